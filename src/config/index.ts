import appConfig from './app.config';
import geminiConfig from './gemini.config';
import loggingConfig from './logging.config';
import newsApiConfig from './news-api.config';
import pineconeConfig from './pinecone.config';

export { appConfig, geminiConfig, loggingConfig, newsApiConfig, pineconeConfig };

export const allConfigs = [
  appConfig,
  loggingConfig,
  newsApiConfig,
  pineconeConfig,
  geminiConfig,
];
