import { registerAs } from '@nestjs/config';

export interface PineconeConfig {
  apiKey: string;
  indexName: string;
  host: string;
  namespace: string;
}

export default registerAs(
  'pinecone',
  (): PineconeConfig => ({
    apiKey: process.env.PINECONE_API_KEY || '',
    indexName: process.env.PINECONE_INDEX_NAME || '',
    host: process.env.PINECONE_HOST || '',
    namespace: process.env.PINECONE_NAMESPACE || '',
  }),
);
