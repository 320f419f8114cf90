import { registerAs } from '@nestjs/config';

export interface NewsApiConfig {
  apiKey: string;
  baseUrl: string;
  language: string;
  sortBy: string;
  timeoutMs: number;
}

export default registerAs(
  'newsApi',
  (): NewsApiConfig => ({
    apiKey: process.env.NEWS_API_KEY || '',
    baseUrl: process.env.NEWS_API_BASE_URL || 'https://newsapi.org/v2',
    language: process.env.NEWS_LANGUAGE || 'en',
    sortBy: process.env.NEWS_SORT_BY || 'publishedAt',
    timeoutMs: parseInt(process.env.NEWS_API_TIMEOUT_MS || '15000', 10),
  }),
);
