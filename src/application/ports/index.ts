export * from './clock.port';
export * from './headline-cache.port';
export * from './llm-client.port';
export * from './news-source.port';
export * from './vector-store.port';

export const CLOCK = 'IClock';
export const HEADLINE_CACHE = 'IHeadlineCache';
export const LLM_CLIENT = 'ILlmClient';
export const NEWS_SOURCE = 'INewsSource';
export const VECTOR_STORE = 'IVectorStore';
