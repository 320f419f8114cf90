import { Module } from '@nestjs/common';
import { LLM_CLIENT, NEWS_SOURCE, VECTOR_STORE } from '../../application/ports';
import { GeminiLlmAdapter } from './gemini-llm.adapter';
import { NewsApiAdapter } from './news-api.adapter';
import { PineconeVectorStoreAdapter } from './pinecone-vector-store.adapter';

/** Binds the outbound ports to the hosted services. */
@Module({
  providers: [
    { provide: NEWS_SOURCE, useClass: NewsApiAdapter },
    { provide: VECTOR_STORE, useClass: PineconeVectorStoreAdapter },
    { provide: LLM_CLIENT, useClass: GeminiLlmAdapter },
  ],
  exports: [NEWS_SOURCE, VECTOR_STORE, LLM_CLIENT],
})
export class AdaptersModule {}
