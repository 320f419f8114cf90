import { Inject, Injectable } from '@nestjs/common';
import { VECTOR_STORE } from '../ports';
import { IVectorStore } from '../ports/vector-store.port';

export interface NewsSearchResult {
  title: string;
  url: string;
  summary: string;
  published_at: string;
}

export const DEFAULT_SEARCH_LIMIT = 10;

function field(fields: Record<string, unknown>, name: string): string {
  const value = fields[name];
  return typeof value === 'string' ? value : '';
}

@Injectable()
export class SearchNewsUseCase {
  constructor(@Inject(VECTOR_STORE) private readonly vectorStore: IVectorStore) {}

  async execute(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<NewsSearchResult[]> {
    const matches = await this.vectorStore.search(query, limit);
    return matches.map(({ fields }) => ({
      title: field(fields, 'title'),
      url: field(fields, 'url'),
      summary: field(fields, 'summary') || field(fields, 'description'),
      published_at: field(fields, 'published_at'),
    }));
  }
}
