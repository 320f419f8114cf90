import { ArticleRecord } from '../../domain/entities/article.entity';

export type HeadlineCacheMode = 'file' | 'memory';

export interface IHeadlineCache {
  readonly mode: HeadlineCacheMode;
  get(country: string, category?: string): ArticleRecord[] | undefined;
  put(country: string, category: string | undefined, headlines: ArticleRecord[]): void;
  /** Removes every entry not dated today. Returns how many were removed. */
  evictStale(): number;
}
