import { ArticleRecord, isArticleRecord } from './article.entity';

export interface HeadlineCacheKey {
  country: string;
  category?: string;
  /** Calendar day, YYYY-MM-DD. */
  date: string;
}

export interface HeadlineCacheEntry {
  date: string;
  timestamp: string;
  country: string;
  category: string | null;
  headlines: ArticleRecord[];
}

export function cacheKeyToString(key: HeadlineCacheKey): string {
  return `${key.country}|${key.category ?? ''}|${key.date}`;
}

export function cacheFileName(key: HeadlineCacheKey): string {
  return key.category
    ? `headlines_${key.country}_${key.category}_${key.date}.json`
    : `headlines_${key.country}_${key.date}.json`;
}

export function parseCacheEntry(raw: unknown): HeadlineCacheEntry | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const v = raw as Record<string, unknown>;
  if (typeof v.date !== 'string' || typeof v.country !== 'string') {
    return undefined;
  }
  if (!Array.isArray(v.headlines) || !v.headlines.every(isArticleRecord)) {
    return undefined;
  }
  const category =
    typeof v.category === 'string' && v.category.length > 0 ? v.category : null;
  return {
    date: v.date,
    timestamp: typeof v.timestamp === 'string' ? v.timestamp : '',
    country: v.country,
    category,
    headlines: v.headlines,
  };
}
