import { IClock } from '../../application/ports/clock.port';
import {
  HeadlineCacheMode,
  IHeadlineCache,
} from '../../application/ports/headline-cache.port';
import { ServiceMode } from '../../config/app.config';
import { ArticleRecord } from '../../domain/entities/article.entity';
import { HeadlineCacheKey } from '../../domain/entities/headline-cache-entry';
import { getErrorInfo } from '../../domain/errors';
import { ILoggerPort } from '../logging/shared/logger.port';
import {
  FileHeadlineStore,
  HeadlineStore,
  MemoryHeadlineStore,
} from './headline-store';

export interface HeadlineCacheOptions {
  serviceMode: ServiceMode;
  cacheDir: string;
}

const CONTEXT = 'HeadlineCache';

/**
 * Daily cache of top headlines keyed by (country, category, day).
 *
 * The backend is picked once: a writable cache directory in a
 * services-enabled deployment gives durable files, anything else gives
 * memory. A failed file write later on moves the cache to memory for the
 * rest of the process.
 */
export class HeadlineCacheService implements IHeadlineCache {
  private store: HeadlineStore;

  constructor(
    options: HeadlineCacheOptions,
    private readonly clock: IClock,
    private readonly logger: ILoggerPort,
  ) {
    this.store = this.selectStore(options);
    this.logger.info(`Headline cache using ${this.store.kind} storage`, CONTEXT);
  }

  get mode(): HeadlineCacheMode {
    return this.store.kind;
  }

  get(country: string, category?: string): ArticleRecord[] | undefined {
    const key = this.keyFor(country, category);
    try {
      const entry = this.store.read(key);
      if (!entry || entry.date !== key.date) return undefined;
      return entry.headlines;
    } catch (error) {
      this.logger.warn(
        `Unreadable headline cache entry for ${country}/${category ?? '-'}: ${getErrorInfo(error).message}`,
        CONTEXT,
      );
      return undefined;
    }
  }

  put(
    country: string,
    category: string | undefined,
    headlines: ArticleRecord[],
  ): void {
    const key = this.keyFor(country, category);
    const entry = {
      date: key.date,
      timestamp: this.clock.now().toISOString(),
      country,
      category: category || null,
      headlines,
    };
    try {
      if (!this.store.write(key, entry)) {
        this.logger.warn(
          `Skipped caching headlines for ${country}/${category ?? '-'}: key is not a valid file name`,
          CONTEXT,
        );
      }
    } catch (error) {
      if (this.store.kind === 'memory') throw error;
      this.logger.error(
        'Headline cache write failed, switching to memory storage',
        error,
        CONTEXT,
      );
      this.store = new MemoryHeadlineStore();
      this.store.write(key, entry);
    }
  }

  evictStale(): number {
    try {
      const removed = this.store.removeStale(this.clock.today());
      if (removed.length > 0) {
        this.logger.info(
          `Evicted ${removed.length} stale headline cache entries`,
          CONTEXT,
          { removed },
        );
      }
      return removed.length;
    } catch (error) {
      this.logger.warn(
        `Stale headline eviction failed: ${getErrorInfo(error).message}`,
        CONTEXT,
      );
      return 0;
    }
  }

  private keyFor(country: string, category?: string): HeadlineCacheKey {
    return { country, category: category || undefined, date: this.clock.today() };
  }

  private selectStore(options: HeadlineCacheOptions): HeadlineStore {
    if (options.serviceMode === 'services-restricted') {
      return new MemoryHeadlineStore();
    }
    if (FileHeadlineStore.probe(options.cacheDir)) {
      return new FileHeadlineStore(options.cacheDir);
    }
    this.logger.warn(
      `Cache directory ${options.cacheDir} is not writable, using memory storage`,
      CONTEXT,
    );
    return new MemoryHeadlineStore();
  }
}
