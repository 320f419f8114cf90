import { Inject, Injectable } from '@nestjs/common';
import { ArticleRecord } from '../../domain/entities/article.entity';
import { ServiceMetrics } from '../../infrastructure/metrics/service-metrics';
import { ILoggerPort, LOGGER } from '../../infrastructure/logging/shared/logger.port';
import { CLOCK, HEADLINE_CACHE, NEWS_SOURCE } from '../ports';
import { IClock } from '../ports/clock.port';
import { IHeadlineCache } from '../ports/headline-cache.port';
import { INewsSource } from '../ports/news-source.port';
import { ArticlePreparationService } from '../services/article-preparation.service';

export interface HeadlinesResult {
  country: string;
  category: string | null;
  date: string;
  cached: boolean;
  headlines: ArticleRecord[];
}

/**
 * Serves today's top headlines, fetching from the news source only when the
 * daily cache has no entry for the (country, category) pair.
 */
@Injectable()
export class GetHeadlinesUseCase {
  constructor(
    @Inject(HEADLINE_CACHE) private readonly cache: IHeadlineCache,
    @Inject(NEWS_SOURCE) private readonly newsSource: INewsSource,
    @Inject(CLOCK) private readonly clock: IClock,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
    private readonly preparation: ArticlePreparationService,
    private readonly metrics: ServiceMetrics,
  ) {}

  async execute(country: string, category?: string): Promise<HeadlinesResult> {
    const normalizedCategory = category || undefined;
    const date = this.clock.today();
    const cached = this.cache.get(country, normalizedCategory);
    if (cached) {
      this.metrics.recordCacheLookup('hit');
      return this.result(country, normalizedCategory, date, true, cached);
    }

    this.metrics.recordCacheLookup('miss');
    const raw = await this.newsSource.fetchTopHeadlines({
      country,
      category: normalizedCategory,
    });
    const headlines = raw
      .filter((article) => Boolean(article.url))
      .map((article) => this.preparation.toArticle(article).toRecord());

    this.cache.evictStale();
    this.cache.put(country, normalizedCategory, headlines);
    this.logger.info(
      `Cached ${headlines.length} headlines for ${country}/${normalizedCategory ?? 'all'}`,
      'GetHeadlinesUseCase',
    );
    return this.result(country, normalizedCategory, date, false, headlines);
  }

  private result(
    country: string,
    category: string | undefined,
    date: string,
    cached: boolean,
    headlines: ArticleRecord[],
  ): HeadlinesResult {
    return { country, category: category ?? null, date, cached, headlines };
  }
}
