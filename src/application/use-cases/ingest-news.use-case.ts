import { Inject, Injectable } from '@nestjs/common';
import { getErrorInfo } from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../../infrastructure/logging/shared/logger.port';
import { CLOCK, NEWS_SOURCE, VECTOR_STORE } from '../ports';
import { IClock } from '../ports/clock.port';
import { INewsSource, NewsApiArticle, NewsSourceStatus } from '../ports/news-source.port';
import { IVectorStore, VectorStoreStats } from '../ports/vector-store.port';
import { ArticlePreparationService } from '../services/article-preparation.service';

export interface IngestionScope {
  topic?: string;
  country?: string;
  category?: string;
  domain?: string;
}

export interface IngestionSuccess extends IngestionScope {
  success: true;
  articlesFetched: number;
  articlesProcessed: number;
  articlesFailed: number;
  timestamp: string;
}

export interface IngestionFailure extends IngestionScope {
  success: false;
  error: string;
  articlesProcessed: 0;
}

export type IngestionResult = IngestionSuccess | IngestionFailure;

export interface BatchIngestionResult {
  success: true;
  topicsProcessed: number;
  articlesFetched: number;
  articlesProcessed: number;
  articlesFailed: number;
  results: IngestionResult[];
  timestamp: string;
}

export interface TopicOptions {
  fromDate?: string;
  language?: string;
  sortBy?: string;
}

export type PipelineStatus =
  | { success: true; newsApi: NewsSourceStatus; vectorStore: VectorStoreStats; timestamp: string }
  | { success: false; error: string };

const CONTEXT = 'IngestNewsUseCase';

/**
 * Fetches articles from the news source and stores them as vector records.
 * Every operation reports its outcome as a result object instead of throwing.
 */
@Injectable()
export class IngestNewsUseCase {
  constructor(
    @Inject(NEWS_SOURCE) private readonly newsSource: INewsSource,
    @Inject(VECTOR_STORE) private readonly vectorStore: IVectorStore,
    @Inject(CLOCK) private readonly clock: IClock,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
    private readonly preparation: ArticlePreparationService,
  ) {}

  async processTopic(topic: string, options: TopicOptions = {}): Promise<IngestionResult> {
    this.logger.info(`Starting pipeline for topic: ${topic}`, CONTEXT);
    return this.run({ topic }, 'No articles found', 'news', topic, () =>
      this.newsSource.fetchEverything({
        q: topic,
        from: options.fromDate,
        language: options.language,
        sortBy: options.sortBy,
      }),
    );
  }

  async processTopHeadlines(country = 'us', category?: string): Promise<IngestionResult> {
    this.logger.info(
      `Starting pipeline for top headlines (country: ${country}, category: ${category ?? 'all'})`,
      CONTEXT,
    );
    return this.run(
      { country, category },
      'No headlines found',
      'headlines',
      `headlines_${country}`,
      () => this.newsSource.fetchTopHeadlines({ country, category }),
    );
  }

  async processDomain(domain: string, fromDate?: string): Promise<IngestionResult> {
    this.logger.info(`Starting pipeline for domain: ${domain}`, CONTEXT);
    const prefix = `domain_${domain}`;
    return this.run({ domain }, 'No articles found', prefix, prefix, () =>
      this.newsSource.fetchEverything({ domains: domain, from: fromDate }),
    );
  }

  /** Topics run one after another; a failed topic counts as one failure. */
  async batchProcessTopics(
    topics: string[],
    options: TopicOptions = {},
  ): Promise<BatchIngestionResult> {
    this.logger.info(`Starting batch pipeline for ${topics.length} topics`, CONTEXT);
    const results: IngestionResult[] = [];
    let articlesFetched = 0;
    let articlesProcessed = 0;
    let articlesFailed = 0;

    for (const topic of topics) {
      const result = await this.processTopic(topic, options);
      results.push(result);
      if (result.success) {
        articlesFetched += result.articlesFetched;
        articlesProcessed += result.articlesProcessed;
        articlesFailed += result.articlesFailed;
      } else {
        articlesFailed += 1;
      }
    }

    this.logger.info(
      `Batch pipeline completed: ${articlesProcessed} total processed, ${articlesFailed} total failed`,
      CONTEXT,
    );
    return {
      success: true,
      topicsProcessed: topics.length,
      articlesFetched,
      articlesProcessed,
      articlesFailed,
      results,
      timestamp: this.clock.now().toISOString(),
    };
  }

  async status(): Promise<PipelineStatus> {
    try {
      const [newsApi, vectorStore] = await Promise.all([
        this.newsSource.status(),
        this.vectorStore.stats(),
      ]);
      return { success: true, newsApi, vectorStore, timestamp: this.clock.now().toISOString() };
    } catch (error) {
      const { message } = getErrorInfo(error);
      this.logger.error(`Error getting pipeline status: ${message}`, error, CONTEXT);
      return { success: false, error: message };
    }
  }

  private async run(
    scope: IngestionScope,
    emptyMessage: string,
    recordPrefix: string,
    sourceType: string,
    fetch: () => Promise<NewsApiArticle[]>,
  ): Promise<IngestionResult> {
    try {
      const articles = await fetch();
      if (articles.length === 0) {
        this.logger.warn(emptyMessage, CONTEXT, { ...scope });
        return { ...scope, success: false, error: emptyMessage, articlesProcessed: 0 };
      }

      const records = articles.map((article) =>
        this.preparation.toVectorRecord(article, recordPrefix, sourceType),
      );
      const upserted = await this.vectorStore.upsertBatch(records);

      this.logger.info(
        `Pipeline completed: ${upserted.successful} processed, ${upserted.failed} failed`,
        CONTEXT,
        { ...scope },
      );
      return {
        ...scope,
        success: true,
        articlesFetched: articles.length,
        articlesProcessed: upserted.successful,
        articlesFailed: upserted.failed,
        timestamp: this.clock.now().toISOString(),
      };
    } catch (error) {
      const { message } = getErrorInfo(error);
      this.logger.error(`Pipeline failed: ${message}`, error, CONTEXT, { ...scope });
      return { ...scope, success: false, error: message, articlesProcessed: 0 };
    }
  }
}
