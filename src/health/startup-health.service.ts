import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { HEADLINE_CACHE } from '../application/ports';
import { IHeadlineCache } from '../application/ports/headline-cache.port';
import { findMissingEnv } from '../config/required-env';
import { ILoggerPort, LOGGER } from '../infrastructure/logging/shared/logger.port';

/** Variables the API needs for search and chat; headlines need only NewsAPI. */
export const API_SERVICE_ENV = [
  'NEWS_API_KEY',
  'PINECONE_API_KEY',
  'PINECONE_INDEX_NAME',
  'GEMINI_API_KEY',
];

@Injectable()
export class StartupHealthService implements OnApplicationBootstrap {
  constructor(
    @Inject(HEADLINE_CACHE) private readonly cache: IHeadlineCache,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
  ) {}

  onApplicationBootstrap(): void {
    const evicted = this.cache.evictStale();
    this.logger.info(
      `Startup: headline cache in ${this.cache.mode} mode, ${evicted} stale entries removed`,
      StartupHealthService.name,
    );

    const missing = findMissingEnv(API_SERVICE_ENV);
    if (missing.length > 0) {
      this.logger.warn(
        `Startup: not configured, dependent endpoints will fail: ${missing.join(', ')}`,
        StartupHealthService.name,
      );
    }
  }
}
