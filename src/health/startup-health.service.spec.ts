import { IHeadlineCache } from '../application/ports/headline-cache.port';
import { createMockLogger } from '../../test/fakes/mock-logger';
import { StartupHealthService } from './startup-health.service';

describe('StartupHealthService', () => {
  const OLD_ENV = process.env;
  let cache: jest.Mocked<IHeadlineCache>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    process.env = { ...OLD_ENV };
    cache = { mode: 'file', get: jest.fn(), put: jest.fn(), evictStale: jest.fn().mockReturnValue(3) };
    logger = createMockLogger();
  });

  afterAll(() => {
    process.env = OLD_ENV;
  });

  it('evicts stale headlines on bootstrap', () => {
    new StartupHealthService(cache, logger).onApplicationBootstrap();

    expect(cache.evictStale).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      'Startup: headline cache in file mode, 3 stale entries removed',
      'StartupHealthService',
    );
  });

  it('warns about missing configuration', () => {
    process.env.NEWS_API_KEY = 'test-news-key';
    process.env.PINECONE_API_KEY = 'test-pinecone-key';
    process.env.PINECONE_INDEX_NAME = 'news';
    delete process.env.GEMINI_API_KEY;

    new StartupHealthService(cache, logger).onApplicationBootstrap();

    expect(logger.warn).toHaveBeenCalledWith(
      'Startup: not configured, dependent endpoints will fail: GEMINI_API_KEY',
      'StartupHealthService',
    );
  });
});
