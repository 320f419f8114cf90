import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import {
  EverythingQuery,
  INewsSource,
  NewsApiArticle,
  NewsSourceStatus,
  TopHeadlinesQuery,
} from '../../application/ports/news-source.port';
import { NewsApiConfig } from '../../config/news-api.config';
import { getErrorInfo, UpstreamServiceError } from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';

interface NewsApiResponse {
  status?: string;
  code?: string;
  message?: string;
  totalResults?: number;
  articles?: NewsApiArticle[];
}

type QueryParams = Record<string, string | number>;

const CONTEXT = 'NewsApiAdapter';

function compact(params: Record<string, string | number | undefined>): QueryParams {
  const result: QueryParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const body: unknown = error.response?.data;
    if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
    if (error.response) return `HTTP ${error.response.status}`;
  }
  return getErrorInfo(error).message;
}

@Injectable()
export class NewsApiAdapter implements INewsSource {
  constructor(
    private readonly config: ConfigService,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
  ) {}

  private get settings(): NewsApiConfig {
    return this.config.getOrThrow<NewsApiConfig>('newsApi');
  }

  async fetchEverything(query: EverythingQuery): Promise<NewsApiArticle[]> {
    const { language, sortBy } = this.settings;
    const body = await this.request(
      'everything',
      compact({
        q: query.q,
        domains: query.domains,
        language: query.language || language,
        sortBy: query.sortBy || sortBy,
        from: query.from,
        to: query.to,
      }),
    );
    return body.articles ?? [];
  }

  async fetchTopHeadlines(query: TopHeadlinesQuery): Promise<NewsApiArticle[]> {
    const body = await this.request(
      'top-headlines',
      compact({ country: query.country, category: query.category }),
    );
    return body.articles ?? [];
  }

  async status(): Promise<NewsSourceStatus> {
    try {
      const body = await this.request('top-headlines', { country: 'us', pageSize: 1 });
      return {
        status: 'ok',
        totalResults: body.totalResults ?? 0,
        articlesFound: body.articles?.length ?? 0,
      };
    } catch (error) {
      return { status: 'error', message: getErrorInfo(error).message };
    }
  }

  private async request(endpoint: string, params: QueryParams): Promise<NewsApiResponse> {
    const { apiKey, baseUrl, timeoutMs } = this.settings;
    const url = `${baseUrl}/${endpoint}`;
    this.logger.debug(`GET ${url}`, CONTEXT, { params });

    let response: AxiosResponse<NewsApiResponse>;
    try {
      response = await axios.get<NewsApiResponse>(url, {
        params,
        headers: { 'X-Api-Key': apiKey },
        timeout: timeoutMs,
      });
    } catch (error) {
      const message = `NewsAPI request failed: ${describeFailure(error)}`;
      this.logger.error(message, error, CONTEXT, { endpoint });
      throw new UpstreamServiceError('newsapi', message, error);
    }

    const body = response.data;
    if (body?.status !== 'ok') {
      const message = `NewsAPI error: ${body?.message || 'unexpected response'}`;
      this.logger.warn(message, CONTEXT, { endpoint, code: body?.code });
      throw new UpstreamServiceError('newsapi', message);
    }
    this.logger.info(
      `NewsAPI ${endpoint} returned ${body.articles?.length ?? 0} articles`,
      CONTEXT,
    );
    return body;
  }
}
