import { Inject, Injectable } from '@nestjs/common';
import { Counter, Registry } from 'prom-client';

export const METRICS_REGISTRY = 'PrometheusRegistry';

export type CacheLookupResult = 'hit' | 'miss';
export type ChatTransport = 'http' | 'websocket';

@Injectable()
export class ServiceMetrics {
  readonly headlineCacheLookups: Counter<'result'>;
  readonly chatRequests: Counter<'transport'>;

  constructor(@Inject(METRICS_REGISTRY) registry: Registry) {
    this.headlineCacheLookups = new Counter({
      name: 'headline_cache_lookups_total',
      help: 'Headline cache lookups by result',
      labelNames: ['result'],
      registers: [registry],
    });
    this.chatRequests = new Counter({
      name: 'chat_requests_total',
      help: 'Chat requests by transport',
      labelNames: ['transport'],
      registers: [registry],
    });
  }

  recordCacheLookup(result: CacheLookupResult): void {
    this.headlineCacheLookups.inc({ result });
  }

  recordChatRequest(transport: ChatTransport): void {
    this.chatRequests.inc({ transport });
  }
}
