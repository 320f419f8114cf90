import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import { LogContext } from './logger.port';

export interface RequestContextStore extends LogContext {
  requestId?: string;
  correlationId?: string;
  serviceName?: string;
}

@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContextStore>();

  runWith<T>(store: RequestContextStore, callback: () => T): T {
    return this.storage.run(store, callback);
  }

  get<K extends keyof RequestContextStore>(key: K): RequestContextStore[K] | undefined {
    return this.storage.getStore()?.[key];
  }

  getStore(): RequestContextStore | undefined {
    return this.storage.getStore();
  }

  getRequestId(): string | undefined {
    return this.get('requestId');
  }

  getCorrelationId(): string | undefined {
    return this.get('correlationId');
  }

  getServiceName(): string | undefined {
    return this.get('serviceName');
  }
}
