import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import { RequestContextService } from './shared/request-context.service';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: IncomingMessage, _res: ServerResponse, next: () => void) {
    const requestId = headerValue(req.headers['x-request-id']) || randomUUID();
    const correlationId = headerValue(req.headers['x-correlation-id']) || requestId;
    const serviceName = process.env.SERVICE_NAME || 'api-service';

    this.requestContext.runWith({ requestId, correlationId, serviceName }, () => next());
  }
}
