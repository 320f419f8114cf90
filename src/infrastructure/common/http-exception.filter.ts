import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ConfigurationError, UpstreamServiceError } from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
  correlationId?: string;
}

export function describeException(exception: unknown): {
  status: number;
  message: string | string[];
} {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'object' && response !== null && 'message' in response) {
      const { message } = response;
      if (typeof message === 'string' || Array.isArray(message)) {
        return { status: exception.getStatus(), message };
      }
    }
    return { status: exception.getStatus(), message: exception.message };
  }
  if (exception instanceof UpstreamServiceError) {
    return { status: HttpStatus.BAD_GATEWAY, message: exception.message };
  }
  if (exception instanceof ConfigurationError) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: exception.message };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal Server Error' };
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(@Inject(LOGGER) private readonly logger: ILoggerPort) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();
    const { status, message } = describeException(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`Unhandled error on ${request.method} ${request.url}`, exception, 'HttpErrorFilter');
    }

    const correlationId = request.headers['x-correlation-id'];
    const payload: ErrorBody = {
      statusCode: status,
      error: HttpStatus[status] || 'Error',
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId: typeof correlationId === 'string' ? correlationId : undefined,
    };

    reply.status(status).send(payload);
  }
}
