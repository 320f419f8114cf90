import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { getErrorInfo } from '../../domain/errors';
import { describeException } from '../common/http-exception.filter';
import { ILoggerPort, LOGGER } from './shared/logger.port';

type HeaderBag = Record<string, string | string[] | undefined>;

function firstHeader(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** X-Forwarded-For (first hop), then X-Real-IP, then the socket address. */
export function resolveClientIp(headers: HeaderBag, socketAddress?: string): string {
  const forwardedFor = firstHeader(headers, 'x-forwarded-for');
  if (forwardedFor) return forwardedFor.split(',')[0].trim();
  const realIp = firstHeader(headers, 'x-real-ip');
  if (realIp) return realIp;
  return socketAddress || 'Unknown';
}

export function statusOf(error: unknown): number {
  return describeException(error).status;
}

/**
 * Logs every HTTP request with its status, duration and client address and
 * stamps the duration (seconds) on the X-Process-Time header.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private static readonly CONTEXT = 'HTTP';

  constructor(@Inject(LOGGER) private readonly logger: ILoggerPort) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const reply = http.getResponse<FastifyReply>();
    const { method } = request;
    const path = request.url.split('?')[0];
    const client = resolveClientIp(request.headers, request.socket?.remoteAddress);
    const startedAt = process.hrtime.bigint();

    this.logger.info(`${method} ${path} - Client: ${client}`, RequestLoggingInterceptor.CONTEXT);

    const elapsedSeconds = () => Number(process.hrtime.bigint() - startedAt) / 1e9;

    return next.handle().pipe(
      tap(() => {
        const seconds = elapsedSeconds();
        reply.header('X-Process-Time', String(seconds));
        this.logCompletion(method, path, reply.statusCode, seconds, client);
      }),
      catchError((error: unknown) => {
        const seconds = elapsedSeconds();
        const status = statusOf(error);
        reply.header('X-Process-Time', String(seconds));
        if (status >= 500) {
          this.logger.error(
            `${method} ${path} - ERROR: ${getErrorInfo(error).message} - ${(seconds * 1000).toFixed(2)}ms - Client: ${client}`,
            error,
            RequestLoggingInterceptor.CONTEXT,
          );
        } else {
          this.logCompletion(method, path, status, seconds, client);
        }
        return throwError(() => error);
      }),
    );
  }

  private logCompletion(
    method: string,
    path: string,
    status: number,
    seconds: number,
    client: string,
  ): void {
    const line = `${method} ${path} - ${status} - ${(seconds * 1000).toFixed(2)}ms - Client: ${client}`;
    if (status >= 500) this.logger.error(line, undefined, RequestLoggingInterceptor.CONTEXT);
    else if (status >= 400) this.logger.warn(line, RequestLoggingInterceptor.CONTEXT);
    else this.logger.info(line, RequestLoggingInterceptor.CONTEXT);
  }
}
