import { CallHandler, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { createMockLogger } from '../../../test/fakes/mock-logger';
import { UpstreamServiceError } from '../../domain/errors';
import {
  RequestLoggingInterceptor,
  resolveClientIp,
  statusOf,
} from './request-logging.interceptor';

describe('resolveClientIp', () => {
  it('prefers the first X-Forwarded-For hop', () => {
    expect(resolveClientIp({ 'x-forwarded-for': '10.0.0.1, 10.0.0.2' }, '127.0.0.1')).toBe(
      '10.0.0.1',
    );
  });

  it('falls back to X-Real-IP, then the socket, then Unknown', () => {
    expect(resolveClientIp({ 'x-real-ip': '10.1.1.1' }, '127.0.0.1')).toBe('10.1.1.1');
    expect(resolveClientIp({}, '127.0.0.1')).toBe('127.0.0.1');
    expect(resolveClientIp({})).toBe('Unknown');
  });
});

describe('statusOf', () => {
  it('matches the status the error filter responds with', () => {
    expect(statusOf(new NotFoundException())).toBe(404);
    expect(statusOf(new UpstreamServiceError('newsapi', 'down'))).toBe(502);
    expect(statusOf(new Error('x'))).toBe(500);
  });
});

describe('RequestLoggingInterceptor', () => {
  const logger = createMockLogger();
  const interceptor = new RequestLoggingInterceptor(logger);

  function contextFor(statusCode: number) {
    const request = {
      method: 'GET',
      url: '/api/v1/news/headlines?country=us',
      headers: { 'x-forwarded-for': '10.0.0.1' },
      socket: { remoteAddress: '127.0.0.1' },
    };
    const reply = { statusCode, header: jest.fn() };
    return { host: new ExecutionContextHost([request, reply]), reply };
  }

  beforeEach(() => jest.clearAllMocks());

  it('logs the request and its completion at info level and sets X-Process-Time', async () => {
    const { host, reply } = contextFor(200);
    const handler: CallHandler = { handle: () => of({ ok: true }) };

    await expect(lastValueFrom(interceptor.intercept(host, handler))).resolves.toEqual({
      ok: true,
    });

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      'GET /api/v1/news/headlines - Client: 10.0.0.1',
      'HTTP',
    );
    expect(logger.info).toHaveBeenNthCalledWith(
      2,
      expect.stringMatching(/^GET \/api\/v1\/news\/headlines - 200 - \d+\.\d{2}ms - Client: 10\.0\.0\.1$/),
      'HTTP',
    );
    expect(reply.header).toHaveBeenCalledWith('X-Process-Time', expect.any(String));
  });

  it('logs client errors as warnings and rethrows', async () => {
    const { host } = contextFor(200);
    const handler: CallHandler = {
      handle: () => throwError(() => new NotFoundException('missing')),
    };

    await expect(lastValueFrom(interceptor.intercept(host, handler))).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^GET \/api\/v1\/news\/headlines - 404 - /),
      'HTTP',
    );
  });

  it('logs server errors with the error message', async () => {
    const { host } = contextFor(200);
    const failure = new Error('pinecone unreachable');
    const handler: CallHandler = { handle: () => throwError(() => failure) };

    await expect(lastValueFrom(interceptor.intercept(host, handler))).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining('GET /api/v1/news/headlines - ERROR: pinecone unreachable - '),
      failure,
      'HTTP',
    );
  });
});
