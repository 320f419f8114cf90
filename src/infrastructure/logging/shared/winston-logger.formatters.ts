import * as winston from 'winston';
import { RequestContextService } from './request-context.service';
import { deepRedact, redactUrl } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
};

const CONSOLE_OMITTED_KEYS = new Set([
  'timestamp',
  'level',
  'message',
  'context',
  'trace',
  'requestId',
  'correlationId',
  'serviceName',
]);

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (typeof value === 'object') return humanizeObjectInline(value);
  return String(value);
}

export function humanizeObjectInline(obj: object): string {
  return Object.entries(obj)
    .map(([k, v]) => `${k}=${humanizeValueInline(v)}`)
    .join(' ');
}

const redactFormat = winston.format((info) => {
  const { message, level } = info;
  const redacted = deepRedact({ ...info });
  const text = typeof message === 'string' ? redactUrl(message) : message;
  return Object.assign(info, redacted, { message: text, level });
});

export function makeAttachRequestContextFormat(ctx?: RequestContextService) {
  return winston.format((info) => {
    if (!ctx) return info;
    const requestId = ctx.getRequestId();
    const correlationId = ctx.getCorrelationId();
    const serviceName = ctx.getServiceName();
    if (requestId && !info.requestId) info.requestId = requestId;
    if (correlationId && !info.correlationId) info.correlationId = correlationId;
    if (serviceName && !info.serviceName) info.serviceName = serviceName;
    return info;
  });
}

export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const level = String(info.level);
  const requestPart = typeof info.requestId === 'string' ? ` [req:${info.requestId}]` : '';
  const contextLabel = typeof info.context === 'string' ? ` [${info.context}]` : '';
  const icon = levelIcon[level] || '•';
  const trace = typeof info.trace === 'string' ? `\n${info.trace}` : '';

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(info)) {
    if (!CONSOLE_OMITTED_KEYS.has(key)) extra[key] = value;
  }
  const restPart = Object.keys(extra).length ? ` ${humanizeObjectInline(extra)}` : '';
  const line = `${String(info.timestamp)} ${icon} ${level.toUpperCase().padEnd(7)}${requestPart}${contextLabel}: ${`${String(info.message)}${restPart}`.trim()}`;
  return `${line}${trace}`.trimEnd();
}

export function makePrettyConsoleFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(formatConsoleLine),
  );
}

export function makeJsonFileFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
