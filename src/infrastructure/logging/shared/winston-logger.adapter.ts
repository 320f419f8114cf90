import { Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { AppConfig } from '../../../config/app.config';
import { LoggingConfig } from '../../../config/logging.config';
import { ILoggerPort, LogContext, LogLevel } from './logger.port';
import { RequestContextService } from './request-context.service';
import { makeJsonFileFormat, makePrettyConsoleFormat } from './winston-logger.formatters';

const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info',
  dir: 'logs',
  appName: 'newswire',
  enableConsole: true,
  enableFiles: true,
  maxSize: '10m',
  maxFiles: '5',
};

/**
 * Creates the log directory. Read-only filesystems (serverless, locked down
 * containers) make this fail, in which case only the console is used.
 */
export function prepareLogDirectory(dir: string): boolean {
  try {
    const absDir = path.isAbsolute(dir) ? dir : path.join(process.cwd(), dir);
    fs.mkdirSync(absDir, { recursive: true });
    return true;
  } catch {
    return false;
  }
}

@Injectable()
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;
  readonly filesEnabled: boolean;

  constructor(
    private readonly configService: ConfigService,
    @Optional() private readonly requestContext?: RequestContextService,
  ) {
    const settings: LoggingConfig = {
      ...DEFAULT_LOGGING,
      ...this.configService.get<LoggingConfig>('logging'),
    };
    const app = this.configService.get<AppConfig>('app');
    const restricted = app?.serviceMode === 'services-restricted';

    this.filesEnabled =
      settings.enableFiles && !restricted && prepareLogDirectory(settings.dir);

    const consoleTransport = new winston.transports.Console({
      level: settings.level,
      format: makePrettyConsoleFormat(this.requestContext),
      silent: !settings.enableConsole,
    });

    const jsonFormat = makeJsonFileFormat(this.requestContext);
    const rotateFile = (name: string, level?: string) =>
      new DailyRotateFile({
        dirname: settings.dir,
        filename: `${settings.appName}-%DATE%-${name}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: settings.maxSize,
        maxFiles: settings.maxFiles,
        level: level || settings.level,
        format: jsonFormat,
      });

    const transports = this.filesEnabled
      ? [consoleTransport, rotateFile('combined'), rotateFile('error', 'error')]
      : [consoleTransport];

    this.logger = winston.createLogger({
      level: settings.level,
      transports,
      exitOnError: false,
    });
  }

  private buildMeta(
    error: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): Record<string, unknown> {
    const meta: Record<string, unknown> = { ...this.requestContext?.getStore() };
    if (typeof context === 'string') meta.context = context;
    else if (context) Object.assign(meta, context);
    if (metadata) Object.assign(meta, metadata);

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = { name: error.name, message: error.message };
    } else if (error !== undefined) {
      meta.error = error;
    }
    return meta;
  }

  log(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildMeta(undefined, context, metadata));
  }

  info(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildMeta(undefined, context, metadata));
  }

  debug(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.debug(message, this.buildMeta(undefined, context, metadata));
  }

  verbose(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.verbose(message, this.buildMeta(undefined, context, metadata));
  }

  warn(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.warn(message, this.buildMeta(undefined, context, metadata));
  }

  error(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    // Nest calls error(message, stack, context) with a string stack trace
    if (typeof error === 'string' && context === undefined) {
      this.logger.error(message, this.buildMeta(undefined, error, metadata));
      return;
    }
    this.logger.error(message, this.buildMeta(error, context, metadata));
  }

  fatal(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(message, { ...this.buildMeta(error, context, metadata), fatal: true });
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level === 'fatal' ? 'error' : level;
  }

  getLevel(): string {
    return this.logger.level;
  }
}
