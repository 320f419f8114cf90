import { registerAs } from '@nestjs/config';

export interface LoggingConfig {
  level: string;
  dir: string;
  appName: string;
  enableConsole: boolean;
  enableFiles: boolean;
  maxSize: string;
  maxFiles: string;
}

export default registerAs(
  'logging',
  (): LoggingConfig => ({
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || 'logs',
    appName: process.env.APP_NAME || 'newswire',
    enableConsole: (process.env.LOG_ENABLE_CONSOLE || 'true') === 'true',
    enableFiles: (process.env.LOG_ENABLE_FILES || 'true') === 'true',
    maxSize: process.env.LOG_MAX_SIZE || '10m',
    maxFiles: process.env.LOG_MAX_FILES || '5',
  }),
);
