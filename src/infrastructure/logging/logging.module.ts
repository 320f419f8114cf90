import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LOGGER } from './shared/logger.port';
import { RequestContextService } from './shared/request-context.service';
import { WinstonLoggerAdapter } from './shared/winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    RequestContextService,
    WinstonLoggerAdapter,
    { provide: LOGGER, useExisting: WinstonLoggerAdapter },
  ],
  exports: [LOGGER, WinstonLoggerAdapter, RequestContextService],
})
export class LoggingModule {}
