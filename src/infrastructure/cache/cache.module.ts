import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, HEADLINE_CACHE } from '../../application/ports';
import { IClock } from '../../application/ports/clock.port';
import { AppConfig } from '../../config/app.config';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';
import { ClockModule } from '../clock/clock.module';
import { HeadlineCacheService } from './headline-cache.service';

@Module({
  imports: [ClockModule],
  providers: [
    {
      provide: HEADLINE_CACHE,
      inject: [ConfigService, CLOCK, LOGGER],
      useFactory: (
        config: ConfigService,
        clock: IClock,
        logger: ILoggerPort,
      ): HeadlineCacheService => {
        const app = config.getOrThrow<AppConfig>('app');
        return new HeadlineCacheService(
          { serviceMode: app.serviceMode, cacheDir: app.headlinesCacheDir },
          clock,
          logger,
        );
      },
    },
  ],
  exports: [ClockModule, HEADLINE_CACHE],
})
export class CacheModule {}
