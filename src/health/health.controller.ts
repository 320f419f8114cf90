import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags } from '@nestjs/swagger';
import { HEADLINE_CACHE } from '../application/ports';
import { HeadlineCacheMode, IHeadlineCache } from '../application/ports/headline-cache.port';
import { AppConfig } from '../config/app.config';

export interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: number;
  service: string;
  cacheMode: HeadlineCacheMode;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly config: ConfigService,
    @Inject(HEADLINE_CACHE) private readonly cache: IHeadlineCache,
  ) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: this.config.getOrThrow<AppConfig>('app').serviceName,
      cacheMode: this.cache.mode,
    };
  }
}
