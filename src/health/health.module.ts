import { Module } from '@nestjs/common';
import { CacheModule } from '../infrastructure/cache/cache.module';
import { HealthController } from './health.controller';
import { StartupHealthService } from './startup-health.service';

@Module({
  imports: [CacheModule],
  controllers: [HealthController],
  providers: [StartupHealthService],
})
export class HealthModule {}
