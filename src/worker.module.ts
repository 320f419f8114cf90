import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ArticlePreparationService } from './application/services/article-preparation.service';
import { IngestNewsUseCase } from './application/use-cases/ingest-news.use-case';
import { allConfigs } from './config';
import { AdaptersModule } from './infrastructure/adapters/adapters.module';
import { ClockModule } from './infrastructure/clock/clock.module';
import { LoggingModule } from './infrastructure/logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: allConfigs,
    }),
    LoggingModule,
    ClockModule,
    AdaptersModule,
  ],
  providers: [ArticlePreparationService, IngestNewsUseCase],
})
export class WorkerModule {}
