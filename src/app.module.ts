import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { allConfigs } from './config';
import { HealthModule } from './health/health.module';
import { HttpErrorFilter } from './infrastructure/common/http-exception.filter';
import { LoggingModule } from './infrastructure/logging/logging.module';
import { RequestContextMiddleware } from './infrastructure/logging/request-context.middleware';
import { RequestLoggingInterceptor } from './infrastructure/logging/request-logging.interceptor';
import { MetricsModule } from './infrastructure/metrics/metrics.module';
import { NewsModule } from './infrastructure/news/news.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: allConfigs,
    }),
    LoggingModule,
    MetricsModule,
    NewsModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_INTERCEPTOR, useClass: RequestLoggingInterceptor },
    { provide: APP_FILTER, useClass: HttpErrorFilter },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
