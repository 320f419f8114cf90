import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/app.config';
import { ILoggerPort, LOGGER } from './infrastructure/logging/shared/logger.port';
import { WinstonLoggerAdapter } from './infrastructure/logging/shared/winston-logger.adapter';
import { ChatSocketServer } from './infrastructure/ws/chat-socket.server';

/** Pipes and CORS shared by the server and the e2e tests. */
export function configureApp(app: NestFastifyApplication): void {
  app.enableShutdownHooks();
  app.enableCors({ origin: '*' });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: true,
    }),
  );
}

function setupSwagger(app: NestFastifyApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Newswire API')
    .setDescription('News search, daily headlines and article chat')
    .setVersion('1.0.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, { jsonDocumentUrl: 'api/docs-json' });
}

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ trustProxy: true }),
    { bufferLogs: true },
  );
  app.useLogger(app.get(WinstonLoggerAdapter));
  configureApp(app);
  setupSwagger(app);

  const { port } = app.get(ConfigService).getOrThrow<AppConfig>('app');
  await app.listen({ port, host: '0.0.0.0' });
  app.get(ChatSocketServer).attach(app.getHttpServer());

  app.get<ILoggerPort>(LOGGER).info(`API service running on port ${port}`, 'Bootstrap');
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    console.error('API service failed to start', error);
    process.exit(1);
  });
}
