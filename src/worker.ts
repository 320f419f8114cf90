#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { IngestNewsUseCase } from './application/use-cases/ingest-news.use-case';
import { runIngestCli } from './cli/ingest.cli';
import { WinstonLoggerAdapter } from './infrastructure/logging/shared/winston-logger.adapter';
import { WorkerModule } from './worker.module';

async function main(): Promise<number> {
  let context: INestApplicationContext | undefined;
  try {
    return await runIngestCli(process.argv.slice(2), {
      pipeline: async () => {
        context = await NestFactory.createApplicationContext(WorkerModule, { bufferLogs: true });
        context.useLogger(context.get(WinstonLoggerAdapter));
        return context.get(IngestNewsUseCase);
      },
      print: (line) => console.log(line),
      printError: (line) => console.error(line),
    });
  } finally {
    await context?.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Ingestion worker crashed', error);
    process.exitCode = 1;
  });
