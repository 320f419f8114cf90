import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { findMissingEnv, INGESTION_REQUIRED_ENV } from '../config/required-env';
import { getErrorInfo } from '../domain/errors';
import {
  BatchIngestionResult,
  IngestionResult,
  IngestNewsUseCase,
} from '../application/use-cases/ingest-news.use-case';

export const INGEST_MODES = ['topic', 'headlines', 'domain', 'batch'] as const;
export type IngestMode = (typeof INGEST_MODES)[number];

export type IngestPipeline = Pick<
  IngestNewsUseCase,
  'processTopic' | 'processTopHeadlines' | 'processDomain' | 'batchProcessTopics' | 'status'
>;

export interface IngestCliDeps {
  /** Creates the pipeline; called only once arguments are valid. */
  pipeline(): Promise<IngestPipeline>;
  print(line: string): void;
  printError(line: string): void;
  env?: NodeJS.ProcessEnv;
}

export interface RunOptions {
  mode: IngestMode;
  topics?: string[];
  topicsFile?: string;
  domain?: string;
  country: string;
  category?: string;
  fromDate?: string;
  language: string;
  sortBy: string;
}

class UsageError extends Error {}

/** One topic per line; blank lines and `#` comments are skipped. */
export function readTopicsFile(file: string): string[] {
  return readFileSync(file, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function collectTopics(options: RunOptions): string[] {
  const topics = [...(options.topics ?? [])];
  if (options.topicsFile) topics.push(...readTopicsFile(options.topicsFile));
  return topics;
}

function validate(options: RunOptions, topics: string[]): void {
  if (options.fromDate && !/^\d{4}-\d{2}-\d{2}$/.test(options.fromDate)) {
    throw new UsageError('--from-date must be in YYYY-MM-DD format');
  }
  if (options.mode === 'topic' && topics.length !== 1) {
    throw new UsageError('Topic mode requires exactly one topic');
  }
  if (options.mode === 'domain' && !options.domain) {
    throw new UsageError('Domain mode requires --domain');
  }
  if (options.mode === 'batch' && topics.length === 0) {
    throw new UsageError('Batch mode requires --topics or --topics-file');
  }
}

function execute(
  pipeline: IngestPipeline,
  options: RunOptions,
  topics: string[],
): Promise<IngestionResult | BatchIngestionResult> {
  const topicOptions = {
    fromDate: options.fromDate,
    language: options.language,
    sortBy: options.sortBy,
  };
  switch (options.mode) {
    case 'topic':
      return pipeline.processTopic(topics[0], topicOptions);
    case 'headlines':
      return pipeline.processTopHeadlines(options.country, options.category);
    case 'domain':
      return pipeline.processDomain(options.domain ?? '', options.fromDate);
    case 'batch':
      return pipeline.batchProcessTopics(topics, topicOptions);
  }
}

export function formatResult(result: IngestionResult | BatchIngestionResult): string[] {
  if (!result.success) return [`Pipeline failed: ${result.error}`];
  const lines = ['', '=== Pipeline Results ===', `Success: ${result.success}`];
  if ('topicsProcessed' in result) lines.push(`Topics processed: ${result.topicsProcessed}`);
  lines.push(
    `Articles fetched: ${result.articlesFetched}`,
    `Articles processed: ${result.articlesProcessed}`,
    `Articles failed: ${result.articlesFailed}`,
    `Timestamp: ${result.timestamp}`,
  );
  return lines;
}

function missingConfiguration(deps: IngestCliDeps): string | undefined {
  const missing = findMissingEnv(INGESTION_REQUIRED_ENV, deps.env ?? process.env);
  return missing.length > 0
    ? `Missing required environment variables: ${missing.join(', ')}`
    : undefined;
}

async function runCommand(options: RunOptions, deps: IngestCliDeps): Promise<number> {
  const topics = collectTopics(options);
  validate(options, topics);

  const pipeline = await deps.pipeline();
  const missing = missingConfiguration(deps);
  if (missing) {
    deps.printError(missing);
    return 1;
  }

  const status = await pipeline.status();
  if (!status.success) {
    deps.printError(`Pipeline status check failed: ${status.error}`);
    return 1;
  }

  const result = await execute(pipeline, options, topics);
  const lines = formatResult(result);
  if (!result.success) {
    lines.forEach((line) => deps.printError(line));
    return 1;
  }
  lines.forEach((line) => deps.print(line));
  return 0;
}

async function statusCommand(deps: IngestCliDeps): Promise<number> {
  const pipeline = await deps.pipeline();
  const missing = missingConfiguration(deps);
  if (missing) {
    deps.printError(missing);
    return 1;
  }
  const status = await pipeline.status();
  if (!status.success) {
    deps.printError(`Pipeline status check failed: ${status.error}`);
    return 1;
  }
  deps.print(JSON.stringify(status, null, 2));
  return 0;
}

/** Parses `argv` (without node and script) and returns the exit code. */
export async function runIngestCli(argv: string[], deps: IngestCliDeps): Promise<number> {
  let exitCode = 0;
  const program = new Command('news-ingest')
    .description('Fetch news from NewsAPI and store it in the vector index')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.print(text.trimEnd()),
      writeErr: (text) => deps.printError(text.trimEnd()),
    });

  program
    .command('run')
    .description('Run the ingestion pipeline once')
    .addOption(
      new Option('--mode <mode>', 'pipeline mode').choices(INGEST_MODES).makeOptionMandatory(),
    )
    .option('--topics <topics...>', 'topics to process (topic and batch modes)')
    .option('--topics-file <path>', 'file with one topic per line')
    .option('--domain <domain>', 'domain to process (domain mode)')
    .option('--country <country>', 'country for headlines', 'us')
    .option('--category <category>', 'category for headlines')
    .option('--from-date <date>', 'oldest publish date, YYYY-MM-DD')
    .option('--language <language>', 'article language', 'en')
    .option('--sort-by <field>', 'NewsAPI sort order', 'publishedAt')
    .action(async (options: RunOptions) => {
      exitCode = await runCommand(options, deps);
    });

  program
    .command('status')
    .description('Show NewsAPI and vector index status')
    .action(async () => {
      exitCode = await statusCommand(deps);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    if (error instanceof UsageError) {
      deps.printError(error.message);
      return 1;
    }
    deps.printError(`Pipeline execution failed: ${getErrorInfo(error).message}`);
    return 1;
  }
}
