import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IngestPipeline, readTopicsFile, runIngestCli } from './ingest.cli';

const ok = {
  success: true as const,
  articlesFetched: 4,
  articlesProcessed: 3,
  articlesFailed: 1,
  timestamp: '2024-05-01T09:30:00.000Z',
};

describe('news-ingest CLI', () => {
  const env = { NEWS_API_KEY: 'test-news-key', PINECONE_API_KEY: 'test-pinecone-key' };
  let pipeline: jest.Mocked<IngestPipeline>;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    pipeline = {
      processTopic: jest.fn().mockResolvedValue({ ...ok, topic: 'ai' }),
      processTopHeadlines: jest.fn().mockResolvedValue(ok),
      processDomain: jest.fn().mockResolvedValue(ok),
      batchProcessTopics: jest.fn().mockResolvedValue({ ...ok, topicsProcessed: 2, results: [] }),
      status: jest.fn().mockResolvedValue({ success: true, timestamp: ok.timestamp }),
    };
    out = [];
    err = [];
  });

  const run = (argv: string[], environment: NodeJS.ProcessEnv = env) =>
    runIngestCli(argv, {
      pipeline: async () => pipeline,
      print: (line) => out.push(line),
      printError: (line) => err.push(line),
      env: environment,
    });

  it('runs a single topic and prints the summary', async () => {
    const code = await run(['run', '--mode', 'topic', '--topics', 'ai', '--from-date', '2024-04-30']);

    expect(code).toBe(0);
    expect(pipeline.processTopic).toHaveBeenCalledWith('ai', {
      fromDate: '2024-04-30',
      language: 'en',
      sortBy: 'publishedAt',
    });
    expect(out).toEqual([
      '',
      '=== Pipeline Results ===',
      'Success: true',
      'Articles fetched: 4',
      'Articles processed: 3',
      'Articles failed: 1',
      'Timestamp: 2024-05-01T09:30:00.000Z',
    ]);
  });

  it('runs headlines with the default country', async () => {
    await expect(run(['run', '--mode', 'headlines', '--category', 'science'])).resolves.toBe(0);
    expect(pipeline.processTopHeadlines).toHaveBeenCalledWith('us', 'science');
  });

  it('runs a domain', async () => {
    await expect(run(['run', '--mode', 'domain', '--domain', 'bbc.co.uk'])).resolves.toBe(0);
    expect(pipeline.processDomain).toHaveBeenCalledWith('bbc.co.uk', undefined);
  });

  it('merges --topics with a topics file for batch mode', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'topics-'));
    const file = path.join(dir, 'topics.txt');
    fs.writeFileSync(file, '# weekly\nspace\n\n  elections \n');
    try {
      const code = await run(['run', '--mode', 'batch', '--topics', 'ai', '--topics-file', file]);
      expect(code).toBe(0);
      expect(pipeline.batchProcessTopics).toHaveBeenCalledWith(['ai', 'space', 'elections'], {
        fromDate: undefined,
        language: 'en',
        sortBy: 'publishedAt',
      });
      expect(out).toContain('Topics processed: 2');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports every missing variable at once', async () => {
    const code = await run(['run', '--mode', 'headlines'], {});
    expect(code).toBe(1);
    expect(err).toEqual(['Missing required environment variables: NEWS_API_KEY, PINECONE_API_KEY']);
    expect(pipeline.processTopHeadlines).not.toHaveBeenCalled();
  });

  it('rejects incomplete mode arguments', async () => {
    await expect(run(['run', '--mode', 'topic', '--topics', 'a', 'b'])).resolves.toBe(1);
    await expect(run(['run', '--mode', 'domain'])).resolves.toBe(1);
    await expect(run(['run', '--mode', 'batch'])).resolves.toBe(1);
    await expect(run(['run', '--mode', 'topic', '--topics', 'a', '--from-date', '01/05/2024'])).resolves.toBe(1);
    expect(err).toEqual([
      'Topic mode requires exactly one topic',
      'Domain mode requires --domain',
      'Batch mode requires --topics or --topics-file',
      '--from-date must be in YYYY-MM-DD format',
    ]);
  });

  it('rejects an unknown mode', async () => {
    await expect(run(['run', '--mode', 'weekly'])).resolves.toBe(1);
    expect(err.join('\n')).toContain('weekly');
  });

  it('exits with 1 when the pipeline reports a failure', async () => {
    pipeline.processTopic.mockResolvedValueOnce({
      success: false,
      error: 'No articles found',
      articlesProcessed: 0,
      topic: 'ai',
    });

    await expect(run(['run', '--mode', 'topic', '--topics', 'ai'])).resolves.toBe(1);
    expect(err).toEqual(['Pipeline failed: No articles found']);
  });

  it('stops when the status check fails', async () => {
    pipeline.status.mockResolvedValueOnce({ success: false, error: 'unauthorized' });

    await expect(run(['run', '--mode', 'headlines'])).resolves.toBe(1);
    expect(err).toEqual(['Pipeline status check failed: unauthorized']);
    expect(pipeline.processTopHeadlines).not.toHaveBeenCalled();
  });

  it('prints status as JSON', async () => {
    await expect(run(['status'])).resolves.toBe(0);
    expect(JSON.parse(out[0])).toEqual({ success: true, timestamp: ok.timestamp });
  });

  it('reads topics files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'topics-'));
    const file = path.join(dir, 'topics.txt');
    fs.writeFileSync(file, 'a\r\n#b\r\nc\r\n');
    try {
      expect(readTopicsFile(file)).toEqual(['a', 'c']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
