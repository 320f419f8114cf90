const mockIndex = {
  namespace: jest.fn(),
  searchRecords: jest.fn(),
  upsertRecords: jest.fn(),
  deleteOne: jest.fn(),
  fetch: jest.fn(),
  describeIndexStats: jest.fn(),
};
const mockClientIndex = jest.fn(() => mockIndex);

jest.mock('@pinecone-database/pinecone', () => ({
  Pinecone: jest.fn().mockImplementation(() => ({ index: mockClientIndex })),
}));

import { ConfigService } from '@nestjs/config';
import { Pinecone } from '@pinecone-database/pinecone';
import { VectorRecord } from '../../application/ports/vector-store.port';
import { ConfigurationError, UpstreamServiceError } from '../../domain/errors';
import { createMockLogger } from '../../../test/fakes/mock-logger';
import { PineconeVectorStoreAdapter } from './pinecone-vector-store.adapter';

const record = (n: number): VectorRecord => ({
  id: `news_${n}`,
  text: `Article ${n}`,
  metadata: { source_type: 'topic', title: `Title ${n}` },
});

function makeAdapter(overrides: Partial<Record<string, string>> = {}) {
  const config = new ConfigService({
    pinecone: {
      apiKey: 'test-pinecone-key',
      indexName: 'news',
      host: '',
      namespace: '',
      ...overrides,
    },
  });
  return new PineconeVectorStoreAdapter(config, createMockLogger());
}

describe('PineconeVectorStoreAdapter', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockIndex.namespace.mockReturnValue(mockIndex);
  });

  it('raises a configuration error on first use when unconfigured', async () => {
    const adapter = makeAdapter({ apiKey: '' });
    await expect(adapter.search('q', 5)).rejects.toBeInstanceOf(ConfigurationError);
    expect(Pinecone).not.toHaveBeenCalled();
  });

  it('creates the client once, lazily, scoped to the namespace', async () => {
    const adapter = makeAdapter({ host: 'https://news.svc.test', namespace: 'articles' });
    expect(Pinecone).not.toHaveBeenCalled();
    mockIndex.deleteOne.mockResolvedValue(undefined);

    await adapter.delete('news_1');
    await adapter.delete('news_2');

    expect(Pinecone).toHaveBeenCalledTimes(1);
    expect(Pinecone).toHaveBeenCalledWith({ apiKey: 'test-pinecone-key' });
    expect(mockClientIndex).toHaveBeenCalledWith('news', 'https://news.svc.test');
    expect(mockIndex.namespace).toHaveBeenCalledWith('articles');
    expect(mockIndex.deleteOne).toHaveBeenLastCalledWith('news_2');
  });

  it('maps search hits to matches and forwards the filter', async () => {
    mockIndex.searchRecords.mockResolvedValueOnce({
      result: {
        hits: [{ _id: 'news_1', _score: 0.91, fields: { text: 'Article 1', title: 'Title 1' } }],
      },
    });

    const matches = await makeAdapter().search('elections', 20, { source_type: 'topic' });

    expect(matches).toEqual([
      { id: 'news_1', score: 0.91, fields: { text: 'Article 1', title: 'Title 1' } },
    ]);
    expect(mockIndex.searchRecords).toHaveBeenCalledWith({
      query: { topK: 20, inputs: { text: 'elections' }, filter: { source_type: 'topic' } },
    });
    expect(mockClientIndex).toHaveBeenCalledWith('news', undefined);
  });

  it('wraps search failures as upstream errors', async () => {
    mockIndex.searchRecords.mockRejectedValueOnce(new Error('503 Service Unavailable'));

    await expect(makeAdapter().search('q', 3)).rejects.toEqual(
      new UpstreamServiceError('pinecone', 'Pinecone search failed: 503 Service Unavailable'),
    );
  });

  it('upserts a record with its text length and flattened metadata', async () => {
    mockIndex.upsertRecords.mockResolvedValueOnce(undefined);

    await makeAdapter().upsert(record(1));

    expect(mockIndex.upsertRecords).toHaveBeenCalledWith([
      { _id: 'news_1', text: 'Article 1', text_length: 9, source_type: 'topic', title: 'Title 1' },
    ]);
  });

  it('upserts in chunks of 96 and counts failed chunks', async () => {
    const records = Array.from({ length: 200 }, (_, i) => record(i));
    mockIndex.upsertRecords
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('quota exceeded'))
      .mockResolvedValueOnce(undefined);

    const result = await makeAdapter().upsertBatch(records);

    expect(result).toEqual({ total: 200, successful: 104, failed: 96 });
    expect(mockIndex.upsertRecords.mock.calls.map(([chunk]) => chunk.length)).toEqual([
      96, 96, 8,
    ]);
  });

  it('returns the ids that exist', async () => {
    mockIndex.fetch.mockResolvedValueOnce({ records: { news_2: {}, news_9: {} } });

    await expect(makeAdapter().fetch(['news_1', 'news_2', 'news_9'])).resolves.toEqual([
      'news_2',
      'news_9',
    ]);
    await expect(makeAdapter().fetch([])).resolves.toEqual([]);
    expect(mockIndex.fetch).toHaveBeenCalledTimes(1);
  });

  it('summarises index statistics', async () => {
    mockIndex.describeIndexStats.mockResolvedValueOnce({
      totalRecordCount: 12,
      namespaces: { '': { recordCount: 5 }, articles: { recordCount: 7 } },
    });

    await expect(makeAdapter().stats()).resolves.toEqual({
      totalRecordCount: 12,
      namespaces: { '': 5, articles: 7 },
    });
  });
});
