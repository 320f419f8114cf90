import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Index, Pinecone } from '@pinecone-database/pinecone';
import {
  IVectorStore,
  UpsertBatchResult,
  VectorMatch,
  VectorRecord,
  VectorStoreStats,
} from '../../application/ports/vector-store.port';
import { PineconeConfig } from '../../config/pinecone.config';
import {
  ConfigurationError,
  getErrorInfo,
  UpstreamServiceError,
} from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';

/** Maximum records per upsert request for indexes with integrated embedding. */
export const UPSERT_BATCH_SIZE = 96;

const CONTEXT = 'PineconeVectorStore';

function toIntegratedRecord(record: VectorRecord) {
  return {
    _id: record.id,
    text: record.text,
    text_length: record.text.length,
    ...record.metadata,
  };
}

/**
 * Vector store backed by a Pinecone index with integrated embedding: records
 * are upserted as text and Pinecone computes the vectors.
 */
@Injectable()
export class PineconeVectorStoreAdapter implements IVectorStore {
  private index?: Index;

  constructor(
    private readonly config: ConfigService,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
  ) {}

  async search(
    query: string,
    topK: number,
    filter?: Record<string, unknown>,
  ): Promise<VectorMatch[]> {
    const index = this.getIndex();
    try {
      const response = await index.searchRecords({
        query: { topK, inputs: { text: query }, ...(filter ? { filter } : {}) },
      });
      const matches = response.result.hits.map((hit) => ({
        id: hit._id,
        score: hit._score,
        fields: { ...hit.fields },
      }));
      this.logger.info(`Found ${matches.length} similar records`, CONTEXT);
      return matches;
    } catch (error) {
      throw this.failure('search', error);
    }
  }

  async upsert(record: VectorRecord): Promise<void> {
    const index = this.getIndex();
    try {
      await index.upsertRecords([toIntegratedRecord(record)]);
    } catch (error) {
      throw this.failure('upsert', error);
    }
  }

  async upsertBatch(records: VectorRecord[]): Promise<UpsertBatchResult> {
    const index = this.getIndex();
    let successful = 0;
    let failed = 0;
    for (let start = 0; start < records.length; start += UPSERT_BATCH_SIZE) {
      const chunk = records.slice(start, start + UPSERT_BATCH_SIZE);
      try {
        await index.upsertRecords(chunk.map(toIntegratedRecord));
        successful += chunk.length;
      } catch (error) {
        failed += chunk.length;
        this.logger.error(
          `Upsert of records ${start}-${start + chunk.length - 1} failed`,
          error,
          CONTEXT,
        );
      }
    }
    this.logger.info(
      `Upserted ${successful}/${records.length} records (${failed} failed)`,
      CONTEXT,
    );
    return { total: records.length, successful, failed };
  }

  async delete(id: string): Promise<void> {
    const index = this.getIndex();
    try {
      await index.deleteOne(id);
    } catch (error) {
      throw this.failure('delete', error);
    }
  }

  async fetch(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    const index = this.getIndex();
    try {
      const response = await index.fetch(ids);
      const found = response.records ?? {};
      return ids.filter((id) => id in found);
    } catch (error) {
      throw this.failure('fetch', error);
    }
  }

  async stats(): Promise<VectorStoreStats> {
    const index = this.getIndex();
    try {
      const description = await index.describeIndexStats();
      const namespaces: Record<string, number> = {};
      for (const [name, summary] of Object.entries(description.namespaces ?? {})) {
        namespaces[name] = summary.recordCount;
      }
      return { totalRecordCount: description.totalRecordCount ?? 0, namespaces };
    } catch (error) {
      throw this.failure('stats', error);
    }
  }

  private getIndex(): Index {
    if (this.index) return this.index;
    const { apiKey, indexName, host, namespace } =
      this.config.getOrThrow<PineconeConfig>('pinecone');
    if (!apiKey || !indexName) {
      throw new ConfigurationError(
        'Pinecone is not configured: PINECONE_API_KEY and PINECONE_INDEX_NAME are required',
      );
    }
    const base = new Pinecone({ apiKey }).index(indexName, host || undefined);
    this.index = namespace ? base.namespace(namespace) : base;
    this.logger.info(`Connected to Pinecone index ${indexName}`, CONTEXT);
    return this.index;
  }

  private failure(operation: string, error: unknown): UpstreamServiceError {
    const message = `Pinecone ${operation} failed: ${getErrorInfo(error).message}`;
    this.logger.error(message, error, CONTEXT);
    return new UpstreamServiceError('pinecone', message, error);
  }
}
