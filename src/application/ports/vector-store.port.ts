export type VectorFieldValue = string | number | boolean;

export interface VectorRecord {
  id: string;
  text: string;
  metadata: Record<string, VectorFieldValue>;
}

export interface VectorMatch {
  id: string;
  score: number;
  fields: Record<string, unknown>;
}

export interface UpsertBatchResult {
  total: number;
  successful: number;
  failed: number;
}

export interface VectorStoreStats {
  totalRecordCount: number;
  namespaces: Record<string, number>;
}

export interface IVectorStore {
  search(
    query: string,
    topK: number,
    filter?: Record<string, unknown>,
  ): Promise<VectorMatch[]>;
  upsert(record: VectorRecord): Promise<void>;
  upsertBatch(records: VectorRecord[]): Promise<UpsertBatchResult>;
  delete(id: string): Promise<void>;
  /** Returns the ids that exist. */
  fetch(ids: string[]): Promise<string[]>;
  stats(): Promise<VectorStoreStats>;
}
