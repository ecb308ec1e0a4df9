// src/lib/vectorIndex.ts
import type { VectorMetric } from "./config";

export type ChunkMetadata = {
  documentId: string;
  chunkIndex: number;
};

export interface VectorRecord {
  id: string;
  values: number[];
  metadata?: ChunkMetadata;
}

export interface QueryMatch {
  id: string;
  score: number;
  metadata?: ChunkMetadata;
}

export interface IndexStats {
  totalVectorCount: number;
  dimension: number;
  indexFullness: number;
}

export interface IndexSpec {
  name: string;
  dimension: number;
  metric: VectorMetric;
}

export interface IndexQuery {
  vector: number[];
  topK: number;
  includeMetadata: boolean;
  /** Restrict matches to one document's vectors. */
  documentId?: string;
}

/**
 * The hosted vector index, seen as a black box. Implementations throw
 * whatever their client throws; VectorStore maps failures to pipeline errors.
 */
export interface VectorIndex {
  ensureIndex(spec: IndexSpec): Promise<void>;
  upsert(records: VectorRecord[]): Promise<void>;
  query(query: IndexQuery): Promise<QueryMatch[]>;
  delete(ids: string[]): Promise<void>;
  describeStats(): Promise<Partial<IndexStats>>;
}
