// src/lib/vectorStore.ts
import { FittedProjection } from "./dimensionReducer";
import type { EmbeddingClient } from "./embeddings";
import {
  EmbeddingDimensionError,
  IndexProvisioningError,
  VectorDeletionError,
  asPipelineError,
} from "./errors";
import { createLogger } from "./logger";
import type { TextPreprocessor } from "./preprocessing";
import type {
  IndexSpec,
  IndexStats,
  QueryMatch,
  VectorIndex,
  VectorRecord,
} from "./vectorIndex";

const log = createLogger("vectorStore");

export interface VectorStoreDeps {
  index: VectorIndex;
  embedder: EmbeddingClient;
  preprocessor: TextPreprocessor;
}

export interface UpsertOptions {
  /** Scopes ids as `documentId:chunkIndex` and tags each vector. */
  documentId?: string;
  reduceDimensions?: boolean;
  targetDimension?: number;
}

export interface QueryOptions {
  topK?: number;
  includeMetadata?: boolean;
  documentId?: string;
}

export function vectorId(chunkIndex: number, documentId?: string): string {
  return documentId ? `${documentId}:${chunkIndex}` : String(chunkIndex);
}

/** Chunk ordinal encoded in a vector id, or null if the id carries none. */
export function chunkIndexFromId(id: string): number | null {
  const tail = id.slice(id.lastIndexOf(":") + 1);
  if (!/^\d+$/.test(tail)) return null;
  return Number(tail);
}

// projections fit without a document id are kept under this key
const UNSCOPED = "";

/**
 * The only place the pipeline talks to the vector index. Owns the index
 * handle and the preprocessing and embedding steps in front of it.
 */
export class VectorStore {
  private projections = new Map<string, FittedProjection>();

  private constructor(
    private deps: VectorStoreDeps,
    readonly spec: IndexSpec
  ) {}

  static async create(
    deps: VectorStoreDeps,
    spec: IndexSpec
  ): Promise<VectorStore> {
    const store = new VectorStore(deps, spec);
    await store.ensureIndex(spec.name, spec.dimension, spec.metric);
    return store;
  }

  async ensureIndex(
    name: string,
    dimension: number,
    metric: IndexSpec["metric"]
  ): Promise<void> {
    try {
      await this.deps.index.ensureIndex({ name, dimension, metric });
    } catch (err) {
      log.error(`Could not provision index ${name}:`, err);
      throw asPipelineError(
        err,
        (message, cause) =>
          new IndexProvisioningError(`Index ${name} unavailable: ${message}`, {
            cause,
          })
      );
    }
  }

  // all-stopword text preprocesses to nothing, which providers reject
  private embeddableText(text: string): string {
    const { preprocessor } = this.deps;
    return (
      preprocessor.preprocessToString(text) ||
      preprocessor.cleanText(text) ||
      text
    );
  }

  private checkDimension(vectors: number[][]): void {
    const bad = vectors.find((v) => v.length !== this.spec.dimension);
    if (bad) {
      throw new EmbeddingDimensionError(
        `Vector length ${bad.length} does not match index dimension ${this.spec.dimension}`
      );
    }
  }

  async upsert(chunks: string[], options: UpsertOptions = {}): Promise<number> {
    if (chunks.length === 0) return 0;
    const { documentId, reduceDimensions = false, targetDimension = 128 } =
      options;

    const preprocessed = chunks.map((c) => this.embeddableText(c));
    let embeddings = await this.deps.embedder.embed(preprocessed, "document");

    const key = documentId ?? UNSCOPED;
    if (reduceDimensions) {
      const projection = FittedProjection.fit(embeddings, targetDimension);
      embeddings = projection.transform(embeddings);
      this.projections.set(key, projection);
    } else {
      this.projections.delete(key);
    }

    this.checkDimension(embeddings);

    const records: VectorRecord[] = embeddings.map((values, chunkIndex) => ({
      id: vectorId(chunkIndex, documentId),
      values,
      ...(documentId ? { metadata: { documentId, chunkIndex } } : {}),
    }));

    try {
      await this.deps.index.upsert(records);
    } catch (err) {
      log.error("Vector upsert failed:", err);
      throw asPipelineError(
        err,
        (message, cause) =>
          new IndexProvisioningError(`Vector upsert failed: ${message}`, {
            cause,
          })
      );
    }

    log.info(`Upserted ${records.length} vectors to index ${this.spec.name}`);
    return records.length;
  }

  async query(text: string, options: QueryOptions = {}): Promise<QueryMatch[]> {
    const { topK = 5, includeMetadata = false, documentId } = options;

    const preprocessed = this.embeddableText(text);
    const [embedding] = await this.deps.embedder.embed([preprocessed], "query");

    const projection = this.projections.get(documentId ?? UNSCOPED);
    const [vector] = projection
      ? projection.transform([embedding])
      : [embedding];
    this.checkDimension([vector]);

    try {
      return await this.deps.index.query({
        vector,
        topK,
        includeMetadata,
        documentId,
      });
    } catch (err) {
      log.error("Index query failed:", err);
      throw asPipelineError(
        err,
        (message, cause) =>
          new IndexProvisioningError(`Index query failed: ${message}`, {
            cause,
          })
      );
    }
  }

  async deleteVectors(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    try {
      await this.deps.index.delete(ids);
    } catch (err) {
      log.error("Vector deletion failed:", err);
      throw asPipelineError(
        err,
        (message, cause) =>
          new VectorDeletionError(`Vector deletion failed: ${message}`, {
            cause,
          })
      );
    }
    log.info(`Deleted ${ids.length} vectors from ${this.spec.name}`);
    return ids.length;
  }

  async deleteDocument(documentId: string, chunkCount: number): Promise<number> {
    const ids = Array.from({ length: chunkCount }, (_, i) =>
      vectorId(i, documentId)
    );
    try {
      return await this.deleteVectors(ids);
    } finally {
      // the document is gone either way; its vectors are unreachable by filter
      this.projections.delete(documentId);
    }
  }

  async stats(): Promise<IndexStats> {
    try {
      const stats = await this.deps.index.describeStats();
      return {
        totalVectorCount: stats.totalVectorCount ?? 0,
        dimension: stats.dimension ?? 0,
        indexFullness: stats.indexFullness ?? 0,
      };
    } catch (err) {
      log.error("Index stats retrieval failed:", err);
      throw asPipelineError(
        err,
        (message, cause) =>
          new IndexProvisioningError(`Index stats unavailable: ${message}`, {
            cause,
          })
      );
    }
  }
}
