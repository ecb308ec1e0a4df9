// src/lib/pineconeIndex.ts
import { Pinecone, type Index } from "@pinecone-database/pinecone";
import { createLogger } from "./logger";
import type {
  ChunkMetadata,
  IndexQuery,
  IndexSpec,
  IndexStats,
  QueryMatch,
  VectorIndex,
  VectorRecord,
} from "./vectorIndex";

const log = createLogger("pinecone");

// Pinecone caps the size of a single upsert request
const UPSERT_BATCH_SIZE = 100;

export interface PineconeIndexOptions {
  apiKey: string;
  cloud: "aws" | "gcp" | "azure";
  region: string;
}

export class PineconeVectorIndex implements VectorIndex {
  private client: Pinecone;
  private index: Index<ChunkMetadata> | null = null;

  constructor(private options: PineconeIndexOptions) {
    this.client = new Pinecone({ apiKey: options.apiKey });
  }

  async ensureIndex(spec: IndexSpec): Promise<void> {
    const { indexes = [] } = await this.client.listIndexes();
    const existing = indexes.find((i) => i.name === spec.name);

    if (!existing) {
      log.info(`Creating Pinecone index: ${spec.name}`);
      await this.client.createIndex({
        name: spec.name,
        dimension: spec.dimension,
        metric: spec.metric,
        spec: {
          serverless: { cloud: this.options.cloud, region: this.options.region },
        },
        waitUntilReady: true,
        suppressConflicts: true,
      });
      log.info(`Index ${spec.name} created successfully`);
    } else if (existing.dimension !== spec.dimension) {
      throw new Error(
        `Index ${spec.name} has dimension ${existing.dimension}, expected ${spec.dimension}`
      );
    }

    this.index = this.client.index<ChunkMetadata>(spec.name);
  }

  private handle(): Index<ChunkMetadata> {
    if (!this.index) {
      throw new Error("Index not initialized. Call ensureIndex() first.");
    }
    return this.index;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const index = this.handle();
    for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
      await index.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
    }
  }

  async query(query: IndexQuery): Promise<QueryMatch[]> {
    const resp = await this.handle().query({
      vector: query.vector,
      topK: query.topK,
      includeMetadata: query.includeMetadata,
      ...(query.documentId
        ? { filter: { documentId: { $eq: query.documentId } } }
        : {}),
    });
    return resp.matches.map((m) => ({
      id: m.id,
      score: m.score ?? 0,
      ...(m.metadata ? { metadata: m.metadata } : {}),
    }));
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.handle().deleteMany(ids);
  }

  async describeStats(): Promise<Partial<IndexStats>> {
    const stats = await this.handle().describeIndexStats();
    return {
      totalVectorCount: stats.totalRecordCount,
      dimension: stats.dimension,
      indexFullness: stats.indexFullness,
    };
  }
}
