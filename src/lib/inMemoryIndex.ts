// src/lib/inMemoryIndex.ts
import { rankBySimilarity } from "./embeddings";
import type {
  IndexQuery,
  IndexSpec,
  IndexStats,
  QueryMatch,
  VectorIndex,
  VectorRecord,
} from "./vectorIndex";

type IndexState = {
  spec: IndexSpec;
  records: Map<string, VectorRecord>;
};

const GLOBAL_KEY = "__PDF_QA_MEMORY_INDEXES__";

type GlobalWithIndexes = typeof globalThis & {
  [GLOBAL_KEY]?: Map<string, IndexState>;
};

// survives module reloads in `next dev`
function sharedIndexes(): Map<string, IndexState> {
  const g: GlobalWithIndexes = globalThis;
  const existing = g[GLOBAL_KEY];
  if (existing) return existing;
  const created = new Map<string, IndexState>();
  g[GLOBAL_KEY] = created;
  return created;
}

/**
 * Process-local stand-in for the hosted index, for local runs without a
 * Pinecone key and for tests. Ranks by cosine similarity regardless of the
 * configured metric.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private state: IndexState | null = null;

  constructor(private indexes: Map<string, IndexState> = new Map()) {}

  static shared(): InMemoryVectorIndex {
    return new InMemoryVectorIndex(sharedIndexes());
  }

  async ensureIndex(spec: IndexSpec): Promise<void> {
    let state = this.indexes.get(spec.name);
    if (!state) {
      state = { spec, records: new Map() };
      this.indexes.set(spec.name, state);
    }
    this.state = state;
  }

  private current(): IndexState {
    if (!this.state) {
      throw new Error("Index not initialized. Call ensureIndex() first.");
    }
    return this.state;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const state = this.current();
    for (const r of records) {
      if (r.values.length !== state.spec.dimension) {
        throw new Error(
          `Vector dimension ${r.values.length} does not match index dimension ${state.spec.dimension}`
        );
      }
      state.records.set(r.id, { ...r, values: r.values.slice() });
    }
  }

  async query(query: IndexQuery): Promise<QueryMatch[]> {
    const state = this.current();
    const candidates = Array.from(state.records.values()).filter(
      (r) => !query.documentId || r.metadata?.documentId === query.documentId
    );
    return rankBySimilarity(query.vector, candidates, query.topK).map(
      ({ item, score }) => ({
        id: item.id,
        score,
        ...(query.includeMetadata && item.metadata
          ? { metadata: { ...item.metadata } }
          : {}),
      })
    );
  }

  async delete(ids: string[]): Promise<void> {
    const state = this.current();
    for (const id of ids) state.records.delete(id);
  }

  async describeStats(): Promise<Partial<IndexStats>> {
    const state = this.current();
    return {
      totalVectorCount: state.records.size,
      dimension: state.spec.dimension,
      indexFullness: 0,
    };
  }

  /** Ids currently stored, in insertion order. */
  listIds(): string[] {
    return Array.from(this.current().records.keys());
  }
}
