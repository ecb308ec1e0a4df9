// src/lib/embeddings.ts
import OpenAI from "openai";
import { CohereClient } from "cohere-ai";
import {
  EmbeddingDimensionError,
  EmbeddingProviderError,
  errorMessage,
} from "./errors";
import { createLogger } from "./logger";

const log = createLogger("embeddings");

export type EmbeddingIntent = "document" | "query";

/**
 * One vector per input text, in input order. Intent may change how the
 * provider encodes the text but never the vector length.
 */
export interface EmbeddingClient {
  embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]>;
}

/**
 * Checks the provider returned exactly one vector per input and that all
 * vectors share a length.
 */
export function assertConsistentVectors(
  vectors: Array<number[] | undefined>,
  expectedCount: number
): number[][] {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingDimensionError(
      `Expected ${expectedCount} embeddings, received ${vectors.length}`
    );
  }
  const checked: number[][] = [];
  let dimension: number | null = null;
  vectors.forEach((vec, i) => {
    if (!Array.isArray(vec) || vec.length === 0) {
      throw new EmbeddingDimensionError(`No embedding for item ${i}`);
    }
    if (dimension === null) dimension = vec.length;
    if (vec.length !== dimension) {
      throw new EmbeddingDimensionError(
        `Embedding ${i} has length ${vec.length}, expected ${dimension}`
      );
    }
    checked.push(vec);
  });
  return checked;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Requested output length; only the text-embedding-3 models accept it. */
  dimensions?: number;
  batchSize?: number;
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  private openai: OpenAI;
  private model: string;
  private dimensions?: number;
  private batchSize: number;

  constructor(options: OpenAIEmbeddingOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? "text-embedding-3-small";
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize ?? 64;
  }

  async embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: Array<number[] | undefined> = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const resp = await this.openai.embeddings
        .create({
          model: this.model,
          input: batch,
          ...(this.dimensions ? { dimensions: this.dimensions } : {}),
        })
        .catch((err: unknown) => {
          log.error(`OpenAI ${intent} embedding failed:`, err);
          throw new EmbeddingProviderError(
            `Embedding request failed: ${errorMessage(err)}`,
            { cause: err }
          );
        });

      // the API reports an index per item; do not rely on response order
      const ordered = new Array<number[] | undefined>(batch.length);
      for (const item of resp.data) ordered[item.index] = item.embedding;
      vectors.push(...ordered);
    }

    log.debug(`Embedded ${texts.length} ${intent} text(s) with ${this.model}`);
    return assertConsistentVectors(vectors, texts.length);
  }
}

export interface CohereEmbeddingOptions {
  apiKey: string;
  model?: string;
  batchSize?: number;
}

export class CohereEmbeddingClient implements EmbeddingClient {
  private cohere: CohereClient;
  private model: string;
  private batchSize: number;

  constructor(options: CohereEmbeddingOptions) {
    this.cohere = new CohereClient({ token: options.apiKey });
    this.model = options.model ?? "embed-multilingual-v2.0";
    this.batchSize = options.batchSize ?? 96;
  }

  async embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      try {
        const resp = await this.cohere.embed({
          texts: batch,
          model: this.model,
          inputType: intent === "query" ? "search_query" : "search_document",
        });
        const embeddings = Array.isArray(resp.embeddings)
          ? resp.embeddings
          : resp.embeddings.float ?? [];
        vectors.push(...embeddings);
      } catch (err) {
        log.error(`Cohere ${intent} embedding failed:`, err);
        throw new EmbeddingProviderError(
          `Embedding request failed: ${errorMessage(err)}`,
          { cause: err }
        );
      }
    }

    log.debug(`Embedded ${texts.length} ${intent} text(s) with ${this.model}`);
    return assertConsistentVectors(vectors, texts.length);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export interface Ranked<T> {
  item: T;
  score: number;
}

/** Client-side nearest neighbours by cosine similarity, best first. */
export function rankBySimilarity<T extends { values: number[] }>(
  query: number[],
  candidates: T[],
  topK: number
): Ranked<T>[] {
  return candidates
    .map((item) => ({ item, score: cosineSimilarity(query, item.values) }))
    .sort((x, y) => y.score - x.score)
    .slice(0, Math.max(0, topK));
}
