// src/lib/container.ts
import {
  type AnswerGenerator,
  ExtractiveAnswerGenerator,
  OpenAIAnswerGenerator,
} from "./answer";
import { type AppConfig, loadConfig } from "./config";
import {
  CohereEmbeddingClient,
  type EmbeddingClient,
  OpenAIEmbeddingClient,
} from "./embeddings";
import { InMemoryVectorIndex } from "./inMemoryIndex";
import { loadLanguageModel } from "./languageModel";
import { createLogger } from "./logger";
import { PineconeVectorIndex } from "./pineconeIndex";
import { TextPreprocessor } from "./preprocessing";
import { RetrievalService } from "./retrievalService";
import type { VectorIndex } from "./vectorIndex";
import { VectorStore } from "./vectorStore";

const log = createLogger("container");

export function createEmbedder(config: AppConfig["embedding"]): EmbeddingClient {
  if (config.provider === "cohere") {
    return new CohereEmbeddingClient({ apiKey: config.apiKey, model: config.model });
  }
  return new OpenAIEmbeddingClient({
    apiKey: config.apiKey,
    model: config.model,
    dimensions: config.dimension,
  });
}

export function createIndex(config: AppConfig["index"]): VectorIndex {
  if (config.backend === "memory") return InMemoryVectorIndex.shared();
  return new PineconeVectorIndex({
    apiKey: config.apiKey ?? "",
    cloud: config.cloud,
    region: config.region,
  });
}

export function createAnswerGenerator(config: AppConfig["answer"]): AnswerGenerator {
  if (config.generator === "extractive") return new ExtractiveAnswerGenerator();
  return new OpenAIAnswerGenerator({ apiKey: config.apiKey, model: config.model });
}

export async function buildRetrievalService(config: AppConfig): Promise<RetrievalService> {
  const model = await loadLanguageModel();
  const store = await VectorStore.create(
    {
      index: createIndex(config.index),
      embedder: createEmbedder(config.embedding),
      preprocessor: new TextPreprocessor(model),
    },
    {
      name: config.index.name,
      dimension: config.index.dimension,
      metric: config.index.metric,
    }
  );
  log.info(
    `Pipeline ready: ${config.embedding.provider} embeddings, ${config.index.backend} index "${config.index.name}" (${config.index.dimension}d)`
  );
  return new RetrievalService({
    store,
    answers: createAnswerGenerator(config.answer),
    options: {
      chunkSize: config.chunking.chunkSize,
      overlap: config.chunking.overlap,
      topK: config.retrieval.topK,
      reduceDimensions: config.reduction.enabled,
      targetDimension: config.reduction.targetDimension,
      sessionTtlMs: config.sessions.ttlMs,
    },
  });
}

interface Container {
  config: AppConfig;
  service: RetrievalService;
}

let pending: Promise<Container> | null = null;

/** Process-wide pipeline, built on first use. A failed build is retried on the next call. */
export function getContainer(): Promise<Container> {
  if (!pending) {
    pending = (async () => {
      const config = loadConfig();
      const service = await buildRetrievalService(config);
      return { config, service };
    })();
    pending.catch((err: unknown) => {
      log.error("Pipeline startup failed:", err);
      pending = null;
    });
  }
  return pending;
}
