// src/lib/config.ts
import { z } from "zod";
import { ConfigurationError } from "./errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z
  .object({
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    OPENAI_API_KEY: optionalSecret,
    OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    COHERE_API_KEY: optionalSecret,
    COHERE_EMBEDDING_MODEL: z.string().default("embed-multilingual-v2.0"),

    VECTOR_BACKEND: z.enum(["pinecone", "memory"]).default("pinecone"),
    PINECONE_API_KEY: optionalSecret,
    PINECONE_INDEX_NAME: z.string().min(1).default("pdf-qa-index"),
    PINECONE_CLOUD: z.enum(["aws", "gcp", "azure"]).default("aws"),
    PINECONE_REGION: z.string().default("us-east-1"),
    VECTOR_DIMENSION: z.coerce.number().int().positive().default(768),
    VECTOR_METRIC: z.enum(["cosine", "euclidean", "dotproduct"]).default("cosine"),

    CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
    TOP_K: z.coerce.number().int().positive().default(3),
    REDUCE_DIMENSIONS: booleanFlag,
    REDUCTION_TARGET_DIMENSION: z.coerce.number().int().positive().default(128),

    ANSWER_GENERATOR: z.enum(["openai", "extractive"]).default("openai"),
    CHAT_MODEL: z.string().default("gpt-4o-mini"),

    MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_SIZE <= env.CHUNK_OVERLAP) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "must be smaller than CHUNK_SIZE",
      });
    }
    const needsOpenAI =
      env.EMBEDDING_PROVIDER === "openai" || env.ANSWER_GENERATOR === "openai";
    if (needsOpenAI && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "is required for the OpenAI embedder or answer generator",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "is required when EMBEDDING_PROVIDER=cohere",
      });
    }
    if (env.VECTOR_BACKEND === "pinecone" && !env.PINECONE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PINECONE_API_KEY"],
        message: "is required when VECTOR_BACKEND=pinecone",
      });
    }
  });

export type VectorMetric = "cosine" | "euclidean" | "dotproduct";

export interface AppConfig {
  embedding:
    | { provider: "openai"; apiKey: string; model: string; dimension: number }
    | { provider: "cohere"; apiKey: string; model: string; dimension: number };
  index: {
    backend: "pinecone" | "memory";
    apiKey?: string;
    name: string;
    cloud: "aws" | "gcp" | "azure";
    region: string;
    /** Dimension of the vectors stored in the index. */
    dimension: number;
    metric: VectorMetric;
  };
  chunking: { chunkSize: number; overlap: number };
  retrieval: { topK: number };
  reduction: { enabled: boolean; targetDimension: number };
  answer:
    | { generator: "openai"; apiKey: string; model: string }
    | { generator: "extractive" };
  upload: { maxBytes: number };
  sessions: { ttlMs: number };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "env"} ${issue.message}`)
    .join("; ");
}

/**
 * Reads the process environment (or a supplied record) into an AppConfig.
 * Every problem is reported at once in a single ConfigurationError.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(parsed.error)}`
    );
  }
  const e = parsed.data;

  // the index holds projected vectors when reduction is on
  const indexDimension = e.REDUCE_DIMENSIONS
    ? Math.min(e.REDUCTION_TARGET_DIMENSION, e.VECTOR_DIMENSION)
    : e.VECTOR_DIMENSION;

  const embedding: AppConfig["embedding"] =
    e.EMBEDDING_PROVIDER === "cohere"
      ? {
          provider: "cohere",
          apiKey: e.COHERE_API_KEY ?? "",
          model: e.COHERE_EMBEDDING_MODEL,
          dimension: e.VECTOR_DIMENSION,
        }
      : {
          provider: "openai",
          apiKey: e.OPENAI_API_KEY ?? "",
          model: e.OPENAI_EMBEDDING_MODEL,
          dimension: e.VECTOR_DIMENSION,
        };

  const answer: AppConfig["answer"] =
    e.ANSWER_GENERATOR === "openai"
      ? { generator: "openai", apiKey: e.OPENAI_API_KEY ?? "", model: e.CHAT_MODEL }
      : { generator: "extractive" };

  return {
    embedding,
    index: {
      backend: e.VECTOR_BACKEND,
      apiKey: e.PINECONE_API_KEY,
      name: e.PINECONE_INDEX_NAME,
      cloud: e.PINECONE_CLOUD,
      region: e.PINECONE_REGION,
      dimension: indexDimension,
      metric: e.VECTOR_METRIC,
    },
    chunking: { chunkSize: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP },
    retrieval: { topK: e.TOP_K },
    reduction: {
      enabled: e.REDUCE_DIMENSIONS,
      targetDimension: e.REDUCTION_TARGET_DIMENSION,
    },
    answer,
    upload: { maxBytes: Math.floor(e.MAX_UPLOAD_MB * 1024 * 1024) },
    sessions: { ttlMs: e.SESSION_TTL_MINUTES * 60 * 1000 },
  };
}
