import { z } from "zod";
import type { AppConfig } from "@kindex/types";

const intWithDefault = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const floatWithDefault = (fallback: string, min: number, max: number) =>
  z.string().default(fallback).transform(Number).pipe(z.number().min(min).max(max));

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((val) => val === "true" || val === "1");

/**
 * Zod schema for every environment variable the worker reads. Validates, coerces
 * and fills defaults; cross-field rules live in the `superRefine` below.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: intWithDefault("20"),
    DATABASE_POOL_MIN: z
      .string()
      .default("2")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "pgvector"]).default("qdrant"),
    QDRANT_URL: z.string().optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("kindex_chunks"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    EMBEDDING_MODEL: z.string().optional(),
    EMBEDDING_DIMENSIONS: intWithDefault("1024"),
    EMBEDDING_BATCH_SIZE: intWithDefault("32"),
    EMBEDDING_MAX_PARALLEL: intWithDefault("2"),
    BGE_M3_URL: z.string().optional(),

    // ---------- Chunking ----------
    CHUNKING_STRATEGY: z.enum(["fixed", "recursive", "semantic"]).default("fixed"),
    CHUNK_MAX_TOKENS: intWithDefault("512"),
    CHUNK_OVERLAP: z.string().default("50").transform(Number).pipe(z.number().int().nonnegative()),
    CHUNK_MIN_TOKENS: z
      .string()
      .default("100")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),
    SEMANTIC_THRESHOLD: floatWithDefault("0.5", 0, 1),

    // ---------- Search ----------
    SEARCH_MODE: z.enum(["semantic", "keyword", "hybrid"]).default("hybrid"),
    SEARCH_TOP_K: intWithDefault("10"),
    SEARCH_MIN_SCORE: floatWithDefault("0.5", 0, 1),
    SEARCH_RERANKER: z.enum(["none", "rrf", "cross-encoder"]).default("rrf"),
    RRF_K: intWithDefault("60"),
    SEARCH_CANDIDATE_MULTIPLIER: intWithDefault("3"),
    CROSS_ENCODER_MODEL: z.string().optional(),
    CROSS_ENCODER_URL: z.string().optional(),

    // ---------- Ingestion ----------
    INGEST_QUEUE_CAPACITY: intWithDefault("1000"),
    INGEST_WORKERS: intWithDefault("4"),
    CONTENT_ROOT: z.string().min(1).default("./data"),
    REINDEX_ON_STARTUP: booleanFlag("false"),

    // ---------- Docling ----------
    DOCLING_PYTHON: z.string().min(1).default("python3"),
    DOCLING_SCRIPT: z.string().min(1).default("scripts/docling_parse.py"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_MAX_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_MAX_TOKENS",
      });
    }
  });

const DEFAULT_MODELS = {
  cohere: "embed-v4.0",
  "bge-m3": "BAAI/bge-m3",
} as const;

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError listing every failed variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
      poolMin: parsed.DATABASE_POOL_MIN,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      collectionName: parsed.QDRANT_COLLECTION,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL ?? DEFAULT_MODELS[parsed.EMBEDDING_PROVIDER],
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      maxParallelRequests: parsed.EMBEDDING_MAX_PARALLEL,
      apiKey: parsed.COHERE_API_KEY,
      baseUrl: parsed.BGE_M3_URL,
    },

    chunking: {
      strategy: parsed.CHUNKING_STRATEGY,
      maxTokens: parsed.CHUNK_MAX_TOKENS,
      overlap: parsed.CHUNK_OVERLAP,
      minTokens: parsed.CHUNK_MIN_TOKENS,
      semanticThreshold: parsed.SEMANTIC_THRESHOLD,
      separators: ["\n\n", "\n", ". ", " "],
    },

    search: {
      mode: parsed.SEARCH_MODE,
      topK: parsed.SEARCH_TOP_K,
      minScore: parsed.SEARCH_MIN_SCORE,
      reranker: parsed.SEARCH_RERANKER,
      rrfK: parsed.RRF_K,
      candidateMultiplier: parsed.SEARCH_CANDIDATE_MULTIPLIER,
      crossEncoderModel: parsed.CROSS_ENCODER_MODEL,
      crossEncoderUrl: parsed.CROSS_ENCODER_URL,
    },

    ingestion: {
      queueCapacity: parsed.INGEST_QUEUE_CAPACITY,
      workerCount: parsed.INGEST_WORKERS,
      contentRoot: parsed.CONTENT_ROOT,
      reindexOnStartup: parsed.REINDEX_ON_STARTUP,
    },

    docling: {
      pythonPath: parsed.DOCLING_PYTHON,
      scriptPath: parsed.DOCLING_SCRIPT,
    },
  };
}
