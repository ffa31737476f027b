import type { ChunkingSettings } from "./chunk.js";
import type { SearchMode } from "./query.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  vectorStore: VectorStoreSettings;
  embedding: EmbeddingSettings;
  chunking: ChunkingSettings;
  search: SearchSettings;
  ingestion: IngestionSettings;
  docling: DoclingConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  poolMin: number;
}

export interface VectorStoreSettings {
  type: "qdrant" | "pgvector";
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collectionName: string;
}

export type EmbeddingProviderType = "cohere" | "bge-m3";

export interface EmbeddingSettings {
  provider: EmbeddingProviderType;
  model: string;
  dimensions: number;
  batchSize: number;
  maxParallelRequests: number;
  apiKey?: string;
  baseUrl?: string;
}

export type RerankerName = "none" | "rrf" | "cross-encoder";

export interface SearchSettings {
  mode: SearchMode;
  topK: number;
  minScore: number;
  reranker: RerankerName;
  rrfK: number;
  candidateMultiplier: number;
  crossEncoderModel?: string;
  crossEncoderUrl?: string;
}

export interface IngestionSettings {
  queueCapacity: number;
  workerCount: number;
  contentRoot: string;
  reindexOnStartup: boolean;
}

export interface DoclingConfig {
  pythonPath: string;
  scriptPath: string;
}

/** The subset of configuration that may change at runtime. */
export interface RuntimeSettings {
  chunking: ChunkingSettings;
  embedding: EmbeddingSettings;
  search: SearchSettings;
}
