import type { Readable } from "node:stream";
import type { ChunkStrategy } from "./chunk.js";

/**
 * Raw document bytes. Only a `Uint8Array` can be re-read; streams and async
 * iterables are buffered by the pipeline before hashing and parsing.
 */
export type ContentInput = Uint8Array | Readable | AsyncIterable<Uint8Array>;

export interface ParsedDocument {
  content: string;
  metadata: Record<string, string>;
  warnings: string[];
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorEntry {
  chunkId: string;
  documentId: string;
  scopeId: string;
  vector: number[];
  modelId: string;
  metadata: Record<string, string>;
}

export interface IngestionRunOptions {
  documentId: string;
  scopeId: string;
  path: string;
  fileName: string;
  contentType: string;
  strategy?: ChunkStrategy;
  metadata?: Record<string, string>;
}

export type IngestionOutcome = "ready" | "failed";

export interface IngestionResult {
  documentId: string;
  status: IngestionOutcome;
  chunkCount: number;
  durationMs: number;
  warnings: string[];
  errorMessage?: string;
}
