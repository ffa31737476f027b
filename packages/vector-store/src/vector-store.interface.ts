import type { VectorEntry } from "@kindex/types";

export interface VectorSearchParams {
  scopeId: string;
  vector: number[];
  topK: number;
  pathPrefix?: string;
}

/**
 * `score` is whatever the backend measures natively: a cosine distance (lower is
 * closer) or a similarity (higher is closer), as told by `scoreKind`.
 */
export interface VectorSearchResult {
  chunkId: string;
  documentId: string;
  content: string;
  score: number;
  scoreKind: "distance" | "similarity";
  metadata: Record<string, string>;
}

export interface IVectorStore {
  readonly name: string;
  upsert(entries: VectorEntry[]): Promise<void>;
  search(params: VectorSearchParams): Promise<VectorSearchResult[]>;
  deleteByDocument(documentId: string): Promise<void>;
  ensureCollection(dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
