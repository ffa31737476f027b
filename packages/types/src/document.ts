export type DocumentStatus = "pending" | "processing" | "ready" | "failed";

export interface Document {
  id: string;
  scopeId: string;
  path: string;
  fileName: string;
  contentType: string;
  contentHash: string | null;
  sizeBytes: number;
  status: DocumentStatus;
  errorMessage: string | null;
  chunkCount: number;
  metadata: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
  lastIndexedAt: Date | null;
}

export type NewDocument = Omit<Document, "createdAt" | "updatedAt">;

export type DocumentPatch = Partial<Omit<Document, "id" | "createdAt" | "updatedAt">>;

export interface DocumentListFilter {
  scopeId?: string;
  pathPrefix?: string;
  documentIds?: string[];
}

// Provenance recorded on every successful index, compared by reindex
export const INDEXED_WITH = {
  CHUNKING_STRATEGY: "indexedWith:chunkingStrategy",
  CHUNKING_MAX_TOKENS: "indexedWith:chunkingMaxTokens",
  CHUNKING_OVERLAP: "indexedWith:chunkingOverlap",
  EMBEDDING_PROVIDER: "indexedWith:embeddingProvider",
  EMBEDDING_MODEL: "indexedWith:embeddingModel",
  EMBEDDING_DIMENSIONS: "indexedWith:embeddingDimensions",
} as const;
