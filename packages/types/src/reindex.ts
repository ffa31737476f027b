import type { ChunkStrategy } from "./chunk.js";

export type ReindexReason =
  | "forced"
  | "content_changed"
  | "embedding_settings_changed"
  | "chunking_settings_changed"
  | "never_indexed"
  | "unchanged"
  | "file_not_found"
  | "error";

export type ReindexAction = "enqueued" | "skipped" | "failed";

export interface ReindexOptions {
  scopeId?: string;
  documentIds?: string[];
  force?: boolean;
  detectSettingsChanges?: boolean;
  strategy?: ChunkStrategy;
}

export interface ReindexDocumentResult {
  documentId: string;
  fileName: string;
  action: ReindexAction;
  reason: ReindexReason;
  jobId?: string;
  errorMessage?: string;
}

export interface ReindexResult {
  batchId: string;
  totalDocuments: number;
  enqueuedCount: number;
  skippedCount: number;
  failedCount: number;
  reasonCounts: Partial<Record<ReindexReason, number>>;
  documents: ReindexDocumentResult[];
}

export interface ReindexCheck {
  documentId: string;
  needsReindex: boolean;
  reason: ReindexReason;
  currentHash: string | null;
  storedHash: string | null;
  storedSettings?: string;
  currentSettings?: string;
}
