import type { ChunkStrategy } from "./chunk.js";

export type JobState = "queued" | "processing" | "completed" | "failed" | "cancelled";

export type IngestionPhase = "parsing" | "chunking" | "embedding" | "storing" | "complete";

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export interface IngestionJobOptions {
  scopeId: string;
  fileName: string;
  contentType: string;
  strategy?: ChunkStrategy;
  metadata?: Record<string, string>;
}

export interface IngestionJob {
  jobId: string;
  documentId: string;
  path: string;
  options: IngestionJobOptions;
  batchId?: string;
}

export interface IngestionJobStatus {
  jobId: string;
  documentId: string;
  state: JobState;
  phase: IngestionPhase | null;
  percentComplete: number;
  errorMessage: string | null;
  queuedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export type EnqueueResult =
  | { accepted: true; jobId: string; queueDepth: number }
  | { accepted: false; reason: "queue_full"; queueDepth: number; capacity: number };

export interface JobOutcome {
  state: "completed" | "failed";
  errorMessage?: string;
}

export interface IngestionProgressUpdate {
  jobId: string;
  documentId: string;
  state: JobState;
  phase: IngestionPhase | null;
  percentComplete: number;
  errorMessage: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface IProgressObserver {
  publish(update: IngestionProgressUpdate): Promise<void> | void;
}
