export { IngestionQueue, DEFAULT_QUEUE_CAPACITY } from "./ingestion-queue.js";
export type { IngestionQueueOptions, EnqueueWaitOptions, StatusPatch } from "./ingestion-queue.js";
export { WorkerPool } from "./worker-pool.js";
export type { JobContext, JobProcessor, WorkerPoolOptions } from "./worker-pool.js";
