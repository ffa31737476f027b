import type { IngestionQueue } from "@kindex/queue";
import { createChildLogger, type Logger } from "@kindex/logger";

export const STATUS_RETENTION_MS = 24 * 60 * 60 * 1000;
export const STATUS_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

export interface StatusCleanupOptions {
  intervalMs?: number;
  maxAgeMs?: number;
  logger: Logger;
}

/** Periodically drops finished job statuses older than `maxAgeMs`. Returns a stop function. */
export function scheduleStatusCleanup(
  queue: IngestionQueue,
  options: StatusCleanupOptions,
): () => void {
  const maxAgeMs = options.maxAgeMs ?? STATUS_RETENTION_MS;
  const log = createChildLogger(options.logger, { component: "status-cleanup" });

  const timer = setInterval(() => {
    const removed = queue.cleanupOldStatuses(maxAgeMs);
    if (removed > 0) {
      log.debug({ removed }, "Removed old job statuses");
    }
  }, options.intervalMs ?? STATUS_CLEANUP_INTERVAL_MS);
  timer.unref();

  return () => clearInterval(timer);
}
