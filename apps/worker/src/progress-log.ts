import type { IngestionProgressUpdate, IProgressObserver } from "@kindex/types";
import { createChildLogger, type Logger } from "@kindex/logger";

/** Writes job progress to the log; terminal states at info, the rest at debug. */
export class ProgressLogObserver implements IProgressObserver {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = createChildLogger(logger, { component: "progress" });
  }

  publish(update: IngestionProgressUpdate): void {
    const fields = {
      jobId: update.jobId,
      documentId: update.documentId,
      state: update.state,
      phase: update.phase,
      percentComplete: update.percentComplete,
    };

    switch (update.state) {
      case "failed":
        this.logger.warn({ ...fields, error: update.errorMessage }, "Ingestion job failed");
        return;
      case "completed":
      case "cancelled":
        this.logger.info(fields, `Ingestion job ${update.state}`);
        return;
      default:
        this.logger.debug(fields, "Ingestion progress");
    }
  }
}
