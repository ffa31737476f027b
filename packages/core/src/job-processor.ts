import type { ContentInput, IContentSource, IDocumentStore } from "@kindex/types";
import { errorMessage, isCancellation } from "@kindex/errors";
import type { JobProcessor } from "@kindex/queue";
import type { IngestionPipeline } from "./ingestion-pipeline.js";

export interface IngestionJobProcessorDeps {
  pipeline: IngestionPipeline;
  contentSource: IContentSource;
  documents: IDocumentStore;
}

/**
 * Opens the job's content and runs it through the pipeline. A source that cannot
 * be opened fails the document the same way a pipeline error would.
 */
export function createIngestionJobProcessor(deps: IngestionJobProcessorDeps): JobProcessor {
  return async (job, context) => {
    let content: ContentInput;
    try {
      content = await deps.contentSource.open(job.path, context.signal);
    } catch (err) {
      if (isCancellation(err)) throw err;
      const message = `Could not read ${job.path}: ${errorMessage(err)}`;
      await deps.documents.update(job.documentId, { status: "failed", errorMessage: message });
      context.logger.warn({ err, path: job.path }, "Content source unavailable");
      return { state: "failed", errorMessage: message };
    }

    const result = await deps.pipeline.ingest(
      content,
      {
        documentId: job.documentId,
        scopeId: job.options.scopeId,
        path: job.path,
        fileName: job.options.fileName,
        contentType: job.options.contentType,
        strategy: job.options.strategy,
        metadata: job.options.metadata,
      },
      context.signal,
      (phase, percent) => context.reportProgress(phase, percent),
    );

    if (result.status === "ready") return { state: "completed" };
    return { state: "failed", errorMessage: result.errorMessage };
  };
}
