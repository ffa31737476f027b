import { randomUUID } from "node:crypto";
import path from "node:path";
import type {
  ChunkStrategy,
  Document,
  EnqueueResult,
  IDocumentStore,
  IKeywordIndex,
  IngestionJob,
  IngestionJobStatus,
} from "@kindex/types";
import { createChildLogger, createSilentLogger, type Logger } from "@kindex/logger";
import type { IngestionQueue } from "@kindex/queue";
import type { IVectorStore } from "@kindex/vector-store";

export interface EnqueueRequest {
  /** Omit to create a new document; pass an existing id to re-ingest it. */
  documentId?: string;
  scopeId: string;
  path: string;
  fileName?: string;
  contentType?: string;
  strategy?: ChunkStrategy;
  metadata?: Record<string, string>;
  batchId?: string;
}

export type EnqueueOutcome = EnqueueResult & { documentId: string };

export interface IngestionServiceDeps {
  queue: IngestionQueue;
  documents: IDocumentStore;
  keywordIndex: IKeywordIndex;
  vectorStore: IVectorStore;
  /** How long `enqueue` waits for queue space. Default: 0 */
  enqueueTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/**
 * Entry point for callers that add, re-ingest or remove documents. A new request
 * for a document supersedes whatever is queued or running for it.
 */
export class IngestionService {
  private readonly deps: IngestionServiceDeps;
  private readonly logger: Logger;

  constructor(deps: IngestionServiceDeps) {
    this.deps = deps;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), {
      component: "ingestion-service",
    });
  }

  async enqueue(request: EnqueueRequest): Promise<EnqueueOutcome> {
    const { queue, documents } = this.deps;
    const documentId = request.documentId ?? randomUUID();
    const fileName = request.fileName ?? path.posix.basename(request.path);
    const contentType = request.contentType ?? DEFAULT_CONTENT_TYPE;

    const superseded = queue.cancelForDocument(documentId);
    if (superseded > 0) {
      this.logger.info({ documentId, superseded }, "Superseded earlier ingestion jobs");
    }

    const previous = await documents.getById(documentId);
    await this.registerPending(documentId, request, fileName, contentType, previous);

    const job: IngestionJob = {
      jobId: randomUUID(),
      documentId,
      path: request.path,
      options: {
        scopeId: request.scopeId,
        fileName,
        contentType,
        ...(request.strategy ? { strategy: request.strategy } : {}),
        ...(request.metadata ? { metadata: request.metadata } : {}),
      },
      ...(request.batchId ? { batchId: request.batchId } : {}),
    };

    const result = await queue.enqueue(job, { timeoutMs: this.deps.enqueueTimeoutMs ?? 0 });
    if (!result.accepted) {
      await this.rollback(documentId, previous);
      this.logger.warn(
        { documentId, queueDepth: result.queueDepth, capacity: result.capacity },
        "Ingestion queue is full",
      );
    } else {
      this.logger.debug({ documentId, jobId: job.jobId }, "Ingestion job enqueued");
    }

    return { ...result, documentId };
  }

  getJobStatus(jobId: string): IngestionJobStatus | undefined {
    return this.deps.queue.getStatus(jobId);
  }

  listJobStatuses(): IngestionJobStatus[] {
    return this.deps.queue.listStatuses();
  }

  /** Returns true when a queued or running job was cancelled. */
  cancelForDocument(documentId: string): boolean {
    return this.deps.queue.cancelForDocument(documentId, "Cancelled by request") > 0;
  }

  /**
   * Cancels the document's jobs, waits for a running one to let go, then removes
   * the document with its chunks and vectors.
   */
  async deleteDocument(documentId: string): Promise<boolean> {
    const { queue, documents, keywordIndex, vectorStore } = this.deps;

    queue.cancelForDocument(documentId, "Document deleted");
    await queue.whenDocumentReleased(documentId);

    await vectorStore.deleteByDocument(documentId);
    await keywordIndex.deleteByDocument(documentId);
    const deleted = await documents.deleteById(documentId);

    this.logger.info({ documentId, deleted }, "Document deleted");
    return deleted;
  }

  private async registerPending(
    documentId: string,
    request: EnqueueRequest,
    fileName: string,
    contentType: string,
    previous: Document | null,
  ): Promise<void> {
    const fields = {
      scopeId: request.scopeId,
      path: request.path,
      fileName,
      contentType,
      status: "pending" as const,
      errorMessage: null,
    };

    if (previous) {
      await this.deps.documents.update(documentId, {
        ...fields,
        ...(request.metadata ? { metadata: { ...previous.metadata, ...request.metadata } } : {}),
      });
      return;
    }

    await this.deps.documents.insert({
      id: documentId,
      ...fields,
      contentHash: null,
      sizeBytes: 0,
      chunkCount: 0,
      metadata: { ...request.metadata },
      lastIndexedAt: null,
    });
  }

  private async rollback(documentId: string, previous: Document | null): Promise<void> {
    if (!previous) {
      await this.deps.documents.deleteById(documentId);
      return;
    }
    await this.deps.documents.update(documentId, {
      scopeId: previous.scopeId,
      path: previous.path,
      fileName: previous.fileName,
      contentType: previous.contentType,
      status: previous.status,
      errorMessage: previous.errorMessage,
      metadata: previous.metadata,
    });
  }
}
