import { randomUUID } from "node:crypto";
import type {
  ChunkStrategy,
  Document,
  IContentSource,
  IDocumentStore,
  ReindexCheck,
  ReindexDocumentResult,
  ReindexOptions,
  ReindexReason,
  ReindexResult,
} from "@kindex/types";
import { INDEXED_WITH } from "@kindex/types";
import { errorMessage } from "@kindex/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@kindex/logger";
import type { SettingsSnapshot, SettingsStore } from "@kindex/config";
import { bufferContent, sha256Hex } from "./content.js";
import type { IngestionService } from "./ingestion-service.js";

export const QUEUE_FULL_MESSAGE = "Ingestion queue is full";

export interface ReindexServiceDeps {
  documents: IDocumentStore;
  contentSource: IContentSource;
  ingestion: IngestionService;
  settings: SettingsStore;
  logger?: Logger;
}

interface SettingsComparison {
  changed: boolean;
  stored?: string;
  current?: string;
}

type Evaluation =
  | { reason: "file_not_found" }
  | { reason: "error"; errorMessage: string }
  | {
      reason: Exclude<ReindexReason, "file_not_found" | "error">;
      currentHash: string;
      stored?: string;
      current?: string;
    };

function chunkingKey(strategy: string, maxTokens: string, overlap: string): string {
  return `${strategy}:${maxTokens}:${overlap}`;
}

function embeddingKey(provider: string, model: string, dimensions: string): string {
  return `${provider}:${model}:${dimensions}`;
}

/**
 * Compares the document's recorded provenance with the current settings. Documents
 * indexed before provenance was recorded never count as changed.
 */
export function compareChunkingSettings(
  document: Document,
  settings: SettingsSnapshot,
  strategy?: ChunkStrategy,
): SettingsComparison {
  const meta = document.metadata;
  const storedStrategy = meta[INDEXED_WITH.CHUNKING_STRATEGY];
  if (!storedStrategy) return { changed: false };

  const stored = chunkingKey(
    storedStrategy,
    meta[INDEXED_WITH.CHUNKING_MAX_TOKENS] ?? "",
    meta[INDEXED_WITH.CHUNKING_OVERLAP] ?? "",
  );
  const current = chunkingKey(
    strategy ?? settings.chunking.strategy,
    String(settings.chunking.maxTokens),
    String(settings.chunking.overlap),
  );
  return { changed: stored.toLowerCase() !== current.toLowerCase(), stored, current };
}

export function compareEmbeddingSettings(
  document: Document,
  settings: SettingsSnapshot,
): SettingsComparison {
  const meta = document.metadata;
  const storedModel = meta[INDEXED_WITH.EMBEDDING_MODEL];
  if (!storedModel) return { changed: false };

  const stored = embeddingKey(
    meta[INDEXED_WITH.EMBEDDING_PROVIDER] ?? "",
    storedModel,
    meta[INDEXED_WITH.EMBEDDING_DIMENSIONS] ?? "",
  );
  const current = embeddingKey(
    settings.embedding.provider,
    settings.embedding.model,
    String(settings.embedding.dimensions),
  );
  return { changed: stored.toLowerCase() !== current.toLowerCase(), stored, current };
}

/**
 * Decides per document whether it must be re-processed, and re-enqueues those that do
 * under one batch id.
 */
export class ReindexService {
  private readonly deps: ReindexServiceDeps;
  private readonly logger: Logger;

  constructor(deps: ReindexServiceDeps) {
    this.deps = deps;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), {
      component: "reindex-service",
    });
  }

  async reindex(options: ReindexOptions = {}): Promise<ReindexResult> {
    const batchId = randomUUID();
    const settings = this.deps.settings.snapshot();
    const log = createChildLogger(this.logger, { batchId });
    log.info(
      {
        scopeId: options.scopeId,
        documentIds: options.documentIds?.length,
        force: options.force ?? false,
        detectSettingsChanges: options.detectSettingsChanges ?? true,
      },
      "Starting reindex",
    );

    const documents = await this.selectDocuments(options);
    const results: ReindexDocumentResult[] = [];
    for (const document of documents) {
      results.push(await this.processDocument(document, options, settings, batchId, log));
    }

    const reasonCounts: Partial<Record<ReindexReason, number>> = {};
    for (const result of results) {
      reasonCounts[result.reason] = (reasonCounts[result.reason] ?? 0) + 1;
    }

    const summary: ReindexResult = {
      batchId,
      totalDocuments: results.length,
      enqueuedCount: results.filter((r) => r.action === "enqueued").length,
      skippedCount: results.filter((r) => r.action === "skipped").length,
      failedCount: results.filter((r) => r.action === "failed").length,
      reasonCounts,
      documents: results,
    };
    log.info(
      {
        total: summary.totalDocuments,
        enqueued: summary.enqueuedCount,
        skipped: summary.skippedCount,
        failed: summary.failedCount,
      },
      "Reindex finished",
    );
    return summary;
  }

  async checkDocument(documentId: string): Promise<ReindexCheck> {
    const document = await this.deps.documents.getById(documentId);
    if (!document) {
      return {
        documentId,
        needsReindex: false,
        reason: "error",
        currentHash: null,
        storedHash: null,
      };
    }

    const evaluation = await this.evaluate(document, this.deps.settings.snapshot(), {
      detectSettingsChanges: true,
    });
    const storedHash = document.contentHash;

    if (evaluation.reason === "file_not_found" || evaluation.reason === "error") {
      return {
        documentId,
        needsReindex: false,
        reason: evaluation.reason,
        currentHash: null,
        storedHash,
      };
    }

    return {
      documentId,
      needsReindex: evaluation.reason !== "unchanged",
      reason: evaluation.reason,
      currentHash: evaluation.currentHash,
      storedHash,
      ...(evaluation.stored === undefined ? {} : { storedSettings: evaluation.stored }),
      ...(evaluation.current === undefined ? {} : { currentSettings: evaluation.current }),
    };
  }

  private selectDocuments(options: ReindexOptions): Promise<Document[]> {
    const { documentIds, scopeId } = options;
    return this.deps.documents.list({
      ...(scopeId ? { scopeId } : {}),
      ...(documentIds && documentIds.length > 0 ? { documentIds } : {}),
    });
  }

  private async processDocument(
    document: Document,
    options: ReindexOptions,
    settings: SettingsSnapshot,
    batchId: string,
    log: Logger,
  ): Promise<ReindexDocumentResult> {
    const base = { documentId: document.id, fileName: document.fileName };

    try {
      if (options.force) {
        return await this.enqueueDocument(document, options, batchId, "forced", log);
      }

      const evaluation = await this.evaluate(document, settings, options);
      switch (evaluation.reason) {
        case "file_not_found":
          log.warn({ documentId: document.id, path: document.path }, "Document source not found");
          return { ...base, action: "skipped", reason: "file_not_found" };
        case "error":
          return {
            ...base,
            action: "failed",
            reason: "error",
            errorMessage: evaluation.errorMessage,
          };
        case "unchanged":
          return { ...base, action: "skipped", reason: "unchanged" };
        default:
          log.info(
            {
              documentId: document.id,
              reason: evaluation.reason,
              stored: evaluation.stored,
              current: evaluation.current,
            },
            "Document needs reindex",
          );
          return await this.enqueueDocument(document, options, batchId, evaluation.reason, log);
      }
    } catch (err) {
      log.error({ err, documentId: document.id }, "Could not reindex document");
      return { ...base, action: "failed", reason: "error", errorMessage: errorMessage(err) };
    }
  }

  private async evaluate(
    document: Document,
    settings: SettingsSnapshot,
    options: Pick<ReindexOptions, "detectSettingsChanges" | "strategy">,
  ): Promise<Evaluation> {
    const { contentSource } = this.deps;
    if (!(await contentSource.exists(document.path))) {
      return { reason: "file_not_found" };
    }

    let currentHash: string;
    try {
      currentHash = sha256Hex(await bufferContent(await contentSource.open(document.path)));
    } catch (err) {
      return { reason: "error", errorMessage: `Hash computation failed: ${errorMessage(err)}` };
    }

    if (currentHash !== document.contentHash?.toLowerCase()) {
      return { reason: "content_changed", currentHash };
    }

    if (options.detectSettingsChanges ?? true) {
      const embedding = compareEmbeddingSettings(document, settings);
      if (embedding.changed) {
        return {
          reason: "embedding_settings_changed",
          currentHash,
          stored: embedding.stored,
          current: embedding.current,
        };
      }
      const chunking = compareChunkingSettings(document, settings, options.strategy);
      if (chunking.changed) {
        return {
          reason: "chunking_settings_changed",
          currentHash,
          stored: chunking.stored,
          current: chunking.current,
        };
      }
    }

    if (!document.lastIndexedAt || document.status !== "ready") {
      return { reason: "never_indexed", currentHash };
    }
    return { reason: "unchanged", currentHash };
  }

  private async enqueueDocument(
    document: Document,
    options: ReindexOptions,
    batchId: string,
    reason: ReindexReason,
    log: Logger,
  ): Promise<ReindexDocumentResult> {
    const { ingestion } = this.deps;
    const base = { documentId: document.id, fileName: document.fileName };

    // Existing chunks and vectors stay searchable until the job replaces them, so a
    // rejected enqueue leaves the document as it was.
    const outcome = await ingestion.enqueue({
      documentId: document.id,
      scopeId: document.scopeId,
      path: document.path,
      fileName: document.fileName,
      contentType: document.contentType,
      batchId,
      ...(options.strategy ? { strategy: options.strategy } : {}),
    });

    if (!outcome.accepted) {
      return { ...base, action: "failed", reason: "error", errorMessage: QUEUE_FULL_MESSAGE };
    }
    log.info(
      { documentId: document.id, jobId: outcome.jobId, reason },
      "Enqueued document for reindex",
    );
    return { ...base, action: "enqueued", reason, jobId: outcome.jobId };
  }
}
