import { randomUUID } from "node:crypto";
import type {
  Chunk,
  ChunkResult,
  ContentInput,
  Document,
  IDocumentStore,
  IKeywordIndex,
  IngestionPhase,
  IngestionResult,
  IngestionRunOptions,
  ParsedDocument,
  VectorEntry,
} from "@kindex/types";
import { INDEXED_WITH } from "@kindex/types";
import { errorMessage, isCancellation, throwIfCancelled } from "@kindex/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@kindex/logger";
import type { SettingsSnapshot, SettingsStore } from "@kindex/config";
import type { ParserRegistry } from "@kindex/parser";
import type { ChunkerRegistry } from "@kindex/chunker";
import { embedInBatches, type IEmbeddingProvider } from "@kindex/embeddings";
import type { IVectorStore } from "@kindex/vector-store";
import { bufferContent, sha256Hex } from "./content.js";

export const NO_CONTENT_MESSAGE = "No extractable content";

export type PhaseCallback = (phase: IngestionPhase, percentComplete: number) => void;

export interface IngestionPipelineDeps {
  documents: IDocumentStore;
  keywordIndex: IKeywordIndex;
  vectorStore: IVectorStore;
  embeddingProvider: IEmbeddingProvider;
  parsers: ParserRegistry;
  chunkers: ChunkerRegistry;
  settings: SettingsStore;
  logger?: Logger;
}

const PHASE_PROGRESS: Record<IngestionPhase, number> = {
  parsing: 10,
  chunking: 30,
  embedding: 50,
  storing: 80,
  complete: 100,
};

/**
 * Ingestion pipeline: Buffer -> Hash -> Parse -> Chunk -> Embed -> Store
 *
 * Failures are recorded on the document and returned; only cancellation escapes.
 */
export class IngestionPipeline {
  private readonly deps: IngestionPipelineDeps;
  private readonly logger: Logger;

  constructor(deps: IngestionPipelineDeps) {
    this.deps = deps;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), {
      component: "ingestion-pipeline",
    });
  }

  async ingest(
    content: ContentInput,
    options: IngestionRunOptions,
    signal?: AbortSignal,
    onPhase?: PhaseCallback,
  ): Promise<IngestionResult> {
    const startedAt = Date.now();
    const settings = this.deps.settings.snapshot();
    const warnings: string[] = [];
    const log = createChildLogger(this.logger, { documentId: options.documentId });
    const report = (phase: IngestionPhase): void => onPhase?.(phase, PHASE_PROGRESS[phase]);

    const finish = (
      status: IngestionResult["status"],
      chunkCount: number,
      message?: string,
    ): IngestionResult => ({
      documentId: options.documentId,
      status,
      chunkCount,
      durationMs: Date.now() - startedAt,
      warnings,
      ...(message === undefined ? {} : { errorMessage: message }),
    });

    try {
      const bytes = await bufferContent(content, signal);
      const contentHash = sha256Hex(bytes);
      const document = await this.beginDocument(options, contentHash, bytes.length);

      report("parsing");
      const parsed = await this.parse(bytes, options, signal);
      warnings.push(...parsed.warnings);
      throwIfCancelled(signal, "Ingestion");

      report("chunking");
      const strategy = options.strategy ?? settings.chunking.strategy;
      const chunker = this.deps.chunkers.get(strategy);
      const results = await chunker.chunk(parsed, { ...settings.chunking, strategy }, signal);

      if (results.length === 0) {
        warnings.push("No chunks generated from document");
        await this.deps.documents.update(options.documentId, {
          status: "failed",
          errorMessage: NO_CONTENT_MESSAGE,
          chunkCount: 0,
        });
        log.warn({ warnings }, "Document produced no chunks");
        return finish("failed", 0, NO_CONTENT_MESSAGE);
      }

      report("embedding");
      const { embeddingProvider } = this.deps;
      if (
        embeddingProvider.modelId !== settings.embedding.model ||
        embeddingProvider.dimensions !== settings.embedding.dimensions
      ) {
        log.warn(
          {
            configuredModel: settings.embedding.model,
            configuredDimensions: settings.embedding.dimensions,
            providerModel: embeddingProvider.modelId,
            providerDimensions: embeddingProvider.dimensions,
          },
          "Embedding settings differ from the running provider; recording the provider's model",
        );
      }
      const { vectors } = await embedInBatches(
        embeddingProvider,
        results.map((r) => r.content),
        {
          batchSize: settings.embedding.batchSize,
          maxParallel: settings.embedding.maxParallelRequests,
          signal,
        },
      );
      throwIfCancelled(signal, "Ingestion");

      report("storing");
      const chunks = results.map((result) => toChunk(result, options));
      await this.replaceChunks(options.documentId, chunks, vectors);

      await this.deps.documents.update(options.documentId, {
        status: "ready",
        errorMessage: null,
        chunkCount: chunks.length,
        lastIndexedAt: new Date(),
        metadata: {
          ...document.metadata,
          ...options.metadata,
          ...provenance(settings, strategy, embeddingProvider),
        },
      });
      report("complete");

      const result = finish("ready", chunks.length);
      log.info({ chunkCount: chunks.length, durationMs: result.durationMs }, "Document ingested");
      return result;
    } catch (err) {
      if (isCancellation(err)) throw err;

      const message = errorMessage(err);
      log.error({ err }, "Ingestion failed");
      warnings.push(`Ingestion failed: ${message}`);
      await this.markFailed(options.documentId, message, log);
      return finish("failed", 0, message);
    }
  }

  private async beginDocument(
    options: IngestionRunOptions,
    contentHash: string,
    sizeBytes: number,
  ): Promise<Document> {
    const { documents } = this.deps;
    const fields = {
      scopeId: options.scopeId,
      path: options.path,
      fileName: options.fileName,
      contentType: options.contentType,
      contentHash,
      sizeBytes,
      status: "processing" as const,
      errorMessage: null,
    };

    const existing = await documents.getById(options.documentId);
    if (existing) {
      const updated = await documents.update(options.documentId, fields);
      if (updated) return updated;
    }

    return documents.insert({
      id: options.documentId,
      ...fields,
      chunkCount: 0,
      metadata: { ...options.metadata },
      lastIndexedAt: null,
    });
  }

  private async parse(
    bytes: Uint8Array,
    options: IngestionRunOptions,
    signal?: AbortSignal,
  ): Promise<ParsedDocument> {
    const parser = this.deps.parsers.getParser(options.fileName, options.contentType);
    if (!parser) {
      return {
        content: "",
        metadata: {},
        warnings: [`Unsupported file type: ${options.fileName}`],
      };
    }
    return parser.parse(bytes, options.fileName, signal);
  }

  private async replaceChunks(
    documentId: string,
    chunks: Chunk[],
    vectors: number[][],
  ): Promise<void> {
    const { keywordIndex, vectorStore, embeddingProvider } = this.deps;

    await vectorStore.deleteByDocument(documentId);
    await keywordIndex.deleteByDocument(documentId);
    await keywordIndex.upsertChunks(chunks);

    const entries = chunks.map((chunk, i): VectorEntry => ({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      scopeId: chunk.scopeId,
      vector: vectors[i] ?? [],
      modelId: embeddingProvider.modelId,
      metadata: {
        ...chunk.metadata,
        path: chunk.path,
        content: chunk.content,
        index: String(chunk.index),
      },
    }));
    await vectorStore.upsert(entries);
  }

  private async markFailed(documentId: string, message: string, log: Logger): Promise<void> {
    try {
      await this.deps.documents.update(documentId, { status: "failed", errorMessage: message });
    } catch (err) {
      log.error({ err }, "Could not record ingestion failure on document");
    }
  }
}

function toChunk(result: ChunkResult, options: IngestionRunOptions): Chunk {
  return {
    id: randomUUID(),
    documentId: options.documentId,
    scopeId: options.scopeId,
    path: options.path,
    content: result.content,
    index: result.index,
    tokenCount: result.tokenCount,
    startOffset: result.startOffset,
    endOffset: result.endOffset,
    metadata: result.metadata,
  };
}

/** Embedding model and width come from the provider that produced the stored vectors. */
function provenance(
  settings: SettingsSnapshot,
  strategy: string,
  provider: IEmbeddingProvider,
): Record<string, string> {
  return {
    [INDEXED_WITH.CHUNKING_STRATEGY]: strategy,
    [INDEXED_WITH.CHUNKING_MAX_TOKENS]: String(settings.chunking.maxTokens),
    [INDEXED_WITH.CHUNKING_OVERLAP]: String(settings.chunking.overlap),
    [INDEXED_WITH.EMBEDDING_PROVIDER]: settings.embedding.provider,
    [INDEXED_WITH.EMBEDDING_MODEL]: provider.modelId,
    [INDEXED_WITH.EMBEDDING_DIMENSIONS]: String(provider.dimensions),
  };
}
