import type {
  AppConfig,
  EmbeddingSettings,
  IRelevanceScorer,
  SearchSettings,
} from "@kindex/types";
import { SettingsStore } from "@kindex/config";
import { createChildLogger, type Logger } from "@kindex/logger";
import {
  closeDbClient,
  createDbClient,
  getSearchIndexMigrationSql,
  PgDocumentStore,
  PgKeywordIndex,
} from "@kindex/db";
import { createVectorStore, type IVectorStore } from "@kindex/vector-store";
import { createEmbeddingProvider } from "@kindex/embeddings";
import { createChunkerRegistry } from "@kindex/chunker";
import { createDefaultParserRegistry } from "@kindex/parser";
import { IngestionQueue, WorkerPool } from "@kindex/queue";
import {
  CohereRelevanceScorer,
  createIngestionJobProcessor,
  createRerankerRegistry,
  HttpRelevanceScorer,
  HybridSearchEngine,
  IngestionPipeline,
  IngestionService,
  LocalContentSource,
  ReindexService,
} from "@kindex/core";
import { ProgressLogObserver } from "./progress-log.js";

export interface WorkerContainer {
  settings: SettingsStore;
  queue: IngestionQueue;
  pool: WorkerPool;
  ingestion: IngestionService;
  reindex: ReindexService;
  search: HybridSearchEngine;
  vectorStore: IVectorStore;
  close(): Promise<void>;
}

/**
 * Picks the scorer behind the cross-encoder reranker: a completion server when
 * `crossEncoderUrl` is set, otherwise Cohere chat when a Cohere key is available.
 */
export function createRelevanceScorer(
  search: SearchSettings,
  embedding: EmbeddingSettings,
): IRelevanceScorer | undefined {
  const model = search.crossEncoderModel;
  if (!model) return undefined;
  if (search.crossEncoderUrl) {
    return new HttpRelevanceScorer({ baseUrl: search.crossEncoderUrl, model });
  }
  if (embedding.apiKey) {
    return new CohereRelevanceScorer({ apiKey: embedding.apiKey, model });
  }
  return undefined;
}

export async function createContainer(
  config: AppConfig,
  logger: Logger,
): Promise<WorkerContainer> {
  const settings = new SettingsStore({
    chunking: config.chunking,
    embedding: config.embedding,
    search: config.search,
  });

  const client = createDbClient({
    url: config.database.url,
    maxConnections: config.database.poolMax,
  });
  const documents = new PgDocumentStore(client.db);
  const keywordIndex = new PgKeywordIndex(client.db, client.connection);

  const vectorStore = createVectorStore(config.vectorStore, {
    dimensions: config.embedding.dimensions,
    db: client,
  });
  if (config.vectorStore.type === "pgvector") {
    await client.connection.unsafe(getSearchIndexMigrationSql());
  }
  await vectorStore.ensureCollection(config.embedding.dimensions);
  if (!(await vectorStore.healthCheck())) {
    logger.warn({ vectorStore: vectorStore.name }, "Vector store health check failed");
  }

  const embeddingProvider = createEmbeddingProvider(config.embedding, logger);
  const contentSource = new LocalContentSource(config.ingestion.contentRoot);
  const queue = new IngestionQueue({ capacity: config.ingestion.queueCapacity });

  const pipeline = new IngestionPipeline({
    documents,
    keywordIndex,
    vectorStore,
    embeddingProvider,
    parsers: createDefaultParserRegistry(config.docling),
    chunkers: createChunkerRegistry({
      embeddingProvider,
      semanticBatching: () => {
        const { embedding } = settings.snapshot();
        return { batchSize: embedding.batchSize, maxParallel: embedding.maxParallelRequests };
      },
    }),
    settings,
    logger,
  });

  const pool = new WorkerPool({
    queue,
    concurrency: config.ingestion.workerCount,
    processor: createIngestionJobProcessor({ pipeline, contentSource, documents }),
    observer: new ProgressLogObserver(logger),
    logger,
  });

  const ingestion = new IngestionService({ queue, documents, keywordIndex, vectorStore, logger });
  const reindex = new ReindexService({
    documents,
    contentSource,
    ingestion,
    settings,
    logger,
  });

  const scorer = createRelevanceScorer(config.search, config.embedding);
  if (config.search.reranker === "cross-encoder" && !scorer) {
    logger.warn("Cross-encoder reranker selected but no relevance scorer is configured");
  }
  const search = new HybridSearchEngine({
    embeddingProvider,
    vectorStore,
    keywordIndex,
    rerankers: createRerankerRegistry({
      rrfK: () => settings.snapshot().search.rrfK,
      ...(scorer ? { scorer } : {}),
      logger,
    }),
    settings,
    logger,
  });

  createChildLogger(logger, { component: "container" }).info(
    {
      vectorStore: vectorStore.name,
      embeddingProvider: embeddingProvider.name,
      workers: config.ingestion.workerCount,
      queueCapacity: queue.capacity,
    },
    "Services ready",
  );

  return {
    settings,
    queue,
    pool,
    ingestion,
    reindex,
    search,
    vectorStore,
    close: () => closeDbClient(client),
  };
}
