import type { RuntimeSettings } from "@kindex/types";
import { SettingsStore, type RuntimeSettingsPatch } from "@kindex/config";
import { createChunkerRegistry } from "@kindex/chunker";
import { createParserRegistry, TextParser } from "@kindex/parser";
import { IngestionQueue } from "@kindex/queue";
import { IngestionPipeline } from "../ingestion-pipeline.js";
import { IngestionService } from "../ingestion-service.js";
import { ReindexService } from "../reindex-service.js";
import { HybridSearchEngine } from "../hybrid-search.js";
import { createRerankerRegistry } from "../rerankers.js";
import { createIngestionJobProcessor } from "../job-processor.js";
import { HashingEmbeddingProvider } from "./hashing-embedding-provider.js";
import {
  InMemoryContentSource,
  InMemoryDocumentStore,
  InMemoryKeywordIndex,
  InMemoryVectorStore,
} from "./in-memory-stores.js";

export const P1 =
  "Quarterly planning starts with a review of last year's results and the goals that were missed. Each team lead prepares a short summary of wins, losses and open risks before the first meeting.";
export const P2 =
  "The finance group then models revenue under three scenarios. Assumptions about hiring, pricing and churn are written down so that later reviews can compare them with what actually happened.";
export const P3 =
  "Finally the plan is shared with the whole company. Teams translate the targets into their own roadmaps and report progress every month against the agreed milestones.";
export const THREE_PARAGRAPHS = [P1, P2, P3].join("\n\n");

export function testSettings(): RuntimeSettings {
  return {
    chunking: {
      strategy: "fixed",
      maxTokens: 50,
      overlap: 10,
      minTokens: 10,
      semanticThreshold: 0.5,
      separators: ["\n\n", "\n", ". ", " "],
    },
    embedding: {
      provider: "bge-m3",
      model: "hashing-v1",
      dimensions: 64,
      batchSize: 4,
      maxParallelRequests: 2,
    },
    search: {
      mode: "hybrid",
      topK: 10,
      minScore: 0,
      reranker: "rrf",
      rrfK: 60,
      candidateMultiplier: 3,
    },
  };
}

/** Every core service wired to in-memory stand-ins. */
export function createTestHarness(patch: RuntimeSettingsPatch = {}, queueCapacity = 100) {
  const settings = new SettingsStore(testSettings());
  settings.update(patch);

  const keywordIndex = new InMemoryKeywordIndex();
  const vectorStore = new InMemoryVectorStore();
  const documents = new InMemoryDocumentStore([keywordIndex, vectorStore]);
  const contentSource = new InMemoryContentSource();
  const embeddingProvider = new HashingEmbeddingProvider();
  const queue = new IngestionQueue({ capacity: queueCapacity });

  const pipeline = new IngestionPipeline({
    documents,
    keywordIndex,
    vectorStore,
    embeddingProvider,
    parsers: createParserRegistry([new TextParser()]),
    chunkers: createChunkerRegistry({
      embeddingProvider,
      semanticBatching: () => {
        const { embedding } = settings.snapshot();
        return { batchSize: embedding.batchSize, maxParallel: embedding.maxParallelRequests };
      },
    }),
    settings,
  });
  const ingestion = new IngestionService({ queue, documents, keywordIndex, vectorStore });
  const reindex = new ReindexService({
    documents,
    contentSource,
    ingestion,
    settings,
  });
  const search = new HybridSearchEngine({
    embeddingProvider,
    vectorStore,
    keywordIndex,
    rerankers: createRerankerRegistry({ rrfK: () => settings.snapshot().search.rrfK }),
    settings,
  });
  const processor = createIngestionJobProcessor({ pipeline, contentSource, documents });

  return {
    settings,
    keywordIndex,
    vectorStore,
    documents,
    contentSource,
    embeddingProvider,
    queue,
    pipeline,
    ingestion,
    reindex,
    search,
    processor,
  };
}

export type TestHarness = ReturnType<typeof createTestHarness>;
