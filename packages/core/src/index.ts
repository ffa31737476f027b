export { bufferContent, sha256Hex } from "./content.js";
export { LocalContentSource } from "./content-source.js";

export { IngestionPipeline, NO_CONTENT_MESSAGE } from "./ingestion-pipeline.js";
export type { IngestionPipelineDeps, PhaseCallback } from "./ingestion-pipeline.js";
export { createIngestionJobProcessor } from "./job-processor.js";
export type { IngestionJobProcessorDeps } from "./job-processor.js";
export { IngestionService } from "./ingestion-service.js";
export type { EnqueueOutcome, EnqueueRequest, IngestionServiceDeps } from "./ingestion-service.js";
export {
  ReindexService,
  QUEUE_FULL_MESSAGE,
  compareChunkingSettings,
  compareEmbeddingSettings,
} from "./reindex-service.js";
export type { ReindexServiceDeps } from "./reindex-service.js";

export { HybridSearchEngine, toSimilarity } from "./hybrid-search.js";
export type { HybridSearchDeps, SearchRequest } from "./hybrid-search.js";
export { MAX_TOP_K, sanitizeKeywordQuery, validateSearchOptions } from "./search-options.js";
export {
  CrossEncoderReranker,
  DEFAULT_RRF_K,
  DEFAULT_SCORER_CONCURRENCY,
  PassThroughReranker,
  RrfReranker,
  createRerankerRegistry,
} from "./rerankers.js";
export type { IReranker, RerankerRegistry, RerankerRegistryDeps } from "./rerankers.js";
export {
  CohereRelevanceScorer,
  HttpRelevanceScorer,
  buildRelevancePrompt,
  parseRelevanceScore,
} from "./relevance-scorers.js";
