import type {
  IKeywordIndex,
  SearchHit,
  SearchOptions,
  SearchResult,
  SearchSettings,
  SearchSource,
} from "@kindex/types";
import { ExternalServiceError } from "@kindex/errors";
import { createChildLogger, createSilentLogger, redactValue, type Logger } from "@kindex/logger";
import type { SettingsStore } from "@kindex/config";
import type { IEmbeddingProvider } from "@kindex/embeddings";
import type { IVectorStore, VectorSearchResult } from "@kindex/vector-store";
import { compareHits, dedupeHits, minMaxNormalize, type RerankerRegistry } from "./rerankers.js";
import { sanitizeKeywordQuery, validateSearchOptions } from "./search-options.js";

/** Search options as callers pass them; gaps are filled from the search settings. */
export type SearchRequest = Partial<SearchOptions> & Pick<SearchOptions, "scopeId">;

export interface HybridSearchDeps {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  keywordIndex: IKeywordIndex;
  rerankers: RerankerRegistry;
  settings: SettingsStore;
  logger?: Logger;
}

/** Native vector score to a similarity in [0, 1]. */
export function toSimilarity(result: Pick<VectorSearchResult, "score" | "scoreKind">): number {
  const similarity = result.scoreKind === "distance" ? 1 - result.score : result.score;
  return Math.min(1, Math.max(0, similarity));
}

function tagSource(metadata: Record<string, string>, source: SearchSource): Record<string, string> {
  return { ...metadata, source };
}

/**
 * Hybrid retrieval: Query -> (Vector search || Keyword search) -> Rerank -> Filter
 *
 * The two branches run concurrently and each store call takes its own session.
 */
export class HybridSearchEngine {
  private readonly deps: HybridSearchDeps;
  private readonly logger: Logger;

  constructor(deps: HybridSearchDeps) {
    this.deps = deps;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), {
      component: "hybrid-search",
    });
  }

  async search(query: string, options: SearchRequest, signal?: AbortSignal): Promise<SearchResult> {
    const startedAt = Date.now();
    const settings = this.deps.settings.snapshot().search;
    const resolved = validateSearchOptions(options, settings);

    if (query.trim().length === 0) {
      this.logger.warn("Empty query provided to search");
      return { hits: [], totalCount: 0, durationMs: Date.now() - startedAt };
    }

    const log = createChildLogger(this.logger, { scopeId: resolved.scopeId, mode: resolved.mode });
    log.info({ query: redactValue("query", query), topK: resolved.topK }, "Search started");

    const candidates = await this.gather(query, resolved, settings, log, signal);
    const totalCount = new Set(candidates.map((hit) => hit.chunkId)).size;
    const reranked = await this.rerank(query, candidates, resolved, settings, log, signal);

    const hits = dedupeHits(reranked)
      .filter((hit) => hit.score >= resolved.minScore)
      .sort(compareHits)
      .slice(0, resolved.topK);

    const durationMs = Date.now() - startedAt;
    log.info({ returned: hits.length, totalCount, durationMs }, "Search completed");
    return { hits, totalCount, durationMs };
  }

  private async gather(
    query: string,
    options: SearchOptions,
    settings: Readonly<SearchSettings>,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const candidateCount = options.topK * settings.candidateMultiplier;
    switch (options.mode) {
      case "semantic":
        return this.semantic(query, options, candidateCount, signal);
      case "keyword":
        return this.keyword(query, options, candidateCount);
      case "hybrid": {
        const [vectorHits, keywordHits] = await Promise.all([
          this.semantic(query, options, candidateCount, signal),
          this.keyword(query, options, candidateCount),
        ]);
        log.debug(
          { vector: vectorHits.length, keyword: keywordHits.length },
          "Hybrid branches done",
        );
        return [...vectorHits, ...keywordHits];
      }
    }
  }

  private async semantic(
    query: string,
    options: SearchOptions,
    candidateCount: number,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const embedding = await this.deps.embeddingProvider.embed(query, signal);
    const vector = embedding.embeddings[0];
    if (!vector) {
      throw new ExternalServiceError(
        "Failed to generate embedding for query",
        this.deps.embeddingProvider.name,
      );
    }

    const results = await this.deps.vectorStore.search({
      scopeId: options.scopeId,
      vector,
      topK: candidateCount,
      ...(options.pathPrefix ? { pathPrefix: options.pathPrefix } : {}),
    });

    return results
      .map((result): SearchHit => ({
        chunkId: result.chunkId,
        documentId: result.documentId,
        content: result.content,
        score: toSimilarity(result),
        metadata: tagSource(result.metadata, "vector"),
      }))
      .filter((hit) => hit.score >= options.minScore);
  }

  private async keyword(
    query: string,
    options: SearchOptions,
    candidateCount: number,
  ): Promise<SearchHit[]> {
    const sanitized = sanitizeKeywordQuery(query);
    if (sanitized.length === 0) return [];

    const rows = await this.deps.keywordIndex.search({
      scopeId: options.scopeId,
      query: sanitized,
      topK: candidateCount,
      ...(options.pathPrefix ? { pathPrefix: options.pathPrefix } : {}),
    });

    const scores = minMaxNormalize(rows.map((row) => row.rank));
    return rows
      .map((row, i): SearchHit => ({
        chunkId: row.chunkId,
        documentId: row.documentId,
        content: row.content,
        score: scores[i] ?? 0,
        metadata: tagSource(
          { path: row.path, index: String(row.index), rawRank: row.rank.toFixed(4) },
          "keyword",
        ),
      }))
      .filter((hit) => hit.score >= options.minScore);
  }

  private async rerank(
    query: string,
    candidates: SearchHit[],
    options: SearchOptions,
    settings: Readonly<SearchSettings>,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const name = options.reranker ?? settings.reranker;
    const reranker = this.deps.rerankers.get(name);
    if (!reranker) {
      log.warn({ reranker: name }, "Reranker not available, keeping original ranking");
      return candidates;
    }
    return reranker.rerank(query, candidates, signal);
  }
}
