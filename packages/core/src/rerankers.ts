import type { IRelevanceScorer, SearchHit } from "@kindex/types";
import { errorMessage, isCancellation } from "@kindex/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@kindex/logger";

export interface IReranker {
  readonly name: string;
  rerank(query: string, hits: SearchHit[], signal?: AbortSignal): Promise<SearchHit[]>;
}

export const DEFAULT_RRF_K = 60;

/** Score descending, ties broken by chunk id. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/** Min-max normalization to [0, 1]; when every value is equal they all become 1. */
export function minMaxNormalize(values: number[]): number[] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  return values.map((v) => (range > 0 ? (v - min) / range : 1));
}

/** Keeps the highest-scoring hit per chunk id. */
export function dedupeHits(hits: SearchHit[]): SearchHit[] {
  const best = new Map<string, SearchHit>();
  for (const hit of hits) {
    const current = best.get(hit.chunkId);
    if (!current || hit.score > current.score) {
      best.set(hit.chunkId, hit);
    }
  }
  return [...best.values()];
}

export class PassThroughReranker implements IReranker {
  readonly name = "none";

  async rerank(_query: string, hits: SearchHit[]): Promise<SearchHit[]> {
    return hits;
  }
}

interface FusedEntry {
  hit: SearchHit;
  total: number;
  contributions: Map<string, number>;
}

/**
 * Reciprocal rank fusion over the hits' `source` tags:
 * score(chunk) = sum over sources of 1 / (k + rank), ranks 1-indexed per source.
 */
export class RrfReranker implements IReranker {
  readonly name = "rrf";
  private readonly k: number | (() => number);
  private readonly logger: Logger;

  /** `k` may be a getter so runtime settings changes reach later searches. */
  constructor(k: number | (() => number) = DEFAULT_RRF_K, logger?: Logger) {
    this.k = k;
    this.logger = createChildLogger(logger ?? createSilentLogger(), { component: "rrf-reranker" });
  }

  async rerank(_query: string, hits: SearchHit[]): Promise<SearchHit[]> {
    if (hits.length === 0) return hits;

    const bySource = new Map<string, SearchHit[]>();
    for (const hit of hits) {
      const source = hit.metadata["source"] ?? "unknown";
      const list = bySource.get(source) ?? [];
      list.push(hit);
      bySource.set(source, list);
    }

    if (bySource.size <= 1) {
      this.logger.debug("Only one search source, skipping fusion");
      return [...hits].sort(compareHits);
    }

    const k = typeof this.k === "function" ? this.k() : this.k;
    const fused = new Map<string, FusedEntry>();
    for (const [source, list] of bySource) {
      const ranked = [...list].sort(compareHits);
      ranked.forEach((hit, i) => {
        const contribution = 1 / (k + i + 1);
        const entry = fused.get(hit.chunkId) ?? {
          hit,
          total: 0,
          contributions: new Map<string, number>(),
        };
        entry.total += contribution;
        entry.contributions.set(source, (entry.contributions.get(source) ?? 0) + contribution);
        fused.set(hit.chunkId, entry);
      });
    }

    const entries = [...fused.values()];
    const normalized = minMaxNormalize(entries.map((e) => e.total));

    const results = entries.map((entry, i): SearchHit => {
      const metadata: Record<string, string> = {
        ...entry.hit.metadata,
        sources: [...entry.contributions.keys()].sort().join(","),
        rrfScore: entry.total.toFixed(6),
        reranker: this.name,
      };
      for (const [source, contribution] of entry.contributions) {
        metadata[`rrf:${source}`] = contribution.toFixed(6);
      }
      return { ...entry.hit, score: normalized[i] ?? 0, metadata };
    });

    this.logger.debug(
      { k, input: hits.length, sources: bySource.size, output: results.length },
      "RRF fusion complete",
    );
    return results.sort(compareHits);
  }
}

/** Neutral score given to a reply that holds no number. */
export const NEUTRAL_RELEVANCE = 5;

/**
 * Re-scores each distinct candidate with a relevance scorer (0-10), then normalizes.
 * A candidate whose scoring call fails keeps its own score, scaled to 0-10.
 */
/** Scoring requests a cross-encoder rerank keeps in flight at once. */
export const DEFAULT_SCORER_CONCURRENCY = 4;

interface ScoredHit {
  hit: SearchHit;
  score: number;
  fallback: boolean;
}

export class CrossEncoderReranker implements IReranker {
  readonly name = "cross-encoder";
  private readonly scorer: IRelevanceScorer;
  private readonly logger: Logger;
  private readonly maxConcurrency: number;

  constructor(scorer: IRelevanceScorer, logger?: Logger, maxConcurrency = DEFAULT_SCORER_CONCURRENCY) {
    this.scorer = scorer;
    this.maxConcurrency = Math.max(1, maxConcurrency);
    this.logger = createChildLogger(logger ?? createSilentLogger(), {
      component: "cross-encoder-reranker",
      scorer: scorer.name,
    });
  }

  async rerank(query: string, hits: SearchHit[], signal?: AbortSignal): Promise<SearchHit[]> {
    if (hits.length === 0) return hits;
    const candidates = dedupeHits(hits);

    const scored: ScoredHit[] = new Array<ScoredHit>(candidates.length);
    let next = 0;
    const runLane = async (): Promise<void> => {
      while (next < candidates.length) {
        const index = next++;
        const hit = candidates[index];
        if (hit === undefined) continue;
        scored[index] = await this.scoreHit(query, hit, signal);
      }
    };
    const lanes = Array.from({ length: Math.min(this.maxConcurrency, candidates.length) }, () => runLane());
    await Promise.all(lanes);

    const normalized = minMaxNormalize(scored.map((s) => s.score));
    return scored
      .map(({ hit, score, fallback }, i): SearchHit => ({
        ...hit,
        score: normalized[i] ?? 0,
        metadata: {
          ...hit.metadata,
          crossEncoderScore: score.toFixed(4),
          reranker: this.name,
          ...(fallback ? { crossEncoderFallback: "true" } : {}),
        },
      }))
      .sort(compareHits);
  }

  private async scoreHit(query: string, hit: SearchHit, signal?: AbortSignal): Promise<ScoredHit> {
    try {
      const raw = await this.scorer.score(query, hit.content, signal);
      return { hit, score: clampRelevance(raw), fallback: false };
    } catch (err) {
      if (isCancellation(err)) throw err;
      this.logger.warn(
        { chunkId: hit.chunkId, error: errorMessage(err) },
        "Relevance scoring failed, keeping original score",
      );
      return { hit, score: clampRelevance(hit.score * 10), fallback: true };
    }
  }
}

export function clampRelevance(score: number): number {
  if (!Number.isFinite(score)) return NEUTRAL_RELEVANCE;
  return Math.min(10, Math.max(0, score));
}

export interface RerankerRegistry {
  get(name: string): IReranker | undefined;
  readonly names: readonly string[];
}

export interface RerankerRegistryDeps {
  rrfK?: number | (() => number);
  /** Enables the cross-encoder reranker. */
  scorer?: IRelevanceScorer;
  /** Defaults to DEFAULT_SCORER_CONCURRENCY. */
  scorerConcurrency?: number;
  logger?: Logger;
}

export function createRerankerRegistry(deps: RerankerRegistryDeps = {}): RerankerRegistry {
  const rerankers = new Map<string, IReranker>();
  for (const reranker of [
    new PassThroughReranker(),
    new RrfReranker(deps.rrfK, deps.logger),
    ...(deps.scorer ? [new CrossEncoderReranker(deps.scorer, deps.logger, deps.scorerConcurrency)] : []),
  ]) {
    rerankers.set(reranker.name, reranker);
  }

  return {
    names: [...rerankers.keys()],
    get: (name) => rerankers.get(name.toLowerCase()),
  };
}
