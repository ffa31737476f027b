import { describe, it, expect, vi } from "vitest";
import type { IRelevanceScorer, SearchHit } from "@kindex/types";
import { CancelledError } from "@kindex/errors";
import {
  compareHits,
  createRerankerRegistry,
  CrossEncoderReranker,
  dedupeHits,
  minMaxNormalize,
  RrfReranker,
} from "./rerankers.js";

function hit(chunkId: string, score: number, source?: string): SearchHit {
  return {
    chunkId,
    documentId: `doc-${chunkId}`,
    content: `content of ${chunkId}`,
    score,
    metadata: source ? { source } : {},
  };
}

function scorerFrom(fn: (text: string) => Promise<number>): IRelevanceScorer {
  return { name: "fake", score: (_query, text) => fn(text) };
}

describe("minMaxNormalize", () => {
  it("maps the range onto [0, 1]", () => {
    expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
  });

  it("gives every value 1 when all are equal", () => {
    expect(minMaxNormalize([0.3, 0.3])).toEqual([1, 1]);
    expect(minMaxNormalize([])).toEqual([]);
  });
});

describe("compareHits and dedupeHits", () => {
  it("orders by score, then chunk id", () => {
    const sorted = [hit("b", 0.5), hit("c", 0.9), hit("a", 0.5)].sort(compareHits);
    expect(sorted.map((h) => h.chunkId)).toEqual(["c", "a", "b"]);
  });

  it("keeps the best hit per chunk", () => {
    const deduped = dedupeHits([hit("a", 0.2), hit("b", 0.4), hit("a", 0.7)]);
    expect(deduped.map((h) => [h.chunkId, h.score])).toEqual([
      ["a", 0.7],
      ["b", 0.4],
    ]);
  });
});

describe("RrfReranker", () => {
  const vectorHits = [hit("a", 0.9, "vector"), hit("d", 0.8, "vector")];
  const keywordHits = [hit("b", 0.9, "keyword"), hit("e", 0.8, "keyword"), hit("d", 0.7, "keyword")];

  it("ranks a chunk found by both sources first", async () => {
    const results = await new RrfReranker(60).rerank("q", [...vectorHits, ...keywordHits]);

    expect(results.map((h) => h.chunkId)).toEqual(["d", "a", "b", "e"]);
    expect(results[0]?.score).toBe(1);
    expect(results[1]?.score).toBeCloseTo(0.016657, 5);
    expect(results[2]?.score).toBeCloseTo(0.016657, 5);
    expect(results[3]?.score).toBe(0);
    expect(results[0]?.metadata).toEqual({
      source: "vector",
      sources: "keyword,vector",
      rrfScore: "0.032002",
      reranker: "rrf",
      "rrf:vector": "0.016129",
      "rrf:keyword": "0.015873",
    });
  });

  it("scores a chunk found by both sources above one found at the same rank by one source", async () => {
    const results = await new RrfReranker(60).rerank("q", [
      hit("a", 0.9, "vector"),
      hit("b", 0.9, "keyword"),
      hit("a", 0.8, "keyword"),
    ]);

    expect(results.map((h) => h.chunkId)).toEqual(["a", "b"]);
    expect(results[0]?.score).toBeGreaterThan(results[1]?.score ?? 1);
  });

  it("reads k on every call when given a getter", async () => {
    let k = 60;
    const reranker = new RrfReranker(() => k);
    k = 0;

    const results = await reranker.rerank("q", [...vectorHits, ...keywordHits]);

    expect(results.find((h) => h.chunkId === "a")?.metadata["rrf:vector"]).toBe("1.000000");
  });

  it("only sorts hits from a single source", async () => {
    const results = await new RrfReranker().rerank("q", [hit("x", 0.2, "vector"), hit("y", 0.6, "vector")]);

    expect(results).toEqual([hit("y", 0.6, "vector"), hit("x", 0.2, "vector")]);
  });
});

describe("CrossEncoderReranker", () => {
  it("re-scores distinct candidates and falls back to the original score on failure", async () => {
    const scores: Record<string, number> = { "content of a": 8, "content of c": 2 };
    const score = vi.fn(async (text: string) => {
      const value = scores[text];
      if (value === undefined) throw new Error("scorer unavailable");
      return value;
    });
    const reranker = new CrossEncoderReranker(scorerFrom(score));

    const results = await reranker.rerank("q", [hit("a", 0.2), hit("a", 0.6), hit("b", 0.9), hit("c", 0.5)]);

    expect(score).toHaveBeenCalledTimes(3);
    expect(results.map((h) => h.chunkId)).toEqual(["b", "a", "c"]);
    expect(results[0]?.score).toBe(1);
    expect(results[1]?.score).toBeCloseTo(6 / 7, 10);
    expect(results[2]?.score).toBe(0);
    expect(results[0]?.metadata).toEqual({
      crossEncoderScore: "9.0000",
      reranker: "cross-encoder",
      crossEncoderFallback: "true",
    });
    expect(results[1]?.metadata).toEqual({ crossEncoderScore: "8.0000", reranker: "cross-encoder" });
  });

  it("clamps scores outside 0-10", async () => {
    const reranker = new CrossEncoderReranker(scorerFrom(async () => 42));

    const [only] = await reranker.rerank("q", [hit("a", 0.5)]);

    expect(only?.metadata["crossEncoderScore"]).toBe("10.0000");
  });

  it("propagates cancellation", async () => {
    const reranker = new CrossEncoderReranker(
      scorerFrom(async () => {
        throw new CancelledError("Search cancelled");
      }),
    );

    await expect(reranker.rerank("q", [hit("a", 0.5)])).rejects.toThrow("Search cancelled");
  });

  it("keeps at most maxConcurrency scoring calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const score = vi.fn(async (text: string) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return text.length;
    });
    const reranker = new CrossEncoderReranker(scorerFrom(score), undefined, 2);
    const hits = ["a", "b", "c", "d", "e", "f", "g"].map((id, i) => hit(id, i / 10));

    const results = await reranker.rerank("q", hits);

    expect(score).toHaveBeenCalledTimes(7);
    expect(peak).toBe(2);
    expect(results).toHaveLength(7);
  });
});

describe("createRerankerRegistry", () => {
  it("offers the cross-encoder only when a scorer is configured", () => {
    expect(createRerankerRegistry().names).toEqual(["none", "rrf"]);

    const registry = createRerankerRegistry({ scorer: scorerFrom(async () => 5) });
    expect(registry.names).toEqual(["none", "rrf", "cross-encoder"]);
    expect(registry.get("RRF")?.name).toBe("rrf");
    expect(registry.get("bm25")).toBeUndefined();
  });
});
