import type { EmbeddingResult } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";
import type { IEmbeddingProvider } from "@kindex/embeddings";

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vectors: each lower-cased word adds 1 to a hashed dimension, then the
 * vector is L2-normalized. Texts sharing words are similar; deterministic across runs.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "hashing";
  readonly modelId: string;
  readonly dimensions: number;
  calls = 0;
  /** Makes the next `batchEmbed` call reject with this error. */
  failNextWith: Error | undefined;

  constructor(dimensions = 64, modelId = "hashing-v1") {
    this.dimensions = dimensions;
    this.modelId = modelId;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
      if (word.length === 0) continue;
      const slot = fnv1a(word) % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    throwIfCancelled(signal, "Embedding");
    this.calls++;
    const failure = this.failNextWith;
    if (failure) {
      this.failNextWith = undefined;
      throw failure;
    }
    return {
      embeddings: texts.map((t) => this.vectorFor(t)),
      model: this.modelId,
      tokensUsed: texts.reduce((sum, t) => sum + Math.ceil(t.length / 4), 0),
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
