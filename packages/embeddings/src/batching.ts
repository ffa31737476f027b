import { ExternalServiceError, throwIfCancelled } from "@kindex/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface BatchEmbedOptions {
  batchSize: number;
  /** Upper bound on provider calls in flight at once. */
  maxParallel: number;
  signal?: AbortSignal;
}

export interface BatchEmbedResult {
  vectors: number[][];
  tokensUsed: number;
}

/**
 * Embeds `texts` in slices of `batchSize`, keeping at most `maxParallel` slices in
 * flight, and returns the vectors in input order.
 *
 * Rejects when the provider returns the wrong number of vectors or a vector whose
 * length differs from `provider.dimensions`.
 */
export async function embedInBatches(
  provider: IEmbeddingProvider,
  texts: string[],
  options: BatchEmbedOptions,
): Promise<BatchEmbedResult> {
  const batchSize = Math.max(1, options.batchSize);
  const maxParallel = Math.max(1, options.maxParallel);

  const slices: string[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    slices.push(texts.slice(i, i + batchSize));
  }

  const results: number[][][] = new Array<number[][]>(slices.length);
  let tokensUsed = 0;
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < slices.length) {
      const sliceIndex = next++;
      const slice = slices[sliceIndex] ?? [];
      throwIfCancelled(options.signal, "Embedding");

      const result = await provider.batchEmbed(slice, options.signal);
      validateVectors(provider, slice.length, result.embeddings);
      results[sliceIndex] = result.embeddings;
      tokensUsed += result.tokensUsed;
    }
  };

  const lanes = Array.from({ length: Math.min(maxParallel, slices.length) }, () => runLane());
  await Promise.all(lanes);

  return { vectors: results.flat(), tokensUsed };
}

function validateVectors(provider: IEmbeddingProvider, expected: number, vectors: number[][]): void {
  if (vectors.length !== expected) {
    throw new ExternalServiceError(
      `Embedding provider ${provider.name} returned ${vectors.length} vectors for ${expected} texts`,
      provider.name,
    );
  }
  for (const vector of vectors) {
    if (vector.length !== provider.dimensions) {
      throw new ExternalServiceError(
        `Embedding dimension mismatch: expected ${provider.dimensions}, got ${vector.length}`,
        provider.name,
      );
    }
  }
}
