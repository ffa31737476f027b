import type { EmbeddingResult } from "@kindex/types";

export interface IEmbeddingProvider {
  readonly name: string;
  /** Model identifier recorded on every stored vector. */
  readonly modelId: string;
  readonly dimensions: number;

  /** Embeds a single search query. */
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
  /** Embeds document text; one vector per input, in input order. */
  batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
