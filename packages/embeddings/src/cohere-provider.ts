import { CohereClient } from "cohere-ai";
import type CircuitBreaker from "opossum";
import type { EmbeddingResult } from "@kindex/types";
import { createCircuitBreaker, ExternalServiceError, isCancellation } from "@kindex/errors";
import { createSilentLogger, type Logger } from "@kindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const MAX_TEXTS_PER_CALL = 96; // Cohere limit

type InputType = "search_document" | "search_query";

interface EmbedCall {
  embeddings: number[][];
  tokens: number;
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  logger?: Logger;
}

/**
 * Cohere v2 embeddings behind an opossum circuit breaker. Documents are embedded as
 * `search_document`, queries as `search_query`.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly modelId: string;
  readonly dimensions: number;
  private readonly client: CohereClient;
  private readonly breaker: CircuitBreaker<[string[], InputType, AbortSignal | undefined], EmbedCall>;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.modelId = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.breaker = createCircuitBreaker(
      "cohere-embed",
      (texts: string[], inputType: InputType, signal: AbortSignal | undefined) =>
        this.callEmbed(texts, inputType, signal),
      config.logger ?? createSilentLogger(),
    );
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.run([text], "search_query", signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.run(texts, "search_document", signal);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async run(
    texts: string[],
    inputType: InputType,
    signal?: AbortSignal,
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += MAX_TEXTS_PER_CALL) {
      const batch = texts.slice(i, i + MAX_TEXTS_PER_CALL);
      try {
        const result = await this.breaker.fire(batch, inputType, signal);
        allEmbeddings.push(...result.embeddings);
        totalTokens += result.tokens;
      } catch (err) {
        if (isCancellation(err)) throw err;
        throw new ExternalServiceError(
          `Cohere embedding failed: ${err instanceof Error ? err.message : String(err)}`,
          "cohere",
          { cause: err },
        );
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.modelId,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private async callEmbed(
    texts: string[],
    inputType: InputType,
    signal: AbortSignal | undefined,
  ): Promise<EmbedCall> {
    const response = await this.client.v2.embed(
      {
        texts,
        model: this.modelId,
        inputType,
        embeddingTypes: ["float"],
        outputDimension: this.dimensions,
      },
      { abortSignal: signal },
    );

    return {
      embeddings: response.embeddings.float ?? [],
      tokens: response.meta?.billedUnits?.inputTokens ?? 0,
    };
  }
}
