import { z } from "zod";
import type { EmbeddingResult } from "@kindex/types";
import { AppError, ExternalServiceError, withRetry } from "@kindex/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
  maxRetries?: number;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative().default(0),
});

/**
 * Self-hosted BGE-M3 model server over HTTP (`POST /embed`, `GET /health`).
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly modelId: string;
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly maxRetries: number;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.modelId = config.model ?? "BAAI/bge-m3";
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.maxRetries = config.maxRetries ?? 3;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    const data = await withRetry(() => this.post(texts, signal), {
      maxRetries: this.maxRetries,
      baseDelayMs: 500,
      signal,
    });

    return {
      embeddings: data.embeddings,
      model: this.modelId,
      tokensUsed: data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async post(
    texts: string[],
    signal?: AbortSignal,
  ): Promise<z.infer<typeof bgeM3ResponseSchema>> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions }),
      signal,
    });

    if (!response.ok) {
      const message = `BGE-M3 embedding failed: ${response.status} ${response.statusText}`;
      if (response.status >= 400 && response.status < 500) {
        throw new AppError({ message, statusCode: response.status, code: "EMBEDDING_REJECTED" });
      }
      throw new ExternalServiceError(message, "bge-m3");
    }

    const parsed = bgeM3ResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("BGE-M3 returned a malformed response", "bge-m3", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
