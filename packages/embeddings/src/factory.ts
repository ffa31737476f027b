import type { EmbeddingSettings } from "@kindex/types";
import { ValidationError } from "@kindex/errors";
import type { Logger } from "@kindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export function createEmbeddingProvider(
  settings: EmbeddingSettings,
  logger?: Logger,
): IEmbeddingProvider {
  switch (settings.provider) {
    case "cohere":
      if (!settings.apiKey) {
        throw new ValidationError("Cohere API key is required when provider is 'cohere'", {
          apiKey: "required",
        });
      }
      return new CohereEmbeddingProvider({
        apiKey: settings.apiKey,
        model: settings.model,
        dimensions: settings.dimensions,
        logger,
      });
    case "bge-m3":
      if (!settings.baseUrl) {
        throw new ValidationError("BGE-M3 base URL is required when provider is 'bge-m3'", {
          baseUrl: "required",
        });
      }
      return new BgeM3EmbeddingProvider({
        baseUrl: settings.baseUrl,
        model: settings.model,
        dimensions: settings.dimensions,
      });
    default:
      throw new ValidationError(`Unknown embedding provider: ${String(settings.provider)}`, {
        provider: "unknown",
      });
  }
}
