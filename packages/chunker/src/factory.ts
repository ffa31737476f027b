import type { ChunkStrategy } from "@kindex/types";
import type { IEmbeddingProvider } from "@kindex/embeddings";
import { createSilentLogger, type Logger } from "@kindex/logger";
import type { IChunker } from "./chunker.interface.js";
import { SemanticChunker, type SemanticChunkerOptions } from "./semantic-chunker.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";

export interface ChunkerRegistryDeps {
  /** Required for the semantic strategy; without it semantic falls back to fixed. */
  embeddingProvider?: IEmbeddingProvider;
  /** Read on every semantic chunking run so batch settings can change live. */
  semanticBatching?: () => SemanticChunkerOptions;
  logger?: Logger;
}

export interface ChunkerRegistry {
  /** Unknown names resolve to the fixed-size chunker. */
  get(strategy: string): IChunker;
  readonly strategies: readonly ChunkStrategy[];
}

export function createChunkerRegistry(deps: ChunkerRegistryDeps = {}): ChunkerRegistry {
  const log = (deps.logger ?? createSilentLogger()).child({ component: "chunker-registry" });
  const fixed = new FixedChunker();

  const chunkers = new Map<string, IChunker>([
    ["fixed", fixed],
    ["recursive", new RecursiveChunker()],
  ]);
  if (deps.embeddingProvider) {
    chunkers.set("semantic", new SemanticChunker(deps.embeddingProvider, deps.semanticBatching));
  }

  return {
    strategies: deps.embeddingProvider ? ["fixed", "recursive", "semantic"] : ["fixed", "recursive"],
    get(strategy) {
      const chunker = chunkers.get(strategy);
      if (chunker) return chunker;

      log.warn({ strategy }, "unknown or unavailable chunking strategy, using fixed");
      return fixed;
    },
  };
}
