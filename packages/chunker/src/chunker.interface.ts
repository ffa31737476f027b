import type { ChunkResult, ChunkStrategy, ChunkingSettings, ParsedDocument } from "@kindex/types";
import { estimateTokens } from "./token-estimator.js";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(
    document: ParsedDocument,
    settings: ChunkingSettings,
    signal?: AbortSignal,
  ): Promise<ChunkResult[]>;
}

export function toChunkResult(
  document: ParsedDocument,
  strategy: ChunkStrategy,
  text: string,
  index: number,
  startOffset: number,
  endOffset: number,
): ChunkResult {
  const content = text.trim();
  return {
    content,
    index,
    tokenCount: estimateTokens(content),
    startOffset,
    endOffset,
    metadata: {
      ...document.metadata,
      chunkingStrategy: strategy,
      chunkIndex: String(index),
    },
  };
}
