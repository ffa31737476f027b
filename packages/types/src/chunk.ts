export type ChunkStrategy = "fixed" | "recursive" | "semantic";

export const CHUNK_STRATEGIES: readonly ChunkStrategy[] = ["fixed", "recursive", "semantic"];

export interface Chunk {
  id: string;
  documentId: string;
  scopeId: string;
  path: string;
  content: string;
  index: number;
  tokenCount: number;
  startOffset: number;
  endOffset: number;
  metadata: Record<string, string>;
}

export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  startOffset: number;
  endOffset: number;
  metadata: Record<string, string>;
}

export interface ChunkingSettings {
  strategy: ChunkStrategy;
  maxTokens: number;
  overlap: number;
  minTokens: number;
  semanticThreshold: number;
  separators: readonly string[];
}
