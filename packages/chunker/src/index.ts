export type { IChunker } from "./chunker.interface.js";
export { toChunkResult } from "./chunker.interface.js";
export { estimateTokens, charsForTokens } from "./token-estimator.js";
export { FixedChunker, findNaturalBreakpoint } from "./fixed-chunker.js";
export { RecursiveChunker, splitRecursive, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export { SemanticChunker, splitSentences, cosineSimilarity } from "./semantic-chunker.js";
export type { SemanticChunkerOptions } from "./semantic-chunker.js";
export { createChunkerRegistry } from "./factory.js";
export type { ChunkerRegistry, ChunkerRegistryDeps } from "./factory.js";
