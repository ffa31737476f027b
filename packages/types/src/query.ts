export type SearchMode = "semantic" | "keyword" | "hybrid";

export type SearchSource = "vector" | "keyword";

export interface SearchOptions {
  scopeId: string;
  pathPrefix?: string;
  topK: number;
  minScore: number;
  mode: SearchMode;
  reranker?: string;
}

export interface SearchHit {
  chunkId: string;
  documentId: string;
  content: string;
  score: number;
  metadata: Record<string, string>;
}

export interface SearchResult {
  hits: SearchHit[];
  totalCount: number;
  durationMs: number;
}

export interface IRelevanceScorer {
  readonly name: string;
  /** Relevance of `text` to `query` on a 0-10 scale. */
  score(query: string, text: string, signal?: AbortSignal): Promise<number>;
}
