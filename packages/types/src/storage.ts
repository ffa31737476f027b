import type { Chunk } from "./chunk.js";
import type { Document, DocumentListFilter, DocumentPatch, NewDocument } from "./document.js";
import type { ContentInput } from "./pipeline.js";

export interface IDocumentStore {
  getById(id: string): Promise<Document | null>;
  insert(document: NewDocument): Promise<Document>;
  update(id: string, patch: DocumentPatch): Promise<Document | null>;
  /** Removes the document together with its chunks and vector entries. */
  deleteById(id: string): Promise<boolean>;
  list(filter?: DocumentListFilter): Promise<Document[]>;
}

export interface KeywordSearchParams {
  scopeId: string;
  query: string;
  topK: number;
  pathPrefix?: string;
}

export interface KeywordSearchRow {
  chunkId: string;
  documentId: string;
  content: string;
  index: number;
  path: string;
  /** Raw lexical relevance, on whatever scale the index produces. */
  rank: number;
}

export interface IKeywordIndex {
  upsertChunks(chunks: Chunk[]): Promise<void>;
  search(params: KeywordSearchParams): Promise<KeywordSearchRow[]>;
  deleteByDocument(documentId: string): Promise<number>;
}

export interface IContentSource {
  exists(path: string): Promise<boolean>;
  open(path: string, signal?: AbortSignal): Promise<ContentInput>;
}
