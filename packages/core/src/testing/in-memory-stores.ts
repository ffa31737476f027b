import { Readable } from "node:stream";
import type {
  Chunk,
  ContentInput,
  Document,
  DocumentListFilter,
  DocumentPatch,
  IContentSource,
  IDocumentStore,
  IKeywordIndex,
  KeywordSearchParams,
  KeywordSearchRow,
  NewDocument,
  VectorEntry,
} from "@kindex/types";
import { ConflictError, NotFoundError } from "@kindex/errors";
import type { IVectorStore, VectorSearchParams, VectorSearchResult } from "@kindex/vector-store";

interface Cascade {
  deleteByDocument(documentId: string): Promise<unknown>;
}

function matchesPath(path: string, prefix?: string): boolean {
  return prefix === undefined || path.startsWith(prefix);
}

export class InMemoryDocumentStore implements IDocumentStore {
  readonly rows = new Map<string, Document>();
  private readonly cascades: Cascade[];

  constructor(cascades: Cascade[] = []) {
    this.cascades = cascades;
  }

  async getById(id: string): Promise<Document | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async insert(document: NewDocument): Promise<Document> {
    if (this.rows.has(document.id)) {
      throw new ConflictError(`duplicate key value violates unique constraint: ${document.id}`);
    }
    const now = new Date();
    const row: Document = {
      ...document,
      metadata: { ...document.metadata },
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return structuredClone(row);
  }

  async update(id: string, patch: DocumentPatch): Promise<Document | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next: Document = { ...row, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return structuredClone(next);
  }

  async deleteById(id: string): Promise<boolean> {
    for (const cascade of this.cascades) {
      await cascade.deleteByDocument(id);
    }
    return this.rows.delete(id);
  }

  async list(filter: DocumentListFilter = {}): Promise<Document[]> {
    return [...this.rows.values()]
      .filter((row) => filter.scopeId === undefined || row.scopeId === filter.scopeId)
      .filter((row) => matchesPath(row.path, filter.pathPrefix))
      .filter((row) => filter.documentIds === undefined || filter.documentIds.includes(row.id))
      .map((row) => structuredClone(row));
  }
}

function terms(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter((t) => t.length > 0);
}

/**
 * Every query term must occur in the chunk; rank is the share of the chunk's
 * terms that are query terms.
 */
export class InMemoryKeywordIndex implements IKeywordIndex {
  readonly chunks = new Map<string, Chunk>();

  async upsertChunks(chunks: Chunk[]): Promise<void> {
    for (const chunk of chunks) this.chunks.set(chunk.id, { ...chunk });
  }

  async search(params: KeywordSearchParams): Promise<KeywordSearchRow[]> {
    const queryTerms = [...new Set(terms(params.query))];
    if (queryTerms.length === 0) return [];

    const rows: KeywordSearchRow[] = [];
    for (const chunk of this.chunks.values()) {
      if (chunk.scopeId !== params.scopeId || !matchesPath(chunk.path, params.pathPrefix)) continue;
      const chunkTerms = terms(chunk.content);
      if (!queryTerms.every((t) => chunkTerms.includes(t))) continue;
      const hits = chunkTerms.filter((t) => queryTerms.includes(t)).length;
      rows.push({
        chunkId: chunk.id,
        documentId: chunk.documentId,
        content: chunk.content,
        index: chunk.index,
        path: chunk.path,
        rank: hits / chunkTerms.length,
      });
    }
    return rows
      .sort((a, b) => b.rank - a.rank || (a.chunkId < b.chunkId ? -1 : 1))
      .slice(0, params.topK);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.documentId === documentId) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** Brute-force cosine search reporting distances, like pgvector. */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  readonly entries = new Map<string, VectorEntry>();

  async upsert(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) this.entries.set(entry.chunkId, entry);
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    return [...this.entries.values()]
      .filter((e) => e.scopeId === params.scopeId)
      .filter((e) => matchesPath(e.metadata["path"] ?? "", params.pathPrefix))
      .map((e): VectorSearchResult => ({
        chunkId: e.chunkId,
        documentId: e.documentId,
        content: e.metadata["content"] ?? "",
        score: 1 - cosine(e.vector, params.vector),
        scoreKind: "distance",
        metadata: e.metadata,
      }))
      .sort((a, b) => a.score - b.score || (a.chunkId < b.chunkId ? -1 : 1))
      .slice(0, params.topK);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    for (const [id, entry] of this.entries) {
      if (entry.documentId === documentId) this.entries.delete(id);
    }
  }

  async ensureCollection(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** Files held in memory and served as single-pass streams. */
export class InMemoryContentSource implements IContentSource {
  readonly files = new Map<string, Uint8Array>();

  write(path: string, content: string): void {
    this.files.set(path, new TextEncoder().encode(content));
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async open(path: string): Promise<ContentInput> {
    const bytes = this.files.get(path);
    if (!bytes) throw new NotFoundError(`File not found: ${path}`);
    return Readable.from([Buffer.from(bytes)]);
  }
}
