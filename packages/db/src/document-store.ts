import { and, asc, eq, inArray, like, type SQL } from "drizzle-orm";
import type {
  Document,
  DocumentListFilter,
  DocumentPatch,
  IDocumentStore,
  NewDocument,
} from "@kindex/types";
import type { Database } from "./client.js";
import { documents, type DocumentRow } from "./schema/index.js";

/** Escapes LIKE wildcards so a path prefix matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    scopeId: row.scopeId,
    path: row.path,
    fileName: row.fileName,
    contentType: row.contentType,
    contentHash: row.contentHash,
    sizeBytes: row.sizeBytes,
    status: row.status,
    errorMessage: row.errorMessage,
    chunkCount: row.chunkCount,
    metadata: { ...row.metadata },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    lastIndexedAt: row.lastIndexedAt,
  };
}

/**
 * Document metadata in Postgres. Deleting a row cascades to its chunks and
 * pgvector entries through foreign keys.
 */
export class PgDocumentStore implements IDocumentStore {
  constructor(private readonly db: Database) {}

  async getById(id: string): Promise<Document | null> {
    const rows = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    const row = rows[0];
    return row ? toDocument(row) : null;
  }

  async insert(document: NewDocument): Promise<Document> {
    const now = new Date();
    const rows = await this.db
      .insert(documents)
      .values({ ...document, createdAt: now, updatedAt: now })
      .returning();
    const row = rows[0];
    if (!row) {
      throw new Error(`Insert of document ${document.id} returned no row`);
    }
    return toDocument(row);
  }

  async update(id: string, patch: DocumentPatch): Promise<Document | null> {
    const rows = await this.db
      .update(documents)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(documents.id, id))
      .returning();
    const row = rows[0];
    return row ? toDocument(row) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const rows = await this.db
      .delete(documents)
      .where(eq(documents.id, id))
      .returning({ id: documents.id });
    return rows.length > 0;
  }

  async list(filter: DocumentListFilter = {}): Promise<Document[]> {
    const conditions: SQL[] = [];
    if (filter.scopeId) {
      conditions.push(eq(documents.scopeId, filter.scopeId));
    }
    if (filter.pathPrefix) {
      conditions.push(like(documents.path, `${escapeLike(filter.pathPrefix)}%`));
    }
    if (filter.documentIds) {
      if (filter.documentIds.length === 0) return [];
      conditions.push(inArray(documents.id, filter.documentIds));
    }

    const rows = await this.db
      .select()
      .from(documents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(documents.createdAt), asc(documents.id));

    return rows.map(toDocument);
  }
}
