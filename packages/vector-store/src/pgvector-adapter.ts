import { and, asc, cosineDistance, eq, like, type SQL } from "drizzle-orm";
import type { VectorEntry } from "@kindex/types";
import { ValidationError } from "@kindex/errors";
import { chunks, chunkVectors, escapeLike, withSession, type DbClient } from "@kindex/db";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

/**
 * pgvector store on the `chunk_vectors` table. Returns cosine distances.
 * Entries are removed with their chunk or document through foreign keys, or
 * explicitly by `deleteByDocument`.
 */
export class PgVectorStore implements IVectorStore {
  readonly name = "pgvector";

  constructor(
    private readonly client: DbClient,
    private readonly dimensions: number,
  ) {}

  async upsert(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        throw new ValidationError(
          `Vector for chunk ${entry.chunkId} has ${entry.vector.length} dimensions, expected ${this.dimensions}`,
          { vector: "dimension_mismatch" },
        );
      }
    }
    if (entries.length === 0) return;

    await this.client.db.transaction(async (tx) => {
      for (const entry of entries) {
        await tx
          .insert(chunkVectors)
          .values({
            chunkId: entry.chunkId,
            documentId: entry.documentId,
            scopeId: entry.scopeId,
            modelId: entry.modelId,
            embedding: entry.vector,
          })
          .onConflictDoUpdate({
            target: chunkVectors.chunkId,
            set: { embedding: entry.vector, modelId: entry.modelId },
          });
      }
    });
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const distance = cosineDistance(chunkVectors.embedding, params.vector).mapWith(Number);

    const conditions: SQL[] = [eq(chunkVectors.scopeId, params.scopeId)];
    if (params.pathPrefix) {
      conditions.push(like(chunks.path, `${escapeLike(params.pathPrefix)}%`));
    }

    const rows = await withSession(this.client.connection, (db) =>
      db
        .select({
          chunkId: chunkVectors.chunkId,
          documentId: chunkVectors.documentId,
          modelId: chunkVectors.modelId,
          content: chunks.content,
          path: chunks.path,
          index: chunks.index,
          metadata: chunks.metadata,
          distance,
        })
        .from(chunkVectors)
        .innerJoin(chunks, eq(chunks.id, chunkVectors.chunkId))
        .where(and(...conditions))
        .orderBy(asc(distance), asc(chunkVectors.chunkId))
        .limit(params.topK),
    );

    return rows.map((row): VectorSearchResult => ({
      chunkId: row.chunkId,
      documentId: row.documentId,
      content: row.content,
      score: row.distance,
      scoreKind: "distance",
      metadata: {
        ...row.metadata,
        path: row.path,
        index: String(row.index),
        modelId: row.modelId,
      },
    }));
  }

  async deleteByDocument(documentId: string): Promise<void> {
    await this.client.db.delete(chunkVectors).where(eq(chunkVectors.documentId, documentId));
  }

  async ensureCollection(dimensions: number): Promise<void> {
    if (dimensions !== this.dimensions) {
      throw new ValidationError(
        `pgvector store is configured for ${this.dimensions} dimensions, not ${dimensions}`,
        { dimensions: "mismatch" },
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.connection`SELECT 1`;
      return true;
    } catch {
      return false;
    }
  }
}
