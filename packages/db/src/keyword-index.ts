import { and, desc, eq, like, sql, type SQL } from "drizzle-orm";
import type { Chunk, IKeywordIndex, KeywordSearchParams, KeywordSearchRow } from "@kindex/types";
import { withSession, type Database, type Sql } from "./client.js";
import { chunks } from "./schema/index.js";
import { escapeLike } from "./document-store.js";

const TS_CONFIG = sql.raw("'english'");

/**
 * Postgres full-text search over chunk content: `ts_rank` against
 * `plainto_tsquery('english', query)`. Searches run on a reserved session so they
 * can proceed alongside a concurrent vector search.
 */
export class PgKeywordIndex implements IKeywordIndex {
  constructor(
    private readonly db: Database,
    private readonly connection: Sql,
  ) {}

  async upsertChunks(rows: Chunk[]): Promise<void> {
    if (rows.length === 0) return;

    await this.db.transaction(async (tx) => {
      for (const chunk of rows) {
        await tx
          .insert(chunks)
          .values(chunk)
          .onConflictDoUpdate({
            target: chunks.id,
            set: {
              content: chunk.content,
              index: chunk.index,
              tokenCount: chunk.tokenCount,
              startOffset: chunk.startOffset,
              endOffset: chunk.endOffset,
              path: chunk.path,
              metadata: chunk.metadata,
            },
          });
      }
    });
  }

  async search(params: KeywordSearchParams): Promise<KeywordSearchRow[]> {
    const query = sql`plainto_tsquery(${TS_CONFIG}, ${params.query})`;
    const vector = sql`to_tsvector(${TS_CONFIG}, ${chunks.content})`;
    const rank = sql<number>`ts_rank(${vector}, ${query})`.mapWith(Number);

    const conditions: SQL[] = [eq(chunks.scopeId, params.scopeId), sql`${vector} @@ ${query}`];
    if (params.pathPrefix) {
      conditions.push(like(chunks.path, `${escapeLike(params.pathPrefix)}%`));
    }

    return withSession(this.connection, (session) =>
      session
        .select({
          chunkId: chunks.id,
          documentId: chunks.documentId,
          content: chunks.content,
          index: chunks.index,
          path: chunks.path,
          rank,
        })
        .from(chunks)
        .where(and(...conditions))
        .orderBy(desc(rank), chunks.id)
        .limit(params.topK),
    );
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const rows = await this.db
      .delete(chunks)
      .where(eq(chunks.documentId, documentId))
      .returning({ id: chunks.id });
    return rows.length;
  }
}
