import { PG_VECTOR_DIMENSIONS } from "./schema/index.js";

/**
 * Extension and index DDL that drizzle's table definitions do not express:
 * pgvector, the full-text GIN index and the HNSW cosine index.
 */
export function getSearchIndexMigrationSql(dimensions = PG_VECTOR_DIMENSIONS): string {
  return [
    "CREATE EXTENSION IF NOT EXISTS vector;",
    `ALTER TABLE chunk_vectors ALTER COLUMN embedding TYPE vector(${dimensions});`,
    "CREATE INDEX IF NOT EXISTS chunks_content_fts_idx ON chunks USING GIN (to_tsvector('english', content));",
    "CREATE INDEX IF NOT EXISTS chunk_vectors_embedding_hnsw_idx ON chunk_vectors USING hnsw (embedding vector_cosine_ops);",
  ].join("\n");
}
