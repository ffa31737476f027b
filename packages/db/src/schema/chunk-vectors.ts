import { pgTable, text, timestamp, vector, index } from "drizzle-orm/pg-core";
import { chunks } from "./chunks.js";
import { documents } from "./documents.js";

/** Column width of the pgvector `embedding` column. */
export const PG_VECTOR_DIMENSIONS = 1024;

export const chunkVectors = pgTable(
  "chunk_vectors",
  {
    chunkId: text("chunk_id")
      .primaryKey()
      .references(() => chunks.id, { onDelete: "cascade" }),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    scopeId: text("scope_id").notNull(),
    modelId: text("model_id").notNull(),
    embedding: vector("embedding", { dimensions: PG_VECTOR_DIMENSIONS }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    scopeIdx: index("chunk_vectors_scope_idx").on(table.scopeId),
  }),
);
