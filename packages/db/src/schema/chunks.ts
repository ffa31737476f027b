import { pgTable, text, timestamp, jsonb, integer, index } from "drizzle-orm/pg-core";
import { documents } from "./documents.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    // Denormalized from the document so searches filter without a join
    scopeId: text("scope_id").notNull(),
    path: text("path").notNull(),
    content: text("content").notNull(),
    index: integer("index").notNull(),
    tokenCount: integer("token_count").notNull(),
    startOffset: integer("start_offset").notNull(),
    endOffset: integer("end_offset").notNull(),
    metadata: jsonb("metadata").notNull().$type<Record<string, string>>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("chunks_document_idx").on(table.documentId),
    scopePathIdx: index("chunks_scope_path_idx").on(table.scopeId, table.path),
  }),
);

export type ChunkRow = typeof chunks.$inferSelect;
