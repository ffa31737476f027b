import { pgTable, text, timestamp, jsonb, integer, bigint, pgEnum, index } from "drizzle-orm/pg-core";

export const documentStatusEnum = pgEnum("document_status", [
  "pending",
  "processing",
  "ready",
  "failed",
]);

export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    scopeId: text("scope_id").notNull(),
    path: text("path").notNull(),
    fileName: text("file_name").notNull(),
    contentType: text("content_type").notNull().default("text/plain"),
    contentHash: text("content_hash"),
    sizeBytes: bigint("size_bytes", { mode: "number" }).notNull().default(0),
    status: documentStatusEnum("status").notNull().default("pending"),
    errorMessage: text("error_message"),
    chunkCount: integer("chunk_count").notNull().default(0),
    metadata: jsonb("metadata").notNull().$type<Record<string, string>>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    lastIndexedAt: timestamp("last_indexed_at", { withTimezone: true }),
  },
  (table) => ({
    scopePathIdx: index("documents_scope_path_idx").on(table.scopeId, table.path),
  }),
);

export type DocumentRow = typeof documents.$inferSelect;
