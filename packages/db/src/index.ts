export * from "./schema/index.js";
export {
  createDbClient,
  withSession,
  closeDbClient,
  type Database,
  type DbClient,
  type DbClientOptions,
  type Sql,
} from "./client.js";
export { PgDocumentStore, toDocument, escapeLike } from "./document-store.js";
export { PgKeywordIndex } from "./keyword-index.js";
export { getSearchIndexMigrationSql } from "./migrations.js";
