import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
  idleTimeoutSeconds?: number;
}

export type Database = PostgresJsDatabase<typeof schema>;

export type Sql = postgres.Sql;

export interface DbClient {
  db: Database;
  connection: Sql;
}

const DEFAULT_WORKER_POOL = { max: 10, idleTimeout: 30 };

export function createDbClient(options: DbClientOptions): DbClient {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: options.idleTimeoutSeconds ?? DEFAULT_WORKER_POOL.idleTimeout,
    connect_timeout: 10,
  });

  return { db: drizzle(connection, { schema }), connection };
}

/**
 * Runs `fn` on a connection reserved from the pool for the duration of the call.
 * Concurrent operations (the two branches of a hybrid search) each get their own
 * session instead of interleaving on one.
 */
export async function withSession<T>(
  connection: Sql,
  fn: (db: Database) => Promise<T>,
): Promise<T> {
  const reserved = await connection.reserve();
  try {
    return await fn(drizzle(reserved, { schema }));
  } finally {
    reserved.release();
  }
}

export async function closeDbClient(client: DbClient): Promise<void> {
  await client.connection.end({ timeout: 5 });
}
