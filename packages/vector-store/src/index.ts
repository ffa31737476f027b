import type { VectorStoreSettings } from "@kindex/types";
import { ValidationError } from "@kindex/errors";
import type { DbClient } from "@kindex/db";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { PgVectorStore } from "./pgvector-adapter.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions } from "./qdrant-adapter.js";
export { PgVectorStore } from "./pgvector-adapter.js";
export { toStringRecord } from "./payload.js";

export interface VectorStoreDeps {
  dimensions: number;
  /** Required for pgvector. */
  db?: DbClient;
}

export function createVectorStore(settings: VectorStoreSettings, deps: VectorStoreDeps): IVectorStore {
  switch (settings.type) {
    case "qdrant":
      if (!settings.qdrantUrl) {
        throw new ValidationError("qdrantUrl is required for Qdrant vector store", {
          qdrantUrl: "required",
        });
      }
      return new QdrantVectorStore({
        url: settings.qdrantUrl,
        apiKey: settings.qdrantApiKey,
        collectionName: settings.collectionName,
        dimensions: deps.dimensions,
      });
    case "pgvector":
      if (!deps.db) {
        throw new ValidationError("A database client is required for pgvector store", {
          db: "required",
        });
      }
      return new PgVectorStore(deps.db, deps.dimensions);
    default:
      throw new ValidationError(`Unknown vector store type: ${String(settings.type)}`, {
        type: "unknown",
      });
  }
}
