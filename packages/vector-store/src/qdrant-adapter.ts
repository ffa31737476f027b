import { QdrantClient } from "@qdrant/js-client-rest";
import type { VectorEntry } from "@kindex/types";
import { ValidationError } from "@kindex/errors";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { PREFIX_OVERFETCH, toStringRecord } from "./payload.js";

const BATCH_SIZE = 100;

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collectionName: string;
  /** Width every upserted vector must have. */
  dimensions: number;
}

/**
 * Qdrant collection with cosine distance; scores come back as similarities.
 * Qdrant keyword payloads cannot match by prefix, so a path prefix over-fetches
 * and filters the hits here.
 */
export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  private readonly client: QdrantClient;
  private readonly collectionName: string;
  private readonly dimensions: number;

  constructor(options: QdrantVectorStoreOptions) {
    this.client = new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.collectionName = options.collectionName;
    this.dimensions = options.dimensions;
  }

  async upsert(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        throw new ValidationError(
          `Vector for chunk ${entry.chunkId} has ${entry.vector.length} dimensions, expected ${this.dimensions}`,
          { vector: "dimension_mismatch" },
        );
      }
    }

    for (let i = 0; i < entries.length; i += BATCH_SIZE) {
      const batch = entries.slice(i, i + BATCH_SIZE);

      await this.client.upsert(this.collectionName, {
        wait: true,
        points: batch.map((entry) => ({
          id: entry.chunkId,
          vector: entry.vector,
          payload: {
            ...entry.metadata,
            scopeId: entry.scopeId,
            documentId: entry.documentId,
            chunkId: entry.chunkId,
            modelId: entry.modelId,
          },
        })),
      });
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const limit = params.pathPrefix ? params.topK * PREFIX_OVERFETCH : params.topK;

    const results = await this.client.search(this.collectionName, {
      vector: params.vector,
      limit,
      filter: { must: [{ key: "scopeId", match: { value: params.scopeId } }] },
      with_payload: true,
    });

    const hits: VectorSearchResult[] = [];
    for (const point of results) {
      const payload = toStringRecord(point.payload);
      const path = payload["path"] ?? "";
      if (params.pathPrefix && !path.startsWith(params.pathPrefix)) continue;

      hits.push({
        chunkId: payload["chunkId"] ?? String(point.id),
        documentId: payload["documentId"] ?? "",
        content: payload["content"] ?? "",
        score: point.score,
        scoreKind: "similarity",
        metadata: payload,
      });
      if (hits.length >= params.topK) break;
    }
    return hits;
  }

  async deleteByDocument(documentId: string): Promise<void> {
    await this.client.delete(this.collectionName, {
      wait: true,
      filter: { must: [{ key: "documentId", match: { value: documentId } }] },
    });
  }

  async ensureCollection(dimensions: number): Promise<void> {
    if (dimensions !== this.dimensions) {
      throw new ValidationError(
        `Qdrant store is configured for ${this.dimensions} dimensions, not ${dimensions}`,
        { dimensions: "mismatch" },
      );
    }

    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collectionName);
    if (exists) return;

    await this.client.createCollection(this.collectionName, {
      vectors: { size: dimensions, distance: "Cosine" },
    });

    for (const field of ["scopeId", "documentId", "path"]) {
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: field,
        field_schema: "keyword",
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
