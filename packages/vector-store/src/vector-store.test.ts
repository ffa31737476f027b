import { describe, it, expect } from "vitest";
import type { VectorStoreSettings } from "@kindex/types";
import { ValidationError } from "@kindex/errors";
import { createDbClient } from "@kindex/db";
import { createVectorStore, PgVectorStore, QdrantVectorStore } from "./index.js";
import { toStringRecord } from "./payload.js";

const qdrantSettings: VectorStoreSettings = {
  type: "qdrant",
  qdrantUrl: "http://localhost:6333",
  collectionName: "test_chunks",
};

describe("createVectorStore", () => {
  it("creates a Qdrant store", () => {
    const store = createVectorStore(qdrantSettings, { dimensions: 4 });
    expect(store.name).toBe("qdrant");
  });

  it("creates a pgvector store from a database client", () => {
    // postgres-js connects lazily; no query is issued here
    const db = createDbClient({ url: "postgresql://localhost:5432/test" });
    const store = createVectorStore({ ...qdrantSettings, type: "pgvector" }, { dimensions: 4, db });
    expect(store.name).toBe("pgvector");
  });

  it("requires a Qdrant URL", () => {
    expect(() =>
      createVectorStore({ type: "qdrant", collectionName: "c" }, { dimensions: 4 }),
    ).toThrow("qdrantUrl is required");
  });

  it("requires a database client for pgvector", () => {
    expect(() =>
      createVectorStore({ type: "pgvector", collectionName: "c" }, { dimensions: 4 }),
    ).toThrow(ValidationError);
  });
});

describe("QdrantVectorStore", () => {
  // The client connects lazily; a rejected upsert never reaches the server.
  const store = new QdrantVectorStore({
    url: "http://localhost:6333",
    collectionName: "test_chunks",
    dimensions: 3,
  });

  it("rejects vectors of the wrong dimension before writing", async () => {
    const pending = store.upsert([
      {
        chunkId: "c1",
        documentId: "d1",
        scopeId: "s1",
        vector: [0.1, 0.2, 0.3],
        modelId: "m",
        metadata: {},
      },
      {
        chunkId: "c2",
        documentId: "d1",
        scopeId: "s1",
        vector: [0.1, 0.2],
        modelId: "m",
        metadata: {},
      },
    ]);

    await expect(pending).rejects.toBeInstanceOf(ValidationError);
    await expect(pending).rejects.toThrow("Vector for chunk c2 has 2 dimensions, expected 3");
  });
});

describe("PgVectorStore", () => {
  const store = new PgVectorStore(createDbClient({ url: "postgresql://localhost:5432/test" }), 3);

  it("rejects vectors of the wrong dimension before writing", async () => {
    await expect(
      store.upsert([
        {
          chunkId: "c1",
          documentId: "d1",
          scopeId: "s1",
          vector: [0.1, 0.2],
          modelId: "m",
          metadata: {},
        },
      ]),
    ).rejects.toThrow("Vector for chunk c1 has 2 dimensions, expected 3");
  });

  it("accepts an empty upsert without a round trip", async () => {
    await expect(store.upsert([])).resolves.toBeUndefined();
  });

  it("rejects a collection of a different width", async () => {
    await expect(store.ensureCollection(1024)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("toStringRecord", () => {
  it("keeps scalars as strings and drops nested values", () => {
    expect(
      toStringRecord({ path: "a.md", index: 2, ok: true, nested: { x: 1 }, none: null }),
    ).toEqual({ path: "a.md", index: "2", ok: "true" });
  });

  it("handles a missing payload", () => {
    expect(toStringRecord(null)).toEqual({});
  });
});
