import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/test",
    QDRANT_URL: "http://localhost:6333",
    COHERE_API_KEY: "test-secret",
    ...overrides,
  };
}

function without(env: Record<string, string>, ...keys: string[]): Record<string, string> {
  const copy = { ...env };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

describe("parseEnv", () => {
  it("fills documented defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.database).toEqual({
      url: "postgresql://localhost:5432/test",
      poolMax: 20,
      poolMin: 2,
    });
    expect(config.vectorStore.type).toBe("qdrant");
    expect(config.vectorStore.collectionName).toBe("kindex_chunks");
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.model).toBe("embed-v4.0");
    expect(config.embedding.dimensions).toBe(1024);
    expect(config.embedding.batchSize).toBe(32);
    expect(config.chunking).toEqual({
      strategy: "fixed",
      maxTokens: 512,
      overlap: 50,
      minTokens: 100,
      semanticThreshold: 0.5,
      separators: ["\n\n", "\n", ". ", " "],
    });
    expect(config.search.mode).toBe("hybrid");
    expect(config.search.topK).toBe(10);
    expect(config.search.minScore).toBe(0.5);
    expect(config.search.reranker).toBe("rrf");
    expect(config.search.rrfK).toBe(60);
    expect(config.ingestion).toEqual({
      queueCapacity: 1000,
      workerCount: 4,
      contentRoot: "./data",
      reindexOnStartup: false,
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = parseEnv(
      makeValidEnv({
        CHUNK_MAX_TOKENS: "256",
        CHUNK_OVERLAP: "32",
        SEARCH_MIN_SCORE: "0.25",
        INGEST_WORKERS: "8",
        REINDEX_ON_STARTUP: "1",
      }),
    );

    expect(config.chunking.maxTokens).toBe(256);
    expect(config.chunking.overlap).toBe(32);
    expect(config.search.minScore).toBe(0.25);
    expect(config.ingestion.workerCount).toBe(8);
    expect(config.ingestion.reindexOnStartup).toBe(true);
  });

  it("uses the BGE-M3 model name when that provider is selected", () => {
    const config = parseEnv(
      makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", BGE_M3_URL: "http://localhost:8080" }),
    );

    expect(config.embedding.model).toBe("BAAI/bge-m3");
    expect(config.embedding.baseUrl).toBe("http://localhost:8080");
  });

  it("rejects a DATABASE_URL that is not postgresql://", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow(
      "DATABASE_URL must start with postgresql://",
    );
  });

  it("rejects a missing DATABASE_URL", () => {
    expect(() => parseEnv(without(makeValidEnv(), "DATABASE_URL"))).toThrow();
  });

  it("requires a Cohere key for the Cohere provider", () => {
    expect(() => parseEnv(without(makeValidEnv(), "COHERE_API_KEY"))).toThrow(
      "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
    );
  });

  it("requires a BGE-M3 URL for the BGE-M3 provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(
      "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
    );
  });

  it("requires a Qdrant URL only for the Qdrant store", () => {
    expect(() => parseEnv(without(makeValidEnv(), "QDRANT_URL"))).toThrow(
      "QDRANT_URL is required when VECTOR_STORE is qdrant",
    );

    const config = parseEnv(without(makeValidEnv({ VECTOR_STORE: "pgvector" }), "QDRANT_URL"));
    expect(config.vectorStore.type).toBe("pgvector");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      parseEnv(makeValidEnv({ CHUNK_MAX_TOKENS: "100", CHUNK_OVERLAP: "100" })),
    ).toThrow("CHUNK_OVERLAP must be smaller than CHUNK_MAX_TOKENS");
  });

  it("rejects a min score outside [0, 1]", () => {
    expect(() => parseEnv(makeValidEnv({ SEARCH_MIN_SCORE: "1.5" }))).toThrow();
  });

  it("rejects an unknown chunking strategy", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNKING_STRATEGY: "sentence" }))).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
