import { describe, it, expect } from "vitest";
import type { RuntimeSettings } from "@kindex/types";
import { SettingsStore } from "./settings-store.js";

function makeSettings(): RuntimeSettings {
  return {
    chunking: {
      strategy: "fixed",
      maxTokens: 512,
      overlap: 50,
      minTokens: 100,
      semanticThreshold: 0.5,
      separators: ["\n\n", "\n"],
    },
    embedding: {
      provider: "cohere",
      model: "embed-v4.0",
      dimensions: 1024,
      batchSize: 32,
      maxParallelRequests: 2,
    },
    search: {
      mode: "hybrid",
      topK: 10,
      minScore: 0.5,
      reranker: "rrf",
      rrfK: 60,
      candidateMultiplier: 3,
    },
  };
}

describe("SettingsStore", () => {
  it("returns frozen snapshots", () => {
    const store = new SettingsStore(makeSettings());
    const snapshot = store.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.chunking)).toBe(true);
    expect(Object.isFrozen(snapshot.chunking.separators)).toBe(true);
    expect(Object.isFrozen(snapshot.search)).toBe(true);
  });

  it("is not affected by later mutation of the initial object", () => {
    const initial = makeSettings();
    const store = new SettingsStore(initial);

    initial.chunking.maxTokens = 10;

    expect(store.snapshot().chunking.maxTokens).toBe(512);
  });

  it("applies updates to later snapshots only", () => {
    const store = new SettingsStore(makeSettings());
    const before = store.snapshot();

    store.update({ chunking: { maxTokens: 256 }, search: { topK: 5 } });
    const after = store.snapshot();

    expect(before.chunking.maxTokens).toBe(512);
    expect(before.search.topK).toBe(10);
    expect(after.chunking.maxTokens).toBe(256);
    expect(after.chunking.overlap).toBe(50);
    expect(after.search.topK).toBe(5);
    expect(after.embedding.model).toBe("embed-v4.0");
  });
});
