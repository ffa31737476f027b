import { describe, it, expect, vi, afterEach } from "vitest";
import type { EmbeddingResult, EmbeddingSettings } from "@kindex/types";
import { AppError, ExternalServiceError, ValidationError } from "@kindex/errors";
import { createEmbeddingProvider } from "./factory.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import { embedInBatches } from "./batching.js";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

function makeSettings(overrides: Partial<EmbeddingSettings> = {}): EmbeddingSettings {
  return {
    provider: "cohere",
    model: "embed-v4.0",
    dimensions: 1024,
    batchSize: 32,
    maxParallelRequests: 2,
    apiKey: "test-secret",
    ...overrides,
  };
}

/** Returns `[index, length]` vectors padded to `dimensions` so order is checkable. */
class RecordingProvider implements IEmbeddingProvider {
  readonly name = "recording";
  readonly modelId = "recording-model";
  readonly calls: string[][] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    readonly dimensions: number,
    private readonly vectorLength = dimensions,
  ) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;
    return {
      embeddings: texts.map((t) => {
        const v = new Array<number>(this.vectorLength).fill(0);
        v[0] = Number(t);
        return v;
      }),
      model: this.modelId,
      tokensUsed: texts.length,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

describe("createEmbeddingProvider", () => {
  it("creates a Cohere provider", () => {
    const provider = createEmbeddingProvider(makeSettings());

    expect(provider.name).toBe("cohere");
    expect(provider.modelId).toBe("embed-v4.0");
    expect(provider.dimensions).toBe(1024);
  });

  it("creates a BGE-M3 provider", () => {
    const provider = createEmbeddingProvider(
      makeSettings({
        provider: "bge-m3",
        model: "BAAI/bge-m3",
        dimensions: 768,
        baseUrl: "http://localhost:8080",
      }),
    );

    expect(provider.name).toBe("bge-m3");
    expect(provider.modelId).toBe("BAAI/bge-m3");
    expect(provider.dimensions).toBe(768);
  });

  it("requires an API key for Cohere", () => {
    expect(() => createEmbeddingProvider(makeSettings({ apiKey: undefined }))).toThrow(
      ValidationError,
    );
  });

  it("requires a base URL for BGE-M3", () => {
    expect(() => createEmbeddingProvider(makeSettings({ provider: "bge-m3" }))).toThrow(
      "BGE-M3 base URL is required",
    );
  });
});

describe("BgeM3EmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts and returns the parsed vectors", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ embeddings: [[0.1, 0.2]], tokens_used: 7 }), {
        status: 200,
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local/", dimensions: 2 });
    const result = await provider.batchEmbed(["hello"]);

    expect(result).toEqual({
      embeddings: [[0.1, 0.2]],
      model: "BAAI/bge-m3",
      tokensUsed: 7,
      dimensions: 2,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://bge.local/embed");
  });

  it("does not retry a 4xx response", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(new Response("bad", { status: 422, statusText: "Unprocessable" }));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local" });

    await expect(provider.batchEmbed(["x"])).rejects.toBeInstanceOf(AppError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects a malformed body without retrying forever", async () => {
    const fetchMock = vi
      .fn()
      .mockImplementation(() => Promise.resolve(new Response(JSON.stringify({ nope: true }))));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://bge.local", maxRetries: 0 });

    await expect(provider.batchEmbed(["x"])).rejects.toThrow("BGE-M3 returned a malformed response");
  });
});

describe("embedInBatches", () => {
  it("returns vectors in input order across batches", async () => {
    const provider = new RecordingProvider(3);
    const texts = ["1", "2", "3", "4", "5"];

    const result = await embedInBatches(provider, texts, { batchSize: 2, maxParallel: 2 });

    expect(provider.calls).toEqual([["1", "2"], ["3", "4"], ["5"]]);
    expect(result.vectors.map((v) => v[0])).toEqual([1, 2, 3, 4, 5]);
    expect(result.tokensUsed).toBe(5);
  });

  it("keeps at most maxParallel calls in flight", async () => {
    const provider = new RecordingProvider(2);
    const texts = Array.from({ length: 10 }, (_, i) => String(i));

    await embedInBatches(provider, texts, { batchSize: 1, maxParallel: 3 });

    expect(provider.maxInFlight).toBe(3);
  });

  it("returns nothing for no texts", async () => {
    const provider = new RecordingProvider(2);

    const result = await embedInBatches(provider, [], { batchSize: 4, maxParallel: 2 });

    expect(result).toEqual({ vectors: [], tokensUsed: 0 });
    expect(provider.calls).toEqual([]);
  });

  it("rejects vectors of the wrong dimension", async () => {
    const provider = new RecordingProvider(4, 3);

    await expect(
      embedInBatches(provider, ["1"], { batchSize: 4, maxParallel: 1 }),
    ).rejects.toBeInstanceOf(ExternalServiceError);
  });
});
