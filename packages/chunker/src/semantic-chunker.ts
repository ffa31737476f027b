import type { ChunkResult, ChunkingSettings, ParsedDocument } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";
import { embedInBatches, type IEmbeddingProvider } from "@kindex/embeddings";
import { toChunkResult, type IChunker } from "./chunker.interface.js";
import { charsForTokens, estimateTokens } from "./token-estimator.js";

interface Span {
  start: number;
  end: number;
}

const SENTENCE_BREAK = /(?<=[.!?])\s+/g;

export interface SemanticChunkerOptions {
  /** Sentences per embedding request. */
  batchSize: number;
  maxParallel: number;
}

const DEFAULT_OPTIONS: SemanticChunkerOptions = { batchSize: 32, maxParallel: 1 };

/**
 * Semantic boundary detection chunker.
 * Embeds each sentence and opens a new chunk wherever the cosine similarity of two
 * neighbouring sentences falls below `semanticThreshold`. Groups above `maxTokens`
 * are split further; groups below `minTokens` merge into the following group.
 */
export class SemanticChunker implements IChunker {
  readonly strategy = "semantic";

  constructor(
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly options: () => SemanticChunkerOptions = () => DEFAULT_OPTIONS,
  ) {}

  async chunk(
    document: ParsedDocument,
    settings: ChunkingSettings,
    signal?: AbortSignal,
  ): Promise<ChunkResult[]> {
    const content = document.content;
    if (content.trim().length === 0) return [];

    const sentences = splitSentences(content);
    const first = sentences[0];
    if (first === undefined) return [];
    if (sentences.length === 1) {
      const text = content.slice(first.start, first.end);
      return [toChunkResult(document, this.strategy, text, 0, first.start, first.end)];
    }

    throwIfCancelled(signal, "Chunking");
    const { batchSize, maxParallel } = this.options();
    const { vectors: embeddings } = await embedInBatches(
      this.embeddingProvider,
      sentences.map((s) => content.slice(s.start, s.end)),
      { batchSize, maxParallel, signal },
    );

    const groups: Span[][] = [[first]];
    for (let i = 1; i < sentences.length; i++) {
      const sentence = sentences[i];
      const current = groups[groups.length - 1];
      if (sentence === undefined || current === undefined) continue;

      const similarity = cosineSimilarity(embeddings[i - 1] ?? [], embeddings[i] ?? []);
      if (similarity < settings.semanticThreshold) {
        groups.push([sentence]);
      } else {
        current.push(sentence);
      }
    }

    const merged = mergeSmallGroups(groups, settings.minTokens);
    const maxTokens = Math.max(1, settings.maxTokens);

    const results: ChunkResult[] = [];
    for (const group of merged) {
      throwIfCancelled(signal, "Chunking");
      for (const span of splitOversize(content, group, maxTokens)) {
        results.push(
          toChunkResult(
            document,
            this.strategy,
            content.slice(span.start, span.end),
            results.length,
            span.start,
            span.end,
          ),
        );
      }
    }

    return results;
  }
}

export function splitSentences(content: string): Span[] {
  const spans: Span[] = [];
  const push = (start: number, end: number): void => {
    let s = start;
    let e = end;
    while (s < e && /\s/.test(content.charAt(s))) s++;
    while (e > s && /\s/.test(content.charAt(e - 1))) e--;
    if (s < e) spans.push({ start: s, end: e });
  };

  let start = 0;
  for (const match of content.matchAll(SENTENCE_BREAK)) {
    const at = match.index ?? 0;
    push(start, at);
    start = at + match[0].length;
  }
  push(start, content.length);

  return spans;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    magA += x * x;
    magB += y * y;
  }

  if (magA === 0 || magB === 0) return 0;
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

function groupSpan(group: Span[]): Span {
  return { start: group[0]?.start ?? 0, end: group[group.length - 1]?.end ?? 0 };
}

function spanTokens(span: Span): number {
  return Math.ceil((span.end - span.start) / 4);
}

function mergeSmallGroups(groups: Span[][], minTokens: number): Span[][] {
  const merged: Span[][] = [];
  let pending: Span[] = [];

  for (const group of groups) {
    pending.push(...group);
    if (spanTokens(groupSpan(pending)) >= minTokens) {
      merged.push(pending);
      pending = [];
    }
  }
  if (pending.length > 0) merged.push(pending);

  return merged;
}

/**
 * Packs the group's sentences into spans of at most `maxTokens`; a sentence that is
 * too long on its own is hard-cut.
 */
function splitOversize(content: string, group: Span[], maxTokens: number): Span[] {
  const whole = groupSpan(group);
  if (spanTokens(whole) <= maxTokens) return [whole];

  const spans: Span[] = [];
  let current: Span | null = null;

  for (const sentence of group) {
    if (spanTokens(sentence) > maxTokens) {
      if (current) spans.push(current);
      current = null;
      const text = content.slice(sentence.start, sentence.end);
      const size = Math.max(1, charsForTokens(text, maxTokens));
      for (let at = sentence.start; at < sentence.end; at += size) {
        const end = Math.min(at + size, sentence.end);
        if (estimateTokens(content.slice(at, end)) > 0) spans.push({ start: at, end });
      }
      continue;
    }

    if (current && spanTokens({ start: current.start, end: sentence.end }) <= maxTokens) {
      current = { start: current.start, end: sentence.end };
    } else {
      if (current) spans.push(current);
      current = { ...sentence };
    }
  }
  if (current) spans.push(current);

  return spans;
}
