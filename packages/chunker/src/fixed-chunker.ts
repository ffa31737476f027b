import type { ChunkResult, ChunkingSettings, ParsedDocument } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";
import { toChunkResult, type IChunker } from "./chunker.interface.js";
import { charsForTokens } from "./token-estimator.js";

const WHITESPACE = /\s/;

/**
 * Token-budgeted windows with overlap. Each window end is pulled back to the
 * nearest paragraph break, line break, sentence end or whitespace within a small
 * search window, so chunks rarely cut through words.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  async chunk(
    document: ParsedDocument,
    settings: ChunkingSettings,
    signal?: AbortSignal,
  ): Promise<ChunkResult[]> {
    const content = document.content;
    const results: ChunkResult[] = [];
    if (content.trim().length === 0) return results;

    const maxTokens = Math.max(1, settings.maxTokens);
    const overlap = settings.overlap >= maxTokens ? Math.floor(maxTokens / 4) : settings.overlap;

    let position = 0;
    let index = 0;

    while (position < content.length) {
      throwIfCancelled(signal, "Chunking");

      const targetChars = charsForTokens(content.slice(position), maxTokens);
      if (targetChars === 0) break; // only whitespace left

      const target = position + targetChars;
      const end = findNaturalBreakpoint(content, position, target);
      const window = content.slice(position, end);
      const isLast = end >= content.length;

      if (window.trim().length > 0) {
        const candidate = toChunkResult(document, this.strategy, window, index, position, end);
        if (candidate.tokenCount >= settings.minTokens || isLast) {
          results.push(candidate);
          index++;
        }
      }

      if (isLast) break;

      const next = end - charsForTokens(window, overlap);
      position = next > position ? next : end;
    }

    return results;
  }
}

/**
 * Snaps `target` backward to a natural boundary, scanning at most
 * `min(100, (target - start) / 4)` characters and never past `start`.
 * Returns `content.length` when `target` is at or beyond the end.
 */
export function findNaturalBreakpoint(content: string, start: number, target: number): number {
  if (target >= content.length) return content.length;

  const searchWindow = Math.min(100, Math.floor((target - start) / 4));
  const floor = Math.max(start, target - searchWindow);
  const last = Math.min(target, content.length - 1);

  for (let i = last; i > floor; i--) {
    if (content[i] === "\n" && content[i - 1] === "\n") return i;
  }

  for (let i = last; i > floor; i--) {
    if (content[i] === "\n") return i;
  }

  // Break after the period so the chunk never grows past `target`
  for (let i = last; i > floor; i--) {
    const ch = content[i];
    if (content[i - 1] === "." && ch !== undefined && WHITESPACE.test(ch)) return i;
  }

  for (let i = last; i > floor; i--) {
    const ch = content[i];
    if (ch !== undefined && WHITESPACE.test(ch)) return i;
  }

  return target;
}
