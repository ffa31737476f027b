import type { ChunkResult, ChunkingSettings, ParsedDocument } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";
import { toChunkResult, type IChunker } from "./chunker.interface.js";
import { charsForTokens, estimateTokens } from "./token-estimator.js";

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " "];

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones and finally to hard
 * character cuts. A flushed piece's trailing `overlap` tokens lead the next piece.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";

  async chunk(
    document: ParsedDocument,
    settings: ChunkingSettings,
    signal?: AbortSignal,
  ): Promise<ChunkResult[]> {
    const content = document.content;
    const results: ChunkResult[] = [];
    if (content.trim().length === 0) return results;

    const separators = settings.separators.length > 0 ? settings.separators : DEFAULT_SEPARATORS;
    const maxTokens = Math.max(1, settings.maxTokens);
    const overlap = settings.overlap >= maxTokens ? Math.floor(maxTokens / 4) : settings.overlap;

    const pieces = splitRecursive(content, separators, maxTokens, overlap).filter(
      (piece) => piece.trim().length > 0,
    );

    const overlapChars = overlap * 4;
    let cursor = 0;
    let index = 0;

    for (let i = 0; i < pieces.length; i++) {
      throwIfCancelled(signal, "Chunking");

      const piece = (pieces[i] ?? "").trim();
      const isLast = i === pieces.length - 1;
      if (estimateTokens(piece) < settings.minTokens && !isLast) continue;

      // Overlap bookkeeping can push the cursor past the end
      cursor = Math.min(cursor, content.length);
      const found = content.indexOf(piece, cursor);
      const start = found === -1 ? cursor : found;
      const end = Math.min(start + piece.length, content.length);

      results.push(toChunkResult(document, this.strategy, piece, index, start, end));
      index++;

      cursor = Math.max(start + 1, end - overlapChars);
    }

    return results;
  }
}

function lastChars(text: string, overlapTokens: number): string {
  const count = charsForTokens(text, overlapTokens);
  if (count === 0) return "";
  return count >= text.length ? text : text.slice(text.length - count);
}

function hardCut(text: string, maxTokens: number): string[] {
  const size = Math.max(1, charsForTokens(text, maxTokens));
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.slice(i, i + size));
  }
  return pieces;
}

export function splitRecursive(
  text: string,
  separators: readonly string[],
  maxTokens: number,
  overlapTokens: number,
): string[] {
  if (estimateTokens(text) <= maxTokens) return [text];

  const sepIndex = separators.findIndex((sep) => sep.length > 0 && text.includes(sep));
  const separator = separators[sepIndex];
  if (separator === undefined) return hardCut(text, maxTokens);

  const rest = separators.slice(sepIndex + 1);
  const result: string[] = [];
  let current = "";
  // true while `current` holds nothing but text carried over from the previous piece
  let carriedOnly = false;

  for (const split of text.split(separator)) {
    const candidate = current.length === 0 ? split : current + separator + split;
    const hasText = split.trim().length > 0;

    if (estimateTokens(candidate) <= maxTokens) {
      current = candidate;
      carriedOnly = carriedOnly && !hasText;
      continue;
    }

    if (current.length > 0) {
      if (!carriedOnly) result.push(current);
      const carried: string = carriedOnly ? "" : lastChars(current, overlapTokens);
      current = carried.length > 0 && hasText ? carried + separator : carried;
      carriedOnly = carried.length > 0;
    }

    current += split;
    carriedOnly = carriedOnly && !hasText;

    if (estimateTokens(current) > maxTokens && split.length > 0) {
      result.push(...splitRecursive(split, rest, maxTokens, overlapTokens));
      current = "";
      carriedOnly = false;
    }
  }

  if (current.length > 0 && !carriedOnly) result.push(current);

  return result;
}
