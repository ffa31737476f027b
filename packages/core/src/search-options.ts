import { z } from "zod";
import type { SearchOptions, SearchSettings } from "@kindex/types";
import { ValidationError } from "@kindex/errors";

export const MAX_TOP_K = 200;

function searchOptionsSchema(defaults: SearchSettings) {
  return z
    .object({
      scopeId: z.string().trim().min(1, "scopeId is required"),
      pathPrefix: z.string().trim().min(1).optional(),
      topK: z.number().int().min(1).max(MAX_TOP_K).default(defaults.topK),
      minScore: z.number().min(0).max(1).default(defaults.minScore),
      mode: z.enum(["semantic", "keyword", "hybrid"]).default(defaults.mode),
      reranker: z.string().trim().min(1).optional(),
    })
    .strict();
}

/**
 * Validates caller-supplied search options, filling gaps from the current search
 * settings. Unknown fields are rejected.
 */
export function validateSearchOptions(input: unknown, defaults: SearchSettings): SearchOptions {
  const parsed = searchOptionsSchema(defaults).safeParse(input);
  if (!parsed.success) {
    const fields: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      const key = issue.path.length > 0 ? issue.path.join(".") : "options";
      fields[key] ??= issue.message;
    }
    const summary = Object.entries(fields)
      .map(([key, message]) => `${key}: ${message}`)
      .join("; ");
    throw new ValidationError(`Invalid search options: ${summary}`, fields);
  }
  return parsed.data;
}

/**
 * Keeps letters, digits, whitespace, `-` and `_`, collapsing runs of whitespace.
 * The result is safe to hand to a plain-text full-text query.
 */
export function sanitizeKeywordQuery(query: string): string {
  return query
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .split(/\s+/)
    .filter((term) => term.length > 0)
    .join(" ");
}
