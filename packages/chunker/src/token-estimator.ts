const CHARS_PER_TOKEN = 4;

/** ≈ characters / 4. Blank text is zero tokens. */
export function estimateTokens(text: string): number {
  if (text.trim().length === 0) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** Characters needed for `tokens` tokens, capped at the length of `text`. */
export function charsForTokens(text: string, tokens: number): number {
  if (tokens <= 0 || text.trim().length === 0) return 0;
  return Math.min(tokens * CHARS_PER_TOKEN, text.length);
}
