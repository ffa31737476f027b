import type { ParsedDocument } from "@kindex/types";

/**
 * Turns raw document bytes into plain text.
 *
 * Recoverable problems (unreadable bytes, a missing external tool) come back as
 * warnings with empty content. Only cancellation rejects.
 */
export interface IParser {
  readonly name: string;
  /** Lower-case extensions including the dot, e.g. ".md". */
  readonly supportedExtensions: readonly string[];
  readonly supportedMimeTypes: readonly string[];
  parse(content: Uint8Array, fileName: string, signal?: AbortSignal): Promise<ParsedDocument>;
}

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  const slash = Math.max(fileName.lastIndexOf("/"), fileName.lastIndexOf("\\"));
  if (dot <= slash + 1) {
    return "";
  }
  return fileName.slice(dot).toLowerCase();
}
