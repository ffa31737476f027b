import type { ParsedDocument } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";
import { fileExtension, type IParser } from "./parser.interface.js";

const TEXT_EXTENSIONS = [
  ".txt",
  ".md",
  ".markdown",
  ".csv",
  ".log",
  ".json",
  ".xml",
  ".yaml",
  ".yml",
  ".html",
  ".htm",
];

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
  "application/yaml",
];

const FILE_TYPES: Record<string, string> = {
  ".md": "markdown",
  ".markdown": "markdown",
  ".csv": "csv",
  ".json": "json",
  ".xml": "xml",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".log": "log",
  ".html": "html",
  ".htm": "html",
};

export const EMPTY_CONTENT_WARNING = "Document contains no readable text content";

/**
 * Plain text, markdown, CSV and other text formats, decoded as UTF-8.
 * HTML has its script/style blocks and tags removed.
 */
export class TextParser implements IParser {
  readonly name = "text";
  readonly supportedExtensions = TEXT_EXTENSIONS;
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(content: Uint8Array, fileName: string, signal?: AbortSignal): Promise<ParsedDocument> {
    throwIfCancelled(signal, "Parsing");

    const extension = fileExtension(fileName);
    const fileType = FILE_TYPES[extension] ?? "text";
    const warnings: string[] = [];

    let text: string;
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(content);
    } catch (err) {
      warnings.push(
        `Could not decode ${fileName} as UTF-8: ${err instanceof Error ? err.message : String(err)}`,
      );
      return { content: "", metadata: { fileType }, warnings };
    }

    if (fileType === "html") {
      text = this.stripHtml(text);
    }

    if (text.trim().length === 0) {
      warnings.push(EMPTY_CONTENT_WARNING);
      text = "";
    }

    const lines = text.split("\n");
    const metadata: Record<string, string> = {
      fileType,
      lineCount: String(lines.length),
      charCount: String(text.length),
      wordCount: String(text.split(/\s+/).filter((w) => w.length > 0).length),
    };

    if (fileType === "markdown") {
      metadata["hasMarkdownHeaders"] = String(lines.some((line) => line.trimStart().startsWith("#")));
    }

    if (fileType === "csv") {
      metadata["csvDelimiter"] = detectCsvDelimiter(lines[0] ?? "");
    }

    return { content: text, metadata, warnings };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/\s+/g, " ")
      .trim();
  }
}

function countChar(line: string, char: string): number {
  return line.split(char).length - 1;
}

export function detectCsvDelimiter(firstLine: string): string {
  const commas = countChar(firstLine, ",");
  const tabs = countChar(firstLine, "\t");
  const semicolons = countChar(firstLine, ";");

  if (commas >= tabs && commas >= semicolons) {
    return ",";
  }
  if (tabs > commas && tabs >= semicolons) {
    return "\t";
  }
  return ";";
}
