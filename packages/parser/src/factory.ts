import type { DoclingConfig } from "@kindex/types";
import { fileExtension, type IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { DoclingParser } from "./docling-parser.js";

export interface ParserRegistry {
  /** Resolve by file extension first, then by content type. */
  getParser(fileName: string, contentType?: string): IParser | undefined;
  readonly parsers: readonly IParser[];
}

export function createParserRegistry(parsers: readonly IParser[]): ParserRegistry {
  return {
    parsers,
    getParser(fileName, contentType) {
      const extension = fileExtension(fileName);
      if (extension) {
        const byExtension = parsers.find((p) => p.supportedExtensions.includes(extension));
        if (byExtension) return byExtension;
      }

      if (contentType) {
        const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
        return parsers.find((p) => p.supportedMimeTypes.includes(mime));
      }

      return undefined;
    },
  };
}

/** Text parser plus the Docling bridge configured from `docling`. */
export function createDefaultParserRegistry(docling?: DoclingConfig): ParserRegistry {
  return createParserRegistry([
    new TextParser(),
    new DoclingParser(
      docling ? { pythonPath: docling.pythonPath, scriptPath: docling.scriptPath } : {},
    ),
  ]);
}
