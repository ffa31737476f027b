import { spawn } from "node:child_process";
import type { ParsedDocument } from "@kindex/types";
import { CancelledError, throwIfCancelled } from "@kindex/errors";
import { fileExtension, type IParser } from "./parser.interface.js";

const DOCLING_EXTENSIONS = [".pdf", ".docx", ".pptx", ".xlsx"];

const DOCLING_MIME_TYPES = [
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
];

interface DoclingOutput {
  text: string;
  page_count?: number;
}

function isDoclingOutput(value: unknown): value is DoclingOutput {
  return (
    typeof value === "object" &&
    value !== null &&
    "text" in value &&
    typeof value.text === "string"
  );
}

export interface DoclingParserOptions {
  pythonPath?: string;
  scriptPath?: string;
}

/**
 * Python bridge to Docling for PDF/DOCX/PPTX/XLSX.
 * Spawns a child process per document, writes the bytes to stdin and reads a JSON
 * `{ text, page_count }` object from stdout.
 */
export class DoclingParser implements IParser {
  readonly name = "docling";
  readonly supportedExtensions = DOCLING_EXTENSIONS;
  readonly supportedMimeTypes = DOCLING_MIME_TYPES;
  private readonly pythonPath: string;
  private readonly scriptPath: string;

  constructor(options: DoclingParserOptions = {}) {
    this.pythonPath = options.pythonPath ?? "python3";
    this.scriptPath = options.scriptPath ?? "scripts/docling_parse.py";
  }

  async parse(content: Uint8Array, fileName: string, signal?: AbortSignal): Promise<ParsedDocument> {
    throwIfCancelled(signal, "Parsing");

    const fileType = fileExtension(fileName).slice(1) || "binary";

    return new Promise<ParsedDocument>((resolve, reject) => {
      const child = spawn(this.pythonPath, [this.scriptPath, "--file-name", fileName]);

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const onAbort = (): void => {
        child.kill("SIGKILL");
        finish(() => reject(new CancelledError("Parsing cancelled")));
      };

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        settle();
      };

      const failed = (message: string): void => {
        finish(() =>
          resolve({ content: "", metadata: { fileType }, warnings: [message] }),
        );
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      // Decoded once on close so multi-byte characters split across reads stay intact.
      child.stdout.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr.push(data);
      });

      child.on("error", (err) => {
        failed(`Failed to start Docling for ${fileName}: ${err.message}`);
      });

      child.on("close", (code) => {
        if (code !== 0) {
          const detail = Buffer.concat(stderr).toString("utf8").trim();
          failed(`Docling exited with code ${String(code)} for ${fileName}: ${detail}`);
          return;
        }

        let output: unknown;
        try {
          output = JSON.parse(Buffer.concat(stdout).toString("utf8"));
        } catch {
          failed(`Docling returned malformed output for ${fileName}`);
          return;
        }

        if (!isDoclingOutput(output)) {
          failed(`Docling returned malformed output for ${fileName}`);
          return;
        }

        const warnings: string[] = [];
        if (output.text.trim().length === 0) {
          warnings.push("Document contains no readable text content");
        }

        const metadata: Record<string, string> = { fileType };
        if (output.page_count !== undefined) {
          metadata["pageCount"] = String(output.page_count);
        }

        finish(() => resolve({ content: output.text, metadata, warnings }));
      });

      // A child that dies before reading stdin surfaces EPIPE here; the close handler reports it.
      child.stdin.on("error", () => undefined);
      child.stdin.end(Buffer.from(content));
    });
  }
}
