import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { ContentInput, IContentSource } from "@kindex/types";
import { NotFoundError, ValidationError, throwIfCancelled } from "@kindex/errors";

/**
 * Files under a root directory, addressed by forward-slash logical paths.
 * Content is handed out as a read stream.
 */
export class LocalContentSource implements IContentSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(logicalPath: string): string {
    const resolved = path.resolve(this.root, logicalPath.replace(/^\/+/, ""));
    const relative = path.relative(this.root, resolved);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ValidationError(`Path escapes the content root: ${logicalPath}`, {
        path: "outside_root",
      });
    }
    return resolved;
  }

  async exists(logicalPath: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(logicalPath));
      return info.isFile();
    } catch {
      return false;
    }
  }

  async open(logicalPath: string, signal?: AbortSignal): Promise<ContentInput> {
    throwIfCancelled(signal, "Opening content");
    const filePath = this.resolve(logicalPath);
    if (!(await this.exists(logicalPath))) {
      throw new NotFoundError(`File not found: ${logicalPath}`);
    }
    return createReadStream(filePath, signal ? { signal } : {});
  }
}
