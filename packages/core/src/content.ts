import { createHash } from "node:crypto";
import type { ContentInput } from "@kindex/types";
import { throwIfCancelled } from "@kindex/errors";

/**
 * Reads a stream or async iterable fully into memory. Byte arrays are returned as is.
 */
export async function bufferContent(
  input: ContentInput,
  signal?: AbortSignal,
): Promise<Uint8Array> {
  if (input instanceof Uint8Array) return input;

  const parts: Uint8Array[] = [];
  let total = 0;
  for await (const part of input) {
    throwIfCancelled(signal, "Reading content");
    const bytes = toBytes(part);
    parts.push(bytes);
    total += bytes.length;
  }

  const buffer = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    buffer.set(part, offset);
    offset += part.length;
  }
  return buffer;
}

// Readable streams in object or string mode may yield strings
function toBytes(part: unknown): Uint8Array {
  if (part instanceof Uint8Array) return part;
  if (typeof part === "string") return new TextEncoder().encode(part);
  throw new TypeError(`Unsupported content chunk of type ${typeof part}`);
}

/** Lower-case hex SHA-256. */
export function sha256Hex(content: Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
