/** Keeps the string, number and boolean values of a payload, stringified. */
export function toStringRecord(payload: Record<string, unknown> | null | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!payload) return result;

  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === "string") {
      result[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[key] = String(value);
    }
  }
  return result;
}

/** Over-fetch factor used when a path prefix has to be applied after the query. */
export const PREFIX_OVERFETCH = 4;
