/**
 * Redaction of secrets and personal data in log output.
 */

const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "qdrantapikey",
  "databaseurl",
  "connectionstring",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair before logging it.
 *
 * Values under a sensitive key are replaced outright; e-mail addresses inside other
 * string values (search queries, file names) are masked in place.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

const SENSITIVE_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "qdrantApiKey",
  "databaseUrl",
  "connectionString",
];

/**
 * Pino `redact` paths: every sensitive key at the top level and one level down
 * (e.g. `embedding.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_PATHS,
  ...SENSITIVE_PATHS.map((path) => `*.${path}`),
];
