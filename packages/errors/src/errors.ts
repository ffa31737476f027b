import { AppError } from "./app-error.js";

type ErrorExtras = { details?: Record<string, unknown>; cause?: unknown };

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}

/**
 * Raised when cooperative cancellation interrupts an operation. Callers must let it
 * propagate instead of recording it as a failure.
 */
export class CancelledError extends AppError {
  constructor(message = "Operation cancelled", options?: ErrorExtras) {
    super({ message, statusCode: 499, code: "CANCELLED", ...options });
  }
}

export function isCancellation(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Throws a {@link CancelledError} when the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, what = "Operation"): void {
  if (signal?.aborted) {
    throw new CancelledError(`${what} cancelled`, { cause: signal.reason });
  }
}
