// ---------------------------------------------------------------------------
// Error hierarchy for the Shelfwise service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Shelfwise domain errors.
 */
export class ShelfwiseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShelfwiseError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Hardcover errors ────────────────────────────────────────────────────────

/**
 * Base class for failures talking to the Hardcover GraphQL API.
 */
export class HardcoverError extends ShelfwiseError {
  public readonly operation: string;

  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HardcoverError";
    this.operation = operation;
  }
}

/** Hardcover answered 429. */
export class HardcoverRateLimitError extends HardcoverError {
  public readonly retryAfterMs: number | null;

  constructor(
    message: string,
    operation: string,
    retryAfterMs: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, operation, options);
    this.name = "HardcoverRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** Non-2xx response, GraphQL `errors`, or a connection failure. */
export class HardcoverUpstreamError extends HardcoverError {
  public readonly status: number | null;

  constructor(
    message: string,
    operation: string,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, operation, options);
    this.name = "HardcoverUpstreamError";
    this.status = status;
  }
}

/** The request exceeded its timeout. */
export class HardcoverTimeoutError extends HardcoverError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Hardcover ${operation} timed out after ${timeoutMs}ms`, operation, options);
    this.name = "HardcoverTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The response body was not the JSON document we expected. */
export class HardcoverParseError extends HardcoverError {
  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, operation, options);
    this.name = "HardcoverParseError";
  }
}

// ── Catalog errors ──────────────────────────────────────────────────────────

export type CatalogSourceFailure = "not_configured" | "not_found" | "unreadable";

/** The Calibre library could not be read. */
export class CatalogSourceError extends ShelfwiseError {
  public readonly reason: CatalogSourceFailure;

  constructor(message: string, reason: CatalogSourceFailure, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogSourceError";
    this.reason = reason;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required setting is missing; `setting` names what to set. */
export class NotConfiguredError extends ShelfwiseError {
  public readonly setting: string;

  constructor(message: string, setting: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotConfiguredError";
    this.setting = setting;
  }
}

/** A local database read or write failed. */
export class StorageError extends ShelfwiseError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Caller-supplied input was rejected. */
export class ValidationError extends ShelfwiseError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `AbortError` / `TimeoutError` raised by fetch or an aborted timer. */
export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "AbortError" || err.name === "TimeoutError")
  );
}
