// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type pino from "pino";
import {
  CatalogSourceError,
  HardcoverError,
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  NotConfiguredError,
  ValidationError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/** Setting named in a 409 when the Calibre library path is missing. */
const CALIBRE_PATH_SETTING = "calibreLibraryPath";

/**
 * Hono `onError` handler.
 *
 * Validation and configuration messages are always returned as-is: they
 * describe the caller's input or what to set. Upstream and internal
 * messages are replaced by generic text in production.
 *
 * - `ValidationError`          -> 400
 * - `NotConfiguredError`       -> 409 (with `setting`)
 * - `CatalogSourceError`       -> 409 (with `reason`)
 * - `HardcoverRateLimitError`  -> 429 (with `Retry-After` when known)
 * - `HardcoverTimeoutError`    -> 504
 * - other `HardcoverError`     -> 502
 * - everything else            -> 500
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const isProduction = process.env["NODE_ENV"] === "production";

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof ValidationError) {
    return c.json({ error: err.message, type: "validation_error" }, 400);
  }

  if (err instanceof NotConfiguredError) {
    return c.json({ error: err.message, type: "not_configured", setting: err.setting }, 409);
  }

  if (err instanceof CatalogSourceError) {
    return c.json(
      {
        error: err.message,
        type: err.reason === "not_configured" ? "not_configured" : "catalog_unavailable",
        reason: err.reason,
        ...(err.reason === "not_configured" ? { setting: CALIBRE_PATH_SETTING } : {}),
      },
      409,
    );
  }

  if (err instanceof HardcoverRateLimitError) {
    const headers: Record<string, string> = {};
    if (err.retryAfterMs !== null) {
      headers["Retry-After"] = String(Math.ceil(err.retryAfterMs / 1000));
    }
    return c.json(
      {
        error: isProduction ? "Hardcover rate limit reached" : err.message,
        type: "rate_limit_error",
      },
      { status: 429, headers },
    );
  }

  if (err instanceof HardcoverTimeoutError) {
    return c.json(
      { error: isProduction ? "Hardcover timed out" : err.message, type: "upstream_timeout" },
      504,
    );
  }

  if (err instanceof HardcoverError) {
    return c.json(
      { error: isProduction ? "Hardcover request failed" : err.message, type: "upstream_error" },
      502,
    );
  }

  const logger: pino.Logger | undefined = c.get("logger");
  logger?.error({ err }, "unhandled error");

  return c.json(
    { error: isProduction ? "Internal server error" : err.message, type: "internal_error" },
    500,
  );
}
