import { describe, it, expect, vi, afterEach } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";

import type { AppEnv } from "../../../src/api/env.js";
import { errorHandler } from "../../../src/api/middleware/error-handler.js";
import {
  CatalogSourceError,
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  HardcoverUpstreamError,
  NotConfiguredError,
  ValidationError,
} from "../../../src/core/errors.js";

/** An app whose only route throws `err`. */
function throwing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.get("/", () => {
    throw err;
  });
  app.onError(errorHandler);
  return app;
}

describe("errorHandler", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("maps a validation error to 400", async () => {
    const res = await throwing(new ValidationError("take must be a number")).request("/");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "take must be a number", type: "validation_error" });
  });

  it("names the setting a not-configured error is about", async () => {
    const res = await throwing(new NotConfiguredError("Hardcover API key not configured.", "HARDCOVER_API_KEY")).request(
      "/",
    );

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "Hardcover API key not configured.",
      type: "not_configured",
      setting: "HARDCOVER_API_KEY",
    });
  });

  it("distinguishes an unreadable library from a missing path", async () => {
    const res = await throwing(new CatalogSourceError("metadata.db is not a Calibre library", "unreadable")).request("/");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "metadata.db is not a Calibre library",
      type: "catalog_unavailable",
      reason: "unreadable",
    });
  });

  it("passes the upstream wait on as Retry-After", async () => {
    const res = await throwing(
      new HardcoverRateLimitError("Hardcover BookByTitle rate limited", "BookByTitle", 30_500),
    ).request("/");

    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBe("31");
    expect(await res.json()).toEqual({ error: "Hardcover BookByTitle rate limited", type: "rate_limit_error" });
  });

  it("omits Retry-After when the wait is unknown", async () => {
    const res = await throwing(new HardcoverRateLimitError("rate limited", "BookByTitle")).request("/");

    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBeNull();
  });

  it("maps a timeout to 504", async () => {
    const res = await throwing(new HardcoverTimeoutError("ListsWithBook", 1_000)).request("/");

    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      error: "Hardcover ListsWithBook timed out after 1000ms",
      type: "upstream_timeout",
    });
  });

  it("maps other upstream failures to 502", async () => {
    const res = await throwing(new HardcoverUpstreamError("Hardcover BookByIsbn returned 500: oops", "BookByIsbn", 500)).request(
      "/",
    );

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Hardcover BookByIsbn returned 500: oops", type: "upstream_error" });
  });

  it("hides upstream and internal details in production", async () => {
    vi.stubEnv("NODE_ENV", "production");

    const upstream = await throwing(new HardcoverUpstreamError("returned 500: oops", "BookByIsbn", 500)).request("/");
    const internal = await throwing(new Error("SQLITE_BUSY: database is locked")).request("/");
    const limited = await throwing(new HardcoverRateLimitError("rate limited", "BookByTitle")).request("/");

    expect(await upstream.json()).toEqual({ error: "Hardcover request failed", type: "upstream_error" });
    expect(await internal.json()).toEqual({ error: "Internal server error", type: "internal_error" });
    expect(await limited.json()).toEqual({ error: "Hardcover rate limit reached", type: "rate_limit_error" });
  });

  it("reports anything else as a 500", async () => {
    const res = await throwing(new Error("SQLITE_BUSY: database is locked")).request("/");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "SQLITE_BUSY: database is locked", type: "internal_error" });
  });

  it("returns an HTTPException's own response", async () => {
    const res = await throwing(new HTTPException(418, { message: "teapot" })).request("/");

    expect(res.status).toBe(418);
    expect(await res.text()).toBe("teapot");
  });
});
