// ---------------------------------------------------------------------------
// Per-IP rate-limiting middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, MiddlewareHandler } from "hono";
import type { RateLimitConfig } from "../../core/types.js";
import type { AppEnv } from "../env.js";

interface ClientRecord {
  count: number;
  windowStart: number;
}

const WINDOW_MS = 60_000;

/** How often stale client records are swept. */
const CLEANUP_INTERVAL_MS = 300_000;

/**
 * Fixed-window counter per client address. Over the limit the request is
 * answered with 429 and a `Retry-After` of the seconds left in the window.
 */
export function rateLimitMiddleware(
  config: RateLimitConfig,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  const clients = new Map<string, ClientRecord>();

  const cleanupInterval = setInterval(() => {
    const current = now();
    for (const [ip, record] of clients) {
      if (current - record.windowStart > WINDOW_MS * 2) {
        clients.delete(ip);
      }
    }
  }, CLEANUP_INTERVAL_MS);

  // Allow the process to exit even if the timer is running.
  if (typeof cleanupInterval === "object" && "unref" in cleanupInterval) {
    cleanupInterval.unref();
  }

  return async (c, next) => {
    if (!config.enabled) {
      await next();
      return;
    }

    const ip = getClientIP(c);
    const current = now();

    let record = clients.get(ip);
    if (!record || current - record.windowStart >= WINDOW_MS) {
      record = { count: 0, windowStart: current };
      clients.set(ip, record);
    }

    record.count++;

    if (record.count > config.requestsPerMinute) {
      const retryAfterSeconds = Math.ceil((record.windowStart + WINDOW_MS - current) / 1000);
      c.header("Retry-After", String(retryAfterSeconds));
      return c.json(
        { error: "Too many requests", type: "rate_limit_exceeded", retryAfterSeconds },
        429,
      );
    }

    await next();
  };
}

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * Client address for bucketing. Forwarding headers are spoofable and are
 * only honoured when TRUST_PROXY=true; otherwise every client shares the
 * "unknown" bucket.
 */
function getClientIP(c: Context<AppEnv>): string {
  if (process.env["TRUST_PROXY"] === "true") {
    const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;

    const realIp = c.req.header("x-real-ip");
    if (realIp) return realIp;
  }
  return "unknown";
}
