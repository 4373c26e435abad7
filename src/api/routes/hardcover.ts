// ---------------------------------------------------------------------------
// Hardcover routes: list discovery (bulk and streamed), crawl cache, and the
// want-to-read cache.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type pino from "pino";
import type { DiscoveryConfig } from "../../core/types.js";
import { ValidationError, errorMessage } from "../../core/errors.js";
import {
  classifyStepError,
  resolveDiscoveryOptions,
  type DiscoveryService,
} from "../../recommendations/discovery-service.js";
import type { WantListService } from "../../hardcover/want-list-service.js";
import type { ListCacheRepository } from "../../storage/repositories/list-cache-repository.js";
import type { WantCacheRepository } from "../../storage/repositories/want-cache-repository.js";
import type { AppEnv } from "../env.js";
import { DiscoveryQuerySchema, toDiscoveryInput, validate } from "../schemas.js";

export interface HardcoverRouteDeps {
  discovery: Pick<DiscoveryService, "discover" | "stream" | "prepare">;
  listCache: ListCacheRepository;
  wantList: Pick<WantListService, "refresh">;
  wantCache: WantCacheRepository;
  limits: DiscoveryConfig;
  logger: pino.Logger;
}

/**
 * - `GET  /hardcover/lists`         -- run discovery, answer with the summary and every step.
 * - `GET  /hardcover/lists/stream`  -- the same as Server-Sent Events
 *                                      (`step`, `summary`, `error`).
 * - `GET  /hardcover/cache/status`  -- crawl cache counts.
 * - `POST /hardcover/cache/reset`   -- clear the crawl cache.
 * - `GET  /hardcover/want`          -- cached want-to-read shelf.
 * - `POST /hardcover/want/sync`     -- refresh the shelf now.
 */
export function hardcoverRoutes(deps: HardcoverRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Discovery ───────────────────────────────────────────────────────────

  app.get("/lists", async (c) => {
    const query = validate(DiscoveryQuerySchema, c.req.query());
    const options = resolveDiscoveryOptions(toDiscoveryInput(query), deps.limits.bulk);
    const response = await deps.discovery.discover(options);
    return c.json(response);
  });

  app.get("/lists/stream", (c) => {
    const query = validate(DiscoveryQuerySchema, c.req.query());
    const options = resolveDiscoveryOptions(toDiscoveryInput(query), deps.limits.stream);
    // Configuration problems answer as plain JSON before the stream opens.
    deps.discovery.prepare(options.take);

    const logger = c.get("logger") ?? deps.logger;

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => {
        logger.info("discovery stream closed by client");
        controller.abort();
      });

      try {
        for await (const event of deps.discovery.stream(options, controller.signal)) {
          if (stream.aborted) continue;
          await stream.writeSSE({
            event: event.type,
            data: JSON.stringify(event.type === "step" ? event.step : event.summary),
          });
        }
      } catch (err) {
        logger.warn({ err }, "discovery stream failed");
        if (!stream.aborted) {
          await stream.writeSSE({
            event: "error",
            data: JSON.stringify({
              error: errorMessage(err),
              type: err instanceof ValidationError ? "validation_error" : classifyStepError(err),
            }),
          });
        }
      }
    });
  });

  // ── Crawl cache ─────────────────────────────────────────────────────────

  app.get("/cache/status", (c) => {
    return c.json(deps.listCache.status());
  });

  app.post("/cache/reset", (c) => {
    const removed = deps.listCache.reset();
    c.get("logger")?.info({ removed }, "crawl cache reset");
    return c.json({ removed });
  });

  // ── Want to read ────────────────────────────────────────────────────────

  app.get("/want", (c) => {
    return c.json({ ...deps.wantCache.getStats(), books: deps.wantCache.getAll() });
  });

  app.post("/want/sync", async (c) => {
    const result = await deps.wantList.refresh();
    return c.json(result);
  });

  return app;
}
