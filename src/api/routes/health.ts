// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { HardcoverApi } from "../../hardcover/hardcover-api.js";
import type { CatalogMirrorRepository } from "../../storage/repositories/catalog-mirror-repository.js";
import type { AppEnv } from "../env.js";

export interface HealthRouteDeps {
  mirror: CatalogMirrorRepository;
  hardcover: Pick<HardcoverApi, "isConfigured">;
  now?: () => number;
}

/**
 * - `GET /health` -- liveness plus a summary of what is configured.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const now = deps.now ?? Date.now;
  const startedAt = now();

  app.get("/", (c) => {
    const state = deps.mirror.getState();
    return c.json({
      status: "ok",
      uptime: now() - startedAt,
      timestamp: new Date(now()).toISOString(),
      calibre: {
        configured: state.sourcePath !== null,
        books: state.entryCount,
        lastSnapshot: state.lastSnapshot,
      },
      hardcover: { configured: deps.hardcover.isConfigured },
    });
  });

  return app;
}
