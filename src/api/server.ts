// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { DiscoveryConfig, RateLimitConfig } from "../core/types.js";
import type { ActivityLog } from "../activity/activity-log.js";
import type { CatalogMirrorService } from "../catalog/catalog-mirror-service.js";
import type { UserSettingsStore } from "../config/user-settings.js";
import type { HardcoverApi } from "../hardcover/hardcover-api.js";
import type { WantListService } from "../hardcover/want-list-service.js";
import type { RankingService } from "../ranking/ranking-service.js";
import type { DiscoveryService } from "../recommendations/discovery-service.js";
import type { Scheduler } from "../scheduler/periodic-task.js";
import type { CatalogMirrorRepository } from "../storage/repositories/catalog-mirror-repository.js";
import type { ListCacheRepository } from "../storage/repositories/list-cache-repository.js";
import type { SuggestedRepository } from "../storage/repositories/suggested-repository.js";
import type { WantCacheRepository } from "../storage/repositories/want-cache-repository.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import { errorHandler } from "./middleware/error-handler.js";

import { healthRoutes } from "./routes/health.js";
import { calibreRoutes } from "./routes/calibre.js";
import { hardcoverRoutes } from "./routes/hardcover.js";
import { suggestedRoutes } from "./routes/suggested.js";
import { activityRoutes } from "./routes/activity.js";
import { settingsRoutes } from "./routes/settings.js";
import { jobRoutes } from "./routes/jobs.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  mirror: CatalogMirrorRepository;
  mirrorService: CatalogMirrorService;
  listCache: ListCacheRepository;
  suggested: SuggestedRepository;
  wantCache: WantCacheRepository;
  hardcover: HardcoverApi;
  discovery: DiscoveryService;
  wantList: WantListService;
  ranking: RankingService;
  activity: ActivityLog;
  settings: UserSettingsStore;
  scheduler: Scheduler;
  discoveryLimits: DiscoveryConfig;
  rateLimitConfig: RateLimitConfig;
  logger: pino.Logger;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Per-IP rate limiting.
 * 4. Route handlers.
 * 5. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));
  app.use("*", rateLimitMiddleware(deps.rateLimitConfig));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      name: "shelfwise",
      routes: ["/health", "/calibre", "/hardcover", "/suggested", "/activity", "/settings", "/jobs"],
    }),
  );

  app.route("/health", healthRoutes({ mirror: deps.mirror, hardcover: deps.hardcover }));
  app.route("/calibre", calibreRoutes({ mirrorService: deps.mirrorService, mirror: deps.mirror }));
  app.route(
    "/hardcover",
    hardcoverRoutes({
      discovery: deps.discovery,
      listCache: deps.listCache,
      wantList: deps.wantList,
      wantCache: deps.wantCache,
      limits: deps.discoveryLimits,
      logger: deps.logger,
    }),
  );
  app.route("/suggested", suggestedRoutes({ suggested: deps.suggested, ranking: deps.ranking }));
  app.route("/activity", activityRoutes({ activity: deps.activity }));
  app.route("/settings", settingsRoutes({ settings: deps.settings }));
  app.route("/jobs", jobRoutes({ scheduler: deps.scheduler }));

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(errorHandler);

  return app;
}
