// ---------------------------------------------------------------------------
// Application bootstrap: configuration, storage, services, scheduler, HTTP.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";
import * as path from "node:path";

import type { AppConfig } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { UserSettingsStore } from "./config/user-settings.js";
import { createLogger } from "./logging/logger.js";
import { openDatabase, type Db } from "./storage/database.js";
import { ActivityLogRepository } from "./storage/repositories/activity-log-repository.js";
import { BookshelfMapRepository } from "./storage/repositories/bookshelf-map-repository.js";
import { CatalogMirrorRepository } from "./storage/repositories/catalog-mirror-repository.js";
import { ListCacheRepository } from "./storage/repositories/list-cache-repository.js";
import { SuggestedRepository } from "./storage/repositories/suggested-repository.js";
import { WantCacheRepository } from "./storage/repositories/want-cache-repository.js";
import { ActivityLog } from "./activity/activity-log.js";
import { CalibreReader, type CatalogReader } from "./catalog/calibre-reader.js";
import { CatalogMirrorService } from "./catalog/catalog-mirror-service.js";
import { HardcoverGraphqlClient, type FetchFn } from "./hardcover/graphql-client.js";
import { HardcoverGraphqlApi } from "./hardcover/hardcover-api.js";
import { ListCrawler } from "./hardcover/list-crawler.js";
import { WantListService } from "./hardcover/want-list-service.js";
import { BookshelfResolver } from "./hardcover/bookshelf-resolver.js";
import { DiscoveryService } from "./recommendations/discovery-service.js";
import { RankingService } from "./ranking/ranking-service.js";
import { SuggestedDedup } from "./ranking/suggested-dedup.js";
import { Scheduler } from "./scheduler/periodic-task.js";
import { createJobs } from "./scheduler/jobs.js";
import type { SleepFn } from "./orchestrator/retry.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

export const DATABASE_FILE = "shelfwise.db";
export const SETTINGS_FILE = "settings.yaml";

/** Overrides for tests and embedding. */
export interface BuildOptions {
  config?: AppConfig;
  logger?: pino.Logger;
  /** `":memory:"` or a file path; defaults to the data directory. */
  databaseFile?: string;
  settingsFile?: string;
  fetchFn?: FetchFn;
  catalogReader?: CatalogReader;
  sleep?: SleepFn;
}

export interface Application {
  app: Hono<AppEnv>;
  scheduler: Scheduler;
  db: Db;
  config: AppConfig;
  logger: pino.Logger;
  /** Stop the scheduler and close the database. */
  close(): void;
}

export function buildApp(options: BuildOptions = {}): Application {
  // 1. Configuration and logging
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ??
    createLogger({
      level: config.logLevel,
      prettyPrint: config.env === "development",
      redactSecrets: true,
    });

  // 2. Storage
  const db = openDatabase(options.databaseFile ?? path.join(config.dataDir, DATABASE_FILE));
  const mirror = new CatalogMirrorRepository(db);
  const listCache = new ListCacheRepository(db);
  const suggested = new SuggestedRepository(db);
  const wantCache = new WantCacheRepository(db);
  const bookshelfMap = new BookshelfMapRepository(db);
  const activity = new ActivityLog(new ActivityLogRepository(db), logger.child({ module: "activity" }));

  const settings = new UserSettingsStore(
    options.settingsFile ?? path.join(config.dataDir, SETTINGS_FILE),
    logger.child({ module: "settings" }),
  );
  const currentSettings = () => settings.get();

  // 3. Hardcover
  const client = new HardcoverGraphqlClient(
    config.hardcover,
    logger.child({ module: "hardcover" }),
    options.fetchFn,
  );
  const hardcover = new HardcoverGraphqlApi(client, config.hardcover, logger.child({ module: "hardcover" }));
  const crawler = new ListCrawler(hardcover, logger.child({ module: "crawler" }));

  // 4. Services
  const mirrorService = new CatalogMirrorService(
    options.catalogReader ?? new CalibreReader(),
    mirror,
    listCache,
    currentSettings,
    activity,
    logger.child({ module: "calibre" }),
  );
  const discovery = new DiscoveryService(
    mirror,
    listCache,
    suggested,
    hardcover,
    crawler,
    config.hardcover,
    activity,
    logger.child({ module: "discovery" }),
    options.sleep,
  );
  const wantList = new WantListService(
    hardcover,
    wantCache,
    activity,
    logger.child({ module: "want-list" }),
    undefined,
    options.sleep,
  );
  const bookshelf = new BookshelfResolver(
    mirror,
    bookshelfMap,
    hardcover,
    currentSettings,
    config.hardcover,
    activity,
    logger.child({ module: "bookshelf" }),
    options.sleep,
  );
  const ranking = new RankingService(mirror, listCache, suggested, logger.child({ module: "ranking" }));
  const dedup = new SuggestedDedup(suggested, ranking, logger.child({ module: "dedup" }));

  // 5. Scheduler (started by the entrypoint)
  const scheduler = new Scheduler(
    createJobs({
      mirrorService,
      hardcover,
      wantList,
      bookshelf,
      dedup,
      schedule: config.schedule,
      logger: logger.child({ module: "jobs" }),
    }),
    activity,
    logger.child({ module: "scheduler" }),
  );

  // 6. HTTP
  const app = createApp({
    mirror,
    mirrorService,
    listCache,
    suggested,
    wantCache,
    hardcover,
    discovery,
    wantList,
    ranking,
    activity,
    settings,
    scheduler,
    discoveryLimits: config.discovery,
    rateLimitConfig: config.rateLimit,
    logger,
  });

  logger.info(
    {
      env: config.env,
      dataDir: config.dataDir,
      hardcoverConfigured: hardcover.isConfigured,
      calibreConfigured: settings.get().calibreLibraryPath !== null,
    },
    "shelfwise ready",
  );

  return {
    app,
    scheduler,
    db,
    config,
    logger,
    close() {
      scheduler.stop();
      db.close();
    },
  };
}
