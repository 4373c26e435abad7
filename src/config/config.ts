// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import type { AppConfig } from "../core/types.js";

/** Hardcover throttles for at least this long after a 429. */
export const MIN_RATE_LIMIT_COOLDOWN_MS = 20_000;

const ENVIRONMENTS: ReadonlyArray<AppConfig["env"]> = ["development", "test", "production"];

function readEnvName(raw: string | undefined): AppConfig["env"] {
  return ENVIRONMENTS.find((e) => e === raw) ?? "development";
}

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the service can start with zero
 * configuration for local development. The Hardcover API key has no default:
 * discovery and the Hardcover schedules report "not configured" until it is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env["HARDCOVER_API_KEY"]?.trim();

  return {
    env: readEnvName(env["NODE_ENV"]),
    port: readNumber(env["PORT"], 3000),
    logLevel: env["LOG_LEVEL"] ?? "info",
    dataDir: path.resolve(env["SHELFWISE_DATA_DIR"] ?? "data"),

    hardcover: {
      endpoint: env["HARDCOVER_ENDPOINT"] ?? "https://api.hardcover.app/v1/graphql",
      apiKey: apiKey ? apiKey : null,
      lookupTimeoutMs: readNumber(env["HARDCOVER_LOOKUP_TIMEOUT_MS"], 8_000),
      listTimeoutMs: readNumber(env["HARDCOVER_LIST_TIMEOUT_MS"], 30_000),
      rateLimitCooldownMs: Math.max(
        MIN_RATE_LIMIT_COOLDOWN_MS,
        readNumber(env["HARDCOVER_RATE_LIMIT_COOLDOWN_MS"], MIN_RATE_LIMIT_COOLDOWN_MS),
      ),
      pushThrottleMs: readNumber(env["HARDCOVER_PUSH_THROTTLE_MS"], 15_000),
    },

    discovery: {
      bulk: {
        listsPerBook: { default: 12, min: 1, max: 50 },
        itemsPerList: { default: 20, min: 1, max: 60 },
        delayMs: { default: 450, min: 0, max: 2_000 },
      },
      stream: {
        listsPerBook: { default: 25, min: 1, max: 100 },
        itemsPerList: { default: 30, min: 1, max: 100 },
        delayMs: { default: 2_000, min: 2_000, max: 120_000 },
      },
    },

    schedule: {
      calibreSyncMinutes: readNumber(env["CALIBRE_SYNC_INTERVAL_MINUTES"], 30),
      wantSyncMinutes: readNumber(env["HARDCOVER_WANT_SYNC_MINUTES"], 30),
      bookshelfSyncMinutes: readNumber(env["HARDCOVER_BOOKSHELF_SYNC_MINUTES"], 30),
      suggestedDedupMinutes: readNumber(env["SUGGESTED_DEDUP_MINUTES"], 30),
    },

    rateLimit: {
      enabled: env["RATE_LIMIT_ENABLED"] !== "false",
      requestsPerMinute: readNumber(env["RATE_LIMIT_RPM"], 120),
    },
  };
}
