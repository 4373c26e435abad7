import { describe, it, expect } from "vitest";
import * as path from "node:path";

import { loadConfig } from "../../../src/config/config.js";

describe("loadConfig", () => {
  it("starts without any environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      env: "development",
      port: 3000,
      logLevel: "info",
      dataDir: path.resolve("data"),
      rateLimit: { enabled: true, requestsPerMinute: 120 },
    });
    expect(config.hardcover.apiKey).toBeNull();
    expect(config.schedule.calibreSyncMinutes).toBe(30);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "8080",
      HARDCOVER_API_KEY: "  test-secret  ",
      HARDCOVER_RATE_LIMIT_COOLDOWN_MS: "45000",
      CALIBRE_SYNC_INTERVAL_MINUTES: "0",
      RATE_LIMIT_ENABLED: "false",
    });

    expect(config.env).toBe("production");
    expect(config.port).toBe(8080);
    expect(config.hardcover.apiKey).toBe("test-secret");
    expect(config.hardcover.rateLimitCooldownMs).toBe(45_000);
    expect(config.schedule.calibreSyncMinutes).toBe(0);
    expect(config.rateLimit.enabled).toBe(false);
  });

  it("falls back on unknown or malformed values", () => {
    const config = loadConfig({ NODE_ENV: "staging", PORT: "eighty", HARDCOVER_API_KEY: "   " });

    expect(config.env).toBe("development");
    expect(config.port).toBe(3000);
    expect(config.hardcover.apiKey).toBeNull();
  });

  it("never lets the rate-limit cooldown drop below twenty seconds", () => {
    expect(loadConfig({ HARDCOVER_RATE_LIMIT_COOLDOWN_MS: "1000" }).hardcover.rateLimitCooldownMs).toBe(20_000);
    expect(loadConfig({}).hardcover.rateLimitCooldownMs).toBe(20_000);
  });
});
