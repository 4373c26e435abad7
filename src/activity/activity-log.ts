// ---------------------------------------------------------------------------
// Activity log sink used by the scheduler, mirror and discovery services.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { ActivityEntry, ActivityLevel, JsonValue } from "../core/types.js";
import type { ActivityLogRepository } from "../storage/repositories/activity-log-repository.js";

/** What the core writes to. Never throws. */
export interface ActivitySink {
  record(source: string, level: ActivityLevel, message: string, details?: JsonValue): void;
}

/**
 * Persists activity entries. Storage failures are logged at debug level and
 * otherwise dropped so that the caller's work continues.
 */
export class ActivityLog implements ActivitySink {
  constructor(
    private readonly repository: ActivityLogRepository,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(source: string, level: ActivityLevel, message: string, details?: JsonValue): void {
    const entry = {
      timestamp: this.now().toISOString(),
      source: source.trim() || "system",
      level,
      message,
      details: details ?? null,
    };

    try {
      this.repository.insert(entry);
    } catch (err) {
      this.logger.debug({ err, source: entry.source }, "activity log write failed");
    }
  }

  recent(take?: number): ActivityEntry[] {
    return this.repository.recent(take);
  }
}
