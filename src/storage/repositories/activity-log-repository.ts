// ---------------------------------------------------------------------------
// Bounded activity log table.
// ---------------------------------------------------------------------------

import type { ActivityEntry, ActivityLevel, JsonValue } from "../../core/types.js";
import { ActivityLevel as Levels } from "../../core/types.js";
import { type Db, serialize, deserialize } from "../database.js";

/** Rows kept after each insert. */
export const ACTIVITY_LOG_CAPACITY = 500;

interface ActivityRow {
  id: number;
  timestamp: string;
  source: string;
  level: string;
  message: string;
  details_json: string | null;
}

const LEVELS: ReadonlyArray<ActivityLevel> = Object.values(Levels);

function toLevel(raw: string): ActivityLevel {
  return LEVELS.find((l) => l === raw) ?? Levels.INFO;
}

// JSON.parse only ever produces JSON values.
function isJsonValue(value: unknown): value is JsonValue {
  return value !== undefined;
}

export class ActivityLogRepository {
  constructor(private readonly db: Db) {}

  insert(entry: Omit<ActivityEntry, "id">): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO activity_log (timestamp, source, level, message, details_json)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(
          entry.timestamp,
          entry.source,
          entry.level,
          entry.message,
          entry.details === null ? null : serialize(entry.details),
        );
      this.db
        .prepare(
          `DELETE FROM activity_log WHERE id NOT IN (
             SELECT id FROM activity_log ORDER BY id DESC LIMIT ?
           )`,
        )
        .run(ACTIVITY_LOG_CAPACITY);
    })();
  }

  /** Newest first; `take` is clamped to 1–500. */
  recent(take = 100): ActivityEntry[] {
    const limit = Math.min(Math.max(Math.trunc(take) || 1, 1), ACTIVITY_LOG_CAPACITY);
    return this.db
      .prepare<[number], ActivityRow>("SELECT * FROM activity_log ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        source: row.source,
        level: toLevel(row.level),
        message: row.message,
        details: deserialize(row.details_json, null, isJsonValue),
      }));
  }
}
