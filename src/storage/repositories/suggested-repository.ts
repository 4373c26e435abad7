// ---------------------------------------------------------------------------
// Durable store of every recommendation ever discovered.
// First discovery wins: rows are inserted when their key is absent and are
// never refreshed afterwards.
// ---------------------------------------------------------------------------

import type {
  NewSuggestion,
  RecommendationReason,
  SuggestedEntry,
} from "../../core/types.js";
import { HiddenFlag } from "../../core/types.js";
import { ValidationError } from "../../core/errors.js";
import {
  type Db,
  serialize,
  deserialize,
  isStringArray,
  isJsonObject,
  isObjectArray,
  nowIso,
} from "../database.js";

interface SuggestedRow {
  id: number;
  hardcover_key: string;
  book_json: string;
  base_genres_json: string;
  reasons_json: string;
  hidden: number;
  created_at: string;
  updated_at: string;
}

function toHidden(value: number): HiddenFlag {
  if (value === HiddenFlag.HIDDEN) return HiddenFlag.HIDDEN;
  if (value === HiddenFlag.IGNORED) return HiddenFlag.IGNORED;
  return HiddenFlag.VISIBLE;
}

function toEntry(row: SuggestedRow): SuggestedEntry {
  return {
    id: row.id,
    sourceKey: row.hardcover_key,
    book: deserialize(row.book_json, {}, isJsonObject),
    baseGenres: deserialize(row.base_genres_json, [], isStringArray),
    reasons: deserialize(row.reasons_json, [], isObjectArray<RecommendationReason>),
    hidden: toHidden(row.hidden),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Placeholder list for an `IN (...)` clause. */
function placeholders(count: number): string {
  return new Array(count).fill("?").join(", ");
}

export class SuggestedRepository {
  constructor(private readonly db: Db) {}

  /**
   * Insert each suggestion whose trimmed key is not already stored
   * (case-insensitive). Returns how many rows were inserted.
   */
  upsertMissing(entries: NewSuggestion[]): number {
    const insert = this.db.prepare(
      `INSERT INTO suggested (hardcover_key, book_json, base_genres_json, reasons_json, hidden, created_at, updated_at)
       VALUES (@key, @book_json, @base_genres_json, @reasons_json, 0, @now, @now)
       ON CONFLICT DO NOTHING`,
    );

    const run = this.db.transaction((): number => {
      const now = nowIso();
      let inserted = 0;
      for (const entry of entries) {
        const key = entry.sourceKey.trim();
        if (!key) continue;
        const info = insert.run({
          key,
          book_json: serialize(entry.book),
          base_genres_json: serialize(entry.baseGenres),
          reasons_json: serialize(entry.reasons),
          now,
        });
        inserted += info.changes;
      }
      return inserted;
    });

    return run();
  }

  /** Visible suggestions, most recently updated first. */
  getAll(): SuggestedEntry[] {
    return this.getByHidden(HiddenFlag.VISIBLE);
  }

  getByHidden(hidden: HiddenFlag): SuggestedEntry[] {
    return this.db
      .prepare<[number], SuggestedRow>(
        "SELECT * FROM suggested WHERE hidden = ? ORDER BY updated_at DESC, id DESC",
      )
      .all(hidden)
      .map(toEntry);
  }

  /** Every row regardless of its hidden flag, oldest first. */
  getEverything(): SuggestedEntry[] {
    return this.db
      .prepare<[], SuggestedRow>("SELECT * FROM suggested ORDER BY id")
      .all()
      .map(toEntry);
  }

  getByKey(sourceKey: string): SuggestedEntry | null {
    const row = this.db
      .prepare<[string], SuggestedRow>(
        "SELECT * FROM suggested WHERE lower(trim(hardcover_key)) = lower(trim(?))",
      )
      .get(sourceKey);
    return row ? toEntry(row) : null;
  }

  /**
   * Mark `ids` hidden (1) or ignored (2). Returns the number of rows changed.
   */
  hide(ids: number[], hiddenValue: HiddenFlag): number {
    if (hiddenValue === HiddenFlag.VISIBLE) {
      throw new ValidationError("hiddenValue must be 1 (hidden) or 2 (ignored)");
    }
    return this.setHidden(ids, hiddenValue);
  }

  /** Make `ids` visible again. */
  unhide(ids: number[]): number {
    return this.setHidden(ids, HiddenFlag.VISIBLE);
  }

  private setHidden(ids: number[], hidden: HiddenFlag): number {
    if (ids.length === 0) return 0;
    return this.db
      .prepare(
        `UPDATE suggested SET hidden = ?, updated_at = ? WHERE id IN (${placeholders(ids.length)})`,
      )
      .run(hidden, nowIso(), ...ids).changes;
  }

  deleteByIds(ids: number[]): number {
    if (ids.length === 0) return 0;
    return this.db
      .prepare(`DELETE FROM suggested WHERE id IN (${placeholders(ids.length)})`)
      .run(...ids).changes;
  }

  count(): number {
    return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM suggested").get()?.n ?? 0;
  }
}
