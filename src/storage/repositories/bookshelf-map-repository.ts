// ---------------------------------------------------------------------------
// Calibre id → Hardcover book id mappings found by the bookshelf resolver.
// ---------------------------------------------------------------------------

import type { BookshelfMapping } from "../../core/types.js";
import { type Db, nowIso } from "../database.js";

interface MapRow {
  calibre_id: number;
  hardcover_id: string | null;
  last_checked_utc: string;
}

export class BookshelfMapRepository {
  constructor(private readonly db: Db) {}

  getAll(): Map<number, BookshelfMapping> {
    const rows = this.db.prepare<[], MapRow>("SELECT * FROM hardcover_bookshelf_map").all();
    return new Map(
      rows.map((r) => [
        r.calibre_id,
        { calibreId: r.calibre_id, hardcoverId: r.hardcover_id, lastCheckedAt: r.last_checked_utc },
      ]),
    );
  }

  upsert(calibreId: number, hardcoverId: string | null, checkedAt: string = nowIso()): void {
    this.db
      .prepare(
        `INSERT INTO hardcover_bookshelf_map (calibre_id, hardcover_id, last_checked_utc)
         VALUES (?, ?, ?)
         ON CONFLICT (calibre_id) DO UPDATE SET
           hardcover_id = excluded.hardcover_id,
           last_checked_utc = excluded.last_checked_utc`,
      )
      .run(calibreId, hardcoverId, checkedAt);
  }

  /** Drop mappings for books that left the mirror. */
  retainOnly(calibreIds: number[]): number {
    const keep = new Set(calibreIds);
    const remove = this.db.prepare("DELETE FROM hardcover_bookshelf_map WHERE calibre_id = ?");
    let removed = 0;
    this.db.transaction(() => {
      for (const id of this.getAll().keys()) {
        if (!keep.has(id)) removed += remove.run(id).changes;
      }
    })();
    return removed;
  }
}
