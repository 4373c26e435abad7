// ---------------------------------------------------------------------------
// Local mirror of the Calibre catalog plus its single-row sync state.
// ---------------------------------------------------------------------------

import type { CatalogEntry, SyncState } from "../../core/types.js";
import { type Db, serialize, deserialize, isStringArray } from "../database.js";

interface CalibreBookRow {
  id: number;
  title: string;
  authors_json: string;
  isbns_json: string;
  tags_json: string;
  formats_json: string;
  cover_path: string | null;
  path: string;
  publisher: string | null;
  series: string | null;
  rating: number | null;
  added_at: string | null;
  published_at: string | null;
  updated_at: string;
}

interface SyncStateRow {
  calibre_db_path: string | null;
  last_snapshot: string | null;
  entry_count: number;
}

export interface ReplaceAllResult {
  addedIds: number[];
  removedIds: number[];
}

function toEntry(row: CalibreBookRow): CatalogEntry {
  return {
    id: row.id,
    title: row.title,
    authors: deserialize(row.authors_json, [], isStringArray),
    isbns: deserialize(row.isbns_json, [], isStringArray),
    tags: deserialize(row.tags_json, [], isStringArray),
    formats: deserialize(row.formats_json, [], isStringArray),
    coverPath: row.cover_path,
    path: row.path,
    publisher: row.publisher,
    series: row.series,
    rating: row.rating,
    addedAt: row.added_at,
    publishedAt: row.published_at,
  };
}

export class CatalogMirrorRepository {
  constructor(private readonly db: Db) {}

  /**
   * Replace the whole mirror with `entries` and record the sync state, in one
   * transaction. Readers see either the previous or the new snapshot.
   */
  replaceAll(entries: CatalogEntry[], sourcePath: string, snapshotTime: string): ReplaceAllResult {
    const insert = this.db.prepare(
      `INSERT INTO calibre_books (
        id, title, authors_json, isbns_json, tags_json, formats_json, cover_path, path,
        publisher, series, rating, added_at, published_at, updated_at
      ) VALUES (@id, @title, @authors_json, @isbns_json, @tags_json, @formats_json, @cover_path,
        @path, @publisher, @series, @rating, @added_at, @published_at, @updated_at)`,
    );
    const upsertState = this.db.prepare(
      `INSERT INTO calibre_sync_state (id, calibre_db_path, last_snapshot, entry_count)
       VALUES (1, ?, ?, ?)
       ON CONFLICT (id) DO UPDATE SET
         calibre_db_path = excluded.calibre_db_path,
         last_snapshot = excluded.last_snapshot,
         entry_count = excluded.entry_count`,
    );

    const run = this.db.transaction((): ReplaceAllResult => {
      const previous = new Set(this.getIds());
      const next = new Set(entries.map((e) => e.id));

      this.db.prepare("DELETE FROM calibre_books").run();
      for (const entry of entries) {
        insert.run({
          id: entry.id,
          title: entry.title,
          authors_json: serialize(entry.authors),
          isbns_json: serialize(entry.isbns),
          tags_json: serialize(entry.tags),
          formats_json: serialize(entry.formats),
          cover_path: entry.coverPath,
          path: entry.path,
          publisher: entry.publisher,
          series: entry.series,
          rating: entry.rating,
          added_at: entry.addedAt,
          published_at: entry.publishedAt,
          updated_at: snapshotTime,
        });
      }
      upsertState.run(sourcePath, snapshotTime, entries.length);

      return {
        addedIds: [...next].filter((id) => !previous.has(id)).sort((a, b) => a - b),
        removedIds: [...previous].filter((id) => !next.has(id)).sort((a, b) => a - b),
      };
    });

    return run();
  }

  /** Mirrored books, newest first. `take <= 0` returns all of them. */
  getBooks(take = 0): CatalogEntry[] {
    const base = `SELECT * FROM calibre_books
      ORDER BY COALESCE(added_at, updated_at) DESC, id DESC`;
    const rows =
      take > 0
        ? this.db.prepare<[number], CalibreBookRow>(`${base} LIMIT ?`).all(take)
        : this.db.prepare<[], CalibreBookRow>(base).all();
    return rows.map(toEntry);
  }

  getById(id: number): CatalogEntry | null {
    const row = this.db
      .prepare<[number], CalibreBookRow>("SELECT * FROM calibre_books WHERE id = ?")
      .get(id);
    return row ? toEntry(row) : null;
  }

  getIds(): number[] {
    return this.db
      .prepare<[], { id: number }>("SELECT id FROM calibre_books")
      .all()
      .map((r) => r.id);
  }

  getState(): SyncState {
    const row = this.db
      .prepare<[], SyncStateRow>(
        "SELECT calibre_db_path, last_snapshot, entry_count FROM calibre_sync_state WHERE id = 1",
      )
      .get();
    return {
      sourcePath: row?.calibre_db_path ?? null,
      lastSnapshot: row?.last_snapshot ?? null,
      entryCount: row?.entry_count ?? 0,
    };
  }
}
