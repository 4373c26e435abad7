// ---------------------------------------------------------------------------
// Per-catalog-entry cache of the last Hardcover list crawl.
// ---------------------------------------------------------------------------

import type {
  CatalogEntry,
  CrawlCacheEntry,
  CrawlCacheStatus,
  ListHit,
  RecommendationCandidate,
} from "../../core/types.js";
import { CrawlStatus } from "../../core/types.js";
import {
  type Db,
  serialize,
  deserialize,
  isStringArray,
  isObjectArray,
  nowIso,
} from "../database.js";

interface ListCacheRow {
  calibre_id: number;
  calibre_title: string;
  hardcover_id: string | null;
  hardcover_title: string | null;
  list_count: number;
  recommendation_count: number;
  last_checked_utc: string | null;
  status: string;
  base_genres_json: string;
  lists_json: string;
  recommendations_json: string;
}

function toStatus(raw: string): CrawlStatus {
  if (raw === CrawlStatus.OK) return CrawlStatus.OK;
  if (raw === CrawlStatus.NOT_MATCHED) return CrawlStatus.NOT_MATCHED;
  return CrawlStatus.PENDING;
}

function toEntry(row: ListCacheRow): CrawlCacheEntry {
  return {
    calibreId: row.calibre_id,
    calibreTitle: row.calibre_title,
    hardcoverId: row.hardcover_id,
    hardcoverTitle: row.hardcover_title,
    listCount: row.list_count,
    recommendationCount: row.recommendation_count,
    status: toStatus(row.status),
    lastCheckedAt: row.last_checked_utc,
    baseGenres: deserialize(row.base_genres_json, [], isStringArray),
    lists: deserialize(row.lists_json, [], isObjectArray<ListHit>),
    recommendations: deserialize(row.recommendations_json, [], isObjectArray<RecommendationCandidate>),
  };
}

export interface ReconcileResult {
  inserted: number;
  renamed: number;
}

export class ListCacheRepository {
  constructor(private readonly db: Db) {}

  get(calibreId: number): CrawlCacheEntry | null {
    const row = this.db
      .prepare<[number], ListCacheRow>("SELECT * FROM hardcover_list_cache WHERE calibre_id = ?")
      .get(calibreId);
    return row ? toEntry(row) : null;
  }

  getAll(): CrawlCacheEntry[] {
    return this.db
      .prepare<[], ListCacheRow>("SELECT * FROM hardcover_list_cache ORDER BY calibre_id")
      .all()
      .map(toEntry);
  }

  /** Insert or fully overwrite the row for `entry.calibreId`. */
  upsert(entry: Omit<CrawlCacheEntry, "lastCheckedAt">, checkedAt: string = nowIso()): void {
    this.db
      .prepare(
        `INSERT INTO hardcover_list_cache (
          calibre_id, calibre_title, hardcover_id, hardcover_title, list_count,
          recommendation_count, last_checked_utc, status, base_genres_json, lists_json,
          recommendations_json
        ) VALUES (@calibre_id, @calibre_title, @hardcover_id, @hardcover_title, @list_count,
          @recommendation_count, @last_checked_utc, @status, @base_genres_json, @lists_json,
          @recommendations_json)
        ON CONFLICT (calibre_id) DO UPDATE SET
          calibre_title = excluded.calibre_title,
          hardcover_id = excluded.hardcover_id,
          hardcover_title = excluded.hardcover_title,
          list_count = excluded.list_count,
          recommendation_count = excluded.recommendation_count,
          last_checked_utc = excluded.last_checked_utc,
          status = excluded.status,
          base_genres_json = excluded.base_genres_json,
          lists_json = excluded.lists_json,
          recommendations_json = excluded.recommendations_json`,
      )
      .run({
        calibre_id: entry.calibreId,
        calibre_title: entry.calibreTitle,
        hardcover_id: entry.hardcoverId,
        hardcover_title: entry.hardcoverTitle,
        list_count: entry.listCount,
        recommendation_count: entry.recommendationCount,
        last_checked_utc: checkedAt,
        status: entry.status,
        base_genres_json: serialize(entry.baseGenres),
        lists_json: serialize(entry.lists),
        recommendations_json: serialize(entry.recommendations),
      });
  }

  /**
   * Add `pending` rows for newly mirrored books and follow title changes.
   * Rows of books that left the library stay until {@link reset}.
   */
  reconcile(books: CatalogEntry[]): ReconcileResult {
    const run = this.db.transaction((): ReconcileResult => {
      const existing = new Map(
        this.db
          .prepare<[], { calibre_id: number; calibre_title: string }>(
            "SELECT calibre_id, calibre_title FROM hardcover_list_cache",
          )
          .all()
          .map((r) => [r.calibre_id, r.calibre_title] as const),
      );
      const wanted = new Map(books.map((b) => [b.id, b.title] as const));

      const insert = this.db.prepare(
        `INSERT INTO hardcover_list_cache (calibre_id, calibre_title, status)
         VALUES (?, ?, 'pending')`,
      );
      const rename = this.db.prepare(
        "UPDATE hardcover_list_cache SET calibre_title = ? WHERE calibre_id = ?",
      );

      const result: ReconcileResult = { inserted: 0, renamed: 0 };
      for (const [id, title] of wanted) {
        const current = existing.get(id);
        if (current === undefined) {
          insert.run(id, title);
          result.inserted++;
        } else if (current !== title) {
          rename.run(title, id);
          result.renamed++;
        }
      }
      return result;
    });

    return run();
  }

  status(): CrawlCacheStatus {
    const row = this.db
      .prepare<[], { total: number; with_lists: number | null; pending: number | null }>(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN list_count > 0 THEN 1 ELSE 0 END) AS with_lists,
           SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) AS pending
         FROM hardcover_list_cache`,
      )
      .get();
    return {
      total: row?.total ?? 0,
      withLists: row?.with_lists ?? 0,
      pending: row?.pending ?? 0,
    };
  }

  /** Every base genre recorded across the cache, in first-seen order. */
  getAllBaseGenres(): string[] {
    const genres = new Set<string>();
    for (const row of this.db
      .prepare<[], { base_genres_json: string }>("SELECT base_genres_json FROM hardcover_list_cache")
      .all()) {
      for (const genre of deserialize(row.base_genres_json, [], isStringArray)) {
        genres.add(genre);
      }
    }
    return [...genres];
  }

  /** Explicit cache reset. Returns the number of rows removed. */
  reset(): number {
    return this.db.prepare("DELETE FROM hardcover_list_cache").run().changes;
  }
}
