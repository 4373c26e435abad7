// ---------------------------------------------------------------------------
// Cache of the Hardcover "want to read" shelf.
// ---------------------------------------------------------------------------

import type { WantCacheStats, WantedBook } from "../../core/types.js";
import { type Db, serialize, deserialize, isStringArray, isJsonObject } from "../database.js";

interface WantRow {
  hardcover_id: string;
  title: string | null;
  authors_json: string;
  isbn13: string | null;
  isbn10: string | null;
  cover_url: string | null;
  book_json: string;
  last_updated_utc: string;
}

export class WantCacheRepository {
  constructor(private readonly db: Db) {}

  /** Replace the whole cache in one transaction. */
  replaceAll(books: WantedBook[], updatedAt: string): void {
    const insert = this.db.prepare(
      `INSERT OR REPLACE INTO hardcover_want_cache
         (hardcover_id, title, authors_json, isbn13, isbn10, cover_url, book_json, last_updated_utc)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM hardcover_want_cache").run();
      for (const book of books) {
        insert.run(
          book.hardcoverId,
          book.title,
          serialize(book.authors),
          book.isbn13,
          book.isbn10,
          book.coverUrl,
          serialize(book.book),
          updatedAt,
        );
      }
    })();
  }

  getAll(): WantedBook[] {
    return this.db
      .prepare<[], WantRow>("SELECT * FROM hardcover_want_cache ORDER BY title COLLATE NOCASE")
      .all()
      .map((row) => ({
        hardcoverId: row.hardcover_id,
        title: row.title,
        authors: deserialize(row.authors_json, [], isStringArray),
        isbn13: row.isbn13,
        isbn10: row.isbn10,
        coverUrl: row.cover_url,
        book: deserialize(row.book_json, {}, isJsonObject),
      }));
  }

  getStats(): WantCacheStats {
    const row = this.db
      .prepare<[], { n: number; last: string | null }>(
        "SELECT COUNT(*) AS n, MAX(last_updated_utc) AS last FROM hardcover_want_cache",
      )
      .get();
    return { count: row?.n ?? 0, lastUpdatedAt: row?.last ?? null };
  }
}
