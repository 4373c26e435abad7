// ---------------------------------------------------------------------------
// Read-only reader for a Calibre library's `metadata.db`.
// ---------------------------------------------------------------------------

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { CatalogEntry } from "../core/types.js";
import { CatalogSourceError, errorMessage } from "../core/errors.js";
import { normalizeIsbnSet } from "../domain/isbn.js";

/** Reads every entry of an external catalog, all or nothing. */
export interface CatalogReader {
  read(sourcePath: string): CatalogEntry[];
}

interface BookRow {
  id: number;
  title: string;
  path: string;
  has_cover: number;
  isbn: string | null;
  timestamp: string | null;
  pubdate: string | null;
}

interface LinkRow {
  book: number;
  value: string;
}

interface RatingRow {
  book: number;
  rating: number;
}

/** Calibre's placeholder publication date for "unknown". */
const UNDEFINED_PUBDATE_PREFIX = "0101-01-01";

/** Accepts either the library directory or the metadata file itself. */
export function resolveMetadataPath(sourcePath: string): string {
  return path.extname(sourcePath).toLowerCase() === ".db"
    ? sourcePath
    : path.join(sourcePath, "metadata.db");
}

function groupValues(rows: LinkRow[]): Map<number, string[]> {
  const grouped = new Map<number, string[]>();
  for (const row of rows) {
    const value = row.value.trim();
    if (!value) continue;
    const list = grouped.get(row.book) ?? [];
    if (!list.includes(value)) list.push(value);
    grouped.set(row.book, list);
  }
  return grouped;
}

export class CalibreReader implements CatalogReader {
  read(sourcePath: string): CatalogEntry[] {
    const file = resolveMetadataPath(sourcePath);
    if (!fs.existsSync(file)) {
      throw new CatalogSourceError(`Metadata file not found at ${file}`, "not_found");
    }

    let db: Database.Database | null = null;
    try {
      db = new Database(file, { readonly: true, fileMustExist: true });
      return this.readAll(db);
    } catch (err) {
      throw new CatalogSourceError(
        `Calibre metadata at ${file} is unreadable: ${errorMessage(err)}`,
        "unreadable",
        { cause: err },
      );
    } finally {
      db?.close();
    }
  }

  private readAll(db: Database.Database): CatalogEntry[] {
    const links = (sql: string): Map<number, string[]> =>
      groupValues(db.prepare<[], LinkRow>(sql).all());

    const authors = links(
      `SELECT l.book AS book, a.name AS value
       FROM books_authors_link l JOIN authors a ON a.id = l.author
       ORDER BY l.id`,
    );
    const tags = links(
      `SELECT l.book AS book, t.name AS value
       FROM books_tags_link l JOIN tags t ON t.id = l.tag
       ORDER BY l.id`,
    );
    const identifiers = links(
      `SELECT book, val AS value FROM identifiers
       WHERE lower(type) IN ('isbn', 'isbn13', 'isbn10')`,
    );
    const formats = links(`SELECT book, format AS value FROM data ORDER BY format`);
    const publishers = links(
      `SELECT l.book AS book, p.name AS value
       FROM books_publishers_link l JOIN publishers p ON p.id = l.publisher`,
    );
    const series = links(
      `SELECT l.book AS book, s.name AS value
       FROM books_series_link l JOIN series s ON s.id = l.series`,
    );
    const ratings = new Map(
      db
        .prepare<[], RatingRow>(
          `SELECT l.book AS book, r.rating AS rating
           FROM books_ratings_link l JOIN ratings r ON r.id = l.rating`,
        )
        .all()
        .map((r) => [r.book, r.rating] as const),
    );

    const books = db
      .prepare<[], BookRow>(
        "SELECT id, title, path, has_cover, isbn, timestamp, pubdate FROM books ORDER BY id",
      )
      .all();

    return books.map((b) => ({
      id: b.id,
      title: b.title,
      authors: authors.get(b.id) ?? [],
      isbns: normalizeIsbnSet([b.isbn, ...(identifiers.get(b.id) ?? [])]),
      tags: tags.get(b.id) ?? [],
      coverPath: b.has_cover ? `${b.path}/cover.jpg` : null,
      path: b.path,
      publisher: publishers.get(b.id)?.[0] ?? null,
      series: series.get(b.id)?.[0] ?? null,
      rating: ratings.get(b.id) ?? null,
      formats: formats.get(b.id) ?? [],
      addedAt: b.timestamp,
      publishedAt:
        b.pubdate && !b.pubdate.startsWith(UNDEFINED_PUBDATE_PREFIX) ? b.pubdate : null,
    }));
  }
}
