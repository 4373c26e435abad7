// ---------------------------------------------------------------------------
// Tolerant field extraction over Hardcover's loosely-shaped JSON payloads.
//
// Each rule is an ordered list of property paths; the first path that yields
// a usable value wins. Everything here is a pure function of a JsonValue.
// ---------------------------------------------------------------------------

import type { JsonObject, JsonValue } from "../core/types.js";
import { normalizeIsbnSet } from "../domain/isbn.js";

export type PropertyPath = readonly string[];

export interface ExtractionRule {
  readonly name: string;
  readonly paths: readonly PropertyPath[];
}

// ── Rules ───────────────────────────────────────────────────────────────────

export const Rules = {
  /** Stable recommendation key: id, else slug, else title. */
  bookKey: { name: "bookKey", paths: [["id"], ["slug"], ["title"]] },
  bookId: { name: "bookId", paths: [["id"]] },
  title: { name: "title", paths: [["title"]] },
  slug: { name: "slug", paths: [["slug"]] },
  rating: { name: "rating", paths: [["rating"]] },
  coverUrl: { name: "coverUrl", paths: [["image", "url"], ["cached_image", "url"]] },
  listOwner: { name: "listOwner", paths: [["user", "name"], ["user", "username"]] },
  contributorName: { name: "contributorName", paths: [["name"], ["author", "name"]] },
  genreName: {
    name: "genreName",
    paths: [["name"], ["label"], ["tag"], ["tagSlug"], ["genre", "name"], ["base_genre", "name"]],
  },
  isbn13: {
    name: "isbn13",
    paths: [
      ["default_physical_edition", "isbn_13"],
      ["default_ebook_edition", "isbn_13"],
      ["isbn_13"],
      ["isbn13"],
    ],
  },
  isbn10: {
    name: "isbn10",
    paths: [
      ["default_physical_edition", "isbn_10"],
      ["default_ebook_edition", "isbn_10"],
      ["isbn_10"],
      ["isbn10"],
    ],
  },
} as const satisfies Record<string, ExtractionRule>;

/** Keys of `cached_tags` that hold genre entries, in priority order. */
const GENRE_GROUP_KEYS: readonly string[] = ["Genre", "Genres", "genre", "genres"];

/** Where author names live, in priority order. */
const AUTHOR_SOURCES: readonly PropertyPath[] = [["cached_contributors"], ["contributions"]];

// ── Primitives ──────────────────────────────────────────────────────────────

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a string that itself holds JSON (Hardcover serialises some `jsonb`
 * columns twice). Non-JSON strings come back unchanged.
 */
export function unwrapJsonString(value: JsonValue | undefined): JsonValue | undefined {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return value;
  try {
    const parsed: JsonValue = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

/**
 * Follow `path` from `root`. When a step lands on an array and the next
 * segment is not an index, the walk continues into the first element.
 */
export function getPath(root: JsonValue | undefined, path: PropertyPath): JsonValue | undefined {
  let current = root;
  for (const segment of path) {
    current = unwrapJsonString(current);
    if (Array.isArray(current)) {
      const index = /^\d+$/.test(segment) ? Number(segment) : null;
      current = index !== null ? current[index] : current[0];
      if (index !== null) continue;
      current = unwrapJsonString(current);
    }
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function asText(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function asNumber(value: JsonValue | undefined): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** First non-empty text value the rule finds. */
export function extractText(root: JsonValue | undefined, rule: ExtractionRule): string | null {
  for (const path of rule.paths) {
    const text = asText(getPath(root, path));
    if (text !== null) return text;
  }
  return null;
}

/** First finite number the rule finds. */
export function extractNumber(root: JsonValue | undefined, rule: ExtractionRule): number | null {
  for (const path of rule.paths) {
    const n = asNumber(getPath(root, path));
    if (n !== null) return n;
  }
  return null;
}

/** Every text value the rule finds, across all of its paths. */
export function extractAllText(root: JsonValue | undefined, rule: ExtractionRule): string[] {
  const out: string[] = [];
  for (const path of rule.paths) {
    const text = asText(getPath(root, path));
    if (text !== null) out.push(text);
  }
  return out;
}

function distinctCaseInsensitive(values: Iterable<string>): string[] {
  const seen = new Map<string, string>();
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) seen.set(key, value);
  }
  return [...seen.values()];
}

// ── Book-level extractors ───────────────────────────────────────────────────

export function extractBookKey(book: JsonValue): string | null {
  return extractText(book, Rules.bookKey);
}

/** Author names from the first author source that has any. */
export function extractAuthors(book: JsonValue): string[] {
  for (const source of AUTHOR_SOURCES) {
    const items = unwrapJsonString(getPath(book, source));
    if (!Array.isArray(items)) continue;
    const names = items
      .map((item) => extractText(unwrapJsonString(item), Rules.contributorName))
      .filter((name): name is string => name !== null);
    if (names.length > 0) return distinctCaseInsensitive(names);
  }
  return [];
}

/** Normalised ISBN-13 set from every edition field the book carries. */
export function extractIsbns(book: JsonValue): string[] {
  return normalizeIsbnSet([
    ...extractAllText(book, Rules.isbn13),
    ...extractAllText(book, Rules.isbn10),
  ]);
}

/**
 * Genre names from a `cached_tags` payload.
 *
 * Accepts an object keyed by tag category (genre groups only), a bare array
 * of entries, or either of those serialised as a string. Entries may be
 * strings or objects matched by {@link Rules.genreName}.
 */
export function extractGenres(cachedTags: JsonValue | undefined): string[] {
  const root = unwrapJsonString(cachedTags);
  let groups: JsonValue[] = [];

  if (Array.isArray(root)) {
    groups = [root];
  } else if (isJsonObject(root)) {
    groups = GENRE_GROUP_KEYS.map((k) => unwrapJsonString(root[k])).filter(
      (g): g is JsonValue => g !== undefined,
    );
  }

  const names: string[] = [];
  for (const group of groups) {
    const items = Array.isArray(group) ? group : [group];
    for (const item of items) {
      const value = unwrapJsonString(item);
      const name = typeof value === "string" ? asText(value) : extractText(value, Rules.genreName);
      if (name !== null) names.push(name);
    }
  }
  return distinctCaseInsensitive(names);
}

/** Copy of `book` tagged with where it came from. */
export function withSource(book: JsonObject, source: string): JsonObject {
  return { ...book, source };
}
