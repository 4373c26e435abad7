// ---------------------------------------------------------------------------
// SQLite connection helpers for the local database.
// ---------------------------------------------------------------------------

import Database from "better-sqlite3";
import { readFileSync, mkdirSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { JsonValue } from "../core/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export type Db = Database.Database;

/**
 * Open (or create) the local database and apply `schema.sql`.
 * Pass `":memory:"` for a throwaway database.
 */
export function openDatabase(file: string): Db {
  if (file !== ":memory:") {
    mkdirSync(dirname(file), { recursive: true });
  }
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  initSchema(db);
  return db;
}

export function initSchema(db: Db): void {
  const sql = readFileSync(join(__dirname, "schema.sql"), "utf-8");
  db.exec(sql);
}

// ── JSON columns ────────────────────────────────────────────────────────────

export const serialize = (value: unknown): string => JSON.stringify(value ?? null);

/** Parse a JSON column, falling back when it is empty or corrupt. */
export function deserialize<T>(value: string | null, fallback: T, guard: (v: unknown) => v is T): T {
  if (!value) return fallback;
  try {
    const parsed: unknown = JSON.parse(value);
    return guard(parsed) ? parsed : fallback;
  } catch {
    return fallback;
  }
}

export const nowIso = (): string => new Date().toISOString();

// ── Guards ──────────────────────────────────────────────────────────────────

export function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

export function isJsonObject(v: unknown): v is { [key: string]: JsonValue } {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isObjectArray<T extends object>(v: unknown): v is T[] {
  return Array.isArray(v) && v.every((x) => typeof x === "object" && x !== null);
}
