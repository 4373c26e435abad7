// ---------------------------------------------------------------------------
// ISBN validation and normalisation.
// Catalog and upstream ISBNs are compared in canonical ISBN-13 form.
// ---------------------------------------------------------------------------

import type { ISBN10, ISBN13, RawISBN } from "../core/types.js";

// ── Check digits ────────────────────────────────────────────────────────────

function isbn10CheckDigit(first9: string): string {
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9[i]);
  }
  const remainder = (11 - (sum % 11)) % 11;
  return remainder === 10 ? "X" : String(remainder);
}

function isbn13CheckDigit(first12: string): string {
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += Number(first12[i]) * (i % 2 === 0 ? 1 : 3);
  }
  return String((10 - (sum % 10)) % 10);
}

// ── Validation ──────────────────────────────────────────────────────────────

/** Strip hyphens, spaces, and surrounding whitespace; uppercase a trailing x. */
export function stripFormatting(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "").toUpperCase();
}

export function validateISBN10(raw: RawISBN): ISBN10 | null {
  const s = stripFormatting(raw);
  if (!/^\d{9}[\dX]$/.test(s)) return null;
  if (isbn10CheckDigit(s.slice(0, 9)) !== s[9]) return null;
  return s as ISBN10;
}

export function validateISBN13(raw: RawISBN): ISBN13 | null {
  const s = stripFormatting(raw);
  if (!/^\d{13}$/.test(s)) return null;
  if (isbn13CheckDigit(s.slice(0, 12)) !== s[12]) return null;
  return s as ISBN13;
}

export function isbn10ToISBN13(isbn10: ISBN10): ISBN13 {
  const prefix12 = "978" + isbn10.slice(0, 9);
  return (prefix12 + isbn13CheckDigit(prefix12)) as ISBN13;
}

/** ISBN-10 form of a 978-prefixed ISBN-13; 979 numbers have none. */
export function isbn13ToISBN10(isbn13: ISBN13): ISBN10 | null {
  if (!isbn13.startsWith("978")) return null;
  const body9 = isbn13.slice(3, 12);
  return (body9 + isbn10CheckDigit(body9)) as ISBN10;
}

/** Canonical ISBN-13 for any valid ISBN input, else `null`. */
export function toISBN13(raw: RawISBN): ISBN13 | null {
  const isbn13 = validateISBN13(raw);
  if (isbn13) return isbn13;
  const isbn10 = validateISBN10(raw);
  return isbn10 ? isbn10ToISBN13(isbn10) : null;
}

// ── Normalisation ───────────────────────────────────────────────────────────

/**
 * Normalise an ISBN for set comparison.
 *
 * Valid ISBNs become ISBN-13. Strings with ISBN shape but a bad check digit
 * are kept stripped (Calibre and Hardcover both carry some of these).
 * Anything else yields `null`.
 */
export function normalizeIsbn(raw: RawISBN | null | undefined): string | null {
  if (!raw) return null;
  const canonical = toISBN13(raw);
  if (canonical) return canonical;
  const stripped = stripFormatting(raw);
  return /^(\d{9}[\dX]|\d{13})$/.test(stripped) ? stripped : null;
}

/**
 * Every spelling worth sending to an upstream exact-ISBN lookup: each
 * normalised value plus its ISBN-10 form where one exists.
 */
export function isbnLookupVariants(isbns: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const raw of isbns) {
    const canonical = toISBN13(raw);
    if (!canonical) {
      const normalized = normalizeIsbn(raw);
      if (normalized) out.add(normalized);
      continue;
    }
    out.add(canonical);
    const isbn10 = isbn13ToISBN10(canonical);
    if (isbn10) out.add(isbn10);
  }
  return [...out];
}

/** Normalise and de-duplicate, keeping first-seen order. */
export function normalizeIsbnSet(values: Iterable<RawISBN | null | undefined>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const normalized = normalizeIsbn(value);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}
