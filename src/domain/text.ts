// ---------------------------------------------------------------------------
// Title, author and genre normalisation shared by crawler and ranking.
// ---------------------------------------------------------------------------

/** Words too common in titles and list names to carry signal. */
const STOPWORDS: ReadonlySet<string> = new Set([
  "the", "and", "for", "with", "from", "into", "that", "this", "your",
  "book", "books", "novel", "series", "volume", "vol", "part", "edition",
  "list", "lists", "best", "read", "reads", "reading", "favorite",
  "favorites", "favourite", "favourites", "must", "want", "more",
]);

/** Minimum length of a significant word. */
export const SIGNIFICANT_WORD_MIN_LENGTH = 4;

/** Lowercase, trim, collapse internal whitespace. */
export function normalizeText(raw: string | null | undefined): string {
  return (raw ?? "").trim().toLowerCase().replace(/\s+/g, " ");
}

/** Normalised title used for exact-title comparison. */
export function normalizeTitle(raw: string | null | undefined): string {
  return normalizeText(raw);
}

/**
 * Distinct significant words of `text`: split on anything that is not a
 * letter or digit, at least four characters long, not a stopword.
 */
export function significantWords(text: string | null | undefined): string[] {
  const words = normalizeText(text)
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length >= SIGNIFICANT_WORD_MIN_LENGTH && !STOPWORDS.has(w));
  return [...new Set(words)];
}

/** Lowercased set of non-empty trimmed values. */
export function toKeySet(values: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const value of values) {
    const key = normalizeText(value);
    if (key) set.add(key);
  }
  return set;
}
