// ---------------------------------------------------------------------------
// Ranking: score suggestions against what the owned library already holds.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { CatalogEntry, RankedSuggestion, SuggestedEntry } from "../core/types.js";
import {
  Rules,
  extractAuthors,
  extractGenres,
  extractIsbns,
  extractText,
  getPath,
} from "../hardcover/extraction.js";
import { significantWords, toKeySet } from "../domain/text.js";
import type { CatalogMirrorRepository } from "../storage/repositories/catalog-mirror-repository.js";
import type { ListCacheRepository } from "../storage/repositories/list-cache-repository.js";
import type { SuggestedRepository } from "../storage/repositories/suggested-repository.js";

export const ScoreWeights = {
  author: 4,
  genre: 3,
  tag: 2,
  titleBonus: 1,
} as const;

export const TITLE_BONUS_CAP = 3;

// ── Library profile ─────────────────────────────────────────────────────────

/** The owned-library signals a suggestion is compared against. */
export interface LibraryProfile {
  authors: ReadonlySet<string>;
  genres: ReadonlySet<string>;
  tagWords: ReadonlySet<string>;
  titleWords: ReadonlySet<string>;
  /** Normalised ISBN → owning catalog id. */
  isbnOwners: ReadonlyMap<string, number>;
}

export function buildLibraryProfile(
  books: readonly CatalogEntry[],
  cachedGenres: readonly string[],
): LibraryProfile {
  const tagWords = new Set<string>();
  const titleWords = new Set<string>();
  const isbnOwners = new Map<string, number>();

  for (const book of books) {
    for (const tag of book.tags) {
      for (const word of significantWords(tag)) tagWords.add(word);
    }
    for (const word of significantWords(book.title)) titleWords.add(word);
    for (const isbn of book.isbns) {
      const owner = isbnOwners.get(isbn);
      if (owner === undefined || book.id < owner) isbnOwners.set(isbn, book.id);
    }
  }

  return {
    authors: toKeySet(books.flatMap((b) => b.authors)),
    genres: toKeySet([...books.flatMap((b) => b.tags), ...cachedGenres]),
    tagWords,
    titleWords,
    isbnOwners,
  };
}

// ── Scoring ─────────────────────────────────────────────────────────────────

function countIn(values: Iterable<string>, set: ReadonlySet<string>): number {
  let n = 0;
  for (const value of values) if (set.has(value)) n++;
  return n;
}

export function scoreSuggestion(entry: SuggestedEntry, profile: LibraryProfile): RankedSuggestion {
  const authors = toKeySet(extractAuthors(entry.book));
  const genres = toKeySet([
    ...entry.baseGenres,
    ...extractGenres(getPath(entry.book, ["cached_tags"])),
  ]);
  const listWords = new Set(entry.reasons.flatMap((r) => significantWords(r.listName)));
  const titleBonusWords = significantWords(extractText(entry.book, Rules.title))
    .filter((w) => profile.titleWords.has(w))
    .slice(0, TITLE_BONUS_CAP);

  const authorMatches = countIn(authors, profile.authors);
  const genreMatches = countIn(genres, profile.genres);
  const tagMatches = countIn(listWords, profile.tagWords);

  let calibreId: number | null = null;
  for (const isbn of extractIsbns(entry.book)) {
    const owner = profile.isbnOwners.get(isbn);
    if (owner !== undefined && (calibreId === null || owner < calibreId)) calibreId = owner;
  }

  return {
    ...entry,
    matchScore:
      ScoreWeights.author * authorMatches +
      ScoreWeights.genre * genreMatches +
      ScoreWeights.tag * tagMatches +
      ScoreWeights.titleBonus * titleBonusWords.length,
    authorMatches,
    genreMatches,
    tagMatches,
    titleBonusWords,
    alreadyInCalibre: calibreId !== null,
    calibreId,
  };
}

export function compareRanked(a: RankedSuggestion, b: RankedSuggestion): number {
  return (
    b.matchScore - a.matchScore ||
    Number(b.alreadyInCalibre) - Number(a.alreadyInCalibre) ||
    b.authorMatches - a.authorMatches ||
    b.genreMatches - a.genreMatches ||
    b.tagMatches - a.tagMatches ||
    a.id - b.id
  );
}

/** Pure: scores and orders `suggestions` against `profile`. */
export function rankSuggestions(
  suggestions: readonly SuggestedEntry[],
  profile: LibraryProfile,
): RankedSuggestion[] {
  return suggestions.map((s) => scoreSuggestion(s, profile)).sort(compareRanked);
}

// ── Service ─────────────────────────────────────────────────────────────────

export interface RankedResult {
  suggestions: RankedSuggestion[];
  /** Ids of suggestions removed because the library already owns them. */
  removedOwnedIds: number[];
}

export class RankingService {
  constructor(
    private readonly mirror: CatalogMirrorRepository,
    private readonly listCache: ListCacheRepository,
    private readonly suggested: SuggestedRepository,
    private readonly logger: pino.Logger,
  ) {}

  profile(): LibraryProfile {
    return buildLibraryProfile(this.mirror.getBooks(), this.listCache.getAllBaseGenres());
  }

  /** Score `suggestions` against the current mirror. Reads only. */
  rank(suggestions: readonly SuggestedEntry[]): RankedSuggestion[] {
    return rankSuggestions(suggestions, this.profile());
  }

  /**
   * Rank every visible suggestion, delete the ones the library owns, and
   * return the rest.
   */
  rankVisible(): RankedResult {
    const ranked = this.rank(this.suggested.getAll());
    const owned = ranked.filter((s) => s.alreadyInCalibre).map((s) => s.id);
    if (owned.length > 0) {
      this.suggested.deleteByIds(owned);
      this.logger.info({ removed: owned.length }, "removed owned suggestions");
    }
    return {
      suggestions: ranked.filter((s) => !s.alreadyInCalibre),
      removedOwnedIds: owned,
    };
  }
}
