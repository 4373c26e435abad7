// ---------------------------------------------------------------------------
// List crawler: resolve one catalog entry on Hardcover and collect the books
// that share public lists with it.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  CatalogEntry,
  CrawlOptions,
  CrawlResult,
  HardcoverBookRef,
  ListHit,
  RecommendationCandidate,
} from "../core/types.js";
import { extractGenres, getPath } from "./extraction.js";
import type { HardcoverApi } from "./hardcover-api.js";

export const EMPTY_CRAWL: Readonly<CrawlResult> = Object.freeze({
  matched: false,
  resolvedId: null,
  resolvedTitle: null,
  baseGenres: [],
  lists: [],
  recommendations: [],
});

/**
 * Turn list hits into candidates keyed by book key. A book seen on several
 * lists collects one occurrence and one reason per list, in list order.
 */
export function collectCandidates(
  entry: Pick<CatalogEntry, "id" | "title">,
  lists: ListHit[],
  minRating: number | null,
  excludeKey: string | null = null,
): RecommendationCandidate[] {
  const byKey = new Map<string, RecommendationCandidate>();

  for (const list of lists) {
    for (const neighbor of list.neighbors) {
      if (neighbor.key === null || neighbor.key === excludeKey) continue;
      if (minRating !== null && neighbor.rating !== null && neighbor.rating < minRating) continue;

      let candidate = byKey.get(neighbor.key);
      if (!candidate) {
        candidate = {
          key: neighbor.key,
          book: neighbor.book,
          occurrences: 0,
          reasons: [],
          baseGenres: extractGenres(getPath(neighbor.book, ["cached_tags"])),
        };
        byKey.set(neighbor.key, candidate);
      }
      candidate.occurrences += 1;
      candidate.reasons.push({
        listId: list.listId,
        listName: list.listName,
        listSlug: list.listSlug,
        ownerName: list.ownerName,
        calibreId: entry.id,
        calibreTitle: entry.title,
      });
    }
  }

  return [...byKey.values()];
}

export class ListCrawler {
  constructor(
    private readonly api: HardcoverApi,
    private readonly logger: pino.Logger,
  ) {}

  /** Exact title first, then exact ISBN. `null` means not matched. */
  async resolve(entry: CatalogEntry, signal?: AbortSignal): Promise<HardcoverBookRef | null> {
    const byTitle = await this.api.findBookByTitle(entry.title, signal);
    if (byTitle) return byTitle;
    if (entry.isbns.length === 0) return null;
    return this.api.findBookByIsbn(entry.isbns, signal);
  }

  /**
   * Resolve `entry` and crawl the lists that contain it. An unresolved
   * entry yields an empty, unmatched result; transport failures propagate.
   */
  async resolveAndCrawl(entry: CatalogEntry, options: CrawlOptions): Promise<CrawlResult> {
    const ref = await this.resolve(entry, options.signal);
    if (!ref) {
      this.logger.debug({ calibreId: entry.id, title: entry.title }, "no hardcover match");
      return { ...EMPTY_CRAWL };
    }

    const lists = await this.api.fetchListsContainingBook(
      ref.id,
      options.listsPerBook,
      options.itemsPerList,
      options.signal,
    );
    const recommendations = collectCandidates(entry, lists, options.minRating, ref.id);

    this.logger.debug(
      {
        calibreId: entry.id,
        hardcoverId: ref.id,
        lists: lists.length,
        recommendations: recommendations.length,
      },
      "crawled lists",
    );

    return {
      matched: true,
      resolvedId: ref.id,
      resolvedTitle: ref.title,
      baseGenres: extractGenres(getPath(ref.book, ["cached_tags"])),
      lists,
      recommendations,
    };
  }
}
