// ---------------------------------------------------------------------------
// Periodic clean-up of the suggested store.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { HiddenFlag, type JsonObject } from "../core/types.js";
import { Rules, extractAuthors, extractText } from "../hardcover/extraction.js";
import { normalizeText } from "../domain/text.js";
import type { SuggestedRepository } from "../storage/repositories/suggested-repository.js";
import type { RankingService } from "./ranking-service.js";

export interface DedupResult {
  removedOwned: number;
  hiddenDuplicates: number;
}

/** Normalised title + first author; empty when the title is missing. */
export function duplicateKey(book: JsonObject): string {
  const title = normalizeText(extractText(book, Rules.title));
  if (!title) return "";
  return `${title}|${normalizeText(extractAuthors(book)[0])}`;
}

export class SuggestedDedup {
  constructor(
    private readonly suggested: SuggestedRepository,
    private readonly ranking: RankingService,
    private readonly logger: pino.Logger,
  ) {}

  /**
   * Delete every suggestion whose ISBN the library owns, then hide visible
   * rows that repeat an earlier row's title and first author. The lowest id
   * of each duplicate group stays visible.
   */
  run(): DedupResult {
    const owned = this.ranking
      .rank(this.suggested.getEverything())
      .filter((s) => s.alreadyInCalibre)
      .map((s) => s.id);
    const removedOwned = owned.length > 0 ? this.suggested.deleteByIds(owned) : 0;

    const seen = new Set<string>();
    const duplicates: number[] = [];
    const visible = [...this.suggested.getAll()].sort((a, b) => a.id - b.id);
    for (const entry of visible) {
      const key = duplicateKey(entry.book);
      if (!key) continue;
      if (seen.has(key)) {
        duplicates.push(entry.id);
      } else {
        seen.add(key);
      }
    }
    const hiddenDuplicates =
      duplicates.length > 0 ? this.suggested.hide(duplicates, HiddenFlag.HIDDEN) : 0;

    this.logger.debug({ removedOwned, hiddenDuplicates }, "suggested store deduplicated");
    return { removedOwned, hiddenDuplicates };
  }
}
