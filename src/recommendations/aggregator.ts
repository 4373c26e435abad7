// ---------------------------------------------------------------------------
// Recommendation aggregation across crawled catalog entries.
// ---------------------------------------------------------------------------

import type { NewSuggestion, RecommendationCandidate } from "../core/types.js";

interface Slot {
  order: number;
  candidate: RecommendationCandidate;
}

/**
 * Accumulates per-entry candidates into one map keyed by book key.
 * Occurrences are summed and reasons concatenated in the order entries are
 * added; the first book payload seen for a key is kept.
 */
export class RecommendationAggregator {
  private readonly slots = new Map<string, Slot>();

  get size(): number {
    return this.slots.size;
  }

  add(candidates: readonly RecommendationCandidate[]): void {
    for (const candidate of candidates) {
      const slot = this.slots.get(candidate.key);
      if (!slot) {
        this.slots.set(candidate.key, {
          order: this.slots.size,
          candidate: {
            ...candidate,
            reasons: [...candidate.reasons],
            baseGenres: [...candidate.baseGenres],
          },
        });
        continue;
      }

      const merged = slot.candidate;
      merged.occurrences += candidate.occurrences;
      merged.reasons.push(...candidate.reasons);
      for (const genre of candidate.baseGenres) {
        if (!merged.baseGenres.some((g) => g.toLowerCase() === genre.toLowerCase())) {
          merged.baseGenres.push(genre);
        }
      }
    }
  }

  /** Occurrences descending; ties keep first-encounter order. */
  sorted(): RecommendationCandidate[] {
    return [...this.slots.values()]
      .sort((a, b) => b.candidate.occurrences - a.candidate.occurrences || a.order - b.order)
      .map((slot) => slot.candidate);
  }
}

export function toSuggestions(candidates: readonly RecommendationCandidate[]): NewSuggestion[] {
  return candidates.map((c) => ({
    sourceKey: c.key,
    book: c.book,
    baseGenres: c.baseGenres,
    reasons: c.reasons,
  }));
}
