import { describe, it, expect } from "vitest";

import type { RecommendationCandidate } from "../../../src/core/types.js";
import { RecommendationAggregator, toSuggestions } from "../../../src/recommendations/aggregator.js";
import { reason } from "../../support/fixtures.js";

function candidate(
  key: string,
  occurrences: number,
  calibreTitle: string,
  baseGenres: string[] = [],
): RecommendationCandidate {
  return {
    key,
    book: { id: Number(key), title: `Book ${key}`, seenFrom: calibreTitle },
    occurrences,
    reasons: [reason({ calibreTitle })],
    baseGenres,
  };
}

/** Deterministic PRNG (mulberry32) so a failing run can be replayed. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("RecommendationAggregator", () => {
  it("sums occurrences and concatenates reasons across entries", () => {
    const agg = new RecommendationAggregator();
    agg.add([candidate("101", 2, "Dune", ["Science Fiction"])]);
    agg.add([candidate("101", 1, "Hyperion", ["science fiction", "Space Opera"])]);

    const [merged] = agg.sorted();
    expect(agg.size).toBe(1);
    expect(merged?.occurrences).toBe(3);
    expect(merged?.reasons.map((r) => r.calibreTitle)).toEqual(["Dune", "Hyperion"]);
    expect(merged?.baseGenres).toEqual(["Science Fiction", "Space Opera"]);
    expect(merged?.book).toEqual({ id: 101, title: "Book 101", seenFrom: "Dune" });
  });

  it("sorts by occurrences and keeps first-seen order on ties", () => {
    const agg = new RecommendationAggregator();
    agg.add([candidate("a", 1, "Dune"), candidate("b", 1, "Dune")]);
    agg.add([candidate("c", 3, "Emma"), candidate("b", 1, "Emma")]);

    expect(agg.sorted().map((c) => [c.key, c.occurrences])).toEqual([
      ["c", 3],
      ["b", 2],
      ["a", 1],
    ]);
  });

  it.each([1, 7, 42, 2024, 90210])("holds its sums and reason order for random batches (seed %i)", (seed) => {
    const random = seededRandom(seed);
    const pick = (n: number) => Math.floor(random() * n);
    const keys = Array.from({ length: 12 }, (_, i) => String(100 + i));

    const agg = new RecommendationAggregator();
    const sums = new Map<string, number>();
    const titles = new Map<string, string[]>();
    const firstSeen: string[] = [];

    const entries = 1 + pick(20);
    for (let entry = 0; entry < entries; entry++) {
      const batch = keys
        .filter(() => random() < 0.4)
        .map((key, i) => candidate(key, 1 + pick(5), `entry-${entry}-${i}`));
      for (const c of batch) {
        if (!sums.has(c.key)) firstSeen.push(c.key);
        sums.set(c.key, (sums.get(c.key) ?? 0) + c.occurrences);
        titles.set(c.key, [...(titles.get(c.key) ?? []), ...c.reasons.map((r) => r.calibreTitle)]);
      }
      agg.add(batch);
    }

    const result = agg.sorted();
    expect(result.map((c) => c.key).sort()).toEqual([...sums.keys()].sort());
    for (const merged of result) {
      expect(merged.occurrences).toBe(sums.get(merged.key));
      expect(merged.reasons.map((r) => r.calibreTitle)).toEqual(titles.get(merged.key));
    }
    const expectedOrder = [...firstSeen].sort(
      (a, b) => (sums.get(b) ?? 0) - (sums.get(a) ?? 0) || firstSeen.indexOf(a) - firstSeen.indexOf(b),
    );
    expect(result.map((c) => c.key)).toEqual(expectedOrder);
  });

  it("does not mutate the candidates it is given", () => {
    const input = candidate("101", 1, "Dune");
    const agg = new RecommendationAggregator();
    agg.add([input]);
    agg.add([candidate("101", 1, "Emma")]);

    expect(input.occurrences).toBe(1);
    expect(input.reasons).toHaveLength(1);
  });
});

describe("toSuggestions", () => {
  it("keeps key, payload, genres and reasons", () => {
    expect(toSuggestions([candidate("101", 2, "Dune", ["Classics"])])).toEqual([
      {
        sourceKey: "101",
        book: { id: 101, title: "Book 101", seenFrom: "Dune" },
        baseGenres: ["Classics"],
        reasons: [reason({ calibreTitle: "Dune" })],
      },
    ]);
  });
});
