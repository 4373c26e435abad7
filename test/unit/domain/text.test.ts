import { describe, it, expect } from "vitest";

import {
  normalizeText,
  normalizeTitle,
  significantWords,
  toKeySet,
} from "../../../src/domain/text.js";

describe("normalizeText", () => {
  it("lowercases, trims and collapses whitespace", () => {
    expect(normalizeText("  The  Left Hand\tof Darkness ")).toBe("the left hand of darkness");
  });

  it("treats null and undefined as empty", () => {
    expect(normalizeText(null)).toBe("");
    expect(normalizeTitle(undefined)).toBe("");
  });
});

describe("significantWords", () => {
  it("drops short words and stopwords", () => {
    expect(significantWords("The Best Science Fiction Books of the Decade")).toEqual([
      "science",
      "fiction",
      "decade",
    ]);
  });

  it("splits on punctuation and dedupes", () => {
    expect(significantWords("Dune: Dune Messiah")).toEqual(["dune", "messiah"]);
  });

  it("keeps non-ASCII letters", () => {
    expect(significantWords("Cien años de soledad")).toEqual(["cien", "años", "soledad"]);
  });

  it("returns nothing for empty input", () => {
    expect(significantWords(null)).toEqual([]);
  });
});

describe("toKeySet", () => {
  it("normalises values and skips blanks", () => {
    expect([...toKeySet(["Frank Herbert", " frank  herbert ", "", "Isaac Asimov"])]).toEqual([
      "frank herbert",
      "isaac asimov",
    ]);
  });
});
