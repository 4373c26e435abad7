import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { openDatabase, type Db } from "../../../src/storage/database.js";
import { CatalogMirrorRepository } from "../../../src/storage/repositories/catalog-mirror-repository.js";
import { DUNE_ISBN, FOUNDATION_ISBN, catalogEntry } from "../../support/fixtures.js";

const SNAPSHOT_1 = "2026-03-01T10:00:00.000Z";
const SNAPSHOT_2 = "2026-03-02T10:00:00.000Z";

const dune = catalogEntry({
  id: 1,
  title: "Dune",
  authors: ["Frank Herbert"],
  isbns: [DUNE_ISBN],
  tags: ["Science Fiction"],
  formats: ["EPUB"],
  rating: 10,
  addedAt: "2024-02-01T00:00:00+00:00",
});
const foundation = catalogEntry({
  id: 2,
  title: "Foundation",
  authors: ["Isaac Asimov"],
  isbns: [FOUNDATION_ISBN],
  addedAt: "2024-01-01T00:00:00+00:00",
});
const hyperion = catalogEntry({ id: 3, title: "Hyperion", addedAt: "2024-03-01T00:00:00+00:00" });

describe("CatalogMirrorRepository", () => {
  let db: Db;
  let repo: CatalogMirrorRepository;

  beforeEach(() => {
    db = openDatabase(":memory:");
    repo = new CatalogMirrorRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it("starts empty", () => {
    expect(repo.getBooks()).toEqual([]);
    expect(repo.getState()).toEqual({ sourcePath: null, lastSnapshot: null, entryCount: 0 });
  });

  it("stores entries and reports the ids added", () => {
    const result = repo.replaceAll([foundation, dune], "/library", SNAPSHOT_1);

    expect(result).toEqual({ addedIds: [1, 2], removedIds: [] });
    expect(repo.getById(1)).toEqual(dune);
    expect(repo.getState()).toEqual({ sourcePath: "/library", lastSnapshot: SNAPSHOT_1, entryCount: 2 });
  });

  it("is idempotent over unchanged data", () => {
    repo.replaceAll([dune, foundation], "/library", SNAPSHOT_1);
    const again = repo.replaceAll([dune, foundation], "/library", SNAPSHOT_2);

    expect(again).toEqual({ addedIds: [], removedIds: [] });
    expect(repo.getIds().sort()).toEqual([1, 2]);
  });

  it("reports removed ids and drops their rows", () => {
    repo.replaceAll([dune, foundation], "/library", SNAPSHOT_1);
    const result = repo.replaceAll([dune, hyperion], "/library", SNAPSHOT_2);

    expect(result).toEqual({ addedIds: [3], removedIds: [2] });
    expect(repo.getById(2)).toBeNull();
    expect(repo.getState().entryCount).toBe(2);
  });

  it("lists books newest first and honours take", () => {
    repo.replaceAll([dune, foundation, hyperion], "/library", SNAPSHOT_1);

    expect(repo.getBooks().map((b) => b.title)).toEqual(["Hyperion", "Dune", "Foundation"]);
    expect(repo.getBooks(2).map((b) => b.id)).toEqual([3, 1]);
    expect(repo.getBooks(-1)).toHaveLength(3);
  });
});
