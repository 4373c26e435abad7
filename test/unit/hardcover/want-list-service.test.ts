import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import type { JsonObject } from "../../../src/core/types.js";
import { HardcoverUpstreamError } from "../../../src/core/errors.js";
import type { HardcoverApi } from "../../../src/hardcover/hardcover-api.js";
import { WantListService, toWantedBook } from "../../../src/hardcover/want-list-service.js";
import { openDatabase, type Db } from "../../../src/storage/database.js";
import { WantCacheRepository } from "../../../src/storage/repositories/want-cache-repository.js";
import {
  DUNE_ISBN,
  RecordingActivity,
  fakeHardcoverApi,
  instantSleep,
  silentLogger,
} from "../../support/fixtures.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

const anathem: JsonObject = {
  id: 7,
  title: "Anathem",
  cached_contributors: [{ name: "Neal Stephenson" }],
  default_physical_edition: { isbn_13: "9780000000000", isbn_10: "0-441-01359-7" },
  isbn_13: DUNE_ISBN,
  image: { url: "https://img.test/7.jpg" },
};

describe("toWantedBook", () => {
  it("pulls the first valid ISBNs and the cover", () => {
    expect(toWantedBook(anathem)).toEqual({
      hardcoverId: "7",
      title: "Anathem",
      authors: ["Neal Stephenson"],
      isbn13: DUNE_ISBN,
      isbn10: "0441013597",
      coverUrl: "https://img.test/7.jpg",
      book: anathem,
    });
  });

  it("skips books without an id", () => {
    expect(toWantedBook({ title: "Nameless" })).toBeNull();
  });
});

describe("WantListService", () => {
  let db: Db;
  let cache: WantCacheRepository;
  let activity: RecordingActivity;

  function service(api: Partial<HardcoverApi>, sleep = instantSleep): WantListService {
    return new WantListService(fakeHardcoverApi(api), cache, activity, silentLogger, () => NOW, sleep);
  }

  beforeEach(() => {
    db = openDatabase(":memory:");
    cache = new WantCacheRepository(db);
    activity = new RecordingActivity();
  });

  afterEach(() => {
    db.close();
  });

  it("skips the refresh when Hardcover is not configured", async () => {
    const fetchWantToRead = vi.fn(async () => ({ variant: null, books: [] }));

    const result = await service({ isConfigured: false, fetchWantToRead }).refresh();

    expect(result).toEqual({ status: "skipped", count: 0, variant: null });
    expect(fetchWantToRead).not.toHaveBeenCalled();
    expect(activity.entries).toEqual([]);
  });

  it("replaces the cache with distinct books", async () => {
    const result = await service({
      fetchWantToRead: async () => ({
        variant: "user_book",
        books: [anathem, { ...anathem, title: "Anathem (dup)" }, { title: "No id" }],
      }),
    }).refresh();

    expect(result).toEqual({ status: "updated", count: 1, variant: "user_book" });
    expect(cache.getAll().map((b) => b.title)).toEqual(["Anathem"]);
    expect(cache.getStats()).toEqual({ count: 1, lastUpdatedAt: "2026-03-01T10:00:00.000Z" });
    expect(activity.last()).toEqual({
      source: "Hardcover want list",
      level: "success",
      message: "Cached 1 want-to-read books.",
      details: { variant: "user_book" },
    });
  });

  it("keeps the cache when the shelf comes back empty", async () => {
    await service({ fetchWantToRead: async () => ({ variant: "user_book", books: [anathem] }) }).refresh();

    const result = await service({ fetchWantToRead: async () => ({ variant: "user_books", books: [] }) }).refresh();

    expect(result).toEqual({ status: "empty", count: 1, variant: "user_books" });
    expect(cache.getStats().count).toBe(1);
    expect(activity.last()).toMatchObject({
      level: "warning",
      message: "Hardcover returned no want-to-read books; kept 1 cached.",
    });
  });

  it("retries a server error", async () => {
    const fetchWantToRead = vi
      .fn<HardcoverApi["fetchWantToRead"]>()
      .mockRejectedValueOnce(new HardcoverUpstreamError("Hardcover WantToRead returned 502: bad gateway", "WantToRead", 502))
      .mockResolvedValueOnce({ variant: "user_book", books: [anathem] });
    const sleep = vi.fn(instantSleep);

    const result = await service({ fetchWantToRead }, sleep).refresh();

    expect(result.status).toBe("updated");
    expect(fetchWantToRead).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("does not retry a client error", async () => {
    const fetchWantToRead = vi.fn(async () => {
      throw new HardcoverUpstreamError("Hardcover WantToRead returned 401: denied", "WantToRead", 401);
    });

    await expect(service({ fetchWantToRead }).refresh()).rejects.toThrow("returned 401");
    expect(fetchWantToRead).toHaveBeenCalledTimes(1);
  });
});
