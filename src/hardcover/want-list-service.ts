// ---------------------------------------------------------------------------
// Keeps a local copy of the Hardcover "want to read" shelf.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { ActivityLevel, type JsonObject, type WantedBook } from "../core/types.js";
import { validateISBN10, validateISBN13 } from "../domain/isbn.js";
import type { ActivitySink } from "../activity/activity-log.js";
import { sleep, withRetry, type SleepFn } from "../orchestrator/retry.js";
import type { WantCacheRepository } from "../storage/repositories/want-cache-repository.js";
import { Rules, extractAllText, extractAuthors, extractText } from "./extraction.js";
import type { HardcoverApi } from "./hardcover-api.js";

export const WANT_ACTIVITY_SOURCE = "Hardcover want list";

export type WantSyncStatus = "skipped" | "empty" | "updated";

export interface WantSyncResult {
  status: WantSyncStatus;
  /** Rows in the cache after the refresh. */
  count: number;
  variant: string | null;
}

function firstValid<T>(values: string[], validate: (raw: string) => T | null): T | null {
  for (const value of values) {
    const valid = validate(value);
    if (valid !== null) return valid;
  }
  return null;
}

export function toWantedBook(book: JsonObject): WantedBook | null {
  const hardcoverId = extractText(book, Rules.bookId);
  if (hardcoverId === null) return null;
  return {
    hardcoverId,
    title: extractText(book, Rules.title),
    authors: extractAuthors(book),
    isbn13: firstValid(extractAllText(book, Rules.isbn13), validateISBN13),
    isbn10: firstValid(extractAllText(book, Rules.isbn10), validateISBN10),
    coverUrl: extractText(book, Rules.coverUrl),
    book,
  };
}

export class WantListService {
  constructor(
    private readonly api: HardcoverApi,
    private readonly cache: WantCacheRepository,
    private readonly activity: ActivitySink,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date(),
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  /**
   * Fetch the shelf and replace the cache. An empty answer keeps whatever
   * is cached; an unconfigured client skips the refresh.
   */
  async refresh(signal?: AbortSignal): Promise<WantSyncResult> {
    if (!this.api.isConfigured) {
      this.logger.debug("hardcover not configured, skipping want-list refresh");
      return { status: "skipped", count: this.cache.getStats().count, variant: null };
    }

    const result = await withRetry(() => this.api.fetchWantToRead(signal), {
      maxRetries: 2,
      baseDelayMs: 1_000,
      signal,
      sleep: this.sleepFn,
      onRetry: (attempt, delayMs, err) =>
        this.logger.warn({ attempt, delayMs, err }, "want-list fetch failed, retrying"),
    });

    const byId = new Map<string, WantedBook>();
    for (const raw of result.books) {
      const book = toWantedBook(raw);
      if (book && !byId.has(book.hardcoverId)) byId.set(book.hardcoverId, book);
    }

    if (byId.size === 0) {
      const kept = this.cache.getStats().count;
      this.logger.warn({ variant: result.variant, kept }, "want list came back empty, keeping cache");
      this.activity.record(
        WANT_ACTIVITY_SOURCE,
        ActivityLevel.WARNING,
        `Hardcover returned no want-to-read books; kept ${kept} cached.`,
      );
      return { status: "empty", count: kept, variant: result.variant };
    }

    this.cache.replaceAll([...byId.values()], this.now().toISOString());
    this.logger.info({ variant: result.variant, count: byId.size }, "want list cached");
    this.activity.record(
      WANT_ACTIVITY_SOURCE,
      ActivityLevel.SUCCESS,
      `Cached ${byId.size} want-to-read books.`,
      { variant: result.variant },
    );
    return { status: "updated", count: byId.size, variant: result.variant };
  }
}
