// ---------------------------------------------------------------------------
// Bookshelf resolver: map mirrored catalog entries to Hardcover book ids and
// optionally add newly mapped books to a Hardcover list.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type pino from "pino";
import {
  ActivityLevel,
  type BookshelfResolveResult,
  type CatalogEntry,
  type HardcoverBookRef,
  type HardcoverConfig,
  type UserSettings,
} from "../core/types.js";
import { errorMessage } from "../core/errors.js";
import { normalizeTitle } from "../domain/text.js";
import type { ActivitySink } from "../activity/activity-log.js";
import { sleep, withRateLimitRetry, type SleepFn } from "../orchestrator/retry.js";
import type { BookshelfMapRepository } from "../storage/repositories/bookshelf-map-repository.js";
import type { CatalogMirrorRepository } from "../storage/repositories/catalog-mirror-repository.js";
import type { HardcoverApi } from "./hardcover-api.js";

export const BOOKSHELF_ACTIVITY_SOURCE = "Hardcover bookshelf";

/** Lookups in flight at once. */
const RESOLVE_CONCURRENCY = 4;

const NUMERIC_ID = /^\d+$/;

interface Resolution {
  ref: HardcoverBookRef | null;
  viaTitle: boolean;
}

export class BookshelfResolver {
  constructor(
    private readonly mirror: CatalogMirrorRepository,
    private readonly mappings: BookshelfMapRepository,
    private readonly api: HardcoverApi,
    private readonly settings: () => Readonly<UserSettings>,
    private readonly config: Pick<HardcoverConfig, "rateLimitCooldownMs" | "pushThrottleMs">,
    private readonly activity: ActivitySink,
    private readonly logger: pino.Logger,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  async run(signal?: AbortSignal): Promise<BookshelfResolveResult> {
    this.api.assertConfigured();

    const books = this.mirror.getBooks();
    this.mappings.retainOnly(books.map((b) => b.id));
    const known = this.mappings.getAll();

    const result: BookshelfResolveResult = {
      attempted: 0,
      resolved: 0,
      missingIsbn: 0,
      titleFallback: 0,
      alreadyMapped: 0,
      pushed: 0,
      failed: 0,
    };
    const newlyResolved: string[] = [];
    const limit = pLimit(RESOLVE_CONCURRENCY);

    await Promise.all(
      books.map((book) =>
        limit(async () => {
          const mapped = known.get(book.id)?.hardcoverId;
          if (mapped && NUMERIC_ID.test(mapped)) {
            result.alreadyMapped++;
            return;
          }
          if (signal?.aborted) return;

          result.attempted++;
          if (book.isbns.length === 0) result.missingIsbn++;
          try {
            const { ref, viaTitle } = await this.resolve(book, signal);
            this.mappings.upsert(book.id, ref?.id ?? null);
            if (!ref) return;
            result.resolved++;
            if (viaTitle) result.titleFallback++;
            newlyResolved.push(ref.id);
          } catch (err) {
            if (signal?.aborted) return;
            result.failed++;
            this.logger.warn({ calibreId: book.id, err: errorMessage(err) }, "bookshelf lookup failed");
          }
        }),
      ),
    );

    const listId = this.settings().hardcoverListId;
    if (listId !== null && newlyResolved.length > 0) {
      result.pushed = await this.pushToList(listId, newlyResolved, signal);
    }

    this.logger.info({ ...result }, "bookshelf resolved");
    this.activity.record(
      BOOKSHELF_ACTIVITY_SOURCE,
      result.failed > 0 ? ActivityLevel.WARNING : ActivityLevel.SUCCESS,
      `Resolved ${result.resolved} of ${result.attempted} books ` +
        `(${result.alreadyMapped} already mapped, ${result.pushed} added to list).`,
      { ...result },
    );
    return result;
  }

  /**
   * ISBN search first, accepting only a hit whose title matches exactly
   * after normalisation; then an exact-title lookup.
   */
  private async resolve(book: CatalogEntry, signal?: AbortSignal): Promise<Resolution> {
    const wanted = normalizeTitle(book.title);
    for (const isbn of book.isbns) {
      const hits = await this.api.searchByIsbn(isbn, signal);
      const match = hits.find((hit) => normalizeTitle(hit.title) === wanted);
      if (match) return { ref: match, viaTitle: false };
    }

    const byTitle = await this.api.findBookByTitle(book.title, signal);
    return { ref: byTitle, viaTitle: byTitle !== null };
  }

  private async pushToList(listId: number, bookIds: string[], signal?: AbortSignal): Promise<number> {
    let pushed = 0;
    for (const [index, id] of bookIds.entries()) {
      if (signal?.aborted) break;
      if (!NUMERIC_ID.test(id)) continue;
      try {
        if (index > 0 && this.config.pushThrottleMs > 0) {
          await this.sleepFn(this.config.pushThrottleMs, signal);
        }
        await withRateLimitRetry(() => this.api.addBookToList(Number(id), listId, signal), {
          cooldownMs: this.config.rateLimitCooldownMs,
          signal,
          sleep: this.sleepFn,
        });
        pushed++;
      } catch (err) {
        if (signal?.aborted) break;
        this.logger.warn({ listId, hardcoverId: id, err: errorMessage(err) }, "add to list failed");
      }
    }
    return pushed;
  }
}
