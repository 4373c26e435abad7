// ---------------------------------------------------------------------------
// Discovery: crawl mirrored catalog entries one by one, fall back to the
// crawl cache when a live crawl fails, and aggregate the recommendations.
// ---------------------------------------------------------------------------

import type pino from "pino";
import {
  ActivityLevel,
  CrawlStatus,
  StepErrorType,
  type CatalogEntry,
  type CrawlCacheEntry,
  type CrawlResult,
  type DiscoveryEvent,
  type DiscoveryLimits,
  type DiscoveryOptions,
  type DiscoveryResponse,
  type DiscoveryStep,
  type DiscoverySummary,
  type HardcoverConfig,
  type RecommendationCandidate,
} from "../core/types.js";
import {
  HardcoverParseError,
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  HardcoverUpstreamError,
  NotConfiguredError,
  ValidationError,
  errorMessage,
} from "../core/errors.js";
import type { ActivitySink } from "../activity/activity-log.js";
import type { HardcoverApi } from "../hardcover/hardcover-api.js";
import { EMPTY_CRAWL, type ListCrawler } from "../hardcover/list-crawler.js";
import { sleep, withRateLimitRetry, type SleepFn } from "../orchestrator/retry.js";
import type { CatalogMirrorRepository } from "../storage/repositories/catalog-mirror-repository.js";
import type { ListCacheRepository } from "../storage/repositories/list-cache-repository.js";
import type { SuggestedRepository } from "../storage/repositories/suggested-repository.js";
import { RecommendationAggregator, toSuggestions } from "./aggregator.js";

export const DISCOVERY_ACTIVITY_SOURCE = "Hardcover lists";

// ── Options ─────────────────────────────────────────────────────────────────

export interface DiscoveryInput {
  take?: number;
  listsPerBook?: number;
  itemsPerList?: number;
  minRating?: number | null;
  delayMs?: number;
}

function clamp(value: number | undefined, range: { default: number; min: number; max: number }): number {
  if (value === undefined || !Number.isFinite(value)) return range.default;
  return Math.min(range.max, Math.max(range.min, Math.trunc(value)));
}

/** Apply defaults and clamp each knob into its allowed range. */
export function resolveDiscoveryOptions(input: DiscoveryInput, limits: DiscoveryLimits): DiscoveryOptions {
  return {
    take: input.take !== undefined && Number.isFinite(input.take) ? Math.max(0, Math.trunc(input.take)) : 0,
    listsPerBook: clamp(input.listsPerBook, limits.listsPerBook),
    itemsPerList: clamp(input.itemsPerList, limits.itemsPerList),
    minRating: input.minRating ?? null,
    delayMs: clamp(input.delayMs, limits.delayMs),
  };
}

// ── Helpers ─────────────────────────────────────────────────────────────────

export function classifyStepError(err: unknown): StepErrorType {
  if (err instanceof HardcoverRateLimitError) return StepErrorType.RATE_LIMIT;
  if (err instanceof HardcoverTimeoutError) return StepErrorType.TIMEOUT;
  if (err instanceof HardcoverUpstreamError) return StepErrorType.UPSTREAM;
  if (err instanceof HardcoverParseError) return StepErrorType.PARSE;
  if (err instanceof NotConfiguredError) return StepErrorType.NOT_CONFIGURED;
  return StepErrorType.UNKNOWN;
}

/** A cached row worth keeping over an unmatched or failed crawl. */
function isPreservable(row: CrawlCacheEntry | null): row is CrawlCacheEntry {
  return (
    row !== null &&
    row.status === CrawlStatus.OK &&
    row.hardcoverId !== null &&
    row.hardcoverId !== ""
  );
}

interface EntryOutcome {
  step: Omit<DiscoveryStep, "totalCalibreBooks" | "processed" | "uniqueRecommendations">;
  candidates: RecommendationCandidate[];
}

/** Thrown inside the loop when the caller's signal fires. */
class DiscoveryCancelled extends Error {}

// ── Service ─────────────────────────────────────────────────────────────────

export class DiscoveryService {
  constructor(
    private readonly mirror: CatalogMirrorRepository,
    private readonly listCache: ListCacheRepository,
    private readonly suggested: SuggestedRepository,
    private readonly api: HardcoverApi,
    private readonly crawler: ListCrawler,
    private readonly config: Pick<HardcoverConfig, "rateLimitCooldownMs">,
    private readonly activity: ActivitySink,
    private readonly logger: pino.Logger,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  /**
   * The entries a discovery would inspect. Throws when Hardcover is not
   * configured or the mirror is empty.
   */
  prepare(take: number): CatalogEntry[] {
    this.api.assertConfigured();
    const books = this.mirror.getBooks(take);
    if (books.length === 0) {
      throw new ValidationError("No Calibre books available. Sync Calibre first.");
    }
    return books;
  }

  /** Run a whole discovery and return the summary with every step. */
  async discover(options: DiscoveryOptions): Promise<DiscoveryResponse> {
    const steps: DiscoveryStep[] = [];
    for await (const event of this.stream(options)) {
      if (event.type === "step") {
        steps.push(event.step);
      } else {
        return { ...event.summary, steps };
      }
    }
    // stream() always finishes with a summary event.
    throw new Error("discovery ended without a summary");
  }

  /**
   * Yield one `step` event per catalog entry, in catalog order, then one
   * `summary`. Aborting `signal` stops further requests and delays; work
   * already written to the cache and the suggested store is kept.
   */
  async *stream(options: DiscoveryOptions, signal?: AbortSignal): AsyncGenerator<DiscoveryEvent> {
    const books = this.prepare(options.take);
    const aggregator = new RecommendationAggregator();
    let matched = 0;
    let processed = 0;
    let failures = 0;
    let cancelled = false;

    this.logger.info(
      { books: books.length, listsPerBook: options.listsPerBook, itemsPerList: options.itemsPerList },
      "discovery started",
    );

    for (const [index, book] of books.entries()) {
      let outcome: EntryOutcome;
      try {
        if (signal?.aborted) throw new DiscoveryCancelled();
        if (index > 0 && options.delayMs > 0) {
          await this.wait(options.delayMs, signal);
        }
        outcome = await this.processEntry(book, options, signal);
      } catch (err) {
        if (err instanceof DiscoveryCancelled) {
          cancelled = true;
          break;
        }
        throw err;
      }

      processed++;
      if (outcome.step.matchedHardcover) matched++;
      if (outcome.step.error) failures++;
      aggregator.add(outcome.candidates);

      yield {
        type: "step",
        step: {
          ...outcome.step,
          totalCalibreBooks: books.length,
          processed,
          uniqueRecommendations: aggregator.size,
        },
      };
    }

    const recommendations = aggregator.sorted();
    const suggestedInserted = this.suggested.upsertMissing(toSuggestions(recommendations));

    const summary: DiscoverySummary = {
      inspectedCalibreBooks: processed,
      matchedCalibreBooks: matched,
      uniqueRecommendations: recommendations.length,
      suggestedInserted,
      cancelled,
      recommendations,
    };

    this.logger.info(
      { processed, matched, unique: recommendations.length, suggestedInserted, failures, cancelled },
      "discovery finished",
    );
    this.activity.record(
      DISCOVERY_ACTIVITY_SOURCE,
      cancelled || failures > 0 ? ActivityLevel.WARNING : ActivityLevel.SUCCESS,
      `Inspected ${processed} of ${books.length} books: ${matched} matched, ` +
        `${recommendations.length} recommendations, ${suggestedInserted} new suggestions.`,
      { processed, matched, failures, cancelled, suggestedInserted },
    );

    yield { type: "summary", summary };
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleepFn(ms, signal);
    } catch (err) {
      if (signal?.aborted) throw new DiscoveryCancelled();
      throw err;
    }
  }

  private async processEntry(
    book: CatalogEntry,
    options: DiscoveryOptions,
    signal?: AbortSignal,
  ): Promise<EntryOutcome> {
    const existing = this.listCache.get(book.id);
    let crawl: CrawlResult;
    let error: DiscoveryStep["error"];

    try {
      crawl = await withRateLimitRetry(
        () =>
          this.crawler.resolveAndCrawl(book, {
            listsPerBook: options.listsPerBook,
            itemsPerList: options.itemsPerList,
            minRating: options.minRating,
            signal,
          }),
        {
          cooldownMs: this.config.rateLimitCooldownMs,
          signal,
          sleep: this.sleepFn,
          onRetry: (_attempt, delayMs) =>
            this.logger.warn({ calibreId: book.id, delayMs }, "rate limited, cooling down"),
        },
      );
    } catch (err) {
      if (signal?.aborted) throw new DiscoveryCancelled();
      error = { type: classifyStepError(err), message: errorMessage(err) };
      this.logger.warn({ calibreId: book.id, errorType: error.type, err }, "crawl failed");
      crawl = { ...EMPTY_CRAWL };
    }

    const base = {
      calibreId: book.id,
      title: book.title,
      isbn: book.isbns[0] ?? null,
      ...(error ? { error } : {}),
    };

    if (!crawl.matched && isPreservable(existing)) {
      return {
        step: {
          ...base,
          matchedHardcover: true,
          hardcoverBookId: existing.hardcoverId,
          hardcoverTitle: existing.hardcoverTitle,
          listsChecked: existing.listCount,
          recommendationsAdded: existing.recommendations.length,
          fromCache: true,
        },
        candidates: existing.recommendations,
      };
    }

    if (!error) {
      this.listCache.upsert({
        calibreId: book.id,
        calibreTitle: book.title,
        hardcoverId: crawl.resolvedId,
        hardcoverTitle: crawl.resolvedTitle,
        listCount: crawl.lists.length,
        recommendationCount: crawl.recommendations.length,
        status: crawl.matched ? CrawlStatus.OK : CrawlStatus.NOT_MATCHED,
        baseGenres: crawl.baseGenres,
        lists: crawl.lists,
        recommendations: crawl.recommendations,
      });
    }

    return {
      step: {
        ...base,
        matchedHardcover: crawl.matched,
        hardcoverBookId: crawl.resolvedId,
        hardcoverTitle: crawl.resolvedTitle,
        listsChecked: crawl.lists.length,
        recommendationsAdded: crawl.recommendations.length,
        fromCache: false,
      },
      candidates: crawl.recommendations,
    };
  }
}
