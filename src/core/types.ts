// ---------------------------------------------------------------------------
// Core domain types for the Shelfwise library and recommendation engine.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** ISBN-10 string (validated). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** ISBN-13 string (validated). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Raw user / upstream input that may or may not be a valid ISBN. */
export type RawISBN = string;

// ── Loose JSON payloads ─────────────────────────────────────────────────────

/** Any JSON value as returned by an upstream API. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ── Catalog ─────────────────────────────────────────────────────────────────

/** One book of the owned desktop library, as mirrored locally. */
export interface CatalogEntry {
  id: number;
  title: string;
  authors: string[];
  /** Normalized ISBN-13 values (ISBN-10 inputs are converted). */
  isbns: string[];
  tags: string[];
  /** Library-relative cover path, when the entry has a cover. */
  coverPath: string | null;
  /** Library-relative directory of the entry. */
  path: string;
  publisher: string | null;
  series: string | null;
  /** Rating on Calibre's 0–10 scale. */
  rating: number | null;
  formats: string[];
  addedAt: string | null;
  publishedAt: string | null;
}

export interface SyncState {
  sourcePath: string | null;
  lastSnapshot: string | null;
  entryCount: number;
}

export interface MirrorSyncResult {
  count: number;
  addedIds: number[];
  removedIds: number[];
  snapshotTime: string;
}

// ── Hardcover ───────────────────────────────────────────────────────────────

/** Why a co-listed book was recommended. */
export interface RecommendationReason {
  listId: string | null;
  listName: string | null;
  listSlug: string | null;
  ownerName: string | null;
  calibreId: number;
  calibreTitle: string;
}

/** A book found next to the crawled book on a list. */
export interface ListNeighbor {
  key: string | null;
  title: string | null;
  rating: number | null;
  book: JsonObject;
}

/** A public list that contains the crawled book. */
export interface ListHit {
  listId: string | null;
  listName: string | null;
  listSlug: string | null;
  ownerName: string | null;
  neighbors: ListNeighbor[];
}

export interface RecommendationCandidate {
  key: string;
  book: JsonObject;
  occurrences: number;
  reasons: RecommendationReason[];
  baseGenres: string[];
}

export interface CrawlOptions {
  listsPerBook: number;
  itemsPerList: number;
  minRating: number | null;
  signal?: AbortSignal;
}

export interface CrawlResult {
  matched: boolean;
  resolvedId: string | null;
  resolvedTitle: string | null;
  baseGenres: string[];
  lists: ListHit[];
  recommendations: RecommendationCandidate[];
}

/** A lightweight resolved book (id + title + slug). */
export interface HardcoverBookRef {
  id: string;
  title: string | null;
  slug: string | null;
  book: JsonObject;
}

// ── Crawl cache ─────────────────────────────────────────────────────────────

export const CrawlStatus = {
  OK: "ok",
  NOT_MATCHED: "not_matched",
  PENDING: "pending",
} as const;

export type CrawlStatus = (typeof CrawlStatus)[keyof typeof CrawlStatus];

export interface CrawlCacheEntry {
  calibreId: number;
  calibreTitle: string;
  hardcoverId: string | null;
  hardcoverTitle: string | null;
  listCount: number;
  recommendationCount: number;
  status: CrawlStatus;
  lastCheckedAt: string | null;
  baseGenres: string[];
  lists: ListHit[];
  recommendations: RecommendationCandidate[];
}

export interface CrawlCacheStatus {
  total: number;
  withLists: number;
  pending: number;
}

// ── Suggested store ─────────────────────────────────────────────────────────

export const HiddenFlag = {
  VISIBLE: 0,
  HIDDEN: 1,
  IGNORED: 2,
} as const;

export type HiddenFlag = (typeof HiddenFlag)[keyof typeof HiddenFlag];

export interface SuggestedEntry {
  id: number;
  sourceKey: string;
  book: JsonObject;
  baseGenres: string[];
  reasons: RecommendationReason[];
  hidden: HiddenFlag;
  createdAt: string;
  updatedAt: string;
}

export interface NewSuggestion {
  sourceKey: string;
  book: JsonObject;
  baseGenres: string[];
  reasons: RecommendationReason[];
}

export interface RankedSuggestion extends SuggestedEntry {
  matchScore: number;
  authorMatches: number;
  genreMatches: number;
  tagMatches: number;
  titleBonusWords: string[];
  alreadyInCalibre: boolean;
  calibreId: number | null;
}

// ── Discovery ───────────────────────────────────────────────────────────────

/** How a per-entry crawl failure is classified in the trace. */
export const StepErrorType = {
  RATE_LIMIT: "rate_limit",
  TIMEOUT: "timeout",
  UPSTREAM: "upstream",
  PARSE: "parse",
  NOT_CONFIGURED: "not_configured",
  UNKNOWN: "unknown",
} as const;

export type StepErrorType = (typeof StepErrorType)[keyof typeof StepErrorType];

export interface DiscoveryStep {
  calibreId: number;
  title: string;
  isbn: string | null;
  matchedHardcover: boolean;
  hardcoverBookId: string | null;
  hardcoverTitle: string | null;
  listsChecked: number;
  recommendationsAdded: number;
  /** True when cached results were used in place of a failed live crawl. */
  fromCache: boolean;
  totalCalibreBooks: number;
  processed: number;
  uniqueRecommendations: number;
  error?: { type: StepErrorType; message: string };
}

export interface DiscoveryOptions {
  /** Number of mirrored entries to inspect (≤ 0 means all). */
  take: number;
  listsPerBook: number;
  itemsPerList: number;
  minRating: number | null;
  delayMs: number;
}

export interface DiscoverySummary {
  inspectedCalibreBooks: number;
  matchedCalibreBooks: number;
  uniqueRecommendations: number;
  suggestedInserted: number;
  cancelled: boolean;
  recommendations: RecommendationCandidate[];
}

export interface DiscoveryResponse extends DiscoverySummary {
  steps: DiscoveryStep[];
}

export type DiscoveryEvent =
  | { type: "step"; step: DiscoveryStep }
  | { type: "summary"; summary: DiscoverySummary };

// ── Want list & bookshelf ───────────────────────────────────────────────────

export interface WantedBook {
  hardcoverId: string;
  title: string | null;
  authors: string[];
  isbn13: string | null;
  isbn10: string | null;
  coverUrl: string | null;
  book: JsonObject;
}

export interface WantCacheStats {
  count: number;
  lastUpdatedAt: string | null;
}

export interface BookshelfMapping {
  calibreId: number;
  hardcoverId: string | null;
  lastCheckedAt: string;
}

export interface BookshelfResolveResult {
  attempted: number;
  resolved: number;
  missingIsbn: number;
  titleFallback: number;
  alreadyMapped: number;
  pushed: number;
  failed: number;
}

// ── Activity log ────────────────────────────────────────────────────────────

export const ActivityLevel = {
  INFO: "info",
  SUCCESS: "success",
  WARNING: "warning",
  ERROR: "error",
} as const;

export type ActivityLevel = (typeof ActivityLevel)[keyof typeof ActivityLevel];

export interface ActivityEntry {
  id: number;
  timestamp: string;
  source: string;
  level: ActivityLevel;
  message: string;
  details: JsonValue | null;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  logLevel: string;
  /** Directory holding the local database and the user settings file. */
  dataDir: string;
  hardcover: HardcoverConfig;
  discovery: DiscoveryConfig;
  schedule: ScheduleConfig;
  rateLimit: RateLimitConfig;
}

export interface HardcoverConfig {
  endpoint: string;
  apiKey: string | null;
  lookupTimeoutMs: number;
  listTimeoutMs: number;
  rateLimitCooldownMs: number;
  /** Pause between add-to-list mutations. */
  pushThrottleMs: number;
}

export interface DiscoveryLimits {
  listsPerBook: { default: number; min: number; max: number };
  itemsPerList: { default: number; min: number; max: number };
  delayMs: { default: number; min: number; max: number };
}

export interface DiscoveryConfig {
  bulk: DiscoveryLimits;
  stream: DiscoveryLimits;
}

/** Task intervals in minutes; a value ≤ 0 disables the task. */
export interface ScheduleConfig {
  calibreSyncMinutes: number;
  wantSyncMinutes: number;
  bookshelfSyncMinutes: number;
  suggestedDedupMinutes: number;
}

export interface RateLimitConfig {
  enabled: boolean;
  requestsPerMinute: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}

/** User-editable settings, persisted beside the database. */
export interface UserSettings {
  calibreLibraryPath: string | null;
  hardcoverListId: number | null;
}
