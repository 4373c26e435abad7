// ---------------------------------------------------------------------------
// Shared builders and fakes for the unit and integration tests.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { ActivitySink } from "../../src/activity/activity-log.js";
import type {
  ActivityLevel,
  AppConfig,
  CatalogEntry,
  HardcoverBookRef,
  JsonObject,
  JsonValue,
  ListHit,
  RecommendationReason,
} from "../../src/core/types.js";
import type { HardcoverApi } from "../../src/hardcover/hardcover-api.js";
import type { FetchFn } from "../../src/hardcover/graphql-client.js";

export const DUNE_ISBN = "9780441013593";
export const FOUNDATION_ISBN = "9780553293357";

export const silentLogger = pino({ level: "silent" });

// ── Builders ────────────────────────────────────────────────────────────────

export function catalogEntry(overrides: Partial<CatalogEntry> & Pick<CatalogEntry, "id" | "title">): CatalogEntry {
  return {
    authors: [],
    isbns: [],
    tags: [],
    coverPath: null,
    path: `Author/${overrides.title} (${overrides.id})`,
    publisher: null,
    series: null,
    rating: null,
    formats: [],
    addedAt: null,
    publishedAt: null,
    ...overrides,
  };
}

export function reason(overrides: Partial<RecommendationReason> = {}): RecommendationReason {
  return {
    listId: "1",
    listName: "Some List",
    listSlug: "some-list",
    ownerName: "reader",
    calibreId: 1,
    calibreTitle: "Dune",
    ...overrides,
  };
}

export function bookRef(id: string, title: string, extra: JsonObject = {}): HardcoverBookRef {
  return { id, title, slug: null, book: { id: Number(id), title, ...extra } };
}

/** A list hit whose neighbours are `[id, title]` pairs. */
export function listHit(listId: string, listName: string, books: Array<[string, string, JsonObject?]>): ListHit {
  return {
    listId,
    listName,
    listSlug: listName.toLowerCase().replace(/\s+/g, "-"),
    ownerName: "reader",
    neighbors: books.map(([id, title, extra]) => ({
      key: id,
      title,
      rating: null,
      book: { id: Number(id), title, ...(extra ?? {}), source: "hardcover" },
    })),
  };
}

export function testConfig(overrides: { apiKey?: string | null; rateLimitEnabled?: boolean } = {}): AppConfig {
  return {
    env: "test",
    port: 0,
    logLevel: "silent",
    dataDir: "/tmp/shelfwise-test",
    hardcover: {
      endpoint: "https://hardcover.test/v1/graphql",
      apiKey: overrides.apiKey === undefined ? "test-secret" : overrides.apiKey,
      lookupTimeoutMs: 1_000,
      listTimeoutMs: 1_000,
      rateLimitCooldownMs: 5_000,
      pushThrottleMs: 100,
    },
    discovery: {
      bulk: {
        listsPerBook: { default: 12, min: 1, max: 50 },
        itemsPerList: { default: 20, min: 1, max: 60 },
        delayMs: { default: 450, min: 0, max: 2_000 },
      },
      stream: {
        listsPerBook: { default: 25, min: 1, max: 100 },
        itemsPerList: { default: 30, min: 1, max: 100 },
        delayMs: { default: 2_000, min: 2_000, max: 120_000 },
      },
    },
    schedule: {
      calibreSyncMinutes: 30,
      wantSyncMinutes: 30,
      bookshelfSyncMinutes: 30,
      suggestedDedupMinutes: 30,
    },
    rateLimit: { enabled: overrides.rateLimitEnabled ?? false, requestsPerMinute: 120 },
  };
}

// ── Fakes ───────────────────────────────────────────────────────────────────

export interface RecordedActivity {
  source: string;
  level: ActivityLevel;
  message: string;
  details: JsonValue | undefined;
}

/** Activity sink that keeps entries in memory, oldest first. */
export class RecordingActivity implements ActivitySink {
  readonly entries: RecordedActivity[] = [];

  record(source: string, level: ActivityLevel, message: string, details?: JsonValue): void {
    this.entries.push({ source, level, message, details });
  }

  last(): RecordedActivity | undefined {
    return this.entries[this.entries.length - 1];
  }
}

/** A configured Hardcover gateway that matches nothing unless overridden. */
export function fakeHardcoverApi(overrides: Partial<HardcoverApi> = {}): HardcoverApi {
  return {
    isConfigured: true,
    assertConfigured: () => undefined,
    findBookByTitle: async () => null,
    findBookByIsbn: async () => null,
    fetchListsContainingBook: async () => [],
    searchByIsbn: async () => [],
    fetchWantToRead: async () => ({ variant: null, books: [] }),
    addBookToList: async () => undefined,
    ...overrides,
  };
}

/** Resolves immediately; records nothing. */
export const instantSleep = async (): Promise<void> => undefined;

// ── Fake GraphQL endpoint ───────────────────────────────────────────────────

export type GraphqlHandler = (variables: Record<string, unknown>, query: string) => unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

/**
 * A fetch stand-in that routes GraphQL requests by operation name. A handler
 * returns either a ready Response or the `data` object to wrap; operations
 * without a handler answer with a GraphQL error.
 */
export function graphqlFetch(handlers: Record<string, GraphqlHandler>): FetchFn & { operations: string[] } {
  const operations: string[] = [];
  const fn = async (_input: string, init: RequestInit): Promise<Response> => {
    const payload: unknown = typeof init.body === "string" ? JSON.parse(init.body) : null;
    const query = isRecord(payload) && typeof payload["query"] === "string" ? payload["query"] : "";
    const variables = isRecord(payload) && isRecord(payload["variables"]) ? payload["variables"] : {};
    const operation = /(?:query|mutation)\s+(\w+)/.exec(query)?.[1] ?? "anonymous";
    operations.push(operation);

    const handler = handlers[operation];
    if (!handler) {
      return jsonResponse({ errors: [{ message: `no handler for ${operation}` }] });
    }
    const result = handler(variables, query);
    return result instanceof Response ? result : jsonResponse({ data: result });
  };
  return Object.assign(fn, { operations });
}
