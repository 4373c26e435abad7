// ---------------------------------------------------------------------------
// Hardcover operations used by the crawler, the want-list sync and the
// bookshelf resolver, expressed over HardcoverGraphqlClient.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  HardcoverBookRef,
  HardcoverConfig,
  JsonObject,
  JsonValue,
  ListHit,
  ListNeighbor,
} from "../core/types.js";
import { HardcoverRateLimitError, HardcoverUpstreamError, NotConfiguredError } from "../core/errors.js";
import { isbnLookupVariants } from "../domain/isbn.js";
import type { HardcoverGraphqlClient } from "./graphql-client.js";
import {
  Rules,
  extractBookKey,
  extractNumber,
  extractText,
  getPath,
  isJsonObject,
  unwrapJsonString,
  withSource,
} from "./extraction.js";
import {
  ADD_BOOK_TO_LIST,
  BOOK_BY_ISBN,
  BOOK_BY_TITLE,
  LISTS_WITH_BOOK,
  SEARCH_BY_ISBN,
  WANT_TO_READ_VARIANTS,
  type QueryVariant,
} from "./queries.js";

export const HARDCOVER_SOURCE = "hardcover";

/** Hardcover operations the core depends on. */
export interface HardcoverApi {
  readonly isConfigured: boolean;
  assertConfigured(): void;
  findBookByTitle(title: string, signal?: AbortSignal): Promise<HardcoverBookRef | null>;
  findBookByIsbn(isbns: string[], signal?: AbortSignal): Promise<HardcoverBookRef | null>;
  fetchListsContainingBook(
    bookId: string,
    listLimit: number,
    itemLimit: number,
    signal?: AbortSignal,
  ): Promise<ListHit[]>;
  searchByIsbn(isbn: string, signal?: AbortSignal): Promise<HardcoverBookRef[]>;
  fetchWantToRead(signal?: AbortSignal): Promise<WantToReadResult>;
  addBookToList(bookId: number, listId: number, signal?: AbortSignal): Promise<void>;
}

export interface WantToReadResult {
  /** Name of the query variant that answered. */
  variant: string | null;
  books: JsonObject[];
}

// ── Payload helpers ─────────────────────────────────────────────────────────

function asArray(value: JsonValue | undefined): JsonValue[] {
  const unwrapped = unwrapJsonString(value);
  return Array.isArray(unwrapped) ? unwrapped : [];
}

function toBookRef(book: JsonValue | undefined): HardcoverBookRef | null {
  if (!isJsonObject(book)) return null;
  const id = extractText(book, Rules.bookId);
  if (id === null) return null;
  return {
    id,
    title: extractText(book, Rules.title),
    slug: extractText(book, Rules.slug),
    book,
  };
}

function toNeighbor(book: JsonObject): ListNeighbor {
  return {
    key: extractBookKey(book),
    title: extractText(book, Rules.title),
    rating: extractNumber(book, Rules.rating),
    book: withSource(book, HARDCOVER_SOURCE),
  };
}

/** `list_books[].list` entries → list hits with their neighbouring books. */
export function parseListHits(data: JsonObject): ListHit[] {
  const hits: ListHit[] = [];
  for (const item of asArray(data["list_books"])) {
    const list = getPath(item, ["list"]);
    if (!isJsonObject(list)) continue;

    const neighbors: ListNeighbor[] = [];
    for (const entry of asArray(list["list_books"])) {
      const book = getPath(entry, ["book"]);
      if (isJsonObject(book)) neighbors.push(toNeighbor(book));
    }

    hits.push({
      listId: extractText(list, Rules.bookId),
      listName: extractText(list, { name: "listName", paths: [["name"]] }),
      listSlug: extractText(list, Rules.slug),
      ownerName: extractText(list, Rules.listOwner),
      neighbors,
    });
  }
  return hits;
}

function parseBookId(bookId: string): number | null {
  return /^\d+$/.test(bookId) ? Number(bookId) : null;
}

// ── Implementation ──────────────────────────────────────────────────────────

export class HardcoverGraphqlApi implements HardcoverApi {
  constructor(
    private readonly client: HardcoverGraphqlClient,
    private readonly config: Pick<HardcoverConfig, "lookupTimeoutMs" | "listTimeoutMs">,
    private readonly logger: pino.Logger,
  ) {}

  get isConfigured(): boolean {
    return this.client.isConfigured;
  }

  assertConfigured(): void {
    this.client.assertConfigured();
  }

  async findBookByTitle(title: string, signal?: AbortSignal): Promise<HardcoverBookRef | null> {
    const trimmed = title.trim();
    if (!trimmed) return null;
    const data = await this.client.query(
      "BookByTitle",
      BOOK_BY_TITLE,
      { title: trimmed },
      { timeoutMs: this.config.lookupTimeoutMs, signal },
    );
    return toBookRef(asArray(data["books"])[0]);
  }

  async findBookByIsbn(isbns: string[], signal?: AbortSignal): Promise<HardcoverBookRef | null> {
    const variants = isbnLookupVariants(isbns);
    if (variants.length === 0) return null;
    const data = await this.client.query(
      "BookByIsbn",
      BOOK_BY_ISBN,
      { isbns: variants },
      { timeoutMs: this.config.lookupTimeoutMs, signal },
    );
    return toBookRef(asArray(data["books"])[0]);
  }

  async fetchListsContainingBook(
    bookId: string,
    listLimit: number,
    itemLimit: number,
    signal?: AbortSignal,
  ): Promise<ListHit[]> {
    const numericId = parseBookId(bookId);
    if (numericId === null) return [];
    const data = await this.client.query(
      "ListsWithBook",
      LISTS_WITH_BOOK,
      { bookId: numericId, listLimit, itemLimit },
      { timeoutMs: this.config.listTimeoutMs, signal },
    );
    return parseListHits(data);
  }

  async searchByIsbn(isbn: string, signal?: AbortSignal): Promise<HardcoverBookRef[]> {
    const data = await this.client.query(
      "SearchByIsbn",
      SEARCH_BY_ISBN,
      { query: isbn, perPage: 5, page: 1 },
      { timeoutMs: this.config.lookupTimeoutMs, signal },
    );
    return asArray(getPath(data, ["search", "results", "hits"]))
      .map((hit) => toBookRef(getPath(hit, ["document"])))
      .filter((ref): ref is HardcoverBookRef => ref !== null);
  }

  /**
   * Try each want-to-read query variant in order; the first that answers
   * without errors and with rows wins. Variants rejected by the schema are
   * skipped; rate limits and missing configuration stop the lookup.
   */
  async fetchWantToRead(signal?: AbortSignal): Promise<WantToReadResult> {
    let lastError: unknown = null;
    let answered: QueryVariant | null = null;

    for (const variant of WANT_TO_READ_VARIANTS) {
      let data: JsonObject;
      try {
        data = await this.client.query("WantToRead", variant.document, {}, {
          timeoutMs: this.config.listTimeoutMs,
          signal,
        });
      } catch (err) {
        if (err instanceof HardcoverRateLimitError || err instanceof NotConfiguredError) throw err;
        if (signal?.aborted) throw err;
        this.logger.debug({ variant: variant.name, err }, "want-to-read variant rejected");
        lastError = err;
        continue;
      }

      answered ??= variant;
      const books = asArray(getPath(data, variant.rowsPath))
        .map((row) => getPath(row, ["book"]))
        .filter((book): book is JsonObject => isJsonObject(book));
      if (books.length > 0) {
        return { variant: variant.name, books };
      }
    }

    if (answered === null && lastError !== null) throw lastError;
    return { variant: answered?.name ?? null, books: [] };
  }

  async addBookToList(bookId: number, listId: number, signal?: AbortSignal): Promise<void> {
    const data = await this.client.query(
      "AddBookToList",
      ADD_BOOK_TO_LIST,
      { bookId, listId },
      { timeoutMs: this.config.lookupTimeoutMs, signal },
    );
    if (!isJsonObject(data["insert_list_book"])) {
      throw new HardcoverUpstreamError("Hardcover did not confirm the list insert", "AddBookToList");
    }
  }
}
