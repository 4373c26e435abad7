// ---------------------------------------------------------------------------
// Minimal GraphQL-over-HTTP client for the Hardcover API.
// Every failure surfaces as a typed HardcoverError subclass.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { HardcoverConfig, JsonObject, JsonValue } from "../core/types.js";
import {
  HardcoverParseError,
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  HardcoverUpstreamError,
  NotConfiguredError,
  isAbortError,
} from "../core/errors.js";
import { isJsonObject } from "./extraction.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface QueryOptions {
  timeoutMs: number;
  /** Caller cancellation; an abort is rethrown as-is, never wrapped. */
  signal?: AbortSignal;
}

export const API_KEY_SETTING = "HARDCOVER_API_KEY";

/** Longest upstream body excerpt carried in an error message. */
const BODY_EXCERPT_LENGTH = 300;

/** Parse `Retry-After` (seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

export class HardcoverGraphqlClient {
  constructor(
    private readonly config: Pick<HardcoverConfig, "endpoint" | "apiKey">,
    private readonly logger: pino.Logger,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init),
  ) {}

  get isConfigured(): boolean {
    return this.config.apiKey !== null;
  }

  /** Throws {@link NotConfiguredError} when no API key is set. */
  assertConfigured(): void {
    if (!this.config.apiKey) {
      throw new NotConfiguredError(
        `Hardcover API key not configured. Set ${API_KEY_SETTING}.`,
        API_KEY_SETTING,
      );
    }
  }

  /**
   * Run one GraphQL operation and return its `data` object.
   *
   * A 429 becomes {@link HardcoverRateLimitError}; any other non-2xx or a
   * non-empty `errors` array becomes {@link HardcoverUpstreamError}.
   */
  async query(
    operation: string,
    document: string,
    variables: Record<string, JsonValue>,
    options: QueryOptions,
  ): Promise<JsonObject> {
    this.assertConfigured();
    const apiKey = this.config.apiKey ?? "";
    const authorization = /^bearer\s/i.test(apiKey) ? apiKey : `Bearer ${apiKey}`;

    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;
    const start = performance.now();

    let response: Response;
    try {
      response = await this.fetchFn(this.config.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          authorization,
        },
        body: JSON.stringify({ query: document, variables }),
        signal,
      });
    } catch (error: unknown) {
      if (options.signal?.aborted) throw error;
      if (timeout.aborted || isAbortError(error)) {
        throw new HardcoverTimeoutError(operation, options.timeoutMs, { cause: error });
      }
      throw new HardcoverUpstreamError(
        `Network error calling Hardcover ${operation}: ${error instanceof Error ? error.message : String(error)}`,
        operation,
        null,
        { cause: error },
      );
    }

    const durationMs = Math.round(performance.now() - start);

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      this.logger.warn({ operation, durationMs, retryAfterMs }, "hardcover rate limited");
      throw new HardcoverRateLimitError(
        `Hardcover rate limit hit during ${operation}`,
        operation,
        retryAfterMs,
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error: unknown) {
      if (options.signal?.aborted) throw error;
      throw new HardcoverTimeoutError(operation, options.timeoutMs, { cause: error });
    }

    if (!response.ok) {
      this.logger.warn({ operation, status: response.status, durationMs }, "hardcover request failed");
      throw new HardcoverUpstreamError(
        `Hardcover ${operation} returned ${response.status}: ${text.slice(0, BODY_EXCERPT_LENGTH)}`,
        operation,
        response.status,
      );
    }

    let body: JsonValue;
    try {
      body = JSON.parse(text);
    } catch (error: unknown) {
      throw new HardcoverParseError(`Hardcover ${operation} returned invalid JSON`, operation, {
        cause: error,
      });
    }

    if (!isJsonObject(body)) {
      throw new HardcoverParseError(`Hardcover ${operation} returned a non-object body`, operation);
    }

    const errors = body["errors"];
    if (Array.isArray(errors) && errors.length > 0) {
      const detail = JSON.stringify(errors).slice(0, BODY_EXCERPT_LENGTH);
      this.logger.warn({ operation, durationMs, errors: detail }, "hardcover graphql errors");
      throw new HardcoverUpstreamError(`Hardcover ${operation} GraphQL errors: ${detail}`, operation, response.status);
    }

    const data = body["data"];
    if (!isJsonObject(data)) {
      throw new HardcoverParseError(`Hardcover ${operation} response has no data`, operation);
    }

    this.logger.debug({ operation, durationMs }, "hardcover query completed");
    return data;
  }
}

