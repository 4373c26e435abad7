// ---------------------------------------------------------------------------
// Retry helpers: exponential backoff with jitter, and the fixed cooldown
// used when Hardcover answers 429.
// ---------------------------------------------------------------------------

import {
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  HardcoverUpstreamError,
} from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted the default policy is used:
   * - Retry: `HardcoverTimeoutError`, `HardcoverUpstreamError` without a 4xx status
   * - Do NOT retry: rate limits, parse errors, missing configuration
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Overrides the backoff computation. */
  delayFor?: (attempt: number, error: unknown) => number;
  /** Aborting stops the wait between attempts. */
  signal?: AbortSignal;
  /** Called before each wait, for logging. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: SleepFn;
}

// ── Default retry predicate ────────────────────────────────────────────────

function defaultShouldRetry(error: unknown): boolean {
  if (error instanceof HardcoverTimeoutError) return true;
  if (error instanceof HardcoverUpstreamError) {
    return error.status === null || error.status >= 500;
  }

  // Rate limits, parse errors and missing configuration are permanent here.
  return false;
}

// ── Delay helpers ──────────────────────────────────────────────────────────

/**
 * Compute the delay for a given attempt using exponential backoff with
 * full jitter (random value between 0 and the exponential ceiling).
 */
function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

/**
 * Resolve after `ms`, or reject with the signal's reason as soon as it aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted. If `true`, the function sleeps
 * before retrying up to `maxRetries` times. If all attempts are exhausted,
 * the last error is thrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    shouldRetry = defaultShouldRetry,
    delayFor = (attempt: number) => computeDelay(attempt, baseDelayMs),
    sleep: wait = sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!shouldRetry(error) || attempt >= maxRetries || options.signal?.aborted) {
        throw error;
      }
      const delay = delayFor(attempt, error);
      options.onRetry?.(attempt + 1, delay, error);
      await wait(delay, options.signal);
    }
  }
}

/**
 * Run `fn`; when it is rate limited, wait the cooldown (or the server's
 * Retry-After, whichever is longer) and try exactly once more.
 */
export function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  options: {
    cooldownMs: number;
    signal?: AbortSignal;
    sleep?: SleepFn;
    onRetry?: RetryOptions["onRetry"];
  },
): Promise<T> {
  return withRetry(fn, {
    maxRetries: 1,
    baseDelayMs: options.cooldownMs,
    shouldRetry: (error) => error instanceof HardcoverRateLimitError,
    delayFor: (_attempt, error) =>
      error instanceof HardcoverRateLimitError && error.retryAfterMs !== null
        ? Math.max(options.cooldownMs, error.retryAfterMs)
        : options.cooldownMs,
    signal: options.signal,
    sleep: options.sleep,
    onRetry: options.onRetry,
  });
}
