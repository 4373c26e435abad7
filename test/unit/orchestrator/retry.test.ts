// ---------------------------------------------------------------------------
// Tests for the retry / exponential-backoff logic and the rate-limit cooldown.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { sleep, withRateLimitRetry, withRetry } from "../../../src/orchestrator/retry.js";
import {
  HardcoverParseError,
  HardcoverRateLimitError,
  HardcoverTimeoutError,
  HardcoverUpstreamError,
  NotConfiguredError,
} from "../../../src/core/errors.js";

const OP = "BookByTitle";

/**
 * Create a function that throws on the first N calls and then resolves.
 * Using async functions with `throw` (not `Promise.reject`) avoids
 * unhandled-rejection warnings in vitest.
 */
function failThenSucceed(
  error: Error,
  failCount: number,
  successValue: string = "ok",
): () => Promise<string> {
  let calls = 0;
  return async () => {
    calls++;
    if (calls <= failCount) throw error;
    return successValue;
  };
}

/** Create a function that always throws the given error. */
function alwaysFail(error: Error): () => Promise<string> {
  return async () => {
    throw error;
  };
}

/**
 * Helper that calls withRetry expecting failure, advances all fake timers,
 * and returns the caught error.
 */
async function expectRetryFailure(
  fn: () => Promise<string>,
  options: Parameters<typeof withRetry>[1],
): Promise<unknown> {
  let caughtError: unknown;
  const promise = withRetry(fn, options).catch((e: unknown) => {
    caughtError = e;
  });
  await vi.runAllTimersAsync();
  await promise;
  return caughtError;
}

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ── Successful calls ──────────────────────────────────────────────────

  it("returns the result when the function succeeds on the first call", async () => {
    const fn = vi.fn(async () => "ok");
    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 100 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Retries on transient errors ───────────────────────────────────────

  it("retries on HardcoverTimeoutError", async () => {
    const fn = vi.fn(failThenSucceed(new HardcoverTimeoutError(OP, 8_000), 1, "recovered"));

    const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 10 });
    await vi.runAllTimersAsync();

    expect(await promise).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries 5xx and connection failures", async () => {
    const fn = vi.fn(failThenSucceed(new HardcoverUpstreamError("bad gateway", OP, 502), 1));
    const connection = vi.fn(failThenSucceed(new HardcoverUpstreamError("reset", OP, null), 1));

    const first = withRetry(fn, { maxRetries: 2, baseDelayMs: 10 });
    const second = withRetry(connection, { maxRetries: 2, baseDelayMs: 10 });
    await vi.runAllTimersAsync();

    expect(await first).toBe("ok");
    expect(await second).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(connection).toHaveBeenCalledTimes(2);
  });

  // ── Stops after max retries ───────────────────────────────────────────

  it("throws after exhausting all retries", async () => {
    const fn = vi.fn(alwaysFail(new HardcoverTimeoutError(OP, 8_000)));

    const err = await expectRetryFailure(fn, { maxRetries: 2, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(HardcoverTimeoutError);
    // initial call + 2 retries = 3
    expect(fn).toHaveBeenCalledTimes(3);
  });

  // ── Non-retryable errors ──────────────────────────────────────────────

  it.each([
    ["a 4xx upstream error", new HardcoverUpstreamError("bad request", OP, 400)],
    ["a rate limit", new HardcoverRateLimitError("rate limited", OP)],
    ["a parse error", new HardcoverParseError("bad json", OP)],
    ["missing configuration", new NotConfiguredError("no key", "HARDCOVER_API_KEY")],
    ["an unknown error", new Error("mysterious")],
  ])("does not retry %s", async (_label, error) => {
    const fn = vi.fn(alwaysFail(error));

    const err = await expectRetryFailure(fn, { maxRetries: 5, baseDelayMs: 10 });

    expect(err).toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Hooks ─────────────────────────────────────────────────────────────

  it("reports each retry with its attempt number and delay", async () => {
    const error = new HardcoverTimeoutError(OP, 8_000);
    const onRetry = vi.fn();
    const wait = vi.fn(async () => undefined);

    const result = await withRetry(failThenSucceed(error, 2), {
      maxRetries: 3,
      baseDelayMs: 10,
      delayFor: (attempt) => (attempt + 1) * 100,
      onRetry,
      sleep: wait,
    });

    expect(result).toBe("ok");
    expect(onRetry.mock.calls).toEqual([
      [1, 100, error],
      [2, 200, error],
    ]);
    expect(wait.mock.calls).toEqual([
      [100, undefined],
      [200, undefined],
    ]);
  });

  it("uses a custom shouldRetry predicate when provided", async () => {
    const fn = vi.fn(failThenSucceed(new Error("custom transient"), 1));

    const promise = withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      shouldRetry: (error) => error instanceof Error && error.message === "custom transient",
    });
    await vi.runAllTimersAsync();

    expect(await promise).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry once the signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(alwaysFail(new HardcoverTimeoutError(OP, 8_000)));

    const err = await expectRetryFailure(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      signal: controller.signal,
    });

    expect(err).toBeInstanceOf(HardcoverTimeoutError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withRateLimitRetry", () => {
  it("waits the cooldown and tries exactly once more", async () => {
    const wait = vi.fn(async () => undefined);
    const fn = vi.fn(failThenSucceed(new HardcoverRateLimitError("rate limited", OP), 1));

    expect(await withRateLimitRetry(fn, { cooldownMs: 20_000, sleep: wait })).toBe("ok");
    expect(wait).toHaveBeenCalledWith(20_000, undefined);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("waits for Retry-After when it is longer than the cooldown", async () => {
    const wait = vi.fn(async () => undefined);
    const fn = failThenSucceed(new HardcoverRateLimitError("rate limited", OP, 45_000), 1);

    await withRateLimitRetry(fn, { cooldownMs: 20_000, sleep: wait });
    expect(wait).toHaveBeenCalledWith(45_000, undefined);
  });

  it("keeps the cooldown when Retry-After is shorter", async () => {
    const wait = vi.fn(async () => undefined);
    const fn = failThenSucceed(new HardcoverRateLimitError("rate limited", OP, 1_000), 1);

    await withRateLimitRetry(fn, { cooldownMs: 20_000, sleep: wait });
    expect(wait).toHaveBeenCalledWith(20_000, undefined);
  });

  it("gives up after the second rate limit", async () => {
    const wait = vi.fn(async () => undefined);
    const fn = vi.fn(alwaysFail(new HardcoverRateLimitError("rate limited", OP)));

    await expect(withRateLimitRetry(fn, { cooldownMs: 10, sleep: wait })).rejects.toBeInstanceOf(
      HardcoverRateLimitError,
    );
    expect(fn).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it("does not retry other failures", async () => {
    const wait = vi.fn(async () => undefined);
    const fn = vi.fn(alwaysFail(new HardcoverTimeoutError(OP, 30_000)));

    await expect(withRateLimitRetry(fn, { cooldownMs: 10, sleep: wait })).rejects.toBeInstanceOf(
      HardcoverTimeoutError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the given delay", async () => {
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects with the abort reason when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal).catch((e: unknown) => e);

    controller.abort(new Error("stopped"));
    expect(await pending).toEqual(new Error("stopped"));
  });

  it("rejects at once for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stopped"));

    await expect(sleep(1_000, controller.signal)).rejects.toThrow("stopped");
  });
});
