import { describe, it, expect, vi, afterEach } from "vitest";
import { RetryExhaustedError, backoffDelay, withRetry, withTimeout } from "./retry.js";
import { TimeoutError } from "../errors.js";

afterEach(() => {
  vi.useRealTimers();
});

// ─── Backoff ────────────────────────────────────────────────────────────────────

describe("backoffDelay", () => {
  it("grows exponentially from the base delay", () => {
    expect(backoffDelay(1, 500, 2)).toBe(500);
    expect(backoffDelay(2, 500, 2)).toBe(1000);
    expect(backoffDelay(3, 500, 2)).toBe(2000);
  });
});

// ─── withRetry ──────────────────────────────────────────────────────────────────

describe("withRetry", () => {
  it("returns the first successful value with its attempt count", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const outcome = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 10, factor: 2, sleep: async () => {} });
    expect(outcome).toEqual({ value: "ok", attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries until success, sleeping with backoff in between", async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("503"))
      .mockRejectedValueOnce(new Error("503"))
      .mockResolvedValue("done");

    const outcome = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 100,
      factor: 2,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(outcome).toEqual({ value: "done", attempts: 3 });
    expect(sleeps).toEqual([100, 200]);
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue(1);
    await withRetry(fn, { maxAttempts: 2, baseDelayMs: 50, factor: 3, sleep: async () => {}, onRetry });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(50);
  });

  it("throws RetryExhaustedError carrying the attempts and last error", async () => {
    const last = new Error("still down");
    const fn = vi.fn().mockRejectedValueOnce(new Error("down")).mockRejectedValue(last);

    const err = await withRetry(fn, { maxAttempts: 2, baseDelayMs: 1, factor: 2, sleep: async () => {} }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(RetryExhaustedError);
    if (!(err instanceof RetryExhaustedError)) return;
    expect(err.attempts).toBe(2);
    expect(err.lastError).toBe(last);
    expect(err.message).toBe("Failed after 2 attempt(s): still down");
  });

  it("makes at least one attempt when maxAttempts is below 1", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("nope"));
    await expect(withRetry(fn, { maxAttempts: 0, baseDelayMs: 1, factor: 2 })).rejects.toThrow(
      "Failed after 1 attempt(s): nope",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

// ─── withTimeout ────────────────────────────────────────────────────────────────

describe("withTimeout", () => {
  it("resolves with the value when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "Model A")).resolves.toBe(42);
  });

  it("rejects with TimeoutError when the timer wins", async () => {
    vi.useFakeTimers();
    const never = new Promise<number>(() => {});
    const raced = withTimeout(never, 2000, "Model A");
    const assertion = expect(raced).rejects.toThrow(new TimeoutError("Model A timed out after 2000ms"));
    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
  });

  it("clears its timer once the race settles", async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve("fast"), 5000, "Model B");
    expect(vi.getTimerCount()).toBe(0);
  });
});
