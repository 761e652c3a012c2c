// Retry and timeout helpers for network-bound calls and model inference.

import { TimeoutError } from "../errors.js";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  /** Injected for tests; defaults to a setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  factor: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before retry number `attempt` (1-based): base * factor^(attempt-1). */
export function backoffDelay(attempt: number, baseDelayMs: number, factor: number): number {
  return baseDelayMs * Math.pow(factor, attempt - 1);
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Runs `fn` until it resolves or `maxAttempts` is reached, sleeping with
 * exponential backoff between attempts. Rejects with the last error, which
 * carries the attempt count through `RetryExhaustedError`.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      lastError = err;
      if (attempt < maxAttempts) {
        const delay = backoffDelay(attempt, options.baseDelayMs, options.factor);
        options.onRetry?.(attempt, err, delay);
        await wait(delay);
      }
    }
  }

  throw new RetryExhaustedError(lastError, maxAttempts);
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(lastError: unknown, attempts: number) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Failed after ${attempts} attempt(s): ${reason}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Races a promise against a timer. The timer is always cleared so nothing is
 * left pending once the race settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
  });
}
