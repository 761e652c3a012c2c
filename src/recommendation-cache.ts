// Child Affect Analyzer - Recommendation Cache
// TTL cache for contextual recommendation responses. Expiry is checked on
// read, and every write sweeps the expired entries first. getOrCompute()
// keeps at most one in-flight computation per key and never waits on other
// keys.

import { createHash } from "node:crypto";

export interface CacheEntry<V> {
  value: V;
  insertedAt: number; // epoch ms
}

export const DEFAULT_RECOMMENDATION_TTL_MS = 60 * 60 * 1000;

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number = DEFAULT_RECOMMENDATION_TTL_MS, now: () => number = Date.now) {
    if (!(ttlMs > 0)) {
      throw new Error(`Cache TTL must be positive, got ${ttlMs}ms`);
    }
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Fresh value for `key`, or undefined. A stale entry is evicted here. */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.prune(now);
    // Re-insert so map order stays the order of insertion times.
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: now });
  }

  /** Drops every expired entry and returns how many were removed. */
  prune(now: number = this.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.insertedAt < this.ttlMs) break;
      this.entries.delete(key);
      removed++;
    }
    return removed;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Cached value, or the result of `compute()`. Concurrent callers for the
   * same key share one computation; a rejected computation is not cached.
   */
  async getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = compute()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, task);
    return task;
  }
}

/**
 * SHA-256 digest of a JSON value with object keys sorted, so equal contexts
 * produce equal keys regardless of property order.
 */
export function digestKey(value: unknown): string {
  return createHash("sha256").update(stableStringify(value)).digest("hex");
}

export function stableStringify(value: unknown): string {
  if (value === undefined) return "null";
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  const keys = Object.keys(value).sort();
  const parts: string[] = [];
  for (const key of keys) {
    const item: unknown = Reflect.get(value, key);
    if (item === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${stableStringify(item)}`);
  }
  return `{${parts.join(",")}}`;
}
