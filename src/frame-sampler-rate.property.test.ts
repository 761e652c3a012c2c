// Property-based tests: the frame sampler never selects two frames closer
// than the configured interval, and never leaves an interval-sized gap unsampled.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameSampler } from "./frame-sampler.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Intervals used by the diagnosis profiles and a little beyond. */
const arbitraryIntervalMs = (): fc.Arbitrary<number> => fc.integer({ min: 100, max: 3000 });

/** Sorted, unique timestamps simulating frame arrival over up to 30 seconds. */
const arbitraryMonotonicTimestamps = (): fc.Arbitrary<number[]> =>
  fc
    .array(fc.double({ min: 0, max: 30, noNaN: true, noDefaultInfinity: true }), {
      minLength: 2,
      maxLength: 200,
    })
    .map((arr) => {
      const sorted = [...new Set(arr)].sort((a, b) => a - b);
      return sorted.length >= 2 ? sorted : [0, 1];
    });

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("FrameSampler properties", () => {
  it("consecutive sampled frames are at least one interval apart", () => {
    fc.assert(
      fc.property(arbitraryIntervalMs(), arbitraryMonotonicTimestamps(), (intervalMs, timestamps) => {
        const sampler = new FrameSampler(intervalMs);
        const sampled = timestamps.filter((t) => sampler.shouldSample(t));
        for (let i = 1; i < sampled.length; i++) {
          expect(sampled[i] - sampled[i - 1]).toBeGreaterThanOrEqual(intervalMs / 1000 - 1e-9);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("the first frame is always sampled", () => {
    fc.assert(
      fc.property(arbitraryIntervalMs(), arbitraryMonotonicTimestamps(), (intervalMs, timestamps) => {
        const sampler = new FrameSampler(intervalMs);
        expect(sampler.shouldSample(timestamps[0])).toBe(true);
      }),
      { numRuns: 100 },
    );
  });

  it("a skipped frame always lies within one interval of the last sampled frame", () => {
    fc.assert(
      fc.property(arbitraryIntervalMs(), arbitraryMonotonicTimestamps(), (intervalMs, timestamps) => {
        const sampler = new FrameSampler(intervalMs);
        let last = -Infinity;
        for (const t of timestamps) {
          if (sampler.shouldSample(t)) {
            last = t;
          } else {
            expect(t - last).toBeLessThan(intervalMs / 1000);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});
