// Picks frames from the decoded stream at the session's sampling interval.
// The frame source may yield more frames than needed; the first frame of each
// interval window is kept.

/** Timestamps are derived as frameIndex / fps, so compare with a small slack. */
const TIMESTAMP_EPSILON = 1e-9;

export class FrameSampler {
  readonly intervalMs: number;
  private readonly windowSeconds: number;
  private previous: number = Number.NEGATIVE_INFINITY;

  constructor(intervalMs: number) {
    if (!(intervalMs > 0)) {
      throw new Error(`Sampling interval must be positive, got ${intervalMs}ms`);
    }
    this.intervalMs = intervalMs;
    this.windowSeconds = intervalMs / 1000;
  }

  /** True when `timestamp` (seconds) opens a new window; the first call always does. */
  shouldSample(timestamp: number): boolean {
    const elapsed = timestamp - this.previous;
    if (elapsed < this.windowSeconds - TIMESTAMP_EPSILON) return false;
    this.previous = timestamp;
    return true;
  }

  reset(): void {
    this.previous = Number.NEGATIVE_INFINITY;
  }
}
