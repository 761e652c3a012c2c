// Property-based tests for confidence filtering and aggregation.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { computeEmotionStatistics, filterByConfidence } from "./emotion-statistics.js";
import { EMOTION_LABELS, type FaceDetection, type FrameResult } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryDetection = (frameId: number): fc.Arbitrary<FaceDetection> =>
  fc
    .record({
      label: fc.constantFrom(...EMOTION_LABELS),
      confidence: fc.double({ min: 0, max: 1, noNaN: true }),
    })
    .map(({ label, confidence }) => ({
      frameId,
      boundingBox: { x: 0, y: 0, width: 40, height: 40 },
      distribution: { Angry: 0, Disgust: 0, Fear: 0, Happy: 0, Sad: 0, Surprise: 0, Neutral: 0, [label]: confidence },
      label,
      confidence,
      qualityScore: 0.5,
      source: "ensemble" as const,
    }));

const arbitraryFrames = (): fc.Arbitrary<FrameResult[]> =>
  fc.integer({ min: 0, max: 30 }).chain((count) =>
    fc.tuple(
      ...Array.from({ length: count }, (_, frameId) =>
        fc
          .array(arbitraryDetection(frameId), { maxLength: 4 })
          .map((detections): FrameResult => ({ frameId, timestamp: frameId * 0.5, detections })),
      ),
    ),
  );

const arbitraryThreshold = (): fc.Arbitrary<number> => fc.double({ min: 0, max: 1, noNaN: true });

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("confidence filtering properties", () => {
  it("filtering twice with the same threshold changes nothing", () => {
    fc.assert(
      fc.property(arbitraryFrames(), arbitraryThreshold(), (frames, threshold) => {
        const once = filterByConfidence(frames, threshold);
        const twice = filterByConfidence(once.frames, threshold);
        expect(twice.frames).toEqual(once.frames);
        expect(twice.droppedDetections).toBe(0);
        expect(twice.framesExcluded).toBe(0);
      }),
      { numRuns: 200 },
    );
  });

  it("kept plus dropped equals the raw detection count", () => {
    fc.assert(
      fc.property(arbitraryFrames(), arbitraryThreshold(), (frames, threshold) => {
        const filtered = filterByConfidence(frames, threshold);
        const stats = computeEmotionStatistics(frames, filtered);
        expect(stats.totalDetections + stats.droppedDetections).toBe(stats.rawDetections);
      }),
      { numRuns: 200 },
    );
  });

  it("every kept detection meets the threshold and every kept frame is non-empty", () => {
    fc.assert(
      fc.property(arbitraryFrames(), arbitraryThreshold(), (frames, threshold) => {
        for (const frame of filterByConfidence(frames, threshold).frames) {
          expect(frame.detections.length).toBeGreaterThan(0);
          for (const d of frame.detections) expect(d.confidence).toBeGreaterThanOrEqual(threshold);
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("aggregation properties", () => {
  it("label counts and group counts both sum to the kept total", () => {
    fc.assert(
      fc.property(arbitraryFrames(), arbitraryThreshold(), (frames, threshold) => {
        const stats = computeEmotionStatistics(frames, filterByConfidence(frames, threshold));
        const labelSum = EMOTION_LABELS.reduce((acc, label) => acc + stats.counts[label], 0);
        const { positive, negative, neutral } = stats.groupCounts;
        expect(labelSum).toBe(stats.totalDetections);
        expect(positive + negative + neutral).toBe(stats.totalDetections);
      }),
      { numRuns: 200 },
    );
  });

  it("the predominant emotion has the highest count and its share is within [0, 1]", () => {
    fc.assert(
      fc.property(arbitraryFrames(), arbitraryThreshold(), (frames, threshold) => {
        const stats = computeEmotionStatistics(frames, filterByConfidence(frames, threshold));
        if (stats.predominantEmotion === null) {
          expect(stats.totalDetections).toBe(0);
          return;
        }
        const top = stats.counts[stats.predominantEmotion];
        for (const label of EMOTION_LABELS) expect(stats.counts[label]).toBeLessThanOrEqual(top);
        expect(stats.predominantPercentage).toBeGreaterThan(0);
        expect(stats.predominantPercentage).toBeLessThanOrEqual(1);
      }),
      { numRuns: 200 },
    );
  });
});
