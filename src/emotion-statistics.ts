// Child Affect Analyzer - Emotion Statistics
// Confidence filtering and per-session aggregation over face detections.

import {
  EMOTION_LABELS,
  type ConfidenceSummary,
  type EmotionGroup,
  type EmotionLabel,
  type EmotionStatistics,
  type FrameResult,
} from "./types.js";
import { mean, median, roundMetric, stdDev } from "./utils.js";

// ─── Emotion groups ─────────────────────────────────────────────────────────────

export const NEGATIVE_EMOTIONS: ReadonlySet<EmotionLabel> = new Set<EmotionLabel>([
  "Sad",
  "Angry",
  "Fear",
  "Disgust",
]);

export const POSITIVE_EMOTIONS: ReadonlySet<EmotionLabel> = new Set<EmotionLabel>([
  "Happy",
  "Surprise",
]);

export function emotionGroup(label: EmotionLabel): EmotionGroup {
  if (NEGATIVE_EMOTIONS.has(label)) return "negative";
  if (POSITIVE_EMOTIONS.has(label)) return "positive";
  return "neutral";
}

function zeroCounts(): Record<EmotionLabel, number> {
  return {
    Angry: 0,
    Disgust: 0,
    Fear: 0,
    Happy: 0,
    Sad: 0,
    Surprise: 0,
    Neutral: 0,
  };
}

// ─── Filtering ──────────────────────────────────────────────────────────────────

export interface FilterResult {
  frames: FrameResult[];
  keptDetections: number;
  droppedDetections: number;
  framesExcluded: number;
}

/**
 * Keep detections with confidence >= threshold. Frames left without any
 * detection are excluded, though their drops still count.
 * Re-filtering the output with the same threshold changes nothing.
 */
export function filterByConfidence(frames: readonly FrameResult[], threshold: number): FilterResult {
  const kept: FrameResult[] = [];
  let keptDetections = 0;
  let droppedDetections = 0;
  let framesExcluded = 0;

  for (const frame of frames) {
    const detections = frame.detections.filter((d) => d.confidence >= threshold);
    droppedDetections += frame.detections.length - detections.length;
    keptDetections += detections.length;

    if (detections.length === 0) {
      framesExcluded++;
      continue;
    }
    kept.push({ frameId: frame.frameId, timestamp: frame.timestamp, detections });
  }

  return { frames: kept, keptDetections, droppedDetections, framesExcluded };
}

// ─── Aggregation ────────────────────────────────────────────────────────────────

export function summarizeConfidences(values: readonly number[]): ConfidenceSummary {
  return {
    mean: roundMetric(mean(values)),
    median: roundMetric(median(values)),
    stdDev: roundMetric(stdDev(values)),
    min: values.length > 0 ? roundMetric(Math.min(...values)) : 0,
    max: values.length > 0 ? roundMetric(Math.max(...values)) : 0,
  };
}

/**
 * Aggregate the filtered detections. `rawFrames` supplies the pre-filter
 * counts so dropped detections remain visible in the statistics.
 */
export function computeEmotionStatistics(
  rawFrames: readonly FrameResult[],
  filtered: FilterResult,
): EmotionStatistics {
  const counts = zeroCounts();
  const confidences = new Map<EmotionLabel, number[]>();

  for (const frame of filtered.frames) {
    for (const d of frame.detections) {
      counts[d.label]++;
      const list = confidences.get(d.label);
      if (list) list.push(d.confidence);
      else confidences.set(d.label, [d.confidence]);
    }
  }

  const total = filtered.keptDetections;
  let predominant: EmotionLabel | null = null;
  for (const label of EMOTION_LABELS) {
    if (counts[label] > 0 && (predominant === null || counts[label] > counts[predominant])) {
      predominant = label;
    }
  }

  const groupCounts: Record<EmotionGroup, number> = { positive: 0, negative: 0, neutral: 0 };
  for (const label of EMOTION_LABELS) {
    groupCounts[emotionGroup(label)] += counts[label];
  }

  const confidenceByEmotion: Partial<Record<EmotionLabel, ConfidenceSummary>> = {};
  for (const [label, values] of confidences) {
    confidenceByEmotion[label] = summarizeConfidences(values);
  }

  const rawDetections = rawFrames.reduce((acc, f) => acc + f.detections.length, 0);

  return {
    counts,
    groupCounts,
    totalDetections: total,
    rawDetections,
    droppedDetections: filtered.droppedDetections,
    framesAnalyzed: rawFrames.length,
    framesExcluded: filtered.framesExcluded,
    predominantEmotion: predominant,
    predominantPercentage: predominant !== null && total > 0 ? counts[predominant] / total : 0,
    confidenceByEmotion,
  };
}

/** Share of kept detections carrying `label`; 0 when nothing was kept. */
export function emotionShare(stats: EmotionStatistics, label: EmotionLabel): number {
  return stats.totalDetections > 0 ? stats.counts[label] / stats.totalDetections : 0;
}

export function emptyStatistics(): EmotionStatistics {
  return computeEmotionStatistics([], filterByConfidence([], 0));
}
