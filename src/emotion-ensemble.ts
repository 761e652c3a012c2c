/**
 * EnsembleScorer: fuses the outputs of several emotion classifiers into one
 * calibrated distribution, with a deterministic image-statistics fallback.
 *
 * Per image: every model gets its own preprocessed tensor and runs
 * concurrently under a timeout. Failed, timed-out or malformed outputs are
 * excluded from that image only; the surviving weights are renormalized,
 * averaged, Laplace-smoothed and renormalized again. No survivors (or no
 * models at all) means the fallback heuristic answers.
 */

import {
  EMOTION_LABELS,
  type EmotionDistribution,
  type EmotionLabel,
  type EnsembleConfig,
  type ImageFrame,
  type LoadedModel,
  type Logger,
  type PredictionSource,
} from "./types.js";
import { imageStatistics, preprocessFace, type ImageStatistics } from "./image-preprocessing.js";
import { withTimeout } from "./utils/retry.js";
import { createConsoleLogger } from "./utils.js";
import { errorMessage } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Blend factor toward the uniform distribution. */
export const SMOOTHING_EPSILON = 0.05;

export const DEFAULT_MODEL_TIMEOUT_MS = 2000;

const SUM_TOLERANCE = 1e-6;

/**
 * Fallback heuristic thresholds, checked in order. Confidences stay at or
 * below FALLBACK_MAX_CONFIDENCE so downstream consumers see reduced trust.
 */
export const FALLBACK_THRESHOLDS = {
  darkMean: 80,
  flatStd: 20,
  brightMean: 180,
  edgeMean: 50,
} as const;

export const FALLBACK_CONFIDENCE = {
  dark: 0.3,
  flat: 0.4,
  bright: 0.35,
  edgy: 0.4,
  plain: 0.3,
} as const;

export const FALLBACK_MAX_CONFIDENCE = 0.4;

// ─── Distribution helpers ───────────────────────────────────────────────────────

export function uniformVector(): number[] {
  return EMOTION_LABELS.map(() => 1 / EMOTION_LABELS.length);
}

export function toDistribution(vector: readonly number[]): EmotionDistribution {
  return {
    Angry: vector[0],
    Disgust: vector[1],
    Fear: vector[2],
    Happy: vector[3],
    Sad: vector[4],
    Surprise: vector[5],
    Neutral: vector[6],
  };
}

export function toVector(distribution: EmotionDistribution): number[] {
  return EMOTION_LABELS.map((label) => distribution[label]);
}

/** Index of the largest value; the first index wins ties. */
export function argMax(vector: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < vector.length; i++) {
    if (vector[i] > vector[best]) best = i;
  }
  return best;
}

/** Scale non-negative weights to sum to 1. An all-zero or empty input returns []. */
export function normalizeWeights(weights: readonly number[]): number[] {
  const total = weights.reduce((a, b) => a + b, 0);
  if (weights.length === 0 || total <= 0) return [];
  return weights.map((w) => w / total);
}

/**
 * Validate a raw classifier output and normalize it to sum to 1.
 * Returns null for the wrong length, non-finite or negative entries, or a zero sum.
 */
export function normalizeModelOutput(raw: unknown): number[] | null {
  if (!Array.isArray(raw) && !(raw instanceof Float32Array)) return null;
  const values: number[] = [];
  for (const v of raw) values.push(typeof v === "number" ? v : Number.NaN);
  if (values.length !== EMOTION_LABELS.length) return null;

  let sum = 0;
  for (const v of values) {
    if (!Number.isFinite(v) || v < 0) return null;
    sum += v;
  }
  if (sum <= 0) return null;
  return values.map((v) => v / sum);
}

/** avg' = (1 - ε)·avg + ε·uniform, renormalized. */
export function smoothVector(vector: readonly number[], epsilon: number = SMOOTHING_EPSILON): number[] {
  const uniform = 1 / vector.length;
  const smoothed = vector.map((v) => (1 - epsilon) * v + epsilon * uniform);
  const total = smoothed.reduce((a, b) => a + b, 0);
  return smoothed.map((v) => v / total);
}

/**
 * Weighted elementwise average of already-normalized vectors. Weights are
 * renormalized over the vectors actually supplied.
 */
export function fuseVectors(
  outputs: ReadonlyArray<{ vector: readonly number[]; weight: number }>,
  epsilon: number = SMOOTHING_EPSILON,
): number[] {
  const weights = normalizeWeights(outputs.map((o) => o.weight));
  if (weights.length === 0) {
    throw new Error("Cannot fuse an empty set of model outputs");
  }

  const avg = new Array<number>(EMOTION_LABELS.length).fill(0);
  outputs.forEach((output, i) => {
    for (let k = 0; k < avg.length; k++) avg[k] += weights[i] * output.vector[k];
  });
  return smoothVector(avg, epsilon);
}

export function isValidDistribution(distribution: EmotionDistribution): boolean {
  let sum = 0;
  for (const label of EMOTION_LABELS) {
    const v = distribution[label];
    if (!Number.isFinite(v) || v < 0) return false;
    sum += v;
  }
  return Math.abs(sum - 1) <= SUM_TOLERANCE;
}

// ─── Fallback ───────────────────────────────────────────────────────────────────

export interface LabeledConfidence {
  label: EmotionLabel;
  confidence: number;
}

/** Classify from image statistics alone. */
export function classifyFromStatistics(stats: ImageStatistics): LabeledConfidence {
  if (stats.meanIntensity < FALLBACK_THRESHOLDS.darkMean) {
    return { label: "Sad", confidence: FALLBACK_CONFIDENCE.dark };
  }
  if (stats.stdIntensity < FALLBACK_THRESHOLDS.flatStd) {
    return { label: "Neutral", confidence: FALLBACK_CONFIDENCE.flat };
  }
  if (stats.meanIntensity > FALLBACK_THRESHOLDS.brightMean) {
    return { label: "Happy", confidence: FALLBACK_CONFIDENCE.bright };
  }
  if (stats.edgeMean > FALLBACK_THRESHOLDS.edgeMean) {
    return { label: "Surprise", confidence: FALLBACK_CONFIDENCE.edgy };
  }
  return { label: "Neutral", confidence: FALLBACK_CONFIDENCE.plain };
}

/** `confidence` on the chosen label, the remainder spread evenly on the rest. */
export function fallbackVector(prediction: LabeledConfidence): number[] {
  const rest = (1 - prediction.confidence) / (EMOTION_LABELS.length - 1);
  return EMOTION_LABELS.map((label) => (label === prediction.label ? prediction.confidence : rest));
}

// ─── Scorer ─────────────────────────────────────────────────────────────────────

export interface EnsembleScorerOptions {
  modelTimeoutMs?: number;
  smoothingEpsilon?: number;
  logger?: Logger;
}

export interface EnsemblePrediction {
  label: EmotionLabel;
  confidence: number;
  distribution: EmotionDistribution;
  source: PredictionSource;
  modelsUsed: string[];
  failedModels: string[];
}

export class EnsembleScorer {
  private readonly config: EnsembleConfig;
  private readonly weights: number[];
  private readonly modelTimeoutMs: number;
  private readonly smoothingEpsilon: number;
  private readonly logger: Logger;
  private readonly failures: Map<string, number> = new Map();

  constructor(config: EnsembleConfig, options: EnsembleScorerOptions = {}) {
    this.config = config;
    this.weights = normalizeWeights(config.models.map((m) => m.descriptor.weight));
    this.modelTimeoutMs = options.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.smoothingEpsilon = options.smoothingEpsilon ?? SMOOTHING_EPSILON;
    this.logger = options.logger ?? createConsoleLogger("EnsembleScorer");
  }

  get modelCount(): number {
    return this.config.models.length;
  }

  /** Normalized configured weight per model name. */
  get modelWeights(): Record<string, number> {
    const out: Record<string, number> = {};
    this.config.models.forEach((m, i) => {
      out[m.descriptor.name] = this.weights[i];
    });
    return out;
  }

  /** Cumulative per-model inference failures since construction. */
  failureCounts(): Record<string, number> {
    return Object.fromEntries(this.failures);
  }

  async predict(faceImage: ImageFrame): Promise<LabeledConfidence> {
    const { label, confidence } = await this.score(faceImage);
    return { label, confidence };
  }

  async distribution(faceImage: ImageFrame): Promise<EmotionDistribution> {
    return (await this.score(faceImage)).distribution;
  }

  async score(faceImage: ImageFrame): Promise<EnsemblePrediction> {
    const settled = await Promise.allSettled(
      this.config.models.map((model) => this.runModel(model, faceImage)),
    );

    const outputs: Array<{ vector: number[]; weight: number }> = [];
    const modelsUsed: string[] = [];
    const failedModels: string[] = [];

    settled.forEach((result, i) => {
      const name = this.config.models[i].descriptor.name;
      if (result.status === "fulfilled") {
        outputs.push({ vector: result.value, weight: this.weights[i] });
        modelsUsed.push(name);
      } else {
        failedModels.push(name);
        this.failures.set(name, (this.failures.get(name) ?? 0) + 1);
        this.logger.warn(`Model ${name} excluded from prediction: ${errorMessage(result.reason)}`);
      }
    });

    if (outputs.length === 0) {
      const fallback = classifyFromStatistics(imageStatistics(faceImage));
      return {
        ...fallback,
        distribution: toDistribution(fallbackVector(fallback)),
        source: "fallback",
        modelsUsed,
        failedModels,
      };
    }

    const fused = fuseVectors(outputs, this.smoothingEpsilon);
    const idx = argMax(fused);
    return {
      label: EMOTION_LABELS[idx],
      confidence: fused[idx],
      distribution: toDistribution(fused),
      source: "ensemble",
      modelsUsed,
      failedModels,
    };
  }

  private async runModel(model: LoadedModel, faceImage: ImageFrame): Promise<number[]> {
    const name = model.descriptor.name;
    const inference = (async () => {
      const tensor = preprocessFace(faceImage, model.descriptor.inputShape);
      return model.classifier.predict(tensor);
    })();

    const raw = await withTimeout(inference, this.modelTimeoutMs, `Model ${name}`);
    const vector = normalizeModelOutput(raw);
    if (!vector) {
      throw new Error(`Model ${name} returned malformed output`);
    }
    return vector;
  }
}
