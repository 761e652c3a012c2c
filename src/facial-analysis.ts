/**
 * FacialAnalyzer: facial-emotion stage of a session.
 * Pulls decoded frames from the external frame source, samples them at the
 * session interval, detects faces and scores every face through the ensemble.
 *
 * Frames are scored with bounded concurrency and re-sorted by frame id before
 * they are returned. Cancellation (abort signal or frame cap) stops reading
 * new frames; frames already scored are kept.
 */

import type {
  BoundingBox,
  FaceDetection,
  FrameResult,
  ImageFrame,
  Logger,
  SourceFrame,
} from "./types.js";
import type { EnsemblePrediction } from "./emotion-ensemble.js";
import { FrameSampler } from "./frame-sampler.js";
import { cropImage, imageStatistics } from "./image-preprocessing.js";
import { clamp01, createConsoleLogger, roundMetric } from "./utils.js";
import { errorMessage } from "./errors.js";

// ─── External capabilities ──────────────────────────────────────────────────────

/** Video decoding is external; sources may pre-thin frames using the interval hint. */
export interface FrameSource {
  frames(videoPath: string, intervalMs: number): AsyncIterable<SourceFrame>;
}

export interface FaceDetector {
  detectFaces(frame: ImageFrame): Promise<BoundingBox[]>;
}

/** Anything that scores a face crop; the EnsembleScorer in production. */
export interface FaceScorer {
  score(faceImage: ImageFrame): Promise<EnsemblePrediction>;
}

// ─── Face size policy ───────────────────────────────────────────────────────────

export interface FaceSizePolicy {
  minFaceSize: number; // px, both sides
  maxFaceFraction: number; // of frame area
}

export const DEFAULT_FACE_SIZE_POLICY: FaceSizePolicy = {
  minFaceSize: 30,
  maxFaceFraction: 0.9,
};

export function applyFaceSizePolicy(
  boxes: readonly BoundingBox[],
  frame: ImageFrame,
  policy: FaceSizePolicy = DEFAULT_FACE_SIZE_POLICY,
): BoundingBox[] {
  const frameArea = frame.width * frame.height;
  return boxes.filter(
    (b) =>
      b.width >= policy.minFaceSize &&
      b.height >= policy.minFaceSize &&
      (b.width * b.height) / frameArea <= policy.maxFaceFraction,
  );
}

// ─── Quality ────────────────────────────────────────────────────────────────────

/** Face area at which the size component saturates, as a fraction of the frame. */
const QUALITY_FULL_AREA_FRACTION = 0.1;
/** Mean Sobel response at which the sharpness component saturates. */
const QUALITY_FULL_EDGE_MEAN = 50;

/** Half size, half sharpness; 0.0-1.0. */
export function computeQualityScore(box: BoundingBox, frame: ImageFrame, edgeMean: number): number {
  const areaFraction = (box.width * box.height) / (frame.width * frame.height);
  const sizeScore = Math.min(1, areaFraction / QUALITY_FULL_AREA_FRACTION);
  const sharpness = Math.min(1, edgeMean / QUALITY_FULL_EDGE_MEAN);
  return roundMetric(clamp01(0.5 * sizeScore + 0.5 * sharpness));
}

// ─── Analyzer ───────────────────────────────────────────────────────────────────

export interface FacialAnalysisOptions {
  intervalMs: number;
  maxFrames?: number | null;
  concurrency?: number;
  signal?: AbortSignal;
  faceSizePolicy?: FaceSizePolicy;
}

export interface FacialAnalysisResult {
  frames: FrameResult[]; // sorted by frameId
  framesRead: number;
  framesSampled: number;
  framesFailed: number;
  fallbackPredictions: number;
  cancelled: boolean;
  cancelReason: "aborted" | "max_frames" | null;
}

export interface FacialAnalyzerDeps {
  frameSource: FrameSource;
  faceDetector: FaceDetector;
  scorer: FaceScorer;
  logger?: Logger;
}

export const DEFAULT_FRAME_CONCURRENCY = 4;

export class FacialAnalyzer {
  private readonly deps: FacialAnalyzerDeps;
  private readonly logger: Logger;

  constructor(deps: FacialAnalyzerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("FacialAnalyzer");
  }

  async analyze(videoPath: string, options: FacialAnalysisOptions): Promise<FacialAnalysisResult> {
    const sampler = new FrameSampler(options.intervalMs);
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_FRAME_CONCURRENCY);
    const maxFrames = options.maxFrames ?? null;
    const policy = options.faceSizePolicy ?? DEFAULT_FACE_SIZE_POLICY;

    const results: FrameResult[] = [];
    const inFlight = new Set<Promise<void>>();
    let framesRead = 0;
    let framesSampled = 0;
    let framesFailed = 0;
    let fallbackPredictions = 0;
    let cancelReason: FacialAnalysisResult["cancelReason"] = null;

    const track = (frame: SourceFrame): void => {
      const task: Promise<void> = this.scoreFrame(frame, policy)
        .then((result) => {
          results.push(result);
          fallbackPredictions += result.detections.filter((d) => d.source === "fallback").length;
        })
        .catch((err: unknown) => {
          framesFailed++;
          this.logger.warn(`Frame ${frame.frameId} skipped: ${errorMessage(err)}`);
        })
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);
    };

    try {
      for await (const frame of this.deps.frameSource.frames(videoPath, options.intervalMs)) {
        framesRead++;
        if (options.signal?.aborted) {
          cancelReason = "aborted";
          break;
        }
        if (!sampler.shouldSample(frame.timestamp)) continue;
        if (maxFrames !== null && framesSampled >= maxFrames) {
          cancelReason = "max_frames";
          break;
        }

        framesSampled++;
        track(frame);
        if (inFlight.size >= concurrency) {
          await Promise.race(inFlight);
        }
      }
    } finally {
      await Promise.allSettled([...inFlight]);
    }

    if (cancelReason) {
      this.logger.warn(
        `Facial analysis cancelled (${cancelReason}) after ${results.length} scored frame(s)`,
      );
    }

    results.sort((a, b) => a.frameId - b.frameId);
    return {
      frames: results,
      framesRead,
      framesSampled,
      framesFailed,
      fallbackPredictions,
      cancelled: cancelReason !== null,
      cancelReason,
    };
  }

  private async scoreFrame(frame: SourceFrame, policy: FaceSizePolicy): Promise<FrameResult> {
    const boxes = applyFaceSizePolicy(
      await this.deps.faceDetector.detectFaces(frame.image),
      frame.image,
      policy,
    );

    const detections: FaceDetection[] = [];
    for (const box of boxes) {
      const crop = cropImage(frame.image, box);
      const prediction = await this.deps.scorer.score(crop);
      const quality = computeQualityScore(box, frame.image, imageStatistics(crop).edgeMean);
      detections.push(
        Object.freeze({
          frameId: frame.frameId,
          boundingBox: Object.freeze({ ...box }),
          distribution: Object.freeze({ ...prediction.distribution }),
          label: prediction.label,
          confidence: prediction.confidence,
          qualityScore: quality,
          source: prediction.source,
        }),
      );
    }

    return { frameId: frame.frameId, timestamp: frame.timestamp, detections };
  }
}
