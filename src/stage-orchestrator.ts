// Child Affect Analyzer - Stage Orchestrator
// Runs one analysis session through six sequential stages:
//   facial_analysis → confidence_filtering → audio_analysis →
//   generic_recommendations → contextual_recommendations → report_generation
//
// Every stage returns a tagged StageResult. A failed stage contributes its
// fallback value and a "<stage>: <reason>" entry in the session error list;
// later stages still run. Validation errors end the session before stage 1
// with a SessionFailure. A FatalEnvironmentError rejects the whole run.

import { v4 as uuidv4 } from "uuid";
import type {
  AnalysisRequest,
  AudioResult,
  ContextualRecommendations,
  EmotionStatistics,
  Logger,
  SessionConfig,
  SessionFailure,
  SessionOutcome,
  SessionResult,
  StageName,
  StageProgressEvent,
  StageResult,
  UserContext,
} from "./types.js";
import { FatalEnvironmentError, ValidationError, errorMessage } from "./errors.js";
import { resolveSessionConfig } from "./diagnosis-profiles.js";
import { validateVideoFile, type VideoValidationOptions } from "./input-validation.js";
import {
  DEFAULT_FRAME_CONCURRENCY,
  type FacialAnalysisOptions,
  type FacialAnalysisResult,
} from "./facial-analysis.js";
import {
  computeEmotionStatistics,
  emptyStatistics,
  filterByConfidence,
  type FilterResult,
} from "./emotion-statistics.js";
import { DEFAULT_TRANSCRIPTION_LANGUAGE, emptyAudioResult } from "./transcription-engine.js";
import {
  classifyCommunicationLevel,
  dedupe,
  type RecommendationEngine,
} from "./recommendation-engine.js";
import {
  DEFAULT_ALERT_THRESHOLDS,
  derivePriority,
  evaluateAlerts,
  type AlertThresholds,
} from "./alert-evaluator.js";
import { createConsoleLogger } from "./utils.js";

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface FacialStage {
  analyze(videoPath: string, options: FacialAnalysisOptions): Promise<FacialAnalysisResult>;
}

/** Audio extraction from the video container is external. */
export interface AudioExtractor {
  extract(videoPath: string): Promise<Buffer>;
}

export interface Transcriber {
  transcribe(audio: Buffer): Promise<AudioResult>;
}

export interface ContextualRecommender {
  getRecommendations(
    diagnosis: string | null,
    userContext: UserContext,
    emotionSummary: EmotionStatistics,
    audioSummary: AudioResult,
  ): Promise<ContextualRecommendations>;
}

export interface SessionStore {
  ensureStorage(): Promise<void>;
  writeReport(result: SessionResult): Promise<string>;
  writeRecord(result: SessionResult): Promise<string>;
}

export interface StageOrchestratorDeps {
  facialAnalyzer: FacialStage;
  audioExtractor: AudioExtractor;
  transcriber: Transcriber;
  recommendationEngine: RecommendationEngine;
  recommendationService: ContextualRecommender;
  store: SessionStore;
  logger?: Logger;
  alertThresholds?: AlertThresholds;
  frameConcurrency?: number;
  languageCode?: string;
  validation?: VideoValidationOptions;
  now?: () => Date;
}

export interface RunOptions {
  sessionId?: string;
  signal?: AbortSignal;
  onProgress?: (event: StageProgressEvent) => void;
}

const EMPTY_FACIAL_RESULT: FacialAnalysisResult = {
  frames: [],
  framesRead: 0,
  framesSampled: 0,
  framesFailed: 0,
  fallbackPredictions: 0,
  cancelled: false,
  cancelReason: null,
};

/** Value to carry forward from a stage, whichever way it ended. */
export function stageValue<T>(result: StageResult<T>): T {
  return result.ok ? result.value : result.fallback;
}

interface RunContext {
  sessionId: string;
  completedStages: StageName[];
  errors: string[];
  onProgress?: (event: StageProgressEvent) => void;
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class StageOrchestrator {
  private readonly deps: StageOrchestratorDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: StageOrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("StageOrchestrator");
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: AnalysisRequest, options: RunOptions = {}): Promise<SessionOutcome> {
    const sessionId = options.sessionId ?? uuidv4();
    const startedAt = this.now();

    try {
      await validateVideoFile(request.videoPath, this.deps.validation);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.logger.warn(`Session ${sessionId} rejected: ${err.message}`);
        const failure: SessionFailure = {
          sessionId,
          status: "failed",
          videoPath: request.videoPath,
          reason: err.message,
        };
        return failure;
      }
      throw err;
    }

    const config = resolveSessionConfig(request.diagnosis, request.overrides);
    const userContext = request.userContext ?? {};
    await this.deps.store.ensureStorage();

    this.logger.info(
      `Session ${sessionId} started (profile ${config.diagnosisCategory}, interval ${config.frameIntervalMs}ms, threshold ${config.confidenceThreshold})`,
    );

    const ctx: RunContext = {
      sessionId,
      completedStages: [],
      errors: [],
      onProgress: options.onProgress,
    };
    const languageCode = this.deps.languageCode ?? DEFAULT_TRANSCRIPTION_LANGUAGE;

    // 1. Facial analysis
    const facial = stageValue(
      await this.runStage(ctx, "facial_analysis", EMPTY_FACIAL_RESULT, () =>
        this.deps.facialAnalyzer.analyze(request.videoPath, {
          intervalMs: config.frameIntervalMs,
          maxFrames: config.maxFrames,
          concurrency: this.deps.frameConcurrency ?? DEFAULT_FRAME_CONCURRENCY,
          signal: options.signal,
        }),
      ),
    );

    // 2. Confidence filtering
    const emptyFilter: FilterResult = filterByConfidence([], config.confidenceThreshold);
    const filtering = stageValue(
      await this.runStage(
        ctx,
        "confidence_filtering",
        { filter: emptyFilter, statistics: emptyStatistics() },
        async () => {
          const filter = filterByConfidence(facial.frames, config.confidenceThreshold);
          return { filter, statistics: computeEmotionStatistics(facial.frames, filter) };
        },
      ),
    );
    const { statistics } = filtering;

    // 3. Audio analysis
    const audio = stageValue(
      await this.runStage(ctx, "audio_analysis", emptyAudioResult(languageCode), async () => {
        const buffer = await this.deps.audioExtractor.extract(request.videoPath);
        return this.deps.transcriber.transcribe(buffer);
      }),
    );

    // 4. Generic recommendations: emotions and audio only
    const generic = stageValue(
      await this.runStage<string[]>(ctx, "generic_recommendations", [], async () =>
        this.deps.recommendationEngine.generate({
          statistics,
          frames: filtering.filter.frames,
          audio,
          userContext,
        }),
      ),
    );

    // 5. Contextual recommendations
    const contextual = stageValue(
      await this.runStage<ContextualRecommendations | null>(
        ctx,
        "contextual_recommendations",
        null,
        () =>
          this.deps.recommendationService.getRecommendations(
            config.diagnosis,
            userContext,
            statistics,
            audio,
          ),
      ),
    );

    const recommendations = mergeRecommendations(
      generic,
      contextual,
      this.deps.recommendationEngine.defaultRecommendations,
    );

    const result: SessionResult = {
      sessionId,
      status: "completed",
      startedAt,
      finishedAt: null,
      videoPath: request.videoPath,
      config,
      frames: facial.frames,
      filteredFrames: filtering.filter.frames,
      statistics,
      audio,
      alerts: [],
      recommendations,
      contextualRecommendations: contextual,
      completedStages: ctx.completedStages,
      errors: ctx.errors,
      cancelled: facial.cancelled,
      priority: "normal",
      reportPath: null,
      recordPath: null,
    };

    // 6. Report generation; alerts are evaluated again afterwards in case the
    // report itself failed and pushed the error count over the threshold.
    this.applyAlerts(result, config);
    const reportPath = stageValue(
      await this.runStage<string | null>(ctx, "report_generation", null, () =>
        this.deps.store.writeReport(result),
      ),
    );
    result.reportPath = reportPath;
    this.applyAlerts(result, config);
    result.finishedAt = this.now();

    try {
      result.recordPath = await this.deps.store.writeRecord(result);
    } catch (err) {
      if (err instanceof FatalEnvironmentError) throw err;
      result.errors.push(`session_record: ${errorMessage(err)}`);
      this.logger.error(`Session ${sessionId} record not persisted: ${errorMessage(err)}`);
    }

    this.logger.info(
      `Session ${sessionId} completed: ${ctx.completedStages.length}/6 stages, ${ctx.errors.length} error(s), priority ${result.priority}`,
    );
    return result;
  }

  private applyAlerts(result: SessionResult, config: SessionConfig): void {
    const audio = result.audio ?? emptyAudioResult(this.deps.languageCode ?? DEFAULT_TRANSCRIPTION_LANGUAGE);
    result.alerts = evaluateAlerts(
      {
        statistics: result.statistics ?? emptyStatistics(),
        config,
        communicationLevel: classifyCommunicationLevel(audio.attemptCount, audio.wordCount),
        attemptCount: audio.attemptCount,
        stageErrorCount: result.errors.length,
      },
      this.deps.alertThresholds ?? DEFAULT_ALERT_THRESHOLDS,
      this.now,
    );
    result.priority = derivePriority(result.alerts);
  }

  private async runStage<T>(
    ctx: RunContext,
    stage: StageName,
    fallback: T,
    fn: () => Promise<T>,
  ): Promise<StageResult<T>> {
    this.emit(ctx, { sessionId: ctx.sessionId, stage, status: "started" });
    try {
      const value = await fn();
      ctx.completedStages.push(stage);
      this.emit(ctx, { sessionId: ctx.sessionId, stage, status: "completed" });
      return { ok: true, value };
    } catch (err) {
      if (err instanceof FatalEnvironmentError) throw err;
      const reason = errorMessage(err);
      ctx.errors.push(`${stage}: ${reason}`);
      this.logger.error(`Session ${ctx.sessionId} stage ${stage} failed: ${reason}`);
      this.emit(ctx, { sessionId: ctx.sessionId, stage, status: "failed", message: reason });
      return { ok: false, reason, fallback };
    }
  }

  /** Progress callbacks must not break the pipeline. */
  private emit(ctx: RunContext, event: StageProgressEvent): void {
    try {
      ctx.onProgress?.(event);
    } catch (err) {
      this.logger.warn(`Progress callback threw: ${errorMessage(err)}`);
    }
  }
}

/**
 * Rule-based recommendations followed by the contextual sections, deduplicated.
 * Falls back to the default list when nothing fired.
 */
export function mergeRecommendations(
  generic: readonly string[],
  contextual: ContextualRecommendations | null,
  defaults: readonly string[],
): string[] {
  const merged = dedupe([
    ...generic,
    ...(contextual?.diagnosisSpecific ?? []),
    ...(contextual?.emotional ?? []),
    ...(contextual?.communicative ?? []),
    ...(contextual?.general ?? []),
  ]);
  return merged.length > 0 ? merged : [...defaults];
}
