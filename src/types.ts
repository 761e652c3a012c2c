// Child Affect Analyzer - Shared TypeScript interfaces and types
// Data model shared by the scorer, the stage orchestrator and the
// recommendation engine. Runtime helpers live in their own modules.

// ─── Emotion Labels ─────────────────────────────────────────────────────────────

/** Fixed, ordered label set. Index order is the classifier output order. */
export const EMOTION_LABELS = [
  "Angry",
  "Disgust",
  "Fear",
  "Happy",
  "Sad",
  "Surprise",
  "Neutral",
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/** Probabilities per label. Non-negative, sums to 1 (±1e-6). */
export type EmotionDistribution = Record<EmotionLabel, number>;

export type EmotionGroup = "positive" | "negative" | "neutral";

export type PredictionSource = "ensemble" | "fallback";

// ─── Images and Tensors ─────────────────────────────────────────────────────────

/**
 * Decoded image. `data` is interleaved row-major; 3/4 channels are RGB(A),
 * 1 channel is already intensity.
 */
export interface ImageFrame {
  width: number;
  height: number;
  channels: 1 | 3 | 4;
  data: Uint8Array;
}

/** Single-channel float image, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Float32Array;
}

export interface Tensor {
  data: Float32Array;
  shape: number[];
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ─── Classifiers ────────────────────────────────────────────────────────────────

/** `[height, width]` or `[height, width, channels]`, without the batch dimension. */
export type InputShape = readonly [number, number] | readonly [number, number, number];

export interface ModelDescriptor {
  name: string;
  file: string;
  inputShape: InputShape;
  weight: number; // (0, 1]; renormalized over the loaded set
}

/**
 * Plug-in emotion classifier. Returns one raw score per label in
 * EMOTION_LABELS order; the scorer validates and normalizes the vector.
 */
export interface EmotionClassifier {
  readonly name: string;
  predict(input: Tensor): Promise<number[]> | number[];
}

export interface LoadedModel {
  descriptor: ModelDescriptor;
  classifier: EmotionClassifier;
}

/** Read-only for the process lifetime once loaded. */
export interface EnsembleConfig {
  readonly models: readonly LoadedModel[];
}

// ─── Detections and Frames ──────────────────────────────────────────────────────

export interface FaceDetection {
  readonly frameId: number;
  readonly boundingBox: BoundingBox;
  readonly distribution: EmotionDistribution;
  readonly label: EmotionLabel;
  readonly confidence: number; // probability of `label`
  readonly qualityScore: number; // 0.0-1.0
  readonly source: PredictionSource;
}

export interface FrameResult {
  frameId: number;
  timestamp: number; // seconds from video start
  detections: FaceDetection[]; // detection order within the frame
}

/** A decoded, timestamped frame as produced by the external frame source. */
export interface SourceFrame {
  frameId: number;
  timestamp: number;
  image: ImageFrame;
}

// ─── Diagnosis Profiles ─────────────────────────────────────────────────────────

export enum DiagnosisCategory {
  AUTISMO = "autismo",
  TDAH = "tdah",
  SINDROME_DOWN = "sindrome_down",
  PARALISIS_CEREBRAL = "paralisis_cerebral",
  DISCAPACIDAD_INTELECTUAL = "discapacidad_intelectual",
  TRASTORNO_LENGUAJE = "trastorno_lenguaje",
  DEFAULT = "default",
}

export interface DiagnosisProfile {
  frameIntervalMs: number;
  confidenceThreshold: number;
  priorityEmotions: EmotionLabel[];
  alertEmotions: EmotionLabel[];
}

/** Caller-supplied keys, applied verbatim with the highest precedence. */
export interface SessionConfigOverrides {
  frameIntervalMs?: number;
  confidenceThreshold?: number;
  priorityEmotions?: EmotionLabel[];
  alertEmotions?: EmotionLabel[];
  maxFrames?: number | null;
}

export interface SessionConfig extends DiagnosisProfile {
  diagnosis: string | null;
  diagnosisCategory: DiagnosisCategory;
  maxFrames: number | null;
}

// ─── Statistics ─────────────────────────────────────────────────────────────────

export interface ConfidenceSummary {
  mean: number;
  median: number;
  stdDev: number;
  min: number;
  max: number;
}

export interface EmotionStatistics {
  counts: Record<EmotionLabel, number>;
  groupCounts: Record<EmotionGroup, number>;
  totalDetections: number; // kept after confidence filtering
  rawDetections: number;
  droppedDetections: number;
  framesAnalyzed: number;
  framesExcluded: number; // frames with zero detections left after filtering
  predominantEmotion: EmotionLabel | null;
  predominantPercentage: number; // 0.0-1.0
  confidenceByEmotion: Partial<Record<EmotionLabel, ConfidenceSummary>>;
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

export type CommunicationQuality = "inaudible" | "muy_limitada" | "limitada" | "clara";

export interface TranscriptSegment {
  text: string;
  startTime: number; // seconds from audio start
  endTime: number;
}

export interface AudioSegmentResult {
  startTime: number;
  endTime: number;
  transcript: string;
  wordCount: number;
  quality: CommunicationQuality;
}

export interface AudioResult {
  transcript: string;
  words: string[];
  wordCount: number;
  attemptCount: number; // words longer than one character
  segments: AudioSegmentResult[];
  languageCode: string;
  provider: string | null;
  transcriptionAttempts: number;
}

// ─── Context Classification ─────────────────────────────────────────────────────

export type EmotionalPattern =
  | "predominio_negativo"
  | "predominio_positivo"
  | "predominio_neutral"
  | "equilibrado";

export type Stability = "alta" | "media" | "baja";
export type Variability = "baja" | "media" | "alta";

export interface EmotionalContext {
  pattern: EmotionalPattern;
  stability: Stability;
  variability: Variability;
  predominantEmotion: EmotionLabel | null;
  predominantShare: number;
  distinctEmotions: number;
  groupCounts: Record<EmotionGroup, number>;
}

export type CommunicationLevel =
  | "no_verbal"
  | "pre_verbal"
  | "verbal_emergente"
  | "verbal_funcional";

export type LanguageComplexity =
  | "sin_lenguaje"
  | "palabras_simples"
  | "frases_basicas"
  | "lenguaje_elaborado";

export interface CommunicativeContext {
  level: CommunicationLevel;
  clarity: CommunicationQuality;
  complexity: LanguageComplexity;
  vocabularyRatio: number;
  attemptCount: number;
  wordCount: number;
}

/** Free-form caregiver context passed to the contextual recommendation stage. */
export interface UserContext {
  ageYears?: number;
  setting?: string;
  notes?: string;
}

// ─── Alerts ─────────────────────────────────────────────────────────────────────

export type AlertType = "emotional" | "diagnosis_specific" | "communication" | "technical";
export type AlertLevel = "alto" | "medio" | "bajo";
export type SessionPriority = "critico" | "moderado" | "normal";

export interface Alert {
  readonly type: AlertType;
  readonly level: AlertLevel;
  readonly message: string;
  readonly recommendation: string;
  readonly timestamp: string; // ISO-8601
}

// ─── Recommendations ────────────────────────────────────────────────────────────

export interface ContextualRecommendations {
  source: "remote" | "local";
  general: string[];
  emotional: string[];
  communicative: string[];
  diagnosisSpecific: string[];
  activities: string[];
}

// ─── Stages ─────────────────────────────────────────────────────────────────────

export type StageName =
  | "facial_analysis"
  | "confidence_filtering"
  | "audio_analysis"
  | "generic_recommendations"
  | "contextual_recommendations"
  | "report_generation";

export const STAGE_ORDER: readonly StageName[] = [
  "facial_analysis",
  "confidence_filtering",
  "audio_analysis",
  "generic_recommendations",
  "contextual_recommendations",
  "report_generation",
];

/** Tagged stage outcome; a failed stage still carries the default value used downstream. */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string; fallback: T };

export type StageStatus = "started" | "completed" | "failed";

export interface StageProgressEvent {
  sessionId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface AnalysisRequest {
  videoPath: string;
  diagnosis?: string;
  userContext?: UserContext;
  overrides?: SessionConfigOverrides;
}

export interface SessionResult {
  sessionId: string;
  status: "completed";
  startedAt: Date;
  finishedAt: Date | null;
  videoPath: string;
  config: SessionConfig;
  frames: FrameResult[];
  filteredFrames: FrameResult[];
  statistics: EmotionStatistics | null;
  audio: AudioResult | null;
  alerts: Alert[];
  recommendations: string[];
  contextualRecommendations: ContextualRecommendations | null;
  completedStages: StageName[];
  errors: string[];
  cancelled: boolean;
  priority: SessionPriority;
  reportPath: string | null;
  recordPath: string | null;
}

export interface SessionFailure {
  sessionId: string;
  status: "failed";
  videoPath: string;
  reason: string;
}

export type SessionOutcome = SessionResult | SessionFailure;

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Server → Client messages
export type ServerMessage =
  | ({ type: "pipeline_progress" } & StageProgressEvent)
  | {
      type: "session_complete";
      sessionId: string;
      status: SessionOutcome["status"];
      priority?: SessionPriority;
    };
