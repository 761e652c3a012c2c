// Child Affect Analyzer - Recommendation Engine
// Classifies the emotional and communicative context of a session and fires
// four static rule tables over it. Texts live in data/recommendations.json,
// age-appropriate vocabulary in data/age-vocabulary.json.

import { readFileSync } from "node:fs";
import {
  DiagnosisCategory,
  EMOTION_LABELS,
  type AudioResult,
  type CommunicationLevel,
  type CommunicationQuality,
  type CommunicativeContext,
  type EmotionStatistics,
  type EmotionalContext,
  type EmotionalPattern,
  type FrameResult,
  type LanguageComplexity,
  type Stability,
  type UserContext,
  type Variability,
} from "./types.js";
import { matchDiagnosisCategory } from "./diagnosis-profiles.js";
import { foldText, roundMetric } from "./utils.js";

// ─── Thresholds ─────────────────────────────────────────────────────────────────

export const PATTERN_DOMINANCE_FACTOR = 1.5;
export const STABILITY_HIGH_SHARE = 0.6;
export const STABILITY_MEDIUM_SHARE = 0.4;

/** Sad detections above this confidence count toward the frequent-sadness rule. */
export const SADNESS_CONFIDENCE = 0.6;
/** More strong Sad detections than this fire the frequent-sadness rule. */
export const SADNESS_MIN_DETECTIONS = 5;
/** Fewer verbal attempts than this fire the verbal-stimulation rule. */
export const LOW_ATTEMPTS = 3;
/** Vocabulary ratio below this fires the vocabulary rule once there is speech. */
export const LOW_VOCABULARY_RATIO = 0.3;

// ─── Data files ─────────────────────────────────────────────────────────────────

export interface RecommendationCatalog {
  rules: Record<string, string[]>;
  default: string[];
  activities: Record<string, string[]>;
}

export interface VocabularyBand {
  minAge: number;
  maxAge: number;
  words: string[];
}

export interface AgeVocabulary {
  bands: VocabularyBand[];
  default: string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isStringListRecord(value: unknown): value is Record<string, string[]> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isStringArray)
  );
}

export function isRecommendationCatalog(value: unknown): value is RecommendationCatalog {
  return (
    typeof value === "object" &&
    value !== null &&
    "rules" in value &&
    "default" in value &&
    "activities" in value &&
    isStringListRecord(value.rules) &&
    isStringArray(value.default) &&
    value.default.length > 0 &&
    isStringListRecord(value.activities)
  );
}

function isVocabularyBand(value: unknown): value is VocabularyBand {
  return (
    typeof value === "object" &&
    value !== null &&
    "minAge" in value &&
    "maxAge" in value &&
    "words" in value &&
    typeof value.minAge === "number" &&
    typeof value.maxAge === "number" &&
    isStringArray(value.words)
  );
}

export function isAgeVocabulary(value: unknown): value is AgeVocabulary {
  return (
    typeof value === "object" &&
    value !== null &&
    "bands" in value &&
    "default" in value &&
    Array.isArray(value.bands) &&
    value.bands.every(isVocabularyBand) &&
    isStringArray(value.default)
  );
}

function readDataFile(name: string): unknown {
  const raw = readFileSync(new URL(`../data/${name}`, import.meta.url), "utf-8");
  return JSON.parse(raw);
}

export function loadRecommendationCatalog(): RecommendationCatalog {
  const data = readDataFile("recommendations.json");
  if (!isRecommendationCatalog(data)) {
    throw new Error("data/recommendations.json has an unexpected shape");
  }
  return data;
}

export function loadAgeVocabulary(): AgeVocabulary {
  const data = readDataFile("age-vocabulary.json");
  if (!isAgeVocabulary(data)) {
    throw new Error("data/age-vocabulary.json has an unexpected shape");
  }
  return data;
}

// ─── Context classification ─────────────────────────────────────────────────────

export function classifyEmotionalContext(stats: EmotionStatistics): EmotionalContext {
  const { positive, negative, neutral } = stats.groupCounts;

  let pattern: EmotionalPattern;
  if (negative > PATTERN_DOMINANCE_FACTOR * positive) pattern = "predominio_negativo";
  else if (positive > PATTERN_DOMINANCE_FACTOR * negative) pattern = "predominio_positivo";
  else if (neutral > positive + negative) pattern = "predominio_neutral";
  else pattern = "equilibrado";

  const share = stats.predominantPercentage;
  let stability: Stability;
  if (share > STABILITY_HIGH_SHARE) stability = "alta";
  else if (share > STABILITY_MEDIUM_SHARE) stability = "media";
  else stability = "baja";

  const distinct = EMOTION_LABELS.filter((label) => stats.counts[label] > 0).length;
  let variability: Variability;
  if (distinct <= 2) variability = "baja";
  else if (distinct <= 4) variability = "media";
  else variability = "alta";

  return {
    pattern,
    stability,
    variability,
    predominantEmotion: stats.predominantEmotion,
    predominantShare: share,
    distinctEmotions: distinct,
    groupCounts: { ...stats.groupCounts },
  };
}

export function classifyClarity(transcript: string): CommunicationQuality {
  const length = transcript.trim().length;
  if (length === 0) return "inaudible";
  if (length < 10) return "muy_limitada";
  if (length < 50) return "limitada";
  return "clara";
}

export function classifyCommunicationLevel(attempts: number, words: number): CommunicationLevel {
  if (attempts === 0 && words === 0) return "no_verbal";
  if (attempts < 3) return "pre_verbal";
  if (attempts < 8) return "verbal_emergente";
  return "verbal_funcional";
}

export function classifyComplexity(wordCount: number): LanguageComplexity {
  if (wordCount === 0) return "sin_lenguaje";
  if (wordCount < 5) return "palabras_simples";
  if (wordCount < 15) return "frases_basicas";
  return "lenguaje_elaborado";
}

/**
 * Word list of the band containing `ageYears`, or the default list. Bands are
 * in whole years, so a fractional age counts as its completed year.
 */
export function vocabularyForAge(vocabulary: AgeVocabulary, ageYears?: number): ReadonlySet<string> {
  const age = ageYears === undefined ? undefined : Math.floor(ageYears);
  const band = age === undefined ? undefined : vocabulary.bands.find((b) => age >= b.minAge && age <= b.maxAge);
  return new Set((band?.words ?? vocabulary.default).map(foldText));
}

function normalizeWord(word: string): string {
  return foldText(word).replace(/[^\p{L}\p{N}]/gu, "");
}

export function vocabularyRatio(words: readonly string[], known: ReadonlySet<string>): number {
  let appropriate = 0;
  for (const word of words) {
    if (known.has(normalizeWord(word))) appropriate++;
  }
  return roundMetric(appropriate / Math.max(words.length, 1));
}

export function classifyCommunicativeContext(
  audio: AudioResult,
  vocabulary: AgeVocabulary,
  ageYears?: number,
): CommunicativeContext {
  return {
    level: classifyCommunicationLevel(audio.attemptCount, audio.wordCount),
    clarity: classifyClarity(audio.transcript),
    complexity: classifyComplexity(audio.wordCount),
    vocabularyRatio: vocabularyRatio(audio.words, vocabularyForAge(vocabulary, ageYears)),
    attemptCount: audio.attemptCount,
    wordCount: audio.wordCount,
  };
}

// ─── Rule tables ────────────────────────────────────────────────────────────────

export interface RecommendationContext {
  diagnosisCategory: DiagnosisCategory;
  emotional: EmotionalContext;
  communicative: CommunicativeContext;
  strongSadDetections: number;
}

export interface RecommendationRule {
  id: string;
  when: (ctx: RecommendationContext) => boolean;
}

function diagnosisRule(category: DiagnosisCategory): RecommendationRule {
  return { id: `diagnosis.${category}`, when: (ctx) => ctx.diagnosisCategory === category };
}

export const DIAGNOSIS_RULES: readonly RecommendationRule[] = [
  diagnosisRule(DiagnosisCategory.AUTISMO),
  diagnosisRule(DiagnosisCategory.TDAH),
  diagnosisRule(DiagnosisCategory.SINDROME_DOWN),
  diagnosisRule(DiagnosisCategory.PARALISIS_CEREBRAL),
  diagnosisRule(DiagnosisCategory.DISCAPACIDAD_INTELECTUAL),
  diagnosisRule(DiagnosisCategory.TRASTORNO_LENGUAJE),
];

export const EMOTIONAL_RULES: readonly RecommendationRule[] = [
  { id: "emotional.frequent_sadness", when: (ctx) => ctx.strongSadDetections > SADNESS_MIN_DETECTIONS },
  { id: "emotional.negative_pattern", when: (ctx) => ctx.emotional.pattern === "predominio_negativo" },
  { id: "emotional.positive_pattern", when: (ctx) => ctx.emotional.pattern === "predominio_positivo" },
  { id: "emotional.neutral_pattern", when: (ctx) => ctx.emotional.pattern === "predominio_neutral" },
  {
    id: "emotional.low_stability",
    when: (ctx) => ctx.emotional.distinctEmotions > 0 && ctx.emotional.stability === "baja",
  },
  { id: "emotional.high_variability", when: (ctx) => ctx.emotional.variability === "alta" },
];

export const COMMUNICATIVE_RULES: readonly RecommendationRule[] = [
  { id: "communicative.no_verbal", when: (ctx) => ctx.communicative.level === "no_verbal" },
  { id: "communicative.pre_verbal", when: (ctx) => ctx.communicative.level === "pre_verbal" },
  { id: "communicative.verbal_emergente", when: (ctx) => ctx.communicative.level === "verbal_emergente" },
  { id: "communicative.verbal_funcional", when: (ctx) => ctx.communicative.level === "verbal_funcional" },
  { id: "communicative.low_attempts", when: (ctx) => ctx.communicative.attemptCount < LOW_ATTEMPTS },
  {
    id: "communicative.low_clarity",
    when: (ctx) =>
      ctx.communicative.clarity === "muy_limitada" || ctx.communicative.clarity === "limitada",
  },
  {
    id: "communicative.low_vocabulary",
    when: (ctx) =>
      ctx.communicative.wordCount > 0 && ctx.communicative.vocabularyRatio < LOW_VOCABULARY_RATIO,
  },
];

/** Rules that only fire on a combination of emotional and communicative signals. */
export const INTEGRATED_RULES: readonly RecommendationRule[] = [
  {
    id: "integrated.frustration",
    when: (ctx) =>
      ctx.emotional.pattern === "predominio_negativo" &&
      (ctx.communicative.level === "no_verbal" || ctx.communicative.level === "pre_verbal"),
  },
  {
    id: "integrated.positive_engagement",
    when: (ctx) =>
      ctx.emotional.pattern === "predominio_positivo" &&
      ctx.communicative.level === "verbal_funcional",
  },
  {
    id: "integrated.withdrawal",
    when: (ctx) =>
      ctx.emotional.pattern === "predominio_neutral" && ctx.communicative.level === "no_verbal",
  },
];

// ─── Engine ─────────────────────────────────────────────────────────────────────

export interface RecommendationInput {
  statistics: EmotionStatistics;
  frames: readonly FrameResult[];
  audio: AudioResult;
  diagnosis?: string | null;
  userContext?: UserContext;
}

export interface RecommendationSections {
  diagnosisSpecific: string[];
  emotional: string[];
  communicative: string[];
  integrated: string[];
}

/** Exact-string dedupe keeping the first occurrence. */
export function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)];
}

export function countStrongSadDetections(frames: readonly FrameResult[]): number {
  let count = 0;
  for (const frame of frames) {
    for (const d of frame.detections) {
      if (d.label === "Sad" && d.confidence > SADNESS_CONFIDENCE) count++;
    }
  }
  return count;
}

export class RecommendationEngine {
  private readonly catalog: RecommendationCatalog;
  private readonly vocabulary: AgeVocabulary;

  constructor(
    catalog: RecommendationCatalog = loadRecommendationCatalog(),
    vocabulary: AgeVocabulary = loadAgeVocabulary(),
  ) {
    this.catalog = catalog;
    this.vocabulary = vocabulary;
  }

  get defaultRecommendations(): string[] {
    return [...this.catalog.default];
  }

  buildContext(input: RecommendationInput): RecommendationContext {
    return {
      diagnosisCategory: matchDiagnosisCategory(input.diagnosis),
      emotional: classifyEmotionalContext(input.statistics),
      communicative: classifyCommunicativeContext(
        input.audio,
        this.vocabulary,
        input.userContext?.ageYears,
      ),
      strongSadDetections: countStrongSadDetections(input.frames),
    };
  }

  /** Rule output per table, each list deduplicated on its own. */
  sections(input: RecommendationInput): RecommendationSections {
    const ctx = this.buildContext(input);
    return {
      diagnosisSpecific: this.fire(DIAGNOSIS_RULES, ctx),
      emotional: this.fire(EMOTIONAL_RULES, ctx),
      communicative: this.fire(COMMUNICATIVE_RULES, ctx),
      integrated: this.fire(INTEGRATED_RULES, ctx),
    };
  }

  /**
   * Diagnosis, emotional, communicative and integrated output concatenated in
   * that order and deduplicated. Never empty.
   */
  generate(input: RecommendationInput): string[] {
    const s = this.sections(input);
    const all = dedupe([...s.diagnosisSpecific, ...s.emotional, ...s.communicative, ...s.integrated]);
    return all.length > 0 ? all : this.defaultRecommendations;
  }

  activitiesFor(category: DiagnosisCategory): string[] {
    return [...(this.catalog.activities[category] ?? this.catalog.activities.default ?? [])];
  }

  private fire(rules: readonly RecommendationRule[], ctx: RecommendationContext): string[] {
    const out: string[] = [];
    for (const rule of rules) {
      if (rule.when(ctx)) out.push(...(this.catalog.rules[rule.id] ?? []));
    }
    return dedupe(out);
  }
}
