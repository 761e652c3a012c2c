// Child Affect Analyzer - Diagnosis Profiles
// One ordered matcher table maps free-text diagnoses to a DiagnosisCategory.
// Both session configuration and the recommendation engine go through
// matchDiagnosisCategory(), so a diagnosis is classified the same way everywhere.

import {
  DiagnosisCategory,
  type DiagnosisProfile,
  type SessionConfig,
  type SessionConfigOverrides,
} from "./types.js";
import { foldText } from "./utils.js";

// ─── Matcher table ──────────────────────────────────────────────────────────────

export interface CategoryMatcher {
  category: DiagnosisCategory;
  keywords: readonly string[]; // accent-folded, lowercase
}

/** Scanned top to bottom; the first category with a matching keyword wins. */
export const DIAGNOSIS_MATCHERS: readonly CategoryMatcher[] = [
  {
    category: DiagnosisCategory.AUTISMO,
    keywords: ["autismo", "autista", "asperger", "espectro autista"],
  },
  {
    category: DiagnosisCategory.TDAH,
    keywords: ["tdah", "hiperactividad", "deficit de atencion", "adhd"],
  },
  {
    category: DiagnosisCategory.SINDROME_DOWN,
    keywords: ["sindrome de down", "down", "trisomia 21"],
  },
  {
    category: DiagnosisCategory.PARALISIS_CEREBRAL,
    keywords: ["paralisis cerebral"],
  },
  {
    category: DiagnosisCategory.DISCAPACIDAD_INTELECTUAL,
    keywords: ["discapacidad intelectual", "retraso madurativo"],
  },
  {
    category: DiagnosisCategory.TRASTORNO_LENGUAJE,
    keywords: ["trastorno del lenguaje", "disfasia", "afasia", "apraxia"],
  },
];

/**
 * Case-insensitive, accent-insensitive substring match against the ordered
 * table. Null, empty or unmatched text maps to DEFAULT.
 */
export function matchDiagnosisCategory(
  diagnosis: string | null | undefined,
  matchers: readonly CategoryMatcher[] = DIAGNOSIS_MATCHERS,
): DiagnosisCategory {
  if (!diagnosis || diagnosis.trim().length === 0) {
    return DiagnosisCategory.DEFAULT;
  }
  const text = foldText(diagnosis);
  for (const matcher of matchers) {
    if (matcher.keywords.some((keyword) => text.includes(keyword))) {
      return matcher.category;
    }
  }
  return DiagnosisCategory.DEFAULT;
}

// ─── Profiles ───────────────────────────────────────────────────────────────────

export const DEFAULT_PROFILE: DiagnosisProfile = {
  frameIntervalMs: 1000,
  confidenceThreshold: 0.6,
  priorityEmotions: [],
  alertEmotions: ["Angry", "Fear"],
};

export const DIAGNOSIS_PROFILES: Readonly<Record<DiagnosisCategory, DiagnosisProfile>> = {
  [DiagnosisCategory.AUTISMO]: {
    frameIntervalMs: 500,
    confidenceThreshold: 0.5,
    priorityEmotions: ["Neutral", "Happy", "Angry"],
    alertEmotions: ["Angry", "Fear"],
  },
  [DiagnosisCategory.TDAH]: {
    frameIntervalMs: 500,
    confidenceThreshold: 0.55,
    priorityEmotions: ["Angry", "Surprise", "Happy"],
    alertEmotions: ["Angry"],
  },
  [DiagnosisCategory.SINDROME_DOWN]: {
    frameIntervalMs: 1000,
    confidenceThreshold: 0.5,
    priorityEmotions: ["Happy", "Sad"],
    alertEmotions: ["Sad", "Fear"],
  },
  [DiagnosisCategory.PARALISIS_CEREBRAL]: {
    frameIntervalMs: 1500,
    confidenceThreshold: 0.45,
    priorityEmotions: ["Sad", "Fear"],
    alertEmotions: ["Sad", "Fear", "Angry"],
  },
  [DiagnosisCategory.DISCAPACIDAD_INTELECTUAL]: {
    frameIntervalMs: 1000,
    confidenceThreshold: 0.5,
    priorityEmotions: ["Happy", "Sad"],
    alertEmotions: ["Fear"],
  },
  [DiagnosisCategory.TRASTORNO_LENGUAJE]: {
    frameIntervalMs: 1000,
    confidenceThreshold: 0.55,
    priorityEmotions: ["Neutral", "Sad"],
    alertEmotions: ["Sad", "Angry"],
  },
  [DiagnosisCategory.DEFAULT]: DEFAULT_PROFILE,
};

// ─── Resolution ─────────────────────────────────────────────────────────────────

/**
 * Default profile → first matching diagnosis profile → caller overrides.
 * Pure: returns fresh arrays and never mutates the profile table.
 */
export function resolveSessionConfig(
  diagnosis?: string | null,
  overrides: SessionConfigOverrides = {},
  profiles: Readonly<Record<DiagnosisCategory, DiagnosisProfile>> = DIAGNOSIS_PROFILES,
): SessionConfig {
  const category = matchDiagnosisCategory(diagnosis);
  const profile = profiles[category];

  const config: SessionConfig = {
    diagnosis: diagnosis && diagnosis.trim().length > 0 ? diagnosis : null,
    diagnosisCategory: category,
    frameIntervalMs: profile.frameIntervalMs,
    confidenceThreshold: profile.confidenceThreshold,
    priorityEmotions: [...profile.priorityEmotions],
    alertEmotions: [...profile.alertEmotions],
    maxFrames: null,
  };

  if (overrides.frameIntervalMs !== undefined) config.frameIntervalMs = overrides.frameIntervalMs;
  if (overrides.confidenceThreshold !== undefined) {
    config.confidenceThreshold = overrides.confidenceThreshold;
  }
  if (overrides.priorityEmotions !== undefined) {
    config.priorityEmotions = [...overrides.priorityEmotions];
  }
  if (overrides.alertEmotions !== undefined) config.alertEmotions = [...overrides.alertEmotions];
  if (overrides.maxFrames !== undefined) config.maxFrames = overrides.maxFrames;

  return config;
}
