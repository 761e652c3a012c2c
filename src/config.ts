// Child Affect Analyzer - Configuration
// Reads the process environment (populated from .env by dotenv in the entry
// point) into a typed AppConfig. Invalid values throw ConfigError at startup.

import { DEFAULT_MODEL_TIMEOUT_MS } from "./emotion-ensemble.js";
import { DEFAULT_FRAME_CONCURRENCY } from "./facial-analysis.js";
import { DEFAULT_RECOMMENDATION_MODEL } from "./recommendation-service.js";
import { DEFAULT_RECOMMENDATION_TTL_MS } from "./recommendation-cache.js";
import { DEFAULT_TRANSCRIPTION_LANGUAGE } from "./transcription-engine.js";
import { DEFAULT_RETRY_OPTIONS } from "./utils/retry.js";

export type TranscriptionProvider = "deepgram" | "openai";

export interface AppConfig {
  port: number;
  deepgramApiKey: string | null;
  openaiApiKey: string | null;
  transcriptionProvider: TranscriptionProvider;
  transcriptionLanguage: string;
  modelsDir: string;
  outputDir: string;
  recommendationModel: string;
  recommendationCacheTtlMs: number;
  sttMaxAttempts: number;
  modelTimeoutMs: number;
  frameConcurrency: number;
  maxFrames: number | null;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${key} must be at least ${min}, got ${value}`);
  }
  return value;
}

/**
 * Parse the environment. TRANSCRIPTION_PROVIDER defaults to deepgram when a
 * Deepgram key is present and to openai otherwise.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const deepgramApiKey = readString(env, "DEEPGRAM_API_KEY");
  const openaiApiKey = readString(env, "OPENAI_API_KEY");

  const providerRaw = readString(env, "TRANSCRIPTION_PROVIDER")?.toLowerCase() ?? null;
  let transcriptionProvider: TranscriptionProvider;
  if (providerRaw === null) {
    transcriptionProvider = deepgramApiKey ? "deepgram" : "openai";
  } else if (providerRaw === "deepgram" || providerRaw === "openai") {
    transcriptionProvider = providerRaw;
  } else {
    throw new ConfigError(`TRANSCRIPTION_PROVIDER must be "deepgram" or "openai", got "${providerRaw}"`);
  }

  const maxFrames = readInteger(env, "MAX_FRAMES", 0, 0);

  return {
    port: readInteger(env, "PORT", 3000, 0),
    deepgramApiKey,
    openaiApiKey,
    transcriptionProvider,
    transcriptionLanguage: readString(env, "TRANSCRIPTION_LANGUAGE") ?? DEFAULT_TRANSCRIPTION_LANGUAGE,
    modelsDir: readString(env, "MODELS_DIR") ?? "models",
    outputDir: readString(env, "OUTPUT_DIR") ?? "output",
    recommendationModel: readString(env, "RECOMMENDATION_MODEL") ?? DEFAULT_RECOMMENDATION_MODEL,
    recommendationCacheTtlMs:
      readInteger(env, "RECOMMENDATION_CACHE_TTL_SECONDS", DEFAULT_RECOMMENDATION_TTL_MS / 1000, 1) * 1000,
    sttMaxAttempts: readInteger(env, "STT_MAX_ATTEMPTS", DEFAULT_RETRY_OPTIONS.maxAttempts, 1),
    modelTimeoutMs: readInteger(env, "MODEL_TIMEOUT_MS", DEFAULT_MODEL_TIMEOUT_MS, 1),
    frameConcurrency: readInteger(env, "FRAME_CONCURRENCY", DEFAULT_FRAME_CONCURRENCY, 1),
    maxFrames: maxFrames > 0 ? maxFrames : null,
  };
}
