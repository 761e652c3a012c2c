// Child Affect Analyzer - Contextual Recommendation Service
// Diagnosis-aware recommendations for stage 5. With an OpenAI client the
// service requests a JSON-mode chat completion; without one it simulates the
// same structure locally from the rule engine and the activity table.
// Responses are cached by a digest of diagnosis + context.

import type {
  AudioResult,
  ContextualRecommendations,
  EmotionStatistics,
  Logger,
  UserContext,
} from "./types.js";
import { RecommendationServiceError, errorMessage } from "./errors.js";
import { matchDiagnosisCategory } from "./diagnosis-profiles.js";
import { RecommendationEngine, dedupe } from "./recommendation-engine.js";
import { TtlCache, digestKey } from "./recommendation-cache.js";
import { DEFAULT_RETRY_OPTIONS, withRetry, type RetryOptions } from "./utils/retry.js";
import { createConsoleLogger } from "./utils.js";

/** The slice of the OpenAI SDK client this service calls. */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export const DEFAULT_RECOMMENDATION_MODEL = "gpt-4o-mini";

export interface RecommendationServiceOptions {
  client?: OpenAIChatClient | null;
  model?: string;
  engine?: RecommendationEngine;
  cache?: TtlCache<ContextualRecommendations>;
  retry?: RetryOptions;
  logger?: Logger;
}

const SECTION_KEYS = [
  "general",
  "emotional",
  "communicative",
  "diagnosisSpecific",
  "activities",
] as const;

type SectionKey = (typeof SECTION_KEYS)[number];

function readStringList(obj: object, key: SectionKey): string[] {
  const value: unknown = Reflect.get(obj, key);
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new Error(`Field "${key}" must be an array of strings`);
  }
  return dedupe(value.map((v) => v.trim()).filter((v) => v.length > 0));
}

/** Validate and normalize a raw JSON-mode response body. */
export function parseRecommendationResponse(raw: string): ContextualRecommendations {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Failed to parse recommendation response as JSON: ${raw.slice(0, 200)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Recommendation response must be a JSON object");
  }

  const result: ContextualRecommendations = {
    source: "remote",
    general: readStringList(parsed, "general"),
    emotional: readStringList(parsed, "emotional"),
    communicative: readStringList(parsed, "communicative"),
    diagnosisSpecific: readStringList(parsed, "diagnosisSpecific"),
    activities: readStringList(parsed, "activities"),
  };
  if (SECTION_KEYS.every((key) => result[key].length === 0)) {
    throw new Error("Recommendation response contained no recommendations");
  }
  return result;
}

export class ContextualRecommendationService {
  private readonly client: OpenAIChatClient | null;
  private readonly model: string;
  private readonly engine: RecommendationEngine;
  private readonly cache: TtlCache<ContextualRecommendations>;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;

  constructor(options: RecommendationServiceOptions = {}) {
    this.client = options.client ?? null;
    this.model = options.model ?? DEFAULT_RECOMMENDATION_MODEL;
    this.engine = options.engine ?? new RecommendationEngine();
    this.cache = options.cache ?? new TtlCache<ContextualRecommendations>();
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.logger = options.logger ?? createConsoleLogger("RecommendationService");
  }

  get mode(): "remote" | "local" {
    return this.client ? "remote" : "local";
  }

  async getRecommendations(
    diagnosis: string | null,
    userContext: UserContext,
    emotionSummary: EmotionStatistics,
    audioSummary: AudioResult,
  ): Promise<ContextualRecommendations> {
    const key = digestKey({
      mode: this.mode,
      diagnosis,
      userContext,
      emotions: {
        counts: emotionSummary.counts,
        predominant: emotionSummary.predominantEmotion,
      },
      audio: {
        transcript: audioSummary.transcript,
        attempts: audioSummary.attemptCount,
      },
    });

    return this.cache.getOrCompute(key, () =>
      this.client
        ? this.requestRemote(this.client, diagnosis, userContext, emotionSummary, audioSummary)
        : Promise.resolve(this.simulate(diagnosis, userContext, emotionSummary, audioSummary)),
    );
  }

  /** Local stand-in for the remote service, built from the rule engine. */
  simulate(
    diagnosis: string | null,
    userContext: UserContext,
    emotionSummary: EmotionStatistics,
    audioSummary: AudioResult,
  ): ContextualRecommendations {
    const sections = this.engine.sections({
      statistics: emotionSummary,
      frames: [],
      audio: audioSummary,
      diagnosis,
      userContext,
    });
    return {
      source: "local",
      general: sections.integrated,
      emotional: sections.emotional,
      communicative: sections.communicative,
      diagnosisSpecific: sections.diagnosisSpecific,
      activities: this.engine.activitiesFor(matchDiagnosisCategory(diagnosis)),
    };
  }

  private async requestRemote(
    client: OpenAIChatClient,
    diagnosis: string | null,
    userContext: UserContext,
    emotionSummary: EmotionStatistics,
    audioSummary: AudioResult,
  ): Promise<ContextualRecommendations> {
    const prompt = buildRecommendationPrompt(diagnosis, userContext, emotionSummary, audioSummary);
    try {
      const outcome = await withRetry(
        async () => {
          const response = await client.chat.completions.create({
            model: this.model,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
            response_format: { type: "json_object" },
            temperature: 0.4,
          });
          const content = response.choices[0]?.message?.content;
          if (!content) {
            throw new Error("Recommendation service returned an empty response");
          }
          return parseRecommendationResponse(content);
        },
        {
          ...this.retry,
          onRetry: (attempt, err, delayMs) => {
            this.logger.warn(
              `Recommendation request attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`,
            );
          },
        },
      );
      return outcome.value;
    } catch (err) {
      throw new RecommendationServiceError(errorMessage(err));
    }
  }
}

export function buildRecommendationPrompt(
  diagnosis: string | null,
  userContext: UserContext,
  emotionSummary: EmotionStatistics,
  audioSummary: AudioResult,
): { system: string; user: string } {
  const system = `Eres un especialista en atención temprana que orienta a familias y terapeutas de niños con discapacidad.

## Formato de salida
Responde con un objeto JSON válido con esta estructura exacta:
{
  "general": ["string"],
  "emotional": ["string"],
  "communicative": ["string"],
  "diagnosisSpecific": ["string"],
  "activities": ["string"]
}

## Reglas
- Cada recomendación es una frase breve y práctica en español.
- No incluyas diagnósticos nuevos ni indicaciones médicas.
- Adapta las recomendaciones al diagnóstico y a la edad cuando se conozcan.`;

  const user = `## Diagnóstico
${diagnosis ?? "No especificado"}

## Contexto
${JSON.stringify(userContext)}

## Emociones detectadas
Emoción predominante: ${emotionSummary.predominantEmotion ?? "ninguna"} (${(emotionSummary.predominantPercentage * 100).toFixed(1)}%)
Recuento: ${JSON.stringify(emotionSummary.counts)}
Detecciones totales: ${emotionSummary.totalDetections}

## Comunicación verbal
Transcripción: ${audioSummary.transcript.length > 0 ? audioSummary.transcript : "(sin habla detectada)"}
Palabras: ${audioSummary.wordCount}
Intentos verbales: ${audioSummary.attemptCount}

Responde SOLO con el objeto JSON.`;

  return { system, user };
}
