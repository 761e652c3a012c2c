// Child Affect Analyzer - Transcription Engine
// Speech-to-text for the audio stage. Two providers share one contract:
//   1. Deepgram prerecorded API (utterances)
//   2. OpenAI audio transcriptions (verbose JSON segments)
// The engine retries the provider with exponential backoff and turns the
// transcript into an AudioResult. Audio stays in memory.

import type { PrerecordedSchema } from "@deepgram/sdk";
import type { AudioResult, AudioSegmentResult, Logger, TranscriptSegment } from "./types.js";
import { TranscriptionError, errorMessage } from "./errors.js";
import { classifyClarity } from "./recommendation-engine.js";
import { DEFAULT_RETRY_OPTIONS, RetryExhaustedError, withRetry, type RetryOptions } from "./utils/retry.js";
import { createConsoleLogger, splitWords } from "./utils.js";

// ─── Provider contract ──────────────────────────────────────────────────────────

export interface SpeechToTextProvider {
  readonly name: string;
  transcribe(audio: Buffer, languageCode: string): Promise<TranscriptSegment[]>;
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

/**
 * The slice of the Deepgram SDK client used for prerecorded transcription.
 * `createClient()` from @deepgram/sdk satisfies it.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options?: PrerecordedSchema,
      ): Promise<{
        result: DeepgramPrerecordedResult | null;
        error: { message: string } | null;
      }>;
    };
  };
}

export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results: {
    channels: Array<{ alternatives: Array<{ transcript: string }> }>;
    utterances?: Array<{ start: number; end: number; transcript: string }>;
  };
}

const DEFAULT_DEEPGRAM_OPTIONS: PrerecordedSchema = {
  model: "nova-2",
  punctuate: true,
  smart_format: true,
  utterances: true,
};

export class DeepgramTranscriber implements SpeechToTextProvider {
  readonly name = "deepgram";
  private readonly client: DeepgramPrerecordedClient;
  private readonly options: PrerecordedSchema;

  constructor(client: DeepgramPrerecordedClient, options?: Partial<PrerecordedSchema>) {
    this.client = client;
    this.options = { ...DEFAULT_DEEPGRAM_OPTIONS, ...options };
  }

  async transcribe(audio: Buffer, languageCode: string): Promise<TranscriptSegment[]> {
    const { result, error } = await this.client.listen.prerecorded.transcribeFile(audio, {
      ...this.options,
      language: languageCode,
    });
    if (error) {
      throw new Error(`Deepgram error: ${error.message}`);
    }
    if (!result) {
      throw new Error("Deepgram returned no result");
    }

    const utterances = result.results.utterances ?? [];
    if (utterances.length > 0) {
      return utterances
        .map((u) => ({ text: u.transcript.trim(), startTime: u.start, endTime: u.end }))
        .filter((s) => s.text.length > 0);
    }

    // No utterances: fall back to the first channel's full transcript.
    const text = result.results.channels[0]?.alternatives[0]?.transcript.trim() ?? "";
    if (!text) return [];
    return [{ text, startTime: 0, endTime: result.metadata?.duration ?? 0 }];
  }
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use,
 * so tests can inject a mock without the SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format: "verbose_json";
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number | string; // older SDK typings declare a string
  segments?: Array<{ start: number; end: number; text: string }>;
}

export class OpenAITranscriber implements SpeechToTextProvider {
  readonly name = "openai";
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;

  constructor(client: OpenAITranscriptionClient, model: string = "whisper-1") {
    this.client = client;
    this.model = model;
  }

  async transcribe(audio: Buffer, languageCode: string): Promise<TranscriptSegment[]> {
    const file = new File([new Uint8Array(audio)], "audio.wav", { type: "audio/wav" });
    const response = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      response_format: "verbose_json",
      language: languageCode,
    });

    const text = response.text?.trim();
    if (!text) return [];

    if (response.segments && response.segments.length > 0) {
      return response.segments
        .map((seg) => ({ text: seg.text.trim(), startTime: seg.start, endTime: seg.end }))
        .filter((s) => s.text.length > 0);
    }
    const duration = Number(response.duration ?? 0);
    return [{ text, startTime: 0, endTime: Number.isFinite(duration) ? duration : 0 }];
  }
}

// ─── Transcript analysis ────────────────────────────────────────────────────────

/** Words longer than one character count as verbal attempts. */
export function countAttempts(words: readonly string[]): number {
  return words.filter((w) => w.length > 1).length;
}

export function analyzeSegment(segment: TranscriptSegment): AudioSegmentResult {
  return {
    startTime: segment.startTime,
    endTime: segment.endTime,
    transcript: segment.text,
    wordCount: splitWords(segment.text).length,
    quality: classifyClarity(segment.text),
  };
}

export interface TranscriptMeta {
  languageCode: string;
  provider: string | null;
  transcriptionAttempts: number;
}

export function analyzeTranscript(
  segments: readonly TranscriptSegment[],
  meta: TranscriptMeta,
): AudioResult {
  const ordered = [...segments].sort((a, b) => a.startTime - b.startTime);
  const transcript = ordered
    .map((s) => s.text.trim())
    .filter((t) => t.length > 0)
    .join(" ");
  const words = splitWords(transcript);
  return {
    transcript,
    words,
    wordCount: words.length,
    attemptCount: countAttempts(words),
    segments: ordered.map(analyzeSegment),
    languageCode: meta.languageCode,
    provider: meta.provider,
    transcriptionAttempts: meta.transcriptionAttempts,
  };
}

/** Audio result used when the audio stage fails. */
export function emptyAudioResult(languageCode: string, transcriptionAttempts: number = 0): AudioResult {
  return analyzeTranscript([], { languageCode, provider: null, transcriptionAttempts });
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export const DEFAULT_TRANSCRIPTION_LANGUAGE = "es";

export interface TranscriptionEngineOptions {
  languageCode?: string;
  retry?: RetryOptions;
  logger?: Logger;
}

export class TranscriptionEngine {
  private readonly provider: SpeechToTextProvider;
  private readonly languageCode: string;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;

  constructor(provider: SpeechToTextProvider, options: TranscriptionEngineOptions = {}) {
    this.provider = provider;
    this.languageCode = options.languageCode ?? DEFAULT_TRANSCRIPTION_LANGUAGE;
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.logger = options.logger ?? createConsoleLogger("TranscriptionEngine");
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Transcribe and analyze. Empty audio short-circuits to an empty result
   * without calling the provider. Throws TranscriptionError once retries run out.
   */
  async transcribe(audio: Buffer): Promise<AudioResult> {
    if (audio.length === 0) {
      this.logger.warn("No audio to transcribe");
      return emptyAudioResult(this.languageCode);
    }

    try {
      const outcome = await withRetry(
        () => this.provider.transcribe(audio, this.languageCode),
        {
          ...this.retry,
          onRetry: (attempt, err, delayMs) => {
            this.logger.warn(
              `${this.provider.name} transcription attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`,
            );
          },
        },
      );
      this.logger.info(
        `Transcribed ${outcome.value.length} segment(s) with ${this.provider.name} in ${outcome.attempts} attempt(s)`,
      );
      return analyzeTranscript(outcome.value, {
        languageCode: this.languageCode,
        provider: this.provider.name,
        transcriptionAttempts: outcome.attempts,
      });
    } catch (err) {
      const attempts = err instanceof RetryExhaustedError ? err.attempts : 1;
      throw new TranscriptionError(errorMessage(err), attempts);
    }
  }
}
