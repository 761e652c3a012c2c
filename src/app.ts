// Child Affect Analyzer - Application wiring
// Builds the analysis pipeline and the HTTP server from an AppConfig, the
// host's media capabilities and whichever API clients are configured.

import type { AppConfig } from "./config.js";
import type { Logger } from "./types.js";
import { EnsembleScorer } from "./emotion-ensemble.js";
import { loadEnsembleConfig, type ClassifierLoader } from "./model-registry.js";
import { FacialAnalyzer, type FaceDetector, type FrameSource } from "./facial-analysis.js";
import {
  DeepgramTranscriber,
  OpenAITranscriber,
  TranscriptionEngine,
  type DeepgramPrerecordedClient,
  type OpenAITranscriptionClient,
  type SpeechToTextProvider,
} from "./transcription-engine.js";
import { RecommendationEngine } from "./recommendation-engine.js";
import { TtlCache } from "./recommendation-cache.js";
import {
  ContextualRecommendationService,
  type OpenAIChatClient,
} from "./recommendation-service.js";
import { FilePersistence } from "./file-persistence.js";
import { StageOrchestrator, type AudioExtractor, type Transcriber } from "./stage-orchestrator.js";
import { createAppServer, type AppServer } from "./server.js";
import { DEFAULT_RETRY_OPTIONS } from "./utils/retry.js";
import { createConsoleLogger } from "./utils.js";
import type { ContextualRecommendations } from "./types.js";

export const APP_NAME = "Child Affect Analyzer";
export const APP_VERSION = "0.1.0";

// ─── Host capabilities ──────────────────────────────────────────────────────────

/**
 * Host-specific pieces of the pipeline. Video decoding, face detection and
 * audio extraction live outside this package; `tfjsClassifierLoader` is the
 * packaged model loader.
 */
export interface HostCapabilities {
  frameSource: FrameSource;
  faceDetector: FaceDetector;
  audioExtractor: AudioExtractor;
  classifierLoader: ClassifierLoader;
}

function notConfigured(capability: string): Error {
  return new Error(`${capability} is not configured`);
}

/**
 * Capabilities that fail on use. Each failure becomes a stage error (or a
 * discarded model), so the server still runs and reports degraded sessions.
 */
export const UNCONFIGURED_CAPABILITIES: HostCapabilities = {
  frameSource: {
    frames: () => ({
      [Symbol.asyncIterator]: () => ({
        next: () => Promise.reject(notConfigured("Frame source")),
      }),
    }),
  },
  faceDetector: {
    detectFaces: () => Promise.reject(notConfigured("Face detector")),
  },
  audioExtractor: {
    extract: () => Promise.reject(notConfigured("Audio extractor")),
  },
  classifierLoader: () => Promise.reject(notConfigured("Classifier loader")),
};

// ─── API clients ────────────────────────────────────────────────────────────────

export interface ApiClients {
  deepgram?: DeepgramPrerecordedClient | null;
  openaiChat?: OpenAIChatClient | null;
  openaiTranscription?: OpenAITranscriptionClient | null;
}

/** Speech-to-text provider for the configured TRANSCRIPTION_PROVIDER, if its client exists. */
export function selectSpeechProvider(config: AppConfig, clients: ApiClients): SpeechToTextProvider | null {
  if (config.transcriptionProvider === "deepgram") {
    return clients.deepgram ? new DeepgramTranscriber(clients.deepgram) : null;
  }
  return clients.openaiTranscription ? new OpenAITranscriber(clients.openaiTranscription) : null;
}

// ─── Runtime ────────────────────────────────────────────────────────────────────

export interface Runtime {
  orchestrator: StageOrchestrator;
  server: AppServer;
  persistence: FilePersistence;
  scorer: EnsembleScorer;
}

export async function createRuntime(
  config: AppConfig,
  capabilities: HostCapabilities,
  clients: ApiClients = {},
  logger: Logger = createConsoleLogger("App"),
): Promise<Runtime> {
  const ensemble = await loadEnsembleConfig(config.modelsDir, capabilities.classifierLoader);
  const scorer = new EnsembleScorer(ensemble, { modelTimeoutMs: config.modelTimeoutMs });
  logger.info(`Ensemble: ${scorer.modelCount} model(s) from ${config.modelsDir}`);

  const facialAnalyzer = new FacialAnalyzer({
    frameSource: capabilities.frameSource,
    faceDetector: capabilities.faceDetector,
    scorer,
  });

  const provider = selectSpeechProvider(config, clients);
  let transcriber: Transcriber;
  if (provider) {
    transcriber = new TranscriptionEngine(provider, {
      languageCode: config.transcriptionLanguage,
      retry: { ...DEFAULT_RETRY_OPTIONS, maxAttempts: config.sttMaxAttempts },
    });
    logger.info(`Speech-to-text: ${provider.name} (${config.transcriptionLanguage})`);
  } else {
    logger.warn(`No ${config.transcriptionProvider} client configured; audio analysis will fail per session`);
    transcriber = {
      transcribe: () => Promise.reject(notConfigured(`Speech-to-text provider "${config.transcriptionProvider}"`)),
    };
  }

  const recommendationEngine = new RecommendationEngine();
  const recommendationService = new ContextualRecommendationService({
    client: clients.openaiChat ?? null,
    model: config.recommendationModel,
    engine: recommendationEngine,
    cache: new TtlCache<ContextualRecommendations>(config.recommendationCacheTtlMs),
  });
  logger.info(`Contextual recommendations: ${recommendationService.mode}`);

  const persistence = new FilePersistence(config.outputDir);
  await persistence.ensureStorage();

  const orchestrator = new StageOrchestrator({
    facialAnalyzer,
    audioExtractor: capabilities.audioExtractor,
    transcriber,
    recommendationEngine,
    recommendationService,
    store: persistence,
    frameConcurrency: config.frameConcurrency,
    languageCode: config.transcriptionLanguage,
  });

  // MAX_FRAMES applies to requests that do not set their own cap.
  const server = createAppServer({
    runner: {
      run: (request, options) =>
        orchestrator.run(
          config.maxFrames !== null && request.overrides?.maxFrames === undefined
            ? { ...request, overrides: { ...request.overrides, maxFrames: config.maxFrames } }
            : request,
          options,
        ),
    },
  });

  return { orchestrator, server, persistence, scorer };
}
