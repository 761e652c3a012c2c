// Child Affect Analyzer - Entry point
// Loads .env, builds the API clients that have keys, wires the pipeline and
// starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { APP_NAME, APP_VERSION, UNCONFIGURED_CAPABILITIES, createRuntime, type ApiClients } from "./app.js";
import { loadAppConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { tfjsClassifierLoader } from "./tfjs-classifier.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

function createApiClients(config: AppConfig): ApiClients {
  const clients: ApiClients = {};

  if (config.deepgramApiKey) {
    logInit("Creating Deepgram client...");
    clients.deepgram = createDeepgramClient(config.deepgramApiKey);
  }

  if (config.openaiApiKey) {
    logInit("Creating OpenAI client...");
    const openai = new OpenAI({ apiKey: config.openaiApiKey });
    clients.openaiChat = {
      chat: { completions: { create: (params) => openai.chat.completions.create(params) } },
    };
    clients.openaiTranscription = {
      audio: { transcriptions: { create: (params) => openai.audio.transcriptions.create(params) } },
    };
  }

  return clients;
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (err) {
    logFatal(`Invalid configuration: ${errorMessage(err)}`);
    process.exit(1);
  }

  const clients = createApiClients(config);
  // Emotion models load through TensorFlow.js; video decoding, face detection
  // and audio extraction are host-specific and stay unconfigured here.
  const capabilities = { ...UNCONFIGURED_CAPABILITIES, classifierLoader: tfjsClassifierLoader };
  const runtime = await createRuntime(config, capabilities, clients);

  await runtime.server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit(`Results are written to ${runtime.persistence.outputDir}`);
  logInit("Ready for connections");
}

main().catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});
