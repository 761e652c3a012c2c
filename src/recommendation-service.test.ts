import { describe, it, expect, vi, type Mock } from "vitest";
import {
  ContextualRecommendationService,
  DEFAULT_RECOMMENDATION_MODEL,
  buildRecommendationPrompt,
  parseRecommendationResponse,
  type OpenAIChatClient,
} from "./recommendation-service.js";
import { RecommendationEngine, loadRecommendationCatalog } from "./recommendation-engine.js";
import { computeEmotionStatistics, emptyStatistics, filterByConfidence } from "./emotion-statistics.js";
import { analyzeTranscript, emptyAudioResult } from "./transcription-engine.js";
import { RecommendationServiceError } from "./errors.js";
import type { AudioResult, FrameResult, Logger } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const NO_WAIT = { maxAttempts: 2, baseDelayMs: 10, factor: 2, sleep: async () => {} };

const REMOTE_BODY = {
  general: ["Mantener la rutina."],
  emotional: ["Validar la tristeza."],
  communicative: ["Usar pictogramas."],
  diagnosisSpecific: ["Anticipar cambios."],
  activities: ["Juego de turnos"],
};

type CreateCompletion = OpenAIChatClient["chat"]["completions"]["create"];

function chatClient(...contents: Array<string | null | Error>): OpenAIChatClient & { create: Mock<CreateCompletion> } {
  const create = vi.fn<CreateCompletion>();
  for (const content of contents) {
    if (content instanceof Error) create.mockRejectedValueOnce(content);
    else create.mockResolvedValueOnce({ choices: [{ message: { content } }] });
  }
  return { chat: { completions: { create } }, create };
}

const sadFrames: FrameResult[] = Array.from({ length: 4 }, (_, frameId) => ({
  frameId,
  timestamp: frameId,
  detections: [
    {
      frameId,
      boundingBox: { x: 0, y: 0, width: 40, height: 40 },
      distribution: { Angry: 0, Disgust: 0, Fear: 0, Happy: 0, Sad: 0.9, Surprise: 0, Neutral: 0.1 },
      label: "Sad",
      confidence: 0.9,
      qualityScore: 0.7,
      source: "ensemble",
    },
  ],
}));
const SAD_STATS = computeEmotionStatistics(sadFrames, filterByConfidence(sadFrames, 0.5));
const SILENT: AudioResult = emptyAudioResult("es");
const SPEECH: AudioResult = analyzeTranscript([{ text: "quiero agua mama", startTime: 0, endTime: 2 }], {
  languageCode: "es",
  provider: "test",
  transcriptionAttempts: 1,
});

const catalog = loadRecommendationCatalog();

// ─── Response parsing ───────────────────────────────────────────────────────────

describe("parseRecommendationResponse", () => {
  it("accepts a complete response", () => {
    expect(parseRecommendationResponse(JSON.stringify(REMOTE_BODY))).toEqual({ source: "remote", ...REMOTE_BODY });
  });

  it("defaults missing sections to empty lists", () => {
    const parsed = parseRecommendationResponse(JSON.stringify({ general: ["Uno"] }));
    expect(parsed.general).toEqual(["Uno"]);
    expect(parsed.activities).toEqual([]);
  });

  it("trims, drops blanks and deduplicates", () => {
    const parsed = parseRecommendationResponse(JSON.stringify({ general: [" Uno ", "Uno", "  ", "Dos"] }));
    expect(parsed.general).toEqual(["Uno", "Dos"]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseRecommendationResponse("not json")).toThrow(
      "Failed to parse recommendation response as JSON: not json",
    );
  });

  it("rejects non-object bodies", () => {
    expect(() => parseRecommendationResponse("[1,2]")).toThrow("Recommendation response must be a JSON object");
  });

  it("rejects a section that is not a list of strings", () => {
    expect(() => parseRecommendationResponse(JSON.stringify({ general: "Uno" }))).toThrow(
      'Field "general" must be an array of strings',
    );
    expect(() => parseRecommendationResponse(JSON.stringify({ emotional: [1] }))).toThrow(
      'Field "emotional" must be an array of strings',
    );
  });

  it("rejects a response without any recommendation", () => {
    expect(() => parseRecommendationResponse("{}")).toThrow("Recommendation response contained no recommendations");
  });
});

// ─── Local mode ─────────────────────────────────────────────────────────────────

describe("ContextualRecommendationService (local)", () => {
  const service = new ContextualRecommendationService({ logger: silentLogger() });

  it("runs locally without a client", () => {
    expect(service.mode).toBe("local");
  });

  it("simulates the response structure from the rule engine", async () => {
    const result = await service.getRecommendations("síndrome de Down", {}, SAD_STATS, SILENT);

    expect(result.source).toBe("local");
    expect(result.diagnosisSpecific).toEqual(catalog.rules["diagnosis.sindrome_down"]);
    expect(result.emotional).toEqual(catalog.rules["emotional.negative_pattern"]);
    expect(result.communicative).toEqual([
      ...catalog.rules["communicative.no_verbal"],
      ...catalog.rules["communicative.low_attempts"],
    ]);
    expect(result.general).toEqual(catalog.rules["integrated.frustration"]);
    expect(result.activities).toEqual(catalog.activities.sindrome_down);
  });

  it("leaves the default list out of the simulated sections", async () => {
    const result = await service.getRecommendations("tdah", {}, SAD_STATS, SPEECH);
    expect(result.general).toEqual([]);
    const sections = [...result.general, ...result.emotional, ...result.communicative, ...result.diagnosisSpecific];
    expect(sections.filter((text) => catalog.default.includes(text))).toEqual([]);
  });

  it("uses default activities without a diagnosis", async () => {
    const result = await service.getRecommendations(null, {}, emptyStatistics(), SPEECH);
    expect(result.diagnosisSpecific).toEqual([]);
    expect(result.activities).toEqual(catalog.activities.default);
  });

  it("serves equal contexts from the cache", async () => {
    const engine = new RecommendationEngine();
    const spy = vi.spyOn(engine, "sections");
    const cached = new ContextualRecommendationService({ engine, logger: silentLogger() });
    await cached.getRecommendations("tdah", { ageYears: 6 }, SAD_STATS, SPEECH);
    await cached.getRecommendations("tdah", { ageYears: 6 }, SAD_STATS, SPEECH);
    expect(spy).toHaveBeenCalledTimes(1);
    await cached.getRecommendations("tdah", { ageYears: 7 }, SAD_STATS, SPEECH);
    expect(spy).toHaveBeenCalledTimes(2);
  });
});

// ─── Remote mode ────────────────────────────────────────────────────────────────

describe("ContextualRecommendationService (remote)", () => {
  it("requests a JSON-mode completion and parses it", async () => {
    const client = chatClient(JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger: silentLogger() });

    expect(service.mode).toBe("remote");
    const result = await service.getRecommendations("autismo", { ageYears: 4 }, SAD_STATS, SPEECH);

    expect(result).toEqual({ source: "remote", ...REMOTE_BODY });
    const params = client.create.mock.calls[0][0];
    expect(params.model).toBe(DEFAULT_RECOMMENDATION_MODEL);
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(params.temperature).toBe(0.4);
    expect(params.messages.map((m) => m.role)).toEqual(["system", "user"]);
    expect(params.messages[1].content).toContain("autismo");
  });

  it("uses the configured model", async () => {
    const client = chatClient(JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, model: "gpt-test", retry: NO_WAIT, logger: silentLogger() });
    await service.getRecommendations(null, {}, SAD_STATS, SPEECH);
    expect(client.create.mock.calls[0][0].model).toBe("gpt-test");
  });

  it("retries a failed request", async () => {
    const logger = silentLogger();
    const client = chatClient(new Error("rate limited"), JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger });

    const result = await service.getRecommendations(null, {}, SAD_STATS, SPEECH);

    expect(result.source).toBe("remote");
    expect(client.create).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "Recommendation request attempt 1 failed (rate limited); retrying in 10ms",
    );
  });

  it("retries an unparseable response", async () => {
    const client = chatClient("lo siento", JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger: silentLogger() });
    await expect(service.getRecommendations(null, {}, SAD_STATS, SPEECH)).resolves.toMatchObject({ source: "remote" });
  });

  it("throws RecommendationServiceError once retries run out", async () => {
    const client = chatClient(null, new Error("timeout"));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger: silentLogger() });

    const err = await service.getRecommendations(null, {}, SAD_STATS, SPEECH).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RecommendationServiceError);
    expect(err).toHaveProperty("message", "Failed after 2 attempt(s): timeout");
  });

  it("does not cache failures", async () => {
    const client = chatClient(new Error("down"), new Error("down"), JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger: silentLogger() });
    await expect(service.getRecommendations(null, {}, SAD_STATS, SPEECH)).rejects.toThrow(RecommendationServiceError);
    await expect(service.getRecommendations(null, {}, SAD_STATS, SPEECH)).resolves.toMatchObject({ source: "remote" });
  });

  it("caches successful responses per context", async () => {
    const client = chatClient(JSON.stringify(REMOTE_BODY));
    const service = new ContextualRecommendationService({ client, retry: NO_WAIT, logger: silentLogger() });
    await service.getRecommendations("tdah", {}, SAD_STATS, SPEECH);
    await service.getRecommendations("tdah", {}, SAD_STATS, SPEECH);
    expect(client.create).toHaveBeenCalledTimes(1);
  });
});

// ─── Prompt ─────────────────────────────────────────────────────────────────────

describe("buildRecommendationPrompt", () => {
  it("describes the session in the user message", () => {
    const { system, user } = buildRecommendationPrompt("autismo", { ageYears: 5 }, SAD_STATS, SPEECH);
    expect(system).toContain('"diagnosisSpecific": ["string"]');
    expect(user).toContain("## Diagnóstico\nautismo");
    expect(user).toContain("Emoción predominante: Sad (100.0%)");
    expect(user).toContain("Transcripción: quiero agua mama");
    expect(user).toContain("Intentos verbales: 3");
    expect(user).toContain('{"ageYears":5}');
  });

  it("marks missing diagnosis and speech", () => {
    const { user } = buildRecommendationPrompt(null, {}, emptyStatistics(), SILENT);
    expect(user).toContain("## Diagnóstico\nNo especificado");
    expect(user).toContain("Emoción predominante: ninguna (0.0%)");
    expect(user).toContain("Transcripción: (sin habla detectada)");
  });
});
