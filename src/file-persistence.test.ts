import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  FilePersistence,
  RECORD_FILE,
  REPORT_FILE,
  buildDirectoryName,
  formatReport,
  formatTimestamp,
  writeFileAtomic,
} from "./file-persistence.js";
import { resolveSessionConfig } from "./diagnosis-profiles.js";
import { computeEmotionStatistics, filterByConfidence } from "./emotion-statistics.js";
import { analyzeTranscript } from "./transcription-engine.js";
import { FatalEnvironmentError } from "./errors.js";
import type { EmotionLabel, FrameResult, PredictionSource, SessionResult } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function frame(
  frameId: number,
  timestamp: number,
  label: EmotionLabel,
  confidence: number,
  source: PredictionSource,
  qualityScore: number,
): FrameResult {
  const distribution = { Angry: 0, Disgust: 0, Fear: 0, Happy: 0, Sad: 0, Surprise: 0, Neutral: 0 };
  distribution[label] = confidence;
  distribution.Neutral += 1 - confidence;
  return {
    frameId,
    timestamp,
    detections: [
      {
        frameId,
        boundingBox: { x: 0, y: 0, width: 48, height: 48 },
        distribution,
        label,
        confidence,
        qualityScore,
        source,
      },
    ],
  };
}

// Midday keeps the ISO date equal to the local date.
const STARTED_AT = new Date(2025, 2, 10, 12, 5, 3);

function makeResult(overrides: Partial<SessionResult> = {}): SessionResult {
  const frames = [frame(0, 0.5, "Happy", 0.8, "ensemble", 0.75), frame(1, 65.2, "Sad", 0.7, "fallback", 0.5)];
  const filtered = filterByConfidence(frames, 0.5);
  return {
    sessionId: "s-1",
    status: "completed",
    startedAt: STARTED_AT,
    finishedAt: null,
    videoPath: "/videos/session.mp4",
    config: resolveSessionConfig("autismo"),
    frames,
    filteredFrames: filtered.frames,
    statistics: computeEmotionStatistics(frames, filtered),
    audio: analyzeTranscript(
      [
        { text: "hola", startTime: 0, endTime: 1 },
        { text: "agua", startTime: 62.4, endTime: 63 },
      ],
      { languageCode: "es", provider: "fake", transcriptionAttempts: 1 },
    ),
    alerts: [
      {
        type: "communication",
        level: "medio",
        message: "Comunicación verbal limitada: 2 intento(s) detectado(s).",
        recommendation: "Estimular la comunicación verbal.",
        timestamp: "2025-03-10T12:06:00.000Z",
      },
    ],
    recommendations: ["Mantener rutinas predecibles."],
    contextualRecommendations: {
      source: "local",
      general: [],
      emotional: [],
      communicative: [],
      diagnosisSpecific: [],
      activities: ["Juego estructurado con agenda visual"],
    },
    completedStages: ["facial_analysis", "confidence_filtering"],
    errors: ["audio_analysis: boom"],
    cancelled: false,
    priority: "moderado",
    reportPath: null,
    recordPath: null,
    ...overrides,
  };
}

// ─── formatTimestamp ──────────────────────────────────────────────────────────

describe("formatTimestamp", () => {
  it.each([
    [0, "[00:00]"],
    [5.9, "[00:05]"],
    [65.2, "[01:05]"],
    [3600, "[60:00]"],
    [-3, "[00:00]"],
  ])("formats %s seconds as %s", (seconds, expected) => {
    expect(formatTimestamp(seconds)).toBe(expected);
  });
});

// ─── buildDirectoryName ───────────────────────────────────────────────────────

describe("buildDirectoryName", () => {
  it("prefixes the session id with the local start time", () => {
    expect(buildDirectoryName("s-1", STARTED_AT)).toBe("2025-03-10_12-05-03_s-1");
  });

  it("zero-pads every component", () => {
    expect(buildDirectoryName("x", new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02_03-04-05_x");
  });
});

// ─── formatReport ─────────────────────────────────────────────────────────────

describe("formatReport", () => {
  it("renders every section", () => {
    expect(formatReport(makeResult()).split("\n")).toEqual([
      "=== Informe de análisis emocional y comunicativo ===",
      "",
      "Fecha: 2025-03-10",
      "Sesión: s-1",
      "Vídeo: /videos/session.mp4",
      "Diagnóstico: autismo (perfil autismo)",
      "Prioridad: moderado",
      "",
      "--- Estadísticas emocionales ---",
      "Detecciones válidas: 2 de 2 (descartadas: 0)",
      "Fotogramas analizados: 2 (excluidos: 0)",
      "Emoción predominante: Happy (50.0%)",
      "  Happy: 1",
      "  Sad: 1",
      "",
      "--- Detecciones ---",
      "[00:00] Fotograma 0: Happy 0.80 (ensemble, calidad 0.75)",
      "[01:05] Fotograma 1: Sad 0.70 (fallback, calidad 0.50)",
      "",
      "--- Transcripción ---",
      "[00:00] hola",
      "[01:02] agua",
      "",
      "--- Alertas ---",
      "[MEDIO] communication: Comunicación verbal limitada: 2 intento(s) detectado(s).",
      "  Estimular la comunicación verbal.",
      "",
      "--- Recomendaciones ---",
      "- Mantener rutinas predecibles.",
      "",
      "Actividades sugeridas:",
      "- Juego estructurado con agenda visual",
      "",
      "--- Errores ---",
      "- audio_analysis: boom",
      "",
    ]);
  });

  it("marks empty sections", () => {
    const report = formatReport(
      makeResult({
        config: resolveSessionConfig(null),
        statistics: null,
        filteredFrames: [],
        audio: null,
        alerts: [],
        contextualRecommendations: null,
        errors: [],
      }),
    );
    const lines = report.split("\n");
    expect(lines).toContain("Diagnóstico: No especificado (perfil default)");
    expect(lines).toContain("Sin estadísticas.");
    expect(lines).toContain("Sin detecciones por encima del umbral.");
    expect(lines).toContain("(sin habla detectada)");
    expect(lines).toContain("Sin alertas.");
    expect(lines).not.toContain("Actividades sugeridas:");
    expect(lines).not.toContain("--- Errores ---");
  });

  it("flags partial results after cancellation", () => {
    const lines = formatReport(makeResult({ cancelled: true })).split("\n");
    expect(lines[7]).toBe("Análisis facial interrumpido: resultados parciales.");
  });
});

// ─── File I/O ─────────────────────────────────────────────────────────────────

describe("writeFileAtomic", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "atomic-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("replaces the target and leaves no temporary file", async () => {
    const target = join(dir, "record.json");
    await writeFile(target, "old", "utf-8");

    await writeFileAtomic(target, "new");

    expect(await readFile(target, "utf-8")).toBe("new");
    expect(await readdir(dir)).toEqual(["record.json"]);
  });

  it("cleans up when the directory is missing", async () => {
    await expect(writeFileAtomic(join(dir, "missing", "record.json"), "x")).rejects.toThrow();
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("FilePersistence", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "persistence-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("creates the output root", async () => {
    const outputDir = join(baseDir, "nested", "output");
    const persistence = new FilePersistence(outputDir);
    await persistence.ensureStorage();
    expect(await readdir(outputDir)).toEqual([]);
    expect(persistence.outputDir).toBe(outputDir);
  });

  it("raises FatalEnvironmentError when the root cannot be created", async () => {
    const blocker = join(baseDir, "file");
    await writeFile(blocker, "x", "utf-8");
    const persistence = new FilePersistence(join(blocker, "output"));
    await expect(persistence.ensureStorage()).rejects.toBeInstanceOf(FatalEnvironmentError);
  });

  it("writes the report into the session directory", async () => {
    const persistence = new FilePersistence(baseDir);
    const result = makeResult();

    const reportPath = await persistence.writeReport(result);

    expect(reportPath).toBe(join(baseDir, "2025-03-10_12-05-03_s-1", REPORT_FILE));
    expect(await readFile(reportPath, "utf-8")).toBe(formatReport(result));
  });

  it("writes a record that carries its own path", async () => {
    const persistence = new FilePersistence(baseDir);

    const recordPath = await persistence.writeRecord(makeResult({ reportPath: "/tmp/report.txt" }));

    expect(recordPath).toBe(join(baseDir, "2025-03-10_12-05-03_s-1", RECORD_FILE));
    const record: unknown = JSON.parse(await readFile(recordPath, "utf-8"));
    expect(record).toMatchObject({
      sessionId: "s-1",
      recordPath,
      reportPath: "/tmp/report.txt",
      priority: "moderado",
      errors: ["audio_analysis: boom"],
    });
    expect(await readdir(join(baseDir, "2025-03-10_12-05-03_s-1"))).toEqual([RECORD_FILE]);
  });
});
