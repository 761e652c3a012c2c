// Child Affect Analyzer - File Persistence
// Writes the per-session outputs:
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
//     report.txt    human-readable report (stage 6)
//     session.json  structured session record, written once and atomically

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { FrameResult, SessionResult } from "./types.js";
import { FatalEnvironmentError, errorMessage } from "./errors.js";

export const REPORT_FILE = "report.txt";
export const RECORD_FILE = "session.json";

/**
 * Formats a number of seconds into `[MM:SS]` timestamp format.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}

/**
 * Output directory name for a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`
 */
export function buildDirectoryName(sessionId: string, startedAt: Date): string {
  const year = startedAt.getFullYear();
  const month = String(startedAt.getMonth() + 1).padStart(2, "0");
  const day = String(startedAt.getDate()).padStart(2, "0");
  const hours = String(startedAt.getHours()).padStart(2, "0");
  const minutes = String(startedAt.getMinutes()).padStart(2, "0");
  const seconds = String(startedAt.getSeconds()).padStart(2, "0");

  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}_${sessionId}`;
}

function formatFrames(frames: readonly FrameResult[]): string[] {
  const lines: string[] = [];
  for (const frame of frames) {
    for (const d of frame.detections) {
      lines.push(
        `${formatTimestamp(frame.timestamp)} Fotograma ${frame.frameId}: ${d.label} ${d.confidence.toFixed(2)} (${d.source}, calidad ${d.qualityScore.toFixed(2)})`,
      );
    }
  }
  return lines;
}

/** Renders report.txt. */
export function formatReport(result: SessionResult): string {
  const lines: string[] = [];

  lines.push("=== Informe de análisis emocional y comunicativo ===");
  lines.push("");
  lines.push(`Fecha: ${result.startedAt.toISOString().split("T")[0]}`);
  lines.push(`Sesión: ${result.sessionId}`);
  lines.push(`Vídeo: ${result.videoPath}`);
  lines.push(
    `Diagnóstico: ${result.config.diagnosis ?? "No especificado"} (perfil ${result.config.diagnosisCategory})`,
  );
  lines.push(`Prioridad: ${result.priority}`);
  if (result.cancelled) {
    lines.push("Análisis facial interrumpido: resultados parciales.");
  }

  lines.push("");
  lines.push("--- Estadísticas emocionales ---");
  const stats = result.statistics;
  if (stats) {
    lines.push(
      `Detecciones válidas: ${stats.totalDetections} de ${stats.rawDetections} (descartadas: ${stats.droppedDetections})`,
    );
    lines.push(`Fotogramas analizados: ${stats.framesAnalyzed} (excluidos: ${stats.framesExcluded})`);
    if (stats.predominantEmotion) {
      lines.push(
        `Emoción predominante: ${stats.predominantEmotion} (${(stats.predominantPercentage * 100).toFixed(1)}%)`,
      );
    }
    for (const [label, count] of Object.entries(stats.counts)) {
      if (count > 0) lines.push(`  ${label}: ${count}`);
    }
  } else {
    lines.push("Sin estadísticas.");
  }

  lines.push("");
  lines.push("--- Detecciones ---");
  const detectionLines = formatFrames(result.filteredFrames);
  lines.push(...(detectionLines.length > 0 ? detectionLines : ["Sin detecciones por encima del umbral."]));

  lines.push("");
  lines.push("--- Transcripción ---");
  const segments = result.audio?.segments ?? [];
  if (segments.length > 0) {
    for (const seg of segments) {
      lines.push(`${formatTimestamp(seg.startTime)} ${seg.transcript}`);
    }
  } else {
    lines.push("(sin habla detectada)");
  }

  lines.push("");
  lines.push("--- Alertas ---");
  if (result.alerts.length > 0) {
    for (const alert of result.alerts) {
      lines.push(`[${alert.level.toUpperCase()}] ${alert.type}: ${alert.message}`);
      lines.push(`  ${alert.recommendation}`);
    }
  } else {
    lines.push("Sin alertas.");
  }

  lines.push("");
  lines.push("--- Recomendaciones ---");
  for (const rec of result.recommendations) {
    lines.push(`- ${rec}`);
  }
  const activities = result.contextualRecommendations?.activities ?? [];
  if (activities.length > 0) {
    lines.push("");
    lines.push("Actividades sugeridas:");
    for (const activity of activities) {
      lines.push(`- ${activity}`);
    }
  }

  if (result.errors.length > 0) {
    lines.push("");
    lines.push("--- Errores ---");
    for (const error of result.errors) {
      lines.push(`- ${error}`);
    }
  }

  return lines.join("\n") + "\n";
}

/** Write to a temporary file beside `filePath`, then rename over it. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${uuidv4()}.tmp`);
  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

export class FilePersistence {
  private readonly baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  get outputDir(): string {
    return this.baseDir;
  }

  /** Creates the output root. Throws FatalEnvironmentError when it cannot. */
  async ensureStorage(): Promise<void> {
    try {
      await mkdir(this.baseDir, { recursive: true });
    } catch (err) {
      throw new FatalEnvironmentError(
        `Cannot create output directory "${this.baseDir}": ${errorMessage(err)}`,
      );
    }
  }

  sessionDir(sessionId: string, startedAt: Date): string {
    return join(this.baseDir, buildDirectoryName(sessionId, startedAt));
  }

  /** Writes report.txt and returns its path. */
  async writeReport(result: SessionResult): Promise<string> {
    const dirPath = this.sessionDir(result.sessionId, result.startedAt);
    await mkdir(dirPath, { recursive: true });
    const reportPath = join(dirPath, REPORT_FILE);
    await writeFile(reportPath, formatReport(result), "utf-8");
    return reportPath;
  }

  /** Atomically writes session.json and returns its path. The record carries its own path. */
  async writeRecord(result: SessionResult): Promise<string> {
    const dirPath = this.sessionDir(result.sessionId, result.startedAt);
    await mkdir(dirPath, { recursive: true });
    const recordPath = join(dirPath, RECORD_FILE);
    await writeFileAtomic(recordPath, JSON.stringify({ ...result, recordPath }, null, 2));
    return recordPath;
  }
}
