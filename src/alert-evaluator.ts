// Child Affect Analyzer - Alert Evaluator
// Pure decision table over the session's aggregated statistics, resolved
// profile, communication level and stage error count.

import type {
  Alert,
  AlertLevel,
  AlertType,
  CommunicationLevel,
  EmotionStatistics,
  SessionConfig,
  SessionPriority,
} from "./types.js";
import { emotionShare } from "./emotion-statistics.js";

// ─── Thresholds ─────────────────────────────────────────────────────────────────

export interface AlertThresholds {
  /** Negative-emotion share strictly above this raises emotional/alto. */
  negativeShare: number;
  /** Share of any profile alert emotion strictly above this raises diagnosis_specific/medio. */
  alertEmotionShare: number;
  /** pre_verbal sessions with fewer attempts than this raise communication/medio. */
  minAttemptsForLimited: number;
  /** More stage errors than this raise technical/medio. */
  maxStageErrors: number;
}

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  negativeShare: 0.6,
  alertEmotionShare: 0.3,
  minAttemptsForLimited: 2,
  maxStageErrors: 2,
};

// ─── Fixed texts ────────────────────────────────────────────────────────────────

const ALERT_RECOMMENDATIONS: Record<AlertType, string> = {
  emotional:
    "Revisar con el equipo terapéutico los momentos de malestar y reforzar estrategias de regulación emocional.",
  diagnosis_specific:
    "Comparar con sesiones anteriores y ajustar el plan de intervención según el perfil diagnóstico.",
  communication:
    "Valorar apoyos de comunicación aumentativa y aumentar las oportunidades de intercambio comunicativo.",
  technical:
    "Repetir la grabación con buena iluminación y audio claro; los resultados de esta sesión son parciales.",
};

// ─── Evaluation ─────────────────────────────────────────────────────────────────

export interface AlertInput {
  statistics: EmotionStatistics;
  config: SessionConfig;
  communicationLevel: CommunicationLevel;
  attemptCount: number;
  stageErrorCount: number;
}

function makeAlert(type: AlertType, level: AlertLevel, message: string, timestamp: string): Alert {
  return Object.freeze({
    type,
    level,
    message,
    recommendation: ALERT_RECOMMENDATIONS[type],
    timestamp,
  });
}

function percent(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}

/** Evaluate the alert table. `now` is injectable for deterministic timestamps. */
export function evaluateAlerts(
  input: AlertInput,
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS,
  now: () => Date = () => new Date(),
): Alert[] {
  const timestamp = now().toISOString();
  const alerts: Alert[] = [];
  const { statistics } = input;

  if (statistics.totalDetections > 0) {
    const negativeShare = statistics.groupCounts.negative / statistics.totalDetections;
    if (negativeShare > thresholds.negativeShare) {
      alerts.push(
        makeAlert(
          "emotional",
          "alto",
          `Predominio de emociones negativas: ${percent(negativeShare)} de las detecciones.`,
          timestamp,
        ),
      );
    }

    const flagged = input.config.alertEmotions.filter(
      (label) => emotionShare(statistics, label) > thresholds.alertEmotionShare,
    );
    if (flagged.length > 0) {
      const detail = flagged
        .map((label) => `${label} ${percent(emotionShare(statistics, label))}`)
        .join(", ");
      alerts.push(
        makeAlert(
          "diagnosis_specific",
          "medio",
          `Emociones de alerta para el perfil ${input.config.diagnosisCategory}: ${detail}.`,
          timestamp,
        ),
      );
    }
  }

  if (input.communicationLevel === "no_verbal") {
    alerts.push(
      makeAlert("communication", "alto", "No se detectaron intentos de comunicación verbal.", timestamp),
    );
  } else if (
    input.communicationLevel === "pre_verbal" &&
    input.attemptCount < thresholds.minAttemptsForLimited
  ) {
    alerts.push(
      makeAlert(
        "communication",
        "medio",
        `Comunicación verbal limitada: ${input.attemptCount} intento(s) detectado(s).`,
        timestamp,
      ),
    );
  }

  if (input.stageErrorCount > thresholds.maxStageErrors) {
    alerts.push(
      makeAlert(
        "technical",
        "medio",
        `Se produjeron ${input.stageErrorCount} errores durante el análisis.`,
        timestamp,
      ),
    );
  }

  return alerts;
}

export function derivePriority(alerts: readonly Alert[]): SessionPriority {
  if (alerts.some((a) => a.level === "alto")) return "critico";
  if (alerts.some((a) => a.level === "medio")) return "moderado";
  return "normal";
}
