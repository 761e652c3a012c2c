// Shared utilities for the Child Affect Analyzer.
//
// Deterministic helpers used across the scorer, the statistics stage and
// the recommendation engine, plus the console logger factory.

import type { Logger } from "./types.js";

// ─── Logging ────────────────────────────────────────────────────────────────────

/**
 * Console logger with level and component prefixes:
 *   [INFO] [StageOrchestrator] Session abc started
 */
export function createConsoleLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

// ─── Text ───────────────────────────────────────────────────────────────────────

/**
 * Lowercase and strip diacritics so "Parálisis" and "paralisis" compare equal.
 */
export function foldText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase();
}

/** Split a transcript into words on whitespace, dropping empty tokens. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

// ─── Numbers ────────────────────────────────────────────────────────────────────

/** Round a metric value to the specified number of decimal places. */
export function roundMetric(value: number, precision: number = 4): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/** Population standard deviation. */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) ** 2;
  return Math.sqrt(acc / values.length);
}
