// Child Affect Analyzer - Model Registry
// Loads the EnsembleConfig from a models directory. The directory holds a
// `models.json` manifest plus one artifact per entry; turning an artifact into
// a runnable EmotionClassifier is delegated to an injected loader.
//
// Missing artifacts and loader failures drop the model (and its weight).
// Malformed entries and duplicate names with conflicting shapes are errors.

import { access, readFile } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import type {
  EmotionClassifier,
  EnsembleConfig,
  InputShape,
  LoadedModel,
  Logger,
  ModelDescriptor,
} from "./types.js";
import { EnsembleConfigError, errorMessage } from "./errors.js";
import { normalizeWeights } from "./emotion-ensemble.js";
import { createConsoleLogger } from "./utils.js";

export const MANIFEST_FILE = "models.json";

/** Turns an artifact on disk into a classifier; framework-specific, supplied by the host. */
export type ClassifierLoader = (
  descriptor: ModelDescriptor,
  artifactPath: string,
) => Promise<EmotionClassifier>;

// ─── Manifest parsing ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseInputShape(raw: unknown, prefix: string): InputShape {
  if (
    !Array.isArray(raw) ||
    (raw.length !== 2 && raw.length !== 3) ||
    !raw.every((d) => typeof d === "number" && Number.isInteger(d) && d > 0)
  ) {
    throw new EnsembleConfigError(
      `${prefix}: inputShape must be [height, width] or [height, width, channels] of positive integers`,
    );
  }
  const dims: number[] = raw;
  return dims.length === 3 ? [dims[0], dims[1], dims[2]] : [dims[0], dims[1]];
}

/** Parse and validate manifest entries. Throws EnsembleConfigError on malformed input. */
export function parseManifest(raw: unknown): ModelDescriptor[] {
  if (!Array.isArray(raw)) {
    throw new EnsembleConfigError("Model manifest must be an array of model entries");
  }

  return raw.map((entry: unknown, index: number) => {
    const prefix = `models[${index}]`;
    if (!isRecord(entry)) {
      throw new EnsembleConfigError(`${prefix}: entry must be an object`);
    }
    if (typeof entry.name !== "string" || entry.name.trim().length === 0) {
      throw new EnsembleConfigError(`${prefix}: missing or invalid 'name'`);
    }
    if (typeof entry.file !== "string" || entry.file.trim().length === 0) {
      throw new EnsembleConfigError(`${prefix}: missing or invalid 'file'`);
    }
    if (typeof entry.weight !== "number" || !(entry.weight > 0 && entry.weight <= 1)) {
      throw new EnsembleConfigError(`${prefix}: weight must be in (0, 1]`);
    }
    return {
      name: entry.name,
      file: entry.file,
      inputShape: parseInputShape(entry.inputShape, prefix),
      weight: entry.weight,
    };
  });
}

function sameShape(a: InputShape, b: InputShape): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

/**
 * Collapse repeated names. Identical repeats keep the first entry; a repeat
 * with a different shape is a configuration error.
 */
export function dedupeDescriptors(
  descriptors: readonly ModelDescriptor[],
  logger: Logger,
): ModelDescriptor[] {
  const byName = new Map<string, ModelDescriptor>();
  for (const d of descriptors) {
    const existing = byName.get(d.name);
    if (!existing) {
      byName.set(d.name, d);
      continue;
    }
    if (!sameShape(existing.inputShape, d.inputShape)) {
      throw new EnsembleConfigError(
        `Model "${d.name}" declared twice with conflicting input shapes ` +
          `[${existing.inputShape.join(", ")}] and [${d.inputShape.join(", ")}]`,
      );
    }
    logger.warn(`Duplicate model entry "${d.name}" ignored`);
  }
  return [...byName.values()];
}

/** Freeze a loaded model list with weights renormalized to sum to 1. */
export function buildEnsembleConfig(models: readonly LoadedModel[]): EnsembleConfig {
  const weights = normalizeWeights(models.map((m) => m.descriptor.weight));
  const normalized = models.map((m, i) =>
    Object.freeze({
      descriptor: Object.freeze({ ...m.descriptor, weight: weights[i] }),
      classifier: m.classifier,
    }),
  );
  return Object.freeze({ models: Object.freeze(normalized) });
}

// ─── Loading ────────────────────────────────────────────────────────────────────

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load every model listed in `<modelsDir>/models.json`.
 * A missing manifest yields an empty config, so every prediction uses the fallback.
 */
export async function loadEnsembleConfig(
  modelsDir: string,
  loader: ClassifierLoader,
  logger: Logger = createConsoleLogger("ModelRegistry"),
): Promise<EnsembleConfig> {
  const manifestPath = join(modelsDir, MANIFEST_FILE);
  if (!(await fileExists(manifestPath))) {
    logger.warn(`No model manifest at ${manifestPath}; scoring will use the fallback heuristic`);
    return buildEnsembleConfig([]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(manifestPath, "utf-8"));
  } catch (err) {
    throw new EnsembleConfigError(`Cannot parse ${manifestPath}: ${errorMessage(err)}`);
  }

  const descriptors = dedupeDescriptors(parseManifest(raw), logger);
  const loaded: LoadedModel[] = [];

  for (const descriptor of descriptors) {
    const artifactPath = join(modelsDir, descriptor.file);
    if (!(await fileExists(artifactPath))) {
      logger.warn(`Model artifact missing, skipping ${descriptor.name}: ${artifactPath}`);
      continue;
    }
    try {
      const classifier = await loader(descriptor, artifactPath);
      loaded.push({ descriptor, classifier });
      logger.info(`Loaded model ${descriptor.name} [${descriptor.inputShape.join("x")}]`);
    } catch (err) {
      logger.warn(`Model ${descriptor.name} failed to load, weight discarded: ${errorMessage(err)}`);
    }
  }

  const config = buildEnsembleConfig(loaded);
  logger.info(`Ensemble ready with ${config.models.length}/${descriptors.length} model(s)`);
  return config;
}
