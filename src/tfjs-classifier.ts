// Child Affect Analyzer - TensorFlow.js classifier loader
// Loads a Keras-style layers model (`model.json` plus binary weight shards)
// from disk and wraps it as an EmotionClassifier. Runs on the pure-JS CPU
// backend, so nothing native is needed at install time.

import * as tf from "@tensorflow/tfjs";
import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { EMOTION_LABELS, type EmotionClassifier, type ModelDescriptor, type Tensor } from "./types.js";
import type { ClassifierLoader } from "./model-registry.js";

// ─── model.json ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWeightEntry(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.dtype === "string" &&
    Array.isArray(value.shape) &&
    value.shape.every((d) => typeof d === "number")
  );
}

function isWeightGroup(value: unknown): boolean {
  return (
    isRecord(value) &&
    Array.isArray(value.paths) &&
    value.paths.every((p) => typeof p === "string") &&
    Array.isArray(value.weights) &&
    value.weights.every(isWeightEntry)
  );
}

export function isLayersModelJson(value: unknown): value is tf.io.ModelJSON {
  return (
    isRecord(value) &&
    isRecord(value.modelTopology) &&
    Array.isArray(value.weightsManifest) &&
    value.weightsManifest.every(isWeightGroup)
  );
}

/** Reads every shard listed in the manifest, in order, into one buffer. */
async function readWeightShards(baseDir: string, manifest: tf.io.WeightsManifestConfig): Promise<ArrayBuffer> {
  const shards: Buffer[] = [];
  for (const group of manifest) {
    for (const path of group.paths) {
      shards.push(await readFile(join(baseDir, path)));
    }
  }
  const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
  const buffer = new ArrayBuffer(total);
  const view = new Uint8Array(buffer);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }
  return buffer;
}

/** IOHandler that loads `model.json` and its shards from the local file system. */
export function fileSystemHandler(modelJsonPath: string): tf.io.IOHandler {
  return {
    load: async () => {
      const raw: unknown = JSON.parse(await readFile(modelJsonPath, "utf-8"));
      if (!isLayersModelJson(raw)) {
        throw new Error(`${modelJsonPath} is not a TensorFlow.js layers model`);
      }
      const baseDir = dirname(modelJsonPath);
      return tf.io.getModelArtifactsForJSON(raw, async (manifest) => {
        const specs = manifest.flatMap((group) => group.weights);
        return [specs, await readWeightShards(baseDir, manifest)];
      });
    },
  };
}

// ─── Classifier ─────────────────────────────────────────────────────────────────

function formatShape(shape: ReadonlyArray<number | null>): string {
  return `[${shape.map((d) => (d === null ? "?" : String(d))).join(", ")}]`;
}

export class TfjsEmotionClassifier implements EmotionClassifier {
  readonly name: string;
  private readonly model: tf.LayersModel;

  constructor(name: string, model: tf.LayersModel) {
    this.name = name;
    this.model = model;
  }

  async predict(input: Tensor): Promise<number[]> {
    const x = tf.tensor(input.data, input.shape);
    const prediction = this.model.predict(x);
    const outputs = Array.isArray(prediction) ? prediction : [prediction];
    try {
      return Array.from(await outputs[0].data());
    } finally {
      x.dispose();
      for (const output of outputs) output.dispose();
    }
  }
}

/**
 * ClassifierLoader for TensorFlow.js layers models. The model's input must
 * match the manifest's inputShape (batch dimension excluded) and its output
 * must carry one score per emotion label.
 */
export const tfjsClassifierLoader: ClassifierLoader = async (
  descriptor: ModelDescriptor,
  artifactPath: string,
): Promise<EmotionClassifier> => {
  await tf.ready();
  const model = await tf.loadLayersModel(fileSystemHandler(artifactPath));

  const inputShape = model.inputs[0].shape.slice(1);
  const matches =
    inputShape.length === descriptor.inputShape.length &&
    inputShape.every((d, i) => d === descriptor.inputShape[i]);
  if (!matches) {
    model.dispose();
    throw new Error(
      `Model ${descriptor.name} expects input ${formatShape(inputShape)}, manifest declares ${formatShape(descriptor.inputShape)}`,
    );
  }

  const outputShape = model.outputs[0].shape;
  const classes = outputShape[outputShape.length - 1];
  if (classes !== EMOTION_LABELS.length) {
    model.dispose();
    throw new Error(
      `Model ${descriptor.name} outputs ${formatShape(outputShape)}, expected ${EMOTION_LABELS.length} classes`,
    );
  }

  return new TfjsEmotionClassifier(descriptor.name, model);
};
