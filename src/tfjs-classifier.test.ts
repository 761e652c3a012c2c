import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";
import * as tf from "@tensorflow/tfjs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isLayersModelJson, tfjsClassifierLoader } from "./tfjs-classifier.js";
import { loadEnsembleConfig } from "./model-registry.js";
import type { Logger, ModelDescriptor, Tensor } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** 4x4 grayscale input, seven softmax outputs. */
function tinyModel(): tf.Sequential {
  const model = tf.sequential();
  model.add(tf.layers.flatten({ inputShape: [4, 4] }));
  model.add(tf.layers.dense({ units: 7, activation: "softmax" }));
  return model;
}

/** Saves `model` as `<dir>/model.json` plus a single `weights.bin` shard. */
async function saveModel(model: tf.LayersModel, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  await model.save(
    tf.io.withSaveHandler(async (artifacts) => {
      const weightData = artifacts.weightData;
      const chunks: ArrayBuffer[] = weightData === undefined ? [] : Array.isArray(weightData) ? weightData : [weightData];
      await writeFile(join(dir, "weights.bin"), Buffer.concat(chunks.map((chunk) => Buffer.from(chunk))));
      await writeFile(
        join(dir, "model.json"),
        JSON.stringify({
          modelTopology: artifacts.modelTopology,
          format: "layers-model",
          weightsManifest: [{ paths: ["weights.bin"], weights: artifacts.weightSpecs ?? [] }],
        }),
      );
      return { modelArtifactsInfo: { dateSaved: new Date(), modelTopologyType: "JSON" } };
    }),
  );
  return join(dir, "model.json");
}

function descriptor(overrides: Partial<ModelDescriptor> = {}): ModelDescriptor {
  return { name: "tiny", file: "tiny/model.json", inputShape: [4, 4], weight: 1, ...overrides };
}

const INPUT: Tensor = {
  data: Float32Array.from({ length: 16 }, (_, i) => i / 15),
  shape: [1, 4, 4],
};

let dir: string;

beforeAll(async () => {
  await tf.setBackend("cpu");
});

afterEach(async () => {
  if (dir) await rm(dir, { recursive: true, force: true });
});

// ─── Loader ─────────────────────────────────────────────────────────────────────

describe("tfjsClassifierLoader", () => {
  it("loads a saved layers model and reproduces its predictions", async () => {
    dir = await mkdtemp(join(tmpdir(), "tfjs-"));
    const model = tinyModel();
    const path = await saveModel(model, join(dir, "tiny"));

    const classifier = await tfjsClassifierLoader(descriptor(), path);
    const scores = await classifier.predict(INPUT);

    const direct = model.predict(tf.tensor(INPUT.data, INPUT.shape));
    const expected = Array.from(await (Array.isArray(direct) ? direct[0] : direct).data());
    expect(classifier.name).toBe("tiny");
    expect(scores).toHaveLength(7);
    expect(scores.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 5);
    scores.forEach((score, i) => expect(score).toBeCloseTo(expected[i], 5));
  });

  it("rejects a model whose input does not match the manifest", async () => {
    dir = await mkdtemp(join(tmpdir(), "tfjs-"));
    const path = await saveModel(tinyModel(), join(dir, "tiny"));

    await expect(tfjsClassifierLoader(descriptor({ inputShape: [5, 5] }), path)).rejects.toThrow(
      "Model tiny expects input [4, 4], manifest declares [5, 5]",
    );
  });

  it("rejects a model without one output per emotion label", async () => {
    dir = await mkdtemp(join(tmpdir(), "tfjs-"));
    const model = tf.sequential();
    model.add(tf.layers.flatten({ inputShape: [4, 4] }));
    model.add(tf.layers.dense({ units: 3, activation: "softmax" }));
    const path = await saveModel(model, join(dir, "three"));

    await expect(tfjsClassifierLoader(descriptor(), path)).rejects.toThrow(
      "Model tiny outputs [?, 3], expected 7 classes",
    );
  });

  it("rejects a file that is not a layers model", async () => {
    dir = await mkdtemp(join(tmpdir(), "tfjs-"));
    const path = join(dir, "model.json");
    await writeFile(path, JSON.stringify({ weights: [] }));

    await expect(tfjsClassifierLoader(descriptor(), path)).rejects.toThrow(
      `${path} is not a TensorFlow.js layers model`,
    );
  });
});

describe("isLayersModelJson", () => {
  it("accepts a topology with a weights manifest", () => {
    expect(
      isLayersModelJson({
        modelTopology: { class_name: "Sequential" },
        weightsManifest: [{ paths: ["w.bin"], weights: [{ name: "k", shape: [16, 7], dtype: "float32" }] }],
      }),
    ).toBe(true);
  });

  it.each([null, [], { modelTopology: {} }, { modelTopology: {}, weightsManifest: [{ paths: [1], weights: [] }] }])(
    "rejects %j",
    (value) => {
      expect(isLayersModelJson(value)).toBe(false);
    },
  );
});

// ─── Registry integration ───────────────────────────────────────────────────────

describe("loadEnsembleConfig with the TensorFlow.js loader", () => {
  it("loads the models listed in the manifest", async () => {
    dir = await mkdtemp(join(tmpdir(), "tfjs-"));
    await saveModel(tinyModel(), join(dir, "tiny"));
    await writeFile(join(dir, "models.json"), JSON.stringify([descriptor({ weight: 0.5 })]));

    const config = await loadEnsembleConfig(dir, tfjsClassifierLoader, silentLogger());

    expect(config.models).toHaveLength(1);
    expect(config.models[0].descriptor.weight).toBe(1);
    const scores = await config.models[0].classifier.predict(INPUT);
    expect(scores).toHaveLength(7);
  });
});
