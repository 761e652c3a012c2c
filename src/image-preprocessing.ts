/**
 * Image preprocessing for emotion classifiers.
 *
 * Every model receives its own tensor: intensity conversion, area resize to the
 * model's expected size, adaptive histogram equalization (CLAHE), scaling to
 * [0,1] and a reshape to the model's tensor rank. The same module computes the
 * image statistics the fallback heuristic classifies from.
 */

import type { BoundingBox, GrayImage, ImageFrame, InputShape, Tensor } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export interface ClaheOptions {
  tilesX: number;
  tilesY: number;
  clipLimit: number;
}

export const DEFAULT_CLAHE_OPTIONS: ClaheOptions = {
  tilesX: 8,
  tilesY: 8,
  clipLimit: 2.0,
};

const HISTOGRAM_BINS = 256;

// ─── Conversion ─────────────────────────────────────────────────────────────────

/** ITU-R BT.601 luma for RGB(A); single-channel input is copied as-is. */
export function toGrayscale(image: ImageFrame): GrayImage {
  const { width, height, channels, data } = image;
  const pixelCount = width * height;
  const out = new Float32Array(pixelCount);

  if (data.length < pixelCount * channels) {
    throw new Error(
      `Image buffer too small: expected ${pixelCount * channels} bytes, got ${data.length}`,
    );
  }

  if (channels === 1) {
    for (let i = 0; i < pixelCount; i++) out[i] = data[i];
    return { width, height, data: out };
  }

  for (let i = 0; i < pixelCount; i++) {
    const o = i * channels;
    out[i] = 0.299 * data[o] + 0.587 * data[o + 1] + 0.114 * data[o + 2];
  }
  return { width, height, data: out };
}

/**
 * Crop a region out of a frame. The box is clamped to the frame; an empty
 * intersection throws.
 */
export function cropImage(image: ImageFrame, box: BoundingBox): ImageFrame {
  const x0 = Math.max(0, Math.floor(box.x));
  const y0 = Math.max(0, Math.floor(box.y));
  const x1 = Math.min(image.width, Math.floor(box.x + box.width));
  const y1 = Math.min(image.height, Math.floor(box.y + box.height));
  const width = x1 - x0;
  const height = y1 - y0;

  if (width <= 0 || height <= 0) {
    throw new Error(`Bounding box outside frame: ${JSON.stringify(box)}`);
  }

  const { channels } = image;
  const data = new Uint8Array(width * height * channels);
  for (let y = 0; y < height; y++) {
    const srcStart = ((y0 + y) * image.width + x0) * channels;
    data.set(image.data.subarray(srcStart, srcStart + width * channels), y * width * channels);
  }
  return { width, height, channels, data };
}

// ─── Resize ─────────────────────────────────────────────────────────────────────

/**
 * Area-preserving resize: each destination pixel is the coverage-weighted mean
 * of the source pixels its footprint overlaps.
 */
export function resizeArea(image: GrayImage, width: number, height: number): GrayImage {
  if (width <= 0 || height <= 0) {
    throw new Error(`Invalid target size ${width}x${height}`);
  }
  if (width === image.width && height === image.height) {
    return { width, height, data: Float32Array.from(image.data) };
  }

  const sx = image.width / width;
  const sy = image.height / height;
  const out = new Float32Array(width * height);

  for (let dy = 0; dy < height; dy++) {
    const yStart = dy * sy;
    const yEnd = yStart + sy;
    for (let dx = 0; dx < width; dx++) {
      const xStart = dx * sx;
      const xEnd = xStart + sx;
      let acc = 0;
      let area = 0;

      for (let y = Math.floor(yStart); y < Math.ceil(yEnd) && y < image.height; y++) {
        const wy = Math.min(yEnd, y + 1) - Math.max(yStart, y);
        if (wy <= 0) continue;
        for (let x = Math.floor(xStart); x < Math.ceil(xEnd) && x < image.width; x++) {
          const wx = Math.min(xEnd, x + 1) - Math.max(xStart, x);
          if (wx <= 0) continue;
          acc += image.data[y * image.width + x] * wx * wy;
          area += wx * wy;
        }
      }

      out[dy * width + dx] = area > 0 ? acc / area : 0;
    }
  }

  return { width, height, data: out };
}

// ─── CLAHE ──────────────────────────────────────────────────────────────────────

/** Clipped, redistributed histogram mapped to a 0-255 lookup table. */
function buildTileLut(
  image: GrayImage,
  x0: number,
  x1: number,
  y0: number,
  y1: number,
  clipLimit: number,
): Float32Array {
  const hist = new Float64Array(HISTOGRAM_BINS);
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      hist[intensityBin(image.data[y * image.width + x])]++;
    }
  }

  const tileArea = (x1 - x0) * (y1 - y0);
  const limit = Math.max(1, (clipLimit * tileArea) / HISTOGRAM_BINS);

  let excess = 0;
  for (let i = 0; i < HISTOGRAM_BINS; i++) {
    if (hist[i] > limit) {
      excess += hist[i] - limit;
      hist[i] = limit;
    }
  }
  const share = excess / HISTOGRAM_BINS;
  for (let i = 0; i < HISTOGRAM_BINS; i++) hist[i] += share;

  const lut = new Float32Array(HISTOGRAM_BINS);
  let cdf = 0;
  for (let i = 0; i < HISTOGRAM_BINS; i++) {
    cdf += hist[i];
    lut[i] = Math.min(255, (cdf * 255) / tileArea);
  }
  return lut;
}

function intensityBin(value: number): number {
  const v = Math.round(value);
  if (v < 0) return 0;
  if (v > 255) return 255;
  return v;
}

/**
 * Contrast-limited adaptive histogram equalization. Each tile gets its own
 * clipped equalization table; pixels blend the four nearest tables bilinearly.
 */
export function equalizeAdaptive(
  image: GrayImage,
  options: ClaheOptions = DEFAULT_CLAHE_OPTIONS,
): GrayImage {
  const { width, height } = image;
  const tilesX = Math.max(1, Math.min(options.tilesX, width));
  const tilesY = Math.max(1, Math.min(options.tilesY, height));
  const tileW = width / tilesX;
  const tileH = height / tilesY;

  const luts: Float32Array[][] = [];
  for (let ty = 0; ty < tilesY; ty++) {
    const row: Float32Array[] = [];
    const y0 = Math.floor(ty * tileH);
    const y1 = Math.floor((ty + 1) * tileH);
    for (let tx = 0; tx < tilesX; tx++) {
      const x0 = Math.floor(tx * tileW);
      const x1 = Math.floor((tx + 1) * tileW);
      row.push(buildTileLut(image, x0, x1, y0, y1, options.clipLimit));
    }
    luts.push(row);
  }

  const out = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    const fy = (y + 0.5) / tileH - 0.5;
    const ty0 = Math.max(0, Math.min(tilesY - 1, Math.floor(fy)));
    const ty1 = Math.min(tilesY - 1, ty0 + 1);
    const ay = Math.max(0, Math.min(1, fy - ty0));

    for (let x = 0; x < width; x++) {
      const fx = (x + 0.5) / tileW - 0.5;
      const tx0 = Math.max(0, Math.min(tilesX - 1, Math.floor(fx)));
      const tx1 = Math.min(tilesX - 1, tx0 + 1);
      const ax = Math.max(0, Math.min(1, fx - tx0));

      const bin = intensityBin(image.data[y * width + x]);
      const top = luts[ty0][tx0][bin] * (1 - ax) + luts[ty0][tx1][bin] * ax;
      const bottom = luts[ty1][tx0][bin] * (1 - ax) + luts[ty1][tx1][bin] * ax;
      out[y * width + x] = top * (1 - ay) + bottom * ay;
    }
  }

  return { width, height, data: out };
}

// ─── Tensor ─────────────────────────────────────────────────────────────────────

/**
 * Scale 0-255 intensities to [0,1] and lay them out for the model:
 * `[1, h, w]` for rank-2 shapes, `[1, h, w, c]` for rank-3 (intensity repeated
 * across channels).
 */
export function toTensor(image: GrayImage, inputShape: InputShape): Tensor {
  const [height, width] = inputShape;
  if (image.width !== width || image.height !== height) {
    throw new Error(
      `Image is ${image.width}x${image.height}, model expects ${width}x${height}`,
    );
  }

  const channels = inputShape.length === 3 ? inputShape[2] : 1;
  const pixelCount = width * height;
  const data = new Float32Array(pixelCount * channels);
  for (let i = 0; i < pixelCount; i++) {
    const v = Math.min(1, Math.max(0, image.data[i] / 255));
    for (let c = 0; c < channels; c++) data[i * channels + c] = v;
  }

  const shape = inputShape.length === 3 ? [1, height, width, channels] : [1, height, width];
  return { data, shape };
}

/** Full per-model preprocessing chain. */
export function preprocessFace(image: ImageFrame, inputShape: InputShape): Tensor {
  const [height, width] = inputShape;
  const gray = toGrayscale(image);
  const resized = resizeArea(gray, width, height);
  const equalized = equalizeAdaptive(resized);
  return toTensor(equalized, inputShape);
}

// ─── Statistics ─────────────────────────────────────────────────────────────────

export interface ImageStatistics {
  meanIntensity: number;
  stdIntensity: number;
  edgeMean: number; // mean Sobel gradient magnitude over interior pixels
}

/** Mean Sobel gradient magnitude; 0 for images too small to have an interior. */
export function sobelMagnitudeMean(image: GrayImage): number {
  const { width, height, data } = image;
  if (width < 3 || height < 3) return 0;

  let acc = 0;
  let count = 0;
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const p = (dx: number, dy: number) => data[(y + dy) * width + (x + dx)];
      const gx =
        -p(-1, -1) - 2 * p(-1, 0) - p(-1, 1) + p(1, -1) + 2 * p(1, 0) + p(1, 1);
      const gy =
        -p(-1, -1) - 2 * p(0, -1) - p(1, -1) + p(-1, 1) + 2 * p(0, 1) + p(1, 1);
      acc += Math.sqrt(gx * gx + gy * gy);
      count++;
    }
  }
  return acc / count;
}

export function imageStatistics(image: ImageFrame): ImageStatistics {
  const gray = toGrayscale(image);
  const n = gray.data.length;
  if (n === 0) {
    return { meanIntensity: 0, stdIntensity: 0, edgeMean: 0 };
  }

  let sum = 0;
  for (let i = 0; i < n; i++) sum += gray.data[i];
  const meanIntensity = sum / n;

  let sq = 0;
  for (let i = 0; i < n; i++) sq += (gray.data[i] - meanIntensity) ** 2;
  const stdIntensity = Math.sqrt(sq / n);

  return { meanIntensity, stdIntensity, edgeMean: sobelMagnitudeMean(gray) };
}
