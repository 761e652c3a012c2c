// Child Affect Analyzer - Input Validation
// Checks a video path before any stage runs. Failures are ValidationErrors,
// which the orchestrator turns into a SessionFailure.

import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { extname } from "node:path";
import { ValidationError } from "./errors.js";

export const SUPPORTED_VIDEO_EXTENSIONS: readonly string[] = [".mp4", ".avi", ".mov", ".mkv"];
export const MAX_VIDEO_BYTES = 200 * 1024 * 1024;

export interface VideoValidationOptions {
  extensions?: readonly string[];
  maxBytes?: number;
}

/** Resolves with the file size in bytes, or rejects with a ValidationError. */
export async function validateVideoFile(
  videoPath: string | null | undefined,
  options: VideoValidationOptions = {},
): Promise<number> {
  const extensions = options.extensions ?? SUPPORTED_VIDEO_EXTENSIONS;
  const maxBytes = options.maxBytes ?? MAX_VIDEO_BYTES;

  if (typeof videoPath !== "string" || videoPath.trim().length === 0) {
    throw new ValidationError("Video path is required");
  }

  const extension = extname(videoPath).toLowerCase();
  if (!extensions.includes(extension)) {
    throw new ValidationError(
      `Unsupported video format "${extension || "(none)"}"; expected one of ${extensions.join(", ")}`,
    );
  }

  let size: number;
  try {
    const info = await stat(videoPath);
    if (!info.isFile()) {
      throw new ValidationError(`Video path is not a regular file: ${videoPath}`);
    }
    size = info.size;
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    throw new ValidationError(`Video file not found: ${videoPath}`);
  }

  if (size === 0) {
    throw new ValidationError(`Video file is empty: ${videoPath}`);
  }
  if (size > maxBytes) {
    const mb = (size / (1024 * 1024)).toFixed(1);
    throw new ValidationError(`Video file is too large (${mb} MB); the limit is ${maxBytes / (1024 * 1024)} MB`);
  }

  try {
    await access(videoPath, constants.R_OK);
  } catch {
    throw new ValidationError(`Video file is not readable: ${videoPath}`);
  }

  return size;
}
