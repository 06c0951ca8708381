import { mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { vi } from "vitest";
import type { Logger } from "../shared/logger";
import type { RoofModel } from "../shared/types/model";

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(async () => undefined),
});

export const createTempDir = (prefix = "roof-monitor-") =>
  mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (directory: string) =>
  rm(directory, { recursive: true, force: true });

/**
 * Writes a solid grayscale PNG and pins its mtime so frame ordering is
 * deterministic.
 */
export const writeSolidPng = async (
  filePath: string,
  gray: number,
  modifiedAtSeconds?: number,
  size = 8,
): Promise<void> => {
  const png = await sharp({
    create: {
      width: size,
      height: size,
      channels: 3,
      background: { r: gray, g: gray, b: gray },
    },
  })
    .png()
    .toBuffer();
  await writeFile(filePath, png);
  if (modifiedAtSeconds !== undefined) {
    await utimes(filePath, modifiedAtSeconds, modifiedAtSeconds);
  }
};

/**
 * A model that reads bright frames as OPEN and dark frames as CLOSED.
 * White: 0.01 * 1 * 1024 - 5 = 5.24 (p ~ 0.995). Black: -5 (p ~ 0.0067).
 */
export const createBrightnessModel = (imageSize = 32): RoofModel => ({
  format: "roof-logreg",
  version: 1,
  imageSize,
  pixelScale: 1 / 255,
  weights: new Array<number>(imageSize * imageSize).fill(0.01),
  intercept: -5,
});
