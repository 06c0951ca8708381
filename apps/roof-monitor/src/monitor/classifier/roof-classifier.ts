import {
  invalidFrame,
  isMonitorError,
  modelNotLoaded,
} from "../../shared/errors";
import type { Frame } from "../../shared/types/frame";
import type { RoofModel } from "../../shared/types/model";
import type {
  ClassificationResult,
  RoofLabel,
} from "../../shared/types/status";
import { type PixelDecoder, decodeGrayscalePixels } from "./pixel-decoder";

export interface FrameClassifier {
  classify(frame: Frame): Promise<ClassificationResult>;
}

export type RoofClassifierOptions = {
  threshold: number;
  model?: RoofModel | null;
  decoder?: PixelDecoder;
  now?: () => number;
};

const sigmoid = (value: number): number => {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
};

/**
 * A score sitting exactly on the threshold is reported CLOSED: calling an
 * open roof closed is the safe failure.
 */
export const decideLabel = (
  openProbability: number,
  threshold: number,
): RoofLabel => (openProbability > threshold ? "OPEN" : "CLOSED");

export const scorePixels = (model: RoofModel, pixels: Uint8Array): number => {
  let activation = model.intercept;
  for (let index = 0; index < model.weights.length; index += 1) {
    activation += model.weights[index] * pixels[index] * model.pixelScale;
  }
  return sigmoid(activation);
};

export class RoofClassifier implements FrameClassifier {
  private model: RoofModel | null;

  private readonly threshold: number;

  private readonly decode: PixelDecoder;

  private readonly now: () => number;

  constructor({
    threshold,
    model = null,
    decoder = decodeGrayscalePixels,
    now = Date.now,
  }: RoofClassifierOptions) {
    this.threshold = threshold;
    this.model = model;
    this.decode = decoder;
    this.now = now;
  }

  attachModel(model: RoofModel): void {
    this.model = model;
  }

  hasModel(): boolean {
    return this.model !== null;
  }

  async classify(frame: Frame): Promise<ClassificationResult> {
    const { model } = this;
    if (!model) {
      throw modelNotLoaded();
    }

    const data = await frame.load();

    let pixels: Uint8Array;
    try {
      pixels = await this.decode(data, model.imageSize);
    } catch (error) {
      if (isMonitorError(error)) {
        throw error;
      }
      throw invalidFrame(frame.path, "image could not be decoded", error);
    }

    if (pixels.length !== model.weights.length) {
      throw invalidFrame(
        frame.path,
        `expected ${model.weights.length} pixels, decoded ${pixels.length}`,
      );
    }

    const openProbability = scorePixels(model, pixels);
    const label = decideLabel(openProbability, this.threshold);

    return Object.freeze({
      label,
      confidence: label === "OPEN" ? openProbability : 1 - openProbability,
      openProbability,
      framePath: frame.path,
      frameModifiedAt: frame.modifiedAt,
      evaluatedAt: this.now(),
      override: null,
    });
  }
}
