export const ROOF_MODEL_FORMAT = "roof-logreg" as const;

export const ROOF_MODEL_VERSION = 1;

/**
 * Logistic regression over a flattened grayscale square image.
 * `weights` has `imageSize * imageSize` entries in row-major order.
 */
export type RoofModel = {
  format: typeof ROOF_MODEL_FORMAT;
  version: typeof ROOF_MODEL_VERSION;
  imageSize: number;
  pixelScale: number;
  weights: number[];
  intercept: number;
  trainedAt?: string;
  samples?: {
    open: number;
    closed: number;
  };
};
