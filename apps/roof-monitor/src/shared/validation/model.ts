import {
  ROOF_MODEL_FORMAT,
  ROOF_MODEL_VERSION,
  type RoofModel,
} from "../types/model";

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

const isPositiveInteger = (value: unknown): value is number => {
  return isFiniteNumber(value) && Number.isInteger(value) && value > 0;
};

const isSampleCounts = (
  value: unknown,
): value is NonNullable<RoofModel["samples"]> => {
  return (
    isRecord(value) &&
    isFiniteNumber(value.open) &&
    isFiniteNumber(value.closed)
  );
};

/**
 * Lists every reason `value` is not a usable roof model. Empty when valid.
 */
export const describeRoofModelIssues = (value: unknown): string[] => {
  if (!isRecord(value)) {
    return ["model must be a JSON object"];
  }

  const issues: string[] = [];

  if (value.format !== ROOF_MODEL_FORMAT) {
    issues.push(`format must be "${ROOF_MODEL_FORMAT}"`);
  }
  if (value.version !== ROOF_MODEL_VERSION) {
    issues.push(`version must be ${ROOF_MODEL_VERSION}`);
  }
  if (!isPositiveInteger(value.imageSize)) {
    issues.push("imageSize must be a positive integer");
  }
  if (!isFiniteNumber(value.pixelScale) || value.pixelScale <= 0) {
    issues.push("pixelScale must be a positive number");
  }
  if (!isFiniteNumber(value.intercept)) {
    issues.push("intercept must be a finite number");
  }

  const { weights } = value;
  if (!Array.isArray(weights) || !weights.every(isFiniteNumber)) {
    issues.push("weights must be an array of finite numbers");
  } else if (
    isPositiveInteger(value.imageSize) &&
    weights.length !== value.imageSize * value.imageSize
  ) {
    issues.push(
      `weights must have ${value.imageSize * value.imageSize} entries, found ${weights.length}`,
    );
  }

  if (value.trainedAt !== undefined && typeof value.trainedAt !== "string") {
    issues.push("trainedAt must be a string when present");
  }
  if (value.samples !== undefined && !isSampleCounts(value.samples)) {
    issues.push("samples must contain numeric open and closed counts");
  }

  return issues;
};

export const isRoofModel = (value: unknown): value is RoofModel => {
  return describeRoofModelIssues(value).length === 0;
};
