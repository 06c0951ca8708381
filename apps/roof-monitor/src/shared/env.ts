export type RuntimeEnv = Record<string, string | undefined>;

export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  if (typeof value !== "string") {
    return defaultValue;
  }
  const normalised = value.trim().toLowerCase();
  if (
    normalised === "1" ||
    normalised === "true" ||
    normalised === "yes" ||
    normalised === "on"
  ) {
    return true;
  }
  if (
    normalised === "0" ||
    normalised === "false" ||
    normalised === "no" ||
    normalised === "off"
  ) {
    return false;
  }
  return defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const parseListEnv = (value: string | null | undefined): string[] => {
  if (typeof value !== "string") {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const getEnvVar = (
  key: string,
  env: RuntimeEnv = process.env,
): string | undefined => {
  const value = env[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    return undefined;
  }
  return value;
};
