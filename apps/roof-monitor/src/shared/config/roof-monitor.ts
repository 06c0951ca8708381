import { ConfigError } from "../errors";
import {
  type RuntimeEnv,
  getEnvVar,
  parseBooleanFlag,
  parseListEnv,
  parseNumericEnv,
} from "../env";
import type { RoofLabel } from "../types/status";
import {
  ALPACA_DEFAULT_HOST,
  ALPACA_DEFAULT_PORT,
  ALPACA_DISCOVERY_PORT,
} from "./alpaca";

export type SafeWhen = RoofLabel;

/**
 * Sun altitude presets in degrees, by twilight definition.
 */
export const TWILIGHT_PRESETS = {
  horizon: 0,
  civil: -6,
  nautical: -12,
  astronomical: -18,
} as const;

export type TwilightPreset = keyof typeof TWILIGHT_PRESETS;

export type SunGuardConfig = {
  latitude: number;
  longitude: number;
  altitudeThresholdDegrees: number;
};

export type RoofMonitorConfig = {
  monitor: {
    directory: string;
    extensions: string[];
    pollIntervalMs: number;
    repeatUnchanged: boolean;
    historySize: number;
  };
  classifier: {
    modelPath: string;
    threshold: number;
  };
  statusLogPath: string;
  safeWhen: SafeWhen;
  sunGuard: SunGuardConfig | null;
  secondaryStatusPath: string | null;
  journalPath: string;
  alpaca: {
    host: string;
    port: number;
    deviceNumber: number;
    location: string;
    discoveryEnabled: boolean;
    discoveryPort: number;
  };
};

export const DEFAULT_POLL_INTERVAL_SECONDS = 60;
export const DEFAULT_CLASSIFIER_THRESHOLD = 0.5;
export const DEFAULT_HISTORY_SIZE = 32;
export const DEFAULT_STATUS_LOG_PATH = "RoofStatusFile.txt";
export const DEFAULT_JOURNAL_PATH = "roof-monitor.sqlite";
export const DEFAULT_FRAME_EXTENSIONS = [".png"];

const normaliseExtension = (extension: string): string => {
  const lowered = extension.toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
};

type NumericSetting = {
  min: number;
  max: number;
  integer?: boolean;
  fallback: number;
};

/** A set variable that does not parse as a number is an issue, never the default. */
const readNumber = (
  env: RuntimeEnv,
  key: string,
  { fallback, ...range }: NumericSetting,
  issues: string[],
): number => {
  const raw = getEnvVar(key, env);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parseNumericEnv(raw, range);
  if (parsed === null) {
    issues.push(`${key} must be ${range.integer ? "an integer" : "a number"}`);
    return fallback;
  }
  return parsed;
};

const isTwilightPreset = (value: string): value is TwilightPreset =>
  Object.hasOwn(TWILIGHT_PRESETS, value);

const parseSunThreshold = (
  raw: string | undefined,
  issues: string[],
): number => {
  if (raw === undefined) {
    return TWILIGHT_PRESETS.astronomical;
  }
  const preset = raw.trim().toLowerCase();
  if (isTwilightPreset(preset)) {
    return TWILIGHT_PRESETS[preset];
  }
  const parsed = parseNumericEnv(raw, { min: -90, max: 90 });
  if (parsed === null) {
    issues.push(
      `SUN_ALTITUDE_THRESHOLD must be degrees or one of ${Object.keys(TWILIGHT_PRESETS).join(", ")}`,
    );
    return TWILIGHT_PRESETS.astronomical;
  }
  return parsed;
};

const parseSunGuard = (
  env: RuntimeEnv,
  issues: string[],
): SunGuardConfig | null => {
  const rawLatitude = getEnvVar("SITE_LATITUDE", env);
  const rawLongitude = getEnvVar("SITE_LONGITUDE", env);

  if (rawLatitude === undefined && rawLongitude === undefined) {
    return null;
  }

  const latitude = parseNumericEnv(rawLatitude, { min: -90, max: 90 });
  const longitude = parseNumericEnv(rawLongitude, { min: -180, max: 180 });
  if (latitude === null || longitude === null) {
    issues.push(
      "SITE_LATITUDE and SITE_LONGITUDE must both be numeric to enable the sun guard",
    );
    return null;
  }

  return {
    latitude,
    longitude,
    altitudeThresholdDegrees: parseSunThreshold(
      getEnvVar("SUN_ALTITUDE_THRESHOLD", env),
      issues,
    ),
  };
};

const parseSafeWhen = (raw: string | undefined, issues: string[]): SafeWhen => {
  if (raw === undefined) {
    return "OPEN";
  }
  const normalised = raw.trim().toUpperCase();
  if (normalised === "OPEN" || normalised === "CLOSED") {
    return normalised;
  }
  issues.push("SAFE_WHEN must be OPEN or CLOSED");
  return "OPEN";
};

/**
 * Builds the service configuration from environment variables, collecting
 * every problem before failing.
 */
export const loadRoofMonitorConfig = (
  env: RuntimeEnv = process.env,
): RoofMonitorConfig => {
  const issues: string[] = [];

  const directory = getEnvVar("MONITOR_DIR", env);
  if (directory === undefined) {
    issues.push("MONITOR_DIR is required");
  }
  const modelPath = getEnvVar("MODEL_PATH", env);
  if (modelPath === undefined) {
    issues.push("MODEL_PATH is required");
  }

  const extensions = parseListEnv(getEnvVar("FRAME_EXTENSIONS", env)).map(
    normaliseExtension,
  );

  const pollIntervalSeconds = readNumber(
    env,
    "POLL_INTERVAL_SECONDS",
    { min: 1, max: 86_400, fallback: DEFAULT_POLL_INTERVAL_SECONDS },
    issues,
  );

  const config: RoofMonitorConfig = {
    monitor: {
      directory: directory ?? "",
      extensions:
        extensions.length > 0 ? extensions : [...DEFAULT_FRAME_EXTENSIONS],
      pollIntervalMs: Math.round(pollIntervalSeconds * 1000),
      repeatUnchanged: parseBooleanFlag(
        getEnvVar("STATUS_LOG_REPEAT_UNCHANGED", env),
        false,
      ),
      historySize: readNumber(
        env,
        "HISTORY_SIZE",
        { min: 1, max: 10_000, integer: true, fallback: DEFAULT_HISTORY_SIZE },
        issues,
      ),
    },
    classifier: {
      modelPath: modelPath ?? "",
      threshold: readNumber(
        env,
        "CLASSIFIER_THRESHOLD",
        { min: 0, max: 1, fallback: DEFAULT_CLASSIFIER_THRESHOLD },
        issues,
      ),
    },
    statusLogPath:
      getEnvVar("STATUS_LOG_PATH", env) ?? DEFAULT_STATUS_LOG_PATH,
    safeWhen: parseSafeWhen(getEnvVar("SAFE_WHEN", env), issues),
    sunGuard: parseSunGuard(env, issues),
    secondaryStatusPath: getEnvVar("SECONDARY_STATUS_PATH", env) ?? null,
    journalPath: getEnvVar("JOURNAL_PATH", env) ?? DEFAULT_JOURNAL_PATH,
    alpaca: {
      host: getEnvVar("ALPACA_HOST", env) ?? ALPACA_DEFAULT_HOST,
      port: readNumber(
        env,
        "ALPACA_PORT",
        { min: 0, max: 65_535, integer: true, fallback: ALPACA_DEFAULT_PORT },
        issues,
      ),
      deviceNumber: readNumber(
        env,
        "ALPACA_DEVICE_NUMBER",
        { min: 0, max: 4_294_967_295, integer: true, fallback: 0 },
        issues,
      ),
      location: getEnvVar("ALPACA_LOCATION", env) ?? "Observatory",
      discoveryEnabled: parseBooleanFlag(
        getEnvVar("ALPACA_DISCOVERY_ENABLED", env),
        true,
      ),
      discoveryPort: readNumber(
        env,
        "ALPACA_DISCOVERY_PORT",
        { min: 0, max: 65_535, integer: true, fallback: ALPACA_DISCOVERY_PORT },
        issues,
      ),
    },
  };

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return config;
};
