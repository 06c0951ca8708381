export type MonitorErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "FRAME_UNREADABLE"
  | "MODEL_NOT_LOADED"
  | "INVALID_FRAME";

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MonitorError";
    this.code = code;
  }

  /** Errors the next poll is expected to recover from without operator action. */
  get recoverable(): boolean {
    return this.code !== "MODEL_NOT_LOADED";
  }
}

export const sourceUnavailable = (directory: string, cause?: unknown) =>
  new MonitorError(
    "SOURCE_UNAVAILABLE",
    `Monitor directory is unavailable: ${directory}`,
    { cause },
  );

export const frameUnreadable = (path: string, cause?: unknown) =>
  new MonitorError("FRAME_UNREADABLE", `Frame could not be read: ${path}`, {
    cause,
  });

export const modelNotLoaded = () =>
  new MonitorError(
    "MODEL_NOT_LOADED",
    "No classifier model is attached; load a model before monitoring",
  );

export const invalidFrame = (path: string, reason: string, cause?: unknown) =>
  new MonitorError("INVALID_FRAME", `Invalid frame ${path}: ${reason}`, {
    cause,
  });

export const isMonitorError = (error: unknown): error is MonitorError =>
  error instanceof MonitorError;

export class ProtocolRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ProtocolRequestError";
    this.status = status;
  }
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n- ${issues.join("\n- ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const NODE_ERROR_CODES = new Set(["ENOENT", "ENOTDIR", "EACCES", "EPERM"]);

export const isMissingPathError = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  NODE_ERROR_CODES.has(error.code);
