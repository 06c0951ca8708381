export type RoofLabel = "OPEN" | "CLOSED";

export type RoofStatusLabel = RoofLabel | "UNKNOWN";

export type StatusOverride = "sun-altitude";

export type ClassificationResult = Readonly<{
  label: RoofLabel;
  confidence: number;
  openProbability: number;
  framePath: string;
  frameModifiedAt: number;
  evaluatedAt: number;
  override: StatusOverride | null;
}>;

export type StatusRecord = Readonly<{
  label: RoofStatusLabel;
  confidence: number;
  updatedAt: number | null;
  framePath: string | null;
  consecutiveCount: number;
  override: StatusOverride | null;
}>;

export type StatusTrend = Readonly<{
  open: number;
  closed: number;
  samples: number;
}>;

export type LogEntry = Readonly<{
  timestamp: Date;
  label: RoofLabel;
}>;

export type PollOutcome = "SUCCESS" | "SKIPPED" | "FAILED";

export type MonitorState = "IDLE" | "POLLING" | PollOutcome | "STOPPED";

export const UNKNOWN_STATUS: StatusRecord = Object.freeze({
  label: "UNKNOWN",
  confidence: 0,
  updatedAt: null,
  framePath: null,
  consecutiveCount: 0,
  override: null,
});
