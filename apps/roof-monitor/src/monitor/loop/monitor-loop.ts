import { type MonitorError, isMonitorError } from "../../shared/errors";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import { type Frame, frameKey } from "../../shared/types/frame";
import type { PollJournal } from "../../shared/types/journal";
import type {
  ClassificationResult,
  LogEntry,
  MonitorState,
  PollOutcome,
} from "../../shared/types/status";
import type { FrameClassifier } from "../classifier/roof-classifier";
import type { SunGuardReading } from "../guards/sun-guard";
import type { SecondaryStatus } from "../secondary/secondary-source";
import type { StatusStore } from "../status/status-store";

export type SkipReason = "NO_FRAME" | "SAME_FRAME";

export type PollReport = {
  outcome: PollOutcome;
  startedAt: number;
  finishedAt: number;
  framePath: string | null;
  result: ClassificationResult | null;
  skipReason: SkipReason | null;
  error: MonitorError | Error | null;
};

export type MonitorTransitionEvent = {
  from: MonitorState;
  to: MonitorState;
  timestamp: number;
  report: PollReport | null;
};

export type MonitorStats = {
  state: MonitorState;
  running: boolean;
  polls: number;
  droppedTicks: number;
  consecutiveFailures: number;
  lastReport: PollReport | null;
};

export type MonitorLoopOptions = {
  frameSource: { latest: () => Promise<Frame | null> };
  classifier: FrameClassifier;
  store: StatusStore;
  statusLogger: { append: (entry: LogEntry) => Promise<void> };
  pollIntervalMs: number;
  repeatUnchanged?: boolean;
  sunGuard?: { evaluate: (at: Date) => SunGuardReading } | null;
  readSecondaryStatus?: (() => Promise<SecondaryStatus | null>) | null;
  journal?: PollJournal | null;
  onTransition?: (event: MonitorTransitionEvent) => void;
  onUnexpectedError?: (error: unknown, context: Record<string, unknown>) => void;
  now?: () => number;
  logger?: Logger;
};

type PollDraft = Omit<PollReport, "finishedAt">;

/**
 * Timer-driven controller and the only writer of the status store.
 *
 * IDLE -> POLLING -> SUCCESS | SKIPPED | FAILED -> IDLE, until stop() moves
 * it to STOPPED. At most one poll is in flight; ticks that arrive while one
 * runs are dropped rather than queued.
 */
export class MonitorLoop {
  private readonly options: MonitorLoopOptions;

  private readonly logger: Logger;

  private readonly now: () => number;

  private state: MonitorState = "IDLE";

  private timer: ReturnType<typeof setInterval> | null = null;

  private inFlight: Promise<PollReport> | null = null;

  private stopRequested = false;

  private lastFrameKey: string | null = null;

  private lastClassified: ClassificationResult | null = null;

  private polls = 0;

  private droppedTicks = 0;

  private consecutiveFailures = 0;

  private lastReport: PollReport | null = null;

  constructor(options: MonitorLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger("monitor-loop", "monitor");
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.state === "STOPPED" || this.stopRequested) {
      throw new Error("Monitor loop has been stopped and cannot be restarted");
    }
    if (this.timer) {
      this.logger.warn("Monitor loop already running");
      return;
    }

    this.timer = setInterval(() => {
      this.handleTimerTick();
    }, this.options.pollIntervalMs);
    this.logger.info("Monitoring started", {
      pollIntervalMs: this.options.pollIntervalMs,
      repeatUnchanged: this.options.repeatUnchanged ?? false,
      sunGuard: Boolean(this.options.sunGuard),
    });
    this.handleTimerTick();
  }

  /**
   * Cancels the timer, lets an in-flight poll finish, then settles in STOPPED.
   */
  async stop(): Promise<void> {
    if (this.state === "STOPPED") {
      return;
    }
    this.stopRequested = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.state !== "STOPPED") {
      this.transition("STOPPED", null);
      this.logger.info("Monitoring stopped", { polls: this.polls });
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Runs one poll now. Returns null when the tick is dropped because a poll
   * is already in flight or the loop is stopping.
   */
  tick(): Promise<PollReport> | null {
    if (this.stopRequested || this.state === "STOPPED") {
      return null;
    }
    if (this.inFlight) {
      this.droppedTicks += 1;
      this.logger.debug("Tick dropped: previous poll still in flight", {
        droppedTicks: this.droppedTicks,
      });
      return null;
    }

    const poll = this.poll().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = poll;
    return poll;
  }

  getStats(): MonitorStats {
    return {
      state: this.state,
      running: this.isRunning(),
      polls: this.polls,
      droppedTicks: this.droppedTicks,
      consecutiveFailures: this.consecutiveFailures,
      lastReport: this.lastReport,
    };
  }

  private handleTimerTick(): void {
    const poll = this.tick();
    if (!poll) {
      return;
    }
    poll.catch((error: unknown) => {
      this.logger.error("Monitor poll rejected", toErrorPayload(error));
    });
  }

  private async poll(): Promise<PollReport> {
    const startedAt = this.now();
    this.transition("POLLING", null);

    let draft: PollDraft;
    try {
      draft = await this.evaluate(startedAt);
    } catch (error) {
      draft = this.describeFailure(startedAt, error);
    }

    const report: PollReport = { ...draft, finishedAt: this.now() };
    this.polls += 1;
    this.consecutiveFailures =
      report.outcome === "FAILED" ? this.consecutiveFailures + 1 : 0;
    this.lastReport = report;

    this.journal(report);
    this.transition(report.outcome, report);
    this.transition("IDLE", null);
    return report;
  }

  private async evaluate(startedAt: number): Promise<PollDraft> {
    const frame = await this.options.frameSource.latest();
    if (!frame) {
      this.logger.debug("No frame available in monitor directory");
      return this.skipped(startedAt, null, "NO_FRAME");
    }

    const key = frameKey(frame);
    if (key === this.lastFrameKey) {
      const reguarded = this.reapplySunGuard();
      if (reguarded) {
        this.options.store.update(reguarded);
        await this.appendStatus({
          timestamp: new Date(reguarded.evaluatedAt),
          label: reguarded.label,
        });
        return {
          outcome: "SUCCESS",
          startedAt,
          framePath: frame.path,
          result: reguarded,
          skipReason: null,
          error: null,
        };
      }
      await this.repeatCurrentStatus();
      return this.skipped(startedAt, frame.path, "SAME_FRAME");
    }

    const classified = await this.options.classifier.classify(frame);
    const result = this.applySunGuard(classified);
    const secondary = await this.readSecondary();

    this.options.store.update(result);
    this.lastFrameKey = key;
    this.lastClassified = classified;

    this.logger.info("Roof status evaluated", {
      frame: frame.name,
      rawLabel: classified.label,
      label: result.label,
      openProbability: result.openProbability,
      confidence: result.confidence,
      override: result.override,
      secondaryLabel: secondary?.label ?? null,
      secondaryModifiedAt: secondary
        ? new Date(secondary.modifiedAt).toISOString()
        : null,
    });

    await this.appendStatus({
      timestamp: new Date(result.evaluatedAt),
      label: result.label,
    });

    return {
      outcome: "SUCCESS",
      startedAt,
      framePath: frame.path,
      result,
      skipReason: null,
      error: null,
    };
  }

  private skipped(
    startedAt: number,
    framePath: string | null,
    skipReason: SkipReason,
  ): PollDraft {
    return {
      outcome: "SKIPPED",
      startedAt,
      framePath,
      result: null,
      skipReason,
      error: null,
    };
  }

  private describeFailure(startedAt: number, error: unknown): PollDraft {
    const normalised =
      error instanceof Error ? error : new Error(String(error));

    if (isMonitorError(normalised)) {
      if (normalised.recoverable) {
        this.logger.warn("Monitor poll failed", toErrorPayload(normalised));
      } else {
        this.logger.error("Monitor poll failed", toErrorPayload(normalised));
        this.options.onUnexpectedError?.(normalised, { startedAt });
      }
    } else {
      this.logger.error(
        "Monitor poll failed unexpectedly",
        toErrorPayload(normalised),
      );
      this.options.onUnexpectedError?.(normalised, { startedAt });
    }

    return {
      outcome: "FAILED",
      startedAt,
      framePath: null,
      result: null,
      skipReason: null,
      error: normalised,
    };
  }

  private applySunGuard(result: ClassificationResult): ClassificationResult {
    const { sunGuard } = this.options;
    if (!sunGuard || result.label !== "OPEN") {
      return result;
    }

    return this.guardResult(
      result,
      sunGuard.evaluate(new Date(result.evaluatedAt)),
    );
  }

  /**
   * Checks an unchanged frame that reads OPEN against the sun again. Returns
   * a result only when the guard's verdict differs from the stored one.
   */
  private reapplySunGuard(): ClassificationResult | null {
    const { sunGuard } = this.options;
    const unguarded = this.lastClassified;
    if (!sunGuard || !unguarded || unguarded.label !== "OPEN") {
      return null;
    }

    const evaluatedAt = this.now();
    const reading = sunGuard.evaluate(new Date(evaluatedAt));
    const vetoed = this.options.store.snapshot().override === "sun-altitude";
    if (reading.safeForOpen !== vetoed) {
      return null;
    }

    if (reading.safeForOpen) {
      this.logger.info("Sun is below the threshold again; restoring OPEN", {
        altitudeDegrees: reading.altitudeDegrees,
        thresholdDegrees: reading.thresholdDegrees,
      });
    }
    const refreshed: ClassificationResult = Object.freeze({
      ...unguarded,
      evaluatedAt,
    });
    return this.guardResult(refreshed, reading);
  }

  private guardResult(
    result: ClassificationResult,
    reading: SunGuardReading,
  ): ClassificationResult {
    if (reading.safeForOpen) {
      return result;
    }

    this.logger.warn("Frame reads OPEN but the sun is too high; reporting CLOSED", {
      altitudeDegrees: reading.altitudeDegrees,
      thresholdDegrees: reading.thresholdDegrees,
    });
    const overridden: ClassificationResult = {
      ...result,
      label: "CLOSED",
      override: "sun-altitude",
    };
    return Object.freeze(overridden);
  }

  private async readSecondary(): Promise<SecondaryStatus | null> {
    const { readSecondaryStatus } = this.options;
    if (!readSecondaryStatus) {
      return null;
    }
    try {
      return await readSecondaryStatus();
    } catch (error) {
      this.logger.warn("Failed to read secondary status", toErrorPayload(error));
      return null;
    }
  }

  private async repeatCurrentStatus(): Promise<void> {
    if (!this.options.repeatUnchanged) {
      return;
    }
    const current = this.options.store.snapshot();
    if (current.label === "UNKNOWN") {
      return;
    }
    await this.appendStatus({
      timestamp: new Date(this.now()),
      label: current.label,
    });
  }

  private async appendStatus(entry: LogEntry): Promise<void> {
    try {
      await this.options.statusLogger.append(entry);
    } catch (error) {
      this.logger.error("Failed to append roof status line", toErrorPayload(error));
      this.options.onUnexpectedError?.(error, { label: entry.label });
    }
  }

  private journal(report: PollReport): void {
    const { journal } = this.options;
    if (!journal) {
      return;
    }
    try {
      journal.recordPoll({
        startedAt: report.startedAt,
        finishedAt: report.finishedAt,
        outcome: report.outcome,
        label: report.result?.label ?? null,
        framePath: report.framePath,
        errorCode: report.error
          ? isMonitorError(report.error)
            ? report.error.code
            : "UNEXPECTED"
          : null,
        errorMessage: report.error?.message ?? null,
      });
    } catch (error) {
      this.logger.warn("Failed to journal monitor poll", toErrorPayload(error));
    }
  }

  private transition(to: MonitorState, report: PollReport | null): void {
    const from = this.state;
    this.state = to;
    this.options.onTransition?.({
      from,
      to,
      timestamp: this.now(),
      report,
    });
  }
}
