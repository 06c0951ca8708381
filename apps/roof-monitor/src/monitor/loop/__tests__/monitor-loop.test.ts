import { rename, utimes, writeFile } from "node:fs/promises";
import path from "node:path";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTempDir, createTestLogger, removeDir } from "../../../__tests__/test-utils";
import { sourceUnavailable } from "../../../shared/errors";
import type { Logger } from "../../../shared/logger";
import type { Frame } from "../../../shared/types/frame";
import type { PollJournal, PollRecordInput } from "../../../shared/types/journal";
import type {
  ClassificationResult,
  LogEntry,
  RoofLabel,
} from "../../../shared/types/status";
import { RoofClassifier } from "../../classifier/roof-classifier";
import { FrameSource } from "../../frame-source/frame-source";
import type { SunGuardReading } from "../../guards/sun-guard";
import type { SecondaryStatus } from "../../secondary/secondary-source";
import { StatusStore } from "../../status/status-store";
import {
  MonitorLoop,
  type MonitorLoopOptions,
  type MonitorTransitionEvent,
} from "../monitor-loop";

const makeFrame = (name: string, modifiedAt: number, size = 10): Frame => ({
  path: `/frames/${name}`,
  name,
  modifiedAt,
  size,
  load: async () => Buffer.from(name),
});

const resultFor = (frame: Frame, label: RoofLabel): ClassificationResult =>
  Object.freeze({
    label,
    confidence: 0.9,
    openProbability: label === "OPEN" ? 0.9 : 0.1,
    framePath: frame.path,
    frameModifiedAt: frame.modifiedAt,
    evaluatedAt: frame.modifiedAt + 500,
    override: null,
  });

const createDeferred = <T>() => {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
};

type Harness = {
  loop: MonitorLoop;
  store: StatusStore;
  entries: LogEntry[];
  transitions: MonitorTransitionEvent[];
  latest: Mock<() => Promise<Frame | null>>;
  classify: Mock<(frame: Frame) => Promise<ClassificationResult>>;
  logger: Logger;
};

const createHarness = (
  overrides: Partial<MonitorLoopOptions> = {},
  labels: Record<string, RoofLabel> = {},
): Harness => {
  const store = new StatusStore();
  const entries: LogEntry[] = [];
  const transitions: MonitorTransitionEvent[] = [];
  const latest = vi.fn<() => Promise<Frame | null>>(async () => null);
  const classify = vi.fn<(frame: Frame) => Promise<ClassificationResult>>(
    async (frame) => resultFor(frame, labels[frame.name] ?? "CLOSED"),
  );
  const logger = createTestLogger();
  let clock = 10_000;

  const loop = new MonitorLoop({
    frameSource: { latest },
    classifier: { classify },
    store,
    statusLogger: {
      append: async (entry) => {
        entries.push(entry);
      },
    },
    pollIntervalMs: 1000,
    onTransition: (event) => {
      transitions.push(event);
    },
    now: () => {
      clock += 1;
      return clock;
    },
    logger,
    ...overrides,
  });

  return { loop, store, entries, transitions, latest, classify, logger };
};

const runTick = async (loop: MonitorLoop) => {
  const poll = loop.tick();
  if (!poll) {
    throw new Error("expected the tick to start a poll");
  }
  return poll;
};

describe("MonitorLoop", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("follows a roof that opens and then closes", async () => {
    const harness = createHarness({}, { "frame_001.png": "OPEN" });
    const first = makeFrame("frame_001.png", 1_000);
    const second = makeFrame("frame_002.png", 2_000);

    harness.latest.mockResolvedValueOnce(first);
    const openReport = await runTick(harness.loop);

    expect(openReport.outcome).toBe("SUCCESS");
    expect(harness.store.snapshot().label).toBe("OPEN");
    expect(harness.entries).toEqual([{ timestamp: new Date(1_500), label: "OPEN" }]);

    harness.latest.mockResolvedValueOnce(second);
    const closedReport = await runTick(harness.loop);

    expect(closedReport.outcome).toBe("SUCCESS");
    expect(closedReport.framePath).toBe("/frames/frame_002.png");
    expect(harness.store.snapshot()).toMatchObject({
      label: "CLOSED",
      framePath: "/frames/frame_002.png",
      consecutiveCount: 1,
    });
    expect(harness.entries.map((entry) => entry.label)).toEqual(["OPEN", "CLOSED"]);
    expect(
      harness.transitions.map((event) => `${event.from}->${event.to}`),
    ).toEqual([
      "IDLE->POLLING",
      "POLLING->SUCCESS",
      "SUCCESS->IDLE",
      "IDLE->POLLING",
      "POLLING->SUCCESS",
      "SUCCESS->IDLE",
    ]);
    expect(harness.transitions[1].report?.result?.label).toBe("OPEN");
  });

  it("skips when the directory has no frame", async () => {
    const harness = createHarness();

    const report = await runTick(harness.loop);

    expect(report).toMatchObject({
      outcome: "SKIPPED",
      skipReason: "NO_FRAME",
      framePath: null,
    });
    expect(harness.store.snapshot().label).toBe("UNKNOWN");
    expect(harness.entries).toEqual([]);
    expect(harness.classify).not.toHaveBeenCalled();
  });

  it("skips an unchanged frame without logging by default", async () => {
    const harness = createHarness({}, { "frame_001.png": "OPEN" });
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    await runTick(harness.loop);
    const report = await runTick(harness.loop);

    expect(report).toMatchObject({ outcome: "SKIPPED", skipReason: "SAME_FRAME" });
    expect(harness.classify).toHaveBeenCalledTimes(1);
    expect(harness.entries).toHaveLength(1);
    expect(harness.store.snapshot().consecutiveCount).toBe(1);
  });

  it("re-evaluates a frame rewritten in place", async () => {
    const harness = createHarness();
    harness.latest.mockResolvedValueOnce(makeFrame("frame.png", 1_000, 10));
    harness.latest.mockResolvedValueOnce(makeFrame("frame.png", 1_000, 12));

    await runTick(harness.loop);
    const report = await runTick(harness.loop);

    expect(report.outcome).toBe("SUCCESS");
    expect(harness.classify).toHaveBeenCalledTimes(2);
  });

  it("repeats the current label for an unchanged frame when configured", async () => {
    const harness = createHarness(
      { repeatUnchanged: true, now: () => 86_400_000 },
      { "frame_001.png": "OPEN" },
    );
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    await runTick(harness.loop);
    const report = await runTick(harness.loop);

    expect(report.outcome).toBe("SKIPPED");
    expect(harness.entries).toEqual([
      { timestamp: new Date(1_500), label: "OPEN" },
      { timestamp: new Date(86_400_000), label: "OPEN" },
    ]);
    expect(harness.store.snapshot().updatedAt).toBe(1_500);
  });

  it("records a failed poll and keeps the last good status", async () => {
    const harness = createHarness({}, { "frame_001.png": "OPEN" });
    harness.latest.mockResolvedValueOnce(makeFrame("frame_001.png", 1_000));
    await runTick(harness.loop);

    harness.latest.mockRejectedValueOnce(sourceUnavailable("/frames"));
    const report = await runTick(harness.loop);

    expect(report.outcome).toBe("FAILED");
    expect(report.error).toMatchObject({ code: "SOURCE_UNAVAILABLE" });
    expect(harness.store.snapshot().label).toBe("OPEN");
    expect(harness.entries).toHaveLength(1);
    expect(harness.loop.getStats().consecutiveFailures).toBe(1);
    expect(harness.logger.warn).toHaveBeenCalledWith(
      "Monitor poll failed",
      expect.objectContaining({ code: "SOURCE_UNAVAILABLE" }),
    );
  });

  it("reports a missing model at error level on every poll", async () => {
    const onUnexpectedError = vi.fn();
    const harness = createHarness({
      classifier: new RoofClassifier({ threshold: 0.5 }),
      onUnexpectedError,
    });
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    await runTick(harness.loop);
    const report = await runTick(harness.loop);

    expect(report.error).toMatchObject({ code: "MODEL_NOT_LOADED" });
    expect(harness.logger.error).toHaveBeenCalledTimes(2);
    expect(onUnexpectedError).toHaveBeenCalledTimes(2);
    expect(harness.loop.getStats().consecutiveFailures).toBe(2);
  });

  it("keeps running after an unexpected error", async () => {
    const onUnexpectedError = vi.fn();
    const journal = { recordPoll: vi.fn<(record: PollRecordInput) => void>() };
    const harness = createHarness({ onUnexpectedError, journal });
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));
    harness.classify.mockRejectedValueOnce(new Error("decoder crashed"));

    const failed = await runTick(harness.loop);
    const recovered = await runTick(harness.loop);

    expect(failed.outcome).toBe("FAILED");
    expect(recovered.outcome).toBe("SUCCESS");
    expect(onUnexpectedError).toHaveBeenCalledWith(
      failed.error,
      expect.objectContaining({ startedAt: failed.startedAt }),
    );
    expect(journal.recordPoll).toHaveBeenNthCalledWith(1, {
      startedAt: failed.startedAt,
      finishedAt: failed.finishedAt,
      outcome: "FAILED",
      label: null,
      framePath: null,
      errorCode: "UNEXPECTED",
      errorMessage: "decoder crashed",
    });
    expect(journal.recordPoll).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({
        outcome: "SUCCESS",
        label: "CLOSED",
        framePath: "/frames/frame_001.png",
        errorCode: null,
      }),
    );
  });

  it("does not let a failing journal break the poll", async () => {
    const journal: PollJournal = {
      recordPoll: () => {
        throw new Error("database is locked");
      },
    };
    const harness = createHarness({ journal });
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    const report = await runTick(harness.loop);

    expect(report.outcome).toBe("SUCCESS");
    expect(harness.logger.warn).toHaveBeenCalledWith(
      "Failed to journal monitor poll",
      expect.objectContaining({ message: "database is locked" }),
    );
  });

  it("keeps the status when the status file cannot be written", async () => {
    const onUnexpectedError = vi.fn();
    const harness = createHarness(
      {
        onUnexpectedError,
        statusLogger: {
          append: async () => {
            throw new Error("disk full");
          },
        },
      },
      { "frame_001.png": "OPEN" },
    );
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    const report = await runTick(harness.loop);

    expect(report.outcome).toBe("SUCCESS");
    expect(harness.store.snapshot().label).toBe("OPEN");
    expect(onUnexpectedError).toHaveBeenCalledWith(expect.any(Error), {
      label: "OPEN",
    });
  });

  it("overrides OPEN to CLOSED while the sun is up", async () => {
    const evaluate = vi.fn<(at: Date) => SunGuardReading>(() => ({
      altitudeDegrees: 35,
      thresholdDegrees: -18,
      safeForOpen: false,
    }));
    const harness = createHarness(
      { sunGuard: { evaluate } },
      { "frame_001.png": "OPEN", "frame_002.png": "CLOSED" },
    );

    harness.latest.mockResolvedValueOnce(makeFrame("frame_001.png", 1_000));
    const report = await runTick(harness.loop);

    expect(evaluate).toHaveBeenCalledWith(new Date(1_500));
    expect(report.result).toMatchObject({
      label: "CLOSED",
      override: "sun-altitude",
      confidence: 0.9,
      openProbability: 0.9,
    });
    expect(harness.store.snapshot()).toMatchObject({
      label: "CLOSED",
      override: "sun-altitude",
    });
    expect(harness.entries).toEqual([{ timestamp: new Date(1_500), label: "CLOSED" }]);

    harness.latest.mockResolvedValueOnce(makeFrame("frame_002.png", 2_000));
    await runTick(harness.loop);
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(harness.store.snapshot().override).toBeNull();
  });

  it("keeps OPEN when the sun is below the threshold", async () => {
    const harness = createHarness(
      {
        sunGuard: {
          evaluate: () => ({
            altitudeDegrees: -40,
            thresholdDegrees: -18,
            safeForOpen: true,
          }),
        },
      },
      { "frame_001.png": "OPEN" },
    );
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    const report = await runTick(harness.loop);

    expect(report.result?.label).toBe("OPEN");
    expect(report.result?.override).toBeNull();
  });

  it("re-checks the sun for an unchanged OPEN frame", async () => {
    const reading = (safeForOpen: boolean): SunGuardReading => ({
      altitudeDegrees: safeForOpen ? -30 : 5,
      thresholdDegrees: -18,
      safeForOpen,
    });
    const evaluate = vi
      .fn<(at: Date) => SunGuardReading>()
      .mockReturnValueOnce(reading(true))
      .mockReturnValueOnce(reading(false))
      .mockReturnValueOnce(reading(false))
      .mockReturnValueOnce(reading(true));
    const harness = createHarness(
      { sunGuard: { evaluate } },
      { "frame_001.png": "OPEN" },
    );
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    const night = await runTick(harness.loop);
    const sunrise = await runTick(harness.loop);

    expect(night.result?.label).toBe("OPEN");
    expect(sunrise).toMatchObject({
      outcome: "SUCCESS",
      skipReason: null,
      framePath: "/frames/frame_001.png",
    });
    expect(sunrise.result).toMatchObject({
      label: "CLOSED",
      override: "sun-altitude",
      openProbability: 0.9,
    });
    expect(harness.store.snapshot()).toMatchObject({
      label: "CLOSED",
      override: "sun-altitude",
      consecutiveCount: 1,
    });

    const stillDay = await runTick(harness.loop);
    expect(stillDay).toMatchObject({ outcome: "SKIPPED", skipReason: "SAME_FRAME" });
    expect(harness.store.snapshot().label).toBe("CLOSED");

    const dusk = await runTick(harness.loop);
    expect(dusk.result).toMatchObject({ label: "OPEN", override: null });
    expect(harness.store.snapshot()).toMatchObject({ label: "OPEN", override: null });

    expect(harness.classify).toHaveBeenCalledTimes(1);
    expect(evaluate).toHaveBeenCalledTimes(4);
    expect(harness.entries.map((entry) => entry.label)).toEqual([
      "OPEN",
      "CLOSED",
      "OPEN",
    ]);
  });

  it("does not consult the sun for an unchanged CLOSED frame", async () => {
    const evaluate = vi.fn<(at: Date) => SunGuardReading>(() => ({
      altitudeDegrees: 5,
      thresholdDegrees: -18,
      safeForOpen: false,
    }));
    const harness = createHarness({ sunGuard: { evaluate } });
    harness.latest.mockResolvedValue(makeFrame("frame_001.png", 1_000));

    await runTick(harness.loop);
    const report = await runTick(harness.loop);

    expect(report).toMatchObject({ outcome: "SKIPPED", skipReason: "SAME_FRAME" });
    expect(evaluate).not.toHaveBeenCalled();
  });

  it("logs the secondary status and tolerates it failing", async () => {
    const readSecondaryStatus = vi
      .fn<() => Promise<SecondaryStatus | null>>()
      .mockResolvedValueOnce({
        label: "OPEN",
        modifiedAt: 900,
        line: "Roof Status: OPEN",
      })
      .mockRejectedValueOnce(new Error("permission denied"));
    const harness = createHarness({ readSecondaryStatus });

    harness.latest.mockResolvedValueOnce(makeFrame("frame_001.png", 1_000));
    await runTick(harness.loop);
    harness.latest.mockResolvedValueOnce(makeFrame("frame_002.png", 2_000));
    const report = await runTick(harness.loop);

    expect(harness.logger.info).toHaveBeenCalledWith(
      "Roof status evaluated",
      expect.objectContaining({
        frame: "frame_001.png",
        secondaryLabel: "OPEN",
        secondaryModifiedAt: new Date(900).toISOString(),
      }),
    );
    expect(report.outcome).toBe("SUCCESS");
    expect(harness.logger.warn).toHaveBeenCalledWith(
      "Failed to read secondary status",
      expect.objectContaining({ message: "permission denied" }),
    );
  });

  it("runs at most one poll at a time and drops overlapping ticks", async () => {
    const harness = createHarness();
    const pending = createDeferred<ClassificationResult>();
    const frame = makeFrame("frame_001.png", 1_000);
    harness.latest.mockResolvedValue(frame);
    harness.classify.mockReturnValueOnce(pending.promise);

    const first = harness.loop.tick();
    const second = harness.loop.tick();

    expect(first).not.toBeNull();
    expect(second).toBeNull();
    expect(harness.loop.getStats().droppedTicks).toBe(1);

    pending.resolve(resultFor(frame, "OPEN"));
    await first;

    expect(harness.classify).toHaveBeenCalledTimes(1);
    expect(harness.loop.getStats()).toMatchObject({
      state: "IDLE",
      polls: 1,
      droppedTicks: 1,
    });
  });

  it("drops timer ticks that arrive during a slow poll", async () => {
    vi.useFakeTimers();
    const harness = createHarness();
    const pending = createDeferred<ClassificationResult>();
    const frame = makeFrame("frame_001.png", 1_000);
    harness.latest.mockResolvedValue(frame);
    harness.classify.mockReturnValueOnce(pending.promise);

    harness.loop.start();
    expect(harness.loop.isRunning()).toBe(true);
    vi.advanceTimersByTime(3_000);

    expect(harness.loop.getStats().droppedTicks).toBe(3);

    pending.resolve(resultFor(frame, "CLOSED"));
    await harness.loop.stop();

    expect(harness.loop.getStats()).toMatchObject({
      state: "STOPPED",
      running: false,
      polls: 1,
      droppedTicks: 3,
    });
  });

  it("finishes the in-flight poll before stopping and cannot restart", async () => {
    const harness = createHarness({}, { "frame_001.png": "OPEN" });
    const pending = createDeferred<ClassificationResult>();
    const frame = makeFrame("frame_001.png", 1_000);
    harness.latest.mockResolvedValue(frame);
    harness.classify.mockReturnValueOnce(pending.promise);

    const poll = harness.loop.tick();
    const stopping = harness.loop.stop();

    expect(harness.loop.tick()).toBeNull();
    pending.resolve(resultFor(frame, "OPEN"));
    await stopping;

    await expect(poll).resolves.toMatchObject({ outcome: "SUCCESS" });
    expect(harness.store.snapshot().label).toBe("OPEN");
    expect(harness.transitions.at(-1)).toMatchObject({ from: "IDLE", to: "STOPPED" });
    expect(() => harness.loop.start()).toThrow(
      "Monitor loop has been stopped and cannot be restarted",
    );
    await expect(harness.loop.stop()).resolves.toBeUndefined();
  });

  it("warns instead of starting a second timer", async () => {
    vi.useFakeTimers();
    const harness = createHarness();

    harness.loop.start();
    harness.loop.start();
    await harness.loop.stop();

    expect(harness.logger.warn).toHaveBeenCalledWith("Monitor loop already running");
  });
});

describe("MonitorLoop with a real frame directory", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(directory);
    await removeDir(`${directory}-away`);
  });

  it("fails while the directory is unavailable and recovers afterwards", async () => {
    const writeFrame = async (name: string, mtimeSeconds: number) => {
      const filePath = path.join(directory, name);
      await writeFile(filePath, name);
      await utimes(filePath, mtimeSeconds, mtimeSeconds);
    };
    const harness = createHarness(
      { frameSource: new FrameSource({ directory }) },
      { "frame_001.png": "OPEN", "frame_002.png": "CLOSED" },
    );

    await writeFrame("frame_001.png", 1_000);
    const first = await runTick(harness.loop);

    await rename(directory, `${directory}-away`);
    const failed = await runTick(harness.loop);

    await rename(`${directory}-away`, directory);
    await writeFrame("frame_002.png", 2_000);
    const recovered = await runTick(harness.loop);

    expect(first.outcome).toBe("SUCCESS");
    expect(failed.outcome).toBe("FAILED");
    expect(failed.error).toMatchObject({ code: "SOURCE_UNAVAILABLE" });
    expect(recovered.outcome).toBe("SUCCESS");
    expect(harness.entries.map((entry) => entry.label)).toEqual(["OPEN", "CLOSED"]);
    expect(harness.store.snapshot().framePath).toBe(
      path.join(directory, "frame_002.png"),
    );
  });
});
