/**
 * Service entry point. Loads configuration, wires the monitor loop to the
 * Alpaca safety monitor server and runs until SIGINT or SIGTERM.
 */
import "./loadEnv";
import os from "node:os";
import { MonitorLoop } from "../monitor/loop/monitor-loop";
import { FrameSource } from "../monitor/frame-source/frame-source";
import { RoofClassifier } from "../monitor/classifier/roof-classifier";
import { loadModelFile } from "../monitor/classifier/model-store";
import { SunGuard } from "../monitor/guards/sun-guard";
import { StatusLogger } from "../monitor/logging/status-logger";
import { readSecondaryStatus } from "../monitor/secondary/secondary-source";
import { StatusStore } from "../monitor/status/status-store";
import { deriveUniqueId } from "../shared/config/alpaca";
import { loadRoofMonitorConfig } from "../shared/config/roof-monitor";
import { ConfigError } from "../shared/errors";
import { getLogger, toErrorPayload } from "../shared/logger";
import type { RoofModel } from "../shared/types/model";
import { startAlpacaDiscovery } from "./alpacaDiscovery";
import { startAlpacaHttpServer } from "./alpacaHttpServer";
import { closeDatabase, initializeDatabase } from "./database/client";
import {
  DEFAULT_JOURNAL_RETENTION,
  countConsecutiveFailures,
  createSqlitePollJournal,
  listRecentPolls,
  prunePolls,
} from "./database/pollJournalRepository";
import {
  captureException,
  flushSentry,
  initSentry,
  registerProcessHandlers,
} from "./sentry";

const logger = getLogger("main", "main");

type ShutdownTask = () => Promise<void> | void;

const loadInitialModel = async (modelPath: string): Promise<RoofModel | null> => {
  try {
    const model = await loadModelFile(modelPath);
    logger.info("Classifier model loaded", {
      modelPath,
      imageSize: model.imageSize,
      trainedAt: model.trainedAt ?? null,
      samples: model.samples ?? null,
    });
    return model;
  } catch (error) {
    logger.error("Classifier model could not be loaded", {
      modelPath,
      ...toErrorPayload(error),
    });
    captureException(error, { modelPath });
    return null;
  }
};

const bootstrap = async (): Promise<ShutdownTask[]> => {
  initSentry();
  registerProcessHandlers();

  const config = loadRoofMonitorConfig();
  const shutdownTasks: ShutdownTask[] = [];

  initializeDatabase(config.journalPath);
  shutdownTasks.push(() => closeDatabase());
  const pruned = prunePolls(DEFAULT_JOURNAL_RETENTION);
  const previousFailures = countConsecutiveFailures();
  if (pruned > 0 || previousFailures > 0) {
    logger.info("Poll journal opened", {
      journalPath: config.journalPath,
      pruned,
      previousFailures,
    });
  }

  const classifier = new RoofClassifier({
    threshold: config.classifier.threshold,
    model: await loadInitialModel(config.classifier.modelPath),
  });
  if (!classifier.hasModel()) {
    logger.warn("Monitoring without a classifier model; polls will fail", {
      modelPath: config.classifier.modelPath,
    });
  }
  const store = new StatusStore(config.monitor.historySize);
  const { secondaryStatusPath } = config;

  const loop = new MonitorLoop({
    frameSource: new FrameSource({
      directory: config.monitor.directory,
      extensions: config.monitor.extensions,
    }),
    classifier,
    store,
    statusLogger: new StatusLogger(config.statusLogPath),
    pollIntervalMs: config.monitor.pollIntervalMs,
    repeatUnchanged: config.monitor.repeatUnchanged,
    sunGuard: config.sunGuard ? new SunGuard(config.sunGuard) : null,
    readSecondaryStatus: secondaryStatusPath
      ? () => readSecondaryStatus(secondaryStatusPath)
      : null,
    journal: createSqlitePollJournal({
      onPruned: (removed) => {
        logger.debug("Poll journal pruned", { removed });
      },
    }),
    onTransition: (event) => {
      if (event.to === "FAILED" || event.to === "STOPPED") {
        logger.debug("Monitor state changed", { from: event.from, to: event.to });
      }
    },
    onUnexpectedError: (error, context) => {
      captureException(error, context);
    },
  });

  const server = await startAlpacaHttpServer({
    host: config.alpaca.host,
    port: config.alpaca.port,
    deviceNumber: config.alpaca.deviceNumber,
    location: config.alpaca.location,
    uniqueId: deriveUniqueId(os.hostname(), config.alpaca.deviceNumber),
    safeWhen: config.safeWhen,
    readStatus: () => store.snapshot(),
    readTrend: () => store.trend(),
    readMonitorStats: () => loop.getStats(),
    listRecentPolls,
  });
  shutdownTasks.push(() => server.close());

  if (config.alpaca.discoveryEnabled) {
    const discovery = await startAlpacaDiscovery({
      discoveryPort: config.alpaca.discoveryPort,
      alpacaPort: server.port,
    });
    if (discovery) {
      shutdownTasks.push(() => discovery.close());
    }
  }

  loop.start();
  shutdownTasks.push(() => loop.stop());

  logger.info("Roof monitor running", {
    directory: config.monitor.directory,
    statusLogPath: config.statusLogPath,
    safeWhen: config.safeWhen,
    sunGuard: config.sunGuard !== null,
    alpacaOrigin: server.origin,
  });

  return shutdownTasks;
};

const runShutdown = async (tasks: ShutdownTask[]): Promise<void> => {
  // Reverse start order: the loop stops before the server and database close.
  for (const task of [...tasks].reverse()) {
    try {
      await task();
    } catch (error) {
      logger.warn("Shutdown step failed", toErrorPayload(error));
    }
  }
  await flushSentry();
  await logger.flush();
};

const main = async () => {
  let tasks: ShutdownTask[];
  try {
    tasks = await bootstrap();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal("Roof monitor configuration is invalid", {
        issues: [...error.issues],
      });
    } else {
      logger.fatal("Roof monitor failed to start", toErrorPayload(error));
      captureException(error);
    }
    await flushSentry();
    await logger.flush();
    process.exitCode = 1;
    return;
  }

  let shuttingDown = false;
  const handleSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down roof monitor", { signal });
    runShutdown(tasks).then(
      () => {
        process.exit(0);
      },
      (error: unknown) => {
        logger.fatal("Roof monitor shutdown failed", toErrorPayload(error));
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", handleSignal);
  process.once("SIGTERM", handleSignal);
};

main().catch((error: unknown) => {
  logger.fatal("Unhandled error in roof monitor entry point", toErrorPayload(error));
  process.exitCode = 1;
});
