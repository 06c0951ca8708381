import * as Sentry from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger } from "../shared/logger";

const logger = getLogger("sentry-main", "main");

let isInitialized = false;

let handlersRegistered = false;

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!isInitialized || !monitoringConfig.sentry.enabled) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));
  Sentry.captureException(normalisedError, {
    contexts: context ? { metadata: context } : undefined,
  });
};

const resolveReasonMessage = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }

  if (typeof reason === "string") {
    return reason;
  }

  try {
    return JSON.stringify(reason) ?? "unknown";
  } catch {
    return "unknown";
  }
};

export const initSentry = () => {
  if (!monitoringConfig.sentry.enabled || isInitialized) {
    if (!monitoringConfig.sentry.enabled) {
      logger.debug("Skipping Sentry initialisation: disabled by configuration");
    }
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: monitoringConfig.sentry.beforeSend,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("process", "main");
  Sentry.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  isInitialized = true;
  logger.info("Sentry initialised", {
    environment: monitoringConfig.environment,
  });
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!isInitialized) {
    return;
  }
  await Sentry.flush(timeoutMs);
};

export const registerProcessHandlers = () => {
  if (handlersRegistered) {
    return;
  }
  handlersRegistered = true;

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception in main process", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error =
      reason instanceof Error
        ? reason
        : new Error(resolveReasonMessage(reason));
    logger.fatal("Unhandled promise rejection in main process", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });
};
