/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they are shipped to Better Stack.
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "main" | "monitor" | "alpaca";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogtailAdapter = {
  log: (
    level: LogLevel,
    message: string,
    metadata?: LoggerMetadata,
  ) => Promise<void>;
  flush: () => Promise<void>;
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const consoleWriters = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
} as const;

type LogLevel = keyof typeof consoleWriters;

const loadLogtail = async (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(monitoringConfig.logtail.token);
      return {
        log: async (
          level: LogLevel,
          message: string,
          metadata?: LoggerMetadata,
        ) => {
          switch (level) {
            case "debug":
              await client.debug(message, metadata);
              return;
            case "info":
              await client.info(message, metadata);
              return;
            case "warn":
              await client.warn(message, metadata);
              return;
            default:
              await client.error(message, metadata);
          }
        },
        flush: async () => {
          await client.flush();
        },
      };
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    await instance.log(level, message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      timestamp: new Date().toISOString(),
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch((error: unknown) => {
        console.error("Unexpected Better Stack logging failure", error);
      });
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const debug = createEmitter(options, "debug");
  const info = createEmitter(options, "info");
  const warn = createEmitter(options, "warn");
  const error = createEmitter(options, "error");
  const fatal = createEmitter(options, "fatal");

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug,
    info,
    warn,
    error,
    fatal,
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export const toErrorPayload = (error: unknown): LoggerMetadata => {
  if (error instanceof Error) {
    const payload: LoggerMetadata = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if ("code" in error && typeof error.code === "string") {
      payload.code = error.code;
    }
    return payload;
  }

  return { message: String(error) };
};
