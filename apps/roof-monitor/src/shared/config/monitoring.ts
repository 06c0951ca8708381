import {
  type RuntimeEnv,
  getEnvVar,
  parseBooleanFlag,
  parseNumericEnv,
} from "../env";

export type SanitizableSentryEvent = Record<string, unknown>;

const DEFAULT_TRACES_SAMPLE_RATE = 0.1;

const SENSITIVE_KEYS = ["password", "token", "secret", "auth", "dsn"];

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSensitiveKey = (key: string) => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

const scrubValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }
  if (!isPlainRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  Object.entries(value).forEach(([key, nestedValue]) => {
    result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
  });
  return result;
};

/**
 * Drops request data and redacts sensitive keys in the event's extra data,
 * contexts and breadcrumb data.
 */
const sanitizeSentryEvent = <TEvent>(event: TEvent): TEvent => {
  if (!isPlainRecord(event)) {
    return event;
  }

  const eventRecord: Record<string, unknown> = { ...event };

  const rawBreadcrumbs = eventRecord.breadcrumbs;
  if (Array.isArray(rawBreadcrumbs)) {
    eventRecord.breadcrumbs = rawBreadcrumbs
      .filter(isPlainRecord)
      .map((breadcrumb) =>
        "data" in breadcrumb
          ? { ...breadcrumb, data: scrubValue(breadcrumb.data) }
          : breadcrumb,
      );
  }

  eventRecord.request = undefined;
  eventRecord.extra = scrubValue(eventRecord.extra);
  eventRecord.contexts = scrubValue(eventRecord.contexts);

  return Object.assign(event, eventRecord);
};

export type MonitoringConfig = {
  environment: string;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
    beforeSend: typeof sanitizeSentryEvent;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

const resolveEnvironment = (env: RuntimeEnv): string =>
  getEnvVar("APP_ENV", env) ??
  getEnvVar("ROOF_MONITOR_ENV", env) ??
  getEnvVar("NODE_ENV", env) ??
  "development";

/**
 * Sentry and Better Stack ship only from production-like environments,
 * unless enabled for development explicitly. Both need their credential.
 */
export const loadMonitoringConfig = (
  env: RuntimeEnv = process.env,
): MonitoringConfig => {
  const environment = resolveEnvironment(env);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = getEnvVar("SENTRY_DSN", env) ?? "";
  const logtailToken = getEnvVar("BETTER_STACK_TOKEN", env) ?? "";

  return {
    environment,
    release: getEnvVar("npm_package_version", env),
    sentry: {
      dsn: sentryDsn,
      enabled:
        sentryDsn.length > 0 &&
        (isProductionLike ||
          parseBooleanFlag(getEnvVar("ENABLE_SENTRY_IN_DEV", env), false)),
      tracesSampleRate:
        parseNumericEnv(getEnvVar("SENTRY_TRACES_SAMPLE_RATE", env), {
          min: 0,
          max: 1,
        }) ?? DEFAULT_TRACES_SAMPLE_RATE,
      beforeSend: sanitizeSentryEvent,
    },
    logtail: {
      token: logtailToken,
      enabled:
        logtailToken.length > 0 &&
        (isProductionLike ||
          parseBooleanFlag(getEnvVar("ENABLE_BETTER_STACK_IN_DEV", env), false)),
    },
  };
};

export const monitoringConfig: MonitoringConfig = loadMonitoringConfig();
