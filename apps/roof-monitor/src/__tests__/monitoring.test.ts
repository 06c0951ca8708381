import { describe, expect, it } from "vitest";
import {
  type SanitizableSentryEvent,
  loadMonitoringConfig,
} from "../shared/config/monitoring";

const TEST_DSN = "https://public-key@sentry.example.test/1";

describe("monitoring configuration", () => {
  it("disables Sentry when DSN is absent", () => {
    const config = loadMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: "",
    });

    expect(config.sentry.enabled).toBe(false);
    expect(config.sentry.dsn).toBe("");
  });

  it("enables Sentry and Better Stack in production when tokens are present", () => {
    const config = loadMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: TEST_DSN,
      BETTER_STACK_TOKEN: "test-token",
      npm_package_version: "1.0.0",
    });

    expect(config.environment).toBe("production");
    expect(config.release).toBe("1.0.0");
    expect(config.sentry.enabled).toBe(true);
    expect(config.logtail).toEqual({ token: "test-token", enabled: true });
  });

  it("prefers APP_ENV over NODE_ENV", () => {
    const config = loadMonitoringConfig({
      APP_ENV: "staging",
      NODE_ENV: "development",
      SENTRY_DSN: TEST_DSN,
    });

    expect(config.environment).toBe("staging");
    expect(config.sentry.enabled).toBe(true);
  });

  it("defaults to development when no environment is named", () => {
    expect(loadMonitoringConfig({ APP_ENV: "  " }).environment).toBe("development");
  });

  it("keeps shipping off in development unless explicitly enabled", () => {
    const env = {
      NODE_ENV: "development",
      SENTRY_DSN: TEST_DSN,
      BETTER_STACK_TOKEN: "test-token",
    };

    const disabled = loadMonitoringConfig(env);
    const enabled = loadMonitoringConfig({
      ...env,
      ENABLE_SENTRY_IN_DEV: "yes",
      ENABLE_BETTER_STACK_IN_DEV: "true",
    });

    expect(disabled.sentry.enabled).toBe(false);
    expect(disabled.logtail.enabled).toBe(false);
    expect(enabled.sentry.enabled).toBe(true);
    expect(enabled.logtail.enabled).toBe(true);
  });

  it("parses and clamps the trace sample rate", () => {
    expect(
      loadMonitoringConfig({ SENTRY_TRACES_SAMPLE_RATE: "often" }).sentry
        .tracesSampleRate,
    ).toBe(0.1);
    expect(
      loadMonitoringConfig({ SENTRY_TRACES_SAMPLE_RATE: "0.25" }).sentry
        .tracesSampleRate,
    ).toBe(0.25);
    expect(
      loadMonitoringConfig({ SENTRY_TRACES_SAMPLE_RATE: "4" }).sentry
        .tracesSampleRate,
    ).toBe(1);
  });

  it("sanitises sensitive fields via beforeSend hook", () => {
    const config = loadMonitoringConfig({
      NODE_ENV: "production",
      SENTRY_DSN: TEST_DSN,
    });
    const fakeEvent: SanitizableSentryEvent = {
      message: "Roof status evaluated",
      request: { url: "http://localhost:11111/setup" },
      extra: {
        password: "test-secret",
        nested: {
          token: "test-token",
          frame: "frame_001.png",
        },
      },
      contexts: {
        metadata: { authorization: "Bearer test-token", label: "OPEN" },
      },
      breadcrumbs: [
        {
          category: "monitor",
          message: "Roof status evaluated",
          data: {
            secret: "test-secret",
          },
        },
        { category: "http" },
      ],
    };

    const sanitised = config.sentry.beforeSend(fakeEvent);

    expect(sanitised.message).toBe("Roof status evaluated");
    expect(sanitised.request).toBeUndefined();
    expect(sanitised.extra).toEqual({
      password: "[redacted]",
      nested: {
        token: "[redacted]",
        frame: "frame_001.png",
      },
    });
    expect(sanitised.contexts).toEqual({
      metadata: { authorization: "[redacted]", label: "OPEN" },
    });
    expect(sanitised.breadcrumbs).toEqual([
      {
        category: "monitor",
        message: "Roof status evaluated",
        data: { secret: "[redacted]" },
      },
      { category: "http" },
    ]);
  });
});
