import { createHash } from "node:crypto";

/**
 * ASCOM Alpaca protocol constants shared by the device server and the
 * discovery responder.
 */

export const ALPACA_DEFAULT_PORT = 11111;

export const ALPACA_DEFAULT_HOST = "0.0.0.0";

/**
 * Standard Alpaca UDP discovery port
 */
export const ALPACA_DISCOVERY_PORT = 32227;

export const ALPACA_DISCOVERY_MESSAGE = "alpacadiscovery1";

export const ALPACA_API_VERSIONS = [1] as const;

export const SAFETY_MONITOR_INTERFACE_VERSION = 1;

export const ALPACA_DEVICE_TYPE = "SafetyMonitor";

export const ALPACA_MAX_BODY_BYTES = 16 * 1024;

export const ALPACA_MAX_TRANSACTION_ID = 4_294_967_295;

export const ALPACA_ERROR_CODES = {
  OK: 0,
  NOT_IMPLEMENTED: 0x400,
  INVALID_VALUE: 0x401,
  VALUE_NOT_SET: 0x402,
  NOT_CONNECTED: 0x407,
  ACTION_NOT_IMPLEMENTED: 0x40c,
  UNSPECIFIED: 0x4ff,
} as const;

export type AlpacaErrorCode =
  (typeof ALPACA_ERROR_CODES)[keyof typeof ALPACA_ERROR_CODES];

export const DEVICE_IDENTITY = {
  serverName: "Roof Monitor Safety Server",
  manufacturer: "Roof Monitor",
  manufacturerVersion: "1.0.0",
  deviceName: "Roof Safety Monitor",
  description: "Safety monitor driven by roof image classification",
  driverVersion: "1.0.0",
} as const;

/**
 * Stable UUID-shaped identifier for the device, derived from the host and
 * device number so clients keep recognising it across restarts.
 */
export const deriveUniqueId = (
  hostname: string,
  deviceNumber: number,
): string => {
  const digest = createHash("sha1")
    .update(`roof-monitor:${hostname}:${deviceNumber}`)
    .digest("hex");
  return [
    digest.slice(0, 8),
    digest.slice(8, 12),
    digest.slice(12, 16),
    digest.slice(16, 20),
    digest.slice(20, 32),
  ].join("-");
};
