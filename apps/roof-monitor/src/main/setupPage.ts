import {
  ALPACA_API_VERSIONS,
  ALPACA_DEVICE_TYPE,
  DEVICE_IDENTITY,
} from "../shared/config/alpaca";
import type { SafeWhen } from "../shared/config/roof-monitor";
import type { StatusRecord } from "../shared/types/status";

export type SetupPageModel = {
  deviceNumber: number;
  port: number;
  location: string;
  connected: boolean;
  isSafe: boolean;
  safeWhen: SafeWhen;
  status: StatusRecord;
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: unknown): string =>
  String(value).replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const row = (label: string, value: unknown) =>
  `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(value)}</td></tr>`;

export const renderSetupPage = (model: SetupPageModel): string => {
  const deviceBase = `/api/v1/safetymonitor/${model.deviceNumber}`;
  const lastUpdate =
    model.status.updatedAt === null
      ? "never"
      : new Date(model.status.updatedAt).toISOString();

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(DEVICE_IDENTITY.deviceName)} Setup</title>
  <style>
    body { font-family: sans-serif; margin: 40px; }
    table { border-collapse: collapse; }
    th, td { border: 1px solid #ddd; padding: 6px 10px; text-align: left; }
  </style>
</head>
<body>
  <h1>${escapeHtml(DEVICE_IDENTITY.deviceName)}</h1>
  <h2>Device</h2>
  <table>
    ${row("Device type", ALPACA_DEVICE_TYPE)}
    ${row("Device number", model.deviceNumber)}
    ${row("Port", model.port)}
    ${row("Location", model.location)}
    ${row("API versions", ALPACA_API_VERSIONS.join(", "))}
    ${row("Driver version", DEVICE_IDENTITY.driverVersion)}
  </table>
  <h2>Status</h2>
  <table>
    ${row("Connected", model.connected)}
    ${row("Roof", model.status.label)}
    ${row("Safe when roof is", model.safeWhen)}
    ${row("Is safe", model.isSafe)}
    ${row("Confidence", model.status.confidence.toFixed(3))}
    ${row("Frame", model.status.framePath ?? "none")}
    ${row("Last update", lastUpdate)}
  </table>
  <h2>Endpoints</h2>
  <ul>
    <li><a href="/management/apiversions">/management/apiversions</a></li>
    <li><a href="/management/v1/description">/management/v1/description</a></li>
    <li><a href="/management/v1/configureddevices">/management/v1/configureddevices</a></li>
    <li><a href="${deviceBase}/issafe">${deviceBase}/issafe</a></li>
    <li><a href="${deviceBase}/status">${deviceBase}/status</a></li>
    <li><a href="/diagnostics/polls">/diagnostics/polls</a></li>
  </ul>
</body>
</html>
`;
};
