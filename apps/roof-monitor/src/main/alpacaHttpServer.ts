import http from "node:http";
import type { AddressInfo } from "node:net";
import { URL } from "node:url";
import {
  ALPACA_API_VERSIONS,
  ALPACA_DEVICE_TYPE,
  ALPACA_ERROR_CODES,
  ALPACA_MAX_TRANSACTION_ID,
  type AlpacaErrorCode,
  DEVICE_IDENTITY,
  SAFETY_MONITOR_INTERFACE_VERSION,
} from "../shared/config/alpaca";
import type { SafeWhen } from "../shared/config/roof-monitor";
import { ProtocolRequestError } from "../shared/errors";
import { getLogger, toErrorPayload } from "../shared/logger";
import type { PollRecord } from "../shared/types/journal";
import type { StatusRecord, StatusTrend } from "../shared/types/status";
import type { MonitorStats } from "../monitor/loop/monitor-loop";
import {
  AlpacaParameters,
  parseAlpacaBoolean,
  parseBodyParameters,
  parseTransactionId,
  readRequestBody,
} from "./alpacaRequest";
import { renderSetupPage } from "./setupPage";

const logger = getLogger("alpaca-http", "alpaca");

export type AlpacaServerOptions = {
  host: string;
  port: number;
  deviceNumber: number;
  location: string;
  uniqueId: string;
  safeWhen: SafeWhen;
  readStatus: () => StatusRecord;
  readTrend?: () => StatusTrend;
  readMonitorStats?: () => MonitorStats;
  listRecentPolls?: (limit: number) => PollRecord[];
  initiallyConnected?: boolean;
};

export type AlpacaHttpServer = {
  host: string;
  port: number;
  origin: string;
  isConnected: () => boolean;
  close: () => Promise<void>;
};

type AlpacaReply = {
  value?: unknown;
  errorNumber?: AlpacaErrorCode;
  errorMessage?: string;
};

type DeviceRequest = {
  params: AlpacaParameters;
};

type DeviceHandler = (request: DeviceRequest) => AlpacaReply;

type DeviceMember = {
  get?: DeviceHandler;
  put?: DeviceHandler;
};

const DEVICE_PATH_PATTERN = /^\/api\/v1\/safetymonitor\/(\d+)\/([a-z]+)$/;
const SETUP_PATH_PATTERN = /^\/setup\/v1\/safetymonitor\/(\d+)\/setup$/;
const DEFAULT_DIAGNOSTIC_LIMIT = 50;

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,PUT,OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

/**
 * IsSafe is true only while the reported roof state matches the configured
 * safe state; a disconnected device or an undetermined roof is never safe.
 */
export const evaluateIsSafe = (
  status: StatusRecord,
  safeWhen: SafeWhen,
  connected: boolean,
): AlpacaReply => {
  if (!connected) {
    return { value: false };
  }
  if (status.label === "UNKNOWN") {
    return {
      value: false,
      errorNumber: ALPACA_ERROR_CODES.VALUE_NOT_SET,
      errorMessage: "Roof status has not been determined yet",
    };
  }
  return { value: status.label === safeWhen };
};

const isAddressInfo = (
  address: string | AddressInfo | null,
): address is AddressInfo => address !== null && typeof address === "object";

const sendText = (
  res: http.ServerResponse,
  status: number,
  message: string,
): void => {
  res.writeHead(status, {
    ...CORS_HEADERS,
    "Content-Type": "text/plain; charset=utf-8",
  });
  res.end(message);
};

const sendJson = (
  res: http.ServerResponse,
  status: number,
  body: unknown,
): void => {
  res.writeHead(status, {
    ...CORS_HEADERS,
    "Content-Type": "application/json; charset=utf-8",
  });
  res.end(JSON.stringify(body));
};

const sendHtml = (res: http.ServerResponse, html: string): void => {
  res.writeHead(200, {
    ...CORS_HEADERS,
    "Content-Type": "text/html; charset=utf-8",
  });
  res.end(html);
};

export type AlpacaRequestHandler = {
  handle: (req: http.IncomingMessage, res: http.ServerResponse) => void;
  isConnected: () => boolean;
};

export const createAlpacaRequestHandler = (
  options: AlpacaServerOptions,
): AlpacaRequestHandler => {
  let connected = options.initiallyConnected ?? false;
  let serverTransactionId = 0;

  const nextServerTransactionId = (): number => {
    serverTransactionId =
      serverTransactionId >= ALPACA_MAX_TRANSACTION_ID
        ? 1
        : serverTransactionId + 1;
    return serverTransactionId;
  };

  const sendAlpaca = (
    res: http.ServerResponse,
    clientTransactionId: number,
    reply: AlpacaReply,
    status = 200,
  ): void => {
    const body: Record<string, unknown> = {};
    if (reply.value !== undefined) {
      body.Value = reply.value;
    }
    body.ClientTransactionID = clientTransactionId;
    body.ServerTransactionID = nextServerTransactionId();
    body.ErrorNumber = reply.errorNumber ?? ALPACA_ERROR_CODES.OK;
    body.ErrorMessage = reply.errorMessage ?? "";
    sendJson(res, status, body);
  };

  const isSafe = (): AlpacaReply =>
    evaluateIsSafe(options.readStatus(), options.safeWhen, connected);

  const notImplemented = (kind: string, name: string | undefined) => ({
    errorNumber: ALPACA_ERROR_CODES.NOT_IMPLEMENTED,
    errorMessage: `${kind} '${name ?? ""}' is not supported`,
  });

  const deviceMembers: Record<string, DeviceMember> = {
    connected: {
      get: () => ({ value: connected }),
      put: ({ params }) => {
        const next = parseAlpacaBoolean("Connected", params.get("Connected"));
        if (next !== connected) {
          logger.info(next ? "Alpaca client connected" : "Alpaca client disconnected");
        }
        connected = next;
        return {};
      },
    },
    issafe: { get: isSafe },
    name: { get: () => ({ value: DEVICE_IDENTITY.deviceName }) },
    description: { get: () => ({ value: DEVICE_IDENTITY.description }) },
    driverinfo: {
      get: () => ({
        value: `${DEVICE_IDENTITY.deviceName} v${DEVICE_IDENTITY.driverVersion}`,
      }),
    },
    driverversion: { get: () => ({ value: DEVICE_IDENTITY.driverVersion }) },
    interfaceversion: {
      get: () => ({ value: SAFETY_MONITOR_INTERFACE_VERSION }),
    },
    supportedactions: { get: () => ({ value: [] }) },
    action: {
      put: ({ params }) => ({
        value: "",
        errorNumber: ALPACA_ERROR_CODES.ACTION_NOT_IMPLEMENTED,
        errorMessage: `Action '${params.get("Action") ?? ""}' is not supported`,
      }),
    },
    commandblind: {
      put: ({ params }) => notImplemented("Command", params.get("Command")),
    },
    commandbool: {
      put: ({ params }) => ({
        value: false,
        ...notImplemented("Command", params.get("Command")),
      }),
    },
    commandstring: {
      put: ({ params }) => ({
        value: "",
        ...notImplemented("Command", params.get("Command")),
      }),
    },
    lastupdate: {
      get: () => {
        const { updatedAt } = options.readStatus();
        if (updatedAt === null) {
          return {
            value: "",
            errorNumber: ALPACA_ERROR_CODES.VALUE_NOT_SET,
            errorMessage: "Roof status has not been determined yet",
          };
        }
        return { value: new Date(updatedAt).toISOString() };
      },
    },
    status: {
      get: () => {
        const status = options.readStatus();
        return {
          value: {
            IsSafe: isSafe().value,
            RoofStatus: status.label,
            SafeWhen: options.safeWhen,
            Confidence: status.confidence,
            Frame: status.framePath,
            ConsecutiveCount: status.consecutiveCount,
            Override: status.override,
            LastUpdate:
              status.updatedAt === null
                ? null
                : new Date(status.updatedAt).toISOString(),
            Trend: options.readTrend?.() ?? null,
          },
        };
      },
    },
  };

  const handleManagement = (
    res: http.ServerResponse,
    pathname: string,
    clientTransactionId: number,
  ): boolean => {
    switch (pathname) {
      case "/management/apiversions":
        sendAlpaca(res, clientTransactionId, { value: [...ALPACA_API_VERSIONS] });
        return true;
      case "/management/v1/description":
        sendAlpaca(res, clientTransactionId, {
          value: {
            ServerName: DEVICE_IDENTITY.serverName,
            Manufacturer: DEVICE_IDENTITY.manufacturer,
            ManufacturerVersion: DEVICE_IDENTITY.manufacturerVersion,
            Location: options.location,
          },
        });
        return true;
      case "/management/v1/configureddevices":
        sendAlpaca(res, clientTransactionId, {
          value: [
            {
              DeviceName: DEVICE_IDENTITY.deviceName,
              DeviceType: ALPACA_DEVICE_TYPE,
              DeviceNumber: options.deviceNumber,
              UniqueID: options.uniqueId,
            },
          ],
        });
        return true;
      default:
        return false;
    }
  };

  const handleDiagnostics = (res: http.ServerResponse, url: URL): void => {
    const rawLimit = Number.parseInt(url.searchParams.get("limit") ?? "", 10);
    const limit = Number.isFinite(rawLimit) ? rawLimit : DEFAULT_DIAGNOSTIC_LIMIT;
    const stats = options.readMonitorStats?.();
    sendJson(res, 200, {
      monitor: stats
        ? {
            state: stats.state,
            running: stats.running,
            polls: stats.polls,
            droppedTicks: stats.droppedTicks,
            consecutiveFailures: stats.consecutiveFailures,
          }
        : null,
      polls: options.listRecentPolls?.(limit) ?? [],
    });
  };

  const handleDevice = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    url: URL,
    member: DeviceMember,
  ): Promise<void> => {
    if (req.method === "GET" && member.get) {
      const params = new AlpacaParameters(url.searchParams, true);
      const clientTransactionId = parseTransactionId(
        params.get("ClientTransactionID"),
      );
      sendAlpaca(res, clientTransactionId, member.get({ params }));
      return;
    }

    if (req.method === "PUT" && member.put) {
      const body = await readRequestBody(req);
      const params = parseBodyParameters(body, req.headers["content-type"]);
      const clientTransactionId = parseTransactionId(
        params.get("ClientTransactionID"),
      );
      sendAlpaca(res, clientTransactionId, member.put({ params }));
      return;
    }

    throw new ProtocolRequestError(
      405,
      `Method ${req.method ?? "unknown"} is not allowed here`,
    );
  };

  const route = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> => {
    if (req.method === "OPTIONS") {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    if (!req.url) {
      throw new ProtocolRequestError(400, "Missing request URL");
    }

    let url: URL;
    try {
      url = new URL(req.url, "http://localhost");
    } catch {
      throw new ProtocolRequestError(400, "Invalid request URL");
    }
    const pathname = url.pathname.toLowerCase().replace(/\/+$/, "") || "/";

    const deviceMatch = DEVICE_PATH_PATTERN.exec(pathname);
    if (deviceMatch) {
      const [, deviceNumber, memberName] = deviceMatch;
      const member = Object.hasOwn(deviceMembers, memberName)
        ? deviceMembers[memberName]
        : undefined;
      if (Number(deviceNumber) !== options.deviceNumber || !member) {
        throw new ProtocolRequestError(404, `Unknown device endpoint: ${pathname}`);
      }
      await handleDevice(req, res, url, member);
      return;
    }

    if (req.method !== "GET") {
      throw new ProtocolRequestError(
        405,
        `Method ${req.method ?? "unknown"} is not allowed here`,
      );
    }

    const queryParams = new AlpacaParameters(url.searchParams, true);
    const clientTransactionId = parseTransactionId(
      queryParams.get("ClientTransactionID"),
    );
    if (handleManagement(res, pathname, clientTransactionId)) {
      return;
    }

    const setupMatch = SETUP_PATH_PATTERN.exec(pathname);
    if (
      pathname === "/setup" ||
      (setupMatch && Number(setupMatch[1]) === options.deviceNumber)
    ) {
      const status = options.readStatus();
      sendHtml(
        res,
        renderSetupPage({
          deviceNumber: options.deviceNumber,
          port: options.port,
          location: options.location,
          connected,
          isSafe: evaluateIsSafe(status, options.safeWhen, connected).value === true,
          safeWhen: options.safeWhen,
          status,
        }),
      );
      return;
    }

    if (pathname === "/diagnostics/polls") {
      handleDiagnostics(res, url);
      return;
    }

    throw new ProtocolRequestError(404, `Unknown endpoint: ${pathname}`);
  };

  const handle = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    route(req, res).catch((error: unknown) => {
      if (error instanceof ProtocolRequestError) {
        logger.warn("Rejected Alpaca request", {
          method: req.method,
          url: req.url,
          status: error.status,
          reason: error.message,
        });
        if (!res.headersSent) {
          sendText(res, error.status, error.message);
        }
        return;
      }

      logger.error("Alpaca request failed", {
        method: req.method,
        url: req.url,
        error: toErrorPayload(error),
      });
      if (!res.headersSent) {
        sendAlpaca(
          res,
          0,
          {
            errorNumber: ALPACA_ERROR_CODES.UNSPECIFIED,
            errorMessage: error instanceof Error ? error.message : String(error),
          },
          500,
        );
      }
    });
  };

  return { handle, isConnected: () => connected };
};

export const startAlpacaHttpServer = (
  options: AlpacaServerOptions,
): Promise<AlpacaHttpServer> => {
  const handler = createAlpacaRequestHandler(options);
  const server = http.createServer(handler.handle);

  return new Promise<AlpacaHttpServer>((resolve, reject) => {
    const onStartupError = (error: Error & { code?: string }) => {
      if (error.code === "EADDRINUSE") {
        logger.error("Alpaca HTTP server port already in use", {
          host: options.host,
          port: options.port,
        });
      }
      reject(error);
    };
    server.once("error", onStartupError);

    server.listen(options.port, options.host, () => {
      server.off("error", onStartupError);
      server.on("error", (error: unknown) => {
        logger.error(
          "Alpaca HTTP server encountered an error",
          toErrorPayload(error),
        );
      });

      const address = server.address();
      const port = isAddressInfo(address) ? address.port : options.port;
      const origin = `http://${options.host}:${port}`;
      logger.info("Alpaca HTTP server listening", {
        host: options.host,
        port,
        deviceNumber: options.deviceNumber,
      });

      resolve({
        host: options.host,
        port,
        origin,
        isConnected: handler.isConnected,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => {
              if (error) {
                logger.warn(
                  "Failed to close Alpaca HTTP server cleanly",
                  toErrorPayload(error),
                );
                rejectClose(error);
                return;
              }
              logger.info("Alpaca HTTP server stopped");
              resolveClose();
            });
            server.closeAllConnections();
          }),
      });
    });
  });
};
