import dgram from "node:dgram";
import { ALPACA_DISCOVERY_MESSAGE } from "../shared/config/alpaca";
import { getLogger, toErrorPayload } from "../shared/logger";

const logger = getLogger("alpaca-discovery", "alpaca");

export type AlpacaDiscoveryOptions = {
  host?: string;
  discoveryPort: number;
  alpacaPort: number;
};

export type AlpacaDiscoveryResponder = {
  port: number;
  close: () => Promise<void>;
};

export const isDiscoveryRequest = (message: Buffer): boolean =>
  message.subarray(0, ALPACA_DISCOVERY_MESSAGE.length).toString("ascii") ===
  ALPACA_DISCOVERY_MESSAGE;

export const buildDiscoveryReply = (alpacaPort: number): Buffer =>
  Buffer.from(JSON.stringify({ AlpacaPort: alpacaPort }), "utf8");

/**
 * Answers Alpaca discovery broadcasts. Resolves to null when the port cannot
 * be bound; the HTTP device stays reachable without it.
 */
export const startAlpacaDiscovery = (
  options: AlpacaDiscoveryOptions,
): Promise<AlpacaDiscoveryResponder | null> => {
  const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
  const reply = buildDiscoveryReply(options.alpacaPort);

  socket.on("message", (message, remote) => {
    if (!isDiscoveryRequest(message)) {
      return;
    }
    logger.debug("Answering Alpaca discovery request", {
      address: remote.address,
      port: remote.port,
    });
    socket.send(reply, remote.port, remote.address, (error) => {
      if (error) {
        logger.warn("Failed to answer discovery request", toErrorPayload(error));
      }
    });
  });

  return new Promise((resolve) => {
    const onBindError = (error: Error) => {
      logger.error(
        "Alpaca discovery responder could not bind; discovery disabled",
        { discoveryPort: options.discoveryPort, ...toErrorPayload(error) },
      );
      try {
        socket.close();
      } catch (closeError) {
        logger.debug("Discovery socket was not open", toErrorPayload(closeError));
      }
      resolve(null);
    };
    socket.once("error", onBindError);

    socket.bind(options.discoveryPort, options.host, () => {
      socket.off("error", onBindError);
      socket.on("error", (error) => {
        logger.warn("Alpaca discovery socket error", toErrorPayload(error));
      });

      const { port } = socket.address();
      logger.info("Alpaca discovery responder listening", {
        discoveryPort: port,
        alpacaPort: options.alpacaPort,
      });

      resolve({
        port,
        close: () =>
          new Promise<void>((resolveClose) => {
            socket.close(() => {
              logger.info("Alpaca discovery responder stopped");
              resolveClose();
            });
          }),
      });
    });
  });
};
