import { randomUUID } from "node:crypto";
import { RawData, WebSocket, WebSocketServer } from "ws";
import { errorMessage } from "../errors";
import { componentLogger, Logger } from "../logger";
import { EventGateway } from "./eventGateway";

export interface GatewayServer {
  port: number;
  close(): Promise<void>;
}

const decode = (data: RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
};

export const startGatewayServer = (
  gateway: EventGateway,
  options: { port: number; host: string; logger?: Logger }
): Promise<GatewayServer> => {
  const logger = options.logger ?? componentLogger("gateway-ws");
  const wss = new WebSocketServer({ port: options.port, host: options.host });

  wss.on("connection", (socket) => {
    const sessionId = randomUUID();
    gateway.connect({
      id: sessionId,
      send: (message) => {
        if (socket.readyState === WebSocket.OPEN) {
          socket.send(JSON.stringify(message));
        }
      }
    });

    socket.on("message", (data) => {
      gateway.handle(sessionId, decode(data)).catch((error: unknown) => {
        logger.error({ err: error, sessionId }, "failed to handle gateway message");
      });
    });
    socket.on("close", () => gateway.disconnect(sessionId));
    socket.on("error", (error) => logger.warn({ sessionId, error: errorMessage(error) }, "gateway socket error"));
  });

  return new Promise((resolve, reject) => {
    wss.once("error", reject);
    wss.once("listening", () => {
      const address = wss.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      logger.info({ port }, "gateway listening");
      resolve({
        port,
        close: () =>
          new Promise<void>((done, fail) => {
            for (const client of wss.clients) {
              client.terminate();
            }
            wss.close((error) => (error ? fail(error) : done()));
          })
      });
    });
  });
};
