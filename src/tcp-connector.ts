// TCP connector for the display client.

import net from "node:net";
import type { ClientConnection, ClientConnector } from "./client-receiver.js";

export interface TcpConnectorOptions {
  host: string;
  port: number;
  connectTimeoutMs: number;
}

export function createTcpConnector(options: TcpConnectorOptions): ClientConnector {
  const { host, port, connectTimeoutMs } = options;

  return {
    connect(): Promise<ClientConnection> {
      return new Promise((resolve, reject) => {
        const socket = net.connect({ host, port });
        socket.setTimeout(connectTimeoutMs);

        const onError = (err: Error) => {
          socket.destroy();
          reject(err);
        };
        const onTimeout = () => {
          onError(new Error(`Connect to ${host}:${port} timed out after ${connectTimeoutMs}ms`));
        };

        socket.once("error", onError);
        socket.once("timeout", onTimeout);
        socket.once("connect", () => {
          socket.off("error", onError);
          socket.off("timeout", onTimeout);
          socket.setTimeout(0);
          socket.setNoDelay(true);
          // Read errors surface as stream end; the receiver sees "closed".
          socket.on("error", () => socket.destroy());
          resolve({ stream: socket, close: () => socket.destroy() });
        });
      });
    },
  };
}
