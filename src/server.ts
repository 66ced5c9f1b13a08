// Raster Relay - Telemetry HTTP server
// Express app exposing liveness and per-pipeline telemetry snapshots as JSON.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { createLogger, type Logger } from "./logger.js";
import type { TelemetryRegistry } from "./telemetry.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateMetricsServerOptions {
  registry: TelemetryRegistry;
  /** Custom logger. Defaults to a console-based logger. */
  logger?: Logger;
  /** Reported by /health. */
  version?: string;
}

export interface MetricsServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening. Resolves with the bound port (useful when `port` is 0). */
  listen(port: number, host?: string): Promise<number>;
  /** Stop accepting requests and close the listener. */
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createMetricsServer(options: CreateMetricsServerOptions): MetricsServer {
  const { registry, logger = createLogger("MetricsServer"), version } = options;
  const startedAt = Date.now();

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
      pipelines: registry.names,
      ...(version ? { version } : {}),
    });
  });

  app.get("/metrics", (_req, res) => {
    res.json(registry.snapshot());
  });

  app.get("/metrics/:pipeline", (req, res) => {
    const snapshot = registry.snapshot()[req.params.pipeline];
    if (!snapshot) {
      res.status(404).json({ error: `Unknown pipeline "${req.params.pipeline}"` });
      return;
    }
    res.json(snapshot);
  });

  return {
    app,
    httpServer,
    listen(port: number, host?: string): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, host, () => {
          httpServer.off("error", reject);
          const address: AddressInfo | string | null = httpServer.address();
          const bound = address && typeof address === "object" ? address.port : port;
          logger.info(`Metrics server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
