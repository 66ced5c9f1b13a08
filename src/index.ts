// Raster Relay - Entry point
// Loads pipeline configuration, starts every pipeline and the telemetry server.

import "dotenv/config";
import { DEFAULT_CONFIG_PATH, loadRelayConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createMetricsServer, type MetricsServer } from "./server.js";
import { StreamPipeline } from "./stream-pipeline.js";
import { TelemetryRegistry } from "./telemetry.js";

export const APP_NAME = "Raster Relay";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

async function main(): Promise<void> {
  // ─── Load configuration ─────────────────────────────────────────────────────

  const configPath = process.env.RELAY_CONFIG || DEFAULT_CONFIG_PATH;
  logInit(`Loading configuration from ${configPath}...`);
  const loaded = await loadRelayConfig(configPath);
  if (!loaded.ok) {
    for (const error of loaded.errors) logFatal(error);
    process.exit(1);
  }
  const { config } = loaded;

  // ─── Start pipelines ────────────────────────────────────────────────────────

  const registry = new TelemetryRegistry();
  const pipelines = config.pipelines.map(
    (pipelineConfig) =>
      new StreamPipeline(pipelineConfig, { telemetry: registry.forPipeline(pipelineConfig.name) }),
  );

  const started = await Promise.allSettled(pipelines.map((p) => p.listen()));
  started.forEach((result, i) => {
    if (result.status === "rejected") {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      logFatal(`Pipeline "${pipelines[i].config.name}" failed to start: ${reason}`);
    }
  });
  const running = pipelines.filter((_, i) => started[i].status === "fulfilled");
  if (running.length === 0) {
    logFatal("No pipeline could be started");
    process.exit(1);
  }
  logInit(`${running.length}/${pipelines.length} pipelines listening`);

  // ─── Start telemetry server ─────────────────────────────────────────────────

  let metricsServer: MetricsServer | null = null;
  if (config.metricsPort > 0) {
    metricsServer = createMetricsServer({ registry, logger: createLogger("MetricsServer"), version: APP_VERSION });
    await metricsServer.listen(config.metricsPort);
  } else {
    logInit("Telemetry server disabled (METRICS_PORT=0)");
  }

  logInit(`${APP_NAME} v${APP_VERSION} ready`);

  // ─── Shutdown ───────────────────────────────────────────────────────────────

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInit(`${signal} received, shutting down...`);
    const results = await Promise.allSettled([
      ...running.map((p) => p.close()),
      ...(metricsServer ? [metricsServer.close()] : []),
    ]);
    const failures = results.filter((r) => r.status === "rejected").length;
    process.exit(failures > 0 ? 1 : 0);
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logFatal(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
