// Raster Relay - Display client
// Connects to one pipeline and renders into an in-memory RGB565 framebuffer.

import "dotenv/config";
import { DisplayReceiver } from "./client-receiver.js";
import { readClientSettings } from "./client-settings.js";
import { FramebufferSurface } from "./framebuffer-surface.js";
import { createLogger } from "./logger.js";
import { createTcpConnector } from "./tcp-connector.js";

const log = createLogger("DisplayClient");

const loaded = readClientSettings(process.env);
if (!loaded.ok) {
  for (const error of loaded.errors) log.error(error);
  process.exit(1);
}
const { host, port, width, height, connectTimeoutMs, statsIntervalMs, receiver: config } = loaded.settings;

const surface = new FramebufferSurface(width, height);
let lastReport = Date.now();

const receiver: DisplayReceiver = new DisplayReceiver(config, {
  connector: createTcpConnector({ host, port, connectTimeoutMs }),
  surface,
  logger: log,
  onHousekeeping: () => {
    const now = Date.now();
    if (now - lastReport < statsIntervalMs) return;
    lastReport = now;
    const s = receiver.stats;
    log.info(
      `state=${receiver.state} rendered=${s.packetsRendered} drained=${s.packetsDrained} ` +
        `oversized=${s.oversizedPackets} bytes=${s.payloadBytes} sessions=${s.sessions}`,
    );
  },
});

const stop = () => {
  log.info("Stopping display client");
  receiver.stop();
};
process.once("SIGINT", stop);
process.once("SIGTERM", stop);

log.info(`Connecting to ${host}:${port} with a ${config.bufferCapacity}-byte receive buffer (${width}x${height})`);
receiver.run().then(
  () => log.info("Display client stopped"),
  (err: unknown) => {
    log.error(`Receiver failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
