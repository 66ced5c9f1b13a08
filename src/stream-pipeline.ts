/**
 * StreamPipeline — one listening port, one display client at a time. A new
 * connection takes over from the active one, so a display that reconnects
 * after a silent or half-open drop is served from its next full frame.
 *
 * Each accepted connection becomes a StreamSession with its own queue,
 * threshold controller, diff baseline and sender:
 *
 *   generation loop ──push──▶ FrameQueue ──pop──▶ processing loop
 *                                                 diff → packetize → send
 *                                                 └─ duration → threshold
 *
 * The generation loop fills the queue up to the low-water mark, then paces
 * itself to `generationIntervalMs`. The processing loop owns the previous
 * frame and the controller. A failed send ends the session; the client's
 * reconnect starts a fresh session from a full frame.
 */

import net from "node:net";
import { v4 as uuidv4 } from "uuid";
import { DiffEngine } from "./diff-engine.js";
import { createFrameSource } from "./frame-sources.js";
import { FrameQueue } from "./frame-queue.js";
import { createLogger, type Logger } from "./logger.js";
import { PACKET_HEADER_SIZE } from "./packet-codec.js";
import { packetizeRect } from "./packetizer.js";
import { PipelineTelemetry } from "./telemetry.js";
import { createThresholdState, updateThreshold, type ThresholdState } from "./threshold-controller.js";
import type { Frame, FrameSource, Packet, PipelineConfig, Rect } from "./types.js";
import { WireSender, type WireSocket } from "./wire-sender.js";

/** Poll interval while the queue sits at or above the low-water mark. */
export const IDLE_POLL_MS = 10;

/** The subset of net.Socket a session uses. */
export interface PipelineSocket extends WireSocket {
  readonly remoteAddress?: string;
  setNoDelay?(noDelay?: boolean): unknown;
  once(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  destroy(): unknown;
}

export interface StreamPipelineDeps {
  /** Defaults to the source named in the config. */
  source?: FrameSource;
  telemetry?: PipelineTelemetry;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export type SessionEndReason = "send_failed" | "stopped";

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const elapsedSeconds = (start: number) => (performance.now() - start) / 1000;

// ─── Session ────────────────────────────────────────────────────────────────────

interface SessionDeps {
  source: FrameSource;
  telemetry: PipelineTelemetry;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
}

export class StreamSession {
  readonly id: string;
  readonly queue: FrameQueue;
  readonly threshold: ThresholdState;
  private readonly config: PipelineConfig;
  private readonly socket: PipelineSocket;
  private readonly diffEngine: DiffEngine;
  private readonly sender: WireSender;
  private readonly source: FrameSource;
  private readonly telemetry: PipelineTelemetry;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private running = false;
  private stopped = false;

  constructor(config: PipelineConfig, socket: PipelineSocket, deps: SessionDeps) {
    this.id = uuidv4();
    this.config = config;
    this.socket = socket;
    this.source = deps.source;
    this.telemetry = deps.telemetry;
    this.log = deps.logger;
    this.sleep = deps.sleep;
    this.queue = new FrameQueue(config.queueCapacity);
    this.threshold = createThresholdState({
      min: config.thresholdMin,
      max: config.thresholdMax,
      stepUp: config.thresholdStepUp,
      stepDown: config.thresholdStepDown,
      targetFps: config.targetFps,
      hysteresis: config.hysteresis,
      historySize: config.fpsHistorySize,
    });
    this.diffEngine = new DiffEngine(config.blockSize);
    this.sender = new WireSender(socket, { timeoutMs: config.socketTimeoutMs, logger: deps.logger });
  }

  /** Run both loops until the link fails or `stop()` is called. Never rejects. */
  async run(): Promise<SessionEndReason> {
    if (this.stopped) {
      this.socket.destroy();
      return "stopped";
    }
    this.running = true;
    this.telemetry.setGauge("threshold", this.threshold.current);
    const generation = this.generationLoop();
    const reason = await this.processingLoop();

    this.stop();
    this.socket.destroy();
    await generation;
    this.queue.clear();
    return reason;
  }

  stop(): void {
    this.stopped = true;
    this.running = false;
    this.queue.close();
  }

  /** Stop and drop the link; a pending write fails instead of waiting out its timeout. */
  terminate(): void {
    this.stop();
    this.socket.destroy();
  }

  get isRunning(): boolean {
    return this.running;
  }

  private async generationLoop(): Promise<void> {
    const { width, height, lowWaterMark, generationIntervalMs } = this.config;

    while (this.running) {
      const loopStart = performance.now();
      this.telemetry.setGauge("queue_depth", this.queue.depth);

      if (this.queue.depth >= lowWaterMark) {
        await this.sleep(IDLE_POLL_MS);
        continue;
      }

      try {
        const frame = await this.source.nextFrame(width, height);
        if (frame && this.running) {
          this.telemetry.observe("generate", elapsedSeconds(loopStart));
          this.telemetry.increment("frames_generated");
          if (this.queue.push(frame) === "dropped") {
            this.telemetry.increment("frames_dropped");
            this.log.debug("queue_full: frame dropped");
          }
        }
      } catch (err) {
        this.telemetry.increment("source_errors");
        this.log.warn(`Frame source failed: ${err instanceof Error ? err.message : String(err)}`);
      }

      const elapsedMs = performance.now() - loopStart;
      await this.sleep(Math.max(0, generationIntervalMs - elapsedMs));
    }
  }

  private async processingLoop(): Promise<SessionEndReason> {
    while (this.running) {
      const frame = await this.queue.pop();
      if (!frame) return "stopped";
      const frameStart = performance.now();

      let rects: Rect[];
      const diffStart = performance.now();
      try {
        rects = this.diffEngine.diff(frame, this.threshold.current);
      } catch (err) {
        // Treated as "no change"; the baseline stays on the last good frame.
        this.telemetry.increment("diff_failures");
        this.log.warn(`diff_failure: ${err instanceof Error ? err.message : String(err)}`);
        rects = [];
      }
      this.telemetry.observe("diff", elapsedSeconds(diffStart));

      if (rects.length === 0) {
        this.telemetry.increment("frames_unchanged");
      } else if (!(await this.sendRects(frame, rects))) {
        return "send_failed";
      }

      this.telemetry.increment("frames_processed");
      const frameSeconds = elapsedSeconds(frameStart);
      this.telemetry.observe("frame_total", frameSeconds);

      const update = updateThreshold(this.threshold, frameSeconds);
      this.telemetry.setGauge("threshold", update.threshold);
      if (update.measuredFps !== null && Number.isFinite(update.measuredFps)) {
        this.telemetry.setGauge("achieved_fps", update.measuredFps);
      }
      if (update.adjustment === "raised" || update.adjustment === "lowered") {
        this.log.debug(`Threshold ${update.adjustment} to ${update.threshold} (${update.measuredFps?.toFixed(1)} fps)`);
      }
    }
    return "stopped";
  }

  /** Packetize and send every rect of one frame. False when the link failed. */
  private async sendRects(frame: Frame, rects: Rect[]): Promise<boolean> {
    let chunks = 0;
    let sendSeconds = 0;

    for (const rect of rects) {
      const packetizeStart = performance.now();
      const packets: Packet[] = packetizeRect(frame, rect, {
        maxChunkDataSize: this.config.maxChunkDataSize,
        dithering: this.config.dithering,
      });
      this.telemetry.observe("packetize", elapsedSeconds(packetizeStart));

      for (const { header, payload } of packets) {
        const sendStart = performance.now();
        const result = await this.sender.send(header, payload);
        sendSeconds += elapsedSeconds(sendStart);

        if (!result.ok) {
          this.telemetry.increment("send_failures");
          this.telemetry.increment("connection_errors");
          this.log.warn(`Session ${this.id} ending on ${result.kind}: ${result.message}`);
          return false;
        }
        chunks++;
        this.telemetry.increment("packets_sent");
        this.telemetry.increment("bytes_sent", PACKET_HEADER_SIZE + header.dataLen);
      }
    }

    this.telemetry.observe("send", sendSeconds);
    this.telemetry.observe("chunks", chunks);
    this.telemetry.setGauge("chunks_per_frame", chunks);
    return true;
  }
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export class StreamPipeline {
  readonly config: PipelineConfig;
  readonly telemetry: PipelineTelemetry;
  private readonly source: FrameSource;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private server: net.Server | null = null;
  private session: StreamSession | null = null;
  private sessionDone: Promise<void> | null = null;

  constructor(config: PipelineConfig, deps: StreamPipelineDeps = {}) {
    this.config = config;
    this.source = deps.source ?? createFrameSource(config.source, config.sourceOptions);
    this.telemetry = deps.telemetry ?? new PipelineTelemetry(config.name);
    this.log = deps.logger ?? createLogger(`pipeline:${config.name}`);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Start accepting display clients on the configured host and port. */
  listen(): Promise<void> {
    const server = net.createServer((socket) => {
      this.handleConnection(socket);
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        server.on("error", (err) => this.log.error(`Listener error: ${err.message}`));
        this.log.info(
          `Listening on ${this.config.host}:${this.port} (${this.config.width}x${this.config.height}, source=${this.config.source})`,
        );
        resolve();
      });
    });
  }

  /**
   * Adopt an accepted socket as the active session. An active session is
   * terminated first; the new one starts once it has wound down.
   */
  handleConnection(socket: PipelineSocket): StreamSession {
    const peer = socket.remoteAddress ?? "unknown";
    socket.setNoDelay?.(true);
    socket.on("error", (err) => {
      this.telemetry.increment("connection_errors");
      this.log.warn(`Socket error from ${peer}: ${err.message}`);
    });

    const session = new StreamSession(this.config, socket, {
      source: this.source,
      telemetry: this.telemetry,
      logger: this.log,
      sleep: this.sleep,
    });
    socket.once("close", () => session.stop());

    const previous = this.session;
    const previousDone = this.sessionDone ?? Promise.resolve();
    if (previous) {
      this.telemetry.increment("session_takeovers");
      this.log.info(`Client ${peer} takes over from session ${previous.id}`);
      previous.terminate();
    }

    this.session = session;
    this.telemetry.increment("reconnections");
    this.telemetry.setGauge("client_connected", 1);
    this.log.info(`Client ${peer} connected (session ${session.id})`);

    this.sessionDone = previousDone.then(() => session.run()).then(
      (reason) => {
        this.log.info(`Session ${session.id} ended: ${reason}`);
        this.endSession(session);
      },
      (err: unknown) => {
        this.log.error(`Session ${session.id} crashed: ${err instanceof Error ? err.message : String(err)}`);
        socket.destroy();
        this.endSession(session);
      },
    );
    return session;
  }

  private endSession(session: StreamSession): void {
    if (this.session !== session) return;
    this.session = null;
    this.sessionDone = null;
    this.telemetry.setGauge("client_connected", 0);
    this.telemetry.setGauge("queue_depth", 0);
  }

  /** Resolves once the active session (if any) has fully wound down. */
  async waitForSession(): Promise<void> {
    await this.sessionDone;
  }

  /** Stop the active session, the listener, and the frame source. */
  async close(): Promise<void> {
    const done = this.sessionDone;
    this.session?.terminate();
    await done;

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    this.source.close?.();
    this.log.info("Pipeline stopped");
  }

  get activeSession(): StreamSession | null {
    return this.session;
  }

  /** Bound port; differs from config.port when that is 0. */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.config.port;
  }
}
