/**
 * DisplayReceiver — the display-side receive/render/reconnect loop.
 *
 * One cooperative async loop per display:
 *   DISCONNECTED → CONNECTING → CONNECTED → READING_HEADER ⇄ READING_PAYLOAD
 * with DRAINING for packets that are skipped (oversized or degenerate).
 *
 * Payloads land in a single pre-allocated buffer of `bufferCapacity` bytes.
 * A header announcing more than that is drained byte-for-byte without
 * buffering and the connection is closed; nothing is ever written past the
 * buffer. Connect failures back off with a short retry delay, and every
 * `maxConnectionFailures` consecutive failures redraw the status screen and
 * wait out a longer cooldown.
 */

import { BoundedReader, type ReadResult } from "./bounded-reader.js";
import { createLogger, type Logger } from "./logger.js";
import { PACKET_HEADER_SIZE, decodeHeader, isDegenerate, isWellFormed } from "./packet-codec.js";
import { RGB565_BYTES_PER_PIXEL } from "./rgb565.js";
import { ReceiverState, type ConnectionState, type DisplaySurface, type StreamErrorKind } from "./types.js";
import type { Readable } from "node:stream";

// ─── Interfaces ─────────────────────────────────────────────────────────────────

export interface ClientConnection {
  readonly stream: Readable;
  close(): void;
}

export interface ClientConnector {
  /** Open a connection to the relay. Rejects on failure. */
  connect(): Promise<ClientConnection>;
}

export interface ReceiverConfig {
  /** Size of the pre-allocated payload buffer in bytes. */
  bufferCapacity: number;
  headerTimeoutMs: number;
  payloadTimeoutMs: number;
  discardTimeoutMs: number;
  retryDelayMs: number;
  cooldownMs: number;
  maxConnectionFailures: number;
}

export const DEFAULT_RECEIVER_CONFIG: ReceiverConfig = {
  bufferCapacity: 8192,
  headerTimeoutMs: 5000,
  payloadTimeoutMs: 5000,
  discardTimeoutMs: 5000,
  retryDelayMs: 1000,
  cooldownMs: 30000,
  maxConnectionFailures: 10,
};

export interface ReceiverDeps {
  connector: ClientConnector;
  surface: DisplaySurface;
  logger?: Logger;
  /** Delay primitive; resolves early once `signal` aborts. Replaced in tests. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Watchdog/housekeeping hook, run once per loop iteration. */
  onHousekeeping?: () => void;
}

/** Result of handling one packet. Anything but "rendered"/"drained" ends the session. */
export type PacketOutcome =
  | "rendered"
  | "drained"
  | "connection_closed"
  | Extract<StreamErrorKind, "header_timeout" | "payload_timeout" | "oversized_payload">;

export interface ReceiverStats {
  packetsRendered: number;
  packetsDrained: number;
  oversizedPackets: number;
  mismatchedPackets: number;
  payloadBytes: number;
  sessions: number;
  statusRedraws: number;
}

const defaultSleep = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });

// ─── Receiver ───────────────────────────────────────────────────────────────────

export class DisplayReceiver {
  private readonly config: ReceiverConfig;
  private readonly connector: ClientConnector;
  private readonly surface: DisplaySurface;
  private readonly log: Logger;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly onHousekeeping: (() => void) | undefined;

  private readonly headerBuffer = Buffer.alloc(PACKET_HEADER_SIZE);
  private readonly payloadBuffer: Buffer;

  private _state: ReceiverState = ReceiverState.DISCONNECTED;
  private readonly connection: ConnectionState = { connected: false, failureCount: 0, lastAttempt: null };
  private current: ClientConnection | null = null;
  private stopped = false;
  private abort = new AbortController();
  private readonly _stats: ReceiverStats = {
    packetsRendered: 0,
    packetsDrained: 0,
    oversizedPackets: 0,
    mismatchedPackets: 0,
    payloadBytes: 0,
    sessions: 0,
    statusRedraws: 0,
  };

  constructor(config: Partial<ReceiverConfig>, deps: ReceiverDeps) {
    this.config = { ...DEFAULT_RECEIVER_CONFIG, ...config };
    if (!Number.isInteger(this.config.bufferCapacity) || this.config.bufferCapacity < RGB565_BYTES_PER_PIXEL) {
      throw new RangeError(`bufferCapacity must be an integer >= 2, got ${this.config.bufferCapacity}`);
    }
    if (!Number.isInteger(this.config.maxConnectionFailures) || this.config.maxConnectionFailures < 1) {
      throw new RangeError(`maxConnectionFailures must be a positive integer, got ${this.config.maxConnectionFailures}`);
    }
    this.connector = deps.connector;
    this.surface = deps.surface;
    this.log = deps.logger ?? createLogger("DisplayReceiver");
    this.sleep = deps.sleep ?? defaultSleep;
    this.onHousekeeping = deps.onHousekeeping;
    this.payloadBuffer = Buffer.alloc(this.config.bufferCapacity);
  }

  /** Connect, receive and reconnect until `stop()` is called. */
  async run(): Promise<void> {
    this.stopped = false;
    if (this.abort.signal.aborted) this.abort = new AbortController();
    this.surface.drawStatusScreen("Waiting for connection");
    while (!this.stopped) {
      this.onHousekeeping?.();
      const connection = await this.connectOnce();
      if (connection) await this.runSession(connection);
    }
    this._state = ReceiverState.DISCONNECTED;
  }

  /** Stop the loop; an in-flight read or delay ends at its next wake-up. */
  stop(): void {
    this.stopped = true;
    this.abort.abort();
    this.current?.close();
  }

  /**
   * One connection attempt, including the retry delay or cooldown that
   * follows a failure. Returns the connection or null.
   */
  async connectOnce(): Promise<ClientConnection | null> {
    this._state = ReceiverState.CONNECTING;
    this.connection.lastAttempt = Date.now();

    try {
      const connection = await this.connector.connect();
      this.connection.connected = true;
      this.connection.failureCount = 0;
      this._state = ReceiverState.CONNECTED;
      this.log.info("Connected to relay");
      return connection;
    } catch (err) {
      this.connection.connected = false;
      this.connection.failureCount++;
      this._state = ReceiverState.DISCONNECTED;
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn(
        `Connect failed (${this.connection.failureCount}/${this.config.maxConnectionFailures}): ${reason}`,
      );

      if (this.connection.failureCount >= this.config.maxConnectionFailures) {
        this._stats.statusRedraws++;
        this.surface.drawStatusScreen(`Relay unreachable, retrying in ${Math.round(this.config.cooldownMs / 1000)}s`);
        await this.sleep(this.config.cooldownMs, this.abort.signal);
        this.connection.failureCount = 0;
      } else {
        await this.sleep(this.config.retryDelayMs, this.abort.signal);
      }
      return null;
    }
  }

  /** Receive packets until an error or stop, then close the connection. */
  async runSession(connection: ClientConnection): Promise<PacketOutcome> {
    this.current = connection;
    this._stats.sessions++;
    const reader = new BoundedReader(connection.stream);
    let outcome: PacketOutcome = "connection_closed";

    try {
      while (!this.stopped) {
        this.onHousekeeping?.();
        outcome = await this.receivePacket(reader);
        if (outcome !== "rendered" && outcome !== "drained") break;
      }
    } finally {
      connection.close();
      this.current = null;
      this.connection.connected = false;
      this._state = ReceiverState.DISCONNECTED;
    }

    if (outcome !== "rendered" && outcome !== "drained" && !this.stopped) {
      this.log.warn(`Session ended: ${outcome}`);
    }
    return outcome;
  }

  /** Read one header and handle its payload. */
  async receivePacket(reader: BoundedReader): Promise<PacketOutcome> {
    this._state = ReceiverState.READING_HEADER;
    const headerRead = await reader.readExact(this.headerBuffer, 0, PACKET_HEADER_SIZE, this.config.headerTimeoutMs);
    if (!headerRead.ok) return failureOutcome(headerRead, "header_timeout");

    const header = decodeHeader(this.headerBuffer);
    if (!header) return "connection_closed";
    const { x, y, w, h, dataLen } = header;

    if (dataLen > this.config.bufferCapacity) {
      this._state = ReceiverState.DRAINING;
      this._stats.oversizedPackets++;
      this.log.warn(`Oversized payload: ${dataLen} bytes > buffer ${this.config.bufferCapacity}; draining`);
      await reader.discard(dataLen, this.config.discardTimeoutMs);
      return "oversized_payload";
    }

    if (isDegenerate(header)) {
      if (dataLen > 0) {
        this._state = ReceiverState.DRAINING;
        const drained = await reader.discard(dataLen, this.config.discardTimeoutMs);
        if (!drained.ok) return failureOutcome(drained, "payload_timeout");
      }
      this._stats.packetsDrained++;
      this.log.debug(`Skipped degenerate packet ${w}x${h}@${x},${y} (${dataLen} bytes)`);
      return "drained";
    }

    if (!isWellFormed(header)) {
      this._stats.mismatchedPackets++;
      this.log.warn(`dataLen ${dataLen} does not match ${w}x${h} (${w * h * RGB565_BYTES_PER_PIXEL} bytes)`);
    }

    this._state = ReceiverState.READING_PAYLOAD;
    const payloadRead = await reader.readExact(this.payloadBuffer, 0, dataLen, this.config.payloadTimeoutMs);
    if (!payloadRead.ok) return failureOutcome(payloadRead, "payload_timeout");

    const pixels = Math.min(w * h, Math.floor(dataLen / RGB565_BYTES_PER_PIXEL));
    this.surface.drawRgb565(x, y, w, h, this.payloadBuffer.subarray(0, pixels * RGB565_BYTES_PER_PIXEL));
    this._stats.packetsRendered++;
    this._stats.payloadBytes += dataLen;
    return "rendered";
  }

  get state(): ReceiverState {
    return this._state;
  }

  get connectionState(): Readonly<ConnectionState> {
    return { ...this.connection };
  }

  get stats(): Readonly<ReceiverStats> {
    return { ...this._stats };
  }
}

function failureOutcome(result: ReadResult, timeoutKind: "header_timeout" | "payload_timeout"): PacketOutcome {
  return !result.ok && result.kind === "timeout" ? timeoutKind : "connection_closed";
}
