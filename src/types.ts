// Raster Relay - Shared TypeScript interfaces and types

// ─── Raster ─────────────────────────────────────────────────────────────────────

/**
 * Immutable raster snapshot in the working pixel format (24-bit RGB,
 * row-major, 3 bytes per pixel). Ownership moves from the generator to the
 * queue to the consumer; nothing writes to `pixels` after creation.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly pixels: Buffer;
  readonly capturedAt: number; // performance.now() at capture
}

/** Region in destination coordinates. All fields are u16 on the wire. */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** A changed region together with its RGB565 payload (w * h * 2 bytes). */
export interface DirtyRect extends Rect {
  payload: Buffer;
}

export type RgbColor = readonly [r: number, g: number, b: number];

// ─── Wire Protocol ──────────────────────────────────────────────────────────────

export interface PacketHeader {
  x: number;
  y: number;
  w: number;
  h: number;
  dataLen: number;
}

export interface Packet {
  header: PacketHeader;
  payload: Buffer;
}

// ─── Errors ─────────────────────────────────────────────────────────────────────

export type StreamErrorKind =
  | "queue_full"
  | "diff_failure"
  | "send_timeout"
  | "send_error"
  | "header_timeout"
  | "payload_timeout"
  | "oversized_payload"
  | "connect_failure";

export type SendResult =
  | { ok: true }
  | { ok: false; kind: Extract<StreamErrorKind, "send_timeout" | "send_error">; message: string };

// ─── Frame Queue ────────────────────────────────────────────────────────────────

export type PushResult = "accepted" | "dropped";

// ─── Frame Sources ──────────────────────────────────────────────────────────────

export type FrameSourceKind = "static" | "test-pattern" | "bars";

export type SourceOptions = Record<string, string | number | boolean>;

/**
 * Capability that renders one frame at the requested size. May suspend
 * briefly; a rejection or `null` means "no frame this cycle".
 */
export interface FrameSource {
  readonly kind: FrameSourceKind;
  nextFrame(width: number, height: number): Promise<Frame | null>;
  close?(): void;
}

// ─── Pipeline Configuration ─────────────────────────────────────────────────────

export interface PipelineConfig {
  name: string;
  host: string;
  port: number;
  width: number;
  height: number;
  source: FrameSourceKind;
  sourceOptions: SourceOptions;
  /** Largest payload (bytes, excluding the 12-byte header) in one packet. */
  maxChunkDataSize: number;
  targetFps: number;
  thresholdMin: number;
  thresholdMax: number;
  thresholdStepUp: number;
  thresholdStepDown: number;
  fpsHistorySize: number;
  /** Dead band around targetFps, as a fraction (0.1 = ±10%). */
  hysteresis: number;
  queueCapacity: number;
  lowWaterMark: number;
  generationIntervalMs: number;
  socketTimeoutMs: number;
  blockSize: number;
  dithering: boolean;
}

export interface RelayConfig {
  /** Port for the telemetry HTTP endpoint; 0 disables it. */
  metricsPort: number;
  pipelines: PipelineConfig[];
}

// ─── Display Client ─────────────────────────────────────────────────────────────

export enum ReceiverState {
  DISCONNECTED = "disconnected",
  CONNECTING = "connecting",
  CONNECTED = "connected",
  READING_HEADER = "reading_header",
  READING_PAYLOAD = "reading_payload",
  DRAINING = "draining",
}

export interface ConnectionState {
  connected: boolean;
  failureCount: number;
  lastAttempt: number | null; // Date.now() of the last connect attempt
}

/** Render primitive on the display side. */
export interface DisplaySurface {
  /** Draw packed big-endian RGB565 pixels row-major starting at (x, y). */
  drawRgb565(x: number, y: number, w: number, h: number, pixels: Buffer): void;
  /** Redraw the idle/status screen shown while disconnected. */
  drawStatusScreen(message: string): void;
}
