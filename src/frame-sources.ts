/**
 * Synthetic frame sources.
 *
 * Each source renders a complete RGB frame at the size the pipeline asks for.
 * The pipeline only sees the FrameSource interface; these stand in for real
 * screen capture and dashboard renderers.
 */

import os from "node:os";
import { createCanvas, createFrame, fillRect } from "./raster.js";
import type { Frame, FrameSource, FrameSourceKind, RgbColor, SourceOptions } from "./types.js";

// ─── Option helpers ─────────────────────────────────────────────────────────────

function numberOption(options: SourceOptions, key: string, fallback: number): number {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/** Parse "#rrggbb" colour options. */
function colorOption(options: SourceOptions, key: string, fallback: RgbColor): RgbColor {
  const value = options[key];
  if (typeof value !== "string") return fallback;
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(value);
  if (!match) return fallback;
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

// ─── Static ─────────────────────────────────────────────────────────────────────

/** A solid screen with an optional border; identical every frame. */
export class StaticScreenSource implements FrameSource {
  readonly kind = "static" as const;
  private readonly background: RgbColor;
  private readonly border: RgbColor;
  private readonly borderWidth: number;

  constructor(options: SourceOptions = {}) {
    this.background = colorOption(options, "background", [0, 0, 170]);
    this.border = colorOption(options, "border", [255, 255, 255]);
    this.borderWidth = Math.max(0, Math.floor(numberOption(options, "borderWidth", 2)));
  }

  async nextFrame(width: number, height: number): Promise<Frame> {
    const pixels = createCanvas(width, height, this.border);
    const inset = this.borderWidth;
    fillRect(pixels, width, height, { x: inset, y: inset, w: width - 2 * inset, h: height - 2 * inset }, this.background);
    return createFrame(width, height, pixels);
  }
}

// ─── Test pattern ───────────────────────────────────────────────────────────────

/**
 * Grid background with one block that moves `speed` pixels per frame,
 * wrapping at the right edge. Only the block's path changes between frames.
 */
export class TestPatternSource implements FrameSource {
  readonly kind = "test-pattern" as const;
  private readonly blockSize: number;
  private readonly speed: number;
  private readonly background: RgbColor;
  private readonly grid: RgbColor;
  private readonly block: RgbColor;
  private frameIndex = 0;

  constructor(options: SourceOptions = {}) {
    this.blockSize = Math.max(1, Math.floor(numberOption(options, "blockSize", 32)));
    this.speed = Math.max(0, Math.floor(numberOption(options, "speed", 8)));
    this.background = colorOption(options, "background", [30, 30, 30]);
    this.grid = colorOption(options, "grid", [60, 60, 60]);
    this.block = colorOption(options, "block", [0, 180, 220]);
  }

  /** Left edge of the moving block for the given frame index. */
  blockX(frameIndex: number, width: number): number {
    const span = Math.max(1, width - this.blockSize + 1);
    return (frameIndex * this.speed) % span;
  }

  async nextFrame(width: number, height: number): Promise<Frame> {
    const pixels = createCanvas(width, height, this.background);
    const spacing = this.blockSize;
    for (let x = 0; x < width; x += spacing) fillRect(pixels, width, height, { x, y: 0, w: 1, h: height }, this.grid);
    for (let y = 0; y < height; y += spacing) fillRect(pixels, width, height, { x: 0, y, w: width, h: 1 }, this.grid);

    const y = Math.max(0, Math.floor((height - this.blockSize) / 2));
    const x = this.blockX(this.frameIndex, width);
    fillRect(pixels, width, height, { x, y, w: this.blockSize, h: this.blockSize }, this.block);

    this.frameIndex++;
    return createFrame(width, height, pixels);
  }
}

// ─── Load bars ──────────────────────────────────────────────────────────────────

/** Returns a load figure in [0, 1]. */
export type LoadSampler = () => number;

/** One-minute load average normalised by core count. */
export const systemLoadSampler: LoadSampler = () => {
  const cores = os.cpus().length || 1;
  return os.loadavg()[0] / cores;
};

/**
 * Scrolling bar graph of recent load samples, newest on the right.
 * Each frame takes one sample.
 */
export class LoadBarsSource implements FrameSource {
  readonly kind = "bars" as const;
  private readonly sampler: LoadSampler;
  private readonly barWidth: number;
  private readonly background: RgbColor;
  private readonly bar: RgbColor;
  private readonly history: number[] = [];

  constructor(options: SourceOptions = {}, sampler: LoadSampler = systemLoadSampler) {
    this.sampler = sampler;
    this.barWidth = Math.max(1, Math.floor(numberOption(options, "barWidth", 8)));
    this.background = colorOption(options, "background", [30, 30, 30]);
    this.bar = colorOption(options, "bar", [0, 180, 220]);
  }

  async nextFrame(width: number, height: number): Promise<Frame> {
    const sample = Math.min(1, Math.max(0, this.sampler()));
    const capacity = Math.max(1, Math.floor(width / this.barWidth));
    this.history.push(sample);
    while (this.history.length > capacity) this.history.shift();

    const pixels = createCanvas(width, height, this.background);
    const offset = capacity - this.history.length;
    this.history.forEach((value, i) => {
      const barHeight = Math.round(value * height);
      fillRect(
        pixels,
        width,
        height,
        { x: (offset + i) * this.barWidth, y: height - barHeight, w: this.barWidth - 1, h: barHeight },
        this.bar,
      );
    });
    return createFrame(width, height, pixels);
  }

  get samples(): readonly number[] {
    return this.history;
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export function createFrameSource(kind: FrameSourceKind, options: SourceOptions = {}): FrameSource {
  switch (kind) {
    case "static":
      return new StaticScreenSource(options);
    case "test-pattern":
      return new TestPatternSource(options);
    case "bars":
      return new LoadBarsSource(options);
  }
}

export const FRAME_SOURCE_KINDS: readonly FrameSourceKind[] = ["static", "test-pattern", "bars"];
