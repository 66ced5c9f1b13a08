/**
 * In-memory RGB565 framebuffer implementing the display's render primitive.
 * Stores pixels big-endian, exactly as they arrive on the wire.
 */

import { rgb888ToRgb565 } from "./rgb565.js";
import type { DisplaySurface, RgbColor } from "./types.js";

const BYTES_PER_PIXEL = 2;

/** Idle-screen background: classic firmware-setup blue. */
export const STATUS_SCREEN_COLOR: RgbColor = [0, 0, 170];

export class FramebufferSurface implements DisplaySurface {
  readonly width: number;
  readonly height: number;
  readonly pixels: Buffer;
  private draws: number;
  private statusDraws: number;
  private lastStatus: string | null;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.pixels = Buffer.alloc(width * height * BYTES_PER_PIXEL);
    this.draws = 0;
    this.statusDraws = 0;
    this.lastStatus = null;
  }

  /**
   * Blit row-major RGB565 pixels at (x, y). Draws at most min(w*h, pixels/2)
   * pixels and clips anything outside the framebuffer.
   */
  drawRgb565(x: number, y: number, w: number, h: number, pixels: Buffer): void {
    this.draws++;
    if (w <= 0 || h <= 0) return;

    const available = Math.min(w * h, Math.floor(pixels.length / BYTES_PER_PIXEL));
    for (let i = 0; i < available; i++) {
      const px = x + (i % w);
      const py = y + Math.floor(i / w);
      if (px >= this.width || py >= this.height) continue;
      const dst = (py * this.width + px) * BYTES_PER_PIXEL;
      this.pixels[dst] = pixels[i * BYTES_PER_PIXEL];
      this.pixels[dst + 1] = pixels[i * BYTES_PER_PIXEL + 1];
    }
  }

  drawStatusScreen(message: string): void {
    this.statusDraws++;
    this.lastStatus = message;
    this.fill(rgb888ToRgb565(...STATUS_SCREEN_COLOR));
  }

  fill(value: number): void {
    for (let i = 0; i < this.pixels.length; i += BYTES_PER_PIXEL) {
      this.pixels.writeUInt16BE(value, i);
    }
  }

  pixelAt(x: number, y: number): number {
    return this.pixels.readUInt16BE((y * this.width + x) * BYTES_PER_PIXEL);
  }

  /** Copy out a region as row-major RGB565 bytes. */
  region(x: number, y: number, w: number, h: number): Buffer {
    const out = Buffer.alloc(w * h * BYTES_PER_PIXEL);
    for (let row = 0; row < h; row++) {
      const src = ((y + row) * this.width + x) * BYTES_PER_PIXEL;
      this.pixels.copy(out, row * w * BYTES_PER_PIXEL, src, src + w * BYTES_PER_PIXEL);
    }
    return out;
  }

  get drawCount(): number {
    return this.draws;
  }

  get statusDrawCount(): number {
    return this.statusDraws;
  }

  get lastStatusMessage(): string | null {
    return this.lastStatus;
  }
}
