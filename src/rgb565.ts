/**
 * RGB888 → RGB565 conversion for the wire pixel format.
 *
 * Wire pixels are 16-bit big-endian: rrrrrggg gggbbbbb.
 */

import { RGB_BYTES_PER_PIXEL } from "./raster.js";
import type { RgbColor } from "./types.js";

export const RGB565_BYTES_PER_PIXEL = 2;

/** Converts one RGB888 pixel to an RGB565 value. */
export function rgb888ToRgb565(r: number, g: number, b: number): number {
  const r5 = (r >> 3) & 0x1f;
  const g6 = (g >> 2) & 0x3f;
  const b5 = (b >> 3) & 0x1f;
  return (r5 << 11) | (g6 << 5) | b5;
}

/** Expands an RGB565 value back to RGB888, replicating high bits into the low ones. */
export function rgb565ToRgb888(value: number): RgbColor {
  const r5 = (value >> 11) & 0x1f;
  const g6 = (value >> 5) & 0x3f;
  const b5 = value & 0x1f;
  return [(r5 << 3) | (r5 >> 2), (g6 << 2) | (g6 >> 4), (b5 << 3) | (b5 >> 2)];
}

export interface Rgb565Options {
  /** Floyd-Steinberg error diffusion before quantizing. */
  dithering?: boolean;
}

/**
 * Convert a row-major RGB888 buffer of `width x height` pixels into
 * big-endian RGB565 bytes (2 per pixel).
 */
export function toRgb565(
  rgb: Buffer,
  width: number,
  height: number,
  options: Rgb565Options = {},
): Buffer {
  const pixelCount = width * height;
  if (rgb.length !== pixelCount * RGB_BYTES_PER_PIXEL) {
    throw new RangeError(`RGB buffer is ${rgb.length} bytes, expected ${pixelCount * RGB_BYTES_PER_PIXEL}`);
  }

  const source = options.dithering ? ditherToRgb565Grid(rgb, width, height) : rgb;
  const out = Buffer.alloc(pixelCount * RGB565_BYTES_PER_PIXEL);
  for (let p = 0; p < pixelCount; p++) {
    const i = p * RGB_BYTES_PER_PIXEL;
    out.writeUInt16BE(rgb888ToRgb565(source[i], source[i + 1], source[i + 2]), p * RGB565_BYTES_PER_PIXEL);
  }
  return out;
}

// Quantization steps per channel: 5-6-5 bits.
const CHANNEL_STEPS = [8, 4, 8] as const;

function clampByte(value: number): number {
  return value < 0 ? 0 : value > 255 ? 255 : value;
}

/**
 * Floyd-Steinberg pass: snaps every channel to the RGB565 grid and spreads
 * the quantization error to unvisited neighbours (7/16 right, 3/16
 * below-left, 5/16 below, 1/16 below-right).
 */
function ditherToRgb565Grid(rgb: Buffer, width: number, height: number): Buffer {
  const work = Float32Array.from(rgb);
  const spread = (x: number, y: number, channel: number, amount: number) => {
    if (x < 0 || x >= width || y >= height) return;
    work[(y * width + x) * RGB_BYTES_PER_PIXEL + channel] += amount;
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const base = (y * width + x) * RGB_BYTES_PER_PIXEL;
      for (let c = 0; c < 3; c++) {
        const old = work[base + c];
        const step = CHANNEL_STEPS[c];
        const quantized = clampByte(Math.round(old / step) * step);
        work[base + c] = quantized;
        const err = old - quantized;
        if (err === 0) continue;
        spread(x + 1, y, c, (err * 7) / 16);
        spread(x - 1, y + 1, c, (err * 3) / 16);
        spread(x, y + 1, c, (err * 5) / 16);
        spread(x + 1, y + 1, c, err / 16);
      }
    }
  }

  const out = Buffer.alloc(rgb.length);
  for (let i = 0; i < work.length; i++) {
    out[i] = clampByte(Math.round(work[i]));
  }
  return out;
}
