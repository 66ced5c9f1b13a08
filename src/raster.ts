// Helpers for working-format (24-bit RGB) rasters.

import type { Frame, Rect, RgbColor } from "./types.js";

export const RGB_BYTES_PER_PIXEL = 3;

/** Largest coordinate or extent the wire header can carry. */
export const MAX_DIMENSION = 0xffff;

export function frameByteLength(width: number, height: number): number {
  return width * height * RGB_BYTES_PER_PIXEL;
}

/** Wrap an RGB buffer as a Frame. The buffer must not be written afterwards. */
export function createFrame(
  width: number,
  height: number,
  pixels: Buffer,
  capturedAt: number = performance.now(),
): Frame {
  if (pixels.length !== frameByteLength(width, height)) {
    throw new RangeError(
      `Pixel buffer is ${pixels.length} bytes, expected ${frameByteLength(width, height)} for ${width}x${height}`,
    );
  }
  return { width, height, pixels, capturedAt };
}

/** Allocate an RGB buffer filled with one colour. */
export function createCanvas(width: number, height: number, color: RgbColor = [0, 0, 0]): Buffer {
  const buf = Buffer.alloc(frameByteLength(width, height));
  fillRect(buf, width, height, { x: 0, y: 0, w: width, h: height }, color);
  return buf;
}

/** Fill a rectangle of an RGB buffer in place, clipped to the canvas. */
export function fillRect(
  pixels: Buffer,
  width: number,
  height: number,
  rect: Rect,
  color: RgbColor,
): void {
  const x0 = Math.max(0, rect.x);
  const y0 = Math.max(0, rect.y);
  const x1 = Math.min(width, rect.x + rect.w);
  const y1 = Math.min(height, rect.y + rect.h);
  const [r, g, b] = color;

  for (let y = y0; y < y1; y++) {
    let i = (y * width + x0) * RGB_BYTES_PER_PIXEL;
    for (let x = x0; x < x1; x++) {
      pixels[i] = r;
      pixels[i + 1] = g;
      pixels[i + 2] = b;
      i += RGB_BYTES_PER_PIXEL;
    }
  }
}

/** True when the frame's buffer length matches its declared size. */
export function isValidFrame(frame: Frame): boolean {
  return (
    Number.isInteger(frame.width) &&
    Number.isInteger(frame.height) &&
    frame.width >= 0 &&
    frame.height >= 0 &&
    frame.pixels.length === frameByteLength(frame.width, frame.height)
  );
}

/** Copy the RGB pixels of `rect` out of `frame`, row-major. */
export function extractRegion(frame: Frame, rect: Rect): Buffer {
  if (rect.x < 0 || rect.y < 0 || rect.x + rect.w > frame.width || rect.y + rect.h > frame.height) {
    throw new RangeError(
      `Region ${rect.w}x${rect.h}@${rect.x},${rect.y} lies outside ${frame.width}x${frame.height} frame`,
    );
  }

  const rowBytes = rect.w * RGB_BYTES_PER_PIXEL;
  const out = Buffer.alloc(rowBytes * rect.h);
  for (let row = 0; row < rect.h; row++) {
    const src = ((rect.y + row) * frame.width + rect.x) * RGB_BYTES_PER_PIXEL;
    frame.pixels.copy(out, row * rowBytes, src, src + rowBytes);
  }
  return out;
}
