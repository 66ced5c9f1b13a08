/**
 * Dirty-rectangle diff between consecutive frames.
 *
 * The frame is partitioned into square blocks. A block's metric is the
 * largest per-pixel sum of absolute channel deltas (|dR| + |dG| + |dB|,
 * 0..765) inside it; the block is dirty when the metric exceeds the
 * threshold. Dirty blocks are merged into horizontal runs per block row, and
 * runs with the same column extent on consecutive block rows are merged into
 * one rectangle. Output is clipped to the frame and sorted by (y, x).
 */

import { RGB_BYTES_PER_PIXEL, isValidFrame } from "./raster.js";
import type { Frame, Rect } from "./types.js";

export const DEFAULT_BLOCK_SIZE = 16;

/** Largest possible per-pixel metric: 3 channels × 255. */
export const MAX_PIXEL_DELTA = 765;

interface BlockSpan {
  colStart: number;
  colEnd: number; // exclusive
  rowStart: number;
  rowEnd: number; // inclusive
}

function fullFrameRect(frame: Frame): Rect[] {
  if (frame.width === 0 || frame.height === 0) return [];
  return [{ x: 0, y: 0, w: frame.width, h: frame.height }];
}

/** True when any pixel inside the block differs by more than `threshold`. */
function isBlockDirty(
  previous: Buffer,
  current: Buffer,
  width: number,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  threshold: number,
): boolean {
  for (let y = y0; y < y1; y++) {
    let i = (y * width + x0) * RGB_BYTES_PER_PIXEL;
    for (let x = x0; x < x1; x++) {
      const delta =
        Math.abs(current[i] - previous[i]) +
        Math.abs(current[i + 1] - previous[i + 1]) +
        Math.abs(current[i + 2] - previous[i + 2]);
      if (delta > threshold) return true;
      i += RGB_BYTES_PER_PIXEL;
    }
  }
  return false;
}

/**
 * Compute the dirty rectangles between `previous` and `current`.
 * `previous = null` or a size change yields one rect covering the frame.
 * Throws RangeError on a frame whose buffer does not match its size.
 */
export function findDirtyRects(
  previous: Frame | null,
  current: Frame,
  threshold: number,
  blockSize: number = DEFAULT_BLOCK_SIZE,
): Rect[] {
  if (!isValidFrame(current)) {
    throw new RangeError(`Malformed frame: ${current.pixels.length} bytes for ${current.width}x${current.height}`);
  }
  if (!Number.isInteger(blockSize) || blockSize < 1) {
    throw new RangeError(`Block size must be a positive integer, got ${blockSize}`);
  }
  if (previous === null || previous.width !== current.width || previous.height !== current.height) {
    return fullFrameRect(current);
  }
  if (!isValidFrame(previous)) {
    throw new RangeError("Malformed previous frame");
  }

  const { width, height } = current;
  const cols = Math.ceil(width / blockSize);
  const rows = Math.ceil(height / blockSize);

  let active: BlockSpan[] = [];
  const finished: BlockSpan[] = [];

  for (let row = 0; row < rows; row++) {
    const y0 = row * blockSize;
    const y1 = Math.min(height, y0 + blockSize);

    const dirty: boolean[] = [];
    for (let col = 0; col < cols; col++) {
      const x0 = col * blockSize;
      const x1 = Math.min(width, x0 + blockSize);
      dirty.push(isBlockDirty(previous.pixels, current.pixels, width, x0, y0, x1, y1, threshold));
    }

    // Runs of dirty blocks on this block row
    const runs: Array<[number, number]> = [];
    let col = 0;
    while (col < cols) {
      if (!dirty[col]) {
        col++;
        continue;
      }
      const start = col;
      while (col < cols && dirty[col]) col++;
      runs.push([start, col]);
    }

    // Extend spans from the previous row that have the same extent
    const next: BlockSpan[] = [];
    for (const [colStart, colEnd] of runs) {
      const idx = active.findIndex((s) => s.colStart === colStart && s.colEnd === colEnd);
      if (idx >= 0) {
        const span = active[idx];
        active.splice(idx, 1);
        span.rowEnd = row;
        next.push(span);
      } else {
        next.push({ colStart, colEnd, rowStart: row, rowEnd: row });
      }
    }
    finished.push(...active);
    active = next;
  }
  finished.push(...active);

  return finished
    .map((span) => {
      const x = span.colStart * blockSize;
      const y = span.rowStart * blockSize;
      return {
        x,
        y,
        w: Math.min(width, span.colEnd * blockSize) - x,
        h: Math.min(height, (span.rowEnd + 1) * blockSize) - y,
      };
    })
    .sort((a, b) => a.y - b.y || a.x - b.x);
}

/** Total pixel area of a set of rects. */
export function dirtyArea(rects: Rect[]): number {
  return rects.reduce((sum, r) => sum + r.w * r.h, 0);
}

/**
 * Stateful wrapper owned by the processing loop: remembers the last frame it
 * diffed so the next call compares against it.
 */
export class DiffEngine {
  private previous: Frame | null;
  private readonly blockSize: number;

  constructor(blockSize: number = DEFAULT_BLOCK_SIZE) {
    this.blockSize = blockSize;
    this.previous = null;
  }

  /**
   * Diff `current` against the previous frame and make it the new baseline.
   * On error the baseline is left unchanged.
   */
  diff(current: Frame, threshold: number): Rect[] {
    const rects = findDirtyRects(this.previous, current, threshold, this.blockSize);
    this.previous = current;
    return rects;
  }

  /** Force the next diff to emit the whole frame. */
  requestFullFrame(): void {
    this.previous = null;
  }

  get hasBaseline(): boolean {
    return this.previous !== null;
  }
}
