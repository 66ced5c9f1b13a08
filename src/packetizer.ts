/**
 * Packetizer: turns a dirty region of a frame into wire packets that each fit
 * the client's receive buffer.
 *
 * The whole region is converted to RGB565 first (so dithering sees the full
 * rect), then split:
 *   - payload <= maxChunkDataSize          → one packet
 *   - otherwise, whole scan-lines per chunk → as many rows as fit
 *   - a single row larger than the limit   → 1-row chunks split on pixel boundaries
 * Every chunk's header gives its exact placement, so chunks render
 * independently and, in emission order, reproduce the rect.
 */

import { PACKET_HEADER_SIZE } from "./packet-codec.js";
import { extractRegion } from "./raster.js";
import { RGB565_BYTES_PER_PIXEL, toRgb565 } from "./rgb565.js";
import type { DirtyRect, Frame, Packet, Rect } from "./types.js";

export interface PacketizerOptions {
  /** Largest payload per packet in bytes, header excluded. At least 2. */
  maxChunkDataSize: number;
  dithering?: boolean;
}

export const MIN_CHUNK_DATA_SIZE = RGB565_BYTES_PER_PIXEL;

/** Convert the region `rect` of `frame` into a DirtyRect with an RGB565 payload. */
export function encodeDirtyRect(frame: Frame, rect: Rect, dithering: boolean = false): DirtyRect {
  const rgb = extractRegion(frame, rect);
  return { ...rect, payload: toRgb565(rgb, rect.w, rect.h, { dithering }) };
}

/**
 * Split a DirtyRect into packets no larger than `maxChunkDataSize` bytes of
 * payload. Degenerate rects (w or h of 0) yield no packets.
 */
export function chunkDirtyRect(rect: DirtyRect, maxChunkDataSize: number): Packet[] {
  if (!Number.isInteger(maxChunkDataSize) || maxChunkDataSize < MIN_CHUNK_DATA_SIZE) {
    throw new RangeError(`maxChunkDataSize must be an integer >= ${MIN_CHUNK_DATA_SIZE}, got ${maxChunkDataSize}`);
  }

  const { x, y, w, h, payload } = rect;
  if (w === 0 || h === 0) return [];

  const bytesPerRow = w * RGB565_BYTES_PER_PIXEL;
  const total = bytesPerRow * h;
  if (payload.length !== total) {
    throw new RangeError(`DirtyRect payload is ${payload.length} bytes, expected ${total} for ${w}x${h}`);
  }

  if (total <= maxChunkDataSize) {
    return [{ header: { x, y, w, h, dataLen: total }, payload }];
  }

  const packets: Packet[] = [];
  const rowsPerChunk = Math.floor(maxChunkDataSize / bytesPerRow);

  if (rowsPerChunk >= 1) {
    for (let row = 0; row < h; row += rowsPerChunk) {
      const rows = Math.min(rowsPerChunk, h - row);
      const start = row * bytesPerRow;
      const dataLen = rows * bytesPerRow;
      packets.push({
        header: { x, y: y + row, w, h: rows, dataLen },
        payload: payload.subarray(start, start + dataLen),
      });
    }
    return packets;
  }

  // A single row exceeds the limit: split each row on pixel boundaries.
  const pixelsPerChunk = Math.floor(maxChunkDataSize / RGB565_BYTES_PER_PIXEL);
  for (let row = 0; row < h; row++) {
    for (let col = 0; col < w; col += pixelsPerChunk) {
      const count = Math.min(pixelsPerChunk, w - col);
      const start = (row * w + col) * RGB565_BYTES_PER_PIXEL;
      const dataLen = count * RGB565_BYTES_PER_PIXEL;
      packets.push({
        header: { x: x + col, y: y + row, w: count, h: 1, dataLen },
        payload: payload.subarray(start, start + dataLen),
      });
    }
  }
  return packets;
}

/** Convert and chunk one dirty region of `frame`. */
export function packetizeRect(frame: Frame, rect: Rect, options: PacketizerOptions): Packet[] {
  return chunkDirtyRect(encodeDirtyRect(frame, rect, options.dithering ?? false), options.maxChunkDataSize);
}

/** Bytes on the wire for a list of packets, headers included. */
export function wireSize(packets: Packet[]): number {
  return packets.reduce((sum, p) => sum + PACKET_HEADER_SIZE + p.payload.length, 0);
}
