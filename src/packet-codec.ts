/**
 * Binary codec for the display update packet.
 *
 * Wire format (big-endian): [x u16][y u16][w u16][h u16][dataLen u32][dataLen payload bytes]
 *
 * The payload is RGB565 pixel data, 2 bytes per pixel, row-major from (x, y).
 * For a well-formed packet dataLen == w * h * 2. Packets with dataLen 0, or
 * with w or h of 0, are degenerate: receivers drain them but never render.
 */

import type { PacketHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const PACKET_HEADER_SIZE = 12;

export const MAX_U16 = 0xffff;
export const MAX_U32 = 0xffffffff;

const BYTES_PER_WIRE_PIXEL = 2;

// ─── Validation ─────────────────────────────────────────────────────────────────

function isUint(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

/** True when every field fits its wire width. */
export function isEncodableHeader(header: PacketHeader): boolean {
  return (
    isUint(header.x, MAX_U16) &&
    isUint(header.y, MAX_U16) &&
    isUint(header.w, MAX_U16) &&
    isUint(header.h, MAX_U16) &&
    isUint(header.dataLen, MAX_U32)
  );
}

/** dataLen matches the pixel area. */
export function isWellFormed(header: PacketHeader): boolean {
  return header.dataLen === header.w * header.h * BYTES_PER_WIRE_PIXEL;
}

/** No-op packet: nothing to render. */
export function isDegenerate(header: PacketHeader): boolean {
  return header.dataLen === 0 || header.w === 0 || header.h === 0;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/** Write the 12-byte header into `target` at `offset`. */
export function writeHeader(header: PacketHeader, target: Buffer, offset: number = 0): void {
  if (!isEncodableHeader(header)) {
    throw new RangeError(
      `Header field out of range: x=${header.x} y=${header.y} w=${header.w} h=${header.h} dataLen=${header.dataLen}`,
    );
  }
  target.writeUInt16BE(header.x, offset);
  target.writeUInt16BE(header.y, offset + 2);
  target.writeUInt16BE(header.w, offset + 4);
  target.writeUInt16BE(header.h, offset + 6);
  target.writeUInt32BE(header.dataLen, offset + 8);
}

export function encodeHeader(header: PacketHeader): Buffer {
  const buf = Buffer.alloc(PACKET_HEADER_SIZE);
  writeHeader(header, buf);
  return buf;
}

/**
 * Encode header + payload as one contiguous buffer.
 * Throws RangeError when the payload length differs from header.dataLen.
 */
export function encodePacket(header: PacketHeader, payload: Buffer): Buffer {
  if (payload.length !== header.dataLen) {
    throw new RangeError(`Payload is ${payload.length} bytes but header declares ${header.dataLen}`);
  }
  const buf = Buffer.alloc(PACKET_HEADER_SIZE + payload.length);
  writeHeader(header, buf);
  payload.copy(buf, PACKET_HEADER_SIZE);
  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

/**
 * Decode a header from `data` at `offset`.
 * Returns null when fewer than 12 bytes are available.
 */
export function decodeHeader(data: Buffer, offset: number = 0): PacketHeader | null {
  if (offset < 0 || data.length - offset < PACKET_HEADER_SIZE) return null;
  return {
    x: data.readUInt16BE(offset),
    y: data.readUInt16BE(offset + 2),
    w: data.readUInt16BE(offset + 4),
    h: data.readUInt16BE(offset + 6),
    dataLen: data.readUInt32BE(offset + 8),
  };
}

/**
 * Decode a complete packet. Returns null on a short header or when the
 * payload is truncated; trailing bytes after the payload are ignored.
 */
export function decodePacket(data: Buffer): { header: PacketHeader; payload: Buffer } | null {
  const header = decodeHeader(data);
  if (!header) return null;
  if (data.length - PACKET_HEADER_SIZE < header.dataLen) return null;
  return { header, payload: data.subarray(PACKET_HEADER_SIZE, PACKET_HEADER_SIZE + header.dataLen) };
}
