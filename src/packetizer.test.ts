// Unit tests for the packetizer/chunker

import { describe, it, expect } from "vitest";
import { chunkDirtyRect, encodeDirtyRect, packetizeRect, wireSize } from "./packetizer.js";
import { createCanvas, createFrame, fillRect } from "./raster.js";
import type { DirtyRect } from "./types.js";

function rectOf(x: number, y: number, w: number, h: number): DirtyRect {
  const payload = Buffer.alloc(w * h * 2);
  for (let i = 0; i < payload.length; i++) payload[i] = i & 0xff;
  return { x, y, w, h, payload };
}

describe("encodeDirtyRect", () => {
  it("converts the region to big-endian RGB565", () => {
    const pixels = createCanvas(8, 4, [0, 0, 0]);
    fillRect(pixels, 8, 4, { x: 2, y: 1, w: 2, h: 1 }, [255, 0, 0]);
    const frame = createFrame(8, 4, pixels);

    const rect = encodeDirtyRect(frame, { x: 2, y: 1, w: 3, h: 1 });
    expect(rect).toMatchObject({ x: 2, y: 1, w: 3, h: 1 });
    expect([...rect.payload]).toEqual([0xf8, 0x00, 0xf8, 0x00, 0x00, 0x00]);
  });
});

describe("chunkDirtyRect", () => {
  it("emits a single packet when the payload fits", () => {
    const packets = chunkDirtyRect(rectOf(10, 20, 4, 2), 16);
    expect(packets).toHaveLength(1);
    expect(packets[0].header).toEqual({ x: 10, y: 20, w: 4, h: 2, dataLen: 16 });
  });

  it("splits on whole scan-lines when rows fit", () => {
    const packets = chunkDirtyRect(rectOf(5, 7, 4, 3), 16);
    expect(packets.map((p) => p.header)).toEqual([
      { x: 5, y: 7, w: 4, h: 2, dataLen: 16 },
      { x: 5, y: 9, w: 4, h: 1, dataLen: 8 },
    ]);
    expect([...packets[1].payload]).toEqual([16, 17, 18, 19, 20, 21, 22, 23]);
  });

  it("splits a row on pixel boundaries when one row exceeds the limit", () => {
    const packets = chunkDirtyRect(rectOf(0, 0, 5, 2), 7);
    expect(packets.map((p) => p.header)).toEqual([
      { x: 0, y: 0, w: 3, h: 1, dataLen: 6 },
      { x: 3, y: 0, w: 2, h: 1, dataLen: 4 },
      { x: 0, y: 1, w: 3, h: 1, dataLen: 6 },
      { x: 3, y: 1, w: 2, h: 1, dataLen: 4 },
    ]);
    expect([...packets[3].payload]).toEqual([16, 17, 18, 19]);
  });

  it("yields no packets for a degenerate rect", () => {
    expect(chunkDirtyRect({ x: 0, y: 0, w: 0, h: 4, payload: Buffer.alloc(0) }, 64)).toEqual([]);
    expect(chunkDirtyRect({ x: 0, y: 0, w: 4, h: 0, payload: Buffer.alloc(0) }, 64)).toEqual([]);
  });

  it("rejects a limit below one pixel", () => {
    expect(() => chunkDirtyRect(rectOf(0, 0, 1, 1), 1)).toThrow(RangeError);
    expect(() => chunkDirtyRect(rectOf(0, 0, 1, 1), 2.5)).toThrow(RangeError);
  });

  it("rejects a payload that disagrees with the rect size", () => {
    expect(() => chunkDirtyRect({ x: 0, y: 0, w: 2, h: 2, payload: Buffer.alloc(6) }, 64)).toThrow(
      "DirtyRect payload is 6 bytes, expected 8 for 2x2",
    );
  });
});

describe("packetizeRect", () => {
  it("converts and chunks a frame region", () => {
    const frame = createFrame(4, 4, createCanvas(4, 4, [0, 255, 0]));
    const packets = packetizeRect(frame, { x: 0, y: 0, w: 4, h: 4 }, { maxChunkDataSize: 8 });

    expect(packets).toHaveLength(4);
    expect(packets.every((p) => p.header.dataLen === 8)).toBe(true);
    expect(packets[0].payload.readUInt16BE(0)).toBe(0x07e0);
  });
});

describe("wireSize", () => {
  it("counts a header per packet plus payload bytes", () => {
    expect(wireSize(chunkDirtyRect(rectOf(5, 7, 4, 3), 16))).toBe(2 * 12 + 24);
  });
});
