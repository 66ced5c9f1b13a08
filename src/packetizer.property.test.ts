// Property-Based Test: chunked packets reproduce the dirty rect

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FramebufferSurface } from "./framebuffer-surface.js";
import { packetizeRect } from "./packetizer.js";
import { createFrame, RGB_BYTES_PER_PIXEL } from "./raster.js";
import { toRgb565 } from "./rgb565.js";
import type { Frame } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryFrame = (): fc.Arbitrary<Frame> =>
  fc
    .record({ width: fc.integer({ min: 1, max: 48 }), height: fc.integer({ min: 1, max: 24 }) })
    .chain(({ width, height }) => {
      const len = width * height * RGB_BYTES_PER_PIXEL;
      return fc
        .uint8Array({ minLength: len, maxLength: len })
        .map((bytes) => createFrame(width, height, Buffer.from(bytes)));
    });

const arbitraryLimit = (): fc.Arbitrary<number> =>
  fc.oneof(fc.integer({ min: 2, max: 64 }), fc.integer({ min: 2, max: 8192 }));

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: chunking reconstructs the rect", () => {
  it("drawing every chunk at its coordinates reproduces the RGB565 rect", () => {
    fc.assert(
      fc.property(arbitraryFrame(), arbitraryLimit(), fc.boolean(), (frame, limit, dithering) => {
        const rect = { x: 0, y: 0, w: frame.width, h: frame.height };
        const packets = packetizeRect(frame, rect, { maxChunkDataSize: limit, dithering });

        const surface = new FramebufferSurface(frame.width, frame.height);
        for (const { header, payload } of packets) {
          surface.drawRgb565(header.x, header.y, header.w, header.h, payload);
        }

        const expected = toRgb565(frame.pixels, frame.width, frame.height, { dithering });
        expect(Buffer.compare(surface.region(0, 0, frame.width, frame.height), expected)).toBe(0);
      }),
      { numRuns: 150 },
    );
  });

  it("no chunk exceeds the limit and every chunk is well-formed", () => {
    fc.assert(
      fc.property(arbitraryFrame(), arbitraryLimit(), (frame, limit) => {
        const rect = { x: 0, y: 0, w: frame.width, h: frame.height };
        for (const { header, payload } of packetizeRect(frame, rect, { maxChunkDataSize: limit })) {
          expect(header.dataLen).toBeLessThanOrEqual(limit);
          expect(header.dataLen).toBe(header.w * header.h * 2);
          expect(payload.length).toBe(header.dataLen);
        }
      }),
      { numRuns: 150 },
    );
  });
});
