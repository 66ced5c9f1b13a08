// Property-Based Test: dirty-rect diff engine

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { dirtyArea, findDirtyRects, MAX_PIXEL_DELTA } from "./diff-engine.js";
import { createFrame, RGB_BYTES_PER_PIXEL } from "./raster.js";
import type { Frame, Rect } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Pair of same-size frames; the second differs from the first in a few pixels. */
const arbitraryFramePair = (): fc.Arbitrary<[Frame, Frame]> =>
  fc
    .record({ width: fc.integer({ min: 1, max: 40 }), height: fc.integer({ min: 1, max: 40 }) })
    .chain(({ width, height }) => {
      const len = width * height * RGB_BYTES_PER_PIXEL;
      return fc
        .tuple(
          fc.uint8Array({ minLength: len, maxLength: len }),
          fc.array(
            fc.tuple(fc.nat({ max: len - 1 }), fc.integer({ min: 0, max: 255 })),
            { maxLength: 30 },
          ),
        )
        .map(([base, edits]): [Frame, Frame] => {
          const prev = Buffer.from(base);
          const curr = Buffer.from(base);
          for (const [i, value] of edits) curr[i] = value;
          return [createFrame(width, height, prev), createFrame(width, height, curr)];
        });
    });

const arbitraryThreshold = (): fc.Arbitrary<number> => fc.integer({ min: 0, max: MAX_PIXEL_DELTA });

const arbitraryBlockSize = (): fc.Arbitrary<number> => fc.constantFrom(1, 4, 8, 16);

function pixelDelta(a: Frame, b: Frame, x: number, y: number): number {
  const i = (y * a.width + x) * RGB_BYTES_PER_PIXEL;
  return (
    Math.abs(a.pixels[i] - b.pixels[i]) +
    Math.abs(a.pixels[i + 1] - b.pixels[i + 1]) +
    Math.abs(a.pixels[i + 2] - b.pixels[i + 2])
  );
}

function contains(rects: Rect[], x: number, y: number): boolean {
  return rects.some((r) => x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h);
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: diff engine", () => {
  it("an unchanged frame yields no dirty rects for any threshold", () => {
    fc.assert(
      fc.property(arbitraryFramePair(), arbitraryThreshold(), arbitraryBlockSize(), ([frame], t, bs) => {
        expect(findDirtyRects(frame, frame, t, bs)).toEqual([]);
      }),
      { numRuns: 200 },
    );
  });

  it("identical inputs produce identical output", () => {
    fc.assert(
      fc.property(arbitraryFramePair(), arbitraryThreshold(), arbitraryBlockSize(), ([prev, curr], t, bs) => {
        expect(findDirtyRects(prev, curr, t, bs)).toEqual(findDirtyRects(prev, curr, t, bs));
      }),
      { numRuns: 100 },
    );
  });

  it("every pixel whose delta exceeds the threshold lies inside a rect", () => {
    fc.assert(
      fc.property(arbitraryFramePair(), arbitraryThreshold(), arbitraryBlockSize(), ([prev, curr], t, bs) => {
        const rects = findDirtyRects(prev, curr, t, bs);
        for (let y = 0; y < curr.height; y++) {
          for (let x = 0; x < curr.width; x++) {
            if (pixelDelta(prev, curr, x, y) > t) {
              expect(contains(rects, x, y)).toBe(true);
            }
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("rects are non-empty, inside the frame and non-overlapping", () => {
    fc.assert(
      fc.property(arbitraryFramePair(), arbitraryThreshold(), arbitraryBlockSize(), ([prev, curr], t, bs) => {
        const rects = findDirtyRects(prev, curr, t, bs);
        for (const r of rects) {
          expect(r.w).toBeGreaterThan(0);
          expect(r.h).toBeGreaterThan(0);
          expect(r.x + r.w).toBeLessThanOrEqual(curr.width);
          expect(r.y + r.h).toBeLessThanOrEqual(curr.height);
        }
        // Non-overlap: covered area equals the sum of rect areas
        let covered = 0;
        for (let y = 0; y < curr.height; y++) {
          for (let x = 0; x < curr.width; x++) {
            if (contains(rects, x, y)) covered++;
          }
        }
        expect(covered).toBe(dirtyArea(rects));
      }),
      { numRuns: 100 },
    );
  });

  it("raising the threshold never increases the dirty area", () => {
    fc.assert(
      fc.property(
        arbitraryFramePair(),
        arbitraryThreshold(),
        arbitraryThreshold(),
        arbitraryBlockSize(),
        ([prev, curr], a, b, bs) => {
          const low = Math.min(a, b);
          const high = Math.max(a, b);
          expect(dirtyArea(findDirtyRects(prev, curr, high, bs))).toBeLessThanOrEqual(
            dirtyArea(findDirtyRects(prev, curr, low, bs)),
          );
        },
      ),
      { numRuns: 200 },
    );
  });
});
