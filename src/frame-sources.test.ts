import { describe, it, expect } from "vitest";
import {
  LoadBarsSource,
  StaticScreenSource,
  TestPatternSource,
  createFrameSource,
} from "./frame-sources.js";
import { RGB_BYTES_PER_PIXEL } from "./raster.js";
import type { Frame } from "./types.js";

function rgbAt(frame: Frame, x: number, y: number): number[] {
  const i = (y * frame.width + x) * RGB_BYTES_PER_PIXEL;
  return [...frame.pixels.subarray(i, i + RGB_BYTES_PER_PIXEL)];
}

describe("StaticScreenSource", () => {
  it("draws a bordered solid screen", async () => {
    const frame = await new StaticScreenSource({ borderWidth: 2 }).nextFrame(8, 8);

    expect(frame.width).toBe(8);
    expect(rgbAt(frame, 0, 0)).toEqual([255, 255, 255]);
    expect(rgbAt(frame, 1, 6)).toEqual([255, 255, 255]);
    expect(rgbAt(frame, 4, 4)).toEqual([0, 0, 170]);
  });

  it("honours colour options and renders the same frame every time", async () => {
    const source = new StaticScreenSource({ background: "#102030", borderWidth: 0 });
    const a = await source.nextFrame(4, 4);
    const b = await source.nextFrame(4, 4);

    expect(rgbAt(a, 0, 0)).toEqual([0x10, 0x20, 0x30]);
    expect(Buffer.compare(a.pixels, b.pixels)).toBe(0);
  });
});

describe("TestPatternSource", () => {
  it("moves the block by `speed` pixels each frame", async () => {
    const source = new TestPatternSource({ blockSize: 4, speed: 2 });
    const first = await source.nextFrame(16, 8);
    const second = await source.nextFrame(16, 8);

    expect(rgbAt(first, 1, 3)).toEqual([0, 180, 220]);
    expect(rgbAt(second, 1, 3)).toEqual([30, 30, 30]);
    expect(rgbAt(second, 5, 3)).toEqual([0, 180, 220]);
    expect(rgbAt(second, 8, 1)).toEqual([60, 60, 60]);
  });

  it("wraps the block at the right edge", () => {
    const source = new TestPatternSource({ blockSize: 4, speed: 2 });
    expect(source.blockX(6, 16)).toBe(12);
    expect(source.blockX(7, 16)).toBe(1);
  });
});

describe("LoadBarsSource", () => {
  it("draws one bar per sample, newest on the right", async () => {
    const values = [0.5, 1, 0];
    const source = new LoadBarsSource({ barWidth: 8 }, () => values.shift() ?? 0);

    const first = await source.nextFrame(16, 10);
    expect(rgbAt(first, 8, 9)).toEqual([0, 180, 220]);
    expect(rgbAt(first, 8, 4)).toEqual([30, 30, 30]);
    expect(rgbAt(first, 0, 9)).toEqual([30, 30, 30]);

    const second = await source.nextFrame(16, 10);
    expect(rgbAt(second, 0, 5)).toEqual([0, 180, 220]);
    expect(rgbAt(second, 8, 0)).toEqual([0, 180, 220]);

    await source.nextFrame(16, 10);
    expect(source.samples).toEqual([1, 0]);
  });

  it("clamps samples into [0, 1]", async () => {
    const source = new LoadBarsSource({}, () => 3);
    await source.nextFrame(16, 4);
    expect(source.samples).toEqual([1]);
  });
});

describe("createFrameSource", () => {
  it("builds each source kind", () => {
    expect(createFrameSource("static").kind).toBe("static");
    expect(createFrameSource("test-pattern").kind).toBe("test-pattern");
    expect(createFrameSource("bars").kind).toBe("bars");
  });
});
