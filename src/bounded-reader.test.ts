import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { BoundedReader } from "./bounded-reader.js";

describe("BoundedReader", () => {
  it("assembles an exact read from several partial writes", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);
    const target = Buffer.alloc(6);

    const pending = reader.readExact(target, 0, 6, 200);
    stream.write(Buffer.from([1, 2]));
    setTimeout(() => stream.write(Buffer.from([3, 4, 5, 6, 7])), 10);

    expect(await pending).toEqual({ ok: true, bytesRead: 6 });
    expect([...target]).toEqual([1, 2, 3, 4, 5, 6]);
    expect(reader.available).toBe(1);
  });

  it("writes at the requested offset", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);
    const target = Buffer.alloc(4);
    stream.write(Buffer.from([9, 8]));

    expect(await reader.readExact(target, 2, 2, 200)).toEqual({ ok: true, bytesRead: 2 });
    expect([...target]).toEqual([0, 0, 9, 8]);
  });

  it("times out when the stream goes quiet", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);
    stream.write(Buffer.from([1]));

    expect(await reader.readExact(Buffer.alloc(4), 0, 4, 30)).toEqual({ ok: false, kind: "timeout", bytesRead: 1 });
  });

  it("re-arms the deadline on each partial read", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);
    const target = Buffer.alloc(3);

    const pending = reader.readExact(target, 0, 3, 60);
    setTimeout(() => stream.write(Buffer.from([1])), 40);
    setTimeout(() => stream.write(Buffer.from([2])), 80);
    setTimeout(() => stream.write(Buffer.from([3])), 120);

    expect(await pending).toEqual({ ok: true, bytesRead: 3 });
  });

  it("reports closed when the stream ends first", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);

    const pending = reader.readExact(Buffer.alloc(4), 0, 4, 500);
    stream.end(Buffer.from([1, 2]));

    expect(await pending).toEqual({ ok: false, kind: "closed", bytesRead: 2 });
    expect(reader.isEnded).toBe(true);
  });

  it("discards exactly the requested byte count", async () => {
    const stream = new PassThrough();
    const reader = new BoundedReader(stream);
    stream.write(Buffer.alloc(10, 7));
    stream.write(Buffer.from([42]));

    expect(await reader.discard(10, 200)).toEqual({ ok: true, bytesRead: 10 });
    const next = Buffer.alloc(1);
    await reader.readExact(next, 0, 1, 200);
    expect(next[0]).toBe(42);
  });

  it("refuses a read larger than the target", async () => {
    const reader = new BoundedReader(new PassThrough());
    await expect(reader.readExact(Buffer.alloc(4), 2, 4, 100)).rejects.toThrow(RangeError);
  });
});
