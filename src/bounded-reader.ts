/**
 * Deadline-bounded exact reads over a Readable byte stream.
 *
 * Incoming chunks are buffered up to a high-water mark (the stream is paused
 * beyond it). `readExact` copies into a caller-owned buffer, so the receive
 * path never allocates per packet. The inactivity deadline is re-armed each
 * time bytes arrive; a read fails only when the link goes quiet or closes.
 */

import type { Readable } from "node:stream";

export type ReadResult =
  | { ok: true; bytesRead: number }
  | { ok: false; kind: "timeout" | "closed"; bytesRead: number };

export const DEFAULT_READER_HIGH_WATER_MARK = 64 * 1024;

export class BoundedReader {
  private readonly stream: Readable;
  private readonly highWaterMark: number;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private wake: (() => void) | null = null;

  constructor(stream: Readable, highWaterMark: number = DEFAULT_READER_HIGH_WATER_MARK) {
    this.stream = stream;
    this.highWaterMark = highWaterMark;

    stream.on("data", (chunk: Buffer | string) => {
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      this.chunks.push(buf);
      this.buffered += buf.length;
      if (this.buffered >= this.highWaterMark) stream.pause();
      this.notify();
    });
    const finish = () => {
      this.ended = true;
      this.notify();
    };
    stream.on("end", finish);
    stream.on("close", finish);
    stream.on("error", finish);
  }

  /** Bytes buffered and not yet consumed. */
  get available(): number {
    return this.buffered;
  }

  /** True once the stream has ended, closed, or errored. */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Fill `target[offset, offset + length)` from the stream.
   * Fails with "timeout" when no byte arrives for `inactivityTimeoutMs`, or
   * "closed" when the stream ends first.
   */
  async readExact(target: Buffer, offset: number, length: number, inactivityTimeoutMs: number): Promise<ReadResult> {
    if (offset < 0 || length < 0 || offset + length > target.length) {
      throw new RangeError(`Read of ${length} bytes at ${offset} exceeds target of ${target.length} bytes`);
    }
    return this.consume(length, inactivityTimeoutMs, (chunk, done) => {
      chunk.copy(target, offset + done);
    });
  }

  /** Consume and drop exactly `length` bytes, under the same deadline rules. */
  async discard(length: number, inactivityTimeoutMs: number): Promise<ReadResult> {
    return this.consume(length, inactivityTimeoutMs, () => {});
  }

  private async consume(
    length: number,
    inactivityTimeoutMs: number,
    sink: (chunk: Buffer, done: number) => void,
  ): Promise<ReadResult> {
    let done = 0;
    let deadline = performance.now() + inactivityTimeoutMs;

    while (done < length) {
      const taken = this.take(length - done);
      if (taken) {
        sink(taken, done);
        done += taken.length;
        deadline = performance.now() + inactivityTimeoutMs;
        continue;
      }
      if (this.ended) return { ok: false, kind: "closed", bytesRead: done };

      const remaining = deadline - performance.now();
      if (remaining <= 0 || !(await this.waitForData(remaining))) {
        return { ok: false, kind: "timeout", bytesRead: done };
      }
    }
    return { ok: true, bytesRead: done };
  }

  /** Remove up to `max` bytes from the front of the buffer. */
  private take(max: number): Buffer | null {
    const head = this.chunks[0];
    if (head === undefined) return null;

    let out: Buffer;
    if (head.length <= max) {
      this.chunks.shift();
      out = head;
    } else {
      out = head.subarray(0, max);
      this.chunks[0] = head.subarray(max);
    }
    this.buffered -= out.length;
    if (this.buffered < this.highWaterMark && this.stream.isPaused() && !this.ended) {
      this.stream.resume();
    }
    return out;
  }

  /** Resolves true when data or end-of-stream arrives, false on timeout. */
  private waitForData(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve(false);
      }, timeoutMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve(true);
      };
    });
  }

  private notify(): void {
    this.wake?.();
  }
}
