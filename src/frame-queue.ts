/**
 * Bounded frame queue between the generation loop and the processing loop.
 * Uses a circular buffer for O(1) push/pop regardless of queue state.
 *
 * Backpressure policy: when full, the incoming frame is dropped. Frames
 * already queued are never evicted, and the consumer is never blocked by a
 * producer. A single consumer may park in pop() until a frame arrives or the
 * queue is closed.
 */

import type { Frame, PushResult } from "./types.js";

export const DEFAULT_QUEUE_CAPACITY = 5;

export class FrameQueue {
  private buffer: (Frame | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private droppedByBackpressure: number;
  private waiter: ((frame: Frame | null) => void) | null; // parked consumer
  private closed: boolean;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`FrameQueue capacity must be a positive integer, got ${capacity}`);
    }
    this.maxSize = capacity;
    this.buffer = new Array<Frame | null>(capacity).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedByBackpressure = 0;
    this.waiter = null;
    this.closed = false;
  }

  /**
   * Offer a frame. A parked consumer receives it directly; otherwise it is
   * queued, or dropped when the queue is full or closed.
   */
  push(frame: Frame): PushResult {
    if (this.closed) {
      return "dropped";
    }

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(frame);
      return "accepted";
    }

    if (this.count === this.maxSize) {
      this.droppedByBackpressure++;
      return "dropped";
    }

    this.buffer[this.tail] = frame;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return "accepted";
  }

  /** Take the oldest frame without waiting, or null if empty. */
  tryPop(): Frame | null {
    if (this.count === 0) {
      return null;
    }

    const frame = this.buffer[this.head];
    this.buffer[this.head] = null; // the queue gives up its reference
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return frame;
  }

  /**
   * Resolve with the oldest frame, waiting for one if the queue is empty.
   * Resolves null once the queue is closed and drained.
   */
  pop(): Promise<Frame | null> {
    const frame = this.tryPop();
    if (frame) {
      return Promise.resolve(frame);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error("FrameQueue.pop() called while another consumer is waiting"));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting frames, discard queued ones and release a parked consumer. */
  close(): void {
    this.closed = true;
    this.clear();
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(null);
    }
  }

  /** Clear all queued frames and reset queue pointers. */
  clear(): void {
    for (let i = 0; i < this.maxSize; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }

  /** Number of frames rejected because the queue was full. */
  get framesDroppedByBackpressure(): number {
    return this.droppedByBackpressure;
  }

  /** Current queue depth. */
  get depth(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
