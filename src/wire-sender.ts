/**
 * Wire Sender: writes one packet (12-byte header + payload) to the client
 * socket as a single logical write and reports the outcome as a SendResult.
 *
 * The write is bounded by a timeout measured until the socket's write callback
 * fires (data handed to the kernel). A failure is terminal for the sender: the
 * caller tears the session down and the client reconnects from a full frame.
 */

import { createLogger, type Logger } from "./logger.js";
import { encodePacket } from "./packet-codec.js";
import type { PacketHeader, SendResult } from "./types.js";

/** The subset of net.Socket the sender writes through. */
export interface WireSocket {
  write(chunk: Buffer, cb?: (err?: Error | null) => void): boolean;
  readonly destroyed: boolean;
}

export interface WireSenderOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class WireSender {
  private readonly socket: WireSocket;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private busy = false;
  private failure: SendResult | null = null;
  private sent = 0;
  private bytes = 0;

  constructor(socket: WireSocket, options: WireSenderOptions) {
    if (!(options.timeoutMs > 0)) {
      throw new RangeError(`Send timeout must be positive, got ${options.timeoutMs}`);
    }
    this.socket = socket;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? createLogger("WireSender");
  }

  /**
   * Send header + payload. Resolves `{ ok: true }` once the write is flushed,
   * or a failure on timeout, socket error, or when a previous send failed.
   * Never rejects.
   */
  send(header: PacketHeader, payload: Buffer): Promise<SendResult> {
    if (this.failure) return Promise.resolve(this.failure);
    if (this.busy) {
      return Promise.resolve({
        ok: false,
        kind: "send_error",
        message: "send() called while a previous write is still pending",
      });
    }
    if (this.socket.destroyed) {
      return Promise.resolve(this.fail({ ok: false, kind: "send_error", message: "Socket is closed" }));
    }

    let packet: Buffer;
    try {
      packet = encodePacket(header, payload);
    } catch (err) {
      // Encoding problems are the caller's bug, not a broken link; the sender stays usable.
      const message = err instanceof Error ? err.message : String(err);
      return Promise.resolve({ ok: false, kind: "send_error", message });
    }

    this.busy = true;
    return new Promise<SendResult>((resolve) => {
      let settled = false;
      const settle = (result: SendResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.busy = false;
        if (result.ok) {
          this.sent++;
          this.bytes += packet.length;
          resolve(result);
        } else {
          resolve(this.fail(result));
        }
      };

      const timer = setTimeout(() => {
        settle({
          ok: false,
          kind: "send_timeout",
          message: `Write of ${packet.length} bytes not flushed within ${this.timeoutMs}ms`,
        });
      }, this.timeoutMs);

      try {
        this.socket.write(packet, (err) => {
          if (err) {
            settle({ ok: false, kind: "send_error", message: err.message });
          } else {
            settle({ ok: true });
          }
        });
      } catch (err) {
        settle({ ok: false, kind: "send_error", message: err instanceof Error ? err.message : String(err) });
      }
    });
  }

  private fail(result: SendResult): SendResult {
    if (!this.failure) {
      this.failure = result;
      if (!result.ok) this.log.warn(`${result.kind}: ${result.message}`);
    }
    return result;
  }

  get packetsSent(): number {
    return this.sent;
  }

  get bytesSent(): number {
    return this.bytes;
  }

  get failed(): boolean {
    return this.failure !== null;
  }
}
