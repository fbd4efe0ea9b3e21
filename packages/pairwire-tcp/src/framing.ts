// Length-prefixed framing for byte streams.
//
// Every message is preceded by its length as a 4-byte little-endian integer.

import type { Duplex } from "node:stream";
import { type MessageTransport, PeerError, createChannel } from "@pairwire/core";

const HEADER_LENGTH = 4;

/** Largest length a 4-byte prefix can carry. */
export const MAX_PREFIX_LENGTH = 0xffff_ffff;

export interface FramingOptions {
  /**
   * Inbound messages announcing a larger length terminate the transport.
   * Defaults to 16 MiB.
   */
  maxFrameLength?: number;
}

/**
 * A MessageTransport over a Node.js byte stream (TCP or TLS socket, or any
 * Duplex).
 *
 * Incoming bytes are split into messages as they arrive; `recv` hands them
 * out in order, then resolves to `null` once the stream ends, or rejects
 * with the stream's error.
 */
export class LengthPrefixedFramed implements MessageTransport {
  private buf: Buffer = Buffer.alloc(0);
  private readonly frames = createChannel<Uint8Array>();
  private readonly maxFrameLength: number;

  constructor(
    private readonly stream: Duplex,
    options: FramingOptions = {},
  ) {
    this.maxFrameLength = Math.min(options.maxFrameLength ?? 16 * 1024 * 1024, MAX_PREFIX_LENGTH);

    stream.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    stream.on("error", (err: Error) => {
      this.frames.close(err);
    });

    stream.on("end", () => {
      this.finish();
    });

    stream.on("close", () => {
      this.finish();
    });
  }

  private processBuffer(): void {
    while (this.buf.length >= HEADER_LENGTH) {
      const frameLen = this.buf.readUInt32LE(0);
      if (frameLen > this.maxFrameLength) {
        this.abort(PeerError.io(`frame of ${frameLen} bytes exceeds the ${this.maxFrameLength} byte limit`));
        return;
      }

      const needed = HEADER_LENGTH + frameLen;
      if (this.buf.length < needed) break;

      // Copy out so the message does not pin the receive buffer
      this.frames.send(new Uint8Array(this.buf.subarray(HEADER_LENGTH, needed)));
      this.buf = this.buf.subarray(needed);
    }
  }

  private finish(): void {
    if (this.buf.length > 0) {
      this.frames.close(PeerError.io(`stream ended inside a frame (${this.buf.length} byte(s) buffered)`));
    } else {
      this.frames.close();
    }
  }

  private abort(error: Error): void {
    this.buf = Buffer.alloc(0);
    this.frames.close(error);
    this.stream.destroy();
  }

  /** Get the underlying stream. */
  getStream(): Duplex {
    return this.stream;
  }

  send(payload: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.frames.isClosed() || this.stream.destroyed || this.stream.writableEnded) {
        reject(PeerError.closed());
        return;
      }
      if (payload.length > MAX_PREFIX_LENGTH) {
        reject(PeerError.io("frame too large for a 4-byte length prefix"));
        return;
      }

      const framed = Buffer.alloc(HEADER_LENGTH + payload.length);
      framed.writeUInt32LE(payload.length, 0);
      framed.set(payload, HEADER_LENGTH);

      this.stream.write(framed, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  recv(): Promise<Uint8Array | null> {
    return this.frames.recv();
  }

  /** Close the connection. Messages already received are still delivered. */
  close(): void {
    this.frames.close();
    this.stream.destroy();
  }
}
