// In-process transport pair.

import type { MessageTransport } from "./transport.ts";
import { type Channel, createChannel } from "./channel.ts";
import { PeerError } from "./errors.ts";

/** One end of an in-process link. */
export interface MemoryTransport extends MessageTransport {
  /**
   * Terminate this end with a transport failure: its pending and later
   * `recv` calls reject with `error` once buffered messages are drained,
   * and the other end sees the stream end.
   */
  fail(error: Error): void;
}

class MemoryEnd implements MemoryTransport {
  constructor(
    private readonly inbox: Channel<Uint8Array>,
    private readonly outbox: Channel<Uint8Array>,
  ) {}

  async send(payload: Uint8Array): Promise<void> {
    if (this.inbox.isClosed()) {
      throw PeerError.closed();
    }
    // Copy so the receiver never shares memory with the sender
    if (!this.outbox.send(payload.slice())) {
      throw PeerError.closed();
    }
  }

  recv(): Promise<Uint8Array | null> {
    return this.inbox.recv();
  }

  close(): void {
    this.inbox.close();
    this.outbox.close();
  }

  fail(error: Error): void {
    this.inbox.close(error);
    this.outbox.close();
  }
}

/**
 * Create two linked transports: what one end sends, the other receives.
 *
 * Closing either end ends the stream for both.
 */
export function createMemoryTransportPair(): [MemoryTransport, MemoryTransport] {
  const aToB = createChannel<Uint8Array>();
  const bToA = createChannel<Uint8Array>();
  return [new MemoryEnd(bToA, aToB), new MemoryEnd(aToB, bToA)];
}
