/**
 * Message transport abstraction.
 *
 * A Peer talks to the other side through an established, ordered, reliable
 * duplex link that already delimits messages: every `send` on one side
 * arrives as exactly one buffer from `recv` on the other.
 *
 * Implementations:
 * - createMemoryTransportPair (this package) for in-process peers
 * - LengthPrefixedFramed (@pairwire/tcp) for byte streams (TCP, TLS)
 */
export interface MessageTransport {
  /**
   * Send one message.
   *
   * Rejects if the transport is closed or the write fails.
   */
  send(payload: Uint8Array): Promise<void>;

  /**
   * Receive the next message, in order.
   *
   * Resolves to null once the stream has ended cleanly, and rejects if the
   * transport failed.
   */
  recv(): Promise<Uint8Array | null>;

  /**
   * Close the transport. Idempotent; a pending or later `recv` resolves to
   * null.
   */
  close(): void;
}
