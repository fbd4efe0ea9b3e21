// Errors raised by a Peer.

export type PeerErrorKind = "invalid-token" | "closed" | "io" | "timeout" | "cancelled";

/** Error during peer handling. */
export class PeerError extends Error {
  constructor(
    public readonly kind: PeerErrorKind,
    message: string,
    /** Token of the call concerned, when there is one. */
    public readonly token?: number,
  ) {
    super(message);
    this.name = "PeerError";
  }

  /** A response named a token with no outstanding call. */
  static invalidToken(token: number): PeerError {
    return new PeerError("invalid-token", `no outstanding call for token ${token}`, token);
  }

  static closed(): PeerError {
    return new PeerError("closed", "transport closed");
  }

  static io(message: string): PeerError {
    return new PeerError("io", message);
  }

  static timeout(token: number, timeoutMs: number): PeerError {
    return new PeerError("timeout", `no reply within ${timeoutMs}ms`, token);
  }

  static cancelled(token?: number): PeerError {
    return new PeerError("cancelled", "call cancelled", token);
  }
}

/** Normalize a thrown value to an Error. */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : PeerError.io(String(e));
}
