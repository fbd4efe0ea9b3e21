// Errors raised at the envelope level and errors relayed from the remote side.

export type FrameErrorKind =
  | "short-header"
  | "truncated-token"
  | "token-overflow"
  | "non-canonical-token"
  | "unsupported-message";

/**
 * An inbound buffer is not a well-formed frame.
 *
 * Framing errors are local: they are reported to the receiving side and never
 * answered on the wire, since the token needed to answer may be unreadable.
 */
export class FrameError extends Error {
  constructor(
    public readonly kind: FrameErrorKind,
    message: string,
    /** Raw identifier byte, for `unsupported-message`. */
    public readonly messageId?: number,
  ) {
    super(message);
    this.name = "FrameError";
  }

  static shortHeader(length: number): FrameError {
    return new FrameError("short-header", `frame too short: ${length} byte(s), need at least 2`);
  }

  static truncatedToken(): FrameError {
    return new FrameError("truncated-token", "frame token is truncated");
  }

  static tokenOverflow(): FrameError {
    return new FrameError("token-overflow", "frame token exceeds the safe integer range");
  }

  static nonCanonicalToken(): FrameError {
    return new FrameError("non-canonical-token", "frame token is not minimally encoded");
  }

  static unsupportedMessage(messageId: number): FrameError {
    return new FrameError(
      "unsupported-message",
      `unsupported message identifier ${messageId}`,
      messageId,
    );
  }
}

/**
 * The remote handler failed.
 *
 * Only the failure's text crosses the wire, so this carries that text as its
 * message and nothing else of the thrown error.
 */
export class RemoteError extends Error {
  constructor(
    message: string,
    /** Identifier of the message whose handler failed. */
    public readonly messageId?: number,
  ) {
    super(message);
    this.name = "RemoteError";
  }
}
