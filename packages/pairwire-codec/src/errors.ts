// Errors raised while decoding payload bytes.

export type DecodeErrorKind =
  | "eof"
  | "trailing-bytes"
  | "invalid-discriminant"
  | "invalid-value"
  | "overflow";

/**
 * A payload could not be decoded.
 *
 * Decoders never treat malformed input as fatal: every failure surfaces as a
 * DecodeError so the call that carried the payload fails instead.
 */
export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
    /** Position in the decoded value, e.g. `items.[2].name`, when known. */
    public readonly path?: string,
  ) {
    super(message);
    this.name = "DecodeError";
  }

  static eof(what: string): DecodeError {
    return new DecodeError("eof", `${what}: unexpected end of input`);
  }

  static trailingBytes(count: number): DecodeError {
    return new DecodeError("trailing-bytes", `${count} trailing byte(s) after value`);
  }

  static invalidDiscriminant(what: string, value: number): DecodeError {
    return new DecodeError("invalid-discriminant", `${what}: invalid discriminant ${value}`);
  }

  static invalidValue(message: string): DecodeError {
    return new DecodeError("invalid-value", message);
  }

  static overflow(what: string): DecodeError {
    return new DecodeError("overflow", `${what}: value out of range`);
  }
}
