// Frame envelope.
//
// Layout:
//   byte 0      message identifier
//   byte 1      flags
//   bytes 2..k  token, unsigned LEB128
//   rest        payload (opaque)

import { DecodeError, decodeVarintNumber, encodeVarint } from "@pairwire/codec";
import { FrameError } from "./errors.ts";

/** Flag bits. Undefined bits are dropped on decode. */
export const FrameFlags = {
  /** The frame answers an earlier request carrying the same token. */
  RESPONSE: 0b01,
  /** The response carries a failure description instead of a result. Only meaningful with RESPONSE. */
  ERROR: 0b10,
} as const;

const KNOWN_FLAGS = FrameFlags.RESPONSE | FrameFlags.ERROR;

/** Largest message identifier; identifiers occupy one byte. */
export const MAX_MESSAGE_ID = 0xff;

export interface Frame {
  messageId: number;
  flags: number;
  token: number;
  payload: Uint8Array;
}

/** Whatever can tell a known message identifier from an unknown one. */
export interface MessageLookup {
  has(messageId: number): boolean;
}

export function hasFlag(frame: Frame, flag: number): boolean {
  return (frame.flags & flag) === flag;
}

export function isResponse(frame: Frame): boolean {
  return hasFlag(frame, FrameFlags.RESPONSE);
}

/** A response that reports a handler failure. */
export function isErrorResponse(frame: Frame): boolean {
  return isResponse(frame) && hasFlag(frame, FrameFlags.ERROR);
}

export function requestFrame(messageId: number, token: number, payload: Uint8Array): Frame {
  return { messageId, flags: 0, token, payload };
}

export function responseFrame(messageId: number, token: number, payload: Uint8Array): Frame {
  return { messageId, flags: FrameFlags.RESPONSE, token, payload };
}

export function errorFrame(messageId: number, token: number, payload: Uint8Array): Frame {
  return { messageId, flags: FrameFlags.RESPONSE | FrameFlags.ERROR, token, payload };
}

/**
 * Serialize a frame.
 *
 * @throws RangeError if the identifier does not fit a byte or the token is not
 *   a non-negative safe integer
 */
export function encodeFrame(frame: Frame): Uint8Array {
  const { messageId, token, payload } = frame;
  if (!Number.isInteger(messageId) || messageId < 0 || messageId > MAX_MESSAGE_ID) {
    throw new RangeError(`message identifier out of range: ${messageId}`);
  }
  const tokenBytes = encodeVarint(token);
  const out = new Uint8Array(2 + tokenBytes.length + payload.length);
  out[0] = messageId;
  out[1] = frame.flags & KNOWN_FLAGS;
  out.set(tokenBytes, 2);
  out.set(payload, 2 + tokenBytes.length);
  return out;
}

/**
 * Parse a frame.
 *
 * The identifier is checked against `messages` before the token is read, so
 * a frame for an unknown message is rejected whatever follows it. The payload
 * is a view into `buf`.
 *
 * @throws FrameError
 */
export function decodeFrame(buf: Uint8Array, messages: MessageLookup): Frame {
  if (buf.length < 2) {
    throw FrameError.shortHeader(buf.length);
  }
  const messageId = buf[0];
  if (!messages.has(messageId)) {
    throw FrameError.unsupportedMessage(messageId);
  }
  const flags = buf[1] & KNOWN_FLAGS;

  let token: { value: number; next: number };
  try {
    token = decodeVarintNumber(buf, 2);
  } catch (e) {
    if (e instanceof DecodeError && e.kind === "overflow") throw FrameError.tokenOverflow();
    if (e instanceof DecodeError && e.kind === "invalid-value") throw FrameError.nonCanonicalToken();
    if (e instanceof DecodeError) throw FrameError.truncatedToken();
    throw e;
  }

  return { messageId, flags, token: token.value, payload: buf.subarray(token.next) };
}
