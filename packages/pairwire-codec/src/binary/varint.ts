// Unsigned LEB128: 7 value bits per byte, high bit set on every byte but the
// last, least significant group first. Decoding accepts only the shortest
// encoding of each value.

import { DecodeError } from "../errors.ts";

export function encodeVarint(value: number | bigint): Uint8Array {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`varint: not a safe integer: ${value}`);
  }
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw new RangeError("varint: negative value");
  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

export function decodeVarint(
  buf: Uint8Array,
  offset: number,
): { value: bigint; next: number } {
  let result = 0n;
  let shift = 0n;
  let i = offset;
  while (true) {
    if (i >= buf.length) throw DecodeError.eof("varint");
    const byte = buf[i++];
    // The tenth byte holds bit 63 and nothing more
    if (shift === 63n && byte > 1) throw DecodeError.overflow("varint");
    result |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (byte === 0 && i - offset > 1) {
        throw DecodeError.invalidValue("varint: non-canonical encoding");
      }
      return { value: result, next: i };
    }
    shift += 7n;
  }
}

export function decodeVarintNumber(
  buf: Uint8Array,
  offset: number,
): { value: number; next: number } {
  const { value, next } = decodeVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw DecodeError.overflow("varint");
  return { value: Number(value), next };
}
