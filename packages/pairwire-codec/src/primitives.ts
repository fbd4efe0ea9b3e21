// Primitive encodings for the schema codec.
//
// Integers wider than a byte are varints (signed ones zigzag-mapped first),
// floats are little-endian IEEE 754, strings and byte strings carry a varint
// length prefix.

import { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat } from "./binary/bytes.ts";
import { DecodeError } from "./errors.ts";

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

/** Wire form of one primitive kind. */
export interface PrimitiveCodec<T> {
  /** @throws RangeError when the value is outside the kind's range */
  encode(value: T): Uint8Array;
  decode(buf: Uint8Array, offset: number): DecodeResult<T>;
}

function checkInteger(value: number, min: number, max: number, kind: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${kind}: ${value} out of range [${min}, ${max}]`);
  }
}

const zigzag = (n: bigint): bigint => BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
const unzigzag = (n: bigint): bigint => (n >> 1n) ^ -(n & 1n);

const bool: PrimitiveCodec<boolean> = {
  encode: (value) => Uint8Array.of(value ? 1 : 0),
  decode(buf, offset) {
    if (offset >= buf.length) throw DecodeError.eof("bool");
    const byte = buf[offset];
    if (byte > 1) throw DecodeError.invalidValue(`bool: invalid value ${byte}`);
    return { value: byte === 1, next: offset + 1 };
  },
};

// u8 and i8 are raw bytes, not varints
function byte(kind: string, min: number, max: number): PrimitiveCodec<number> {
  return {
    encode(value) {
      checkInteger(value, min, max, kind);
      return Uint8Array.of(value & 0xff);
    },
    decode(buf, offset) {
      if (offset >= buf.length) throw DecodeError.eof(kind);
      const raw = buf[offset];
      return { value: raw > max ? raw - 0x100 : raw, next: offset + 1 };
    },
  };
}

function unsigned(kind: string, max: number): PrimitiveCodec<number> {
  return {
    encode(value) {
      checkInteger(value, 0, max, kind);
      return encodeVarint(value);
    },
    decode(buf, offset) {
      const result = decodeVarintNumber(buf, offset);
      if (result.value > max) throw DecodeError.overflow(kind);
      return result;
    },
  };
}

function signed(kind: string, min: number, max: number): PrimitiveCodec<number> {
  return {
    encode(value) {
      checkInteger(value, min, max, kind);
      return encodeVarint(zigzag(BigInt(value)));
    },
    decode(buf, offset) {
      const { value, next } = decodeVarint(buf, offset);
      const n = Number(unzigzag(value));
      if (n < min || n > max) throw DecodeError.overflow(kind);
      return { value: n, next };
    },
  };
}

function wide(kind: string, min: bigint, max: bigint, isSigned: boolean): PrimitiveCodec<bigint> {
  return {
    encode(value) {
      if (value < min || value > max) throw new RangeError(`${kind}: ${value} out of range`);
      return encodeVarint(isSigned ? zigzag(value) : value);
    },
    decode(buf, offset) {
      const { value: raw, next } = decodeVarint(buf, offset);
      const value = isSigned ? unzigzag(raw) : raw;
      if (value < min || value > max) throw DecodeError.overflow(kind);
      return { value, next };
    },
  };
}

function float(kind: string, width: 4 | 8): PrimitiveCodec<number> {
  return {
    encode(value) {
      const out = new Uint8Array(width);
      const view = new DataView(out.buffer);
      if (width === 4) view.setFloat32(0, value, true);
      else view.setFloat64(0, value, true);
      return out;
    },
    decode(buf, offset) {
      if (offset + width > buf.length) throw DecodeError.eof(kind);
      const view = new DataView(buf.buffer, buf.byteOffset + offset, width);
      const value = width === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
      return { value, next: offset + width };
    },
  };
}

function lengthPrefixed<T>(
  kind: string,
  toBytes: (value: T) => Uint8Array,
  fromBytes: (bytes: Uint8Array) => T,
): PrimitiveCodec<T> {
  return {
    encode(value) {
      const bytes = toBytes(value);
      return concat(encodeVarint(bytes.length), bytes);
    },
    decode(buf, offset) {
      const len = decodeVarintNumber(buf, offset);
      const end = len.next + len.value;
      if (end > buf.length) throw DecodeError.eof(kind);
      return { value: fromBytes(buf.subarray(len.next, end)), next: end };
    },
  };
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/** Decode UTF-8 text, rejecting malformed sequences. */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw DecodeError.invalidValue("string: invalid UTF-8");
  }
}

export function encodeUtf8(value: string): Uint8Array {
  return utf8Encoder.encode(value);
}

/** Codecs for the primitive schema kinds, plus length-prefixed bytes. */
export const primitives = {
  bool,
  u8: byte("u8", 0, 0xff),
  i8: byte("i8", -0x80, 0x7f),
  u16: unsigned("u16", 0xffff),
  u32: unsigned("u32", 0xffff_ffff),
  u64: wide("u64", 0n, 0xffff_ffff_ffff_ffffn, false),
  i16: signed("i16", -0x8000, 0x7fff),
  i32: signed("i32", -0x8000_0000, 0x7fff_ffff),
  i64: wide("i64", -(1n << 63n), (1n << 63n) - 1n, true),
  f32: float("f32", 4),
  f64: float("f64", 8),
  string: lengthPrefixed("string", encodeUtf8, decodeUtf8),
  bytes: lengthPrefixed<Uint8Array>("bytes", (b) => b, (b) => b),
};
