// The serialization contract for message payloads, and the built-in codecs.

import type { Schema, SchemaRegistry } from "./schema.ts";
import { compileSchema } from "./schema_codec.ts";
import { decodeUtf8, encodeUtf8 } from "./primitives.ts";
import { concat } from "./binary/bytes.ts";
import { DecodeError } from "./errors.ts";

export type MaybePromise<T> = T | Promise<T>;

/**
 * Converts values of `T` to and from payload bytes.
 *
 * Either direction may be asynchronous and either may throw; failures
 * propagate to whoever is sending or handling the message.
 */
export interface Serializable<T> {
  encode(value: T): MaybePromise<Uint8Array>;
  decode(bytes: Uint8Array): MaybePromise<T>;
}

/** Value type carried by a serializable. */
export type SerializedType<S> = S extends Serializable<infer T> ? T : never;

/** No value. Encodes to zero bytes. */
export const unit: Serializable<void> = {
  encode() {
    return new Uint8Array(0);
  },
  decode(bytes) {
    if (bytes.length !== 0) throw DecodeError.trailingBytes(bytes.length);
  },
};

/** Raw payload bytes, passed through untouched. */
export const rawBytes: Serializable<Uint8Array> = {
  encode: (value) => value,
  decode: (bytes) => bytes,
};

/** The whole payload as UTF-8 text. */
export const utf8: Serializable<string> = {
  encode: (value) => encodeUtf8(value),
  decode: (bytes) => decodeUtf8(bytes),
};

// Serializables whose decoded value may itself be null
const nullable = new WeakSet<Serializable<unknown>>();

/**
 * An optional value: `[0]` when absent, `[1]` followed by the inner encoding
 * when present. `null` stands for absent, so the inner values must never be
 * null themselves.
 *
 * @throws TypeError when `inner` is itself an optional (or an option schema)
 */
export function optional<T>(inner: Serializable<T>): Serializable<T | null> {
  if (nullable.has(inner)) {
    throw new TypeError(
      "optional: the inner value can already be null, so absence would be ambiguous",
    );
  }
  const codec: Serializable<T | null> = {
    async encode(value) {
      if (value === null) return Uint8Array.of(0);
      return concat(Uint8Array.of(1), await inner.encode(value));
    },
    async decode(bytes) {
      if (bytes.length === 0) throw DecodeError.eof("optional");
      switch (bytes[0]) {
        case 0:
          if (bytes.length > 1) throw DecodeError.trailingBytes(bytes.length - 1);
          return null;
        case 1:
          return inner.decode(bytes.subarray(1));
        default:
          throw DecodeError.invalidDiscriminant("optional", bytes[0]);
      }
    },
  };
  nullable.add(codec);
  return codec;
}

/**
 * Binary codec for structured values described by a schema.
 *
 * The decoded value is trusted to match `T`; the schema is what validates it.
 */
export function schemaSerializable<T>(
  schema: Schema,
  registry?: SchemaRegistry,
): Serializable<T> {
  const codec = compileSchema(schema, registry);
  const serializable: Serializable<T> = {
    encode: (value) => codec.encode(value),
    decode(bytes) {
      const { value, next } = codec.decode(bytes);
      if (next !== bytes.length) throw DecodeError.trailingBytes(bytes.length - next);
      return value as T;
    },
  };
  const top = schema.kind === "ref" ? registry?.get(schema.name) : schema;
  if (top?.kind === "option") nullable.add(serializable);
  return serializable;
}
