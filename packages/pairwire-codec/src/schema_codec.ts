// Schema-driven encoding/decoding.
//
// A schema is compiled once into a tree of codecs. Encoding appends to a
// Writer; decoding consumes a Reader, which keeps the path through the value
// so a failure can say where it happened.

import type {
  BytesSchema,
  EnumSchema,
  MapSchema,
  OptionSchema,
  PrimitiveKind,
  RefSchema,
  Schema,
  SchemaRegistry,
  StructSchema,
  TupleSchema,
  VecSchema,
} from "./schema.ts";
import { type ResolvedVariant, enumVariants, resolveSchema } from "./schema.ts";
import { type DecodeResult, type PrimitiveCodec, primitives } from "./primitives.ts";
import { decodeVarintNumber, encodeVarint } from "./binary/varint.ts";
import { concat, hexDump } from "./binary/bytes.ts";
import { DecodeError } from "./errors.ts";

/** A decoded enum value. */
export type TaggedValue = { tag: string; [key: string]: unknown };

/** A compiled schema. */
export interface SchemaCodec {
  /** @throws TypeError or RangeError when the value does not fit the schema */
  encode(value: unknown): Uint8Array;
  /** @throws DecodeError */
  decode(buf: Uint8Array, offset?: number): DecodeResult<unknown>;
}

// ============================================================================
// Value shape checks (encoding side)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isTagged(value: unknown): value is TaggedValue {
  return isRecord(value) && typeof value.tag === "string";
}

function shapeError(expected: string, value: unknown): TypeError {
  const actual = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new TypeError(`expected ${expected}, got ${actual}`);
}

function expectBoolean(value: unknown): boolean {
  if (typeof value !== "boolean") throw shapeError("boolean", value);
  return value;
}

function expectString(value: unknown): string {
  if (typeof value !== "string") throw shapeError("string", value);
  return value;
}

function expectNumber(kind: string): (value: unknown) => number {
  return (value) => {
    if (typeof value !== "number") throw shapeError(`number for ${kind}`, value);
    return value;
  };
}

function expectBigint(kind: string): (value: unknown) => bigint {
  return (value) => {
    if (typeof value === "bigint") return value;
    if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
    throw shapeError(`bigint for ${kind}`, value);
  };
}

function expectBytes(value: unknown): Uint8Array {
  if (!(value instanceof Uint8Array)) throw shapeError("Uint8Array", value);
  return value;
}

function expectArray(value: unknown, kind: string): unknown[] {
  if (!Array.isArray(value)) throw shapeError(`array for ${kind}`, value);
  return value;
}

// ============================================================================
// Writer / Reader
// ============================================================================

class Writer {
  private readonly parts: Uint8Array[] = [];

  write(bytes: Uint8Array): void {
    this.parts.push(bytes);
  }

  finish(): Uint8Array {
    return concat(...this.parts);
  }
}

class Reader {
  private readonly path: string[] = [];

  constructor(
    private readonly buf: Uint8Array,
    public pos: number,
  ) {}

  read<T>(decode: (buf: Uint8Array, offset: number) => DecodeResult<T>): T {
    const { value, next } = decode(this.buf, this.pos);
    this.pos = next;
    return value;
  }

  byte(what: string): number {
    if (this.pos >= this.buf.length) throw DecodeError.eof(what);
    return this.buf[this.pos++];
  }

  /**
   * An element count. Unless elements can be zero bytes long, a count above
   * what is left is a truncated buffer.
   */
  count(what: string, emptyElements: boolean): number {
    const n = this.read(decodeVarintNumber);
    if (!emptyElements && n > this.buf.length - this.pos) throw DecodeError.eof(what);
    return n;
  }

  rest(): Uint8Array {
    const bytes = this.buf.subarray(this.pos);
    this.pos = this.buf.length;
    return bytes;
  }

  /** Decode a nested value under `segment` of the path. */
  at<T>(segment: string, decode: () => T): T {
    this.path.push(segment);
    try {
      return decode();
    } finally {
      this.path.pop();
    }
  }

  /**
   * Decode one schema node. The innermost node a DecodeError passes through
   * attaches the path, offset and surrounding bytes; outer nodes leave it be.
   */
  node<T>(schema: Schema, decode: () => T): T {
    const start = this.pos;
    try {
      return decode();
    } catch (e) {
      if (e instanceof DecodeError && e.path === undefined) {
        throw this.wrap(e, start, schema);
      }
      throw e;
    }
  }

  private wrap(cause: DecodeError, offset: number, schema: Schema): DecodeError {
    const path = this.path.length === 0 ? "<root>" : this.path.join(".");
    const details = [
      cause.message,
      `Path: ${path}`,
      `Offset: ${offset} (0x${offset.toString(16)})`,
      `Buffer length: ${this.buf.length}`,
      `Schema: ${schemaToString(schema)}`,
      `Bytes: ${hexDump(this.buf, Math.max(0, offset - 8), 32, offset)}`,
    ].join("\n  ");
    return new DecodeError(cause.kind, `Decode error: ${details}`, path);
  }
}

/** Abbreviated, human-readable form of a schema. */
export function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "enum":
      return `enum { ${schema.variants.map((v) => v.name).join(" | ")} }`;
    case "struct":
      return `struct { ${Object.keys(schema.fields).join(", ")} }`;
    case "vec":
      return `vec<${schemaToString(schema.element)}>`;
    case "option":
      return `option<${schemaToString(schema.inner)}>`;
    case "map":
      return `map<${schemaToString(schema.key)}, ${schemaToString(schema.value)}>`;
    case "tuple":
      return `tuple(${schema.elements.length} elements)`;
    case "bytes":
      return schema.trailing ? "bytes(trailing)" : "bytes";
    case "ref":
      return `ref(${schema.name})`;
    default:
      return schema.kind;
  }
}

// ============================================================================
// Codecs
// ============================================================================

interface Codec {
  encode(value: unknown, out: Writer): void;
  decode(input: Reader): unknown;
}

function primitive<T>(kind: PrimitiveKind, check: (value: unknown) => T, codec: PrimitiveCodec<T>): Codec {
  const schema: Schema = { kind };
  return {
    encode: (value, out) => out.write(codec.encode(check(value))),
    decode: (input) => input.node(schema, () => input.read((buf, offset) => codec.decode(buf, offset))),
  };
}

const PRIMITIVES: Record<PrimitiveKind, Codec> = {
  bool: primitive("bool", expectBoolean, primitives.bool),
  u8: primitive("u8", expectNumber("u8"), primitives.u8),
  u16: primitive("u16", expectNumber("u16"), primitives.u16),
  u32: primitive("u32", expectNumber("u32"), primitives.u32),
  u64: primitive("u64", expectBigint("u64"), primitives.u64),
  i8: primitive("i8", expectNumber("i8"), primitives.i8),
  i16: primitive("i16", expectNumber("i16"), primitives.i16),
  i32: primitive("i32", expectNumber("i32"), primitives.i32),
  i64: primitive("i64", expectBigint("i64"), primitives.i64),
  f32: primitive("f32", expectNumber("f32"), primitives.f32),
  f64: primitive("f64", expectNumber("f64"), primitives.f64),
  string: primitive("string", expectString, primitives.string),
};

/**
 * A named schema, compiled on first use. Resolving late is what lets a type
 * refer to itself, and lets a schema name refs it never reaches.
 */
class RefCodec implements Codec {
  private target: Codec | null = null;

  constructor(
    private readonly schema: RefSchema,
    private readonly compiler: SchemaCompiler,
  ) {}

  encode(value: unknown, out: Writer): void {
    this.resolved().encode(value, out);
  }

  decode(input: Reader): unknown {
    return this.resolved().decode(input);
  }

  private resolved(): Codec {
    if (!this.target) {
      this.target = this.compiler.resolve(this.schema);
    }
    return this.target;
  }
}

interface VariantCodec {
  name: string;
  discriminant: number;
  /** Property of the tagged value each field lives under, with its codec. */
  fields: Array<[key: string, codec: Codec]>;
}

class SchemaCompiler {
  private readonly refs = new Map<string, Codec>();

  constructor(private readonly registry?: SchemaRegistry) {}

  compile(schema: Schema): Codec {
    switch (schema.kind) {
      case "bytes":
        return this.bytes(schema);
      case "vec":
        return this.vec(schema);
      case "option":
        return this.option(schema);
      case "map":
        return this.map(schema);
      case "struct":
        return this.struct(schema);
      case "tuple":
        return this.tuple(schema);
      case "enum":
        return this.enumeration(schema);
      case "ref":
        return this.ref(schema);
      default:
        return PRIMITIVES[schema.kind];
    }
  }

  private lookup(schema: Schema): Schema {
    return schema.kind === "ref" ? (this.registry?.get(schema.name) ?? schema) : schema;
  }

  /** Whether some value of `schema` encodes to zero bytes. */
  private canBeEmpty(schema: Schema, seen: ReadonlySet<string> = new Set()): boolean {
    switch (schema.kind) {
      case "bytes":
        return schema.trailing === true;
      case "struct":
        return Object.values(schema.fields).every((field) => this.canBeEmpty(field, seen));
      case "tuple":
        return schema.elements.every((element) => this.canBeEmpty(element, seen));
      case "ref": {
        const target = this.registry?.get(schema.name);
        if (!target || seen.has(schema.name)) return false;
        return this.canBeEmpty(target, new Set(seen).add(schema.name));
      }
      default:
        return false;
    }
  }

  // Trailing bytes carry no length and take the rest of the input
  private bytes(schema: BytesSchema): Codec {
    return {
      encode(value, out) {
        const bytes = expectBytes(value);
        out.write(schema.trailing ? bytes : primitives.bytes.encode(bytes));
      },
      decode: (input) => input.node(schema, () => (schema.trailing ? input.rest() : input.read((buf, offset) => primitives.bytes.decode(buf, offset)))),
    };
  }

  private vec(schema: VecSchema): Codec {
    const element = this.compile(schema.element);
    const emptyElements = this.canBeEmpty(schema.element);
    return {
      encode(value, out) {
        const items = expectArray(value, "vec");
        out.write(encodeVarint(items.length));
        for (const item of items) element.encode(item, out);
      },
      decode: (input) =>
        input.node(schema, () => {
          const n = input.count("vec", emptyElements);
          const items: unknown[] = [];
          for (let i = 0; i < n; i++) {
            items.push(input.at(`[${i}]`, () => element.decode(input)));
          }
          return items;
        }),
    };
  }

  private option(schema: OptionSchema): Codec {
    if (this.lookup(schema.inner).kind === "option") {
      throw new TypeError(
        "option<option<T>> cannot tell an absent outer value from an absent inner one",
      );
    }
    const inner = this.compile(schema.inner);
    return {
      encode(value, out) {
        if (value === null || value === undefined) {
          out.write(Uint8Array.of(0));
          return;
        }
        out.write(Uint8Array.of(1));
        inner.encode(value, out);
      },
      decode: (input) =>
        input.node(schema, () => {
          const present = input.byte("option");
          if (present === 0) return null;
          if (present !== 1) throw DecodeError.invalidDiscriminant("option", present);
          return input.at("Some", () => inner.decode(input));
        }),
    };
  }

  private map(schema: MapSchema): Codec {
    const key = this.compile(schema.key);
    const val = this.compile(schema.value);
    const emptyEntries = this.canBeEmpty(schema.key) && this.canBeEmpty(schema.value);
    return {
      encode(value, out) {
        if (!(value instanceof Map)) throw shapeError("Map", value);
        out.write(encodeVarint(value.size));
        for (const [k, v] of value) {
          key.encode(k, out);
          val.encode(v, out);
        }
      },
      decode: (input) =>
        input.node(schema, () => {
          const n = input.count("map", emptyEntries);
          const map = new Map<unknown, unknown>();
          for (let i = 0; i < n; i++) {
            const k = input.at(`{key ${i}}`, () => key.decode(input));
            const v = input.at(`{value ${i}}`, () => val.decode(input));
            map.set(k, v);
          }
          return map;
        }),
    };
  }

  // Fields are encoded back to back in declaration order
  private struct(schema: StructSchema): Codec {
    const fields = Object.entries(schema.fields).map(
      ([name, field]): [string, Codec] => [name, this.compile(field)],
    );
    return {
      encode(value, out) {
        if (!isRecord(value)) throw shapeError("object", value);
        for (const [name, codec] of fields) codec.encode(value[name], out);
      },
      decode: (input) =>
        input.node(schema, () => {
          const obj: Record<string, unknown> = {};
          for (const [name, codec] of fields) {
            obj[name] = input.at(name, () => codec.decode(input));
          }
          return obj;
        }),
    };
  }

  private tuple(schema: TupleSchema): Codec {
    const elements = schema.elements.map((element) => this.compile(element));
    return {
      encode(value, out) {
        const values = expectArray(value, "tuple");
        if (values.length !== elements.length) {
          throw new Error(`Tuple length mismatch: got ${values.length}, expected ${elements.length}`);
        }
        values.forEach((v, i) => elements[i].encode(v, out));
      },
      decode: (input) =>
        input.node(schema, () => elements.map((codec, i) => input.at(`${i}`, () => codec.decode(input)))),
    };
  }

  private enumeration(schema: EnumSchema): Codec {
    const variants = enumVariants(schema).map((variant) => this.variant(variant));
    const byName = new Map(variants.map((v): [string, VariantCodec] => [v.name, v]));
    const byDiscriminant = new Map(variants.map((v): [number, VariantCodec] => [v.discriminant, v]));
    return {
      encode(value, out) {
        if (!isTagged(value)) throw shapeError("tagged object", value);
        const variant = byName.get(value.tag);
        if (!variant) throw new Error(`Unknown variant: ${value.tag}`);
        out.write(encodeVarint(variant.discriminant));
        for (const [key, codec] of variant.fields) codec.encode(value[key], out);
      },
      decode: (input) =>
        input.node(schema, () => {
          const discriminant = input.read(decodeVarintNumber);
          const variant = byDiscriminant.get(discriminant);
          if (!variant) throw DecodeError.invalidDiscriminant("enum", discriminant);
          return input.at(variant.name, () => {
            const result: TaggedValue = { tag: variant.name };
            for (const [key, codec] of variant.fields) {
              result[key] = input.at(key, () => codec.decode(input));
            }
            return result;
          });
        }),
    };
  }

  // Newtype fields live under `value`, tuple fields under "0", "1", ...
  private variant({ name, discriminant, shape }: ResolvedVariant): VariantCodec {
    switch (shape.kind) {
      case "unit":
        return { name, discriminant, fields: [] };
      case "newtype":
        return { name, discriminant, fields: [["value", this.compile(shape.field)]] };
      case "tuple":
        return {
          name,
          discriminant,
          fields: shape.fields.map((field, i): [string, Codec] => [`${i}`, this.compile(field)]),
        };
      case "struct":
        return {
          name,
          discriminant,
          fields: shape.fields.map(([key, field]): [string, Codec] => [key, this.compile(field)]),
        };
    }
  }

  private ref(schema: RefSchema): Codec {
    let codec = this.refs.get(schema.name);
    if (!codec) {
      codec = new RefCodec(schema, this);
      this.refs.set(schema.name, codec);
    }
    return codec;
  }

  resolve(schema: RefSchema): Codec {
    if (!this.registry) {
      throw new Error(`Unresolved ref: ${schema.name} - provide a registry`);
    }
    return this.compile(resolveSchema(schema, this.registry));
  }
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Compile a schema, following refs through `registry`.
 *
 * @throws Error if an enum has clashing variants. Refs are resolved when
 *   first reached, so an unknown ref fails the encode or decode that reaches it.
 */
export function compileSchema(schema: Schema, registry?: SchemaRegistry): SchemaCodec {
  const root = new SchemaCompiler(registry).compile(schema);
  return {
    encode(value) {
      const out = new Writer();
      root.encode(value, out);
      return out.finish();
    },
    decode(buf, offset = 0) {
      const input = new Reader(buf, offset);
      const value = root.decode(input);
      return { value, next: input.pos };
    },
  };
}

/** Encode a value according to its schema. */
export function encodeWithSchema(value: unknown, schema: Schema, registry?: SchemaRegistry): Uint8Array {
  return compileSchema(schema, registry).encode(value);
}

/**
 * Decode a value according to its schema.
 *
 * @param offset - Starting offset in `buf`
 * @returns Decoded value and the offset after it
 */
export function decodeWithSchema(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry?: SchemaRegistry,
): DecodeResult<unknown> {
  return compileSchema(schema, registry).decode(buf, offset);
}
