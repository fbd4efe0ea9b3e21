// @pairwire/codec - payload serialization

export {
  type DecodeResult,
  type PrimitiveCodec,
  primitives,
  encodeUtf8,
  decodeUtf8,
} from "./primitives.ts";

export { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
export { concat, hexDump } from "./binary/bytes.ts";

export { DecodeError, type DecodeErrorKind } from "./errors.ts";

export type {
  PrimitiveKind,
  BytesSchema,
  VecSchema,
  OptionSchema,
  MapSchema,
  StructSchema,
  TupleSchema,
  EnumVariant,
  EnumSchema,
  RefSchema,
  Schema,
  SchemaRegistry,
  VariantShape,
  ResolvedVariant,
} from "./schema.ts";
export { resolveSchema, variantShape, enumVariants, isRefSchema } from "./schema.ts";

export {
  compileSchema,
  encodeWithSchema,
  decodeWithSchema,
  schemaToString,
  type SchemaCodec,
  type TaggedValue,
} from "./schema_codec.ts";

export {
  type MaybePromise,
  type Serializable,
  type SerializedType,
  unit,
  rawBytes,
  utf8,
  optional,
  schemaSerializable,
} from "./serializable.ts";
