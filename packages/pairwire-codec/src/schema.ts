// Schema types for runtime type description and encoding/decoding.
//
// A schema describes the shape of a structured payload so the generic codec in
// schema_codec.ts can serialize it without hand-written wire logic:
// - Primitive types (bool, integers, floats, string, bytes)
// - Container types (vec, option, map)
// - Composite types (struct, enum, tuple)
// - Type references (ref) for shared and recursive types

// ============================================================================
// Primitive Schema Kinds
// ============================================================================

export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "string";

/**
 * Schema for a byte string.
 *
 * `trailing` bytes carry no length prefix and consume the rest of the input,
 * so they may only appear as the last field of a payload.
 */
export interface BytesSchema {
  kind: "bytes";
  trailing?: boolean;
}

// ============================================================================
// Container Schemas
// ============================================================================

export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Optional value: one discriminator byte (0 = absent, 1 = present) then the inner value. */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

export interface MapSchema {
  kind: "map";
  key: Schema;
  value: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

/** Schema for a record with named fields. */
export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

/** Fixed-size tuple, encoded as its elements back to back with no length prefix. */
export interface TupleSchema {
  kind: "tuple";
  elements: Schema[];
}

export interface EnumVariant {
  name: string;

  /**
   * Wire discriminant value.
   * If omitted, defaults to the variant's index in the variants array.
   */
  discriminant?: number;

  /**
   * Variant fields. Can be:
   * - null/undefined: unit variant (no fields)
   * - Schema: newtype variant (single unnamed field, stored under `value`)
   * - Schema[]: tuple variant (stored under "0", "1", ...)
   * - Record<string, Schema>: struct variant (named fields, encoded in key order)
   */
  fields?: null | Schema | Schema[] | Record<string, Schema>;
}

/**
 * Tagged union. Values look like `{ tag: "Name", ...fields }`; the
 * discriminant is encoded as a varint followed by the variant's fields.
 */
export interface EnumSchema {
  kind: "enum";
  variants: EnumVariant[];
}

// ============================================================================
// Reference Schema
// ============================================================================

/** Reference to a named schema held in a SchemaRegistry. */
export interface RefSchema {
  kind: "ref";
  name: string;
}

export type Schema =
  | { kind: PrimitiveKind }
  | BytesSchema
  | VecSchema
  | OptionSchema
  | MapSchema
  | StructSchema
  | TupleSchema
  | EnumSchema
  | RefSchema;

/** Named schemas used to resolve RefSchema references. */
export type SchemaRegistry = Map<string, Schema>;

/**
 * Resolve a schema, following a ref to its definition.
 *
 * Only the outermost ref is resolved; nested refs are resolved when their
 * fields are reached, which is what makes recursive types work.
 */
export function resolveSchema(schema: Schema, registry: SchemaRegistry): Schema {
  if (schema.kind === "ref") {
    const resolved = registry.get(schema.name);
    if (!resolved) {
      throw new Error(`Unknown type ref: ${schema.name}`);
    }
    return resolved;
  }
  return schema;
}

// ============================================================================
// Enum Variants
// ============================================================================

/** How a variant's fields are laid out, after the discriminant. */
export type VariantShape =
  | { kind: "unit" }
  | { kind: "newtype"; field: Schema }
  | { kind: "tuple"; fields: Schema[] }
  | { kind: "struct"; fields: Array<[name: string, schema: Schema]> };

export interface ResolvedVariant {
  name: string;
  discriminant: number;
  shape: VariantShape;
}

function isSchema(fields: Schema | Schema[] | Record<string, Schema>): fields is Schema {
  return !Array.isArray(fields) && typeof fields.kind === "string";
}

export function variantShape(variant: EnumVariant): VariantShape {
  const fields = variant.fields;
  if (fields === null || fields === undefined) {
    return { kind: "unit" };
  }
  if (Array.isArray(fields)) {
    return { kind: "tuple", fields };
  }
  if (isSchema(fields)) {
    return { kind: "newtype", field: fields };
  }
  return { kind: "struct", fields: Object.entries(fields) };
}

/**
 * The variants of an enum with their wire discriminants.
 *
 * @throws Error if two variants share a name or a discriminant
 */
export function enumVariants(schema: EnumSchema): ResolvedVariant[] {
  const byDiscriminant = new Map<number, string>();
  const names = new Set<string>();
  return schema.variants.map((variant, index) => {
    const discriminant = variant.discriminant ?? index;
    const clash = byDiscriminant.get(discriminant);
    if (clash !== undefined) {
      throw new Error(`enum: variants ${clash} and ${variant.name} share discriminant ${discriminant}`);
    }
    if (names.has(variant.name)) {
      throw new Error(`enum: duplicate variant name ${variant.name}`);
    }
    byDiscriminant.set(discriminant, variant.name);
    names.add(variant.name);
    return { name: variant.name, discriminant, shape: variantShape(variant) };
  });
}

export function isRefSchema(schema: Schema): schema is RefSchema {
  return schema.kind === "ref";
}
