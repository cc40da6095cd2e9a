/**
 * Type model.
 *
 * Types are interned: building the same type twice returns the same object,
 * so types can be compared with `===` everywhere downstream.
 */

import { ModelingError } from "./errors";

// ============================================================================
// Type Definitions
// ============================================================================

export type IntBits = 8 | 16 | 32 | 64;

export type Type =
  | BoolType
  | IntType
  | BigIntType
  | CharType
  | StringType
  | SeqType
  | OptionType
  | ObjectType
  | MapType
  | DefaultMapType;

export interface BoolType {
  readonly kind: "bool";
}

/** Fixed-width two's-complement integer */
export interface IntType {
  readonly kind: "int";
  readonly bits: IntBits;
  readonly signed: boolean;
}

/** Arbitrary-precision integer, also used for sequence lengths and offsets */
export interface BigIntType {
  readonly kind: "bigint";
}

/** A single Unicode code point */
export interface CharType {
  readonly kind: "char";
}

export interface StringType {
  readonly kind: "string";
}

export interface SeqType {
  readonly kind: "seq";
  readonly element: Type;
}

export interface OptionType {
  readonly kind: "option";
  readonly element: Type;
}

export interface FieldType {
  readonly name: string;
  readonly type: Type;
}

/** Record with ordered, named fields. Tuples are records named "tuple". */
export interface ObjectType {
  readonly kind: "object";
  readonly name: string;
  readonly fields: readonly FieldType[];
}

/** General map: absent keys read back as none */
export interface MapType {
  readonly kind: "map";
  readonly key: Type;
  readonly value: Type;
}

/** Default-valued map: absent keys read back the default of the value type */
export interface DefaultMapType {
  readonly kind: "defaultMap";
  readonly key: Type;
  readonly value: Type;
}

export type AnyMapType = MapType | DefaultMapType;

// ============================================================================
// Interning
// ============================================================================

class Interner<T extends Type> {
  private readonly table = new Map<string, T>();

  intern(key: string, make: () => T): T {
    const existing = this.table.get(key);
    if (existing !== undefined) return existing;
    const created = make();
    this.table.set(key, created);
    return created;
  }
}

const intTypes = new Interner<IntType>();
const seqTypes = new Interner<SeqType>();
const optionTypes = new Interner<OptionType>();
const objectTypes = new Interner<ObjectType>();
const mapTypes = new Interner<MapType>();
const defaultMapTypes = new Interner<DefaultMapType>();

// Every composite type is interned, so child identity can stand in for
// child structure in the keys below.
const typeIds = new WeakMap<Type, number>();
let nextTypeId = 0;

export function typeId(t: Type): number {
  let id = typeIds.get(t);
  if (id === undefined) {
    id = nextTypeId++;
    typeIds.set(t, id);
  }
  return id;
}

// ============================================================================
// Constructors
// ============================================================================

export const boolType: BoolType = Object.freeze({ kind: "bool" });
export const bigintType: BigIntType = Object.freeze({ kind: "bigint" });
export const charType: CharType = Object.freeze({ kind: "char" });
export const stringType: StringType = Object.freeze({ kind: "string" });

export function intType(bits: IntBits, signed: boolean): IntType {
  if (bits !== 8 && bits !== 16 && bits !== 32 && bits !== 64) {
    throw new ModelingError(`Unsupported integer width: ${bits}`);
  }
  return intTypes.intern(`${bits}:${signed}`, () => Object.freeze({ kind: "int", bits, signed }));
}

export const int8Type = intType(8, true);
export const byteType = intType(8, false);
export const shortType = intType(16, true);
export const ushortType = intType(16, false);
export const int32Type = intType(32, true);
export const uint32Type = intType(32, false);
export const longType = intType(64, true);
export const ulongType = intType(64, false);

export function seqType(element: Type): SeqType {
  if (containsMap(element)) {
    throw new ModelingError(`A sequence element may not contain a map: ${typeToString(element)}`);
  }
  return seqTypes.intern(String(typeId(element)), () => Object.freeze({ kind: "seq", element }));
}

export function optionType(element: Type): OptionType {
  if (containsMap(element)) {
    throw new ModelingError(`An option may not contain a map: ${typeToString(element)}`);
  }
  return optionTypes.intern(String(typeId(element)), () => Object.freeze({ kind: "option", element }));
}

/**
 * Create a record type. Fields keep their declaration order.
 */
export function objectType(name: string, fields: readonly (readonly [string, Type])[]): ObjectType {
  const seen = new Set<string>();
  for (const [fieldName] of fields) {
    if (seen.has(fieldName)) {
      throw new ModelingError(`Duplicate field "${fieldName}" in ${name}`);
    }
    seen.add(fieldName);
  }
  const key = `${JSON.stringify(name)}(${fields.map(([n, t]) => `${JSON.stringify(n)}:${typeId(t)}`).join(",")})`;
  return objectTypes.intern(key, () =>
    Object.freeze({
      kind: "object",
      name,
      fields: Object.freeze(fields.map(([n, t]) => Object.freeze({ name: n, type: t }))),
    })
  );
}

export function tupleType(...elements: Type[]): ObjectType {
  return objectType("tuple", elements.map((t, i) => [`item${i + 1}`, t] as const));
}

export function mapType(key: Type, value: Type): MapType {
  checkMapComponents("map", key, value);
  return mapTypes.intern(`${typeId(key)}:${typeId(value)}`, () => Object.freeze({ kind: "map", key, value }));
}

export function defaultMapType(key: Type, value: Type): DefaultMapType {
  checkMapComponents("defaultMap", key, value);
  return defaultMapTypes.intern(`${typeId(key)}:${typeId(value)}`, () =>
    Object.freeze({ kind: "defaultMap", key, value })
  );
}

/** Sets are default-valued maps from their elements to bool */
export const setType = (element: Type): DefaultMapType => defaultMapType(element, boolType);

function checkMapComponents(kind: string, key: Type, value: Type): void {
  if (containsMap(key)) {
    throw new ModelingError(`A ${kind} key may not contain a map: ${typeToString(key)}`);
  }
  if (containsMap(value)) {
    throw new ModelingError(`A ${kind} value may not contain a map: ${typeToString(value)}`);
  }
}

// ============================================================================
// Queries
// ============================================================================

export function isMapType(t: Type): t is AnyMapType {
  return t.kind === "map" || t.kind === "defaultMap";
}

export function containsMap(t: Type): boolean {
  switch (t.kind) {
    case "map":
    case "defaultMap":
      return true;
    case "object":
      return t.fields.some((f) => containsMap(f.type));
    case "seq":
    case "option":
      return containsMap(t.element);
    default:
      return false;
  }
}

/** Integer-like types ordered by `lt`/`le` */
export function isOrdered(t: Type): t is IntType | BigIntType | CharType {
  return t.kind === "int" || t.kind === "bigint" || t.kind === "char";
}

export function isArithmetic(t: Type): t is IntType | BigIntType {
  return t.kind === "int" || t.kind === "bigint";
}

export function isSequence(t: Type): t is StringType | SeqType {
  return t.kind === "string" || t.kind === "seq";
}

export function fieldType(t: ObjectType, name: string): Type | undefined {
  return t.fields.find((f) => f.name === name)?.type;
}

/** Smallest and largest representable value of a fixed-width integer */
export function intRange(t: IntType): [bigint, bigint] {
  if (t.signed) {
    const half = 1n << BigInt(t.bits - 1);
    return [-half, half - 1n];
  }
  return [0n, (1n << BigInt(t.bits)) - 1n];
}

export const MAX_CHAR = 0x2ffff;

// ============================================================================
// Formatting
// ============================================================================

export function typeToString(t: Type): string {
  switch (t.kind) {
    case "bool":
      return "bool";
    case "int":
      return `${t.signed ? "int" : "uint"}${t.bits}`;
    case "bigint":
      return "bigint";
    case "char":
      return "char";
    case "string":
      return "string";
    case "seq":
      return `seq<${typeToString(t.element)}>`;
    case "option":
      return `option<${typeToString(t.element)}>`;
    case "object":
      return `${t.name}{${t.fields.map((f) => `${f.name}: ${typeToString(f.type)}`).join(", ")}}`;
    case "map":
      return `map<${typeToString(t.key)}, ${typeToString(t.value)}>`;
    case "defaultMap":
      return `defaultMap<${typeToString(t.key)}, ${typeToString(t.value)}>`;
  }
}
