/**
 * Concrete values: the results of evaluation and the entries of solver models.
 */

import { ModelingError } from "./errors";
import { Type, ObjectType, IntType, MAX_CHAR, intRange, typeToString } from "./types";
import * as defaultMaps from "./maps/default-map";
import * as generalMaps from "./maps/general-map";

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | BoolValue
  | IntValue
  | CharValue
  | StringValue
  | SeqValue
  | OptionValue
  | ObjectValue
  | MapValue
  | DefaultMapValue;

export interface BoolValue {
  readonly tag: "bool";
  readonly value: boolean;
}

/** Value of a fixed-width or arbitrary-precision integer type */
export interface IntValue {
  readonly tag: "int";
  readonly value: bigint;
}

export interface CharValue {
  readonly tag: "char";
  readonly codePoint: number;
}

export interface StringValue {
  readonly tag: "string";
  readonly value: string;
}

export interface SeqValue {
  readonly tag: "seq";
  readonly elements: readonly Value[];
}

export interface OptionValue {
  readonly tag: "option";
  readonly value: Value | undefined;
}

export interface ObjectValue {
  readonly tag: "object";
  readonly fields: ReadonlyMap<string, Value>;
}

export interface MapEntry {
  readonly key: Value;
  readonly value: Value;
}

/** General map: an explicit key/value table, indexed by `valueKey` */
export interface MapValue {
  readonly tag: "map";
  readonly entries: ReadonlyMap<string, MapEntry>;
}

/**
 * Default-valued map: an override history (oldest first) applied over the
 * default of the value type.
 */
export interface DefaultMapValue {
  readonly tag: "defaultMap";
  readonly overrides: readonly MapEntry[];
  readonly defaultValue: Value;
}

// ============================================================================
// Constructors
// ============================================================================

export const trueVal: BoolValue = { tag: "bool", value: true };
export const falseVal: BoolValue = { tag: "bool", value: false };
export const boolVal = (value: boolean): BoolValue => (value ? trueVal : falseVal);
export const intVal = (value: bigint | number): IntValue => ({ tag: "int", value: BigInt(value) });
export const charVal = (c: string | number): CharValue => ({
  tag: "char",
  codePoint: typeof c === "number" ? c : firstCodePoint(c),
});
export const stringVal = (value: string): StringValue => ({ tag: "string", value });
export const seqVal = (elements: readonly Value[]): SeqValue => ({ tag: "seq", elements });
export const someVal = (value: Value): OptionValue => ({ tag: "option", value });
export const noneVal: OptionValue = { tag: "option", value: undefined };

export const objectVal = (fields: Record<string, Value> | ReadonlyMap<string, Value>): ObjectValue => ({
  tag: "object",
  fields: isFieldMap(fields) ? new Map(fields) : new Map(Object.entries(fields)),
});

function isFieldMap(fields: Record<string, Value> | ReadonlyMap<string, Value>): fields is ReadonlyMap<string, Value> {
  return fields instanceof Map;
}

export const tupleVal = (...items: Value[]): ObjectValue =>
  objectVal(new Map(items.map((v, i) => [`item${i + 1}`, v] as const)));

export const mapVal = (entries: Iterable<readonly [Value, Value]> = []): MapValue => {
  const table = new Map<string, MapEntry>();
  for (const [key, value] of entries) {
    table.set(valueKey(key), { key, value });
  }
  return { tag: "map", entries: table };
};

export const defaultMapVal = (
  defaultValue: Value,
  overrides: Iterable<readonly [Value, Value]> = []
): DefaultMapValue => ({
  tag: "defaultMap",
  overrides: [...overrides].map(([key, value]) => ({ key, value })),
  defaultValue,
});

function firstCodePoint(s: string): number {
  const cp = s.codePointAt(0);
  if (cp === undefined || [...s].length !== 1) {
    throw new ModelingError(`Expected a single character, got ${JSON.stringify(s)}`);
  }
  return cp;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * The value every type reads back when nothing else is known about it.
 */
export function defaultValue(t: Type): Value {
  switch (t.kind) {
    case "bool":
      return falseVal;
    case "int":
    case "bigint":
      return intVal(0n);
    case "char":
      return charVal(0);
    case "string":
      return stringVal("");
    case "seq":
      return seqVal([]);
    case "option":
      return noneVal;
    case "object":
      return objectVal(new Map(t.fields.map((f) => [f.name, defaultValue(f.type)] as const)));
    case "map":
      return mapVal();
    case "defaultMap":
      return defaultMapVal(defaultValue(t.value));
  }
}

// ============================================================================
// Equality and Keys
// ============================================================================

/**
 * Structural equality. Default-valued maps compare extensionally.
 */
export function valueEquals(a: Value, b: Value): boolean {
  if (a === b) return true;
  switch (a.tag) {
    case "bool":
      return b.tag === "bool" && a.value === b.value;
    case "int":
      return b.tag === "int" && a.value === b.value;
    case "char":
      return b.tag === "char" && a.codePoint === b.codePoint;
    case "string":
      return b.tag === "string" && a.value === b.value;
    case "seq":
      return (
        b.tag === "seq" &&
        a.elements.length === b.elements.length &&
        a.elements.every((e, i) => valueEquals(e, b.elements[i]))
      );
    case "option":
      if (b.tag !== "option") return false;
      if (a.value === undefined || b.value === undefined) return a.value === b.value;
      return valueEquals(a.value, b.value);
    case "object": {
      if (b.tag !== "object" || a.fields.size !== b.fields.size) return false;
      for (const [name, v] of a.fields) {
        const other = b.fields.get(name);
        if (other === undefined || !valueEquals(v, other)) return false;
      }
      return true;
    }
    case "map":
      return b.tag === "map" && generalMaps.tableEquals(a, b, valueEquals);
    case "defaultMap":
      return b.tag === "defaultMap" && defaultMaps.equals(a, b, valueEquals, valueEquals);
  }
}

/**
 * Canonical string for values that can be used as map keys.
 * Maps never appear inside keys, so they are not encoded.
 */
export function valueKey(v: Value): string {
  switch (v.tag) {
    case "bool":
      return v.value ? "T" : "F";
    case "int":
      return `${v.value}`;
    case "char":
      return `c${v.codePoint}`;
    case "string":
      return JSON.stringify(v.value);
    case "seq":
      return `[${v.elements.map(valueKey).join(",")}]`;
    case "option":
      return v.value === undefined ? "none" : `some(${valueKey(v.value)})`;
    case "object":
      return `{${[...v.fields].map(([k, f]) => `${JSON.stringify(k)}:${valueKey(f)}`).join(",")}}`;
    case "map":
    case "defaultMap":
      throw new ModelingError("Maps cannot be used as keys");
  }
}

// ============================================================================
// Type Checking
// ============================================================================

/**
 * Check that a value is a well-formed instance of a type.
 */
export function valueHasType(v: Value, t: Type): boolean {
  switch (t.kind) {
    case "bool":
      return v.tag === "bool";
    case "int":
      return v.tag === "int" && inIntRange(v.value, t);
    case "bigint":
      return v.tag === "int";
    case "char":
      return v.tag === "char" && v.codePoint >= 0 && v.codePoint <= MAX_CHAR;
    case "string":
      return v.tag === "string";
    case "seq":
      return v.tag === "seq" && v.elements.every((e) => valueHasType(e, t.element));
    case "option":
      return v.tag === "option" && (v.value === undefined || valueHasType(v.value, t.element));
    case "object":
      return v.tag === "object" && objectHasType(v, t);
    case "map":
      return (
        v.tag === "map" &&
        [...v.entries.values()].every((e) => valueHasType(e.key, t.key) && valueHasType(e.value, t.value))
      );
    case "defaultMap":
      return (
        v.tag === "defaultMap" &&
        valueHasType(v.defaultValue, t.value) &&
        valueEquals(v.defaultValue, defaultValue(t.value)) &&
        v.overrides.every((e) => valueHasType(e.key, t.key) && valueHasType(e.value, t.value))
      );
  }
}

function objectHasType(v: ObjectValue, t: ObjectType): boolean {
  if (v.fields.size !== t.fields.length) return false;
  return t.fields.every((f) => {
    const fv = v.fields.get(f.name);
    return fv !== undefined && valueHasType(fv, f.type);
  });
}

export function inIntRange(n: bigint, t: IntType): boolean {
  const [lo, hi] = intRange(t);
  return n >= lo && n <= hi;
}

export function requireValueType(v: Value, t: Type, context: string): void {
  if (!valueHasType(v, t)) {
    throw new ModelingError(`${context}: ${valueToString(v)} is not a value of type ${typeToString(t)}`);
  }
}

// ============================================================================
// Printing
// ============================================================================

export function valueToString(v: Value): string {
  switch (v.tag) {
    case "bool":
      return v.value ? "true" : "false";
    case "int":
      return String(v.value);
    case "char":
      return `'${String.fromCodePoint(v.codePoint)}'`;
    case "string":
      return JSON.stringify(v.value);
    case "seq":
      return `[${v.elements.map(valueToString).join(", ")}]`;
    case "option":
      return v.value === undefined ? "none" : `some(${valueToString(v.value)})`;
    case "object":
      return `{ ${[...v.fields].map(([k, f]) => `${k}: ${valueToString(f)}`).join(", ")} }`;
    case "map":
      return `{${[...v.entries.values()].map((e) => `${valueToString(e.key)} => ${valueToString(e.value)}`).join(", ")}}`;
    case "defaultMap":
      return `{${defaultMaps
        .effectiveEntries(v, valueKey, valueEquals)
        .map((e) => `${valueToString(e.key)} => ${valueToString(e.value)}`)
        .join(", ")}}`;
  }
}
