/**
 * Runtime support for compiled expressions.
 *
 * Compiled code works on plain JavaScript values instead of `Value`s:
 *
 *   bool        boolean
 *   int/bigint  bigint
 *   char        number (code point)
 *   string      string
 *   seq         array
 *   option      array of length 0 or 1
 *   record      plain object keyed by field name
 *   map         Map from canonical key to { key, value }
 *   defaultMap  RawOverrides
 *
 * `toRaw` and `fromRaw` convert at the boundary, and `runtime` holds the
 * helpers the generated code calls for anything that is not a single
 * JavaScript operator.
 */

import { ModelingError } from "../errors";
import { Type, typeToString } from "../types";
import {
  Value,
  MapEntry,
  boolVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  someVal,
  noneVal,
  valueEquals,
  valueKey,
  requireValueType,
} from "../value";
import * as defaultMaps from "../maps/default-map";
import type { Override, OverrideHistory } from "../maps/default-map";
import * as generalMaps from "../maps/general-map";
import type { TableEntry } from "../maps/general-map";
import * as seqs from "../sequence-ops";
import type { SetOp } from "../expr";
import { booleanLogic, membership } from "../maps/sets";

// ============================================================================
// Raw Values
// ============================================================================

export type Raw = boolean | bigint | number | string | readonly Raw[] | RawRecord | RawTable | RawOverrides;

export interface RawRecord {
  readonly [field: string]: Raw;
}

export type RawTable = ReadonlyMap<string, TableEntry<Raw, Raw>>;

export class RawOverrides implements OverrideHistory<Raw, Raw> {
  constructor(
    readonly overrides: readonly Override<Raw, Raw>[],
    readonly defaultValue: Raw
  ) {}
}

const isRawArray = (r: unknown): r is readonly unknown[] => Array.isArray(r);
const isTable = (r: unknown): r is ReadonlyMap<unknown, unknown> => r instanceof Map;

function isPlainObject(r: unknown): r is object {
  return typeof r === "object" && r !== null && !isRawArray(r) && !isTable(r) && !(r instanceof RawOverrides);
}

function bad(r: unknown, t: Type): ModelingError {
  return new ModelingError(`Compiled code produced ${String(r)} for ${typeToString(t)}`);
}

// ============================================================================
// Conversion
// ============================================================================

export function toRaw(v: Value, t: Type): Raw {
  switch (t.kind) {
    case "bool":
      if (v.tag === "bool") return v.value;
      break;
    case "int":
    case "bigint":
      if (v.tag === "int") return v.value;
      break;
    case "char":
      if (v.tag === "char") return v.codePoint;
      break;
    case "string":
      if (v.tag === "string") return v.value;
      break;
    case "seq":
      if (v.tag === "seq") return v.elements.map((e) => toRaw(e, t.element));
      break;
    case "option":
      if (v.tag === "option") return v.value === undefined ? [] : [toRaw(v.value, t.element)];
      break;
    case "object":
      if (v.tag === "object") {
        return Object.fromEntries(
          t.fields.map((f) => {
            const fv = v.fields.get(f.name);
            if (fv === undefined) throw new ModelingError(`Missing field ${f.name}`);
            return [f.name, toRaw(fv, f.type)] as const;
          })
        );
      }
      break;
    case "map":
      if (v.tag === "map") {
        const table = new Map<string, TableEntry<Raw, Raw>>();
        for (const [k, e] of v.entries) {
          table.set(k, { key: toRaw(e.key, t.key), value: toRaw(e.value, t.value) });
        }
        return table;
      }
      break;
    case "defaultMap":
      if (v.tag === "defaultMap") {
        return new RawOverrides(
          v.overrides.map((o) => ({ key: toRaw(o.key, t.key), value: toRaw(o.value, t.value) })),
          toRaw(v.defaultValue, t.value)
        );
      }
      break;
  }
  requireValueType(v, t, "Compiled argument");
  throw new ModelingError(`Cannot convert value for ${typeToString(t)}`);
}

/**
 * Read a raw value back as a `Value` of type `t`, validating its shape.
 */
export function fromRaw(r: unknown, t: Type): Value {
  switch (t.kind) {
    case "bool":
      if (typeof r === "boolean") return boolVal(r);
      break;
    case "int":
    case "bigint":
      if (typeof r === "bigint") return intVal(r);
      break;
    case "char":
      if (typeof r === "number") return charVal(r);
      break;
    case "string":
      if (typeof r === "string") return stringVal(r);
      break;
    case "seq":
      if (isRawArray(r)) return seqVal(r.map((e) => fromRaw(e, t.element)));
      break;
    case "option":
      if (isRawArray(r) && r.length <= 1) return r.length === 0 ? noneVal : someVal(fromRaw(r[0], t.element));
      break;
    case "object":
      if (isPlainObject(r)) {
        return { tag: "object", fields: new Map(t.fields.map((f) => [f.name, fromRaw(Reflect.get(r, f.name), f.type)] as const)) };
      }
      break;
    case "map":
      if (isTable(r)) {
        const entries = new Map<string, MapEntry>();
        for (const entry of r.values()) {
          if (!isPlainObject(entry)) throw bad(entry, t);
          const key = fromRaw(Reflect.get(entry, "key"), t.key);
          entries.set(valueKey(key), { key, value: fromRaw(Reflect.get(entry, "value"), t.value) });
        }
        return { tag: "map", entries };
      }
      break;
    case "defaultMap":
      if (r instanceof RawOverrides) {
        return {
          tag: "defaultMap",
          overrides: r.overrides.map((o) => ({ key: fromRaw(o.key, t.key), value: fromRaw(o.value, t.value) })),
          defaultValue: fromRaw(r.defaultValue, t.value),
        };
      }
      break;
  }
  throw bad(r, t);
}

// ============================================================================
// Helpers
// ============================================================================

export const rawEquals = (a: Raw, b: Raw, t: Type): boolean => valueEquals(fromRaw(a, t), fromRaw(b, t));
const rawKey = (k: Raw, t: Type): string => valueKey(fromRaw(k, t));
const equalityAt = (t: Type) => (a: Raw, b: Raw): boolean => rawEquals(a, b, t);
const sameChar = (a: string, b: string): boolean => a === b;
const chars = seqs.codePoints;

/**
 * Helpers called by generated code as `rt.<name>(...)`.
 */
export const runtime = {
  eq: rawEquals,

  withField: (o: RawRecord, field: string, value: Raw): RawRecord => ({ ...o, [field]: value }),

  optionValue: (o: readonly Raw[], fallback: Raw): Raw => (o.length > 0 ? o[0] : fallback),

  // strings, by code point
  strLength: (s: string): bigint => BigInt(chars(s).length),
  strSlice: (s: string, offset: bigint, length: bigint): string => seqs.slice(chars(s), offset, length).join(""),
  strAt: (s: string, index: bigint): string => seqs.at(chars(s), index).join(""),
  strIndexOf: (s: string, sub: string, offset: bigint): bigint => seqs.indexOf(chars(s), chars(sub), offset, sameChar),
  strContains: (s: string, sub: string): boolean => seqs.contains(chars(s), chars(sub), sameChar),
  strStartsWith: (s: string, prefix: string): boolean => seqs.startsWith(chars(s), chars(prefix), sameChar),
  strEndsWith: (s: string, suffix: string): boolean => seqs.endsWith(chars(s), chars(suffix), sameChar),
  strReplaceFirst: (s: string, sub: string, replacement: string): string =>
    seqs.replaceFirst(chars(s), chars(sub), chars(replacement), sameChar).join(""),

  // sequences, compared at their element type
  seqSlice: (s: readonly Raw[], offset: bigint, length: bigint): Raw[] => seqs.slice(s, offset, length),
  seqAt: (s: readonly Raw[], index: bigint): Raw[] => seqs.at(s, index),
  seqIndexOf: (s: readonly Raw[], sub: readonly Raw[], offset: bigint, element: Type): bigint =>
    seqs.indexOf(s, sub, offset, equalityAt(element)),
  seqContains: (s: readonly Raw[], sub: readonly Raw[], element: Type): boolean =>
    seqs.contains(s, sub, equalityAt(element)),
  seqStartsWith: (s: readonly Raw[], prefix: readonly Raw[], element: Type): boolean =>
    seqs.startsWith(s, prefix, equalityAt(element)),
  seqEndsWith: (s: readonly Raw[], suffix: readonly Raw[], element: Type): boolean =>
    seqs.endsWith(s, suffix, equalityAt(element)),
  seqReplaceFirst: (s: readonly Raw[], sub: readonly Raw[], replacement: readonly Raw[], element: Type): Raw[] =>
    seqs.replaceFirst(s, sub, replacement, equalityAt(element)),

  // general maps
  mapGet: (m: RawTable, key: Raw, keyType: Type): Raw[] => {
    const found = generalMaps.lookup({ entries: m }, key, (k) => rawKey(k, keyType));
    return found === undefined ? [] : [found];
  },
  mapSet: (m: RawTable, key: Raw, value: Raw, keyType: Type): RawTable =>
    generalMaps.insert({ entries: m }, key, value, (k) => rawKey(k, keyType)).entries,
  mapDelete: (m: RawTable, key: Raw, keyType: Type): RawTable =>
    generalMaps.remove({ entries: m }, key, (k) => rawKey(k, keyType)).entries,

  // default-valued maps
  dmapGet: (m: RawOverrides, key: Raw, keyType: Type): Raw => defaultMaps.get(m, key, equalityAt(keyType)),
  dmapSet: (m: RawOverrides, key: Raw, value: Raw): RawOverrides =>
    new RawOverrides([...m.overrides, { key, value }], m.defaultValue),
  dmapCount: (m: RawOverrides, keyType: Type, valueType: Type): bigint =>
    BigInt.asIntN(32, BigInt(defaultMaps.count(m, (k) => rawKey(k, keyType), equalityAt(valueType)))),

  // sets, as default-valued maps to booleans
  setCombine: (op: SetOp, a: RawOverrides, b: RawOverrides, keyType: Type): RawOverrides =>
    new RawOverrides(
      defaultMaps.combine(
        a,
        b,
        (x, y) => membership(op, x === true, y === true, booleanLogic),
        (k) => rawKey(k, keyType),
        equalityAt(keyType),
        (x, y) => x === y
      ),
      a.defaultValue
    ),
};

export type Runtime = typeof runtime;
