/**
 * Expression constructors.
 *
 * Every constructor checks its operand types and throws a `ModelingError`
 * on mismatch, then applies a few local simplifications before interning
 * the node. Simplification never changes meaning.
 */

import { ModelingError } from "./errors";
import {
  Type,
  IntType,
  BigIntType,
  ObjectType,
  OptionType,
  SeqType,
  StringType,
  MapType,
  DefaultMapType,
  boolType,
  bigintType,
  charType,
  stringType,
  int32Type,
  seqType,
  optionType,
  tupleType,
  mapType,
  defaultMapType,
  setType,
  fieldType,
  isArithmetic,
  isOrdered,
  isSequence,
  typeToString,
} from "./types";
import {
  Value,
  boolVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  noneVal,
  mapVal,
  defaultMapVal,
  defaultValue,
  falseVal,
  trueVal,
  inIntRange,
  requireValueType,
  valueEquals,
  valueKey,
} from "./value";
import {
  Expr,
  VarExpr,
  SetOp,
  mkConst,
  mkVar,
  mkUnary,
  mkBinary,
  mkTernary,
  mkIf,
  mkCreateObject,
  mkGetField,
  mkWithField,
  mkRegexMatch,
} from "./expr";
import { parseRegex } from "./regex/parser";
import { wrapInt } from "./evaluate";
import * as defaultMaps from "./maps/default-map";

/** Sequence offsets and lengths may be given as plain numbers */
export type Index = Expr | number | bigint;

// ============================================================================
// Type Checks
// ============================================================================

function mismatch(op: string, message: string): ModelingError {
  return new ModelingError(`${op}: ${message}`);
}

function requireBool(op: string, e: Expr): void {
  if (e.type.kind !== "bool") {
    throw mismatch(op, `expected bool, got ${typeToString(e.type)}`);
  }
}

function requireSame(op: string, a: Expr, b: Expr): void {
  if (a.type !== b.type) {
    throw mismatch(op, `operand types differ: ${typeToString(a.type)} and ${typeToString(b.type)}`);
  }
}

function requireSequence(op: string, e: Expr): SeqType | StringType {
  const t = e.type;
  if (!isSequence(t)) {
    throw mismatch(op, `expected a string or sequence, got ${typeToString(t)}`);
  }
  return t;
}

function requireObject(op: string, e: Expr): ObjectType {
  if (e.type.kind !== "object") {
    throw mismatch(op, `expected a record, got ${typeToString(e.type)}`);
  }
  return e.type;
}

function requireOption(op: string, e: Expr): OptionType {
  if (e.type.kind !== "option") {
    throw mismatch(op, `expected an option, got ${typeToString(e.type)}`);
  }
  return e.type;
}

function requireMap(op: string, e: Expr): MapType {
  if (e.type.kind !== "map") {
    throw mismatch(op, `expected a map, got ${typeToString(e.type)}`);
  }
  return e.type;
}

function requireDefaultMap(op: string, e: Expr): DefaultMapType {
  if (e.type.kind !== "defaultMap") {
    throw mismatch(op, `expected a default-valued map, got ${typeToString(e.type)}`);
  }
  return e.type;
}

function requireType(op: string, what: string, e: Expr, t: Type): void {
  if (e.type !== t) {
    throw mismatch(op, `${what} must be ${typeToString(t)}, got ${typeToString(e.type)}`);
  }
}

function toIndex(op: string, i: Index): Expr {
  if (typeof i === "number" || typeof i === "bigint") return bigint(i);
  requireType(op, "index", i, bigintType);
  return i;
}

function boolConstant(e: Expr): boolean | undefined {
  return e.tag === "const" && e.value.tag === "bool" ? e.value.value : undefined;
}

// ============================================================================
// Leaves
// ============================================================================

/**
 * A literal of the given type. Null and ill-typed values are rejected.
 */
export function constant(value: Value | null | undefined, type: Type): Expr {
  if (value === null || value === undefined) {
    throw new ModelingError(`Null constant of type ${typeToString(type)}`);
  }
  requireValueType(value, type, "constant");
  return mkConst(value, type);
}

export const bool = (b: boolean): Expr => mkConst(boolVal(b), boolType);
export const trueExpr = bool(true);
export const falseExpr = bool(false);

export function int(n: number | bigint, type: IntType = int32Type): Expr {
  if (typeof n === "number" && !Number.isInteger(n)) {
    throw new ModelingError(`Not an integer: ${n}`);
  }
  const value = BigInt(n);
  if (!inIntRange(value, type)) {
    throw new ModelingError(`Literal ${value} is out of range for ${typeToString(type)}`);
  }
  return mkConst(intVal(value), type);
}

export function bigint(n: number | bigint): Expr {
  if (typeof n === "number" && !Number.isInteger(n)) {
    throw new ModelingError(`Not an integer: ${n}`);
  }
  return mkConst(intVal(n), bigintType);
}

export const char = (c: string | number): Expr => constant(charVal(c), charType);

export function str(s: string | null | undefined): Expr {
  if (s === null || s === undefined) {
    throw new ModelingError("Null string literal");
  }
  return mkConst(stringVal(s), stringType);
}

export const emptySeq = (element: Type): Expr => mkConst(seqVal([]), seqType(element));
export const seqOf = (element: Type, values: readonly Value[]): Expr => constant(seqVal(values), seqType(element));
export const none = (element: Type): Expr => mkConst(noneVal, optionType(element));
export const mapEmpty = (key: Type, value: Type): Expr => mkConst(mapVal(), mapType(key, value));
export const defaultMapEmpty = (key: Type, value: Type): Expr => {
  const t = defaultMapType(key, value);
  return mkConst(defaultMapVal(defaultValue(t.value)), t);
};

/**
 * A free variable. Identity is (name, type): the same name at the same type
 * is the same variable.
 */
export function variable(name: string, type: Type): VarExpr {
  if (name.length === 0) {
    throw new ModelingError("Variable names must not be empty");
  }
  return mkVar(name, type);
}

let arbitraryCounter = 0;

/** A fresh variable with a generated name */
export const arbitrary = (type: Type): VarExpr => mkVar(`$${arbitraryCounter++}`, type);

// ============================================================================
// Logic
// ============================================================================

export function not(e: Expr): Expr {
  requireBool("not", e);
  const c = boolConstant(e);
  if (c !== undefined) return bool(!c);
  if (e.tag === "not") return e.operand;
  return mkUnary("not", e, boolType);
}

export function and(a: Expr, b: Expr): Expr {
  requireBool("and", a);
  requireBool("and", b);
  const ca = boolConstant(a);
  const cb = boolConstant(b);
  if (ca === false || cb === false) return falseExpr;
  if (ca === true) return b;
  if (cb === true) return a;
  if (a === b) return a;
  return mkBinary("and", a, b, boolType);
}

export function or(a: Expr, b: Expr): Expr {
  requireBool("or", a);
  requireBool("or", b);
  const ca = boolConstant(a);
  const cb = boolConstant(b);
  if (ca === true || cb === true) return trueExpr;
  if (ca === false) return b;
  if (cb === false) return a;
  if (a === b) return a;
  return mkBinary("or", a, b, boolType);
}

export const andAll = (...es: Expr[]): Expr => es.reduce(and, trueExpr);
export const orAll = (...es: Expr[]): Expr => es.reduce(or, falseExpr);
export const implies = (a: Expr, b: Expr): Expr => or(not(a), b);

export function iff(a: Expr, b: Expr): Expr {
  requireBool("iff", a);
  return eq(a, b);
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Equality at any type. Records compare fieldwise, default-valued maps
 * extensionally.
 */
export function eq(a: Expr, b: Expr): Expr {
  requireSame("eq", a, b);
  if (a === b) return trueExpr;
  if (a.tag === "const" && b.tag === "const") return bool(valueEquals(a.value, b.value));
  return mkBinary("eq", a, b, boolType);
}

export const neq = (a: Expr, b: Expr): Expr => not(eq(a, b));

function ordered(op: "lt" | "le", a: Expr, b: Expr): Expr {
  requireSame(op, a, b);
  if (!isOrdered(a.type)) {
    throw mismatch(op, `${typeToString(a.type)} is not ordered`);
  }
  if (a === b) return bool(op === "le");
  return mkBinary(op, a, b, boolType);
}

export const lt = (a: Expr, b: Expr): Expr => ordered("lt", a, b);
export const le = (a: Expr, b: Expr): Expr => ordered("le", a, b);
export const gt = (a: Expr, b: Expr): Expr => ordered("lt", b, a);
export const ge = (a: Expr, b: Expr): Expr => ordered("le", b, a);

// ============================================================================
// Arithmetic
// ============================================================================

function arithmetic(op: "add" | "sub" | "mul", a: Expr, b: Expr): Expr {
  requireSame(op, a, b);
  if (!isArithmetic(a.type)) {
    throw mismatch(op, `${typeToString(a.type)} is not numeric`);
  }
  return mkBinary(op, a, b, a.type);
}

export const add = (a: Expr, b: Expr): Expr => arithmetic("add", a, b);
export const sub = (a: Expr, b: Expr): Expr => arithmetic("sub", a, b);
export const mul = (a: Expr, b: Expr): Expr => arithmetic("mul", a, b);

function bitwise(op: "bitAnd" | "bitOr" | "bitXor", a: Expr, b: Expr): Expr {
  requireSame(op, a, b);
  if (a.type.kind !== "int") {
    throw mismatch(op, `expected a fixed-width integer, got ${typeToString(a.type)}`);
  }
  return mkBinary(op, a, b, a.type);
}

export const bitAnd = (a: Expr, b: Expr): Expr => bitwise("bitAnd", a, b);
export const bitOr = (a: Expr, b: Expr): Expr => bitwise("bitOr", a, b);
export const bitXor = (a: Expr, b: Expr): Expr => bitwise("bitXor", a, b);

/**
 * Convert between integer types. Narrowing keeps the low bits; widening
 * extends the sign of a signed operand and zero-extends an unsigned one.
 */
export function cast(e: Expr, to: IntType | BigIntType): Expr {
  if (!isArithmetic(e.type)) {
    throw mismatch("cast", `expected an integer, got ${typeToString(e.type)}`);
  }
  if (e.type === to) return e;
  if (e.tag === "const" && e.value.tag === "int") return mkConst(intVal(wrapInt(e.value.value, to)), to);
  return mkUnary("cast", e, to);
}

export function bitNot(e: Expr): Expr {
  if (e.type.kind !== "int") {
    throw mismatch("bitNot", `expected a fixed-width integer, got ${typeToString(e.type)}`);
  }
  if (e.tag === "bitNot") return e.operand;
  return mkUnary("bitNot", e, e.type);
}

// ============================================================================
// Conditional
// ============================================================================

export function ifThenElse(cond: Expr, thenExpr: Expr, elseExpr: Expr): Expr {
  requireBool("if", cond);
  requireSame("if", thenExpr, elseExpr);
  const c = boolConstant(cond);
  if (c !== undefined) return c ? thenExpr : elseExpr;
  if (thenExpr === elseExpr) return thenExpr;
  if (thenExpr.type === boolType) {
    const t = boolConstant(thenExpr);
    const f = boolConstant(elseExpr);
    if (t === true && f === false) return cond;
    if (t === false && f === true) return not(cond);
  }
  return mkIf(cond, thenExpr, elseExpr);
}

// ============================================================================
// Records
// ============================================================================

export function createObject(type: ObjectType, fields: Readonly<Record<string, Expr>>): Expr {
  for (const name of Object.keys(fields)) {
    if (fieldType(type, name) === undefined) {
      throw mismatch("createObject", `${type.name} has no field "${name}"`);
    }
  }
  const ordered = type.fields.map((f) => {
    const e = Object.prototype.hasOwnProperty.call(fields, f.name) ? fields[f.name] : undefined;
    if (e === undefined) {
      throw mismatch("createObject", `missing field "${f.name}" of ${type.name}`);
    }
    requireType("createObject", `field "${f.name}"`, e, f.type);
    return e;
  });
  return mkCreateObject(type, ordered);
}

export const tuple = (...items: Expr[]): Expr =>
  createObject(
    tupleType(...items.map((e) => e.type)),
    Object.fromEntries(items.map((e, i) => [`item${i + 1}`, e] as const))
  );

export function getField(object: Expr, field: string): Expr {
  const t = requireObject("getField", object);
  const ft = fieldType(t, field);
  if (ft === undefined) {
    throw mismatch("getField", `${t.name} has no field "${field}"`);
  }
  if (object.tag === "createObject") {
    return object.fields[t.fields.findIndex((f) => f.name === field)];
  }
  if (object.tag === "withField") {
    return object.field === field ? object.value : getField(object.object, field);
  }
  if (object.tag === "const" && object.value.tag === "object") {
    const v = object.value.fields.get(field);
    if (v !== undefined) return mkConst(v, ft);
  }
  return mkGetField(object, field, ft);
}

/** Tuple projection, 1-based */
export const item = (object: Expr, index: number): Expr => getField(object, `item${index}`);

export function withField(object: Expr, field: string, value: Expr): Expr {
  const t = requireObject("withField", object);
  const ft = fieldType(t, field);
  if (ft === undefined) {
    throw mismatch("withField", `${t.name} has no field "${field}"`);
  }
  requireType("withField", `field "${field}"`, value, ft);
  return mkWithField(object, field, value);
}

// ============================================================================
// Options
// ============================================================================

export function some(value: Expr): Expr {
  return mkUnary("some", value, optionType(value.type));
}

export function isSome(option: Expr): Expr {
  requireOption("isSome", option);
  if (option.tag === "some") return trueExpr;
  if (option.tag === "const" && option.value.tag === "option") return bool(option.value.value !== undefined);
  return mkUnary("isSome", option, boolType);
}

export const isNone = (option: Expr): Expr => not(isSome(option));

/**
 * The contained value, or the default of the element type for none.
 */
export function optionValue(option: Expr): Expr {
  const t = requireOption("optionValue", option);
  if (option.tag === "some") return option.operand;
  if (option.tag === "const" && option.value.tag === "option") {
    return mkConst(option.value.value ?? defaultValue(t.element), t.element);
  }
  return mkUnary("optionValue", option, t.element);
}

export const valueOr = (option: Expr, fallback: Expr): Expr =>
  ifThenElse(isSome(option), optionValue(option), fallback);

// ============================================================================
// Sequences and Strings
// ============================================================================

export function unit(element: Expr): Expr {
  return mkUnary("unit", element, seqType(element.type));
}

export function concat(a: Expr, b: Expr): Expr {
  requireSequence("concat", a);
  requireSame("concat", a, b);
  return mkBinary("concat", a, b, a.type);
}

export function length(s: Expr): Expr {
  requireSequence("length", s);
  return mkUnary("length", s, bigintType);
}

/**
 * Up to `len` elements starting at `offset`; empty when the offset is out of
 * range or the length is not positive.
 */
export function slice(s: Expr, offset: Index, len: Index): Expr {
  requireSequence("slice", s);
  return mkTernary("slice", s, toIndex("slice", offset), toIndex("slice", len), s.type);
}

/** The one-element sequence at `index`, or empty when out of range */
export function at(s: Expr, index: Index): Expr {
  requireSequence("at", s);
  return mkBinary("at", s, toIndex("at", index), s.type);
}

/** First position of `sub` at or after `offset`, or -1 */
export function indexOf(s: Expr, sub: Expr, offset: Index = 0): Expr {
  requireSequence("indexOf", s);
  requireSame("indexOf", s, sub);
  return mkTernary("indexOf", s, sub, toIndex("indexOf", offset), bigintType);
}

function seqPredicate(op: "contains" | "startsWith" | "endsWith", s: Expr, sub: Expr): Expr {
  requireSequence(op, s);
  requireSame(op, s, sub);
  return mkBinary(op, s, sub, boolType);
}

export const contains = (s: Expr, sub: Expr): Expr => seqPredicate("contains", s, sub);
export const startsWith = (s: Expr, prefix: Expr): Expr => seqPredicate("startsWith", s, prefix);
export const endsWith = (s: Expr, suffix: Expr): Expr => seqPredicate("endsWith", s, suffix);

export function replaceFirst(s: Expr, sub: Expr, replacement: Expr): Expr {
  requireSequence("replaceFirst", s);
  requireSame("replaceFirst", s, sub);
  requireSame("replaceFirst", s, replacement);
  return mkTernary("replaceFirst", s, sub, replacement, s.type);
}

/** Whole-string match against a pattern; throws `RegexSyntaxError` for bad patterns */
export function matchesRegex(s: Expr, pattern: string): Expr {
  requireType("matchesRegex", "subject", s, stringType);
  return mkRegexMatch(s, pattern, parseRegex(pattern), boolType);
}

export function charToString(c: Expr): Expr {
  requireType("charToString", "operand", c, charType);
  return mkUnary("charToString", c, stringType);
}

// ============================================================================
// General Maps
// ============================================================================

export function mapSet(m: Expr, key: Expr, value: Expr): Expr {
  const t = requireMap("mapSet", m);
  requireType("mapSet", "key", key, t.key);
  requireType("mapSet", "value", value, t.value);
  return mkTernary("mapSet", m, key, value, t);
}

/** `some(value)` for a stored key, none otherwise */
export function mapGet(m: Expr, key: Expr): Expr {
  const t = requireMap("mapGet", m);
  requireType("mapGet", "key", key, t.key);
  return mkBinary("mapGet", m, key, optionType(t.value));
}

export function mapDelete(m: Expr, key: Expr): Expr {
  const t = requireMap("mapDelete", m);
  requireType("mapDelete", "key", key, t.key);
  return mkBinary("mapDelete", m, key, t);
}

export const containsKey = (m: Expr, key: Expr): Expr => isSome(mapGet(m, key));

// ============================================================================
// Default-Valued Maps
// ============================================================================

export function defaultMapSet(m: Expr, key: Expr, value: Expr): Expr {
  const t = requireDefaultMap("defaultMapSet", m);
  requireType("defaultMapSet", "key", key, t.key);
  requireType("defaultMapSet", "value", value, t.value);
  return mkTernary("defaultMapSet", m, key, value, t);
}

export function defaultMapGet(m: Expr, key: Expr): Expr {
  const t = requireDefaultMap("defaultMapGet", m);
  requireType("defaultMapGet", "key", key, t.key);
  return mkBinary("defaultMapGet", m, key, t.value);
}

/** Number of keys whose value differs from the default, as an int32 */
export function defaultMapCount(m: Expr): Expr {
  requireDefaultMap("defaultMapCount", m);
  return mkUnary("defaultMapCount", m, int32Type);
}

// ============================================================================
// Sets
// ============================================================================

function requireSet(op: string, e: Expr): DefaultMapType {
  const t = requireDefaultMap(op, e);
  if (t.value.kind !== "bool") {
    throw mismatch(op, `expected a set, got ${typeToString(e.type)}`);
  }
  return t;
}

export const emptySet = (element: Type): Expr => defaultMapEmpty(element, boolType);

/** A constant set of the given members */
export const setOf = (element: Type, values: readonly Value[]): Expr =>
  constant(defaultMapVal(falseVal, values.map((v) => [v, trueVal] as const)), setType(element));

export function setAdd(s: Expr, element: Expr): Expr {
  requireSet("setAdd", s);
  return defaultMapSet(s, element, trueExpr);
}

export function setRemove(s: Expr, element: Expr): Expr {
  requireSet("setRemove", s);
  return defaultMapSet(s, element, falseExpr);
}

export function setContains(s: Expr, element: Expr): Expr {
  requireSet("setContains", s);
  return defaultMapGet(s, element);
}

export function setSize(s: Expr): Expr {
  requireSet("setSize", s);
  return defaultMapCount(s);
}

function isEmptySet(e: Expr): boolean {
  return e.tag === "const" && e.value.tag === "defaultMap" && defaultMaps.count(e.value, valueKey, valueEquals) === 0;
}

function combineSets(op: SetOp, a: Expr, b: Expr): Expr {
  requireSame(op, a, b);
  const t = requireSet(op, a);
  if (a === b) return op === "setDifference" ? emptySet(t.key) : a;
  // (a ∪ b) ∪ b and (a ∩ b) ∩ b
  if ((a.tag === "setUnion" || a.tag === "setIntersect") && a.tag === op && (a.left === b || a.right === b)) {
    return a;
  }
  const emptyA = isEmptySet(a);
  const emptyB = isEmptySet(b);
  switch (op) {
    case "setUnion":
      if (emptyA) return b;
      if (emptyB) return a;
      break;
    case "setIntersect":
      if (emptyA) return a;
      if (emptyB) return b;
      break;
    case "setDifference":
      if (emptyA || emptyB) return a;
      break;
  }
  return mkBinary(op, a, b, t);
}

export const setUnion = (a: Expr, b: Expr): Expr => combineSets("setUnion", a, b);
export const setIntersect = (a: Expr, b: Expr): Expr => combineSets("setIntersect", a, b);
export const setDifference = (a: Expr, b: Expr): Expr => combineSets("setDifference", a, b);
