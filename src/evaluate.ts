/**
 * Concrete evaluator.
 *
 * Interprets an expression against a binding of every free variable.
 * Results are memoized by node id, so shared sub-expressions are evaluated
 * once, and only the taken branch of a conditional is visited.
 */

import { ModelingError } from "./errors";
import { Expr, VarExpr, UnaryExpr, BinaryExpr, TernaryExpr } from "./expr";
import { Type, ObjectType, typeToString } from "./types";
import {
  Value,
  ObjectValue,
  MapValue,
  DefaultMapValue,
  boolVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  someVal,
  noneVal,
  defaultValue,
  requireValueType,
  valueEquals,
  valueKey,
  valueToString,
} from "./value";
import * as defaultMaps from "./maps/default-map";
import * as generalMaps from "./maps/general-map";
import { booleanLogic, membership } from "./maps/sets";
import * as seqs from "./sequence-ops";
import { automatonFor } from "./regex/automaton";

export type Bindings = Readonly<Record<string, Value>> | ReadonlyMap<string, Value>;

/**
 * Evaluate `expr`. Every free variable must be bound to a value of its type.
 */
export function evaluate(expr: Expr, bindings: Bindings = {}): Value {
  return new Evaluator(bindings).evaluate(expr);
}

export function lookupBinding(bindings: Bindings, name: string): Value | undefined {
  if (isBindingMap(bindings)) return bindings.get(name);
  return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : undefined;
}

/**
 * Bindings and models are keyed by name, so two free variables may not share
 * a name at different types.
 */
export function requireDistinctNames(variables: readonly VarExpr[]): void {
  const seen = new Map<string, VarExpr>();
  for (const v of variables) {
    const other = seen.get(v.name);
    if (other !== undefined && other !== v) {
      throw new ModelingError(
        `Variable ${v.name} is used at both ${typeToString(other.type)} and ${typeToString(v.type)}`
      );
    }
    seen.set(v.name, v);
  }
}

function isBindingMap(bindings: Bindings): bindings is ReadonlyMap<string, Value> {
  return bindings instanceof Map;
}

// ============================================================================
// Value Accessors
// ============================================================================

function unexpected(expected: string, v: Value): ModelingError {
  return new ModelingError(`Expected a ${expected} value, got ${valueToString(v)}`);
}

function asBool(v: Value): boolean {
  if (v.tag !== "bool") throw unexpected("bool", v);
  return v.value;
}

function asInt(v: Value): bigint {
  if (v.tag !== "int") throw unexpected("integer", v);
  return v.value;
}

function asObject(v: Value): ObjectValue {
  if (v.tag !== "object") throw unexpected("record", v);
  return v;
}

function asMap(v: Value): MapValue {
  if (v.tag !== "map") throw unexpected("map", v);
  return v;
}

function asDefaultMap(v: Value): DefaultMapValue {
  if (v.tag !== "defaultMap") throw unexpected("default-valued map", v);
  return v;
}

/** Ordering key of an integer or character value */
function ordinal(v: Value): bigint {
  if (v.tag === "char") return BigInt(v.codePoint);
  return asInt(v);
}

/** Elements of a string (as characters) or a sequence */
function items(v: Value): readonly Value[] {
  if (v.tag === "string") return seqs.codePoints(v.value).map((c) => charVal(c));
  if (v.tag === "seq") return v.elements;
  throw unexpected("sequence", v);
}

/** A sequence of the same kind as `like` */
function rebuild(like: Value, elements: readonly Value[]): Value {
  if (like.tag !== "string") return seqVal(elements);
  return stringVal(elements.map((c) => (c.tag === "char" ? String.fromCodePoint(c.codePoint) : "")).join(""));
}

/**
 * Wrap an integer to the width of its type.
 */
export function wrapInt(n: bigint, t: Type): bigint {
  if (t.kind !== "int") return n;
  return t.signed ? BigInt.asIntN(t.bits, n) : BigInt.asUintN(t.bits, n);
}

// ============================================================================
// Evaluator
// ============================================================================

class Evaluator {
  private readonly memo = new Map<number, Value>();

  constructor(private readonly bindings: Bindings) {}

  evaluate(e: Expr): Value {
    const cached = this.memo.get(e.id);
    if (cached !== undefined) return cached;
    const result = this.compute(e);
    this.memo.set(e.id, result);
    return result;
  }

  private compute(e: Expr): Value {
    switch (e.tag) {
      case "const":
        return e.value;

      case "var": {
        const v = lookupBinding(this.bindings, e.name);
        if (v === undefined) {
          throw new ModelingError(`No binding for variable ${e.name}: ${typeToString(e.type)}`);
        }
        requireValueType(v, e.type, `Binding for ${e.name}`);
        return v;
      }

      case "if":
        return asBool(this.evaluate(e.cond)) ? this.evaluate(e.then) : this.evaluate(e.else);

      case "createObject":
        return this.createObject(e.type, e.fields);

      case "getField": {
        const field = asObject(this.evaluate(e.object)).fields.get(e.field);
        if (field === undefined) throw new ModelingError(`Missing field ${e.field}`);
        return field;
      }

      case "withField": {
        const fields = new Map(asObject(this.evaluate(e.object)).fields);
        fields.set(e.field, this.evaluate(e.value));
        return { tag: "object", fields };
      }

      case "regexMatch": {
        const s = this.evaluate(e.operand);
        if (s.tag !== "string") throw unexpected("string", s);
        return boolVal(automatonFor(e.regex).accepts(s.value));
      }

      case "and":
        return boolVal(asBool(this.evaluate(e.left)) && asBool(this.evaluate(e.right)));

      case "or":
        return boolVal(asBool(this.evaluate(e.left)) || asBool(this.evaluate(e.right)));

      case "slice":
      case "indexOf":
      case "replaceFirst":
      case "mapSet":
      case "defaultMapSet":
        return this.ternary(e);

      case "not":
      case "bitNot":
      case "some":
      case "isSome":
      case "optionValue":
      case "unit":
      case "length":
      case "charToString":
      case "defaultMapCount":
      case "cast":
        return this.unary(e);

      default:
        return this.binary(e);
    }
  }

  private createObject(t: Type, fields: readonly Expr[]): Value {
    if (t.kind !== "object") throw new ModelingError(`Not a record type: ${typeToString(t)}`);
    const objectType: ObjectType = t;
    return {
      tag: "object",
      fields: new Map(objectType.fields.map((f, i) => [f.name, this.evaluate(fields[i])] as const)),
    };
  }

  private unary(e: UnaryExpr): Value {
    const v = this.evaluate(e.operand);
    switch (e.tag) {
      case "not":
        return boolVal(!asBool(v));
      case "bitNot":
        return intVal(wrapInt(~asInt(v), e.type));
      case "some":
        return someVal(v);
      case "isSome":
        if (v.tag !== "option") throw unexpected("option", v);
        return boolVal(v.value !== undefined);
      case "optionValue":
        if (v.tag !== "option") throw unexpected("option", v);
        return v.value ?? defaultValue(e.type);
      case "unit":
        return seqVal([v]);
      case "length":
        return intVal(items(v).length);
      case "charToString":
        if (v.tag !== "char") throw unexpected("char", v);
        return stringVal(String.fromCodePoint(v.codePoint));
      case "defaultMapCount":
        return intVal(BigInt.asIntN(32, BigInt(defaultMaps.count(asDefaultMap(v), valueKey, valueEquals))));
      case "cast":
        return intVal(wrapInt(asInt(v), e.type));
    }
  }

  private binary(e: BinaryExpr): Value {
    const l = this.evaluate(e.left);
    const r = this.evaluate(e.right);
    switch (e.tag) {
      case "and":
        return boolVal(asBool(l) && asBool(r));
      case "or":
        return boolVal(asBool(l) || asBool(r));
      case "eq":
        return boolVal(valueEquals(l, r));
      case "lt":
        return boolVal(ordinal(l) < ordinal(r));
      case "le":
        return boolVal(ordinal(l) <= ordinal(r));
      case "add":
        return intVal(wrapInt(asInt(l) + asInt(r), e.type));
      case "sub":
        return intVal(wrapInt(asInt(l) - asInt(r), e.type));
      case "mul":
        return intVal(wrapInt(asInt(l) * asInt(r), e.type));
      case "bitAnd":
        return intVal(wrapInt(asInt(l) & asInt(r), e.type));
      case "bitOr":
        return intVal(wrapInt(asInt(l) | asInt(r), e.type));
      case "bitXor":
        return intVal(wrapInt(asInt(l) ^ asInt(r), e.type));
      case "concat":
        return rebuild(l, [...items(l), ...items(r)]);
      case "at":
        return rebuild(l, seqs.at(items(l), asInt(r)));
      case "contains":
        return boolVal(seqs.contains(items(l), items(r), valueEquals));
      case "startsWith":
        return boolVal(seqs.startsWith(items(l), items(r), valueEquals));
      case "endsWith":
        return boolVal(seqs.endsWith(items(l), items(r), valueEquals));
      case "mapGet": {
        const found = generalMaps.lookup(asMap(l), r, valueKey);
        return found === undefined ? noneVal : someVal(found);
      }
      case "mapDelete":
        return generalMaps.remove(asMap(l), r, valueKey);
      case "defaultMapGet":
        return defaultMaps.get(asDefaultMap(l), r, valueEquals);
      case "setUnion":
      case "setIntersect":
      case "setDifference": {
        const op = e.tag;
        const a = asDefaultMap(l);
        const overrides = defaultMaps.combine(
          a,
          asDefaultMap(r),
          (x, y) => boolVal(membership(op, asBool(x), asBool(y), booleanLogic)),
          valueKey,
          valueEquals,
          valueEquals
        );
        return { tag: "defaultMap", overrides, defaultValue: a.defaultValue };
      }
    }
  }

  private ternary(e: TernaryExpr): Value {
    const a = this.evaluate(e.first);
    const b = this.evaluate(e.second);
    const c = this.evaluate(e.third);
    switch (e.tag) {
      case "slice":
        return rebuild(a, seqs.slice(items(a), asInt(b), asInt(c)));
      case "indexOf":
        return intVal(seqs.indexOf(items(a), items(b), asInt(c), valueEquals));
      case "replaceFirst":
        return rebuild(a, seqs.replaceFirst(items(a), items(b), items(c), valueEquals));
      case "mapSet":
        return generalMaps.insert(asMap(a), b, c, valueKey);
      case "defaultMapSet":
        return defaultMaps.set(asDefaultMap(a), b, c);
    }
  }
}
