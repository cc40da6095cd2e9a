/**
 * Symbolic values: the backend-independent shape of an expression's value
 * during translation.
 *
 * Leaves hold a backend term. Records, options and maps are kept as
 * structure over leaves, so backends never need datatypes or arrays.
 */

import { ModelingError } from "../errors";
import { Type, ObjectType, OptionType, boolType, typeToString } from "../types";
import { Value, defaultValue, trueVal, falseVal, someVal, valueToString } from "../value";
import { SolverBackend, isLeafType } from "../backends/backend";
import * as symbolicMaps from "../maps/symbolic-map";
import type { SymbolicMap, MapAlgebra } from "../maps/symbolic-map";

export type Symbolic<T> = SymbolicLeaf<T> | SymbolicObject<T> | SymbolicOption<T> | SymbolicMap<T>;

export interface SymbolicLeaf<T> {
  readonly kind: "leaf";
  readonly type: Type;
  readonly term: T;
}

export interface SymbolicObject<T> {
  readonly kind: "object";
  readonly type: ObjectType;
  readonly fields: ReadonlyMap<string, Symbolic<T>>;
}

/** `value` is meaningful only where `has` holds */
export interface SymbolicOption<T> {
  readonly kind: "option";
  readonly type: OptionType;
  readonly has: T;
  readonly value: Symbolic<T>;
}

export const leaf = <T>(type: Type, term: T): SymbolicLeaf<T> => ({ kind: "leaf", type, term });

/**
 * Structural operations on symbolic values, built on one backend.
 */
export class SymbolicAlgebra<T> implements MapAlgebra<T> {
  readonly true: T;
  readonly false: T;

  constructor(readonly backend: SolverBackend<T>) {
    this.true = backend.constant(trueVal, boolType);
    this.false = backend.constant(falseVal, boolType);
  }

  and(a: T, b: T): T {
    return this.backend.and(a, b);
  }

  not(a: T): T {
    return this.backend.not(a);
  }

  count(indicators: readonly T[]): T {
    return this.backend.count(indicators);
  }

  leafTerm(s: Symbolic<T>): T {
    if (s.kind !== "leaf") {
      throw new ModelingError(`Expected a scalar, got a symbolic ${s.kind} of ${typeToString(s.type)}`);
    }
    return s.term;
  }

  constant(v: Value, t: Type): Symbolic<T> {
    if (isLeafType(t)) return leaf(t, this.backend.constant(v, t));
    switch (t.kind) {
      case "object": {
        if (v.tag !== "object") break;
        const fields = new Map<string, Symbolic<T>>();
        for (const f of t.fields) {
          fields.set(f.name, this.constant(v.fields.get(f.name) ?? defaultValue(f.type), f.type));
        }
        return { kind: "object", type: t, fields };
      }
      case "option":
        if (v.tag !== "option") break;
        return {
          kind: "option",
          type: t,
          has: v.value === undefined ? this.false : this.true,
          value: this.constant(v.value ?? defaultValue(t.element), t.element),
        };
      case "map":
        if (v.tag !== "map") break;
        return {
          kind: "map",
          type: t,
          defaultValue: this.constant(defaultValue(symbolicMaps.storedType(t)), symbolicMaps.storedType(t)),
          entries: [...v.entries.values()].map((e) => ({
            guard: this.true,
            key: this.constant(e.key, t.key),
            value: this.constant(someVal(e.value), symbolicMaps.storedType(t)),
          })),
        };
      case "defaultMap":
        if (v.tag !== "defaultMap") break;
        return {
          kind: "map",
          type: t,
          defaultValue: this.constant(v.defaultValue, t.value),
          entries: v.overrides.map((o) => ({
            guard: this.true,
            key: this.constant(o.key, t.key),
            value: this.constant(o.value, t.value),
          })),
        };
    }
    throw new ModelingError(`${valueToString(v)} is not a value of type ${typeToString(t)}`);
  }

  defaultOf(t: Type): Symbolic<T> {
    return this.constant(defaultValue(t), t);
  }

  /**
   * Equality: leaves by the backend, records fieldwise, options by presence
   * and then value, maps extensionally.
   */
  eq(a: Symbolic<T>, b: Symbolic<T>): T {
    if (a.kind === "leaf" && b.kind === "leaf") return this.backend.eq(a.term, b.term, a.type);
    if (a.kind === "object" && b.kind === "object") {
      let result = this.true;
      for (const [name, fa] of a.fields) {
        const fb = b.fields.get(name);
        if (fb === undefined) throw shapeMismatch(a, b);
        result = this.backend.and(result, this.eq(fa, fb));
      }
      return result;
    }
    if (a.kind === "option" && b.kind === "option") {
      const bothSome = this.backend.and(a.has, b.has);
      const sameHas = this.backend.eq(a.has, b.has, boolType);
      return this.backend.and(sameHas, this.backend.or(this.backend.not(bothSome), this.eq(a.value, b.value)));
    }
    if (a.kind === "map" && b.kind === "map") return symbolicMaps.equals(this, a, b);
    throw shapeMismatch(a, b);
  }

  /** Conditional merge of two values of the same type */
  ite(cond: T, a: Symbolic<T>, b: Symbolic<T>): Symbolic<T> {
    if (a.kind === "leaf" && b.kind === "leaf") return leaf(a.type, this.backend.ite(cond, a.term, b.term, a.type));
    if (a.kind === "object" && b.kind === "object") {
      const fields = new Map<string, Symbolic<T>>();
      for (const [name, fa] of a.fields) {
        const fb = b.fields.get(name);
        if (fb === undefined) throw shapeMismatch(a, b);
        fields.set(name, this.ite(cond, fa, fb));
      }
      return { kind: "object", type: a.type, fields };
    }
    if (a.kind === "option" && b.kind === "option") {
      return {
        kind: "option",
        type: a.type,
        has: this.backend.ite(cond, a.has, b.has, boolType),
        value: this.ite(cond, a.value, b.value),
      };
    }
    if (a.kind === "map" && b.kind === "map") return symbolicMaps.merge(this, cond, a, b);
    throw shapeMismatch(a, b);
  }
}

function shapeMismatch<T>(a: Symbolic<T>, b: Symbolic<T>): ModelingError {
  return new ModelingError(`Symbolic shapes differ: ${typeToString(a.type)} and ${typeToString(b.type)}`);
}

export type { SymbolicMap };
