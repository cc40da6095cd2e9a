/**
 * Maps over symbolic keys and values.
 *
 * A symbolic map is a guarded override history, oldest first, over a
 * default. An entry takes effect only where its guard holds, which lets two
 * maps merge under a condition by concatenating their histories. General
 * maps store `option(V)` and default to none; default-valued maps store `V`
 * and default to its default.
 */

import { CapabilityError } from "../errors";
import { Type, AnyMapType, containsMap, optionType, typeToString } from "../types";
import type { Symbolic } from "../symbolic/symbolic";

export interface GuardedEntry<T> {
  readonly guard: T;
  readonly key: Symbolic<T>;
  readonly value: Symbolic<T>;
}

export interface SymbolicMap<T> {
  readonly kind: "map";
  readonly type: AnyMapType;
  readonly defaultValue: Symbolic<T>;
  readonly entries: readonly GuardedEntry<T>[];
}

/** What map encoding needs from the surrounding symbolic layer */
export interface MapAlgebra<T> {
  readonly true: T;
  and(a: T, b: T): T;
  not(a: T): T;
  eq(a: Symbolic<T>, b: Symbolic<T>): T;
  ite(cond: T, a: Symbolic<T>, b: Symbolic<T>): Symbolic<T>;
  count(indicators: readonly T[]): T;
}

/** The type of the values a map's history stores */
export function storedType(t: AnyMapType): Type {
  return t.kind === "map" ? optionType(t.value) : t.value;
}

/** Map keys and values cannot themselves hold maps */
export function checkMapNesting(backend: string, t: AnyMapType): void {
  if (containsMap(t.key) || containsMap(t.value)) {
    throw new CapabilityError(backend, `nested map type ${typeToString(t)} cannot be encoded`);
  }
}

/** Nested if-then-else over the history, newest entry outermost */
export function get<T>(alg: MapAlgebra<T>, m: SymbolicMap<T>, key: Symbolic<T>): Symbolic<T> {
  let result = m.defaultValue;
  for (const entry of m.entries) {
    result = alg.ite(alg.and(entry.guard, alg.eq(entry.key, key)), entry.value, result);
  }
  return result;
}

export function set<T>(alg: MapAlgebra<T>, m: SymbolicMap<T>, key: Symbolic<T>, value: Symbolic<T>): SymbolicMap<T> {
  return { ...m, entries: [...m.entries, { guard: alg.true, key, value }] };
}

/** Entries of `a` where `cond` holds, of `b` where it does not */
export function merge<T>(alg: MapAlgebra<T>, cond: T, a: SymbolicMap<T>, b: SymbolicMap<T>): SymbolicMap<T> {
  if (a === b) return a;
  const notCond = alg.not(cond);
  return {
    ...a,
    entries: [
      ...a.entries.map((e) => ({ ...e, guard: alg.and(cond, e.guard) })),
      ...b.entries.map((e) => ({ ...e, guard: alg.and(notCond, e.guard) })),
    ],
  };
}

/**
 * Number of keys whose effective value differs from the default. Entry `i`
 * counts when it is active, not shadowed by a later active entry for the
 * same key, and not mapping to the default.
 */
export function count<T>(alg: MapAlgebra<T>, m: SymbolicMap<T>): T {
  const indicators: T[] = [];
  m.entries.forEach((entry, i) => {
    let indicator = alg.and(entry.guard, alg.not(alg.eq(entry.value, m.defaultValue)));
    for (const later of m.entries.slice(i + 1)) {
      indicator = alg.and(indicator, alg.not(alg.and(later.guard, alg.eq(later.key, entry.key))));
    }
    indicators.push(indicator);
  });
  return alg.count(indicators);
}

/**
 * Extensional equality. Two histories over the same default can only
 * disagree at keys one of them mentions.
 */
export function equals<T>(alg: MapAlgebra<T>, a: SymbolicMap<T>, b: SymbolicMap<T>): T {
  if (a === b) return alg.true;
  let result = alg.true;
  for (const { key } of [...a.entries, ...b.entries]) {
    result = alg.and(result, alg.eq(get(alg, a, key), get(alg, b, key)));
  }
  return result;
}

/**
 * Pointwise combination of two maps over the same default, where
 * `op(default, default)` is the default again. Every entry of either
 * history is stored again with the combined value at its key; a key
 * neither history mentions reads the default on both sides and so in the
 * result.
 */
export function combine<T>(
  alg: MapAlgebra<T>,
  a: SymbolicMap<T>,
  b: SymbolicMap<T>,
  op: (x: Symbolic<T>, y: Symbolic<T>) => Symbolic<T>
): SymbolicMap<T> {
  return {
    ...a,
    entries: [...a.entries, ...b.entries].map(({ guard, key }) => ({
      guard,
      key,
      value: op(get(alg, a, key), get(alg, b, key)),
    })),
  };
}
