/**
 * Concrete semantics of default-valued maps.
 *
 * A default-valued map is an override history applied most-recent-first over
 * a fixed default. The functions here are shared by the interpreter (over
 * `Value`s) and the compiled runtime (over raw JavaScript values), so they are
 * parameterized by key and value equality.
 */

export interface Override<K, V> {
  readonly key: K;
  readonly value: V;
}

export interface OverrideHistory<K, V> {
  /** Oldest first */
  readonly overrides: readonly Override<K, V>[];
  readonly defaultValue: V;
}

export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Walk the history most-recent-first and return the first matching value.
 */
export function get<K, V>(m: OverrideHistory<K, V>, key: K, keyEquals: Equality<K>): V {
  for (let i = m.overrides.length - 1; i >= 0; i--) {
    const o = m.overrides[i];
    if (keyEquals(o.key, key)) return o.value;
  }
  return m.defaultValue;
}

export function set<K, V, M extends OverrideHistory<K, V>>(m: M, key: K, value: V): M {
  return { ...m, overrides: [...m.overrides, { key, value }] };
}

/**
 * The observable key/value pairs: the latest value of each touched key,
 * omitting keys whose latest value is the default. Ordered by first touch.
 */
export function effectiveEntries<K, V>(
  m: OverrideHistory<K, V>,
  keyOf: (k: K) => string,
  valueEquals: Equality<V>
): Override<K, V>[] {
  const latest = new Map<string, Override<K, V>>();
  for (const o of m.overrides) {
    // Map keeps first-insertion order on overwrite
    latest.set(keyOf(o.key), o);
  }
  return [...latest.values()].filter((o) => !valueEquals(o.value, m.defaultValue));
}

/** Number of keys whose effective value differs from the default */
export function count<K, V>(m: OverrideHistory<K, V>, keyOf: (k: K) => string, valueEquals: Equality<V>): number {
  return effectiveEntries(m, keyOf, valueEquals).length;
}

/**
 * Extensional equality over the union of keys touched by either history.
 * Keys outside both histories read the same default on both sides.
 */
export function equals<K, V>(
  a: OverrideHistory<K, V>,
  b: OverrideHistory<K, V>,
  keyEquals: Equality<K>,
  valueEquals: Equality<V>
): boolean {
  for (const o of [...a.overrides, ...b.overrides]) {
    if (!valueEquals(get(a, o.key, keyEquals), get(b, o.key, keyEquals))) return false;
  }
  return true;
}

/**
 * Pointwise combination of two histories over the same default, where
 * `op(default, default)` is the default again. Only keys either side
 * touched can differ from it; the result lists those that do, in first
 * touch order.
 */
export function combine<K, V>(
  a: OverrideHistory<K, V>,
  b: OverrideHistory<K, V>,
  op: (x: V, y: V) => V,
  keyOf: (k: K) => string,
  keyEquals: Equality<K>,
  valueEquals: Equality<V>
): Override<K, V>[] {
  const touched = new Map<string, K>();
  for (const o of [...a.overrides, ...b.overrides]) {
    const id = keyOf(o.key);
    if (!touched.has(id)) touched.set(id, o.key);
  }
  const result: Override<K, V>[] = [];
  for (const key of touched.values()) {
    const value = op(get(a, key, keyEquals), get(b, key, keyEquals));
    if (!valueEquals(value, a.defaultValue)) result.push({ key, value });
  }
  return result;
}
