/**
 * Concrete semantics of general maps: a persistent table indexed by a
 * canonical key string. Absent keys read back as "no value".
 */

import type { Equality } from "./default-map";

export interface TableEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

export interface KeyedTable<K, V> {
  readonly entries: ReadonlyMap<string, TableEntry<K, V>>;
}

export function lookup<K, V>(m: KeyedTable<K, V>, key: K, keyOf: (k: K) => string): V | undefined {
  return m.entries.get(keyOf(key))?.value;
}

export function insert<K, V, M extends KeyedTable<K, V>>(m: M, key: K, value: V, keyOf: (k: K) => string): M {
  const entries = new Map(m.entries);
  entries.set(keyOf(key), { key, value });
  return { ...m, entries };
}

export function remove<K, V, M extends KeyedTable<K, V>>(m: M, key: K, keyOf: (k: K) => string): M {
  const k = keyOf(key);
  if (!m.entries.has(k)) return m;
  const entries = new Map(m.entries);
  entries.delete(k);
  return { ...m, entries };
}

export function tableEquals<K, V>(a: KeyedTable<K, V>, b: KeyedTable<K, V>, valueEquals: Equality<V>): boolean {
  if (a.entries.size !== b.entries.size) return false;
  for (const [k, entry] of a.entries) {
    const other = b.entries.get(k);
    if (other === undefined || !valueEquals(entry.value, other.value)) return false;
  }
  return true;
}
