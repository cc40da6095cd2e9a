/**
 * Default-Valued Map Tests
 *
 * The override-history semantics shared by the interpreter and the
 * compiled runtime.
 */
import { describe, it, expect } from "vitest";

import * as defaultMaps from "../src/maps/default-map";
import type { OverrideHistory } from "../src/maps/default-map";

const same = (a: number, b: number): boolean => a === b;
const keyOf = (k: number): string => String(k);

function history(defaultValue: number, ...overrides: [number, number][]): OverrideHistory<number, number> {
  return { defaultValue, overrides: overrides.map(([key, value]) => ({ key, value })) };
}

describe("Default-valued maps", () => {
  it("reads the default for untouched keys", () => {
    expect(defaultMaps.get(history(7), 3, same)).toBe(7);
  });

  it("reads the most recent override", () => {
    const m = history(0, [1, 10], [2, 20], [1, 11]);
    expect(defaultMaps.get(m, 1, same)).toBe(11);
    expect(defaultMaps.get(m, 2, same)).toBe(20);
  });

  it("appends without touching the original", () => {
    const m = history(0, [1, 10]);
    const updated = defaultMaps.set(m, 1, 0);
    expect(m.overrides).toHaveLength(1);
    expect(updated.overrides).toHaveLength(2);
    expect(defaultMaps.get(updated, 1, same)).toBe(0);
  });

  it("does not count keys reset to the default", () => {
    expect(defaultMaps.count(history(0, [1, 10], [1, 0]), keyOf, same)).toBe(0);
    expect(defaultMaps.count(history(0, [1, 10], [2, 0], [3, 4]), keyOf, same)).toBe(2);
  });

  it("lists effective entries in first-touch order", () => {
    const m = history(0, [5, 1], [3, 2], [5, 9], [4, 0]);
    expect(defaultMaps.effectiveEntries(m, keyOf, same)).toEqual([
      { key: 5, value: 9 },
      { key: 3, value: 2 },
    ]);
  });

  it("compares over the union of touched keys", () => {
    expect(defaultMaps.equals(history(0, [1, 0]), history(0), same, same)).toBe(true);
    expect(defaultMaps.equals(history(0, [1, 2], [1, 3]), history(0, [1, 3]), same, same)).toBe(true);
    expect(defaultMaps.equals(history(0, [2, 1]), history(0, [1, 1]), same, same)).toBe(false);
  });

  it("satisfies get-after-set for every key", () => {
    const base = history(0, [1, 4], [2, 5]);
    for (const k of [0, 1, 2, 3]) {
      for (const v of [0, 1, 5]) {
        const m = defaultMaps.set(base, k, v);
        expect(defaultMaps.get(m, k, same)).toBe(v);
        for (const other of [0, 1, 2, 3].filter((o) => o !== k)) {
          expect(defaultMaps.get(m, other, same)).toBe(defaultMaps.get(base, other, same));
        }
      }
    }
  });
});
