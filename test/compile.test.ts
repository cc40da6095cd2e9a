/**
 * Compiler Tests
 *
 * Generated JavaScript must agree with the interpreter on every input.
 */
import { describe, it, expect } from "vitest";

import {
  ModelingError,
  boolType,
  int32Type,
  byteType,
  bigintType,
  stringType,
  charType,
  objectType,
  optionType,
  seqType,
  mapType,
  defaultMapType,
  trueVal,
  falseVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  someVal,
  noneVal,
  objectVal,
  mapVal,
  defaultMapVal,
  valueEquals,
  valueToString,
  evaluate,
  compile,
  variable,
  int,
  bigint,
  str,
  and,
  or,
  not,
  eq,
  lt,
  le,
  add,
  sub,
  mul,
  bitXor,
  bitNot,
  ifThenElse,
  createObject,
  getField,
  withField,
  optionValue,
  isSome,
  some,
  concat,
  length,
  slice,
  at,
  indexOf,
  contains,
  endsWith,
  replaceFirst,
  matchesRegex,
  charToString,
  unit,
  mapSet,
  mapGet,
  mapDelete,
  defaultMapSet,
  defaultMapGet,
  defaultMapCount,
  int8Type,
  ushortType,
  ulongType,
  setType,
  cast,
  setOf,
  setAdd,
  setContains,
  setSize,
  setUnion,
  setIntersect,
  setDifference,
} from "../src";
import type { Bindings, Expr, Value } from "../src";

function agree(expr: Expr, cases: readonly Bindings[]): void {
  const compiled = compile(expr);
  for (const bindings of cases) {
    const expected = evaluate(expr, bindings);
    const actual = compiled.evaluate(bindings);
    expect(valueEquals(actual, expected), `${valueToString(actual)} vs ${valueToString(expected)}`).toBe(true);
  }
}

describe("Compiled evaluation", () => {
  it("agrees on wrapped arithmetic", () => {
    const x = variable("x", int32Type);
    const y = variable("y", int32Type);
    const e = sub(mul(add(x, y), int(3)), bitXor(x, bitNot(y)));
    const samples = [0, 1, -1, 2147483647, -2147483648, 123456];
    agree(
      e,
      samples.flatMap((a) => samples.map((b) => ({ x: intVal(a), y: intVal(b) })))
    );
  });

  it("agrees on unsigned bytes", () => {
    const b = variable("b", byteType);
    agree(add(b, int(200, byteType)), [{ b: intVal(0) }, { b: intVal(55) }, { b: intVal(56) }, { b: intVal(255) }]);
  });

  it("agrees on bigints and comparisons", () => {
    const n = variable("n", bigintType);
    const e = ifThenElse(lt(n, bigint(0)), sub(bigint(0), n), mul(n, n));
    agree(e, [{ n: intVal(-5) }, { n: intVal(0) }, { n: intVal(1n << 70n) }]);
  });

  it("agrees on logic", () => {
    const p = variable("p", boolType);
    const q = variable("q", boolType);
    const e = or(and(p, not(q)), eq(p, q));
    agree(
      e,
      [trueVal, falseVal].flatMap((a) => [trueVal, falseVal].map((b) => ({ p: a, q: b })))
    );
  });

  it("agrees on string operations", () => {
    const s = variable("s", stringType);
    const t = variable("t", stringType);
    const e = and(
      eq(indexOf(s, t, 1), bigint(2)),
      or(contains(concat(s, t), str("😀")), endsWith(replaceFirst(s, t, str("!")), str("!")))
    );
    const words = ["", "a", "xaa", "a😀a", "banana", "na"];
    agree(
      e,
      words.flatMap((a) => words.map((b) => ({ s: stringVal(a), t: stringVal(b) })))
    );
  });

  it("returns strings and lengths", () => {
    const s = variable("s", stringType);
    const e = concat(slice(s, 1, 2), at(s, 0));
    agree(e, [{ s: stringVal("") }, { s: stringVal("hello") }, { s: stringVal("😀b😀") }]);
    agree(length(s), [{ s: stringVal("héllo") }]);
    expect(compile(e).evaluate({ s: stringVal("hello") })).toEqual(stringVal("elh"));
  });

  it("agrees on regex matches", () => {
    const s = variable("s", stringType);
    agree(matchesRegex(s, "a+b+"), ["", "ab", "aab", "ba", "abc"].map((w) => ({ s: stringVal(w) })));
  });

  it("agrees on characters", () => {
    const c = variable("c", charType);
    agree(charToString(c), [{ c: charVal("q") }, { c: charVal(0x1f600) }]);
    agree(le(c, variable("d", charType)), [{ c: charVal("a"), d: charVal("b") }]);
  });

  it("agrees on sequences", () => {
    const s = variable("s", seqType(int32Type));
    const e = concat(slice(s, 1, 5), unit(int(9)));
    agree(e, [{ s: seqVal([]) }, { s: seqVal([intVal(1), intVal(2), intVal(3)]) }]);
  });

  it("agrees on records and options", () => {
    const point = objectType("Point", [["x", int32Type], ["y", int32Type]]);
    const pt = variable("pt", point);
    const o = variable("o", optionType(point));
    const e = ifThenElse(isSome(o), withField(optionValue(o), "y", getField(pt, "x")), pt);
    const p1 = objectVal({ x: intVal(1), y: intVal(2) });
    agree(e, [
      { pt: p1, o: noneVal },
      { pt: p1, o: someVal(objectVal({ x: intVal(5), y: intVal(6) })) },
    ]);
    agree(some(getField(pt, "y")), [{ pt: p1 }]);
  });

  it("keeps a field named __proto__ as an own field", () => {
    const odd = objectType("Odd", [["__proto__", int32Type], ["y", int32Type]]);
    const x = variable("x", int32Type);
    const built = createObject(odd, Object.fromEntries([["__proto__", add(x, int(1))], ["y", x]] as const));
    const expected = objectVal(new Map([["__proto__", intVal(2)], ["y", intVal(1)]]));
    expect(compile(built).evaluate({ x: intVal(1) })).toEqual(expected);
    expect(compile(built).source).toContain('["__proto__"]: ');

    const r = variable("r", odd);
    const bound = objectVal(new Map([["__proto__", intVal(5)], ["y", intVal(6)]]));
    agree(getField(r, "__proto__"), [{ r: bound }]);
    agree(withField(r, "__proto__", getField(r, "y")), [{ r: bound }]);
    expect(compile(withField(r, "__proto__", int(9))).evaluate({ r: bound })).toEqual(
      objectVal(new Map([["__proto__", intVal(9)], ["y", intVal(6)]]))
    );
  });

  it("agrees on general maps", () => {
    const m = variable("m", mapType(int32Type, stringType));
    const k = variable("k", int32Type);
    const e = mapGet(mapDelete(mapSet(m, int(1), str("one")), int(2)), k);
    const stored = mapVal([
      [intVal(2), stringVal("two")],
      [intVal(3), stringVal("three")],
    ]);
    agree(e, [1, 2, 3, 4].map((n) => ({ m: stored, k: intVal(n) })));
  });

  it("agrees on default-valued maps", () => {
    const m = variable("m", defaultMapType(int32Type, int32Type));
    const updated = defaultMapSet(defaultMapSet(m, int(1), int(10)), int(2), int(0));
    const base = defaultMapVal(intVal(0), [
      [intVal(2), intVal(5)],
      [intVal(3), intVal(7)],
    ]);
    agree(defaultMapCount(updated), [{ m: base }, { m: defaultMapVal(intVal(0)) }]);
    agree(defaultMapGet(updated, int(3)), [{ m: base }]);
    agree(eq(updated, m), [{ m: base }, { m: defaultMapVal(intVal(0), [[intVal(1), intVal(10)]]) }]);
    expect(compile(defaultMapCount(updated)).evaluate({ m: base })).toEqual(intVal(2));
  });
});

describe("Compiled casts and sets", () => {
  it("agrees on integer casts", () => {
    const x = variable("x", int32Type);
    const samples = [0, 1, -1, 127, 128, 255, 256, 65535, -32768, 2147483647, -2147483648].map((n) => ({
      x: intVal(n),
    }));
    agree(cast(x, int8Type), samples);
    agree(cast(x, byteType), samples);
    agree(cast(x, ushortType), samples);
    agree(cast(x, ulongType), samples);
    agree(cast(x, bigintType), samples);
    agree(cast(cast(x, byteType), int32Type), samples);
    const n = variable("n", bigintType);
    agree(cast(n, int32Type), [{ n: intVal(1n << 40n) }, { n: intVal((1n << 31n) + 5n) }, { n: intVal(-3) }]);
    expect(compile(cast(x, ulongType)).evaluate({ x: intVal(-1) })).toEqual(intVal(18446744073709551615n));
  });

  it("agrees on set combinations", () => {
    const s = variable("s", setType(int32Type));
    const t = variable("t", setType(int32Type));
    const k = variable("k", int32Type);
    const pair = defaultMapVal(falseVal, [
      [intVal(1), trueVal],
      [intVal(2), trueVal],
    ]);
    const cases = [
      { s: pair, t: defaultMapVal(falseVal) },
      { s: pair, t: defaultMapVal(falseVal, [[intVal(2), trueVal], [intVal(3), trueVal]]) },
    ];
    for (const combined of [setUnion(s, t), setIntersect(s, t), setDifference(s, t)]) {
      agree(combined, cases);
      agree(setSize(combined), cases);
      agree(
        setContains(combined, k),
        cases.flatMap((c) => [1, 2, 3, 4].map((n) => ({ ...c, k: intVal(n) })))
      );
    }
    const grown = setUnion(setAdd(s, k), setOf(int32Type, [intVal(7)]));
    expect(compile(setSize(grown)).evaluate({ s: pair, k: intVal(9) })).toEqual(intVal(4));
  });
});

describe("Compiled functions", () => {
  it("takes positional arguments in free-variable order", () => {
    const x = variable("x", int32Type);
    const y = variable("y", int32Type);
    const compiled = compile(sub(x, y));
    expect(compiled.parameters).toEqual([x, y]);
    expect(compiled.evaluatePositional(intVal(10), intVal(3))).toEqual(intVal(7));
  });

  it("exposes the generated source", () => {
    const x = variable("x", int32Type);
    const { source } = compile(add(x, int(1)));
    expect(source).toContain("BigInt.asIntN(32");
  });

  it("rejects missing and ill-typed arguments", () => {
    const x = variable("x", int32Type);
    const compiled = compile(add(x, int(1)));
    expect(() => compiled.evaluate({})).toThrow(ModelingError);
    expect(() => compiled.evaluatePositional()).toThrow(ModelingError);
    const wrong: Value = stringVal("1");
    expect(() => compiled.evaluatePositional(wrong)).toThrow(ModelingError);
  });

  it("rejects two variables sharing a name", () => {
    const expr = and(variable("v", boolType), eq(variable("v", int32Type), int(1)));
    expect(() => compile(expr)).toThrow(ModelingError);
  });

  it("folds constant expressions to the same value", () => {
    const e = add(int(2147483647), int(1));
    expect(compile(e).evaluate()).toEqual(intVal(-2147483648));
  });
});
