/**
 * SMT Solving Tests
 *
 * End-to-end queries through z3. Every model found is checked against the
 * interpreter.
 */
import { describe, it, expect, afterAll } from "vitest";

import {
  BoundExceededError,
  int32Type,
  int8Type,
  byteType,
  ushortType,
  bigintType,
  setType,
  charType,
  stringType,
  seqType,
  objectType,
  optionType,
  mapType,
  defaultMapType,
  trueVal,
  intVal,
  charVal,
  stringVal,
  someVal,
  evaluate,
  variable,
  int,
  bigint,
  str,
  and,
  not,
  eq,
  neq,
  lt,
  le,
  add,
  mul,
  getField,
  isSome,
  optionValue,
  length,
  indexOf,
  startsWith,
  contains,
  unit,
  matchesRegex,
  charToString,
  mapGet,
  some,
  defaultMapEmpty,
  defaultMapSet,
  defaultMapGet,
  defaultMapCount,
  cast,
  setContains,
  setSize,
  setUnion,
  setIntersect,
  setDifference,
  solve,
  findFirst,
  findAll,
  isValid,
  take,
  shutdownSmtEngine,
  RegexAutomaton,
} from "../src";
import type { Expr, Model } from "../src";

afterAll(async () => {
  await shutdownSmtEngine();
});

function holds(expr: Expr, model: Model): boolean {
  return evaluate(expr, model.bindings) === trueVal;
}

async function satisfy(expr: Expr): Promise<Model> {
  const model = await findFirst(expr);
  if (model === undefined) throw new Error("expected a model");
  expect(holds(expr, model)).toBe(true);
  return model;
}

describe("Default-valued maps", () => {
  const m = variable("m", defaultMapType(int32Type, int32Type));
  const empty = defaultMapEmpty(int32Type, int32Type);

  it("finds no map that stays empty after a non-default write", async () => {
    const solution = await solve(eq(defaultMapSet(m, int(1), int(10)), empty));
    expect(solution.satisfiable).toBe(false);
  });

  it("finds the missing entry of a map", async () => {
    const target = defaultMapSet(defaultMapSet(empty, int(1), int(10)), int(2), int(20));
    const model = await satisfy(eq(defaultMapSet(m, int(1), int(10)), target));
    expect(evaluate(defaultMapGet(m, int(2)), model.bindings)).toEqual(intVal(20));
  });

  it("solves for the size of a map", async () => {
    const model = await satisfy(and(eq(defaultMapCount(m), int(2)), eq(defaultMapGet(m, int(7)), int(3))));
    expect(evaluate(defaultMapCount(m), model.bindings)).toEqual(intVal(2));
    expect(evaluate(defaultMapGet(m, int(7)), model.bindings)).toEqual(intVal(3));
  });

  it("reports sizes beyond the modeled entries instead of unsat", async () => {
    const four = eq(defaultMapCount(m), int(4));
    await expect(solve(four)).rejects.toThrow(BoundExceededError);
    const model = await findFirst(four, { mapDepth: 4 });
    expect(model === undefined ? undefined : evaluate(four, model.bindings)).toEqual(trueVal);
  });

  it("does not prove size bounds it cannot check", async () => {
    const atMostThree = le(defaultMapCount(m), int(3));
    await expect(isValid(atMostThree)).rejects.toThrow(BoundExceededError);
    expect(await isValid(atMostThree, { mapDepth: 4 })).toBe(false);
  });

  it("models every key the query reads", async () => {
    const target = [1, 2, 3, 4, 5].reduce(
      (acc: Expr, k) => defaultMapSet(acc, int(k), int(k * 10)),
      defaultMapEmpty(int32Type, int32Type)
    );
    const expr = eq(defaultMapSet(m, int(1), int(10)), target);
    const solution = await solve(expr, { mapDepth: 0 });
    expect(solution.satisfiable).toBe(true);
    expect(holds(expr, solution.model)).toBe(true);
    expect(evaluate(defaultMapGet(m, int(5)), solution.model.bindings)).toEqual(intVal(50));
  });
});

describe("Casts", () => {
  it("solves through a narrowing cast", async () => {
    const x = variable("x", int32Type);
    const model = await satisfy(and(eq(cast(x, byteType), int(200, byteType)), lt(x, int(0))));
    expect(evaluate(cast(x, byteType), model.bindings)).toEqual(intVal(200));
  });

  it("proves widening keeps the value", async () => {
    const b = variable("b", byteType);
    const u = variable("u", ushortType);
    const i = variable("i", int8Type);
    expect(await isValid(eq(cast(cast(b, int32Type), byteType), b))).toBe(true);
    expect(await isValid(le(cast(u, int32Type), int(65535)))).toBe(true);
    expect(await isValid(le(cast(i, bigintType), bigint(127)))).toBe(true);
    expect(await isValid(le(bigint(-128), cast(i, bigintType)))).toBe(true);
    expect(await isValid(le(cast(i, byteType), int(127, byteType)))).toBe(false);
  });

  it("narrows unbounded integers", async () => {
    const n = variable("n", bigintType);
    const model = await satisfy(and(eq(cast(n, int8Type), int(-1, int8Type)), lt(bigint(1000), n)));
    expect(evaluate(cast(n, int8Type), model.bindings)).toEqual(intVal(-1));
  });
});

describe("Sets", () => {
  const s = variable("s", setType(int32Type));
  const t = variable("t", setType(int32Type));

  it("proves identities of set combinations", async () => {
    expect(await isValid(eq(setDifference(setUnion(s, t), t), setDifference(s, t)))).toBe(true);
    expect(await isValid(eq(setIntersect(s, t), setIntersect(t, s)))).toBe(true);
    expect(await isValid(eq(setUnion(s, t), s))).toBe(false);
  });

  it("solves for members and sizes", async () => {
    const expr = and(
      and(setContains(setIntersect(s, t), int(5)), not(setContains(s, int(6)))),
      eq(setSize(setUnion(s, t)), int(3))
    );
    const model = await satisfy(expr);
    expect(evaluate(setSize(setUnion(s, t)), model.bindings)).toEqual(intVal(3));
  });
});

describe("Strings", () => {
  const s = variable("s", stringType);

  it("enumerates strings accepted by a pattern", async () => {
    const models = await take(findAll(matchesRegex(s, "a+b+")), 5);
    expect(models).toHaveLength(5);
    const automaton = RegexAutomaton.fromPattern("a+b+");
    const words = models.map((model) => {
      const v = model.get(s);
      return v.tag === "string" ? v.value : "";
    });
    for (const word of words) expect(automaton.accepts(word)).toBe(true);
    expect(new Set(words).size).toBe(5);
  });

  it("solves prefix and length constraints", async () => {
    const model = await satisfy(and(startsWith(s, str("ab")), eq(length(s), bigint(4))));
    const v = model.get(s);
    expect(v.tag === "string" && v.value.startsWith("ab")).toBe(true);
  });

  it("agrees with the interpreter on indexOf", async () => {
    await satisfy(and(eq(indexOf(s, str("x"), 1), bigint(2)), eq(length(s), bigint(3))));
  });

  it("reads non-ASCII characters back", async () => {
    const model = await satisfy(eq(s, str("é😀\"")));
    expect(model.get(s)).toEqual(stringVal('é😀"'));
  });

  it("solves for characters", async () => {
    const c = variable("c", charType);
    const model = await satisfy(eq(charToString(c), str("é")));
    expect(model.get(c)).toEqual(charVal("é"));
  });
});

describe("Numbers and composites", () => {
  it("solves unbounded integers", async () => {
    const x = variable("x", bigintType);
    const model = await satisfy(and(eq(mul(x, x), bigint(49)), lt(x, bigint(0))));
    expect(model.get(x)).toEqual(intVal(-7));
  });

  it("solves over records and options", async () => {
    const point = objectType("Point", [["x", int32Type], ["y", int32Type]]);
    const p = variable("p", point);
    const o = variable("o", optionType(int32Type));
    await satisfy(
      and(
        and(eq(add(getField(p, "x"), getField(p, "y")), int(10)), lt(getField(p, "y"), getField(p, "x"))),
        and(isSome(o), eq(optionValue(o), getField(p, "y")))
      )
    );
  });

  it("solves over general maps", async () => {
    const m = variable("m", mapType(int32Type, stringType));
    const model = await satisfy(and(eq(mapGet(m, int(3)), some(str("x"))), neq(mapGet(m, int(4)), some(str("x")))));
    expect(evaluate(mapGet(m, int(3)), model.bindings)).toEqual(someVal(stringVal("x")));
  });

  it("solves over integer sequences", async () => {
    const q = variable("q", seqType(int32Type));
    await satisfy(and(eq(length(q), bigint(2)), contains(q, unit(int(5)))));
  });

  it("enumerates distinct models", async () => {
    const x = variable("x", int32Type);
    const expr = and(lt(int(0), x), lt(x, int(4)));
    const values: bigint[] = [];
    for await (const model of findAll(expr)) {
      const v = model.get(x);
      if (v.tag === "int") values.push(v.value);
    }
    expect(values.sort()).toEqual([1n, 2n, 3n]);
  });
});

describe("Validity", () => {
  const x = variable("x", int32Type);

  it("proves commutativity of wrapped addition", async () => {
    expect(await isValid(eq(add(x, int(1)), add(int(1), x)))).toBe(true);
  });

  it("finds the overflow counterexample", async () => {
    expect(await isValid(lt(x, add(x, int(1))))).toBe(false);
  });
});
