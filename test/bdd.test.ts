/**
 * BDD Tests
 *
 * The decision-diagram manager and solving through the finite-domain backend.
 */
import { describe, it, expect, vi, afterEach } from "vitest";

import {
  BoundExceededError,
  CapabilityError,
  ModelingError,
  boolType,
  int32Type,
  int8Type,
  byteType,
  bigintType,
  setType,
  stringType,
  charType,
  objectType,
  optionType,
  defaultMapType,
  trueVal,
  intVal,
  defaultMapVal,
  evaluate,
  variable,
  int,
  str,
  and,
  or,
  not,
  eq,
  lt,
  add,
  mul,
  getField,
  isSome,
  optionValue,
  matchesRegex,
  defaultMapEmpty,
  defaultMapSet,
  defaultMapGet,
  defaultMapCount,
  cast,
  setAdd,
  setContains,
  setUnion,
  setIntersect,
  setDifference,
  emptySet,
  solve,
  findFirst,
  findAll,
  isValid,
  take,
} from "../src";
import type { Expr, Model } from "../src";
import { BddManager, FALSE, TRUE } from "../src/backends/bdd/bdd";
import { BddBackend } from "../src/backends/bdd/bdd-backend";

const bdd = { backend: "bdd" } as const;

async function collect(items: AsyncIterable<Model>): Promise<Model[]> {
  const models: Model[] = [];
  for await (const model of items) models.push(model);
  return models;
}

function holds(expr: Expr, model: Model): boolean {
  return evaluate(expr, model.bindings) === trueVal;
}

describe("BddManager", () => {
  it("keeps diagrams canonical", () => {
    const m = new BddManager();
    const a = m.newVariable();
    const b = m.newVariable();
    expect(m.and(a, b)).toBe(m.and(b, a));
    expect(m.or(a, m.not(a))).toBe(TRUE);
    expect(m.xor(a, a)).toBe(FALSE);
    expect(m.not(m.not(b))).toBe(b);
    expect(m.iff(a, b)).toBe(m.not(m.xor(a, b)));
  });

  it("evaluates under an assignment", () => {
    const m = new BddManager();
    const a = m.newVariable();
    const b = m.newVariable();
    const f = m.and(a, m.not(b));
    expect(m.evaluate(f, new Map([[0, true], [1, false]]))).toBe(true);
    expect(m.evaluate(f, new Map([[0, true], [1, true]]))).toBe(false);
    expect(m.evaluate(f, new Map([[0, true]]))).toBe(true);
  });

  it("finds a satisfying assignment", () => {
    const m = new BddManager();
    const a = m.newVariable();
    const b = m.newVariable();
    expect(m.variableOf(a)).toBe(0);
    expect(m.variableOf(b)).toBe(1);
    expect(m.satOne(m.and(a, m.not(b)))).toEqual(new Map([[0, true], [1, false]]));
    expect(m.satOne(FALSE)).toBeUndefined();
    expect(m.satOne(TRUE)).toEqual(new Map());
  });

  it("counts variables and nodes", () => {
    const m = new BddManager();
    m.newVariable();
    m.newVariable();
    expect(m.variableCount).toBe(2);
    expect(m.nodeCount).toBe(4);
  });
});

describe("Solving with BDDs", () => {
  const m = variable("m", defaultMapType(int32Type, int32Type));
  const empty = defaultMapEmpty(int32Type, int32Type);

  it("finds no map that stays empty after a non-default write", async () => {
    const solution = await solve(eq(defaultMapSet(m, int(1), int(10)), empty), bdd);
    expect(solution.satisfiable).toBe(false);
    expect(() => solution.model).toThrow(ModelingError);
  });

  it("finds the missing entry of a map", async () => {
    const target = defaultMapSet(defaultMapSet(empty, int(1), int(10)), int(2), int(20));
    const expr = eq(defaultMapSet(m, int(1), int(10)), target);
    const solution = await solve(expr, bdd);
    expect(solution.satisfiable).toBe(true);
    expect(evaluate(defaultMapGet(m, int(2)), solution.model.bindings)).toEqual(intVal(20));
    expect(holds(expr, solution.model)).toBe(true);
  });

  it("counts symbolic maps", async () => {
    const expr = and(eq(defaultMapCount(m), int(2)), eq(defaultMapGet(m, int(7)), int(3)));
    const model = await findFirst(expr, bdd);
    expect(model).toBeDefined();
    if (model !== undefined) {
      expect(holds(expr, model)).toBe(true);
    }
  });

  it("reports counted maps that need more entries than modeled", async () => {
    const small = variable("small", defaultMapType(byteType, byteType));
    const expr = eq(defaultMapCount(small), int(2));
    await expect(solve(expr, { ...bdd, mapDepth: 1 })).rejects.toThrow(BoundExceededError);
    expect((await solve(expr, { ...bdd, mapDepth: 2 })).satisfiable).toBe(true);
  });

  it("models as many entries as the query reads, whatever mapDepth is", async () => {
    const small = variable("small", defaultMapType(byteType, byteType));
    const reads = [1, 2, 3, 4].map((k) => eq(defaultMapGet(small, int(k, byteType)), int(k + 10, byteType)));
    const expr = reads.reduce(and);
    const solution = await solve(expr, { ...bdd, mapDepth: 0 });
    expect(solution.satisfiable).toBe(true);
    expect(holds(expr, solution.model)).toBe(true);
    expect(evaluate(defaultMapCount(small), solution.model.bindings)).toEqual(intVal(4));
  });

  it("rejects two variables sharing a name", async () => {
    const expr = and(eq(variable("v", byteType), int(1, byteType)), variable("v", boolType));
    await expect(solve(expr, bdd)).rejects.toThrow(ModelingError);
    expect(() => findAll(expr, bdd)).toThrow(ModelingError);
  });

  it("solves wrapped arithmetic", async () => {
    const x = variable("x", byteType);
    const expr = eq(mul(x, int(3, byteType)), int(9, byteType));
    const solution = await solve(expr, bdd);
    expect(solution.get(x)).toEqual(intVal(3));
  });

  it("solves signed comparisons", async () => {
    const x = variable("x", int32Type);
    const expr = and(lt(x, int(-5)), lt(int(-8), x));
    const values = (await collect(findAll(expr, bdd))).map((md) => md.get(x));
    expect(values).toHaveLength(2);
    expect(values).toContainEqual(intVal(-7));
    expect(values).toContainEqual(intVal(-6));
  });

  it("enumerates every model once", async () => {
    const p = variable("p", boolType);
    const q = variable("q", boolType);
    const models = await collect(findAll(or(p, q), bdd));
    expect(models.map((md) => md.toString()).sort()).toEqual([
      "p = false, q = true",
      "p = true, q = false",
      "p = true, q = true",
    ]);
  });

  it("restarts enumeration for each iteration", async () => {
    const x = variable("x", byteType);
    const all = findAll(lt(x, int(3, byteType)), bdd);
    expect(await take(all, 2)).toHaveLength(2);
    expect(await collect(all)).toHaveLength(3);
  });

  it("solves over records and options", async () => {
    const pair = objectType("Pair", [["a", byteType], ["b", byteType]]);
    const v = variable("v", pair);
    const o = variable("o", optionType(byteType));
    const expr = and(
      and(eq(add(getField(v, "a"), getField(v, "b")), int(10, byteType)), lt(getField(v, "b"), getField(v, "a"))),
      and(isSome(o), eq(optionValue(o), getField(v, "a")))
    );
    const model = await findFirst(expr, bdd);
    expect(model).toBeDefined();
    if (model !== undefined) {
      expect(holds(expr, model)).toBe(true);
    }
  });

  it("checks validity", async () => {
    const x = variable("x", byteType);
    expect(await isValid(eq(add(x, int(1, byteType)), add(int(1, byteType), x)), bdd)).toBe(true);
    expect(await isValid(lt(x, add(x, int(1, byteType))), bdd)).toBe(false);
    expect(await isValid(or(not(lt(x, int(5, byteType))), lt(x, int(6, byteType))), bdd)).toBe(true);
  });

  it("reads the default for maps it never constrains", async () => {
    const p = variable("p", boolType);
    const solution = await solve(p, bdd);
    expect(solution.get(m)).toEqual(defaultMapVal(intVal(0)));
  });
});

describe("Casts and sets with BDDs", () => {
  const b = variable("b", byteType);

  it("solves through casts", async () => {
    const solution = await solve(eq(cast(b, int8Type), int(-1, int8Type)), bdd);
    expect(solution.get(b)).toEqual(intVal(255));
    const i = variable("i", int8Type);
    const widened = await solve(eq(cast(i, int32Type), int(-3)), bdd);
    expect(widened.get(i)).toEqual(intVal(-3));
  });

  it("proves facts about casts", async () => {
    const i = variable("i", int8Type);
    expect(await isValid(eq(cast(cast(b, int32Type), byteType), b), bdd)).toBe(true);
    expect(await isValid(lt(cast(i, int32Type), int(128)), bdd)).toBe(true);
    expect(await isValid(lt(cast(b, int32Type), int(256)), bdd)).toBe(true);
    expect(await isValid(lt(cast(b, int8Type), int(0, int8Type)), bdd)).toBe(false);
  });

  it("rejects casts to bigint", () => {
    expect(() => findAll(eq(cast(b, bigintType), cast(b, bigintType)), bdd)).toThrow(CapabilityError);
  });

  it("combines sets", async () => {
    const s = variable("s", setType(byteType));
    const t = variable("t", setType(byteType));
    expect(await isValid(eq(setDifference(setUnion(s, t), t), setDifference(s, t)), bdd)).toBe(true);
    expect(await isValid(eq(setUnion(s, t), s), bdd)).toBe(false);
    const pair = setAdd(setAdd(emptySet(byteType), int(1, byteType)), int(2, byteType));
    const expr = and(eq(setIntersect(s, pair), pair), setContains(s, b));
    const model = await findFirst(and(expr, lt(int(2, byteType), b)), bdd);
    expect(model).toBeDefined();
    if (model !== undefined) {
      expect(holds(expr, model)).toBe(true);
      expect(evaluate(setContains(s, int(1, byteType)), model.bindings)).toEqual(trueVal);
    }
  });
});

describe("BDD capabilities", () => {
  it("rejects strings before solving", () => {
    const s = variable("s", stringType);
    expect(() => findAll(eq(s, str("a")), bdd)).toThrow(CapabilityError);
  });

  it("rejects strings through solve", async () => {
    const s = variable("s", stringType);
    await expect(solve(eq(s, str("a")), bdd)).rejects.toThrow(CapabilityError);
  });

  it("rejects characters and patterns", () => {
    const c = variable("c", charType);
    expect(() => findAll(lt(c, variable("d", charType)), bdd)).toThrow(CapabilityError);
    expect(() => findAll(matchesRegex(variable("s", stringType), "a"), bdd)).toThrow(CapabilityError);
  });

  it("reports the backend in capability errors", () => {
    try {
      findAll(eq(variable("s", stringType), str("a")), bdd);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CapabilityError);
      if (e instanceof CapabilityError) expect(e.backend).toBe("bdd");
    }
  });
});

describe("Enumeration sessions", () => {
  const x = variable("x", byteType);
  const few = lt(x, int(3, byteType));

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function countSessions(): { opened: number; released: number } {
    const counts = { opened: 0, released: 0 };
    const open = BddBackend.prototype.openSession;
    vi.spyOn(BddBackend.prototype, "openSession").mockImplementation(function (this: BddBackend, options) {
      const session = open.call(this, options);
      counts.opened++;
      const release = session.release.bind(session);
      session.release = () => {
        counts.released++;
        release();
      };
      return session;
    });
    return counts;
  }

  it("releases the session when iteration stops early", async () => {
    const counts = countSessions();
    const first = await take(findAll(few, bdd), 1);
    expect(first).toHaveLength(1);
    expect(counts).toEqual({ opened: 1, released: 1 });
    expect((await solve(eq(x, int(7, byteType)), bdd)).get(x)).toEqual(intVal(7));
    expect(counts).toEqual({ opened: 2, released: 2 });
  });

  it("releases the session when the models run out", async () => {
    const counts = countSessions();
    const values = (await collect(findAll(few, bdd))).map((md) => md.get(x));
    expect(values).toHaveLength(3);
    expect(counts).toEqual({ opened: 1, released: 1 });
  });

  it("releases the session when the consumer throws", async () => {
    const counts = countSessions();
    const consume = async (): Promise<void> => {
      for await (const model of findAll(few, bdd)) {
        throw new Error(`stopped at ${model.toString()}`);
      }
    };
    await expect(consume()).rejects.toThrow("stopped at x = ");
    expect(counts).toEqual({ opened: 1, released: 1 });
  });

  it("opens no session for an empty take", async () => {
    const counts = countSessions();
    expect(await take(findAll(few, bdd), 0)).toEqual([]);
    expect(counts).toEqual({ opened: 0, released: 0 });
  });
});
