/**
 * BDD backend: booleans are single diagrams and fixed-width integers are
 * vectors of diagrams, most significant bit first. Arithmetic is built from
 * gates, so only booleans, integers and composites of those are supported.
 */

import { CapabilityError, ModelingError } from "../../errors";
import type { Expr } from "../../expr";
import type { Type } from "../../types";
import { Value, boolVal, intVal, requireValueType } from "../../value";
import { checkMapNesting } from "../../maps/symbolic-map";
import { BackendSession, LeafDecl, SessionOptions, SolverBackend, unsupportedType } from "../backend";
import { Bdd, BddManager, FALSE, TRUE } from "./bdd";

export type BddTerm = { readonly kind: "bool"; readonly node: Bdd } | { readonly kind: "bits"; readonly bits: readonly Bdd[] };

const boolTerm = (node: Bdd): BddTerm => ({ kind: "bool", node });
const bitsTerm = (bits: readonly Bdd[]): BddTerm => ({ kind: "bits", bits });

function widthOf(t: Type): number {
  if (t.kind !== "int") throw unsupportedType("bdd", t);
  return t.bits;
}

function unsupportedOp(op: string): CapabilityError {
  return new CapabilityError("bdd", `operation ${op} is not supported`);
}

export class BddBackend implements SolverBackend<BddTerm> {
  readonly name = "bdd";
  readonly manager = new BddManager();

  checkType(t: Type): void {
    switch (t.kind) {
      case "bool":
      case "int":
      case "object":
      case "option":
        return;
      case "map":
      case "defaultMap":
        checkMapNesting("bdd", t);
        return;
      default:
        throw unsupportedType("bdd", t);
    }
  }

  checkNode(e: Expr): void {
    if (e.tag === "regexMatch" || e.tag === "charToString") throw unsupportedOp(e.tag);
  }

  private bool(t: BddTerm): Bdd {
    if (t.kind !== "bool") throw new ModelingError("Expected a boolean diagram");
    return t.node;
  }

  private bits(t: BddTerm): readonly Bdd[] {
    if (t.kind !== "bits") throw new ModelingError("Expected a bit vector");
    return t.bits;
  }

  /**
   * Booleans first, then the bits of same-width integers interleaved so that
   * bits of equal significance sit next to each other.
   */
  declare(leaves: readonly LeafDecl[]): BddTerm[] {
    const m = this.manager;
    const terms: (BddTerm | undefined)[] = leaves.map(() => undefined);
    const byWidth = new Map<number, number[]>();

    leaves.forEach(({ type }, i) => {
      if (type.kind === "bool") {
        terms[i] = boolTerm(m.newVariable());
      } else {
        const width = widthOf(type);
        const group = byWidth.get(width) ?? [];
        group.push(i);
        byWidth.set(width, group);
      }
    });

    for (const [width, group] of byWidth) {
      const bits = group.map((): Bdd[] => []);
      for (let bit = 0; bit < width; bit++) {
        bits.forEach((vector) => vector.push(m.newVariable()));
      }
      group.forEach((leafIndex, j) => {
        terms[leafIndex] = bitsTerm(bits[j]);
      });
    }

    return terms.map((t, i) => {
      if (t === undefined) throw unsupportedType("bdd", leaves[i].type);
      return t;
    });
  }

  constant(v: Value, t: Type): BddTerm {
    if (t.kind === "bool" && v.tag === "bool") return boolTerm(v.value ? TRUE : FALSE);
    if (t.kind === "int" && v.tag === "int") {
      const unsigned = BigInt.asUintN(t.bits, v.value);
      const bits: Bdd[] = [];
      for (let j = t.bits - 1; j >= 0; j--) {
        bits.push((unsigned >> BigInt(j)) & 1n ? TRUE : FALSE);
      }
      return bitsTerm(bits);
    }
    requireValueType(v, t, "BDD constant");
    throw unsupportedType("bdd", t);
  }

  not(a: BddTerm): BddTerm {
    return boolTerm(this.manager.not(this.bool(a)));
  }

  and(a: BddTerm, b: BddTerm): BddTerm {
    return boolTerm(this.manager.and(this.bool(a), this.bool(b)));
  }

  or(a: BddTerm, b: BddTerm): BddTerm {
    return boolTerm(this.manager.or(this.bool(a), this.bool(b)));
  }

  ite(cond: BddTerm, a: BddTerm, b: BddTerm): BddTerm {
    const m = this.manager;
    const c = this.bool(cond);
    if (a.kind === "bool") return boolTerm(m.ite(c, a.node, this.bool(b)));
    const ys = this.bits(b);
    return bitsTerm(a.bits.map((x, i) => m.ite(c, x, ys[i])));
  }

  eq(a: BddTerm, b: BddTerm): BddTerm {
    const m = this.manager;
    if (a.kind === "bool") return boolTerm(m.iff(a.node, this.bool(b)));
    const ys = this.bits(b);
    return boolTerm(a.bits.reduce((acc, x, i) => m.and(acc, m.iff(x, ys[i])), TRUE));
  }

  /** Unsigned less-than, decided by the most significant differing bit */
  private unsignedLess(a: readonly Bdd[], b: readonly Bdd[]): Bdd {
    const m = this.manager;
    let result = FALSE;
    for (let i = a.length - 1; i >= 0; i--) {
      result = m.ite(m.iff(a[i], b[i]), result, b[i]);
    }
    return result;
  }

  /** Signed order is unsigned order with the sign bits flipped */
  private less(a: BddTerm, b: BddTerm, t: Type): Bdd {
    const m = this.manager;
    const xs = this.bits(a);
    const ys = this.bits(b);
    if (t.kind === "int" && t.signed) {
      return this.unsignedLess([m.not(xs[0]), ...xs.slice(1)], [m.not(ys[0]), ...ys.slice(1)]);
    }
    return this.unsignedLess(xs, ys);
  }

  lt(a: BddTerm, b: BddTerm, t: Type): BddTerm {
    return boolTerm(this.less(a, b, t));
  }

  le(a: BddTerm, b: BddTerm, t: Type): BddTerm {
    return boolTerm(this.manager.not(this.less(b, a, t)));
  }

  /** Ripple-carry addition, truncated to the operand width */
  private addBits(a: readonly Bdd[], b: readonly Bdd[], carryIn: Bdd): Bdd[] {
    const m = this.manager;
    const sum: Bdd[] = new Array<Bdd>(a.length).fill(FALSE);
    let carry = carryIn;
    for (let i = a.length - 1; i >= 0; i--) {
      const half = m.xor(a[i], b[i]);
      sum[i] = m.xor(half, carry);
      carry = m.or(m.and(a[i], b[i]), m.and(carry, half));
    }
    return sum;
  }

  add(a: BddTerm, b: BddTerm): BddTerm {
    return bitsTerm(this.addBits(this.bits(a), this.bits(b), FALSE));
  }

  sub(a: BddTerm, b: BddTerm): BddTerm {
    const m = this.manager;
    return bitsTerm(this.addBits(this.bits(a), this.bits(b).map((x) => m.not(x)), TRUE));
  }

  /** Shift-and-add over the bits of the right operand */
  mul(a: BddTerm, b: BddTerm): BddTerm {
    const m = this.manager;
    const xs = this.bits(a);
    const ys = this.bits(b);
    const width = xs.length;
    let product: Bdd[] = new Array<Bdd>(width).fill(FALSE);
    for (let shift = 0; shift < width; shift++) {
      const multiplierBit = ys[width - 1 - shift];
      if (multiplierBit === FALSE) continue;
      const partial = xs.map((_, j) => (j + shift < width ? m.and(xs[j + shift], multiplierBit) : FALSE));
      product = this.addBits(product, partial, FALSE);
    }
    return bitsTerm(product);
  }

  private bitwise(a: BddTerm, b: BddTerm, op: (x: Bdd, y: Bdd) => Bdd): BddTerm {
    const ys = this.bits(b);
    return bitsTerm(this.bits(a).map((x, i) => op(x, ys[i])));
  }

  bitAnd(a: BddTerm, b: BddTerm): BddTerm {
    return this.bitwise(a, b, (x, y) => this.manager.and(x, y));
  }

  bitOr(a: BddTerm, b: BddTerm): BddTerm {
    return this.bitwise(a, b, (x, y) => this.manager.or(x, y));
  }

  bitXor(a: BddTerm, b: BddTerm): BddTerm {
    return this.bitwise(a, b, (x, y) => this.manager.xor(x, y));
  }

  bitNot(a: BddTerm): BddTerm {
    return bitsTerm(this.bits(a).map((x) => this.manager.not(x)));
  }

  /** Keep the low bits, or pad with the sign bit (signed) or zeros */
  cast(a: BddTerm, from: Type, to: Type): BddTerm {
    const xs = this.bits(a);
    const width = widthOf(to);
    if (width <= xs.length) return bitsTerm(xs.slice(xs.length - width));
    const fill = from.kind === "int" && from.signed ? xs[0] : FALSE;
    return bitsTerm([...new Array<Bdd>(width - xs.length).fill(fill), ...xs]);
  }

  count(indicators: readonly BddTerm[]): BddTerm {
    let total: Bdd[] = new Array<Bdd>(32).fill(FALSE);
    for (const indicator of indicators) {
      const one: Bdd[] = new Array<Bdd>(32).fill(FALSE);
      one[31] = this.bool(indicator);
      total = this.addBits(total, one, FALSE);
    }
    return bitsTerm(total);
  }

  unit(): BddTerm {
    throw unsupportedOp("unit");
  }

  concat(): BddTerm {
    throw unsupportedOp("concat");
  }

  length(): BddTerm {
    throw unsupportedOp("length");
  }

  slice(): BddTerm {
    throw unsupportedOp("slice");
  }

  at(): BddTerm {
    throw unsupportedOp("at");
  }

  indexOf(): BddTerm {
    throw unsupportedOp("indexOf");
  }

  contains(): BddTerm {
    throw unsupportedOp("contains");
  }

  startsWith(): BddTerm {
    throw unsupportedOp("startsWith");
  }

  endsWith(): BddTerm {
    throw unsupportedOp("endsWith");
  }

  replaceFirst(): BddTerm {
    throw unsupportedOp("replaceFirst");
  }

  regexMatch(): BddTerm {
    throw unsupportedOp("regexMatch");
  }

  charToString(): BddTerm {
    throw unsupportedOp("charToString");
  }

  openSession(options: SessionOptions): BackendSession<BddTerm> {
    return new BddSession(this.manager, options);
  }
}

class BddSession implements BackendSession<BddTerm> {
  private constraint: Bdd = TRUE;
  private assignment = new Map<number, boolean>();

  constructor(
    private readonly manager: BddManager,
    private readonly options: SessionOptions
  ) {}

  assert(constraint: BddTerm): void {
    if (constraint.kind !== "bool") throw new ModelingError("Assertions must be boolean");
    this.constraint = this.manager.and(this.constraint, constraint.node);
  }

  async check(): Promise<boolean> {
    const assignment = this.manager.satOne(this.constraint);
    if (this.options.debug) {
      console.debug(
        `[bdd] ${assignment === undefined ? "unsat" : "sat"}; ` +
          `${this.manager.nodeCount} nodes over ${this.manager.variableCount} variables`
      );
    }
    this.assignment = assignment ?? new Map();
    return assignment !== undefined;
  }

  value(term: BddTerm, type: Type): Value {
    const m = this.manager;
    if (term.kind === "bool") return boolVal(m.evaluate(term.node, this.assignment));
    let n = 0n;
    for (const bit of term.bits) {
      n = (n << 1n) | (m.evaluate(bit, this.assignment) ? 1n : 0n);
    }
    if (type.kind !== "int") throw unsupportedType("bdd", type);
    return intVal(type.signed ? BigInt.asIntN(type.bits, n) : n);
  }

  release(): void {
    this.assignment = new Map();
  }
}
