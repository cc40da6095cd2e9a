/**
 * Symbolic evaluation: the interpreter's semantics, producing backend terms
 * instead of values.
 */

import { ModelingError } from "../errors";
import { Expr, UnaryExpr, BinaryExpr, TernaryExpr, exprToString } from "../expr";
import { Type, boolType, typeToString } from "../types";
import * as symbolicMaps from "../maps/symbolic-map";
import { membership } from "../maps/sets";
import { Symbolic, SymbolicAlgebra, SymbolicMap, leaf } from "./symbolic";
import type { SymbolicVariable } from "./variables";

export class SymbolicEvaluator<T> {
  private readonly cache = new Map<number, Symbolic<T>>();

  constructor(
    private readonly alg: SymbolicAlgebra<T>,
    variables: readonly SymbolicVariable<T>[]
  ) {
    for (const { variable, symbolic } of variables) {
      this.cache.set(variable.id, symbolic);
    }
  }

  private get backend() {
    return this.alg.backend;
  }

  evaluate(e: Expr): Symbolic<T> {
    const cached = this.cache.get(e.id);
    if (cached !== undefined) return cached;
    const result = this.compute(e);
    this.cache.set(e.id, result);
    return result;
  }

  /** The term of a scalar-valued expression */
  term(e: Expr): T {
    return this.alg.leafTerm(this.evaluate(e));
  }

  private compute(e: Expr): Symbolic<T> {
    switch (e.tag) {
      case "const":
        return this.alg.constant(e.value, e.type);

      case "var":
        throw new ModelingError(`Variable ${e.name}: ${typeToString(e.type)} was not declared`);

      case "if":
        return this.alg.ite(this.term(e.cond), this.evaluate(e.then), this.evaluate(e.else));

      case "createObject": {
        const t = e.type;
        if (t.kind !== "object") throw mistyped(e);
        const fields = new Map<string, Symbolic<T>>();
        t.fields.forEach((f, i) => fields.set(f.name, this.evaluate(e.fields[i])));
        return { kind: "object", type: t, fields };
      }

      case "getField": {
        const o = this.evaluate(e.object);
        const field = o.kind === "object" ? o.fields.get(e.field) : undefined;
        if (field === undefined) throw mistyped(e);
        return field;
      }

      case "withField": {
        const o = this.evaluate(e.object);
        if (o.kind !== "object") throw mistyped(e);
        const fields = new Map(o.fields);
        fields.set(e.field, this.evaluate(e.value));
        return { ...o, fields };
      }

      case "regexMatch":
        return leaf(e.type, this.backend.regexMatch(this.term(e.operand), e.regex));

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

  private map(e: Expr): SymbolicMap<T> {
    const m = this.evaluate(e);
    if (m.kind !== "map") throw mistyped(e);
    return m;
  }

  private unary(e: UnaryExpr): Symbolic<T> {
    const b = this.backend;
    const t = e.operand.type;
    switch (e.tag) {
      case "not":
        return leaf(e.type, b.not(this.term(e.operand)));
      case "bitNot":
        return leaf(e.type, b.bitNot(this.term(e.operand), t));
      case "some":
        if (e.type.kind !== "option") throw mistyped(e);
        return { kind: "option", type: e.type, has: this.alg.true, value: this.evaluate(e.operand) };
      case "isSome": {
        const o = this.evaluate(e.operand);
        if (o.kind !== "option") throw mistyped(e);
        return leaf(e.type, o.has);
      }
      case "optionValue": {
        const o = this.evaluate(e.operand);
        if (o.kind !== "option") throw mistyped(e);
        return this.alg.ite(o.has, o.value, this.alg.defaultOf(e.type));
      }
      case "unit":
        return leaf(e.type, b.unit(this.term(e.operand), t));
      case "length":
        return leaf(e.type, b.length(this.term(e.operand), t));
      case "charToString":
        return leaf(e.type, b.charToString(this.term(e.operand)));
      case "defaultMapCount":
        return leaf(e.type, symbolicMaps.count(this.alg, this.map(e.operand)));
      case "cast":
        return leaf(e.type, b.cast(this.term(e.operand), t, e.type));
    }
  }

  private binary(e: BinaryExpr): Symbolic<T> {
    const b = this.backend;
    const t = e.left.type;
    const scalar = (op: (l: T, r: T, t: Type) => T): Symbolic<T> =>
      leaf(e.type, op.call(b, this.term(e.left), this.term(e.right), t));
    switch (e.tag) {
      case "and":
        return leaf(e.type, b.and(this.term(e.left), this.term(e.right)));
      case "or":
        return leaf(e.type, b.or(this.term(e.left), this.term(e.right)));
      case "eq":
        return leaf(e.type, this.alg.eq(this.evaluate(e.left), this.evaluate(e.right)));
      case "lt":
        return scalar(b.lt);
      case "le":
        return scalar(b.le);
      case "add":
        return scalar(b.add);
      case "sub":
        return scalar(b.sub);
      case "mul":
        return scalar(b.mul);
      case "bitAnd":
        return scalar(b.bitAnd);
      case "bitOr":
        return scalar(b.bitOr);
      case "bitXor":
        return scalar(b.bitXor);
      case "concat":
        return scalar(b.concat);
      case "at":
        return scalar(b.at);
      case "contains":
        return scalar(b.contains);
      case "startsWith":
        return scalar(b.startsWith);
      case "endsWith":
        return scalar(b.endsWith);
      case "mapGet":
      case "defaultMapGet":
        return symbolicMaps.get(this.alg, this.map(e.left), this.evaluate(e.right));
      case "mapDelete": {
        const m = this.map(e.left);
        return symbolicMaps.set(this.alg, m, this.evaluate(e.right), this.alg.defaultOf(symbolicMaps.storedType(m.type)));
      }
      case "setUnion":
      case "setIntersect":
      case "setDifference": {
        const op = e.tag;
        return symbolicMaps.combine(this.alg, this.map(e.left), this.map(e.right), (x, y) =>
          leaf(boolType, membership(op, this.alg.leafTerm(x), this.alg.leafTerm(y), b))
        );
      }
    }
  }

  private ternary(e: TernaryExpr): Symbolic<T> {
    const b = this.backend;
    const t = e.first.type;
    switch (e.tag) {
      case "slice":
        return leaf(e.type, b.slice(this.term(e.first), this.term(e.second), this.term(e.third), t));
      case "indexOf":
        return leaf(e.type, b.indexOf(this.term(e.first), this.term(e.second), this.term(e.third), t));
      case "replaceFirst":
        return leaf(e.type, b.replaceFirst(this.term(e.first), this.term(e.second), this.term(e.third), t));
      case "mapSet": {
        const m = this.map(e.first);
        const value = this.evaluate(e.third);
        const stored = symbolicMaps.storedType(m.type);
        if (stored.kind !== "option") throw mistyped(e);
        return symbolicMaps.set(this.alg, m, this.evaluate(e.second), {
          kind: "option",
          type: stored,
          has: this.alg.true,
          value,
        });
      }
      case "defaultMapSet":
        return symbolicMaps.set(this.alg, this.map(e.first), this.evaluate(e.second), this.evaluate(e.third));
    }
  }
}

function mistyped(e: Expr): ModelingError {
  return new ModelingError(`Ill-typed node in symbolic evaluation: ${exprToString(e)}`);
}
