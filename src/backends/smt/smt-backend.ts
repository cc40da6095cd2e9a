/**
 * SMT backend: leaf terms are SMT-LIB s-expressions checked by z3.
 *
 *   bool          Bool
 *   int(bits)     (_ BitVec bits)
 *   bigint, char  Int
 *   string        String
 *   seq(T)        (Seq T)
 *
 * Characters are integers constrained to the code point range.
 */

import { CapabilityError, EngineError } from "../../errors";
import type { Expr } from "../../expr";
import { Type, MAX_CHAR, isMapType, typeToString } from "../../types";
import {
  Value,
  boolVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  defaultValue,
  requireValueType,
} from "../../value";
import type { Regex } from "../../regex/ast";
import { checkMapNesting } from "../../maps/symbolic-map";
import { BackendSession, LeafDecl, SessionOptions, SolverBackend, isLeafType, unsupportedType } from "../backend";
import {
  SExpr,
  app,
  list,
  symbol,
  numeral,
  bitVector,
  stringLiteral,
  parseStringLiteral,
  isStringLiteral,
  printSExpr,
  modelDefinitions,
} from "./sexpr";
import { regexToSmt } from "./regex-to-smt";
import { Z3Session } from "./z3-engine";

const TRUE = "true";
const FALSE = "false";

export function sortOf(t: Type): SExpr {
  switch (t.kind) {
    case "bool":
      return "Bool";
    case "int":
      return list("_", "BitVec", String(t.bits));
    case "bigint":
    case "char":
      return "Int";
    case "string":
      return "String";
    case "seq":
      return list("Seq", sortOf(t.element));
    default:
      throw unsupportedType("smt", t);
  }
}

const isString = (t: Type): boolean => t.kind === "string";
const containsChar = (t: Type): boolean => t.kind === "char" || (t.kind === "seq" && containsChar(t.element));

/** Constraint keeping every character inside `term` in range */
function rangeAxiom(term: SExpr, t: Type, depth = 0): SExpr {
  if (t.kind === "char") return app("and", app("<=", "0", term), app("<=", term, String(MAX_CHAR)));
  if (t.kind !== "seq") return TRUE;
  const i = `i${depth}`;
  return app(
    "forall",
    list(list(i, "Int")),
    app(
      "=>",
      app("and", app("<=", "0", i), app("<", i, app("seq.len", term))),
      rangeAxiom(app("seq.nth", term, i), t.element, depth + 1)
    )
  );
}

export class SmtBackend implements SolverBackend<SExpr> {
  readonly name = "smt";
  private readonly declarations: string[] = [];
  private readonly axioms: SExpr[] = [];

  checkType(t: Type): void {
    if (t.kind === "seq" && !isLeafType(t.element)) {
      throw new CapabilityError("smt", `sequences of ${typeToString(t.element)} cannot be encoded`);
    }
    if (isMapType(t)) checkMapNesting("smt", t);
  }

  checkNode(_e: Expr): void {}

  declare(leaves: readonly LeafDecl[]): SExpr[] {
    return leaves.map(({ name, type }) => {
      const atom = symbol(name);
      this.declarations.push(printSExpr(list("declare-const", atom, sortOf(type))));
      if (containsChar(type)) this.axioms.push(rangeAxiom(atom, type));
      return atom;
    });
  }

  constant(v: Value, t: Type): SExpr {
    switch (t.kind) {
      case "bool":
        if (v.tag === "bool") return v.value ? TRUE : FALSE;
        break;
      case "int":
        if (v.tag === "int") return bitVector(v.value, t.bits);
        break;
      case "bigint":
        if (v.tag === "int") return numeral(v.value);
        break;
      case "char":
        if (v.tag === "char") return String(v.codePoint);
        break;
      case "string":
        if (v.tag === "string") return stringLiteral(v.value);
        break;
      case "seq":
        if (v.tag === "seq") {
          if (v.elements.length === 0) return list("as", "seq.empty", sortOf(t));
          const units = v.elements.map((e) => app("seq.unit", this.constant(e, t.element)));
          return units.length === 1 ? units[0] : app("seq.++", ...units);
        }
        break;
    }
    requireValueType(v, t, "SMT constant");
    throw unsupportedType("smt", t);
  }

  not(a: SExpr): SExpr {
    if (a === TRUE) return FALSE;
    if (a === FALSE) return TRUE;
    return app("not", a);
  }

  and(a: SExpr, b: SExpr): SExpr {
    if (a === FALSE || b === FALSE) return FALSE;
    if (a === TRUE) return b;
    if (b === TRUE) return a;
    return app("and", a, b);
  }

  or(a: SExpr, b: SExpr): SExpr {
    if (a === TRUE || b === TRUE) return TRUE;
    if (a === FALSE) return b;
    if (b === FALSE) return a;
    return app("or", a, b);
  }

  ite(cond: SExpr, a: SExpr, b: SExpr): SExpr {
    if (cond === TRUE || a === b) return a;
    if (cond === FALSE) return b;
    return app("ite", cond, a, b);
  }

  eq(a: SExpr, b: SExpr): SExpr {
    return a === b ? TRUE : app("=", a, b);
  }

  lt(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(t.kind === "int" ? (t.signed ? "bvslt" : "bvult") : "<", a, b);
  }

  le(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(t.kind === "int" ? (t.signed ? "bvsle" : "bvule") : "<=", a, b);
  }

  add(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(t.kind === "int" ? "bvadd" : "+", a, b);
  }

  sub(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(t.kind === "int" ? "bvsub" : "-", a, b);
  }

  mul(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(t.kind === "int" ? "bvmul" : "*", a, b);
  }

  bitAnd(a: SExpr, b: SExpr): SExpr {
    return app("bvand", a, b);
  }

  bitOr(a: SExpr, b: SExpr): SExpr {
    return app("bvor", a, b);
  }

  bitXor(a: SExpr, b: SExpr): SExpr {
    return app("bvxor", a, b);
  }

  bitNot(a: SExpr): SExpr {
    return app("bvnot", a);
  }

  cast(a: SExpr, from: Type, to: Type): SExpr {
    if (from.kind === "int" && to.kind === "int") {
      if (to.bits === from.bits) return a;
      if (to.bits < from.bits) return list(list("_", "extract", String(to.bits - 1), "0"), a);
      return list(list("_", from.signed ? "sign_extend" : "zero_extend", String(to.bits - from.bits)), a);
    }
    if (from.kind === "int") {
      const unsigned = app("bv2nat", a);
      if (!from.signed) return unsigned;
      const negative = app("bvslt", a, bitVector(0n, from.bits));
      return this.ite(negative, app("-", unsigned, numeral(1n << BigInt(from.bits))), unsigned);
    }
    if (to.kind === "int") return list(list("_", "int2bv", String(to.bits)), a);
    return a;
  }

  count(indicators: readonly SExpr[]): SExpr {
    const one = bitVector(1n, 32);
    const zero = bitVector(0n, 32);
    const terms = indicators.filter((c) => c !== FALSE).map((c) => this.ite(c, one, zero));
    if (terms.length === 0) return zero;
    return terms.length === 1 ? terms[0] : app("bvadd", ...terms);
  }

  unit(element: SExpr): SExpr {
    return app("seq.unit", element);
  }

  concat(a: SExpr, b: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.++" : "seq.++", a, b);
  }

  length(s: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.len" : "seq.len", s);
  }

  slice(s: SExpr, offset: SExpr, length: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.substr" : "seq.extract", s, offset, length);
  }

  at(s: SExpr, index: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.at" : "seq.at", s, index);
  }

  indexOf(s: SExpr, sub: SExpr, offset: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.indexof" : "seq.indexof", s, sub, offset);
  }

  contains(s: SExpr, sub: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.contains" : "seq.contains", s, sub);
  }

  startsWith(s: SExpr, prefix: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.prefixof" : "seq.prefixof", prefix, s);
  }

  endsWith(s: SExpr, suffix: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.suffixof" : "seq.suffixof", suffix, s);
  }

  replaceFirst(s: SExpr, sub: SExpr, replacement: SExpr, t: Type): SExpr {
    return app(isString(t) ? "str.replace" : "seq.replace", s, sub, replacement);
  }

  regexMatch(s: SExpr, regex: Regex): SExpr {
    return app("str.in_re", s, regexToSmt(regex));
  }

  charToString(c: SExpr): SExpr {
    return app("str.from_code", c);
  }

  openSession(options: SessionOptions): BackendSession<SExpr> {
    return new SmtSession(this.declarations, this.axioms, options);
  }
}

/**
 * Assertions are buffered and shipped to z3 on `check`, each batch preceded
 * by the declarations.
 */
class SmtSession implements BackendSession<SExpr> {
  private engine: Z3Session | undefined;
  private pending: SExpr[];
  private model = new Map<string, SExpr>();
  private released = false;

  constructor(
    private readonly declarations: readonly string[],
    axioms: readonly SExpr[],
    private readonly options: SessionOptions
  ) {
    this.pending = [...axioms];
  }

  assert(constraint: SExpr): void {
    this.pending.push(constraint);
  }

  async check(): Promise<boolean> {
    if (this.released) throw new EngineError("smt", "session already released");
    this.engine ??= await Z3Session.open(this.options.timeoutMs);
    const script = [...this.declarations, ...this.pending.map((a) => printSExpr(app("assert", a)))].join("\n");
    this.pending = [];
    if (this.options.debug) console.debug(`[smt] script\n${script}`);
    this.engine.load(script);
    const result = await this.engine.check();
    if (this.options.debug) console.debug(`[smt] ${result}`);
    this.model = result === "sat" ? modelDefinitions(this.engine.modelText()) : new Map();
    return result === "sat";
  }

  value(term: SExpr, type: Type): Value {
    if (typeof term !== "string" || !term.startsWith("|")) {
      throw new EngineError("smt", `cannot read ${printSExpr(term)} from a model`);
    }
    const definition = this.model.get(term.slice(1, -1));
    return definition === undefined ? defaultValue(type) : readModelValue(definition, type);
  }

  release(): void {
    this.released = true;
    this.engine?.release();
    this.engine = undefined;
  }
}

// ============================================================================
// Model Values
// ============================================================================

function integerOf(e: SExpr): bigint | undefined {
  if (typeof e === "string") {
    if (/^\d+$/.test(e)) return BigInt(e);
    if (/^#x[0-9a-fA-F]+$/.test(e)) return BigInt(`0x${e.slice(2)}`);
    if (/^#b[01]+$/.test(e)) return BigInt(`0b${e.slice(2)}`);
    return undefined;
  }
  if (e.length === 2 && e[0] === "-") {
    const n = integerOf(e[1]);
    return n === undefined ? undefined : -n;
  }
  const [underscore, bv] = e;
  if (e.length === 3 && underscore === "_" && typeof bv === "string" && bv.startsWith("bv")) {
    return BigInt(bv.slice(2));
  }
  return undefined;
}

function sequenceElements(e: SExpr): readonly SExpr[] | undefined {
  if (typeof e === "string") return undefined;
  if (e[0] === "as" && e[1] === "seq.empty") return [];
  if (e[0] === "seq.unit" && e.length === 2) return [e[1]];
  if (e[0] === "seq.++") {
    const parts: SExpr[] = [];
    for (const part of e.slice(1)) {
      const elements = sequenceElements(part);
      if (elements === undefined) return undefined;
      parts.push(...elements);
    }
    return parts;
  }
  return undefined;
}

export function readModelValue(e: SExpr, t: Type): Value {
  const fail = (): EngineError => new EngineError("smt", `unexpected model value ${printSExpr(e)} for ${typeToString(t)}`);
  switch (t.kind) {
    case "bool":
      if (e === TRUE || e === FALSE) return boolVal(e === TRUE);
      throw fail();
    case "int":
    case "bigint":
    case "char": {
      const n = integerOf(e);
      if (n === undefined) throw fail();
      if (t.kind === "char") return charVal(Number(n));
      return intVal(t.kind === "int" ? (t.signed ? BigInt.asIntN(t.bits, n) : BigInt.asUintN(t.bits, n)) : n);
    }
    case "string":
      if (isStringLiteral(e)) return stringVal(parseStringLiteral(e));
      throw fail();
    case "seq": {
      const elements = sequenceElements(e);
      if (elements === undefined) throw fail();
      return seqVal(elements.map((el) => readModelValue(el, t.element)));
    }
    default:
      throw unsupportedType("smt", t);
  }
}
