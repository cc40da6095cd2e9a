/**
 * Expression lowering.
 *
 * Turns an expression DAG into the body of a JavaScript function
 * `(rt, K, p0, p1, ...) => { ... }` where `rt` is the runtime helper table,
 * `K` the constant pool and `pN` the raw values of the free variables.
 * Nodes referenced more than once are bound to a `const` and reused.
 */

import { ModelingError } from "../errors";
import {
  Expr,
  VarExpr,
  UnaryExpr,
  BinaryExpr,
  TernaryExpr,
  children,
  exprToString,
  freeVariables,
  postOrder,
} from "../expr";
import type { Type } from "../types";
import { defaultValue } from "../value";
import { automatonFor } from "../regex/automaton";
import { Raw, toRaw } from "./runtime";
import {
  JSExpr,
  JSFunction,
  jsArray,
  jsBinop,
  jsConstant,
  jsGlobalCall,
  jsHelper,
  jsLit,
  jsLocal,
  jsMember,
  jsMethod,
  jsRecord,
  jsTernary,
  jsUnary,
} from "./js-ast";

export interface GeneratedFunction {
  /** Free variables, in parameter order after `rt` and `K` */
  readonly parameters: readonly VarExpr[];
  readonly parameterNames: readonly string[];
  /** Values referenced as `K[i]` */
  readonly constants: readonly unknown[];
  readonly function: JSFunction;
}

/** Types whose raw values compare with `===` */
function isPrimitive(t: Type): boolean {
  return t.kind === "bool" || t.kind === "int" || t.kind === "bigint" || t.kind === "char" || t.kind === "string";
}

const rt = jsHelper;

function unsupported(e: Expr): never {
  throw new ModelingError(`Cannot compile ${exprToString(e)}: operand types do not fit ${e.tag}`);
}

export function genFunction(root: Expr): GeneratedFunction {
  return new ExprLowering(root).generate();
}

class ExprLowering {
  private readonly constants: unknown[] = [];
  private readonly constantIndex = new Map<unknown, number>();
  private readonly names = new Map<number, string>();
  private readonly parameters: VarExpr[];

  constructor(private readonly root: Expr) {
    this.parameters = freeVariables(root);
    this.parameters.forEach((v, i) => this.names.set(v.id, `p${i}`));
  }

  generate(): GeneratedFunction {
    const order = postOrder(this.root);
    const refs = new Map<number, number>();
    for (const node of order) {
      for (const child of children(node)) {
        refs.set(child.id, (refs.get(child.id) ?? 0) + 1);
      }
    }

    const locals: JSFunction["locals"] = [];
    for (const node of order) {
      if (node === this.root || node.tag === "var" || node.tag === "const") continue;
      if ((refs.get(node.id) ?? 0) > 1) {
        const name = `t${node.id}`;
        locals.push({ name, value: this.lower(node) });
        this.names.set(node.id, name);
      }
    }

    const parameterNames = this.parameters.map((_, i) => `p${i}`);
    return {
      parameters: this.parameters,
      parameterNames,
      constants: this.constants,
      function: { params: ["rt", "K", ...parameterNames], locals, result: this.ref(this.root) },
    };
  }

  private constant(value: unknown): JSExpr {
    let index = this.constantIndex.get(value);
    if (index === undefined) {
      index = this.constants.length;
      this.constants.push(value);
      this.constantIndex.set(value, index);
    }
    return jsConstant(index);
  }

  private raw(value: Raw): JSExpr {
    switch (typeof value) {
      case "boolean":
      case "bigint":
      case "number":
      case "string":
        return jsLit(value);
      default:
        return this.constant(value);
    }
  }

  private ref(e: Expr): JSExpr {
    const name = this.names.get(e.id);
    return name === undefined ? this.lower(e) : jsLocal(name);
  }

  private lower(e: Expr): JSExpr {
    switch (e.tag) {
      case "const":
        return this.raw(toRaw(e.value, e.type));

      case "var":
        return this.ref(e);

      case "if":
        return jsTernary(this.ref(e.cond), this.ref(e.then), this.ref(e.else));

      case "createObject": {
        const t = e.type;
        if (t.kind !== "object") return unsupported(e);
        return jsRecord(t.fields.map((f, i) => ({ key: f.name, value: this.ref(e.fields[i]) })));
      }

      case "getField":
        return jsMember(this.ref(e.object), e.field);

      case "withField":
        return rt("withField", [this.ref(e.object), jsLit(e.field), this.ref(e.value)]);

      case "regexMatch":
        return jsMethod(this.constant(automatonFor(e.regex)), "accepts", [this.ref(e.operand)]);

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

  /** Truncate to the width of a fixed-size integer type */
  private wrap(value: JSExpr, t: Type): JSExpr {
    if (t.kind !== "int") return value;
    return jsGlobalCall(t.signed ? "BigInt.asIntN" : "BigInt.asUintN", [jsLit(t.bits), value]);
  }

  private unary(e: UnaryExpr): JSExpr {
    const x = this.ref(e.operand);
    const operandType = e.operand.type;
    switch (e.tag) {
      case "not":
        return jsUnary("!", x);
      case "bitNot":
        return this.wrap(jsUnary("~", x), e.type);
      case "some":
      case "unit":
        return jsArray([x]);
      case "isSome":
        return jsBinop(">", jsMember(x, "length"), jsLit(0));
      case "optionValue":
        return rt("optionValue", [x, this.raw(toRaw(defaultValue(e.type), e.type))]);
      case "length":
        return operandType.kind === "string"
          ? rt("strLength", [x])
          : jsGlobalCall("BigInt", [jsMember(x, "length")]);
      case "charToString":
        return jsGlobalCall("String.fromCodePoint", [x]);
      case "defaultMapCount":
        return operandType.kind === "defaultMap"
          ? rt("dmapCount", [x, this.constant(operandType.key), this.constant(operandType.value)])
          : unsupported(e);
      case "cast":
        return this.wrap(x, e.type);
    }
  }

  private binary(e: BinaryExpr): JSExpr {
    const l = this.ref(e.left);
    const r = this.ref(e.right);
    const t = e.left.type;
    switch (e.tag) {
      case "and":
        return jsBinop("&&", l, r);
      case "or":
        return jsBinop("||", l, r);
      case "eq":
        return isPrimitive(t) ? jsBinop("===", l, r) : rt("eq", [l, r, this.constant(t)]);
      case "lt":
        return jsBinop("<", l, r);
      case "le":
        return jsBinop("<=", l, r);
      case "add":
        return this.wrap(jsBinop("+", l, r), e.type);
      case "sub":
        return this.wrap(jsBinop("-", l, r), e.type);
      case "mul":
        return this.wrap(jsBinop("*", l, r), e.type);
      case "bitAnd":
        return this.wrap(jsBinop("&", l, r), e.type);
      case "bitOr":
        return this.wrap(jsBinop("|", l, r), e.type);
      case "bitXor":
        return this.wrap(jsBinop("^", l, r), e.type);
      case "concat":
        return jsMethod(l, "concat", [r]);
      case "at":
        return t.kind === "string" ? rt("strAt", [l, r]) : rt("seqAt", [l, r]);
      case "contains":
        return this.seqCall("Contains", t, [l, r]);
      case "startsWith":
        return this.seqCall("StartsWith", t, [l, r]);
      case "endsWith":
        return this.seqCall("EndsWith", t, [l, r]);
      case "mapGet":
      case "mapDelete":
        return t.kind === "map" ? rt(e.tag, [l, r, this.constant(t.key)]) : unsupported(e);
      case "defaultMapGet":
        return t.kind === "defaultMap" ? rt("dmapGet", [l, r, this.constant(t.key)]) : unsupported(e);
      case "setUnion":
      case "setIntersect":
      case "setDifference":
        return t.kind === "defaultMap" ? rt("setCombine", [jsLit(e.tag), l, r, this.constant(t.key)]) : unsupported(e);
    }
  }

  private ternary(e: TernaryExpr): JSExpr {
    const a = this.ref(e.first);
    const b = this.ref(e.second);
    const c = this.ref(e.third);
    const t = e.first.type;
    switch (e.tag) {
      case "slice":
        return t.kind === "string" ? rt("strSlice", [a, b, c]) : rt("seqSlice", [a, b, c]);
      case "indexOf":
        return this.seqCall("IndexOf", t, [a, b, c]);
      case "replaceFirst":
        return this.seqCall("ReplaceFirst", t, [a, b, c]);
      case "mapSet":
        return t.kind === "map" ? rt("mapSet", [a, b, c, this.constant(t.key)]) : unsupported(e);
      case "defaultMapSet":
        return rt("dmapSet", [a, b, c]);
    }
  }

  /** `rt.str<op>(...)` for strings, `rt.seq<op>(..., elementType)` for sequences */
  private seqCall(op: string, t: Type, args: JSExpr[]): JSExpr {
    return t.kind === "seq" ? rt(`seq${op}`, [...args, this.constant(t.element)]) : rt(`str${op}`, args);
  }
}
