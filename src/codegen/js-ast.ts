/**
 * The JavaScript the compiler emits.
 *
 * Every compiled expression becomes one function
 * `(rt, K, p0, ...) => { const tN = ...; return ...; }`. Its expressions
 * reach the runtime helpers through `rt`, pooled constants through `K` and
 * a few global functions (`BigInt`, `String.fromCodePoint`); nothing else
 * is ever named, so locals need no renaming.
 */

/** Literals the lowering inlines; everything else goes through `K` */
export type JSLiteralValue = number | bigint | string | boolean;

export type JSExpr =
  | JSLit
  | JSLocal
  | JSConstant
  | JSHelper
  | JSGlobalCall
  | JSBinop
  | JSUnary
  | JSTernary
  | JSMember
  | JSMethod
  | JSRecord
  | JSArray;

export interface JSLit {
  tag: "jsLit";
  value: JSLiteralValue;
}

/** A parameter or a `const` bound in the function body */
export interface JSLocal {
  tag: "jsLocal";
  name: string;
}

/** `K[index]` */
export interface JSConstant {
  tag: "jsConstant";
  index: number;
}

/** `rt.name(args)` */
export interface JSHelper {
  tag: "jsHelper";
  name: string;
  args: JSExpr[];
}

/** A call to a global such as `BigInt.asIntN` */
export interface JSGlobalCall {
  tag: "jsGlobalCall";
  callee: "BigInt" | "BigInt.asIntN" | "BigInt.asUintN" | "String.fromCodePoint";
  args: JSExpr[];
}

export type JSBinaryOperator = "&&" | "||" | "===" | "<" | "<=" | ">" | "+" | "-" | "*" | "&" | "|" | "^";

export interface JSBinop {
  tag: "jsBinop";
  op: JSBinaryOperator;
  left: JSExpr;
  right: JSExpr;
}

export interface JSUnary {
  tag: "jsUnary";
  op: "!" | "~";
  operand: JSExpr;
}

export interface JSTernary {
  tag: "jsTernary";
  cond: JSExpr;
  then: JSExpr;
  else: JSExpr;
}

/** Property read: record fields and `length` */
export interface JSMember {
  tag: "jsMember";
  obj: JSExpr;
  prop: string;
}

export interface JSMethod {
  tag: "jsMethod";
  obj: JSExpr;
  method: string;
  args: JSExpr[];
}

/** A record, keyed by field name in field order */
export interface JSRecord {
  tag: "jsRecord";
  fields: { key: string; value: JSExpr }[];
}

export interface JSArray {
  tag: "jsArray";
  elements: JSExpr[];
}

/** The compiled function: shared nodes bound to locals, then the result */
export interface JSFunction {
  params: string[];
  locals: { name: string; value: JSExpr }[];
  result: JSExpr;
}

export const jsLit = (value: JSLiteralValue): JSLit => ({ tag: "jsLit", value });

export const jsLocal = (name: string): JSLocal => ({ tag: "jsLocal", name });

export const jsConstant = (index: number): JSConstant => ({ tag: "jsConstant", index });

export const jsHelper = (name: string, args: JSExpr[]): JSHelper => ({ tag: "jsHelper", name, args });

export const jsGlobalCall = (callee: JSGlobalCall["callee"], args: JSExpr[]): JSGlobalCall => ({
  tag: "jsGlobalCall",
  callee,
  args,
});

export const jsBinop = (op: JSBinaryOperator, left: JSExpr, right: JSExpr): JSBinop => ({
  tag: "jsBinop",
  op,
  left,
  right,
});

export const jsUnary = (op: JSUnary["op"], operand: JSExpr): JSUnary => ({ tag: "jsUnary", op, operand });

export const jsTernary = (cond: JSExpr, thenExpr: JSExpr, elseExpr: JSExpr): JSTernary => ({
  tag: "jsTernary",
  cond,
  then: thenExpr,
  else: elseExpr,
});

export const jsMember = (obj: JSExpr, prop: string): JSMember => ({ tag: "jsMember", obj, prop });

export const jsMethod = (obj: JSExpr, method: string, args: JSExpr[]): JSMethod => ({
  tag: "jsMethod",
  obj,
  method,
  args,
});

export const jsRecord = (fields: { key: string; value: JSExpr }[]): JSRecord => ({ tag: "jsRecord", fields });

export const jsArray = (elements: JSExpr[]): JSArray => ({ tag: "jsArray", elements });
