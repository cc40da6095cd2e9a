/**
 * Expression nodes.
 *
 * Nodes are immutable and hash-consed: building a node with the same tag,
 * the same operand nodes and the same payload returns the existing instance.
 * Reference equality therefore implies semantic equality, and every pass
 * downstream memoizes on `id` instead of re-walking shared sub-trees.
 *
 * This module only defines and interns nodes. Type-checked construction
 * lives in `builders.ts`.
 */

import type { Type } from "./types";
import { typeId, typeToString } from "./types";
import type { Value } from "./value";
import { valueKey, valueToString } from "./value";
import type { Regex } from "./regex/ast";

// ============================================================================
// Node Types
// ============================================================================

export type UnaryOp =
  | "not"
  | "bitNot"
  | "some"
  | "isSome"
  | "optionValue"
  | "unit"
  | "length"
  | "charToString"
  | "defaultMapCount"
  | "cast";

/** Pointwise combination of two sets */
export type SetOp = "setUnion" | "setIntersect" | "setDifference";

export type BinaryOp =
  | "and"
  | "or"
  | "eq"
  | "lt"
  | "le"
  | "add"
  | "sub"
  | "mul"
  | "bitAnd"
  | "bitOr"
  | "bitXor"
  | "concat"
  | "at"
  | "contains"
  | "startsWith"
  | "endsWith"
  | "mapGet"
  | "mapDelete"
  | "defaultMapGet"
  | SetOp;

export type TernaryOp = "slice" | "indexOf" | "replaceFirst" | "mapSet" | "defaultMapSet";

export type Expr =
  | ConstExpr
  | VarExpr
  | UnaryExpr
  | BinaryExpr
  | TernaryExpr
  | IfExpr
  | CreateObjectExpr
  | GetFieldExpr
  | WithFieldExpr
  | RegexMatchExpr;

interface ExprBase {
  /** Stable identity, unique within the process */
  readonly id: number;
  readonly type: Type;
}

/** Literal constant */
export interface ConstExpr extends ExprBase {
  readonly tag: "const";
  readonly value: Value;
}

/** Free variable, bound later by evaluation or by a solver model */
export interface VarExpr extends ExprBase {
  readonly tag: "var";
  readonly name: string;
}

/** A `cast` converts its operand to the node's own integer type */
export interface UnaryExpr extends ExprBase {
  readonly tag: UnaryOp;
  readonly operand: Expr;
}

export interface BinaryExpr extends ExprBase {
  readonly tag: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

/**
 * slice(s, offset, length), indexOf(s, sub, offset),
 * replaceFirst(s, sub, replacement), mapSet(m, key, value),
 * defaultMapSet(m, key, value)
 */
export interface TernaryExpr extends ExprBase {
  readonly tag: TernaryOp;
  readonly first: Expr;
  readonly second: Expr;
  readonly third: Expr;
}

export interface IfExpr extends ExprBase {
  readonly tag: "if";
  readonly cond: Expr;
  readonly then: Expr;
  readonly else: Expr;
}

/** Record construction; `fields` follow the order of the record type */
export interface CreateObjectExpr extends ExprBase {
  readonly tag: "createObject";
  readonly fields: readonly Expr[];
}

export interface GetFieldExpr extends ExprBase {
  readonly tag: "getField";
  readonly object: Expr;
  readonly field: string;
}

export interface WithFieldExpr extends ExprBase {
  readonly tag: "withField";
  readonly object: Expr;
  readonly field: string;
  readonly value: Expr;
}

/** Full match of a string against a parsed pattern */
export interface RegexMatchExpr extends ExprBase {
  readonly tag: "regexMatch";
  readonly operand: Expr;
  readonly pattern: string;
  readonly regex: Regex;
}

// ============================================================================
// Interning
// ============================================================================

let nextId = 0;

class NodeTable<E extends Expr> {
  private readonly table = new Map<string, E>();

  intern(key: string, make: (id: number) => E): E {
    const existing = this.table.get(key);
    if (existing !== undefined) return existing;
    const created = Object.freeze(make(nextId++));
    this.table.set(key, created);
    return created;
  }

  get size(): number {
    return this.table.size;
  }
}

const constTable = new NodeTable<ConstExpr>();
const varTable = new NodeTable<VarExpr>();
const unaryTable = new NodeTable<UnaryExpr>();
const binaryTable = new NodeTable<BinaryExpr>();
const ternaryTable = new NodeTable<TernaryExpr>();
const ifTable = new NodeTable<IfExpr>();
const objectTable = new NodeTable<CreateObjectExpr>();
const getFieldTable = new NodeTable<GetFieldExpr>();
const withFieldTable = new NodeTable<WithFieldExpr>();
const regexTable = new NodeTable<RegexMatchExpr>();

/** Number of distinct nodes built so far in this process */
export function internedNodeCount(): number {
  return [
    constTable,
    varTable,
    unaryTable,
    binaryTable,
    ternaryTable,
    ifTable,
    objectTable,
    getFieldTable,
    withFieldTable,
    regexTable,
  ].reduce((n, t) => n + t.size, 0);
}

export function mkConst(value: Value, type: Type): ConstExpr {
  return constTable.intern(`${typeId(type)}|${constantKey(value)}`, (id) => ({ id, type, tag: "const", value }));
}

export function mkVar(name: string, type: Type): VarExpr {
  return varTable.intern(`${typeId(type)}|${name}`, (id) => ({ id, type, tag: "var", name }));
}

export function mkUnary(tag: UnaryOp, operand: Expr, type: Type): UnaryExpr {
  return unaryTable.intern(`${tag}|${typeId(type)}|${operand.id}`, (id) => ({ id, type, tag, operand }));
}

export function mkBinary(tag: BinaryOp, left: Expr, right: Expr, type: Type): BinaryExpr {
  return binaryTable.intern(`${tag}|${left.id}|${right.id}`, (id) => ({ id, type, tag, left, right }));
}

export function mkTernary(tag: TernaryOp, first: Expr, second: Expr, third: Expr, type: Type): TernaryExpr {
  return ternaryTable.intern(`${tag}|${first.id}|${second.id}|${third.id}`, (id) => ({
    id,
    type,
    tag,
    first,
    second,
    third,
  }));
}

export function mkIf(cond: Expr, thenExpr: Expr, elseExpr: Expr): IfExpr {
  return ifTable.intern(`${cond.id}|${thenExpr.id}|${elseExpr.id}`, (id) => ({
    id,
    type: thenExpr.type,
    tag: "if",
    cond,
    then: thenExpr,
    else: elseExpr,
  }));
}

export function mkCreateObject(type: Type, fields: readonly Expr[]): CreateObjectExpr {
  return objectTable.intern(`${typeId(type)}|${fields.map((f) => f.id).join(",")}`, (id) => ({
    id,
    type,
    tag: "createObject",
    fields: Object.freeze([...fields]),
  }));
}

export function mkGetField(object: Expr, field: string, type: Type): GetFieldExpr {
  return getFieldTable.intern(`${object.id}|${field}`, (id) => ({ id, type, tag: "getField", object, field }));
}

export function mkWithField(object: Expr, field: string, value: Expr): WithFieldExpr {
  return withFieldTable.intern(`${object.id}|${value.id}|${field}`, (id) => ({
    id,
    type: object.type,
    tag: "withField",
    object,
    field,
    value,
  }));
}

export function mkRegexMatch(operand: Expr, pattern: string, regex: Regex, type: Type): RegexMatchExpr {
  return regexTable.intern(`${operand.id}|${pattern}`, (id) => ({
    id,
    type,
    tag: "regexMatch",
    operand,
    pattern,
    regex,
  }));
}

/**
 * Key of a constant payload. Unlike `valueKey` this also covers maps, which
 * are keyed by their full override history.
 */
function constantKey(v: Value): string {
  switch (v.tag) {
    case "map":
      return `map{${[...v.entries.keys()]
        .sort()
        .map((k) => {
          const entry = v.entries.get(k);
          return entry === undefined ? "" : `${k}=>${constantKey(entry.value)}`;
        })
        .join(",")}}`;
    case "defaultMap":
      return `dmap[${v.overrides.map((o) => `${valueKey(o.key)}=>${constantKey(o.value)}`).join(",")}]`;
    case "object":
      return `{${[...v.fields].map(([k, f]) => `${JSON.stringify(k)}:${constantKey(f)}`).join(",")}}`;
    default:
      return valueKey(v);
  }
}

// ============================================================================
// Traversal
// ============================================================================

export function children(e: Expr): readonly Expr[] {
  switch (e.tag) {
    case "const":
    case "var":
      return [];
    case "if":
      return [e.cond, e.then, e.else];
    case "createObject":
      return e.fields;
    case "getField":
      return [e.object];
    case "withField":
      return [e.object, e.value];
    case "regexMatch":
      return [e.operand];
    case "slice":
    case "indexOf":
    case "replaceFirst":
    case "mapSet":
    case "defaultMapSet":
      return [e.first, e.second, e.third];
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
      return [e.operand];
    default:
      return [e.left, e.right];
  }
}

/**
 * Visit every distinct node once, children before parents.
 */
export function postOrder(root: Expr): Expr[] {
  const order: Expr[] = [];
  const seen = new Set<number>();
  const stack: { node: Expr; expanded: boolean }[] = [{ node: root, expanded: false }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    if (top.expanded) {
      order.push(top.node);
      continue;
    }
    if (seen.has(top.node.id)) continue;
    seen.add(top.node.id);
    stack.push({ node: top.node, expanded: true });
    const kids = children(top.node);
    for (let i = kids.length - 1; i >= 0; i--) {
      if (!seen.has(kids[i].id)) stack.push({ node: kids[i], expanded: false });
    }
  }
  return order;
}

/** Free variables in first-occurrence order */
export function freeVariables(root: Expr): VarExpr[] {
  return postOrder(root).filter((e): e is VarExpr => e.tag === "var");
}

/** Number of distinct nodes reachable from `root` */
export function exprSize(root: Expr): number {
  return postOrder(root).length;
}

// ============================================================================
// Printing
// ============================================================================

export function exprToString(e: Expr): string {
  switch (e.tag) {
    case "const":
      return valueToString(e.value);
    case "var":
      return e.name;
    case "if":
      return `(if ${exprToString(e.cond)} ${exprToString(e.then)} ${exprToString(e.else)})`;
    case "createObject":
      return `(new ${typeToString(e.type)} ${e.fields.map(exprToString).join(" ")})`;
    case "getField":
      return `${exprToString(e.object)}.${e.field}`;
    case "withField":
      return `(with ${exprToString(e.object)} ${e.field} ${exprToString(e.value)})`;
    case "regexMatch":
      return `(matches ${exprToString(e.operand)} /${e.pattern}/)`;
    case "cast":
      return `(cast ${typeToString(e.type)} ${exprToString(e.operand)})`;
    default:
      return `(${e.tag} ${children(e).map(exprToString).join(" ")})`;
  }
}
