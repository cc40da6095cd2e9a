/**
 * Contract between the symbolic evaluator and a decision procedure.
 *
 * A backend works on leaf terms only: booleans, integers, characters,
 * strings and sequences. Records, options and maps are decomposed into
 * leaves by the symbolic layer before a backend sees them.
 */

import { CapabilityError } from "../errors";
import { Expr, postOrder } from "../expr";
import { Type, typeToString } from "../types";
import type { Value } from "../value";
import type { Regex } from "../regex/ast";

export type BackendName = "smt" | "bdd";

/** A leaf symbol to declare */
export interface LeafDecl {
  readonly name: string;
  readonly type: Type;
}

export interface SessionOptions {
  timeoutMs?: number;
  debug: boolean;
}

/**
 * One isolated engine context. Assertions accumulate until `release`.
 */
export interface BackendSession<T> {
  assert(constraint: T): void;
  /** true when the assertions so far are satisfiable */
  check(): Promise<boolean>;
  /** Value of a declared leaf in the most recent model */
  value(term: T, type: Type): Value;
  release(): void;
}

export interface SolverBackend<T> {
  readonly name: BackendName;

  /** Throw a `CapabilityError` for anything this backend cannot encode */
  checkType(t: Type): void;
  checkNode(e: Expr): void;

  /** Declare leaves together so the backend may choose their layout */
  declare(leaves: readonly LeafDecl[]): T[];
  constant(v: Value, t: Type): T;

  not(a: T): T;
  and(a: T, b: T): T;
  or(a: T, b: T): T;
  ite(cond: T, a: T, b: T, t: Type): T;
  eq(a: T, b: T, t: Type): T;

  lt(a: T, b: T, t: Type): T;
  le(a: T, b: T, t: Type): T;
  add(a: T, b: T, t: Type): T;
  sub(a: T, b: T, t: Type): T;
  mul(a: T, b: T, t: Type): T;
  bitAnd(a: T, b: T, t: Type): T;
  bitOr(a: T, b: T, t: Type): T;
  bitXor(a: T, b: T, t: Type): T;
  bitNot(a: T, t: Type): T;
  /** Integer conversion with the wrapping of the target type */
  cast(a: T, from: Type, to: Type): T;
  /** Number of true indicators, as an int32 */
  count(indicators: readonly T[]): T;

  unit(element: T, elementType: Type): T;
  concat(a: T, b: T, t: Type): T;
  length(s: T, t: Type): T;
  slice(s: T, offset: T, length: T, t: Type): T;
  at(s: T, index: T, t: Type): T;
  indexOf(s: T, sub: T, offset: T, t: Type): T;
  contains(s: T, sub: T, t: Type): T;
  startsWith(s: T, prefix: T, t: Type): T;
  endsWith(s: T, suffix: T, t: Type): T;
  replaceFirst(s: T, sub: T, replacement: T, t: Type): T;
  regexMatch(s: T, regex: Regex): T;
  charToString(c: T): T;

  openSession(options: SessionOptions): BackendSession<T>;
}

/** Types a backend represents directly as a single term */
export function isLeafType(t: Type): boolean {
  switch (t.kind) {
    case "bool":
    case "int":
    case "bigint":
    case "char":
    case "string":
    case "seq":
      return true;
    default:
      return false;
  }
}

/**
 * Walk every node and every type reachable from `root` and let the backend
 * reject what it cannot encode, before anything is translated.
 */
export function checkCapabilities<T>(backend: SolverBackend<T>, root: Expr): void {
  const seen = new Set<Type>();
  const visitType = (t: Type): void => {
    if (seen.has(t)) return;
    seen.add(t);
    backend.checkType(t);
    switch (t.kind) {
      case "seq":
      case "option":
        visitType(t.element);
        break;
      case "object":
        t.fields.forEach((f) => visitType(f.type));
        break;
      case "map":
      case "defaultMap":
        visitType(t.key);
        visitType(t.value);
        break;
    }
  };
  for (const node of postOrder(root)) {
    visitType(node.type);
    backend.checkNode(node);
  }
}

export function unsupportedType(backend: BackendName, t: Type): CapabilityError {
  return new CapabilityError(backend, `type ${typeToString(t)} is not supported`);
}
