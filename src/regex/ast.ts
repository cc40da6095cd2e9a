/**
 * Regular expressions over Unicode code points.
 *
 * Constructors normalize as they build (unions are flattened, sorted and
 * deduplicated; empty and epsilon are absorbed), which keeps the set of
 * derivatives of any expression finite.
 */

import { MAX_CHAR } from "../types";

// ============================================================================
// Regex Types
// ============================================================================

export type Regex = EmptyRegex | EpsilonRegex | CharsRegex | ConcatRegex | UnionRegex | StarRegex;

/** Matches nothing */
export interface EmptyRegex {
  readonly tag: "empty";
}

/** Matches only the empty string */
export interface EpsilonRegex {
  readonly tag: "epsilon";
}

/** A single character from a set of sorted, disjoint, inclusive ranges */
export interface CharsRegex {
  readonly tag: "chars";
  readonly ranges: readonly CharRange[];
}

export interface ConcatRegex {
  readonly tag: "concat";
  readonly left: Regex;
  readonly right: Regex;
}

export interface UnionRegex {
  readonly tag: "union";
  readonly alternatives: readonly Regex[];
}

export interface StarRegex {
  readonly tag: "star";
  readonly inner: Regex;
}

export type CharRange = readonly [number, number];

// ============================================================================
// Keys
// ============================================================================

const keys = new WeakMap<Regex, string>();

/**
 * Canonical text of a regex; equal keys mean equal languages up to the
 * normalizations performed by the constructors.
 */
export function regexKey(r: Regex): string {
  const cached = keys.get(r);
  if (cached !== undefined) return cached;
  let key: string;
  switch (r.tag) {
    case "empty":
      key = "∅";
      break;
    case "epsilon":
      key = "ε";
      break;
    case "chars":
      key = `[${r.ranges.map(([lo, hi]) => (lo === hi ? `${lo}` : `${lo}-${hi}`)).join(",")}]`;
      break;
    case "concat":
      key = `(${regexKey(r.left)}·${regexKey(r.right)})`;
      break;
    case "union":
      key = `(${r.alternatives.map(regexKey).join("|")})`;
      break;
    case "star":
      key = `${regexKey(r.inner)}*`;
      break;
  }
  keys.set(r, key);
  return key;
}

// ============================================================================
// Constructors
// ============================================================================

export const emptyRegex: EmptyRegex = { tag: "empty" };
export const epsilon: EpsilonRegex = { tag: "epsilon" };

export function chars(ranges: readonly CharRange[]): Regex {
  const normalized = normalizeRanges(ranges);
  if (normalized.length === 0) return emptyRegex;
  return { tag: "chars", ranges: normalized };
}

export const char = (c: number): Regex => chars([[c, c]]);
export const anyChar: Regex = chars([[0, MAX_CHAR]]);

export function complementChars(ranges: readonly CharRange[]): Regex {
  const result: CharRange[] = [];
  let next = 0;
  for (const [lo, hi] of normalizeRanges(ranges)) {
    if (lo > next) result.push([next, lo - 1]);
    next = hi + 1;
  }
  if (next <= MAX_CHAR) result.push([next, MAX_CHAR]);
  return chars(result);
}

export function concat(left: Regex, right: Regex): Regex {
  if (left.tag === "empty" || right.tag === "empty") return emptyRegex;
  if (left.tag === "epsilon") return right;
  if (right.tag === "epsilon") return left;
  // right-associate so that equal languages share keys
  if (left.tag === "concat") return concat(left.left, concat(left.right, right));
  return { tag: "concat", left, right };
}

export function union(...alternatives: Regex[]): Regex {
  const flat = new Map<string, Regex>();
  for (const alt of alternatives) {
    if (alt.tag === "empty") continue;
    for (const r of alt.tag === "union" ? alt.alternatives : [alt]) {
      flat.set(regexKey(r), r);
    }
  }
  if (flat.size === 0) return emptyRegex;
  if (flat.size === 1) return [...flat.values()][0];
  const sorted = [...flat.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, r]) => r);
  return { tag: "union", alternatives: sorted };
}

export function star(inner: Regex): Regex {
  if (inner.tag === "empty" || inner.tag === "epsilon") return epsilon;
  if (inner.tag === "star") return inner;
  return { tag: "star", inner };
}

export const plus = (inner: Regex): Regex => concat(inner, star(inner));
export const optional = (inner: Regex): Regex => union(inner, epsilon);

/**
 * `inner{min,max}`; an undefined max means unbounded.
 */
export function repeat(inner: Regex, min: number, max: number | undefined): Regex {
  let result: Regex = epsilon;
  for (let i = 0; i < min; i++) result = concat(result, inner);
  if (max === undefined) return concat(result, star(inner));
  let tail: Regex = epsilon;
  for (let i = min; i < max; i++) tail = optional(concat(inner, tail));
  return concat(result, tail);
}

export function literal(text: string): Regex {
  let result: Regex = epsilon;
  for (const c of text) {
    result = concat(result, char(c.codePointAt(0) ?? 0));
  }
  return result;
}

function normalizeRanges(ranges: readonly CharRange[]): CharRange[] {
  const sorted = ranges
    .map(([lo, hi]): CharRange => [Math.max(0, lo), Math.min(MAX_CHAR, hi)])
    .filter(([lo, hi]) => lo <= hi)
    .sort((a, b) => a[0] - b[0]);
  const merged: [number, number][] = [];
  for (const [lo, hi] of sorted) {
    const last = merged[merged.length - 1];
    if (last !== undefined && lo <= last[1] + 1) {
      last[1] = Math.max(last[1], hi);
    } else {
      merged.push([lo, hi]);
    }
  }
  return merged;
}

// ============================================================================
// Derivatives
// ============================================================================

export function nullable(r: Regex): boolean {
  switch (r.tag) {
    case "empty":
    case "chars":
      return false;
    case "epsilon":
    case "star":
      return true;
    case "concat":
      return nullable(r.left) && nullable(r.right);
    case "union":
      return r.alternatives.some(nullable);
  }
}

/**
 * Brzozowski derivative: the language of suffixes after reading `c`.
 */
export function derivative(r: Regex, c: number): Regex {
  switch (r.tag) {
    case "empty":
    case "epsilon":
      return emptyRegex;
    case "chars":
      return r.ranges.some(([lo, hi]) => c >= lo && c <= hi) ? epsilon : emptyRegex;
    case "concat": {
      const first = concat(derivative(r.left, c), r.right);
      return nullable(r.left) ? union(first, derivative(r.right, c)) : first;
    }
    case "union":
      return union(...r.alternatives.map((alt) => derivative(alt, c)));
    case "star":
      return concat(derivative(r.inner, c), r);
  }
}

export function regexToString(r: Regex): string {
  return regexKey(r);
}
