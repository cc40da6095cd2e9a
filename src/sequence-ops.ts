/**
 * Sequence semantics shared by the interpreter and the compiled runtime.
 *
 * Strings are handled as arrays of code points, so every operation here is
 * generic over the element type and takes its equality as a parameter.
 * Out-of-range offsets saturate the way the SMT string theory does.
 */

import type { Equality } from "./maps/default-map";

export function slice<T>(s: readonly T[], offset: bigint, length: bigint): T[] {
  if (offset < 0n || offset >= BigInt(s.length) || length <= 0n) return [];
  const start = Number(offset);
  const end = length > BigInt(s.length - start) ? s.length : start + Number(length);
  return s.slice(start, end);
}

export function at<T>(s: readonly T[], index: bigint): T[] {
  if (index < 0n || index >= BigInt(s.length)) return [];
  return [s[Number(index)]];
}

function matchesAt<T>(s: readonly T[], sub: readonly T[], position: number, equals: Equality<T>): boolean {
  if (position + sub.length > s.length) return false;
  for (let i = 0; i < sub.length; i++) {
    if (!equals(s[position + i], sub[i])) return false;
  }
  return true;
}

/** -1 when `offset` is outside 0..|s| or `sub` does not occur at or after it */
export function indexOf<T>(s: readonly T[], sub: readonly T[], offset: bigint, equals: Equality<T>): bigint {
  if (offset < 0n || offset > BigInt(s.length)) return -1n;
  for (let i = Number(offset); i + sub.length <= s.length; i++) {
    if (matchesAt(s, sub, i, equals)) return BigInt(i);
  }
  return -1n;
}

export const contains = <T>(s: readonly T[], sub: readonly T[], equals: Equality<T>): boolean =>
  indexOf(s, sub, 0n, equals) >= 0n;

export const startsWith = <T>(s: readonly T[], prefix: readonly T[], equals: Equality<T>): boolean =>
  matchesAt(s, prefix, 0, equals);

export const endsWith = <T>(s: readonly T[], suffix: readonly T[], equals: Equality<T>): boolean =>
  suffix.length <= s.length && matchesAt(s, suffix, s.length - suffix.length, equals);

/** An empty `sub` matches at the front, so the replacement is prepended */
export function replaceFirst<T>(s: readonly T[], sub: readonly T[], replacement: readonly T[], equals: Equality<T>): T[] {
  const i = indexOf(s, sub, 0n, equals);
  if (i < 0n) return [...s];
  const n = Number(i);
  return [...s.slice(0, n), ...replacement, ...s.slice(n + sub.length)];
}

export const codePoints = (s: string): string[] => Array.from(s);
