/**
 * SMT-LIB s-expressions: building, printing and reading back.
 */

import { MAX_CHAR } from "../../types";

export type SExpr = string | readonly SExpr[];

export const list = (...items: SExpr[]): SExpr => items;
export const app = (fn: string, ...args: SExpr[]): SExpr => [fn, ...args];

export function printSExpr(e: SExpr): string {
  return typeof e === "string" ? e : `(${e.map(printSExpr).join(" ")})`;
}

// ============================================================================
// Literals
// ============================================================================

/** `|...|` quoting, with `|` and `\` replaced since SMT-LIB has no escapes inside */
export function symbol(name: string): string {
  return `|${name.replace(/[|\\]/g, "_")}|`;
}

export function numeral(n: bigint): SExpr {
  return n < 0n ? app("-", (-n).toString()) : n.toString();
}

export function bitVector(n: bigint, width: number): SExpr {
  const unsigned = BigInt.asUintN(width, n);
  return list("_", `bv${unsigned}`, String(width));
}

/**
 * String literal. Printable ASCII stays as is, `"` doubles, and every other
 * code point becomes a `\u{...}` escape.
 */
export function stringLiteral(s: string): string {
  let out = '"';
  for (const ch of s) {
    const cp = ch.codePointAt(0) ?? 0;
    if (ch === '"') out += '""';
    else if (cp >= 0x20 && cp < 0x7f && ch !== "\\") out += ch;
    else out += `\\u{${cp.toString(16)}}`;
  }
  return `${out}"`;
}

/** Decode a string literal as printed by the engine, quotes included */
export function parseStringLiteral(token: string): string {
  const body = token.slice(1, -1).replace(/""/g, '"');
  return body.replace(/\\u\{([0-9a-fA-F]{1,5})\}|\\u([0-9a-fA-F]{4})/g, (match, braced?: string, bare?: string) => {
    const cp = parseInt(braced ?? bare ?? "", 16);
    return Number.isNaN(cp) || cp > MAX_CHAR ? match : String.fromCodePoint(cp);
  });
}

export const isStringLiteral = (e: SExpr): e is string => typeof e === "string" && e.startsWith('"');

// ============================================================================
// Reading
// ============================================================================

export class SExprSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SExprSyntaxError";
  }
}

/**
 * Parse a sequence of s-expressions. String literals keep their quotes so
 * they can be told apart from symbols; `|quoted|` symbols lose their bars.
 */
export function parseSExprs(text: string): SExpr[] {
  const stack: SExpr[][] = [[]];
  let pos = 0;
  const push = (e: SExpr): void => {
    stack[stack.length - 1].push(e);
  };

  while (pos < text.length) {
    const ch = text[pos];
    if (/\s/.test(ch)) {
      pos++;
    } else if (ch === ";") {
      while (pos < text.length && text[pos] !== "\n") pos++;
    } else if (ch === "(") {
      stack.push([]);
      pos++;
    } else if (ch === ")") {
      const done = stack.pop();
      if (done === undefined || stack.length === 0) throw new SExprSyntaxError(`Unbalanced ')' at ${pos}`);
      push(done);
      pos++;
    } else if (ch === '"') {
      let end = pos + 1;
      for (;;) {
        if (end >= text.length) throw new SExprSyntaxError(`Unterminated string at ${pos}`);
        if (text[end] === '"') {
          if (text[end + 1] === '"') end += 2;
          else break;
        } else end++;
      }
      push(text.slice(pos, end + 1));
      pos = end + 1;
    } else if (ch === "|") {
      const end = text.indexOf("|", pos + 1);
      if (end < 0) throw new SExprSyntaxError(`Unterminated symbol at ${pos}`);
      push(text.slice(pos + 1, end));
      pos = end + 1;
    } else {
      let end = pos;
      while (end < text.length && !/[\s()";|]/.test(text[end])) end++;
      push(text.slice(pos, end));
      pos = end;
    }
  }
  if (stack.length !== 1) throw new SExprSyntaxError("Unbalanced '('");
  return stack[0];
}

/** `(define-fun name () Sort value)` entries of a printed model */
export function modelDefinitions(text: string): Map<string, SExpr> {
  const definitions = new Map<string, SExpr>();
  const visit = (e: SExpr): void => {
    if (typeof e === "string") return;
    if (e[0] === "define-fun" && e.length === 5 && typeof e[1] === "string") {
      const params = e[2];
      if (typeof params !== "string" && params.length === 0) definitions.set(e[1], e[4]);
      return;
    }
    // some engine versions wrap the model in an outer list
    e.forEach(visit);
  };
  parseSExprs(text).forEach(visit);
  return definitions;
}
