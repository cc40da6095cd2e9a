/**
 * Regex Parser - turns a textual pattern into a `Regex`.
 *
 * Patterns always describe a full match; a leading `^` and a trailing `$`
 * are accepted and ignored.
 */

import { ModelingError } from "../errors";
import {
  Regex,
  CharRange,
  anyChar,
  char,
  chars,
  complementChars,
  concat,
  epsilon,
  optional,
  plus,
  repeat,
  star,
  union,
} from "./ast";

// ============================================================================
// Errors
// ============================================================================

export class RegexSyntaxError extends ModelingError {
  constructor(
    message: string,
    public readonly pattern: string,
    public readonly position: number
  ) {
    super(`Invalid regex ${JSON.stringify(pattern)} at ${position}: ${message}`);
    this.name = "RegexSyntaxError";
  }
}

// ============================================================================
// Character Classes
// ============================================================================

const DIGITS: CharRange[] = [[0x30, 0x39]];
const WORD: CharRange[] = [[0x30, 0x39], [0x41, 0x5a], [0x5f, 0x5f], [0x61, 0x7a]];
const SPACE: CharRange[] = [[0x09, 0x0d], [0x20, 0x20]];

type ClassEscape = { tag: "class"; ranges: CharRange[]; negated: boolean };
type CharEscape = { tag: "char"; codePoint: number };

// ============================================================================
// Parser
// ============================================================================

export class RegexParser {
  private readonly chars: number[];
  private pos = 0;

  constructor(private readonly pattern: string) {
    this.chars = Array.from(pattern, (c) => c.codePointAt(0) ?? 0);
  }

  parse(): Regex {
    if (this.peek() === "^") this.pos++;
    const result = this.parseAlternation();
    if (this.peek() === "$" && this.pos === this.chars.length - 1) this.pos++;
    if (!this.atEnd()) {
      throw this.error(`Unexpected ${JSON.stringify(this.peek())}`);
    }
    return result;
  }

  private parseAlternation(): Regex {
    const alternatives = [this.parseSequence()];
    while (this.peek() === "|") {
      this.pos++;
      alternatives.push(this.parseSequence());
    }
    return union(...alternatives);
  }

  private parseSequence(): Regex {
    let result: Regex = epsilon;
    while (!this.atEnd()) {
      const c = this.peek();
      if (c === "|" || c === ")") break;
      if (c === "$" && this.pos === this.chars.length - 1) break;
      result = concat(result, this.parseRepeat());
    }
    return result;
  }

  private parseRepeat(): Regex {
    let atom = this.parseAtom();
    for (;;) {
      const c = this.peek();
      if (c === "*") {
        this.pos++;
        atom = star(atom);
      } else if (c === "+") {
        this.pos++;
        atom = plus(atom);
      } else if (c === "?") {
        this.pos++;
        atom = optional(atom);
      } else if (c === "{") {
        const bounds = this.parseBounds();
        atom = repeat(atom, bounds.min, bounds.max);
      } else {
        return atom;
      }
    }
  }

  private parseBounds(): { min: number; max: number | undefined } {
    const start = this.pos;
    this.expect("{");
    const min = this.parseNumber();
    let max: number | undefined = min;
    if (this.peek() === ",") {
      this.pos++;
      max = this.peek() === "}" ? undefined : this.parseNumber();
    }
    this.expect("}");
    if (max !== undefined && max < min) {
      throw new RegexSyntaxError(`Bad repetition bounds {${min},${max}}`, this.pattern, start);
    }
    return { min, max };
  }

  private parseNumber(): number {
    let digits = "";
    while (/[0-9]/.test(this.peek())) {
      digits += this.peek();
      this.pos++;
    }
    if (digits.length === 0) throw this.error("Expected a number");
    return Number.parseInt(digits, 10);
  }

  private parseAtom(): Regex {
    const c = this.peek();
    switch (c) {
      case "(": {
        this.pos++;
        if (this.peek() === "?") {
          this.pos++;
          this.expect(":");
        }
        const inner = this.parseAlternation();
        this.expect(")");
        return inner;
      }
      case "[":
        return this.parseClass();
      case ".":
        this.pos++;
        return anyChar;
      case "\\": {
        const escape = this.parseEscape();
        if (escape.tag === "char") return char(escape.codePoint);
        return escape.negated ? complementChars(escape.ranges) : chars(escape.ranges);
      }
      case "*":
      case "+":
      case "?":
      case "{":
        throw this.error(`Nothing to repeat before ${JSON.stringify(c)}`);
      default:
        return char(this.next());
    }
  }

  private parseClass(): Regex {
    this.expect("[");
    let negated = false;
    if (this.peek() === "^") {
      negated = true;
      this.pos++;
    }
    const ranges: CharRange[] = [];
    let first = true;
    while (this.peek() !== "]" || first) {
      if (this.atEnd()) throw this.error("Unterminated character class");
      first = false;
      const lo = this.parseClassAtom();
      if (lo.tag === "class") {
        ranges.push(...(lo.negated ? complementRanges(lo.ranges) : lo.ranges));
        continue;
      }
      if (this.peek() === "-" && this.peekAt(1) !== "]" && this.peekAt(1) !== "") {
        this.pos++;
        const hi = this.parseClassAtom();
        if (hi.tag === "class" || hi.codePoint < lo.codePoint) {
          throw this.error("Bad character range");
        }
        ranges.push([lo.codePoint, hi.codePoint]);
      } else {
        ranges.push([lo.codePoint, lo.codePoint]);
      }
    }
    this.expect("]");
    return negated ? complementChars(ranges) : chars(ranges);
  }

  private parseClassAtom(): ClassEscape | CharEscape {
    if (this.peek() === "\\") return this.parseEscape();
    return { tag: "char", codePoint: this.next() };
  }

  private parseEscape(): ClassEscape | CharEscape {
    this.expect("\\");
    if (this.atEnd()) throw this.error("Dangling escape");
    const c = this.peek();
    this.pos++;
    switch (c) {
      case "d":
        return { tag: "class", ranges: DIGITS, negated: false };
      case "D":
        return { tag: "class", ranges: DIGITS, negated: true };
      case "w":
        return { tag: "class", ranges: WORD, negated: false };
      case "W":
        return { tag: "class", ranges: WORD, negated: true };
      case "s":
        return { tag: "class", ranges: SPACE, negated: false };
      case "S":
        return { tag: "class", ranges: SPACE, negated: true };
      case "n":
        return { tag: "char", codePoint: 0x0a };
      case "t":
        return { tag: "char", codePoint: 0x09 };
      case "r":
        return { tag: "char", codePoint: 0x0d };
      case "f":
        return { tag: "char", codePoint: 0x0c };
      case "v":
        return { tag: "char", codePoint: 0x0b };
      case "0":
        return { tag: "char", codePoint: 0 };
      case "x":
        return { tag: "char", codePoint: this.parseHex(2) };
      case "u":
        return { tag: "char", codePoint: this.parseHex(4) };
      default:
        return { tag: "char", codePoint: this.chars[this.pos - 1] };
    }
  }

  private parseHex(length: number): number {
    let digits = "";
    for (let i = 0; i < length; i++) {
      if (!/[0-9a-fA-F]/.test(this.peek())) throw this.error("Expected a hex digit");
      digits += this.peek();
      this.pos++;
    }
    return Number.parseInt(digits, 16);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private atEnd(): boolean {
    return this.pos >= this.chars.length;
  }

  private peek(): string {
    return this.peekAt(0);
  }

  private peekAt(offset: number): string {
    const cp = this.chars[this.pos + offset];
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  private next(): number {
    const cp = this.chars[this.pos];
    if (cp === undefined) throw this.error("Unexpected end of pattern");
    this.pos++;
    return cp;
  }

  private expect(c: string): void {
    if (this.peek() !== c) {
      throw this.error(`Expected ${JSON.stringify(c)}`);
    }
    this.pos++;
  }

  private error(message: string): RegexSyntaxError {
    return new RegexSyntaxError(message, this.pattern, this.pos);
  }
}

function complementRanges(ranges: readonly CharRange[]): CharRange[] {
  const r = complementChars(ranges);
  return r.tag === "chars" ? [...r.ranges] : [];
}

export function parseRegex(pattern: string): Regex {
  return new RegexParser(pattern).parse();
}
