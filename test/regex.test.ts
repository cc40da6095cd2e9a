/**
 * Regex Tests
 *
 * Pattern parsing and whole-string matching through derivative automata.
 */
import { describe, it, expect } from "vitest";

import { RegexAutomaton, RegexSyntaxError, ModelingError } from "../src";

function accepts(pattern: string, input: string): boolean {
  return RegexAutomaton.fromPattern(pattern).accepts(input);
}

describe("Regex matching", () => {
  it("matches the whole string", () => {
    expect(accepts("a+b+", "ab")).toBe(true);
    expect(accepts("a+b+", "aabbb")).toBe(true);
    expect(accepts("a+b+", "")).toBe(false);
    expect(accepts("a+b+", "ba")).toBe(false);
    expect(accepts("a+b+", "abc")).toBe(false);
  });

  it("ignores anchors", () => {
    expect(accepts("^(?:ab|cd)*$", "")).toBe(true);
    expect(accepts("^(?:ab|cd)*$", "abcdab")).toBe(true);
    expect(accepts("^(?:ab|cd)*$", "abc")).toBe(false);
  });

  it("supports character classes", () => {
    expect(accepts("[a-c]x", "bx")).toBe(true);
    expect(accepts("[a-c]x", "dx")).toBe(false);
    expect(accepts("[^a-c]", "a")).toBe(false);
    expect(accepts("[^a-c]", "z")).toBe(true);
    expect(accepts("[a-]", "-")).toBe(true);
  });

  it("supports escapes", () => {
    expect(accepts("\\d\\d", "42")).toBe(true);
    expect(accepts("\\w+", "snake_case1")).toBe(true);
    expect(accepts("\\s", "\t")).toBe(true);
    expect(accepts("\\D", "7")).toBe(false);
    expect(accepts("a\\.b", "a.b")).toBe(true);
    expect(accepts("a\\.b", "axb")).toBe(false);
    expect(accepts("\\x41\\u0062", "Ab")).toBe(true);
  });

  it("supports bounded repetition", () => {
    expect(accepts("\\d{2,3}", "1")).toBe(false);
    expect(accepts("\\d{2,3}", "12")).toBe(true);
    expect(accepts("\\d{2,3}", "123")).toBe(true);
    expect(accepts("\\d{2,3}", "1234")).toBe(false);
    expect(accepts("x{2,}", "xxxxx")).toBe(true);
    expect(accepts("x{2}", "xxx")).toBe(false);
  });

  it("supports optional parts", () => {
    expect(accepts("colou?r", "color")).toBe(true);
    expect(accepts("colou?r", "colour")).toBe(true);
  });

  it("reads input by code point", () => {
    expect(accepts(".", "😀")).toBe(true);
    expect(accepts("..", "😀")).toBe(false);
  });

  it("reuses states across inputs", () => {
    const automaton = RegexAutomaton.fromPattern("(ab)*");
    expect(automaton.accepts("abab")).toBe(true);
    const states = automaton.stateCount;
    expect(automaton.accepts("ababab")).toBe(true);
    expect(automaton.stateCount).toBe(states);
  });
});

describe("Regex syntax errors", () => {
  it("reports unbalanced groups", () => {
    expect(() => RegexAutomaton.fromPattern("(ab")).toThrow(RegexSyntaxError);
    expect(() => RegexAutomaton.fromPattern("ab)")).toThrow(RegexSyntaxError);
  });

  it("reports dangling quantifiers", () => {
    expect(() => RegexAutomaton.fromPattern("*a")).toThrow(RegexSyntaxError);
  });

  it("reports bad bounds and classes", () => {
    expect(() => RegexAutomaton.fromPattern("a{3,1}")).toThrow(RegexSyntaxError);
    expect(() => RegexAutomaton.fromPattern("[z-a]")).toThrow(RegexSyntaxError);
    expect(() => RegexAutomaton.fromPattern("[a-")).toThrow(RegexSyntaxError);
  });

  it("is a modeling error with a position", () => {
    try {
      RegexAutomaton.fromPattern("ab)");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ModelingError);
      expect(e).toBeInstanceOf(RegexSyntaxError);
      if (e instanceof RegexSyntaxError) {
        expect(e.position).toBe(2);
        expect(e.pattern).toBe("ab)");
      }
    }
  });
});
