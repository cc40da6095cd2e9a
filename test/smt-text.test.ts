/**
 * SMT-LIB Text Tests
 *
 * Printing terms, reading printed models back, and the regex translation.
 * Nothing here starts the engine.
 */
import { describe, it, expect } from "vitest";

import {
  SExprSyntaxError,
  app,
  bitVector,
  modelDefinitions,
  numeral,
  parseSExprs,
  parseStringLiteral,
  printSExpr,
  stringLiteral,
  symbol,
} from "../src/backends/smt/sexpr";
import { SmtBackend, readModelValue, sortOf } from "../src/backends/smt/smt-backend";
import { regexToSmt } from "../src/backends/smt/regex-to-smt";
import { parseRegex } from "../src/regex/parser";
import {
  EngineError,
  CapabilityError,
  boolType,
  int32Type,
  int8Type,
  byteType,
  bigintType,
  charType,
  stringType,
  seqType,
  objectType,
  intVal,
  charVal,
  stringVal,
  seqVal,
  trueVal,
  findAll,
  variable,
  eq,
} from "../src";

describe("Printing", () => {
  it("prints nested terms", () => {
    expect(printSExpr(app("and", app("=", "x", "1"), "true"))).toBe("(and (= x 1) true)");
  });

  it("quotes symbols", () => {
    expect(symbol("x#0.value")).toBe("|x#0.value|");
    expect(symbol("a|b\\c")).toBe("|a_b_c|");
  });

  it("prints integers", () => {
    expect(printSExpr(numeral(-5n))).toBe("(- 5)");
    expect(printSExpr(numeral(12n))).toBe("12");
    expect(printSExpr(bitVector(-1n, 8))).toBe("(_ bv255 8)");
    expect(printSExpr(bitVector(3n, 32))).toBe("(_ bv3 32)");
  });

  it("escapes string literals", () => {
    expect(stringLiteral("ab")).toBe('"ab"');
    expect(stringLiteral('say "hi"')).toBe('"say ""hi"""');
    expect(stringLiteral("a\\b")).toBe('"a\\u{5c}b"');
    expect(stringLiteral("é😀")).toBe('"\\u{e9}\\u{1f600}"');
  });

  it("decodes string literals", () => {
    expect(parseStringLiteral('"say ""hi"""')).toBe('say "hi"');
    expect(parseStringLiteral('"\\u{e9}\\u0041"')).toBe("éA");
    expect(parseStringLiteral(stringLiteral("x\\y\n😀"))).toBe("x\\y\n😀");
  });

  it("maps types to sorts", () => {
    expect(printSExpr(sortOf(int8Type))).toBe("(_ BitVec 8)");
    expect(printSExpr(sortOf(bigintType))).toBe("Int");
    expect(printSExpr(sortOf(charType))).toBe("Int");
    expect(printSExpr(sortOf(seqType(boolType)))).toBe("(Seq Bool)");
    expect(() => sortOf(objectType("P", [["x", int32Type]]))).toThrow(CapabilityError);
  });
});

describe("Reading", () => {
  it("parses nested lists and atoms", () => {
    expect(parseSExprs("(a (b c) |d e|) f ; comment\n g")).toEqual([["a", ["b", "c"], "d e"], "f", "g"]);
  });

  it("keeps string quotes", () => {
    expect(parseSExprs('(x "a b" "q""q")')).toEqual([["x", '"a b"', '"q""q"']]);
  });

  it("rejects unbalanced input", () => {
    expect(() => parseSExprs("(a")).toThrow(SExprSyntaxError);
    expect(() => parseSExprs("a)")).toThrow(SExprSyntaxError);
    expect(() => parseSExprs('"abc')).toThrow(SExprSyntaxError);
  });

  it("collects constant definitions from a model", () => {
    const text = `(
      (define-fun |x#0| () (_ BitVec 8) #x0a)
      (define-fun |s#1| () String "hi")
      (define-fun f ((a Int)) Int a)
    )`;
    const defs = modelDefinitions(text);
    expect([...defs.keys()]).toEqual(["x#0", "s#1"]);
    expect(defs.get("x#0")).toBe("#x0a");
    expect(defs.get("s#1")).toBe('"hi"');
  });

  it("reads model values", () => {
    expect(readModelValue("true", boolType)).toEqual(trueVal);
    expect(readModelValue("#xff", int8Type)).toEqual(intVal(-1));
    expect(readModelValue("#xff", byteType)).toEqual(intVal(255));
    expect(readModelValue("#b101", byteType)).toEqual(intVal(5));
    expect(readModelValue(["_", "bv7", "32"], int32Type)).toEqual(intVal(7));
    expect(readModelValue(["-", "42"], bigintType)).toEqual(intVal(-42));
    expect(readModelValue("97", charType)).toEqual(charVal("a"));
    expect(readModelValue('"a""b"', stringType)).toEqual(stringVal('a"b'));
  });

  it("reads sequences", () => {
    const t = seqType(int8Type);
    expect(readModelValue(["as", "seq.empty", ["Seq", ["_", "BitVec", "8"]]], t)).toEqual(seqVal([]));
    expect(readModelValue(["seq.++", ["seq.unit", "#x01"], ["seq.unit", "#x02"]], t)).toEqual(
      seqVal([intVal(1), intVal(2)])
    );
  });

  it("rejects values it cannot read", () => {
    expect(() => readModelValue("maybe", boolType)).toThrow(EngineError);
    expect(() => readModelValue(["f", "1"], int32Type)).toThrow(EngineError);
  });
});

describe("Term construction", () => {
  it("folds boolean constants", () => {
    const smt = new SmtBackend();
    expect(smt.and("true", "p")).toBe("p");
    expect(smt.or("p", "true")).toBe("true");
    expect(smt.not("false")).toBe("true");
    expect(smt.ite("true", "a", "b")).toBe("a");
    expect(smt.eq("a", "a")).toBe("true");
  });

  it("picks signed and unsigned comparisons", () => {
    const smt = new SmtBackend();
    expect(printSExpr(smt.lt("a", "b", int8Type))).toBe("(bvslt a b)");
    expect(printSExpr(smt.lt("a", "b", byteType))).toBe("(bvult a b)");
    expect(printSExpr(smt.le("a", "b", bigintType))).toBe("(<= a b)");
  });

  it("encodes constants", () => {
    const smt = new SmtBackend();
    expect(printSExpr(smt.constant(seqVal([intVal(1)]), seqType(byteType)))).toBe("(seq.unit (_ bv1 8))");
    expect(printSExpr(smt.constant(seqVal([]), seqType(bigintType)))).toBe("(as seq.empty (Seq Int))");
    expect(smt.constant(charVal("a"), charType)).toBe("97");
  });

  it("rejects sequences of records", () => {
    const point = objectType("Point", [["x", int32Type]]);
    const s = variable("s", seqType(point));
    expect(() => findAll(eq(s, variable("t", seqType(point))))).toThrow(CapabilityError);
  });
});

describe("Regex translation", () => {
  it("translates characters, ranges and the wildcard", () => {
    expect(printSExpr(regexToSmt(parseRegex("a")))).toBe('(str.to_re "a")');
    expect(printSExpr(regexToSmt(parseRegex("[a-c]")))).toBe('(re.range "a" "c")');
    expect(printSExpr(regexToSmt(parseRegex(".")))).toBe("re.allchar");
  });

  it("translates to a term the engine can read", () => {
    const printed = printSExpr(regexToSmt(parseRegex("a+b+")));
    expect(printed).toContain("re.*");
    expect(parseSExprs(printed)).toHaveLength(1);
  });
});
