/**
 * Source text of a compiled function.
 *
 * Parentheses are added only where precedence requires them. Record keys
 * that are not plain identifiers, and `__proto__`, are printed as computed
 * keys so every field becomes an own data property.
 */

import { JSExpr, JSFunction, JSBinaryOperator, JSLiteralValue } from "./js-ast";

export function printFunction(fn: JSFunction): string {
  const lines = fn.locals.map(({ name, value }) => `  const ${name} = ${printExpr(value)};`);
  lines.push(`  return ${printExpr(fn.result)};`);
  return `(${fn.params.join(", ")}) => {\n${lines.join("\n")}\n}`;
}

export function printExpr(expr: JSExpr): string {
  switch (expr.tag) {
    case "jsLit":
      return printLiteral(expr.value);
    case "jsLocal":
      return expr.name;
    case "jsConstant":
      return `K[${expr.index}]`;
    case "jsHelper":
      return `rt.${expr.name}(${printArgs(expr.args)})`;
    case "jsGlobalCall":
      return `${expr.callee}(${printArgs(expr.args)})`;
    case "jsBinop":
      return `${operand(expr.left, expr.op, "left")} ${expr.op} ${operand(expr.right, expr.op, "right")}`;
    case "jsUnary": {
      const inner = printExpr(expr.operand);
      return expr.operand.tag === "jsBinop" || expr.operand.tag === "jsUnary" || expr.operand.tag === "jsTernary"
        ? `${expr.op}(${inner})`
        : `${expr.op}${inner}`;
    }
    case "jsTernary": {
      const cond = expr.cond.tag === "jsTernary" ? `(${printExpr(expr.cond)})` : printExpr(expr.cond);
      return `${cond} ? ${printExpr(expr.then)} : ${printExpr(expr.else)}`;
    }
    case "jsMember": {
      const obj = receiver(expr.obj);
      return isIdentifier(expr.prop) ? `${obj}.${expr.prop}` : `${obj}[${JSON.stringify(expr.prop)}]`;
    }
    case "jsMethod":
      return `${receiver(expr.obj)}.${expr.method}(${printArgs(expr.args)})`;
    case "jsRecord":
      if (expr.fields.length === 0) return "{}";
      return `{ ${expr.fields.map(({ key, value }) => `${recordKey(key)}: ${printExpr(value)}`).join(", ")} }`;
    case "jsArray":
      return `[${printArgs(expr.elements)}]`;
  }
}

function printLiteral(value: JSLiteralValue): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    default:
      return String(value);
  }
}

const printArgs = (args: readonly JSExpr[]): string => args.map(printExpr).join(", ");

const PRECEDENCE: Record<JSBinaryOperator, number> = {
  "||": 1,
  "&&": 2,
  "|": 3,
  "^": 4,
  "&": 5,
  "===": 6,
  "<": 7,
  ">": 7,
  "<=": 7,
  "+": 8,
  "-": 8,
  "*": 9,
};

function operand(expr: JSExpr, parent: JSBinaryOperator, side: "left" | "right"): string {
  const code = printExpr(expr);
  if (expr.tag === "jsTernary") return `(${code})`;
  if (expr.tag !== "jsBinop") return code;
  const child = PRECEDENCE[expr.op];
  const outer = PRECEDENCE[parent];
  return child < outer || (child === outer && side === "right") ? `(${code})` : code;
}

/** Receivers of `.` need parentheses around operators and numeric literals */
function receiver(obj: JSExpr): string {
  const code = printExpr(obj);
  const wrap =
    obj.tag === "jsBinop" ||
    obj.tag === "jsUnary" ||
    obj.tag === "jsTernary" ||
    (obj.tag === "jsLit" && (typeof obj.value === "number" || typeof obj.value === "bigint"));
  return wrap ? `(${code})` : code;
}

const isIdentifier = (name: string): boolean => /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);

// A literal `__proto__: v` would set the prototype instead of a field
const recordKey = (key: string): string =>
  isIdentifier(key) && key !== "__proto__" ? key : `[${JSON.stringify(key)}]`;
