/**
 * Native compilation: lower once, then run as a JavaScript function.
 *
 * Compiled evaluation returns the same `Value` the interpreter would for
 * every binding.
 */

import { ModelingError } from "../errors";
import type { Expr, VarExpr } from "../expr";
import { typeToString } from "../types";
import type { Value } from "../value";
import { requireValueType } from "../value";
import { Bindings, lookupBinding, requireDistinctNames } from "../evaluate";
import { genFunction } from "./gen-expr";
import { printFunction } from "./js-printer";
import { Raw, fromRaw, runtime, toRaw } from "./runtime";

export interface CompiledExpression {
  /** Free variables in the order `evaluatePositional` takes them */
  readonly parameters: readonly VarExpr[];
  /** The generated JavaScript */
  readonly source: string;
  evaluate(bindings?: Bindings): Value;
  evaluatePositional(...args: Value[]): Value;
}

export function compile(expr: Expr): CompiledExpression {
  const generated = genFunction(expr);
  requireDistinctNames(generated.parameters);
  const source = printFunction(generated.function);
  const fn: unknown = new Function(`"use strict";\nreturn ${source};`)();
  if (typeof fn !== "function") {
    throw new ModelingError("Generated code did not produce a function");
  }
  const { parameters, constants } = generated;

  const run = (args: readonly Value[]): Value => {
    const raws: Raw[] = parameters.map((p, i) => {
      const v = args[i];
      requireValueType(v, p.type, `Argument for ${p.name}`);
      return toRaw(v, p.type);
    });
    const result: unknown = Reflect.apply(fn, undefined, [runtime, constants, ...raws]);
    return fromRaw(result, expr.type);
  };

  return {
    parameters,
    source,
    evaluate(bindings: Bindings = {}) {
      return run(
        parameters.map((p) => {
          const v = lookupBinding(bindings, p.name);
          if (v === undefined) {
            throw new ModelingError(`No binding for variable ${p.name}: ${typeToString(p.type)}`);
          }
          return v;
        })
      );
    },
    evaluatePositional(...args: Value[]) {
      if (args.length !== parameters.length) {
        throw new ModelingError(`Expected ${parameters.length} arguments, got ${args.length}`);
      }
      return run(args);
    },
  };
}
