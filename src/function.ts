/**
 * Functions over typed parameters: evaluate, compile, or search for inputs.
 */

import { ModelingError } from "./errors";
import type { Expr, VarExpr } from "./expr";
import { Type, typeToString } from "./types";
import type { Value } from "./value";
import { andAll, variable } from "./builders";
import { evaluate } from "./evaluate";
import { compile, CompiledExpression } from "./codegen/compile";
import type { SolverOptions } from "./options";
import { findAll, solve } from "./solver";

export type Parameter = readonly [name: string, type: Type];

/** Predicate over a function's inputs and its output */
export type Invariant = (inputs: readonly Expr[], output: Expr) => Expr;

export class ExprFunction {
  readonly parameters: readonly VarExpr[];
  readonly body: Expr;
  private readonly assumptions: Expr[] = [];
  private compiled: CompiledExpression | undefined;

  constructor(parameters: readonly Parameter[], build: (...args: Expr[]) => Expr) {
    this.parameters = parameters.map(([name, type]) => variable(name, type));
    this.body = build(...this.parameters);
  }

  get outputType(): Type {
    return this.body.type;
  }

  private bindings(args: readonly Value[]): Map<string, Value> {
    if (args.length !== this.parameters.length) {
      throw new ModelingError(`Expected ${this.parameters.length} arguments, got ${args.length}`);
    }
    return new Map(this.parameters.map((p, i) => [p.name, args[i]] as const));
  }

  evaluate(...args: Value[]): Value {
    return evaluate(this.body, this.bindings(args));
  }

  /** Compile once; later calls reuse the generated code */
  compile(): (...args: Value[]) => Value {
    const compiled = (this.compiled ??= compile(this.body));
    return (...args) => compiled.evaluate(this.bindings(args));
  }

  /** Restrict `find` and `findAll` to inputs satisfying a precondition */
  assume(precondition: (...args: Expr[]) => Expr): this {
    const condition = precondition(...this.parameters);
    if (condition.type.kind !== "bool") {
      throw new ModelingError(`Assumptions must be boolean, got ${typeToString(condition.type)}`);
    }
    this.assumptions.push(condition);
    return this;
  }

  private query(invariant: Invariant): Expr {
    return andAll(...this.assumptions, invariant(this.parameters, this.body));
  }

  /** Inputs for which the invariant holds, if any */
  async find(invariant: Invariant, options?: Partial<SolverOptions>): Promise<Value[] | undefined> {
    const solution = await solve(this.query(invariant), options);
    if (!solution.satisfiable) return undefined;
    return this.parameters.map((p) => solution.get(p));
  }

  /** Every distinct input for which the invariant holds */
  async *findAll(invariant: Invariant, options?: Partial<SolverOptions>): AsyncGenerator<Value[], void, undefined> {
    for await (const model of findAll(this.query(invariant), options)) {
      yield this.parameters.map((p) => model.get(p));
    }
  }
}
