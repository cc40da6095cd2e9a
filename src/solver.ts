/**
 * Solver front-end.
 *
 * A query translates a boolean expression once: capabilities are checked
 * over the whole DAG, free variables are declared as backend leaves and the
 * expression is evaluated symbolically. Each solve then opens its own
 * backend session, so no assertion leaks from one call into another.
 */

import { BoundExceededError, ModelingError } from "./errors";
import { Expr, VarExpr, freeVariables } from "./expr";
import { Type, typeToString } from "./types";
import { requireDistinctNames } from "./evaluate";
import { Value, defaultValue, valueToString } from "./value";
import { SolverOptions, resolveOptions } from "./options";
import { BackendSession, SolverBackend, checkCapabilities } from "./backends/backend";
import { SmtBackend } from "./backends/smt/smt-backend";
import { BddBackend } from "./backends/bdd/bdd-backend";
import { SymbolicAlgebra } from "./symbolic/symbolic";
import { SymbolicVariable, declareVariables, readValue } from "./symbolic/variables";
import { SymbolicEvaluator } from "./symbolic/evaluator";
import { SlotBounds, slotBounds } from "./symbolic/slot-bounds";
import { InstanceFactory, instanceFromValue } from "./marshal";

// ============================================================================
// Models
// ============================================================================

/** A satisfying assignment of the free variables */
export class Model {
  constructor(private readonly values: ReadonlyMap<VarExpr, Value>) {}

  /** Variables that do not occur in the solved expression read their default */
  get(variable: VarExpr): Value {
    return this.values.get(variable) ?? defaultValue(variable.type);
  }

  /** Values by variable name, as taken by `evaluate` and `compile`; names are unique per query */
  get bindings(): Map<string, Value> {
    return new Map([...this.values].map(([v, value]) => [v.name, value] as const));
  }

  get variables(): VarExpr[] {
    return [...this.values.keys()];
  }

  toString(): string {
    return [...this.values].map(([v, value]) => `${v.name} = ${valueToString(value)}`).join(", ");
  }
}

export class Solution {
  constructor(
    readonly satisfiable: boolean,
    private readonly found: Model | undefined
  ) {}

  get model(): Model {
    if (this.found === undefined) {
      throw new ModelingError("No model: the expression is unsatisfiable");
    }
    return this.found;
  }

  get(variable: VarExpr): Value {
    return this.model.get(variable);
  }

  /** Marshal a record-valued variable through a factory */
  getAs<T>(variable: VarExpr, factory: InstanceFactory<T>): T {
    return instanceFromValue(this.get(variable), factory);
  }
}

// ============================================================================
// Queries
// ============================================================================

interface QuerySession {
  check(): Promise<boolean>;
  model(): Model;
  /** Exclude a model from later checks */
  block(model: Model): void;
  release(): void;
}

interface Query {
  open(): QuerySession;
}

class SymbolicQuery<T> implements Query {
  private readonly alg: SymbolicAlgebra<T>;
  private readonly bounds: SlotBounds;
  private readonly variables: SymbolicVariable<T>[];
  private readonly constraint: T;

  constructor(
    private readonly backend: SolverBackend<T>,
    expr: Expr,
    negate: boolean,
    private readonly options: SolverOptions
  ) {
    checkCapabilities(backend, expr);
    this.alg = new SymbolicAlgebra(backend);
    this.bounds = slotBounds(expr, options.mapDepth);
    this.variables = declareVariables(this.alg, freeVariables(expr), this.bounds.slotsFor);
    const term = new SymbolicEvaluator(this.alg, this.variables).term(expr);
    this.constraint = negate ? backend.not(term) : term;
    if (options.debug) {
      console.debug(`[solve] ${backend.name}: ${this.variables.length} free variables`);
    }
  }

  open(): QuerySession {
    const session = this.backend.openSession({ timeoutMs: this.options.timeoutMs, debug: this.options.debug });
    session.assert(this.constraint);
    let checked = false;
    return {
      check: async () => {
        const satisfiable = await session.check();
        // Later checks only run out of models to enumerate
        if (!satisfiable && !checked) this.requireExhaustive();
        checked = true;
        return satisfiable;
      },
      model: () => this.readModel(session),
      block: (model) => session.assert(this.blockingClause(model)),
      release: () => session.release(),
    };
  }

  private requireExhaustive(): void {
    const [counted] = this.bounds.counted;
    if (counted === undefined) return;
    throw new BoundExceededError(
      this.options.mapDepth,
      `No model with at most ${this.options.mapDepth} extra entries per counted ${typeToString(counted)}; ` +
        "raise mapDepth to search larger maps"
    );
  }

  private readModel(session: BackendSession<T>): Model {
    const read = (term: T, type: Type): Value => session.value(term, type);
    return new Model(new Map(this.variables.map(({ variable, symbolic }) => [variable, readValue(symbolic, read)] as const)));
  }

  private blockingClause(model: Model): T {
    let same = this.alg.true;
    for (const { variable, symbolic } of this.variables) {
      const value = this.alg.constant(model.get(variable), variable.type);
      same = this.backend.and(same, this.alg.eq(symbolic, value));
    }
    return this.backend.not(same);
  }
}

function prepare(expr: Expr, options: SolverOptions, negate = false): Query {
  if (expr.type.kind !== "bool") {
    throw new ModelingError(`Only boolean expressions can be solved, got ${typeToString(expr.type)}`);
  }
  requireDistinctNames(freeVariables(expr));
  switch (options.backend) {
    case "smt":
      return new SymbolicQuery(new SmtBackend(), expr, negate, options);
    case "bdd":
      return new SymbolicQuery(new BddBackend(), expr, negate, options);
  }
}

async function solveQuery(query: Query): Promise<Solution> {
  const session = query.open();
  try {
    const satisfiable = await session.check();
    return new Solution(satisfiable, satisfiable ? session.model() : undefined);
  } finally {
    session.release();
  }
}

// ============================================================================
// Operations
// ============================================================================

export async function solve(expr: Expr, options?: Partial<SolverOptions>): Promise<Solution> {
  return solveQuery(prepare(expr, resolveOptions(options)));
}

export async function findFirst(expr: Expr, options?: Partial<SolverOptions>): Promise<Model | undefined> {
  const solution = await solve(expr, options);
  return solution.satisfiable ? solution.model : undefined;
}

/**
 * Every satisfying model, one per step, each differing from all earlier ones.
 * Translation happens here, so capability errors surface immediately; each
 * iteration then owns one session, released however the iteration ends.
 */
export function findAll(expr: Expr, options?: Partial<SolverOptions>): AsyncIterable<Model> {
  const query = prepare(expr, resolveOptions(options));
  return {
    [Symbol.asyncIterator]: () => enumerate(query),
  };
}

async function* enumerate(query: Query): AsyncGenerator<Model, void, undefined> {
  const session = query.open();
  try {
    while (await session.check()) {
      const model = session.model();
      yield model;
      session.block(model);
    }
  } finally {
    session.release();
  }
}

/** True when the expression holds under every assignment */
export async function isValid(expr: Expr, options?: Partial<SolverOptions>): Promise<boolean> {
  const counterexample = await solveQuery(prepare(expr, resolveOptions(options), true));
  return !counterexample.satisfiable;
}

/** The first `n` items of an async iterable; stops the iteration early */
export async function take<T>(items: AsyncIterable<T>, n: number): Promise<T[]> {
  const result: T[] = [];
  if (n <= 0) return result;
  for await (const item of items) {
    result.push(item);
    if (result.length >= n) break;
  }
  return result;
}
