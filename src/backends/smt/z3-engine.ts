/**
 * The z3 engine, loaded once per process.
 *
 * Scripts are handed over as SMT-LIB text. Each `fromString` call parses in
 * a fresh command context, so every call repeats the declarations it uses;
 * constants with the same name and sort resolve to the same symbol, which
 * lets one solver accumulate assertions across calls.
 */

import { init } from "z3-solver";
import type { Context, Solver } from "z3-solver";
import { EngineError } from "../../errors";

type Z3Api = Awaited<ReturnType<typeof init>>;

let api: Promise<Z3Api> | undefined;
let context: Promise<Context<"solvable">> | undefined;

function loadApi(): Promise<Z3Api> {
  api ??= init();
  return api;
}

function loadContext(): Promise<Context<"solvable">> {
  context ??= loadApi().then(({ Context }) => Context("solvable"));
  return context;
}

export type CheckResult = "sat" | "unsat";

/**
 * One z3 solver. Not reusable after `release`.
 */
export class Z3Session {
  private solver: Solver<"solvable"> | undefined;

  private constructor(solver: Solver<"solvable">) {
    this.solver = solver;
  }

  static async open(timeoutMs: number | undefined): Promise<Z3Session> {
    const ctx = await loadContext();
    const solver = new ctx.Solver();
    if (timeoutMs !== undefined) solver.set("timeout", timeoutMs);
    return new Z3Session(solver);
  }

  private get live(): Solver<"solvable"> {
    if (this.solver === undefined) throw new EngineError("smt", "session already released");
    return this.solver;
  }

  /** Add the assertions of an SMT-LIB script */
  load(script: string): void {
    try {
      this.live.fromString(script);
    } catch (err) {
      throw new EngineError("smt", `script rejected: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async check(): Promise<CheckResult> {
    const result = await this.live.check();
    if (result === "unknown") {
      throw new EngineError("smt", "solver returned unknown (timeout or incomplete theory)");
    }
    return result;
  }

  /** The current model as printed by the engine */
  modelText(): string {
    return this.live.model().sexpr();
  }

  release(): void {
    this.solver?.release();
    this.solver = undefined;
  }
}

/**
 * Stop the engine's worker threads so the process can exit. Later solves
 * load the engine again.
 */
export async function shutdownSmtEngine(): Promise<void> {
  const loaded = api;
  if (loaded === undefined) return;
  api = undefined;
  context = undefined;
  const { em } = await loaded;
  em.PThread.terminateAllThreads();
}
