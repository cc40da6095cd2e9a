import { ModelingError } from "./errors";
import type { BackendName } from "./backends/backend";

export interface SolverOptions {
  /** Decision procedure to translate into */
  backend: BackendName;
  /**
   * Extra override slots for a free map whose size is counted. Other maps get
   * exactly as many slots as the query has keys to observe.
   */
  mapDepth: number;
  /** Forwarded to the SMT engine; a timeout surfaces as an `EngineError` */
  timeoutMs?: number;
  /** Write generated scripts and check results with `console.debug` */
  debug: boolean;
}

export const defaultSolverOptions: SolverOptions = {
  backend: "smt",
  mapDepth: 3,
  debug: false,
};

export function resolveOptions(options: Partial<SolverOptions> = {}): SolverOptions {
  const opts = { ...defaultSolverOptions, ...options };
  if (!Number.isInteger(opts.mapDepth) || opts.mapDepth < 0) {
    throw new ModelingError(`mapDepth must be a non-negative integer, got ${opts.mapDepth}`);
  }
  if (opts.timeoutMs !== undefined && !(opts.timeoutMs > 0)) {
    throw new ModelingError(`timeoutMs must be positive, got ${opts.timeoutMs}`);
  }
  return opts;
}
