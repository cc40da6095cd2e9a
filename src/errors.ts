/**
 * Error taxonomy.
 *
 * Every failure is surfaced synchronously to the caller of the failing
 * operation (or as the rejection of the returned promise for solver calls).
 * Nothing is retried internally.
 */

/**
 * Malformed construction: type mismatches, null literals, forbidden nesting,
 * bad bindings, or reading the model of an unsatisfiable solution.
 */
export class ModelingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelingError";
  }
}

/**
 * A well-typed expression uses a type or operation the selected backend
 * cannot encode. Raised before the engine is consulted.
 */
export class CapabilityError extends Error {
  constructor(
    public readonly backend: string,
    message: string
  ) {
    super(`${backend} backend: ${message}`);
    this.name = "CapabilityError";
  }
}

/**
 * The decision procedure itself failed (unknown result, timeout, resource
 * exhaustion, rejected script).
 */
export class EngineError extends Error {
  constructor(
    public readonly backend: string,
    message: string
  ) {
    super(`${backend} engine failure: ${message}`);
    this.name = "EngineError";
  }
}

/**
 * A query counts the entries of a free map and has no model within the
 * entries modeled for it. Larger maps may still satisfy it; raise
 * `mapDepth` to search further.
 */
export class BoundExceededError extends Error {
  constructor(
    public readonly mapDepth: number,
    message: string
  ) {
    super(message);
    this.name = "BoundExceededError";
  }
}
