/**
 * Typed expressions you can interpret, compile to JavaScript, or solve.
 */

// Errors
export { ModelingError, CapabilityError, EngineError, BoundExceededError } from "./errors";
export { RegexSyntaxError } from "./regex/parser";

// Types
export {
  boolType,
  bigintType,
  charType,
  stringType,
  intType,
  int8Type,
  byteType,
  shortType,
  ushortType,
  int32Type,
  uint32Type,
  longType,
  ulongType,
  seqType,
  optionType,
  objectType,
  tupleType,
  mapType,
  defaultMapType,
  setType,
  typeToString,
  MAX_CHAR,
} from "./types";
export type {
  Type,
  IntBits,
  IntType,
  SeqType,
  OptionType,
  ObjectType,
  MapType,
  DefaultMapType,
  AnyMapType,
} from "./types";

// Values
export {
  trueVal,
  falseVal,
  boolVal,
  intVal,
  charVal,
  stringVal,
  seqVal,
  someVal,
  noneVal,
  objectVal,
  tupleVal,
  mapVal,
  defaultMapVal,
  defaultValue,
  valueEquals,
  valueHasType,
  valueToString,
} from "./value";
export type { Value, MapEntry } from "./value";

// Expressions
export { internedNodeCount, freeVariables, exprSize, exprToString } from "./expr";
export type { Expr, VarExpr } from "./expr";
export * from "./builders";

// Evaluation and compilation
export { evaluate } from "./evaluate";
export type { Bindings } from "./evaluate";
export { compile } from "./codegen/compile";
export type { CompiledExpression } from "./codegen/compile";

// Solving
export { solve, findFirst, findAll, isValid, take, Model, Solution } from "./solver";
export { defaultSolverOptions } from "./options";
export type { SolverOptions } from "./options";
export type { BackendName } from "./backends/backend";
export { shutdownSmtEngine } from "./backends/smt/z3-engine";

// Functions and marshaling
export { ExprFunction } from "./function";
export type { Parameter, Invariant } from "./function";
export { buildInstance, instanceFromValue, toNative } from "./marshal";
export type { InstanceFactory, Native } from "./marshal";

// Regular expressions
export { parseRegex } from "./regex/parser";
export { RegexAutomaton } from "./regex/automaton";
