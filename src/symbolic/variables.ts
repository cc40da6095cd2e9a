/**
 * Free variables as symbolic values, and reading them back from a model.
 *
 * Every variable is decomposed into leaves: one per scalar field, a
 * presence flag plus payload per option, and a number of (present, key,
 * value) slots per map chosen by the caller for each map type. All leaves
 * are declared in a single batch so the backend can lay them out together.
 */

import type { VarExpr } from "../expr";
import { ModelingError } from "../errors";
import { Type, ObjectType, OptionType, AnyMapType, boolType, typeToString } from "../types";
import {
  Value,
  objectVal,
  someVal,
  noneVal,
  valueKey,
  valueEquals,
  defaultValue,
} from "../value";
import * as defaultMaps from "../maps/default-map";
import { storedType } from "../maps/symbolic-map";
import { LeafDecl, isLeafType } from "../backends/backend";
import { Symbolic, SymbolicAlgebra, leaf } from "./symbolic";

type Shape =
  | { kind: "leaf"; type: Type; index: number }
  | { kind: "object"; type: ObjectType; fields: [string, Shape][] }
  | { kind: "option"; type: OptionType; has: number; value: Shape }
  | { kind: "map"; type: AnyMapType; slots: Slot[] };

interface Slot {
  present: number;
  key: Shape;
  value: Shape;
}

export interface SymbolicVariable<T> {
  readonly variable: VarExpr;
  readonly symbolic: Symbolic<T>;
}

class ShapeBuilder {
  readonly leaves: LeafDecl[] = [];

  constructor(private readonly slotsFor: (t: AnyMapType) => number) {}

  private declare(name: string, type: Type): number {
    this.leaves.push({ name, type });
    return this.leaves.length - 1;
  }

  build(name: string, t: Type): Shape {
    if (isLeafType(t)) return { kind: "leaf", type: t, index: this.declare(name, t) };
    switch (t.kind) {
      case "object":
        return { kind: "object", type: t, fields: t.fields.map((f): [string, Shape] => [f.name, this.build(`${name}.${f.name}`, f.type)]) };
      case "option":
        return {
          kind: "option",
          type: t,
          has: this.declare(`${name}.has`, boolType),
          value: this.build(`${name}.value`, t.element),
        };
      case "map":
      case "defaultMap": {
        const slots: Slot[] = [];
        const n = this.slotsFor(t);
        for (let i = 0; i < n; i++) {
          slots.push({
            present: this.declare(`${name}[${i}].present`, boolType),
            key: this.build(`${name}[${i}].key`, t.key),
            value: this.build(`${name}[${i}].value`, storedType(t)),
          });
        }
        return { kind: "map", type: t, slots };
      }
      default:
        throw new ModelingError(`Cannot declare a variable of type ${typeToString(t)}`);
    }
  }
}

function instantiate<T>(alg: SymbolicAlgebra<T>, shape: Shape, terms: readonly T[]): Symbolic<T> {
  switch (shape.kind) {
    case "leaf":
      return leaf(shape.type, terms[shape.index]);
    case "object":
      return {
        kind: "object",
        type: shape.type,
        fields: new Map(shape.fields.map(([name, s]) => [name, instantiate(alg, s, terms)] as const)),
      };
    case "option":
      return { kind: "option", type: shape.type, has: terms[shape.has], value: instantiate(alg, shape.value, terms) };
    case "map":
      return {
        kind: "map",
        type: shape.type,
        defaultValue: alg.defaultOf(storedType(shape.type)),
        entries: shape.slots.map((slot) => ({
          guard: terms[slot.present],
          key: instantiate(alg, slot.key, terms),
          value: instantiate(alg, slot.value, terms),
        })),
      };
  }
}

/**
 * Declare every variable's leaves with the backend and return the symbolic
 * value of each variable.
 */
export function declareVariables<T>(
  alg: SymbolicAlgebra<T>,
  variables: readonly VarExpr[],
  slotsFor: (t: AnyMapType) => number
): SymbolicVariable<T>[] {
  const builder = new ShapeBuilder(slotsFor);
  const shapes = variables.map((v) => builder.build(`${v.name}#${v.id}`, v.type));
  const terms = alg.backend.declare(builder.leaves);
  return variables.map((variable, i) => ({ variable, symbolic: instantiate(alg, shapes[i], terms) }));
}

export type LeafReader<T> = (term: T, type: Type) => Value;

/**
 * Concrete value of a declared variable under a model. Maps replay their
 * present slots oldest first and keep only what differs from the default.
 */
export function readValue<T>(s: Symbolic<T>, read: LeafReader<T>): Value {
  switch (s.kind) {
    case "leaf":
      return read(s.term, s.type);
    case "object":
      return objectVal(new Map([...s.fields].map(([name, f]) => [name, readValue(f, read)] as const)));
    case "option": {
      const has = read(s.has, boolType);
      return has.tag === "bool" && has.value ? someVal(readValue(s.value, read)) : noneVal;
    }
    case "map": {
      const history: defaultMaps.Override<Value, Value>[] = [];
      for (const entry of s.entries) {
        const present = read(entry.guard, boolType);
        if (present.tag === "bool" && present.value) {
          history.push({ key: readValue(entry.key, read), value: readValue(entry.value, read) });
        }
      }
      const fallback = defaultValue(storedType(s.type));
      const effective = defaultMaps.effectiveEntries({ overrides: history, defaultValue: fallback }, valueKey, valueEquals);
      if (s.type.kind === "defaultMap") {
        return { tag: "defaultMap", overrides: effective, defaultValue: fallback };
      }
      const entries = new Map<string, { key: Value; value: Value }>();
      for (const o of effective) {
        if (o.value.tag === "option" && o.value.value !== undefined) {
          entries.set(valueKey(o.key), { key: o.key, value: o.value.value });
        }
      }
      return { tag: "map", entries };
    }
  }
}
