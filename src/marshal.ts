/**
 * Building host objects from named values.
 *
 * A factory describes how to construct one kind of object: the names of its
 * constructor parameters and of the fields that can be set afterwards.
 * Names match exactly first, then case-insensitively; a case-insensitive
 * match against several parameters is ambiguous.
 */

import { ModelingError } from "./errors";
import { Value, valueEquals, valueKey, valueToString } from "./value";
import * as defaultMaps from "./maps/default-map";

/** Plain JavaScript form of a `Value` */
export type Native =
  | boolean
  | bigint
  | string
  | undefined
  | readonly Native[]
  | { readonly [field: string]: Native }
  | ReadonlyMap<Native, Native>;

export interface InstanceFactory<T> {
  /** Constructor parameter names, in order */
  readonly parameters: readonly string[];
  /** Fields assigned after construction */
  readonly settable?: readonly string[];
  construct(args: readonly Native[]): T;
  set?(instance: T, field: string, value: Native): void;
}

/**
 * Convert a value to plain JavaScript: integers are bigints, characters are
 * one-character strings, options are the value or undefined, records are
 * objects and maps are `Map`s holding only their effective entries.
 */
export function toNative(v: Value): Native {
  switch (v.tag) {
    case "bool":
      return v.value;
    case "int":
      return v.value;
    case "char":
      return String.fromCodePoint(v.codePoint);
    case "string":
      return v.value;
    case "seq":
      return v.elements.map(toNative);
    case "option":
      return v.value === undefined ? undefined : toNative(v.value);
    case "object":
      return Object.fromEntries([...v.fields].map(([name, f]) => [name, toNative(f)] as const));
    case "map":
      return new Map([...v.entries.values()].map((e) => [toNative(e.key), toNative(e.value)] as const));
    case "defaultMap":
      return new Map(
        defaultMaps.effectiveEntries(v, valueKey, valueEquals).map((o) => [toNative(o.key), toNative(o.value)] as const)
      );
  }
}

function resolveName(name: string, candidates: readonly string[]): string | undefined {
  if (candidates.includes(name)) return name;
  const lower = name.toLowerCase();
  const matches = candidates.filter((c) => c.toLowerCase() === lower);
  if (matches.length > 1) {
    throw new ModelingError(`Name ${name} is ambiguous between ${matches.join(", ")}`);
  }
  return matches[0];
}

/**
 * Construct an instance from named values. Every name must match a
 * constructor parameter or a settable field; parameters without a value
 * receive undefined.
 */
export function buildInstance<T>(factory: InstanceFactory<T>, values: ReadonlyMap<string, Native>): T {
  const args = new Map<string, Native>();
  const assignments: [string, Native][] = [];
  for (const [name, value] of values) {
    const parameter = resolveName(name, factory.parameters);
    if (parameter !== undefined) {
      args.set(parameter, value);
      continue;
    }
    const field = factory.set === undefined ? undefined : resolveName(name, factory.settable ?? []);
    if (field === undefined) {
      throw new ModelingError(`No constructor parameter or settable field matches ${name}`);
    }
    assignments.push([field, value]);
  }
  const instance = factory.construct(factory.parameters.map((p) => args.get(p)));
  for (const [field, value] of assignments) {
    factory.set?.(instance, field, value);
  }
  return instance;
}

/** Build an instance from the fields of a record value */
export function instanceFromValue<T>(v: Value, factory: InstanceFactory<T>): T {
  if (v.tag !== "object") {
    throw new ModelingError(`Only records can be marshaled, got ${valueToString(v)}`);
  }
  return buildInstance(factory, new Map([...v.fields].map(([name, f]) => [name, toNative(f)] as const)));
}
