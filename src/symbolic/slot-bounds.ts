/**
 * How many override slots each free map needs.
 *
 * Take any model and the set R of key values the query observes: the key
 * operands of gets, sets and deletes, the keys of its constant maps, and
 * one witness key per map equality that fails. Dropping every override
 * outside R from the free maps changes no get at a key in R and keeps every
 * equality's truth value, and keys outside R read the default on both
 * sides. So a free map with |R| slots loses no model.
 *
 * Counting breaks that argument: a count sees overrides nothing else reads.
 * A map type counted over a free variable gets `mapDepth` extra slots, and
 * an unsatisfiable answer for such a query proves nothing beyond them.
 */

import { Expr, freeVariables, postOrder } from "../expr";
import { Type, AnyMapType, isMapType } from "../types";
import { Value, valueKey } from "../value";

export interface SlotBounds {
  slotsFor(t: AnyMapType): number;
  /** Map types whose size is counted over a free variable */
  readonly counted: readonly AnyMapType[];
}

export function slotBounds(root: Expr, mapDepth: number): SlotBounds {
  const keys = new Map<AnyMapType, Set<string>>();
  const witnesses = new Map<AnyMapType, number>();
  const counted = new Set<AnyMapType>();

  const observe = (t: Type, key: string): void => {
    if (!isMapType(t)) return;
    const seen = keys.get(t) ?? new Set<string>();
    seen.add(key);
    keys.set(t, seen);
  };
  // Equal constants share a key; any other operand may take any value
  const keyOperand = (e: Expr): string => (e.tag === "const" ? `=${valueKey(e.value)}` : `#${e.id}`);

  for (const e of postOrder(root)) {
    switch (e.tag) {
      case "const":
        constantKeys(e.value, e.type, observe);
        break;
      case "mapGet":
      case "mapDelete":
      case "defaultMapGet":
        observe(e.left.type, keyOperand(e.right));
        break;
      case "mapSet":
      case "defaultMapSet":
        observe(e.first.type, keyOperand(e.second));
        break;
      case "eq":
        forEachMapType(e.left.type, (t) => witnesses.set(t, (witnesses.get(t) ?? 0) + 1));
        break;
      case "defaultMapCount": {
        const t = e.operand.type;
        if (isMapType(t) && freeVariables(e.operand).some((v) => mentions(v.type, t))) counted.add(t);
        break;
      }
    }
  }

  return {
    slotsFor: (t) => (keys.get(t)?.size ?? 0) + (witnesses.get(t) ?? 0) + (counted.has(t) ? mapDepth : 0),
    counted: [...counted],
  };
}

/** Maps occur at the top of a type or inside records, never deeper */
function forEachMapType(t: Type, visit: (m: AnyMapType) => void): void {
  if (isMapType(t)) visit(t);
  else if (t.kind === "object") t.fields.forEach((f) => forEachMapType(f.type, visit));
}

function mentions(t: Type, target: AnyMapType): boolean {
  let found = false;
  forEachMapType(t, (m) => {
    if (m === target) found = true;
  });
  return found;
}

function constantKeys(v: Value, t: Type, observe: (t: Type, key: string) => void): void {
  if (t.kind === "object" && v.tag === "object") {
    for (const f of t.fields) {
      const field = v.fields.get(f.name);
      if (field !== undefined) constantKeys(field, f.type, observe);
    }
  } else if (t.kind === "map" && v.tag === "map") {
    for (const entry of v.entries.values()) observe(t, `=${valueKey(entry.key)}`);
  } else if (t.kind === "defaultMap" && v.tag === "defaultMap") {
    for (const o of v.overrides) observe(t, `=${valueKey(o.key)}`);
  }
}
