/**
 * Sets are default-valued maps to bool: members map to true, everything
 * else reads the default false. Combining two sets is pointwise, so the
 * interpreter, the compiled runtime and the symbolic layer share the
 * membership rule and differ only in what a boolean is.
 */

import type { SetOp } from "../expr";

export interface Logic<B> {
  and(a: B, b: B): B;
  or(a: B, b: B): B;
  not(a: B): B;
}

export const booleanLogic: Logic<boolean> = {
  and: (a, b) => a && b,
  or: (a, b) => a || b,
  not: (a) => !a,
};

/** Membership in the combined set from membership in each operand */
export function membership<B>(op: SetOp, x: B, y: B, logic: Logic<B>): B {
  switch (op) {
    case "setUnion":
      return logic.or(x, y);
    case "setIntersect":
      return logic.and(x, y);
    case "setDifference":
      return logic.and(x, logic.not(y));
  }
}
