/**
 * Reduced ordered binary decision diagrams.
 *
 * Nodes are integers into parallel arrays; 0 is FALSE and 1 is TRUE.
 * Variables are ordered by index, lower indices nearer the root. Every node
 * is unique, so two functions are equal exactly when their nodes are.
 */

export type Bdd = number;

export const FALSE: Bdd = 0;
export const TRUE: Bdd = 1;

export class BddManager {
  private readonly level: number[] = [Infinity, Infinity];
  private readonly low: Bdd[] = [FALSE, TRUE];
  private readonly high: Bdd[] = [FALSE, TRUE];
  private readonly unique = new Map<string, Bdd>();
  private readonly iteCache = new Map<string, Bdd>();
  private variables = 0;

  get nodeCount(): number {
    return this.level.length;
  }

  get variableCount(): number {
    return this.variables;
  }

  /** A fresh variable, ordered after all earlier ones */
  newVariable(): Bdd {
    return this.node(this.variables++, FALSE, TRUE);
  }

  private node(level: number, low: Bdd, high: Bdd): Bdd {
    if (low === high) return low;
    const key = `${level}:${low}:${high}`;
    const existing = this.unique.get(key);
    if (existing !== undefined) return existing;
    const id = this.level.length;
    this.level.push(level);
    this.low.push(low);
    this.high.push(high);
    this.unique.set(key, id);
    return id;
  }

  private cofactors(f: Bdd, level: number): [Bdd, Bdd] {
    return this.level[f] === level ? [this.low[f], this.high[f]] : [f, f];
  }

  ite(f: Bdd, g: Bdd, h: Bdd): Bdd {
    if (f === TRUE) return g;
    if (f === FALSE) return h;
    if (g === h) return g;
    if (g === TRUE && h === FALSE) return f;
    const key = `${f}:${g}:${h}`;
    const cached = this.iteCache.get(key);
    if (cached !== undefined) return cached;

    const top = Math.min(this.level[f], this.level[g], this.level[h]);
    const [f0, f1] = this.cofactors(f, top);
    const [g0, g1] = this.cofactors(g, top);
    const [h0, h1] = this.cofactors(h, top);
    const result = this.node(top, this.ite(f0, g0, h0), this.ite(f1, g1, h1));
    this.iteCache.set(key, result);
    return result;
  }

  not(f: Bdd): Bdd {
    return this.ite(f, FALSE, TRUE);
  }

  and(f: Bdd, g: Bdd): Bdd {
    return this.ite(f, g, FALSE);
  }

  or(f: Bdd, g: Bdd): Bdd {
    return this.ite(f, TRUE, g);
  }

  xor(f: Bdd, g: Bdd): Bdd {
    return this.ite(f, this.not(g), g);
  }

  iff(f: Bdd, g: Bdd): Bdd {
    return this.ite(f, g, this.not(g));
  }

  /** Variable index of a node made by `newVariable` */
  variableOf(v: Bdd): number {
    return this.level[v];
  }

  /** Value of `f` under an assignment; unassigned variables read false */
  evaluate(f: Bdd, assignment: ReadonlyMap<number, boolean>): boolean {
    let current = f;
    while (current !== TRUE && current !== FALSE) {
      current = assignment.get(this.level[current]) === true ? this.high[current] : this.low[current];
    }
    return current === TRUE;
  }

  /**
   * One satisfying assignment, or undefined when `f` is FALSE. Variables not
   * on the chosen path are left out.
   */
  satOne(f: Bdd): Map<number, boolean> | undefined {
    if (f === FALSE) return undefined;
    const assignment = new Map<number, boolean>();
    let current = f;
    while (current !== TRUE) {
      const lo = this.low[current];
      const takeLow = lo !== FALSE;
      assignment.set(this.level[current], !takeLow);
      current = takeLow ? lo : this.high[current];
    }
    return assignment;
  }
}
