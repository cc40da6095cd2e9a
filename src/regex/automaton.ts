/**
 * Lazily constructed deterministic automaton over regex derivatives.
 *
 * States are regexes identified by their canonical key; transitions are
 * computed on first use and cached, so repeated membership tests against the
 * same pattern run in time linear in the input.
 */

import { Regex, derivative, nullable, regexKey } from "./ast";
import { parseRegex } from "./parser";

export interface AutomatonState {
  readonly regex: Regex;
  readonly accepting: boolean;
  readonly transitions: Map<number, AutomatonState>;
}

export class RegexAutomaton {
  private readonly states = new Map<string, AutomatonState>();
  readonly initial: AutomatonState;

  constructor(readonly regex: Regex) {
    this.initial = this.state(regex);
  }

  static fromPattern(pattern: string): RegexAutomaton {
    return new RegexAutomaton(parseRegex(pattern));
  }

  /**
   * Does the automaton accept the whole input? Strings are read by code point.
   */
  accepts(input: string | readonly number[]): boolean {
    let current = this.initial;
    const codePoints = typeof input === "string" ? Array.from(input, (c) => c.codePointAt(0) ?? 0) : input;
    for (const c of codePoints) {
      current = this.step(current, c);
      if (current.regex.tag === "empty") return false;
    }
    return current.accepting;
  }

  get stateCount(): number {
    return this.states.size;
  }

  private step(from: AutomatonState, c: number): AutomatonState {
    const cached = from.transitions.get(c);
    if (cached !== undefined) return cached;
    const to = this.state(derivative(from.regex, c));
    from.transitions.set(c, to);
    return to;
  }

  private state(regex: Regex): AutomatonState {
    const key = regexKey(regex);
    let s = this.states.get(key);
    if (s === undefined) {
      s = { regex, accepting: nullable(regex), transitions: new Map() };
      this.states.set(key, s);
    }
    return s;
  }
}

const automata = new WeakMap<Regex, RegexAutomaton>();

/** One shared automaton per parsed pattern */
export function automatonFor(regex: Regex): RegexAutomaton {
  let a = automata.get(regex);
  if (a === undefined) {
    a = new RegexAutomaton(regex);
    automata.set(regex, a);
  }
  return a;
}
