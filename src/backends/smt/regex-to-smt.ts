import { MAX_CHAR } from "../../types";
import type { Regex, CharRange } from "../../regex/ast";
import { SExpr, app, stringLiteral } from "./sexpr";

const charLiteral = (cp: number): string => stringLiteral(String.fromCodePoint(cp));

function rangeToSmt([lo, hi]: CharRange): SExpr {
  if (lo === hi) return app("str.to_re", charLiteral(lo));
  return app("re.range", charLiteral(lo), charLiteral(hi));
}

/** Translate a regex to the `re.*` theory */
export function regexToSmt(r: Regex): SExpr {
  switch (r.tag) {
    case "empty":
      return "re.none";
    case "epsilon":
      return app("str.to_re", '""');
    case "chars": {
      const [first] = r.ranges;
      if (r.ranges.length === 1 && first[0] === 0 && first[1] === MAX_CHAR) return "re.allchar";
      const ranges = r.ranges.map(rangeToSmt);
      return ranges.length === 1 ? ranges[0] : app("re.union", ...ranges);
    }
    case "concat":
      return app("re.++", regexToSmt(r.left), regexToSmt(r.right));
    case "union":
      return app("re.union", ...r.alternatives.map(regexToSmt));
    case "star":
      return app("re.*", regexToSmt(r.inner));
  }
}
