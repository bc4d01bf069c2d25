import type { Context, MatchSpec, Rule, RuleSet } from "../rules/types";
import type { State } from "../state/state";
import { evaluate } from "./matcher";

const CONCRETE_FIELDS = ["sni", "protocol", "port", "latencyMs", "rttMs"] as const;

export function specificity(match: MatchSpec): number {
  if (match.any) {
    return 0;
  }
  return CONCRETE_FIELDS.filter((field) => match[field] !== undefined).length;
}

/**
 * Negative when `a` should win over `b`.
 */
export function compareRules(a: Rule, b: Rule): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  const bySpecificity = specificity(b.match) - specificity(a.match);
  if (bySpecificity !== 0) {
    return bySpecificity;
  }
  return a.index - b.index;
}

export function selectRule(ruleSet: RuleSet, state: State, context: Context): Rule | null {
  let best: Rule | null = null;
  for (const rule of ruleSet.rules) {
    if (!evaluate(rule, context, state)) {
      continue;
    }
    if (best === null || compareRules(rule, best) < 0) {
      best = rule;
    }
  }
  return best;
}
