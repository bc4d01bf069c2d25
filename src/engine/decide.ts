import type { Context, Decision, RuleSet } from "../rules/types";
import type { State } from "../state/state";
import { resolveDecision } from "./actions";
import { selectRule } from "./selector";

export function decide(ruleSet: RuleSet, state: State, context: Context): Decision {
  return resolveDecision(selectRule(ruleSet, state, context));
}
