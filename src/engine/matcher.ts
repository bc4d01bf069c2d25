import { applyComparator } from "../rules/comparator";
import { portSetContains } from "../rules/port-set";
import { matchSni } from "../rules/sni";
import type { Comparator, Context, MatchSpec, Rule } from "../rules/types";
import type { State } from "../state/state";

export function isEligible(rule: Rule, state: State): boolean {
  if (rule.disable?.has(state)) {
    return false;
  }
  if (rule.when && !rule.when.has(state)) {
    return false;
  }
  return true;
}

function compareField(comparator: Comparator | undefined, value: number | null | undefined): boolean {
  if (!comparator) {
    return true;
  }
  if (value === null || value === undefined) {
    return false;
  }
  return applyComparator(comparator, value);
}

export function matchesContext(match: MatchSpec, context: Context): boolean {
  if (match.any) {
    return true;
  }

  if (match.sni) {
    if (!context.sni || !matchSni(match.sni, context.sni)) {
      return false;
    }
  }

  if (match.protocol) {
    if (!context.protocol || context.protocol.trim().toLowerCase() !== match.protocol) {
      return false;
    }
  }

  if (match.port) {
    if (context.port === null || context.port === undefined || !portSetContains(match.port, context.port)) {
      return false;
    }
  }

  return compareField(match.latencyMs, context.latencyMs) && compareField(match.rttMs, context.rttMs);
}

/**
 * Pure predicate: state gating first, then the match block.
 */
export function evaluate(rule: Rule, context: Context, state: State): boolean {
  return isEligible(rule, state) && matchesContext(rule.match, context);
}
