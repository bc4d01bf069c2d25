import type { ActionSpec, Decision, PrimaryAction, Rule } from "../rules/types";

export function noMatchDecision(): Decision {
  return { ruleName: null, action: { kind: "none" }, log: false };
}

export function resolveAction(spec: ActionSpec): Pick<Decision, "action" | "log"> {
  return { action: { ...spec.primary }, log: spec.log };
}

export function resolveDecision(rule: Rule | null): Decision {
  if (!rule) {
    return noMatchDecision();
  }
  return { ruleName: rule.name, ...resolveAction(rule.action) };
}

export function summarizeAction(action: PrimaryAction): string {
  switch (action.kind) {
    case "route":
      return `route ${action.target}`;
    case "switch_route":
      return `switch_route ${action.target}`;
    case "block":
      return "block";
    case "throttle":
      return `throttle ${action.profile}`;
    case "none":
      return "none";
  }
}
