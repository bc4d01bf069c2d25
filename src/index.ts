export { STATES, parseState, type State } from "./state/state";
export { StateHolder, stateHolder, type StateListener } from "./state/state-holder";
export { loadRuleSet, loadRuleSetOrThrow, formatLoadError, formatLoadErrors, RuleSetLoadError } from "./rules/loader";
export type { LoadOptions } from "./rules/loader";
export { parseRuleDsl } from "./rules/dsl";
export { parseContext, contextSchema } from "./rules/context";
export { parsePortSet, portSetContains } from "./rules/port-set";
export { parseComparator, applyComparator } from "./rules/comparator";
export { compileSniPattern, matchSni } from "./rules/sni";
export { evaluate, isEligible, matchesContext } from "./engine/matcher";
export { compareRules, selectRule, specificity } from "./engine/selector";
export { resolveAction, resolveDecision, summarizeAction, noMatchDecision } from "./engine/actions";
export { decide } from "./engine/decide";
export {
  createFileRuleSetSource,
  lintRuleSetFile,
  resolveRulesPath,
  detectFormat,
  type RuleSetSnapshot,
  type RuleSetSource,
  type FileRuleSetSource,
  type ReloadListener,
  type RuleSetInfo,
  type LintReport
} from "./runtime/ruleset-source";
export { DecisionTelemetry, type TelemetrySnapshot } from "./runtime/telemetry";
export { createDecisionLogger, createDecisionLogSink, type DecisionRecord, type DecisionSink } from "./runtime/decision-log";
export {
  createPolicyEngine,
  startPolicyEngine,
  type PolicyEngine,
  type PolicyEngineOptions,
  type RunningPolicyEngine,
  type StartPolicyEngineOptions
} from "./runtime/engine";
export type * from "./rules/types";
