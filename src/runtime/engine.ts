import { config } from "../config";
import { decide as decideWith } from "../engine/decide";
import { noMatchDecision } from "../engine/actions";
import { logger as defaultLogger, type Logger } from "../logger";
import type { Context, Decision } from "../rules/types";
import type { State } from "../state/state";
import { StateHolder, stateHolder as processStateHolder } from "../state/state-holder";
import { createDecisionLogger, createDecisionLogSink, type DecisionSink } from "./decision-log";
import { createFileRuleSetSource, type RuleSetSnapshot, type RuleSetSource } from "./ruleset-source";
import { DecisionTelemetry, type TelemetrySnapshot } from "./telemetry";

export type PolicyEngine = {
  decide: (context: Context) => Decision;
  setState: (state: State) => void;
  currentState: () => State;
  getSnapshot: () => RuleSetSnapshot;
  reload: () => RuleSetSnapshot;
  telemetry: () => TelemetrySnapshot;
  // Stops recording reloads from the source.
  close: () => void;
};

export type PolicyEngineOptions = {
  source: RuleSetSource;
  stateHolder?: StateHolder;
  telemetry?: DecisionTelemetry;
  sink?: DecisionSink;
  logger?: Logger;
};

export function createPolicyEngine(options: PolicyEngineOptions): PolicyEngine {
  const { source, sink } = options;
  const holder = options.stateHolder ?? new StateHolder();
  const telemetry = options.telemetry ?? new DecisionTelemetry();
  const logger = options.logger ?? defaultLogger;

  const unsubscribe = source.subscribe((snapshot) => {
    telemetry.recordReload(snapshot.errors.length === 0);
  });

  const decide = (context: Context): Decision => {
    // One read of each so the call sees a single rule set and a single state.
    const snapshot = source.getSnapshot();
    const state = holder.currentState();

    if (!snapshot.ruleSet) {
      telemetry.recordDecision(false);
      logger.debug({ state }, "No rule set loaded; returning no-match decision");
      return noMatchDecision();
    }

    const decision = decideWith(snapshot.ruleSet, state, context);
    telemetry.recordDecision(decision.ruleName !== null);

    if (decision.log && sink) {
      try {
        sink({ decision, state, ruleSetHash: snapshot.ruleSet.hash });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        telemetry.recordError(`decision sink failed: ${message}`);
        logger.error({ error, rule: decision.ruleName }, "Decision sink failed");
      }
    }

    return decision;
  };

  return {
    decide,
    setState: (state) => holder.setState(state),
    currentState: () => holder.currentState(),
    getSnapshot: () => source.getSnapshot(),
    reload: () => source.reload(),
    telemetry: () => telemetry.snapshot(),
    close: unsubscribe
  };
}

export type RunningPolicyEngine = {
  engine: PolicyEngine;
  stop: () => void;
};

export type StartPolicyEngineOptions = {
  logger?: Logger;
  stateHolder?: StateHolder;
  rulesPath?: string;
  hotReload?: boolean;
  reloadIntervalMs?: number;
  reloadOnSighup?: boolean;
  decisionLogPath?: string;
};

/**
 * Wires the engine from process configuration: rules file, process-wide state
 * holder, decision log and optional hot reload. Options override `config`.
 */
export function startPolicyEngine(options?: StartPolicyEngineOptions): RunningPolicyEngine {
  const logger = options?.logger ?? defaultLogger;
  const hotReload = options?.hotReload ?? config.rules.hotReload;
  const source = createFileRuleSetSource({
    path: options?.rulesPath,
    handleSignals: options?.reloadOnSighup ?? config.rules.reloadOnSighup,
    logger
  });
  const engine = createPolicyEngine({
    source,
    stateHolder: options?.stateHolder ?? processStateHolder,
    telemetry: new DecisionTelemetry(),
    sink: createDecisionLogSink(createDecisionLogger(options?.decisionLogPath)),
    logger
  });

  if (hotReload) {
    source.watch(options?.reloadIntervalMs ?? config.rules.reloadIntervalMs);
  }
  logger.info({ hotReload, state: engine.currentState(), source: source.getSnapshot().source }, "Policy engine started");

  return {
    engine,
    stop: () => {
      engine.close();
      source.close();
      logger.info("Policy engine stopped");
    }
  };
}
