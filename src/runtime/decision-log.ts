import pino from "pino";
import { config } from "../config";
import { summarizeAction } from "../engine/actions";
import type { Logger } from "../logger";
import type { Decision } from "../rules/types";
import type { State } from "../state/state";

export type DecisionRecord = {
  decision: Decision;
  state: State;
  ruleSetHash: string | null;
};

export type DecisionSink = (record: DecisionRecord) => void;

/**
 * Dedicated logger for decision records: a file when a path is given,
 * stdout otherwise.
 */
export function createDecisionLogger(destination: string | undefined = config.decisionLogPath): Logger {
  const options = { level: "info", base: { service: config.serviceName, stream: "decisions" } };
  if (!destination) {
    return pino(options);
  }
  return pino(options, pino.destination({ dest: destination, mkdir: true, sync: true }));
}

export function createDecisionLogSink(logger: Logger): DecisionSink {
  return ({ decision, state, ruleSetHash }) => {
    logger.info(
      {
        state,
        rule: decision.ruleName,
        action: summarizeAction(decision.action),
        hash: ruleSetHash
      },
      "policy decision"
    );
  };
}
