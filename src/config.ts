import dotenv from "dotenv";
import { parseState, type State } from "./state/state";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseInitialState(value: string | undefined, fallback: State): State {
  if (!value) {
    return fallback;
  }
  return parseState(value) ?? fallback;
}

export const config = {
  serviceName: process.env.SERVICE_NAME ?? "netpolicy-engine",
  logLevel: process.env.LOG_LEVEL ?? "info",
  initialState: parseInitialState(process.env.INITIAL_STATE, "NORMAL"),
  rules: {
    path: process.env.RULES_PATH,
    hotReload: parseBoolean(process.env.RULES_HOT_RELOAD, false),
    reloadIntervalMs: parseNumber(process.env.RULES_RELOAD_INTERVAL_MS, 2000),
    reloadOnSighup: parseBoolean(process.env.RULES_RELOAD_ON_SIGHUP, true)
  },
  decisionLogPath: process.env.DECISION_LOG_PATH
};
