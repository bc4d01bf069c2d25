import { expect, test } from "vitest";
import { noMatchDecision, resolveAction, resolveDecision, summarizeAction } from "../src/engine/actions";
import { loadRuleSetOrThrow } from "../src/rules/loader";

test("summarizes each primary action", () => {
  expect(
    [
      summarizeAction({ kind: "route", target: "tunnel_fast" }),
      summarizeAction({ kind: "switch_route", target: "backup" }),
      summarizeAction({ kind: "block" }),
      summarizeAction({ kind: "throttle", profile: "bulk" }),
      summarizeAction({ kind: "none" })
    ]
  ).toEqual(["route tunnel_fast", "switch_route backup", "block", "throttle bulk", "none"]);
});

test("log is carried alongside the primary action", () => {
  const ruleSet = loadRuleSetOrThrow(`rules:
  - name: block_and_log
    priority: 1
    match: { port: "6667" }
    action: { block: true, log: true }
  - name: log_only
    priority: 1
    match: { any: true }
    action: { log: true }
  - name: empty_action
    priority: 1
    match: { any: true }
    action: {}
`);
  const [blockAndLog, logOnly, emptyAction] = ruleSet.rules;

  expect(resolveAction(blockAndLog.action)).toEqual({ action: { kind: "block" }, log: true });
  expect(resolveAction(logOnly.action)).toEqual({ action: { kind: "none" }, log: true });
  expect(resolveDecision(emptyAction)).toEqual({ ruleName: "empty_action", action: { kind: "none" }, log: false });
});

test("no-match decisions are fresh objects", () => {
  const first = noMatchDecision();
  first.log = true;

  expect(noMatchDecision()).toEqual({ ruleName: null, action: { kind: "none" }, log: false });
  expect(resolveDecision(null)).toEqual({ ruleName: null, action: { kind: "none" }, log: false });
});
