import { expect, test } from "vitest";
import { evaluate, isEligible, matchesContext } from "../src/engine/matcher";
import { loadRuleSetOrThrow } from "../src/rules/loader";
import type { Rule } from "../src/rules/types";

function singleRule(body: string): Rule {
  const ruleSet = loadRuleSetOrThrow(`rules:
  - name: subject
    priority: 10
${body}`);
  return ruleSet.rules[0];
}

test("disable wins over a matching context", () => {
  const rule = singleRule(`    disable: [FAILOVER]
    match: { port: "6667" }
    action: { block: true }
`);

  expect(evaluate(rule, { port: 6667 }, "FAILOVER")).toBe(false);
  expect(evaluate(rule, { port: 6667 }, "NORMAL")).toBe(true);
});

test("when.state limits the states a rule is eligible in", () => {
  const rule = singleRule(`    when: { state: [DEGRADED, RECOVERY] }
    match: { any: true }
    action: { route: slow }
`);

  expect(isEligible(rule, "NORMAL")).toBe(false);
  expect(isEligible(rule, "FAILOVER")).toBe(false);
  expect(isEligible(rule, "DEGRADED")).toBe(true);
  expect(isEligible(rule, "RECOVERY")).toBe(true);
});

test("a rule listing a state in both when and disable is never eligible in it", () => {
  const rule = singleRule(`    when: { state: DEGRADED }
    disable: DEGRADED
    match: { any: true }
    action: { route: slow }
`);
  expect(isEligible(rule, "DEGRADED")).toBe(false);
});

test("any: true ignores the other match fields", () => {
  const rule = singleRule(`    match: { any: true, protocol: udp, port: "53" }
    action: { route: direct }
`);
  expect(matchesContext(rule.match, { protocol: "tcp", port: 443 })).toBe(true);
  expect(matchesContext(rule.match, {})).toBe(true);
});

test("absent context values fail the fields that need them", () => {
  const rule = singleRule(`    match: { sni: "*.zoom.us", protocol: tcp, port: "443", latency_ms: "<100", rtt_ms: "<50" }
    action: { route: fast }
`);
  const full = { sni: "call.zoom.us", protocol: "tcp", port: 443, latencyMs: 20, rttMs: 10 };

  expect(matchesContext(rule.match, full)).toBe(true);
  expect(matchesContext(rule.match, { ...full, sni: null })).toBe(false);
  expect(matchesContext(rule.match, { ...full, protocol: undefined })).toBe(false);
  expect(matchesContext(rule.match, { ...full, port: null })).toBe(false);
  expect(matchesContext(rule.match, { ...full, latencyMs: null })).toBe(false);
  expect(matchesContext(rule.match, { ...full, rttMs: undefined })).toBe(false);
});

test("protocol compares case-insensitively", () => {
  const rule = singleRule(`    match: { protocol: TCP }
    action: { route: fast }
`);
  expect(matchesContext(rule.match, { protocol: "tcp" })).toBe(true);
  expect(matchesContext(rule.match, { protocol: "Tcp" })).toBe(true);
  expect(matchesContext(rule.match, { protocol: "udp" })).toBe(false);
});

test("latency_ms and rtt_ms are independent conditions", () => {
  const rule = singleRule(`    match: { latency_ms: ">100", rtt_ms: "<50" }
    action: { switch_route: backup }
`);
  expect(matchesContext(rule.match, { latencyMs: 150, rttMs: 40 })).toBe(true);
  expect(matchesContext(rule.match, { latencyMs: 150, rttMs: 60 })).toBe(false);
  expect(matchesContext(rule.match, { latencyMs: 90, rttMs: 40 })).toBe(false);
  expect(matchesContext(rule.match, { latencyMs: 150 })).toBe(false);
});

test("port membership uses the parsed range set", () => {
  const rule = singleRule(`    match: { port: "22,80,1000-2000" }
    action: { block: true }
`);
  expect([22, 80, 1500].map((port) => matchesContext(rule.match, { port }))).toEqual([true, true, true]);
  expect([21, 999, 2001].map((port) => matchesContext(rule.match, { port }))).toEqual([false, false, false]);
});
