import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { expect, test } from "vitest";
import { config } from "../src/config";
import { createDecisionLogger, createDecisionLogSink } from "../src/runtime/decision-log";

test("writes one record per decision with the action summary", () => {
  const lines: string[] = [];
  const logger = pino({ base: undefined, timestamp: false }, { write: (line: string) => lines.push(line) });
  const sink = createDecisionLogSink(logger);

  sink({
    decision: { ruleName: "irc_block_outside_failover", action: { kind: "block" }, log: true },
    state: "NORMAL",
    ruleSetHash: "abc123"
  });
  sink({
    decision: { ruleName: "bulk_throttle_when_degraded", action: { kind: "throttle", profile: "bulk" }, log: true },
    state: "DEGRADED",
    ruleSetHash: null
  });

  expect(lines.map((line) => JSON.parse(line))).toEqual([
    {
      level: 30,
      state: "NORMAL",
      rule: "irc_block_outside_failover",
      action: "block",
      hash: "abc123",
      msg: "policy decision"
    },
    {
      level: 30,
      state: "DEGRADED",
      rule: "bulk_throttle_when_degraded",
      action: "throttle bulk",
      hash: null,
      msg: "policy decision"
    }
  ]);
});

test("decision logger appends to the configured file", () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "netpolicy-log-"));
  try {
    const file = path.join(dir, "nested", "decisions.log");
    const sink = createDecisionLogSink(createDecisionLogger(file));

    sink({
      decision: { ruleName: "default_log", action: { kind: "none" }, log: true },
      state: "RECOVERY",
      ruleSetHash: "def456"
    });

    const [line] = readFileSync(file, "utf-8").trim().split("\n");
    expect(JSON.parse(line)).toMatchObject({
      level: 30,
      service: config.serviceName,
      stream: "decisions",
      state: "RECOVERY",
      rule: "default_log",
      action: "none",
      hash: "def456",
      msg: "policy decision"
    });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
