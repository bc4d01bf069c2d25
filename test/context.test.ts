import { expect, test } from "vitest";
import { parseContext } from "../src/rules/context";

test("maps wire field names and fills absent values with null", () => {
  expect(parseContext({ sni: "meet.example.com", latency_ms: 42.5 })).toEqual({
    sni: "meet.example.com",
    protocol: null,
    port: null,
    latencyMs: 42.5,
    rttMs: null
  });
});

test("keeps explicit nulls as absent", () => {
  expect(parseContext({ sni: null, protocol: "udp", port: 53, latency_ms: null, rtt_ms: 7 })).toEqual({
    sni: null,
    protocol: "udp",
    port: 53,
    latencyMs: null,
    rttMs: 7
  });
});

test("rejects out-of-range and unknown fields", () => {
  expect(() => parseContext({ port: 70000 })).toThrow();
  expect(() => parseContext({ port: 1.5 })).toThrow();
  expect(() => parseContext({ latency_ms: -1 })).toThrow();
  expect(() => parseContext({ host: "example.com" })).toThrow();
});
