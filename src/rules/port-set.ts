import type { PortRange, PortSet, Result } from "./types";

const MAX_PORT = 65535;
const DIGITS = /^\d+$/;

function parsePort(raw: string, label: string): Result<number, string> {
  const token = raw.trim();
  if (!DIGITS.test(token)) {
    return { ok: false, error: `invalid ${label}: ${token || "(empty)"}` };
  }
  const value = Number(token);
  if (value > MAX_PORT) {
    return { ok: false, error: `${label} out of range (0-${MAX_PORT}): ${token}` };
  }
  return { ok: true, value };
}

/**
 * Parses `"22,80,1000-2000"` style port lists into inclusive ranges.
 */
export function parsePortSet(pattern: string): Result<PortSet, string> {
  const ranges: PortRange[] = [];

  for (const entry of pattern.split(",")) {
    const token = entry.trim();
    if (token.length === 0) {
      return { ok: false, error: "port pattern must not contain empty entries" };
    }

    const dash = token.indexOf("-");
    if (dash === -1) {
      const single = parsePort(token, "port value");
      if (!single.ok) {
        return single;
      }
      ranges.push([single.value, single.value]);
      continue;
    }

    const start = parsePort(token.slice(0, dash), "port range start");
    if (!start.ok) {
      return start;
    }
    const end = parsePort(token.slice(dash + 1), "port range end");
    if (!end.ok) {
      return end;
    }
    if (start.value > end.value) {
      return { ok: false, error: `invalid port range (start > end): ${token}` };
    }
    ranges.push([start.value, end.value]);
  }

  ranges.sort((a, b) => (a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1]));
  return { ok: true, value: ranges };
}

export function portSetContains(ports: PortSet, port: number): boolean {
  return ports.some(([start, end]) => port >= start && port <= end);
}
