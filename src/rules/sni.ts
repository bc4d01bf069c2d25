import type { Result, SniPattern } from "./types";

function normalizeHost(value: string): string {
  const lowered = value.trim().toLowerCase();
  return lowered.endsWith(".") ? lowered.slice(0, -1) : lowered;
}

/**
 * Accepts `*`, `*.suffix` or an exact host name.
 */
export function compileSniPattern(pattern: string): Result<SniPattern, string> {
  const normalized = normalizeHost(pattern);
  if (normalized.length === 0) {
    return { ok: false, error: "sni pattern must not be empty" };
  }
  if (normalized === "*") {
    return { ok: true, value: { kind: "any" } };
  }
  if (normalized.startsWith("*.")) {
    const suffix = normalized.slice(2);
    if (suffix.length === 0 || suffix.includes("*") || suffix.startsWith(".")) {
      return { ok: false, error: `invalid sni wildcard: ${pattern}` };
    }
    return { ok: true, value: { kind: "suffix", suffix } };
  }
  if (normalized.includes("*")) {
    return { ok: false, error: `wildcard is only allowed as the leftmost label: ${pattern}` };
  }
  return { ok: true, value: { kind: "exact", host: normalized } };
}

export function matchSni(pattern: SniPattern, sni: string): boolean {
  const host = normalizeHost(sni);
  if (host.length === 0) {
    return false;
  }
  switch (pattern.kind) {
    case "any":
      return true;
    case "exact":
      return host === pattern.host;
    case "suffix":
      return host.length > pattern.suffix.length + 1 && host.endsWith(`.${pattern.suffix}`);
  }
}
