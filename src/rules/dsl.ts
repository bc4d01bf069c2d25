import type { ParseError, Result } from "./types";

type RawRule = {
  name: string;
  priority: number;
  match: Record<string, string | boolean>;
  action: Record<string, string | boolean>;
  when?: { state: string[] };
  disable?: string[];
};

export type RawRuleSetDocument = {
  rules: RawRule[];
};

const MATCH_KEYS = new Set(["sni", "protocol", "port", "latency_ms", "rtt_ms"]);
const ACTION_KEYS = new Set(["route", "switch_route", "throttle"]);
const TOKEN = /(?:[^\s"']+|"[^"]*"|'[^']*')+/g;
const INTEGER = /^-?\d+$/;

class DslSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(message);
    this.name = "DslSyntaxError";
  }
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) || (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function tokenize(rest: string): string[] {
  return rest.match(TOKEN) ?? [];
}

function splitPair(token: string, what: string, line: number): [string, string] {
  const eq = token.indexOf("=");
  if (eq <= 0) {
    throw new DslSyntaxError(`invalid ${what} token: ${token}`, line);
  }
  return [token.slice(0, eq), stripQuotes(token.slice(eq + 1))];
}

function parseMatchTokens(rest: string, target: RawRule["match"], line: number): void {
  const tokens = tokenize(rest);
  if (tokens.length === 0) {
    throw new DslSyntaxError("match needs fields", line);
  }
  for (const token of tokens) {
    if (token === "any" || token === "any=true") {
      target.any = true;
      continue;
    }
    const [key, value] = splitPair(token, "match", line);
    if (!MATCH_KEYS.has(key)) {
      throw new DslSyntaxError(`unknown match key ${key}`, line);
    }
    target[key] = value;
  }
}

function parseActionTokens(rest: string, target: RawRule["action"], line: number): void {
  const tokens = tokenize(rest);
  if (tokens.length === 0) {
    throw new DslSyntaxError("action needs fields", line);
  }
  for (const token of tokens) {
    if (token === "block" || token === "block=true") {
      target.block = true;
      continue;
    }
    if (token === "log" || token === "log=true") {
      target.log = true;
      continue;
    }
    const [key, value] = splitPair(token, "action", line);
    if (key === "log" || key === "block") {
      target[key] = value === "true";
      continue;
    }
    if (!ACTION_KEYS.has(key)) {
      throw new DslSyntaxError(`unknown action key ${key}`, line);
    }
    target[key] = value;
  }
}

function parseStateList(rest: string, line: number): string[] {
  const trimmed = rest.trim();
  const value = trimmed.startsWith("state=") ? trimmed.slice("state=".length) : trimmed;
  const items = value
    .split(",")
    .map((item) => stripQuotes(item))
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new DslSyntaxError("state value is required", line);
  }
  return items;
}

function directive(text: string): [keyword: string, rest: string] {
  const space = text.search(/\s/);
  return space === -1 ? [text, ""] : [text.slice(0, space), text.slice(space + 1)];
}

function parseLines(input: string): RawRuleSetDocument {
  const rules: RawRule[] = [];
  let current: RawRule | null = null;

  input.split(/\r?\n/).forEach((rawLine, idx) => {
    const line = idx + 1;
    const text = rawLine.trim();
    if (text.length === 0 || text.startsWith("#")) {
      return;
    }

    const [keyword, rest] = directive(text);

    if (keyword === "rule") {
      const name = rest.trim().replace(/:$/, "").trim();
      if (name.length === 0) {
        throw new DslSyntaxError("rule name is required", line);
      }
      current = { name, priority: 0, match: {}, action: {} };
      rules.push(current);
      return;
    }

    if (!current) {
      throw new DslSyntaxError("content must be inside a rule block", line);
    }

    switch (keyword) {
      case "priority": {
        const value = rest.trim();
        if (!INTEGER.test(value)) {
          throw new DslSyntaxError(`invalid priority: ${value || "(empty)"}`, line);
        }
        current.priority = Number(value);
        return;
      }
      case "match":
        parseMatchTokens(rest, current.match, line);
        return;
      case "action":
        parseActionTokens(rest, current.action, line);
        return;
      case "when":
        current.when = { state: parseStateList(rest, line) };
        return;
      case "disable":
        current.disable = parseStateList(rest, line);
        return;
      default:
        throw new DslSyntaxError(`unknown directive ${keyword}`, line);
    }
  });

  return { rules };
}

/**
 * Parses the line-oriented rule syntax into the same document shape the YAML
 * loader produces. Only syntax is checked here; schema rules are applied by
 * the loader.
 */
export function parseRuleDsl(input: string): Result<RawRuleSetDocument, ParseError> {
  try {
    const document = parseLines(input);
    if (document.rules.length === 0) {
      return { ok: false, error: { kind: "parse", message: "no rules defined" } };
    }
    return { ok: true, value: document };
  } catch (error) {
    if (error instanceof DslSyntaxError) {
      return { ok: false, error: { kind: "parse", message: error.message, line: error.line } };
    }
    throw error;
  }
}
