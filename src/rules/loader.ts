import { parse as parseYaml, YAMLError } from "yaml";
import type { ZodIssue } from "zod";
import { parseRuleDsl } from "./dsl";
import { hashDocument } from "./hash";
import { ruleSchema, ruleSetDocumentSchema, type ValidatedRule } from "./schema";
import type { LoadError, ParseError, Result, Rule, RuleSet, RuleSetFormat, ValidationError } from "./types";

export type LoadOptions = {
  format?: RuleSetFormat;
};

export class RuleSetLoadError extends Error {
  constructor(public readonly errors: LoadError[]) {
    super(`Rule set rejected with ${errors.length} error(s): ${formatLoadErrors(errors).join("; ")}`);
    this.name = "RuleSetLoadError";
  }
}

function parseYamlDocument(text: string): Result<unknown, ParseError> {
  try {
    return { ok: true, value: parseYaml(text) };
  } catch (error) {
    if (error instanceof YAMLError) {
      const line = error.linePos?.[0].line;
      return { ok: false, error: { kind: "parse", message: error.message, line } };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: { kind: "parse", message } };
  }
}

function parseDocument(text: string, format: RuleSetFormat): Result<unknown, ParseError> {
  return format === "dsl" ? parseRuleDsl(text) : parseYamlDocument(text);
}

function rawRuleName(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("name" in raw)) {
    return null;
  }
  const { name } = raw;
  return typeof name === "string" && name.trim().length > 0 ? name.trim() : null;
}

function toValidationError(issue: ZodIssue, index: number | null, rule: string | null): ValidationError {
  return {
    kind: "validation",
    index,
    rule,
    path: issue.path.join("."),
    message: issue.message
  };
}

function toRule(rule: ValidatedRule, index: number): Rule {
  const { match } = rule;
  return Object.freeze({
    name: rule.name,
    priority: rule.priority,
    index,
    match: Object.freeze({
      any: match.any === true,
      sni: match.sni,
      protocol: match.protocol,
      port: match.port,
      latencyMs: match.latency_ms,
      rttMs: match.rtt_ms
    }),
    when: rule.when?.state ? new Set(rule.when.state) : null,
    disable: rule.disable ? new Set(rule.disable) : null,
    action: Object.freeze({ primary: Object.freeze(rule.action.primary), log: rule.action.log })
  });
}

function findDuplicateNames(rawRules: unknown[]): ValidationError[] {
  const seen = new Set<string>();
  const errors: ValidationError[] = [];
  rawRules.forEach((raw, index) => {
    const name = rawRuleName(raw);
    if (name === null) {
      return;
    }
    if (seen.has(name)) {
      errors.push({ kind: "validation", index, rule: name, path: "name", message: `duplicate rule name: ${name}` });
      return;
    }
    seen.add(name);
  });
  return errors;
}

/**
 * Parses and validates a complete rule set. Every violation in every rule is
 * reported; no rule set is produced unless all rules are valid.
 */
export function loadRuleSet(text: string, options?: LoadOptions): Result<RuleSet, LoadError[]> {
  const parsed = parseDocument(text, options?.format ?? "yaml");
  if (!parsed.ok) {
    return { ok: false, error: [parsed.error] };
  }

  const document = ruleSetDocumentSchema.safeParse(parsed.value);
  if (!document.success) {
    return { ok: false, error: document.error.issues.map((issue) => toValidationError(issue, null, null)) };
  }

  const rawRules = document.data.rules;
  const errors: ValidationError[] = [];
  const rules: Rule[] = [];

  rawRules.forEach((raw, index) => {
    const result = ruleSchema.safeParse(raw);
    if (!result.success) {
      const name = rawRuleName(raw);
      errors.push(...result.error.issues.map((issue) => toValidationError(issue, index, name)));
      return;
    }
    rules.push(toRule(result.data, index));
  });

  errors.push(...findDuplicateNames(rawRules));

  if (errors.length > 0) {
    errors.sort((a, b) => (a.index ?? -1) - (b.index ?? -1));
    return { ok: false, error: errors };
  }

  return {
    ok: true,
    value: Object.freeze({ rules: Object.freeze(rules), hash: hashDocument(parsed.value) })
  };
}

export function loadRuleSetOrThrow(text: string, options?: LoadOptions): RuleSet {
  const result = loadRuleSet(text, options);
  if (!result.ok) {
    throw new RuleSetLoadError(result.error);
  }
  return result.value;
}

export function formatLoadError(error: LoadError): string {
  if (error.kind === "parse") {
    return error.line !== undefined ? `line ${error.line}: ${error.message}` : error.message;
  }
  const location = error.index === null ? "" : `rules[${error.index}]${error.rule ? ` (${error.rule})` : ""}`;
  const segments = [location, error.path].filter((segment) => segment.length > 0);
  return segments.length > 0 ? `${segments.join(": ")}: ${error.message}` : error.message;
}

export function formatLoadErrors(errors: LoadError[]): string[] {
  return errors.map((error) => formatLoadError(error));
}
