import type { State } from "../state/state";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Protocol = "tcp" | "udp";

export type PortRange = readonly [start: number, end: number];

/**
 * Inclusive port ranges, sorted by start. Ranges may overlap.
 */
export type PortSet = ReadonlyArray<PortRange>;

export type ComparatorOperator = ">" | ">=" | "<" | "<=" | "==";

export type Comparator = {
  operator: ComparatorOperator;
  threshold: number;
};

export type SniPattern =
  | { kind: "any" }
  | { kind: "exact"; host: string }
  | { kind: "suffix"; suffix: string };

export type MatchSpec = {
  any: boolean;
  sni?: SniPattern;
  protocol?: Protocol;
  port?: PortSet;
  latencyMs?: Comparator;
  rttMs?: Comparator;
};

export type PrimaryAction =
  | { kind: "route"; target: string }
  | { kind: "switch_route"; target: string }
  | { kind: "block" }
  | { kind: "throttle"; profile: string }
  | { kind: "none" };

export type ActionSpec = {
  primary: PrimaryAction;
  log: boolean;
};

export type Rule = {
  name: string;
  priority: number;
  // Position in the source document; final tie-break.
  index: number;
  match: MatchSpec;
  when: ReadonlySet<State> | null;
  disable: ReadonlySet<State> | null;
  action: ActionSpec;
};

export type RuleSet = {
  readonly rules: ReadonlyArray<Rule>;
  readonly hash: string;
};

export type Context = {
  sni?: string | null;
  protocol?: string | null;
  port?: number | null;
  latencyMs?: number | null;
  rttMs?: number | null;
};

export type Decision = {
  ruleName: string | null;
  action: PrimaryAction;
  log: boolean;
};

export type RuleSetFormat = "yaml" | "dsl";

export type ParseError = {
  kind: "parse";
  message: string;
  line?: number;
};

export type ValidationError = {
  kind: "validation";
  index: number | null;
  rule: string | null;
  path: string;
  message: string;
};

export type LoadError = ParseError | ValidationError;
