import type { Comparator, ComparatorOperator, Result } from "./types";

// Longest operators first so ">=" is not read as ">".
const OPERATORS: ReadonlyArray<[prefix: string, operator: ComparatorOperator]> = [
  [">=", ">="],
  ["<=", "<="],
  ["==", "=="],
  [">", ">"],
  ["<", "<"],
  ["=", "=="]
];

const THRESHOLD = /^\d+(\.\d+)?$/;

export function parseComparator(expression: string): Result<Comparator, string> {
  const trimmed = expression.trim();
  const found = OPERATORS.find(([prefix]) => trimmed.startsWith(prefix));
  if (!found) {
    return { ok: false, error: `comparator must start with one of >, >=, <, <=, ==: ${trimmed || "(empty)"}` };
  }

  const [prefix, operator] = found;
  const rest = trimmed.slice(prefix.length).trim();
  if (!THRESHOLD.test(rest)) {
    return { ok: false, error: `invalid comparator threshold: ${trimmed}` };
  }

  return { ok: true, value: { operator, threshold: Number(rest) } };
}

export function applyComparator(comparator: Comparator, value: number): boolean {
  const { operator, threshold } = comparator;
  switch (operator) {
    case ">":
      return value > threshold;
    case ">=":
      return value >= threshold;
    case "<":
      return value < threshold;
    case "<=":
      return value <= threshold;
    case "==":
      return value === threshold;
  }
}
