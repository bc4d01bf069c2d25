import { z } from "zod";

export const STATES = ["NORMAL", "DEGRADED", "FAILOVER", "RECOVERY"] as const;

export const stateSchema = z.enum(STATES);

export type State = z.infer<typeof stateSchema>;

export function parseState(value: string): State | null {
  const result = stateSchema.safeParse(value.trim().toUpperCase());
  return result.success ? result.data : null;
}
