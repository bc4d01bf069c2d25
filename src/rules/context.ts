import { z } from "zod";
import type { Context } from "./types";

const optionalNumber = z.number().nonnegative().nullish();

export const contextSchema = z
  .object({
    sni: z.string().nullish(),
    protocol: z.string().nullish(),
    port: z.number().int().min(0).max(65535).nullish(),
    latency_ms: optionalNumber,
    rtt_ms: optionalNumber
  })
  .strict();

export type ContextInput = z.input<typeof contextSchema>;

/**
 * Builds a Context from wire-shaped input (`latency_ms`, `rtt_ms`).
 */
export function parseContext(input: unknown): Context {
  const parsed = contextSchema.parse(input);
  return {
    sni: parsed.sni ?? null,
    protocol: parsed.protocol ?? null,
    port: parsed.port ?? null,
    latencyMs: parsed.latency_ms ?? null,
    rttMs: parsed.rtt_ms ?? null
  };
}
