import { z } from "zod";
import { parseState, type State } from "../state/state";
import { parseComparator } from "./comparator";
import { parsePortSet } from "./port-set";
import { compileSniPattern } from "./sni";
import type { ActionSpec, PrimaryAction, Protocol, Result } from "./types";

function compiled<T>(compile: (value: string) => Result<T, string>) {
  return (value: string, ctx: z.RefinementCtx): T => {
    const result = compile(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
      return z.NEVER;
    }
    return result.value;
  };
}

const stateValueSchema = z.string().transform(
  compiled((value): Result<State, string> => {
    const state = parseState(value);
    return state ? { ok: true, value: state } : { ok: false, error: `invalid state value: ${value}` };
  })
);

const stateSelectorSchema = z.union([
  stateValueSchema.transform((state) => [state]),
  z.array(stateValueSchema).min(1, "state list must not be empty")
]);

const protocolSchema = z.string().transform(
  compiled((value): Result<Protocol, string> => {
    const normalized = value.trim().toLowerCase();
    if (normalized === "tcp" || normalized === "udp") {
      return { ok: true, value: normalized };
    }
    return { ok: false, error: `protocol must be tcp or udp: ${value}` };
  })
);

const portSchema = z
  .union([z.string(), z.number().int()])
  .transform((value) => String(value))
  .transform(compiled(parsePortSet));

const comparatorSchema = z.string().transform(compiled(parseComparator));

const sniSchema = z.string().transform(compiled(compileSniPattern));

const MATCH_FIELDS = ["sni", "protocol", "port", "latency_ms", "rtt_ms"] as const;

export const matchSchema = z
  .object(
    {
      any: z.boolean().optional(),
      sni: sniSchema.optional(),
      protocol: protocolSchema.optional(),
      port: portSchema.optional(),
      latency_ms: comparatorSchema.optional(),
      rtt_ms: comparatorSchema.optional()
    },
    { required_error: "match is required" }
  )
  .strict()
  .superRefine((match, ctx) => {
    if (match.any === true) {
      return;
    }
    if (!MATCH_FIELDS.some((field) => match[field] !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "match must contain at least one field or any: true"
      });
    }
  });

const PRIMARY_FIELDS = ["route", "switch_route", "block", "throttle"] as const;

type RawAction = {
  route?: string;
  switch_route?: string;
  block?: boolean;
  throttle?: string;
  log?: boolean;
};

function primaryFieldsSet(action: RawAction): string[] {
  return PRIMARY_FIELDS.filter((field) => (field === "block" ? action.block === true : action[field] !== undefined));
}

function toPrimaryAction(action: RawAction): PrimaryAction {
  if (action.route !== undefined) {
    return { kind: "route", target: action.route };
  }
  if (action.switch_route !== undefined) {
    return { kind: "switch_route", target: action.switch_route };
  }
  if (action.block === true) {
    return { kind: "block" };
  }
  if (action.throttle !== undefined) {
    return { kind: "throttle", profile: action.throttle };
  }
  return { kind: "none" };
}

export const actionSchema = z
  .object(
    {
      route: z.string().trim().min(1, "route must not be empty").optional(),
      switch_route: z.string().trim().min(1, "switch_route must not be empty").optional(),
      block: z.boolean().optional(),
      throttle: z.string().trim().min(1, "throttle must not be empty").optional(),
      log: z.boolean().optional()
    },
    { required_error: "action is required" }
  )
  .strict()
  .superRefine((action, ctx) => {
    const primaries = primaryFieldsSet(action);
    if (primaries.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `action must not include multiple primary actions (${primaries.join(", ")})`
      });
    }
  })
  .transform((action): ActionSpec => ({ primary: toPrimaryAction(action), log: action.log ?? false }));

export const ruleSchema = z
  .object(
    {
      name: z.string({ required_error: "name is required" }).trim().min(1, "rule name is required"),
      priority: z
        .number({ required_error: "priority is required" })
        .int("priority must be an integer")
        .nonnegative("priority must be >= 0"),
      match: matchSchema,
      when: z
        .object({ state: stateSelectorSchema.optional() })
        .strict()
        .optional(),
      disable: stateSelectorSchema.optional(),
      action: actionSchema
    },
    { invalid_type_error: "rule must be a mapping" }
  )
  .strict();

export type ValidatedRule = z.output<typeof ruleSchema>;

export const ruleSetDocumentSchema = z.object(
  {
    rules: z
      .array(z.unknown(), {
        required_error: "rules is required",
        invalid_type_error: "rules must be a list"
      })
      .min(1, "rules must not be empty")
  },
  {
    required_error: "ruleset document must be a mapping with a rules list",
    invalid_type_error: "ruleset document must be a mapping with a rules list"
  }
);
