import { z } from "zod";

import { ValidationError } from "../errors";
import type { CanonicalWindow, Granularity, TimeWindowToken } from "../types";

const identifier = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_.:@/ -]+$/, "contains unsupported characters");

const isoDate = z.string().datetime({ offset: true });

export const metricParamsSchema = z
  .object({
    window: z.enum(["today", "7d", "30d", "90d", "all", "custom"]).optional(),
    from: isoDate.optional(),
    to: isoDate.optional(),
    threshold: z.coerce.number().min(0).max(100).optional(),
    granularity: z.enum(["hour", "day", "week"]).optional(),
    limit: z.coerce.number().int().min(1).max(500).optional(),
    windowSize: z.coerce.number().int().min(1).max(90).optional(),
    percentile: z.coerce.number().min(0).max(1).optional(),
    slaMs: z.coerce.number().positive().max(60_000).optional(),
    caseStudyId: identifier.optional(),
    service: identifier.optional(),
    route: identifier.optional(),
    studentId: identifier.optional(),
    department: identifier.optional(),
    cohort: identifier.optional()
  })
  .strict()
  .superRefine((p, ctx) => {
    const custom = p.window === "custom";
    if (custom && (p.from === undefined || p.to === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["window"], message: "custom window requires from and to" });
    }
    if (!custom && (p.from !== undefined || p.to !== undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["window"], message: "from/to are only valid with window=custom" });
    }
    if (p.from !== undefined && p.to !== undefined && new Date(p.from).getTime() > new Date(p.to).getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["from"], message: "from must not be after to" });
    }
  });

export type MetricParams = z.infer<typeof metricParamsSchema>;

export const SCOPE_PARAMS = ["studentId", "department", "cohort"] as const;
export type ScopeParam = (typeof SCOPE_PARAMS)[number];

export interface TunableValues {
  threshold: number;
  granularity: Granularity;
  limit: number;
  windowSize: number;
  percentile: number;
  slaMs: number;
  caseStudyId: string | undefined;
  service: string | undefined;
  route: string | undefined;
}

export type TunableParam = keyof TunableValues;

const TUNABLE_PARAMS: readonly TunableParam[] = [
  "threshold",
  "granularity",
  "limit",
  "windowSize",
  "percentile",
  "slaMs",
  "caseStudyId",
  "service",
  "route"
];

export interface NormalizedParams {
  window: CanonicalWindow;
  tunables: Partial<TunableValues>;
}

export const parseParams = (raw: Record<string, unknown>): MetricParams => {
  const parsed = metricParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Invalid metric parameters", parsed.error.flatten());
  }
  return parsed.data;
};

/**
 * Reduces validated parameters to the canonical set a definition uses, with
 * defaults filled in, so equivalent requests produce equal cache keys.
 */
export const normalizeParams = (
  params: MetricParams,
  accepts: {
    defaultWindow: Exclude<TimeWindowToken, "custom">;
    tunables: readonly TunableParam[];
    scope: boolean;
    defaults: Partial<TunableValues>;
  },
  globalDefaults: TunableValues
): NormalizedParams => {
  const unsupported: string[] = [];

  for (const key of TUNABLE_PARAMS) {
    if (params[key] !== undefined && !accepts.tunables.includes(key)) unsupported.push(key);
  }
  if (!accepts.scope) {
    for (const key of SCOPE_PARAMS) {
      if (params[key] !== undefined) unsupported.push(key);
    }
  }
  if (unsupported.length > 0) {
    throw new ValidationError("Parameters not supported by this metric", { unsupported });
  }

  const window: CanonicalWindow =
    params.window === "custom" && params.from !== undefined && params.to !== undefined
      ? { window: "custom", from: new Date(params.from).toISOString(), to: new Date(params.to).toISOString() }
      : { window: params.window === undefined || params.window === "custom" ? accepts.defaultWindow : params.window };

  const tunables: Partial<TunableValues> = {};
  for (const key of accepts.tunables) {
    assignTunable(tunables, key, params[key] ?? accepts.defaults[key] ?? globalDefaults[key]);
  }

  return { window, tunables };
};

const assignTunable = <K extends TunableParam>(
  target: Partial<TunableValues>,
  key: K,
  value: TunableValues[K] | undefined
): void => {
  if (value !== undefined) target[key] = value;
};
