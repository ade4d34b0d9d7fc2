import { z } from "zod";

import { WEEKDAYS } from "../analytics/types";

const ttlMap = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.number().nonnegative()));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  DATA_DIR: z.string().min(1).default("./data"),
  AT_RISK_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  CACHE_TTL_SECONDS: z.coerce.number().nonnegative().default(3600),
  CACHE_TTL_SECONDS_BY_METRIC: ttlMap.optional(),
  WEEK_START_DAY: z.enum(WEEKDAYS).default("monday"),
  RECORD_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LATENCY_SLA_MS: z.coerce.number().positive().default(1000),
  AI_COST_PER_MILLION_TOKENS: z.coerce.number().nonnegative().default(15),
  CORS_ORIGIN: z.string().optional()
});

export type AppConfig = {
  port: number;
  dataDir: string;
  corsOrigins: string[] | undefined;
  defaultAtRiskThreshold: number;
  defaultCacheTtlSeconds: number;
  cacheTtlSecondsByMetric: Record<string, number>;
  timeBucketWeekStartDay: (typeof WEEKDAYS)[number];
  recordFetchTimeoutMs: number;
  latencySlaMs: number;
  aiCostPerMillionTokens: number;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Empty strings count as unset, so a blank line in .env falls back to the default. */
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: e.DATA_DIR,
    corsOrigins: e.CORS_ORIGIN?.split(",").map((s) => s.trim()).filter(Boolean),
    defaultAtRiskThreshold: e.AT_RISK_THRESHOLD,
    defaultCacheTtlSeconds: e.CACHE_TTL_SECONDS,
    cacheTtlSecondsByMetric: e.CACHE_TTL_SECONDS_BY_METRIC ?? {},
    timeBucketWeekStartDay: e.WEEK_START_DAY,
    recordFetchTimeoutMs: e.RECORD_FETCH_TIMEOUT_MS,
    latencySlaMs: e.LATENCY_SLA_MS,
    aiCostPerMillionTokens: e.AI_COST_PER_MILLION_TOKENS
  };
};
