import { bucketByTime, count, distinctCount, groupBy, mean, percentile, rate, sortedGroups, sum } from "../primitives";
import type { TelemetryEvent } from "../types";
import { cell, percentCell, scalar, series, table, type MetricContext, type MetricSpec, type ScalarFormat } from "./builder";

const AI_TTL_SECONDS = 300;

const aiEvents = async (ctx: MetricContext): Promise<TelemetryEvent[]> =>
  (await ctx.telemetry()).filter((e) => e.aiModel !== null);

const modelOf = (e: TelemetryEvent): string => e.aiModel ?? "unknown";

const costOf = (tokens: number, ctx: MetricContext): number => (tokens / 1_000_000) * ctx.settings.aiCostPerMillionTokens;

const aiScalar = (
  id: string,
  label: string,
  reduce: (events: TelemetryEvent[], ctx: MetricContext) => number | undefined,
  format: ScalarFormat
): MetricSpec => ({
  id,
  label,
  category: "ai",
  records: ["telemetry"],
  ttlSeconds: AI_TTL_SECONDS,
  tunables: ["service"],
  compute: async (ctx) => scalar(reduce(await aiEvents(ctx), ctx), format)
});

const TOKENS: ScalarFormat = { unit: "tokens", precision: 0, whenEmpty: 0 };

export const aiMetrics: MetricSpec[] = [
  aiScalar("ai.requests_total", "AI model requests", (events) => events.length, { unit: "count", precision: 0, whenEmpty: 0 }),
  aiScalar("ai.tokens_total", "AI tokens used", (events) => sum(events.map((e) => e.aiTokens)), TOKENS),
  aiScalar("ai.tokens_average", "Average tokens per AI request", (events) => mean(events.map((e) => e.aiTokens)), {
    unit: "tokens",
    precision: 1
  }),
  aiScalar(
    "ai.estimated_cost",
    "Estimated AI spend",
    (events, ctx) => costOf(sum(events.map((e) => e.aiTokens)), ctx),
    { unit: "usd", precision: 2 }
  ),
  aiScalar("ai.latency_p95", "P95 latency of AI requests", (events) => percentile(events.map((e) => e.latencyMs), 0.95), {
    unit: "ms",
    precision: 0
  }),
  aiScalar("ai.error_rate", "Error rate of AI requests", (events) => rate(count(events, (e) => e.isError), events.length), {
    percent: true
  }),
  aiScalar("ai.models_in_use", "Distinct AI models in use", (events) => distinctCount(events, (e) => e.aiModel), {
    unit: "count",
    precision: 0,
    whenEmpty: 0
  }),
  {
    id: "ai.requests_by_model",
    label: "AI requests by model",
    category: "ai",
    records: ["telemetry"],
    ttlSeconds: AI_TTL_SECONDS,
    compute: async (ctx) => {
      const events = await aiEvents(ctx);
      const groups = groupBy(events, modelOf, (group) => group.length);
      return table(
        ["model", "requests", "share"],
        sortedGroups(groups).map(([model, n]) => ({ model, requests: n, share: percentCell(rate(n, events.length)) }))
      );
    }
  },
  {
    id: "ai.tokens_by_model",
    label: "AI tokens by model",
    category: "ai",
    records: ["telemetry"],
    ttlSeconds: AI_TTL_SECONDS,
    compute: async (ctx) => {
      const groups = groupBy(await aiEvents(ctx), modelOf, (group) => ({
        tokens: sum(group.map((e) => e.aiTokens)),
        average: mean(group.map((e) => e.aiTokens))
      }));
      return table(
        ["model", "tokens", "averageTokens"],
        sortedGroups(groups).map(([model, v]) => ({ model, tokens: v.tokens, averageTokens: cell(v.average, 1) }))
      );
    }
  },
  {
    id: "ai.cost_by_model",
    label: "Estimated AI spend by model",
    category: "ai",
    records: ["telemetry"],
    ttlSeconds: AI_TTL_SECONDS,
    compute: async (ctx) => {
      const groups = groupBy(await aiEvents(ctx), modelOf, (group) => sum(group.map((e) => e.aiTokens)));
      return table(
        ["model", "tokens", "costUsd"],
        sortedGroups(groups).map(([model, tokens]) => ({ model, tokens, costUsd: cell(costOf(tokens, ctx), 2) }))
      );
    }
  },
  {
    id: "ai.tokens_trend",
    label: "AI tokens over time",
    category: "ai",
    records: ["telemetry"],
    ttlSeconds: AI_TTL_SECONDS,
    tunables: ["granularity"],
    compute: async (ctx) => {
      const buckets = bucketByTime(await aiEvents(ctx), (e) => e.timestamp, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "tokens",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: sum(b.records.map((e) => e.aiTokens)) }))
      );
    }
  },
  {
    id: "ai.request_trend",
    label: "AI requests over time",
    category: "ai",
    records: ["telemetry"],
    ttlSeconds: AI_TTL_SECONDS,
    tunables: ["granularity"],
    compute: async (ctx) => {
      const buckets = bucketByTime(await aiEvents(ctx), (e) => e.timestamp, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "count",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: b.records.length }))
      );
    }
  }
];
