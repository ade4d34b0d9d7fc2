import { LATENCY_BRACKETS, isSlaBreach, statusClass, systemHealthScore } from "../evaluators";
import {
  bucketByTime,
  count,
  distinctCount,
  groupBy,
  histogramBucket,
  max,
  mean,
  percentile,
  rate,
  rollingWindow,
  sortedGroups,
  type TimeBucket
} from "../primitives";
import type { Cell, TelemetryEvent } from "../types";
import type { TunableParam } from "./params";
import {
  cell,
  percentCell,
  scalar,
  series,
  table,
  type MetricContext,
  type MetricSpec,
  type ScalarFormat
} from "./builder";

const SYSTEM_TTL_SECONDS = 300;
const FILTERS: readonly TunableParam[] = ["service", "route"];

const MS: ScalarFormat = { unit: "ms", precision: 0 };
const COUNT: ScalarFormat = { unit: "count", precision: 0, whenEmpty: 0 };

const latencies = (events: readonly TelemetryEvent[]): Array<number | null> => events.map((e) => e.latencyMs);

const errorRate = (events: readonly TelemetryEvent[]): number | undefined => rate(count(events, (e) => e.isError), events.length);

const systemScalar = (
  id: string,
  label: string,
  reduce: (events: TelemetryEvent[], ctx: MetricContext) => number | undefined,
  format: ScalarFormat,
  tunables: readonly TunableParam[] = FILTERS
): MetricSpec => ({
  id,
  label,
  category: "system",
  records: ["telemetry"],
  ttlSeconds: SYSTEM_TTL_SECONDS,
  tunables,
  compute: async (ctx) => scalar(reduce(await ctx.telemetry(), ctx), format)
});

type Breakdown = (group: TelemetryEvent[], ctx: MetricContext) => Record<string, Cell>;

/** Per-route or per-service table, ordered by key or by one numeric column (descending). */
const breakdown = (
  id: string,
  label: string,
  key: "route" | "service",
  columns: string[],
  row: Breakdown,
  opts: { orderBy?: string; tunables?: readonly TunableParam[] } = {}
): MetricSpec => ({
  id,
  label,
  category: "system",
  records: ["telemetry"],
  ttlSeconds: SYSTEM_TTL_SECONDS,
  tunables: opts.tunables ?? ["limit"],
  defaults: { limit: 25 },
  compute: async (ctx) => {
    const groups = groupBy(await ctx.telemetry(), (e) => e[key], (group) => row(group, ctx));
    const rows = sortedGroups(groups).map(([k, v]) => ({ [key]: k, ...v }));

    const orderBy = opts.orderBy;
    if (orderBy) {
      const numeric = (r: Record<string, Cell>): number => {
        const v = r[orderBy];
        return typeof v === "number" ? v : -Infinity;
      };
      rows.sort((a, b) => numeric(b) - numeric(a));
    }

    return table([key, ...columns], rows.slice(0, ctx.params.limit));
  }
});

const trend = (
  id: string,
  label: string,
  unit: "count" | "percent" | "ms",
  valueOf: (bucket: TimeBucket<TelemetryEvent>) => number | null
): MetricSpec => ({
  id,
  label,
  category: "system",
  records: ["telemetry"],
  ttlSeconds: SYSTEM_TTL_SECONDS,
  defaultWindow: "7d",
  tunables: ["granularity", ...FILTERS],
  compute: async (ctx) => {
    const buckets = bucketByTime(await ctx.telemetry(), (e) => e.timestamp, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
    return series(
      unit,
      ctx.params.granularity,
      buckets.map((b) => ({ bucket: b.bucket, value: valueOf(b) }))
    );
  }
});

const latencyRow: Breakdown = (group) => ({
  requests: group.length,
  averageMs: cell(mean(latencies(group)), 1),
  p95Ms: cell(percentile(latencies(group), 0.95), 1),
  p99Ms: cell(percentile(latencies(group), 0.99), 1)
});

const errorRow: Breakdown = (group) => ({
  requests: group.length,
  errors: count(group, (e) => e.isError),
  errorRate: percentCell(errorRate(group))
});

const bySeverity = (a: TelemetryEvent, b: TelemetryEvent): number =>
  new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime() || (a.id < b.id ? -1 : 1);

const eventRow = (e: TelemetryEvent): Record<string, Cell> => ({
  timestamp: e.timestamp,
  service: e.service,
  route: e.route,
  statusCode: e.statusCode,
  latencyMs: e.latencyMs
});

export const systemMetrics: MetricSpec[] = [
  systemScalar("system.requests_total", "Requests", (events) => events.length, COUNT),
  systemScalar("system.errors_total", "Failed requests", (events) => count(events, (e) => e.isError), COUNT),
  systemScalar("system.error_rate", "Error rate", errorRate, { percent: true }),
  // Error rate stands in for availability here; it is not measured uptime.
  systemScalar("system.uptime", "Uptime (approximated as 1 - error rate)", (events) => {
    const r = errorRate(events);
    return r === undefined ? undefined : 1 - r;
  }, { percent: true }),
  systemScalar("system.latency_avg", "Average latency", (events) => mean(latencies(events)), MS),
  systemScalar("system.latency_p50", "Median latency", (events) => percentile(latencies(events), 0.5), MS),
  systemScalar("system.latency_p95", "P95 latency", (events) => percentile(latencies(events), 0.95), MS),
  systemScalar("system.latency_p99", "P99 latency", (events) => percentile(latencies(events), 0.99), MS),
  systemScalar("system.latency_max", "Slowest response", (events) => max(latencies(events)), MS),
  systemScalar(
    "system.latency_percentile",
    "Latency percentile",
    (events, ctx) => percentile(latencies(events), ctx.params.percentile),
    MS,
    ["percentile", ...FILTERS]
  ),
  systemScalar("system.services_total", "Services reporting", (events) => distinctCount(events, (e) => e.service), COUNT),
  systemScalar("system.routes_total", "Routes served", (events) => distinctCount(events, (e) => e.route), COUNT),
  systemScalar(
    "system.sla_breaches",
    "Requests slower than the latency SLA",
    (events, ctx) => count(events, (e) => isSlaBreach(e, ctx.params.slaMs)),
    COUNT,
    ["slaMs", ...FILTERS]
  ),
  systemScalar(
    "system.sla_breach_rate",
    "Share of timed requests slower than the latency SLA",
    (events, ctx) => {
      const timed = events.filter((e) => e.latencyMs !== null);
      return rate(count(timed, (e) => isSlaBreach(e, ctx.params.slaMs)), timed.length);
    },
    { percent: true },
    ["slaMs", ...FILTERS]
  ),
  systemScalar(
    "system.health_score",
    "System health score",
    (events) => {
      const r = errorRate(events);
      return r === undefined ? undefined : systemHealthScore(r, mean(latencies(events)) ?? 0);
    },
    { unit: "score", precision: 0 },
    ["service"]
  ),
  breakdown("system.latency_by_route", "Latency by route", "route", ["requests", "averageMs", "p95Ms", "p99Ms"], latencyRow, {
    orderBy: "p95Ms",
    tunables: ["limit", "service"]
  }),
  breakdown("system.latency_by_service", "Latency by service", "service", ["requests", "averageMs", "p95Ms", "p99Ms"], latencyRow, {
    orderBy: "p95Ms"
  }),
  breakdown("system.requests_by_route", "Requests by route", "route", ["requests"], (group) => ({ requests: group.length }), {
    orderBy: "requests",
    tunables: ["limit", "service"]
  }),
  breakdown("system.requests_by_service", "Requests by service", "service", ["requests"], (group) => ({ requests: group.length }), {
    orderBy: "requests"
  }),
  breakdown("system.error_rate_by_route", "Error rate by route", "route", ["requests", "errors", "errorRate"], errorRow, {
    orderBy: "errorRate",
    tunables: ["limit", "service"]
  }),
  breakdown("system.error_rate_by_service", "Error rate by service", "service", ["requests", "errors", "errorRate"], errorRow, {
    orderBy: "errorRate"
  }),
  breakdown(
    "system.sla_breaches_by_route",
    "Latency SLA breaches by route",
    "route",
    ["requests", "breaches", "breachRate"],
    (group, ctx) => {
      const breaches = count(group, (e) => isSlaBreach(e, ctx.params.slaMs));
      return { requests: group.length, breaches, breachRate: percentCell(rate(breaches, group.length)) };
    },
    { orderBy: "breaches", tunables: ["limit", "slaMs", "service"] }
  ),
  {
    id: "system.status_distribution",
    label: "Responses by status class",
    category: "system",
    records: ["telemetry"],
    ttlSeconds: SYSTEM_TTL_SECONDS,
    tunables: FILTERS,
    compute: async (ctx) => {
      const events = await ctx.telemetry();
      const groups = groupBy(events, (e) => statusClass(e.statusCode), (group) => group.length);
      return table(
        ["statusClass", "requests", "share"],
        sortedGroups(groups).map(([cls, n]) => ({ statusClass: cls, requests: n, share: percentCell(rate(n, events.length)) }))
      );
    }
  },
  {
    id: "system.latency_histogram",
    label: "Latency distribution",
    category: "system",
    records: ["telemetry"],
    ttlSeconds: SYSTEM_TTL_SECONDS,
    tunables: FILTERS,
    compute: async (ctx) => {
      const counts = new Map(LATENCY_BRACKETS.map((b) => [b.label, 0]));
      for (const e of await ctx.telemetry()) {
        if (e.latencyMs === null) continue;
        const label = histogramBucket(e.latencyMs, LATENCY_BRACKETS);
        if (label !== undefined) counts.set(label, (counts.get(label) ?? 0) + 1);
      }
      return table(
        ["bucket", "requests"],
        LATENCY_BRACKETS.map((b) => ({ bucket: b.label, requests: counts.get(b.label) ?? 0 }))
      );
    }
  },
  {
    id: "system.error_log",
    label: "Recent errors",
    category: "system",
    records: ["telemetry"],
    ttlSeconds: 60,
    defaultWindow: "7d",
    tunables: ["limit", ...FILTERS],
    defaults: { limit: 50 },
    compute: async (ctx) => {
      const rows = (await ctx.telemetry())
        .filter((e) => e.isError)
        .sort(bySeverity)
        .slice(0, ctx.params.limit)
        .map(eventRow);
      return table(["timestamp", "service", "route", "statusCode", "latencyMs"], rows);
    }
  },
  {
    id: "system.slowest_requests",
    label: "Slowest requests",
    category: "system",
    records: ["telemetry"],
    ttlSeconds: SYSTEM_TTL_SECONDS,
    defaultWindow: "7d",
    tunables: ["limit", ...FILTERS],
    compute: async (ctx) => {
      const rows = (await ctx.telemetry())
        .filter((e): e is TelemetryEvent & { latencyMs: number } => e.latencyMs !== null)
        .sort((a, b) => b.latencyMs - a.latencyMs || bySeverity(a, b))
        .slice(0, ctx.params.limit)
        .map(eventRow);
      return table(["timestamp", "service", "route", "statusCode", "latencyMs"], rows);
    }
  },
  trend("system.request_trend", "Requests over time", "count", (b) => b.records.length),
  trend("system.error_trend", "Error rate over time", "percent", (b) => percentCell(errorRate(b.records))),
  trend("system.latency_trend", "P95 latency over time", "ms", (b) => cell(percentile(latencies(b.records), 0.95), 1)),
  {
    id: "system.latency_rolling",
    label: "Rolling average latency",
    category: "system",
    records: ["telemetry"],
    ttlSeconds: SYSTEM_TTL_SECONDS,
    defaultWindow: "7d",
    tunables: ["granularity", "windowSize", ...FILTERS],
    compute: async (ctx) => {
      const buckets = bucketByTime(await ctx.telemetry(), (e) => e.timestamp, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      const rolled = rollingWindow(buckets, ctx.params.windowSize, (window) => mean(window.flatMap((b) => latencies(b.records))));
      return series(
        "ms",
        ctx.params.granularity,
        buckets.map((b, i) => ({ bucket: b.bucket, value: cell(rolled[i], 1) }))
      );
    }
  }
];
