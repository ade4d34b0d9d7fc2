import type { AppConfig } from "../config";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { allMetricSpecs, MetricCatalog, type CatalogEntry, type CatalogSettings, type MetricSpec } from "./catalog";
import { toMetricError, ValidationError, type MetricErrorBody } from "./errors";
import { MetricCache } from "./metricCache";
import type { RecordStore } from "./recordStore";
import { RoleScopingLayer, type MetricRequest } from "./roleScope";
import type { CallerIdentity, MetricValue } from "./types";

export type MetricResponse =
  | { ok: true; metricId: string; result: MetricValue; computedAt: string; fromCache: boolean }
  | { ok: false; metricId: string; error: MetricErrorBody };

export interface MetricsEngineOptions {
  logger?: Logger;
  /** Clock shared by the cache and the record windows. */
  now?: () => Date;
}

/**
 * Caller boundary of the analytics layer: scope, validate, then serve from
 * the cache or compute. getMetric never throws; failures come back as a typed
 * error body.
 */
export class MetricsEngine {
  private readonly cache: MetricCache<MetricValue>;
  private readonly scoping: RoleScopingLayer;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: MetricCatalog,
    opts: MetricsEngineOptions = {}
  ) {
    const now = opts.now ?? (() => new Date());
    this.now = now;
    this.cache = new MetricCache<MetricValue>({ now: () => now().getTime() });
    this.scoping = new RoleScopingLayer(catalog);
    this.log = opts.logger ?? rootLogger;
  }

  async getMetric(request: MetricRequest, caller: CallerIdentity): Promise<MetricResponse> {
    const { metricId } = request;
    const start = process.hrtime.bigint();

    try {
      const { definition, scope } = this.scoping.scope(request, caller);
      const params = this.catalog.prepare(definition, request.params);

      // Caller identity is already folded into ownerId; equal scopes share one entry.
      // "today" is pinned to its UTC date so an entry never outlives midnight.
      const filters = {
        window: params.window.window === "today" ? { ...params.window, day: this.now().toISOString().slice(0, 10) } : params.window,
        tunables: params.tunables,
        scope: { ownerId: scope.ownerId, department: scope.department, cohort: scope.cohort }
      };

      const lookup = await this.cache.getOrCompute(metricId, filters, definition.ttlSeconds, () =>
        this.catalog.compute(definition, params, scope)
      );

      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      if (lookup.fromCache) {
        this.log.debug({ metricId, role: caller.role }, "metric_cache_hit");
      } else {
        this.log.info({ metricId, role: caller.role, durationMs: Number(durationMs.toFixed(2)) }, "metric_computed");
      }

      return {
        ok: true,
        metricId,
        result: lookup.value,
        computedAt: new Date(lookup.computedAt).toISOString(),
        fromCache: lookup.fromCache
      };
    } catch (e) {
      const error = toMetricError(e);

      if (error.kind === "validation" || error.kind === "authorization") {
        this.log.warn({ metricId, role: caller.role, callerId: caller.id, kind: error.kind, details: error.details }, "metric_request_rejected");
      } else if (error.kind === "data_unavailable") {
        this.log.warn({ metricId, err: e }, "metric_compute_failed");
      } else {
        this.log.error({ metricId, err: e }, "metric_compute_failed");
      }

      return { ok: false, metricId, error: error.toBody() };
    }
  }

  hasMetric(metricId: string): boolean {
    return this.catalog.get(metricId) !== undefined;
  }

  listMetrics(caller: CallerIdentity): CatalogEntry[] {
    return this.catalog.list(caller.role);
  }

  /** Drops cached values of one metric, or of all metrics. Returns how many entries went. */
  invalidate(metricId?: string): number {
    if (metricId !== undefined && !this.catalog.get(metricId)) {
      throw new ValidationError(`Unknown metric: ${metricId}`);
    }
    const dropped = this.cache.invalidate(metricId);
    this.log.info({ metricId: metricId ?? "*", dropped }, "metric_cache_invalidated");
    return dropped;
  }

  get cachedEntries(): number {
    return this.cache.size;
  }
}

export const catalogSettings = (config: AppConfig): CatalogSettings => ({
  defaultAtRiskThreshold: config.defaultAtRiskThreshold,
  defaultCacheTtlSeconds: config.defaultCacheTtlSeconds,
  cacheTtlSecondsByMetric: config.cacheTtlSecondsByMetric,
  timeBucketWeekStartDay: config.timeBucketWeekStartDay,
  recordFetchTimeoutMs: config.recordFetchTimeoutMs,
  latencySlaMs: config.latencySlaMs,
  aiCostPerMillionTokens: config.aiCostPerMillionTokens
});

export const createMetricsEngine = (
  config: AppConfig,
  store: RecordStore,
  opts: MetricsEngineOptions & { specs?: readonly MetricSpec[] } = {}
): MetricsEngine => {
  const catalog = new MetricCatalog(opts.specs ?? allMetricSpecs, catalogSettings(config), store, opts.now);
  return new MetricsEngine(catalog, opts);
};
