import { logger } from "../../utils/logger";
import { toMetricError, ValidationError, type MetricError } from "../errors";
import type { RecordStore } from "../recordStore";
import { err, ok, type EffectiveScope, type MetricValue, type Result, type Role } from "../types";
import { aiMetrics } from "./aiMetrics";
import { buildDefinition, readsOnly, type CatalogSettings, type MetricDefinition, type MetricSpec } from "./builder";
import { caseStudyMetrics } from "./caseStudyMetrics";
import { RecordContext } from "./context";
import { learningMetrics } from "./learningMetrics";
import { normalizeParams, parseParams, type NormalizedParams, type TunableValues } from "./params";
import { studentMetrics } from "./studentMetrics";
import { systemMetrics } from "./systemMetrics";
import { userMetrics } from "./userMetrics";

export type { CatalogSettings, MetricContext, MetricDefinition, MetricSpec } from "./builder";
export type { MetricParams, NormalizedParams, TunableValues } from "./params";

export const allMetricSpecs: readonly MetricSpec[] = [
  ...userMetrics,
  ...learningMetrics,
  ...caseStudyMetrics,
  ...studentMetrics,
  ...aiMetrics,
  ...systemMetrics
];

export interface CatalogEntry {
  id: string;
  label: string;
  category: MetricDefinition["category"];
  subject: MetricDefinition["subject"];
  defaultWindow: MetricDefinition["defaultWindow"];
  params: readonly string[];
}

/**
 * The fixed set of metric definitions, built and frozen once at startup.
 * Definitions are looked up by id and never change afterwards.
 */
export class MetricCatalog {
  private readonly definitions = new Map<string, MetricDefinition>();

  constructor(
    specs: readonly MetricSpec[],
    private readonly settings: CatalogSettings,
    private readonly store: RecordStore,
    private readonly now: () => Date = () => new Date()
  ) {
    for (const spec of specs) {
      if (this.definitions.has(spec.id)) {
        throw new Error(`Duplicate metric id: ${spec.id}`);
      }
      this.definitions.set(spec.id, buildDefinition(spec, settings));
    }

    const unknown = Object.keys(settings.cacheTtlSecondsByMetric).filter((id) => !this.definitions.has(id));
    if (unknown.length > 0) {
      logger.warn({ metricIds: unknown }, "cache_ttl_override_unknown_metric");
    }
  }

  get size(): number {
    return this.definitions.size;
  }

  get(metricId: string): MetricDefinition | undefined {
    return this.definitions.get(metricId);
  }

  /** Definitions a role may request, in id order. */
  list(role: Role): CatalogEntry[] {
    return [...this.definitions.values()]
      .filter((d) => d.roles.includes(role))
      .sort((a, b) => (a.id < b.id ? -1 : 1))
      .map((d) => ({
        id: d.id,
        label: d.label,
        category: d.category,
        subject: d.subject,
        defaultWindow: d.defaultWindow,
        params: ["window", ...d.tunables]
      }));
  }

  globalDefaults(): TunableValues {
    return {
      threshold: this.settings.defaultAtRiskThreshold,
      granularity: "day",
      limit: 10,
      windowSize: 7,
      percentile: 0.5,
      slaMs: this.settings.latencySlaMs,
      caseStudyId: undefined,
      service: undefined,
      route: undefined
    };
  }

  /** Validates raw request parameters and reduces them to the definition's canonical set. */
  prepare(definition: MetricDefinition, raw: Record<string, unknown>): NormalizedParams {
    return normalizeParams(
      parseParams(raw),
      {
        defaultWindow: definition.defaultWindow,
        tunables: definition.tunables,
        scope: !readsOnly(definition, "telemetry"),
        defaults: definition.defaults
      },
      this.globalDefaults()
    );
  }

  compute(definition: MetricDefinition, params: NormalizedParams, scope: EffectiveScope): Promise<MetricValue> {
    const ctx = new RecordContext(
      definition,
      this.store,
      this.settings,
      params.window,
      { ...this.globalDefaults(), ...params.tunables },
      scope,
      this.now()
    );
    return definition.compute(ctx);
  }

  /** Validates, normalizes and computes one metric without caching. */
  async resolve(metricId: string, raw: Record<string, unknown>, scope: EffectiveScope): Promise<Result<MetricValue, MetricError>> {
    try {
      const definition = this.get(metricId);
      if (!definition) return err(new ValidationError(`Unknown metric: ${metricId}`));
      return ok(await this.compute(definition, this.prepare(definition, raw), scope));
    } catch (e) {
      return err(toMetricError(e));
    }
  }
}
