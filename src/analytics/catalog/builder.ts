import { round, toPercent } from "../primitives";
import type {
  Account,
  CanonicalWindow,
  CaseStudy,
  Cell,
  EffectiveScope,
  GradeRecord,
  Granularity,
  MetricCategory,
  MetricUnit,
  MetricValue,
  RecordType,
  Role,
  SeriesPoint,
  TelemetryEvent,
  TimeRange,
  TimeWindowToken,
  Weekday
} from "../types";
import type { TunableParam, TunableValues } from "./params";

export type MetricSubject = "population" | "student";

export type DefaultWindow = Exclude<TimeWindowToken, "custom">;

export interface CatalogSettings {
  defaultAtRiskThreshold: number;
  defaultCacheTtlSeconds: number;
  cacheTtlSecondsByMetric: Record<string, number>;
  timeBucketWeekStartDay: Weekday;
  recordFetchTimeoutMs: number;
  latencySlaMs: number;
  aiCostPerMillionTokens: number;
}

/**
 * Everything a definition's pipeline may touch. Record accessors apply the
 * caller's scope and the request window; they only serve the record types the
 * definition declares.
 */
export interface MetricContext {
  readonly params: TunableValues;
  readonly window: CanonicalWindow;
  readonly range: TimeRange | undefined;
  readonly scope: EffectiveScope;
  readonly now: Date;
  readonly settings: CatalogSettings;
  accounts(opts?: { windowed?: boolean; role?: Role }): Promise<Account[]>;
  grades(opts?: { windowed?: boolean }): Promise<GradeRecord[]>;
  telemetry(): Promise<TelemetryEvent[]>;
  caseStudies(): Promise<CaseStudy[]>;
  /** The student a student-subject metric is about. */
  subjectId(): string;
}

export interface MetricSpec {
  id: string;
  label: string;
  category: MetricCategory;
  records: readonly RecordType[];
  roles?: readonly Role[];
  subject?: MetricSubject;
  defaultWindow?: DefaultWindow;
  ttlSeconds?: number;
  tunables?: readonly TunableParam[];
  defaults?: Partial<TunableValues>;
  compute: (ctx: MetricContext) => Promise<MetricValue>;
}

export interface MetricDefinition {
  readonly id: string;
  readonly label: string;
  readonly category: MetricCategory;
  readonly records: readonly RecordType[];
  readonly roles: readonly Role[];
  readonly subject: MetricSubject;
  readonly defaultWindow: DefaultWindow;
  readonly ttlSeconds: number;
  readonly tunables: readonly TunableParam[];
  readonly defaults: Readonly<Partial<TunableValues>>;
  readonly compute: (ctx: MetricContext) => Promise<MetricValue>;
}

const defaultRoles = (records: readonly RecordType[]): readonly Role[] =>
  records.every((r) => r === "telemetry") ? ["admin", "developer"] : ["admin", "faculty"];

/** Freezes a spec into a definition; TTL overrides win over the spec's own. */
export const buildDefinition = (spec: MetricSpec, settings: CatalogSettings): MetricDefinition =>
  Object.freeze({
    id: spec.id,
    label: spec.label,
    category: spec.category,
    records: Object.freeze([...spec.records]),
    roles: Object.freeze([...(spec.roles ?? defaultRoles(spec.records))]),
    subject: spec.subject ?? "population",
    defaultWindow: spec.defaultWindow ?? "30d",
    ttlSeconds: settings.cacheTtlSecondsByMetric[spec.id] ?? spec.ttlSeconds ?? settings.defaultCacheTtlSeconds,
    tunables: Object.freeze([...(spec.tunables ?? [])]),
    defaults: Object.freeze({ ...spec.defaults }),
    compute: spec.compute
  });

export const readsOnly = (definition: MetricDefinition, type: RecordType): boolean =>
  definition.records.every((r) => r === type);

export interface ScalarFormat {
  unit?: MetricUnit;
  precision?: number;
  /** Converts a ratio to a percentage. */
  percent?: boolean;
  /** Substituted when there is no data; leave unset to report an undefined result. */
  whenEmpty?: number;
  label?: (value: number) => string;
}

export const NO_DATA = "no data in the selected window";

export const undefinedResult = (reason: string = NO_DATA): MetricValue => ({ shape: "undefined", reason });

export const scalar = (value: number | undefined, format: ScalarFormat = {}): MetricValue => {
  const raw = value ?? format.whenEmpty;
  if (raw === undefined) return undefinedResult();

  const precision = format.precision ?? 2;
  const v = format.percent ? toPercent(raw, precision) : round(raw, precision);
  const unit: MetricUnit = format.percent ? "percent" : format.unit ?? "count";

  return format.label ? { shape: "scalar", value: v, unit, label: format.label(raw) } : { shape: "scalar", value: v, unit };
};

export const table = (columns: string[], rows: Array<Record<string, Cell>>): MetricValue => ({ shape: "table", columns, rows });

export const series = (unit: MetricUnit, granularity: Granularity, points: SeriesPoint[]): MetricValue => ({
  shape: "series",
  unit,
  granularity,
  points
});

export const labels = (values: string[]): MetricValue => ({ shape: "labels", labels: values });

/** Table cell for an optional number: rounded, or null when undefined. */
export const cell = (value: number | undefined, precision = 2): number | null =>
  value === undefined ? null : round(value, precision);

export const percentCell = (ratio: number | undefined, precision = 2): number | null =>
  ratio === undefined ? null : toPercent(ratio, precision);

export const scoresOf = (records: readonly GradeRecord[]): Array<number | null> => records.map((r) => r.finalScore);

export const graded = (records: readonly GradeRecord[]): GradeRecord[] => records.filter((r) => r.finalScore !== null);
