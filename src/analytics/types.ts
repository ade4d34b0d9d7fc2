export const ROLES = ["admin", "developer", "faculty", "student"] as const;
export type Role = (typeof ROLES)[number];

export type RecordType = "account" | "grade" | "telemetry" | "caseStudy";

export interface Account {
  id: string;
  role: Role;
  name: string;
  department: string | null;
  cohort: string | null;
  registeredAt: string;
}

export interface GradeRecord {
  id: string;
  accountId: string;
  caseStudyId: string;
  /** 0-100, null while the submission is not graded yet. */
  finalScore: number | null;
  submittedAt: string;
  summary: string | null;
  feedback: string | null;
}

export interface TelemetryEvent {
  id: string;
  timestamp: string;
  service: string;
  route: string;
  statusCode: number;
  latencyMs: number | null;
  /** Derived from the status code upstream; taken as given. */
  isError: boolean;
  aiModel: string | null;
  aiTokens: number | null;
}

export interface CaseStudy {
  id: string;
  title: string;
}

export interface RecordTypeMap {
  account: Account;
  grade: GradeRecord;
  telemetry: TelemetryEvent;
  caseStudy: CaseStudy;
}

export interface TimeRange {
  from: Date;
  to: Date;
}

export interface CallerIdentity {
  id: string;
  role: Role;
}

export const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export type Granularity = "hour" | "day" | "week";

export type TimeWindowToken = "today" | "7d" | "30d" | "90d" | "all" | "custom";

export type CanonicalWindow =
  | { window: Exclude<TimeWindowToken, "custom"> }
  | { window: "custom"; from: string; to: string };

export type MetricCategory = "users" | "learning" | "student" | "caseStudies" | "ai" | "system";

export type MetricUnit = "count" | "score" | "percent" | "ms" | "tokens" | "usd" | "ratio";

export type Cell = string | number | boolean | null;

export interface SeriesPoint {
  bucket: string;
  value: number | null;
}

export type MetricValue =
  | { shape: "scalar"; value: number; unit: MetricUnit; label?: string }
  | { shape: "undefined"; reason: string }
  | { shape: "series"; unit: MetricUnit; granularity: Granularity; points: SeriesPoint[] }
  | { shape: "table"; columns: string[]; rows: Array<Record<string, Cell>> }
  | { shape: "labels"; labels: string[] };

/** Filters resolved from the caller's role and identity. */
export interface EffectiveScope {
  role: Role;
  callerId: string;
  ownerId?: string;
  department?: string;
  cohort?: string;
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });
