import type { AppConfig } from "../../config";
import type { RecordCollections } from "../recordStore";
import type { GradeRecord, TelemetryEvent } from "../types";

export const NOW = new Date("2024-06-15T12:00:00.000Z");

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  port: 0,
  dataDir: "unused",
  corsOrigins: undefined,
  defaultAtRiskThreshold: 70,
  defaultCacheTtlSeconds: 3600,
  cacheTtlSecondsByMetric: {},
  timeBucketWeekStartDay: "monday",
  recordFetchTimeoutMs: 1000,
  latencySlaMs: 1000,
  aiCostPerMillionTokens: 15,
  ...overrides
});

export const grade = (id: string, accountId: string, caseStudyId: string, finalScore: number | null, submittedAt: string): GradeRecord => ({
  id,
  accountId,
  caseStudyId,
  finalScore,
  submittedAt,
  summary: null,
  feedback: null
});

export const event = (
  id: string,
  timestamp: string,
  service: string,
  route: string,
  statusCode: number,
  latencyMs: number | null,
  isError: boolean,
  ai: { model: string; tokens: number } | null = null
): TelemetryEvent => ({
  id,
  timestamp,
  service,
  route,
  statusCode,
  latencyMs,
  isError,
  aiModel: ai?.model ?? null,
  aiTokens: ai?.tokens ?? null
});

/**
 * s1 averages 92 over two graded submissions; s2 averages 58 with one
 * submission still ungraded; s3 has never submitted.
 */
export const seedRecords = (): RecordCollections => ({
  account: [
    { id: "s1", role: "student", name: "Student One", department: "cs", cohort: "2024", registeredAt: "2024-01-10T00:00:00Z" },
    { id: "s2", role: "student", name: "Student Two", department: "math", cohort: "2024", registeredAt: "2024-06-01T00:00:00Z" },
    { id: "s3", role: "student", name: "Student Three", department: "cs", cohort: "2025", registeredAt: "2024-06-10T00:00:00Z" },
    { id: "f1", role: "faculty", name: "Faculty One", department: "cs", cohort: null, registeredAt: "2023-09-01T00:00:00Z" },
    { id: "a1", role: "admin", name: "Admin One", department: null, cohort: null, registeredAt: "2023-01-01T00:00:00Z" },
    { id: "d1", role: "developer", name: "Dev One", department: null, cohort: null, registeredAt: "2023-02-01T00:00:00Z" }
  ],
  grade: [
    grade("g1", "s1", "cs-1", 90, "2024-06-10T10:00:00Z"),
    grade("g2", "s1", "cs-2", 94, "2024-06-11T10:00:00Z"),
    grade("g3", "s2", "cs-1", 50, "2024-06-10T11:00:00Z"),
    grade("g4", "s2", "cs-2", 66, "2024-06-12T09:00:00Z"),
    grade("g5", "s2", "cs-3", null, "2024-06-13T09:00:00Z")
  ],
  telemetry: [
    event("t1", "2024-06-14T10:00:00Z", "api", "/api/chat", 200, 120, false, { model: "model-a", tokens: 1000 }),
    event("t2", "2024-06-14T10:05:00Z", "api", "/api/chat", 500, 900, true, { model: "model-a", tokens: 500 }),
    event("t3", "2024-06-14T11:00:00Z", "api", "/api/grades", 200, 80, false),
    event("t4", "2024-06-15T09:00:00Z", "worker", "/jobs/sync", 200, 1500, false),
    event("t5", "2024-06-15T09:30:00Z", "api", "/api/grades", 404, null, true)
  ],
  caseStudy: [
    { id: "cs-1", title: "Supply Chain" },
    { id: "cs-2", title: "Market Entry" },
    { id: "cs-3", title: "Pricing" }
  ]
});
