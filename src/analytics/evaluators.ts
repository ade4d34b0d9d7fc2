import { distinctCount, histogramBucket, max, mean, present, type BucketBoundary } from "./primitives";
import type { GradeRecord, TelemetryEvent } from "./types";

export const LETTER_GRADES: readonly BucketBoundary[] = [
  { min: 90, label: "A" },
  { min: 80, label: "B" },
  { min: 70, label: "C" },
  { min: 60, label: "D" },
  { min: 0, label: "F" }
];

export const SCORE_BRACKETS: readonly BucketBoundary[] = [
  { min: 90, label: "90-100" },
  { min: 80, label: "80-89" },
  { min: 70, label: "70-79" },
  { min: 60, label: "60-69" },
  { min: 0, label: "0-59" }
];

export const LATENCY_BRACKETS: readonly BucketBoundary[] = [
  { min: 0, label: "<100ms" },
  { min: 100, label: "100-249ms" },
  { min: 250, label: "250-499ms" },
  { min: 500, label: "500-999ms" },
  { min: 1000, label: ">=1000ms" }
];

export const letterGrade = (score: number): string => histogramBucket(score, LETTER_GRADES) ?? "F";

export type RiskTier = "critical" | "high" | "moderate";

/** Tiers are relative to the threshold; at or above it there is no tier. */
export const riskTier = (meanScore: number | undefined, threshold: number): RiskTier | undefined => {
  if (meanScore === undefined || meanScore >= threshold) return undefined;
  if (meanScore < threshold - 20) return "critical";
  if (meanScore < threshold - 10) return "high";
  return "moderate";
};

export interface StudentAggregate {
  studentId: string;
  distinctCaseStudies: number;
  totalSubmissions: number;
  gradedSubmissions: number;
  meanScore: number | undefined;
  maxScore: number | undefined;
}

export const buildStudentAggregate = (studentId: string, records: readonly GradeRecord[]): StudentAggregate => {
  const own = records.filter((r) => r.accountId === studentId);
  const scores = present(own.map((r) => r.finalScore));

  return {
    studentId,
    distinctCaseStudies: distinctCount(own, (r) => r.caseStudyId),
    totalSubmissions: own.length,
    gradedSubmissions: scores.length,
    meanScore: mean(scores),
    maxScore: max(scores)
  };
};

export interface AtRiskStudent {
  studentId: string;
  meanScore: number;
  tier: RiskTier;
}

/**
 * Students whose mean over graded records is below the threshold, lowest
 * first. Students without a graded record are never at risk.
 */
export const classifyAtRisk = (aggregates: readonly StudentAggregate[], threshold: number): AtRiskStudent[] => {
  const out: AtRiskStudent[] = [];
  for (const a of aggregates) {
    const tier = riskTier(a.meanScore, threshold);
    if (a.meanScore === undefined || tier === undefined) continue;
    out.push({ studentId: a.studentId, meanScore: a.meanScore, tier });
  }
  return out.sort((a, b) => a.meanScore - b.meanScore || (a.studentId < b.studentId ? -1 : 1));
};

export interface BadgeRule {
  id: string;
  label: string;
  earned: (a: StudentAggregate) => boolean;
}

export const BADGE_RULES: readonly BadgeRule[] = [
  { id: "first_submission", label: "First Submission", earned: (a) => a.totalSubmissions >= 1 },
  { id: "dedicated_learner", label: "Dedicated Learner", earned: (a) => a.totalSubmissions >= 10 },
  { id: "case_explorer", label: "Case Explorer", earned: (a) => a.distinctCaseStudies >= 5 },
  { id: "high_achiever", label: "High Achiever", earned: (a) => a.gradedSubmissions >= 3 && (a.meanScore ?? 0) >= 85 },
  { id: "perfect_score", label: "Perfect Score", earned: (a) => (a.maxScore ?? 0) >= 100 },
  { id: "honor_roll", label: "Honor Roll", earned: (a) => a.gradedSubmissions >= 5 && (a.meanScore ?? 0) >= 90 }
];

/** Pure re-check of every rule; nothing is remembered between calls. */
export const evaluateBadges = (aggregate: StudentAggregate): string[] =>
  BADGE_RULES.filter((rule) => rule.earned(aggregate)).map((rule) => rule.id);

export const isSlaBreach = (event: TelemetryEvent, slaMs: number): boolean =>
  event.latencyMs !== null && event.latencyMs > slaMs;

export const statusClass = (statusCode: number): string => `${Math.floor(statusCode / 100)}xx`;

/** 0-100: penalties for error rate (up to 60) and mean latency (up to 30). */
export const systemHealthScore = (errorRate: number, averageLatencyMs: number): number => {
  const errorPenalty = Math.min(60, errorRate * 100 * 10);
  const latencyPenalty = Math.min(30, averageLatencyMs / 100);

  const score = 100 - errorPenalty - latencyPenalty;
  return Math.max(0, Math.min(100, Math.round(score)));
};
