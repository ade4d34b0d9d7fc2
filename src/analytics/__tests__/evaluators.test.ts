import { describe, expect, it } from "vitest";

import {
  buildStudentAggregate,
  classifyAtRisk,
  evaluateBadges,
  isSlaBreach,
  letterGrade,
  riskTier,
  statusClass,
  systemHealthScore,
  type StudentAggregate
} from "../evaluators";
import { event, grade } from "./fixtures";

describe("letterGrade", () => {
  it("maps every score with inclusive lower bounds", () => {
    expect(letterGrade(100)).toBe("A");
    expect(letterGrade(90)).toBe("A");
    expect(letterGrade(89.999)).toBe("B");
    expect(letterGrade(60)).toBe("D");
    expect(letterGrade(59.9)).toBe("F");
    expect(letterGrade(0)).toBe("F");
  });
});

describe("riskTier", () => {
  it("is relative to the threshold", () => {
    expect(riskTier(45, 70)).toBe("critical");
    expect(riskTier(50, 70)).toBe("high");
    expect(riskTier(65, 70)).toBe("moderate");
    expect(riskTier(70, 70)).toBeUndefined();
    expect(riskTier(undefined, 70)).toBeUndefined();
  });
});

describe("classifyAtRisk", () => {
  it("excludes students without graded records", () => {
    const records = [
      grade("1", "B", "cs-1", 60, "2024-06-01T00:00:00Z"),
      grade("2", "B", "cs-2", 70, "2024-06-02T00:00:00Z"),
      grade("3", "C", "cs-1", 75, "2024-06-01T00:00:00Z"),
      grade("4", "A", "cs-1", null, "2024-06-01T00:00:00Z")
    ];
    const aggregates = ["A", "B", "C"].map((id) => buildStudentAggregate(id, records));

    expect(classifyAtRisk(aggregates, 70)).toEqual([{ studentId: "B", meanScore: 65, tier: "moderate" }]);
  });

  it("orders the lowest mean first", () => {
    const records = [grade("1", "x", "cs-1", 40, "2024-06-01T00:00:00Z"), grade("2", "y", "cs-1", 20, "2024-06-01T00:00:00Z")];
    const ids = classifyAtRisk(
      ["x", "y"].map((id) => buildStudentAggregate(id, records)),
      70
    ).map((s) => s.studentId);
    expect(ids).toEqual(["y", "x"]);
  });
});

describe("buildStudentAggregate", () => {
  it("only counts the student's own records", () => {
    const records = [
      grade("1", "s1", "cs-1", 80, "2024-06-01T00:00:00Z"),
      grade("2", "s1", "cs-1", null, "2024-06-02T00:00:00Z"),
      grade("3", "s2", "cs-2", 100, "2024-06-01T00:00:00Z")
    ];
    expect(buildStudentAggregate("s1", records)).toEqual({
      studentId: "s1",
      distinctCaseStudies: 1,
      totalSubmissions: 2,
      gradedSubmissions: 1,
      meanScore: 80,
      maxScore: 80
    });
  });
});

describe("evaluateBadges", () => {
  const strong: StudentAggregate = {
    studentId: "s1",
    distinctCaseStudies: 5,
    totalSubmissions: 10,
    gradedSubmissions: 5,
    meanScore: 92,
    maxScore: 100
  };

  it("awards every rule that holds", () => {
    expect(evaluateBadges(strong)).toEqual([
      "first_submission",
      "dedicated_learner",
      "case_explorer",
      "high_achiever",
      "perfect_score",
      "honor_roll"
    ]);
  });

  it("is a pure function of the aggregate", () => {
    expect(evaluateBadges(strong)).toEqual(evaluateBadges({ ...strong }));
    expect(evaluateBadges({ ...strong, totalSubmissions: 0, distinctCaseStudies: 0, gradedSubmissions: 0, meanScore: undefined, maxScore: undefined })).toEqual(
      []
    );
  });

  it("needs enough graded work for score badges", () => {
    expect(evaluateBadges({ ...strong, gradedSubmissions: 2, totalSubmissions: 2, distinctCaseStudies: 2, maxScore: 95 })).toEqual([
      "first_submission"
    ]);
  });
});

describe("telemetry evaluators", () => {
  it("treats latency equal to the SLA as within it", () => {
    expect(isSlaBreach(event("1", "2024-06-01T00:00:00Z", "api", "/", 200, 1000, false), 1000)).toBe(false);
    expect(isSlaBreach(event("2", "2024-06-01T00:00:00Z", "api", "/", 200, 1001, false), 1000)).toBe(true);
    expect(isSlaBreach(event("3", "2024-06-01T00:00:00Z", "api", "/", 200, null, false), 1000)).toBe(false);
  });

  it("classifies status codes", () => {
    expect(statusClass(204)).toBe("2xx");
    expect(statusClass(503)).toBe("5xx");
  });

  it("penalizes error rate and latency", () => {
    expect(systemHealthScore(0, 0)).toBe(100);
    expect(systemHealthScore(0.01, 250)).toBe(88);
    expect(systemHealthScore(0.5, 5000)).toBe(10);
  });
});
