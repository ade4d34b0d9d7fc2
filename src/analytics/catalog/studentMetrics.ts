import { BADGE_RULES, buildStudentAggregate, evaluateBadges, letterGrade, riskTier } from "../evaluators";
import { distinctCount, groupBy } from "../primitives";
import type { GradeRecord, Role } from "../types";
import { cell, graded, labels, scalar, table, undefinedResult, type MetricSpec } from "./builder";
import { aggregatesByStudent } from "./learningMetrics";

const WITH_STUDENTS: readonly Role[] = ["admin", "faculty", "student"];

const SCORE = { unit: "score", precision: 1 } as const;

const chronological = (records: readonly GradeRecord[]): GradeRecord[] =>
  records.slice().sort((a, b) => new Date(a.submittedAt).getTime() - new Date(b.submittedAt).getTime() || (a.id < b.id ? -1 : 1));

const studentSpec = (spec: Omit<MetricSpec, "category" | "roles" | "subject" | "defaultWindow">): MetricSpec => ({
  category: "student",
  roles: WITH_STUDENTS,
  subject: "student",
  defaultWindow: "all",
  ...spec
});

export const studentMetrics: MetricSpec[] = [
  studentSpec({
    id: "student.profile",
    label: "Student aggregate record",
    records: ["grade"],
    compute: async (ctx) => {
      const a = buildStudentAggregate(ctx.subjectId(), await ctx.grades());
      return table(
        ["studentId", "distinctCaseStudies", "totalSubmissions", "gradedSubmissions", "meanScore", "maxScore", "letter"],
        [
          {
            studentId: a.studentId,
            distinctCaseStudies: a.distinctCaseStudies,
            totalSubmissions: a.totalSubmissions,
            gradedSubmissions: a.gradedSubmissions,
            meanScore: cell(a.meanScore, 1),
            maxScore: cell(a.maxScore, 1),
            letter: a.meanScore === undefined ? null : letterGrade(a.meanScore)
          }
        ]
      );
    }
  }),
  studentSpec({
    id: "student.badges",
    label: "Badges earned",
    records: ["grade"],
    compute: async (ctx) => labels(evaluateBadges(buildStudentAggregate(ctx.subjectId(), await ctx.grades())))
  }),
  studentSpec({
    id: "student.history",
    label: "Submission history",
    records: ["grade", "caseStudy"],
    tunables: ["limit"],
    defaults: { limit: 50 },
    compute: async (ctx) => {
      const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
      const titles = new Map(caseStudies.map((c) => [c.id, c.title]));
      const rows = chronological(grades)
        .slice(-ctx.params.limit)
        .map((g) => ({
          submissionId: g.id,
          caseStudyId: g.caseStudyId,
          title: titles.get(g.caseStudyId) ?? null,
          score: g.finalScore,
          letter: g.finalScore === null ? null : letterGrade(g.finalScore),
          submittedAt: g.submittedAt
        }));
      return table(["submissionId", "caseStudyId", "title", "score", "letter", "submittedAt"], rows);
    }
  }),
  studentSpec({
    id: "student.case_studies_completed",
    label: "Case studies with a graded submission",
    records: ["grade"],
    compute: async (ctx) =>
      scalar(distinctCount(graded(await ctx.grades()), (g) => g.caseStudyId), { unit: "count", precision: 0, whenEmpty: 0 })
  }),
  studentSpec({
    id: "student.best_score",
    label: "Best score",
    records: ["grade"],
    compute: async (ctx) => scalar(buildStudentAggregate(ctx.subjectId(), await ctx.grades()).maxScore, SCORE)
  }),
  studentSpec({
    id: "student.latest_score",
    label: "Most recent graded score",
    records: ["grade"],
    compute: async (ctx) => {
      const last = chronological(graded(await ctx.grades())).at(-1);
      return scalar(last?.finalScore ?? undefined, { ...SCORE, label: letterGrade });
    }
  }),
  studentSpec({
    id: "student.improvement",
    label: "Change from first to latest graded score",
    records: ["grade"],
    compute: async (ctx) => {
      const scored = chronological(graded(await ctx.grades()));
      const first = scored[0]?.finalScore;
      const last = scored.at(-1)?.finalScore;
      if (scored.length < 2 || first === undefined || first === null || last === undefined || last === null) {
        return undefinedResult("needs at least two graded submissions");
      }
      return scalar(last - first, SCORE);
    }
  }),
  studentSpec({
    id: "student.risk_tier",
    label: "At-risk tier",
    records: ["grade"],
    tunables: ["threshold"],
    compute: async (ctx) => {
      const tier = riskTier(buildStudentAggregate(ctx.subjectId(), await ctx.grades()).meanScore, ctx.params.threshold);
      return labels(tier === undefined ? [] : [tier]);
    }
  }),
  {
    id: "badges.summary",
    label: "Students holding each badge",
    category: "student",
    records: ["grade"],
    defaultWindow: "all",
    compute: async (ctx) => {
      const earned = aggregatesByStudent(await ctx.grades()).flatMap(evaluateBadges);
      const counts = groupBy(earned, (id) => id, (group) => group.length);
      return table(
        ["badge", "label", "students"],
        BADGE_RULES.map((rule) => ({ badge: rule.id, label: rule.label, students: counts.get(rule.id) ?? 0 }))
      );
    }
  }
];
