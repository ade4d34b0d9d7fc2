import {
  LETTER_GRADES,
  SCORE_BRACKETS,
  buildStudentAggregate,
  classifyAtRisk,
  letterGrade,
  type RiskTier,
  type StudentAggregate
} from "../evaluators";
import {
  bucketByTime,
  count,
  groupBy,
  histogramBucket,
  max,
  mean,
  min,
  percentile,
  present,
  rate,
  rollingWindow,
  sortedGroups,
  type MaybeNumber
} from "../primitives";
import type { Account, GradeRecord, Role } from "../types";
import { cell, graded, scalar, scoresOf, series, table, type MetricContext, type MetricSpec, type ScalarFormat } from "./builder";

const WITH_STUDENTS: readonly Role[] = ["admin", "faculty", "student"];

const SCORE: ScalarFormat = { unit: "score", precision: 1 };
const COUNT: ScalarFormat = { unit: "count", precision: 0, whenEmpty: 0 };

const scoreStat = (
  id: string,
  label: string,
  stat: (scores: readonly MaybeNumber[], ctx: MetricContext) => number | undefined,
  extra: Partial<MetricSpec> = {}
): MetricSpec => ({
  id,
  label,
  category: "learning",
  records: ["grade"],
  roles: WITH_STUDENTS,
  ...extra,
  compute: async (ctx) => scalar(stat(scoresOf(await ctx.grades()), ctx), SCORE)
});

const submissionCount = (id: string, label: string, predicate: (g: GradeRecord) => boolean): MetricSpec => ({
  id,
  label,
  category: "learning",
  records: ["grade"],
  roles: WITH_STUDENTS,
  compute: async (ctx) => scalar(count(await ctx.grades(), predicate), COUNT)
});

export const aggregatesByStudent = (grades: readonly GradeRecord[]): StudentAggregate[] =>
  sortedGroups(groupBy(grades, (g) => g.accountId, (group, id) => buildStudentAggregate(id, group))).map(([, a]) => a);

const namesById = (accounts: readonly Account[]): Map<string, string> => new Map(accounts.map((a) => [a.id, a.name]));

const ranked = (direction: "top" | "bottom"): MetricSpec => ({
  id: direction === "top" ? "grades.top_performers" : "grades.bottom_performers",
  label: direction === "top" ? "Top performing students" : "Lowest performing students",
  category: "learning",
  records: ["grade", "account"],
  tunables: ["limit"],
  compute: async (ctx) => {
    const [grades, accounts] = await Promise.all([ctx.grades(), ctx.accounts()]);
    const names = namesById(accounts);
    const sign = direction === "top" ? -1 : 1;
    const rows = aggregatesByStudent(grades)
      .filter((a): a is StudentAggregate & { meanScore: number } => a.meanScore !== undefined)
      .sort((a, b) => sign * (a.meanScore - b.meanScore) || (a.studentId < b.studentId ? -1 : 1))
      .slice(0, ctx.params.limit)
      .map((a) => ({
        studentId: a.studentId,
        name: names.get(a.studentId) ?? null,
        meanScore: cell(a.meanScore, 1),
        letter: letterGrade(a.meanScore),
        gradedSubmissions: a.gradedSubmissions
      }));
    return table(["studentId", "name", "meanScore", "letter", "gradedSubmissions"], rows);
  }
});

const byAccountField = (id: string, label: string, field: "department" | "cohort"): MetricSpec => ({
  id,
  label,
  category: "learning",
  records: ["grade", "account"],
  compute: async (ctx) => {
    const [grades, accounts] = await Promise.all([ctx.grades(), ctx.accounts()]);
    const groupOf = new Map(accounts.map((a) => [a.id, a[field] ?? "unassigned"]));
    const groups = groupBy(
      grades.filter((g) => groupOf.has(g.accountId)),
      (g) => groupOf.get(g.accountId) ?? "unassigned",
      (group) => ({
        averageScore: mean(scoresOf(group)),
        students: new Set(group.map((g) => g.accountId)).size,
        submissions: group.length
      })
    );
    return table(
      [field, "averageScore", "students", "submissions"],
      sortedGroups(groups).map(([key, v]) => ({
        [field]: key,
        averageScore: cell(v.averageScore, 1),
        students: v.students,
        submissions: v.submissions
      }))
    );
  }
});

const countTable = (column: string, labelsInOrder: readonly string[], values: readonly string[]) => {
  const counts = new Map(labelsInOrder.map((l) => [l, 0]));
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return table(
    [column, "count"],
    labelsInOrder.map((l) => ({ [column]: l, count: counts.get(l) ?? 0 }))
  );
};

const atRisk = async (ctx: MetricContext) => classifyAtRisk(aggregatesByStudent(await ctx.grades()), ctx.params.threshold);

export const learningMetrics: MetricSpec[] = [
  scoreStat("grades.average", "Average score", (s) => mean(s)),
  scoreStat("grades.median", "Median score", (s) => percentile(s, 0.5)),
  scoreStat("grades.percentile", "Score percentile", (s, ctx) => percentile(s, ctx.params.percentile), {
    tunables: ["percentile"]
  }),
  scoreStat("grades.min", "Lowest score", (s) => min(s)),
  scoreStat("grades.max", "Highest score", (s) => max(s)),
  submissionCount("grades.submissions_total", "Submissions", () => true),
  submissionCount("grades.graded_total", "Graded submissions", (g) => g.finalScore !== null),
  submissionCount("grades.pending_total", "Submissions awaiting a grade", (g) => g.finalScore === null),
  {
    id: "grades.graded_rate",
    label: "Share of submissions graded",
    category: "learning",
    records: ["grade"],
    compute: async (ctx) => {
      const grades = await ctx.grades();
      return scalar(rate(graded(grades).length, grades.length), { percent: true });
    }
  },
  {
    id: "grades.pass_rate",
    label: "Share of graded submissions at or above the pass mark",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    tunables: ["threshold"],
    defaults: { threshold: 60 },
    compute: async (ctx) => {
      const scores = present(scoresOf(await ctx.grades()));
      return scalar(rate(count(scores, (s) => s >= ctx.params.threshold), scores.length), { percent: true });
    }
  },
  {
    id: "grades.distribution",
    label: "Score distribution",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    compute: async (ctx) => {
      const scores = present(scoresOf(await ctx.grades()));
      const brackets = scores.map((s) => histogramBucket(s, SCORE_BRACKETS) ?? "0-59");
      return countTable("bracket", SCORE_BRACKETS.map((b) => b.label), brackets);
    }
  },
  {
    id: "grades.letter_distribution",
    label: "Letter grade distribution (submissions)",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    compute: async (ctx) => {
      const scores = present(scoresOf(await ctx.grades()));
      return countTable("letter", LETTER_GRADES.map((b) => b.label), scores.map(letterGrade));
    }
  },
  {
    id: "grades.letter",
    label: "Letter grade of the average score",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    compute: async (ctx) => scalar(mean(scoresOf(await ctx.grades())), { ...SCORE, label: letterGrade })
  },
  {
    id: "grades.trend",
    label: "Average score over time",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    tunables: ["granularity"],
    compute: async (ctx) => {
      const buckets = bucketByTime(graded(await ctx.grades()), (g) => g.submittedAt, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "score",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: cell(mean(scoresOf(b.records)), 1) }))
      );
    }
  },
  {
    id: "grades.rolling_average",
    label: "Rolling average score",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    tunables: ["granularity", "windowSize"],
    compute: async (ctx) => {
      const buckets = bucketByTime(graded(await ctx.grades()), (g) => g.submittedAt, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      const rolled = rollingWindow(buckets, ctx.params.windowSize, (window) => mean(window.flatMap((b) => scoresOf(b.records))));
      return series(
        "score",
        ctx.params.granularity,
        buckets.map((b, i) => ({ bucket: b.bucket, value: cell(rolled[i], 1) }))
      );
    }
  },
  {
    id: "grades.submission_trend",
    label: "Submissions over time",
    category: "learning",
    records: ["grade"],
    roles: WITH_STUDENTS,
    tunables: ["granularity"],
    compute: async (ctx) => {
      const buckets = bucketByTime(await ctx.grades(), (g) => g.submittedAt, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "count",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: b.records.length }))
      );
    }
  },
  {
    id: "grades.by_student",
    label: "Average score by student",
    category: "learning",
    records: ["grade"],
    compute: async (ctx) => {
      const rows = aggregatesByStudent(await ctx.grades()).map((a) => ({
        studentId: a.studentId,
        meanScore: cell(a.meanScore, 1),
        gradedSubmissions: a.gradedSubmissions,
        submissions: a.totalSubmissions
      }));
      return table(["studentId", "meanScore", "gradedSubmissions", "submissions"], rows);
    }
  },
  {
    id: "grades.by_case_study",
    label: "Average score by case study",
    category: "learning",
    records: ["grade", "caseStudy"],
    roles: WITH_STUDENTS,
    compute: async (ctx) => {
      const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
      const titles = new Map(caseStudies.map((c) => [c.id, c.title]));
      const groups = groupBy(grades, (g) => g.caseStudyId, (group) => ({
        averageScore: mean(scoresOf(group)),
        submissions: group.length
      }));
      return table(
        ["caseStudyId", "title", "averageScore", "submissions"],
        sortedGroups(groups).map(([id, v]) => ({
          caseStudyId: id,
          title: titles.get(id) ?? null,
          averageScore: cell(v.averageScore, 1),
          submissions: v.submissions
        }))
      );
    }
  },
  byAccountField("grades.by_department", "Average score by department", "department"),
  byAccountField("grades.by_cohort", "Average score by cohort", "cohort"),
  ranked("top"),
  ranked("bottom"),
  {
    id: "students.at_risk",
    label: "Students at risk",
    category: "learning",
    records: ["grade"],
    tunables: ["threshold"],
    compute: async (ctx) => {
      const rows = (await atRisk(ctx)).map((s) => ({ studentId: s.studentId, meanScore: cell(s.meanScore, 1), tier: s.tier }));
      return table(["studentId", "meanScore", "tier"], rows);
    }
  },
  {
    id: "students.at_risk_count",
    label: "Number of students at risk",
    category: "learning",
    records: ["grade"],
    tunables: ["threshold"],
    compute: async (ctx) => scalar((await atRisk(ctx)).length, COUNT)
  },
  {
    id: "students.at_risk_rate",
    label: "Share of graded students at risk",
    category: "learning",
    records: ["grade"],
    tunables: ["threshold"],
    compute: async (ctx) => {
      const aggregates = aggregatesByStudent(await ctx.grades());
      const gradedStudents = count(aggregates, (a) => a.meanScore !== undefined);
      return scalar(rate(classifyAtRisk(aggregates, ctx.params.threshold).length, gradedStudents), { percent: true });
    }
  },
  {
    id: "students.at_risk_tiers",
    label: "Students at risk by tier",
    category: "learning",
    records: ["grade"],
    tunables: ["threshold"],
    compute: async (ctx) => {
      const tiers: readonly RiskTier[] = ["critical", "high", "moderate"];
      return countTable("tier", tiers, (await atRisk(ctx)).map((s) => s.tier));
    }
  },
  {
    id: "students.letter_distribution",
    label: "Students by letter grade of their average",
    category: "learning",
    records: ["grade"],
    compute: async (ctx) => {
      const means = aggregatesByStudent(await ctx.grades()).flatMap((a) => (a.meanScore === undefined ? [] : [a.meanScore]));
      return countTable("letter", LETTER_GRADES.map((b) => b.label), means.map(letterGrade));
    }
  }
];
