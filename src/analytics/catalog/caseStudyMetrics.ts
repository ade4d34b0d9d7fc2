import { distinctCount, groupBy, mean, rate, sortedGroups } from "../primitives";
import { cell, graded, scalar, scoresOf, table, type MetricSpec } from "./builder";

const byDifficulty = (id: string, label: string, order: "asc" | "desc"): MetricSpec => ({
  id,
  label,
  category: "caseStudies",
  records: ["grade", "caseStudy"],
  tunables: ["limit"],
  compute: async (ctx) => {
    const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
    const titles = new Map(caseStudies.map((c) => [c.id, c.title]));
    const sign = order === "asc" ? 1 : -1;

    const rows = sortedGroups(groupBy(graded(grades), (g) => g.caseStudyId, (group) => mean(scoresOf(group))))
      .flatMap(([caseStudyId, avg]) => (avg === undefined ? [] : [{ caseStudyId, avg }]))
      .sort((a, b) => sign * (a.avg - b.avg) || (a.caseStudyId < b.caseStudyId ? -1 : 1))
      .slice(0, ctx.params.limit)
      .map((r) => ({ caseStudyId: r.caseStudyId, title: titles.get(r.caseStudyId) ?? null, averageScore: cell(r.avg, 1) }));

    return table(["caseStudyId", "title", "averageScore"], rows);
  }
});

export const caseStudyMetrics: MetricSpec[] = [
  {
    id: "case_studies.total",
    label: "Case studies in the catalog",
    category: "caseStudies",
    records: ["caseStudy"],
    roles: ["admin", "faculty", "student"],
    defaultWindow: "all",
    compute: async (ctx) => scalar((await ctx.caseStudies()).length, { unit: "count", precision: 0, whenEmpty: 0 })
  },
  {
    id: "case_studies.attempted",
    label: "Case studies with submissions",
    category: "caseStudies",
    records: ["grade"],
    compute: async (ctx) =>
      scalar(distinctCount(await ctx.grades(), (g) => g.caseStudyId), { unit: "count", precision: 0, whenEmpty: 0 })
  },
  {
    id: "case_studies.coverage",
    label: "Share of case studies attempted",
    category: "caseStudies",
    records: ["grade", "caseStudy"],
    compute: async (ctx) => {
      const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
      const known = new Set(caseStudies.map((c) => c.id));
      const attempted = distinctCount(grades, (g) => (known.has(g.caseStudyId) ? g.caseStudyId : null));
      return scalar(rate(attempted, caseStudies.length), { percent: true });
    }
  },
  byDifficulty("case_studies.hardest", "Case studies with the lowest average", "asc"),
  byDifficulty("case_studies.easiest", "Case studies with the highest average", "desc"),
  {
    id: "case_studies.participation",
    label: "Participation by case study",
    category: "caseStudies",
    records: ["grade", "caseStudy"],
    compute: async (ctx) => {
      const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
      const groups = groupBy(grades, (g) => g.caseStudyId, (group) => ({
        students: distinctCount(group, (g) => g.accountId),
        submissions: group.length
      }));
      const rows = caseStudies
        .slice()
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .map((c) => ({
          caseStudyId: c.id,
          title: c.title,
          students: groups.get(c.id)?.students ?? 0,
          submissions: groups.get(c.id)?.submissions ?? 0
        }));
      return table(["caseStudyId", "title", "students", "submissions"], rows);
    }
  },
  {
    id: "case_studies.pending_review",
    label: "Ungraded submissions by case study",
    category: "caseStudies",
    records: ["grade", "caseStudy"],
    compute: async (ctx) => {
      const [grades, caseStudies] = await Promise.all([ctx.grades(), ctx.caseStudies()]);
      const titles = new Map(caseStudies.map((c) => [c.id, c.title]));
      const pending = grades.filter((g) => g.finalScore === null);
      const groups = groupBy(pending, (g) => g.caseStudyId, (group) => group.length);
      return table(
        ["caseStudyId", "title", "pending"],
        sortedGroups(groups).map(([id, n]) => ({ caseStudyId: id, title: titles.get(id) ?? null, pending: n }))
      );
    }
  }
];
