import { bucketByTime, distinctCount, groupBy, rate, sortedGroups } from "../primitives";
import type { Account } from "../types";
import { scalar, series, table, type MetricSpec } from "./builder";

const COUNT = { unit: "count", precision: 0, whenEmpty: 0 } as const;

const UNASSIGNED = "unassigned";

const countBy = (id: string, label: string, keyFn: (a: Account) => string | null, column: string): MetricSpec => ({
  id,
  label,
  category: "users",
  records: ["account"],
  compute: async (ctx) => {
    const accounts = await ctx.accounts();
    const groups = groupBy(accounts, (a) => keyFn(a) ?? UNASSIGNED, (g) => g.length);
    return table(
      [column, "accounts"],
      sortedGroups(groups).map(([key, n]) => ({ [column]: key, accounts: n }))
    );
  }
});

export const userMetrics: MetricSpec[] = [
  {
    id: "users.total",
    label: "Total users",
    category: "users",
    records: ["account"],
    compute: async (ctx) => scalar((await ctx.accounts()).length, COUNT)
  },
  countBy("users.by_role", "Users by role", (a) => a.role, "role"),
  countBy("users.by_department", "Users by department", (a) => a.department, "department"),
  countBy("users.by_cohort", "Users by cohort", (a) => a.cohort, "cohort"),
  {
    id: "users.registrations",
    label: "New registrations",
    category: "users",
    records: ["account"],
    compute: async (ctx) => scalar((await ctx.accounts({ windowed: true })).length, COUNT)
  },
  {
    id: "users.registration_trend",
    label: "Registrations over time",
    category: "users",
    records: ["account"],
    tunables: ["granularity"],
    compute: async (ctx) => {
      const accounts = await ctx.accounts({ windowed: true });
      const buckets = bucketByTime(accounts, (a) => a.registeredAt, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "count",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: b.records.length }))
      );
    }
  },
  {
    id: "students.total",
    label: "Total students",
    category: "users",
    records: ["account"],
    compute: async (ctx) => scalar((await ctx.accounts({ role: "student" })).length, COUNT)
  },
  {
    id: "faculty.total",
    label: "Total faculty",
    category: "users",
    records: ["account"],
    compute: async (ctx) => scalar((await ctx.accounts({ role: "faculty" })).length, COUNT)
  },
  {
    id: "students.active",
    label: "Active students (submitted in window)",
    category: "users",
    records: ["grade"],
    compute: async (ctx) => scalar(distinctCount(await ctx.grades(), (g) => g.accountId), COUNT)
  },
  {
    id: "students.active_rate",
    label: "Share of students active in window",
    category: "users",
    records: ["account", "grade"],
    compute: async (ctx) => {
      const [students, grades] = await Promise.all([ctx.accounts({ role: "student" }), ctx.grades()]);
      const ids = new Set(students.map((s) => s.id));
      const active = distinctCount(grades, (g) => (ids.has(g.accountId) ? g.accountId : null));
      return scalar(rate(active, students.length), { percent: true });
    }
  },
  {
    id: "students.daily_active",
    label: "Active students over time",
    category: "users",
    records: ["grade"],
    tunables: ["granularity"],
    compute: async (ctx) => {
      const buckets = bucketByTime(await ctx.grades(), (g) => g.submittedAt, ctx.params.granularity, ctx.settings.timeBucketWeekStartDay);
      return series(
        "count",
        ctx.params.granularity,
        buckets.map((b) => ({ bucket: b.bucket, value: distinctCount(b.records, (g) => g.accountId) }))
      );
    }
  },
  {
    id: "students.inactive",
    label: "Students without submissions in window",
    category: "users",
    records: ["account", "grade"],
    tunables: ["limit"],
    compute: async (ctx) => {
      const [students, grades] = await Promise.all([ctx.accounts({ role: "student" }), ctx.grades()]);
      const active = new Set(grades.map((g) => g.accountId));
      const rows = students
        .filter((s) => !active.has(s.id))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .slice(0, ctx.params.limit)
        .map((s) => ({ studentId: s.id, name: s.name, department: s.department, cohort: s.cohort }));
      return table(["studentId", "name", "department", "cohort"], rows);
    }
  }
];
