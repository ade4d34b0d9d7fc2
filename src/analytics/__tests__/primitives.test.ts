import { describe, expect, it } from "vitest";

import { LATENCY_BRACKETS } from "../evaluators";
import {
  bucketByTime,
  count,
  distinctCount,
  groupBy,
  histogramBucket,
  max,
  mean,
  min,
  percentile,
  rate,
  rollingWindow,
  round,
  sortedGroups,
  sum,
  toPercent
} from "../primitives";

describe("reducers", () => {
  it("returns undefined for empty or all-null input, except sum", () => {
    expect(mean([])).toBeUndefined();
    expect(min([null, undefined])).toBeUndefined();
    expect(max([])).toBeUndefined();
    expect(percentile([], 0.5)).toBeUndefined();
    expect(sum([])).toBe(0);
  });

  it("ignores nulls", () => {
    expect(mean([10, null, 20])).toBe(15);
    expect(min([null, 7, 3])).toBe(3);
    expect(max([null, 7, 3])).toBe(7);
    expect(sum([1, null, 2])).toBe(3);
  });

  it("counts with and without a predicate", () => {
    expect(count([1, 2, 3])).toBe(3);
    expect(count([1, 2, 3], (n) => n > 1)).toBe(2);
    expect(distinctCount(["a", "b", "a", null], (v) => v)).toBe(2);
  });

  it("reports no rate for a zero denominator", () => {
    expect(rate(1, 0)).toBeUndefined();
    expect(rate(1, 4)).toBe(0.25);
  });
});

describe("percentile", () => {
  it("returns min and max at the end points", () => {
    const values = [4, 1, 3, 2];
    expect(percentile(values, 0)).toBe(1);
    expect(percentile(values, 1)).toBe(4);
  });

  it("interpolates between ranks", () => {
    expect(percentile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(percentile([null, 10, undefined, 20], 0.25)).toBe(12.5);
  });

  it("does not reorder its input", () => {
    const values = [3, 1, 2];
    percentile(values, 0.5);
    expect(values).toEqual([3, 1, 2]);
  });

  it("rejects p outside [0, 1]", () => {
    expect(() => percentile([1], 1.5)).toThrow(RangeError);
    expect(() => percentile([1], -0.1)).toThrow(RangeError);
  });
});

describe("groupBy", () => {
  it("keeps first-occurrence order and sortedGroups sorts by key", () => {
    const groups = groupBy(["b", "a", "b"], (v) => v, (g) => g.length);
    expect([...groups.entries()]).toEqual([
      ["b", 2],
      ["a", 1]
    ]);
    expect(sortedGroups(groups)).toEqual([
      ["a", 1],
      ["b", 2]
    ]);
  });
});

describe("bucketByTime", () => {
  const stamps = ["2024-03-05T23:59:00Z", "2024-03-05T00:00:00Z", "2024-03-04T12:00:00Z", "not a date"];

  it("buckets by UTC day in ascending order and drops bad timestamps", () => {
    const buckets = bucketByTime(stamps, (s) => s, "day");
    expect(buckets.map((b) => [b.bucket, b.records.length])).toEqual([
      ["2024-03-04", 1],
      ["2024-03-05", 2]
    ]);
  });

  it("labels hourly buckets", () => {
    expect(bucketByTime(["2024-03-05T23:59:00Z"], (s) => s, "hour").map((b) => b.bucket)).toEqual(["2024-03-05T23:00Z"]);
  });

  it("aligns weeks to the configured start day", () => {
    // 2024-03-06 is a Wednesday.
    expect(bucketByTime(["2024-03-06T08:00:00Z"], (s) => s, "week", "monday")[0]?.bucket).toBe("2024-03-04");
    expect(bucketByTime(["2024-03-06T08:00:00Z"], (s) => s, "week", "sunday")[0]?.bucket).toBe("2024-03-03");
  });
});

describe("rollingWindow", () => {
  it("uses partial windows at the start", () => {
    expect(rollingWindow([1, 2, 3, 4], 2, (w) => sum(w))).toEqual([1, 3, 5, 7]);
  });

  it("rejects a non-positive size", () => {
    expect(() => rollingWindow([1], 0, (w) => w.length)).toThrow(RangeError);
  });
});

describe("histogramBucket", () => {
  it("uses inclusive lower bounds and an open-ended top bucket", () => {
    expect(histogramBucket(99.9, LATENCY_BRACKETS)).toBe("<100ms");
    expect(histogramBucket(100, LATENCY_BRACKETS)).toBe("100-249ms");
    expect(histogramBucket(5000, LATENCY_BRACKETS)).toBe(">=1000ms");
    expect(histogramBucket(-1, LATENCY_BRACKETS)).toBeUndefined();
  });
});

describe("rounding", () => {
  it("rounds and converts ratios to percentages", () => {
    expect(round(12.3456, 2)).toBe(12.35);
    expect(toPercent(0.125)).toBe(12.5);
  });
});
