import { WEEKDAYS, type Granularity, type Weekday } from "./types";

/**
 * Statistical building blocks shared by every metric definition.
 *
 * "No data" is never an exception here: reducers over numbers return
 * `undefined` when nothing non-null is left, and the catalog decides whether
 * that surfaces as an undefined result or a documented default.
 */

export type MaybeNumber = number | null | undefined;

export const present = (values: readonly MaybeNumber[]): number[] =>
  values.filter((v): v is number => typeof v === "number" && Number.isFinite(v));

export const count = <T>(records: readonly T[], predicate?: (record: T) => boolean): number => {
  if (!predicate) return records.length;
  let n = 0;
  for (const r of records) {
    if (predicate(r)) n += 1;
  }
  return n;
};

export const distinctCount = <T>(records: readonly T[], keyFn: (record: T) => string | null | undefined): number => {
  const seen = new Set<string>();
  for (const r of records) {
    const key = keyFn(r);
    if (key !== null && key !== undefined) seen.add(key);
  }
  return seen.size;
};

/** Sum of the non-null values; an empty input sums to 0. */
export const sum = (values: readonly MaybeNumber[]): number => present(values).reduce((a, b) => a + b, 0);

export const mean = (values: readonly MaybeNumber[]): number | undefined => {
  const nums = present(values);
  if (nums.length === 0) return undefined;
  return nums.reduce((a, b) => a + b, 0) / nums.length;
};

export const min = (values: readonly MaybeNumber[]): number | undefined => {
  const nums = present(values);
  if (nums.length === 0) return undefined;
  return nums.reduce((a, b) => (b < a ? b : a));
};

export const max = (values: readonly MaybeNumber[]): number | undefined => {
  const nums = present(values);
  if (nums.length === 0) return undefined;
  return nums.reduce((a, b) => (b > a ? b : a));
};

/**
 * Continuous percentile: linear interpolation between the two closest ranks
 * of the ascending non-null values. `p` is a fraction in [0, 1].
 */
export const percentile = (values: readonly MaybeNumber[], p: number): number | undefined => {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`percentile must be within [0, 1], got ${p}`);
  }

  const sorted = present(values).sort((a, b) => a - b);
  if (sorted.length === 0) return undefined;

  const rank = p * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const lower = sorted[lo];
  const upper = sorted[hi];
  if (lower === undefined || upper === undefined) return undefined;

  return lower + (upper - lower) * (rank - lo);
};

export const rate = (numerator: number, denominator: number): number | undefined => {
  if (denominator === 0) return undefined;
  return numerator / denominator;
};

/** Partitions records by key, keeping the order in which keys first appear. */
export const groupBy = <T, K, R>(
  records: readonly T[],
  keyFn: (record: T) => K,
  aggFn: (group: T[], key: K) => R
): Map<K, R> => {
  const groups = new Map<K, T[]>();
  for (const r of records) {
    const key = keyFn(r);
    const list = groups.get(key);
    if (list) {
      list.push(r);
    } else {
      groups.set(key, [r]);
    }
  }

  const out = new Map<K, R>();
  for (const [key, group] of groups) {
    out.set(key, aggFn(group, key));
  }
  return out;
};

/** Entries of a grouped result in ascending key order. */
export const sortedGroups = <K extends string | number, R>(groups: Map<K, R>): Array<[K, R]> =>
  [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

export interface TimeBucket<T> {
  bucket: string;
  start: Date;
  records: T[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (n: number): string => String(n).padStart(2, "0");

const toDayKey = (d: Date): string => `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;

export const bucketStart = (at: Date, granularity: Granularity, weekStartDay: Weekday = "monday"): Date => {
  if (granularity === "hour") {
    return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), at.getUTCHours()));
  }

  const day = Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate());
  if (granularity === "day") return new Date(day);

  const offset = (at.getUTCDay() - WEEKDAYS.indexOf(weekStartDay) + 7) % 7;
  return new Date(day - offset * DAY_MS);
};

export const bucketLabel = (start: Date, granularity: Granularity): string =>
  granularity === "hour" ? `${toDayKey(start)}T${pad(start.getUTCHours())}:00Z` : toDayKey(start);

/**
 * Groups records into UTC calendar buckets. Boundaries never depend on when
 * the query runs; weeks begin on `weekStartDay`. Buckets come back in
 * ascending time order and records with unparseable timestamps are dropped.
 */
export const bucketByTime = <T>(
  records: readonly T[],
  timestampFn: (record: T) => string | Date,
  granularity: Granularity,
  weekStartDay: Weekday = "monday"
): TimeBucket<T>[] => {
  const buckets = new Map<number, TimeBucket<T>>();

  for (const r of records) {
    const raw = timestampFn(r);
    const at = raw instanceof Date ? raw : new Date(raw);
    if (Number.isNaN(at.getTime())) continue;

    const start = bucketStart(at, granularity, weekStartDay);
    const existing = buckets.get(start.getTime());
    if (existing) {
      existing.records.push(r);
    } else {
      buckets.set(start.getTime(), { bucket: bucketLabel(start, granularity), start, records: [r] });
    }
  }

  return [...buckets.values()].sort((a, b) => a.start.getTime() - b.start.getTime());
};

/**
 * For each position, aggregates the trailing `windowSize` points ending there.
 * The first positions see fewer points; nothing is padded.
 */
export const rollingWindow = <T, R>(series: readonly T[], windowSize: number, aggFn: (window: T[]) => R): R[] => {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }

  return series.map((_, i) => aggFn(series.slice(Math.max(0, i - windowSize + 1), i + 1)));
};

export interface BucketBoundary {
  /** Inclusive lower bound. */
  min: number;
  label: string;
}

/**
 * Maps a value to the label of the highest boundary it reaches. The highest
 * boundary is open-ended; values below the lowest boundary have no bucket.
 */
export const histogramBucket = (value: number, boundaries: readonly BucketBoundary[]): string | undefined => {
  const descending = boundaries.slice().sort((a, b) => b.min - a.min);
  return descending.find((b) => value >= b.min)?.label;
};

export const round = (value: number, precision: number): number => {
  const factor = 10 ** precision;
  return Math.round((value + Number.EPSILON) * factor) / factor;
};

export const toPercent = (ratio: number, precision = 2): number => round(ratio * 100, precision);
