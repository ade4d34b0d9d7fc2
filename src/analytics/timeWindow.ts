import type { CanonicalWindow, TimeRange } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

const ROLLING_DAYS = { "7d": 7, "30d": 30, "90d": 90 } as const;

/**
 * Resolves a canonical window to concrete bounds at query time.
 * `all` has no bounds at all.
 */
export const windowToRange = (w: CanonicalWindow, now = new Date()): TimeRange | undefined => {
  switch (w.window) {
    case "all":
      return undefined;
    case "today":
      return {
        from: new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())),
        to: new Date(now)
      };
    case "custom":
      return { from: new Date(w.from), to: new Date(w.to) };
    default:
      return { from: new Date(now.getTime() - ROLLING_DAYS[w.window] * DAY_MS), to: new Date(now) };
  }
};

export const isWithin = (timestamp: string, range: TimeRange | undefined): boolean => {
  const ms = new Date(timestamp).getTime();
  if (Number.isNaN(ms)) return false;
  if (!range) return true;
  return ms >= range.from.getTime() && ms <= range.to.getTime();
};
