import type { BaselineMetric, IsoDate, SeriesPoint } from "./health-types";
import { startOfDay, toIsoDate } from "./calendar-day";

export type DailyAggregation = "sum" | "average";

// Activity accumulates through the day; vitals are averaged.
export const DAILY_AGGREGATION: Record<BaselineMetric, DailyAggregation> = {
  steps: "sum",
  activeEnergy: "sum",
  hrv: "average",
  restingHeartRate: "average",
};

/**
 * Collapses raw samples into one point per calendar day in `timezone` (UTC
 * when none is given), stamped at the day's start. Days on or after `before`
 * are dropped so a partial day never enters a baseline.
 */
export function rollupDaily(
  series: readonly SeriesPoint[],
  mode: DailyAggregation,
  before?: IsoDate,
  timezone?: string | null,
): SeriesPoint[] {
  const buckets = new Map<IsoDate, { sum: number; n: number }>();
  for (const p of series) {
    if (!Number.isFinite(p.value) || !Number.isFinite(p.timestamp.getTime())) continue;
    const day = toIsoDate(p.timestamp, timezone);
    if (before != null && day >= before) continue;
    const b = buckets.get(day) ?? { sum: 0, n: 0 };
    b.sum += p.value;
    b.n += 1;
    buckets.set(day, b);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([day, b]) => ({
      timestamp: startOfDay(day, timezone),
      value: mode === "sum" ? b.sum : b.sum / b.n,
    }));
}

export function sumForDay(series: readonly SeriesPoint[], day: IsoDate, timezone?: string | null): number | null {
  let total = 0;
  let seen = false;
  for (const p of series) {
    if (!Number.isFinite(p.value)) continue;
    if (toIsoDate(p.timestamp, timezone) !== day) continue;
    total += p.value;
    seen = true;
  }
  return seen ? total : null;
}
