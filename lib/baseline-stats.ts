import type { BaselineMetric, BaselineStats, SeriesPoint } from "./health-types";

export const BASELINE_MIN_POINTS = 14;
export const BASELINE_WINDOW = 30;
const STDDEV_FLOOR_FRACTION = 0.05;

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

/** Conservative population priors used until a personal baseline exists. */
export const STATIC_PRIORS: Record<BaselineMetric, BaselineStats> = {
  steps: { mean: 8000, stdDev: 2000, count: 0 },
  activeEnergy: { mean: 500, stdDev: 150, count: 0 },
  hrv: { mean: 50, stdDev: 15, count: 0 },
  restingHeartRate: { mean: 60, stdDev: 7, count: 0 },
};

export type BaselineSource = "personal" | "prior";

export interface ResolvedBaseline {
  stats: BaselineStats;
  source: BaselineSource;
}

export function computeBaseline(series: readonly SeriesPoint[]): BaselineStats | null {
  const finite = series.filter((p) => Number.isFinite(p.value) && Number.isFinite(p.timestamp.getTime()));
  if (finite.length < BASELINE_MIN_POINTS) return null;

  const window = [...finite]
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
    .slice(-BASELINE_WINDOW)
    .map((p) => p.value);

  const n = window.length;
  const mean = window.reduce((s, v) => s + v, 0) / n;
  const variance = window.reduce((s, v) => s + (v - mean) * (v - mean), 0) / n;
  return { mean, stdDev: Math.sqrt(variance), count: n };
}

export function effectiveStdDev(stats: BaselineStats): number {
  return Math.max(stats.stdDev, STDDEV_FLOOR_FRACTION * Math.abs(stats.mean));
}

export function zScore(stats: BaselineStats, value: number): number {
  const sd = effectiveStdDev(stats);
  if (sd <= 0) return 0;
  return (value - stats.mean) / sd;
}

/** Maps mean ± scale·σ linearly onto 0–100; values outside saturate. */
export function normalizedScore(stats: BaselineStats, value: number, scale: number = 3.0): number {
  const z = zScore(stats, value);
  return clamp(((z + scale) / (2 * scale)) * 100, 0, 100);
}

export function resolveBaseline(metric: BaselineMetric, series: readonly SeriesPoint[]): ResolvedBaseline {
  const personal = computeBaseline(series);
  if (personal) return { stats: personal, source: "personal" };
  return { stats: STATIC_PRIORS[metric], source: "prior" };
}
