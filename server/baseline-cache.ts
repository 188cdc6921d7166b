import type { BaselineMetric, SeriesPoint } from "../lib/health-types";
import { resolveBaseline, type ResolvedBaseline } from "../lib/baseline-stats";

export const BASELINE_TTL_MS = 24 * 3_600_000;

export interface CachedBaseline extends ResolvedBaseline {
  computedAt: Date;
}

interface Entry {
  baseline: CachedBaseline;
  fingerprint: string;
}

function fingerprintOf(series: readonly SeriesPoint[]): string {
  if (series.length === 0) return "empty";
  const last = series[series.length - 1];
  return `${series.length}:${last.timestamp.getTime()}:${last.value}`;
}

/**
 * One baseline per metric. An entry is rebuilt when its backing series
 * changes or it is older than the TTL.
 */
export class BaselineCache {
  private readonly entries = new Map<BaselineMetric, Entry>();

  constructor(private readonly ttlMs: number = BASELINE_TTL_MS) {}

  resolve(metric: BaselineMetric, series: readonly SeriesPoint[], now: Date = new Date()): CachedBaseline {
    const fingerprint = fingerprintOf(series);
    const existing = this.entries.get(metric);
    if (
      existing &&
      existing.fingerprint === fingerprint &&
      now.getTime() - existing.baseline.computedAt.getTime() < this.ttlMs
    ) {
      return existing.baseline;
    }

    const baseline: CachedBaseline = { ...resolveBaseline(metric, series), computedAt: now };
    this.entries.set(metric, { baseline, fingerprint });
    return baseline;
  }

  peek(metric: BaselineMetric): CachedBaseline | null {
    return this.entries.get(metric)?.baseline ?? null;
  }

  clear(): void {
    this.entries.clear();
  }
}
