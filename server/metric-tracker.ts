import type { LatestObservation, MetricKind, MetricState } from "../lib/health-types";
import { METRIC_KINDS } from "../lib/health-types";
import { classify, recencyThreshold } from "../lib/metric-validity";

/**
 * Keeps only the newest observation per metric. Staleness is derived from
 * `now` on every read, so nothing here ticks on its own.
 */
export class MetricTracker {
  private readonly latest = new Map<MetricKind, LatestObservation>();

  observe(metric: MetricKind, value: number, timestamp: Date): boolean {
    if (!Number.isFinite(value) || !Number.isFinite(timestamp.getTime())) return false;
    const prev = this.latest.get(metric);
    if (prev && prev.timestamp.getTime() > timestamp.getTime()) return false;
    if (prev && prev.timestamp.getTime() === timestamp.getTime() && prev.value === value) return false;
    this.latest.set(metric, { value, timestamp });
    return true;
  }

  lastObservation(metric: MetricKind): LatestObservation | null {
    return this.latest.get(metric) ?? null;
  }

  stateOf(metric: MetricKind, now: Date = new Date()): MetricState {
    const obs = this.latest.get(metric);
    return classify(obs?.value, obs?.timestamp, recencyThreshold(metric), now);
  }

  snapshot(now: Date = new Date()): ReadonlyMap<MetricKind, MetricState> {
    return new Map(METRIC_KINDS.map((m) => [m, this.stateOf(m, now)] as const));
  }
}
