import type { MetricKind, MetricState } from "./health-types";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export type RecencyClass = "wearable" | "manual" | "sameDay";

export const RECENCY_THRESHOLDS_MS: Record<RecencyClass, number> = {
  wearable: 7 * DAY_MS,
  manual: 90 * DAY_MS,
  sameDay: 24 * HOUR_MS,
};

export const METRIC_RECENCY_CLASS: Record<MetricKind, RecencyClass> = {
  hrv: "wearable",
  restingHeartRate: "wearable",
  vo2Max: "wearable",
  bodyWeight: "manual",
  respiratoryRate: "sameDay",
  oxygenSaturation: "sameDay",
  bodyTemperature: "sameDay",
  sleepDuration: "sameDay",
  steps: "sameDay",
  activeEnergy: "sameDay",
};

export const METRIC_LABELS: Record<MetricKind, string> = {
  hrv: "HRV",
  restingHeartRate: "RHR",
  vo2Max: "VO2 max",
  bodyWeight: "weight",
  respiratoryRate: "respiratory rate",
  oxygenSaturation: "SpO2",
  bodyTemperature: "temperature",
  sleepDuration: "sleep",
  steps: "steps",
  activeEnergy: "active energy",
};

export function recencyThreshold(metric: MetricKind): number {
  return RECENCY_THRESHOLDS_MS[METRIC_RECENCY_CLASS[metric]];
}

export function classify<T>(
  lastValue: T | null | undefined,
  lastSeen: Date | null | undefined,
  thresholdMs: number,
  now: Date = new Date(),
): MetricState<T> {
  if (lastValue == null || lastSeen == null) return { kind: "missing" };
  const age = now.getTime() - lastSeen.getTime();
  if (age <= thresholdMs) return { kind: "valid", value: lastValue, lastSeen };
  return { kind: "stale", lastSeen };
}

export function isValid<T>(state: MetricState<T>): state is Extract<MetricState<T>, { kind: "valid" }> {
  return state.kind === "valid";
}

export function validValue<T>(state: MetricState<T>): T | null {
  return state.kind === "valid" ? state.value : null;
}

export function sameState<T>(a: MetricState<T>, b: MetricState<T>): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === "missing" || b.kind === "missing") return true;
  if (a.lastSeen.getTime() !== b.lastSeen.getTime()) return false;
  if (a.kind === "valid" && b.kind === "valid") return a.value === b.value;
  return true;
}
