import type { MetricKind } from "../lib/health-types";

const ISO_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:Z|[+-]\d{2}:?\d{2})$/;

export function parseStrictISO(ts: string): Date | null {
  if (typeof ts !== 'string') return null;
  if (!ISO_REGEX.test(ts)) return null;
  const d = new Date(ts);
  if (isNaN(d.getTime())) return null;
  return d;
}

export function toTimestamp(value: unknown): Date | null {
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  if (typeof value === 'string') return parseStrictISO(value);
  return null;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

// Plausible physiological ranges; anything outside is treated as sensor noise.
export const METRIC_RANGES: Record<MetricKind, readonly [number, number]> = {
  hrv: [0, 500],
  restingHeartRate: [25, 250],
  vo2Max: [5, 100],
  bodyWeight: [20, 400],
  respiratoryRate: [4, 60],
  oxygenSaturation: [50, 100],
  bodyTemperature: [-5, 45],
  sleepDuration: [0, 24],
  steps: [0, 200_000],
  activeEnergy: [0, 20_000],
};

export function isPlausibleValue(metric: MetricKind, value: number): boolean {
  if (typeof value !== 'number' || !Number.isFinite(value)) return false;
  const [lo, hi] = METRIC_RANGES[metric];
  return value >= lo && value <= hi;
}
