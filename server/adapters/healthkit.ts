import type { MetricKind, RawIntervalSample, SeriesPoint, SleepCategory } from "../../lib/health-types";
import { isPlausibleValue, toTimestamp } from "../validation";

export interface HKQuantitySample {
  uuid: string;
  startDate: string;
  endDate: string;
  value: number;
  unit: string;
  sourceName?: string;
  sourceId?: string;
  metadata?: Record<string, string>;
}

export interface HKCategorySample {
  uuid: string;
  startDate: string;
  endDate: string;
  value: number;
  sourceName?: string;
}

// HKCategoryValueSleepAnalysis raw values.
export const HK_SLEEP_VALUE_MAP: Record<number, SleepCategory> = {
  0: "inBed",
  1: "asleepUnspecified",
  2: "awake",
  3: "asleepCore",
  4: "asleepDeep",
  5: "asleepREM",
};

export const HK_QUANTITY_TYPE_MAP: Record<string, MetricKind> = {
  HKQuantityTypeIdentifierHeartRateVariabilitySDNN: "hrv",
  HKQuantityTypeIdentifierRestingHeartRate: "restingHeartRate",
  HKQuantityTypeIdentifierVO2Max: "vo2Max",
  HKQuantityTypeIdentifierBodyMass: "bodyWeight",
  HKQuantityTypeIdentifierRespiratoryRate: "respiratoryRate",
  HKQuantityTypeIdentifierOxygenSaturation: "oxygenSaturation",
  HKQuantityTypeIdentifierBodyTemperature: "bodyTemperature",
  HKQuantityTypeIdentifierAppleSleepingWristTemperature: "bodyTemperature",
  HKQuantityTypeIdentifierStepCount: "steps",
  HKQuantityTypeIdentifierActiveEnergyBurned: "activeEnergy",
};

export function healthkitSleepValueToCategory(value: number): SleepCategory | null {
  return HK_SLEEP_VALUE_MAP[value] ?? null;
}

export function categoryToHealthkitSleepValue(category: SleepCategory): number {
  for (const [raw, c] of Object.entries(HK_SLEEP_VALUE_MAP)) {
    if (c === category) return Number(raw);
  }
  return -1;
}

export function healthkitSleepToInterval(sample: HKCategorySample): RawIntervalSample | null {
  const category = healthkitSleepValueToCategory(sample.value);
  const start = toTimestamp(sample.startDate);
  const end = toTimestamp(sample.endDate);
  if (category == null || start == null || end == null) return null;
  return { category, start, end };
}

/**
 * HealthKit reports SpO2 as a fraction; everything downstream expects a
 * percentage. HRV is kept to two decimals.
 */
export function normalizeHealthkitValue(metric: MetricKind, value: number, unit: string): number {
  if (metric === "oxygenSaturation" && (unit === "%" || unit === "fraction") && value <= 1) {
    return Math.round(value * 1000) / 10;
  }
  if (metric === "hrv") return Math.round(value * 100) / 100;
  return value;
}

export function healthkitQuantityToPoint(metric: MetricKind, sample: HKQuantitySample): SeriesPoint | null {
  const timestamp = toTimestamp(sample.endDate);
  if (timestamp == null) return null;
  const value = normalizeHealthkitValue(metric, sample.value, sample.unit);
  if (!isPlausibleValue(metric, value)) return null;
  return { timestamp, value };
}

export function healthkitIdentifierToMetric(identifier: string): MetricKind | null {
  return HK_QUANTITY_TYPE_MAP[identifier] ?? null;
}
