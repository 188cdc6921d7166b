export type IsoDate = string;

export type SleepCategory =
  | "inBed"
  | "asleepUnspecified"
  | "asleepCore"
  | "asleepDeep"
  | "asleepREM"
  | "awake";

export const SLEEP_CATEGORIES: readonly SleepCategory[] = [
  "inBed",
  "asleepUnspecified",
  "asleepCore",
  "asleepDeep",
  "asleepREM",
  "awake",
];

export interface RawIntervalSample {
  readonly category: SleepCategory;
  readonly start: Date;
  readonly end: Date;
}

/** Stage durations in milliseconds. */
export interface SleepStages {
  readonly core: number;
  readonly deep: number;
  readonly rem: number;
  readonly awake: number;
}

export interface SleepMetrics {
  /** Total awake time inside the session (ms). Not onset-relative. */
  readonly waso: number;
  readonly fragmentationIndex: number;
  /** Rough estimate: 10% of awake time (ms). */
  readonly sleepLatency: number;
  readonly consistency: number;
}

export type SessionSource = "detailed" | "basic";

export interface SleepSession {
  readonly start: Date;
  readonly end: Date;
  readonly duration: number;
  readonly efficiency: number;
  readonly stages: SleepStages;
  readonly wakeEvents: number;
  readonly source: SessionSource;
  readonly metrics: SleepMetrics;
}

export interface DailySleepSummary {
  readonly date: IsoDate;
  readonly primarySession: SleepSession | null;
  readonly totalDuration: number;
  readonly averageEfficiency: number;
  readonly totalWakeEvents: number;
  readonly bedtime: Date | null;
  readonly wakeTime: Date | null;
  readonly hasData: boolean;
}

export type MetricKind =
  | "hrv"
  | "restingHeartRate"
  | "vo2Max"
  | "bodyWeight"
  | "respiratoryRate"
  | "oxygenSaturation"
  | "bodyTemperature"
  | "sleepDuration"
  | "steps"
  | "activeEnergy";

export const METRIC_KINDS: readonly MetricKind[] = [
  "hrv",
  "restingHeartRate",
  "vo2Max",
  "bodyWeight",
  "respiratoryRate",
  "oxygenSaturation",
  "bodyTemperature",
  "sleepDuration",
  "steps",
  "activeEnergy",
];

export interface SeriesPoint {
  readonly timestamp: Date;
  readonly value: number;
}

export interface LatestObservation {
  readonly value: number;
  readonly timestamp: Date;
}

export interface BaselineStats {
  readonly mean: number;
  readonly stdDev: number;
  readonly count: number;
}

export type BaselineMetric = "steps" | "activeEnergy" | "hrv" | "restingHeartRate";

export type MetricState<T = number> =
  | { readonly kind: "valid"; readonly value: T; readonly lastSeen: Date }
  | { readonly kind: "stale"; readonly lastSeen: Date }
  | { readonly kind: "missing" };

export type ScoreCategory = "recovery" | "sleep" | "strain" | "stress";

export const SCORE_CATEGORIES: readonly ScoreCategory[] = ["recovery", "sleep", "strain", "stress"];

export type ScoreStatus = "optimal" | "moderate" | "poor";

export type ScoreState =
  | { readonly kind: "pending" }
  | { readonly kind: "unavailable"; readonly reason: string }
  | { readonly kind: "computed"; readonly value: number; readonly status: ScoreStatus };
