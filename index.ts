export * from "./lib/health-types";
export * from "./lib/calendar-day";
export * from "./lib/sleep-session-builder";
export * from "./lib/daily-sleep-summary";
export * from "./lib/daily-series";
export * from "./lib/baseline-stats";
export * from "./lib/metric-validity";
export * from "./lib/sleep-score";
export * from "./lib/score-engine";

export { loadConfig, DEFAULT_USER_ID, type HealthCoreConfig } from "./server/config";
export { createPool, initDb, type Queryable } from "./server/db";
export { PgSampleSource, type SampleSource } from "./server/sample-source";
export { PgSnapshotStore, type DailySnapshot, type SnapshotSink } from "./server/snapshot-storage";
export { BaselineCache, BASELINE_TTL_MS, type CachedBaseline } from "./server/baseline-cache";
export { MetricTracker } from "./server/metric-tracker";
export { ScoreOrchestrator, gateReason, type ScoreOrchestratorDeps } from "./server/score-orchestrator";
export {
  healthkitSleepToInterval,
  healthkitQuantityToPoint,
  healthkitIdentifierToMetric,
  type HKCategorySample,
  type HKQuantitySample,
} from "./server/adapters/healthkit";
