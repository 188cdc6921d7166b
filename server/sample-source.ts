import type {
  LatestObservation,
  MetricKind,
  RawIntervalSample,
  SeriesPoint,
  SleepCategory,
} from "../lib/health-types";
import { DEFAULT_USER_ID } from "./config";
import type { Queryable } from "./db";
import { categoryToHealthkitSleepValue, healthkitSleepValueToCategory } from "./adapters/healthkit";
import { isPlausibleValue, toTimestamp } from "./validation";

/**
 * Read side of the platform health store. Implementations return samples
 * with `end <= now`, already de-duplicated; the core re-validates anyway.
 */
export interface SampleSource {
  fetchIntervalSamples(
    categories: readonly SleepCategory[] | null,
    start: Date,
    end: Date,
  ): Promise<RawIntervalSample[]>;
  fetchQuantitySeries(metric: MetricKind, start: Date, end: Date): Promise<SeriesPoint[]>;
  fetchLatest(metric: MetricKind): Promise<LatestObservation | null>;
}

export class PgSampleSource implements SampleSource {
  constructor(
    private readonly db: Queryable,
    private readonly userId: string = DEFAULT_USER_ID,
  ) {}

  async fetchIntervalSamples(
    categories: readonly SleepCategory[] | null,
    start: Date,
    end: Date,
  ): Promise<RawIntervalSample[]> {
    const rawValues = categories?.map(categoryToHealthkitSleepValue) ?? null;
    const { rows } = await this.db.query(
      `SELECT hk_value, start_ts, end_ts
       FROM sleep_interval_samples
       WHERE user_id = $1 AND start_ts < $3 AND end_ts > $2
         AND ($4::smallint[] IS NULL OR hk_value = ANY($4::smallint[]))
       ORDER BY start_ts ASC`,
      [this.userId, start, end, rawValues],
    );

    const samples: RawIntervalSample[] = [];
    for (const r of rows) {
      const category = healthkitSleepValueToCategory(Number(r.hk_value));
      const s = toTimestamp(r.start_ts);
      const e = toTimestamp(r.end_ts);
      if (category == null || s == null || e == null) continue;
      samples.push({ category, start: s, end: e });
    }
    return samples;
  }

  async fetchQuantitySeries(metric: MetricKind, start: Date, end: Date): Promise<SeriesPoint[]> {
    const { rows } = await this.db.query(
      `SELECT ts, value
       FROM quantity_samples
       WHERE user_id = $1 AND metric = $2 AND ts >= $3 AND ts < $4
       ORDER BY ts ASC`,
      [this.userId, metric, start, end],
    );

    const points: SeriesPoint[] = [];
    for (const r of rows) {
      const timestamp = toTimestamp(r.ts);
      const value = Number(r.value);
      if (timestamp == null || !isPlausibleValue(metric, value)) continue;
      points.push({ timestamp, value });
    }
    return points;
  }

  async fetchLatest(metric: MetricKind): Promise<LatestObservation | null> {
    const { rows } = await this.db.query(
      `SELECT ts, value
       FROM quantity_samples
       WHERE user_id = $1 AND metric = $2
       ORDER BY ts DESC
       LIMIT 1`,
      [this.userId, metric],
    );
    if (rows.length === 0) return null;
    const timestamp = toTimestamp(rows[0].ts);
    const value = Number(rows[0].value);
    if (timestamp == null || !isPlausibleValue(metric, value)) return null;
    return { value, timestamp };
  }
}
