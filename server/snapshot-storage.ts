import type { IsoDate, ScoreCategory, ScoreState } from "../lib/health-types";
import { SCORE_CATEGORIES } from "../lib/health-types";
import { DEFAULT_USER_ID } from "./config";
import type { Queryable } from "./db";

export interface DailySnapshot {
  day: IsoDate;
  capturedAt: Date;
  scores: Record<ScoreCategory, ScoreState>;
  hrv: number | null;
  restingHeartRate: number | null;
}

export interface SnapshotSink {
  saveSnapshot(snapshot: DailySnapshot): Promise<void>;
}

function scoreColumns(state: ScoreState): [number | null, string | null] {
  if (state.kind !== "computed") return [null, null];
  return [Math.round(state.value * 10) / 10, state.status];
}

export class PgSnapshotStore implements SnapshotSink {
  constructor(
    private readonly db: Queryable,
    private readonly userId: string = DEFAULT_USER_ID,
  ) {}

  /** First snapshot of a day wins; later calls for the same day are no-ops. */
  async saveSnapshot(s: DailySnapshot): Promise<void> {
    const reasons: Partial<Record<ScoreCategory, string>> = {};
    for (const c of SCORE_CATEGORIES) {
      const state = s.scores[c];
      if (state.kind === "unavailable") reasons[c] = state.reason;
    }

    const [recovery, recoveryStatus] = scoreColumns(s.scores.recovery);
    const [sleep, sleepStatus] = scoreColumns(s.scores.sleep);
    const [strain, strainStatus] = scoreColumns(s.scores.strain);
    const [stress, stressStatus] = scoreColumns(s.scores.stress);

    await this.db.query(
      `INSERT INTO daily_score_snapshots
         (user_id, day, recovery_score, recovery_status, sleep_score, sleep_status,
          strain_score, strain_status, stress_score, stress_status,
          hrv_ms, resting_hr_bpm, reasons, captured_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13::jsonb,$14)
       ON CONFLICT (user_id, day) DO NOTHING`,
      [
        this.userId, s.day,
        recovery, recoveryStatus, sleep, sleepStatus,
        strain, strainStatus, stress, stressStatus,
        s.hrv, s.restingHeartRate,
        JSON.stringify(reasons),
        s.capturedAt,
      ],
    );
  }

  /** Up to `days` most recent computed values for one score, oldest first. */
  async getTrend(category: ScoreCategory, days: number = 7): Promise<number[]> {
    const column = `${category}_score`;
    const { rows } = await this.db.query(
      `SELECT ${column} AS score
       FROM daily_score_snapshots
       WHERE user_id = $1 AND ${column} IS NOT NULL
       ORDER BY day DESC
       LIMIT $2`,
      [this.userId, days],
    );
    return rows.map((r) => Number(r.score)).filter((v) => Number.isFinite(v)).reverse();
  }
}
