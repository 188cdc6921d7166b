import pg from "pg";
import { loadConfig } from "./config";

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

export function createPool(databaseUrl: string | undefined = loadConfig().databaseUrl): pg.Pool {
  return new pg.Pool({
    connectionString: databaseUrl,
  });
}

export async function runMigration(db: Queryable, name: string, sql: string): Promise<void> {
  const { rows } = await db.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await db.query(sql);
  await db.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(db, "001_sleep_interval_samples", `
    CREATE TABLE IF NOT EXISTS sleep_interval_samples (
      user_id TEXT NOT NULL,
      uuid TEXT NOT NULL,
      hk_value SMALLINT NOT NULL,
      start_ts TIMESTAMPTZ NOT NULL,
      end_ts TIMESTAMPTZ NOT NULL,
      source_name TEXT,
      PRIMARY KEY (user_id, uuid)
    );
    CREATE INDEX IF NOT EXISTS sleep_interval_samples_range
      ON sleep_interval_samples (user_id, start_ts, end_ts);
  `);

  await runMigration(db, "002_quantity_samples", `
    CREATE TABLE IF NOT EXISTS quantity_samples (
      user_id TEXT NOT NULL,
      uuid TEXT NOT NULL,
      metric TEXT NOT NULL,
      ts TIMESTAMPTZ NOT NULL,
      value DOUBLE PRECISION NOT NULL,
      unit TEXT,
      PRIMARY KEY (user_id, uuid)
    );
    CREATE INDEX IF NOT EXISTS quantity_samples_metric_ts
      ON quantity_samples (user_id, metric, ts);
  `);

  await runMigration(db, "003_daily_score_snapshots", `
    CREATE TABLE IF NOT EXISTS daily_score_snapshots (
      user_id TEXT NOT NULL,
      day DATE NOT NULL,
      recovery_score REAL,
      recovery_status TEXT,
      sleep_score REAL,
      sleep_status TEXT,
      strain_score REAL,
      strain_status TEXT,
      stress_score REAL,
      stress_status TEXT,
      hrv_ms REAL,
      resting_hr_bpm REAL,
      reasons JSONB NOT NULL DEFAULT '{}'::jsonb,
      captured_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (user_id, day)
    );
  `);
}
