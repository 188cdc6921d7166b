import { isValidTimezone } from "./validation";

export interface HealthCoreConfig {
  databaseUrl: string | undefined;
  userId: string;
  debounceMs: number;
  baselineTtlMs: number;
  /** IANA zone for every calendar day; UTC when null. */
  timezone: string | null;
}

export const DEFAULT_USER_ID = "local_default";

function numberFromEnv(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function timezoneFromEnv(raw: string | undefined): string | null {
  if (!raw) return null;
  if (isValidTimezone(raw)) return raw;
  console.warn(`[config] unknown timezone "${raw}", using UTC`);
  return null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HealthCoreConfig {
  return {
    databaseUrl: env.DATABASE_URL,
    userId: env.HEALTH_USER_ID || DEFAULT_USER_ID,
    debounceMs: numberFromEnv(env.SCORE_DEBOUNCE_MS, 1000),
    baselineTtlMs: numberFromEnv(env.BASELINE_TTL_HOURS, 24) * 3_600_000,
    timezone: timezoneFromEnv(env.HEALTH_TIMEZONE),
  };
}
