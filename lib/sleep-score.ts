import type { ScoreStatus, SleepSession } from "./health-types";
import { sessionDurationHours, stagePercentages } from "./sleep-session-builder";

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export const SLEEP_WEIGHTS = {
  duration: 0.40,
  efficiency: 0.25,
  rem: 0.15,
  deep: 0.15,
  fragmentation: 0.05,
} as const;

export const REM_OPTIMAL_PCT = [20, 25] as const;
export const DEEP_OPTIMAL_PCT = [15, 20] as const;

export function sleepStatus(score: number): ScoreStatus {
  if (score >= 80) return "optimal";
  if (score >= 60) return "moderate";
  return "poor";
}

/** Peaks at 8.5–9.5 h; falls off faster on the short side. */
export function durationComponent(hours: number): number {
  if (hours >= 8.5 && hours <= 9.5) return 100;
  if (hours > 9.5 && hours <= 10.5) return 100 - (hours - 9.5) * 15;
  if (hours > 10.5) return Math.max(50, 85 - (hours - 10.5) * 15);
  if (hours >= 7.5) return 85 + (hours - 7.5) * 15;
  if (hours >= 7) return 75 + (hours - 7) * 20;
  if (hours >= 6) return 55 + (hours - 6) * 20;
  if (hours >= 5) return 30 + (hours - 5) * 25;
  return Math.max(0, hours * 6);
}

export function efficiencyComponent(efficiency: number): number {
  const pct = efficiency * 100;
  if (pct >= 90) return 100;
  if (pct >= 85) return 85 + (pct - 85) * 3;
  if (pct >= 80) return 70 + (pct - 80) * 3;
  if (pct >= 75) return 55 + (pct - 75) * 3;
  if (pct >= 65) return 30 + (pct - 65) * 2.5;
  return Math.max(0, (pct / 65) * 30);
}

export function bandComponent(pct: number, band: readonly [number, number]): number {
  const [lo, hi] = band;
  if (pct >= lo && pct <= hi) return 100;
  const distance = pct < lo ? lo - pct : pct - hi;
  return Math.max(0, 100 - distance * 5);
}

export function fragmentationComponent(index: number): number {
  return Math.max(0, 100 - index * 10);
}

export function wasoPenalty(wasoMinutes: number): number {
  if (wasoMinutes <= 0) return 0;
  if (wasoMinutes <= 10) return 2;
  if (wasoMinutes <= 20) return 5;
  if (wasoMinutes <= 30) return 10;
  return 15;
}

export interface SleepScoreBreakdown {
  value: number;
  status: ScoreStatus;
  subMetrics: Record<string, number>;
}

export function comprehensiveSleepScore(session: SleepSession): SleepScoreBreakdown {
  const hours = sessionDurationHours(session);
  const pct = stagePercentages(session.stages);
  const wasoMin = session.metrics.waso / 60_000;

  const duration = durationComponent(hours);
  const efficiency = efficiencyComponent(session.efficiency);
  const rem = bandComponent(pct.rem, REM_OPTIMAL_PCT);
  const deep = bandComponent(pct.deep, DEEP_OPTIMAL_PCT);
  const fragmentation = fragmentationComponent(session.metrics.fragmentationIndex);
  const penalty = wasoPenalty(wasoMin);

  const weighted =
    SLEEP_WEIGHTS.duration * duration +
    SLEEP_WEIGHTS.efficiency * efficiency +
    SLEEP_WEIGHTS.rem * rem +
    SLEEP_WEIGHTS.deep * deep +
    SLEEP_WEIGHTS.fragmentation * fragmentation;

  const value = clamp(weighted - penalty, 0, 100);
  return {
    value,
    status: sleepStatus(value),
    subMetrics: {
      durationHours: hours,
      efficiencyPct: session.efficiency * 100,
      remPct: pct.rem,
      deepPct: pct.deep,
      fragmentationIndex: session.metrics.fragmentationIndex,
      wasoMin,
      wasoPenalty: penalty,
    },
  };
}

export interface BasicSleepInputs {
  durationHours?: number | null;
  efficiency?: number | null;
  wakeEvents?: number | null;
}

/** Used only when no reconstructed session exists for the day. */
export function basicSleepScore(input: BasicSleepInputs): SleepScoreBreakdown {
  let score = 50;
  const subMetrics: Record<string, number> = {};

  const { durationHours, efficiency, wakeEvents } = input;

  if (durationHours != null) {
    subMetrics.durationHours = durationHours;
    if (durationHours >= 8) score += 20;
    else if (durationHours >= 7) score += 12;
    else if (durationHours >= 6) score += 5;
    else if (durationHours < 5) score -= 20;
    else score -= 10;
  }

  if (efficiency != null) {
    subMetrics.efficiencyPct = efficiency * 100;
    if (efficiency >= 0.9) score += 20;
    else if (efficiency >= 0.85) score += 12;
    else if (efficiency >= 0.8) score += 5;
    else if (efficiency < 0.75) score -= 20;
    else score -= 10;
  }

  if (wakeEvents != null) {
    subMetrics.wakeEvents = wakeEvents;
    if (wakeEvents === 0) score += 10;
    else if (wakeEvents <= 2) score += 5;
    else if (wakeEvents > 5) score -= 10;
  }

  const value = clamp(score, 0, 100);
  return { value, status: sleepStatus(value), subMetrics };
}
