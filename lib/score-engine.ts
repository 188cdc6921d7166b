import type { BaselineStats, ScoreState, ScoreStatus, SleepSession } from "./health-types";
import { normalizedScore } from "./baseline-stats";
import { basicSleepScore, comprehensiveSleepScore } from "./sleep-score";

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export type ScoreOutcome =
  | { kind: "computed"; value: number; status: ScoreStatus; subMetrics: Record<string, number> }
  | { kind: "unavailable"; reason: string };

export interface ScoreInputs {
  hrv?: number | null;
  restingHeartRate?: number | null;
  sleepEfficiency?: number | null;
  sleepDurationHours?: number | null;
  wakeEvents?: number | null;
  session?: SleepSession | null;
  steps?: number | null;
  activeEnergy?: number | null;
}

/** Personal baselines only; a static prior must not be passed here. */
export interface ScoreBaselines {
  hrv?: BaselineStats | null;
  restingHeartRate?: BaselineStats | null;
  steps?: BaselineStats | null;
  activeEnergy?: BaselineStats | null;
}

export const LOW_ACTIVITY_GUARD = { steps: 1000, activeEnergyKcal: 200 } as const;
export const STRAIN_WEIGHTS = { steps: 0.4, activeEnergy: 0.6 } as const;

export function toScoreState(outcome: ScoreOutcome): ScoreState {
  if (outcome.kind === "unavailable") return { kind: "unavailable", reason: outcome.reason };
  return { kind: "computed", value: outcome.value, status: outcome.status };
}

// --- recovery ---------------------------------------------------------------

export function hrvBandAdjustment(hrv: number): number {
  if (hrv >= 70) return 20;
  if (hrv >= 50) return 15;
  if (hrv >= 30) return 8;
  if (hrv >= 20) return -5;
  return -15;
}

/** Mirrors the HRV bands; below 40 bpm gets no band adjustment. */
export function rhrBandAdjustment(rhr: number): number {
  if (rhr < 40) return 0;
  if (rhr < 60) return 20;
  if (rhr < 80) return 8;
  if (rhr < 100) return -5;
  return -15;
}

export function recoveryStatus(score: number): ScoreStatus {
  if (score >= 75) return "optimal";
  if (score >= 50) return "moderate";
  return "poor";
}

export function computeRecovery(inputs: ScoreInputs, baselines: ScoreBaselines = {}): ScoreOutcome {
  const { hrv, restingHeartRate: rhr, sleepEfficiency: efficiency } = inputs;
  if (hrv == null && rhr == null && efficiency == null) {
    return { kind: "unavailable", reason: "No HRV, RHR or sleep data" };
  }

  let score = 50;
  const subMetrics: Record<string, number> = {};

  if (hrv != null) {
    subMetrics.hrv = hrv;
    score += hrvBandAdjustment(hrv);
    const base = baselines.hrv?.mean;
    if (base != null && base > 0) {
      const ratio = hrv / base;
      subMetrics.hrvRatio = ratio;
      if (ratio > 1.1) score += 10;
      else if (ratio < 0.8) score -= 10;
    }
  }

  if (rhr != null) {
    subMetrics.restingHeartRate = rhr;
    score += rhrBandAdjustment(rhr);
    const base = baselines.restingHeartRate?.mean;
    if (base != null) {
      const diff = base - rhr;
      subMetrics.rhrDelta = -diff;
      if (diff > 5) score += 10;
      else if (diff < -3) score -= 10;
    }
  }

  if (efficiency != null) {
    subMetrics.sleepEfficiencyPct = efficiency * 100;
    if (efficiency >= 0.85) score += 15;
    else if (efficiency >= 0.75) score += 8;
    else if (efficiency < 0.65) score -= 12;
  }

  const value = clamp(score, 0, 100);
  return { kind: "computed", value, status: recoveryStatus(value), subMetrics };
}

// --- sleep ------------------------------------------------------------------

export function computeSleep(inputs: ScoreInputs): ScoreOutcome {
  if (inputs.session) {
    return { kind: "computed", ...comprehensiveSleepScore(inputs.session) };
  }
  if (inputs.sleepDurationHours == null && inputs.sleepEfficiency == null) {
    return { kind: "unavailable", reason: "No sleep data" };
  }
  return {
    kind: "computed",
    ...basicSleepScore({
      durationHours: inputs.sleepDurationHours,
      efficiency: inputs.sleepEfficiency,
      wakeEvents: inputs.wakeEvents,
    }),
  };
}

// --- strain -----------------------------------------------------------------

export function stepsCurve(steps: number): number {
  if (steps >= 12000) return 90 + Math.min(10, ((steps - 12000) / 3000) * 10);
  if (steps >= 8000) return 70 + ((steps - 8000) / 4000) * 20;
  if (steps >= 5000) return 40 + ((steps - 5000) / 3000) * 30;
  if (steps >= 2000) return 20 + ((steps - 2000) / 3000) * 20;
  return Math.max(5, (steps / 2000) * 20);
}

export function energyCurve(kcal: number): number {
  if (kcal >= 600) return 85 + Math.min(15, ((kcal - 600) / 200) * 15);
  if (kcal >= 400) return 65 + ((kcal - 400) / 200) * 20;
  if (kcal >= 200) return 35 + ((kcal - 200) / 200) * 30;
  if (kcal >= 100) return 15 + ((kcal - 100) / 100) * 20;
  return Math.max(5, (kcal / 100) * 15);
}

export function strainStatus(score: number): ScoreStatus {
  if (score >= 70) return "optimal";
  if (score >= 40) return "moderate";
  return "poor";
}

export function computeStrain(inputs: ScoreInputs, baselines: ScoreBaselines = {}): ScoreOutcome {
  const { steps, activeEnergy } = inputs;
  if (steps == null && activeEnergy == null) {
    return { kind: "unavailable", reason: "No steps or active energy data" };
  }

  if ((steps ?? 0) < LOW_ACTIVITY_GUARD.steps && (activeEnergy ?? 0) < LOW_ACTIVITY_GUARD.activeEnergyKcal) {
    return {
      kind: "computed",
      value: 0,
      status: strainStatus(0),
      subMetrics: { steps: steps ?? 0, activeEnergy: activeEnergy ?? 0, lowActivityGuard: 1 },
    };
  }

  const subMetrics: Record<string, number> = {};
  let weighted = 0;
  let weight = 0;

  if (steps != null) {
    const component = baselines.steps ? normalizedScore(baselines.steps, steps) : stepsCurve(steps);
    subMetrics.steps = steps;
    subMetrics.stepsComponent = component;
    weighted += STRAIN_WEIGHTS.steps * component;
    weight += STRAIN_WEIGHTS.steps;
  }
  if (activeEnergy != null) {
    const component = baselines.activeEnergy
      ? normalizedScore(baselines.activeEnergy, activeEnergy)
      : energyCurve(activeEnergy);
    subMetrics.activeEnergy = activeEnergy;
    subMetrics.energyComponent = component;
    weighted += STRAIN_WEIGHTS.activeEnergy * component;
    weight += STRAIN_WEIGHTS.activeEnergy;
  }

  const value = clamp(weighted / weight, 0, 100);
  return { kind: "computed", value, status: strainStatus(value), subMetrics };
}

// --- stress -----------------------------------------------------------------

/** Higher is worse, so the status mapping runs the other way. */
export function stressStatus(score: number): ScoreStatus {
  if (score >= 70) return "poor";
  if (score >= 40) return "moderate";
  return "optimal";
}

export function computeStress(inputs: ScoreInputs, baselines: ScoreBaselines = {}): ScoreOutcome {
  const { hrv } = inputs;
  if (hrv == null) return { kind: "unavailable", reason: "No HRV data" };

  let stress = 50;
  const subMetrics: Record<string, number> = { hrv };
  const base = baselines.hrv?.mean;
  if (base != null && base > 0) {
    const ratio = hrv / base;
    subMetrics.hrvRatio = ratio;
    if (ratio < 0.8) stress += 25;
    else if (ratio < 0.9) stress += 15;
    else if (ratio > 1.1) stress -= 20;
  }

  const value = clamp(stress, 0, 100);
  return { kind: "computed", value, status: stressStatus(value), subMetrics };
}

export interface AllScores {
  recovery: ScoreOutcome;
  sleep: ScoreOutcome;
  strain: ScoreOutcome;
  stress: ScoreOutcome;
}

export function computeAllScores(inputs: ScoreInputs, baselines: ScoreBaselines = {}): AllScores {
  return {
    recovery: computeRecovery(inputs, baselines),
    sleep: computeSleep(inputs),
    strain: computeStrain(inputs, baselines),
    stress: computeStress(inputs, baselines),
  };
}
