import type { SeriesPoint, SleepSession, SleepStages } from "../health-types";
import { withDerivedMetrics } from "../sleep-session-builder";

export const MIN = 60_000;
export const HOUR = 60 * MIN;
export const DAY = 24 * HOUR;

export function makeSession(
  start: string,
  end: string,
  stages: SleepStages,
  wakeEvents: number = 0,
): SleepSession {
  const s = new Date(start);
  const e = new Date(end);
  const asleep = stages.core + stages.deep + stages.rem;
  const inBed = asleep + stages.awake;
  return withDerivedMetrics({
    start: s,
    end: e,
    duration: e.getTime() - s.getTime(),
    efficiency: inBed > 0 ? asleep / inBed : 0,
    stages,
    wakeEvents,
    source: "detailed",
    metrics: { waso: 0, fragmentationIndex: 0, sleepLatency: 0, consistency: 1 },
  });
}

/** One point per UTC day, the last one on `lastDay`, oldest first. */
export function dailyPoints(values: readonly number[], lastDay: string = "2026-03-09"): SeriesPoint[] {
  const last = new Date(lastDay + "T00:00:00Z").getTime();
  return values.map((value, i) => ({
    timestamp: new Date(last - (values.length - 1 - i) * DAY),
    value,
  }));
}
