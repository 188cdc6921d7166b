import { endOfDay, startOfDay } from "./calendar-day";
import type { DailySleepSummary, IsoDate, SleepSession } from "./health-types";

/** Sessions overlapping `date` in `timezone` (UTC when none is given). */
export function buildDailySummary(
  date: IsoDate,
  sessions: readonly SleepSession[],
  timezone?: string | null,
): DailySleepSummary {
  const dayStart = startOfDay(date, timezone).getTime();
  const dayEnd = endOfDay(date, timezone).getTime();

  const daySessions = sessions.filter((s) => s.start.getTime() < dayEnd && s.end.getTime() > dayStart);

  // first-longest wins on ties
  let primary: SleepSession | null = null;
  for (const s of daySessions) {
    if (primary == null || s.duration > primary.duration) primary = s;
  }

  const totalDuration = daySessions.reduce((sum, s) => sum + s.duration, 0);
  const totalWakeEvents = daySessions.reduce((sum, s) => sum + s.wakeEvents, 0);
  const averageEfficiency = daySessions.length === 0
    ? 0
    : daySessions.reduce((sum, s) => sum + s.efficiency, 0) / daySessions.length;

  return {
    date,
    primarySession: primary,
    totalDuration,
    averageEfficiency,
    totalWakeEvents,
    bedtime: primary?.start ?? null,
    wakeTime: primary?.end ?? null,
    hasData: primary != null && totalDuration > 0,
  };
}
