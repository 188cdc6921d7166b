import {
  SLEEP_CATEGORIES,
  type RawIntervalSample,
  type SessionSource,
  type SleepCategory,
  type SleepSession,
  type SleepStages,
} from "./health-types";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export const SLEEP_SESSION_POLICY = {
  maxGapMs: 30 * MINUTE_MS,
  minSessionMs: 90 * MINUTE_MS,
  latencyFractionOfAwake: 0.1,
} as const;

const ASLEEP: ReadonlySet<SleepCategory> = new Set<SleepCategory>([
  "asleepUnspecified",
  "asleepCore",
  "asleepDeep",
  "asleepREM",
]);

const DETAILED: ReadonlySet<SleepCategory> = new Set<SleepCategory>(["asleepCore", "asleepDeep", "asleepREM"]);

interface SleepInterval {
  start: number;
  end: number;
  samples: RawIntervalSample[];
}

export function totalAsleep(stages: SleepStages): number {
  return stages.core + stages.deep + stages.rem;
}

export function totalInBed(stages: SleepStages): number {
  return totalAsleep(stages) + stages.awake;
}

export function stagePercentages(stages: SleepStages): { core: number; deep: number; rem: number } {
  const asleep = totalAsleep(stages);
  if (asleep <= 0) return { core: 0, deep: 0, rem: 0 };
  return {
    core: (stages.core / asleep) * 100,
    deep: (stages.deep / asleep) * 100,
    rem: (stages.rem / asleep) * 100,
  };
}

export function sessionDurationHours(session: Pick<SleepSession, "duration">): number {
  return session.duration / HOUR_MS;
}

function isUsable(s: RawIntervalSample, rangeStart: number, rangeEnd: number, now: number): boolean {
  const start = s.start.getTime();
  const end = s.end.getTime();
  if (!Number.isFinite(start) || !Number.isFinite(end)) return false;
  if (end <= start) return false;
  if (end > now) return false;
  if (!(start < rangeEnd && end > rangeStart)) return false;
  return SLEEP_CATEGORIES.includes(s.category);
}

function groupIntoIntervals(samples: RawIntervalSample[]): SleepInterval[] {
  const sorted = [...samples].sort((a, b) => a.start.getTime() - b.start.getTime());
  const intervals: SleepInterval[] = [];
  let current: SleepInterval | null = null;

  for (const s of sorted) {
    const start = s.start.getTime();
    const end = s.end.getTime();
    if (current && start - current.end <= SLEEP_SESSION_POLICY.maxGapMs) {
      current.end = Math.max(current.end, end);
      current.samples.push(s);
      continue;
    }
    if (current) intervals.push(current);
    current = { start, end, samples: [s] };
  }
  if (current) intervals.push(current);
  return intervals;
}

/**
 * Unspecified sleep is split by the core:deep:rem ratio seen so far in the
 * interval, or credited to core when nothing specific has been seen yet. The
 * result depends on sample order.
 */
function accumulateStages(samples: RawIntervalSample[]): SleepStages {
  let core = 0;
  let deep = 0;
  let rem = 0;
  let awake = 0;

  for (const s of samples) {
    const d = s.end.getTime() - s.start.getTime();
    switch (s.category) {
      case "asleepCore":
        core += d;
        break;
      case "asleepDeep":
        deep += d;
        break;
      case "asleepREM":
        rem += d;
        break;
      case "awake":
        awake += d;
        break;
      case "asleepUnspecified": {
        const specified = core + deep + rem;
        if (specified > 0) {
          const c = core / specified;
          const dp = deep / specified;
          const r = rem / specified;
          core += d * c;
          deep += d * dp;
          rem += d * r;
        } else {
          core += d;
        }
        break;
      }
      case "inBed":
        break;
    }
  }

  return { core, deep, rem, awake };
}

function countWakeEvents(samples: RawIntervalSample[]): number {
  let events = 0;
  let wasAsleep = false;
  for (const s of samples) {
    if (ASLEEP.has(s.category)) {
      wasAsleep = true;
    } else if (s.category === "awake" && wasAsleep) {
      events += 1;
      wasAsleep = false;
    }
  }
  return events;
}

function sourceOf(samples: RawIntervalSample[]): SessionSource {
  return samples.some((s) => DETAILED.has(s.category)) ? "detailed" : "basic";
}

function sessionFromInterval(interval: SleepInterval): SleepSession | null {
  if (interval.end - interval.start < SLEEP_SESSION_POLICY.minSessionMs) return null;

  const inBed = interval.samples.filter((s) => s.category === "inBed");
  if (inBed.length === 0) return null;

  const start = inBed[0].start;
  const end = inBed[inBed.length - 1].end;
  const duration = end.getTime() - start.getTime();
  if (duration <= 0 || duration < SLEEP_SESSION_POLICY.minSessionMs) return null;

  const stages = accumulateStages(interval.samples);
  const inBedMs = totalInBed(stages);
  const efficiency = inBedMs > 0 ? Math.min(1, Math.max(0, totalAsleep(stages) / inBedMs)) : 0;

  return {
    start,
    end,
    duration,
    efficiency,
    stages,
    wakeEvents: countWakeEvents(interval.samples),
    source: sourceOf(interval.samples),
    metrics: { waso: 0, fragmentationIndex: 0, sleepLatency: 0, consistency: 1 },
  };
}

export function withDerivedMetrics(session: SleepSession): SleepSession {
  const hours = sessionDurationHours(session);
  return {
    ...session,
    metrics: {
      waso: session.stages.awake,
      fragmentationIndex: session.wakeEvents > 0 && hours > 0 ? session.wakeEvents / hours : 0,
      sleepLatency: session.stages.awake * SLEEP_SESSION_POLICY.latencyFractionOfAwake,
      // no bedtime history is consulted yet
      consistency: 1,
    },
  };
}

export function buildSessions(
  samples: readonly RawIntervalSample[],
  rangeStart: Date,
  rangeEnd: Date,
  now: Date = new Date(),
): SleepSession[] {
  const usable = samples.filter((s) => isUsable(s, rangeStart.getTime(), rangeEnd.getTime(), now.getTime()));
  const dropped = samples.length - usable.length;
  if (dropped > 0) console.log(`[sleep-session-builder] dropped ${dropped} of ${samples.length} samples`);
  const sessions: SleepSession[] = [];
  for (const interval of groupIntoIntervals(usable)) {
    const session = sessionFromInterval(interval);
    if (session) sessions.push(withDerivedMetrics(session));
  }
  return sessions;
}
