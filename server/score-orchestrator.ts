import {
  BehaviorSubject,
  Observable,
  Subscription,
  combineLatest,
  debounceTime,
  distinctUntilChanged,
} from "rxjs";
import type {
  BaselineMetric,
  DailySleepSummary,
  IsoDate,
  MetricKind,
  MetricState,
  ScoreCategory,
  ScoreState,
  SeriesPoint,
  SleepSession,
} from "../lib/health-types";
import { METRIC_KINDS, SCORE_CATEGORIES } from "../lib/health-types";
import { BASELINE_WINDOW } from "../lib/baseline-stats";
import { addDays, startOfDay, toIsoDate } from "../lib/calendar-day";
import { DAILY_AGGREGATION, rollupDaily, sumForDay } from "../lib/daily-series";
import { buildDailySummary } from "../lib/daily-sleep-summary";
import { METRIC_LABELS, sameState, validValue } from "../lib/metric-validity";
import {
  computeRecovery,
  computeSleep,
  computeStrain,
  computeStress,
  toScoreState,
  type ScoreBaselines,
} from "../lib/score-engine";
import { buildSessions } from "../lib/sleep-session-builder";
import { BaselineCache, type CachedBaseline } from "./baseline-cache";
import type { HealthCoreConfig } from "./config";
import { MetricTracker } from "./metric-tracker";
import type { SampleSource } from "./sample-source";
import type { DailySnapshot, SnapshotSink } from "./snapshot-storage";
import { isValidTimezone } from "./validation";

const HOUR_MS = 3_600_000;
export const SLEEP_LOOKBACK_MS = 36 * HOUR_MS;
export const DEFAULT_DEBOUNCE_MS = 1000;

const BASELINE_METRICS: readonly BaselineMetric[] = ["hrv", "restingHeartRate", "steps", "activeEnergy"];
const POINT_METRICS: readonly MetricKind[] = [
  "hrv",
  "restingHeartRate",
  "vo2Max",
  "bodyWeight",
  "respiratoryRate",
  "oxygenSaturation",
  "bodyTemperature",
];

type GateInput = readonly [MetricKind, MetricState];

export interface ScoreOrchestratorDeps {
  source: SampleSource;
  snapshotSink?: SnapshotSink | null;
  tracker?: MetricTracker;
  baselineCache?: BaselineCache;
  config?: Partial<Pick<HealthCoreConfig, "debounceMs" | "baselineTtlMs" | "timezone">>;
  clock?: () => Date;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/** Null when every input is valid; otherwise the reason shown for the score. */
export function gateReason(inputs: readonly GateInput[]): string | null {
  const missing = inputs.find(([, s]) => s.kind === "missing");
  if (missing) return `No ${METRIC_LABELS[missing[0]]} data`;
  const stale = inputs.find(([, s]) => s.kind === "stale");
  if (stale) return `${capitalize(METRIC_LABELS[stale[0]])} data is stale`;
  return null;
}

function sameScore(a: ScoreState, b: ScoreState): boolean {
  if (a.kind === "computed" && b.kind === "computed") return a.value === b.value && a.status === b.status;
  if (a.kind === "unavailable" && b.kind === "unavailable") return a.reason === b.reason;
  return a.kind === b.kind;
}

function sameBaselines(
  a: ReadonlyMap<BaselineMetric, CachedBaseline>,
  b: ReadonlyMap<BaselineMetric, CachedBaseline>,
): boolean {
  if (a.size !== b.size) return false;
  for (const [metric, baseline] of a) {
    if (b.get(metric) !== baseline) return false;
  }
  return true;
}

/**
 * Owns every piece of published state. Data enters through `refresh` (pull
 * from the sample source) or `observe` (push of a single reading); each
 * score pipeline coalesces bursts with a debounce and recomputes from the
 * latest validity states.
 */
export class ScoreOrchestrator {
  private readonly source: SampleSource;
  private readonly snapshotSink: SnapshotSink | null;
  private readonly tracker: MetricTracker;
  private readonly baselineCache: BaselineCache;
  private readonly clock: () => Date;
  private readonly debounceMs: number;
  private readonly timezone: string | null;

  private readonly metricSubjects = new Map<MetricKind, BehaviorSubject<MetricState>>();
  private readonly scoreSubjects: Record<ScoreCategory, BehaviorSubject<ScoreState>> = {
    recovery: new BehaviorSubject<ScoreState>({ kind: "pending" }),
    sleep: new BehaviorSubject<ScoreState>({ kind: "pending" }),
    strain: new BehaviorSubject<ScoreState>({ kind: "pending" }),
    stress: new BehaviorSubject<ScoreState>({ kind: "pending" }),
  };
  private readonly sessionsSubject = new BehaviorSubject<readonly SleepSession[]>([]);
  private readonly summarySubject = new BehaviorSubject<DailySleepSummary | null>(null);
  private readonly baselinesSubject = new BehaviorSubject<ReadonlyMap<BaselineMetric, CachedBaseline>>(new Map());

  private readonly subscriptions = new Subscription();
  private lastSnapshotDay: IsoDate | null = null;
  private refreshSeq = 0;
  private disposed = false;

  constructor(deps: ScoreOrchestratorDeps) {
    this.source = deps.source;
    this.snapshotSink = deps.snapshotSink ?? null;
    this.tracker = deps.tracker ?? new MetricTracker();
    this.baselineCache = deps.baselineCache ?? new BaselineCache(deps.config?.baselineTtlMs);
    this.clock = deps.clock ?? (() => new Date());
    this.debounceMs = deps.config?.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.timezone = deps.config?.timezone ?? null;
    if (this.timezone && !isValidTimezone(this.timezone)) {
      throw new Error(`unknown timezone "${this.timezone}"`);
    }

    const now = this.clock();
    for (const m of METRIC_KINDS) {
      this.metricSubjects.set(m, new BehaviorSubject<MetricState>(this.tracker.stateOf(m, now)));
    }

    // recovery last: the snapshot reads whatever the other scores hold when it fires
    this.subscriptions.add(this.wireStress());
    this.subscriptions.add(this.wireSleep());
    this.subscriptions.add(this.wireStrain());
    this.subscriptions.add(this.wireRecovery());
  }

  // --- published state ------------------------------------------------------

  metric$(metric: MetricKind): Observable<MetricState> {
    return this.metricSubject(metric).asObservable();
  }

  score$(category: ScoreCategory): Observable<ScoreState> {
    return this.scoreSubjects[category].asObservable();
  }

  get sessions$(): Observable<readonly SleepSession[]> {
    return this.sessionsSubject.asObservable();
  }

  get dailySummary$(): Observable<DailySleepSummary | null> {
    return this.summarySubject.asObservable();
  }

  get baselines$(): Observable<ReadonlyMap<BaselineMetric, CachedBaseline>> {
    return this.baselinesSubject.asObservable();
  }

  metricState(metric: MetricKind): MetricState {
    return this.metricSubject(metric).value;
  }

  scoreState(category: ScoreCategory): ScoreState {
    return this.scoreSubjects[category].value;
  }

  scoreStates(): Record<ScoreCategory, ScoreState> {
    return {
      recovery: this.scoreState("recovery"),
      sleep: this.scoreState("sleep"),
      strain: this.scoreState("strain"),
      stress: this.scoreState("stress"),
    };
  }

  get sessions(): readonly SleepSession[] {
    return this.sessionsSubject.value;
  }

  get dailySummary(): DailySleepSummary | null {
    return this.summarySubject.value;
  }

  get baselines(): ReadonlyMap<BaselineMetric, CachedBaseline> {
    return this.baselinesSubject.value;
  }

  get lastSnapshotDate(): IsoDate | null {
    return this.lastSnapshotDay;
  }

  // --- inputs ---------------------------------------------------------------

  /** Push a single reading, e.g. from a background delivery callback. */
  observe(metric: MetricKind, value: number, timestamp: Date, now: Date = this.clock()): boolean {
    if (this.disposed) return false;
    const accepted = this.tracker.observe(metric, value, timestamp);
    if (accepted) this.publishMetrics(now);
    return accepted;
  }

  /** Re-derives validity without new data; staleness only moves when this runs. */
  reevaluate(now: Date = this.clock()): void {
    if (this.disposed) return;
    this.publishMetrics(now);
  }

  /**
   * Pulls everything the scores need from the sample source. A failed fetch
   * rejects and leaves published state untouched. When refreshes overlap,
   * only the most recently started one is applied.
   */
  async refresh(now: Date = this.clock()): Promise<void> {
    const seq = ++this.refreshSeq;
    const today = toIsoDate(now, this.timezone);
    const todayStart = startOfDay(today, this.timezone);
    const historyStart = startOfDay(addDays(today, -BASELINE_WINDOW), this.timezone);
    const sleepStart = new Date(now.getTime() - SLEEP_LOOKBACK_MS);

    const [samples, latest, series] = await Promise.all([
      this.source.fetchIntervalSamples(null, sleepStart, now),
      Promise.all(POINT_METRICS.map(async (m) => [m, await this.source.fetchLatest(m)] as const)),
      Promise.all(
        BASELINE_METRICS.map(async (m) => [m, await this.source.fetchQuantitySeries(m, historyStart, now)] as const),
      ),
    ]);

    if (this.disposed || seq !== this.refreshSeq) return;

    const sessions = buildSessions(samples, sleepStart, now, now);
    const summary = buildDailySummary(today, sessions, this.timezone);

    for (const [metric, obs] of latest) {
      if (obs) this.tracker.observe(metric, obs.value, obs.timestamp);
    }
    if (summary.hasData && summary.primarySession) {
      this.tracker.observe("sleepDuration", summary.totalDuration / HOUR_MS, summary.primarySession.end);
    }

    const resolved = new Map<BaselineMetric, CachedBaseline>();
    for (const [metric, points] of series) {
      if (metric === "steps" || metric === "activeEnergy") {
        this.observeDailyTotal(metric, points, today, todayStart);
      }
      const daily = rollupDaily(points, DAILY_AGGREGATION[metric], today, this.timezone);
      resolved.set(metric, this.baselineCache.resolve(metric, daily, now));
    }

    console.log(
      `[score-orchestrator] refresh ${today}: ${samples.length} interval samples, ${sessions.length} sessions`,
    );

    this.sessionsSubject.next(sessions);
    this.summarySubject.next(summary);
    if (!sameBaselines(this.baselinesSubject.value, resolved)) this.baselinesSubject.next(resolved);
    this.publishMetrics(now);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.subscriptions.unsubscribe();
    for (const s of this.metricSubjects.values()) s.complete();
    for (const c of SCORE_CATEGORIES) this.scoreSubjects[c].complete();
    this.sessionsSubject.complete();
    this.summarySubject.complete();
    this.baselinesSubject.complete();
  }

  // --- internals ------------------------------------------------------------

  private metricSubject(metric: MetricKind): BehaviorSubject<MetricState> {
    let subject = this.metricSubjects.get(metric);
    if (!subject) {
      subject = new BehaviorSubject<MetricState>({ kind: "missing" });
      this.metricSubjects.set(metric, subject);
    }
    return subject;
  }

  private observeDailyTotal(
    metric: "steps" | "activeEnergy",
    points: readonly SeriesPoint[],
    today: IsoDate,
    todayStart: Date,
  ): void {
    const total = sumForDay(points, today, this.timezone);
    if (total == null) {
      // a new day starts from zero once the metric has any history
      if (points.length > 0 || this.tracker.lastObservation(metric)) this.tracker.observe(metric, 0, todayStart);
      return;
    }
    let lastSeen = todayStart;
    for (const p of points) {
      if (p.timestamp.getTime() > lastSeen.getTime()) lastSeen = p.timestamp;
    }
    this.tracker.observe(metric, total, lastSeen);
  }

  private publishMetrics(now: Date): void {
    for (const m of METRIC_KINDS) {
      const subject = this.metricSubject(m);
      const next = this.tracker.stateOf(m, now);
      if (!sameState(subject.value, next)) subject.next(next);
    }
  }

  private publishScore(category: ScoreCategory, state: ScoreState): void {
    const subject = this.scoreSubjects[category];
    if (!sameScore(subject.value, state)) subject.next(state);
  }

  private personalBaselines(map: ReadonlyMap<BaselineMetric, CachedBaseline>): ScoreBaselines {
    const personal = (m: BaselineMetric) => {
      const b = map.get(m);
      return b && b.source === "personal" ? b.stats : null;
    };
    return {
      hrv: personal("hrv"),
      restingHeartRate: personal("restingHeartRate"),
      steps: personal("steps"),
      activeEnergy: personal("activeEnergy"),
    };
  }

  private debounced<T>(source: Observable<T>): Observable<T> {
    return source.pipe(debounceTime(this.debounceMs));
  }

  private wireRecovery(): Subscription {
    let lastVitals: readonly [MetricState, MetricState] | null = null;
    return this.debounced(
      combineLatest([
        this.metric$("hrv"),
        this.metric$("restingHeartRate"),
        this.summarySubject,
        this.baselinesSubject,
      ]),
    ).subscribe(([hrv, rhr, summary, baselines]) => {
      const vitalsChanged =
        lastVitals == null || !sameState(lastVitals[0], hrv) || !sameState(lastVitals[1], rhr);
      lastVitals = [hrv, rhr];

      const reason = gateReason([["hrv", hrv], ["restingHeartRate", rhr]]);
      const state: ScoreState = reason
        ? { kind: "unavailable", reason }
        : toScoreState(
            computeRecovery(
              {
                hrv: validValue(hrv),
                restingHeartRate: validValue(rhr),
                sleepEfficiency: summary?.hasData ? summary.averageEfficiency : null,
              },
              this.personalBaselines(baselines),
            ),
          );
      this.publishScore("recovery", state);
      if (vitalsChanged) this.maybeSnapshot(hrv, rhr);
    });
  }

  private wireSleep(): Subscription {
    return this.debounced(combineLatest([this.metric$("sleepDuration"), this.summarySubject])).subscribe(
      ([duration, summary]) => {
        const reason = gateReason([["sleepDuration", duration]]);
        const state: ScoreState = reason
          ? { kind: "unavailable", reason }
          : toScoreState(
              computeSleep({
                session: summary?.primarySession ?? null,
                sleepDurationHours: validValue(duration),
                sleepEfficiency: summary?.hasData ? summary.averageEfficiency : null,
                wakeEvents: summary?.hasData ? summary.totalWakeEvents : null,
              }),
            );
        this.publishScore("sleep", state);
      },
    );
  }

  private wireStrain(): Subscription {
    return this.debounced(
      combineLatest([this.metric$("steps"), this.metric$("activeEnergy"), this.baselinesSubject]),
    ).subscribe(([steps, energy, baselines]) => {
      const reason = gateReason([["steps", steps], ["activeEnergy", energy]]);
      const state: ScoreState = reason
        ? { kind: "unavailable", reason }
        : toScoreState(
            computeStrain(
              { steps: validValue(steps), activeEnergy: validValue(energy) },
              this.personalBaselines(baselines),
            ),
          );
      this.publishScore("strain", state);
    });
  }

  private wireStress(): Subscription {
    return this.debounced(
      combineLatest([this.metric$("hrv").pipe(distinctUntilChanged(sameState)), this.baselinesSubject]),
    ).subscribe(([hrv, baselines]) => {
      const reason = gateReason([["hrv", hrv]]);
      const state: ScoreState = reason
        ? { kind: "unavailable", reason }
        : toScoreState(computeStress({ hrv: validValue(hrv) }, this.personalBaselines(baselines)));
      this.publishScore("stress", state);
    });
  }

  private maybeSnapshot(hrv: MetricState, rhr: MetricState): void {
    if (!this.snapshotSink) return;
    if (this.scoreSubjects.recovery.value.kind !== "computed") return;

    const capturedAt = this.clock();
    const day = toIsoDate(capturedAt, this.timezone);
    if (this.lastSnapshotDay === day) return;
    this.lastSnapshotDay = day;

    const snapshot: DailySnapshot = {
      day,
      capturedAt,
      scores: this.scoreStates(),
      hrv: validValue(hrv),
      restingHeartRate: validValue(rhr),
    };

    void this.snapshotSink
      .saveSnapshot(snapshot)
      .then(() => console.log(`[score-orchestrator] snapshot saved for ${day}`))
      .catch((err: unknown) => {
        if (this.lastSnapshotDay === day) this.lastSnapshotDay = null;
        console.error("snapshot save error:", err);
      });
  }
}
