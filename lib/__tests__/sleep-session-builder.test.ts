import type { RawIntervalSample, SleepCategory } from "../health-types";
import {
  buildSessions,
  stagePercentages,
  totalAsleep,
  totalInBed,
  SLEEP_SESSION_POLICY,
} from "../sleep-session-builder";

const MIN = 60_000;
const HOUR = 60 * MIN;

const t = (iso: string) => new Date(iso);

function sample(category: SleepCategory, start: string, end: string): RawIntervalSample {
  return { category, start: t(start), end: t(end) };
}

const RANGE_START = t("2026-03-09T12:00:00Z");
const RANGE_END = t("2026-03-10T12:00:00Z");
const NOW = RANGE_END;

describe("stage helpers", () => {
  it("totalInBed adds awake to asleep", () => {
    const stages = { core: 3 * HOUR, deep: HOUR, rem: 2 * HOUR, awake: 30 * MIN };
    expect(totalAsleep(stages)).toBe(6 * HOUR);
    expect(totalInBed(stages)).toBe(6.5 * HOUR);
  });

  it("stagePercentages is all zero without sleep", () => {
    expect(stagePercentages({ core: 0, deep: 0, rem: 0, awake: HOUR })).toEqual({ core: 0, deep: 0, rem: 0 });
  });

  it("stagePercentages splits asleep time", () => {
    const pct = stagePercentages({ core: 2 * HOUR, deep: HOUR, rem: HOUR, awake: 0 });
    expect(pct.core).toBe(50);
    expect(pct.deep).toBe(25);
    expect(pct.rem).toBe(25);
  });
});

describe("buildSessions", () => {
  test("a 10-minute awake stretch at 02:00 stays inside one session", () => {
    const sessions = buildSessions(
      [
        sample("inBed", "2026-03-09T23:00:00Z", "2026-03-10T06:30:00Z"),
        sample("asleepCore", "2026-03-09T23:00:00Z", "2026-03-10T02:00:00Z"),
        sample("awake", "2026-03-10T02:00:00Z", "2026-03-10T02:10:00Z"),
        sample("asleepDeep", "2026-03-10T02:10:00Z", "2026-03-10T03:30:00Z"),
        sample("asleepREM", "2026-03-10T03:30:00Z", "2026-03-10T06:30:00Z"),
      ],
      RANGE_START,
      RANGE_END,
      NOW,
    );

    expect(sessions).toHaveLength(1);
    const s = sessions[0];
    expect(s.start).toEqual(t("2026-03-09T23:00:00Z"));
    expect(s.end).toEqual(t("2026-03-10T06:30:00Z"));
    expect(s.duration).toBe(7.5 * HOUR);
    expect(s.stages).toEqual({ core: 3 * HOUR, deep: 80 * MIN, rem: 3 * HOUR, awake: 10 * MIN });
    expect(s.efficiency).toBeCloseTo(440 / 450, 10);
    expect(s.wakeEvents).toBe(1);
    expect(s.source).toBe("detailed");
    expect(s.metrics.waso).toBe(10 * MIN);
    expect(s.metrics.sleepLatency).toBeCloseTo(MIN, 6);
    expect(s.metrics.fragmentationIndex).toBeCloseTo(1 / 7.5, 10);
  });

  test("a 20-minute hole between samples is bridged", () => {
    const sessions = buildSessions(
      [
        sample("inBed", "2026-03-09T23:00:00Z", "2026-03-10T02:00:00Z"),
        sample("asleepCore", "2026-03-09T23:00:00Z", "2026-03-10T02:00:00Z"),
        sample("inBed", "2026-03-10T02:20:00Z", "2026-03-10T06:30:00Z"),
        sample("asleepCore", "2026-03-10T02:20:00Z", "2026-03-10T06:30:00Z"),
      ],
      RANGE_START,
      RANGE_END,
      NOW,
    );
    expect(sessions).toHaveLength(1);
    expect(sessions[0].start).toEqual(t("2026-03-09T23:00:00Z"));
    expect(sessions[0].end).toEqual(t("2026-03-10T06:30:00Z"));
  });

  test("a 45-minute hole splits into two sessions", () => {
    const sessions = buildSessions(
      [
        sample("inBed", "2026-03-09T22:00:00Z", "2026-03-10T00:00:00Z"),
        sample("asleepCore", "2026-03-09T22:00:00Z", "2026-03-10T00:00:00Z"),
        sample("inBed", "2026-03-10T00:45:00Z", "2026-03-10T06:00:00Z"),
        sample("asleepCore", "2026-03-10T00:45:00Z", "2026-03-10T06:00:00Z"),
      ],
      RANGE_START,
      RANGE_END,
      NOW,
    );
    expect(sessions).toHaveLength(2);
    expect(sessions[0].duration).toBe(2 * HOUR);
    expect(sessions[1].duration).toBe(5.25 * HOUR);
  });

  test("input order does not matter for grouping", () => {
    const samples = [
      sample("asleepREM", "2026-03-10T03:00:00Z", "2026-03-10T05:00:00Z"),
      sample("inBed", "2026-03-10T01:00:00Z", "2026-03-10T05:00:00Z"),
      sample("asleepCore", "2026-03-10T01:00:00Z", "2026-03-10T03:00:00Z"),
    ];
    const sessions = buildSessions(samples, RANGE_START, RANGE_END, NOW);
    expect(sessions).toHaveLength(1);
    expect(sessions[0].stages.core).toBe(2 * HOUR);
    expect(sessions[0].stages.rem).toBe(2 * HOUR);
  });

  describe("minimum session length", () => {
    it("drops an 89-minute night", () => {
      const sessions = buildSessions(
        [
          sample("inBed", "2026-03-10T01:00:00Z", "2026-03-10T02:29:00Z"),
          sample("asleepCore", "2026-03-10T01:00:00Z", "2026-03-10T02:29:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(sessions).toEqual([]);
    });

    it("keeps exactly 90 minutes", () => {
      const sessions = buildSessions(
        [
          sample("inBed", "2026-03-10T01:00:00Z", "2026-03-10T02:30:00Z"),
          sample("asleepCore", "2026-03-10T01:00:00Z", "2026-03-10T02:30:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(sessions).toHaveLength(1);
      expect(sessions[0].duration).toBe(SLEEP_SESSION_POLICY.minSessionMs);
    });

    it("never emits a session shorter than the minimum", () => {
      const samples: RawIntervalSample[] = [];
      for (let i = 0; i < 6; i++) {
        const start = new Date(t("2026-03-09T14:00:00Z").getTime() + i * 3 * HOUR);
        const end = new Date(start.getTime() + (30 + i * 20) * MIN);
        samples.push({ category: "inBed", start, end });
        samples.push({ category: "asleepCore", start, end });
      }
      const sessions = buildSessions(samples, RANGE_START, RANGE_END, NOW);
      expect(sessions.length).toBeGreaterThan(0);
      for (const s of sessions) expect(s.duration).toBeGreaterThanOrEqual(90 * MIN);
    });
  });

  it("needs an inBed sample to anchor the session", () => {
    const sessions = buildSessions(
      [sample("asleepCore", "2026-03-10T00:00:00Z", "2026-03-10T04:00:00Z")],
      RANGE_START,
      RANGE_END,
      NOW,
    );
    expect(sessions).toEqual([]);
  });

  it("rejects reversed, future and out-of-range samples", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const sessions = buildSessions(
      [
        sample("inBed", "2026-03-10T04:00:00Z", "2026-03-10T01:00:00Z"),
        sample("inBed", "2026-03-10T10:00:00Z", "2026-03-10T13:00:00Z"),
        sample("inBed", "2026-03-08T00:00:00Z", "2026-03-08T04:00:00Z"),
      ],
      RANGE_START,
      RANGE_END,
      NOW,
    );
    expect(sessions).toEqual([]);
    expect(log).toHaveBeenCalledWith("[sleep-session-builder] dropped 3 of 3 samples");
    log.mockRestore();
  });

  describe("efficiency", () => {
    it("is 1 when asleep stages cover the whole in-bed time", () => {
      const [s] = buildSessions(
        [
          sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T02:00:00Z"),
          sample("asleepCore", "2026-03-10T00:00:00Z", "2026-03-10T02:00:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(totalInBed(s.stages)).toBe(s.duration);
      expect(s.efficiency).toBe(1);
    });

    it("counts only staged time when stages leave part of the in-bed span uncovered", () => {
      const [s] = buildSessions(
        [
          sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T04:00:00Z"),
          sample("asleepCore", "2026-03-10T00:00:00Z", "2026-03-10T02:00:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(s.duration).toBe(4 * HOUR);
      expect(totalInBed(s.stages)).toBe(2 * HOUR);
      expect(totalInBed(s.stages)).not.toBe(s.duration);
      expect(s.efficiency).toBe(1);
    });

    it("is 0 with no stage data", () => {
      const [s] = buildSessions(
        [sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T03:00:00Z")],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(s.efficiency).toBe(0);
      expect(s.source).toBe("basic");
    });

    it("stays within [0, 1] for mixed nights", () => {
      const [s] = buildSessions(
        [
          sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T04:00:00Z"),
          sample("awake", "2026-03-10T00:00:00Z", "2026-03-10T01:00:00Z"),
          sample("asleepCore", "2026-03-10T01:00:00Z", "2026-03-10T04:00:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(s.efficiency).toBe(0.75);
      expect(s.efficiency).toBeGreaterThanOrEqual(0);
      expect(s.efficiency).toBeLessThanOrEqual(1);
    });
  });

  describe("unspecified sleep", () => {
    it("is split by the stage ratio seen so far", () => {
      const [s] = buildSessions(
        [
          sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T03:00:00Z"),
          sample("asleepCore", "2026-03-10T00:00:00Z", "2026-03-10T01:00:00Z"),
          sample("asleepDeep", "2026-03-10T01:00:00Z", "2026-03-10T01:30:00Z"),
          sample("asleepUnspecified", "2026-03-10T01:30:00Z", "2026-03-10T03:00:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(s.stages.core).toBeCloseTo(120 * MIN, 6);
      expect(s.stages.deep).toBeCloseTo(60 * MIN, 6);
      expect(s.stages.rem).toBe(0);
    });

    it("goes to core when nothing specific came first", () => {
      const [s] = buildSessions(
        [
          sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T02:00:00Z"),
          sample("asleepUnspecified", "2026-03-10T00:00:00Z", "2026-03-10T02:00:00Z"),
        ],
        RANGE_START,
        RANGE_END,
        NOW,
      );
      expect(s.stages).toEqual({ core: 2 * HOUR, deep: 0, rem: 0, awake: 0 });
      expect(s.source).toBe("basic");
    });
  });

  it("counts a wake event only after sleep", () => {
    const [s] = buildSessions(
      [
        sample("inBed", "2026-03-10T00:00:00Z", "2026-03-10T04:00:00Z"),
        sample("awake", "2026-03-10T00:00:00Z", "2026-03-10T00:20:00Z"),
        sample("asleepCore", "2026-03-10T00:20:00Z", "2026-03-10T01:30:00Z"),
        sample("awake", "2026-03-10T01:30:00Z", "2026-03-10T01:35:00Z"),
        sample("awake", "2026-03-10T01:35:00Z", "2026-03-10T01:40:00Z"),
        sample("asleepREM", "2026-03-10T01:40:00Z", "2026-03-10T03:00:00Z"),
        sample("awake", "2026-03-10T03:00:00Z", "2026-03-10T03:10:00Z"),
        sample("asleepCore", "2026-03-10T03:10:00Z", "2026-03-10T04:00:00Z"),
      ],
      RANGE_START,
      RANGE_END,
      NOW,
    );
    expect(s.wakeEvents).toBe(2);
    expect(s.metrics.fragmentationIndex).toBe(0.5);
  });
});
