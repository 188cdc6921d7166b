import {
  RECENCY_THRESHOLDS_MS,
  classify,
  isValid,
  recencyThreshold,
  sameState,
  validValue,
} from "../metric-validity";
import { DAY, HOUR } from "./fixtures";

const NOW = new Date("2026-03-10T12:00:00Z");

describe("recencyThreshold", () => {
  it("gives wearables a week", () => {
    expect(recencyThreshold("hrv")).toBe(7 * DAY);
    expect(recencyThreshold("restingHeartRate")).toBe(7 * DAY);
    expect(recencyThreshold("vo2Max")).toBe(7 * DAY);
  });
  it("gives manual weight 90 days", () => {
    expect(recencyThreshold("bodyWeight")).toBe(90 * DAY);
  });
  it("gives same-day vitals 24 hours", () => {
    for (const m of ["respiratoryRate", "oxygenSaturation", "bodyTemperature", "steps", "activeEnergy", "sleepDuration"] as const) {
      expect(recencyThreshold(m)).toBe(RECENCY_THRESHOLDS_MS.sameDay);
    }
    expect(RECENCY_THRESHOLDS_MS.sameDay).toBe(24 * HOUR);
  });
});

describe("classify", () => {
  const threshold = 7 * DAY;

  it("is missing without a value or a timestamp", () => {
    expect(classify(null, null, threshold, NOW)).toEqual({ kind: "missing" });
    expect(classify(45, null, threshold, NOW)).toEqual({ kind: "missing" });
    expect(classify(null, NOW, threshold, NOW)).toEqual({ kind: "missing" });
  });

  it("is valid exactly at the threshold", () => {
    const lastSeen = new Date(NOW.getTime() - threshold);
    expect(classify(45, lastSeen, threshold, NOW)).toEqual({ kind: "valid", value: 45, lastSeen });
  });

  it("is stale one second past the threshold", () => {
    const lastSeen = new Date(NOW.getTime() - threshold - 1000);
    expect(classify(45, lastSeen, threshold, NOW)).toEqual({ kind: "stale", lastSeen });
  });

  it("treats zero as a real value", () => {
    expect(classify(0, NOW, threshold, NOW)).toEqual({ kind: "valid", value: 0, lastSeen: NOW });
  });
});

describe("state helpers", () => {
  const lastSeen = new Date("2026-03-10T06:00:00Z");

  it("validValue only reads valid states", () => {
    expect(validValue({ kind: "valid", value: 55, lastSeen })).toBe(55);
    expect(validValue({ kind: "stale", lastSeen })).toBeNull();
    expect(validValue({ kind: "missing" })).toBeNull();
    expect(isValid({ kind: "valid", value: 55, lastSeen })).toBe(true);
    expect(isValid({ kind: "missing" })).toBe(false);
  });

  it("sameState compares kind, value and timestamp", () => {
    expect(sameState({ kind: "missing" }, { kind: "missing" })).toBe(true);
    expect(sameState({ kind: "valid", value: 55, lastSeen }, { kind: "valid", value: 55, lastSeen: new Date(lastSeen) })).toBe(true);
    expect(sameState({ kind: "valid", value: 55, lastSeen }, { kind: "valid", value: 56, lastSeen })).toBe(false);
    expect(sameState({ kind: "valid", value: 55, lastSeen }, { kind: "stale", lastSeen })).toBe(false);
    expect(sameState({ kind: "stale", lastSeen }, { kind: "stale", lastSeen: NOW })).toBe(false);
  });
});
