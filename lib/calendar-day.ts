import type { IsoDate } from "./health-types";

// Day keys are YYYY-MM-DD. Without a timezone every helper works on the UTC
// calendar; an IANA zone name moves the day boundaries to local midnight.
// An unknown zone makes Intl throw a RangeError.

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let f = formatters.get(timezone);
  if (!f) {
    f = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timezone, f);
  }
  return f;
}

/** Local wall-clock time at `instant`, expressed as if it were UTC. */
function wallClock(instant: number, timezone: string): number {
  const parts = formatterFor(timezone).formatToParts(new Date(instant));
  const field = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value);
  return Date.UTC(field("year"), field("month") - 1, field("day"), field("hour"), field("minute"), field("second"));
}

function zoneOffset(instant: number, timezone: string): number {
  return wallClock(instant, timezone) - Math.floor(instant / 1000) * 1000;
}

export function dayStartUTC(date: IsoDate): Date {
  return new Date(date + "T00:00:00Z");
}

export function addDays(dateStr: IsoDate, days: number): IsoDate {
  const d = dayStartUTC(dateStr);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

export function toIsoDate(ts: Date, timezone?: string | null): IsoDate {
  if (!timezone) return ts.toISOString().slice(0, 10);
  return new Date(wallClock(ts.getTime(), timezone)).toISOString().slice(0, 10);
}

/** First instant of `date` in `timezone`. */
export function startOfDay(date: IsoDate, timezone?: string | null): Date {
  const midnight = dayStartUTC(date).getTime();
  if (!timezone) return new Date(midnight);
  const guess = midnight - zoneOffset(midnight, timezone);
  // the offset at the guess differs from the one at UTC midnight on DST days
  return new Date(midnight - zoneOffset(guess, timezone));
}

export function endOfDay(date: IsoDate, timezone?: string | null): Date {
  return startOfDay(addDays(date, 1), timezone);
}
