import type { MalformedInputHook } from "../types.ts";

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_DAYS = 60;

const CALENDAR_DATE = /^(\d{4})(-?)(\d{2})\2(\d{2})/;
const WEEK_DATE = /^(\d{4})(-?)W(\d{2})(?:\2(\d))?/;
const TIME_OF_DAY =
  /^(\d{2})(?:(:?)(\d{2})(?:\2(\d{2})(?:[.,](\d+))?)?)?(?:(Z)|([+-])(\d{2})(?:(:?)(\d{2})(?:\9(\d{2})(?:[.,](\d+))?)?)?)?$/;

type DatePrefix = {
  date: Date;
  rest: string;
};

function utcMidnight(year: number, monthIndex: number, day: number) {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

// ISO years have 53 weeks when they start on a Thursday, or on a Wednesday in leap years.
function isoWeeksInYear(year: number) {
  const jan1 = utcMidnight(year, 0, 1).getUTCDay();
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return jan1 === 4 || (leap && jan1 === 3) ? 53 : 52;
}

function parseCalendarDate(value: string): DatePrefix | null {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return null;

  const [text, year, , month, day] = match;
  const date = utcMidnight(Number(year), Number(month) - 1, Number(day));
  if (
    Number(year) < 1 ||
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return { date, rest: value.slice(text.length) };
}

function parseWeekDate(value: string): DatePrefix | null {
  const match = WEEK_DATE.exec(value);
  if (!match) return null;

  const [text, yearText, , weekText, weekdayText] = match;
  const year = Number(yearText);
  const week = Number(weekText);
  const weekday = weekdayText ? Number(weekdayText) : 1;
  if (year < 1 || week < 1 || week > isoWeeksInYear(year)) return null;
  if (weekday < 1 || weekday > 7) return null;

  const jan4 = utcMidnight(year, 0, 4);
  const jan4Weekday = jan4.getUTCDay() || 7;
  const offsetDays = 1 - jan4Weekday + (week - 1) * 7 + (weekday - 1);
  return {
    date: new Date(jan4.getTime() + offsetDays * DAY_MS),
    rest: value.slice(text.length),
  };
}

// Date only keeps milliseconds, so longer fractions are truncated.
function fractionToMs(fraction: string | undefined) {
  return Number((fraction ?? "").padEnd(3, "0").slice(0, 3));
}

function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value);
  if (!match) return null;

  const [
    ,
    hour,
    ,
    minute,
    second,
    fraction,
    ,
    sign,
    offsetHour,
    ,
    offsetMinute,
    offsetSecond,
    offsetFraction,
  ] = match;

  const h = Number(hour);
  const m = Number(minute ?? "0");
  const sec = Number(second ?? "0");
  if (h > 23 || m > 59 || sec > 59) return null;

  let offsetMs = 0;
  if (sign) {
    const oh = Number(offsetHour);
    const om = Number(offsetMinute ?? "0");
    const os = Number(offsetSecond ?? "0");
    if (oh > 23 || om > 59 || os > 59) return null;
    const magnitude = ((oh * 60 + om) * 60 + os) * 1000 + fractionToMs(offsetFraction);
    offsetMs = sign === "-" ? -magnitude : magnitude;
  }

  return ((h * 60 + m) * 60 + sec) * 1000 + fractionToMs(fraction) - offsetMs;
}

/**
 * Parses an ISO-8601 date or date-time: calendar or week dates in extended or
 * basic format, any one-character separator before the time, and `Z` or
 * `±HH[:MM[:SS[.f]]]` offsets. Values without an offset are read as UTC.
 * Returns null when the string is not a valid timestamp.
 */
export function parseIsoTimestamp(value: string): Date | null {
  const prefix = parseCalendarDate(value) ?? parseWeekDate(value);
  if (!prefix) return null;
  if (prefix.rest.length === 0) return prefix.date;

  const timeMs = parseTimeOfDay(prefix.rest.slice(1));
  if (timeMs === null) return null;
  return new Date(prefix.date.getTime() + timeMs);
}

export function parsePublishedAt(
  value: Date | string | null | undefined,
  onMalformed?: MalformedInputHook
): Date | null {
  if (value === null || value === undefined) return null;

  const parsed =
    value instanceof Date
      ? Number.isNaN(value.getTime())
        ? null
        : value
      : parseIsoTimestamp(value);

  if (!parsed) {
    onMalformed?.({ field: "publishedAt", value });
  }
  return parsed;
}

export function getAgeDays(publishedAt: Date, now: Date): number {
  return Math.floor((now.getTime() - publishedAt.getTime()) / DAY_MS);
}

export function scoreRecency(
  publishedAt: Date | null | undefined,
  maxDays = DEFAULT_MAX_DAYS,
  now = new Date()
): number {
  if (!publishedAt) return 0.5;

  const days = getAgeDays(publishedAt, now);
  if (days <= 0) return 1;
  if (days >= maxDays) return 0;
  return Math.max(0, 1 - days / maxDays);
}
