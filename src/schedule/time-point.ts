import { DAYS_OF_WEEK, FIELD_RANGES } from "../types/time.ts";
import type { DayOfWeek, TimeField, TimePoint, TimeZoneMode } from "../types/time.ts";
import { ScheduleError } from "./errors.ts";

// ── Day Conversion ───────────────────────────────────────────────────────────

const DAY_ABBREVIATIONS: Readonly<Record<string, DayOfWeek>> = {
  sun: "sunday",
  mon: "monday",
  tue: "tuesday",
  wed: "wednesday",
  thu: "thursday",
  fri: "friday",
  sat: "saturday",
};

export function dayIndex(day: DayOfWeek): number {
  return DAYS_OF_WEEK.indexOf(day);
}

export function dayFromIndex(index: number): DayOfWeek {
  const day = DAYS_OF_WEEK[index];
  if (day === undefined) {
    throw new ScheduleError(
      `Day index ${index} out of range [0-6]`,
      "VALUE_OUT_OF_RANGE",
      "dayOfWeek",
    );
  }
  return day;
}

/**
 * Resolve a day name ("wednesday") or three-letter abbreviation ("wed"),
 * case-insensitively. Returns null for anything else.
 */
export function lookupDay(name: string): DayOfWeek | null {
  const lower = name.toLowerCase();
  const full = DAYS_OF_WEEK.find((d) => d === lower);
  return full ?? DAY_ABBREVIATIONS[lower] ?? null;
}

// ── Time Point Construction ──────────────────────────────────────────────────

export interface TimePointInput {
  readonly minuteOfHour: number;
  readonly hourOfDay: number;
  readonly dayOfWeek: DayOfWeek | number;
  readonly weekOfMonth: number;
  readonly monthOfYear: number;
}

/**
 * Build a validated, frozen TimePoint.
 * Throws ScheduleError (INVALID_TIME_POINT) when a field is out of range.
 */
export function createTimePoint(input: TimePointInput): TimePoint {
  checkField("minute", input.minuteOfHour);
  checkField("hour", input.hourOfDay);
  checkField("week", input.weekOfMonth);
  checkField("month", input.monthOfYear);

  let dayOfWeek: DayOfWeek;
  if (typeof input.dayOfWeek === "number") {
    checkField("dayOfWeek", input.dayOfWeek);
    dayOfWeek = dayFromIndex(input.dayOfWeek);
  } else if (DAYS_OF_WEEK.includes(input.dayOfWeek)) {
    dayOfWeek = input.dayOfWeek;
  } else {
    throw new ScheduleError(
      `Unknown day of week "${String(input.dayOfWeek)}"`,
      "INVALID_TIME_POINT",
      "dayOfWeek",
    );
  }

  return Object.freeze({
    minuteOfHour: input.minuteOfHour,
    hourOfDay: input.hourOfDay,
    dayOfWeek,
    weekOfMonth: input.weekOfMonth,
    monthOfYear: input.monthOfYear,
  });
}

function checkField(field: TimeField, value: number): void {
  const { min, max } = FIELD_RANGES[field];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ScheduleError(
      `Time point ${field} must be an integer in [${min}-${max}], got ${value}`,
      "INVALID_TIME_POINT",
      field,
    );
  }
}

/**
 * Derive the time point of a Date, reading either local or UTC calendar fields.
 * Week of month counts seven-day blocks from the 1st, so the 29th–31st are week 5.
 */
export function timePointFromDate(
  date: Date,
  zone: TimeZoneMode = "local",
): TimePoint {
  const utc = zone === "utc";
  const dayOfMonth = utc ? date.getUTCDate() : date.getDate();

  return Object.freeze({
    minuteOfHour: utc ? date.getUTCMinutes() : date.getMinutes(),
    hourOfDay: utc ? date.getUTCHours() : date.getHours(),
    dayOfWeek: dayFromIndex(utc ? date.getUTCDay() : date.getDay()),
    weekOfMonth: Math.floor((dayOfMonth - 1) / 7) + 1,
    monthOfYear: (utc ? date.getUTCMonth() : date.getMonth()) + 1, // JS months are 0-indexed
  });
}

export function timePointKey(time: TimePoint): string {
  return `${time.monthOfYear}-${time.weekOfMonth}-${dayIndex(time.dayOfWeek)}-${time.hourOfDay}-${time.minuteOfHour}`;
}
