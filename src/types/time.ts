// ── Day of Week ──────────────────────────────────────────────────────────────

// Index order is significant: Sunday = 0 … Saturday = 6, as in Date#getDay().
export const DAYS_OF_WEEK = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

// ── Time Point ───────────────────────────────────────────────────────────────

export interface TimePoint {
  readonly minuteOfHour: number;
  readonly hourOfDay: number;
  readonly dayOfWeek: DayOfWeek;
  readonly weekOfMonth: number;
  readonly monthOfYear: number;
}

export const TIME_ZONE_MODES = ["local", "utc"] as const;
export type TimeZoneMode = (typeof TIME_ZONE_MODES)[number];

// ── Field Ranges ─────────────────────────────────────────────────────────────

export const TIME_FIELDS = ["minute", "hour", "dayOfWeek", "week", "month"] as const;
export type TimeField = (typeof TIME_FIELDS)[number];

export interface FieldRange {
  readonly min: number;
  readonly max: number;
}

export const FIELD_RANGES: Readonly<Record<TimeField, FieldRange>> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfWeek: { min: 0, max: 6 },
  week: { min: 1, max: 5 },
  month: { min: 1, max: 12 },
};
