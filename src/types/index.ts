// ── Type re-exports ──────────────────────────────────────────────────────────
export type {
  DayOfWeek,
  TimePoint,
  TimeZoneMode,
  TimeField,
  FieldRange,
} from "./time.ts";

export type { FetchJob, FetchRequest, FetchHandler, JobState } from "./jobs.ts";

// ── Runtime constants ────────────────────────────────────────────────────────
export { DAYS_OF_WEEK, TIME_ZONE_MODES, TIME_FIELDS, FIELD_RANGES } from "./time.ts";
