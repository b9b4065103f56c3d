// ── Schedule Algebra ─────────────────────────────────────────────────────────
export {
  weeks,
  daysOfTheWeek,
  hoursOfTheDay,
  minutesOfTheHour,
  monthsOfTheYear,
  leaf,
  always,
  never,
  union,
  intersection,
  negate,
  times,
  matches,
  isLeaf,
  collectNodes,
  LEAF_KINDS,
  LEAF_FIELDS,
  type Schedule,
  type ScheduleKind,
  type LeafKind,
  type LeafSchedule,
  type AlwaysSchedule,
  type NeverSchedule,
  type TimesSchedule,
  type UnionSchedule,
  type IntersectionSchedule,
  type NegateSchedule,
} from "./schedule.ts";

// ── Evaluator ────────────────────────────────────────────────────────────────
export { ScheduleEvaluator } from "./evaluator.ts";

// ── Time Points ──────────────────────────────────────────────────────────────
export {
  createTimePoint,
  timePointFromDate,
  timePointKey,
  dayIndex,
  dayFromIndex,
  lookupDay,
  type TimePointInput,
} from "./time-point.ts";

// ── Expressions ──────────────────────────────────────────────────────────────
export { parseSchedule, formatSchedule } from "./expression.ts";

// ── Search ───────────────────────────────────────────────────────────────────
export {
  nextMatch,
  upcomingMatches,
  evaluatePartial,
  type PartialTimePoint,
  type SearchOptions,
} from "./search.ts";

// ── Errors ───────────────────────────────────────────────────────────────────
export { ScheduleError, ScheduleParseError, type ScheduleErrorCode } from "./errors.ts";
