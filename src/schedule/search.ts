import { FIELD_RANGES } from "../types/time.ts";
import type { TimePoint, TimeZoneMode } from "../types/time.ts";
import { assertNever, evaluateNode, LEAF_FIELDS, matches } from "./schedule.ts";
import type { LeafSchedule, Schedule } from "./schedule.ts";
import type { ScheduleEvaluator } from "./evaluator.ts";
import { dayIndex, timePointFromDate } from "./time-point.ts";

// ── Partial Evaluation ──────────────────────────────────────────────────────

export type PartialTimePoint = Partial<TimePoint>;

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Evaluate with some fields unknown, using three-valued (Kleene) logic:
 * `true` or `false` when the known fields decide the answer for every value
 * of the unknown ones, `undefined` otherwise. `times` nodes use the
 * stateless reading, as in `matches`, or never match once `exhaustedTimes`
 * says their counts are used up.
 */
export function evaluatePartial(
  schedule: Schedule,
  time: PartialTimePoint,
  exhaustedTimes = false,
): boolean | undefined {
  switch (schedule.kind) {
    case "weeks":
      return leafPartial(schedule, time.weekOfMonth);
    case "daysOfWeek":
      return leafPartial(
        schedule,
        time.dayOfWeek === undefined ? undefined : dayIndex(time.dayOfWeek),
      );
    case "hours":
      return leafPartial(schedule, time.hourOfDay);
    case "minutes":
      return leafPartial(schedule, time.minuteOfHour);
    case "months":
      return leafPartial(schedule, time.monthOfYear);
    case "always":
      return true;
    case "never":
      return false;
    case "times":
      return exhaustedTimes || schedule.n === 0
        ? false
        : evaluatePartial(schedule.schedule, time, exhaustedTimes);
    case "union": {
      const left = evaluatePartial(schedule.left, time, exhaustedTimes);
      const right = evaluatePartial(schedule.right, time, exhaustedTimes);
      if (left === true || right === true) return true;
      if (left === false && right === false) return false;
      return undefined;
    }
    case "intersection": {
      const left = evaluatePartial(schedule.left, time, exhaustedTimes);
      const right = evaluatePartial(schedule.right, time, exhaustedTimes);
      if (left === false || right === false) return false;
      if (left === true && right === true) return true;
      return undefined;
    }
    case "negate": {
      const inner = evaluatePartial(schedule.schedule, time, exhaustedTimes);
      return inner === undefined ? undefined : !inner;
    }
    default:
      return assertNever(schedule);
  }
}

function leafPartial(schedule: LeafSchedule, value: number | undefined): boolean | undefined {
  if (value !== undefined) return schedule.values.includes(value);
  if (schedule.values.length === 0) return false;

  const { min, max } = FIELD_RANGES[LEAF_FIELDS[schedule.kind]];
  return schedule.values.length === max - min + 1 ? true : undefined;
}

// ── Next Match ───────────────────────────────────────────────────────────────

export interface SearchOptions {
  readonly zone?: TimeZoneMode;
  readonly lookaheadDays?: number;
  /**
   * Follow this evaluator's `times` counters instead of reading every `times`
   * node as unused. The evaluator itself is not advanced.
   */
  readonly evaluator?: ScheduleEvaluator;
}

const DEFAULT_LOOKAHEAD_DAYS = 366;

/**
 * Find the first whole minute strictly after `from` at which the schedule
 * matches. Returns null if nothing matches within the lookahead window.
 *
 * Walks days → hours → minutes, skipping any day or hour that partial
 * evaluation already rules out. While an evaluator's `times` counts are still
 * open, every minute is stepped through a copy of it instead, as a minute
 * tick would.
 */
export function nextMatch(
  schedule: Schedule,
  from: Date,
  options: SearchOptions = {},
): Date | null {
  return search(schedule, from, options, options.evaluator?.clone() ?? null);
}

/**
 * The next `count` matching minutes after `from`, in order. Stops early when
 * the lookahead window runs out.
 */
export function upcomingMatches(
  schedule: Schedule,
  from: Date,
  count: number,
  options: SearchOptions = {},
): Date[] {
  const tracker = options.evaluator?.clone() ?? null;
  const found: Date[] = [];
  let cursor = from;

  while (found.length < count) {
    const match = search(schedule, cursor, options, tracker);
    if (!match) break;
    found.push(match);
    cursor = match;
  }

  return found;
}

/** Advances `tracker` through every minute it steps. */
function search(
  schedule: Schedule,
  from: Date,
  options: SearchOptions,
  tracker: ScheduleEvaluator | null,
): Date | null {
  const zone = options.zone ?? "local";
  const limit = from.getTime() + (options.lookaheadDays ?? DEFAULT_LOOKAHEAD_DAYS) * DAY_MS;

  let exhausted = tracker?.isExhausted() ?? false;
  let stepper = tracker && tracker.hasTimesNodes() && !exhausted ? tracker : null;

  let t = Math.floor(from.getTime() / MINUTE_MS) * MINUTE_MS + MINUTE_MS;

  while (t <= limit) {
    const candidate = new Date(t);
    const time = timePointFromDate(candidate, zone);

    if (stepper) {
      if (stepper.evaluate(time)) return candidate;
      if (stepper.isExhausted()) {
        // Used-up counts never match again, so skipping is safe from here.
        stepper = null;
        exhausted = true;
      }
      t += MINUTE_MS;
      continue;
    }

    const day = evaluatePartial(
      schedule,
      {
        dayOfWeek: time.dayOfWeek,
        weekOfMonth: time.weekOfMonth,
        monthOfYear: time.monthOfYear,
      },
      exhausted,
    );
    if (day === false) {
      t = Math.max(startOfNextDay(candidate, zone), t + MINUTE_MS);
      continue;
    }

    const hour = evaluatePartial(
      schedule,
      {
        dayOfWeek: time.dayOfWeek,
        weekOfMonth: time.weekOfMonth,
        monthOfYear: time.monthOfYear,
        hourOfDay: time.hourOfDay,
      },
      exhausted,
    );
    if (hour === false) {
      t += (60 - time.minuteOfHour) * MINUTE_MS;
      continue;
    }

    const matched = exhausted
      ? evaluateNode(schedule, time, () => false, new Map())
      : matches(schedule, time);
    if (matched) {
      return candidate;
    }
    t += MINUTE_MS;
  }

  return null;
}

function startOfNextDay(date: Date, zone: TimeZoneMode): number {
  if (zone === "utc") {
    return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1);
  }
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + 1).getTime();
}
