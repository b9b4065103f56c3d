import { FIELD_RANGES } from "../types/time.ts";
import type { DayOfWeek, TimeField, TimePoint } from "../types/time.ts";
import { ScheduleError } from "./errors.ts";
import { dayIndex, lookupDay } from "./time-point.ts";

// ── Schedule Tree ────────────────────────────────────────────────────────────
//
// A schedule is an immutable expression tree of time predicates. Nodes are
// frozen plain objects; combinators reference their children, never copy them,
// so one subtree may be shared by several parents.

export const LEAF_KINDS = ["weeks", "daysOfWeek", "hours", "minutes", "months"] as const;
export type LeafKind = (typeof LEAF_KINDS)[number];

export interface LeafSchedule {
  readonly kind: LeafKind;
  /** Sorted ascending, no duplicates. */
  readonly values: readonly number[];
}

export interface AlwaysSchedule {
  readonly kind: "always";
}

export interface NeverSchedule {
  readonly kind: "never";
}

export interface TimesSchedule {
  readonly kind: "times";
  readonly schedule: Schedule;
  readonly n: number;
}

export interface UnionSchedule {
  readonly kind: "union";
  readonly left: Schedule;
  readonly right: Schedule;
}

export interface IntersectionSchedule {
  readonly kind: "intersection";
  readonly left: Schedule;
  readonly right: Schedule;
}

export interface NegateSchedule {
  readonly kind: "negate";
  readonly schedule: Schedule;
}

export type Schedule =
  | LeafSchedule
  | AlwaysSchedule
  | NeverSchedule
  | TimesSchedule
  | UnionSchedule
  | IntersectionSchedule
  | NegateSchedule;

export type ScheduleKind = Schedule["kind"];

/** Which time field each leaf kind tests. */
export const LEAF_FIELDS: Readonly<Record<LeafKind, TimeField>> = {
  weeks: "week",
  daysOfWeek: "dayOfWeek",
  hours: "hour",
  minutes: "minute",
  months: "month",
};

export function isLeaf(schedule: Schedule): schedule is LeafSchedule {
  return LEAF_KINDS.some((kind) => kind === schedule.kind);
}

// ── Leaf Constructors ────────────────────────────────────────────────────────

/**
 * Build a leaf from raw values. Values are validated against the field's
 * range, deduplicated and sorted. No values yields a leaf that never matches.
 */
export function leaf(kind: LeafKind, values: readonly number[]): LeafSchedule {
  const field = LEAF_FIELDS[kind];
  const { min, max } = FIELD_RANGES[field];

  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new ScheduleError(
        `${field} value must be an integer, got ${value}`,
        "NOT_AN_INTEGER",
        field,
      );
    }
    if (value < min || value > max) {
      throw new ScheduleError(
        `${field} value ${value} out of range [${min}-${max}]`,
        "VALUE_OUT_OF_RANGE",
        field,
      );
    }
  }

  const unique = [...new Set(values)].sort((a, b) => a - b);
  return Object.freeze({ kind, values: Object.freeze(unique) });
}

/** Weeks of the month, 1–5 (week 5 covers the 29th onwards). */
export function weeks(...values: number[]): LeafSchedule {
  return leaf("weeks", values);
}

/** Days of the week, by name ("wednesday", "wed") or index (Sunday = 0). */
export function daysOfTheWeek(...days: Array<DayOfWeek | string | number>): LeafSchedule {
  const indexes = days.map((day) => {
    if (typeof day === "number") return day;
    const resolved = lookupDay(day);
    if (resolved === null) {
      throw new ScheduleError(`Unknown day of week "${day}"`, "UNKNOWN_DAY", "dayOfWeek");
    }
    return dayIndex(resolved);
  });
  return leaf("daysOfWeek", indexes);
}

export function hoursOfTheDay(...values: number[]): LeafSchedule {
  return leaf("hours", values);
}

export function minutesOfTheHour(...values: number[]): LeafSchedule {
  return leaf("minutes", values);
}

/** Months of the year, 1–12. */
export function monthsOfTheYear(...values: number[]): LeafSchedule {
  return leaf("months", values);
}

// ── Constants ────────────────────────────────────────────────────────────────

const ALWAYS: AlwaysSchedule = Object.freeze({ kind: "always" });
const NEVER: NeverSchedule = Object.freeze({ kind: "never" });

/** Matches every time point; identity of intersection. */
export function always(): AlwaysSchedule {
  return ALWAYS;
}

/** Matches no time point; identity of union. */
export function never(): NeverSchedule {
  return NEVER;
}

// ── Combinators ──────────────────────────────────────────────────────────────

/** Fires when any of the schedules would fire. Folds to the left. */
export function union(first: Schedule, second: Schedule, ...rest: Schedule[]): Schedule {
  return [second, ...rest].reduce<Schedule>((left, right) => {
    const node: UnionSchedule = { kind: "union", left, right };
    return Object.freeze(node);
  }, first);
}

/** Fires only when every schedule would fire. Folds to the left. */
export function intersection(first: Schedule, second: Schedule, ...rest: Schedule[]): Schedule {
  return [second, ...rest].reduce<Schedule>((left, right) => {
    const node: IntersectionSchedule = { kind: "intersection", left, right };
    return Object.freeze(node);
  }, first);
}

/**
 * Fires exactly when `schedule` would not. Negating a negation returns the
 * original node.
 */
export function negate(schedule: Schedule): Schedule {
  if (schedule.kind === "negate") return schedule.schedule;
  const node: NegateSchedule = { kind: "negate", schedule };
  return Object.freeze(node);
}

/**
 * Restrict `schedule` to its first `n` occurrences. The count is kept by a
 * ScheduleEvaluator; stateless `matches` treats the node as never having fired.
 */
export function times(schedule: Schedule, n: number): TimesSchedule {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ScheduleError(
      `Occurrence count must be a non-negative safe integer, got ${n}`,
      "INVALID_OCCURRENCE_COUNT",
    );
  }
  const node: TimesSchedule = { kind: "times", schedule, n };
  return Object.freeze(node);
}

// ── Evaluation ───────────────────────────────────────────────────────────────

/**
 * Decides how a `times` node answers, given whether its inner schedule
 * matched at the current time point.
 */
export type TimesResolver = (node: TimesSchedule, innerMatched: boolean) => boolean;

const FRESH_TIMES: TimesResolver = (node, innerMatched) => innerMatched && node.n > 0;

/**
 * Whether `schedule` fires at `time`. Pure: the same inputs always give the
 * same answer and nothing is recorded.
 */
export function matches(schedule: Schedule, time: TimePoint): boolean {
  return evaluateNode(schedule, time, FRESH_TIMES, new Map());
}

/**
 * Shared recursive evaluator. Every node is evaluated at most once per call
 * (memoised by identity) and both children of a binary node are always
 * visited, so a stateful resolver observes each `times` node exactly once.
 */
export function evaluateNode(
  schedule: Schedule,
  time: TimePoint,
  resolveTimes: TimesResolver,
  memo: Map<Schedule, boolean>,
): boolean {
  const cached = memo.get(schedule);
  if (cached !== undefined) return cached;

  let result: boolean;
  switch (schedule.kind) {
    case "weeks":
      result = schedule.values.includes(time.weekOfMonth);
      break;
    case "daysOfWeek":
      result = schedule.values.includes(dayIndex(time.dayOfWeek));
      break;
    case "hours":
      result = schedule.values.includes(time.hourOfDay);
      break;
    case "minutes":
      result = schedule.values.includes(time.minuteOfHour);
      break;
    case "months":
      result = schedule.values.includes(time.monthOfYear);
      break;
    case "always":
      result = true;
      break;
    case "never":
      result = false;
      break;
    case "times":
      result = resolveTimes(
        schedule,
        evaluateNode(schedule.schedule, time, resolveTimes, memo),
      );
      break;
    case "union": {
      const left = evaluateNode(schedule.left, time, resolveTimes, memo);
      const right = evaluateNode(schedule.right, time, resolveTimes, memo);
      result = left || right;
      break;
    }
    case "intersection": {
      const left = evaluateNode(schedule.left, time, resolveTimes, memo);
      const right = evaluateNode(schedule.right, time, resolveTimes, memo);
      result = left && right;
      break;
    }
    case "negate":
      result = !evaluateNode(schedule.schedule, time, resolveTimes, memo);
      break;
    default:
      return assertNever(schedule);
  }

  memo.set(schedule, result);
  return result;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled schedule node: ${JSON.stringify(value)}`);
}

// ── Traversal ────────────────────────────────────────────────────────────────

/** Distinct nodes of the tree, parents before children. */
export function collectNodes(schedule: Schedule): Schedule[] {
  const seen = new Set<Schedule>();
  const stack: Schedule[] = [schedule];
  const ordered: Schedule[] = [];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || seen.has(node)) continue;
    seen.add(node);
    ordered.push(node);

    switch (node.kind) {
      case "union":
      case "intersection":
        stack.push(node.right, node.left);
        break;
      case "times":
      case "negate":
        stack.push(node.schedule);
        break;
      default:
        break;
    }
  }

  return ordered;
}
