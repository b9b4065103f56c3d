import type { DayOfWeek, TimePoint } from "../../types/time.ts";
import { DAYS_OF_WEEK } from "../../types/time.ts";
import {
  always,
  daysOfTheWeek,
  hoursOfTheDay,
  intersection,
  minutesOfTheHour,
  monthsOfTheYear,
  negate,
  never,
  times,
  union,
  weeks,
} from "../schedule.ts";
import type { Schedule } from "../schedule.ts";
import { createTimePoint } from "../time-point.ts";

// ── Time Points ─────────────────────────────────────────────────────────────

export function at(
  minuteOfHour: number,
  hourOfDay: number,
  dayOfWeek: DayOfWeek,
  weekOfMonth = 1,
  monthOfYear = 1,
): TimePoint {
  return createTimePoint({ minuteOfHour, hourOfDay, dayOfWeek, weekOfMonth, monthOfYear });
}

const GRID_MINUTES = [0, 15, 30, 45, 59];
const GRID_HOURS = [0, 5, 6, 7, 12, 23];
const GRID_WEEKS = [1, 3, 5];
const GRID_MONTHS = [1, 6, 12];

/** Every combination of a few representative values per field. */
export function timeGrid(): TimePoint[] {
  const points: TimePoint[] = [];
  for (const monthOfYear of GRID_MONTHS) {
    for (const weekOfMonth of GRID_WEEKS) {
      for (const dayOfWeek of DAYS_OF_WEEK) {
        for (const hourOfDay of GRID_HOURS) {
          for (const minuteOfHour of GRID_MINUTES) {
            points.push(at(minuteOfHour, hourOfDay, dayOfWeek, weekOfMonth, monthOfYear));
          }
        }
      }
    }
  }
  return points;
}

// ── Random Schedules ────────────────────────────────────────────────────────

export type Random = () => number;

/** Deterministic PRNG (mulberry32) so failures reproduce. */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: Random, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new Error("pick from empty list");
  return item;
}

function subset(random: Random, items: readonly number[]): number[] {
  return items.filter(() => random() < 0.4);
}

function randomLeaf(random: Random): Schedule {
  switch (pick(random, ["weeks", "days", "hours", "minutes", "months", "const"] as const)) {
    case "weeks":
      return weeks(...subset(random, GRID_WEEKS));
    case "days":
      return daysOfTheWeek(...subset(random, [0, 1, 2, 3, 4, 5, 6]));
    case "hours":
      return hoursOfTheDay(...subset(random, GRID_HOURS));
    case "minutes":
      return minutesOfTheHour(...subset(random, GRID_MINUTES));
    case "months":
      return monthsOfTheYear(...subset(random, GRID_MONTHS));
    case "const":
      return random() < 0.5 ? always() : never();
  }
}

export interface RandomScheduleOptions {
  readonly depth: number;
  readonly withTimes?: boolean;
}

export function randomSchedule(random: Random, options: RandomScheduleOptions): Schedule {
  if (options.depth <= 0 || random() < 0.25) {
    return randomLeaf(random);
  }

  const child = (): Schedule =>
    randomSchedule(random, { ...options, depth: options.depth - 1 });

  const kinds = options.withTimes
    ? (["union", "intersection", "negate", "times"] as const)
    : (["union", "intersection", "negate"] as const);

  switch (pick(random, kinds)) {
    case "union":
      return union(child(), child());
    case "intersection":
      return intersection(child(), child());
    case "negate":
      return negate(child());
    case "times":
      return times(child(), Math.floor(random() * 4));
  }
}
