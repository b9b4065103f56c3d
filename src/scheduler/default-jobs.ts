import type { FetchJob } from "../types/jobs.ts";
import {
  daysOfTheWeek,
  hoursOfTheDay,
  intersection,
  minutesOfTheHour,
  union,
  weeks,
} from "../schedule/schedule.ts";

// ── Default Jobs ────────────────────────────────────────────────────────────
//
// Sample pricing fetches, used when no jobs file is configured.

/** Wednesdays at 6:00 and 12:00; Thursdays at 5:30, 6:30 and 7:30. */
export const MIDWEEK_PRICING_SCHEDULE = union(
  intersection(daysOfTheWeek("wednesday"), hoursOfTheDay(6, 12), minutesOfTheHour(0)),
  intersection(daysOfTheWeek("thursday"), hoursOfTheDay(5, 6, 7), minutesOfTheHour(30)),
);

/** 03:00 on the fifth Tuesday of the month, in months that have one. */
export const FIFTH_TUESDAY_SCHEDULE = intersection(
  weeks(5),
  daysOfTheWeek("tuesday"),
  hoursOfTheDay(3),
  minutesOfTheHour(0),
);

/** On the hour, every hour, on Wednesdays. */
export const HOURLY_WEDNESDAY_SCHEDULE = intersection(
  daysOfTheWeek("wednesday"),
  minutesOfTheHour(0),
);

export const DEFAULT_JOBS: readonly FetchJob[] = [
  {
    id: "midweek-pricing",
    name: "Midweek Pricing Snapshot",
    url: "https://pricing.example.com/v1/listings.csv",
    directory: "./data/listings",
    schedule: MIDWEEK_PRICING_SCHEDULE,
    enabled: true,
    description: "Listing prices on Wednesday and Thursday mornings",
  },
  {
    id: "fifth-tuesday-refresh",
    name: "Fifth Tuesday Full Refresh",
    url: "https://pricing.example.com/v1/full-export.csv",
    directory: "./data/full-export",
    schedule: FIFTH_TUESDAY_SCHEDULE,
    enabled: true,
    description: "Full pricing export on every fifth Tuesday",
  },
  {
    id: "hourly-wednesday-rates",
    name: "Hourly Wednesday Rates",
    url: "https://pricing.example.com/v1/rates.json",
    directory: "./data/rates",
    schedule: HOURLY_WEDNESDAY_SCHEDULE,
    enabled: false,
    description: "Mortgage rate feed, hourly on Wednesdays",
  },
];
