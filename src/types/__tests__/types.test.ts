import { describe, expect, it } from "vitest";
import { DAYS_OF_WEEK, FIELD_RANGES, TIME_FIELDS, TIME_ZONE_MODES } from "../index.ts";

describe("Days of Week", () => {
  it("starts on sunday, matching Date#getDay", () => {
    expect(DAYS_OF_WEEK).toHaveLength(7);
    expect(DAYS_OF_WEEK[new Date(Date.UTC(2026, 2, 4)).getUTCDay()]).toBe("wednesday");
    expect(DAYS_OF_WEEK[0]).toBe("sunday");
  });
});

describe("Field Ranges", () => {
  it("has a range for every field", () => {
    for (const field of TIME_FIELDS) {
      expect(FIELD_RANGES[field].min).toBeLessThanOrEqual(FIELD_RANGES[field].max);
    }
  });

  it("covers the calendar", () => {
    expect(FIELD_RANGES.minute).toEqual({ min: 0, max: 59 });
    expect(FIELD_RANGES.hour).toEqual({ min: 0, max: 23 });
    expect(FIELD_RANGES.dayOfWeek).toEqual({ min: 0, max: DAYS_OF_WEEK.length - 1 });
    expect(FIELD_RANGES.week).toEqual({ min: 1, max: 5 });
    expect(FIELD_RANGES.month).toEqual({ min: 1, max: 12 });
  });
});

describe("Time Zone Modes", () => {
  it("reads local or utc fields", () => {
    expect(TIME_ZONE_MODES).toEqual(["local", "utc"]);
  });
});
