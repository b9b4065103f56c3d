import { describe, expect, it } from "vitest";
import { describeExpression, parseArgs } from "../cli.ts";
import { ScheduleParseError } from "../schedule/errors.ts";

// ── parseArgs ───────────────────────────────────────────────────────────────

describe("parseArgs", () => {
  it("returns defaults for no arguments", () => {
    expect(parseArgs([])).toEqual({
      expression: null,
      daemon: false,
      at: null,
      next: null,
      utc: false,
      help: false,
    });
  });

  it("reads an expression with --at and --utc", () => {
    const args = parseArgs(["days(wed)", "--at", "2026-03-04T06:00:00Z", "--utc"]);
    expect(args.expression).toBe("days(wed)");
    expect(args.at?.toISOString()).toBe("2026-03-04T06:00:00.000Z");
    expect(args.utc).toBe(true);
  });

  it("reads --next, --daemon and -h", () => {
    expect(parseArgs(["hours(6)", "--next", "3"]).next).toBe(3);
    expect(parseArgs(["--daemon"]).daemon).toBe(true);
    expect(parseArgs(["-h"]).help).toBe(true);
  });

  it("rejects a missing or invalid --at value", () => {
    expect(() => parseArgs(["--at"])).toThrow("--at requires an ISO 8601 date-time argument");
    expect(() => parseArgs(["--at", "tomorrow"])).toThrow(
      "--at requires an ISO 8601 date-time argument",
    );
  });

  it("rejects a non-positive --next value", () => {
    expect(() => parseArgs(["--next", "0"])).toThrow("--next requires a positive integer argument");
    expect(() => parseArgs(["--next"])).toThrow("--next requires a positive integer argument");
  });

  it("rejects a second expression and unknown flags", () => {
    expect(() => parseArgs(["hours(6)", "hours(7)"])).toThrow(
      "Only one schedule expression may be given",
    );
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown flag: --verbose");
  });
});

// ── describeExpression ──────────────────────────────────────────────────────

describe("describeExpression", () => {
  it("reports whether the schedule fires at a time", () => {
    expect(
      describeExpression("days(wednesday) & hours(6)", {
        at: new Date(Date.UTC(2026, 2, 4, 6, 0)),
        next: null,
        zone: "utc",
      }),
    ).toEqual([
      "Schedule: days(wed) & hours(6)",
      "At wednesday 06:00 (week 1, month 3): fetch",
    ]);
  });

  it("reports a miss", () => {
    expect(
      describeExpression("days(wed) & hours(6)", {
        at: new Date(Date.UTC(2026, 2, 5, 6, 5)),
        next: null,
        zone: "utc",
      }),
    ).toEqual(["Schedule: days(wed) & hours(6)", "At thursday 06:05 (week 1, month 3): no fetch"]);
  });

  it("lists upcoming matches", () => {
    expect(
      describeExpression("weeks(5) & days(tue) & hours(3) & minutes(0)", {
        at: new Date(Date.UTC(2026, 1, 16, 0, 0)),
        next: 2,
        zone: "utc",
      }),
    ).toEqual([
      "Schedule: weeks(5) & days(tue) & hours(3) & minutes(0)",
      "2026-03-31T03:00:00.000Z",
      "2026-06-30T03:00:00.000Z",
    ]);
  });

  it("says when fewer matches exist than were asked for", () => {
    expect(
      describeExpression("never", {
        at: new Date(Date.UTC(2026, 1, 16, 0, 0)),
        next: 1,
        zone: "utc",
      }),
    ).toEqual(["Schedule: never", "Only 0 match(es) in the next 366 days"]);
  });

  it("throws ScheduleParseError for an invalid expression", () => {
    expect(() =>
      describeExpression("hours(", { at: new Date(0), next: null, zone: "utc" }),
    ).toThrow(ScheduleParseError);
  });
});
