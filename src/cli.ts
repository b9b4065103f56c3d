import { pathToFileURL } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import { ScheduleParseError } from "./schedule/errors.ts";
import { formatSchedule, parseSchedule } from "./schedule/expression.ts";
import { matches } from "./schedule/schedule.ts";
import { upcomingMatches } from "./schedule/search.ts";
import { timePointFromDate } from "./schedule/time-point.ts";
import type { TimeZoneMode } from "./types/time.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  expression: string | null;
  daemon: boolean;
  at: Date | null;
  next: number | null;
  utc: boolean;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    expression: null,
    daemon: false,
    at: null,
    next: null,
    utc: false,
    help: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--daemon") {
      result.daemon = true;
      i++;
    } else if (arg === "--utc") {
      result.utc = true;
      i++;
    } else if (arg === "--at") {
      const value = argv[i + 1];
      const at = value === undefined ? null : new Date(value);
      if (at === null || Number.isNaN(at.getTime())) {
        throw new Error("--at requires an ISO 8601 date-time argument");
      }
      result.at = at;
      i += 2;
    } else if (arg === "--next") {
      const value = argv[i + 1];
      const count = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(count) || count < 1) {
        throw new Error("--next requires a positive integer argument");
      }
      result.next = count;
      i += 2;
    } else if (!arg.startsWith("--")) {
      if (result.expression !== null) {
        throw new Error("Only one schedule expression may be given");
      }
      result.expression = arg;
      i++;
    } else {
      throw new Error(`Unknown flag: ${arg}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

const HELP_TEXT = `
Pricing fetch schedules

Usage:
  npm start -- "<expression>"                  Does the schedule match now?
  npm start -- "<expression>" --at <ISO>       Does it match at a given time?
  npm start -- "<expression>" --next N         List the next N matching minutes
  npm start -- --daemon                        Run the fetch scheduler

Options:
  --utc         Read calendar fields in UTC instead of local time
  --help, -h    Show this help message

Expressions:
  days(wed) & hours(6,12) & minutes(0) | days(thu) & hours(5-7) & minutes(30)
  weeks(5) & days(tue)          every fifth Tuesday
  !months(7,8) & minutes(*/15)  every quarter hour outside July and August
`.trim();

// ── Expression Mode ────────────────────────────────────────────────────────

/**
 * Evaluate an expression and return the lines to print.
 * Throws ScheduleParseError for an invalid expression.
 */
export function describeExpression(
  expression: string,
  options: { readonly at: Date; readonly next: number | null; readonly zone: TimeZoneMode },
): string[] {
  const schedule = parseSchedule(expression);
  const lines = [`Schedule: ${formatSchedule(schedule)}`];

  if (options.next !== null) {
    const found = upcomingMatches(schedule, options.at, options.next, { zone: options.zone });
    for (const date of found) {
      lines.push(date.toISOString());
    }
    if (found.length < options.next) {
      lines.push(`Only ${found.length} match(es) in the next 366 days`);
    }
    return lines;
  }

  const time = timePointFromDate(options.at, options.zone);
  const hh = String(time.hourOfDay).padStart(2, "0");
  const mm = String(time.minuteOfHour).padStart(2, "0");
  lines.push(
    `At ${time.dayOfWeek} ${hh}:${mm} (week ${time.weekOfMonth}, month ${time.monthOfYear}): ${
      matches(schedule, time) ? "fetch" : "no fetch"
    }`,
  );
  return lines;
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  if ((args.expression === null) === !args.daemon) {
    console.error("Error: Provide either a schedule expression or --daemon");
    console.error(HELP_TEXT);
    process.exit(1);
    return;
  }

  let config;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    process.exit(1);
    return;
  }

  // ── Expression Mode ──────────────────────────────────────────────────
  if (args.expression !== null) {
    try {
      const lines = describeExpression(args.expression, {
        at: args.at ?? new Date(),
        next: args.next,
        zone: args.utc ? "utc" : config.scheduler.timeZone,
      });
      console.log(lines.join("\n"));
      process.exit(0);
    } catch (err: unknown) {
      if (!(err instanceof ScheduleParseError)) throw err;
      console.error(`Invalid schedule: ${err.message}`);
      process.exit(1);
    }
    return;
  }

  // ── Daemon Mode ──────────────────────────────────────────────────────
  const app = await bootstrap(
    args.utc
      ? { ...config, scheduler: { ...config.scheduler, timeZone: "utc" } }
      : config,
  );
  app.start();
  app.logger.info("daemon_running", { jobs: app.jobs.length });
}

// Run only when executed as the entry point (not when imported for testing)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error(
      "Fatal: Failed to start:",
      err instanceof Error ? err.message : String(err),
    );
    process.exit(1);
  });
}
