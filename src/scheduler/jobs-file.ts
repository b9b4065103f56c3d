import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { FetchJob } from "../types/jobs.ts";
import type { Schedule } from "../schedule/schedule.ts";
import { ScheduleParseError } from "../schedule/errors.ts";
import { parseSchedule } from "../schedule/expression.ts";

// ── YAML Schema ─────────────────────────────────────────────────────────────
//
// jobs:
//   - id: midweek-pricing
//     name: Midweek Pricing Snapshot
//     url: https://pricing.example.com/v1/listings.csv
//     directory: ./data/listings
//     schedule: "days(wed) & hours(6,12) & minutes(0)"
//     enabled: true            # optional, default true
//     description: ...         # optional

// ── Validation Error ────────────────────────────────────────────────────────

export class JobsFileError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly string[],
  ) {
    super(message);
    this.name = "JobsFileError";
  }
}

// ── Loading ─────────────────────────────────────────────────────────────────

/**
 * Read and validate a YAML jobs file.
 */
export async function loadJobsFile(path: string): Promise<FetchJob[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new JobsFileError(`Jobs file not found: ${path}`, [
        `File not found: ${path}`,
      ]);
    }
    throw new JobsFileError(`Failed to read jobs file: ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  return parseJobsYaml(content);
}

/**
 * Parse jobs from YAML text. Collects every problem before throwing, so one
 * JobsFileError lists all invalid entries.
 */
export function parseJobsYaml(content: string): FetchJob[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    throw new JobsFileError("Invalid YAML in jobs file", [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  return parseJobsData(raw);
}

export function parseJobsData(raw: unknown): FetchJob[] {
  const list = isRecord(raw) ? raw["jobs"] : undefined;
  if (!Array.isArray(list)) {
    throw new JobsFileError("Invalid jobs file: expected a 'jobs' list at root", [
      "Missing or invalid 'jobs' key (expected a list)",
    ]);
  }

  const errors: string[] = [];
  const jobs: FetchJob[] = [];
  const seenIds = new Set<string>();

  list.forEach((entry: unknown, index: number) => {
    const label = `jobs[${index}]`;
    if (!isRecord(entry)) {
      errors.push(`${label}: expected an object`);
      return;
    }

    const id = requireString(entry, "id", label, errors);
    const url = requireString(entry, "url", label, errors);
    const directory = requireString(entry, "directory", label, errors);
    const expression = requireString(entry, "schedule", label, errors);
    const name = optionalString(entry, "name", label, errors);
    const description = optionalString(entry, "description", label, errors);

    // A present key must hold a boolean; a blank "enabled:" reads as null.
    const enabled = Object.hasOwn(entry, "enabled") ? entry["enabled"] : true;
    if (typeof enabled !== "boolean") {
      errors.push(`${label}: 'enabled' must be a boolean`);
    }

    if (id !== null) {
      if (seenIds.has(id)) {
        errors.push(`${label}: duplicate job id "${id}"`);
      }
      seenIds.add(id);
    }

    let schedule: Schedule | null = null;
    if (expression !== null) {
      try {
        schedule = parseSchedule(expression);
      } catch (err: unknown) {
        if (!(err instanceof ScheduleParseError)) throw err;
        errors.push(`${label}: invalid schedule: ${err.message}`);
      }
    }

    if (
      id === null ||
      url === null ||
      directory === null ||
      schedule === null ||
      name === null ||
      description === null ||
      typeof enabled !== "boolean"
    ) {
      return;
    }

    jobs.push({
      id,
      name: name ?? id,
      url,
      directory,
      schedule,
      enabled,
      ...(description !== undefined ? { description } : {}),
    });
  });

  if (errors.length > 0) {
    throw new JobsFileError(
      `Jobs file validation failed with ${errors.length} error(s):\n${errors.map((e) => `  - ${e}`).join("\n")}`,
      errors,
    );
  }

  return jobs;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(
  entry: Record<string, unknown>,
  key: string,
  label: string,
  errors: string[],
): string | null {
  const value = entry[key];
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`${label}: missing or empty '${key}'`);
    return null;
  }
  return value;
}

/** undefined when absent, null (with an error recorded) when not a string. */
function optionalString(
  entry: Record<string, unknown>,
  key: string,
  label: string,
  errors: string[],
): string | undefined | null {
  const value = entry[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    errors.push(`${label}: '${key}' must be a string`);
    return null;
  }
  return value;
}
