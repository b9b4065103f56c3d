import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JobsFileError, loadJobsFile, parseJobsData, parseJobsYaml } from "../jobs-file.ts";
import { parseSchedule } from "../../schedule/expression.ts";

const VALID_YAML = `
jobs:
  - id: midweek-pricing
    name: Midweek Pricing Snapshot
    url: https://pricing.example.com/v1/listings.csv
    directory: ./data/listings
    schedule: "days(wed) & hours(6,12) & minutes(0)"
    description: Listing prices
  - id: rates
    url: https://pricing.example.com/v1/rates.json
    directory: ./data/rates
    schedule: "days(wed) & minutes(0)"
    enabled: false
`;

function jobsError(fn: () => unknown): JobsFileError {
  try {
    fn();
  } catch (err) {
    if (err instanceof JobsFileError) return err;
    throw err;
  }
  throw new Error("expected a JobsFileError");
}

describe("parseJobsYaml", () => {
  it("parses jobs and fills in defaults", () => {
    const jobs = parseJobsYaml(VALID_YAML);
    expect(jobs).toEqual([
      {
        id: "midweek-pricing",
        name: "Midweek Pricing Snapshot",
        url: "https://pricing.example.com/v1/listings.csv",
        directory: "./data/listings",
        schedule: parseSchedule("days(wed) & hours(6,12) & minutes(0)"),
        enabled: true,
        description: "Listing prices",
      },
      {
        id: "rates",
        name: "rates",
        url: "https://pricing.example.com/v1/rates.json",
        directory: "./data/rates",
        schedule: parseSchedule("days(wed) & minutes(0)"),
        enabled: false,
      },
    ]);
    expect(jobs[1]).not.toHaveProperty("description");
  });

  it("accepts an empty job list", () => {
    expect(parseJobsYaml("jobs: []")).toEqual([]);
  });

  it("rejects invalid YAML", () => {
    const err = jobsError(() => parseJobsYaml("jobs: [\n"));
    expect(err.message).toBe("Invalid YAML in jobs file");
    expect(err.errors).toHaveLength(1);
  });

  it("rejects a document without a jobs list", () => {
    const err = jobsError(() => parseJobsYaml("- a\n- b\n"));
    expect(err.errors).toEqual(["Missing or invalid 'jobs' key (expected a list)"]);
  });

  it("collects every problem before throwing", () => {
    const err = jobsError(() =>
      parseJobsYaml(`
jobs:
  - id: a
    directory: ./a
    schedule: "hours(6)"
  - id: a
    url: https://pricing.example.com/b
    directory: ./b
    schedule: "hours(25)"
    enabled: "yes"
  - just a string
`),
    );

    expect(err.errors).toEqual([
      "jobs[0]: missing or empty 'url'",
      "jobs[1]: 'enabled' must be a boolean",
      'jobs[1]: duplicate job id "a"',
      "jobs[1]: invalid schedule: Value 25 out of range [0-23] in hour at position 6",
      "jobs[2]: expected an object",
    ]);
    expect(err.message).toBe(
      [
        "Jobs file validation failed with 5 error(s):",
        "  - jobs[0]: missing or empty 'url'",
        "  - jobs[1]: 'enabled' must be a boolean",
        '  - jobs[1]: duplicate job id "a"',
        "  - jobs[1]: invalid schedule: Value 25 out of range [0-23] in hour at position 6",
        "  - jobs[2]: expected an object",
      ].join("\n"),
    );
  });
});

describe("parseJobsData", () => {
  it("rejects non-string optional fields", () => {
    const err = jobsError(() =>
      parseJobsData({
        jobs: [
          {
            id: "x",
            url: "https://pricing.example.com/x",
            directory: "./x",
            schedule: "always",
            name: 42,
          },
        ],
      }),
    );
    expect(err.errors).toEqual(["jobs[0]: 'name' must be a string"]);
  });

  it("rejects a null or blank enabled value", () => {
    const err = jobsError(() =>
      parseJobsData({
        jobs: [
          {
            id: "x",
            url: "https://pricing.example.com/x",
            directory: "./x",
            schedule: "always",
            enabled: null,
          },
        ],
      }),
    );
    expect(err.errors).toEqual(["jobs[0]: 'enabled' must be a boolean"]);

    const blank = jobsError(() =>
      parseJobsYaml(
        [
          "jobs:",
          "  - id: y",
          "    url: https://pricing.example.com/y",
          "    directory: ./y",
          "    schedule: never",
          "    enabled:",
        ].join("\n"),
      ),
    );
    expect(blank.errors).toEqual(["jobs[0]: 'enabled' must be a boolean"]);
  });

  it("rejects blank required fields", () => {
    const err = jobsError(() =>
      parseJobsData({
        jobs: [{ id: " ", url: "https://pricing.example.com/x", directory: "./x", schedule: "never" }],
      }),
    );
    expect(err.errors).toEqual(["jobs[0]: missing or empty 'id'"]);
  });
});

describe("loadJobsFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "jobs-file-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reads jobs from disk", async () => {
    const path = join(tempDir, "jobs.yaml");
    await writeFile(path, VALID_YAML, "utf-8");

    const jobs = await loadJobsFile(path);
    expect(jobs.map((j) => j.id)).toEqual(["midweek-pricing", "rates"]);
  });

  it("reports a missing file", async () => {
    const path = join(tempDir, "missing.yaml");
    await expect(loadJobsFile(path)).rejects.toThrow(`Jobs file not found: ${path}`);
  });
});
