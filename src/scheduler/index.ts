// ── Scheduler ────────────────────────────────────────────────────────────────
export {
  FetchScheduler,
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
  type SchedulerDeps,
  type TickResult,
  type SkipEntry,
} from "./scheduler.ts";

// ── Jobs File ────────────────────────────────────────────────────────────────
export { loadJobsFile, parseJobsYaml, parseJobsData, JobsFileError } from "./jobs-file.ts";

// ── Default Jobs ─────────────────────────────────────────────────────────────
export {
  DEFAULT_JOBS,
  MIDWEEK_PRICING_SCHEDULE,
  FIFTH_TUESDAY_SCHEDULE,
  HOURLY_WEDNESDAY_SCHEDULE,
} from "./default-jobs.ts";
