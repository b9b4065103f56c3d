import type { Logger } from "../observability/logger.ts";
import type { FetchHandler, FetchJob, FetchRequest, JobState } from "../types/jobs.ts";
import type { TimePoint, TimeZoneMode } from "../types/time.ts";
import { ScheduleEvaluator } from "../schedule/evaluator.ts";
import { formatSchedule } from "../schedule/expression.ts";
import { nextMatch } from "../schedule/search.ts";
import { timePointFromDate } from "../schedule/time-point.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface SchedulerConfig {
  readonly tickIntervalMs: number;
  readonly timeZone: TimeZoneMode;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  tickIntervalMs: 60_000,
  timeZone: "local",
};

// ── Dependencies ────────────────────────────────────────────────────────────

export interface SchedulerDeps {
  readonly handler: FetchHandler;
  readonly logger: Logger;
  readonly config?: Partial<SchedulerConfig>;
  readonly clock?: () => Date;
}

// ── Tick Result ─────────────────────────────────────────────────────────────

export interface TickResult {
  readonly timestamp: string;
  readonly fired: readonly string[];
  readonly skipped: readonly SkipEntry[];
}

export interface SkipEntry {
  readonly id: string;
  readonly reason: string;
}

// ── Internal Types ──────────────────────────────────────────────────────────

interface RegisteredJob {
  readonly job: FetchJob;
  readonly evaluator: ScheduleEvaluator;
  enabled: boolean;
}

interface RunningFetch {
  readonly startedAt: Date;
  readonly done: Promise<void>;
}

// ── Fetch Scheduler ─────────────────────────────────────────────────────────

/**
 * Ticks once per interval, evaluates every registered job against the
 * current minute and starts the handler for each job that is due.
 *
 * Each job owns a ScheduleEvaluator, so `times` counters are per job and
 * only advance while the job is enabled.
 */
export class FetchScheduler {
  private readonly config: SchedulerConfig;
  private readonly clock: () => Date;
  private readonly handler: FetchHandler;
  private readonly logger: Logger;

  private readonly jobs = new Map<string, RegisteredJob>();
  private readonly states = new Map<string, JobState>();
  private readonly runningFetches = new Map<string, RunningFetch>();
  private readonly firedThisMinute = new Set<string>();
  private lastMinute = -1;

  private running = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private alignTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(deps: SchedulerDeps) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...deps.config };
    this.clock = deps.clock ?? (() => new Date());
    this.handler = deps.handler;
    this.logger = deps.logger.child({ module: "scheduler" });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /**
   * Register jobs and start the tick loop, aligned to the next interval boundary.
   */
  start(jobs?: readonly FetchJob[]): void {
    if (this.running) return;
    this.running = true;

    for (const job of jobs ?? []) {
      this.register(job);
    }

    this.startTickLoop();

    this.logger.info("scheduler_started", {
      jobCount: this.jobs.size,
      tickIntervalMs: this.config.tickIntervalMs,
      timeZone: this.config.timeZone,
    });
  }

  /**
   * Stop the tick loop and wait for running fetches to settle.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.alignTimer) {
      clearTimeout(this.alignTimer);
      this.alignTimer = null;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    await this.drain();
    this.logger.info("scheduler_stopped");
  }

  /** Resolves once every fetch started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.runningFetches.values()].map((r) => r.done));
  }

  // ── Job Management ──────────────────────────────────────────────────────

  addJob(job: FetchJob): void {
    this.register(job);
    this.logger.info("job_added", {
      jobId: job.id,
      schedule: formatSchedule(job.schedule),
    });
  }

  removeJob(id: string): void {
    const removed = this.jobs.delete(id);
    if (removed) {
      this.states.delete(id);
      this.logger.info("job_removed", { jobId: id });
    }
  }

  setEnabled(id: string, enabled: boolean): void {
    const registered = this.jobs.get(id);
    if (registered) {
      registered.enabled = enabled;
      this.logger.info("job_enabled_changed", { jobId: id, enabled });
    }
  }

  // ── Introspection ───────────────────────────────────────────────────────

  getJobStates(): ReadonlyMap<string, JobState> {
    return this.states;
  }

  getActiveJobs(): readonly FetchJob[] {
    return [...this.jobs.values()].filter((r) => r.enabled).map((r) => r.job);
  }

  getAllJobs(): readonly FetchJob[] {
    return [...this.jobs.values()].map((r) => r.job);
  }

  /**
   * Next minute at which the job would fire, following its `times` counters
   * as they stand. The job's own counters are not advanced.
   */
  getNextFiring(id: string): Date | null {
    const registered = this.jobs.get(id);
    if (!registered || !registered.enabled) return null;

    return nextMatch(registered.job.schedule, this.clock(), {
      zone: this.config.timeZone,
      evaluator: registered.evaluator,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  // ── Tick (public for testing) ───────────────────────────────────────────

  /**
   * Evaluate every job at the current minute and start the due fetches.
   * Fetches run in the background; `drain()` waits for them.
   */
  tick(): TickResult {
    const now = this.clock();
    const time = timePointFromDate(now, this.config.timeZone);

    const minute = Math.floor(now.getTime() / 60_000);
    if (minute !== this.lastMinute) {
      this.firedThisMinute.clear();
      this.lastMinute = minute;
    }

    const fired: string[] = [];
    const skipped: SkipEntry[] = [];

    for (const id of [...this.jobs.keys()]) {
      const registered = this.jobs.get(id);
      if (!registered) continue;

      if (!registered.enabled) {
        skipped.push({ id, reason: "disabled" });
        continue;
      }

      if (!registered.evaluator.evaluate(time)) {
        continue; // not due, and too noisy to log
      }

      if (this.firedThisMinute.has(id)) {
        skipped.push({ id, reason: "already_fired_this_minute" });
        this.logger.debug("job_dedup_skipped", { jobId: id });
        continue;
      }

      const inFlight = this.runningFetches.get(id);
      if (inFlight) {
        skipped.push({ id, reason: "fetch_still_running" });
        this.updateState(id, { lastSkipReason: "fetch_still_running" });
        this.logger.info("job_overlap_skipped", {
          jobId: id,
          startedAt: inFlight.startedAt.toISOString(),
        });
        continue;
      }

      try {
        this.fire(registered.job, now, time);
        fired.push(id);
        this.firedThisMinute.add(id);
      } catch (err) {
        const errorMsg = err instanceof Error ? err.message : String(err);
        skipped.push({ id, reason: `fire_error: ${errorMsg}` });
        this.updateState(id, { lastSkipReason: `fire_error: ${errorMsg}` });
        this.logger.error("job_fire_failed", { jobId: id, error: errorMsg });
      }
    }

    return { timestamp: now.toISOString(), fired, skipped };
  }

  // ── Internal: Fire ────────────────────────────────────────────────────

  private fire(job: FetchJob, now: Date, time: TimePoint): void {
    const request: FetchRequest = {
      jobId: job.id,
      url: job.url,
      directory: job.directory,
      scheduledFor: now.toISOString(),
      time,
    };

    const done = this.handler(request)
      .then(
        () => this.recordCompletion(job.id, now),
        (err: unknown) => this.recordFailure(job.id, err),
      )
      .finally(() => {
        this.runningFetches.delete(job.id);
      });
    this.runningFetches.set(job.id, { startedAt: now, done });

    const previous = this.states.get(job.id);
    this.updateState(job.id, {
      lastFiredAt: now.toISOString(),
      lastSkipReason: null,
      fireCount: (previous?.fireCount ?? 0) + 1,
    });

    this.logger.info("job_fired", {
      jobId: job.id,
      url: job.url,
      directory: job.directory,
      scheduledFor: request.scheduledFor,
    });
  }

  private recordCompletion(jobId: string, startedAt: Date): void {
    const completedAt = this.clock();
    this.updateState(jobId, {
      lastCompletedAt: completedAt.toISOString(),
      lastError: null,
    });
    this.logger.info("fetch_completed", {
      jobId,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });
  }

  private recordFailure(jobId: string, err: unknown): void {
    const errorMsg = err instanceof Error ? err.message : String(err);
    const previous = this.states.get(jobId);
    this.updateState(jobId, {
      lastError: errorMsg,
      failureCount: (previous?.failureCount ?? 0) + 1,
    });
    this.logger.error("fetch_failed", { jobId, error: errorMsg });
  }

  // ── Internal: State ───────────────────────────────────────────────────

  private updateState(jobId: string, updates: Partial<JobState>): void {
    // A job removed while its fetch was running keeps no state.
    if (!this.jobs.has(jobId)) return;

    const existing = this.states.get(jobId) ?? {
      jobId,
      lastFiredAt: null,
      lastCompletedAt: null,
      lastSkipReason: null,
      lastError: null,
      fireCount: 0,
      failureCount: 0,
    };
    this.states.set(jobId, { ...existing, ...updates });
  }

  // ── Internal: Timer ───────────────────────────────────────────────────

  private startTickLoop(): void {
    const now = Date.now();
    const msUntilNextBoundary =
      this.config.tickIntervalMs - (now % this.config.tickIntervalMs);

    this.alignTimer = setTimeout(() => {
      this.alignTimer = null;
      this.guardedTick();

      this.tickTimer = setInterval(
        () => this.guardedTick(),
        this.config.tickIntervalMs,
      );
    }, msUntilNextBoundary);
  }

  private guardedTick(): void {
    if (!this.running) return;

    try {
      const result = this.tick();
      if (result.fired.length > 0) {
        this.logger.debug("tick_completed", {
          fired: result.fired,
          skipped: result.skipped.length,
        });
      }
    } catch (err) {
      this.logger.error("tick_error", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // ── Internal: Helpers ─────────────────────────────────────────────────

  private register(job: FetchJob): void {
    this.jobs.set(job.id, {
      job,
      evaluator: new ScheduleEvaluator(job.schedule),
      enabled: job.enabled,
    });
  }
}
