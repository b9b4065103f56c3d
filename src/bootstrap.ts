import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import type { FetchHandler, FetchJob } from "./types/jobs.ts";
import { FetchScheduler } from "./scheduler/scheduler.ts";
import { DEFAULT_JOBS } from "./scheduler/default-jobs.ts";
import { loadJobsFile } from "./scheduler/jobs-file.ts";
import { formatSchedule } from "./schedule/expression.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly jobs: readonly FetchJob[];
  readonly scheduler: FetchScheduler;

  start(): void;
  shutdown(): Promise<void>;
}

export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly handler?: FetchHandler;
  readonly clock?: () => Date;
  /** Defaults to true; tests turn it off. */
  readonly installSignalHandlers?: boolean;
}

// ── Default Handler ────────────────────────────────────────────────────────

/**
 * Handler used by the daemon: downloading is left to the caller, so a due
 * fetch is only reported.
 */
export function createLoggingFetchHandler(logger: Logger): FetchHandler {
  const log = logger.child({ module: "fetch" });
  return async (request) => {
    log.info("fetch_due", {
      jobId: request.jobId,
      url: request.url,
      directory: request.directory,
      scheduledFor: request.scheduledFor,
    });
  };
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire logger, jobs and scheduler. The single place where dependencies are
 * chosen.
 */
export async function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Promise<Application> {
  // 1. Logger, first so everything after it can log
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
    });

  logger.info("bootstrapping", {
    jobsFile: config.jobsFile,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    timeZone: config.scheduler.timeZone,
  });

  // 2. Jobs, from the configured file or the built-in defaults
  const jobs = config.jobsFile ? await loadJobsFile(config.jobsFile) : DEFAULT_JOBS;
  for (const job of jobs) {
    logger.info("job_loaded", {
      jobId: job.id,
      enabled: job.enabled,
      schedule: formatSchedule(job.schedule),
    });
  }

  // 3. Scheduler
  const scheduler = new FetchScheduler({
    handler: overrides.handler ?? createLoggingFetchHandler(logger),
    logger,
    config: config.scheduler,
    ...(overrides.clock ? { clock: overrides.clock } : {}),
  });

  const app: Application = {
    config,
    logger,
    jobs,
    scheduler,

    start(): void {
      scheduler.start(jobs);
      for (const job of scheduler.getActiveJobs()) {
        logger.info("job_next_firing", {
          jobId: job.id,
          next: scheduler.getNextFiring(job.id)?.toISOString() ?? null,
        });
      }
    },

    async shutdown(): Promise<void> {
      logger.info("shutting_down");
      try {
        await scheduler.stop();
      } catch (err: unknown) {
        logger.error("scheduler_stop_failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      }

      if (installSignals) {
        process.removeListener("SIGTERM", sigtermHandler);
        process.removeListener("SIGINT", sigintHandler);
      }
      logger.info("shutdown_complete");
    },
  };

  // 4. Signal handlers for graceful shutdown (with dedup guard)
  const installSignals = overrides.installSignalHandlers ?? true;
  let signalHandled = false;
  const onSignal = async (signal: string): Promise<void> => {
    if (signalHandled) return;
    signalHandled = true;
    logger.info("signal_received", { signal });
    await app.shutdown();
    process.exit(0);
  };

  const sigtermHandler = (): void => {
    void onSignal("SIGTERM");
  };
  const sigintHandler = (): void => {
    void onSignal("SIGINT");
  };
  if (installSignals) {
    process.on("SIGTERM", sigtermHandler);
    process.on("SIGINT", sigintHandler);
  }

  return app;
}
