import type { FetchHandler, FetchJob, FetchRequest } from "../../types/jobs.ts";
import type { SchedulerDeps } from "../scheduler.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { hoursOfTheDay, intersection, minutesOfTheHour } from "../../schedule/schedule.ts";

// ── Deferred ────────────────────────────────────────────────────────────────

/** A promise the test settles by hand, to hold a fetch open. */
export class Deferred {
  readonly promise: Promise<void>;
  resolve: () => void = () => {};
  reject: (err: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<void>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

// ── Recording Handler ───────────────────────────────────────────────────────

export interface RecordingHandler {
  readonly handler: FetchHandler;
  readonly requests: FetchRequest[];
}

/**
 * Handler that records each request, then defers to `impl` (resolving
 * immediately when none is given).
 */
export function createRecordingHandler(
  impl?: (request: FetchRequest) => Promise<void>,
): RecordingHandler {
  const requests: FetchRequest[] = [];
  return {
    requests,
    handler: async (request) => {
      requests.push(request);
      if (impl) await impl(request);
    },
  };
}

// ── Test Context ────────────────────────────────────────────────────────────

export interface SchedulerTestContext {
  deps: SchedulerDeps;
  logger: BufferLogger;
  fetches: RecordingHandler;
  clock: { now: Date; fn: () => Date };
}

export function createSchedulerTestContext(
  overrides?: Partial<{
    clockDate: Date;
    handler: (request: FetchRequest) => Promise<void>;
  }>,
): SchedulerTestContext {
  const logger = new BufferLogger();
  const fetches = createRecordingHandler(overrides?.handler);

  // Monday 16 February 2026, midnight UTC
  const clockDate = overrides?.clockDate ?? new Date(Date.UTC(2026, 1, 16, 0, 0));
  const clock = {
    now: clockDate,
    fn: () => clock.now,
  };

  const deps: SchedulerDeps = {
    handler: fetches.handler,
    logger,
    clock: clock.fn,
    config: {
      tickIntervalMs: 60_000,
      timeZone: "utc",
    },
  };

  return { deps, logger, fetches, clock };
}

export function utc(month: number, day: number, hour: number, minute: number): Date {
  return new Date(Date.UTC(2026, month - 1, day, hour, minute));
}

// ── Fixtures ────────────────────────────────────────────────────────────────

export function createTestJob(overrides?: Partial<FetchJob>): FetchJob {
  return {
    id: "test-job",
    name: "Test Job",
    url: "https://pricing.example.com/v1/test.csv",
    directory: "./data/test",
    schedule: intersection(hoursOfTheDay(6), minutesOfTheHour(0)),
    enabled: true,
    ...overrides,
  };
}
