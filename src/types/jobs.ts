import type { Schedule } from "../schedule/schedule.ts";
import type { TimePoint } from "./time.ts";

// ── Fetch Job ────────────────────────────────────────────────────────────────

export interface FetchJob {
  readonly id: string;
  readonly name: string;
  /** Source of the pricing data. */
  readonly url: string;
  /** Where the caller stores what it downloads. */
  readonly directory: string;
  readonly schedule: Schedule;
  readonly enabled: boolean;
  readonly description?: string;
}

// ── Fetch Request (handed to the FetchHandler) ──────────────────────────────

export interface FetchRequest {
  readonly jobId: string;
  readonly url: string;
  readonly directory: string;
  readonly scheduledFor: string;
  readonly time: TimePoint;
}

export type FetchHandler = (request: FetchRequest) => Promise<void>;

// ── Job State (operational data) ─────────────────────────────────────────────

export interface JobState {
  readonly jobId: string;
  readonly lastFiredAt: string | null;
  readonly lastCompletedAt: string | null;
  readonly lastSkipReason: string | null;
  readonly lastError: string | null;
  readonly fireCount: number;
  readonly failureCount: number;
}
