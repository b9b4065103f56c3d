import type { TimeField } from "../types/time.ts";

// ── Schedule Error Codes ─────────────────────────────────────────────────────

export type ScheduleErrorCode =
  | "NOT_AN_INTEGER"
  | "VALUE_OUT_OF_RANGE"
  | "UNKNOWN_DAY"
  | "INVALID_OCCURRENCE_COUNT"
  | "INVALID_TIME_POINT";

// ── Schedule Error ───────────────────────────────────────────────────────────

export class ScheduleError extends Error {
  constructor(
    message: string,
    public readonly code: ScheduleErrorCode,
    public readonly field?: TimeField,
  ) {
    super(message);
    this.name = "ScheduleError";
  }
}

// ── Parse Error ──────────────────────────────────────────────────────────────

export class ScheduleParseError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly position: number,
  ) {
    super(message);
    this.name = "ScheduleParseError";
  }
}
