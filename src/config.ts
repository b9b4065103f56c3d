import { resolve } from "node:path";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import { TIME_ZONE_MODES } from "./types/time.ts";
import type { TimeZoneMode } from "./types/time.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  /** Absolute path of the YAML jobs file, or null to use the default jobs. */
  readonly jobsFile: string | null;
  readonly scheduler: {
    readonly tickIntervalMs: number;
    readonly timeZone: TimeZoneMode;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Env-var-style overrides for testing, keyed by
 *   variable name (e.g. "JOBS_FILE").
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if a variable holds an invalid value.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env = (key: string): string | undefined =>
    envOverrides?.[key] ?? process.env[key];

  // ── Jobs File ──────────────────────────────────────────────────────────
  const jobsFileRaw = env("JOBS_FILE")?.trim();
  const jobsFile = jobsFileRaw ? resolve(process.cwd(), jobsFileRaw) : null;

  // ── Tick Interval ──────────────────────────────────────────────────────
  const tickRaw = env("TICK_INTERVAL_MS");
  let tickIntervalMs = 60_000;
  if (tickRaw !== undefined && tickRaw !== "") {
    tickIntervalMs = Number(tickRaw.trim());
    if (!Number.isInteger(tickIntervalMs) || tickIntervalMs <= 0) {
      throw new ConfigError(
        `TICK_INTERVAL_MS must be a positive integer, got "${tickRaw}".`,
        "TICK_INTERVAL_MS",
      );
    }
  }

  // ── Time Zone ──────────────────────────────────────────────────────────
  const zoneRaw = (env("SCHEDULE_TIMEZONE") || "local").trim().toLowerCase();
  const timeZone = TIME_ZONE_MODES.find((z) => z === zoneRaw);
  if (timeZone === undefined) {
    throw new ConfigError(
      `SCHEDULE_TIMEZONE must be one of: ${TIME_ZONE_MODES.join(", ")}. Got "${zoneRaw}".`,
      "SCHEDULE_TIMEZONE",
    );
  }

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevelRaw = (env("LOG_LEVEL") || "info").trim();
  const logLevel = LOG_LEVELS.find((l) => l === logLevelRaw);
  if (logLevel === undefined) {
    throw new ConfigError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}. Got "${logLevelRaw}".`,
      "LOG_LEVEL",
    );
  }

  const logFormatRaw = (env("LOG_FORMAT") || "pretty").trim();
  const logFormat = LOG_FORMATS.find((f) => f === logFormatRaw);
  if (logFormat === undefined) {
    throw new ConfigError(
      `LOG_FORMAT must be one of: ${LOG_FORMATS.join(", ")}. Got "${logFormatRaw}".`,
      "LOG_FORMAT",
    );
  }

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    jobsFile,
    scheduler: Object.freeze({ tickIntervalMs, timeZone }),
    logging: Object.freeze({ level: logLevel, format: logFormat }),
  });
}
