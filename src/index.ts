export * from "./schedule/index.ts";
export * from "./scheduler/index.ts";
export * from "./types/index.ts";
export {
  createLogger,
  BufferLogger,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVELS,
  LOG_FORMATS,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
  type LogEntry,
} from "./observability/logger.ts";
export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export {
  bootstrap,
  createLoggingFetchHandler,
  type Application,
  type BootstrapOverrides,
} from "./bootstrap.ts";
