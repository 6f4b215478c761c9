/**
 * Utility exports
 */

// Errors
export {
  ArgumentError,
  ConfigError,
  DependencyError,
  type ErrorKind,
  errorMessage,
  fail,
  HomesyncError,
  INTERRUPTED_EXIT_CODE,
  LogFileError,
  ok,
  type Result,
  SyncError,
} from "./errors";
// Formatting utilities
export { formatDuration, formatLogFileStamp, formatTimestamp } from "./format";
export type { Logger, LoggerOptions, LogLevel } from "./logger";
// Logger
export {
  createLogger,
  formatRecord,
  openSessionLog,
  sessionLogPath,
} from "./logger";
// Path utilities
export { ensureTrailingSep, getBaseName, resolveExecutable } from "./path";
