import * as fs from "node:fs";
import * as path from "node:path";
import color from "picocolors";
import { LogFileError, errorMessage } from "./errors";
import { formatLogFileStamp, formatTimestamp } from "./format";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

type Paint = (text: string) => string;

function levelColors(enabled: boolean): Record<LogLevel, Paint> {
  const palette = color.createColors(enabled);
  return {
    INFO: palette.green,
    WARN: palette.yellow,
    ERROR: palette.red,
    DEBUG: palette.cyan,
  };
}

export interface Logger {
  /** Session log file, or null for a console-only logger */
  readonly logFile: string | null;
  log(message: string, level?: LogLevel): void;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  logFile?: string | null;
  /** Colorize the console copy. Defaults to terminal support. */
  color?: boolean;
  now?: () => Date;
}

export function formatRecord(
  timestamp: Date,
  level: LogLevel,
  message: string,
): string {
  return `${formatTimestamp(timestamp)} [${level}] ${message}`;
}

/**
 * Every level is emitted; there is no threshold. The file copy is plain text,
 * the console copy goes to stderr in the level's color.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const logFile = options.logFile ?? null;
  const now = options.now ?? (() => new Date());
  const colors = levelColors(options.color ?? color.isColorSupported);

  const log = (message: string, level: LogLevel = "INFO"): void => {
    const line = formatRecord(now(), level, message);
    console.error(colors[level](line));
    if (logFile) {
      fs.appendFileSync(logFile, `${line}\n`);
    }
  };

  return {
    logFile,
    log,
    debug: (message) => log(message, "DEBUG"),
    info: (message) => log(message, "INFO"),
    warn: (message) => log(message, "WARN"),
    error: (message) => log(message, "ERROR"),
  };
}

export function sessionLogPath(
  dir: string,
  baseName: string,
  startedAt: Date,
): string {
  return path.join(dir, `${baseName}_${formatLogFileStamp(startedAt)}.log`);
}

/**
 * Create the per-run log file and return its path
 */
export function openSessionLog(
  dir: string,
  baseName: string,
  startedAt: Date,
): string {
  const logFile = sessionLogPath(dir, baseName, startedAt);
  try {
    fs.closeSync(fs.openSync(logFile, "a"));
  } catch (e) {
    throw new LogFileError(
      `Failed to create log file: ${logFile} (${errorMessage(e)})`,
    );
  }
  return logFile;
}
