/**
 * Error taxonomy and step results
 */

export type ErrorKind =
  | "ConfigMissing"
  | "ConfigInvalid"
  | "LogFileError"
  | "DependencyMissing"
  | "ArgumentError"
  | "ExecutionFailure"
  | "Interrupted";

export const INTERRUPTED_EXIT_CODE = 130;

export class HomesyncError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = "HomesyncError";
  }
}

export class ConfigError extends HomesyncError {
  constructor(
    message: string,
    kind: "ConfigMissing" | "ConfigInvalid" = "ConfigInvalid",
  ) {
    super(kind, message);
    this.name = "ConfigError";
  }
}

export class LogFileError extends HomesyncError {
  constructor(message: string) {
    super("LogFileError", message);
    this.name = "LogFileError";
  }
}

export class DependencyError extends HomesyncError {
  constructor(message: string, exitCode?: number) {
    super("DependencyMissing", message, exitCode);
    this.name = "DependencyError";
  }
}

export class ArgumentError extends HomesyncError {
  constructor(message: string) {
    super("ArgumentError", message);
    this.name = "ArgumentError";
  }
}

export class SyncError extends HomesyncError {
  constructor(
    message: string,
    kind: "ExecutionFailure" | "Interrupted" = "ExecutionFailure",
  ) {
    super(kind, message, kind === "Interrupted" ? INTERRUPTED_EXIT_CODE : 1);
    this.name = "SyncError";
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: HomesyncError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: HomesyncError): Result<T> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
