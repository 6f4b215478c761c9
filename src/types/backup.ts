/**
 * Backup run type definitions
 */

import type { HomesyncError } from "../utils/errors";

export type BackupState =
  | "idle"
  | "validating"
  | "ready"
  | "syncing"
  | "failed"
  | "succeeded";

export interface SyncInvocation {
  command: string;
  args: string[];
  /** File that receives the tool's stdout and stderr */
  logFile: string | null;
  /** Aborting stops the running tool */
  signal?: AbortSignal;
}

export interface SyncRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export type SyncRunner = (invocation: SyncInvocation) => Promise<SyncRunResult>;

export type BackupOutcome =
  | {
      state: "succeeded";
      dryRun: boolean;
      durationMs: number;
      invocation: SyncInvocation;
    }
  | {
      state: "failed";
      error: HomesyncError;
      invocation: SyncInvocation | null;
    };
