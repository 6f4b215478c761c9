/**
 * rsync invocation building and execution
 */

import { spawn } from "node:child_process";
import * as fs from "node:fs";
import type {
  BackupConfig,
  RunOptions,
  SyncInvocation,
  SyncRunResult,
} from "../../types";
import { ensureTrailingSep } from "../../utils/path";

/**
 * Archive mode with backups of overwritten files, itemized human-readable
 * output, and pruning of both vanished and excluded entries at the destination.
 */
export const BASE_RSYNC_OPTIONS = [
  "-abvh",
  "--delete",
  "--delete-excluded",
  "--recursive",
] as const;

export const VERBOSE_RSYNC_OPTIONS = ["-h", "--progress"] as const;

export const DRY_RUN_OPTION = "--dry-run";

/**
 * Build the ordered rsync argument list. Source and destination carry a
 * trailing separator so the directory's contents are mirrored, not the
 * directory itself.
 */
export function buildRsyncArgs(
  config: BackupConfig,
  options: RunOptions,
): string[] {
  const args: string[] = [
    ...BASE_RSYNC_OPTIONS,
    `--exclude-from=${config.excludeFile}`,
  ];

  if (options.verbose) {
    args.push(...VERBOSE_RSYNC_OPTIONS);
  }

  if (options.dryRun) {
    args.push(DRY_RUN_OPTION);
  }

  args.push(
    ensureTrailingSep(config.sourceDir),
    ensureTrailingSep(config.backupDir),
  );
  return args;
}

export function buildSyncInvocation(
  command: string,
  config: BackupConfig,
  options: RunOptions,
  logFile: string | null,
  signal?: AbortSignal,
): SyncInvocation {
  return { command, args: buildRsyncArgs(config, options), logFile, signal };
}

/**
 * Run rsync with stdout and stderr appended to the invocation's log file
 * (or inherited when there is none). Resolves once the process has exited;
 * an aborted invocation is killed and resolves with the terminating signal.
 */
export async function runRsync(
  invocation: SyncInvocation,
): Promise<SyncRunResult> {
  const fd = invocation.logFile ? fs.openSync(invocation.logFile, "a") : null;
  const output = fd ?? "inherit";

  try {
    return await new Promise<SyncRunResult>((resolve, reject) => {
      const child = spawn(invocation.command, invocation.args, {
        stdio: ["ignore", output, output],
        signal: invocation.signal,
      });
      child.on("error", (error) => {
        if (error.name !== "AbortError") {
          reject(error);
        }
      });
      child.once("close", (exitCode, signal) => resolve({ exitCode, signal }));
    });
  } finally {
    if (fd !== null) {
      fs.closeSync(fd);
    }
  }
}
