/**
 * Environment validation before a sync run
 */

import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { SYNC_COMMAND } from "../config/defaults";
import type { BackupConfig } from "../types";
import {
  DependencyError,
  errorMessage,
  fail,
  ok,
  type Result,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { resolveExecutable } from "../utils/path";

export interface ValidatedEnvironment {
  /** Absolute path of the sync executable */
  syncCommand: string;
}

export interface DependencyCheckOptions {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  syncCommand?: string;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

/**
 * Check, in order: sync tool on PATH, source directory, backup directory
 * (created when missing), exclude file. Stops at the first failure.
 */
export async function validateDependencies(
  config: BackupConfig,
  options: DependencyCheckOptions,
): Promise<Result<ValidatedEnvironment>> {
  const { logger } = options;
  const commandName = options.syncCommand ?? SYNC_COMMAND;

  logger.debug("Validating dependencies...");

  // CHECK 1: sync tool resolvable on PATH
  const syncCommand = await resolveExecutable(commandName, options.env);
  if (!syncCommand) {
    return fail(
      new DependencyError(
        `Required command '${commandName}' not found. Please install it.`,
      ),
    );
  }

  // CHECK 2: source directory exists
  const sourceStat = await statOrNull(config.sourceDir);
  if (!sourceStat?.isDirectory()) {
    return fail(
      new DependencyError(`Source directory not found: ${config.sourceDir}`),
    );
  }

  // CHECK 3: backup directory exists, or can be created
  const backupStat = await statOrNull(config.backupDir);
  if (!backupStat) {
    logger.warn(
      `Backup destination directory not found. Creating it: ${config.backupDir}`,
    );
    try {
      await fs.mkdir(config.backupDir, { recursive: true });
    } catch (e) {
      return fail(
        new DependencyError(
          `Failed to create backup destination directory: ${config.backupDir}` +
            ` (${errorMessage(e)})`,
        ),
      );
    }
  } else if (!backupStat.isDirectory()) {
    return fail(
      new DependencyError(
        `Backup destination is not a directory: ${config.backupDir}`,
      ),
    );
  }

  // CHECK 4: exclude file exists
  const excludeStat = await statOrNull(config.excludeFile);
  if (!excludeStat?.isFile()) {
    return fail(
      new DependencyError(`Exclude file not found: ${config.excludeFile}`),
    );
  }

  logger.debug("All required dependencies found.");
  return ok({ syncCommand });
}
