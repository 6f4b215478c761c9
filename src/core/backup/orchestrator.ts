/**
 * Backup orchestration
 */

import type {
  BackupConfig,
  BackupOutcome,
  BackupState,
  RunOptions,
  SyncInvocation,
  SyncRunner,
  SyncRunResult,
} from "../../types";
import {
  errorMessage,
  type HomesyncError,
  SyncError,
} from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import type { Logger } from "../../utils/logger";
import { getBaseName } from "../../utils/path";
import { validateDependencies } from "../dependencies";
import { buildSyncInvocation, runRsync } from "./rsync";

const TRANSITIONS: Record<BackupState, readonly BackupState[]> = {
  idle: ["validating"],
  validating: ["ready", "failed"],
  ready: ["syncing", "failed"],
  syncing: ["succeeded", "failed"],
  failed: [],
  succeeded: [],
};

/**
 * Tracks the lifecycle of one run. Terminal states accept no transitions.
 */
export class BackupRun {
  private current: BackupState = "idle";
  private readonly visited: BackupState[] = ["idle"];

  constructor(private readonly onStateChange?: (state: BackupState) => void) {}

  get state(): BackupState {
    return this.current;
  }

  get history(): readonly BackupState[] {
    return this.visited;
  }

  transition(next: BackupState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `Invalid backup state transition: ${this.current} -> ${next}`,
      );
    }
    this.current = next;
    this.visited.push(next);
    this.onStateChange?.(next);
  }
}

export interface BackupDeps {
  logger: Logger;
  /** Defaults to spawning rsync */
  runner?: SyncRunner;
  env?: NodeJS.ProcessEnv;
  /** Command name or path of the sync tool; defaults to rsync */
  syncCommand?: string;
  /** Aborted when the process is asked to stop */
  signal?: AbortSignal;
  onStateChange?: (state: BackupState) => void;
  clock?: () => number;
}

function describeFailure(
  command: string,
  result: SyncRunResult,
  interrupted: boolean,
): HomesyncError | null {
  const name = getBaseName(command);
  const exitCode = result.exitCode ?? "unknown";
  if (result.signal) {
    return new SyncError(
      `${name} terminated by signal ${result.signal}`,
      "Interrupted",
    );
  }
  if (interrupted) {
    return new SyncError(
      `${name} interrupted (exit code ${exitCode})`,
      "Interrupted",
    );
  }
  if (result.exitCode !== 0) {
    return new SyncError(`${name} exited with code ${exitCode}`);
  }
  return null;
}

/**
 * Validate the environment, then mirror sourceDir into backupDir.
 * A failed sync is not retried and the destination is left as the tool left it.
 */
export async function runBackup(
  config: BackupConfig,
  options: RunOptions,
  deps: BackupDeps,
): Promise<BackupOutcome> {
  const { logger } = deps;
  const runner = deps.runner ?? runRsync;
  const clock = deps.clock ?? Date.now;
  const run = new BackupRun(deps.onStateChange);

  const failed = (
    error: HomesyncError,
    invocation: SyncInvocation | null,
  ): BackupOutcome => {
    run.transition("failed");
    return { state: "failed", error, invocation };
  };

  run.transition("validating");
  const validation = await validateDependencies(config, {
    logger,
    env: deps.env,
    syncCommand: deps.syncCommand,
  });
  if (!validation.ok) {
    return failed(validation.error, null);
  }
  run.transition("ready");

  if (options.dryRun) {
    logger.warn(
      "Dry run mode enabled. Simulating backup without making changes.",
    );
  }

  logger.info(
    `Starting backup from '${config.sourceDir}' to '${config.backupDir}'.`,
  );

  const invocation = buildSyncInvocation(
    validation.value.syncCommand,
    config,
    options,
    logger.logFile,
    deps.signal,
  );

  if (options.verbose) {
    logger.debug("Verbose mode enabled.");
  }
  logger.debug(`Running: ${invocation.command} ${invocation.args.join(" ")}`);

  if (deps.signal?.aborted) {
    const name = getBaseName(invocation.command);
    return failed(
      new SyncError(`Backup interrupted before ${name} started`, "Interrupted"),
      null,
    );
  }

  run.transition("syncing");
  const startedAt = clock();

  let result: SyncRunResult;
  try {
    result = await runner(invocation);
  } catch (e) {
    return failed(
      new SyncError(`Failed to run ${invocation.command}: ${errorMessage(e)}`),
      invocation,
    );
  }

  const failure = describeFailure(
    invocation.command,
    result,
    deps.signal?.aborted ?? false,
  );
  if (failure) {
    return failed(failure, invocation);
  }

  run.transition("succeeded");
  const durationMs = clock() - startedAt;

  const elapsed = formatDuration(durationMs);
  if (options.dryRun) {
    logger.info(`Dry run simulation finished successfully in ${elapsed}.`);
  } else {
    logger.info(`Backup completed successfully in ${elapsed}.`);
  }

  return { state: "succeeded", dryRun: options.dryRun, durationMs, invocation };
}
