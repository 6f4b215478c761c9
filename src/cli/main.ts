/**
 * Command flow: arguments, configuration, session log, backup
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { findAndLoadConfig, HOME_ENV_VAR } from "../config";
import { runBackup } from "../core";
import type { SyncRunner } from "../types";
import { createLogger, HomesyncError, openSessionLog } from "../utils";
import { parseCliArgs } from "./args";
import { fatal, printUsage } from "./ui";

export interface RunContext {
  /** Directory holding the config file; session logs are written here too */
  appDir: string;
  scriptName: string;
  env: NodeJS.ProcessEnv;
  startedAt: Date;
  color?: boolean;
  runner?: SyncRunner;
  syncCommand?: string;
  signal?: AbortSignal;
}

/**
 * `HOMESYNC_HOME` when set, else the directory holding the real path of the
 * running script, else the working directory.
 */
export function resolveAppDir(
  scriptPath: string | undefined,
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): string {
  const override = env[HOME_ENV_VAR];
  if (override) {
    return path.resolve(cwd, override);
  }
  return scriptPath ? path.dirname(fs.realpathSync(scriptPath)) : cwd;
}

/**
 * Run one backup and return the process exit code. Every failure surfaces
 * here; nothing below this function exits the process.
 */
export async function main(
  argv: readonly string[],
  context: RunContext,
): Promise<number> {
  const { scriptName } = context;
  const parsed = parseCliArgs(argv);

  if (parsed.ok && parsed.value.help) {
    printUsage(scriptName);
    return 0;
  }

  const loaded = await findAndLoadConfig(context.appDir, context.env);
  if (!loaded.ok) {
    fatal(loaded.error.message, context.color);
    return loaded.error.exitCode;
  }

  let logFile: string;
  try {
    logFile = openSessionLog(context.appDir, scriptName, context.startedAt);
  } catch (e) {
    if (e instanceof HomesyncError) {
      fatal(e.message, context.color);
      return e.exitCode;
    }
    throw e;
  }

  const logger = createLogger({ logFile, color: context.color });

  if (!parsed.ok) {
    logger.error(parsed.error.message);
    return parsed.error.exitCode;
  }
  const { options } = parsed.value;

  logger.info(`'${scriptName}' started.`);
  logger.debug(`Using configuration: ${loaded.value.configPath}`);

  const outcome = await runBackup(loaded.value.config, options, {
    logger,
    runner: context.runner,
    env: context.env,
    syncCommand: context.syncCommand,
    signal: context.signal,
  });

  if (outcome.state === "failed") {
    logger.error(outcome.error.message);
    return outcome.error.exitCode;
  }

  logger.info(`'${scriptName}' finished.`);
  return 0;
}
