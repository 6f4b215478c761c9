/**
 * Configuration value expansion and path resolution
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BackupConfig } from "../types";
import { ConfigError, type RawConfig } from "./validator";

const NAME = "[A-Za-z_][A-Za-z0-9_]*";
const VARIABLE_PATTERN = new RegExp(`\\$(?:\\{(${NAME})\\}|(${NAME}))`, "g");

function homeDirectory(env: NodeJS.ProcessEnv): string {
  return env.HOME ?? os.homedir();
}

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references.
 * Referencing an unset variable is an error.
 */
export function expandValue(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  let expanded = value;

  if (expanded === "~" || expanded.startsWith("~/")) {
    expanded = homeDirectory(env) + expanded.slice(1);
  }

  return expanded.replace(
    VARIABLE_PATTERN,
    (_match, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? "";
      const resolved = name === "HOME" ? homeDirectory(env) : env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Config references unset variable: $${name}`);
      }
      return resolved;
    },
  );
}

/**
 * Expand values and resolve relative paths against the config file's directory
 */
export function resolvePaths(
  raw: RawConfig,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): BackupConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const resolve = (value: string): string =>
    path.resolve(configDir, expandValue(value, env));

  return Object.freeze({
    sourceDir: resolve(raw.sourceDir),
    backupDir: resolve(raw.backupDir),
    excludeFile: resolve(raw.excludeFile),
  });
}
