/**
 * Configuration validation
 */

import type { ConfigKey } from "../types";
import { ConfigError } from "../utils/errors";
import { CONFIG_KEYS } from "./defaults";

export { ConfigError };

export type RawConfig = Record<ConfigKey, string>;

type Validator = (config: Record<string, unknown>) => string;

function requiredPath(key: ConfigKey): Validator {
  return (c) => {
    const value = c[key];
    if (value === undefined) {
      throw new ConfigError(`Config must set '${key}'`);
    }
    if (typeof value !== "string") {
      throw new ConfigError(`${key} must be a string`);
    }
    if (value.trim().length === 0) {
      throw new ConfigError(`${key} must not be empty`);
    }
    return value;
  };
}

const validators: Record<ConfigKey, Validator> = {
  sourceDir: requiredPath("sourceDir"),
  backupDir: requiredPath("backupDir"),
  excludeFile: requiredPath("excludeFile"),
};

function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Validate a parsed config object. Unknown keys are rejected.
 */
export function validateConfig(config: unknown): RawConfig {
  if (!config || typeof config !== "object" || Array.isArray(config)) {
    throw new ConfigError("Config must be a mapping of keys to values");
  }

  const record = config as Record<string, unknown>;

  for (const key of Object.keys(record)) {
    if (!isConfigKey(key)) {
      throw new ConfigError(
        `Unknown config key: '${key}'. ` +
          `Expected one of: ${CONFIG_KEYS.join(", ")}`,
      );
    }
  }

  return {
    sourceDir: validators.sourceDir(record),
    backupDir: validators.backupDir(record),
    excludeFile: validators.excludeFile(record),
  };
}
