/**
 * Configuration file names and key mappings
 */

import type { ConfigKey } from "../types";

export const APP_NAME = "homesync";

/**
 * Overrides the directory searched for the config file and used for
 * session logs
 */
export const HOME_ENV_VAR = "HOMESYNC_HOME";

export const SYNC_COMMAND = "rsync";

/** Searched in order; the first existing file wins */
export const CONFIG_FILE_NAMES = [
  `${APP_NAME}.conf`,
  `${APP_NAME}.config.yaml`,
  `${APP_NAME}.config.yml`,
  `${APP_NAME}.config.json`,
] as const;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "sourceDir",
  "backupDir",
  "excludeFile",
];

/** `.conf` files use environment-style `KEY=value` names */
export const CONF_FILE_KEYS: Readonly<Record<string, ConfigKey>> = {
  SOURCE_DIR: "sourceDir",
  BACKUP_DIR: "backupDir",
  EXCLUDE_FILE: "excludeFile",
};
