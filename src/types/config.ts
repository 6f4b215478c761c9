/**
 * Configuration type definitions for homesync
 */

export interface BackupConfig {
  /** Directory whose contents are mirrored */
  readonly sourceDir: string;
  /** Mirror destination, created when absent */
  readonly backupDir: string;
  /** rsync exclude-from file, one pattern per line */
  readonly excludeFile: string;
}

export type ConfigKey = keyof BackupConfig;

export type ConfigFormat = "conf" | "yaml" | "json";

export interface RunOptions {
  readonly verbose: boolean;
  readonly dryRun: boolean;
}
