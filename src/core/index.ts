/**
 * Core module exports
 */

// Backup
export {
  BASE_RSYNC_OPTIONS,
  type BackupDeps,
  BackupRun,
  buildRsyncArgs,
  buildSyncInvocation,
  DRY_RUN_OPTION,
  runBackup,
  runRsync,
  VERBOSE_RSYNC_OPTIONS,
} from "./backup";

// Dependencies
export {
  type DependencyCheckOptions,
  type ValidatedEnvironment,
  validateDependencies,
} from "./dependencies";
