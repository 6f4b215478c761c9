/**
 * Backup module exports
 */

export { type BackupDeps, BackupRun, runBackup } from "./orchestrator";
export {
  BASE_RSYNC_OPTIONS,
  buildRsyncArgs,
  buildSyncInvocation,
  DRY_RUN_OPTION,
  runRsync,
  VERBOSE_RSYNC_OPTIONS,
} from "./rsync";
