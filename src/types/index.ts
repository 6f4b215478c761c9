export type {
  BackupOutcome,
  BackupState,
  SyncInvocation,
  SyncRunner,
  SyncRunResult,
} from "./backup";
export type {
  BackupConfig,
  ConfigFormat,
  ConfigKey,
  RunOptions,
} from "./config";
