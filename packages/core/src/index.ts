export { defineConfig, resolveSafekeepConfig } from "./config.js";
export type { SafekeepConfig, ResolvedSafekeepConfig } from "./config.js";
export {
  createLogger,
  createMemoryLogSink,
  formatLogRecord,
  isDebugEnabled,
  resolveLogLevel,
  stderrSink
} from "./logging.js";
export type { LogLevel, LogRecord, LogSink, Logger, LoggerOptions } from "./logging.js";
export { createSafekeep, SafekeepRuntime } from "./runtime.js";
export type { SafekeepRuntimeParams } from "./runtime.js";
export { createStaticSettings, readWatchSettings } from "./settings.js";
export type { SettingsProvider, WatchSettingsKeys } from "./settings.js";
export { DEFAULT_MAX_AGE_DAYS, DEFAULT_SETTINGS_KEYS, DEFAULT_STORE_DIRECTORY_NAME } from "./store/constants.js";
export { listStoredSessions, readStoredSnapshot } from "./store/listing.js";
export {
  createSessionId,
  defaultStoreRoot,
  expandHome,
  parseSessionId,
  sessionDirectoryPath,
  snapshotFileName,
  snapshotFilePath
} from "./store/paths.js";
export { sweepOldSessions } from "./store/sweep.js";
export type { SweepParams } from "./store/sweep.js";
export { SnapshotStoreError } from "./store/types.js";
export type {
  SnapshotStoreErrorCode,
  StoredSession,
  StoredSnapshotFile,
  SweepFailure,
  SweepResult
} from "./store/types.js";
export { toErrorText } from "./store/utils.js";
export { createTimerScheduler } from "./watcher/scheduler.js";
export { transitionWatcherState } from "./watcher/state.js";
export { DocumentWatcher } from "./watcher/watcher.js";
export type { DocumentWatcherParams } from "./watcher/watcher.js";
export type {
  CancelToken,
  SavedHandler,
  Scheduler,
  TickOutcome,
  WatchSettings,
  WatchedDocument,
  WatcherEvent,
  WatcherState,
  WatcherStatus
} from "./watcher/types.js";
