export {
  BatchLock,
  LOCK_STALE_AFTER_MS,
  withBatchLock,
  type BatchLockOptions,
} from "./batch-lock.js";
export {
  DEFAULT_SETTINGS,
  configFileSchema,
  loadConfig,
  parseConfig,
  type JobSpec,
  type MirrorConfig,
  type MirrorSettings,
  type NotificationSettings,
} from "./config.js";
export * from "./errors.js";
export {
  JOB_TIMEOUT_SECONDS,
  JobRunner,
  buildRsyncArgs,
  supervise,
  type JobExecutor,
  type JobRunnerOptions,
} from "./job-runner.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  createFileSink,
  createLogger,
  formatLogLine,
  parseLogLevel,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./logger.js";
export {
  Notifier,
  composeFailureMessage,
  missingSmtpFields,
  type FailureNotifier,
  type MailTransport,
  type TransportFactory,
} from "./notifier.js";
export {
  runBatch,
  type BatchOptions,
  type BatchSummary,
} from "./orchestrator.js";
export {
  DEFAULT_RSYNC_OPTIONS,
  RSYNC_OPTIONS,
  rsyncOptionArgs,
  type RsyncOption,
  type RsyncOptionsSpec,
} from "./rsync-options.js";
export { parseRsyncStats, type RsyncStats } from "./rsync-stats.js";
export { RunHistory, type RunHistoryRow } from "./run-history.js";
export { StatusStore, serializeStatus } from "./status-store.js";
export { renderStatusTable, statusRows } from "./status-view.js";
export * from "./types.js";
