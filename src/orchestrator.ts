// src/orchestrator.ts
import { withBatchLock } from "./batch-lock.js";
import type { JobSpec } from "./config.js";
import { HistoryWriteError, errorMessage } from "./errors.js";
import type { JobExecutor } from "./job-runner.js";
import { NullLogger, type Logger } from "./logger.js";
import type { FailureNotifier } from "./notifier.js";
import type { RunHistory } from "./run-history.js";
import type { StatusStore } from "./status-store.js";
import type { RunResult } from "./types.js";

export interface BatchOptions {
  jobs: readonly JobSpec[];
  runner: JobExecutor;
  store: StatusStore;
  notifier?: FailureNotifier;
  history?: Pick<RunHistory, "append">;
  // when set, the whole batch runs under this exclusive lock file
  lockFile?: string;
  logger?: Logger;
  clock?: () => number;
}

export interface BatchSummary {
  success: boolean;
  startedAt: Date;
  /** Seconds. */
  duration: number;
  successful: RunResult[];
  failed: RunResult[];
  skipped: string[];
  totalRuns: number;
  persisted: boolean;
  notified: boolean;
}

/**
 * Run every enabled job once, in configuration order, one at a time.
 *
 * Results are recorded as they come in but only written after the last job:
 * status.json is persisted exactly once per batch, and the notifier is called
 * at most once with every failed job.
 */
export async function runBatch(opts: BatchOptions): Promise<BatchSummary> {
  if (opts.lockFile) {
    return withBatchLock(opts.lockFile, () => executeBatch(opts), {
      logger: opts.logger?.child("lock"),
    });
  }
  return executeBatch(opts);
}

async function executeBatch({
  jobs,
  runner,
  store,
  notifier,
  history,
  logger = new NullLogger(),
  clock = () => Date.now(),
}: BatchOptions): Promise<BatchSummary> {
  logger.info("Starting backup sync run");
  const t0 = clock();
  const startedAt = new Date(t0);
  await store.load();

  const successful: RunResult[] = [];
  const failed: RunResult[] = [];
  const skipped: string[] = [];
  const results: RunResult[] = [];

  for (const job of jobs) {
    if (!job.enabled) {
      logger.info(`Skipping disabled job: ${job.name}`);
      skipped.push(job.name);
      continue;
    }
    const result = await runner.run(job);
    store.recordRun(result);
    results.push(result);
    (result.success ? successful : failed).push(result);
  }

  store.finalizeRun(startedAt, successful.length, failed.length);
  const persisted = await store.persist();
  const totalRuns = store.document.total_runs;

  if (history) {
    try {
      history.append(totalRuns, results);
    } catch (err) {
      const failure = new HistoryWriteError(
        `Failed to append run history: ${errorMessage(err)}`,
        { batch: totalRuns },
        { cause: err },
      );
      logger.error(failure.message, { kind: failure.kind, ...failure.context });
    }
  }

  let notified = false;
  if (failed.length > 0 && notifier) {
    notified = await notifier.notifyFailures(failed);
  }

  const duration = (clock() - t0) / 1000;
  logger.info(`Backup sync completed in ${duration.toFixed(1)}s`);
  logger.info(
    `Results: ${successful.length} successful, ${failed.length} failed`,
    skipped.length ? { skipped } : undefined,
  );

  return {
    success: failed.length === 0,
    startedAt,
    duration,
    successful,
    failed,
    skipped,
    totalRuns,
    persisted,
    notified,
  };
}
