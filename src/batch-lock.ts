// src/batch-lock.ts
//
// At most one batch at a time: an external timer can fire again while a slow
// batch is still running, and two batches would race on status.json.

import { link, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { BatchLockedError, errorCode, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

// A lock file without a readable pid is only treated as abandoned once it is
// this old.
export const LOCK_STALE_AFTER_MS = 10_000;

export interface BatchLockOptions {
  logger?: Logger;
  staleAfterMs?: number;
}

function isPidAlive(pid: number): boolean {
  if (!pid) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive but owned by someone else
    return errorCode(err) === "EPERM";
  }
}

async function readHolderPid(lockFile: string): Promise<number | null> {
  try {
    const raw = (await readFile(lockFile, "utf8")).trim();
    if (!raw) return null;
    const pid = Number(raw);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

async function lockAgeMs(lockFile: string): Promise<number> {
  try {
    return Date.now() - (await stat(lockFile)).mtimeMs;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return Number.POSITIVE_INFINITY;
    throw err;
  }
}

export class BatchLock {
  private released = false;

  private constructor(
    public readonly file: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Write our pid to a private file and hard-link it into place, so the lock
   * file never exists without a pid. A lock left behind by a dead process is
   * removed and acquisition retried once.
   */
  static async acquire(
    lockFile: string,
    {
      logger = new NullLogger(),
      staleAfterMs = LOCK_STALE_AFTER_MS,
    }: BatchLockOptions = {},
  ): Promise<BatchLock> {
    await mkdir(path.dirname(lockFile), { recursive: true });
    const pidFile = `${lockFile}.${process.pid}.tmp`;
    await writeFile(pidFile, `${process.pid}\n`);
    try {
      for (let attempt = 0; ; attempt += 1) {
        try {
          await link(pidFile, lockFile);
          logger.debug("batch lock acquired", { file: lockFile });
          return new BatchLock(lockFile, logger);
        } catch (err) {
          if (errorCode(err) !== "EEXIST") throw err;
          await BatchLock.checkHolder(lockFile, attempt, staleAfterMs, logger);
        }
      }
    } finally {
      await rm(pidFile, { force: true });
    }
  }

  // Throws BatchLockedError unless the existing lock is abandoned, in which
  // case it is removed.
  private static async checkHolder(
    lockFile: string,
    attempt: number,
    staleAfterMs: number,
    logger: Logger,
  ): Promise<void> {
    const holder = await readHolderPid(lockFile);
    if (holder != null && isPidAlive(holder)) {
      throw new BatchLockedError(
        `another batch is already running (pid ${holder})`,
        holder,
        { file: lockFile },
      );
    }
    if (holder == null && (await lockAgeMs(lockFile)) < staleAfterMs) {
      // being written by a holder that has not recorded its pid yet
      throw new BatchLockedError(
        `lock ${lockFile} is held by a batch that has not written its pid`,
        0,
        { file: lockFile },
      );
    }
    if (attempt > 0) {
      throw new BatchLockedError(
        `could not take over stale lock ${lockFile}`,
        holder ?? 0,
        { file: lockFile },
      );
    }
    logger.warn("removing stale batch lock", {
      file: lockFile,
      pid: holder,
    });
    await rm(lockFile, { force: true });
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      await rm(this.file, { force: true });
      this.logger.debug("batch lock released", { file: this.file });
    } catch (err) {
      this.logger.error("failed to release batch lock", {
        file: this.file,
        error: errorMessage(err),
      });
    }
  }
}

/** Run fn while holding the lock; the lock is released however fn exits. */
export async function withBatchLock<T>(
  lockFile: string,
  fn: () => Promise<T>,
  opts: BatchLockOptions = {},
): Promise<T> {
  const lock = await BatchLock.acquire(lockFile, opts);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
