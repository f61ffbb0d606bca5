// src/job-runner.ts
import { spawn } from "node:child_process";
import type { JobSpec, MirrorSettings } from "./config.js";
import { DEFAULT_SETTINGS } from "./config.js";
import {
  JobExecutionError,
  JobTimeoutError,
  errorMessage,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  excludeArgs,
  rsyncOptionArgs,
  sshTransportArgs,
} from "./rsync-options.js";
import { parseRsyncStats } from "./rsync-stats.js";
import type { RunResult } from "./types.js";
import { argsJoin, describeSeconds, truncateMiddle } from "./util.js";

export const JOB_TIMEOUT_SECONDS = 3600;

export interface JobExecutor {
  run(job: JobSpec): Promise<RunResult>;
}

export interface JobRunnerOptions {
  settings?: MirrorSettings;
  logger?: Logger;
  timeoutSeconds?: number;
  clock?: () => number;
}

type ChildOutcome = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

export function buildRsyncArgs(
  job: JobSpec,
  settings: MirrorSettings = DEFAULT_SETTINGS,
): string[] {
  return [
    ...sshTransportArgs(settings.sshKey),
    ...rsyncOptionArgs(settings.rsyncOptions),
    ...excludeArgs(job.exclude),
    job.source,
    job.destination,
  ];
}

// Run cmd to completion with captured output. Rejects with JobTimeoutError
// once timeoutMs elapses (the child is SIGKILLed) or JobExecutionError when
// the child cannot be started.
export function supervise(
  cmd: string,
  args: string[],
  timeoutMs: number,
): Promise<ChildOutcome> {
  return new Promise((resolve, reject) => {
    let settled = false;
    let stdout = "";
    let stderr = "";

    const child = (() => {
      try {
        return spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
      } catch (err) {
        reject(
          new JobExecutionError(errorMessage(err), { cmd }, { cause: err }),
        );
        return undefined;
      }
    })();
    if (!child) return;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      reject(
        new JobTimeoutError(
          `Timeout after ${describeSeconds(timeoutMs / 1000)}`,
          timeoutMs / 1000,
          { cmd },
        ),
      );
    }, timeoutMs);

    child.stdout.setEncoding("utf8").on("data", (s: string) => (stdout += s));
    child.stderr.setEncoding("utf8").on("data", (s: string) => (stderr += s));

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new JobExecutionError(err.message, { cmd }, { cause: err }));
    });

    // "close" rather than "exit": both pipes are drained by then
    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ code, signal, stdout, stderr });
    });
  });
}

/**
 * Runs one job through rsync and turns whatever happens into a RunResult.
 * `run` never throws: timeouts and spawn failures are recorded on the result
 * with `return_code: -1`.
 */
export class JobRunner implements JobExecutor {
  private readonly settings: MirrorSettings;
  private readonly logger: Logger;
  private readonly timeoutSeconds: number;
  private readonly clock: () => number;

  constructor({
    settings,
    logger,
    timeoutSeconds,
    clock,
  }: JobRunnerOptions = {}) {
    this.settings = settings ?? DEFAULT_SETTINGS;
    this.logger = logger ?? new NullLogger();
    this.timeoutSeconds = timeoutSeconds ?? JOB_TIMEOUT_SECONDS;
    this.clock = clock ?? (() => Date.now());
  }

  async run(job: JobSpec): Promise<RunResult> {
    const { name, source, destination } = job;
    const cmd = this.settings.rsyncPath;
    const args = buildRsyncArgs(job, this.settings);
    this.logger.info(`Starting sync for ${name}: ${cmd} ${argsJoin(args)}`);

    const start = this.clock();
    const base = {
      name,
      source,
      destination,
      last_run: new Date(start).toISOString(),
    };

    try {
      const res = await supervise(cmd, args, this.timeoutSeconds * 1000);
      const duration = (this.clock() - start) / 1000;
      const returnCode = res.code ?? -1;
      const success = returnCode === 0;
      const result: RunResult = {
        ...base,
        duration,
        success,
        return_code: returnCode,
        outcome: success ? "succeeded" : "failed",
        stats: parseRsyncStats(res.stdout),
        stdout: res.stdout,
        stderr: res.stderr,
      };
      if (res.signal) {
        result.error = `Terminated by ${res.signal}`;
      }
      if (success) {
        this.logger.info(
          `✓ ${name} completed successfully in ${duration.toFixed(1)}s`,
        );
      } else {
        this.logger.error(`✗ ${name} failed with return code ${returnCode}`, {
          stderr: truncateMiddle(res.stderr, 400),
          ...(res.signal ? { signal: res.signal } : {}),
        });
      }
      return Object.freeze(result);
    } catch (err) {
      if (err instanceof JobTimeoutError) {
        this.logger.error(`✗ ${name} timed out: ${err.message}`);
        return Object.freeze({
          ...base,
          duration: err.timeoutSeconds,
          success: false,
          return_code: -1,
          outcome: "timed_out" as const,
          error: err.message,
          stats: {},
          stdout: "",
          stderr: "Process timed out",
        });
      }
      // duration stays 0: the failure happened before rsync did any work
      const message = errorMessage(err);
      this.logger.error(`✗ ${name} failed with exception: ${message}`);
      return Object.freeze({
        ...base,
        duration: 0,
        success: false,
        return_code: -1,
        outcome: "errored" as const,
        error: message,
        stats: {},
        stdout: "",
        stderr: message,
      });
    }
  }
}
