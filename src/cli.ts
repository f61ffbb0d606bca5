#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { loadConfig, type JobSpec, type MirrorConfig } from "./config.js";
import {
  BatchLockedError,
  HistoryWriteError,
  MirrorError,
  errorMessage,
} from "./errors.js";
import { JobRunner } from "./job-runner.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  createLogger,
  type Logger,
} from "./logger.js";
import { Notifier } from "./notifier.js";
import { runBatch } from "./orchestrator.js";
import { RunHistory } from "./run-history.js";
import { StatusStore, serializeStatus } from "./status-store.js";
import { renderStatusTable } from "./status-view.js";

export const CLI_NAME = "backup-mirror";

export interface RunCommandOptions {
  config: string;
  status: string;
  logDir: string;
  logLevel: string;
  history?: string;
  lock?: string;
}

export interface StatusCommandOptions {
  config: string;
  status: string;
  json: boolean;
}

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // running from an unusual layout; the version is cosmetic
  }
  return "0.0.0";
}

// The batch runs without history when the database cannot be opened.
function openHistory(file: string, logger: Logger): RunHistory | undefined {
  try {
    return new RunHistory(file);
  } catch (err) {
    const failure = new HistoryWriteError(
      `Failed to open run history: ${errorMessage(err)}`,
      { file },
      { cause: err },
    );
    logger.error(failure.message, { kind: failure.kind, ...failure.context });
    return undefined;
  }
}

/** Exit status: 0 when every enabled job succeeded, 1 otherwise. */
export async function runCommand(
  opts: RunCommandOptions,
  logger: Logger = createLogger({ level: opts.logLevel, logDir: opts.logDir }),
): Promise<number> {
  let config: MirrorConfig;
  try {
    config = await loadConfig(opts.config);
    logger.info(`Configuration loaded from ${opts.config}`);
  } catch (err) {
    logger.error(`Failed to load configuration: ${errorMessage(err)}`);
    return 1;
  }

  const { settings } = config;
  const history = opts.history
    ? openHistory(opts.history, logger.child("history"))
    : undefined;
  try {
    const summary = await runBatch({
      jobs: config.jobs,
      runner: new JobRunner({ settings, logger: logger.child("runner") }),
      store: new StatusStore(opts.status, { logger: logger.child("status") }),
      notifier: new Notifier(settings.notification, {
        logger: logger.child("notify"),
      }),
      history,
      lockFile: opts.lock ?? `${opts.status}.lock`,
      logger: logger.child("batch"),
    });
    return summary.success ? 0 : 1;
  } catch (err) {
    if (err instanceof BatchLockedError) {
      logger.error(`Batch not started: ${err.message}`, err.context);
      return 1;
    }
    throw err;
  } finally {
    history?.close();
  }
}

export async function statusCommand(
  opts: StatusCommandOptions,
  logger: Logger = new ConsoleLogger("warn"),
  print: (text: string) => void = (text) => console.log(text),
): Promise<number> {
  const doc = await new StatusStore(opts.status, { logger }).load();
  if (opts.json) {
    print(serializeStatus(doc).trimEnd());
    return 0;
  }
  let jobs: JobSpec[] = [];
  try {
    jobs = (await loadConfig(opts.config)).jobs;
  } catch (err) {
    logger.warn(`showing recorded jobs only: ${errorMessage(err)}`);
  }
  print(renderStatusTable(doc, jobs));
  return 0;
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Scheduled one-way rsync mirroring with status tracking")
    .version(packageVersion());

  program
    .command("run", { isDefault: true })
    .description("run every enabled job once and record the results")
    .option("--config <file>", "job configuration", "config.json")
    .option("--status <file>", "status document", "status.json")
    .option("--log-dir <dir>", "directory for daily log files", "logs")
    .option("--history <file>", "SQLite database keeping every run")
    .option("--lock <file>", "batch lock file (default: <status>.lock)")
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .action(async (opts: RunCommandOptions) => {
      process.exitCode = await runCommand(opts);
    });

  program
    .command("status")
    .description("show the last recorded result of every job")
    .option("--config <file>", "job configuration", "config.json")
    .option("--status <file>", "status document", "status.json")
    .option("--json", "print the raw status document", false)
    .action(async (opts: StatusCommandOptions) => {
      process.exitCode = await statusCommand(opts);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      const label = err instanceof MirrorError ? err.kind : "fatal";
      console.error(
        `${CLI_NAME} ${label}:`,
        err instanceof Error ? (err.stack ?? err.message) : err,
      );
      process.exit(1);
    });
}
