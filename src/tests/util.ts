import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import type { JobSpec } from "../config.js";
import { StructuredLogger, type LogEntry } from "../logger.js";
import type { RunResult } from "../types.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), `backup-mirror-${prefix}-`));
}

export async function rmTmp(dir: string | undefined): Promise<void> {
  if (dir) await fsp.rm(dir, { recursive: true, force: true });
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

// A stand-in for rsync: a /bin/sh script with the given body.
export async function writeFakeRsync(
  dir: string,
  body: string,
  name = "rsync",
): Promise<string> {
  const file = join(dir, name);
  await fsp.writeFile(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return file;
}

export function capturingLogger(): {
  logger: StructuredLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  return {
    logger: new StructuredLogger({ sink: (e) => entries.push(e) }),
    entries,
  };
}

export function mkJob(name: string, extra: Partial<JobSpec> = {}): JobSpec {
  return {
    name,
    source: `/mnt/nas/${name}/`,
    destination: `backup@archive:/srv/${name}/`,
    exclude: [],
    enabled: true,
    ...extra,
  };
}

export function mkResult(
  name: string,
  extra: Partial<RunResult> = {},
): RunResult {
  return {
    name,
    source: `/mnt/nas/${name}/`,
    destination: `backup@archive:/srv/${name}/`,
    last_run: "2026-10-19T08:00:00.000Z",
    duration: 1.5,
    success: true,
    return_code: 0,
    outcome: "succeeded",
    stats: {},
    stdout: "",
    stderr: "",
    ...extra,
  };
}

export function mkFailure(
  name: string,
  error?: string,
  extra: Partial<RunResult> = {},
): RunResult {
  return mkResult(name, {
    success: false,
    return_code: error ? -1 : 23,
    outcome: error ? "errored" : "failed",
    error,
    ...extra,
  });
}
