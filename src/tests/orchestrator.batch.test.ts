import fsp from "node:fs/promises";
import { join } from "node:path";
import { BatchLock } from "../batch-lock.js";
import type { JobSpec } from "../config.js";
import { BatchLockedError } from "../errors.js";
import type { JobExecutor } from "../job-runner.js";
import type { FailureNotifier } from "../notifier.js";
import { runBatch } from "../orchestrator.js";
import { StatusStore } from "../status-store.js";
import type { RunResult } from "../types.js";
import {
  capturingLogger,
  fileExists,
  mkFailure,
  mkJob,
  mkResult,
  mkTmp,
  rmTmp,
} from "./util";

// Runs jobs from a table of canned results and records the call order.
class ScriptedRunner implements JobExecutor {
  readonly calls: string[] = [];
  private active = 0;
  maxActive = 0;

  constructor(private readonly outcomes: Record<string, RunResult>) {}

  async run(job: JobSpec): Promise<RunResult> {
    this.calls.push(job.name);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((r) => setImmediate(r));
    this.active -= 1;
    return this.outcomes[job.name] ?? mkResult(job.name);
  }
}

function mockNotifier() {
  const notifyFailures = jest.fn<Promise<boolean>, [readonly RunResult[]]>();
  notifyFailures.mockResolvedValue(true);
  const notifier: FailureNotifier = { notifyFailures };
  return { notifier, notifyFailures };
}

describe("runBatch", () => {
  let tmp: string;
  let statusFile: string;

  beforeEach(async () => {
    tmp = await mkTmp("batch");
    statusFile = join(tmp, "status.json");
  });

  afterEach(async () => {
    await rmTmp(tmp);
  });

  it("runs enabled jobs sequentially in configuration order", async () => {
    const runner = new ScriptedRunner({});
    const jobs = [
      mkJob("c"),
      mkJob("a"),
      mkJob("off", { enabled: false }),
      mkJob("b"),
    ];
    const summary = await runBatch({
      jobs,
      runner,
      store: new StatusStore(statusFile),
    });
    expect(runner.calls).toEqual(["c", "a", "b"]);
    expect(runner.maxActive).toBe(1);
    expect(summary.success).toBe(true);
    expect(summary.skipped).toEqual(["off"]);
  });

  it("excludes disabled jobs from counts, status and notification", async () => {
    const runner = new ScriptedRunner({
      photos: mkFailure("photos", "boom"),
      off: mkFailure("off", "never"),
    });
    const { notifier, notifyFailures } = mockNotifier();
    const store = new StatusStore(statusFile);
    const summary = await runBatch({
      jobs: [mkJob("photos"), mkJob("music"), mkJob("off", { enabled: false })],
      runner,
      store,
      notifier,
    });

    expect(summary.success).toBe(false);
    expect(summary.successful.map((r) => r.name)).toEqual(["music"]);
    expect(summary.failed.map((r) => r.name)).toEqual(["photos"]);
    expect(Object.keys(store.document.jobs).sort()).toEqual([
      "music",
      "photos",
    ]);
    expect(store.document.last_summary).toEqual({
      successful: 1,
      failed: 1,
      total: 2,
    });
    expect(notifyFailures).toHaveBeenCalledTimes(1);
    expect(notifyFailures).toHaveBeenCalledWith([
      mkFailure("photos", "boom"),
    ]);
    expect(summary.notified).toBe(true);
  });

  it("does not notify when every job succeeds", async () => {
    const { notifier, notifyFailures } = mockNotifier();
    const summary = await runBatch({
      jobs: [mkJob("photos")],
      runner: new ScriptedRunner({}),
      store: new StatusStore(statusFile),
      notifier,
    });
    expect(summary.success).toBe(true);
    expect(summary.notified).toBe(false);
    expect(notifyFailures).not.toHaveBeenCalled();
  });

  it("persists exactly once, after the last job", async () => {
    const store = new StatusStore(statusFile);
    const persist = jest.spyOn(store, "persist");
    const runner = new ScriptedRunner({});
    const run = jest.spyOn(runner, "run");
    await runBatch({ jobs: [mkJob("a"), mkJob("b")], runner, store });

    expect(persist).toHaveBeenCalledTimes(1);
    expect(persist.mock.invocationCallOrder[0]).toBeGreaterThan(
      run.mock.invocationCallOrder[1],
    );
    const onDisk = JSON.parse(await fsp.readFile(statusFile, "utf8"));
    expect(Object.keys(onDisk.jobs)).toEqual(["a", "b"]);
  });

  it("counts one run per batch across invocations", async () => {
    for (let i = 0; i < 3; i++) {
      await runBatch({
        jobs: [mkJob("photos")],
        runner: new ScriptedRunner({}),
        store: new StatusStore(statusFile),
      });
    }
    const doc = await new StatusStore(statusFile).load();
    expect(doc.total_runs).toBe(3);
  });

  it("records the batch start time", async () => {
    const store = new StatusStore(statusFile);
    const summary = await runBatch({
      jobs: [mkJob("photos")],
      runner: new ScriptedRunner({}),
      store,
      clock: () => Date.parse("2026-10-19T08:00:00.000Z"),
    });
    expect(store.document.last_run).toBe("2026-10-19T08:00:00.000Z");
    expect(summary.duration).toBe(0);
  });

  it("appends results to the history in order, tagged with the batch number", async () => {
    const append = jest.fn();
    await runBatch({
      jobs: [mkJob("b"), mkJob("a")],
      runner: new ScriptedRunner({ a: mkFailure("a", "boom") }),
      store: new StatusStore(statusFile),
      history: { append },
    });
    expect(append).toHaveBeenCalledWith(1, [
      mkResult("b"),
      mkFailure("a", "boom"),
    ]);
  });

  it("keeps going when the history cannot be written", async () => {
    const { logger, entries } = capturingLogger();
    const summary = await runBatch({
      jobs: [mkJob("photos")],
      runner: new ScriptedRunner({}),
      store: new StatusStore(statusFile),
      history: {
        append: () => {
          throw new Error("database is locked");
        },
      },
      logger,
    });
    expect(summary.success).toBe(true);
    expect(summary.persisted).toBe(true);
    const errors = entries.filter((e) => e.level === "error");
    expect(errors.map((e) => e.message)).toEqual([
      "Failed to append run history: database is locked",
    ]);
  });

  it("does not start while another batch holds the lock", async () => {
    const lockFile = `${statusFile}.lock`;
    const held = await BatchLock.acquire(lockFile);
    const runner = new ScriptedRunner({});
    try {
      await expect(
        runBatch({
          jobs: [mkJob("photos")],
          runner,
          store: new StatusStore(statusFile),
          lockFile,
        }),
      ).rejects.toBeInstanceOf(BatchLockedError);
    } finally {
      await held.release();
    }
    expect(runner.calls).toEqual([]);
    expect(await fileExists(statusFile)).toBe(false);
  });

  it("releases the lock after the batch", async () => {
    const lockFile = `${statusFile}.lock`;
    await runBatch({
      jobs: [mkJob("photos")],
      runner: new ScriptedRunner({}),
      store: new StatusStore(statusFile),
      lockFile,
    });
    expect(await fileExists(lockFile)).toBe(false);
    expect(await fileExists(statusFile)).toBe(true);
  });
});
