import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { RunOutcome, RunResult } from "./types.js";

export interface RunHistoryRow {
  name: string;
  started_at: string;
  batch: number;
  duration: number;
  success: boolean;
  return_code: number;
  outcome: RunOutcome | null;
  error: string | null;
  stats: Record<string, string>;
}

type RawRow = Omit<RunHistoryRow, "success" | "stats"> & {
  success: number;
  stats: string;
};

const PRAGMAS = ["busy_timeout = 5000", "journal_mode = WAL"];

function decodeStats(raw: string): Record<string, string> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      const out: Record<string, string> = {};
      for (const [k, v] of Object.entries(parsed)) {
        if (typeof v === "string") out[k] = v;
      }
      return out;
    }
  } catch {
    // stats column is written by append() only; tolerate hand edits
  }
  return {};
}

function fromRaw(row: RawRow): RunHistoryRow {
  return { ...row, success: row.success === 1, stats: decodeStats(row.stats) };
}

/**
 * Append-only log of every run, keyed by (job name, start time). status.json
 * only keeps the latest result per job; this keeps them all and derives the
 * latest view with SQL.
 */
export class RunHistory {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    for (const pragma of PRAGMAS) {
      try {
        this.db.pragma(pragma);
      } catch {
        // another batch holding the db may refuse journal changes; defaults are fine
      }
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        name        TEXT NOT NULL,
        started_at  TEXT NOT NULL,  -- ISO-8601, sorts chronologically
        batch       INTEGER NOT NULL,
        duration    REAL NOT NULL,
        success     INTEGER NOT NULL,
        return_code INTEGER NOT NULL,
        outcome     TEXT,
        error       TEXT,
        stats       TEXT NOT NULL DEFAULT '{}',
        PRIMARY KEY (name, started_at)
      );
      CREATE INDEX IF NOT EXISTS runs_batch_idx ON runs(batch);

      CREATE VIEW IF NOT EXISTS latest_runs AS
        SELECT r.* FROM runs r
         WHERE r.started_at = (
           SELECT MAX(started_at) FROM runs WHERE name = r.name
         );
    `);
  }

  append(batch: number, results: readonly RunResult[]): void {
    if (!results.length) return;
    // INSERT OR IGNORE: a (name, started_at) pair is only ever written once
    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO runs(name, started_at, batch, duration, success,
                                  return_code, outcome, error, stats)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const tx = this.db.transaction((rows: readonly RunResult[]) => {
      for (const r of rows) {
        insert.run(
          r.name,
          r.last_run,
          batch,
          r.duration,
          r.success ? 1 : 0,
          r.return_code,
          r.outcome ?? null,
          r.error ?? null,
          JSON.stringify(r.stats),
        );
      }
    });
    tx(results);
  }

  latest(): RunHistoryRow[] {
    const rows = this.db
      .prepare<[], RawRow>(
        `SELECT name, started_at, batch, duration, success, return_code,
                outcome, error, stats
           FROM latest_runs ORDER BY name`,
      )
      .all();
    return rows.map(fromRaw);
  }

  forJob(name: string, limit = 50): RunHistoryRow[] {
    const rows = this.db
      .prepare<[string, number], RawRow>(
        `SELECT name, started_at, batch, duration, success, return_code,
                outcome, error, stats
           FROM runs WHERE name = ?
          ORDER BY started_at DESC
          LIMIT ?`,
      )
      .all(name, limit);
    return rows.map(fromRaw);
  }

  close(): void {
    this.db.close();
  }
}
