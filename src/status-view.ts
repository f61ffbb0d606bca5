import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { JobSpec } from "./config.js";
import type { StatusDocument } from "./types.js";
import { formatDuration, truncateMiddle } from "./util.js";

export const STATUS_HEADINGS = [
  "Job",
  "Enabled",
  "Result",
  "Last run",
  "Duration",
  "Files",
  "Transferred",
  "Error",
] as const;

// One row per configured job, then any job that only exists in status.json
// (removed from the config since it last ran).
export function statusRows(
  doc: StatusDocument,
  jobs: readonly JobSpec[],
): string[][] {
  const rows: string[][] = [];
  const seen = new Set<string>();
  const row = (name: string, enabled: string) => {
    const r = doc.jobs[name];
    if (!r) {
      return [name, enabled, "never run", "-", "-", "-", "-", ""];
    }
    const result = r.success ? "ok" : (r.outcome ?? "failed");
    return [
      name,
      enabled,
      result,
      r.last_run,
      formatDuration(r.duration),
      r.stats.total_files ?? "-",
      r.stats.transferred_size ?? "-",
      r.error ? truncateMiddle(r.error, 60) : "",
    ];
  };
  for (const job of jobs) {
    seen.add(job.name);
    rows.push(row(job.name, job.enabled ? "yes" : "no"));
  }
  for (const name of Object.keys(doc.jobs).sort()) {
    if (!seen.has(name)) rows.push(row(name, "removed"));
  }
  return rows;
}

export function renderStatusTable(
  doc: StatusDocument,
  jobs: readonly JobSpec[],
): string {
  const table = new AsciiTable3("Backup Jobs")
    .setHeading(...STATUS_HEADINGS)
    .setStyle("unicode-round");
  STATUS_HEADINGS.forEach((_, idx) => table.setAlign(idx + 1, AlignmentEnum.LEFT));
  for (const r of statusRows(doc, jobs)) {
    table.addRow(...r);
  }
  const summary = doc.last_summary
    ? `${doc.last_summary.successful} ok, ${doc.last_summary.failed} failed of ${doc.last_summary.total}`
    : "none";
  return [
    table.toString(),
    `Last run: ${doc.last_run ?? "never"}`,
    `Total runs: ${doc.total_runs}`,
    `Last batch: ${summary}`,
  ].join("\n");
}
