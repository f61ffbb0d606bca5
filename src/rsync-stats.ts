// Summary counters printed by `rsync --stats`.

export type RsyncStats = Record<string, string>;

const STAT_LABELS: ReadonlyArray<readonly [label: string, key: string]> = [
  ["Number of files:", "total_files"],
  ["Number of created files:", "created_files"],
  ["Number of deleted files:", "deleted_files"],
  ["Total transferred file size:", "transferred_size"],
  ["Total file size:", "total_size"],
];

/**
 * Extract the recognized `--stats` lines from rsync's stdout.
 *
 * Values are kept exactly as rsync formatted them ("4,096 bytes",
 * "120 (reg: 100, dir: 20)"); callers that want numbers parse them
 * themselves. Labels that never appear are absent from the result.
 */
export function parseRsyncStats(output: string): RsyncStats {
  const stats: RsyncStats = {};
  if (!output) return stats;
  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trimStart();
    if (!line) continue;
    for (const [label, key] of STAT_LABELS) {
      if (!line.startsWith(label)) continue;
      stats[key] = line.slice(line.indexOf(":") + 1).trim();
      break;
    }
  }
  return stats;
}
