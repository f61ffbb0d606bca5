// src/rsync-options.ts

export const DEFAULT_RSYNC_OPTIONS = "-avz --delete --stats";

// Recognized option names and the single rsync flag each one maps to.
export const RSYNC_OPTIONS = [
  "archive",
  "verbose",
  "compress",
  "delete",
  "delete-excluded",
  "stats",
  "checksum",
  "partial",
  "hard-links",
  "numeric-ids",
  "acls",
  "xattrs",
  "human-readable",
  "dry-run",
] as const;

export type RsyncOption = (typeof RSYNC_OPTIONS)[number];

// Either the legacy whitespace-separated string or a list of option names.
export type RsyncOptionsSpec = string | readonly RsyncOption[];

export function rsyncOptionFlag(option: RsyncOption): string {
  return `--${option}`;
}

// Translate the configured options into rsync CLI args.
export function rsyncOptionArgs(
  spec: RsyncOptionsSpec = DEFAULT_RSYNC_OPTIONS,
): string[] {
  if (typeof spec === "string") {
    // no quoting support: "--exclude 'a b'" is not one token
    return spec.split(/\s+/).filter(Boolean);
  }
  return Array.from(new Set(spec)).map(rsyncOptionFlag);
}

function quoteIfNeeded(s: string): string {
  return /\s/.test(s) ? `'${s.replace(/'/g, `'\\''`)}'` : s;
}

// The remote shell rsync uses for host:path endpoints. Host key checking is
// disabled since the job runs unattended.
export function remoteShellCommand(sshKey?: string): string {
  const pieces = ["ssh"];
  if (sshKey) {
    pieces.push("-i", quoteIfNeeded(sshKey));
  }
  pieces.push("-o", "StrictHostKeyChecking=no");
  return pieces.join(" ");
}

export function sshTransportArgs(sshKey?: string): string[] {
  return ["-e", remoteShellCommand(sshKey)];
}

export function excludeArgs(patterns: readonly string[]): string[] {
  return patterns.flatMap((pattern) => ["--exclude", pattern]);
}
