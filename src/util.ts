export function argsJoin(args: string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function truncateMiddle(input: string, max = 200): string {
  if (input.length <= max) return input;
  const half = Math.floor((max - 3) / 2);
  return `${input.slice(0, half)}...${input.slice(-half)}`;
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? "" : "s"}`;
}

// 3600 -> "1 hour", 90 -> "90 seconds", 120 -> "2 minutes"
export function describeSeconds(seconds: number): string {
  if (seconds >= 3600 && seconds % 3600 === 0) {
    return plural(seconds / 3600, "hour");
  }
  if (seconds >= 60 && seconds % 60 === 0) {
    return plural(seconds / 60, "minute");
  }
  return plural(seconds, "second");
}

export function formatDuration(seconds: number | undefined): string {
  if (seconds == null || !Number.isFinite(seconds)) return "-";
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const m = Math.floor(seconds / 60);
  const s = Math.round(seconds % 60);
  if (m < 60) return `${m}m ${s}s`;
  return `${Math.floor(m / 60)}h ${m % 60}m`;
}
