import type { ResultRecord } from "./model.js";

/**
 * Count records per reported severity, most severe first.
 */
export function summarizeBySeverity(records: readonly ResultRecord[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.severity, (counts.get(record.severity) ?? 0) + 1);
  }

  const ordered = [...counts.entries()].sort(
    ([a], [b]) => severityRank(b) - severityRank(a) || a.localeCompare(b)
  );
  return Object.fromEntries(ordered);
}

function severityRank(severity: string): number {
  switch (severity) {
    case "critical":
      return 5;
    case "high":
      return 4;
    case "medium":
      return 3;
    case "low":
      return 2;
    case "info":
      return 1;
    default:
      return 0;
  }
}
