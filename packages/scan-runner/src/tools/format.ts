/**
 * Markdown formatting for tool output.
 */

import type { ResultRecord, TaskSnapshot, TaskState } from "../core/model.js";

/**
 * Format a task snapshot as markdown.
 */
export function formatTask(task: TaskSnapshot): string {
  const lines: string[] = [];

  lines.push(`## Scan: ${task.name} (${task.id})`);
  lines.push("");
  lines.push(`**Status:** ${formatStatus(task.state)}`);
  lines.push(`**Targets:** ${task.targetCount}  **Templates:** ${task.templateCount}`);
  lines.push(`**Results:** ${task.resultCount}`);
  lines.push(`**Lines processed:** ${task.linesProcessed}`);

  if (task.malformedLines > 0) {
    lines.push(`**Skipped lines:** ${task.malformedLines}`);
  }

  if (task.startedAt) {
    lines.push(`**Started:** ${task.startedAt}`);
    lines.push(`**${task.endedAt ? "Duration" : "Running for"}:** ${formatDuration(task.elapsedMs)}`);
  }

  if (task.exitCode !== null) {
    lines.push(`**Exit code:** ${task.exitCode}`);
  }

  if (task.lastError) {
    lines.push(`**Error:** ${task.lastError}`);
  }

  return lines.join("\n");
}

/**
 * One line per task.
 */
export function formatTaskLine(task: TaskSnapshot): string {
  const code = task.exitCode !== null ? `:${task.exitCode}` : "";
  return `[${task.state}${code}] ${task.name} (${task.id}) - ${task.resultCount} result(s), ${task.targetCount} target(s)`;
}

/**
 * Results table, newest last. Shows at most `limit` rows.
 */
export function formatResults(records: readonly ResultRecord[], limit: number): string {
  if (records.length === 0) {
    return "### Results\n\n(no results)";
  }

  const shown = records.slice(0, limit);
  const lines = [
    "### Results",
    "",
    "| Severity | Template | Target |",
    "| --- | --- | --- |",
    ...shown.map((r) => `| ${r.severity} | ${escapeCell(r.templateId)} | ${escapeCell(r.target)} |`),
  ];

  if (records.length > shown.length) {
    lines.push("");
    lines.push(`... (${records.length - shown.length} more)`);
  }

  return lines.join("\n");
}

/**
 * "critical: 1, high: 2"
 */
export function formatSummary(summary: Record<string, number>): string {
  const entries = Object.entries(summary);
  if (entries.length === 0) return "No findings";
  return entries.map(([severity, count]) => `${severity}: ${count}`).join(", ");
}

function formatStatus(state: TaskState): string {
  switch (state) {
    case "pending":
      return "⏳ Pending";
    case "running":
      return "🔄 Running";
    case "completed":
      return "✅ Completed";
    case "failed":
      return "❌ Failed";
    case "stopped":
      return "🛑 Stopped";
  }
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

/**
 * Format a duration in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600_000) {
    const mins = Math.floor(ms / 60_000);
    const secs = Math.floor((ms % 60_000) / 1000);
    return `${mins}m ${secs}s`;
  }

  const hours = Math.floor(ms / 3600_000);
  const mins = Math.floor((ms % 3600_000) / 60_000);
  return `${hours}h ${mins}m`;
}
