/**
 * Plain-text run summary. The CLI colours it; the engine only decides what
 * goes in it.
 */

import { RunResult } from "./types";

function describeUndone(result: RunResult): string[] {
  const report = result.rollback;
  if (!report) return [];
  const lines: string[] = [];
  const undone = report.items.filter((i) => i.outcome !== "failed");
  if (undone.length === 0) {
    lines.push("Nothing needed to be undone.");
  } else {
    lines.push(`Undone (${undone.length}):`);
    for (const item of undone) {
      const what =
        item.entry.kind === "CONFIG_BACKUP"
          ? `restored ${item.entry.original_path ?? item.entry.path}`
          : `removed ${item.entry.path}`;
      lines.push(`  - ${what}${item.outcome === "already_absent" ? " (already gone)" : ""}`);
    }
  }
  return lines;
}

export function formatRunSummary(result: RunResult): string {
  const lines: string[] = [];
  const completed = result.results.filter((r) => r.status === "SUCCESS" || r.status === "SOFT_FAILURE");
  const skipped = result.results.filter((r) => r.status === "SKIPPED");

  if (result.status === "COMPLETED") {
    lines.push(result.dry_run ? "Dry run completed. No changes were made." : "Setup completed.");
  } else {
    lines.push(`Setup aborted in phase "${result.failed_phase ?? "unknown"}".`);
    if (result.error) lines.push(`Error (${result.error.category}): ${result.error.message}`);
  }

  lines.push("");
  lines.push(`Completed phases (${completed.length}):`);
  for (const r of completed) {
    lines.push(`  ✓ ${r.phase}${r.status === "SOFT_FAILURE" ? " (with errors)" : ""}`);
  }
  if (skipped.length > 0) {
    lines.push(`Skipped phases (${skipped.length}):`);
    for (const r of skipped) lines.push(`  - ${r.phase}: ${r.skip_reason ?? "skipped"}`);
  }

  if (result.status === "ABORTED") {
    lines.push("");
    lines.push(...describeUndone(result));
  }

  if (result.leftovers.length > 0) {
    lines.push("");
    lines.push("Remove these manually:");
    for (const entry of result.leftovers) lines.push(`  - ${entry.path}`);
  }

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push(`Warnings (${result.warnings.length}):`);
    for (const w of result.warnings) lines.push(`  ! ${w}`);
  }

  return lines.join("\n");
}
