/**
 * Tandem Engine — Run Summary Tests
 */

import { describe, it, expect } from "vitest";
import { formatRunSummary } from "../src/summary";
import { LedgerEntry, PhaseResult, RunResult } from "../src/types";

function phase(name: string, status: PhaseResult["status"], skip_reason?: string): PhaseResult {
  return {
    phase: name,
    ordinal: 1,
    status,
    warnings: [],
    errors: [],
    actions: [],
    duration_ms: 0,
    skip_reason,
  };
}

const entry = (path: string, kind: LedgerEntry["kind"] = "CREATED_DIRECTORY"): LedgerEntry => ({
  kind,
  path,
  phase: "create-directories",
  created_at: "2024-01-01T00:00:00.000Z",
});

const base: RunResult = {
  run_id: "run-1",
  status: "COMPLETED",
  started_at: "2024-01-01T00:00:00.000Z",
  finished_at: "2024-01-01T00:00:01.000Z",
  dry_run: false,
  results: [],
  warnings: [],
  leftovers: [],
};

describe("formatRunSummary", () => {
  it("lists completed and skipped phases after a successful run", () => {
    const summary = formatRunSummary({
      ...base,
      results: [
        phase("check-privileges", "SKIPPED", "--skip-admin"),
        phase("migrate-config", "SUCCESS"),
        phase("configure-injector", "SOFT_FAILURE"),
      ],
      warnings: ["configure-injector failed: locked"],
    });

    expect(summary).toBe(
      [
        "Setup completed.",
        "",
        "Completed phases (2):",
        "  ✓ migrate-config",
        "  ✓ configure-injector (with errors)",
        "Skipped phases (1):",
        "  - check-privileges: --skip-admin",
        "",
        "Warnings (1):",
        "  ! configure-injector failed: locked",
      ].join("\n"),
    );
  });

  it("says so for a dry run", () => {
    expect(formatRunSummary({ ...base, dry_run: true }).split("\n")[0]).toBe(
      "Dry run completed. No changes were made.",
    );
  });

  it("shows the failing phase, the error and what was undone", () => {
    const summary = formatRunSummary({
      ...base,
      status: "ABORTED",
      results: [phase("create-directories", "SUCCESS"), phase("download-unlocker", "FATAL_FAILURE")],
      failed_phase: "download-unlocker",
      error: {
        category: "NETWORK_ERROR",
        kind: "transient",
        message: "Download failed after 3 attempt(s) in 12ms: reset",
        phase: "download-unlocker",
      },
      rollback: {
        operation: "rollback",
        items: [
          { entry: entry("/t/temp/Installer.exe", "TEMP_FILE"), outcome: "already_absent" },
          {
            entry: { ...entry("/t/config/a.json.bak", "CONFIG_BACKUP"), original_path: "/t/config/a.json" },
            outcome: "undone",
          },
          { entry: entry("/t/locked"), outcome: "failed", error: "EBUSY" },
        ],
        undone: 2,
        failed: 1,
        warnings: ["Could not remove /t/locked: EBUSY"],
      },
      leftovers: [entry("/t/locked")],
      warnings: [],
    });

    expect(summary).toBe(
      [
        'Setup aborted in phase "download-unlocker".',
        "Error (NETWORK_ERROR): Download failed after 3 attempt(s) in 12ms: reset",
        "",
        "Completed phases (1):",
        "  ✓ create-directories",
        "",
        "Undone (2):",
        "  - removed /t/temp/Installer.exe (already gone)",
        "  - restored /t/config/a.json",
        "",
        "Remove these manually:",
        "  - /t/locked",
      ].join("\n"),
    );
  });

  it("reports an empty rollback", () => {
    const summary = formatRunSummary({
      ...base,
      status: "ABORTED",
      failed_phase: "check-privileges",
      rollback: { operation: "rollback", items: [], undone: 0, failed: 0, warnings: [] },
    });
    expect(summary.split("\n")).toContain("Nothing needed to be undone.");
  });
});
