/**
 * Tandem Engine — Resource Ledger
 *
 * Records every filesystem resource the run creates or overwrites so it
 * can be undone. The ledger is the single owner of registered paths:
 * nothing else deletes them.
 *
 *   rollback()     undo everything, newest first (after a fatal failure)
 *   cleanupTemp()  remove temp files/directories only (after success)
 *
 * Whichever of the two runs first settles the ledger; the other then
 * returns an empty report. Undo is best-effort: one entry failing never
 * stops the rest, and failures are reported as warnings, never thrown.
 */

import * as fs from "fs";
import * as path from "path";
import {
  LedgerEntry,
  LedgerEntryKind,
  LedgerItemReport,
  RollbackReport,
} from "./types";
import { SetupError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";

/** The filesystem primitives the ledger needs; swapped out in tests */
export interface LedgerFileSystem {
  exists(target: string): boolean;
  remove(target: string, options: { recursive: boolean }): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
}

/** Like fs.existsSync, but a dangling symlink counts as present */
export function pathExists(target: string): boolean {
  try {
    fs.lstatSync(target);
    return true;
  } catch (err: unknown) {
    // Anything but "not there" means there is something to deal with
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    return code !== "ENOENT" && code !== "ENOTDIR";
  }
}

export const nodeLedgerFs: LedgerFileSystem = {
  exists: pathExists,
  remove: (target, { recursive }) =>
    fs.promises.rm(target, { recursive, force: false }),
  copyFile: (source, destination) =>
    fs.promises.copyFile(source, destination),
};

export interface LedgerOptions {
  logger: Logger;
  fs?: LedgerFileSystem;
  /** Registration is refused in dry-run */
  dryRun?: boolean;
  now?: () => Date;
}

export interface LedgerContext {
  /** Why the ledger is being unwound; logged only */
  reason?: string;
}

const TEMP_KINDS: ReadonlySet<LedgerEntryKind> = new Set<LedgerEntryKind>([
  "TEMP_FILE",
  "TEMP_DIRECTORY",
]);

const DIRECTORY_KINDS: ReadonlySet<LedgerEntryKind> = new Set<LedgerEntryKind>([
  "TEMP_DIRECTORY",
  "CREATED_DIRECTORY",
]);

export type CreatedKind = Exclude<LedgerEntryKind, "CONFIG_BACKUP">;

export class ResourceLedger {
  private active: LedgerEntry[] = [];
  private retained: LedgerEntry[] = [];
  private settledBy: RollbackReport["operation"] | null = null;
  private readonly logger: Logger;
  private readonly fs: LedgerFileSystem;
  private readonly dryRun: boolean;
  private readonly now: () => Date;

  constructor(options: LedgerOptions) {
    this.logger = options.logger;
    this.fs = options.fs ?? nodeLedgerFs;
    this.dryRun = options.dryRun ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.active.length;
  }

  get settled(): boolean {
    return this.settledBy !== null;
  }

  entries(): readonly LedgerEntry[] {
    return [...this.active];
  }

  /** Entries whose undo failed; they need manual removal */
  leftovers(): readonly LedgerEntry[] {
    return [...this.retained];
  }

  has(target: string): boolean {
    const resolved = path.resolve(target);
    return this.active.some((e) => e.path === resolved);
  }

  /**
   * Record a resource about to be created. Call this BEFORE the mutation.
   *
   * @returns false if the path was already registered (no-op)
   */
  registerCreated(target: string, kind: CreatedKind, phase: string): boolean {
    this.assertWritable(target);
    const resolved = path.resolve(target);
    if (this.has(resolved)) return false;

    this.active.push({
      kind,
      path: resolved,
      phase,
      created_at: this.now().toISOString(),
    });
    this.logger.debug({ kind, path: resolved, phase }, "Ledger entry registered");
    return true;
  }

  /**
   * Record that `backupPath` holds the previous content of `originalPath`
   * and must be copied back over it on rollback.
   */
  registerBackup(originalPath: string, backupPath: string, phase: string): boolean {
    this.assertWritable(backupPath);
    const resolved = path.resolve(backupPath);
    if (this.has(resolved)) return false;

    this.active.push({
      kind: "CONFIG_BACKUP",
      path: resolved,
      original_path: path.resolve(originalPath),
      phase,
      created_at: this.now().toISOString(),
    });
    this.logger.debug(
      { original: originalPath, backup: resolved, phase },
      "Ledger backup registered",
    );
    return true;
  }

  async rollback(context: LedgerContext = {}): Promise<RollbackReport> {
    if (this.settledBy) return emptyReport("rollback");
    this.settledBy = "rollback";

    this.logger.info(
      { entries: this.active.length, reason: context.reason },
      "Rolling back ledger",
    );

    const report = await this.unwind("rollback", [...this.active]);
    this.active = [];
    return report;
  }

  async cleanupTemp(context: LedgerContext = {}): Promise<RollbackReport> {
    if (this.settledBy) return emptyReport("cleanup");
    this.settledBy = "cleanup";

    const temps = this.active.filter((e) => TEMP_KINDS.has(e.kind));
    this.logger.info(
      { entries: temps.length, reason: context.reason },
      "Cleaning up temporary resources",
    );

    const report = await this.unwind("cleanup", temps);
    this.active = this.active.filter((e) => !TEMP_KINDS.has(e.kind));
    return report;
  }

  // ─── Internals ───────────────────────────────────────────────

  private assertWritable(target: string): void {
    if (this.dryRun) {
      throw new SetupError(
        `Attempted to register ${target} during a dry run`,
        "permanent",
        "GENERAL_ERROR",
      );
    }
    if (this.settledBy) {
      throw new SetupError(
        `Ledger already settled by ${this.settledBy}; cannot register ${target}`,
        "permanent",
        "GENERAL_ERROR",
      );
    }
  }

  private async unwind(
    operation: RollbackReport["operation"],
    entries: LedgerEntry[],
  ): Promise<RollbackReport> {
    const items: LedgerItemReport[] = [];

    for (const entry of entries.reverse()) {
      const item = await this.undo(entry);
      items.push(item);
      if (item.outcome === "failed") {
        this.retained.push(entry);
        this.logger.warn(
          { kind: entry.kind, path: entry.path, error: item.error },
          "Failed to undo ledger entry",
        );
      } else {
        this.logger.debug(
          { kind: entry.kind, path: entry.path, outcome: item.outcome },
          "Ledger entry undone",
        );
      }
    }

    const failed = items.filter((i) => i.outcome === "failed");
    return {
      operation,
      items,
      undone: items.length - failed.length,
      failed: failed.length,
      warnings: failed.map((i) => describeFailure(i)),
    };
  }

  private async undo(entry: LedgerEntry): Promise<LedgerItemReport> {
    try {
      if (entry.kind === "CONFIG_BACKUP") {
        if (!this.fs.exists(entry.path)) {
          return { entry, outcome: "already_absent" };
        }
        if (entry.original_path) {
          await this.fs.copyFile(entry.path, entry.original_path);
        }
        await this.fs.remove(entry.path, { recursive: false });
        return { entry, outcome: "undone" };
      }

      if (!this.fs.exists(entry.path)) {
        return { entry, outcome: "already_absent" };
      }
      await this.fs.remove(entry.path, {
        recursive: DIRECTORY_KINDS.has(entry.kind),
      });
      return { entry, outcome: "undone" };
    } catch (err: unknown) {
      return { entry, outcome: "failed", error: errorMessage(err) };
    }
  }
}

function emptyReport(operation: RollbackReport["operation"]): RollbackReport {
  return { operation, items: [], undone: 0, failed: 0, warnings: [] };
}

function describeFailure(item: LedgerItemReport): string {
  const { entry } = item;
  if (entry.kind === "CONFIG_BACKUP") {
    return `Could not restore ${entry.original_path ?? "?"} from ${entry.path}: ${item.error}`;
  }
  return `Could not remove ${entry.path}: ${item.error}`;
}
