/**
 * Tandem Engine — Idempotent Filesystem Mutations
 *
 * Phases never call fs directly for anything they create. These helpers
 * check the current state first, register with the ledger BEFORE the
 * mutation, and report what happened:
 *
 *   CREATED            something changed on disk
 *   ALREADY_SATISFIED  the target was already in the desired state
 *   FAILED             the mutation was attempted and failed
 *
 * Overwriting an existing file always leaves a sibling ".bak" that the
 * ledger restores on rollback.
 */

import * as fs from "fs";
import * as path from "path";
import { MutationOutcome } from "./types";
import { SetupError, classifyFsError } from "./errors";
import { ResourceLedger } from "./ledger";
import { computeBufferHash, computeFileHash, sameFileContent } from "./verifier";
import { Logger } from "./utils/logger";

export interface MutationContext {
  ledger: ResourceLedger;
  /** Phase name recorded on ledger entries */
  phase: string;
  logger: Logger;
}

export interface Mutation {
  outcome: MutationOutcome;
  path: string;
  /** Set when a backup of the previous content was taken */
  backupPath?: string;
  error?: SetupError;
}

export type DirectoryKind = "CREATED_DIRECTORY" | "TEMP_DIRECTORY";

/**
 * Create `dir` (and missing parents). The top-most missing ancestor is what
 * gets registered, so rollback removes everything this call created.
 */
export async function ensureDirectory(
  dir: string,
  ctx: MutationContext,
  kind: DirectoryKind = "CREATED_DIRECTORY",
): Promise<Mutation> {
  const target = path.resolve(dir);

  if (fs.existsSync(target)) {
    if (fs.statSync(target).isDirectory()) {
      return { outcome: "ALREADY_SATISFIED", path: target };
    }
    return {
      outcome: "FAILED",
      path: target,
      error: new SetupError(
        `${target} exists and is not a directory`,
        "permanent",
        "FILE_ERROR",
      ),
    };
  }

  ctx.ledger.registerCreated(topMostMissing(target), kind, ctx.phase);
  try {
    await fs.promises.mkdir(target, { recursive: true });
    ctx.logger.debug({ dir: target }, "Created directory");
    return { outcome: "CREATED", path: target };
  } catch (err: unknown) {
    return { outcome: "FAILED", path: target, error: classifyFsError(err) };
  }
}

/**
 * Write `content` to `target` unless it already holds exactly that.
 */
export async function writeFileIdempotent(
  target: string,
  content: string | Buffer,
  ctx: MutationContext,
): Promise<Mutation> {
  const file = path.resolve(target);

  try {
    if (fs.existsSync(file)) {
      const current = await computeFileHash(file);
      if (current === computeBufferHash(content)) {
        return { outcome: "ALREADY_SATISFIED", path: file };
      }
      const backupPath = await backupFile(file, ctx);
      await fs.promises.writeFile(file, content);
      ctx.logger.debug({ file, backup: backupPath }, "Overwrote file");
      return { outcome: "CREATED", path: file, backupPath };
    }

    const parent = await ensureDirectory(path.dirname(file), ctx);
    if (parent.outcome === "FAILED") return { ...parent, path: file };

    ctx.ledger.registerCreated(file, "CREATED_FILE", ctx.phase);
    await fs.promises.writeFile(file, content);
    ctx.logger.debug({ file }, "Wrote file");
    return { outcome: "CREATED", path: file };
  } catch (err: unknown) {
    return { outcome: "FAILED", path: file, error: classifyFsError(err) };
  }
}

/**
 * Copy `source` to `destination` unless the destination already has the
 * same content.
 */
export async function copyFileIdempotent(
  source: string,
  destination: string,
  ctx: MutationContext,
): Promise<Mutation> {
  const dest = path.resolve(destination);

  try {
    if (!fs.existsSync(source)) {
      return {
        outcome: "FAILED",
        path: dest,
        error: new SetupError(
          `Source file not found: ${source}`,
          "permanent",
          "FILE_ERROR",
        ),
      };
    }

    if (fs.existsSync(dest)) {
      if (await sameFileContent(source, dest)) {
        return { outcome: "ALREADY_SATISFIED", path: dest };
      }
      const backupPath = await backupFile(dest, ctx);
      await fs.promises.copyFile(source, dest);
      return { outcome: "CREATED", path: dest, backupPath };
    }

    const parent = await ensureDirectory(path.dirname(dest), ctx);
    if (parent.outcome === "FAILED") return { ...parent, path: dest };

    ctx.ledger.registerCreated(dest, "CREATED_FILE", ctx.phase);
    await fs.promises.copyFile(source, dest);
    ctx.logger.debug({ source, dest }, "Copied file");
    return { outcome: "CREATED", path: dest };
  } catch (err: unknown) {
    return { outcome: "FAILED", path: dest, error: classifyFsError(err) };
  }
}

/**
 * Copy `file` to the first free `<file>.bak[.N]` and register it as a
 * backup. Returns the backup path.
 */
export async function backupFile(
  file: string,
  ctx: MutationContext,
  backupDir?: string,
): Promise<string> {
  const backupPath = nextBackupPath(file, backupDir);
  ctx.ledger.registerBackup(file, backupPath, ctx.phase);
  await fs.promises.mkdir(path.dirname(backupPath), { recursive: true });
  await fs.promises.copyFile(file, backupPath);
  ctx.logger.debug({ file, backup: backupPath }, "Backed up file");
  return backupPath;
}

export function nextBackupPath(file: string, backupDir?: string): string {
  const base = backupDir
    ? path.join(backupDir, `${path.basename(file)}.bak`)
    : `${file}.bak`;
  if (!fs.existsSync(base)) return base;
  for (let n = 1; ; n++) {
    const candidate = `${base}.${n}`;
    if (!fs.existsSync(candidate)) return candidate;
  }
}

function topMostMissing(target: string): string {
  let current = target;
  for (;;) {
    const parent = path.dirname(current);
    if (parent === current || fs.existsSync(parent)) return current;
    current = parent;
  }
}
