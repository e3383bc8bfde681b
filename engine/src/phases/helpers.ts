/**
 * Shared plumbing for the setup phases.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError } from "../errors";
import { Mutation } from "../fs-ops";
import { PhaseScope } from "../pipeline";
import { ComponentCatalog } from "../components";

/** What every phase factory closes over */
export interface PhaseEnv {
  catalog: ComponentCatalog;
  /** Expands "~" in the legacy search locations */
  homeDir: string;
}

/**
 * Run an idempotent mutation under the retry policy. A FAILED outcome is
 * thrown so transient errors (locked files) get another attempt.
 */
export async function mutate(
  scope: PhaseScope,
  operationName: string,
  apply: () => Promise<Mutation>,
): Promise<Mutation> {
  return scope.retry(operationName, async () => {
    const mutation = await apply();
    if (mutation.outcome === "FAILED") {
      throw (
        mutation.error ??
        new SetupError(`${operationName} failed`, "permanent", "FILE_ERROR")
      );
    }
    return mutation;
  });
}

/** Record a finished mutation on the scope */
export function recordMutation(scope: PhaseScope, verb: string, mutation: Mutation): void {
  if (mutation.outcome === "ALREADY_SATISFIED") {
    scope.record(`${mutation.path} already up to date`);
    return;
  }
  scope.record(
    mutation.backupPath
      ? `${verb} ${mutation.path} (previous version kept at ${mutation.backupPath})`
      : `${verb} ${mutation.path}`,
  );
}

/** A legacy path may be a config file or the tool's directory */
export function legacyDirectory(p: string): string {
  return fs.existsSync(p) && fs.statSync(p).isDirectory() ? p : path.dirname(p);
}

/** All files below `dir`, as paths relative to it */
export function listFilesRecursive(dir: string): string[] {
  const files: string[] = [];
  const walk = (current: string, prefix: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const rel = prefix ? path.join(prefix, entry.name) : entry.name;
      if (entry.isDirectory()) {
        walk(path.join(current, entry.name), rel);
      } else {
        files.push(rel);
      }
    }
  };
  if (fs.existsSync(dir)) walk(dir, "");
  return files.sort();
}
