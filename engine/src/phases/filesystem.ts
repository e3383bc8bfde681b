/**
 * Directory layout and legacy file migration.
 */

import * as fs from "fs";
import * as path from "path";
import { definePhase, PhaseDefinition, PhaseScope } from "../pipeline";
import { DirectoryKind, copyFileIdempotent, ensureDirectory } from "../fs-ops";
import { legacyDirectory, listFilesRecursive, mutate, PhaseEnv } from "./helpers";

export function createDirectoriesPhase(): PhaseDefinition {
  return definePhase(
    "create-directories",
    { required: true, dryRunSafe: false },
    async (ctx, scope) => {
      const { coreDir, injectorDir, unlockerDir, configDir, tempDir } = ctx.settings.paths;
      const dirs: Array<[string, DirectoryKind]> = [
        [coreDir, "CREATED_DIRECTORY"],
        [injectorDir, "CREATED_DIRECTORY"],
        [unlockerDir, "CREATED_DIRECTORY"],
        [configDir, "CREATED_DIRECTORY"],
        [tempDir, "TEMP_DIRECTORY"],
      ];

      for (const [dir, kind] of dirs) {
        if (ctx.dryRun) {
          if (!fs.existsSync(dir)) scope.record(`Create directory ${dir}`);
          continue;
        }
        const mutation = await mutate(scope, `Create ${dir}`, () =>
          ensureDirectory(dir, scope.mutation, kind),
        );
        if (mutation.outcome === "CREATED") scope.record(`Created directory ${dir}`);
      }
    },
  );
}

async function copyTree(
  scope: PhaseScope,
  dryRun: boolean,
  sourceDir: string,
  files: readonly string[],
  targetDir: string,
): Promise<number> {
  let copied = 0;
  for (const rel of files) {
    const source = path.join(sourceDir, rel);
    if (!fs.existsSync(source)) continue;
    const target = path.join(targetDir, rel);

    if (dryRun) {
      scope.record(`Copy ${source} → ${target}`);
      continue;
    }
    const mutation = await mutate(scope, `Copy ${rel}`, () =>
      copyFileIdempotent(source, target, scope.mutation),
    );
    if (mutation.outcome === "CREATED") copied++;
  }
  return copied;
}

export function migrateLegacyFilesPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "migrate-legacy-files",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      const { injector, unlocker } = env.catalog;
      const { injectorDir, unlockerDir } = ctx.settings.paths;
      const { injectorPath, unlockerPath } = ctx.legacy;

      if (!injectorPath && !unlockerPath) {
        scope.skip("no legacy installation to migrate");
        return;
      }

      if (injectorPath) {
        const source = legacyDirectory(injectorPath);
        const appList = listFilesRecursive(path.join(source, injector.appListDir)).map((f) =>
          path.join(injector.appListDir, f),
        );
        const copied = await copyTree(
          scope,
          ctx.dryRun,
          source,
          [...injector.files, ...appList],
          injectorDir,
        );
        if (!ctx.dryRun) scope.record(`Migrated ${copied} legacy injector file(s) from ${source}`);
      }

      if (unlockerPath) {
        const source = legacyDirectory(unlockerPath);
        const copied = await copyTree(
          scope,
          ctx.dryRun,
          source,
          [...unlocker.files, unlocker.config],
          unlockerDir,
        );
        if (!ctx.dryRun) scope.record(`Migrated ${copied} legacy unlocker file(s) from ${source}`);
      }
    },
  );
}
