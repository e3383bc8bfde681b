/**
 * Desktop shortcuts: create the new ones, retire the ones the legacy tools
 * left behind.
 */

import * as fs from "fs";
import * as path from "path";
import { definePhase, PhaseDefinition } from "../pipeline";
import { ShortcutSpec } from "../capabilities";
import { backupFile, ensureDirectory } from "../fs-ops";
import { classifyFsError } from "../errors";
import { pathExists } from "../ledger";
import { mutate, PhaseEnv } from "./helpers";

export function createShortcutsPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "create-shortcuts",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      const { injector, unlocker } = env.catalog;
      const { injectorDir, unlockerDir } = ctx.settings.paths;
      const creator = ctx.capabilities.shortcuts;

      const specs: ShortcutSpec[] = [];
      if (ctx.config.core.injectorEnabled) {
        specs.push({
          name: injector.shortcutName,
          target: path.join(injectorDir, injector.executable),
          workDir: injectorDir,
        });
      }
      if (ctx.config.core.unlockerEnabled) {
        specs.push({
          name: unlocker.shortcutName,
          target: path.join(unlockerDir, unlocker.executable),
          workDir: unlockerDir,
        });
      }
      if (specs.length === 0) {
        scope.skip("no components enabled");
        return;
      }

      await ctx.gate.withFeatureFallback(
        creator.feature,
        async () => {
          for (const spec of specs) {
            const shortcutPath = creator.shortcutPath(spec.name);
            if (pathExists(shortcutPath)) {
              scope.record(`${shortcutPath} already exists`);
              continue;
            }
            if (!fs.existsSync(spec.target)) {
              scope.warn(`Shortcut target ${spec.target} does not exist yet`);
            }
            if (ctx.dryRun) {
              scope.record(`Create shortcut ${shortcutPath} → ${spec.target}`);
              continue;
            }

            ctx.ledger.registerCreated(shortcutPath, "CREATED_FILE", scope.name);
            const created = await scope.retry(`Create shortcut ${spec.name}`, (_attempt, signal) =>
              creator.createShortcut(spec, signal),
            );
            scope.record(`Created shortcut ${created}`);
          }
        },
        (reason) => {
          scope.warn(`Shortcuts were not created (${reason})`);
        },
      );
    },
  );
}

/** Legacy shortcut files present in `desktopDir` */
export function findLegacyShortcuts(desktopDir: string, names: readonly string[]): string[] {
  return names.map((n) => path.join(desktopDir, n)).filter((p) => fs.existsSync(p));
}

export function retireLegacyShortcutsPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "retire-legacy-shortcuts",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      const { desktopDir, backupDir } = ctx.settings.paths;
      const found = findLegacyShortcuts(desktopDir, env.catalog.legacy.shortcuts);

      if (found.length === 0) {
        scope.skip("no legacy shortcuts found");
        return;
      }
      if (ctx.dryRun) {
        found.forEach((p) => scope.record(`Back up and remove ${p}`));
        return;
      }

      if (!ctx.force) {
        const confirmed = await ctx.capabilities.prompter.confirm(
          `Remove ${found.length} legacy shortcut(s) from ${desktopDir}? Backups go to ${backupDir}.`,
          ctx.signal,
        );
        if (!confirmed) {
          scope.skip("declined by user");
          return;
        }
      }

      await mutate(scope, "Create backup directory", () => ensureDirectory(backupDir, scope.mutation));

      for (const shortcut of found) {
        const backup = await scope.retry(`Back up ${path.basename(shortcut)}`, async () => {
          try {
            return await backupFile(shortcut, scope.mutation, backupDir);
          } catch (err: unknown) {
            throw classifyFsError(err);
          }
        });
        await scope.retry(`Remove ${path.basename(shortcut)}`, async () => {
          try {
            await fs.promises.rm(shortcut, { force: true });
          } catch (err: unknown) {
            throw classifyFsError(err);
          }
        });
        scope.record(`Retired ${shortcut} (backup at ${backup})`);
      }
    },
  );
}
