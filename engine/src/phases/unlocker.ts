/**
 * Unlocker phases: fetch the installer, run it elevated, write its config.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError, errorMessage } from "../errors";
import { definePhase, PhaseDefinition } from "../pipeline";
import { writeFileIdempotent } from "../fs-ops";
import { isRecord, stripLineComments, toUnlockerPlatforms } from "../migration";
import { mutate, PhaseEnv, recordMutation } from "./helpers";

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function downloadUnlockerPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "download-unlocker",
    { required: true, dryRunSafe: false },
    async (ctx, scope) => {
      if (ctx.configOnly) {
        scope.skip("--config-only");
        return;
      }
      if (!ctx.config.core.unlockerEnabled) {
        scope.skip("unlocker disabled in configuration");
        return;
      }

      const installed = path.join(ctx.settings.paths.unlockerDir, env.catalog.unlocker.executable);
      if (fs.existsSync(installed) && !ctx.force) {
        scope.skip(`already installed at ${installed} (use --force to reinstall)`);
        return;
      }

      const url = ctx.settings.downloadUrl || env.catalog.unlocker.downloadUrl;
      const dest = path.join(ctx.settings.paths.tempDir, env.catalog.unlocker.installer);

      if (ctx.dryRun) {
        scope.record(`Download ${url} → ${dest}`);
        return;
      }

      ctx.ledger.registerCreated(dest, "TEMP_FILE", scope.name);
      scope.progress(`Downloading ${url}`, 0);

      const result = await scope.retry("Download unlocker installer", (_attempt, signal) =>
        ctx.capabilities.downloader.fetch(url, dest, {
          signal,
          timeoutMs: ctx.settings.timeoutMs,
          onProgress: (p) =>
            scope.progress(`Downloading ${formatBytes(p.bytes_downloaded)}`, p.percent),
        }),
      );

      ctx.artifacts.unlockerInstaller = result.file_path;
      scope.record(
        result.resumed_from > 0
          ? `Downloaded ${formatBytes(result.bytes_downloaded)} to ${result.file_path} (resumed at ${formatBytes(result.resumed_from)})`
          : `Downloaded ${formatBytes(result.bytes_downloaded)} to ${result.file_path}`,
      );
    },
  );
}

export function runUnlockerInstallerPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "run-unlocker-installer",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      const installer = ctx.artifacts.unlockerInstaller;

      if (ctx.dryRun) {
        if (!ctx.configOnly && ctx.config.core.unlockerEnabled) {
          scope.record(`Run ${env.catalog.unlocker.installer} with administrator rights`);
        }
        return;
      }
      if (!installer) {
        scope.skip("no installer was downloaded");
        return;
      }

      const command = {
        file: installer,
        args: env.catalog.unlocker.installerArgs,
        label: env.catalog.unlocker.installer,
      };

      await ctx.gate.withFeatureFallback(
        "elevated_commands",
        async () => {
          scope.progress(`Running ${command.label}`);
          await scope.retry(`Run ${command.label}`, async () => {
            const result = await ctx.gate.runElevated(command, ctx.settings.timeoutMs, ctx.signal);
            if (!result.success) {
              throw result.error ?? new SetupError(result.message, "permanent", "PERMISSION_ERROR");
            }
          });
          scope.record(`Ran ${command.label}`);
        },
        (reason) => {
          scope.warn(`Run ${installer} manually to finish installing the unlocker (${reason})`);
        },
      );
    },
  );
}

/** Existing config, then the bundled template, then an empty object */
function baseUnlockerConfig(
  configPath: string,
  templatePath: string,
  warn: (message: string) => void,
): Record<string, unknown> {
  for (const candidate of [configPath, templatePath]) {
    if (!fs.existsSync(candidate)) continue;
    try {
      const parsed: unknown = JSON.parse(stripLineComments(fs.readFileSync(candidate, "utf-8")));
      if (isRecord(parsed)) return parsed;
      warn(`${candidate} is not a JSON object, ignoring it`);
    } catch (err: unknown) {
      warn(`${candidate} could not be parsed, ignoring it: ${errorMessage(err)}`);
    }
  }
  return {};
}

export function configureUnlockerPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "configure-unlocker",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      if (!ctx.config.core.unlockerEnabled) {
        scope.skip("unlocker disabled in configuration");
        return;
      }

      const configPath = path.join(ctx.settings.paths.unlockerDir, env.catalog.unlocker.config);
      const templatePath = path.join(ctx.settings.paths.assetsDir, env.catalog.unlocker.configTemplate);

      const base = baseUnlockerConfig(configPath, templatePath, (m) => scope.warn(m));
      const content =
        JSON.stringify({ ...base, platforms: toUnlockerPlatforms(ctx.config.platforms) }, null, 2) + "\n";

      if (ctx.dryRun) {
        const current = fs.existsSync(configPath) ? fs.readFileSync(configPath, "utf-8") : null;
        if (current === content) {
          scope.record(`${configPath} already up to date`);
        } else {
          scope.record(current === null ? `Write ${configPath}` : `Back up and rewrite ${configPath}`);
        }
        return;
      }

      const mutation = await mutate(scope, "Write unlocker config", () =>
        writeFileIdempotent(configPath, content, scope.mutation),
      );
      recordMutation(scope, "Wrote", mutation);
    },
  );
}
