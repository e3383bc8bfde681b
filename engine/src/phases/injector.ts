/**
 * Injector phases: extraction, antivirus check, INI configuration and the
 * AppList.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError } from "../errors";
import { definePhase, PhaseDefinition } from "../pipeline";
import { copyFileIdempotent, ensureDirectory, writeFileIdempotent } from "../fs-ops";
import { checkFilesPresent } from "../verifier";
import { updateInjectorIni } from "../migration";
import { listFilesRecursive, mutate, PhaseEnv, recordMutation } from "./helpers";

export function extractInjectorPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "extract-injector",
    { required: true, dryRunSafe: false },
    async (ctx, scope) => {
      if (ctx.configOnly) {
        scope.skip("--config-only");
        return;
      }
      if (!ctx.config.core.injectorEnabled) {
        scope.skip("injector disabled in configuration");
        return;
      }

      const { assetsDir, injectorDir, tempDir } = ctx.settings.paths;
      const archive = path.join(assetsDir, env.catalog.injector.archive);

      if (!fs.existsSync(archive)) {
        const message = `Injector archive not found at ${archive}`;
        if (ctx.dryRun) {
          scope.warn(message);
          return;
        }
        throw new SetupError(message, "permanent", "FILE_ERROR");
      }

      if (ctx.dryRun) {
        scope.record(`Extract ${archive} → ${injectorDir}`);
        return;
      }

      // Extract beside the target first so existing files are replaced
      // through the ledger (with backups) rather than by the extractor.
      const staging = path.join(tempDir, `injector-${ctx.runId.slice(0, 8)}`);
      await mutate(scope, "Create staging directory", () =>
        ensureDirectory(staging, scope.mutation, "TEMP_DIRECTORY"),
      );

      scope.progress(`Extracting ${path.basename(archive)}`);
      await scope.retry("Extract injector archive", (_attempt, signal) =>
        ctx.capabilities.extractor.extract(archive, staging, { flatten: true, signal }),
      );

      const files = listFilesRecursive(staging);
      let installed = 0;
      for (const [index, rel] of files.entries()) {
        const target = path.join(injectorDir, rel);
        // configure-injector owns the INI once it exists
        if (rel === env.catalog.injector.config && fs.existsSync(target)) {
          scope.record(`Kept existing ${target}`);
          continue;
        }
        const mutation = await mutate(scope, `Install ${rel}`, () =>
          copyFileIdempotent(path.join(staging, rel), target, scope.mutation),
        );
        if (mutation.outcome === "CREATED") installed++;
        scope.progress(`Installed ${rel}`, Math.round(((index + 1) / files.length) * 100));
      }

      scope.record(
        `Extracted ${files.length} file(s) to ${injectorDir} (${installed} new or updated)`,
      );
    },
  );
}

export function verifyInjectorFilesPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "verify-injector-files",
    { required: false, dryRunSafe: true },
    async (ctx, scope) => {
      if (ctx.configOnly || !ctx.config.core.injectorEnabled) {
        scope.skip(ctx.configOnly ? "--config-only" : "injector disabled in configuration");
        return;
      }
      if (ctx.dryRun) {
        scope.record(`Verify injector files in ${ctx.settings.paths.injectorDir}`);
        return;
      }

      const report = checkFilesPresent(ctx.settings.paths.injectorDir, env.catalog.injector.files);
      if (report.missing.length > 0) {
        throw new SetupError(
          `Missing after extraction (quarantined by antivirus?): ${report.missing.join(", ")}. ` +
            "Add an exclusion for the install directory and re-run setup.",
          "permanent",
          "FILE_ERROR",
          { details: { missing: report.missing } },
        );
      }
      scope.record(`All ${report.present.length} injector files present`);
    },
  );
}

export function configureInjectorPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "configure-injector",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      if (!ctx.config.core.injectorEnabled) {
        scope.skip("injector disabled in configuration");
        return;
      }

      const { injectorDir } = ctx.settings.paths;
      const iniPath = path.join(injectorDir, env.catalog.injector.config);
      const dllPath = path.join(injectorDir, env.catalog.injector.dll);

      if (!fs.existsSync(iniPath)) {
        if (ctx.configOnly || ctx.dryRun) {
          scope.skip(`${env.catalog.injector.config} not present`);
          return;
        }
        throw new SetupError(`Injector config not found at ${iniPath}`, "permanent", "FILE_ERROR");
      }
      if (!fs.existsSync(dllPath)) {
        scope.warn(`Injector DLL not found at ${dllPath}`);
      }

      const current = fs.readFileSync(iniPath, "utf-8");
      const updated = updateInjectorIni(current, {
        Dll: `"${dllPath}"`,
        EnableFakeParentProcess: ctx.config.core.stealthMode ? "1" : "0",
      });

      if (ctx.dryRun) {
        scope.record(
          updated === current ? `${iniPath} already up to date` : `Back up and update ${iniPath}`,
        );
        return;
      }

      const mutation = await mutate(scope, "Update injector config", () =>
        writeFileIdempotent(iniPath, updated, scope.mutation),
      );
      recordMutation(scope, "Updated", mutation);
    },
  );
}

export const APP_ID_PATTERN = /^\d+$/;

export function setupAppListPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "setup-applist",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      if (!ctx.config.core.injectorEnabled) {
        scope.skip("injector disabled in configuration");
        return;
      }

      const { appId } = ctx.settings;
      if (!APP_ID_PATTERN.test(appId)) {
        throw new SetupError(`App ID must be numeric, got "${appId}"`, "permanent", "CONFIG_ERROR");
      }

      const appListDir = path.join(ctx.settings.paths.injectorDir, env.catalog.injector.appListDir);
      const listFile = path.join(appListDir, "0.txt");

      if (fs.existsSync(listFile)) {
        const content = fs.readFileSync(listFile, "utf-8").trim();
        if (!APP_ID_PATTERN.test(content)) {
          scope.warn(`${listFile} does not contain a numeric app id`);
        }
        scope.record(`${listFile} already exists, left unchanged`);
        return;
      }

      if (ctx.dryRun) {
        scope.record(`Write ${listFile} with app id ${appId}`);
        return;
      }

      const mutation = await mutate(scope, "Write AppList", () =>
        writeFileIdempotent(listFile, `${appId}\n`, scope.mutation),
      );
      recordMutation(scope, "Wrote", mutation);
    },
  );
}
