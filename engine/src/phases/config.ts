/**
 * Configuration phases: find the legacy tools, migrate their settings and
 * persist the unified config.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError } from "../errors";
import { definePhase, PhaseDefinition } from "../pipeline";
import { expandHome } from "../components";
import { writeFileIdempotent } from "../fs-ops";
import {
  migrateLegacyConfigs,
  serializeUnifiedConfig,
  validateUnifiedConfig,
  UNIFIED_CONFIG_FILENAME,
} from "../migration";
import { mutate, PhaseEnv, recordMutation } from "./helpers";

/** First directory in `candidates` that holds any of `markers` */
export function findInstallation(
  candidates: readonly string[],
  markers: readonly string[],
  homeDir: string,
): string | undefined {
  for (const candidate of candidates) {
    const dir = path.resolve(expandHome(candidate, homeDir));
    if (markers.some((m) => fs.existsSync(path.join(dir, m)))) return dir;
  }
  return undefined;
}

export function detectLegacyPhase(env: PhaseEnv): PhaseDefinition {
  return definePhase(
    "detect-legacy",
    { required: false, dryRunSafe: true },
    async (ctx, scope) => {
      const { legacy } = env.catalog;

      if (legacy.injectorDirs.length === 0 && legacy.unlockerDirs.length === 0) {
        scope.skip("no legacy locations to search");
        return;
      }

      if (ctx.legacy.injectorPath) {
        scope.record(`Using legacy injector path ${ctx.legacy.injectorPath}`);
      } else {
        const found = findInstallation(legacy.injectorDirs, legacy.injectorMarkers, env.homeDir);
        if (found) {
          ctx.legacy.injectorPath = found;
          scope.record(`Found legacy injector installation at ${found}`);
        }
      }

      if (ctx.legacy.unlockerPath) {
        scope.record(`Using legacy unlocker path ${ctx.legacy.unlockerPath}`);
      } else {
        const found = findInstallation(legacy.unlockerDirs, legacy.unlockerMarkers, env.homeDir);
        if (found) {
          ctx.legacy.unlockerPath = found;
          scope.record(`Found legacy unlocker installation at ${found}`);
        }
      }

      if (!ctx.legacy.injectorPath && !ctx.legacy.unlockerPath) {
        scope.record("No legacy installations detected");
      }
    },
  );
}

export function migrateConfigPhase(): PhaseDefinition {
  return definePhase(
    "migrate-config",
    { required: true, dryRunSafe: true },
    async (ctx, scope) => {
      const migration = migrateLegacyConfigs({
        injectorLegacyPath: ctx.legacy.injectorPath,
        unlockerLegacyPath: ctx.legacy.unlockerPath,
        overrides: ctx.settings.overrides,
      });
      migration.warnings.forEach((w) => scope.warn(w));

      const validation = validateUnifiedConfig(migration.config);
      if (!validation.valid) {
        const detail = validation.errors.map((e) => `${e.path} ${e.message}`).join("; ");
        throw new SetupError(
          `Migrated configuration is invalid: ${detail}`,
          "permanent",
          "CONFIG_ERROR",
        );
      }

      ctx.config = migration.config;
      ctx.artifacts.migration = migration;

      const { migratedFromInjectorLegacy, migratedFromUnlockerLegacy } = migration.config.migration;
      const platforms = Object.keys(migration.config.platforms);
      scope.record(
        `Unified config built: injector legacy ${migratedFromInjectorLegacy ? "migrated" : "not found"}, ` +
          `unlocker legacy ${migratedFromUnlockerLegacy ? "migrated" : "not found"}, ` +
          `platforms [${platforms.join(", ")}]`,
      );
    },
  );
}

export function writeUnifiedConfigPhase(): PhaseDefinition {
  return definePhase(
    "write-unified-config",
    { required: true, dryRunSafe: false },
    async (ctx, scope) => {
      const file = path.join(ctx.settings.paths.configDir, UNIFIED_CONFIG_FILENAME);
      const content = serializeUnifiedConfig(ctx.config);

      if (ctx.dryRun) {
        const current = fs.existsSync(file) ? fs.readFileSync(file, "utf-8") : null;
        if (current === content) {
          scope.record(`${file} already up to date`);
        } else {
          scope.record(current === null ? `Write ${file}` : `Back up and rewrite ${file}`);
        }
        return;
      }

      const mutation = await mutate(scope, "Write unified config", () =>
        writeFileIdempotent(file, content, scope.mutation),
      );
      recordMutation(scope, "Wrote", mutation);
    },
  );
}
