/**
 * Tandem CLI — Migrate Command
 *
 * Read-only preview of the unified config the legacy tools would produce.
 *
 * Usage:
 *   tandem migrate
 *   tandem migrate --legacy-injector-path C:\GreenLuma --json
 */

import * as os from "os";
import * as path from "path";
import { Command } from "commander";
import {
  MigrationResult,
  findInstallation,
  loadComponentCatalog,
  migrateLegacyConfigs,
  serializeUnifiedConfig,
  toSetupError,
  exitCodeForCategory,
} from "@tandem/engine";
import { loadOverridesFile } from "../config";
import { colors, printError, printInfo, printTable, printWarn } from "../output";

export interface MigrateCliOptions {
  legacyInjectorPath?: string;
  legacyUnlockerPath?: string;
  overrides?: string;
  json: boolean;
}

/** Explicit paths win; otherwise the well-known legacy locations are searched */
export function previewMigration(opts: MigrateCliOptions, home: string = os.homedir()): MigrationResult {
  const { legacy } = loadComponentCatalog();
  const injectorPath = opts.legacyInjectorPath
    ? path.resolve(opts.legacyInjectorPath)
    : findInstallation(legacy.injectorDirs, legacy.injectorMarkers, home);
  const unlockerPath = opts.legacyUnlockerPath
    ? path.resolve(opts.legacyUnlockerPath)
    : findInstallation(legacy.unlockerDirs, legacy.unlockerMarkers, home);

  return migrateLegacyConfigs({
    injectorLegacyPath: injectorPath,
    unlockerLegacyPath: unlockerPath,
    overrides: opts.overrides ? loadOverridesFile(opts.overrides) : undefined,
  });
}

function printMigration(result: MigrationResult): void {
  const { config, diagnostics } = result;

  printInfo(
    `Injector legacy config: ${
      diagnostics.injector ? colors.bold(diagnostics.injector.path) : colors.dim("not found")
    }`,
  );
  printInfo(
    `Unlocker legacy config: ${
      diagnostics.unlocker ? colors.bold(diagnostics.unlocker.path) : colors.dim("not found")
    }`,
  );
  console.log();

  printTable({
    head: ["Platform", "Enabled", "Unlock DLC", "Blacklist", "Ignore"],
    rows: Object.entries(config.platforms).map(([name, p]) => [
      colors.app(name),
      p.enabled ? colors.success("yes") : colors.dim("no"),
      p.unlockDlc ? colors.success("yes") : colors.dim("no"),
      String(p.blacklist.length),
      String(p.ignore.length),
    ]),
  });

  console.log();
  console.log(`  ${colors.bold("Injector:")}    ${config.core.injectorEnabled ? "enabled" : "disabled"}`);
  console.log(`  ${colors.bold("Unlocker:")}    ${config.core.unlockerEnabled ? "enabled" : "disabled"}`);
  console.log(`  ${colors.bold("Stealth mode:")} ${config.core.stealthMode ? "on" : "off"}`);

  const extras = diagnostics.injector ? Object.keys(diagnostics.injector.extras) : [];
  if (extras.length > 0) {
    console.log(`  ${colors.bold("Unmapped injector keys:")} ${colors.dim(extras.join(", "))}`);
  }

  for (const warning of result.warnings) printWarn(warning);
}

export function registerMigrateCommand(program: Command): void {
  program
    .command("migrate")
    .description("Preview the unified config built from legacy installations (changes nothing)")
    .option("--legacy-injector-path <path>", "Legacy injector directory or DLLInjector.ini")
    .option("--legacy-unlocker-path <path>", "Legacy unlocker directory or config.json")
    .option("--overrides <file>", "YAML file with configuration overrides")
    .option("--json", "Print the unified config as JSON", false)
    .action((opts: MigrateCliOptions) => {
      try {
        const result = previewMigration(opts);
        if (opts.json) {
          process.stdout.write(serializeUnifiedConfig(result.config));
        } else {
          printMigration(result);
        }
      } catch (err: unknown) {
        const error = toSetupError(err, "CONFIG_ERROR");
        printError(error.message);
        process.exitCode = exitCodeForCategory(error.category);
      }
    });
}
