/**
 * Tandem CLI — Status Command
 *
 * Shows what this machine can do and what is installed.
 *
 * Usage:
 *   tandem status
 *   tandem status --core-path D:\Tandem
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import {
  PlatformFeature,
  PrivilegeGate,
  UNIFIED_CONFIG_FILENAME,
  checkFilesPresent,
  createElevation,
  createLogger,
  loadComponentCatalog,
} from "@tandem/engine";
import { resolvePaths } from "../config";
import { colors, printInfo, printTable } from "../output";

const FEATURE_LABELS: Record<PlatformFeature, string> = {
  windows_admin: "Administrator check",
  windows_defender: "Windows Defender exclusions",
  windows_shortcuts: "Windows shortcuts",
  linux_desktop_entries: "Linux desktop entries",
  macos_aliases: "macOS aliases",
  elevated_commands: "Elevated commands",
};

const FEATURE_ORDER: PlatformFeature[] = [
  "windows_admin",
  "windows_defender",
  "windows_shortcuts",
  "linux_desktop_entries",
  "macos_aliases",
  "elevated_commands",
];

export interface ComponentStatus {
  name: string;
  dir: string;
  present: number;
  missing: string[];
}

/** Which expected files of each component are on disk */
export function componentStatus(paths: { injectorDir: string; unlockerDir: string }): ComponentStatus[] {
  const catalog = loadComponentCatalog();
  return [
    { name: "Injector", dir: paths.injectorDir, files: catalog.injector.files },
    { name: "Unlocker", dir: paths.unlockerDir, files: catalog.unlocker.files },
  ].map(({ name, dir, files }) => {
    const report = checkFilesPresent(dir, files);
    return { name, dir, present: report.present.length, missing: report.missing };
  });
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show elevation, platform features and installed components")
    .option("--core-path <dir>", "Installation root")
    .action(async (opts: { corePath?: string }) => {
      const paths = resolvePaths(process.env, undefined, opts.corePath);
      const logger = createLogger();
      const gate = new PrivilegeGate({ elevation: createElevation(process.platform, logger), logger });

      const elevated = await gate.hasElevatedRights();
      console.log();
      console.log(`  ${colors.bold("Platform:")}   ${gate.platform}`);
      console.log(
        `  ${colors.bold("Elevated:")}   ${elevated ? colors.success("yes") : colors.warn("no")}`,
      );
      console.log(`  ${colors.bold("Install at:")} ${paths.coreDir}`);
      const configFile = path.join(paths.configDir, UNIFIED_CONFIG_FILENAME);
      console.log(
        `  ${colors.bold("Config:")}     ${fs.existsSync(configFile) ? configFile : colors.dim("not written yet")}`,
      );
      console.log();

      const features = gate.features();
      printTable({
        head: ["Feature", "Available"],
        rows: FEATURE_ORDER.map((feature) => [
          FEATURE_LABELS[feature],
          features[feature] ? colors.success("yes") : colors.dim("no"),
        ]),
      });
      console.log();

      const components = componentStatus(paths);
      printTable({
        head: ["Component", "Files", "Directory"],
        rows: components.map((c) => [
          colors.app(c.name),
          c.missing.length === 0
            ? colors.success(`${c.present} present`)
            : colors.warn(`${c.missing.length} missing`),
          c.dir,
        ]),
      });

      for (const c of components) {
        if (c.present > 0 && c.missing.length > 0) {
          printInfo(`${c.name} is missing ${c.missing.join(", ")}`);
        }
      }
    });
}
