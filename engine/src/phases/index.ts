/**
 * Tandem Engine — Setup Phases
 *
 * The fixed sequence a `tandem setup` run executes.
 */

import * as os from "os";
import { PhaseDefinition } from "../pipeline";
import { ComponentCatalog, loadComponentCatalog } from "../components";
import { PhaseEnv } from "./helpers";
import { checkPrivilegesPhase, securityExclusionsPhase } from "./privileges";
import { detectLegacyPhase, migrateConfigPhase, writeUnifiedConfigPhase } from "./config";
import { createDirectoriesPhase, migrateLegacyFilesPhase } from "./filesystem";
import {
  configureInjectorPhase,
  extractInjectorPhase,
  setupAppListPhase,
  verifyInjectorFilesPhase,
} from "./injector";
import {
  configureUnlockerPhase,
  downloadUnlockerPhase,
  runUnlockerInstallerPhase,
} from "./unlocker";
import { createShortcutsPhase, retireLegacyShortcutsPhase } from "./shortcuts";

export interface SetupPhaseOptions {
  catalog?: ComponentCatalog;
  homeDir?: string;
}

export function createSetupPhases(options: SetupPhaseOptions = {}): PhaseDefinition[] {
  const env: PhaseEnv = {
    catalog: options.catalog ?? loadComponentCatalog(),
    homeDir: options.homeDir ?? os.homedir(),
  };

  return [
    checkPrivilegesPhase(),
    detectLegacyPhase(env),
    migrateConfigPhase(),
    createDirectoriesPhase(),
    writeUnifiedConfigPhase(),
    securityExclusionsPhase(),
    migrateLegacyFilesPhase(env),
    extractInjectorPhase(env),
    verifyInjectorFilesPhase(env),
    configureInjectorPhase(env),
    setupAppListPhase(env),
    downloadUnlockerPhase(env),
    runUnlockerInstallerPhase(env),
    configureUnlockerPhase(env),
    createShortcutsPhase(env),
    retireLegacyShortcutsPhase(env),
  ];
}

export const SETUP_PHASE_NAMES = [
  "check-privileges",
  "detect-legacy",
  "migrate-config",
  "create-directories",
  "write-unified-config",
  "security-exclusions",
  "migrate-legacy-files",
  "extract-injector",
  "verify-injector-files",
  "configure-injector",
  "setup-applist",
  "download-unlocker",
  "run-unlocker-installer",
  "configure-unlocker",
  "create-shortcuts",
  "retire-legacy-shortcuts",
] as const;

export { findInstallation } from "./config";
export { findLegacyShortcuts } from "./shortcuts";
export { defenderExclusionCommand } from "./privileges";
export { APP_ID_PATTERN } from "./injector";
export type { PhaseEnv } from "./helpers";
