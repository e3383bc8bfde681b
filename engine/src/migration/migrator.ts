/**
 * Tandem Engine — Legacy Configuration Migrator
 *
 * Reads whatever the two predecessor tools left behind and produces one
 * UnifiedConfig. Nothing here is fatal: an unreadable or malformed source
 * becomes a warning and the other source is still used.
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigOverrides, UnifiedConfig } from "../types";
import { errorMessage } from "../errors";
import { InjectorLegacyConfig, parseInjectorLegacy } from "./injector-legacy";
import { UnlockerLegacyConfig, parseUnlockerLegacy } from "./unlocker-legacy";
import { mergeLegacyConfigs } from "./unified-config";

export const INJECTOR_CONFIG_FILENAME = "DLLInjector.ini";
export const UNLOCKER_CONFIG_FILENAME = "config.json";

export interface MigrationInput {
  /** DLLInjector.ini, or the directory containing it */
  injectorLegacyPath?: string;
  /** config.json, or the directory containing it */
  unlockerLegacyPath?: string;
  overrides?: ConfigOverrides;
}

/** Display-only information about the sources; never used for decisions */
export interface MigrationDiagnostics {
  injector?: {
    path: string;
    parsed: boolean;
    dll?: string;
    exe?: string;
    extras: Record<string, string>;
  };
  unlocker?: {
    path: string;
    parsed: boolean;
    configVersion?: number;
    logLevel?: string;
  };
}

export interface MigrationResult {
  config: UnifiedConfig;
  warnings: string[];
  diagnostics: MigrationDiagnostics;
}

/**
 * Resolve a user-supplied legacy path: a directory means the tool's
 * default config filename inside it.
 */
export function resolveLegacyFile(supplied: string, defaultName: string): string {
  const resolved = path.resolve(supplied);
  if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    return path.join(resolved, defaultName);
  }
  return resolved;
}

export function migrateLegacyConfigs(input: MigrationInput = {}): MigrationResult {
  const warnings: string[] = [];
  const diagnostics: MigrationDiagnostics = {};

  let injector: InjectorLegacyConfig | null = null;
  if (input.injectorLegacyPath) {
    const file = resolveLegacyFile(input.injectorLegacyPath, INJECTOR_CONFIG_FILENAME);
    const text = readLegacyFile(file, "injector", warnings);
    if (text !== null) {
      const parsed = parseInjectorLegacy(text);
      warnings.push(...parsed.warnings);
      if (parsed.recognized) {
        injector = parsed.config;
      } else {
        warnings.push(`${file} contains no settings; injector config not migrated`);
      }
      diagnostics.injector = {
        path: file,
        parsed: parsed.recognized,
        dll: parsed.config.dll,
        exe: parsed.config.exe,
        extras: parsed.extras,
      };
    }
  }

  let unlocker: UnlockerLegacyConfig | null = null;
  if (input.unlockerLegacyPath) {
    const file = resolveLegacyFile(input.unlockerLegacyPath, UNLOCKER_CONFIG_FILENAME);
    const text = readLegacyFile(file, "unlocker", warnings);
    if (text !== null) {
      const parsed = parseUnlockerLegacy(text);
      warnings.push(...parsed.warnings);
      if (parsed.ok) unlocker = parsed.config;
      diagnostics.unlocker = {
        path: file,
        parsed: parsed.ok,
        configVersion: parsed.ok ? parsed.config.configVersion : undefined,
        logLevel: parsed.ok ? parsed.config.logLevel : undefined,
      };
    }
  }

  return {
    config: mergeLegacyConfigs(injector, unlocker, input.overrides),
    warnings,
    diagnostics,
  };
}

function readLegacyFile(
  file: string,
  label: string,
  warnings: string[],
): string | null {
  if (!fs.existsSync(file)) {
    warnings.push(`Legacy ${label} config not found at ${file}`);
    return null;
  }
  try {
    return fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    warnings.push(`Cannot read legacy ${label} config ${file}: ${errorMessage(err)}`);
    return null;
  }
}
