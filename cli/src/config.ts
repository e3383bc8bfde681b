/**
 * Tandem CLI — Configuration
 *
 * Central location for all CLI paths, defaults, and environment overrides.
 * Everything lives under ~/Documents/Tandem unless TANDEM_HOME or
 * --core-path says otherwise.
 *
 * Environment:
 *   TANDEM_HOME           installation root
 *   TANDEM_TEMP_DIR       scratch space (default <root>/temp)
 *   TANDEM_ASSETS_DIR     bundled archives and templates (default <root>/assets)
 *   TANDEM_DOWNLOAD_URL   unlocker installer URL
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import {
  ConfigOverrides,
  PlatformSettings,
  SetupError,
  SetupPaths,
  SetupSettings,
  APP_ID_PATTERN,
  assertHttpsUrl,
  errorMessage,
  isRecord,
  isReservedKey,
  loadComponentCatalog,
  LogLevel,
} from "@tandem/engine";

export const DEFAULT_APP_ID = "480";
export const DEFAULT_TIMEOUT_SECONDS = 300;

/** Root data directory: ~/Documents/Tandem */
export function defaultHome(home: string = os.homedir()): string {
  return path.join(home, "Documents", "Tandem");
}

export function resolvePaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
  corePath?: string,
): SetupPaths {
  const coreDir = path.resolve(corePath || env.TANDEM_HOME || defaultHome(home));
  return {
    coreDir,
    injectorDir: path.join(coreDir, "injector"),
    unlockerDir: path.join(coreDir, "unlocker"),
    configDir: path.join(coreDir, "config"),
    tempDir: path.resolve(env.TANDEM_TEMP_DIR || path.join(coreDir, "temp")),
    assetsDir: path.resolve(env.TANDEM_ASSETS_DIR || path.join(coreDir, "assets")),
    backupDir: path.join(coreDir, "backups"),
    desktopDir: path.join(home, "Desktop"),
  };
}

// ─── Overrides File ─────────────────────────────────────────

const CORE_KEYS = ["injectorEnabled", "unlockerEnabled", "stealthMode"] as const;

function invalidOverrides(file: string, detail: string): SetupError {
  return new SetupError(`Invalid overrides file ${file}: ${detail}`, "permanent", "CONFIG_ERROR");
}

function readStringList(file: string, where: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw invalidOverrides(file, `${where} must be a list of strings`);
  }
  return value;
}

function readFlag(file: string, where: string, value: unknown): boolean {
  if (typeof value !== "boolean") throw invalidOverrides(file, `${where} must be true or false`);
  return value;
}

function readPlatform(file: string, name: string, raw: unknown): Partial<PlatformSettings> {
  if (!isRecord(raw)) throw invalidOverrides(file, `platforms.${name} must be a mapping`);
  const out: Partial<PlatformSettings> = {};
  for (const [key, value] of Object.entries(raw)) {
    const where = `platforms.${name}.${key}`;
    switch (key) {
      case "enabled":
        out.enabled = readFlag(file, where, value);
        break;
      case "unlockDlc":
        out.unlockDlc = readFlag(file, where, value);
        break;
      case "blacklist":
        out.blacklist = readStringList(file, where, value);
        break;
      case "ignore":
        out.ignore = readStringList(file, where, value);
        break;
      default:
        throw invalidOverrides(file, `unknown key ${where}`);
    }
  }
  return out;
}

/**
 * Parse a YAML overrides document:
 *
 *   core:
 *     stealthMode: false
 *   platforms:
 *     Steam:
 *       blacklist: ["12345"]
 */
export function parseOverrides(text: string, file: string = "<overrides>"): ConfigOverrides {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err: unknown) {
    throw invalidOverrides(file, errorMessage(err));
  }
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) throw invalidOverrides(file, "top level must be a mapping");

  const overrides: ConfigOverrides = {};
  for (const [key, value] of Object.entries(doc)) {
    if (key === "core") {
      if (!isRecord(value)) throw invalidOverrides(file, "core must be a mapping");
      const core: NonNullable<ConfigOverrides["core"]> = {};
      for (const [field, flag] of Object.entries(value)) {
        const known = CORE_KEYS.find((k) => k === field);
        if (!known) throw invalidOverrides(file, `unknown key core.${field}`);
        core[known] = readFlag(file, `core.${field}`, flag);
      }
      overrides.core = core;
    } else if (key === "platforms") {
      if (!isRecord(value)) throw invalidOverrides(file, "platforms must be a mapping");
      const platforms: Record<string, Partial<PlatformSettings>> = {};
      for (const [name, raw] of Object.entries(value)) {
        if (isReservedKey(name)) throw invalidOverrides(file, `platforms.${name} is a reserved name`);
        platforms[name] = readPlatform(file, name, raw);
      }
      overrides.platforms = platforms;
    } else {
      throw invalidOverrides(file, `unknown key ${key}`);
    }
  }
  return overrides;
}

export function loadOverridesFile(file: string): ConfigOverrides {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    throw new SetupError(
      `Could not read overrides file ${file}: ${errorMessage(err)}`,
      "permanent",
      "CONFIG_ERROR",
    );
  }
  return parseOverrides(text, file);
}

// ─── Setup Options ──────────────────────────────────────────

/** Flags exactly as commander hands them over */
export interface SetupCliOptions {
  dryRun: boolean;
  configOnly: boolean;
  skipAdmin: boolean;
  skipSecurity: boolean;
  /** commander's --no-cleanup sets this to false */
  cleanup: boolean;
  force: boolean;
  timeout: string;
  appId: string;
  corePath?: string;
  legacyInjectorPath?: string;
  legacyUnlockerPath?: string;
  downloadUrl?: string;
  overrides?: string;
  verbose: boolean;
  quiet: boolean;
  debug: boolean;
}

function configError(message: string): SetupError {
  return new SetupError(message, "permanent", "CONFIG_ERROR");
}

/**
 * Check flag combinations and turn the CLI options into run settings.
 *
 * @throws SetupError (CONFIG_ERROR) on conflicting or malformed options
 */
export function buildSetupSettings(
  opts: SetupCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): SetupSettings {
  if (opts.dryRun && opts.configOnly) {
    throw configError("--dry-run and --config-only cannot be used together");
  }
  if (opts.verbose && opts.quiet) {
    throw configError("--verbose and --quiet cannot be used together");
  }
  if (!APP_ID_PATTERN.test(opts.appId)) {
    throw configError(`--app-id must be numeric, got "${opts.appId}"`);
  }

  const seconds = Number(opts.timeout);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw configError(`--timeout must be a positive number of seconds, got "${opts.timeout}"`);
  }

  const downloadUrl =
    opts.downloadUrl || env.TANDEM_DOWNLOAD_URL || loadComponentCatalog().unlocker.downloadUrl;
  assertHttpsUrl(downloadUrl);

  return {
    paths: resolvePaths(env, home, opts.corePath),
    appId: opts.appId,
    downloadUrl,
    timeoutMs: Math.round(seconds * 1000),
    dryRun: opts.dryRun,
    configOnly: opts.configOnly,
    skipAdmin: opts.skipAdmin,
    skipSecurity: opts.skipSecurity,
    cleanup: opts.cleanup,
    force: opts.force,
    legacyInjectorPath: opts.legacyInjectorPath ? path.resolve(opts.legacyInjectorPath) : undefined,
    legacyUnlockerPath: opts.legacyUnlockerPath ? path.resolve(opts.legacyUnlockerPath) : undefined,
    overrides: opts.overrides ? loadOverridesFile(opts.overrides) : undefined,
  };
}

/** pino level for the output flags; logs stay silent by default */
export function logLevelFor(opts: { verbose: boolean; debug: boolean }): LogLevel {
  if (opts.debug) return "debug";
  if (opts.verbose) return "info";
  return "silent";
}
