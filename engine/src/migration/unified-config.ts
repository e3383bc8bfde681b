/**
 * Tandem Engine — Unified Configuration
 *
 * The single configuration both tools are driven from after migration.
 * Built once per run by mergeLegacyConfigs(), deep-frozen, and serialized
 * deterministically: same input, same bytes.
 *
 * Validated against schemas/unified-config.schema.json with AJV before it
 * is written or after it is read back.
 */

import Ajv, { ValidateFunction } from "ajv";
import * as fs from "fs";
import schema from "../../schemas/unified-config.schema.json";
import { ConfigOverrides, PlatformSettings, UnifiedConfig } from "../types";
import { SetupError, errorMessage } from "../errors";
import { InjectorLegacyConfig } from "./injector-legacy";
import { DEFAULT_PLATFORM_SETTINGS, UnlockerLegacyConfig } from "./unlocker-legacy";

export const UNIFIED_CONFIG_FILENAME = "unified-config.json";

/** The injector is a Steam-only tool */
export const INJECTOR_PLATFORM = "Steam";

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

let _validate: ValidateFunction<UnifiedConfig> | null = null;

function getValidator(): ValidateFunction<UnifiedConfig> {
  if (_validate) return _validate;

  const ajv = new Ajv({ allErrors: true, strict: false });
  _validate = ajv.compile<UnifiedConfig>(schema);
  return _validate;
}

export function validateUnifiedConfig(config: unknown): ConfigValidationResult {
  const validate = getValidator();
  if (validate(config)) return { valid: true, errors: [] };

  return {
    valid: false,
    errors: (validate.errors ?? []).map((err) => ({
      path: err.instancePath || "/",
      message: err.message || "Unknown validation error",
    })),
  };
}

export function defaultUnifiedConfig(): UnifiedConfig {
  return deepFreeze({
    core: { injectorEnabled: true, unlockerEnabled: true, stealthMode: true },
    platforms: {},
    migration: { migratedFromInjectorLegacy: false, migratedFromUnlockerLegacy: false },
  });
}

/**
 * Merge whichever legacy configs parsed (null for a missing or failed
 * source) and apply user overrides last.
 *
 * Platforms are the union of both sources. A platform the unlocker also
 * defines takes the unlocker's settings; the injector's fake-parent flag
 * always lands in core.stealthMode.
 */
export function mergeLegacyConfigs(
  injector: InjectorLegacyConfig | null,
  unlocker: UnlockerLegacyConfig | null,
  overrides: ConfigOverrides = {},
): UnifiedConfig {
  const platforms: Record<string, PlatformSettings> = {};

  if (injector) {
    platforms[INJECTOR_PLATFORM] = clonePlatform(DEFAULT_PLATFORM_SETTINGS);
  }
  if (unlocker) {
    for (const [name, settings] of Object.entries(unlocker.platforms)) {
      platforms[name] = clonePlatform(settings);
    }
  }

  const core = {
    injectorEnabled: true,
    unlockerEnabled: true,
    stealthMode: injector ? injector.enableFakeParentProcess ?? true : true,
    ...overrides.core,
  };

  for (const [name, patch] of Object.entries(overrides.platforms ?? {})) {
    platforms[name] = {
      ...clonePlatform(platforms[name] ?? DEFAULT_PLATFORM_SETTINGS),
      ...patch,
    };
  }

  const sorted: Record<string, PlatformSettings> = {};
  for (const name of Object.keys(platforms).sort()) {
    sorted[name] = platforms[name];
  }

  return deepFreeze({
    core,
    platforms: sorted,
    migration: {
      migratedFromInjectorLegacy: injector !== null,
      migratedFromUnlockerLegacy: unlocker !== null,
    },
  });
}

/** Two-space JSON with a trailing newline */
export function serializeUnifiedConfig(config: UnifiedConfig): string {
  return JSON.stringify(config, null, 2) + "\n";
}

/**
 * Read and validate a unified config written by an earlier run.
 *
 * @throws SetupError (CONFIG_ERROR) if the file is unreadable or invalid
 */
export function loadUnifiedConfig(filePath: string): UnifiedConfig {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new SetupError(
      `Cannot read unified config ${filePath}: ${errorMessage(err)}`,
      "permanent",
      "CONFIG_ERROR",
      { cause: err },
    );
  }

  const validate = getValidator();
  if (!validate(data)) {
    const first = validate.errors?.[0];
    throw new SetupError(
      `Invalid unified config ${filePath}: ${first?.instancePath || "/"} ${first?.message ?? ""}`.trim(),
      "permanent",
      "CONFIG_ERROR",
    );
  }
  return deepFreeze(data);
}

function clonePlatform(settings: Readonly<PlatformSettings>): PlatformSettings {
  return {
    enabled: settings.enabled,
    unlockDlc: settings.unlockDlc,
    blacklist: [...settings.blacklist],
    ignore: [...settings.ignore],
  };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
