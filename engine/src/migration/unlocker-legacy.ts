/**
 * Parser for the legacy DLC unlocker's config.json.
 *
 * The file is JSON with `//` line comments:
 *
 *   {
 *     "config_version": 6,   // do not touch
 *     "platforms": {
 *       "Steam": { "enabled": true, "unlock_dlc": true, "blacklist": [] }
 *     }
 *   }
 */

import { PlatformSettings } from "../types";
import { errorMessage } from "../errors";

export interface UnlockerLegacyConfig {
  configVersion?: number;
  logLevel?: string;
  platforms: Record<string, PlatformSettings>;
}

export type UnlockerParseResult =
  | { ok: true; config: UnlockerLegacyConfig; warnings: string[] }
  | { ok: false; warnings: string[] };

export const DEFAULT_PLATFORM_SETTINGS: Readonly<PlatformSettings> = Object.freeze({
  enabled: true,
  unlockDlc: true,
  blacklist: [],
  ignore: [],
});

/**
 * Remove `//` comments up to end of line. Quote state is tracked so a
 * `//` inside a string literal (a URL, say) is kept; backslash escapes
 * inside strings are honoured. Newlines are preserved so JSON.parse error
 * positions still point at the right line.
 */
export function stripLineComments(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === "/" && text[i + 1] === "/") {
      while (i < text.length && text[i] !== "\n" && text[i] !== "\r") i++;
      i--;
    } else {
      out += ch;
    }
  }

  return out;
}

export function parseUnlockerLegacy(text: string): UnlockerParseResult {
  const warnings: string[] = [];

  let data: unknown;
  try {
    data = JSON.parse(stripLineComments(text.replace(/^\uFEFF/, "")));
  } catch (err: unknown) {
    return {
      ok: false,
      warnings: [`config.json is not valid JSON: ${errorMessage(err)}`],
    };
  }

  if (!isRecord(data)) {
    return { ok: false, warnings: ["config.json does not contain a JSON object"] };
  }

  const config: UnlockerLegacyConfig = { platforms: {} };
  if (typeof data.config_version === "number") config.configVersion = data.config_version;
  if (typeof data.log_level === "string") config.logLevel = data.log_level;

  const platforms = data.platforms;
  if (platforms === undefined) {
    return { ok: true, config, warnings };
  }
  if (!isRecord(platforms)) {
    warnings.push('config.json: "platforms" is not an object, ignored');
    return { ok: true, config, warnings };
  }

  for (const [name, raw] of Object.entries(platforms)) {
    if (isReservedKey(name)) {
      warnings.push(`config.json: platform "${name}" has a reserved name, ignored`);
      continue;
    }
    if (!isRecord(raw)) {
      warnings.push(`config.json: platform "${name}" is not an object, ignored`);
      continue;
    }
    config.platforms[name] = {
      enabled: readBoolean(raw, "enabled", name, DEFAULT_PLATFORM_SETTINGS.enabled, warnings),
      unlockDlc: readBoolean(raw, "unlock_dlc", name, DEFAULT_PLATFORM_SETTINGS.unlockDlc, warnings),
      blacklist: readStringList(raw, "blacklist", name, warnings),
      ignore: readStringList(raw, "ignore", name, warnings),
    };
  }

  return { ok: true, config, warnings };
}

export interface UnlockerPlatformEntry {
  enabled: boolean;
  unlock_dlc: boolean;
  blacklist: string[];
  ignore: string[];
}

/** Inverse mapping, used when writing the unlocker config from the unified one */
export function toUnlockerPlatforms(
  platforms: Readonly<Record<string, PlatformSettings>>,
): Record<string, UnlockerPlatformEntry> {
  const out: Record<string, UnlockerPlatformEntry> = {};
  for (const name of Object.keys(platforms).sort()) {
    const p = platforms[name];
    out[name] = {
      enabled: p.enabled,
      unlock_dlc: p.unlockDlc,
      blacklist: [...p.blacklist],
      ignore: [...p.ignore],
    };
  }
  return out;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

/** Names that cannot be used as keys of a plain object map */
export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.has(key);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoolean(
  raw: Record<string, unknown>,
  field: string,
  platform: string,
  fallback: boolean,
  warnings: string[],
): boolean {
  const value = raw[field];
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  warnings.push(`config.json: ${platform}.${field} is not a boolean, using ${fallback}`);
  return fallback;
}

function readStringList(
  raw: Record<string, unknown>,
  field: string,
  platform: string,
  warnings: string[],
): string[] {
  const value = raw[field];
  if (value === undefined) return [];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
    return [...value];
  }
  warnings.push(`config.json: ${platform}.${field} is not a list of strings, using []`);
  return [];
}
