/**
 * Parser for the legacy DLL injector's INI file (DLLInjector.ini).
 *
 *   [DllInjector]
 *   ; comment
 *   Exe="C:\Program Files (x86)\Steam\Steam.exe"
 *   Dll="C:\GreenLuma\GreenLuma_2020_x86.dll"
 *   EnableFakeParentProcess=1
 *
 * Keys are case-insensitive. Values may be double-quoted; backslashes are
 * literal. Only Dll, Exe and EnableFakeParentProcess carry meaning, every
 * other key ends up in `extras` for display.
 */

export interface InjectorLegacyConfig {
  dll?: string;
  exe?: string;
  enableFakeParentProcess?: boolean;
}

export interface InjectorParseResult {
  config: InjectorLegacyConfig;
  /** Unmapped keys with their values as written */
  extras: Record<string, string>;
  /** Section headers seen, in order */
  sections: string[];
  /** False when the file held no key=value line at all */
  recognized: boolean;
  warnings: string[];
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parseLegacyBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

const KEY_VALUE = /^([A-Za-z_][\w.-]*)\s*=\s*(.*)$/;
const SECTION = /^\[([^\]]*)\]$/;

export function parseInjectorLegacy(text: string): InjectorParseResult {
  const result: InjectorParseResult = {
    config: {},
    extras: {},
    sections: [],
    recognized: false,
    warnings: [],
  };

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNo = index + 1;
    if (line === "" || line.startsWith(";") || line.startsWith("#")) return;

    const section = SECTION.exec(line);
    if (section) {
      result.sections.push(section[1].trim());
      return;
    }

    const match = KEY_VALUE.exec(line);
    if (!match) {
      result.warnings.push(`DLLInjector.ini line ${lineNo}: cannot parse "${line}"`);
      return;
    }

    result.recognized = true;
    const [, key, rawValue] = match;
    const value = unquote(rawValue.trim(), lineNo, result.warnings);

    switch (key.toLowerCase()) {
      case "dll":
        result.config.dll = value;
        break;
      case "exe":
        result.config.exe = value;
        break;
      case "enablefakeparentprocess": {
        const flag = parseLegacyBoolean(value);
        if (flag === undefined) {
          result.warnings.push(
            `DLLInjector.ini line ${lineNo}: EnableFakeParentProcess has non-boolean value "${value}"`,
          );
        } else {
          result.config.enableFakeParentProcess = flag;
        }
        break;
      }
      default:
        result.extras[key] = rawValue.trim();
    }
  });

  return result;
}

function unquote(value: string, lineNo: number, warnings: string[]): string {
  if (!value.startsWith('"')) return value;
  if (value.length >= 2 && value.endsWith('"')) return value.slice(1, -1);
  warnings.push(`DLLInjector.ini line ${lineNo}: unterminated quoted value`);
  return value.slice(1);
}

/**
 * Replace (or append) `key=value` pairs in an injector INI, keeping every
 * other line, comment and the original line endings untouched.
 */
export function updateInjectorIni(
  text: string,
  updates: Record<string, string>,
): string {
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  const lines = text.length > 0 ? text.split(/\r?\n/) : [];
  const pending = new Map(
    Object.entries(updates).map(([k, v]) => [k.toLowerCase(), { key: k, value: v }]),
  );

  const updated = lines.map((line) => {
    const match = KEY_VALUE.exec(line.trim());
    if (!match) return line;
    const update = pending.get(match[1].toLowerCase());
    if (!update) return line;
    pending.delete(match[1].toLowerCase());
    return `${match[1]}=${update.value}`;
  });

  while (updated.length > 0 && updated[updated.length - 1] === "") updated.pop();
  for (const { key, value } of pending.values()) {
    updated.push(`${key}=${value}`);
  }
  return updated.join(eol) + eol;
}
