/**
 * Tandem Engine — Legacy Config Migration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  loadUnifiedConfig,
  mergeLegacyConfigs,
  migrateLegacyConfigs,
  parseInjectorLegacy,
  parseLegacyBoolean,
  parseUnlockerLegacy,
  serializeUnifiedConfig,
  stripLineComments,
  toUnlockerPlatforms,
  updateInjectorIni,
  validateUnifiedConfig,
} from "../src/migration";
import { isSetupError } from "../src/errors";
import { makeTempDir, removeDir } from "./fakes";

const UNLOCKER_JSON = `{
  // written by the unlocker
  "config_version": 6,
  "log_level": "debug",
  "platforms": {
    "Steam": { "enabled": true, "unlock_dlc": false, "blacklist": ["12345"], "ignore": [] },
    "Epic Games": { "enabled": false, "unlock_dlc": true, "blacklist": [], "ignore": ["launcher.exe"] } // off for now
  }
}
`;

describe("stripLineComments", () => {
  it("keeps // inside string literals", () => {
    const parsed: unknown = JSON.parse(stripLineComments('{"url": "http://example.com"} // trailing'));
    expect(parsed).toEqual({ url: "http://example.com" });
  });

  it("handles escaped quotes inside strings", () => {
    const text = '{"a": "say \\"hi\\" // not a comment"} // comment';
    expect(stripLineComments(text)).toBe('{"a": "say \\"hi\\" // not a comment"} ');
  });

  it("keeps the newline after a comment", () => {
    expect(stripLineComments("1 // one\n2")).toBe("1 \n2");
  });
});

describe("parseInjectorLegacy", () => {
  it("maps the three known keys and keeps the rest as extras", () => {
    const result = parseInjectorLegacy(
      [
        "[DllInjector]",
        "; comment",
        "",
        'Exe="C:\\Program Files (x86)\\Steam\\Steam.exe"',
        'Dll="C:\\x\\y.dll"',
        "EnableFakeParentProcess=1",
        "CreateFiles=2",
      ].join("\r\n"),
    );

    expect(result.recognized).toBe(true);
    expect(result.sections).toEqual(["DllInjector"]);
    expect(result.config).toEqual({
      exe: "C:\\Program Files (x86)\\Steam\\Steam.exe",
      dll: "C:\\x\\y.dll",
      enableFakeParentProcess: true,
    });
    expect(result.extras).toEqual({ CreateFiles: "2" });
    expect(result.warnings).toEqual([]);
  });

  it("warns on a non-boolean fake-parent flag", () => {
    const result = parseInjectorLegacy("EnableFakeParentProcess=maybe\n");
    expect(result.config.enableFakeParentProcess).toBeUndefined();
    expect(result.warnings).toEqual([
      'DLLInjector.ini line 1: EnableFakeParentProcess has non-boolean value "maybe"',
    ]);
  });

  it("is not recognized without any key=value line", () => {
    const result = parseInjectorLegacy("[DllInjector]\n; nothing here\n");
    expect(result.recognized).toBe(false);
  });

  it("accepts the usual boolean spellings", () => {
    expect(["1", "TRUE", " yes ", "on"].map(parseLegacyBoolean)).toEqual([true, true, true, true]);
    expect(["0", "false", "No", "off"].map(parseLegacyBoolean)).toEqual([false, false, false, false]);
    expect(parseLegacyBoolean("2")).toBeUndefined();
  });
});

describe("parseUnlockerLegacy", () => {
  it("reads platforms from commented JSON", () => {
    const result = parseUnlockerLegacy(UNLOCKER_JSON);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.config.configVersion).toBe(6);
    expect(result.config.logLevel).toBe("debug");
    expect(result.config.platforms).toEqual({
      Steam: { enabled: true, unlockDlc: false, blacklist: ["12345"], ignore: [] },
      "Epic Games": { enabled: false, unlockDlc: true, blacklist: [], ignore: ["launcher.exe"] },
    });
    expect(result.warnings).toEqual([]);
  });

  it("reports invalid JSON as a warning", () => {
    const result = parseUnlockerLegacy("{ not json");
    expect(result.ok).toBe(false);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^config\.json is not valid JSON: /);
  });

  it("ignores platforms with reserved names", () => {
    const result = parseUnlockerLegacy('{"platforms": {"__proto__": {"enabled": false}, "Steam": {}}}');
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(Object.keys(result.config.platforms)).toEqual(["Steam"]);
    expect(Object.getPrototypeOf(result.config.platforms)).toBe(Object.prototype);
    expect(result.warnings).toEqual(['config.json: platform "__proto__" has a reserved name, ignored']);
  });

  it("falls back to defaults for badly typed fields", () => {
    const result = parseUnlockerLegacy('{"platforms": {"Origin": {"enabled": "yes", "blacklist": [1]}}}');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.platforms.Origin).toEqual({
      enabled: true,
      unlockDlc: true,
      blacklist: [],
      ignore: [],
    });
    expect(result.warnings).toEqual([
      "config.json: Origin.enabled is not a boolean, using true",
      "config.json: Origin.blacklist is not a list of strings, using []",
    ]);
  });
});

describe("migrateLegacyConfigs", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("migrate");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("returns the default config when there are no legacy sources", () => {
    const result = migrateLegacyConfigs({});
    expect(result.config).toEqual({
      core: { injectorEnabled: true, unlockerEnabled: true, stealthMode: true },
      platforms: {},
      migration: { migratedFromInjectorLegacy: false, migratedFromUnlockerLegacy: false },
    });
    expect(result.warnings).toEqual([]);
  });

  it("migrates the injector's fake-parent flag into stealth mode", () => {
    const ini = path.join(root, "DLLInjector.ini");
    fs.writeFileSync(ini, 'Dll="C:\\x\\y.dll"\nEnableFakeParentProcess=1\n');

    const result = migrateLegacyConfigs({ injectorLegacyPath: ini });

    expect(result.config.core.stealthMode).toBe(true);
    expect(result.config.migration.migratedFromInjectorLegacy).toBe(true);
    expect(result.config.platforms.Steam).toEqual({
      enabled: true,
      unlockDlc: true,
      blacklist: [],
      ignore: [],
    });
    expect(result.diagnostics.injector?.dll).toBe("C:\\x\\y.dll");
  });

  it("resolves a directory to the tool's config filename", () => {
    fs.writeFileSync(path.join(root, "config.json"), UNLOCKER_JSON);
    const result = migrateLegacyConfigs({ unlockerLegacyPath: root });
    expect(result.diagnostics.unlocker?.path).toBe(path.join(root, "config.json"));
    expect(result.config.migration.migratedFromUnlockerLegacy).toBe(true);
  });

  it("keeps going with the injector when the unlocker config is broken", () => {
    const ini = path.join(root, "DLLInjector.ini");
    const json = path.join(root, "config.json");
    fs.writeFileSync(ini, "EnableFakeParentProcess=0\n");
    fs.writeFileSync(json, "{ broken");

    const result = migrateLegacyConfigs({ injectorLegacyPath: ini, unlockerLegacyPath: json });

    expect(result.config.core.stealthMode).toBe(false);
    expect(result.config.migration).toEqual({
      migratedFromInjectorLegacy: true,
      migratedFromUnlockerLegacy: false,
    });
    expect(result.warnings).toHaveLength(1);
  });

  it("warns about a missing legacy file", () => {
    const missing = path.join(root, "nope.ini");
    const result = migrateLegacyConfigs({ injectorLegacyPath: missing });
    expect(result.warnings).toEqual([`Legacy injector config not found at ${missing}`]);
    expect(result.config.migration.migratedFromInjectorLegacy).toBe(false);
  });

  it("produces byte-identical output for identical inputs", () => {
    const ini = path.join(root, "DLLInjector.ini");
    const json = path.join(root, "config.json");
    fs.writeFileSync(ini, "Dll=a.dll\nEnableFakeParentProcess=1\n");
    fs.writeFileSync(json, UNLOCKER_JSON);

    const first = serializeUnifiedConfig(
      migrateLegacyConfigs({ injectorLegacyPath: ini, unlockerLegacyPath: json }).config,
    );
    const second = serializeUnifiedConfig(
      migrateLegacyConfigs({ injectorLegacyPath: ini, unlockerLegacyPath: json }).config,
    );

    expect(second).toBe(first);
    expect(Object.keys(JSON.parse(first).platforms)).toEqual(["Epic Games", "Steam"]);
  });
});

describe("mergeLegacyConfigs", () => {
  it("lets the unlocker's Steam settings win over the injector default", () => {
    const config = mergeLegacyConfigs(
      { enableFakeParentProcess: false },
      {
        platforms: { Steam: { enabled: false, unlockDlc: false, blacklist: ["1"], ignore: [] } },
      },
    );
    expect(config.platforms.Steam).toEqual({ enabled: false, unlockDlc: false, blacklist: ["1"], ignore: [] });
    expect(config.core.stealthMode).toBe(false);
  });

  it("applies overrides last", () => {
    const config = mergeLegacyConfigs(null, null, {
      core: { unlockerEnabled: false },
      platforms: { Steam: { unlockDlc: false } },
    });
    expect(config.core).toEqual({ injectorEnabled: true, unlockerEnabled: false, stealthMode: true });
    expect(config.platforms.Steam).toEqual({ enabled: true, unlockDlc: false, blacklist: [], ignore: [] });
  });

  it("returns a frozen config", () => {
    const config = mergeLegacyConfigs(null, null);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.core)).toBe(true);
  });
});

describe("unified config schema", () => {
  it("accepts a merged config", () => {
    const config = mergeLegacyConfigs({ enableFakeParentProcess: true }, null);
    expect(validateUnifiedConfig(config)).toEqual({ valid: true, errors: [] });
  });

  it("rejects unknown fields and wrong types", () => {
    const result = validateUnifiedConfig({
      core: { injectorEnabled: "yes", unlockerEnabled: true, stealthMode: true },
      platforms: {},
      migration: { migratedFromInjectorLegacy: false, migratedFromUnlockerLegacy: false },
      extra: 1,
    });
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path)).toContain("/core/injectorEnabled");
  });

  describe("loadUnifiedConfig", () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir("unified");
    });

    afterEach(() => {
      removeDir(root);
    });

    it("reads back what serializeUnifiedConfig wrote", () => {
      const file = path.join(root, "unified-config.json");
      const config = mergeLegacyConfigs(null, { platforms: {} });
      fs.writeFileSync(file, serializeUnifiedConfig(config));
      expect(loadUnifiedConfig(file)).toEqual(config);
    });

    it("throws a config error for an invalid file", () => {
      const file = path.join(root, "unified-config.json");
      fs.writeFileSync(file, '{"core": {}}');
      let caught: unknown;
      try {
        loadUnifiedConfig(file);
      } catch (err: unknown) {
        caught = err;
      }
      expect(isSetupError(caught) ? caught.category : undefined).toBe("CONFIG_ERROR");
    });
  });
});

describe("writing legacy formats back", () => {
  it("updates keys in place and appends missing ones", () => {
    const text = "[DllInjector]\r\n; keep me\r\nDll=\r\nExe=steam.exe\r\n\r\n";
    const updated = updateInjectorIni(text, { Dll: '"C:\\a.dll"', EnableFakeParentProcess: "1" });
    expect(updated).toBe(
      '[DllInjector]\r\n; keep me\r\nDll="C:\\a.dll"\r\nExe=steam.exe\r\nEnableFakeParentProcess=1\r\n',
    );
  });

  it("maps platforms back to the unlocker's field names", () => {
    expect(
      toUnlockerPlatforms({ Steam: { enabled: true, unlockDlc: false, blacklist: ["7"], ignore: [] } }),
    ).toEqual({ Steam: { enabled: true, unlock_dlc: false, blacklist: ["7"], ignore: [] } });
  });
});
