/**
 * Tandem Engine — Host Capability Tests
 *
 * Only the parts that run without PowerShell, UAC or a network.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  buildElevationScript,
  createElevation,
  encodePowerShell,
  processExitCode,
  psQuote,
} from "../src/platform/elevation";
import { flattenSingleRoot } from "../src/platform/extractor";
import { DesktopEntryCreator, renderDesktopEntry } from "../src/platform/shortcuts";
import { defenderExclusionCommand } from "../src/phases";
import { assertHttpsUrl } from "../src/downloader";
import { makeTempDir, removeDir, silentLogger } from "./fakes";

describe("PowerShell helpers", () => {
  it("doubles single quotes", () => {
    expect(psQuote("C:\\Users\\O'Brien")).toBe("'C:\\Users\\O''Brien'");
  });

  it("builds the elevation script", () => {
    expect(buildElevationScript({ file: "C:\\setup.exe", args: ["/S", "/D=C:\\x"] })).toBe(
      "$p = Start-Process -FilePath 'C:\\setup.exe' -ArgumentList @('/S', '/D=C:\\x') " +
        "-Verb RunAs -WindowStyle Hidden -Wait -PassThru; exit $p.ExitCode",
    );
  });

  it("leaves out an empty argument list", () => {
    expect(buildElevationScript({ file: "a.exe", args: [] })).toBe(
      "$p = Start-Process -FilePath 'a.exe' -Verb RunAs -WindowStyle Hidden -Wait -PassThru; exit $p.ExitCode",
    );
  });

  it("encodes as UTF-16LE base64", () => {
    expect(Buffer.from(encodePowerShell("exit 0"), "base64").toString("utf16le")).toBe("exit 0");
  });

  it("builds the Defender exclusion command", () => {
    expect(defenderExclusionCommand("C:\\Tandem")).toBe("Add-MpPreference -ExclusionPath 'C:\\Tandem'");
  });

  it("reads numeric exit codes only", () => {
    expect(processExitCode(Object.assign(new Error("x"), { code: 3 }))).toBe(3);
    expect(processExitCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBeUndefined();
  });
});

describe("createElevation", () => {
  it("cannot raise single commands off Windows", () => {
    const elevation = createElevation("linux", silentLogger);
    expect(elevation.platform).toBe("linux");
    expect(elevation.canElevate).toBe(false);
  });

  it("can on Windows", () => {
    expect(createElevation("win32", silentLogger).canElevate).toBe(true);
  });
});

describe("desktop entries", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("platform");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("renders a freedesktop entry", () => {
    expect(renderDesktopEntry({ name: "Tandem Injector", target: "/opt/t/inj.exe", workDir: "/opt/t" })).toBe(
      [
        "[Desktop Entry]",
        "Type=Application",
        "Name=Tandem Injector",
        'Exec="/opt/t/inj.exe"',
        "Path=/opt/t",
        "Terminal=false",
        "",
      ].join("\n"),
    );
  });

  it("writes entries under a slugged file name", async () => {
    const creator = new DesktopEntryCreator(path.join(root, "Desktop"), silentLogger);
    const created = await creator.createShortcut({ name: "Tandem Injector", target: "/x", workDir: "/" });

    expect(created).toBe(path.join(root, "Desktop", "tandem-injector.desktop"));
    expect(creator.shortcutPath("Tandem Injector")).toBe(created);
    expect(fs.readFileSync(created, "utf-8")).toContain("Name=Tandem Injector");
  });

  it("moves a single root folder up one level", async () => {
    const nested = path.join(root, "injector-1.2");
    fs.mkdirSync(nested);
    fs.writeFileSync(path.join(nested, "DLLInjector.exe"), "exe");

    expect(await flattenSingleRoot(root, silentLogger)).toBe(true);
    expect(fs.readdirSync(root)).toEqual(["DLLInjector.exe"]);
  });

  it("leaves multi-entry archives alone", async () => {
    fs.writeFileSync(path.join(root, "a"), "");
    fs.writeFileSync(path.join(root, "b"), "");
    expect(await flattenSingleRoot(root, silentLogger)).toBe(false);
  });
});

describe("assertHttpsUrl", () => {
  it("accepts https", () => {
    expect(() => assertHttpsUrl("https://example.com/a.exe")).not.toThrow();
  });

  it("rejects other schemes and garbage", () => {
    expect(() => assertHttpsUrl("ftp://example.com/a.exe")).toThrow(
      "Download URL must be HTTPS. Got: ftp://example.com/a.exe",
    );
    expect(() => assertHttpsUrl("not a url")).toThrow("Invalid download URL: not a url");
  });
});
