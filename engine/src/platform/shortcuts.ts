/**
 * Tandem Engine — Shortcut Creators
 *
 * Windows: proper .lnk files through PowerShell's WScript.Shell COM object.
 * Linux: freedesktop .desktop entries.
 * macOS: a symlink on the desktop (Finder shows it like an alias).
 */

import * as fs from "fs";
import * as path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import { ShortcutCreator, ShortcutSpec } from "../capabilities";
import { PlatformFeature } from "../types";
import { SetupError, cancelledError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";
import { psQuote } from "./elevation";

const execFileAsync = promisify(execFile);

export class WindowsShortcutCreator implements ShortcutCreator {
  readonly feature: PlatformFeature = "windows_shortcuts";

  constructor(
    private readonly desktopDir: string,
    private readonly logger: Logger,
  ) {}

  shortcutPath(name: string): string {
    return path.join(this.desktopDir, `${name}.lnk`);
  }

  async createShortcut(spec: ShortcutSpec, signal?: AbortSignal): Promise<string> {
    const shortcutPath = this.shortcutPath(spec.name);

    const psScript = [
      `$ws = New-Object -ComObject WScript.Shell;`,
      `$sc = $ws.CreateShortcut(${psQuote(shortcutPath)});`,
      `$sc.TargetPath = ${psQuote(spec.target)};`,
      `$sc.WorkingDirectory = ${psQuote(spec.workDir)};`,
      spec.icon ? `$sc.IconLocation = ${psQuote(spec.icon)};` : "",
      `$sc.Save()`,
    ]
      .filter(Boolean)
      .join(" ");

    try {
      await execFileAsync(
        "powershell",
        ["-NoProfile", "-ExecutionPolicy", "Bypass", "-Command", psScript],
        { windowsHide: true, signal },
      );
    } catch (err: unknown) {
      if (signal?.aborted) throw cancelledError();
      throw new SetupError(
        `Failed to create shortcut ${spec.name}: ${errorMessage(err)}`,
        "permanent",
        "FILE_ERROR",
        { cause: err },
      );
    }

    this.logger.info({ name: spec.name, target: spec.target, path: shortcutPath }, "Created shortcut");
    return shortcutPath;
  }
}

export function renderDesktopEntry(spec: ShortcutSpec): string {
  const lines = [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${spec.name}`,
    `Exec="${spec.target}"`,
    `Path=${spec.workDir}`,
  ];
  if (spec.icon) lines.push(`Icon=${spec.icon}`);
  lines.push("Terminal=false", "");
  return lines.join("\n");
}

export class DesktopEntryCreator implements ShortcutCreator {
  readonly feature: PlatformFeature = "linux_desktop_entries";

  constructor(
    private readonly desktopDir: string,
    private readonly logger: Logger,
  ) {}

  shortcutPath(name: string): string {
    const fileName = name.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
    return path.join(this.desktopDir, `${fileName}.desktop`);
  }

  async createShortcut(spec: ShortcutSpec): Promise<string> {
    const entryPath = this.shortcutPath(spec.name);
    await fs.promises.mkdir(this.desktopDir, { recursive: true });
    await fs.promises.writeFile(entryPath, renderDesktopEntry(spec), { mode: 0o755 });
    this.logger.info({ name: spec.name, path: entryPath }, "Created desktop entry");
    return entryPath;
  }
}

export class MacAliasCreator implements ShortcutCreator {
  readonly feature: PlatformFeature = "macos_aliases";

  constructor(
    private readonly desktopDir: string,
    private readonly logger: Logger,
  ) {}

  shortcutPath(name: string): string {
    return path.join(this.desktopDir, name);
  }

  async createShortcut(spec: ShortcutSpec): Promise<string> {
    const aliasPath = this.shortcutPath(spec.name);
    await fs.promises.symlink(spec.target, aliasPath);
    this.logger.info({ name: spec.name, path: aliasPath }, "Created alias");
    return aliasPath;
  }
}

export function createShortcutCreator(
  platform: NodeJS.Platform,
  desktopDir: string,
  logger: Logger,
): ShortcutCreator {
  switch (platform) {
    case "win32":
      return new WindowsShortcutCreator(desktopDir, logger);
    case "darwin":
      return new MacAliasCreator(desktopDir, logger);
    default:
      return new DesktopEntryCreator(desktopDir, logger);
  }
}
