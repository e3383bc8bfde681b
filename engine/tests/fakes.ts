/**
 * In-process stand-ins for the host capabilities, shared by the tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  Capabilities,
  DownloadResult,
  Downloader,
  ElevatedCommand,
  ElevationCapability,
  ExtractOptions,
  Extractor,
  FetchOptions,
  Prompter,
  ShortcutCreator,
  ShortcutSpec,
} from "../src/capabilities";
import { PlatformFeature, SetupSettings } from "../src/types";
import { SetupError, cancelledError } from "../src/errors";
import { createLogger } from "../src/utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `tandem-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Writes a fixed set of files instead of unpacking an archive */
export class FakeExtractor implements Extractor {
  readonly calls: string[] = [];
  failuresLeft: number;

  constructor(
    private readonly files: Record<string, string>,
    transientFailures = 0,
  ) {
    this.failuresLeft = transientFailures;
  }

  async extract(archivePath: string, destDir: string, _options?: ExtractOptions): Promise<void> {
    this.calls.push(archivePath);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new SetupError("archive locked", "transient", "FILE_ERROR");
    }
    for (const [rel, content] of Object.entries(this.files)) {
      const target = path.join(destDir, rel);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    }
  }
}

export class FakeDownloader implements Downloader {
  readonly urls: string[] = [];

  constructor(
    private readonly content: string = "installer-bytes",
    private readonly error?: SetupError,
  ) {}

  async fetch(url: string, destPath: string, options: FetchOptions = {}): Promise<DownloadResult> {
    this.urls.push(url);
    if (options.signal?.aborted) throw cancelledError();
    if (this.error) throw this.error;
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    fs.writeFileSync(destPath, this.content);
    const size = Buffer.byteLength(this.content);
    options.onProgress?.({ bytes_downloaded: size, bytes_total: size, percent: 100 });
    return { file_path: destPath, bytes_downloaded: size, resumed_from: 0, duration_ms: 1 };
  }
}

export class FakeShortcutCreator implements ShortcutCreator {
  readonly created: ShortcutSpec[] = [];

  constructor(
    private readonly desktopDir: string,
    readonly feature: PlatformFeature = "linux_desktop_entries",
  ) {}

  shortcutPath(name: string): string {
    return path.join(this.desktopDir, `${name}.desktop`);
  }

  async createShortcut(spec: ShortcutSpec): Promise<string> {
    const target = this.shortcutPath(spec.name);
    fs.mkdirSync(this.desktopDir, { recursive: true });
    fs.writeFileSync(target, spec.target);
    this.created.push(spec);
    return target;
  }
}

export interface FakeElevationOptions {
  platform?: NodeJS.Platform;
  canElevate?: boolean;
  elevated?: boolean;
  /** Exit codes returned by successive run() calls; the last one repeats */
  exitCodes?: number[];
  /** Never settle until aborted */
  hang?: boolean;
}

export class FakeElevation implements ElevationCapability {
  readonly platform: NodeJS.Platform;
  readonly canElevate: boolean;
  readonly commands: ElevatedCommand[] = [];
  private readonly options: FakeElevationOptions;

  constructor(options: FakeElevationOptions = {}) {
    this.options = options;
    this.platform = options.platform ?? "linux";
    this.canElevate = options.canElevate ?? false;
  }

  async isElevated(): Promise<boolean> {
    return this.options.elevated ?? false;
  }

  run(command: ElevatedCommand, signal: AbortSignal): Promise<number> {
    this.commands.push(command);
    if (this.options.hang) {
      return new Promise<number>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(cancelledError()), { once: true });
      });
    }
    const codes = this.options.exitCodes ?? [0];
    const index = Math.min(this.commands.length - 1, codes.length - 1);
    return Promise.resolve(codes[index]);
  }
}

export class FakePrompter implements Prompter {
  readonly messages: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(message: string): Promise<boolean> {
    this.messages.push(message);
    return this.answer;
  }
}

export const INJECTOR_FILES: Record<string, string> = {
  "DLLInjector.exe": "exe",
  "DLLInjector.ini": "[DllInjector]\nExe=\nDll=\nEnableFakeParentProcess=0\n",
  "GreenLuma_2020_x64.dll": "dll64",
  "GreenLuma_2020_x86.dll": "dll86",
  "GreenLumaSettings_2023.exe": "settings",
};

export function fakeCapabilities(desktopDir: string, overrides: Partial<Capabilities> = {}): Capabilities {
  return {
    extractor: new FakeExtractor(INJECTOR_FILES),
    downloader: new FakeDownloader(),
    shortcuts: new FakeShortcutCreator(desktopDir),
    elevation: new FakeElevation(),
    prompter: new FakePrompter(true),
    ...overrides,
  };
}

/** Settings rooted at `root`, with an assets dir holding a dummy archive */
export function testSettings(root: string, overrides: Partial<SetupSettings> = {}): SetupSettings {
  const coreDir = path.join(root, "Tandem");
  const assetsDir = path.join(root, "assets");
  fs.mkdirSync(assetsDir, { recursive: true });
  fs.writeFileSync(path.join(assetsDir, "injector.zip"), "zip");

  return {
    paths: {
      coreDir,
      injectorDir: path.join(coreDir, "injector"),
      unlockerDir: path.join(coreDir, "unlocker"),
      configDir: path.join(coreDir, "config"),
      tempDir: path.join(coreDir, "temp"),
      assetsDir,
      backupDir: path.join(coreDir, "backups"),
      desktopDir: path.join(root, "Desktop"),
    },
    appId: "480",
    downloadUrl: "https://example.com/UnlockerInstaller.exe",
    timeoutMs: 5000,
    dryRun: false,
    configOnly: false,
    skipAdmin: true,
    skipSecurity: false,
    cleanup: true,
    force: false,
    ...overrides,
  };
}

/** Every file below `dir`, relative and sorted */
export function snapshotTree(dir: string): string[] {
  const out: string[] = [];
  const walk = (current: string, prefix: string) => {
    if (!fs.existsSync(current)) return;
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      out.push(rel);
      if (entry.isDirectory()) walk(path.join(current, entry.name), rel);
    }
  };
  walk(dir, "");
  return out.sort();
}
