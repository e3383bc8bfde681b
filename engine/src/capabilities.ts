/**
 * Tandem Engine — Capability Interfaces
 *
 * Everything the pipeline needs from the host system, expressed as small
 * interfaces. The engine ships default implementations (see ./platform and
 * ./downloader); tests substitute in-process fakes.
 *
 * Every suspension point takes the run's AbortSignal.
 */

import { PlatformFeature } from "./types";

// ─── Extraction ──────────────────────────────────────────────────

export interface ExtractOptions {
  /** If the archive holds a single root folder, move its contents up */
  flatten?: boolean;
  signal?: AbortSignal;
}

export interface Extractor {
  extract(archivePath: string, destDir: string, options?: ExtractOptions): Promise<void>;
}

// ─── Download ────────────────────────────────────────────────────

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Idle timeout for the connection */
  timeoutMs?: number;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  /** Bytes already on disk when the request was made */
  resumed_from: number;
  duration_ms: number;
}

/**
 * Non-2xx responses and transport errors reject with a transient
 * SetupError so callers can retry; a partial file is kept for resuming.
 */
export interface Downloader {
  fetch(url: string, destPath: string, options?: FetchOptions): Promise<DownloadResult>;
}

// ─── Shortcuts ───────────────────────────────────────────────────

export interface ShortcutSpec {
  /** Executable the shortcut launches */
  target: string;
  /** Display name, without extension */
  name: string;
  workDir: string;
  icon?: string;
}

export interface ShortcutCreator {
  /** Feature the gate must report before this creator is used */
  readonly feature: PlatformFeature;
  /** Where createShortcut() will write for `name` */
  shortcutPath(name: string): string;
  /** @returns The path of the created shortcut */
  createShortcut(spec: ShortcutSpec, signal?: AbortSignal): Promise<string>;
}

// ─── Elevation ───────────────────────────────────────────────────

export interface ElevatedCommand {
  file: string;
  args: string[];
  /** Shown in logs and results */
  label?: string;
}

export interface ElevationCapability {
  readonly platform: NodeJS.Platform;
  /** Whether this host can raise privileges for a single command */
  readonly canElevate: boolean;
  isElevated(): Promise<boolean>;
  /**
   * Run `command` with raised privileges. Aborting the signal kills the
   * process.
   *
   * @returns The process exit code
   */
  run(command: ElevatedCommand, signal: AbortSignal): Promise<number>;
}

// ─── Confirmation ────────────────────────────────────────────────

export interface Prompter {
  /** Rejects with a cancelled SetupError when the signal fires */
  confirm(message: string, signal?: AbortSignal): Promise<boolean>;
}

export interface Capabilities {
  extractor: Extractor;
  downloader: Downloader;
  shortcuts: ShortcutCreator;
  elevation: ElevationCapability;
  prompter: Prompter;
}
