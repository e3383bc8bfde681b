/**
 * Tandem CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module so --quiet can
 * silence everything except errors and the final summary.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import { ErrorCategory } from "@tandem/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

let _quietMode = false;

export function setQuietMode(enabled: boolean): void {
  _quietMode = enabled;
}

export function isQuietMode(): boolean {
  return _quietMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  warn: chalk.yellow,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
  dash: chalk.gray("\u2500"), // ─
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  if (_quietMode) return;
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  if (_quietMode) return;
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  if (_quietMode) return;
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  if (_quietMode) return;
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ create-directories
 *   ✔ write-unified-config
 */
export function printStageSuccess(msg: string): void {
  if (_quietMode) return;
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  if (_quietMode) return;
  console.log(`  ${symbols.warn}  ${msg}`);
}

export function printStageInfo(msg: string): void {
  if (_quietMode) return;
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

// ─── Header / Banner ────────────────────────────────────────

/**
 * Print a bold header line, e.g.  "Setting up Tandem in C:\\Users\\me\\Documents\\Tandem"
 */
export function printHeader(msg: string): void {
  if (_quietMode) return;
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", isSilent: _quietMode });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

type TableConfig = NonNullable<ConstructorParameters<typeof Table>[0]>;

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

/** Bordered table; ASCII borders on legacy Windows consoles */
export function printTable({ head, rows, colWidths }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const tableOpts: TableConfig = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(colWidths ? { colWidths } : {}),
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  };
  const table = new Table(tableOpts);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  GENERAL_ERROR: "Setup failed",
  PERMISSION_ERROR: "Administrator privileges required",
  NETWORK_ERROR: "Network or download failure",
  FILE_ERROR: "File operation failed",
  CONFIG_ERROR: "Invalid configuration",
  CANCELLED: "Cancelled by user",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
