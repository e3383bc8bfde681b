/**
 * Tandem Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

import { Capabilities, Prompter } from "./capabilities";
import { HttpsDownloader } from "./downloader";
import { createElevation } from "./platform/elevation";
import { ArchiveExtractor } from "./platform/extractor";
import { createShortcutCreator } from "./platform/shortcuts";
import { Logger } from "./utils/logger";

// Pipeline
export { PhasePipeline, definePhase } from "./pipeline";
export type {
  PhaseDefinition,
  PhaseRun,
  PhaseScope,
  PipelineOptions,
  RunArtifacts,
  RunContext,
} from "./pipeline";
export {
  createSetupPhases,
  findInstallation,
  findLegacyShortcuts,
  SETUP_PHASE_NAMES,
  APP_ID_PATTERN,
} from "./phases";
export type { SetupPhaseOptions } from "./phases";
export { formatRunSummary } from "./summary";

// Building blocks
export { ResourceLedger, nodeLedgerFs, pathExists } from "./ledger";
export type { LedgerFileSystem, LedgerOptions, LedgerContext, CreatedKind } from "./ledger";
export {
  executeWithRetry,
  validateRetryPolicy,
  delayForAttempt,
  defaultClassify,
  abortableSleep,
  DEFAULT_RETRY_POLICY,
} from "./retry";
export type { RetryOptions, Sleep } from "./retry";
export { PrivilegeGate } from "./privilege-gate";
export type { PrivilegeGateOptions } from "./privilege-gate";
export {
  ensureDirectory,
  writeFileIdempotent,
  copyFileIdempotent,
  backupFile,
  nextBackupPath,
} from "./fs-ops";
export type { Mutation, MutationContext, DirectoryKind } from "./fs-ops";
export * from "./migration";
export { loadComponentCatalog, expandHome } from "./components";
export type { ComponentCatalog, InjectorComponent, UnlockerComponent, LegacyLocations } from "./components";
export { checkFilesPresent, computeFileHash, sameFileContent } from "./verifier";

// Errors
export {
  SetupError,
  RetryExhaustedError,
  isSetupError,
  errorMessage,
  cancelledError,
  toSetupError,
  classifyFsError,
  exitCodeForCategory,
  EXIT_CODES,
} from "./errors";

// All types
export type * from "./types";
export type * from "./capabilities";

// Host implementations
export { HttpsDownloader, assertHttpsUrl } from "./downloader";
export { ArchiveExtractor } from "./platform/extractor";
export { createElevation, WindowsElevation, PosixElevation } from "./platform/elevation";
export {
  createShortcutCreator,
  renderDesktopEntry,
  WindowsShortcutCreator,
  DesktopEntryCreator,
  MacAliasCreator,
} from "./platform/shortcuts";

export { createLogger } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";

/** The real host: PowerShell on Windows, unzip and .desktop files elsewhere */
export function createDefaultCapabilities(
  platform: NodeJS.Platform,
  desktopDir: string,
  logger: Logger,
  prompter: Prompter,
): Capabilities {
  return {
    extractor: new ArchiveExtractor(platform, logger),
    downloader: new HttpsDownloader(logger),
    shortcuts: createShortcutCreator(platform, desktopDir, logger),
    elevation: createElevation(platform, logger),
    prompter,
  };
}
