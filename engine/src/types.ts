/**
 * Tandem Engine — Core Type Definitions
 *
 * Shared vocabulary for the setup pipeline: phases and their results,
 * ledger entries, retry policies, the unified configuration, run-level
 * settings and the events the engine emits to whatever UI is attached.
 *
 * Data records that end up in reports use snake_case fields; option bags
 * passed between modules use camelCase.
 */

import type { SetupError } from "./errors";

// ─── Errors ──────────────────────────────────────────────────────

/** How the pipeline reacts to an error */
export type ErrorKind =
  | "transient"
  | "permanent"
  | "platform_unsupported"
  | "cancelled";

/** What the user is told; maps 1:1 onto CLI exit codes */
export type ErrorCategory =
  | "GENERAL_ERROR"
  | "PERMISSION_ERROR"
  | "NETWORK_ERROR"
  | "FILE_ERROR"
  | "CONFIG_ERROR"
  | "CANCELLED";

// ─── Phases ──────────────────────────────────────────────────────

export interface PhaseDescriptor {
  readonly name: string;
  readonly ordinal: number;
  /** If false, a failure only warns and the pipeline continues */
  readonly required: boolean;
  /** The phase only reads state, even outside dry-run */
  readonly dryRunSafe: boolean;
}

export type PhaseStatus =
  | "SUCCESS"
  | "SOFT_FAILURE"
  | "FATAL_FAILURE"
  | "SKIPPED";

export interface PhaseResult {
  phase: string;
  ordinal: number;
  status: PhaseStatus;
  warnings: string[];
  errors: string[];
  /** What the phase did, or in dry-run what it would do */
  actions: string[];
  duration_ms: number;
  skip_reason?: string;
}

// ─── Pipeline ────────────────────────────────────────────────────

export type PipelineState =
  | "NOT_STARTED"
  | "RUNNING"
  | "ROLLING_BACK"
  | "COMPLETED"
  | "ROLLED_BACK"
  | "ABORTED";

export type RunStatus = "COMPLETED" | "ABORTED";

// ─── Ledger ──────────────────────────────────────────────────────

export type LedgerEntryKind =
  | "TEMP_FILE"
  | "TEMP_DIRECTORY"
  | "CREATED_FILE"
  | "CREATED_DIRECTORY"
  | "CONFIG_BACKUP";

export interface LedgerEntry {
  kind: LedgerEntryKind;
  path: string;
  /** Name of the phase that registered the entry */
  phase: string;
  created_at: string;
  /** For CONFIG_BACKUP: the file the backup is restored over */
  original_path?: string;
}

export type LedgerOutcome = "undone" | "already_absent" | "failed";

export interface LedgerItemReport {
  entry: LedgerEntry;
  outcome: LedgerOutcome;
  error?: string;
}

export interface RollbackReport {
  operation: "rollback" | "cleanup";
  /** In the order they were attempted */
  items: LedgerItemReport[];
  undone: number;
  failed: number;
  warnings: string[];
}

// ─── Retry ───────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total attempts including the first one (>= 1) */
  maxAttempts: number;
  /** Delay before attempt 2, in milliseconds */
  initialDelayMs: number;
  /** Growth factor per attempt (>= 1.0) */
  multiplier: number;
  /** Add uniform jitter in [0, delay/2) */
  jitter?: boolean;
}

export interface RetryNotice {
  /** The attempt that just failed */
  attempt: number;
  error: unknown;
  /** Sleep before the next attempt, jitter included */
  delayMs: number;
}

// ─── Unified Configuration ───────────────────────────────────────

export interface PlatformSettings {
  enabled: boolean;
  unlockDlc: boolean;
  blacklist: string[];
  ignore: string[];
}

export interface UnifiedConfig {
  core: {
    injectorEnabled: boolean;
    unlockerEnabled: boolean;
    stealthMode: boolean;
  };
  platforms: Record<string, PlatformSettings>;
  migration: {
    migratedFromInjectorLegacy: boolean;
    migratedFromUnlockerLegacy: boolean;
  };
}

/** User-supplied values that win over anything migrated */
export interface ConfigOverrides {
  core?: Partial<UnifiedConfig["core"]>;
  platforms?: Record<string, Partial<PlatformSettings>>;
}

// ─── Run Settings ────────────────────────────────────────────────

export interface SetupPaths {
  /** Root of the installation (injector/, unlocker/, config/ live here) */
  coreDir: string;
  injectorDir: string;
  unlockerDir: string;
  configDir: string;
  /** Scratch space; registered as a temp directory */
  tempDir: string;
  /** Bundled archives and config templates */
  assetsDir: string;
  /** Where retired legacy shortcuts are backed up */
  backupDir: string;
  /** Desktop folder scanned for legacy shortcuts */
  desktopDir: string;
}

export interface SetupSettings {
  paths: SetupPaths;
  /** Numeric store id written to the AppList */
  appId: string;
  downloadUrl: string;
  /** Per-suspension-point timeout (downloads, elevated commands) */
  timeoutMs: number;
  dryRun: boolean;
  configOnly: boolean;
  skipAdmin: boolean;
  skipSecurity: boolean;
  /** Run temp cleanup after a successful run */
  cleanup: boolean;
  /** Overwrite/replace without asking */
  force: boolean;
  legacyInjectorPath?: string;
  legacyUnlockerPath?: string;
  overrides?: ConfigOverrides;
}

// ─── Platform Features ───────────────────────────────────────────

export type PlatformFeature =
  | "windows_admin"
  | "windows_defender"
  | "windows_shortcuts"
  | "linux_desktop_entries"
  | "macos_aliases"
  | "elevated_commands";

export interface OperationResult {
  success: boolean;
  message: string;
  /** Hints for the user when success is false */
  suggestions: string[];
  exit_code?: number;
  error?: SetupError;
}

// ─── Idempotent Mutations ────────────────────────────────────────

export type MutationOutcome = "CREATED" | "ALREADY_SATISFIED" | "FAILED";

// ─── Run Result ──────────────────────────────────────────────────

export interface RunError {
  category: ErrorCategory;
  kind: ErrorKind;
  message: string;
  phase: string;
}

export interface RunResult {
  run_id: string;
  status: RunStatus;
  started_at: string;
  finished_at: string;
  dry_run: boolean;
  results: PhaseResult[];
  failed_phase?: string;
  error?: RunError;
  rollback?: RollbackReport;
  cleanup?: RollbackReport;
  /** Phase warnings plus cleanup warnings, in order */
  warnings: string[];
  /** Ledger entries that could not be undone and need manual removal */
  leftovers: LedgerEntry[];
  config?: UnifiedConfig;
}

// ─── Engine Events ───────────────────────────────────────────────

interface EventBase {
  timestamp: string;
  run_id: string;
}

export type SetupEvent =
  | (EventBase & { type: "state_change"; state: PipelineState })
  | (EventBase & { type: "phase_started"; phase: string; ordinal: number; total: number })
  | (EventBase & { type: "phase_finished"; result: PhaseResult })
  | (EventBase & {
      type: "retry_attempted";
      phase: string;
      attempt: number;
      error: string;
      delay_ms: number;
    })
  | (EventBase & { type: "rollback_report"; report: RollbackReport })
  | (EventBase & {
      type: "progress";
      phase: string;
      message: string;
      percent?: number;
    })
  | (EventBase & {
      type: "log";
      phase: string;
      level: "info" | "warn";
      message: string;
    });

export type SetupEventType = SetupEvent["type"];
export type SetupEventHandler = (event: SetupEvent) => void;
