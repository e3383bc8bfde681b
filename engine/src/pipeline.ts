/**
 * Tandem Engine — Phase Pipeline
 *
 * Runs a fixed list of phases strictly in order against one RunContext:
 *
 *   NOT_STARTED → RUNNING → COMPLETED
 *                        ↘ ROLLING_BACK → ROLLED_BACK → ABORTED
 *
 * A required phase that throws is fatal: the ledger is rolled back and no
 * later phase runs. A non-required phase that throws becomes a soft
 * failure and the run continues. Cancellation is always fatal.
 *
 * The pipeline has NO UI logic. It communicates via the RunResult and
 * event callbacks.
 */

import * as crypto from "crypto";
import {
  PhaseDescriptor,
  PhaseResult,
  PhaseStatus,
  PipelineState,
  RetryPolicy,
  RollbackReport,
  RunError,
  RunResult,
  SetupEvent,
  SetupEventHandler,
  SetupSettings,
  UnifiedConfig,
} from "./types";
import { Capabilities } from "./capabilities";
import {
  SetupError,
  cancelledError,
  errorMessage,
  toSetupError,
} from "./errors";
import { LedgerFileSystem, ResourceLedger } from "./ledger";
import { PrivilegeGate } from "./privilege-gate";
import { DEFAULT_RETRY_POLICY, Sleep, executeWithRetry } from "./retry";
import { MutationContext } from "./fs-ops";
import { MigrationResult, defaultUnifiedConfig } from "./migration";
import { Logger } from "./utils/logger";

// ─── Run Context ─────────────────────────────────────────────────

/** Values one phase hands to a later one */
export interface RunArtifacts {
  migration?: MigrationResult;
  /** Downloaded unlocker installer */
  unlockerInstaller?: string;
}

export interface RunContext {
  readonly runId: string;
  readonly settings: SetupSettings;
  /** Replaced by the migrate-config phase; frozen */
  config: UnifiedConfig;
  /** Legacy config locations, given or detected */
  legacy: { injectorPath?: string; unlockerPath?: string };
  readonly artifacts: RunArtifacts;
  /** Results of the phases that already ran, in order */
  readonly results: readonly PhaseResult[];
  readonly ledger: ResourceLedger;
  readonly gate: PrivilegeGate;
  readonly capabilities: Capabilities;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
  readonly signal: AbortSignal;
  readonly dryRun: boolean;
  readonly configOnly: boolean;
  readonly force: boolean;
}

// ─── Phases ──────────────────────────────────────────────────────

/** What a running phase can do besides touching the RunContext */
export interface PhaseScope {
  readonly name: string;
  /** Ledger-backed context for the fs-ops helpers */
  readonly mutation: MutationContext;
  warn(message: string): void;
  /** Record what the phase did, or in dry-run what it would do */
  record(action: string): void;
  /** Mark the phase inapplicable; the phase should return right after */
  skip(reason: string): void;
  progress(message: string, percent?: number): void;
  /** Run `operation` under the run's retry policy, reporting retries */
  retry<T>(
    operationName: string,
    operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
    policy?: RetryPolicy,
  ): Promise<T>;
}

/** Throw to fail; return to succeed. */
export type PhaseRun = (ctx: RunContext, scope: PhaseScope) => Promise<void>;

export interface PhaseDefinition {
  name: string;
  required: boolean;
  dryRunSafe: boolean;
  run: PhaseRun;
}

export function definePhase(
  name: string,
  flags: { required: boolean; dryRunSafe: boolean },
  run: PhaseRun,
): PhaseDefinition {
  return { name, ...flags, run };
}

// ─── Pipeline ────────────────────────────────────────────────────

export interface PipelineOptions {
  phases: PhaseDefinition[];
  capabilities: Capabilities;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  /** Defaults to a gate over capabilities.elevation */
  gate?: PrivilegeGate;
  ledgerFs?: LedgerFileSystem;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

interface PhaseEntry {
  descriptor: PhaseDescriptor;
  run: PhaseRun;
}

export class PhasePipeline {
  private readonly phases: PhaseEntry[];
  private readonly options: PipelineOptions;
  private readonly logger: Logger;
  private readonly gate: PrivilegeGate;
  private readonly now: () => Date;
  private eventHandlers: SetupEventHandler[] = [];
  private currentState: PipelineState = "NOT_STARTED";
  private running = false;

  constructor(options: PipelineOptions) {
    const seen = new Set<string>();
    for (const phase of options.phases) {
      if (seen.has(phase.name)) {
        throw new SetupError(
          `Duplicate phase name "${phase.name}"`,
          "permanent",
          "CONFIG_ERROR",
        );
      }
      seen.add(phase.name);
    }

    this.options = options;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.gate =
      options.gate ??
      new PrivilegeGate({ elevation: options.capabilities.elevation, logger: options.logger });
    this.phases = options.phases.map((phase, index) => ({
      descriptor: Object.freeze({
        name: phase.name,
        ordinal: index + 1,
        required: phase.required,
        dryRunSafe: phase.dryRunSafe,
      }),
      run: phase.run,
    }));
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get descriptors(): readonly PhaseDescriptor[] {
    return this.phases.map((p) => p.descriptor);
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. Returns a function that unregisters it.
   */
  on(handler: SetupEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  private emit(event: SetupEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // Event handler errors should never crash the pipeline
        this.logger.warn({ type: event.type, error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private setState(runId: string, state: PipelineState): void {
    this.currentState = state;
    this.logger.debug({ run_id: runId, state }, "Pipeline state");
    this.emit({ type: "state_change", timestamp: this.timestamp(), run_id: runId, state });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ─── Core: Run ───────────────────────────────────────────────

  /**
   * Execute every phase in order.
   *
   * @throws SetupError only if a run is already in progress; every phase
   *   failure is reported through the RunResult instead
   */
  async run(settings: SetupSettings, signal: AbortSignal = new AbortController().signal): Promise<RunResult> {
    if (this.running) {
      throw new SetupError(
        "A setup run is already in progress",
        "permanent",
        "GENERAL_ERROR",
      );
    }
    this.running = true;

    try {
      return await this.execute(settings, signal);
    } finally {
      this.running = false;
    }
  }

  private async execute(settings: SetupSettings, signal: AbortSignal): Promise<RunResult> {
    const runId = crypto.randomUUID();
    const startedAt = this.timestamp();
    const results: PhaseResult[] = [];
    const warnings: string[] = [];

    const ledger = new ResourceLedger({
      logger: this.logger,
      fs: this.options.ledgerFs,
      dryRun: settings.dryRun,
      now: this.now,
    });

    const ctx: RunContext = {
      runId,
      settings,
      config: defaultUnifiedConfig(),
      legacy: {
        injectorPath: settings.legacyInjectorPath,
        unlockerPath: settings.legacyUnlockerPath,
      },
      artifacts: {},
      results,
      ledger,
      gate: this.gate,
      capabilities: this.options.capabilities,
      retryPolicy: this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
      logger: this.logger,
      signal,
      dryRun: settings.dryRun,
      configOnly: settings.configOnly,
      force: settings.force,
    };

    this.logger.info(
      { run_id: runId, phases: this.phases.length, dry_run: settings.dryRun },
      "Starting setup run",
    );
    this.setState(runId, "RUNNING");

    let failure: RunError | undefined;
    for (const phase of this.phases) {
      this.emit({
        type: "phase_started",
        timestamp: this.timestamp(),
        run_id: runId,
        phase: phase.descriptor.name,
        ordinal: phase.descriptor.ordinal,
        total: this.phases.length,
      });

      const { result, error } = await this.executePhase(phase, ctx);
      results.push(result);
      warnings.push(...result.warnings);
      this.emit({ type: "phase_finished", timestamp: this.timestamp(), run_id: runId, result });

      if (result.status === "FATAL_FAILURE") {
        const fatal = error ?? cancelledError();
        failure = {
          category: fatal.category,
          kind: fatal.kind,
          message: fatal.message,
          phase: phase.descriptor.name,
        };
        break;
      }
    }

    const base = {
      run_id: runId,
      started_at: startedAt,
      dry_run: settings.dryRun,
      results,
      config: ctx.config,
    };

    if (failure) {
      this.logger.error(
        { run_id: runId, phase: failure.phase, category: failure.category, error: failure.message },
        "Setup aborted",
      );
      this.setState(runId, "ROLLING_BACK");
      const rollback = await ledger.rollback({ reason: `${failure.phase}: ${failure.message}` });
      this.emit({ type: "rollback_report", timestamp: this.timestamp(), run_id: runId, report: rollback });
      this.setState(runId, "ROLLED_BACK");
      this.setState(runId, "ABORTED");

      return {
        ...base,
        status: "ABORTED",
        finished_at: this.timestamp(),
        failed_phase: failure.phase,
        error: failure,
        rollback,
        warnings,
        leftovers: [...ledger.leftovers()],
      };
    }

    this.setState(runId, "COMPLETED");

    let cleanup: RollbackReport | undefined;
    if (settings.cleanup) {
      cleanup = await ledger.cleanupTemp({ reason: "run completed" });
      this.emit({ type: "rollback_report", timestamp: this.timestamp(), run_id: runId, report: cleanup });
      warnings.push(...cleanup.warnings);
    }

    this.logger.info(
      { run_id: runId, phases: results.length, warnings: warnings.length },
      "Setup completed",
    );

    return {
      ...base,
      status: "COMPLETED",
      finished_at: this.timestamp(),
      cleanup,
      warnings,
      leftovers: [...ledger.leftovers()],
    };
  }

  private async executePhase(
    phase: PhaseEntry,
    ctx: RunContext,
  ): Promise<{ result: PhaseResult; error?: SetupError }> {
    const { name, ordinal, required } = phase.descriptor;
    const started = Date.now();
    const scope = new Scope(name, ctx, this);
    const finish = (status: PhaseStatus, errors: string[] = []): PhaseResult => ({
      phase: name,
      ordinal,
      status,
      warnings: scope.warnings,
      errors,
      actions: scope.actions,
      duration_ms: Date.now() - started,
      skip_reason: scope.skipReason,
    });

    if (ctx.signal.aborted) {
      return { result: finish("FATAL_FAILURE", ["cancelled"]), error: cancelledError() };
    }

    this.logger.info({ phase: name, ordinal }, "Phase started");
    try {
      await phase.run(ctx, scope);
      if (ctx.signal.aborted) {
        return { result: finish("FATAL_FAILURE", ["cancelled"]), error: cancelledError() };
      }
      const status: PhaseStatus = scope.skipReason !== undefined ? "SKIPPED" : "SUCCESS";
      this.logger.info({ phase: name, status }, "Phase finished");
      return { result: finish(status) };
    } catch (err: unknown) {
      const error = ctx.signal.aborted ? cancelledError() : toSetupError(err);

      if (error.kind === "cancelled") {
        this.logger.warn({ phase: name }, "Phase cancelled");
        return { result: finish("FATAL_FAILURE", ["cancelled"]), error };
      }

      if (error.kind === "platform_unsupported") {
        scope.warn(`${name}: ${error.message}`);
        scope.skip(error.message);
        return { result: finish("SKIPPED") };
      }

      if (required) {
        this.logger.error({ phase: name, error: error.message }, "Required phase failed");
        return { result: finish("FATAL_FAILURE", [error.message]), error };
      }

      this.logger.warn({ phase: name, error: error.message }, "Optional phase failed");
      scope.warn(`${name} failed: ${error.message}`);
      return { result: finish("SOFT_FAILURE", [error.message]), error };
    }
  }

  /** @internal used by Scope */
  notify(event: SetupEvent): void {
    this.emit(event);
  }

  /** @internal used by Scope */
  retryHooks(): { sleep?: Sleep; random?: () => number } {
    return { sleep: this.options.sleep, random: this.options.random };
  }
}

class Scope implements PhaseScope {
  readonly warnings: string[] = [];
  readonly actions: string[] = [];
  skipReason: string | undefined;
  readonly mutation: MutationContext;

  constructor(
    readonly name: string,
    private readonly ctx: RunContext,
    private readonly pipeline: PhasePipeline,
  ) {
    this.mutation = { ledger: ctx.ledger, phase: name, logger: ctx.logger };
  }

  warn(message: string): void {
    this.warnings.push(message);
    this.ctx.logger.warn({ phase: this.name }, message);
    this.pipeline.notify({
      type: "log",
      timestamp: new Date().toISOString(),
      run_id: this.ctx.runId,
      phase: this.name,
      level: "warn",
      message,
    });
  }

  record(action: string): void {
    const entry = this.ctx.dryRun ? `[DRY RUN] ${action}` : action;
    this.actions.push(entry);
    this.ctx.logger.info({ phase: this.name }, entry);
    this.pipeline.notify({
      type: "log",
      timestamp: new Date().toISOString(),
      run_id: this.ctx.runId,
      phase: this.name,
      level: "info",
      message: entry,
    });
  }

  skip(reason: string): void {
    this.skipReason = reason;
  }

  progress(message: string, percent?: number): void {
    this.pipeline.notify({
      type: "progress",
      timestamp: new Date().toISOString(),
      run_id: this.ctx.runId,
      phase: this.name,
      message,
      percent,
    });
  }

  retry<T>(
    operationName: string,
    operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
    policy: RetryPolicy = this.ctx.retryPolicy,
  ): Promise<T> {
    return executeWithRetry(operation, policy, {
      ...this.pipeline.retryHooks(),
      operationName,
      signal: this.ctx.signal,
      onRetry: ({ attempt, error, delayMs }) => {
        this.ctx.logger.warn(
          { phase: this.name, operation: operationName, attempt, delay_ms: delayMs, error: errorMessage(error) },
          "Retrying after transient failure",
        );
        this.pipeline.notify({
          type: "retry_attempted",
          timestamp: new Date().toISOString(),
          run_id: this.ctx.runId,
          phase: this.name,
          attempt,
          error: errorMessage(error),
          delay_ms: Math.round(delayMs),
        });
      },
    });
  }
}
