/**
 * Tandem Engine — Privilege Gate
 *
 * Answers "are we elevated?", runs single commands with elevation, and lets
 * platform-specific steps degrade to a fallback instead of failing the run.
 *
 * runElevated() never throws and never blocks past its timeout. The result
 * carries a SetupError whose kind tells the caller what to do with it:
 *
 *   platform_unsupported  no elevation on this OS; warn and move on
 *   transient             timeout or non-zero exit; worth retrying
 *   cancelled             the run's signal fired
 */

import { ElevatedCommand, ElevationCapability } from "./capabilities";
import { OperationResult, PlatformFeature } from "./types";
import {
  SetupError,
  cancelledError,
  isSetupError,
  toSetupError,
} from "./errors";
import { Logger } from "./utils/logger";

const FEATURE_PLATFORMS: Record<Exclude<PlatformFeature, "elevated_commands">, NodeJS.Platform> = {
  windows_admin: "win32",
  windows_defender: "win32",
  windows_shortcuts: "win32",
  linux_desktop_entries: "linux",
  macos_aliases: "darwin",
};

export interface PrivilegeGateOptions {
  elevation: ElevationCapability;
  logger: Logger;
}

export class PrivilegeGate {
  private readonly elevation: ElevationCapability;
  private readonly logger: Logger;
  private elevated: Promise<boolean> | null = null;

  constructor(options: PrivilegeGateOptions) {
    this.elevation = options.elevation;
    this.logger = options.logger;
  }

  get platform(): NodeJS.Platform {
    return this.elevation.platform;
  }

  /** Query only. The answer is cached for the lifetime of the gate. */
  hasElevatedRights(): Promise<boolean> {
    if (!this.elevated) {
      this.elevated = this.elevation.isElevated();
    }
    return this.elevated;
  }

  supports(feature: PlatformFeature): boolean {
    if (feature === "elevated_commands") return this.elevation.canElevate;
    return FEATURE_PLATFORMS[feature] === this.elevation.platform;
  }

  /** Every feature name with its availability on this host */
  features(): Record<PlatformFeature, boolean> {
    return {
      windows_admin: this.supports("windows_admin"),
      windows_defender: this.supports("windows_defender"),
      windows_shortcuts: this.supports("windows_shortcuts"),
      linux_desktop_entries: this.supports("linux_desktop_entries"),
      macos_aliases: this.supports("macos_aliases"),
      elevated_commands: this.supports("elevated_commands"),
    };
  }

  async runElevated(
    command: ElevatedCommand,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<OperationResult> {
    const label = command.label ?? command.file;

    if (!this.elevation.canElevate) {
      return {
        success: false,
        message: `Elevated commands are not available on ${this.platform}`,
        suggestions: [
          `Run "${label}" manually with administrator/root rights`,
          "Re-run the setup from an elevated terminal",
        ],
        error: new SetupError(
          `Elevation is not supported on ${this.platform}`,
          "platform_unsupported",
          "PERMISSION_ERROR",
        ),
      };
    }

    if (signal?.aborted) {
      return { success: false, message: `${label} was cancelled`, suggestions: [], error: cancelledError() };
    }

    try {
      const exitCode = await this.runWithDeadline(command, timeoutMs, signal);
      if (exitCode === 0) {
        return { success: true, message: `${label} completed`, suggestions: [], exit_code: 0 };
      }
      return {
        success: false,
        message: `${label} exited with code ${exitCode}`,
        suggestions: [
          "Make sure you clicked 'Yes' in the UAC prompt",
          "Check that your user account has administrator rights",
        ],
        exit_code: exitCode,
        error: new SetupError(
          `${label} exited with code ${exitCode}`,
          "transient",
          "PERMISSION_ERROR",
          { details: { exit_code: exitCode } },
        ),
      };
    } catch (err: unknown) {
      const error = toSetupError(err, "PERMISSION_ERROR");
      if (error.kind === "cancelled") {
        return { success: false, message: `${label} was cancelled`, suggestions: [], error };
      }
      this.logger.warn({ label, error: error.message }, "Elevated command failed");
      return {
        success: false,
        message: error.message,
        suggestions:
          error.kind === "transient"
            ? ["Try again; the UAC prompt may have been left open", "Increase --timeout"]
            : ["Check that PowerShell is available", "Run the setup as administrator manually"],
        error,
      };
    }
  }

  /**
   * Run `primary` when `feature` is available here, otherwise `fallback`.
   * A primary that discovers at run time that the platform cannot do it
   * (throws a platform_unsupported SetupError) also ends up in `fallback`.
   */
  async withFeatureFallback<T>(
    feature: PlatformFeature,
    primary: () => Promise<T>,
    fallback: (reason: string) => T | Promise<T>,
  ): Promise<T> {
    if (!this.supports(feature)) {
      const reason = `${feature} is not available on ${this.platform}`;
      this.logger.info({ feature, platform: this.platform }, "Feature unavailable, using fallback");
      return fallback(reason);
    }

    try {
      return await primary();
    } catch (err: unknown) {
      if (isSetupError(err) && err.kind === "platform_unsupported") {
        this.logger.info({ feature, error: err.message }, "Feature unsupported at run time, using fallback");
        return fallback(err.message);
      }
      throw err;
    }
  }

  private runWithDeadline(
    command: ElevatedCommand,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<number> {
    const controller = new AbortController();
    const label = command.label ?? command.file;

    return new Promise<number>((resolve, reject) => {
      const finish = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        finish();
        controller.abort();
        reject(cancelledError());
      };
      const timer = setTimeout(() => {
        finish();
        controller.abort();
        reject(
          new SetupError(
            `${label} did not complete within ${timeoutMs}ms`,
            "transient",
            "GENERAL_ERROR",
            { details: { timeout_ms: timeoutMs } },
          ),
        );
      }, timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });

      this.elevation.run(command, controller.signal).then(
        (code) => {
          finish();
          resolve(code);
        },
        (err: unknown) => {
          finish();
          reject(err);
        },
      );
    });
  }
}
