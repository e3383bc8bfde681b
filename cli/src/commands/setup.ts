/**
 * Tandem CLI — Setup Command
 *
 * Runs the full setup pipeline.
 *
 * Usage:
 *   tandem setup                      Install and configure everything
 *   tandem setup --dry-run            Show what would happen
 *   tandem setup --config-only        Only migrate and write configuration
 *
 * Output:
 *
 *   Setting up Tandem in C:\Users\me\Documents\Tandem
 *
 *     ✔ check-privileges
 *     ℹ detect-legacy skipped: no legacy locations to search
 *     ✔ migrate-config
 *     ...
 *
 *   ✔ Setup completed in 12.4s
 *
 * Ctrl+C cancels the run; everything done so far is rolled back.
 */

import * as os from "os";
import { Command } from "commander";
import {
  Capabilities,
  PhaseDefinition,
  PhasePipeline,
  RunResult,
  SetupEvent,
  SetupSettings,
  createDefaultCapabilities,
  createLogger,
  createSetupPhases,
  exitCodeForCategory,
  formatRunSummary,
  toSetupError,
  EXIT_CODES,
  Sleep,
} from "@tandem/engine";
import {
  buildSetupSettings,
  logLevelFor,
  SetupCliOptions,
  DEFAULT_APP_ID,
  DEFAULT_TIMEOUT_SECONDS,
} from "../config";
import { FixedPrompter, ReadlinePrompter } from "../prompt";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  isQuietMode,
  printDebug,
  printDryRun,
  printError,
  printHeader,
  printStageError,
  printStageInfo,
  printStageSuccess,
  printStageWarn,
  printSuccess,
  printWarn,
  setDebugMode,
  setQuietMode,
} from "../output";

/** Seams for tests; the real host is used for anything left out */
export interface SetupDependencies {
  env?: NodeJS.ProcessEnv;
  home?: string;
  platform?: NodeJS.Platform;
  capabilities?: Capabilities;
  phases?: PhaseDefinition[];
  sleep?: Sleep;
  /** Aborting it cancels the run, like Ctrl+C */
  signal?: AbortSignal;
}

export function exitCodeForResult(result: RunResult): number {
  if (result.status === "COMPLETED") return EXIT_CODES.SUCCESS;
  return result.error ? exitCodeForCategory(result.error.category) : EXIT_CODES.GENERAL_ERROR;
}

/**
 * Run `tandem setup` and return the process exit code.
 */
export async function runSetup(
  opts: SetupCliOptions,
  deps: SetupDependencies = {},
): Promise<number> {
  setDebugMode(opts.debug);
  setQuietMode(opts.quiet);

  let settings: SetupSettings;
  try {
    settings = buildSetupSettings(opts, deps.env, deps.home);
  } catch (err: unknown) {
    const error = toSetupError(err, "CONFIG_ERROR");
    printError(error.message);
    return exitCodeForCategory(error.category);
  }

  // One controller per invocation; the SIGINT listener lives only as long as the run
  const controller = new AbortController();
  const spinner = createSpinner("Starting...");
  const onSigint = () => {
    if (controller.signal.aborted) return;
    spinner.stop();
    printWarn("Cancelling... rolling back changes");
    controller.abort();
  };

  const logger = createLogger({ level: logLevelFor(opts) });
  const prompter = process.stdin.isTTY
    ? new ReadlinePrompter(process.stdin, process.stdout, onSigint)
    : new FixedPrompter(false);
  const platform = deps.platform ?? process.platform;
  const capabilities =
    deps.capabilities ??
    createDefaultCapabilities(platform, settings.paths.desktopDir, logger, prompter);

  const pipeline = new PhasePipeline({
    phases: deps.phases ?? createSetupPhases({ homeDir: deps.home ?? os.homedir() }),
    capabilities,
    logger,
    sleep: deps.sleep,
  });

  if (settings.dryRun) {
    printDryRun(`Would set up Tandem in ${colors.bold(settings.paths.coreDir)}`);
  } else {
    printHeader(`Setting up Tandem in ${settings.paths.coreDir}`);
  }

  const unsubscribe = pipeline.on((event) => renderEvent(event, spinner, opts.verbose || opts.debug));

  const onOuterAbort = () => controller.abort();
  process.on("SIGINT", onSigint);
  if (deps.signal?.aborted) controller.abort();
  deps.signal?.addEventListener("abort", onOuterAbort, { once: true });

  const started = Date.now();
  let result: RunResult;
  try {
    result = await pipeline.run(settings, controller.signal);
  } catch (err: unknown) {
    spinner.stop();
    const error = toSetupError(err);
    printError(error.message);
    return exitCodeForCategory(error.category);
  } finally {
    process.off("SIGINT", onSigint);
    deps.signal?.removeEventListener("abort", onOuterAbort);
    unsubscribe();
  }
  spinner.stop();

  const elapsed = formatDuration(Date.now() - started);
  if (result.status === "COMPLETED") {
    printSuccess(
      settings.dryRun
        ? `Dry run finished in ${elapsed}; nothing was changed`
        : `Setup completed in ${elapsed}`,
    );
    if (!isQuietMode() && result.warnings.length > 0) {
      console.log();
      console.log(formatRunSummary(result));
    }
  } else {
    const category = result.error?.category ?? "GENERAL_ERROR";
    printError(`${formatErrorCategory(category)} (after ${elapsed})`);
    console.error();
    console.error(formatRunSummary(result));
  }

  return exitCodeForResult(result);
}

function renderEvent(
  event: SetupEvent,
  spinner: ReturnType<typeof createSpinner>,
  verbose: boolean,
): void {
  switch (event.type) {
    case "phase_started":
      spinner.text = `[${event.ordinal}/${event.total}] ${event.phase}...`;
      spinner.start();
      break;

    case "progress":
      spinner.text =
        event.percent !== undefined
          ? `${event.phase}: ${event.message} (${event.percent}%)`
          : `${event.phase}: ${event.message}`;
      break;

    case "retry_attempted":
      spinner.text = `${event.phase}: retrying after attempt ${event.attempt} (${event.error})`;
      printDebug(`retry in ${event.delay_ms}ms: ${event.error}`);
      break;

    case "phase_finished": {
      spinner.stop();
      const { result } = event;
      if (result.status === "SUCCESS") {
        printStageSuccess(result.phase);
      } else if (result.status === "SKIPPED") {
        printStageInfo(`${result.phase} skipped: ${result.skip_reason ?? "not applicable"}`);
      } else if (result.status === "SOFT_FAILURE") {
        printStageWarn(`${result.phase} failed, continuing`);
      } else {
        printStageError(`${result.phase}: ${result.errors.join("; ")}`);
      }
      if (verbose) {
        for (const action of result.actions) printStageInfo(`  ${action}`);
      }
      for (const warning of result.warnings) printStageWarn(`  ${warning}`);
      break;
    }

    case "state_change":
      if (event.state === "ROLLING_BACK") {
        spinner.text = "Rolling back...";
        spinner.start();
      }
      printDebug(`state: ${event.state}`);
      break;

    case "rollback_report":
      spinner.stop();
      printDebug(`${event.report.operation}: ${event.report.undone} undone, ${event.report.failed} failed`);
      break;

    case "log":
      printDebug(`${event.phase}: ${event.message}`);
      break;
  }
}

export function registerSetupCommand(program: Command): void {
  program
    .command("setup")
    .description("Install the injector and unlocker and migrate legacy settings")
    .option("--dry-run", "Show what would be done without changing anything", false)
    .option("--config-only", "Only migrate and write configuration", false)
    .option("--skip-admin", "Do not require administrator privileges", false)
    .option("--skip-security", "Do not add antivirus exclusions", false)
    .option("--no-cleanup", "Keep temporary files after a successful run")
    .option("--force", "Reinstall and replace without asking", false)
    .option("--timeout <seconds>", "Timeout for downloads and elevated commands", String(DEFAULT_TIMEOUT_SECONDS))
    .option("--app-id <id>", "Numeric app id for the AppList", DEFAULT_APP_ID)
    .option("--core-path <dir>", "Installation root")
    .option("--legacy-injector-path <path>", "Legacy injector directory or DLLInjector.ini")
    .option("--legacy-unlocker-path <path>", "Legacy unlocker directory or config.json")
    .option("--download-url <url>", "Unlocker installer URL (https only)")
    .option("--overrides <file>", "YAML file with configuration overrides")
    .option("--verbose", "Show every action", false)
    .option("--quiet", "Only show errors and the final summary", false)
    .option("--debug", "Show debug output", false)
    .action(async (opts: SetupCliOptions) => {
      process.exitCode = await runSetup(opts);
    });
}
