/**
 * Tandem Engine — Host Elevation
 *
 * Windows: `net session` succeeds only in an elevated process; single
 * commands are raised through PowerShell's Start-Process -Verb RunAs,
 * which shows the UAC prompt without restarting the tool.
 *
 * POSIX: elevation status is the effective uid. There is no equivalent of
 * a per-command UAC prompt, so run() is unsupported.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { ElevatedCommand, ElevationCapability } from "../capabilities";
import { SetupError, cancelledError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

/** Quote a value for a single-quoted PowerShell string */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Build the PowerShell script that launches `command` elevated, waits for
 * it and exits with its exit code.
 */
export function buildElevationScript(command: ElevatedCommand): string {
  const argList =
    command.args.length > 0
      ? `-ArgumentList @(${command.args.map(psQuote).join(", ")})`
      : "";

  const startProcess = [
    "Start-Process",
    `-FilePath ${psQuote(command.file)}`,
    argList,
    "-Verb RunAs",
    "-WindowStyle Hidden",
    "-Wait",
    "-PassThru",
  ]
    .filter(Boolean)
    .join(" ");

  return `$p = ${startProcess}; exit $p.ExitCode`;
}

/** PowerShell -EncodedCommand takes base64 of UTF-16LE */
export function encodePowerShell(script: string): string {
  return Buffer.from(script, "utf16le").toString("base64");
}

export class WindowsElevation implements ElevationCapability {
  readonly platform: NodeJS.Platform = "win32";
  readonly canElevate = true;

  constructor(private readonly logger: Logger) {}

  async isElevated(): Promise<boolean> {
    try {
      await execFileAsync("net", ["session"], { windowsHide: true, timeout: 5000 });
      this.logger.debug("Process is running elevated (admin)");
      return true;
    } catch (err: unknown) {
      this.logger.debug({ error: errorMessage(err) }, "Process is NOT running elevated");
      return false;
    }
  }

  async run(command: ElevatedCommand, signal: AbortSignal): Promise<number> {
    this.logger.info(
      { file: command.file, argsCount: command.args.length, label: command.label },
      "Requesting UAC elevation",
    );

    const encoded = encodePowerShell(buildElevationScript(command));
    try {
      await execFileAsync(
        "powershell",
        ["-NoProfile", "-ExecutionPolicy", "Bypass", "-EncodedCommand", encoded],
        { windowsHide: true, signal },
      );
      return 0;
    } catch (err: unknown) {
      if (signal.aborted) throw cancelledError();
      const exitCode = processExitCode(err);
      if (exitCode === undefined) {
        throw new SetupError(
          `Could not start elevated command: ${errorMessage(err)}`,
          "permanent",
          "PERMISSION_ERROR",
          { cause: err },
        );
      }
      this.logger.warn({ exitCode, label: command.label }, "Elevated command exited non-zero");
      return exitCode;
    }
  }
}

export class PosixElevation implements ElevationCapability {
  readonly canElevate = false;

  constructor(
    readonly platform: NodeJS.Platform,
    private readonly getuid: () => number | undefined = () => process.getuid?.(),
  ) {}

  async isElevated(): Promise<boolean> {
    return this.getuid() === 0;
  }

  async run(command: ElevatedCommand): Promise<number> {
    throw new SetupError(
      `Elevated commands are not supported on ${this.platform}: ${command.label ?? command.file}`,
      "platform_unsupported",
      "PERMISSION_ERROR",
    );
  }
}

export function createElevation(
  platform: NodeJS.Platform,
  logger: Logger,
): ElevationCapability {
  return platform === "win32"
    ? new WindowsElevation(logger)
    : new PosixElevation(platform);
}

/** Exit code of a failed execFile call, if the process actually ran */
export function processExitCode(err: unknown): number | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "number" ? code : undefined;
  }
  return undefined;
}
