/**
 * Tandem Engine — Archive Extraction
 *
 * Delegates to the tools every target system already has: PowerShell's
 * Expand-Archive on Windows 10+, `unzip` elsewhere. A failed extraction is
 * reported as transient because the usual cause is antivirus holding a
 * freshly written file.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import * as fs from "fs";
import * as path from "path";
import { ExtractOptions, Extractor } from "../capabilities";
import { SetupError, cancelledError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";
import { psQuote } from "./elevation";

const execFileAsync = promisify(execFile);

export class ArchiveExtractor implements Extractor {
  constructor(
    private readonly platform: NodeJS.Platform,
    private readonly logger: Logger,
  ) {}

  async extract(
    archivePath: string,
    destDir: string,
    options: ExtractOptions = {},
  ): Promise<void> {
    if (!fs.existsSync(archivePath)) {
      throw new SetupError(
        `Archive not found: ${archivePath}`,
        "permanent",
        "FILE_ERROR",
      );
    }

    this.logger.info(
      { archive: archivePath, dest: destDir, flatten: options.flatten },
      "Extracting archive",
    );

    await fs.promises.mkdir(destDir, { recursive: true });

    try {
      if (this.platform === "win32") {
        const psCommand = [
          "Expand-Archive",
          `-Path ${psQuote(archivePath)}`,
          `-DestinationPath ${psQuote(destDir)}`,
          "-Force",
        ].join(" ");
        await execFileAsync(
          "powershell",
          ["-NoProfile", "-ExecutionPolicy", "Bypass", "-Command", psCommand],
          { windowsHide: true, signal: options.signal },
        );
      } else {
        await execFileAsync("unzip", ["-o", "-q", archivePath, "-d", destDir], {
          signal: options.signal,
        });
      }
    } catch (err: unknown) {
      if (options.signal?.aborted) throw cancelledError();
      throw new SetupError(
        `Extraction of ${path.basename(archivePath)} failed: ${errorMessage(err)}`,
        "transient",
        "FILE_ERROR",
        { cause: err },
      );
    }

    if (options.flatten) {
      await flattenSingleRoot(destDir, this.logger);
    }
  }
}

/**
 * If `dir` holds exactly one entry and it is a directory, move that
 * directory's contents up one level and remove it.
 * Example: "injector-1.2/" inside the target becomes the target itself.
 *
 * @returns true if anything was moved
 */
export async function flattenSingleRoot(
  dir: string,
  logger: Logger,
): Promise<boolean> {
  const entries = await fs.promises.readdir(dir);
  if (entries.length !== 1) return false;

  const rootDir = path.join(dir, entries[0]);
  if (!(await fs.promises.stat(rootDir)).isDirectory()) return false;

  logger.debug({ rootDir }, "Flattening single root directory");
  for (const entry of await fs.promises.readdir(rootDir)) {
    await fs.promises.rename(path.join(rootDir, entry), path.join(dir, entry));
  }
  await fs.promises.rmdir(rootDir);
  return true;
}
