/**
 * Tandem Engine — File Verification
 *
 * SHA-256 content hashing for idempotent copies, and presence checks for
 * component files that antivirus software likes to quarantine right after
 * extraction.
 */

import * as fs from "fs";
import * as crypto from "crypto";
import * as path from "path";

export interface PresenceReport {
  present: string[];
  missing: string[];
}

/**
 * Compute SHA-256 hash of a file.
 *
 * Uses streaming to handle large files without loading them into memory.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

export function computeBufferHash(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/** True when both files exist and have identical content */
export async function sameFileContent(a: string, b: string): Promise<boolean> {
  if (!fs.existsSync(a) || !fs.existsSync(b)) return false;
  if (fs.statSync(a).size !== fs.statSync(b).size) return false;
  const [ha, hb] = await Promise.all([computeFileHash(a), computeFileHash(b)]);
  return ha === hb;
}

/**
 * Check which of `fileNames` exist directly inside `dir`.
 */
export function checkFilesPresent(
  dir: string,
  fileNames: readonly string[],
): PresenceReport {
  const present: string[] = [];
  const missing: string[] = [];
  for (const name of fileNames) {
    if (fs.existsSync(path.join(dir, name))) {
      present.push(name);
    } else {
      missing.push(name);
    }
  }
  return { present, missing };
}
