/**
 * Tandem Engine — File Downloader
 *
 * Streams a file to disk with progress reporting and resume support: if a
 * partial file is already at the destination, the request asks for the
 * remaining bytes with a Range header and appends on 206. A 416 means the
 * file is already complete (Content-Range matches its size) or stale, in
 * which case it is downloaded again from the start.
 *
 * HTTPS only — HTTP URLs are rejected.
 */

import * as fs from "fs";
import * as https from "https";
import * as path from "path";
import { IncomingHttpHeaders } from "http";
import {
  DownloadResult,
  Downloader,
  FetchOptions,
} from "./capabilities";
import { SetupError, cancelledError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";

const MAX_REDIRECTS = 5;

/** The parts of an HTTP response the downloader reads */
export interface DownloadResponse extends NodeJS.ReadableStream {
  statusCode?: number;
  headers: IncomingHttpHeaders;
}

export interface DownloadRequest {
  on(event: "error", listener: (err: Error) => void): unknown;
  setTimeout(ms: number, callback: () => void): unknown;
  destroy(error?: Error): unknown;
}

/** Same shape as `https.get`; replaced in tests */
export type HttpGet = (
  url: string,
  options: { headers: Record<string, string>; signal?: AbortSignal },
  callback: (response: DownloadResponse) => void,
) => DownloadRequest;

type RangeOutcome =
  | { status: "body"; response: DownloadResponse }
  | { status: "complete" }
  | { status: "stale" };
const DEFAULT_IDLE_TIMEOUT_MS = 60_000;

export function assertHttpsUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err: unknown) {
    throw new SetupError(`Invalid download URL: ${url}`, "permanent", "CONFIG_ERROR", {
      cause: err,
    });
  }
  if (parsed.protocol !== "https:") {
    throw new SetupError(
      `Download URL must be HTTPS. Got: ${url}`,
      "permanent",
      "CONFIG_ERROR",
    );
  }
}

export class HttpsDownloader implements Downloader {
  constructor(
    private readonly logger: Logger,
    private readonly get: HttpGet = https.get,
  ) {}

  async fetch(
    url: string,
    destPath: string,
    options: FetchOptions = {},
  ): Promise<DownloadResult> {
    assertHttpsUrl(url);
    if (options.signal?.aborted) throw cancelledError();

    await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
    let existing = fs.existsSync(destPath) ? fs.statSync(destPath).size : 0;

    this.logger.info({ url, dest: destPath, resume_from: existing }, "Starting download");
    const startTime = Date.now();

    let outcome = await this.request(url, existing, options, 0);
    if (outcome.status === "stale") {
      this.logger.warn({ dest: destPath, size: existing }, "Partial download does not match, starting over");
      await fs.promises.rm(destPath, { force: true });
      existing = 0;
      outcome = await this.request(url, 0, options, 0);
    }
    if (outcome.status !== "body") {
      // Only a ranged request can find the file already complete
      this.logger.info({ dest: destPath, bytes: existing }, "Download already complete");
      return {
        file_path: destPath,
        bytes_downloaded: 0,
        resumed_from: existing,
        duration_ms: Date.now() - startTime,
      };
    }

    const { response } = outcome;
    const resumed = response.statusCode === 206;
    const resumedFrom = resumed ? existing : 0;
    const bytes = await this.writeBody(response, destPath, resumedFrom, options);

    const duration = Date.now() - startTime;
    this.logger.info(
      { dest: destPath, bytes, resumed_from: resumedFrom, duration_ms: duration },
      "Download complete",
    );
    return {
      file_path: destPath,
      bytes_downloaded: bytes,
      resumed_from: resumedFrom,
      duration_ms: duration,
    };
  }

  /** Resolves with a 200/206 response, following redirects */
  private request(
    url: string,
    rangeStart: number,
    options: FetchOptions,
    hops: number,
  ): Promise<RangeOutcome> {
    const headers: Record<string, string> = {};
    if (rangeStart > 0) headers.Range = `bytes=${rangeStart}-`;

    return new Promise<RangeOutcome>((resolve, reject) => {
      const request = this.get(url, { headers, signal: options.signal }, (response) => {
        const status = response.statusCode ?? 0;

        if (status >= 300 && status < 400 && response.headers.location) {
          response.resume();
          if (hops >= MAX_REDIRECTS) {
            reject(networkError(`Too many redirects for ${url}`));
            return;
          }
          const next = new URL(response.headers.location, url).toString();
          this.logger.debug({ redirect: next }, "Following redirect");
          try {
            assertHttpsUrl(next);
          } catch (err: unknown) {
            reject(err);
            return;
          }
          this.request(next, rangeStart, options, hops + 1).then(resolve, reject);
          return;
        }

        if (status === 416 && rangeStart > 0) {
          response.resume();
          const total = parseUnsatisfiedRange(response.headers["content-range"]);
          resolve({ status: total === rangeStart ? "complete" : "stale" });
          return;
        }

        if (status !== 200 && status !== 206) {
          response.resume();
          reject(networkError(`Download failed: HTTP ${status} for ${url}`));
          return;
        }
        resolve({ status: "body", response });
      });

      request.on("error", (err) => {
        if (options.signal?.aborted) {
          reject(cancelledError());
          return;
        }
        reject(networkError(`Download request failed: ${err.message}`, err));
      });

      const timeoutMs = options.timeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
      request.setTimeout(timeoutMs, () => {
        request.destroy(networkError(`Download timed out after ${timeoutMs}ms: ${url}`));
      });
    });
  }

  private writeBody(
    response: DownloadResponse,
    destPath: string,
    resumedFrom: number,
    options: FetchOptions,
  ): Promise<number> {
    const contentLength = parseInt(response.headers["content-length"] ?? "0", 10);
    const totalBytes = contentLength > 0 ? resumedFrom + contentLength : 0;
    let downloaded = resumedFrom;

    return new Promise<number>((resolve, reject) => {
      const fileStream = fs.createWriteStream(destPath, {
        flags: resumedFrom > 0 ? "a" : "w",
      });

      response.on("data", (chunk: Buffer) => {
        downloaded += chunk.length;
        if (options.onProgress && totalBytes > 0) {
          options.onProgress({
            bytes_downloaded: downloaded,
            bytes_total: totalBytes,
            percent: Math.round((downloaded / totalBytes) * 100),
          });
        }
      });

      response.on("error", (err) => {
        fileStream.close();
        reject(
          options.signal?.aborted
            ? cancelledError()
            : networkError(`Download interrupted: ${err.message}`, err),
        );
      });

      response.pipe(fileStream);

      // The partial file stays for the next attempt to resume from
      fileStream.on("finish", () => resolve(downloaded - resumedFrom));
      fileStream.on("error", (err) => {
        reject(
          new SetupError(
            `Failed to write downloaded file: ${errorMessage(err)}`,
            "transient",
            "FILE_ERROR",
            { cause: err },
          ),
        );
      });
    });
  }
}

// Total size from a 416's Content-Range, "bytes */N"
export function parseUnsatisfiedRange(header: string | undefined): number | undefined {
  const match = /^bytes \*\/(\d+)$/.exec(header?.trim() ?? "");
  return match ? parseInt(match[1], 10) : undefined;
}

function networkError(message: string, cause?: unknown): SetupError {
  return new SetupError(message, "transient", "NETWORK_ERROR", { cause });
}
