/**
 * Tandem Engine — Error Taxonomy
 *
 * Every failure that crosses a module boundary is a SetupError. Two axes:
 *
 *   kind      how the pipeline reacts (retry, fail, fall back, abort)
 *   category  what the user is told, and which exit code the CLI returns
 *
 * Plain Error values coming from Node or a library are converted with
 * toSetupError() at the point where the caller knows what they mean.
 */

import { ErrorCategory, ErrorKind } from "./types";

export class SetupError extends Error {
  readonly kind: ErrorKind;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind,
    category: ErrorCategory,
    options: { cause?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SetupError";
    this.kind = kind;
    this.category = category;
    this.details = options.details;
  }

  get transient(): boolean {
    return this.kind === "transient";
  }
}

/**
 * Thrown by the retry executor once every attempt has failed.
 * Keeps the kind and category of the last error so the calling phase
 * can decide severity the same way it would for a single failure.
 */
export class RetryExhaustedError extends SetupError {
  readonly attempts: number;
  readonly elapsed_ms: number;
  readonly lastError: unknown;

  constructor(
    operation: string,
    attempts: number,
    elapsedMs: number,
    lastError: unknown,
  ) {
    const last = toSetupError(lastError);
    super(
      `${operation} failed after ${attempts} attempt(s) in ${elapsedMs}ms: ${last.message}`,
      last.kind,
      last.category,
      { cause: lastError, details: { attempts, elapsed_ms: elapsedMs } },
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.elapsed_ms = elapsedMs;
    this.lastError = lastError;
  }
}

export function isSetupError(err: unknown): err is SetupError {
  return err instanceof SetupError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function cancelledError(reason: string = "cancelled"): SetupError {
  return new SetupError(reason, "cancelled", "CANCELLED");
}

/**
 * Wrap an arbitrary thrown value. Non-SetupError values are permanent:
 * only code that knows an error is worth retrying marks it transient.
 */
export function toSetupError(
  err: unknown,
  fallbackCategory: ErrorCategory = "GENERAL_ERROR",
): SetupError {
  if (isSetupError(err)) return err;
  return new SetupError(errorMessage(err), "permanent", fallbackCategory, {
    cause: err,
  });
}

const TRANSIENT_FS_CODES = new Set([
  "EBUSY",
  "EAGAIN",
  "ETIMEDOUT",
  "EMFILE",
  "ENFILE",
  "ECONNRESET",
]);

/**
 * Classify a filesystem error. Locked files show up as EBUSY everywhere
 * and as EPERM/EACCES on Windows when another process holds the handle.
 */
export function classifyFsError(
  err: unknown,
  platform: NodeJS.Platform = process.platform,
): SetupError {
  if (isSetupError(err)) return err;
  const code = fsErrorCode(err);

  if (code && TRANSIENT_FS_CODES.has(code)) {
    return new SetupError(errorMessage(err), "transient", "FILE_ERROR", {
      cause: err,
      details: { code },
    });
  }
  if (platform === "win32" && (code === "EPERM" || code === "EACCES")) {
    return new SetupError(
      `${errorMessage(err)} (file may be in use)`,
      "transient",
      "FILE_ERROR",
      { cause: err, details: { code } },
    );
  }
  if (code === "EPERM" || code === "EACCES") {
    return new SetupError(errorMessage(err), "permanent", "PERMISSION_ERROR", {
      cause: err,
      details: { code },
    });
  }
  return new SetupError(errorMessage(err), "permanent", "FILE_ERROR", {
    cause: err,
    details: code ? { code } : undefined,
  });
}

function fsErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

// ─── Exit Codes ──────────────────────────────────────────────────

export const EXIT_CODES: Record<ErrorCategory | "SUCCESS", number> = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  PERMISSION_ERROR: 2,
  NETWORK_ERROR: 3,
  FILE_ERROR: 4,
  CONFIG_ERROR: 5,
  CANCELLED: 6,
};

export function exitCodeForCategory(category: ErrorCategory): number {
  return EXIT_CODES[category];
}
