/**
 * Tandem Engine — Retry Executor
 *
 * The one retry loop in the codebase. Call sites configure a RetryPolicy;
 * they never write their own loop.
 *
 *   attempt 1        runs immediately
 *   attempt k >= 2   after sleeping initialDelay * multiplier^(k-2)
 *                    (+ uniform jitter in [0, delay/2) when enabled)
 *
 * Only errors classified "transient" are retried. Everything else,
 * including cancellation, propagates on the spot. Attempts are strictly
 * sequential.
 */

import { RetryPolicy, RetryNotice, ErrorKind } from "./types";
import {
  RetryExhaustedError,
  SetupError,
  cancelledError,
  isSetupError,
} from "./errors";

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 1000,
  multiplier: 2,
  jitter: true,
});

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Label used in the exhaustion message */
  operationName?: string;
  signal?: AbortSignal;
  /** Called before each retry sleep */
  onRetry?: (notice: RetryNotice) => void;
  /** Decide whether an error is worth another attempt */
  classify?: (err: unknown) => ErrorKind;
  sleep?: Sleep;
  /** Returns a number in [0, 1) */
  random?: () => number;
  now?: () => number;
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new SetupError(
      `Retry policy maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`,
      "permanent",
      "CONFIG_ERROR",
    );
  }
  if (!Number.isFinite(policy.initialDelayMs) || policy.initialDelayMs < 0) {
    throw new SetupError(
      `Retry policy initialDelayMs must be >= 0, got ${policy.initialDelayMs}`,
      "permanent",
      "CONFIG_ERROR",
    );
  }
  if (!Number.isFinite(policy.multiplier) || policy.multiplier < 1) {
    throw new SetupError(
      `Retry policy multiplier must be >= 1.0, got ${policy.multiplier}`,
      "permanent",
      "CONFIG_ERROR",
    );
  }
}

/**
 * Base delay (no jitter) before attempt `attempt`. Attempt 1 has none.
 */
export function delayForAttempt(policy: RetryPolicy, attempt: number): number {
  if (attempt < 2) return 0;
  return policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 2);
}

export function defaultClassify(err: unknown): ErrorKind {
  return isSetupError(err) ? err.kind : "permanent";
}

/**
 * Promise-based sleep that rejects with a cancelled SetupError as soon
 * as the signal fires.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Run `operation` under `policy`.
 *
 * @returns The operation's value from the first successful attempt
 * @throws The original error when it is not transient, a cancelled
 *   SetupError on abort, or RetryExhaustedError after the last attempt
 */
export async function executeWithRetry<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  validateRetryPolicy(policy);

  const {
    operationName = "operation",
    signal,
    onRetry,
    classify = defaultClassify,
    sleep = abortableSleep,
    random = Math.random,
    now = Date.now,
  } = options;

  const startedAt = now();
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) throw cancelledError();

    if (attempt > 1) {
      const base = delayForAttempt(policy, attempt);
      const delayMs = policy.jitter ? base + random() * (base / 2) : base;
      onRetry?.({ attempt: attempt - 1, error: lastError, delayMs });
      await sleep(delayMs, signal);
      if (signal?.aborted) throw cancelledError();
    }

    try {
      return await operation(attempt, signal);
    } catch (err: unknown) {
      if (signal?.aborted) throw cancelledError();
      const kind = classify(err);
      if (kind !== "transient") throw err;
      lastError = err;
    }
  }

  throw new RetryExhaustedError(
    operationName,
    policy.maxAttempts,
    now() - startedAt,
    lastError,
  );
}
