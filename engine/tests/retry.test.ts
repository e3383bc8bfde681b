/**
 * Tandem Engine — Retry Executor Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  delayForAttempt,
  executeWithRetry,
  validateRetryPolicy,
  abortableSleep,
} from "../src/retry";
import { RetryExhaustedError, SetupError, isSetupError } from "../src/errors";
import { RetryNotice } from "../src/types";

const transient = () => new SetupError("connection reset", "transient", "NETWORK_ERROR");

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

describe("delayForAttempt", () => {
  const policy = { maxAttempts: 5, initialDelayMs: 1000, multiplier: 2 };

  it("has no delay before the first attempt", () => {
    expect(delayForAttempt(policy, 1)).toBe(0);
  });

  it("grows geometrically from the initial delay", () => {
    expect([2, 3, 4, 5].map((a) => delayForAttempt(policy, a))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe("validateRetryPolicy", () => {
  it("rejects zero attempts", () => {
    expect(() => validateRetryPolicy({ maxAttempts: 0, initialDelayMs: 0, multiplier: 1 })).toThrow(
      "maxAttempts must be an integer >= 1",
    );
  });

  it("rejects a multiplier below 1", () => {
    expect(() => validateRetryPolicy({ maxAttempts: 2, initialDelayMs: 0, multiplier: 0.5 })).toThrow(
      "multiplier must be >= 1.0",
    );
  });

  it("rejects a negative delay", () => {
    expect(() => validateRetryPolicy({ maxAttempts: 2, initialDelayMs: -1, multiplier: 1 })).toThrow(
      "initialDelayMs must be >= 0",
    );
  });
});

describe("executeWithRetry", () => {
  it("fails twice, then succeeds on the third attempt after 1s and 2s sleeps", async () => {
    const { delays, sleep } = recordingSleep();
    const attempts: number[] = [];

    const result = await executeWithRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw transient();
        return "done";
      },
      { maxAttempts: 3, initialDelayMs: 1000, multiplier: 2 },
      { sleep },
    );

    expect(result).toBe("done");
    expect(attempts).toEqual([1, 2, 3]);
    expect(delays).toEqual([1000, 2000]);
  });

  it.each([1, 2, 4, 7])("makes exactly %i attempts for an always-transient failure", async (n) => {
    const { sleep } = recordingSleep();
    const op = vi.fn(async () => {
      throw transient();
    });

    const error = await executeWithRetry(op, { maxAttempts: n, initialDelayMs: 10, multiplier: 1 }, {
      sleep,
      operationName: "Download",
      now: () => 0,
    }).catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(n);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(n);
      expect(error.message).toBe(`Download failed after ${n} attempt(s) in 0ms: connection reset`);
      expect(error.kind).toBe("transient");
      expect(error.category).toBe("NETWORK_ERROR");
    }
  });

  it("does not retry permanent errors", async () => {
    const { delays, sleep } = recordingSleep();
    const permanent = new SetupError("not found", "permanent", "FILE_ERROR");
    const op = vi.fn(async () => {
      throw permanent;
    });

    await expect(
      executeWithRetry(op, { maxAttempts: 5, initialDelayMs: 10, multiplier: 2 }, { sleep }),
    ).rejects.toBe(permanent);
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("treats plain errors as permanent", async () => {
    const op = vi.fn(async () => {
      throw new Error("boom");
    });
    await expect(
      executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 0, multiplier: 1 }),
    ).rejects.toThrow("boom");
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("adds jitter in [0, delay/2)", async () => {
    const { delays, sleep } = recordingSleep();
    await executeWithRetry(
      async (attempt) => {
        if (attempt < 3) throw transient();
        return 1;
      },
      { maxAttempts: 3, initialDelayMs: 1000, multiplier: 2, jitter: true },
      { sleep, random: () => 0.5 },
    );
    expect(delays).toEqual([1250, 2500]);
  });

  it("reports each retry before sleeping", async () => {
    const { sleep } = recordingSleep();
    const notices: RetryNotice[] = [];
    await executeWithRetry(
      async (attempt) => {
        if (attempt === 1) throw transient();
        return 1;
      },
      { maxAttempts: 2, initialDelayMs: 50, multiplier: 2 },
      { sleep, onRetry: (n) => notices.push(n) },
    );
    expect(notices).toHaveLength(1);
    expect(notices[0].attempt).toBe(1);
    expect(notices[0].delayMs).toBe(50);
    const { error } = notices[0];
    expect(isSetupError(error) ? error.message : undefined).toBe("connection reset");
  });

  it("stops with a cancelled error when the signal fires during a sleep", async () => {
    const controller = new AbortController();
    const op = vi.fn(async () => {
      throw transient();
    });
    const sleep = async () => {
      controller.abort();
    };

    const error = await executeWithRetry(
      op,
      { maxAttempts: 5, initialDelayMs: 10, multiplier: 1 },
      { sleep, signal: controller.signal },
    ).catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(1);
    expect(isSetupError(error) ? error.kind : undefined).toBe("cancelled");
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const op = vi.fn(async () => 1);

    await expect(
      executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 0, multiplier: 1 }, { signal: controller.signal }),
    ).rejects.toMatchObject({ kind: "cancelled", category: "CANCELLED" });
    expect(op).not.toHaveBeenCalled();
  });
});

describe("abortableSleep", () => {
  it("rejects as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: "cancelled" });
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    try {
      const pending = abortableSleep(500);
      vi.advanceTimersByTime(500);
      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
