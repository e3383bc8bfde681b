/**
 * Tandem Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine module logs through
 * the instance it is handed; nothing creates its own.
 *
 * The default level is "silent" so the CLI only shows its own rendered
 * output. --verbose / --debug raise the level and logs go to stderr.
 *
 * NOTE: pino.destination() instead of pino transports, because transports
 * spawn worker_threads that outlive short CLI runs.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** File descriptor to write to (2 = stderr) */
  fd: number;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  fd: 2,
};

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: "tandem",
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: opts.fd, sync: true }),
  );
}

export type Logger = pino.Logger;
