/**
 * answerkit Engine -- Structured Logger
 *
 * Wraps pino. Silent unless a level is requested; when enabled, JSON lines
 * go to stderr so stdout stays clean for CLI output.
 *
 * NOTE: pino.destination() is used instead of transports, which spawn
 * worker_threads.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Bound to every line as `name` */
  name?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: opts.name,
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
