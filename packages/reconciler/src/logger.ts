/**
 * Logging setup.
 *
 * One root pino logger per process; components take a Logger and bind a
 * `component` field through child loggers. Library entry points default to
 * a silent logger so they stay quiet when embedded.
 */

import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "stop-sync",
    level: options.level ?? "info",
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger that discards everything */
export const silentLogger: Logger = pino({ level: "silent" });
