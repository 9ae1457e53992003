import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type { Logger };

export interface LoggerOptions {
  /** Number of -v flags given on the command line. */
  verbosity?: number;
  /** When set, logs go to this file and the level is pinned to info. */
  logfile?: string;
}

export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return "debug";
  if (verbosity === 1) return "info";
  return "warn";
}

function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: "message",
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  if (options.logfile) {
    const destination = pino.destination({
      dest: options.logfile,
      append: true,
      mkdir: true,
      sync: true,
    });
    return pino(createPinoOptions("info"), destination);
  }

  const pretty = PinoPretty({
    colorize: process.stderr.isTTY === true,
    destination: 2,
    sync: true,
    messageKey: "message",
    translateTime: "SYS:HH:MM:ss",
    ignore: "pid,hostname",
  });
  return pino(createPinoOptions(levelForVerbosity(options.verbosity ?? 0)), pretty);
}

/** Test helper: create a logger writing NDJSON to a custom destination */
export function createLoggerWithDestination(
  destination: DestinationStream,
  level: LogLevel = "debug"
): Logger {
  return pino(createPinoOptions(level), destination);
}
