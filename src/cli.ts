import fs from "fs";
import { Command, CommanderError } from "commander";
import { config } from "./config.js";
import { convertExport, type ConversionSummary } from "./converter.js";
import { ValidationError, errorMessage, exitCodeFor } from "./errors.js";
import { createLogger, type Logger, type LoggerOptions } from "./logger.js";
import { parseLooseDate, type CalendarDate, type DateRange } from "./utils/dates.js";

export interface CliOptions {
  fitbitPath: string;
  exportPath: string;
  startDate?: string;
  endDate?: string;
  verbosity: number;
  logfile?: string;
}

export type CliParseResult =
  | { kind: "run"; options: CliOptions }
  | { kind: "exit"; code: number };

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface RunDeps {
  io?: CliIO;
  createLogger?: (options: LoggerOptions) => Logger;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function readPackageVersion(): string {
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(new URL(candidate, import.meta.url), "utf-8"));
      if (
        typeof pkg === "object" && pkg !== null &&
        "name" in pkg && pkg.name === "fitbit-oscar" &&
        "version" in pkg && typeof pkg.version === "string"
      ) {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return "0.0.0";
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(io: CliIO = defaultIO): Command {
  return new Command()
    .name("fitbit-oscar")
    .description("Convert a Fitbit Takeout export into sleep-stage and oximetry files OSCAR can import")
    .version(readPackageVersion())
    .argument("<fitbit_path>", "path to the Takeout folder or the Fitbit folder within it")
    .argument("[export_path]", "output directory", config.exportPath)
    .option("-s, --start-date <YYYY-M-D>", "first date to convert (inclusive)")
    .option("-e, --end-date <YYYY-M-D>", "last date to convert (inclusive)")
    .option("-v, --verbosity", "increase console log detail (repeatable)", increaseVerbosity, 0)
    .option("-l, --logfile <filename.log>", "write logs to this file at INFO level")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
      outputError: () => {},
    });
}

/**
 * Parse argv (without the node and script entries). Help and version requests
 * come back as an exit result; anything commander rejects is a ValidationError.
 */
export function parseCliArgs(argv: string[], io: CliIO = defaultIO): CliParseResult {
  const program = buildProgram(io);
  const captured: { operands?: { fitbitPath: string; exportPath: string } } = {};
  program.action((fitbitPath: string, exportPath: string) => {
    captured.operands = { fitbitPath, exportPath };
  });

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) return { kind: "exit", code: 0 };
      throw new ValidationError(`${err.message.replace(/^error: /, "")} (see --help)`, { cause: err });
    }
    throw err;
  }

  const parsed = captured.operands;
  if (!parsed) {
    throw new ValidationError("missing required argument 'fitbit_path' (see --help)");
  }
  const opts = program.opts<{
    startDate?: string;
    endDate?: string;
    verbosity: number;
    logfile?: string;
  }>();

  return {
    kind: "run",
    options: {
      fitbitPath: parsed.fitbitPath,
      exportPath: parsed.exportPath,
      startDate: opts.startDate,
      endDate: opts.endDate,
      verbosity: opts.verbosity,
      logfile: opts.logfile,
    },
  };
}

export function parseDateArg(value: string, flag: string): CalendarDate {
  const date = parseLooseDate(value);
  if (!date) {
    throw new ValidationError(`Invalid ${flag} value "${value}". Must be a calendar date in YYYY-M-D format.`);
  }
  return date;
}

export function resolveDateRange(startDate?: string, endDate?: string): DateRange {
  const range: DateRange = {};
  if (startDate !== undefined) range.start = parseDateArg(startDate, "--start-date");
  if (endDate !== undefined) range.end = parseDateArg(endDate, "--end-date");
  if (range.start && range.end && range.start > range.end) {
    throw new ValidationError(
      `Invalid date range: --start-date ${range.start} is after --end-date ${range.end}.`
    );
  }
  return range;
}

export function formatSummary(summary: ConversionSummary): string {
  if (summary.written.length === 0) {
    return "No data in the selected date range; nothing exported.\n";
  }
  const lines = [
    `Exported ${summary.sleepSessions} sleep sessions and ${summary.oximetrySessions} oximetry sessions ` +
      `(${summary.oximetryFiles} files) to ${summary.exportPath}`,
  ];
  if (summary.recordsSkipped > 0 || summary.filesFailed > 0) {
    lines.push(`Skipped ${summary.recordsSkipped} malformed records and ${summary.filesFailed} unreadable files`);
  }
  return `${lines.join("\n")}\n`;
}

/** Run the CLI and return the process exit code. */
export function run(argv: string[], deps: RunDeps = {}): number {
  const io = deps.io ?? defaultIO;
  const makeLogger = deps.createLogger ?? createLogger;
  let logger: Logger | null = null;

  try {
    const parsed = parseCliArgs(argv, io);
    if (parsed.kind === "exit") return parsed.code;

    const { options } = parsed;
    const range = resolveDateRange(options.startDate, options.endDate);
    logger = makeLogger({ verbosity: options.verbosity, logfile: options.logfile });

    const summary = convertExport({
      fitbitPath: options.fitbitPath,
      exportPath: options.exportPath,
      range,
      logger,
    });
    io.stdout(formatSummary(summary));
    return 0;
  } catch (err) {
    logger?.error({ err: errorMessage(err) }, "Conversion failed");
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return exitCodeFor(err);
  }
}
