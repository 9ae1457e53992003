import { config } from "./config.js";
import { ValidationError } from "./errors.js";
import { discoverSources, type FitbitSources } from "./fitbit/discovery.js";
import { resolveFitbitPath } from "./fitbit/paths.js";
import {
  emptyReadStats,
  readHeartRateRecords,
  readProfileTimezone,
  readSleepRecords,
  readSpo2Records,
  type ReadStats,
} from "./fitbit/readers.js";
import type { SleepRecord } from "./fitbit/records.js";
import type { Logger } from "./logger.js";
import { DREEM_FILE_NAME, renderDreemCsv, toDreemRow, type DreemRow } from "./oscar/dreem.js";
import {
  buildSessionChunks,
  buildTimeline,
  detectSessions,
  partitionByPulseCoverage,
  type OximetrySession,
} from "./oscar/oximetry.js";
import { isStagedSummary } from "./oscar/sleep-levels.js";
import { encodeViatom, type ViatomFile } from "./oscar/viatom.js";
import { writeExport, type ExportFile } from "./oscar/writer.js";
import {
  formatLocalDateTime,
  isValidTimeZone,
  isWithinRange,
  localCalendarDate,
  localDateTime,
  type DateRange,
} from "./utils/dates.js";

export interface ConvertOptions {
  fitbitPath: string;
  exportPath: string;
  range: DateRange;
  logger: Logger;
  /** Overrides both FITBIT_TIMEZONE and the profile time zone. */
  timezone?: string;
  sessionGapMinutes?: number;
}

export interface ConversionSummary {
  fitbitDir: string;
  exportPath: string;
  timezone: string | null;
  sleepSessions: number;
  oximetrySessions: number;
  oximetryFiles: number;
  recordsRead: number;
  recordsSkipped: number;
  filesFailed: number;
  written: string[];
}

function compareSleep(a: SleepRecord, b: SleepRecord): number {
  if (a.startTime !== b.startTime) return a.startTime < b.startTime ? -1 : 1;
  return (a.logId ?? 0) - (b.logId ?? 0);
}

function convertSleep(
  sources: FitbitSources,
  range: DateRange,
  logger: Logger,
  stats: ReadStats
): DreemRow[] {
  if (sources.sleepFiles.length === 0) {
    logger.warn("No sleep data found, skipping sleep stages");
    return [];
  }

  const seen = new Set<number>();
  const selected: SleepRecord[] = [];
  for (const sleep of readSleepRecords(sources.sleepFiles, logger, stats)) {
    if (!isStagedSummary(Object.keys(sleep.summary))) {
      logger.debug({ date: sleep.date, logId: sleep.logId }, "Skipping sleep log without stage data");
      continue;
    }
    if (!isWithinRange(sleep.date, range)) continue;
    if (sleep.logId !== null) {
      if (seen.has(sleep.logId)) continue;
      seen.add(sleep.logId);
    }
    selected.push(sleep);
  }
  selected.sort(compareSleep);

  const unknownLevels = new Set<string>();
  const onUnknownLevel = (label: string): void => {
    if (unknownLevels.has(label)) return;
    unknownLevels.add(label);
    logger.warn({ sleepLevel: label }, `Sleep stage '${label}' is not recognized`);
  };

  return selected.map((sleep) => {
    logger.info(`Export to Dreem sleep: ${sleep.startTime} - ${sleep.endTime}`);
    return toDreemRow(sleep, onUnknownLevel);
  });
}

export function resolveTimezone(
  sources: FitbitSources,
  override: string | undefined,
  logger: Logger,
  stats: ReadStats
): string {
  let timezone = override || config.timezoneOverride;
  let origin = "override";
  if (!timezone && sources.profile) {
    timezone = readProfileTimezone(sources.profile, logger, stats) ?? "";
    origin = "profile";
  }
  if (!timezone) {
    logger.warn("Profile time zone not found, treating SpO2 timestamps as UTC");
    return "UTC";
  }
  if (!isValidTimeZone(timezone)) {
    throw new ValidationError(`Unknown time zone "${timezone}" (from ${origin}).`);
  }
  logger.info(`Timezone: ${timezone}`);
  return timezone;
}

function describeSession(session: OximetrySession, timezone: string): string {
  return (
    `${formatLocalDateTime(localDateTime(session.start, timezone))} - ` +
    `${formatLocalDateTime(localDateTime(session.end, timezone))}`
  );
}

function convertOximetry(
  sources: FitbitSources,
  range: DateRange,
  timezone: string,
  gapMinutes: number,
  logger: Logger,
  stats: ReadStats
): { sessions: number; files: ViatomFile[] } {
  const spo2 = readSpo2Records(sources.spo2Files, logger, stats);
  const heartRate = readHeartRateRecords(sources.heartRateFiles, logger, stats);
  if (spo2.length === 0 || heartRate.length === 0) {
    logger.warn("No usable SpO2 or heart rate data, skipping oximetry");
    return { sessions: 0, files: [] };
  }

  const sessions = detectSessions(spo2, gapMinutes * 60_000).filter((session) =>
    isWithinRange(localCalendarDate(session.end, timezone), range)
  );
  const { covered, uncovered } = partitionByPulseCoverage(sessions, heartRate);
  for (const session of uncovered) {
    logger.warn(`Skipping SpO2 session without heart rate data: ${describeSession(session, timezone)}`);
  }
  for (const session of covered) {
    logger.info(`Detected SpO2 session: ${describeSession(session, timezone)}`);
  }

  const perSession = buildSessionChunks(covered, buildTimeline(spo2, heartRate));
  const names = new Set<string>();
  const files = perSession.flat().map((chunk) => {
    let file = encodeViatom(chunk, timezone);
    const wanted = file.fileName;
    for (let shift = 1; names.has(file.fileName); shift++) {
      file = encodeViatom(chunk, timezone, { shiftSeconds: shift });
    }
    if (file.fileName !== wanted) {
      logger.warn(`Oximetry file name ${wanted} already used, writing ${file.fileName}`);
    }
    names.add(file.fileName);
    logger.debug({ file: file.fileName, records: file.records }, "Encoded oximetry file");
    return file;
  });
  return { sessions: perSession.filter((chunks) => chunks.length > 0).length, files };
}

/**
 * Run the whole pipeline: resolve the Fitbit folder, read and filter the
 * records, transform them, and write the export. Nothing is written unless
 * every output was built.
 */
export function convertExport(options: ConvertOptions): ConversionSummary {
  const { logger, range } = options;
  const fitbitDir = resolveFitbitPath(options.fitbitPath);
  logger.info({ fitbitDir, range }, "Converting Fitbit export");

  const sources = discoverSources(fitbitDir, logger);
  const stats = emptyReadStats();
  const files: ExportFile[] = [];

  const sleepRows = convertSleep(sources, range, logger, stats);
  if (sleepRows.length > 0) {
    files.push({ name: DREEM_FILE_NAME, contents: renderDreemCsv(sleepRows) });
  }

  let timezone: string | null = null;
  let oximetry: { sessions: number; files: ViatomFile[] } = { sessions: 0, files: [] };
  if (sources.spo2Files.length > 0) {
    timezone = resolveTimezone(sources, options.timezone, logger, stats);
    oximetry = convertOximetry(
      sources,
      range,
      timezone,
      options.sessionGapMinutes ?? config.oximetry.sessionGapMinutes,
      logger,
      stats
    );
    for (const file of oximetry.files) {
      files.push({ name: file.fileName, contents: file.bytes });
    }
  } else {
    logger.warn("No SpO2 data found, skipping oximetry");
  }

  let written: string[] = [];
  if (files.length > 0) {
    written = writeExport(options.exportPath, files, logger);
  } else {
    logger.warn("Nothing to export for the selected date range");
  }

  const summary: ConversionSummary = {
    fitbitDir,
    exportPath: options.exportPath,
    timezone,
    sleepSessions: sleepRows.length,
    oximetrySessions: oximetry.sessions,
    oximetryFiles: oximetry.files.length,
    recordsRead: stats.recordsRead,
    recordsSkipped: stats.recordsSkipped,
    filesFailed: stats.filesFailed,
    written,
  };
  logger.info(
    {
      sleepSessions: summary.sleepSessions,
      oximetrySessions: summary.oximetrySessions,
      oximetryFiles: summary.oximetryFiles,
      recordsSkipped: summary.recordsSkipped,
      filesFailed: summary.filesFailed,
    },
    "Conversion finished"
  );
  return summary;
}
