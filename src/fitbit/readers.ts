import fs from "fs";
import path from "path";
import { parse as parseCsvSync } from "csv-parse/sync";
import type { z } from "zod";
import { config } from "../config.js";
import { ParseError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  formatIssues,
  heartRateSampleSchema,
  profileRowSchema,
  sleepLogSchema,
  spo2RowSchema,
  type HeartRateRecord,
  type SleepRecord,
  type Spo2Record,
} from "./records.js";

export interface ReadStats {
  recordsRead: number;
  recordsSkipped: number;
  filesRead: number;
  filesFailed: number;
}

export function emptyReadStats(): ReadStats {
  return { recordsRead: 0, recordsSkipped: 0, filesRead: 0, filesFailed: 0 };
}

function readJsonArray(file: string): unknown[] {
  const data: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  if (!Array.isArray(data)) {
    throw new Error("expected a JSON array at the top level");
  }
  return data;
}

function readCsvRows(file: string): unknown[] {
  const rows: unknown = parseCsvSync(fs.readFileSync(file, "utf-8"), {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    // a short row becomes a record without that field and fails its schema
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) {
    throw new Error("expected CSV rows");
  }
  return rows;
}

export function decodeRecord<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  file: string,
  index: number
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(path.basename(file), index, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Decode every element of every file. A malformed element is skipped with a
 * warning; a file that cannot be read or decoded at all is reported and
 * skipped.
 */
function readAll<S extends z.ZodTypeAny>(
  files: string[],
  load: (file: string) => unknown[],
  schema: S,
  logger: Logger,
  stats: ReadStats
): Array<z.output<S>> {
  const records: Array<z.output<S>> = [];

  for (const file of files) {
    let items: unknown[];
    try {
      items = load(file);
    } catch (err) {
      stats.filesFailed++;
      logger.error({ file, err: errorMessage(err) }, `Could not read ${path.basename(file)}, skipping it`);
      continue;
    }
    stats.filesRead++;

    items.forEach((raw, index) => {
      try {
        records.push(decodeRecord(schema, raw, file, index));
        stats.recordsRead++;
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        stats.recordsSkipped++;
        logger.warn({ file: err.file, index: err.index }, `Skipping malformed record: ${err.message}`);
      }
    });
    logger.debug({ file, records: items.length }, "Read file");
  }

  return records;
}

export function readSleepRecords(files: string[], logger: Logger, stats: ReadStats): SleepRecord[] {
  return readAll(files, readJsonArray, sleepLogSchema, logger, stats);
}

export function readHeartRateRecords(files: string[], logger: Logger, stats: ReadStats): HeartRateRecord[] {
  return readAll(files, readJsonArray, heartRateSampleSchema, logger, stats);
}

/**
 * Minute SpO2 readings, rounded to whole percent. Readings below the floor are
 * sensor noise and dropped; 100 is clamped to the highest value the oximetry
 * format accepts.
 */
export function readSpo2Records(files: string[], logger: Logger, stats: ReadStats): Spo2Record[] {
  const { minValidSpo2, maxSpo2 } = config.oximetry;
  const readings: Spo2Record[] = [];
  let dropped = 0;

  for (const record of readAll(files, readCsvRows, spo2RowSchema, logger, stats)) {
    const value = Math.round(record.value);
    if (value < minValidSpo2) {
      dropped++;
      continue;
    }
    readings.push({ ...record, value: Math.min(value, maxSpo2) });
  }

  if (dropped > 0) {
    logger.debug({ dropped }, `Dropped SpO2 readings below ${minValidSpo2}%`);
  }
  return readings;
}

export function readProfileTimezone(file: string, logger: Logger, stats: ReadStats): string | null {
  const rows = readAll([file], readCsvRows, profileRowSchema, logger, stats);
  return rows.length > 0 ? rows[rows.length - 1].timezone : null;
}
