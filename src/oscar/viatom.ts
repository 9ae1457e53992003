import { config } from "../config.js";
import { formatCompactTimestamp, localDateTime } from "../utils/dates.js";
import type { OximetryChunk } from "./oximetry.js";

export const VIATOM_HEADER_SIZE = 40;
export const VIATOM_RECORD_SIZE = 5;

const INVALID = 0xff;

export interface ViatomFile {
  fileName: string;
  bytes: Buffer;
  records: number;
}

export interface EncodeOptions {
  /**
   * Seconds added to the header timestamp and file name. Used to keep names
   * unique when two chunks start at the same local time (DST fall-back).
   */
  shiftSeconds?: number;
}

/**
 * Encode one chunk as a Viatom/Wellue oximetry file. The header timestamp and
 * file name use the chunk's first sample in the given time zone; records are
 * assumed to be evenly spaced at the configured interval.
 */
export function encodeViatom(
  chunk: OximetryChunk,
  timeZone: string,
  options: EncodeOptions = {}
): ViatomFile {
  const { maxRecordsPerFile, minValidSpo2, maxSpo2, recordIntervalSeconds } = config.oximetry;
  if (chunk.length === 0) {
    throw new RangeError("Cannot encode an empty oximetry chunk");
  }
  if (chunk.length > maxRecordsPerFile) {
    throw new RangeError(`Oximetry chunk too long (${chunk.length} > ${maxRecordsPerFile} records)`);
  }

  const size = VIATOM_HEADER_SIZE + chunk.length * VIATOM_RECORD_SIZE;
  const bytes = Buffer.alloc(size);
  const start = localDateTime(chunk[0].time + (options.shiftSeconds ?? 0) * 1000, timeZone);

  bytes.writeUInt8(0x05, 0);
  bytes.writeUInt8(0x00, 1);
  bytes.writeUInt16LE(start.year, 2);
  bytes.writeUInt8(start.month, 4);
  bytes.writeUInt8(start.day, 5);
  bytes.writeUInt8(start.hour, 6);
  bytes.writeUInt8(start.minute, 7);
  bytes.writeUInt8(start.second, 8);
  bytes.writeUInt32LE(size, 9);
  bytes.writeUInt16LE(chunk.length * recordIntervalSeconds, 13);
  // 15..39 stay zero

  chunk.forEach((sample, index) => {
    const offset = VIATOM_HEADER_SIZE + index * VIATOM_RECORD_SIZE;
    const bpm = sample.bpm ?? INVALID;
    // a reading at the floor itself is kept in the series but flagged invalid
    if (sample.spo2 === null || sample.spo2 <= minValidSpo2) {
      bytes.writeUInt8(INVALID, offset);
      bytes.writeUInt8(bpm, offset + 1);
      bytes.writeUInt8(INVALID, offset + 2);
    } else {
      bytes.writeUInt8(Math.min(sample.spo2, maxSpo2), offset);
      bytes.writeUInt8(bpm, offset + 1);
    }
  });

  return {
    fileName: `${formatCompactTimestamp(start)}.bin`,
    bytes,
    records: chunk.length,
  };
}
