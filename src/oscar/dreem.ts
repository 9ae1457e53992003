import { stringify } from "csv-stringify/sync";
import { config } from "../config.js";
import type { SleepRecord, SleepSegment } from "../fitbit/records.js";
import { minutesToTime } from "../utils/dates.js";
import { DREEM_STAGE_LABELS, normalizeSleepLevel, type SleepStage } from "./sleep-levels.js";

export const DREEM_FILE_NAME = "sleep.csv";

export const DREEM_HEADER = [
  "Start Time",
  "Stop Time",
  "Sleep Onset Duration",
  "Light Sleep Duration",
  "Deep Sleep Duration",
  "REM Duration",
  "Wake After Sleep Onset Duration",
  "Number of awakenings",
  "Sleep efficiency",
  "Hypnogram",
] as const;

export type DreemRow = [
  startTime: string,
  stopTime: string,
  sleepOnset: string,
  light: string,
  deep: string,
  rem: string,
  wakeAfterSleepOnset: string,
  awakenings: number,
  efficiency: number,
  hypnogram: string,
];

function stageSummary(sleep: SleepRecord, stage: SleepStage): { count: number; minutes: number } {
  for (const [label, summary] of Object.entries(sleep.summary)) {
    if (label.toLowerCase() === stage) return summary;
  }
  return { count: 0, minutes: 0 };
}

/**
 * Expand level segments into fixed 30-second epochs. Segments with a label the
 * level table does not know are left out of the hypnogram.
 */
export function buildHypnogram(
  segments: SleepSegment[],
  onUnknownLevel: (label: string) => void = () => {}
): string[] {
  const epochs: string[] = [];
  for (const segment of segments) {
    const stage = normalizeSleepLevel(segment.level);
    if (!stage) {
      onUnknownLevel(segment.level);
      continue;
    }
    const count = Math.floor(segment.seconds / config.sleep.epochSeconds);
    for (let i = 0; i < count; i++) epochs.push(DREEM_STAGE_LABELS[stage]);
  }
  return epochs;
}

export function toDreemRow(
  sleep: SleepRecord,
  onUnknownLevel?: (label: string) => void
): DreemRow {
  const hypnogram = buildHypnogram(sleep.segments, onUnknownLevel);
  return [
    sleep.startTime,
    sleep.endTime,
    minutesToTime(sleep.minutesToFallAsleep),
    minutesToTime(stageSummary(sleep, "light").minutes),
    minutesToTime(stageSummary(sleep, "deep").minutes),
    minutesToTime(stageSummary(sleep, "rem").minutes),
    minutesToTime(sleep.minutesAwake),
    stageSummary(sleep, "wake").count,
    sleep.efficiency,
    `[${hypnogram.join(",")}]`,
  ];
}

export function renderDreemCsv(rows: DreemRow[]): string {
  return stringify([[...DREEM_HEADER], ...rows], {
    delimiter: ";",
    record_delimiter: "unix",
  });
}
