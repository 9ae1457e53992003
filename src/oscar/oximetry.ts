import { config } from "../config.js";
import type { HeartRateRecord, Spo2Record } from "../fitbit/records.js";

export interface OximetrySession {
  /** Epoch ms of the first and last SpO2 reading. */
  start: number;
  end: number;
  readings: number;
}

export interface TimelinePoint {
  time: number;
  spo2: number | null;
  bpm: number | null;
}

export interface OximetrySample {
  time: number;
  spo2: number | null;
  bpm: number | null;
}

export type OximetryChunk = OximetrySample[];

export interface ChunkOptions {
  intervalMs: number;
  maxRecords: number;
}

const defaultChunkOptions: ChunkOptions = {
  intervalMs: config.oximetry.recordIntervalSeconds * 1000,
  maxRecords: config.oximetry.maxRecordsPerFile,
};

/** Split time-sorted readings wherever two neighbours are more than gapMs apart. */
export function detectSessions(readings: Spo2Record[], gapMs: number): OximetrySession[] {
  const times = [...new Set(readings.map((r) => r.time))].sort((a, b) => a - b);
  const sessions: OximetrySession[] = [];

  for (const time of times) {
    const current = sessions[sessions.length - 1];
    if (current && time - current.end <= gapMs) {
      current.end = time;
      current.readings++;
    } else {
      sessions.push({ start: time, end: time, readings: 1 });
    }
  }

  return sessions;
}

/** Merge both series into one time-sorted list; a later duplicate wins. */
export function buildTimeline(spo2: Spo2Record[], heartRate: HeartRateRecord[]): TimelinePoint[] {
  const points = new Map<number, TimelinePoint>();
  const at = (time: number): TimelinePoint => {
    let point = points.get(time);
    if (!point) {
      point = { time, spo2: null, bpm: null };
      points.set(time, point);
    }
    return point;
  };

  for (const reading of spo2) at(reading.time).spo2 = reading.value;
  for (const sample of heartRate) at(sample.time).bpm = sample.bpm;

  return [...points.values()].sort((a, b) => a.time - b.time);
}

/**
 * Sessions that end before the last heart-rate sample can be paired with pulse
 * data; the rest cannot.
 */
export function partitionByPulseCoverage(
  sessions: OximetrySession[],
  heartRate: HeartRateRecord[]
): { covered: OximetrySession[]; uncovered: OximetrySession[] } {
  let lastPulse = Number.NEGATIVE_INFINITY;
  for (const sample of heartRate) lastPulse = Math.max(lastPulse, sample.time);

  const covered: OximetrySession[] = [];
  const uncovered: OximetrySession[] = [];
  for (const session of sessions) {
    (session.end < lastPulse ? covered : uncovered).push(session);
  }
  return { covered, uncovered };
}

/**
 * Resample each session onto a fixed grid, carrying forward the latest SpO2
 * and pulse values, and split the result into file-sized chunks. Sessions must
 * be time-sorted and non-overlapping; the result has one entry per session.
 */
export function buildSessionChunks(
  sessions: OximetrySession[],
  timeline: TimelinePoint[],
  options: ChunkOptions = defaultChunkOptions
): OximetryChunk[][] {
  const { intervalMs, maxRecords } = options;
  const result: OximetryChunk[][] = [];
  let spo2: number | null = null;
  let bpm: number | null = null;
  let i = 0;

  for (const session of sessions) {
    const samples: OximetrySample[] = [];
    let cursor: number | null = null;

    for (; i < timeline.length; i++) {
      const point = timeline[i];
      if (point.time > session.end) break;
      if (point.spo2 !== null) spo2 = point.spo2;
      if (point.bpm !== null) bpm = point.bpm;
      if (point.time < session.start) continue;

      const next = timeline[i + 1];
      const stop = Math.min(next ? next.time : Number.POSITIVE_INFINITY, session.end + intervalMs);
      let t: number = cursor ?? point.time;
      while (t < stop) {
        samples.push({ time: t, spo2, bpm });
        t += intervalMs;
      }
      cursor = t;
    }

    const chunks: OximetryChunk[] = [];
    for (let offset = 0; offset < samples.length; offset += maxRecords) {
      chunks.push(samples.slice(offset, offset + maxRecords));
    }
    result.push(chunks);
  }

  return result;
}
