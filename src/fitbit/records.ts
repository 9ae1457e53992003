import { z } from "zod";
import {
  parseFitbitDateTime,
  parseUtcTimestamp,
  type CalendarDate,
} from "../utils/dates.js";

// ============================================================================
// Record types
// ============================================================================

export interface SleepLevelSummary {
  count: number;
  minutes: number;
}

export interface SleepSegment {
  dateTime: string;
  level: string;
  seconds: number;
}

export interface SleepRecord {
  kind: "sleep";
  logId: number | null;
  date: CalendarDate;
  /** Local wall-clock times exactly as Fitbit wrote them. */
  startTime: string;
  endTime: string;
  minutesToFallAsleep: number;
  minutesAwake: number;
  efficiency: number;
  summary: Record<string, SleepLevelSummary>;
  segments: SleepSegment[];
}

export interface Spo2Record {
  kind: "spo2";
  /** Epoch milliseconds, UTC. */
  time: number;
  value: number;
}

export interface HeartRateRecord {
  kind: "heartRate";
  time: number;
  bpm: number;
}

export interface ProfileRecord {
  kind: "profile";
  timezone: string;
}

// ============================================================================
// Schemas
// ============================================================================

const dateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD format");

const localTimestamp = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/, "Must be an ISO local timestamp");

const minutes = z.number().nonnegative();

const levelSummarySchema = z.object({
  count: z.number().int().nonnegative().default(0),
  minutes,
});

const segmentSchema = z.object({
  dateTime: localTimestamp,
  level: z.string().min(1),
  seconds: z.number().int().nonnegative(),
});

export const sleepLogSchema = z
  .object({
    logId: z.number().int().optional(),
    dateOfSleep: dateString,
    startTime: localTimestamp,
    endTime: localTimestamp,
    minutesToFallAsleep: minutes.default(0),
    minutesAwake: minutes.default(0),
    efficiency: z.number().min(0).max(100),
    levels: z.object({
      summary: z.record(z.string(), levelSummarySchema),
      data: z.array(segmentSchema).default([]),
    }),
  })
  .transform(
    (log): SleepRecord => ({
      kind: "sleep",
      logId: log.logId ?? null,
      date: log.dateOfSleep,
      startTime: log.startTime,
      endTime: log.endTime,
      minutesToFallAsleep: log.minutesToFallAsleep,
      minutesAwake: log.minutesAwake,
      efficiency: log.efficiency,
      summary: log.levels.summary,
      segments: log.levels.data,
    })
  );

function timestampField(parse: (value: string) => number | null, format: string) {
  return z.string().transform((value, ctx) => {
    const time = parse(value.trim());
    if (time === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Must be ${format}` });
      return z.NEVER;
    }
    return time;
  });
}

export const spo2RowSchema = z
  .object({
    timestamp: timestampField(parseUtcTimestamp, "YYYY-MM-DDTHH:MM:SSZ"),
    value: z.string().trim().min(1).pipe(z.coerce.number().finite().nonnegative()),
  })
  .transform((row): Spo2Record => ({ kind: "spo2", time: row.timestamp, value: row.value }));

export const heartRateSampleSchema = z
  .object({
    dateTime: timestampField(parseFitbitDateTime, "MM/DD/YY HH:MM:SS"),
    value: z.object({
      bpm: z.number().int().positive().max(254),
    }),
  })
  .transform(
    (sample): HeartRateRecord => ({ kind: "heartRate", time: sample.dateTime, bpm: sample.value.bpm })
  );

export const profileRowSchema = z
  .object({
    timezone: z.string().trim().min(1),
  })
  .transform((row): ProfileRecord => ({ kind: "profile", timezone: row.timezone }));

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
