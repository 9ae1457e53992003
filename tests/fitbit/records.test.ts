import { describe, it, expect } from "vitest";
import {
  formatIssues,
  heartRateSampleSchema,
  profileRowSchema,
  sleepLogSchema,
  spo2RowSchema,
} from "../../src/fitbit/records.js";
import { sleepLog } from "../helpers/takeout.js";

describe("sleepLogSchema", () => {
  it("maps a staged log onto a sleep record", () => {
    const parsed = sleepLogSchema.parse(sleepLog("2023-01-03"));

    expect(parsed).toMatchObject({
      kind: "sleep",
      logId: 20230103,
      date: "2023-01-03",
      startTime: "2023-01-02T23:00:00.000",
      endTime: "2023-01-03T07:00:00.000",
      minutesToFallAsleep: 5,
      minutesAwake: 40,
      efficiency: 92,
    });
    expect(parsed.summary.light).toEqual({ count: 20, minutes: 250 });
    expect(parsed.segments).toHaveLength(4);
    expect(parsed.segments[0]).toEqual({ dateTime: "2023-01-02T23:00:00.000", level: "wake", seconds: 60 });
  });

  it("defaults optional counters", () => {
    const raw = sleepLog("2023-01-03", { minutesToFallAsleep: undefined, minutesAwake: undefined, logId: undefined });
    const parsed = sleepLogSchema.parse(raw);

    expect(parsed.minutesToFallAsleep).toBe(0);
    expect(parsed.minutesAwake).toBe(0);
    expect(parsed.logId).toBeNull();
  });

  it("rejects a log without a date", () => {
    const result = sleepLogSchema.safeParse(sleepLog("2023-01-03", { dateOfSleep: undefined }));

    expect(result.success).toBe(false);
    if (!result.success) expect(formatIssues(result.error)).toBe("dateOfSleep: Required");
  });

  it("rejects an efficiency above 100", () => {
    expect(sleepLogSchema.safeParse(sleepLog("2023-01-03", { efficiency: 140 })).success).toBe(false);
  });
});

describe("spo2RowSchema", () => {
  it("parses the timestamp and coerces the value", () => {
    expect(spo2RowSchema.parse({ timestamp: "2023-01-03T07:00:00Z", value: "95.6" })).toEqual({
      kind: "spo2",
      time: Date.UTC(2023, 0, 3, 7, 0, 0),
      value: 95.6,
    });
  });

  it("rejects an empty value", () => {
    expect(spo2RowSchema.safeParse({ timestamp: "2023-01-03T07:00:00Z", value: "" }).success).toBe(false);
  });

  it("rejects a non-numeric value", () => {
    expect(spo2RowSchema.safeParse({ timestamp: "2023-01-03T07:00:00Z", value: "n/a" }).success).toBe(false);
  });

  it("names the expected timestamp layout", () => {
    const result = spo2RowSchema.safeParse({ timestamp: "03/01/2023 07:00", value: "95" });

    expect(result.success).toBe(false);
    if (!result.success) expect(formatIssues(result.error)).toBe("timestamp: Must be YYYY-MM-DDTHH:MM:SSZ");
  });
});

describe("heartRateSampleSchema", () => {
  it("keeps the time and bpm", () => {
    expect(
      heartRateSampleSchema.parse({ dateTime: "01/03/23 07:00:05", value: { bpm: 61, confidence: 2 } })
    ).toEqual({ kind: "heartRate", time: Date.UTC(2023, 0, 3, 7, 0, 5), bpm: 61 });
  });

  it("rejects a bpm the oximetry format cannot hold", () => {
    expect(
      heartRateSampleSchema.safeParse({ dateTime: "01/03/23 07:00:05", value: { bpm: 255 } }).success
    ).toBe(false);
  });
});

describe("profileRowSchema", () => {
  it("reads the time zone", () => {
    expect(profileRowSchema.parse({ id: "ABC", timezone: "Europe/Berlin" })).toEqual({
      kind: "profile",
      timezone: "Europe/Berlin",
    });
  });
});

describe("formatIssues", () => {
  it("labels root-level issues", () => {
    const result = profileRowSchema.safeParse("not a row");

    expect(result.success).toBe(false);
    if (!result.success) expect(formatIssues(result.error)).toBe("(root): Expected object, received string");
  });
});
