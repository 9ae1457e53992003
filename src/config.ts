import dotenv from "dotenv";
import { ValidationError } from "./errors.js";

if (process.env.NODE_ENV === "test") {
  dotenv.config({ path: ".env.test", override: true });
} else {
  dotenv.config({ path: ".env" });
}

const env = process.env.NODE_ENV || "development";

function parseIntegerEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || Number.isNaN(value) || value < min || String(value) !== raw.trim()) {
    throw new ValidationError(`${name} must be an integer >= ${min}. Received "${raw}".`);
  }
  return value;
}

function parseTimezoneEnv(name: string): string {
  const raw = process.env[name]?.trim();
  if (!raw) return "";
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: raw });
  } catch {
    throw new ValidationError(`${name} must be an IANA time zone such as "Europe/Berlin". Received "${raw}".`);
  }
  return raw;
}

const oximetrySessionGapMinutes = parseIntegerEnv(
  "OXIMETRY_SESSION_GAP_MINUTES",
  5,
  1
);

export const config = {
  env,
  timezoneOverride: parseTimezoneEnv("FITBIT_TIMEZONE"),
  exportPath: process.env.EXPORT_PATH?.trim() || "export",
  oximetry: {
    sessionGapMinutes: oximetrySessionGapMinutes,
    recordIntervalSeconds: 4,
    maxRecordsPerFile: 4095,
    minValidSpo2: 61,
    maxSpo2: 99,
  },
  sleep: {
    epochSeconds: 30,
  },
} as const;
