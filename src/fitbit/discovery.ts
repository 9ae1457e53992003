import fs from "fs";
import path from "path";
import type { Logger } from "../logger.js";
import { NotFoundError } from "../errors.js";
import { GLOBAL_EXPORT_DIR, PROFILE_DIR, SPO2_DIR } from "./paths.js";

export interface FitbitSources {
  fitbitDir: string;
  profile: string | null;
  spo2Files: string[];
  heartRateFiles: string[];
  sleepFiles: string[];
}

const SLEEP_FILE = /^sleep-.*\.json$/;
const HEART_RATE_FILE = /^heart_rate-.*\.json$/;
const SPO2_FILE = /^Minute SpO2.*\.csv$/;

function listMatching(dir: string, pattern: RegExp): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    return [];
  }
  return names
    .filter((name) => pattern.test(name))
    .sort()
    .map((name) => path.join(dir, name));
}

export function discoverSources(fitbitDir: string, logger: Logger): FitbitSources {
  const globalDir = path.join(fitbitDir, GLOBAL_EXPORT_DIR);
  const profilePath = path.join(fitbitDir, PROFILE_DIR, "Profile.csv");

  const sources: FitbitSources = {
    fitbitDir,
    profile: fs.existsSync(profilePath) ? profilePath : null,
    spo2Files: listMatching(path.join(fitbitDir, SPO2_DIR), SPO2_FILE),
    heartRateFiles: listMatching(globalDir, HEART_RATE_FILE),
    sleepFiles: listMatching(globalDir, SLEEP_FILE),
  };

  logger.debug(
    {
      fitbitDir,
      profile: sources.profile,
      spo2: sources.spo2Files.length,
      heartRate: sources.heartRateFiles.length,
      sleep: sources.sleepFiles.length,
    },
    "Discovered Fitbit sources"
  );

  if (sources.sleepFiles.length === 0 && sources.spo2Files.length === 0) {
    throw new NotFoundError(
      `No sleep or SpO2 data found under ${fitbitDir} ` +
        `(looked for ${GLOBAL_EXPORT_DIR}/sleep-*.json and ${SPO2_DIR}/Minute SpO2*.csv).`
    );
  }

  return sources;
}
