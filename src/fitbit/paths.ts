import fs from "fs";
import path from "path";
import { NotFoundError } from "../errors.js";

export const GLOBAL_EXPORT_DIR = "Global Export Data";
export const SPO2_DIR = "Oxygen Saturation (SpO2)";
export const PROFILE_DIR = "Your Profile";

const DATA_DIRS = [GLOBAL_EXPORT_DIR, SPO2_DIR, PROFILE_DIR];

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function looksLikeFitbitDir(p: string): boolean {
  return DATA_DIRS.some((dir) => isDirectory(path.join(p, dir)));
}

/**
 * Resolve the Fitbit data directory from whatever the user pointed at: the
 * Fitbit folder itself, the Takeout folder, or the folder the Takeout archive
 * was extracted into.
 */
export function resolveFitbitPath(input: string): string {
  const root = path.resolve(input);
  if (!isDirectory(root)) {
    throw new NotFoundError(`The path ${root} is not a valid directory.`);
  }

  const candidates = [
    path.join(root, "Fitbit"),
    path.join(root, "Takeout", "Fitbit"),
    root,
  ];
  for (const candidate of candidates) {
    if (isDirectory(candidate) && looksLikeFitbitDir(candidate)) {
      return candidate;
    }
  }

  throw new NotFoundError(
    `The path ${root} does not contain Fitbit data ` +
      `(expected Fitbit/, Takeout/Fitbit/ or one of: ${DATA_DIRS.join(", ")}).`
  );
}
