export type SleepStage = "wake" | "light" | "deep" | "rem";

export interface SleepLevelTable {
  version: number;
  /** Lower-case Fitbit label → canonical stage. */
  aliases: Readonly<Record<string, SleepStage>>;
}

/**
 * Fitbit label changes are handled here and nowhere else: add the new label
 * as an alias and bump the version.
 *
 * v2: "awake" (used by some exports for the wake stage) maps to wake.
 */
export const SLEEP_LEVEL_TABLE: SleepLevelTable = {
  version: 2,
  aliases: {
    wake: "wake",
    awake: "wake",
    light: "light",
    deep: "deep",
    rem: "rem",
  },
};

/** Hypnogram labels understood by OSCAR's Dreem importer. */
export const DREEM_STAGE_LABELS: Readonly<Record<SleepStage, string>> = {
  wake: "WAKE",
  light: "Light",
  deep: "Deep",
  rem: "REM",
};

export function normalizeSleepLevel(
  label: string,
  table: SleepLevelTable = SLEEP_LEVEL_TABLE
): SleepStage | null {
  const key = label.trim().toLowerCase();
  return Object.hasOwn(table.aliases, key) ? table.aliases[key] : null;
}

/** Staged logs carry light/deep/rem/wake; classic logs carry asleep/restless/awake. */
export function isStagedSummary(summaryKeys: string[]): boolean {
  return summaryKeys.some((key) => key.toLowerCase() === "light");
}
