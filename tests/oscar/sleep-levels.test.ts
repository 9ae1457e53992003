import { describe, it, expect } from "vitest";
import {
  SLEEP_LEVEL_TABLE,
  isStagedSummary,
  normalizeSleepLevel,
  type SleepLevelTable,
} from "../../src/oscar/sleep-levels.js";

describe("normalizeSleepLevel", () => {
  it("maps Fitbit labels case-insensitively", () => {
    expect(normalizeSleepLevel("REM")).toBe("rem");
    expect(normalizeSleepLevel(" Wake ")).toBe("wake");
    expect(normalizeSleepLevel("deep")).toBe("deep");
  });

  it("treats awake as wake", () => {
    expect(normalizeSleepLevel("awake")).toBe("wake");
  });

  it("returns null for classic and unknown labels", () => {
    expect(normalizeSleepLevel("asleep")).toBeNull();
    expect(normalizeSleepLevel("restless")).toBeNull();
    expect(normalizeSleepLevel("toString")).toBeNull();
  });

  it("uses a caller-supplied table", () => {
    const table: SleepLevelTable = {
      version: SLEEP_LEVEL_TABLE.version + 1,
      aliases: { ...SLEEP_LEVEL_TABLE.aliases, core: "light" },
    };
    expect(normalizeSleepLevel("core", table)).toBe("light");
    expect(normalizeSleepLevel("core")).toBeNull();
  });
});

describe("isStagedSummary", () => {
  it("detects staged logs by their light stage", () => {
    expect(isStagedSummary(["deep", "light", "rem", "wake"])).toBe(true);
    expect(isStagedSummary(["Light"])).toBe(true);
  });

  it("rejects classic logs", () => {
    expect(isStagedSummary(["asleep", "awake", "restless"])).toBe(false);
    expect(isStagedSummary([])).toBe(false);
  });
});
