import { describe, it, expect } from "vitest";
import { emptyCategoryStats } from "../src/stats/category_stats.js";
import { categoryStatsFor, detailedStats, headlineStat } from "../src/stats/headlines.js";
import type { CategoryStats } from "../src/shared/types.js";

const FALL: CategoryStats = {
  totalCount: 1234,
  fatalCount: 56,
  dafwCount: 800,
  avgDafw: 41.6,
  maxDafw: 365,
  pctFatal: 4.5,
  topSources: [
    { source: "Ladders", count: 400 },
    { source: "Roofs", count: 300 },
  ],
  topBodyParts: [{ bodyPart: "Back", count: 200 }],
  yearBreakdown: { "2023": 700, "2022": 534 },
};

describe("Category headlines", () => {
  it("summarizes a category in one paragraph", () => {
    expect(headlineStat("Fall Hazard", { "Fall Hazard": FALL })).toBe(
      "1,234 Fall Hazard incidents recorded. 56 fatalities (4.5%). " +
        "Workers averaged 42 days away from work. Most common causes: Ladders, Roofs. Most affected: Back."
    );
  });

  it("uses the singular cause and skips absent figures", () => {
    const stats = { ...FALL, avgDafw: 0, topSources: [{ source: "Ladders", count: 3 }], topBodyParts: [] };
    expect(headlineStat("Fall Hazard", { "Fall Hazard": stats })).toBe(
      "1,234 Fall Hazard incidents recorded. 56 fatalities (4.5%). Most common cause: Ladders."
    );
  });

  it("handles empty and unknown categories", () => {
    expect(headlineStat("Noise", { Noise: emptyCategoryStats() })).toBe(
      "No Noise incidents found in dataset."
    );
    expect(headlineStat("Noise", {})).toBe("No statistics available for Noise.");
  });

  it("ignores names inherited from Object.prototype", () => {
    expect(headlineStat("constructor", {})).toBe("No statistics available for constructor.");
    expect(detailedStats("toString", {})).toBe("No statistics available for toString.");
    expect(categoryStatsFor({}, "hasOwnProperty")).toBeUndefined();
  });

  it("rounds half-day averages up", () => {
    const stats = { ...FALL, avgDafw: 12.5, topSources: [], topBodyParts: [] };
    expect(headlineStat("Fall Hazard", { "Fall Hazard": stats })).toBe(
      "1,234 Fall Hazard incidents recorded. 56 fatalities (4.5%). Workers averaged 13 days away from work."
    );
  });

  it("lists every figure in the detailed report", () => {
    expect(detailedStats("Fall Hazard", { "Fall Hazard": FALL }).split("\n")).toEqual([
      "Fall Hazard Statistics",
      "=".repeat(60),
      "Total Incidents: 1,234",
      "Fatalities: 56 (4.5%)",
      "Days Away from Work Cases: 800",
      "Average Days Away: 41.6 days",
      "Maximum Days Away: 365 days",
      "",
      "Top 3 Causes:",
      "  1. Ladders: 400 incidents",
      "  2. Roofs: 300 incidents",
      "",
      "Top 3 Affected Body Parts:",
      "  1. Back: 200 incidents",
      "",
      "Year Breakdown:",
      "  2022: 534 incidents",
      "  2023: 700 incidents",
    ]);
  });
});
