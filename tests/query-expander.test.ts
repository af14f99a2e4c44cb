import { describe, it, expect } from "vitest";
import {
  CATEGORY_RULES,
  expandCategory,
  matchCategoryRule,
  statisticsFilter,
} from "../src/retrieval/query_expander.js";

describe("Query expander", () => {
  it("expands a fall category to event type and source clauses", () => {
    const set = expandCategory("Fall Hazard");
    expect(set.category).toBe("Fall Hazard");
    expect(set.clauses).toEqual([
      { kind: "contains", field: "eventType", text: "fall" },
      { kind: "contains", field: "source", text: "ladder" },
      { kind: "contains", field: "source", text: "scaffold" },
      { kind: "contains", field: "source", text: "roof" },
    ]);
  });

  it("uses the narrower statistics clauses for aggregates", () => {
    expect(statisticsFilter("Fall Hazard").clauses).toEqual([
      { kind: "contains", field: "eventType", text: "fall" },
    ]);
    expect(statisticsFilter("Struck By").clauses).toEqual([
      { kind: "contains", field: "eventType", text: "struck" },
    ]);
  });

  it("matches case-insensitively", () => {
    expect(matchCategoryRule("ELECTRICAL")?.key).toBe("electrical");
    expect(matchCategoryRule("caught in/between")?.key).toBe("caught_in");
  });

  it("takes the first matching rule in table order", () => {
    expect(matchCategoryRule("Electrical fire")?.key).toBe("electrical");
    expect(matchCategoryRule("Slip/Trip")?.key).toBe("slip_trip");
    expect(matchCategoryRule("Hit by crane load")?.key).toBe("struck_by");
  });

  it("nests the chemical statistics filter as exposure AND (chemical OR toxic)", () => {
    expect(statisticsFilter("Chemical Exposure").clauses).toEqual([
      {
        kind: "all",
        of: [
          { kind: "contains", field: "eventType", text: "expos" },
          {
            kind: "any",
            of: [
              { kind: "contains", field: "source", text: "chemical" },
              { kind: "contains", field: "source", text: "toxic" },
            ],
          },
        ],
      },
    ]);
  });

  it("passes unknown categories through against the event type", () => {
    expect(expandCategory("  Noise ")).toEqual({
      category: "Noise",
      clauses: [{ kind: "contains", field: "eventType", text: "Noise" }],
    });
    expect(statisticsFilter("Noise").clauses).toEqual([
      { kind: "contains", field: "eventType", text: "Noise" },
    ]);
  });

  it("returns an empty set for a blank or missing category", () => {
    expect(expandCategory("   ")).toEqual({ category: "", clauses: [] });
    expect(statisticsFilter(undefined)).toEqual({ category: "", clauses: [] });
  });

  it("is deterministic", () => {
    expect(expandCategory("Fire/Explosion")).toEqual(expandCategory("Fire/Explosion"));
    expect(CATEGORY_RULES.map((r) => r.key)).toEqual([
      "fall",
      "electrical",
      "struck_by",
      "caught_in",
      "chemical",
      "slip_trip",
      "fire_explosion",
    ]);
  });
});
