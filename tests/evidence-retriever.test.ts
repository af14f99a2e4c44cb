import { afterEach, describe, it, expect, vi } from "vitest";
import type { IncidentSearch } from "../src/corpus/types.js";
import {
  buildLexicalQuery,
  computeConfidence,
  formatOutcome,
  retrieveEvidence,
} from "../src/retrieval/evidence_retriever.js";
import type { IncidentRecord } from "../src/shared/types.js";
import { buildCorpus, makeRecord } from "./helpers/corpus_fixture.js";

function fakeSearch(
  records: IncidentRecord[],
  passes: { lexical?: number[]; classification?: number[]; category?: number[] }
): IncidentSearch {
  return {
    searchNarratives: () => passes.lexical ?? [],
    findNarrativeText: () => [],
    findClassificationText: () => passes.classification ?? [],
    findByPredicates: () => passes.category ?? [],
    fetchIncidents: (ids) => records.filter((r) => ids.includes(r.id)),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Lexical query", () => {
  it("prefix-matches each term and ORs them", () => {
    expect(buildLexicalQuery("Floor  Hole")).toBe("floor* OR hole*");
  });

  it("returns a blank label unchanged", () => {
    expect(buildLexicalQuery("  ")).toBe("  ");
  });
});

describe("Evidence retrieval", () => {
  it("returns an empty list for an empty corpus", () => {
    const corpus = buildCorpus([]);
    expect(retrieveEvidence(corpus, "ladder fall", { category: "Fall Hazard" })).toEqual([]);
    corpus.close();
  });

  it("returns an empty list when nothing matches", () => {
    const corpus = buildCorpus();
    expect(retrieveEvidence(corpus, "asbestos")).toEqual([]);
    corpus.close();
  });

  it("rejects a non-positive k", () => {
    const corpus = buildCorpus();
    expect(() => retrieveEvidence(corpus, "fell", { k: 0 })).toThrow(RangeError);
    corpus.close();
  });

  it("orders fatal incidents first, then by days away", () => {
    const corpus = buildCorpus();
    const results = retrieveEvidence(corpus, "fell", { category: "Fall Hazard", k: 3 });
    corpus.close();

    expect(results.map((r) => r.incidentId)).toEqual([1, 8, 2]);
    expect(results.map((r) => r.outcome)).toEqual([
      "FATAL",
      "60 days away from work",
      "45 days away from work",
    ]);
    expect(results.map((r) => r.confidence)).toEqual([0.9, 0.6, 0.6]);
    expect(results[0]).toMatchObject({
      isFatal: true,
      whatHappened: "Worker fell from a ladder while painting the stairwell",
      eventType: "Fall to lower level",
      source: "Ladders",
      natureOfInjury: "Fractures",
      bodyPart: "Head",
      year: 2022,
      dafwDays: 0,
    });
  });

  it("gives a fatal incident found only by category exactly 0.8", () => {
    const corpus = buildCorpus();
    const results = retrieveEvidence(corpus, "generator", { category: "Electrical Hazard" });
    corpus.close();

    expect(results).toHaveLength(1);
    expect(results[0].incidentId).toBe(3);
    expect(results[0].confidence).toBe(0.8);
  });

  it("falls back to substring matching when the full-text query is rejected", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const corpus = buildCorpus();
    const results = retrieveEvidence(corpus, 'roof"');
    corpus.close();

    expect(results.map((r) => r.incidentId)).toEqual([8]);
    expect(results[0].confidence).toBe(0.7);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("breaks ties on days away by id", () => {
    const records = [
      makeRecord({ id: 5, outcome: "days_away", daysAway: 100 }),
      makeRecord({ id: 9, outcome: "fatal" }),
      makeRecord({ id: 2, outcome: "days_away", daysAway: 100 }),
      makeRecord({ id: 4, outcome: "fatal", daysAway: 10 }),
    ];
    const search = fakeSearch(records, { lexical: [5, 9], category: [2, 4] });
    const results = retrieveEvidence(search, "trench", { category: "Caught In/Between", k: 4 });
    expect(results.map((r) => r.incidentId)).toEqual([4, 9, 2, 5]);
  });

  it("cuts the severity-ordered union to k", () => {
    const records = [1, 2, 3, 4, 5].map((id) => makeRecord({ id, outcome: "days_away", daysAway: id }));
    const search = fakeSearch(records, { lexical: [1, 2, 3], classification: [3, 4, 5] });
    expect(retrieveEvidence(search, "trench", { k: 2 }).map((r) => r.incidentId)).toEqual([5, 4]);
  });

  it("skips the label passes for a blank label", () => {
    const records = [makeRecord({ id: 1, outcome: "fatal" })];
    const search = fakeSearch(records, { lexical: [1], classification: [1] });
    expect(retrieveEvidence(search, "   ")).toEqual([]);
  });
});

describe("Confidence", () => {
  it("adds fatality, severity and pass bonuses", () => {
    expect(computeConfidence(makeRecord({ id: 1, outcome: "fatal", daysAway: 40 }), true, true)).toBe(1);
    expect(computeConfidence(makeRecord({ id: 1, outcome: "days_away", daysAway: 5 }), false, true)).toBe(0.6);
    expect(computeConfidence(makeRecord({ id: 1 }), false, false)).toBe(0.5);
  });
});

describe("Outcome labels", () => {
  it("describes each outcome", () => {
    expect(formatOutcome("fatal", 0, 0)).toBe("FATAL");
    expect(formatOutcome("days_away", 12, 0)).toBe("12 days away from work");
    expect(formatOutcome("days_away", 0, 0)).toBe("Days away from work");
    expect(formatOutcome("job_transfer", 0, 7)).toBe("7 days job transfer/restriction");
    expect(formatOutcome("job_transfer", 0, 0)).toBe("Job transfer/restriction");
    expect(formatOutcome("other_recordable", 0, 0)).toBe("Other recordable case");
    expect(formatOutcome("unknown", 0, 0)).toBe("Unknown");
  });
});
