/**
 * Evidence Retriever
 *
 * Finds real incident narratives supporting a hazard label.
 *
 * Three independent candidate passes, each capped at 3·k ids:
 *   1. lexical         — prefix-match full-text search over narratives
 *   2. classification  — label as substring of event type / source
 *   3. category        — expanded category predicates (when a category is given)
 *
 * The union is fetched once, ordered fatal-first then by days away, and
 * cut to k. Confidence is reported per result but never affects order.
 */

import { MalformedQueryError } from "../shared/errors.js";
import { round } from "../analytics/stats.js";
import type { EvidenceResult, IncidentOutcome, IncidentRecord } from "../shared/types.js";
import type { IncidentSearch } from "../corpus/types.js";
import { expandCategory } from "./query_expander.js";

export const CANDIDATE_MULTIPLIER = 3;

export interface RetrieveOptions {
  category?: string;
  k?: number;
}

// ── Query building ───────────────────────────────────────────────────

/**
 * Full-text expression for a label: lowercased whitespace tokens, each
 * prefix-matched, OR-combined. "Floor hole" → "floor* OR hole*".
 */
export function buildLexicalQuery(label: string): string {
  const terms = label.toLowerCase().trim().split(/\s+/).filter((t) => t.length > 0);
  return terms.length > 0 ? terms.map((t) => `${t}*`).join(" OR ") : label;
}

// ── Candidate passes ─────────────────────────────────────────────────

export function lexicalPass(search: IncidentSearch, label: string, limit: number): Set<number> {
  if (label.trim() === "") return new Set();
  const expression = buildLexicalQuery(label);
  try {
    return new Set(search.searchNarratives(expression, limit));
  } catch (err) {
    if (!(err instanceof MalformedQueryError)) throw err;
    console.warn(`[evidence] Full-text query rejected (${expression}); falling back to substring match`);
    return new Set(search.findNarrativeText(label, limit));
  }
}

export function classificationPass(search: IncidentSearch, label: string, limit: number): Set<number> {
  if (label.trim() === "") return new Set();
  return new Set(search.findClassificationText(label, limit));
}

export function categoryPass(
  search: IncidentSearch,
  category: string | undefined,
  limit: number
): Set<number> {
  if (!category) return new Set();
  const predicates = expandCategory(category);
  if (predicates.clauses.length === 0) return new Set();
  return new Set(search.findByPredicates(predicates, limit));
}

// ── Presentation ─────────────────────────────────────────────────────

/** Human-readable outcome label. */
export function formatOutcome(outcome: IncidentOutcome, daysAway: number, jobTransferDays: number): string {
  switch (outcome) {
    case "fatal":
      return "FATAL";
    case "days_away":
      return daysAway > 0 ? `${daysAway} days away from work` : "Days away from work";
    case "job_transfer":
      return jobTransferDays > 0
        ? `${jobTransferDays} days job transfer/restriction`
        : "Job transfer/restriction";
    case "other_recordable":
      return "Other recordable case";
    case "unknown":
      return "Unknown";
  }
}

/**
 * Confidence in [0, 1]: 0.5 base, +0.3 fatal, +0.1 for more than 30 days
 * away (else +0.05 for any), +0.1 lexical hit, +0.05 classification hit.
 */
export function computeConfidence(
  record: IncidentRecord,
  inLexical: boolean,
  inClassification: boolean
): number {
  let score = 0.5;
  if (record.outcome === "fatal") score += 0.3;
  if (record.daysAway > 30) score += 0.1;
  else if (record.daysAway > 0) score += 0.05;
  if (inLexical) score += 0.1;
  if (inClassification) score += 0.05;
  return round(Math.min(1, score), 2);
}

/** Fatal first, then most days away; id breaks remaining ties. */
export function compareBySeverity(a: IncidentRecord, b: IncidentRecord): number {
  const fatalA = a.outcome === "fatal" ? 1 : 0;
  const fatalB = b.outcome === "fatal" ? 1 : 0;
  if (fatalA !== fatalB) return fatalB - fatalA;
  if (a.daysAway !== b.daysAway) return b.daysAway - a.daysAway;
  return a.id - b.id;
}

function toEvidenceResult(record: IncidentRecord, confidence: number): EvidenceResult {
  return {
    incidentId: record.id,
    whatHappened: record.whatHappened ?? "",
    injuryDescription: record.injuryIllness ?? "",
    objectInvolved: record.objectSubstance ?? "",
    location: record.location ?? "",
    outcome: formatOutcome(record.outcome, record.daysAway, record.jobTransferDays),
    dafwDays: record.daysAway,
    eventType: record.eventType ?? "",
    source: record.source ?? "",
    natureOfInjury: record.natureOfInjury ?? "",
    bodyPart: record.bodyPart ?? "",
    year: record.yearFilingFor,
    isFatal: record.outcome === "fatal",
    confidence,
  };
}

// ── Retrieval ────────────────────────────────────────────────────────

/**
 * Retrieve up to k incidents supporting a hazard label.
 * No match is an empty list; only an unreachable corpus throws.
 */
export function retrieveEvidence(
  search: IncidentSearch,
  label: string,
  options: RetrieveOptions = {}
): EvidenceResult[] {
  const k = options.k ?? 3;
  if (!Number.isInteger(k) || k <= 0) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
  const limit = k * CANDIDATE_MULTIPLIER;

  const lexicalIds = lexicalPass(search, label, limit);
  const classificationIds = classificationPass(search, label, limit);
  const categoryIds = categoryPass(search, options.category, limit);

  const allIds = new Set([...lexicalIds, ...classificationIds, ...categoryIds]);
  if (allIds.size === 0) return [];

  const selected = search.fetchIncidents([...allIds]).sort(compareBySeverity).slice(0, k);

  return selected.map((record) =>
    toEvidenceResult(
      record,
      computeConfidence(record, lexicalIds.has(record.id), classificationIds.has(record.id))
    )
  );
}
