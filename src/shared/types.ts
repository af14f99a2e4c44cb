/** Recorded outcome of an incident */
export type IncidentOutcome =
  | "fatal"
  | "days_away"
  | "job_transfer"
  | "other_recordable"
  | "unknown";

/** Classification fields predicted for each incident */
export type ClassificationField =
  | "eventType"
  | "source"
  | "secondarySource"
  | "natureOfInjury"
  | "bodyPart";

/** Fields a category predicate can match against */
export type PredicateField = "eventType" | "source" | "whatHappened";

/** Letter grade for a composite site score */
export type SiteGrade = "A" | "B" | "C" | "D" | "F";

/** One historical incident as held by the corpus */
export interface IncidentRecord {
  id: number;
  establishmentName: string | null;
  city: string | null;
  state: string | null;
  naicsCode: string | null;
  industryDescription: string | null;
  yearFilingFor: number | null;
  dateOfIncident: string | null;
  outcome: IncidentOutcome;
  daysAway: number;
  jobTransferDays: number;
  typeOfIncident: number | null;
  jobDescription: string | null;
  // Narratives
  whatHappened: string | null;
  beforeIncident: string | null;
  location: string | null;
  injuryIllness: string | null;
  objectSubstance: string | null;
  incidentDescription: string | null;
  // Predicted classifications
  natureOfInjury: string | null;
  bodyPart: string | null;
  eventType: string | null;
  source: string | null;
  secondarySource: string | null;
}

/** Hazard as supplied by a caller */
export interface HazardDescriptor {
  label: string;
  category: string;
}

/** hazard_id → descriptor */
export type HazardRegistry = Record<string, HazardDescriptor>;

/**
 * A single clause of a category predicate.
 * `contains` is a case-insensitive substring match on one field;
 * `all` / `any` combine nested clauses.
 */
export type CategoryPredicate =
  | { kind: "contains"; field: PredicateField; text: string }
  | { kind: "all"; of: readonly CategoryPredicate[] }
  | { kind: "any"; of: readonly CategoryPredicate[] };

/** Ordered clauses derived from a category string; a record matches if any clause does. */
export interface CategoryPredicateSet {
  category: string;
  clauses: readonly CategoryPredicate[];
}

/** Narrows an aggregate query beyond the category predicates */
export interface IncidentFilter {
  predicates: CategoryPredicateSet;
  outcome?: IncidentOutcome;
  minDaysAway?: number;
}

/** A supporting incident returned by evidence retrieval */
export interface EvidenceResult {
  incidentId: number;
  whatHappened: string;
  injuryDescription: string;
  objectInvolved: string;
  location: string;
  outcome: string;
  dafwDays: number;
  eventType: string;
  source: string;
  natureOfInjury: string;
  bodyPart: string;
  year: number | null;
  isFatal: boolean;
  confidence: number;
}

/** The four aggregate counts a hazard score is computed from */
export interface HazardCounts {
  frequency: number;
  fatalCount: number;
  avgDaysAway: number;
  severeCount: number;
}

export interface ScoreComponents {
  frequencyScore: number;
  fatalityScore: number;
  severityScore: number;
  seriousCaseScore: number;
}

export interface HazardScoreBreakdown {
  finalScore: number;
  components: ScoreComponents;
}

/** One row of the site breakdown */
export interface HazardBreakdownRow {
  hazardId: string;
  label: string;
  category: string;
  frequencyCount: number;
  fatalCount: number;
  fatalityRate: number;
  avgDafw: number;
  severeRate: number;
  finalScore: number;
  components: ScoreComponents;
}

export interface SiteRiskResult {
  score: number;
  grade: SiteGrade;
  gradeExplanation: string;
  breakdown: HazardBreakdownRow[];
  top5Hazards: HazardBreakdownRow[];
  topConcern: string;
  topConcernStats: string;
  recommendation: string;
}

export interface ValueCount {
  value: string;
  count: number;
}

/** Headline statistics for one hazard category */
export interface CategoryStats {
  totalCount: number;
  fatalCount: number;
  dafwCount: number;
  avgDafw: number;
  maxDafw: number;
  pctFatal: number;
  topSources: Array<{ source: string; count: number }>;
  topBodyParts: Array<{ bodyPart: string; count: number }>;
  yearBreakdown: Record<string, number>;
}
