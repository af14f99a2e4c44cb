import type {
  CategoryPredicateSet,
  ClassificationField,
  IncidentFilter,
  IncidentRecord,
  ValueCount,
} from "../shared/types.js";

/**
 * Candidate generation and record access for evidence retrieval.
 * Every `find*` method returns at most `limit` incident ids.
 */
export interface IncidentSearch {
  /**
   * Ranked full-text search over the narrative fields, best match first.
   * Throws MalformedQueryError when the engine rejects the expression.
   */
  searchNarratives(expression: string, limit: number): number[];
  /** Substring match of `text` against any of the six narrative fields. */
  findNarrativeText(text: string, limit: number): number[];
  /** Substring match of `text` against event type or source. */
  findClassificationText(text: string, limit: number): number[];
  /** Records matching any clause of the predicate set. */
  findByPredicates(predicates: CategoryPredicateSet, limit: number): number[];
  /** Full records for the given ids, in no particular order. */
  fetchIncidents(ids: readonly number[]): IncidentRecord[];
}

/** Aggregate queries over the records matching a filter. */
export interface CorpusAggregation {
  countIncidents(filter: IncidentFilter): number;
  /** Mean days away over matching rows with days away > 0; 0 when there are none. */
  averageDaysAway(filter: IncidentFilter): number;
  maxDaysAway(filter: IncidentFilter): number;
  /** Most frequent non-blank values of a classification field. */
  topValues(field: ClassificationField, filter: IncidentFilter, limit: number): ValueCount[];
  /** Incident counts per filing year, ascending; rows without a year are left out. */
  countByYear(filter: IncidentFilter): Array<{ year: number; count: number }>;
}

export interface IncidentCorpus extends IncidentSearch, CorpusAggregation {
  close(): void;
}
