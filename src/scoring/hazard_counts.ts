import type { CorpusAggregation } from "../corpus/types.js";
import type { CategoryPredicateSet, HazardCounts } from "../shared/types.js";
import { SERIOUS_CASE_MIN_DAYS } from "./hazard_scorer.js";

/**
 * The four aggregates a hazard score needs, for one predicate set.
 * Follow-up queries are skipped when nothing matches.
 */
export function queryHazardCounts(
  aggregation: CorpusAggregation,
  predicates: CategoryPredicateSet
): HazardCounts {
  const frequency = aggregation.countIncidents({ predicates });
  if (frequency === 0) {
    return { frequency: 0, fatalCount: 0, avgDaysAway: 0, severeCount: 0 };
  }

  return {
    frequency,
    fatalCount: aggregation.countIncidents({ predicates, outcome: "fatal" }),
    avgDaysAway: aggregation.averageDaysAway({ predicates }),
    severeCount: aggregation.countIncidents({ predicates, minDaysAway: SERIOUS_CASE_MIN_DAYS }),
  };
}
