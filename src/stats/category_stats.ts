import { round } from "../analytics/stats.js";
import type { CorpusAggregation } from "../corpus/types.js";
import { statisticsFilter } from "../retrieval/query_expander.js";
import type { CategoryStats } from "../shared/types.js";

/** Categories precomputed into the statistics snapshot. */
export const DEFAULT_STATS_CATEGORIES = [
  "Fall Hazard",
  "Electrical Hazard",
  "Struck By",
  "Caught In/Between",
  "Chemical Exposure",
  "Slip/Trip",
  "Fire/Explosion",
] as const;

const TOP_VALUES_LIMIT = 3;

export function emptyCategoryStats(): CategoryStats {
  return {
    totalCount: 0,
    fatalCount: 0,
    dafwCount: 0,
    avgDafw: 0,
    maxDafw: 0,
    pctFatal: 0,
    topSources: [],
    topBodyParts: [],
    yearBreakdown: {},
  };
}

/**
 * Aggregate profile of one hazard category: counts, days-away figures,
 * leading sources and body parts, and incidents per filing year.
 */
export function computeCategoryStats(aggregation: CorpusAggregation, category: string): CategoryStats {
  const predicates = statisticsFilter(category);
  const totalCount = aggregation.countIncidents({ predicates });
  if (totalCount === 0) return emptyCategoryStats();

  const fatalCount = aggregation.countIncidents({ predicates, outcome: "fatal" });

  const yearBreakdown: Record<string, number> = {};
  for (const { year, count } of aggregation.countByYear({ predicates })) {
    yearBreakdown[String(year)] = count;
  }

  return {
    totalCount,
    fatalCount,
    dafwCount: aggregation.countIncidents({ predicates, outcome: "days_away" }),
    avgDafw: round(aggregation.averageDaysAway({ predicates }), 1),
    maxDafw: aggregation.maxDaysAway({ predicates }),
    pctFatal: round((fatalCount / totalCount) * 100, 1),
    topSources: aggregation
      .topValues("source", { predicates }, TOP_VALUES_LIMIT)
      .map(({ value, count }) => ({ source: value, count })),
    topBodyParts: aggregation
      .topValues("bodyPart", { predicates }, TOP_VALUES_LIMIT)
      .map(({ value, count }) => ({ bodyPart: value, count })),
    yearBreakdown,
  };
}

export function computeAllCategoryStats(
  aggregation: CorpusAggregation,
  categories: readonly string[] = DEFAULT_STATS_CATEGORIES
): Record<string, CategoryStats> {
  const all: Record<string, CategoryStats> = {};
  for (const category of categories) {
    all[category] = computeCategoryStats(aggregation, category);
  }
  return all;
}
