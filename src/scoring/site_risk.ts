/**
 * Site Risk Aggregator
 *
 * Scores every hazard in a registry against the corpus and folds the
 * scores into one site score. With two or more hazards the worst one
 * dominates: highest × 0.6 + mean(others) × 0.4.
 */

import { z } from "zod";
import { mean, round } from "../analytics/stats.js";
import type { CorpusAggregation } from "../corpus/types.js";
import { statisticsFilter } from "../retrieval/query_expander.js";
import type {
  HazardBreakdownRow,
  HazardRegistry,
  SiteGrade,
  SiteRiskResult,
} from "../shared/types.js";
import { queryHazardCounts } from "./hazard_counts.js";
import { scoreHazardCounts } from "./hazard_scorer.js";

export const DOMINANT_WEIGHT = 0.6;
export const REMAINDER_WEIGHT = 0.4;
export const TOP_HAZARD_COUNT = 5;

// ── Grade bands ──────────────────────────────────────────────────────

interface GradeBand {
  grade: SiteGrade;
  /** Inclusive upper bound. */
  max: number;
  explanation: string;
  recommendation: string;
}

export const GRADE_BANDS: readonly GradeBand[] = [
  {
    grade: "A",
    max: 20,
    explanation: "A: 0-20 risk range. Low risk site. Standard safety protocols sufficient.",
    recommendation: "Low-risk site. Standard safety protocols sufficient.",
  },
  {
    grade: "B",
    max: 40,
    explanation: "B: 21-40 risk range. Moderate risk. Enhanced safety measures recommended.",
    recommendation: "Moderate-risk site. Enhanced safety measures recommended.",
  },
  {
    grade: "C",
    max: 60,
    explanation: "C: 41-60 risk range. Elevated risk. Regular safety audits required.",
    recommendation: "Elevated-risk site. Regular safety audits and training required.",
  },
  {
    grade: "D",
    max: 80,
    explanation: "D: 61-80 risk range. High-risk site. Immediate corrective action recommended.",
    recommendation:
      "High-risk site. Daily safety briefings required. Immediate corrective action needed.",
  },
  {
    grade: "F",
    max: Infinity,
    explanation:
      "F: 81-100 risk range. Critical risk. Site shutdown may be required until hazards are mitigated.",
    recommendation:
      "Critical-risk site. Consider site shutdown until hazards are mitigated. Emergency safety protocols required.",
  },
];

export function gradeBandFor(score: number): GradeBand {
  return GRADE_BANDS.find((band) => score <= band.max) ?? GRADE_BANDS[GRADE_BANDS.length - 1];
}

// ── Registry input ───────────────────────────────────────────────────

/** Registry entries as read from JSON; unknown fields such as `severity` are dropped. */
export const HazardRegistrySchema = z.record(
  z.string(),
  z.object({
    label: z.string().default(""),
    category: z.string().default(""),
  })
);

export function parseHazardRegistry(raw: unknown): HazardRegistry {
  return HazardRegistrySchema.parse(raw);
}

// ── Composite ────────────────────────────────────────────────────────

/** Dominance-weighted site score (one decimal). */
export function compositeSiteScore(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  if (scores.length === 1) return round(scores[0], 1);

  const [highest, ...others] = [...scores].sort((a, b) => b - a);
  return round(highest * DOMINANT_WEIGHT + mean(others) * REMAINDER_WEIGHT, 1);
}

function scoreHazard(
  aggregation: CorpusAggregation,
  hazardId: string,
  label: string,
  category: string
): HazardBreakdownRow {
  const counts = queryHazardCounts(aggregation, statisticsFilter(category));
  const { finalScore, components } = scoreHazardCounts(counts);
  const { frequency } = counts;

  return {
    hazardId,
    label,
    category,
    frequencyCount: frequency,
    fatalCount: counts.fatalCount,
    fatalityRate: frequency > 0 ? round(counts.fatalCount / frequency, 3) : 0,
    avgDafw: round(counts.avgDaysAway, 1),
    severeRate: frequency > 0 ? round(counts.severeCount / frequency, 3) : 0,
    finalScore,
    components,
  };
}

/** Citation sentence for the top concern, quoting its aggregates. */
export function topConcernCitation(row: HazardBreakdownRow): string {
  return (
    `${row.frequencyCount.toLocaleString("en-US")} similar incidents in OSHA data. ` +
    `${row.fatalCount} fatalities. ` +
    `Avg ${row.avgDafw.toFixed(1)} days away from work.`
  );
}

/**
 * Assess a whole site. Throws CorpusUnavailableError when the
 * aggregation source cannot be queried; nothing else is an error.
 */
export function assessSiteRisk(
  registry: HazardRegistry,
  aggregation: CorpusAggregation
): SiteRiskResult {
  const breakdown = Object.entries(registry).map(([hazardId, hazard]) =>
    scoreHazard(aggregation, hazardId, hazard.label, hazard.category)
  );

  // Array.prototype.sort is stable, so ties keep registry order.
  breakdown.sort((a, b) => b.finalScore - a.finalScore);

  const score = compositeSiteScore(breakdown.map((row) => row.finalScore));
  const band = gradeBandFor(score);
  const top = breakdown[0];

  return {
    score,
    grade: band.grade,
    gradeExplanation: band.explanation,
    breakdown,
    top5Hazards: breakdown.slice(0, TOP_HAZARD_COUNT),
    topConcern: top ? top.label : "None",
    topConcernStats: top ? topConcernCitation(top) : "",
    recommendation: band.recommendation,
  };
}
