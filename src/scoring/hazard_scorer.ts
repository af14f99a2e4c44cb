/**
 * Hazard Scorer
 *
 * Scores a hazard 0–100 purely from historical incident aggregates:
 *
 *   Frequency     (max 25)  min(frequency / 500, 1) × 25
 *   Fatality      (max 35)  fatal / frequency × 35
 *   Severity      (max 25)  min(avg days away / 90, 1) × 25
 *   Serious cases (max 15)  (30+ days away) / frequency × 15
 */

import { clamp, round } from "../analytics/stats.js";
import type { HazardCounts, HazardScoreBreakdown, ScoreComponents } from "../shared/types.js";

export const SCORE_CAPS = {
  frequency: 25,
  fatality: 35,
  severity: 25,
  seriousCase: 15,
} as const;

/** Incident count at which the frequency component saturates. */
export const FREQUENCY_SATURATION = 500;
/** Average days away at which the severity component saturates. */
export const SEVERITY_SATURATION_DAYS = 90;
/** Days away from which a case counts as serious. */
export const SERIOUS_CASE_MIN_DAYS = 30;

const ZERO_COMPONENTS: ScoreComponents = {
  frequencyScore: 0,
  fatalityScore: 0,
  severityScore: 0,
  seriousCaseScore: 0,
};

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function computeHazardScore(
  frequency: number,
  fatalCount: number,
  avgDaysAway: number,
  severeCount: number
): HazardScoreBreakdown {
  const freq = nonNegative(frequency);
  if (freq === 0) {
    return { finalScore: 0, components: { ...ZERO_COMPONENTS } };
  }

  const frequencyScore = Math.min(freq / FREQUENCY_SATURATION, 1) * SCORE_CAPS.frequency;
  const fatalityScore = clamp(nonNegative(fatalCount) / freq, 0, 1) * SCORE_CAPS.fatality;
  const severityScore =
    Math.min(nonNegative(avgDaysAway) / SEVERITY_SATURATION_DAYS, 1) * SCORE_CAPS.severity;
  const seriousCaseScore = clamp(nonNegative(severeCount) / freq, 0, 1) * SCORE_CAPS.seriousCase;

  const raw = frequencyScore + fatalityScore + severityScore + seriousCaseScore;

  return {
    finalScore: round(clamp(raw, 0, 100), 1),
    components: {
      frequencyScore: round(frequencyScore, 1),
      fatalityScore: round(fatalityScore, 1),
      severityScore: round(severityScore, 1),
      seriousCaseScore: round(seriousCaseScore, 1),
    },
  };
}

/** Convenience overload over a HazardCounts value. */
export function scoreHazardCounts(counts: HazardCounts): HazardScoreBreakdown {
  return computeHazardScore(counts.frequency, counts.fatalCount, counts.avgDaysAway, counts.severeCount);
}
