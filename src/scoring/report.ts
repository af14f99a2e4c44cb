import type { HazardBreakdownRow, SiteRiskResult } from "../shared/types.js";
import { SCORE_CAPS } from "./hazard_scorer.js";

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

const fmt = (n: number): string => n.toLocaleString("en-US");
const pct = (rate: number): string => `${(rate * 100).toFixed(1)}%`;
const pts = (value: number, cap: number): string => `${value.toFixed(1).padStart(5)}/${cap} pts`;

function hazardDetail(rank: number, h: HazardBreakdownRow): string[] {
  const c = h.components;
  return [
    "",
    `#${rank}. ${h.label} (${h.category}) — Score: ${h.finalScore}/100`,
    `    Frequency:     ${pts(c.frequencyScore, SCORE_CAPS.frequency)}  (${fmt(h.frequencyCount)} incidents)`,
    `    Fatality Rate: ${pts(c.fatalityScore, SCORE_CAPS.fatality)}  (${pct(h.fatalityRate)} fatal)`,
    `    Severity:      ${pts(c.severityScore, SCORE_CAPS.severity)}  (avg ${h.avgDafw} days away)`,
    `    Serious Cases: ${pts(c.seriousCaseScore, SCORE_CAPS.seriousCase)}  (${pct(h.severeRate)} with 30+ days)`,
  ];
}

/**
 * Plain-text site assessment: overall grade, the five worst hazards with
 * their component scores, then a one-line summary of everything else.
 */
export function formatRiskReport(result: SiteRiskResult): string {
  const lines: string[] = [
    RULE,
    "SITE RISK ASSESSMENT (Based on OSHA Historical Data)",
    RULE,
    "",
    `Overall Risk Score: ${result.score}/100`,
    `Grade: ${result.grade}`,
    "",
    result.gradeExplanation,
    "",
    `Recommendation: ${result.recommendation}`,
    "",
    `Top Concern: ${result.topConcern}`,
    `  ${result.topConcernStats}`,
    "",
    THIN_RULE,
    "TOP 5 HAZARDS (Ranked by Risk Score)",
    THIN_RULE,
  ];

  result.top5Hazards.forEach((h, i) => lines.push(...hazardDetail(i + 1, h)));

  const remaining = result.breakdown.slice(result.top5Hazards.length);
  if (remaining.length > 0) {
    lines.push("", THIN_RULE, "OTHER HAZARDS", THIN_RULE);
    for (const h of remaining) {
      lines.push(
        "",
        `${h.label} (${h.category}) — Score: ${h.finalScore}/100`,
        `    ${fmt(h.frequencyCount)} incidents | ${pct(h.fatalityRate)} fatal | avg ${h.avgDafw} days away`
      );
    }
  }

  lines.push("", RULE);
  return lines.join("\n");
}
