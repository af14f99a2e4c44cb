import type { CategoryStats } from "../shared/types.js";

const fmt = (n: number): string => n.toLocaleString("en-US");

/** Own entry for a category; names inherited from Object.prototype are absent. */
export function categoryStatsFor(
  all: Record<string, CategoryStats>,
  category: string
): CategoryStats | undefined {
  return Object.hasOwn(all, category) ? all[category] : undefined;
}

/**
 * One-paragraph, citation-ready summary of a category.
 */
export function headlineStat(category: string, all: Record<string, CategoryStats>): string {
  const stats = categoryStatsFor(all, category);
  if (!stats) return `No statistics available for ${category}.`;
  if (stats.totalCount === 0) return `No ${category} incidents found in dataset.`;

  const parts: string[] = [
    `${fmt(stats.totalCount)} ${category} incidents recorded.`,
    `${stats.fatalCount} fatalities (${stats.pctFatal.toFixed(1)}%).`,
  ];

  if (stats.avgDafw > 0) {
    parts.push(`Workers averaged ${stats.avgDafw.toFixed(0)} days away from work.`);
  }

  const sources = stats.topSources.map((s) => s.source);
  if (sources.length >= 2) {
    parts.push(`Most common causes: ${sources[0]}, ${sources[1]}.`);
  } else if (sources.length === 1) {
    parts.push(`Most common cause: ${sources[0]}.`);
  }

  if (stats.topBodyParts.length > 0) {
    parts.push(`Most affected: ${stats.topBodyParts[0].bodyPart}.`);
  }

  return parts.join(" ");
}

/**
 * Multi-line report of every statistic held for a category.
 */
export function detailedStats(category: string, all: Record<string, CategoryStats>): string {
  const stats = categoryStatsFor(all, category);
  if (!stats) return `No statistics available for ${category}.`;
  if (stats.totalCount === 0) return `No ${category} incidents found in dataset.`;

  const lines: string[] = [
    `${category} Statistics`,
    "=".repeat(60),
    `Total Incidents: ${fmt(stats.totalCount)}`,
    `Fatalities: ${stats.fatalCount} (${stats.pctFatal.toFixed(1)}%)`,
    `Days Away from Work Cases: ${fmt(stats.dafwCount)}`,
    `Average Days Away: ${stats.avgDafw.toFixed(1)} days`,
    `Maximum Days Away: ${stats.maxDafw} days`,
  ];

  if (stats.topSources.length > 0) {
    lines.push("", "Top 3 Causes:");
    stats.topSources.forEach((s, i) => lines.push(`  ${i + 1}. ${s.source}: ${fmt(s.count)} incidents`));
  }

  if (stats.topBodyParts.length > 0) {
    lines.push("", "Top 3 Affected Body Parts:");
    stats.topBodyParts.forEach((b, i) =>
      lines.push(`  ${i + 1}. ${b.bodyPart}: ${fmt(b.count)} incidents`)
    );
  }

  const years = Object.keys(stats.yearBreakdown).sort();
  if (years.length > 0) {
    lines.push("", "Year Breakdown:");
    for (const year of years) {
      lines.push(`  ${year}: ${fmt(stats.yearBreakdown[year])} incidents`);
    }
  }

  return lines.join("\n");
}
