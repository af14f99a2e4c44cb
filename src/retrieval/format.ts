import type { EvidenceResult } from "../shared/types.js";

export const NARRATIVE_PREVIEW_CHARS = 150;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Numbered evidence list:
 *   " 1. [2023 | FATAL] Worker fell through ... → Fractures, Head"
 */
export function formatEvidenceForDisplay(results: EvidenceResult[]): string {
  if (results.length === 0) return "No matching incidents found.";

  const lines = ["Real OSHA incidents matching this hazard:"];

  results.forEach((r, i) => {
    const year = r.year ?? "Unknown";
    const injuryParts = [r.natureOfInjury, r.bodyPart].filter((p) => p !== "");
    const injury = injuryParts.length > 0 ? injuryParts.join(", ") : "Injury details not available";
    lines.push(
      ` ${i + 1}. [${year} | ${r.outcome}] ${truncate(r.whatHappened, NARRATIVE_PREVIEW_CHARS)} → ${injury}`
    );
  });

  return lines.join("\n");
}
