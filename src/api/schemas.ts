import { z } from "zod";
import { HazardRegistrySchema } from "../scoring/site_risk.js";

export const EvidenceQuerySchema = z.object({
  label: z.string().trim().min(1, "label is required"),
  category: z.string().trim().optional(),
  k: z.coerce.number().int().positive().max(50).optional(),
});

const Count = z.number().nonnegative();

/** Score raw aggregates directly. */
export const HazardCountsBodySchema = z.object({
  frequency: Count,
  fatalCount: Count,
  avgDaysAway: Count,
  severeCount: Count,
});

/** Score a category against the corpus. */
export const HazardCategoryBodySchema = z.object({
  category: z.string().trim().min(1),
  label: z.string().optional(),
});

export const HazardScoreBodySchema = z.union([HazardCategoryBodySchema, HazardCountsBodySchema]);

export const SiteRiskBodySchema = z.object({
  hazards: HazardRegistrySchema,
});

export const StatsQuerySchema = z.object({
  rebuild: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export type EvidenceQuery = z.infer<typeof EvidenceQuerySchema>;
export type HazardScoreBody = z.infer<typeof HazardScoreBodySchema>;
export type SiteRiskBody = z.infer<typeof SiteRiskBodySchema>;

/** "field: message; field: message" */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
