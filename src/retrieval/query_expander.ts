/**
 * Query Expander
 *
 * Maps a free-text hazard category ("Fall Hazard", "Caught In/Between", ...)
 * to field-match predicates over the incident classifications. Rules are
 * tested in table order; the first rule with a keyword contained in the
 * lowercased category wins.
 *
 * Each rule carries two predicate lists:
 *   evidence   — broad OR-list used to pull candidate narratives
 *   statistics — narrower filter used for aggregate counts and scoring
 */

import type { CategoryPredicate, CategoryPredicateSet, PredicateField } from "../shared/types.js";

export type HazardCategoryKey =
  | "fall"
  | "electrical"
  | "struck_by"
  | "caught_in"
  | "chemical"
  | "slip_trip"
  | "fire_explosion";

export interface CategoryRule {
  key: HazardCategoryKey;
  keywords: readonly string[];
  evidence: readonly CategoryPredicate[];
  statistics: readonly CategoryPredicate[];
}

const contains = (field: PredicateField, text: string): CategoryPredicate => ({
  kind: "contains",
  field,
  text,
});

const ELECTRICAL_CLAUSES: readonly CategoryPredicate[] = [
  contains("eventType", "contact with electric"),
  contains("eventType", "contact with wiring"),
  contains("source", "electric"),
  contains("source", "wiring"),
  contains("source", "power line"),
  contains("whatHappened", "electrocuted"),
  contains("whatHappened", "electric shock"),
];

export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    key: "fall",
    keywords: ["fall"],
    evidence: [
      contains("eventType", "fall"),
      contains("source", "ladder"),
      contains("source", "scaffold"),
      contains("source", "roof"),
    ],
    statistics: [contains("eventType", "fall")],
  },
  {
    key: "electrical",
    keywords: ["electric"],
    evidence: ELECTRICAL_CLAUSES,
    statistics: ELECTRICAL_CLAUSES,
  },
  {
    key: "struck_by",
    keywords: ["struck", "hit"],
    evidence: [contains("eventType", "struck"), contains("eventType", "hit")],
    statistics: [contains("eventType", "struck")],
  },
  {
    key: "caught_in",
    keywords: ["caught", "compress", "between"],
    evidence: [contains("eventType", "caught"), contains("eventType", "compress")],
    statistics: [contains("eventType", "caught"), contains("eventType", "compress")],
  },
  {
    key: "chemical",
    keywords: ["chemical"],
    evidence: [contains("eventType", "expos"), contains("source", "chemical")],
    statistics: [
      {
        kind: "all",
        of: [
          contains("eventType", "expos"),
          { kind: "any", of: [contains("source", "chemical"), contains("source", "toxic")] },
        ],
      },
    ],
  },
  {
    key: "slip_trip",
    keywords: ["slip", "trip"],
    evidence: [
      contains("eventType", "slip"),
      contains("eventType", "trip"),
      contains("eventType", "same level"),
    ],
    statistics: [
      contains("eventType", "fall on same level"),
      contains("eventType", "slip"),
      contains("eventType", "trip"),
    ],
  },
  {
    key: "fire_explosion",
    keywords: ["fire", "explosion"],
    evidence: [
      contains("eventType", "fire"),
      contains("eventType", "explosion"),
      contains("eventType", "burn"),
    ],
    statistics: [
      contains("eventType", "fire"),
      contains("eventType", "explosion"),
      contains("eventType", "burn"),
    ],
  },
];

/** First rule whose keyword occurs in the category, if any. */
export function matchCategoryRule(category: string): CategoryRule | undefined {
  const lowered = category.toLowerCase();
  return CATEGORY_RULES.find((rule) => rule.keywords.some((kw) => lowered.includes(kw)));
}

function buildPredicateSet(
  category: string | undefined,
  pick: (rule: CategoryRule) => readonly CategoryPredicate[]
): CategoryPredicateSet {
  const normalized = (category ?? "").trim();
  if (normalized === "") return { category: "", clauses: [] };

  const rule = matchCategoryRule(normalized);
  if (rule) return { category: normalized, clauses: [...pick(rule)] };

  // Unknown categories match their own text against the event type.
  return { category: normalized, clauses: [contains("eventType", normalized)] };
}

/** Predicates for the retriever's category pass. */
export function expandCategory(category: string | undefined): CategoryPredicateSet {
  return buildPredicateSet(category, (rule) => rule.evidence);
}

/** Predicates for aggregate counts (scoring and category statistics). */
export function statisticsFilter(category: string | undefined): CategoryPredicateSet {
  return buildPredicateSet(category, (rule) => rule.statistics);
}
