/**
 * Risk API Routes
 *
 * Express Router over an injected corpus provider. Request bodies and
 * query strings are validated with zod; a failed validation is a 400,
 * an unreachable corpus a 503, anything else a 500.
 */

import { Router } from "express";
import type { Response } from "express";
import { ZodError } from "zod";

import type { IncidentCorpus } from "../corpus/types.js";
import { retrieveEvidence } from "../retrieval/evidence_retriever.js";
import { statisticsFilter } from "../retrieval/query_expander.js";
import { queryHazardCounts } from "../scoring/hazard_counts.js";
import { computeHazardScore, scoreHazardCounts } from "../scoring/hazard_scorer.js";
import { assessSiteRisk } from "../scoring/site_risk.js";
import { CorpusUnavailableError } from "../shared/errors.js";
import type { RunConfig } from "../shared/run_config.js";
import { DEFAULT_STATS_CATEGORIES } from "../stats/category_stats.js";
import { categoryStatsFor, headlineStat } from "../stats/headlines.js";
import { loadCategoryStats } from "../stats/stats_cache.js";
import {
  describeZodError,
  EvidenceQuerySchema,
  HazardScoreBodySchema,
  SiteRiskBodySchema,
  StatsQuerySchema,
} from "./schemas.js";

export type CorpusProvider = () => IncidentCorpus;

export type ApiConfig = Pick<RunConfig, "defaultK" | "statsCachePath" | "statsCacheEnabled">;

function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: describeZodError(err) });
    return;
  }
  if (err instanceof RangeError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof CorpusUnavailableError) {
    console.error(`[api] ${err.message}`);
    res.status(503).json({ error: "Incident corpus unavailable" });
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[api] Unhandled error: ${message}`);
  res.status(500).json({ error: message });
}

export function createRiskRouter(getCorpus: CorpusProvider, config: ApiConfig): Router {
  const router = Router();

  const statsFor = (categories: readonly string[], rebuild: boolean) =>
    loadCategoryStats({
      cachePath: config.statsCachePath,
      aggregation: getCorpus(),
      categories,
      useCache: config.statsCacheEnabled && !rebuild,
    });

  // ── GET /v1/evidence ─────────────────────────────────────────────
  router.get("/v1/evidence", (req, res) => {
    try {
      const query = EvidenceQuerySchema.parse(req.query);
      const results = retrieveEvidence(getCorpus(), query.label, {
        category: query.category,
        k: query.k ?? config.defaultK,
      });
      res.json({ label: query.label, category: query.category ?? null, results });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/hazard-score ────────────────────────────────────────
  router.post("/v1/hazard-score", (req, res) => {
    try {
      const body = HazardScoreBodySchema.parse(req.body);
      if ("category" in body) {
        const counts = queryHazardCounts(getCorpus(), statisticsFilter(body.category));
        res.json({ category: body.category, counts, ...scoreHazardCounts(counts) });
        return;
      }
      res.json(computeHazardScore(body.frequency, body.fatalCount, body.avgDaysAway, body.severeCount));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/site-risk ───────────────────────────────────────────
  router.post("/v1/site-risk", (req, res) => {
    try {
      const body = SiteRiskBodySchema.parse(req.body);
      res.json(assessSiteRisk(body.hazards, getCorpus()));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/stats ────────────────────────────────────────────────
  router.get("/v1/stats", (req, res) => {
    try {
      const { rebuild } = StatsQuerySchema.parse(req.query);
      res.json({ categories: statsFor(DEFAULT_STATS_CATEGORIES, rebuild) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/stats/:category ──────────────────────────────────────
  router.get("/v1/stats/:category", (req, res) => {
    try {
      const { rebuild } = StatsQuerySchema.parse(req.query);
      const category = req.params.category;
      const categories: string[] = [...DEFAULT_STATS_CATEGORIES];
      if (!categories.includes(category)) categories.push(category);

      const all = statsFor(categories, rebuild);
      res.json({ category, stats: categoryStatsFor(all, category) ?? null, headline: headlineStat(category, all) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
