/**
 * Category Statistics Snapshot
 *
 * Read-through JSON cache of per-category statistics. A snapshot is used
 * only if it parses, validates, carries the current schema version, its
 * checksum matches its category map, and it covers every requested
 * category. Anything else discards it wholesale and rebuilds from the
 * corpus; a cache problem never reaches the caller.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import path from "path";
import { z } from "zod";

import type { CorpusAggregation } from "../corpus/types.js";
import { contentHash } from "../shared/hash.js";
import type { CategoryStats } from "../shared/types.js";
import { computeAllCategoryStats, DEFAULT_STATS_CATEGORIES } from "./category_stats.js";

export const STATS_SNAPSHOT_VERSION = 1;

const CountSchema = z.number().int().nonnegative();

export const CategoryStatsSchema = z.object({
  totalCount: CountSchema,
  fatalCount: CountSchema,
  dafwCount: CountSchema,
  avgDafw: z.number().nonnegative(),
  maxDafw: z.number().nonnegative(),
  pctFatal: z.number().min(0).max(100),
  topSources: z.array(z.object({ source: z.string(), count: CountSchema })),
  topBodyParts: z.array(z.object({ bodyPart: z.string(), count: CountSchema })),
  yearBreakdown: z.record(z.string(), CountSchema),
});

export const StatsSnapshotSchema = z.object({
  schemaVersion: z.number().int(),
  generatedAt: z.string(),
  checksum: z.string().regex(/^[a-f0-9]{64}$/),
  categories: z.record(z.string(), CategoryStatsSchema),
});

export type StatsSnapshot = z.infer<typeof StatsSnapshotSchema>;

export type SnapshotReadResult =
  | { ok: true; snapshot: StatsSnapshot }
  | { ok: false; reason: string };

export interface LoadCategoryStatsOptions {
  cachePath: string;
  aggregation: CorpusAggregation;
  categories?: readonly string[];
  useCache?: boolean;
}

export function buildStatsSnapshot(
  aggregation: CorpusAggregation,
  categories: readonly string[] = DEFAULT_STATS_CATEGORIES,
  now: Date = new Date()
): StatsSnapshot {
  const computed = computeAllCategoryStats(aggregation, categories);
  return {
    schemaVersion: STATS_SNAPSHOT_VERSION,
    generatedAt: now.toISOString(),
    checksum: contentHash(computed),
    categories: computed,
  };
}

/** Write via a temp file and rename, so readers never see a partial file. */
export function writeStatsSnapshot(cachePath: string, snapshot: StatsSnapshot): void {
  const dir = path.dirname(cachePath);
  mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(cachePath)}.partial`);
  writeFileSync(tmp, JSON.stringify(snapshot, null, 2), "utf-8");
  renameSync(tmp, cachePath);
}

/** Read and verify a snapshot. Never throws. */
export function readStatsSnapshot(
  cachePath: string,
  requiredCategories: readonly string[] = []
): SnapshotReadResult {
  if (!existsSync(cachePath)) return { ok: false, reason: "no snapshot on disk" };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(cachePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `unreadable snapshot: ${message}` };
  }

  const parsed = StatsSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return { ok: false, reason: `invalid snapshot: ${first.path.join(".")}: ${first.message}` };
  }

  const snapshot = parsed.data;
  if (snapshot.schemaVersion !== STATS_SNAPSHOT_VERSION) {
    return {
      ok: false,
      reason: `snapshot version ${snapshot.schemaVersion} != ${STATS_SNAPSHOT_VERSION}`,
    };
  }
  if (contentHash(snapshot.categories) !== snapshot.checksum) {
    return { ok: false, reason: "snapshot checksum mismatch" };
  }
  const missing = requiredCategories.filter((c) => !Object.hasOwn(snapshot.categories, c));
  if (missing.length > 0) {
    return { ok: false, reason: `snapshot missing categories: ${missing.join(", ")}` };
  }

  return { ok: true, snapshot };
}

/**
 * Statistics for every requested category, from the snapshot when it is
 * sound, otherwise recomputed live and written back.
 */
export function loadCategoryStats(options: LoadCategoryStatsOptions): Record<string, CategoryStats> {
  const categories = options.categories ?? DEFAULT_STATS_CATEGORIES;

  if (options.useCache ?? true) {
    const cached = readStatsSnapshot(options.cachePath, categories);
    if (cached.ok) return cached.snapshot.categories;
    console.warn(`[stats-cache] Rebuilding statistics: ${cached.reason}`);
  }

  const snapshot = buildStatsSnapshot(options.aggregation, categories);
  try {
    writeStatsSnapshot(options.cachePath, snapshot);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[stats-cache] Could not write snapshot to ${options.cachePath}: ${message}`);
  }
  return snapshot.categories;
}
