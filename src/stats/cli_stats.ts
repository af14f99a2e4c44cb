#!/usr/bin/env tsx
/**
 * CLI: stats
 *
 * Usage: npm run stats -- [--category <category>] [--detailed] [--rebuild]
 *
 * Prints headline statistics for every snapshot category, or the full
 * breakdown for one. --rebuild ignores the snapshot on disk.
 */

import "dotenv/config";
import { SqliteIncidentCorpus } from "../corpus/sqlite_corpus.js";
import { loadRunConfig, parseCliFlags } from "../shared/run_config.js";
import { DEFAULT_STATS_CATEGORIES } from "./category_stats.js";
import { detailedStats, headlineStat } from "./headlines.js";
import { loadCategoryStats } from "./stats_cache.js";

function main() {
  const { flags } = parseCliFlags(process.argv.slice(2));
  const config = loadRunConfig();

  const categories: string[] = [...DEFAULT_STATS_CATEGORIES];
  if (flags.category && !categories.includes(flags.category)) categories.push(flags.category);

  const corpus = SqliteIncidentCorpus.open(config.corpusDbPath);
  try {
    const all = loadCategoryStats({
      cachePath: config.statsCachePath,
      aggregation: corpus,
      categories,
      useCache: config.statsCacheEnabled && flags.rebuild !== "true",
    });

    if (flags.category) {
      console.log(
        flags.detailed === "true" ? detailedStats(flags.category, all) : headlineStat(flags.category, all)
      );
      return;
    }

    for (const category of categories) {
      console.log(flags.detailed === "true" ? detailedStats(category, all) : `${category}: ${headlineStat(category, all)}`);
      console.log();
    }
  } finally {
    corpus.close();
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
