#!/usr/bin/env tsx
/**
 * CLI: corpus:ingest
 *
 * Usage: npm run corpus:ingest -- [--db <path>] <case_detail.csv> [...]
 *
 * Rebuilds the incident corpus from OSHA ITA case-detail exports,
 * keeping construction incidents only, then prints a short summary.
 */

import "dotenv/config";
import { existsSync, mkdirSync, rmSync } from "fs";
import path from "path";
import { createCorpusDatabase } from "../db/connection.js";
import { createCorpusSchema } from "../db/migrate.js";
import { loadRunConfig, parseCliFlags } from "../shared/run_config.js";
import { ingestCaseDetailFiles, summarizeCorpus } from "./ingest.js";

function main() {
  const { flags, positional } = parseCliFlags(process.argv.slice(2));
  if (positional.length === 0) {
    console.error("Usage: npm run corpus:ingest -- [--db <path>] <case_detail.csv> [...]");
    process.exit(1);
  }

  const config = loadRunConfig();
  const dbPath = flags.db ?? config.corpusDbPath;

  mkdirSync(path.dirname(dbPath), { recursive: true });
  for (const suffix of ["", "-wal", "-shm"]) {
    if (existsSync(dbPath + suffix)) rmSync(dbPath + suffix);
  }

  const { db, sqlite } = createCorpusDatabase(dbPath);
  try {
    createCorpusSchema(db);
    const startTime = Date.now();
    const report = ingestCaseDetailFiles(db, positional);
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

    const summary = summarizeCorpus(db);
    console.log();
    console.log(`  Database:   ${dbPath}`);
    console.log(`  Files:      ${report.files.length} loaded, ${report.skippedFiles.length} skipped`);
    console.log(`  Incidents:  ${summary.totalRows.toLocaleString("en-US")}`);
    console.log(`  Fatal:      ${summary.fatalCount.toLocaleString("en-US")}`);
    console.log(`  Days away:  ${summary.daysAwayCount.toLocaleString("en-US")}`);
    console.log("  Top event types:");
    for (const row of summary.topEventTypes) {
      console.log(`    ${row.count.toLocaleString("en-US").padStart(8)}  ${row.eventType}`);
    }
    console.log();
    console.log(`  Completed in ${elapsed}s`);
  } finally {
    sqlite.close();
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
