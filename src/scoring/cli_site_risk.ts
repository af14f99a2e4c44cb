#!/usr/bin/env tsx
/**
 * CLI: site-risk
 *
 * Usage: npm run site-risk -- --registry <hazards.json> [--json]
 *
 * The registry file maps hazard ids to { "label": ..., "category": ... };
 * see fixtures/site-hazards.json.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { SqliteIncidentCorpus } from "../corpus/sqlite_corpus.js";
import { loadRunConfig, parseCliFlags } from "../shared/run_config.js";
import { formatRiskReport } from "./report.js";
import { assessSiteRisk, parseHazardRegistry } from "./site_risk.js";

function main() {
  const { flags } = parseCliFlags(process.argv.slice(2));
  if (!flags.registry) {
    console.error("Usage: npm run site-risk -- --registry <hazards.json> [--json]");
    process.exit(1);
  }

  const registry = parseHazardRegistry(JSON.parse(readFileSync(flags.registry, "utf-8")));
  const config = loadRunConfig();

  const corpus = SqliteIncidentCorpus.open(config.corpusDbPath);
  try {
    const result = assessSiteRisk(registry, corpus);
    console.log(flags.json === "true" ? JSON.stringify(result, null, 2) : formatRiskReport(result));
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
