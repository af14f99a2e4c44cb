#!/usr/bin/env tsx
/**
 * CLI: evidence
 *
 * Usage: npm run evidence -- --label "<hazard label>" [--category <category>] [--k <n>] [--json]
 */

import "dotenv/config";
import { SqliteIncidentCorpus } from "../corpus/sqlite_corpus.js";
import { loadRunConfig, parseCliFlags } from "../shared/run_config.js";
import { retrieveEvidence } from "./evidence_retriever.js";
import { formatEvidenceForDisplay } from "./format.js";

function main() {
  const { flags, positional } = parseCliFlags(process.argv.slice(2));
  const label = flags.label ?? positional.join(" ");
  if (!label.trim()) {
    console.error('Usage: npm run evidence -- --label "<hazard label>" [--category <category>] [--k <n>] [--json]');
    process.exit(1);
  }

  const config = loadRunConfig();
  const k = flags.k !== undefined ? Number(flags.k) : config.defaultK;

  const corpus = SqliteIncidentCorpus.open(config.corpusDbPath);
  try {
    const results = retrieveEvidence(corpus, label, { category: flags.category, k });
    if (flags.json === "true") {
      console.log(JSON.stringify(results, null, 2));
    } else {
      console.log(formatEvidenceForDisplay(results));
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
