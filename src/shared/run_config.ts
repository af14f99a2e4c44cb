/**
 * Run Configuration Module
 *
 * Resolves where the corpus and the statistics snapshot live, and the
 * defaults for retrieval and the HTTP server:
 * - CORPUS_DB_PATH       SQLite corpus file
 * - STATS_CACHE_PATH     category statistics snapshot (JSON)
 * - STATS_CACHE_ENABLED  read-through snapshot on/off
 * - EVIDENCE_DEFAULT_K   number of narratives returned when k is omitted
 * - PORT                 HTTP port
 *
 * Entry points load `.env` through `dotenv/config` before calling this.
 */

import path from "path";
import { z } from "zod";

const BooleanFlag = z.preprocess(
  (v) => (typeof v === "string" ? !["false", "0", "no", "off"].includes(v.trim().toLowerCase()) : v),
  z.boolean()
);

const EnvSchema = z.object({
  CORPUS_DB_PATH: z.string().min(1).default("data/incidents.db"),
  STATS_CACHE_PATH: z.string().min(1).default("data/stats-cache.json"),
  STATS_CACHE_ENABLED: BooleanFlag.default(true),
  EVIDENCE_DEFAULT_K: z.coerce.number().int().positive().default(3),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export interface RunConfig {
  corpusDbPath: string;
  statsCachePath: string;
  statsCacheEnabled: boolean;
  defaultK: number;
  port: number;
}

/**
 * Build the run configuration from an environment map.
 * Relative paths resolve against `cwd`. Invalid values throw with the
 * offending variable named.
 */
export function loadRunConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): RunConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    corpusDbPath: path.resolve(cwd, e.CORPUS_DB_PATH),
    statsCachePath: path.resolve(cwd, e.STATS_CACHE_PATH),
    statsCacheEnabled: e.STATS_CACHE_ENABLED,
    defaultK: e.EVIDENCE_DEFAULT_K,
    port: e.PORT,
  };
}

/**
 * Read `--name value` pairs from CLI arguments.
 * A flag given without a value maps to "true".
 */
export function parseCliFlags(args: string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[name] = next;
        i++;
      } else {
        flags[name] = "true";
      }
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}
