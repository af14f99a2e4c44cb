import express from "express";
import type { Express } from "express";
import { SqliteIncidentCorpus } from "../corpus/sqlite_corpus.js";
import type { IncidentCorpus } from "../corpus/types.js";
import { createRiskRouter } from "./routes.js";
import type { ApiConfig, CorpusProvider } from "./routes.js";

export function createApp(getCorpus: CorpusProvider, config: ApiConfig): Express {
  const app = express();
  app.use(express.json());
  app.use(createRiskRouter(getCorpus, config));
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  return app;
}

/** Opens the corpus on first use, so a missing database answers 503 instead of failing startup. */
export function lazyCorpus(dbPath: string): CorpusProvider {
  let corpus: IncidentCorpus | null = null;
  return () => {
    corpus ??= SqliteIncidentCorpus.open(dbPath);
    return corpus;
  };
}
