import "dotenv/config";
import { loadRunConfig } from "../shared/run_config.js";
import type { RunConfig } from "../shared/run_config.js";
import { createApp, lazyCorpus } from "./app.js";

export function startServer(config: RunConfig = loadRunConfig()) {
  const app = createApp(lazyCorpus(config.corpusDbPath), config);
  return app.listen(config.port, () => {
    console.log(`[api] Incident risk API running on port ${config.port}`);
  });
}

// Start if run directly
if (process.argv[1]?.includes("server")) {
  startServer();
}
