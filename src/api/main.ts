import { serve } from "@hono/node-server";
import { createGateway } from "../classifier/index.js";
import { loadApiConfig } from "../config/api.js";
import { logger } from "../config/logger.js";
import { toTriageSettings } from "../config/triage.js";
import { TriagePipeline } from "../pipeline/index.js";
import { TriageStats } from "../stats/index.js";
import { createApp } from "./app.js";

const config = loadApiConfig();

function main() {
  const stats = new TriageStats();
  const pipeline = new TriagePipeline({
    gateway: createGateway(config),
    settings: toTriageSettings(config),
    stats,
  });
  const app = createApp({ pipeline, stats, config });

  if (config.api.apiKey) {
    logger.info("API key authentication enabled");
  } else {
    logger.warn("API_KEY not set, API endpoints are unprotected");
  }

  const server = serve(
    {
      fetch: app.fetch,
      port: config.api.port,
      hostname: config.api.host,
    },
    (info) => {
      logger.info(
        { host: config.api.host, port: info.port, provider: config.llm.provider, model: config.llm.model },
        "API server listening"
      );
    }
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down API server...");
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  logger.fatal({ error: err }, "Failed to start API server");
  process.exit(1);
}
