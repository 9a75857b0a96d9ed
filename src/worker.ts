import { createGateway } from "./classifier/index.js";
import { loadLlmConfig } from "./config/llm.js";
import { logger } from "./config/logger.js";
import { toTriageSettings } from "./config/triage.js";
import { TriagePipeline } from "./pipeline/index.js";
import { startTriageWorker, stopTriageWorker, closeRedisConnection } from "./queue/index.js";
import { TriageStats } from "./stats/index.js";

/**
 * Standalone BullMQ worker entrypoint.
 * Run with: node dist/src/worker.js
 */
async function main(): Promise<void> {
  const config = loadLlmConfig();
  const pipeline = new TriagePipeline({
    gateway: createGateway(config),
    settings: toTriageSettings(config),
    stats: new TriageStats(),
  });

  const worker = startTriageWorker(pipeline);
  await worker.waitUntilReady();
  logger.info({ provider: config.llm.provider, model: config.llm.model }, "Mail triage worker started");

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Worker shutting down...");

    await stopTriageWorker();
    await closeRedisConnection();

    logger.info("Worker shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  process.on("uncaughtException", (err) => {
    logger.fatal({ error: err }, "Uncaught exception in worker");
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.fatal({ reason }, "Unhandled rejection in worker");
    process.exit(1);
  });
}

main().catch((err) => {
  logger.fatal({ error: err }, "Failed to start worker");
  process.exit(1);
});
