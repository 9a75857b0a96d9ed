import { Redis } from "ioredis";
import { loadSharedConfig } from "../config/shared.js";
import { logger } from "../config/logger.js";

let connection: Redis | undefined;

/**
 * Shared Redis connection for the triage queue and worker. BullMQ needs
 * `maxRetriesPerRequest: null` on connections used by workers.
 */
export function getRedisConnection(): Redis {
  if (!connection) {
    const config = loadSharedConfig();
    connection = new Redis(config.redis.url, {
      connectionName: "mail-triage",
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    });
    connection.on("error", (err) => {
      logger.error({ error: err }, "Redis connection error");
    });
    connection.on("connect", () => {
      logger.debug({ url: config.redis.url.replace(/\/\/[^@]*@/, "//***@") }, "Redis connected");
    });
  }
  return connection;
}

export async function closeRedisConnection(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = undefined;
    logger.debug("Redis connection closed");
  }
}
