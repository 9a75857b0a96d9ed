import { Queue } from "bullmq";
import { getRedisConnection } from "./connection.js";
import { loadSharedConfig } from "../config/shared.js";
import { logger } from "../config/logger.js";
import type { RawMessage } from "../types/index.js";
import type { TriageJobData, TriageJobResult } from "./triage-processor.js";

export const TRIAGE_JOB_NAME = "triage-message";

let queue: Queue<TriageJobData, TriageJobResult> | undefined;

export function getTriageQueue(): Queue<TriageJobData, TriageJobResult> {
  if (!queue) {
    const config = loadSharedConfig();
    queue = new Queue<TriageJobData, TriageJobResult>(config.queue.name, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: config.queue.attempts,
        backoff: {
          type: "exponential",
          delay: 10_000,
        },
        removeOnComplete: { count: 1000 },
        removeOnFail: { count: 5000 },
      },
    });
  }
  return queue;
}

/**
 * Enqueue a message for triage. The provider message id is the job id, so
 * enqueueing the same message twice is a no-op while the first job is kept.
 */
export async function addTriageJob(message: RawMessage): Promise<string> {
  const q = getTriageQueue();
  await q.add(TRIAGE_JOB_NAME, { message }, { jobId: message.id });
  logger.debug({ messageId: message.id }, "Triage job enqueued");
  return message.id;
}

export async function closeTriageQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = undefined;
    logger.debug("Triage queue closed");
  }
}
