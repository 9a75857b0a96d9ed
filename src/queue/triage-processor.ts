import { UnrecoverableError, Worker, type Job } from "bullmq";
import { getRedisConnection } from "./connection.js";
import { loadSharedConfig } from "../config/shared.js";
import { logger } from "../config/logger.js";
import { rawMessageSchema } from "../parser/index.js";
import type { TriagePipeline } from "../pipeline/index.js";
import type { MajorCategory, RawMessage, TriageOutput } from "../types/index.js";

export interface TriageJobData {
  message: RawMessage;
}

/** Hot fields denormalized for list views and filters. */
export interface TriageProjection {
  major_category: MajorCategory;
  sub_action_key: string;
  confidence: number;
  explicit_task: boolean;
  reply_required: boolean;
}

export interface TriageJobResult {
  messageId: string;
  threadId: string | null;
  output: TriageOutput;
  projection: TriageProjection;
}

export function toProjection(output: TriageOutput): TriageProjection {
  return {
    major_category: output.major_category,
    sub_action_key: output.sub_action_key,
    confidence: output.confidence,
    explicit_task: output.explicit_task,
    reply_required:
      output.suggested_reply_action.length > 0 || output.major_category === "core_communication",
  };
}

/**
 * Validate the job payload and run it through the pipeline. An invalid
 * payload can never succeed, so it fails the job without retries.
 */
export async function processTriageJob(
  job: Pick<Job<TriageJobData>, "id" | "data">,
  pipeline: TriagePipeline
): Promise<TriageJobResult> {
  const parsed = rawMessageSchema.safeParse(job.data.message);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new UnrecoverableError(`Invalid triage payload: ${issues.join("; ")}`);
  }

  const message = parsed.data;
  const output = await pipeline.run(message);

  logger.info(
    {
      jobId: job.id,
      messageId: message.id,
      category: output.major_category,
      subActionKey: output.sub_action_key,
      fallback: output.debug.flags.includes("classification_fallback"),
    },
    "Message triaged"
  );

  return {
    messageId: message.id,
    threadId: message.threadId ?? null,
    output,
    projection: toProjection(output),
  };
}

let worker: Worker<TriageJobData, TriageJobResult> | undefined;

export function startTriageWorker(pipeline: TriagePipeline): Worker<TriageJobData, TriageJobResult> {
  if (worker) {
    logger.warn("Triage worker already running");
    return worker;
  }

  const config = loadSharedConfig();
  worker = new Worker<TriageJobData, TriageJobResult>(
    config.queue.name,
    (job) => processTriageJob(job, pipeline),
    {
      connection: getRedisConnection(),
      concurrency: config.queue.concurrency,
    }
  );

  worker.on("completed", (job) => {
    logger.debug({ jobId: job.id, messageId: job.data.message.id }, "Job completed");
  });

  worker.on("failed", (job, err) => {
    logger.error(
      { jobId: job?.id, error: err.message, attempts: job?.attemptsMade },
      "Job failed"
    );
  });

  worker.on("error", (err) => {
    logger.error({ error: err }, "Worker error");
  });

  logger.info({ queue: config.queue.name, concurrency: config.queue.concurrency }, "Triage worker started");
  return worker;
}

export async function stopTriageWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = undefined;
    logger.info("Triage worker stopped");
  }
}
