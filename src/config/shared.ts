import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const sharedEnvSchema = z.object({
  REDIS_URL: z.string().default("redis://127.0.0.1:6379"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  MAX_BODY_CHARS: z.coerce.number().int().min(100).default(12000),
  DEFAULT_TIMEZONE: z.string().min(1).default("UTC"),
  DEFAULT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
  FALLBACK_CONFIDENCE: z.coerce.number().min(0).max(1).default(0),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
  PROMPT_VERSION: z.string().min(1).default("triage-v3-2026-02"),
  FALLBACK_MODEL_VERSION: z.string().min(1).default("fallback"),
  CONTRACT_REFERENCE: z.string().min(1).default("mail_triage.v1"),
  VERIFY_OUTPUT: z.enum(["true", "false"]).optional(),
  TRIAGE_QUEUE_NAME: z.string().min(1).default("email-triage"),
  TRIAGE_WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(100).default(5),
  TRIAGE_JOB_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
});

type SharedEnv = z.infer<typeof sharedEnvSchema>;

export type SharedConfig = {
  env: SharedEnv["NODE_ENV"];
  logLevel: SharedEnv["LOG_LEVEL"];
  redis: { url: string };
  triage: {
    maxBodyChars: number;
    defaultTimezone: string;
    defaultConfidence: number;
    fallbackConfidence: number;
    timeoutMs: number;
    promptVersion: string;
    fallbackModelVersion: string;
    contractReference: string;
    verifyOutput: boolean;
  };
  queue: {
    name: string;
    concurrency: number;
    attempts: number;
  };
};

let cachedSharedConfig: SharedConfig | undefined;

export function loadSharedConfig(): SharedConfig {
  if (cachedSharedConfig) {
    return cachedSharedConfig;
  }

  const parsed = sharedEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  cachedSharedConfig = {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    redis: {
      url: env.REDIS_URL,
    },
    triage: {
      maxBodyChars: env.MAX_BODY_CHARS,
      defaultTimezone: env.DEFAULT_TIMEZONE,
      defaultConfidence: env.DEFAULT_CONFIDENCE,
      fallbackConfidence: env.FALLBACK_CONFIDENCE,
      timeoutMs: env.LLM_TIMEOUT_MS,
      promptVersion: env.PROMPT_VERSION,
      fallbackModelVersion: env.FALLBACK_MODEL_VERSION,
      contractReference: env.CONTRACT_REFERENCE,
      // Output verification throws on invariant violations; off in production unless asked for
      verifyOutput: env.VERIFY_OUTPUT
        ? env.VERIFY_OUTPUT === "true"
        : env.NODE_ENV !== "production",
    },
    queue: {
      name: env.TRIAGE_QUEUE_NAME,
      concurrency: env.TRIAGE_WORKER_CONCURRENCY,
      attempts: env.TRIAGE_JOB_ATTEMPTS,
    },
  };

  return cachedSharedConfig;
}
