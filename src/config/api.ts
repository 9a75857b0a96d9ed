import { z } from "zod";
import { loadLlmConfig, type LlmConfig } from "./llm.js";

const apiEnvSchema = z.object({
  API_HOST: z.string().default("0.0.0.0"),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  API_KEY: z.string().min(1).optional(),
  API_VERSION: z.string().min(1).default("1.0.0"),
  CORS_ORIGINS: z.string().default("*"),
  API_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(200),
  API_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
  API_BODY_LIMIT_MB: z.coerce.number().min(1).max(100).default(25),
});

export type ApiConfig = LlmConfig & {
  api: {
    host: string;
    port: number;
    apiKey: string | undefined;
    version: string;
    corsOrigins: string[];
    bodyLimitBytes: number;
    rateLimit: {
      maxPerWindow: number;
      windowMs: number;
    };
  };
};

let cachedApiConfig: ApiConfig | undefined;

export function loadApiConfig(): ApiConfig {
  if (cachedApiConfig) {
    return cachedApiConfig;
  }

  const llmConfig = loadLlmConfig();
  const parsed = apiEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  // Parse CORS_ORIGINS: "*" means all, otherwise comma-separated list
  const corsOrigins =
    env.CORS_ORIGINS === "*"
      ? ["*"]
      : env.CORS_ORIGINS.split(",")
          .map((o) => o.trim())
          .filter(Boolean);

  cachedApiConfig = {
    ...llmConfig,
    api: {
      host: env.API_HOST,
      port: env.API_PORT,
      apiKey: env.API_KEY,
      version: env.API_VERSION,
      corsOrigins,
      bodyLimitBytes: Math.round(env.API_BODY_LIMIT_MB * 1024 * 1024),
      rateLimit: {
        maxPerWindow: env.API_RATE_LIMIT_MAX,
        windowMs: env.API_RATE_LIMIT_WINDOW_MS,
      },
    },
  };

  return cachedApiConfig;
}
