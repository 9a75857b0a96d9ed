import { z } from "zod";
import { loadSharedConfig, type SharedConfig } from "./shared.js";

const llmEnvSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "local"]).default("openai"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LOCAL_LLM_URL: z.string().url().default("http://127.0.0.1:8080/v1/triage"),
  LOCAL_LLM_MODEL: z.string().min(1).default("local-triage"),
});

type LlmEnv = z.infer<typeof llmEnvSchema>;

export type LlmConfig = SharedConfig & {
  llm: {
    provider: LlmEnv["LLM_PROVIDER"];
    model: string;
    modelVersion: string;
    temperature: number;
    openai: { apiKey: string | undefined; baseUrl: string | undefined };
    local: { url: string };
  };
};

let cachedLlmConfig: LlmConfig | undefined;

export function loadLlmConfig(): LlmConfig {
  if (cachedLlmConfig) {
    return cachedLlmConfig;
  }

  const sharedConfig = loadSharedConfig();
  const parsed = llmEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;
  const model = env.LLM_PROVIDER === "openai" ? env.OPENAI_MODEL : env.LOCAL_LLM_MODEL;

  cachedLlmConfig = {
    ...sharedConfig,
    llm: {
      provider: env.LLM_PROVIDER,
      model,
      modelVersion: `${env.LLM_PROVIDER}:${model}`,
      temperature: env.LLM_TEMPERATURE,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        baseUrl: env.OPENAI_BASE_URL,
      },
      local: {
        url: env.LOCAL_LLM_URL,
      },
    },
  };

  return cachedLlmConfig;
}
