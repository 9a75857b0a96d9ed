import type { LlmConfig } from "../config/llm.js";
import type { ClassificationGateway } from "./gateway.js";
import { LocalGateway } from "./local-gateway.js";
import { OpenAIGateway } from "./openai-gateway.js";

export { GatewayError, toGatewayError, type GatewayErrorKind } from "./errors.js";
export type { ClassificationGateway, ClassifyOptions } from "./gateway.js";
export { buildClassificationRequest, renderUserContent, type ClassificationRequest } from "./request.js";
export { TRIAGE_SYSTEM_PROMPT } from "./prompt.js";
export { triageCandidateSchema } from "./schema.js";
export {
  OTHER_ACTION_KEY,
  SUB_ACTION_KEYS,
  SUB_ACTION_KEYS_BY_CATEGORY,
  isKnownSubActionKey,
} from "./taxonomy.js";
export { OpenAIGateway, LocalGateway };

export function createGateway(config: LlmConfig): ClassificationGateway {
  switch (config.llm.provider) {
    case "openai":
      return new OpenAIGateway({
        apiKey: config.llm.openai.apiKey,
        baseUrl: config.llm.openai.baseUrl,
        model: config.llm.model,
        temperature: config.llm.temperature,
        modelVersion: config.llm.modelVersion,
      });
    case "local":
      return new LocalGateway({
        url: config.llm.local.url,
        modelVersion: config.llm.modelVersion,
      });
  }
}
