export { loadSharedConfig, type SharedConfig } from "./shared.js";
export { loadLlmConfig, type LlmConfig } from "./llm.js";
export { loadApiConfig, type ApiConfig } from "./api.js";
export { toTriageSettings } from "./triage.js";
export { logger, componentLogger } from "./logger.js";
