import type { TriageSettings } from "../types/index.js";
import type { LlmConfig } from "./llm.js";

/**
 * Freeze the slice of process configuration the core pipeline depends on.
 * The pipeline and normalizer receive this object at construction and never
 * read the environment themselves.
 */
export function toTriageSettings(config: LlmConfig): TriageSettings {
  return Object.freeze({
    maxBodyChars: config.triage.maxBodyChars,
    defaultTimezone: config.triage.defaultTimezone,
    defaultConfidence: config.triage.defaultConfidence,
    fallbackConfidence: config.triage.fallbackConfidence,
    fallbackCategory: "other",
    fallbackActionKey: "OTHER",
    gatewayTimeoutMs: config.triage.timeoutMs,
    modelVersion: config.llm.modelVersion,
    fallbackModelVersion: config.triage.fallbackModelVersion,
    promptVersion: config.triage.promptVersion,
    verifyOutput: config.triage.verifyOutput,
  });
}
