import { pino, type Logger } from "pino";
import { loadSharedConfig } from "./shared.js";

const config = loadSharedConfig();

export const logger = pino({
  level: config.logLevel,
  base: { service: "mail-triage" },
  redact: {
    paths: ["apiKey", "headers.authorization", "headers[\"x-api-key\"]"],
    censor: "[redacted]",
  },
  transport:
    config.env === "development"
      ? {
          target: "pino/file",
          options: { destination: 1 },
        }
      : undefined,
});

/**
 * Child logger tagged with the pipeline component that emits the record.
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
