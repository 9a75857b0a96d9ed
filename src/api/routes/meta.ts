import { Hono } from "hono";
import type { ApiConfig } from "../../config/api.js";
import type { TriageStats } from "../../stats/index.js";
import { MAJOR_CATEGORIES } from "../../types/index.js";

export const SERVICE_NAME = "mail-triage";
const RECENT_ERRORS_IN_HEALTH = 10;

const ENDPOINTS = [
  { method: "GET", path: "/api/v1/health", description: "Service health and recent errors" },
  { method: "GET", path: "/api/v1/apidata", description: "Service and contract metadata" },
  { method: "GET", path: "/api/v1/ai", description: "Classification model configuration" },
  { method: "POST", path: "/api/v1/ai/triage", description: "Triage one Gmail message" },
] as const;

export interface MetaRouteDeps {
  stats: TriageStats;
  config: ApiConfig;
}

export function metaRoutes({ stats, config }: MetaRouteDeps) {
  const routes = new Hono();

  routes.get("/health", (c) =>
    c.json({
      status: stats.healthStatus(),
      service: SERVICE_NAME,
      version: config.api.version,
      uptimeSeconds: stats.uptimeSeconds(),
      startedAt: stats.startedAt.toISOString(),
      provider: config.llm.provider,
      model: config.llm.model,
      requests: stats.requestCounts(),
      recentErrors: stats.recentErrors(RECENT_ERRORS_IN_HEALTH),
    })
  );

  routes.get("/apidata", (c) =>
    c.json({
      service: SERVICE_NAME,
      version: config.api.version,
      contract: config.triage.contractReference,
      endpoints: ENDPOINTS,
      majorCategories: MAJOR_CATEGORIES,
    })
  );

  routes.get("/ai", (c) =>
    c.json({
      provider: config.llm.provider,
      model: config.llm.model,
      temperature: config.llm.temperature,
      timeoutMs: config.triage.timeoutMs,
      maxBodyChars: config.triage.maxBodyChars,
      modelVersion: config.llm.modelVersion,
      promptVersion: config.triage.promptVersion,
      contract: config.triage.contractReference,
      capabilities: ["triage", "signals", "deadline_resolution", "fallback"],
      requests: stats.requestCounts(),
    })
  );

  return routes;
}
