import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { ApiConfig } from "../../config/api.js";
import { rawMessageSchema } from "../../parser/index.js";
import type { TriagePipeline } from "../../pipeline/index.js";
import type { TriageStats } from "../../stats/index.js";
import type { TriageResponse } from "../../types/index.js";

export interface TriageRouteDeps {
  pipeline: TriagePipeline;
  stats: TriageStats;
  config: ApiConfig;
}

export function triageRoutes({ pipeline, stats, config }: TriageRouteDeps) {
  const routes = new Hono();

  routes.post(
    "/triage",
    bodyLimit({
      maxSize: config.api.bodyLimitBytes,
      onError: (c) => c.json({ error: "Payload too large" }, 413),
    }),
    async (c) => {
      stats.recordRequest("triage");

      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json({ error: "Invalid JSON body" }, 400);
      }

      const parsed = rawMessageSchema.safeParse(body);
      if (!parsed.success) {
        return c.json({ error: "Invalid message", issues: parsed.error.issues }, 400);
      }

      const output = await pipeline.run(parsed.data, { signal: c.req.raw.signal });
      const response: TriageResponse = { output };
      return c.json(response);
    }
  );

  return routes;
}
