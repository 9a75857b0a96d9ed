import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import type { ApiConfig } from "../config/api.js";
import { logger } from "../config/logger.js";
import type { TriagePipeline } from "../pipeline/index.js";
import type { TriageStats } from "../stats/index.js";
import { apiKeyAuth, apiRateLimit } from "./middleware/security.js";
import { metaRoutes } from "./routes/meta.js";
import { triageRoutes } from "./routes/triage.js";

export interface AppDeps {
  pipeline: TriagePipeline;
  stats: TriageStats;
  config: ApiConfig;
  /** Hono request logging; off in tests. */
  requestLogging?: boolean;
}

export function createApp({ pipeline, stats, config, requestLogging = true }: AppDeps) {
  const app = new Hono();

  const corsOrigins = config.api.corsOrigins;
  app.use(
    "*",
    cors({
      origin: corsOrigins.includes("*") ? "*" : corsOrigins,
    })
  );
  if (requestLogging) {
    app.use("*", honoLogger((message) => logger.info(message)));
  }
  app.use("/api/*", apiRateLimit(config));
  app.use("/api/*", apiKeyAuth(config));

  app.onError((err, c) => {
    logger.error({ error: err, path: c.req.path }, "Unhandled API error");
    stats.recordError("api", err);
    return c.json({ error: "Internal server error" }, 500);
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.route("/api/v1", metaRoutes({ stats, config }));
  app.route("/api/v1/ai", triageRoutes({ pipeline, stats, config }));

  return app;
}
