import type { Context, Next } from "hono";
import type { ApiConfig } from "../../config/api.js";

export const PUBLIC_PATHS = new Set(["/api/v1/health"]);

export function apiKeyAuth(config: ApiConfig) {
  return async (c: Context, next: Next) => {
    if (!config.api.apiKey) return next();

    if (PUBLIC_PATHS.has(c.req.path)) return next();

    const key = c.req.header("x-api-key") ?? c.req.query("api_key");

    if (key !== config.api.apiKey) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    return next();
  };
}

interface ApiBucket {
  timestamps: number[];
}

/**
 * Per-IP sliding-window limiter. Each middleware instance keeps its own
 * buckets; stale ones are swept on an unref'd timer.
 */
export function apiRateLimit(config: ApiConfig, now: () => number = Date.now) {
  const { maxPerWindow, windowMs } = config.api.rateLimit;
  const buckets = new Map<string, ApiBucket>();

  const cleanupInterval = Math.max(windowMs, 60000);
  const timer = setInterval(() => {
    const cutoff = now() - windowMs;
    for (const [ip, bucket] of buckets) {
      bucket.timestamps = bucket.timestamps.filter((t) => t > cutoff);
      if (bucket.timestamps.length === 0) buckets.delete(ip);
    }
  }, cleanupInterval);
  timer.unref();

  return async (c: Context, next: Next) => {
    const ip = (
      c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ??
      c.req.header("x-real-ip") ??
      "unknown"
    ).replace(/^::ffff:/, "");

    const current = now();
    let bucket = buckets.get(ip);
    if (!bucket) {
      bucket = { timestamps: [] };
      buckets.set(ip, bucket);
    }

    bucket.timestamps = bucket.timestamps.filter((t) => t > current - windowMs);

    if (bucket.timestamps.length >= maxPerWindow) {
      const resetAt = bucket.timestamps[0] + windowMs;
      c.header("Retry-After", String(Math.ceil((resetAt - current) / 1000)));
      return c.json({ error: "Too many requests" }, 429);
    }

    bucket.timestamps.push(current);

    c.header("X-RateLimit-Limit", String(maxPerWindow));
    c.header("X-RateLimit-Remaining", String(maxPerWindow - bucket.timestamps.length));

    return next();
  };
}
