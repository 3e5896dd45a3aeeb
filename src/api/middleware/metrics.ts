// HTTP Metrics Middleware
// src/api/middleware/metrics.ts

import type { Context, Next } from "hono";
import { httpRequestDuration, httpRequestsTotal } from "@/telemetry";

/**
 * Middleware to collect HTTP request metrics
 */
export async function httpMetricsMiddleware(c: Context, next: Next): Promise<void> {
  const start = performance.now();
  const method = c.req.method;
  const route = normalizeRoute(c.req.path);

  await next();

  const duration = (performance.now() - start) / 1000;
  const statusCode = c.res.status.toString();

  httpRequestDuration.observe({ method, route, status_code: statusCode }, duration);
  httpRequestsTotal.inc({ method, route, status_code: statusCode });
}

/**
 * Collapse book ids into a placeholder to keep label cardinality bounded
 */
function normalizeRoute(path: string): string {
  return path
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ":id")
    .replace(/\/\d+(?=\/|$)/g, "/:id")
    .split("/")
    .slice(0, 6)
    .join("/");
}
