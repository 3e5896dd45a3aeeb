import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger as honoLogger } from "hono/logger";
import { requestId } from "hono/request-id";
import { env, logger as rootLogger, type Logger } from "@/config";
import { requireBasicAuth, type UserStore } from "@/auth";
import { createBookRoutes, type BookStore } from "@/books";
import { getMetrics, metricsRegistry } from "@/telemetry";
import { setupSwaggerUI } from "./docs/openapi";
import {
  apiSecurityHeaders,
  createRateLimiter,
  httpMetricsMiddleware,
  type RateLimitOptions,
} from "./middleware";

export interface AppDependencies {
  store: BookStore;
  users: UserStore;
  logger?: Logger;
  rateLimit?: RateLimitOptions;
}

export function createApp({ store, users, logger = rootLogger, rateLimit }: AppDependencies) {
  const app = new Hono();

  // Global Middleware
  app.use("*", requestId());
  app.use("*", cors({
    origin: env.CORS_ORIGINS?.split(",") || ["http://localhost:5173"],
    allowHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    allowMethods: ["GET", "POST", "PUT", "OPTIONS"],
    exposeHeaders: ["X-Request-ID", "X-RateLimit-Limit", "X-RateLimit-Remaining", "Location"],
    credentials: true,
  }));
  app.use("*", apiSecurityHeaders);
  app.use("*", httpMetricsMiddleware);

  // Development logging
  if (env.NODE_ENV === "development") {
    app.use("*", honoLogger());
  }

  // Health check and metrics (no auth, no rate limiting)
  app.get("/health", (c) => c.json({ status: "ok", store: env.STORE }));
  app.get("/metrics", async (c) => {
    c.header("Content-Type", metricsRegistry.contentType);
    return c.body(await getMetrics());
  });

  // API Documentation (Swagger UI)
  setupSwaggerUI(app);

  // REST API routes - every route requires Basic auth
  const api = new Hono();

  api.use("*", requireBasicAuth(users));
  api.use("*", createRateLimiter(rateLimit));
  api.route("/books", createBookRoutes(store, logger));

  app.route("/api/v1", api);

  // 404 handler
  app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: "Not found" } }, 404));

  // Error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    return c.json(
      { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
      500
    );
  });

  return app;
}
