// Security Headers Middleware
// src/api/middleware/security-headers.ts

import type { MiddlewareHandler } from "hono";

// Headers for JSON API responses (no HTML served besides /docs)
export const apiSecurityHeaders: MiddlewareHandler = async (c, next) => {
  await next();

  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "strict-origin-when-cross-origin");
  c.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
  c.header("Cross-Origin-Resource-Policy", "same-origin");

  // Stock levels change on every borrow, never cache
  if (!c.res.headers.has("Cache-Control")) {
    c.header("Cache-Control", "no-store, no-cache, must-revalidate, proxy-revalidate");
  }
};
