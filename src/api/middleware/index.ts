// Middleware Index
// src/api/middleware/index.ts

export { createRateLimiter, type RateLimitOptions } from "./rate-limit.js";
export { apiSecurityHeaders } from "./security-headers.js";
export { httpMetricsMiddleware } from "./metrics.js";
