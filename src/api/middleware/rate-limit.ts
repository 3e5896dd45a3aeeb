// Rate Limiting Middleware
// src/api/middleware/rate-limit.ts

import { rateLimiter } from "hono-rate-limiter";

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
}

// 100 requests per minute per librarian account
const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  windowMs: 60 * 1000,
  limit: 100,
};

/**
 * Per-account API rate limiter. Must run after requireBasicAuth so the
 * user is known; every call gets its own counter store.
 */
export function createRateLimiter({ windowMs, limit }: RateLimitOptions = DEFAULT_RATE_LIMIT) {
  return rateLimiter({
    windowMs,
    limit,
    standardHeaders: "draft-6",
    keyGenerator: (c) => `user:${c.get("user").username}`,
    message: { error: { code: "RATE_LIMITED", message: "Too many requests. Please try again later." } },
  });
}
