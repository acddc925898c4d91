/**
 * Ballot Workflow API -- Rate Limiting Middleware
 *
 * In-memory fixed-window rate limiter keyed by client IP.
 *
 * @module api/middleware/rate-limiter
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import type { RateLimitSettings } from "../../types";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

interface RateLimiterConfig {
  /** Maximum number of requests in the window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Creates a rate limiter middleware.
 *
 * @example
 * ```typescript
 * // 30 requests per minute
 * router.use(createRateLimiter({ maxRequests: 30, windowMs: 60000 }));
 * ```
 */
export function createRateLimiter(config: RateLimiterConfig): RequestHandler {
  const store = new Map<string, RateLimitEntry>();

  // Drop expired windows; unref'd so it never keeps the process alive
  const cleanup = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store.entries()) {
      if (entry.resetAt <= now) store.delete(key);
    }
  }, CLEANUP_INTERVAL_MS);
  cleanup.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.ip || req.socket.remoteAddress || "unknown";
    const now = Date.now();

    let entry = store.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + config.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    const remaining = Math.max(0, config.maxRequests - entry.count);
    res.setHeader("X-RateLimit-Limit", config.maxRequests);
    res.setHeader("X-RateLimit-Remaining", remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(entry.resetAt / 1000));

    if (entry.count > config.maxRequests) {
      res.status(429).json({
        error: "RATE_LIMITED",
        message: "Too many requests. Please try again later.",
        details: {
          retry_after_ms: entry.resetAt - now,
        },
      });
      return;
    }

    next();
  };
}

/**
 * Write and read limiters for the campaign routes.  Writes are matched
 * by HTTP method so both can be mounted on the same path.
 */
export function createRateLimiters(settings: RateLimitSettings): RequestHandler[] {
  const write = createRateLimiter({
    maxRequests: settings.writePerMinute,
    windowMs: 60 * 1000,
  });
  const read = createRateLimiter({
    maxRequests: settings.readPerMinute,
    windowMs: 60 * 1000,
  });

  return [
    (req, res, next) => (req.method === "GET" ? next() : write(req, res, next)),
    (req, res, next) => (req.method === "GET" ? read(req, res, next) : next()),
  ];
}
