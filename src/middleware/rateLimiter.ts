// src/middleware/rateLimiter.ts
import { Request, Response, NextFunction } from "express";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory fixed-window rate limiter.
 * One instance per middleware, so limits on different routes don't share counters.
 */
export class RateLimiter {
  private store = new Map<string, RateLimitEntry>();

  constructor(cleanupEveryMs: number = 60000) {
    // never keep the process alive just for housekeeping
    setInterval(() => this.cleanup(), cleanupEveryMs).unref();
  }

  private cleanup() {
    const now = Date.now();
    for (const [key, entry] of this.store.entries()) {
      if (entry.resetAt < now) {
        this.store.delete(key);
      }
    }
  }

  check(
    key: string,
    windowMs: number,
    maxRequests: number,
    now: number = Date.now()
  ): { allowed: boolean; remaining: number; resetAt: number } {
    const entry = this.store.get(key);

    if (!entry || entry.resetAt < now) {
      const resetAt = now + windowMs;
      this.store.set(key, { count: 1, resetAt });
      return { allowed: true, remaining: maxRequests - 1, resetAt };
    }

    if (entry.count >= maxRequests) {
      return { allowed: false, remaining: 0, resetAt: entry.resetAt };
    }

    entry.count++;
    return { allowed: true, remaining: maxRequests - entry.count, resetAt: entry.resetAt };
  }
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
  message?: string;
}

function clientIp(req: Request): string {
  // Use X-Forwarded-For for proxied requests, fallback to IP
  const forwarded = req.headers["x-forwarded-for"];
  const ip = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(",")[0]?.trim();
  return ip || req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Rate limiting middleware. Limits requests per client IP by default.
 */
export function rateLimitMiddleware(options: RateLimitOptions) {
  const {
    windowMs,
    maxRequests,
    keyGenerator = clientIp,
    message = "Too many requests, please try again later",
  } = options;
  const limiter = new RateLimiter(windowMs);

  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.check(keyGenerator(req), windowMs, maxRequests);

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(result.resetAt / 1000));

    if (!result.allowed) {
      const retryAfter = Math.ceil((result.resetAt - Date.now()) / 1000);
      res.setHeader("Retry-After", retryAfter);
      return res.status(429).json({ ok: false, error: message, retryAfter });
    }

    next();
  };
}

export default rateLimitMiddleware;
