import type { Request, Response, NextFunction, RequestHandler } from "express";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

const DEFAULT_OPTIONS: RateLimitOptions = {
  windowMs: 60 * 1000, // 1 minute
  maxRequests: 90, // 90 requests per minute per IP
};

export function createRateLimiter(options: RateLimitOptions = DEFAULT_OPTIONS): RequestHandler {
  const { windowMs, maxRequests } = options;
  const rateLimitStore = new Map<string, RateLimitEntry>();

  const pruneTimer = setInterval(() => {
    const now = Date.now();
    for (const [ip, entry] of rateLimitStore.entries()) {
      if (now > entry.resetAt) {
        rateLimitStore.delete(ip);
      }
    }
  }, windowMs);
  pruneTimer.unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    const now = Date.now();

    let entry = rateLimitStore.get(ip);

    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + windowMs };
      rateLimitStore.set(ip, entry);
    }

    entry.count++;

    const remaining = Math.max(0, maxRequests - entry.count);
    const resetSeconds = Math.ceil((entry.resetAt - now) / 1000);

    res.setHeader("X-RateLimit-Limit", maxRequests.toString());
    res.setHeader("X-RateLimit-Remaining", remaining.toString());
    res.setHeader("X-RateLimit-Reset", resetSeconds.toString());

    if (entry.count > maxRequests) {
      res.status(429).json({
        success: false,
        error: { code: "RATE_LIMITED", message: `Rate limit exceeded, retry after ${resetSeconds}s` },
      });
      return;
    }

    next();
  };
}

export const rateLimiter = createRateLimiter();
