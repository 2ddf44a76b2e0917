import type { NextFunction, Request, RequestHandler, Response } from "express";

interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const MAX_TRACKED_CLIENTS = 5000;

/** Fixed-window limiter per client IP, in front of the action routes. */
export function createIpRateLimiter(options: RateLimitOptions): RequestHandler {
  const bucket = new Map<string, RateLimitEntry>();
  const clock = options.now ?? Date.now;

  return (req: Request, res: Response, next: NextFunction): void => {
    const now = clock();
    const key = req.ip ?? "unknown";
    const current = bucket.get(key);

    if (!current || now > current.resetAt) {
      bucket.set(key, { count: 1, resetAt: now + options.windowMs });
      next();
      return;
    }

    if (current.count >= options.maxRequests) {
      const retryAfterSeconds = Math.max(Math.ceil((current.resetAt - now) / 1000), 1);
      res.setHeader("Retry-After", String(retryAfterSeconds));
      res.status(429).json({ error: "Too many requests. Try again later.", code: "RateLimited" });
      return;
    }

    current.count += 1;

    if (bucket.size > MAX_TRACKED_CLIENTS) {
      for (const [entryKey, entry] of bucket.entries()) {
        if (entry.resetAt < now) {
          bucket.delete(entryKey);
        }
      }
    }

    next();
  };
}
