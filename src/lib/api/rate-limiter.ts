/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Counts requests per client IP. Each limiter instance owns its store;
 * expired windows are dropped lazily on access.
 */

import type { Context, Next } from 'hono';
import { failureWithStatus } from './response.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  /** Max requests per window (default: 100) */
  max?: number;
  /** Window size in milliseconds (default: 60_000) */
  windowMs?: number;
}

function clientIp(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ?? c.req.header('x-real-ip') ?? 'unknown'
  );
}

/**
 * @example
 * app.use('/api/*', rateLimiter({ max: 200, windowMs: 60_000 }));
 */
export function rateLimiter(opts?: RateLimitOptions) {
  const max = opts?.max ?? 100;
  const windowMs = opts?.windowMs ?? 60_000;
  const store = new Map<string, RateLimitEntry>();

  const sweep = (now: number) => {
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) store.delete(key);
    }
  };

  return async (c: Context, next: Next) => {
    const now = Date.now();
    if (store.size > 1000) sweep(now);

    const ip = clientIp(c);
    let entry = store.get(ip);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      store.set(ip, entry);
    }

    entry.count += 1;

    c.header('X-RateLimit-Limit', String(max));
    c.header('X-RateLimit-Remaining', String(Math.max(0, max - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count > max) {
      return c.json(failureWithStatus(429, 'Too many requests. Please try again later.'), 429);
    }

    return next();
  };
}
