import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  /** Key callers by the first X-Forwarded-For hop instead of sharing one bucket. */
  trustProxy?: boolean;
  maxBuckets?: number;
}

const DEFAULT_MAX_BUCKETS = 50_000;

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

/**
 * Fixed-window, in-memory rate limiter keyed by caller and route.
 * Each middleware instance owns its buckets.
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number, options: RateLimitOptions = {}) {
  const buckets = new Map<string, RateLimitEntry>();
  const maxBuckets = options.maxBuckets ?? DEFAULT_MAX_BUCKETS;

  return async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const caller = options.trustProxy
      ? `ip:${trimKeySegment(c.req.header('x-forwarded-for')?.split(',')[0] ?? 'anonymous')}`
      : 'anonymous';
    const key = `${caller}:${scope}`;
    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      for (const [k, e] of buckets) {
        if (now >= e.resetAt) buckets.delete(k);
      }
      while (buckets.size >= maxBuckets) {
        const oldest = buckets.keys().next().value;
        if (oldest === undefined) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    }

    entry.count++;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      c.header('Retry-After', String(resetSeconds));
      logger.warn({ key, scope, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ error: 'Too many requests. Please try again later.' }, 429);
    }

    await next();
  };
}
