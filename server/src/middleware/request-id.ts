import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a caller-supplied X-Request-ID when it is short and safe, otherwise
 * mints one. The id is echoed back, bound to a request-scoped logger, and
 * doubles as the pipeline run id.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const candidate = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
