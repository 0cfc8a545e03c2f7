import type { Event } from '@sentry/node';
import logger from './logger.js';

type SentryModule = typeof import('@sentry/node');

let sentry: SentryModule | null = null;
let enabled = false;

const SENSITIVE_EXTRA_KEYS = [
  'SUPABASE_SERVICE_ROLE_KEY',
  'ZAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'RAPIDAPI_KEY',
  'SENTRY_DSN',
];

const SENSITIVE_FIELD = /key|token|secret|authorization/i;

/** Redacts secrets from extras and breadcrumb data before an event leaves the process. */
export function scrubEvent<E extends Pick<Event, 'extra' | 'breadcrumbs'>>(event: E): E {
  if (event.extra) {
    for (const key of SENSITIVE_EXTRA_KEYS) {
      if (key in event.extra) event.extra[key] = '[REDACTED]';
    }
  }
  for (const crumb of event.breadcrumbs ?? []) {
    if (!crumb.data) continue;
    for (const key of Object.keys(crumb.data)) {
      if (SENSITIVE_FIELD.test(key)) crumb.data[key] = '[REDACTED]';
    }
  }
  return event;
}

/**
 * Loads @sentry/node on demand. Without a DSN, or when the module cannot be
 * loaded, reporting stays off and every other export is a no-op.
 */
export async function initSentry(options: { dsn?: string; environment: string }): Promise<void> {
  if (!options.dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }
  try {
    sentry = await import('@sentry/node');
  } catch (err) {
    logger.warn({ err }, 'Sentry requested but @sentry/node could not be loaded; continuing without Sentry');
    return;
  }

  sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: 0.1,
    beforeSend: (event) => scrubEvent(event),
  });
  enabled = true;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  const client = sentry;
  if (!enabled || !client) return;

  client.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    client.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled || !sentry) return;
  try {
    await sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, 'Sentry flush failed during shutdown');
  }
}
