import { describe, it, expect } from 'vitest';
import { captureError, flushSentry, initSentry, scrubEvent } from '../lib/sentry.js';

describe('scrubEvent', () => {
  it('redacts secret extras and sensitive breadcrumb fields', () => {
    const event = scrubEvent({
      extra: { ANTHROPIC_API_KEY: 'test-secret', runId: 'run-1' },
      breadcrumbs: [{ data: { authorization: 'Bearer test-token', url: '/api/pipeline/run' } }, { message: 'no data' }],
    });

    expect(event.extra).toEqual({ ANTHROPIC_API_KEY: '[REDACTED]', runId: 'run-1' });
    expect(event.breadcrumbs?.[0].data).toEqual({ authorization: '[REDACTED]', url: '/api/pipeline/run' });
  });
});

describe('without a DSN', () => {
  it('stays disabled and every call is a no-op', async () => {
    await initSentry({ environment: 'test' });
    expect(() => captureError(new Error('boom'), { runId: 'run-1' })).not.toThrow();
    await expect(flushSentry()).resolves.toBeUndefined();
  });
});
