import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware } from '../middleware/request-id.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestIdMiddleware);
  app.get('/id', (c) => {
    const bindings = c.get('log').bindings();
    return c.json({ requestId: c.get('requestId'), loggedAs: bindings.requestId });
  });
  return app;
}

describe('requestIdMiddleware', () => {
  it('uses a valid caller-provided request id and binds it to the logger', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': ' req-123_ABC:1 ' },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-123_ABC:1');
    const body = await res.json() as { requestId: string; loggedAs: string };
    expect(body).toEqual({ requestId: 'req-123_ABC:1', loggedAs: 'req-123_ABC:1' });
  });

  it('mints a UUID for ids with unsafe characters', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'bad id' },
    });
    const echoed = res.headers.get('X-Request-ID') ?? '';
    expect(echoed).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('mints a UUID when no id is sent', async () => {
    const res = await createApp().request('http://test/id');
    const body = await res.json() as { requestId: string };
    expect(body.requestId).toBe(res.headers.get('X-Request-ID'));
    expect(body.requestId).toHaveLength(36);
  });

  it('caps very long request ids to 64 chars', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'a'.repeat(200) },
    });
    expect(res.headers.get('X-Request-ID')).toBe('a'.repeat(64));
  });
});
