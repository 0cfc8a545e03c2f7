import type { Context } from 'hono';
import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data on success, or the zod issues on failure.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

export type JsonBodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/**
 * Reads a JSON request body under a byte limit and validates it.
 * 413 when too large, 415 for a non-JSON content type, 400 for unparseable
 * JSON or a schema failure (with the zod issues as `details`).
 */
export async function readJsonBody<T extends z.ZodType>(
  c: Context,
  schema: T,
  maxBytes: number,
): Promise<JsonBodyResult<z.infer<T>>> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415) };
  }

  const raw = await c.req.text();
  if (new TextEncoder().encode(raw).byteLength > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  let body: unknown;
  try {
    body = raw.trim() ? JSON.parse(raw) : {};
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }

  const parsed = validateBody(schema, body);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: 'Invalid request', details: parsed.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}
