import { Hono } from 'hono';
import { ResumeExtractionError, type ResumeExtractionErrorCode } from '../lib/errors.js';
import { MAX_RESUME_BYTES, extractResumeText } from '../lib/resume-text.js';

const STATUS_BY_CODE: Record<ResumeExtractionErrorCode, 400 | 422> = {
  unsupported_format: 400,
  too_large: 400,
  empty: 400,
  unreadable: 422,
};

export function createResumeRoutes() {
  const resumes = new Hono();

  // POST /resumes/extract — Plain text from an uploaded .txt, .docx or .pdf
  resumes.post('/extract', async (c) => {
    const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
    if (Number.isFinite(declared) && declared > MAX_RESUME_BYTES * 2) {
      return c.json({ error: 'File too large. Please upload a resume under 10 MB.', code: 'too_large' }, 400);
    }

    const form = await c.req.parseBody().catch(() => null);
    if (!form) {
      return c.json({ error: 'Expected a multipart/form-data upload' }, 400);
    }

    const file = form['file'];
    if (!(file instanceof File)) {
      return c.json({ error: 'Missing "file" field' }, 400);
    }

    try {
      const text = await extractResumeText(new Uint8Array(await file.arrayBuffer()), file.name);
      c.get('log').info({ file: file.name, bytes: file.size, chars: text.length }, 'Résumé text extracted');
      return c.json({ text, chars: text.length });
    } catch (err) {
      if (err instanceof ResumeExtractionError) {
        c.get('log').warn({ file: file.name, code: err.code, error: err.message }, 'Résumé extraction rejected');
        return c.json({ error: err.message, code: err.code }, STATUS_BY_CODE[err.code]);
      }
      throw err;
    }
  });

  return resumes;
}
