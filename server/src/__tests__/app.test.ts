import { describe, it, expect, vi } from 'vitest';
import { createApp } from '../index.js';
import type { PipelineReport, RankingEntry, TraceEntry } from '../agents/types.js';
import { loadConfig } from '../lib/config.js';
import type { CandidateIntakeRecord, RecordSink } from '../lib/record-sink.js';
import { statusForPipelineError } from '../routes/pipeline.js';
import { PreconditionError, StageError } from '../lib/errors.js';
import { SENIOR_JOBS, fakeSearch, fullRunScript, scriptedGenerator, type ScriptedResponse } from './fixtures.js';

function memorySink() {
  return {
    name: 'memory',
    saveCandidate: vi.fn(async (_record: CandidateIntakeRecord) => {}),
    saveRankedOpportunities: vi.fn(async (_name: string, _entries: readonly RankingEntry[]) => {}),
  } satisfies RecordSink;
}

function buildApp(script: ScriptedResponse[] = [], env: Record<string, string> = {}) {
  const config = loadConfig({ NODE_ENV: 'test', ANTHROPIC_API_KEY: 'test-secret', PERSISTENCE_BACKEND: 'none', ...env });
  const generator = scriptedGenerator(...script);
  const records = memorySink();
  const app = createApp({ config, generator, search: fakeSearch(SENIOR_JOBS), records });
  return { app, generator, records };
}

function postJson(body: unknown, headers: Record<string, string> = {}) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

const RUN_BODY = { resume_text: 'Jane Doe\nPython, SQL', target_role: 'Backend Engineer', num_jobs: 3 };

/** `event:` names from an SSE body, with their decoded data. */
function parseSse(text: string): Array<{ event: string; data: unknown }> {
  return text
    .split('\n\n')
    .filter((block) => block.trim())
    .map((block) => {
      const lines = block.split('\n');
      const event = lines.find((l) => l.startsWith('event: '))?.slice(7) ?? '';
      const data = lines.filter((l) => l.startsWith('data: ')).map((l) => l.slice(6)).join('\n');
      return { event, data: JSON.parse(data) };
    });
}

describe('GET /health', () => {
  it('reports the provider and sink without caching', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/health');

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    const body = await res.json() as { status: string; llm_provider: string; persistence: string };
    expect(body).toMatchObject({ status: 'ok', llm_provider: 'anthropic', persistence: 'memory' });
  });

  it('returns JSON 404 for unknown routes', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('POST /api/pipeline/run', () => {
  it('runs the pipeline and saves the ranked rows under the extracted name', async () => {
    const { app, records } = buildApp(fullRunScript());
    const res = await app.request('http://test/api/pipeline/run', postJson(RUN_BODY, { 'X-Request-ID': 'run-abc' }));

    expect(res.status).toBe(200);
    const { report } = await res.json() as { report: PipelineReport };
    expect(report.run_id).toBe('run-abc');
    expect(report.ranking.entries).toHaveLength(3);
    expect(records.saveRankedOpportunities).toHaveBeenCalledTimes(1);
    expect(records.saveRankedOpportunities.mock.calls[0][0]).toBe('Jane Doe');
    expect(records.saveCandidate).not.toHaveBeenCalled();
  });

  it('saves the intake row when one is sent', async () => {
    const { app, records } = buildApp(fullRunScript());
    const res = await app.request('http://test/api/pipeline/run', postJson({
      ...RUN_BODY,
      intake: { full_name: 'Jane Q. Doe', work_preference: 'Remote', country: 'US' },
    }));

    expect(res.status).toBe(200);
    expect(records.saveCandidate).toHaveBeenCalledWith({
      full_name: 'Jane Q. Doe',
      experience_level: 'senior',
      work_preference: 'Remote',
      location: '',
      country: 'US',
      target_role: 'Backend Engineer',
      skills_count: 3,
      total_experience_years: 6,
    });
    expect(records.saveRankedOpportunities.mock.calls[0][0]).toBe('Jane Q. Doe');
  });

  it('still returns the report when persistence fails', async () => {
    const { app, records } = buildApp(fullRunScript());
    records.saveRankedOpportunities.mockRejectedValueOnce(new Error('disk full'));
    const res = await app.request('http://test/api/pipeline/run', postJson(RUN_BODY));
    expect(res.status).toBe(200);
  });

  it('answers a stage failure with 422 and the trace', async () => {
    const { app } = buildApp(['not a profile']);
    const res = await app.request('http://test/api/pipeline/run', postJson(RUN_BODY, { 'X-Request-ID': 'run-422' }));

    expect(res.status).toBe(422);
    const body = await res.json() as { error: string; code: string; stage: string; run_id: string; trace: TraceEntry[] };
    expect(body.error).toBe('Failed to build candidate profile: No JSON object found in generated text');
    expect(body.code).toBe('StageError');
    expect(body.stage).toBe('profile_extraction');
    expect(body.run_id).toBe('run-422');
    expect(body.trace.map((e) => e.status)).toEqual(['started', 'failed']);
  });

  it('hides unexpected failures behind a 500', async () => {
    const { app } = buildApp([new Error('socket hang up')]);
    const res = await app.request('http://test/api/pipeline/run', postJson(RUN_BODY));

    expect(res.status).toBe(500);
    const body = await res.json() as { error: string; code: string };
    expect(body.error).toBe('Pipeline failed unexpectedly');
    expect(body.code).toBe('Error');
  });

  it('rejects a request without a target role', async () => {
    const { app, generator } = buildApp();
    const res = await app.request('http://test/api/pipeline/run', postJson({ resume_text: 'text', target_role: '  ' }));

    expect(res.status).toBe(400);
    const body = await res.json() as { error: string; details: Array<{ path: string[]; message: string }> };
    expect(body.error).toBe('Invalid request');
    expect(body.details[0]).toMatchObject({ path: ['target_role'], message: 'target_role is required' });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('rejects malformed JSON and other content types', async () => {
    const { app } = buildApp();
    const malformed = await app.request('http://test/api/pipeline/run', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"resume_text":',
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Request body is not valid JSON' });

    const plain = await app.request('http://test/api/pipeline/run', {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello',
    });
    expect(plain.status).toBe(415);
  });

  it('rate limits pipeline runs', async () => {
    const { app } = buildApp([], { PIPELINE_RATE_LIMIT_PER_MINUTE: '1' });
    const bad = postJson({ resume_text: 'text' });
    expect((await app.request('http://test/api/pipeline/run', bad)).status).toBe(400);
    expect((await app.request('http://test/api/pipeline/run', bad)).status).toBe(429);
  });
});

describe('statusForPipelineError', () => {
  it('maps error classes to statuses', () => {
    expect(statusForPipelineError(new PreconditionError('rank_opportunities', 'empty', 'requires scored opportunities'))).toBe(409);
    expect(statusForPipelineError(new StageError('fit_scoring', 'bad output'))).toBe(422);
    expect(statusForPipelineError(new TypeError('boom'))).toBe(500);
  });
});

describe('POST /api/pipeline/stream', () => {
  it('streams trace events and ends with the report', async () => {
    const { app } = buildApp(fullRunScript());
    const res = await app.request('http://test/api/pipeline/stream', postJson(RUN_BODY, { 'X-Request-ID': 'run-sse' }));

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toContain('text/event-stream');
    const events = parseSse(await res.text());
    const last = events.at(-1);
    expect(events[0].event).toBe('trace');
    expect(last?.event).toBe('pipeline_complete');
    expect(last?.data).toMatchObject({ type: 'pipeline_complete', run_id: 'run-sse' });
    expect(events.filter((e) => e.event === 'trace')).toHaveLength(13);
  });

  it('ends with an error event when a stage fails', async () => {
    const { app } = buildApp(['not a profile']);
    const res = await app.request('http://test/api/pipeline/stream', postJson(RUN_BODY, { 'X-Request-ID': 'run-err' }));

    const events = parseSse(await res.text());
    expect(events.at(-1)).toEqual({
      event: 'pipeline_error',
      data: {
        type: 'pipeline_error',
        run_id: 'run-err',
        error: 'Failed to build candidate profile: No JSON object found in generated text',
        state: 'empty',
      },
    });
  });

  it('validates the body before opening the stream', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/api/pipeline/stream', postJson({ target_role: 'Engineer' }));
    expect(res.status).toBe(400);
  });
});

describe('POST /api/resumes/extract', () => {
  function upload(file?: File) {
    const form = new FormData();
    if (file) form.append('file', file);
    return { method: 'POST', body: form };
  }

  it('returns the normalized text of a .txt upload', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/api/resumes/extract', upload(new File(['Jane Doe  \nEngineer\n\n\n\nPython'], 'cv.txt')));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ text: 'Jane Doe\nEngineer\n\nPython', chars: 25 });
  });

  it('rejects legacy .doc uploads with 400', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/api/resumes/extract', upload(new File(['x'], 'cv.doc')));

    expect(res.status).toBe(400);
    const body = await res.json() as { code: string };
    expect(body.code).toBe('unsupported_format');
  });

  it('requires a file field', async () => {
    const { app } = buildApp();
    const res = await app.request('http://test/api/resumes/extract', upload());
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing "file" field' });
  });
});
