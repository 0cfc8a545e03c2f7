import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { JobMatchPipeline } from '../agents/pipeline.js';
import type { PipelineEmitter, PipelineEvent, PipelineReport, PipelineRunRequest, TraceEntry } from '../agents/types.js';
import type { PipelineSettings } from '../lib/config.js';
import { PreconditionError, StageError, errorMessage } from '../lib/errors.js';
import type { JobSearchClient } from '../lib/job-search.js';
import type { TextGenerator } from '../lib/llm.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import type { RecordSink } from '../lib/record-sink.js';
import { captureError } from '../lib/sentry.js';
import { readJsonBody } from '../lib/validate.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';

export interface PipelineRouteDeps {
  generator: TextGenerator;
  search: JobSearchClient;
  records: RecordSink;
  settings: PipelineSettings;
  trustProxy?: boolean;
}

const MAX_RUN_BODY_BYTES = 256_000;

const intakeSchema = z.object({
  full_name: z.string().trim().min(1).max(200),
  work_preference: z.string().trim().max(50).default(''),
  location: z.string().trim().max(200).default(''),
  country: z.string().trim().max(100).default(''),
  experience_level: z.string().trim().max(50).optional(),
});

type Intake = z.infer<typeof intakeSchema>;

function runRequestSchema(settings: PipelineSettings) {
  return z.object({
    resume_text: z.string().trim().min(1, 'resume_text is required').max(settings.maxResumeChars),
    target_role: z.string().trim().min(1, 'target_role is required').max(200),
    num_jobs: z.number().int().min(1).max(10).optional(),
    location: z.string().trim().max(200).optional(),
    batch_scoring: z.boolean().optional(),
    intake: intakeSchema.optional(),
  });
}

/** HTTP status for a failed run: out-of-order 409, stage failure 422, anything else 500. */
export function statusForPipelineError(err: unknown): 409 | 422 | 500 {
  if (err instanceof PreconditionError) return 409;
  if (err instanceof StageError) return 422;
  return 500;
}

function errorBody(err: unknown, runId: string, trace: TraceEntry[]) {
  const status = statusForPipelineError(err);
  return {
    error: status === 500 ? 'Pipeline failed unexpectedly' : errorMessage(err),
    code: err instanceof Error ? err.name : 'Error',
    ...(err instanceof StageError && { stage: err.stage }),
    run_id: runId,
    trace,
  };
}

/**
 * Writes the intake row and the ranked rows. Each write stands alone; a
 * failure is logged and reported, never surfaced to the caller.
 */
async function persistRun(records: RecordSink, report: PipelineReport, intake: Intake | undefined, log: Logger) {
  const candidateName = intake?.full_name ?? report.candidate.name ?? 'Unknown candidate';
  const writes: Array<{ what: string; write: () => Promise<void> }> = [
    { what: 'ranked_opportunities', write: () => records.saveRankedOpportunities(candidateName, report.ranking.entries) },
  ];
  if (intake) {
    writes.unshift({
      what: 'candidate_intake',
      write: () => records.saveCandidate({
        full_name: intake.full_name,
        experience_level: intake.experience_level ?? report.candidate.experience_level,
        work_preference: intake.work_preference,
        location: intake.location,
        country: intake.country,
        target_role: report.job_search.target_role,
        skills_count: report.candidate.skills_count,
        total_experience_years: report.candidate.total_years,
      }),
    });
  }

  const results = await Promise.allSettled(writes.map(({ write }) => write()));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      const what = writes[i].what;
      log.error({ sink: records.name, what, error: errorMessage(result.reason) }, 'Failed to persist pipeline records');
      captureError(result.reason, { runId: report.run_id, sink: records.name, what });
    }
  });
}

export function createPipelineRoutes(deps: PipelineRouteDeps) {
  const routes = new Hono();
  const schema = runRequestSchema(deps.settings);

  routes.use('*', rateLimitMiddleware(deps.settings.rateLimitPerMinute, 60_000, { trustProxy: deps.trustProxy }));

  function createPipeline(c: Context, body: z.infer<typeof schema>, signal: AbortSignal, emit?: PipelineEmitter) {
    const runId = c.get('requestId');
    const log = createRunLogger(runId, { target_role: body.target_role });
    const request: PipelineRunRequest = {
      resume_text: body.resume_text,
      target_role: body.target_role,
      num_jobs: body.num_jobs ?? deps.settings.defaultNumJobs,
      location: body.location,
      batch_scoring: body.batch_scoring,
    };
    const pipeline = new JobMatchPipeline({
      runId,
      generator: deps.generator,
      search: deps.search,
      log,
      emit,
      signal,
      batchScoring: deps.settings.batchScoring,
    });
    return { pipeline, request, log, runId };
  }

  function reportFailure(err: unknown, runId: string, log: Logger, state: string) {
    if (statusForPipelineError(err) === 500) {
      captureError(err, { runId, state });
      log.error({ err, state }, 'Pipeline run failed');
    } else {
      log.warn({ error: errorMessage(err), state }, 'Pipeline run rejected');
    }
  }

  // POST /pipeline/run — Run every stage and return the final report
  routes.post('/run', async (c) => {
    const body = await readJsonBody(c, schema, MAX_RUN_BODY_BYTES);
    if (!body.ok) return body.response;

    const { pipeline, request, log, runId } = createPipeline(c, body.data, c.req.raw.signal);
    try {
      const report = await pipeline.run(request);
      await persistRun(deps.records, report, body.data.intake, log);
      return c.json({ report });
    } catch (err) {
      reportFailure(err, runId, log, pipeline.state);
      return c.json(errorBody(err, runId, pipeline.getTrace()), statusForPipelineError(err));
    }
  });

  // POST /pipeline/stream — Same run, with trace entries pushed as Server-Sent Events
  routes.post('/stream', async (c) => {
    const body = await readJsonBody(c, schema, MAX_RUN_BODY_BYTES);
    if (!body.ok) return body.response;

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());

      const send = (event: PipelineEvent) => stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
      const { pipeline, request, log, runId } = createPipeline(c, body.data, controller.signal, (event) => {
        void send(event).catch((err: unknown) => {
          log.warn({ error: errorMessage(err) }, 'SSE write failed');
        });
      });

      try {
        const report = await pipeline.run(request);
        await persistRun(deps.records, report, body.data.intake, log);
        await send({ type: 'pipeline_complete', run_id: runId, report });
      } catch (err) {
        if (controller.signal.aborted) {
          log.info({ state: pipeline.state }, 'Client disconnected; pipeline run aborted');
          return;
        }
        reportFailure(err, runId, log, pipeline.state);
        const { error } = errorBody(err, runId, []);
        await send({ type: 'pipeline_error', run_id: runId, error, state: pipeline.state });
      }
    });
  });

  return routes;
}
