import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadConfig, type AppConfig } from './lib/config.js';
import { JSearchClient, type JobSearchClient } from './lib/job-search.js';
import { createTextGenerator, type TextGenerator } from './lib/llm.js';
import logger from './lib/logger.js';
import { createRecordSink, type RecordSink } from './lib/record-sink.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { securityHeadersMiddleware } from './middleware/security-headers.js';
import { createPipelineRoutes } from './routes/pipeline.js';
import { createResumeRoutes } from './routes/resumes.js';

export interface AppDeps {
  config: AppConfig;
  generator: TextGenerator;
  search: JobSearchClient;
  records: RecordSink;
}

/** Builds the HTTP app from explicit collaborators; nothing here reads the environment. */
export function createApp(deps: AppDeps) {
  const { config } = deps;
  const app = new Hono();

  app.use('*', requestIdMiddleware);
  app.use('*', securityHeadersMiddleware({ production: config.env === 'production' }));
  app.use('*', cors({
    origin: config.allowedOrigins,
    credentials: true,
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      llm_provider: config.llm.provider,
      persistence: deps.records.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/resumes', createResumeRoutes());
  app.route('/api/pipeline', createPipelineRoutes({
    generator: deps.generator,
    search: deps.search,
    records: deps.records,
    settings: config.pipeline,
    trustProxy: config.trustProxy,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flushed = flushSentry(2000);

  // Stop accepting new connections, then give the Sentry flush a short budget.
  server.close(() => {
    void Promise.race([
      flushed,
      new Promise((resolve) => setTimeout(resolve, 3_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export async function startServer(config: AppConfig = loadConfig()) {
  if (server) return server;

  logger.level = config.logLevel;
  await initSentry({ dsn: config.sentryDsn, environment: config.env });

  if (config.env === 'production' && config.allowedOrigins.length === 0) {
    logger.error('ALLOWED_ORIGINS not set in production; all cross-origin requests will be blocked');
  }
  if (!config.jobSearch.apiKey) {
    logger.warn('RAPIDAPI_KEY not set; job searches will return no opportunities');
  }

  const app = createApp({
    config,
    generator: createTextGenerator(config.llm),
    search: new JSearchClient(config.jobSearch),
    records: createRecordSink(config.persistence),
  });

  logger.info({ port: config.port, llm_provider: config.llm.provider, model: config.llm.model }, 'Job match server starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  });
}
