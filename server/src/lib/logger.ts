import pino, { type Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isProduction = nodeEnv === 'production';
const usePrettyTransport = !isProduction && nodeEnv !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(usePrettyTransport
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {}),
});

export type { Logger };

/**
 * Creates a child logger scoped to a single pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
