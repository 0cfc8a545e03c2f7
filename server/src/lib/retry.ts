const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'service unavailable',
  'bad gateway',
];

function readNumberField(error: unknown, key: 'status' | 'statusCode'): number | null {
  if (typeof error !== 'object' || error === null || !(key in error)) return null;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : null;
}

function readCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const value: unknown = Reflect.get(error, 'code');
  return typeof value === 'string' ? value.toUpperCase() : null;
}

/**
 * Transport-level failures worth another attempt: throttling, 5xx and
 * connection resets. Timeouts and aborts are not retried.
 */
export function isTransientError(error: unknown): boolean {
  const status = readNumberField(error, 'status') ?? readNumberField(error, 'statusCode');
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = readCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: {
    maxAttempts?: number;
    baseDelay?: number;
    onRetry?: (attempt: number, error: unknown) => void;
  },
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 2;
  const baseDelay = options?.baseDelay ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !isTransientError(err)) {
        throw err;
      }
      options?.onRetry?.(attempt, err);
      const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
