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
  'timeout',
  'socket hang up',
  'fetch failed',
  'service unavailable',
];

interface ErrorShape {
  status?: unknown;
  statusCode?: unknown;
  code?: unknown;
  headers?: unknown;
}

function asShape(error: unknown): ErrorShape {
  return typeof error === 'object' && error !== null ? (error as ErrorShape) : {};
}

function readRetryAfter(headers: unknown): string | null {
  if (headers instanceof Headers) return headers.get('retry-after');
  if (typeof headers === 'object' && headers !== null) {
    const entry = Object.entries(headers).find(([k]) => k.toLowerCase() === 'retry-after');
    return typeof entry?.[1] === 'string' ? entry[1] : null;
  }
  return null;
}

export function isTransientError(error: unknown): boolean {
  const shape = asShape(error);
  const status = typeof shape.status === 'number'
    ? shape.status
    : typeof shape.statusCode === 'number' ? shape.statusCode : null;
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  if (typeof shape.code === 'string' && TRANSIENT_ERROR_CODES.has(shape.code.toUpperCase())) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Retry-After in milliseconds (capped at 60s), or 0 if the error carries none.
 */
function getRetryAfterMs(error: unknown): number {
  const value = readRetryAfter(asShape(error).headers);
  if (!value) return 0;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) && seconds > 0 ? Math.min(seconds, 60) * 1000 : 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxAttempts || !isTransientError(err)) {
        throw error;
      }

      options?.onRetry?.(attempt, error);

      // Server-specified Retry-After wins over exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
