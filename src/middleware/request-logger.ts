import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Assigns a request id (honouring a well-formed X-Request-ID), exposes a
 * request-scoped child logger and logs one line per completed request.
 */
export async function requestLogger(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = raw && REQUEST_ID_RE.test(raw) ? raw : randomUUID();
  const log = logger.child({ requestId });

  c.set('requestId', requestId);
  c.set('log', log);
  c.header('X-Request-ID', requestId);

  const startedAt = Date.now();
  await next();
  log.info(
    { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
    'Request completed',
  );
}
