import { Hono } from 'hono';
import { cors } from 'hono/cors';
import logger from './lib/logger.js';
import { requestLogger } from './middleware/request-logger.js';
import type { Orchestrator } from './orchestrator/core.js';
import { createSessionRoutes } from './routes/sessions.js';

export interface AppOptions {
  orchestrator: Orchestrator;
  allowedOrigins: string[];
}

export function createApp({ orchestrator, allowedOrigins }: AppOptions) {
  const app = new Hono();

  app.use('*', requestLogger);
  app.use('*', cors({ origin: allowedOrigins, credentials: true }));

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route('/api/sessions', createSessionRoutes(orchestrator));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((err, c) => {
    (c.get('log') ?? logger).error({ error: err.message, stack: err.stack }, 'Unhandled request error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
