import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger as honoLogger } from 'hono/logger';
import { contentRoutes, type ContentServices } from './content/index.js';
import { errorMessage, errorStatus } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('api');

export interface ApiOptions {
  /** Per-request access lines; off in tests. */
  requestLogging?: boolean;
}

export function createApi(services: ContentServices, options: ApiOptions = {}) {
  const app = new Hono();

  app.use('*', cors());
  if (options.requestLogging ?? true) {
    app.use('*', honoLogger());
  }
  app.use('*', bodyLimit({ maxSize: 1024 * 1024 }));

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.route('/api/content', contentRoutes(services));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    const status = errorStatus(error);
    if (status === 500) {
      logger.error('Request failed', { path: c.req.path, error });
    }
    return c.json({ error: errorMessage(error) }, status);
  });

  return app;
}
