import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApi } from './api/index.js';
import { closeDatabase, initializeDatabase } from './db/index.js';
import { SqliteContentStore } from './db/sqlite-store.js';
import { ActivityService } from './services/behavior/activity.js';
import { ContentQualityService } from './services/quality/quality-service.js';
import { SubscriptionService } from './services/subscription/subscription-service.js';
import { config, validateConfig } from './config.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('server');

async function main() {
  logger.info('Starting Article Quality Engine');
  validateConfig();

  const store = new SqliteContentStore(initializeDatabase());

  const app = createApi({
    quality: new ContentQualityService(store),
    subscription: new SubscriptionService(store),
    activity: new ActivityService(store),
  });

  serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  });

  logger.info(`Server running on http://${config.server.host}:${config.server.port}`);

  const shutdown = () => {
    closeDatabase();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
