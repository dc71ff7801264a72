import Fastify from 'fastify';
import { logger } from '../lib/logger.js';
import type { ServiceContainer } from '../container.js';
import { authPlugin } from './plugins/auth.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { jobRoutes } from './routes/jobs.js';
import { queueRoutes } from './routes/queue.js';

export async function buildApp(apiKey: string, container: ServiceContainer) {
  const app = Fastify({
    loggerInstance: logger.child({ component: 'api' }),
  });

  // Plugins
  await app.register(authPlugin, { apiKey });
  await app.register(errorHandlerPlugin);

  // Routes
  await app.register(jobRoutes, { prefix: '/api/jobs', container });
  await app.register(queueRoutes, { prefix: '/api/queue', container });

  // Health check
  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  return app;
}
