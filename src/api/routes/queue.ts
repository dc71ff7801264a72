import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContainer } from '../../container.js';

export const queueRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  // GET /api/queue/status
  app.get('/status', async () => {
    const status = await opts.container.queue.status();
    return { data: status };
  });
};
