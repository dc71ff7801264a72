import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ServiceContainer } from '../../container.js';
import { NotFoundError } from '../../lib/errors.js';
import { JOB_STATES } from '../../services/queue/index.js';

const listJobsQuery = z.object({
  state: z.enum(JOB_STATES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const jobRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { ledger, queue } = opts.container;

  // GET /api/jobs
  app.get('/', async (request) => {
    const query = listJobsQuery.parse(request.query);
    const jobs = await ledger.list({ state: query.state, limit: query.limit });
    return { data: jobs };
  });

  // GET /api/jobs/:id
  app.get<{ Params: { id: string } }>('/:id', async (request) => {
    const job = await ledger.get(request.params.id);
    if (!job) throw new NotFoundError('Job', request.params.id);
    return { data: job };
  });

  // POST /api/jobs/:id/requeue
  app.post<{ Params: { id: string } }>('/:id/requeue', async (request, reply) => {
    const job = await queue.requeue(request.params.id);
    return reply.status(201).send({ data: job });
  });
};
