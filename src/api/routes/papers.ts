import type { FastifyInstance } from 'fastify';
import { PapersController } from '../controllers/papersController';
import type { PipelineQueries } from '../types/api';

export function registerPapersRoutes(fastify: FastifyInstance, queries: PipelineQueries) {
  const controller = new PapersController(queries);

  // GET /api/papers?keyword=&date=YYYY-MM-DD
  fastify.get<{ Querystring: unknown }>('/api/papers', async (request, reply) => {
    await controller.list(request, reply);
  });
}
