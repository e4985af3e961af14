import type { FastifyInstance } from 'fastify';
import { PipelineController } from '../controllers/pipelineController';
import { requireApiKey } from '../middleware';
import type { PipelineJobStore } from '../services/pipelineJobs';
import type { PipelineQueries, PipelineRunner } from '../types/api';

export function registerPipelineRoutes(
  fastify: FastifyInstance,
  runner: PipelineRunner,
  queries: PipelineQueries,
  jobs: PipelineJobStore
) {
  const controller = new PipelineController(runner, queries, jobs);

  // POST /api/pipeline/run - Requires API key
  fastify.post<{ Body: unknown }>(
    '/api/pipeline/run',
    { preHandler: requireApiKey },
    async (request, reply) => {
      await controller.run(request, reply);
    }
  );

  // GET /api/pipeline/jobs/:jobId
  fastify.get<{ Params: { jobId: string } }>('/api/pipeline/jobs/:jobId', async (request, reply) => {
    await controller.getJob(request, reply);
  });

  // GET /api/pipeline/status?days=7
  fastify.get<{ Querystring: unknown }>('/api/pipeline/status', async (request, reply) => {
    await controller.getStatus(request, reply);
  });
}
