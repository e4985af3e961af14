import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadProfile, ensureDataDirectories } from '../config/profile';
import { createPipeline } from '../pipeline/createPipeline';
import { errorHandler } from './middleware';
import { registerPapersRoutes, registerPipelineRoutes } from './routes';
import { PipelineJobStore } from './services/pipelineJobs';
import type { ApiDeps } from './types/api';

async function buildServer(deps: ApiDeps) {
  const fastify = Fastify({
    logger: deps.logger ?? { level: process.env.LOG_LEVEL || 'info' },
  });

  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || '*',
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerPipelineRoutes(fastify, deps.runner, deps.queries, deps.jobs ?? new PipelineJobStore());
  registerPapersRoutes(fastify, deps.queries);

  return fastify;
}

async function start() {
  const profile = await loadProfile();
  await ensureDataDirectories(profile);
  const pipeline = createPipeline(profile);

  const server = await buildServer({
    runner: pipeline.supervisor,
    queries: pipeline.orchestrator,
  });
  // PORT is what hosting platforms set; API_PORT is the local override
  const port = parseInt(process.env.PORT || process.env.API_PORT || '3000', 10);
  const host = process.env.API_HOST || '0.0.0.0';

  await server.listen({ port, host });
  server.log.info(`API server listening on http://${host}:${port}`);
  return server;
}

if (require.main === module) {
  start().catch((err) => {
    console.error('Error starting server:', err);
    process.exit(1);
  });
}

export { buildServer, start };
