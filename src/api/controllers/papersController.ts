import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { createError } from '../middleware/errorHandler';
import type { PapersResponse, PipelineQueries } from '../types/api';

const PapersQuerySchema = z.object({
  keyword: z.string().trim().optional(),
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .optional(),
});

export class PapersController {
  constructor(private queries: PipelineQueries) {}

  async list(request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) {
    const parsed = PapersQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw createError(issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid query', 400, 'INVALID_QUERY');
    }

    const papers = await this.queries.queryPapers({
      keyword: parsed.data.keyword || undefined,
      date: parsed.data.date,
    });
    const body: PapersResponse = { data: papers, count: papers.length };
    reply.send(body);
  }
}
