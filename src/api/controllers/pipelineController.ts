import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { createError } from '../middleware/errorHandler';
import type { PipelineJob, PipelineJobStore } from '../services/pipelineJobs';
import type { LedgerDocument } from '../../ledger/stageLedger';
import type { DataResponse, PipelineQueries, PipelineRunner, RunAccepted } from '../types/api';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const RunBodySchema = z
  .object({
    target_date: z.string().regex(DAY_PATTERN, 'expected YYYY-MM-DD').optional(),
  })
  .default({});

const StatusQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

interface JobParams {
  jobId: string;
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || 'request'}: ${issue.message}` : 'Invalid request';
}

export class PipelineController {
  constructor(
    private runner: PipelineRunner,
    private queries: PipelineQueries,
    private jobs: PipelineJobStore
  ) {}

  async run(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const parsed = RunBodySchema.safeParse(request.body ?? undefined);
    if (!parsed.success) {
      throw createError(firstIssue(parsed.error), 400, 'INVALID_REQUEST');
    }

    const active = this.jobs.active;
    if (active) {
      throw createError(`Pipeline run ${active.jobId} is still in progress`, 409, 'RUN_IN_PROGRESS');
    }

    const targetDate = parsed.data.target_date;
    const job = this.jobs.start(() => this.runner.run({ targetDate }), targetDate);

    const body: DataResponse<RunAccepted> = {
      data: {
        jobId: job.jobId,
        status: 'pending',
        message: 'Pipeline run started',
      },
    };
    reply.status(202).send(body);
  }

  async getJob(request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) {
    const job = this.jobs.get(request.params.jobId);
    if (!job) {
      throw createError('Job not found', 404, 'JOB_NOT_FOUND');
    }
    const body: DataResponse<PipelineJob> = { data: job };
    reply.send(body);
  }

  async getStatus(request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) {
    const parsed = StatusQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      throw createError(firstIssue(parsed.error), 400, 'INVALID_QUERY');
    }
    const status = await this.queries.queryStatus(parsed.data.days);
    const body: DataResponse<LedgerDocument> = { data: status };
    reply.send(body);
  }
}
