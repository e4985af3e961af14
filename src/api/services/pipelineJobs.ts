import { v4 as uuidv4 } from 'uuid';
import type { RunResult } from '../../pipeline/types';
import { errorMessage } from '../../utils/logger';

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface PipelineJob {
  jobId: string;
  status: JobStatus;
  targetDate?: string;
  result?: RunResult;
  error?: string;
  createdAt: string;
  finishedAt?: string;
}

/** In-memory record of pipeline runs started over HTTP. At most one runs at a time. */
export class PipelineJobStore {
  private jobs = new Map<string, PipelineJob>();
  private settling = new Map<string, Promise<void>>();

  get active(): PipelineJob | undefined {
    for (const job of this.jobs.values()) {
      if (job.status === 'pending' || job.status === 'processing') {
        return job;
      }
    }
    return undefined;
  }

  get(jobId: string): PipelineJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  start(run: () => Promise<RunResult>, targetDate?: string): PipelineJob {
    const job: PipelineJob = {
      jobId: uuidv4(),
      status: 'pending',
      createdAt: new Date().toISOString(),
    };
    if (targetDate) {
      job.targetDate = targetDate;
    }
    this.jobs.set(job.jobId, job);
    this.settling.set(job.jobId, this.process(job, run));
    return { ...job };
  }

  /** Resolves once the job has finished, whatever its outcome. */
  async settled(jobId: string): Promise<PipelineJob | undefined> {
    await this.settling.get(jobId);
    return this.get(jobId);
  }

  private async process(job: PipelineJob, run: () => Promise<RunResult>): Promise<void> {
    job.status = 'processing';
    try {
      const result = await run();
      job.result = result;
      job.status = result.status === 'error' ? 'failed' : 'completed';
      if (result.status === 'error') {
        job.error = result.summary;
      }
    } catch (error) {
      job.status = 'failed';
      job.error = errorMessage(error);
    } finally {
      job.finishedAt = new Date().toISOString();
      this.settling.delete(job.jobId);
    }
  }
}
