import type { ClassifiedPaper } from '../../agents/schemas';
import type { LedgerDocument } from '../../ledger/stageLedger';
import type { PipelineRunner } from '../../pipeline/types';
import type { PaperQuery } from '../../storage/artifacts';
import type { PipelineJobStore } from '../services/pipelineJobs';

export type { PipelineRunner };

// Read side of the pipeline; satisfied by PipelineOrchestrator.

export interface PipelineQueries {
  queryStatus(days?: number): Promise<LedgerDocument>;
  queryPapers(query?: PaperQuery): Promise<ClassifiedPaper[]>;
}

export interface ApiDeps {
  runner: PipelineRunner;
  queries: PipelineQueries;
  jobs?: PipelineJobStore;
  /** Passed to Fastify; `false` disables request logging. */
  logger?: boolean | { level: string };
}

export interface DataResponse<T> {
  data: T;
}

export interface PapersResponse extends DataResponse<ClassifiedPaper[]> {
  count: number;
}

export interface RunAccepted {
  jobId: string;
  status: 'pending';
  message: string;
}
