import type { ProgressCallback } from './classificationEngine';

export const STAGES = ['scrape', 'classify', 'send'] as const;

export type Stage = (typeof STAGES)[number];

export type StageEvent = 'start' | 'done';

export type StageCallback = (stage: Stage, event: StageEvent) => void;

export interface RunOptions {
  targetDate?: string;
  onStage?: StageCallback;
  onClassifyProgress?: ProgressCallback;
}

export type PipelineOutcome =
  | { status: 'completed'; date: string; daily_file: string }
  | { status: 'already_completed'; date: string }
  | { status: 'no_papers'; date: string };

export type StageState = 'ok' | 'failed' | 'skipped';

export type RunStatus = PipelineOutcome['status'] | 'error';

export interface RunResult {
  status: RunStatus;
  date: string;
  stages: Record<Stage, StageState>;
  paper_count: number;
  summary: string;
  errors: string[];
  log: string[];
}

/** Anything that can run the pipeline once and report; `RunSupervisor` is the real one. */
export interface PipelineRunner {
  run(options?: RunOptions): Promise<RunResult>;
}
